/**
 * Unit tests for the pure merge decision
 */

import { describe, it, expect } from "vitest";
import type { JobRecord } from "@/types";
import { decideMerge, isMoreComplete, mergeRecords } from "@/dedup";
import { countFilledRequiredFields, isJobComplete } from "@/freshness";
import { makeJobRecord } from "../helpers/fakes";

const URL_A = "https://a.com/job1";

describe("decideMerge", () => {
  it("inserts when nothing is stored for the URL", () => {
    const candidate = makeJobRecord({ sourceUrl: URL_A });
    expect(decideMerge(candidate, null)).toEqual({ kind: "insert", record: candidate });
  });

  it("updates an incomplete record with a more complete candidate", () => {
    const existing = makeJobRecord({
      sourceUrl: URL_A,
      title: "Engineer",
      location: "",
      employmentType: "",
      aboutJob: "short",
    });
    const candidate = makeJobRecord({
      sourceUrl: URL_A,
      title: "Engineer",
      location: "San Francisco, CA",
      employmentType: "Full time",
      aboutJob: "d".repeat(230),
    });

    const decision = decideMerge(candidate, existing);

    expect(decision.kind).toBe("update");
    if (decision.kind !== "update") return;
    expect(decision.record.location).toBe("San Francisco, CA");
    expect(decision.record.employmentType).toBe("Full time");
    expect(decision.record.aboutJob).toBe("d".repeat(230));
    expect(isJobComplete(decision.record)).toBe(true);
    expect(decision.previous).toBe(existing);
  });

  it("skips a complete stored record even for an identical candidate", () => {
    const existing = makeJobRecord({ sourceUrl: "https://b.com/job2" });
    const decision = decideMerge({ ...existing }, existing);
    expect(decision).toEqual({ kind: "skip", reason: "already_complete", existing });
  });

  it("repairs the description from a candidate that lacks other fields", () => {
    const existing = makeJobRecord({
      sourceUrl: URL_A,
      location: "Austin, TX",
      employmentType: "Full time",
      aboutJob: "short text",
    });
    const candidate = makeJobRecord({
      sourceUrl: URL_A,
      location: "",
      alternateLocations: ["Austin, TX"],
      employmentType: "",
      aboutJob: "r".repeat(300),
    });

    const decision = decideMerge(candidate, existing);

    expect(decision.kind).toBe("update");
    if (decision.kind !== "update") return;
    expect(decision.record.location).toBe("Austin, TX");
    expect(decision.record.alternateLocations).toEqual(["Austin, TX"]);
    expect(decision.record.employmentType).toBe("Full time");
    expect(decision.record.aboutJob).toBe("r".repeat(300));
    expect(isJobComplete(decision.record)).toBe(true);
  });

  it("skips a candidate that is not more complete", () => {
    const existing = makeJobRecord({ employmentType: "", aboutJob: "a fairly long description" });
    const candidate = makeJobRecord({ employmentType: "", aboutJob: "shorter one" });
    const decision = decideMerge(candidate, existing);
    expect(decision.kind).toBe("skip");
    if (decision.kind !== "skip") return;
    expect(decision.reason).toBe("not_more_complete");
  });
});

describe("isMoreComplete", () => {
  it("prefers more filled required fields", () => {
    const existing = makeJobRecord({ location: "", employmentType: "" });
    expect(isMoreComplete(makeJobRecord({ employmentType: "" }), existing)).toBe(true);
    expect(isMoreComplete(existing, makeJobRecord({ employmentType: "" }))).toBe(false);
  });

  it("accepts a longer aboutJob even with fewer filled fields", () => {
    const existing = makeJobRecord({ aboutJob: "short text" });
    const candidate = makeJobRecord({ location: "", employmentType: "", aboutJob: "w".repeat(300) });
    expect(isMoreComplete(candidate, existing)).toBe(true);
  });

  it("compares the trimmed aboutJob length", () => {
    const existing = makeJobRecord({ employmentType: "", aboutJob: "abc" });
    expect(isMoreComplete(makeJobRecord({ employmentType: "", aboutJob: "abcd" }), existing)).toBe(true);
    expect(isMoreComplete(makeJobRecord({ employmentType: "", aboutJob: "  abc   " }), existing)).toBe(false);
  });
});

describe("mergeRecords", () => {
  it("keeps stored values the candidate lacks and the longer description", () => {
    const existing = makeJobRecord({
      employmentType: "",
      salary: "$120,000 - $150,000",
      aboutJob: "x".repeat(150),
      alternateLocations: ["Austin, TX"],
    });
    const candidate = makeJobRecord({
      employerKey: "other",
      salary: "",
      aboutJob: "y".repeat(100),
      benefits: "401k match",
      alternateLocations: ["austin, tx", "Denver, CO"],
      scrapedAt: "2026-02-01T00:00:00.000Z",
    });

    const merged = mergeRecords(existing, candidate);

    expect(merged.employmentType).toBe("Full time");
    expect(merged.salary).toBe("$120,000 - $150,000");
    expect(merged.aboutJob).toBe("x".repeat(150));
    expect(merged.benefits).toBe("401k match");
    expect(merged.alternateLocations).toEqual(["Austin, TX", "Denver, CO"]);
    expect(merged.employerKey).toBe(existing.employerKey);
    expect(merged.scrapedAt).toBe("2026-02-01T00:00:00.000Z");
  });

  it("never decreases completeness", () => {
    const stored: JobRecord[] = [
      makeJobRecord({ location: "", employmentType: "", aboutJob: "short" }),
      makeJobRecord({ title: "Engineer", employmentType: "", aboutJob: "z".repeat(250) }),
      makeJobRecord({ aboutJob: "z".repeat(120), salary: "$100,000" }),
    ];
    const candidates: JobRecord[] = [
      makeJobRecord({ employmentType: "", aboutJob: "q".repeat(300), salary: "" }),
      makeJobRecord({ location: "", aboutJob: "short" }),
      makeJobRecord({ title: "Staff Engineer", location: "Remote - US", aboutJob: "" }),
    ];

    for (const existing of stored) {
      for (const candidate of candidates) {
        const merged = mergeRecords(existing, candidate);
        expect(countFilledRequiredFields(merged)).toBeGreaterThanOrEqual(countFilledRequiredFields(existing));
        expect(merged.aboutJob.trim().length).toBeGreaterThanOrEqual(existing.aboutJob.trim().length);
        if (isJobComplete(existing)) {
          expect(isJobComplete(merged)).toBe(true);
        }
      }
    }
  });
});
