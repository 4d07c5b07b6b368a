/**
 * Unit tests for the employment type filter
 */

import { describe, it, expect } from "vitest";
import { checkEmploymentType } from "@/extraction";

describe("checkEmploymentType", () => {
  it.each(["Full-Time", "full time", "FULL TIME", "Permanent", "Regular employee"])(
    "normalizes %s to the canonical type",
    (stated) => {
      expect(checkEmploymentType(stated, "")).toEqual({ ok: true, employmentType: "Full time" });
    },
  );

  it.each(["Part-time", "Contract", "Contractor", "Internship", "Temporary", "Freelance", "Seasonal"])(
    "rejects %s",
    (stated) => {
      expect(checkEmploymentType(stated, "")).toEqual({
        ok: false,
        reason: "non_full_time",
        detail: stated,
      });
    },
  );

  it("lets a full-time mention win over a non-full-time one", () => {
    expect(checkEmploymentType("Full-time or Contract", "")).toEqual({
      ok: true,
      employmentType: "Full time",
    });
  });

  it("rejects hourly-only pay", () => {
    expect(checkEmploymentType("", "$30 - $45 per hour")).toEqual({
      ok: false,
      reason: "hourly_only_salary",
      detail: "$30 - $45 per hour",
    });
  });

  it("keeps hourly pay that also quotes a yearly figure", () => {
    expect(checkEmploymentType("Full time", "$50 per hour ($104,000 per year)")).toEqual({
      ok: true,
      employmentType: "Full time",
    });
  });

  it("accepts an absent type and leaves it empty", () => {
    expect(checkEmploymentType("", "")).toEqual({ ok: true, employmentType: "" });
    expect(checkEmploymentType("  ", "$150,000")).toEqual({ ok: true, employmentType: "" });
  });
});
