/**
 * Unit tests for posting URL normalization (record identity)
 */

import { describe, it, expect } from "vitest";
import { normalizeSourceUrl } from "@/utils";

describe("normalizeSourceUrl", () => {
  it("strips tracking params, fragment and trailing slash", () => {
    expect(
      normalizeSourceUrl("https://boards.greenhouse.io/acme/jobs/123/?utm_source=linkedin&gh_src=abc#apply"),
    ).toBe("https://boards.greenhouse.io/acme/jobs/123");
  });

  it("keeps non-tracking params in order", () => {
    expect(normalizeSourceUrl("https://jobs.lever.co/acme/abc?lever-source=x&team=eng&utm_medium=y&lang=en")).toBe(
      "https://jobs.lever.co/acme/abc?team=eng&lang=en",
    );
  });

  it("keeps gh_jid, the posting id of embedded boards", () => {
    expect(normalizeSourceUrl("https://acme.example/careers?gh_jid=4567")).toBe(
      "https://acme.example/careers?gh_jid=4567",
    );
  });

  it("lowercases the host", () => {
    expect(normalizeSourceUrl("https://Jobs.Lever.CO/Acme/abc")).toBe("https://jobs.lever.co/Acme/abc");
  });

  it("maps variants of one posting to the same identity", () => {
    const a = normalizeSourceUrl("https://boards.greenhouse.io/acme/jobs/9?gh_src=1");
    const b = normalizeSourceUrl("https://boards.greenhouse.io/acme/jobs/9/#top");
    expect(a).toBe(b);
  });

  it("resolves relative URLs against a base", () => {
    expect(normalizeSourceUrl("/jobs/5", "https://acme.example/careers")).toBe("https://acme.example/jobs/5");
  });

  it("keeps the root path slash", () => {
    expect(normalizeSourceUrl("https://acme.example/")).toBe("https://acme.example/");
  });

  it("rejects non-http and unparsable input", () => {
    expect(normalizeSourceUrl("mailto:jobs@acme.example")).toBeNull();
    expect(normalizeSourceUrl("not a url")).toBeNull();
    expect(normalizeSourceUrl("   ")).toBeNull();
  });
});
