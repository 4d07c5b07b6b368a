/**
 * Unit tests for work environment classification
 */

import { describe, it, expect } from "vitest";
import { classifyWorkEnvironment, normalizeWorkEnvironment } from "@/extraction";

describe("classifyWorkEnvironment", () => {
  it("checks hybrid before remote", () => {
    expect(classifyWorkEnvironment("Hybrid: two remote days a week")).toBe("Hybrid");
  });

  it("recognizes remote and on-site wording", () => {
    expect(classifyWorkEnvironment("This is a fully remote role")).toBe("Remote");
    expect(classifyWorkEnvironment("Work from home anywhere in the US")).toBe("Remote");
    expect(classifyWorkEnvironment("On-site in our Austin office")).toBe("On-site");
    expect(classifyWorkEnvironment("in-person collaboration")).toBe("On-site");
  });

  it("returns null when nothing matches", () => {
    expect(classifyWorkEnvironment("Great team, great product")).toBeNull();
  });
});

describe("normalizeWorkEnvironment", () => {
  it("classifies a stated value on its own", () => {
    expect(normalizeWorkEnvironment("remote-first", "On-site in Denver")).toBe("Remote");
  });

  it("keeps a stated value that does not classify", () => {
    expect(normalizeWorkEnvironment("Flexible", "")).toBe("Flexible");
  });

  it("infers an absent value from context", () => {
    expect(normalizeWorkEnvironment("", "Remote - US\nBackend Engineer")).toBe("Remote");
    expect(normalizeWorkEnvironment("", "Backend Engineer")).toBe("");
  });
});
