/**
 * Unit tests for posting section splitting
 */

import { describe, it, expect } from "vitest";
import { matchHeading, normalizeHeading, splitSections } from "@/platforms";

describe("normalizeHeading", () => {
  it("strips emoji, bullets and trailing punctuation", () => {
    expect(normalizeHeading("🚀 What You'll Do:")).toBe("what you'll do");
    expect(normalizeHeading("## Requirements")).toBe("requirements");
    expect(normalizeHeading("  Benefits —  ")).toBe("benefits");
  });
});

describe("matchHeading", () => {
  it("maps known headings to fields", () => {
    expect(matchHeading("About Us")).toBe("aboutCompany");
    expect(matchHeading("💼 Responsibilities")).toBe("aboutJob");
    expect(matchHeading("What we're looking for")).toBe("qualifications");
    expect(matchHeading("Perks and Benefits:")).toBe("benefits");
    expect(matchHeading("Pay Range")).toBe("salary");
  });

  it("ignores ordinary and long lines", () => {
    expect(matchHeading("We build tools for data teams.")).toBeNull();
    expect(matchHeading(`Requirements ${"x".repeat(60)}`)).toBeNull();
    expect(matchHeading("")).toBeNull();
  });
});

describe("splitSections", () => {
  it("assigns lines to the field of the preceding heading", () => {
    const text = [
      "Acme is hiring a backend engineer.",
      "About Us",
      "We make ✨ widgets.",
      "Requirements",
      "- 5 years of TypeScript",
      "- SQL",
      "",
      "",
      "",
      "Benefits",
      "Health insurance",
      "Compensation",
      "$150,000 - $180,000",
    ].join("\n");

    expect(splitSections(text)).toEqual({
      aboutJob: "Acme is hiring a backend engineer.",
      aboutCompany: "We make widgets.",
      qualifications: "- 5 years of TypeScript\n- SQL",
      benefits: "Health insurance",
      salary: "$150,000 - $180,000",
      workEnvironment: "",
    });
  });

  it("puts everything in aboutJob when there is no heading", () => {
    expect(splitSections("Line one\nLine two").aboutJob).toBe("Line one\nLine two");
  });
});
