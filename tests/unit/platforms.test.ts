/**
 * Unit tests for platform detection and adapters
 */

import { describe, it, expect } from "vitest";
import {
  detectPlatform,
  genericAdapter,
  greenhouseAdapter,
  resolvePostingAdapter,
} from "@/platforms";
import type { RenderedPage } from "@/types";
import { htmlToText } from "@/utils";
import { loadFixtureText } from "../helpers/mockHttp";

function page(url: string, html: string): RenderedPage {
  return { url, html, text: htmlToText(html) };
}

function links(hrefs: string[]): string {
  return `<html><body>${hrefs.map((h) => `<a href="${h}">link</a>`).join("")}</body></html>`;
}

describe("detectPlatform", () => {
  it("recognizes ATS hosts", () => {
    expect(detectPlatform("https://boards.greenhouse.io/acme")).toBe("greenhouse");
    expect(detectPlatform("https://jobs.lever.co/acme")).toBe("lever");
    expect(detectPlatform("https://jobs.ashbyhq.com/acme")).toBe("ashby");
    expect(detectPlatform("https://acme.wd5.myworkdayjobs.com/External")).toBe("workday");
  });

  it("falls back to generic", () => {
    expect(detectPlatform("https://acme.test/careers")).toBe("generic");
    expect(detectPlatform("not a url")).toBe("generic");
  });
});

describe("resolvePostingAdapter", () => {
  it("prefers the posting host over the employer platform", () => {
    expect(resolvePostingAdapter("https://boards.greenhouse.io/acme/jobs/1", "generic").platform).toBe(
      "greenhouse",
    );
    expect(resolvePostingAdapter("https://acme.test/jobs/1", "lever").platform).toBe("lever");
    expect(resolvePostingAdapter("https://acme.test/jobs/1").platform).toBe("generic");
  });
});

describe("greenhouseAdapter", () => {
  it("collects posting links once each, in document order", () => {
    const listing = page(
      "https://boards.greenhouse.io/acme",
      links([
        "/acme/jobs/4001",
        "/acme/jobs/4001#app",
        "https://boards.greenhouse.io/acme/jobs/4002?gh_src=x",
        "/acme",
        "https://acme.test/about",
      ]),
    );

    expect(greenhouseAdapter.collectUrls(listing)).toEqual([
      "https://boards.greenhouse.io/acme/jobs/4001",
      "https://boards.greenhouse.io/acme/jobs/4002?gh_src=x",
    ]);
  });

  it("extracts fields from markup, filling gaps from JSON-LD", () => {
    const posting = page(
      "https://boards.greenhouse.io/acme/jobs/4001",
      loadFixtureText("pages/greenhouse-posting.html"),
    );

    expect(greenhouseAdapter.extractFallbackFields(posting)).toEqual({
      title: "Senior Backend Engineer",
      company: "Acme",
      aboutCompany: null,
      location: "Austin, TX",
      alternateLocations: [],
      employmentType: "full time",
      aboutJob: "Acme builds data tools.",
      qualifications: "- Go or TypeScript\n\n- Postgres",
      benefits: "401k match",
      salary: null,
      workEnvironment: null,
    });
  });
});

describe("genericAdapter", () => {
  it("follows same-site posting paths and ATS postings", () => {
    const listing = page(
      "https://www.acme.test/careers",
      links([
        "/careers/backend-engineer",
        "https://acme.test/jobs/42",
        "https://other.test/jobs/1",
        "https://boards.greenhouse.io/acme/jobs/55",
        "/about",
        "/careers",
      ]),
    );

    expect(genericAdapter.collectUrls(listing)).toEqual([
      "https://www.acme.test/careers/backend-engineer",
      "https://acme.test/jobs/42",
      "https://boards.greenhouse.io/acme/jobs/55",
    ]);
  });
});
