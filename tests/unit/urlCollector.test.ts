/**
 * Unit tests for posting URL collection
 */

import { describe, it, expect } from "vitest";
import { CollectionError, collectJobUrls } from "@/collection";
import type { UrlCollectorDeps } from "@/collection";
import type { Employer } from "@/types";
import { createRecordingLogger, FakeRenderer } from "../helpers/fakes";

const FIRST_LISTING = "https://boards.greenhouse.io/acme";
const SECOND_LISTING = "https://boards.greenhouse.io/acme?page=2";

const employer: Employer = {
  key: "acme",
  name: "Acme",
  listingUrls: [FIRST_LISTING, SECOND_LISTING],
};

function listing(hrefs: string[]): string {
  return `<html><body>${hrefs.map((h) => `<a href="${h}">Open role</a>`).join("")}</body></html>`;
}

async function collectAll(deps: UrlCollectorDeps): Promise<string[]> {
  const urls: string[] = [];
  for await (const url of collectJobUrls(employer, deps)) {
    urls.push(url);
  }
  return urls;
}

describe("collectJobUrls", () => {
  it("yields normalized URLs once across listing pages", async () => {
    const renderer = new FakeRenderer()
      .setPage(FIRST_LISTING, listing(["/acme/jobs/1?gh_src=abc", "/acme/jobs/2"]))
      .setPage(SECOND_LISTING, listing(["/acme/jobs/2/", "/acme/jobs/3"]));

    const urls = await collectAll({ renderer, renderTimeoutMs: 1000, log: createRecordingLogger() });

    expect(urls).toEqual([
      "https://boards.greenhouse.io/acme/jobs/1",
      "https://boards.greenhouse.io/acme/jobs/2",
      "https://boards.greenhouse.io/acme/jobs/3",
    ]);
  });

  it("throws when a listing cannot be rendered", async () => {
    const renderer = new FakeRenderer();

    await expect(collectAll({ renderer, renderTimeoutMs: 1000 })).rejects.toThrow(
      `URL collection failed for acme: listing ${FIRST_LISTING}: Render failed (transport) for ${FIRST_LISTING}: HTTP 404 Not Found`,
    );
  });

  it("throws when no listing links to a posting", async () => {
    const renderer = new FakeRenderer()
      .setPage(FIRST_LISTING, listing(["/about"]))
      .setPage(SECOND_LISTING, listing([]));

    await expect(collectAll({ renderer, renderTimeoutMs: 1000 })).rejects.toBeInstanceOf(CollectionError);
  });

  it("yields nothing once stopped", async () => {
    const renderer = new FakeRenderer().setPage(FIRST_LISTING, listing(["/acme/jobs/1"]));
    const controller = new AbortController();
    controller.abort();

    const urls = await collectAll({ renderer, renderTimeoutMs: 1000, signal: controller.signal });

    expect(urls).toEqual([]);
    expect(renderer.calls).toEqual([]);
  });
});
