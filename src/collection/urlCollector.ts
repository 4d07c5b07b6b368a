/**
 * URL collector
 *
 * Phase one of a crawl: renders each listing page of an employer and
 * yields the normalized posting URLs it links to, each at most once per
 * pass. The sequence is lazy; listing pages are rendered as the consumer
 * pulls.
 */

import type { Employer, Logger } from "@/types";
import type { Renderer } from "@/interfaces";
import { detectPlatform, getPlatformAdapter } from "@/platforms";
import { errorMessage, normalizeSourceUrl } from "@/utils";
import * as logger from "@/logger";
import { CollectionError } from "./collectionError";

export type UrlCollectorDeps = {
  renderer: Renderer;
  renderTimeoutMs: number;
  signal?: AbortSignal;
  log?: Logger;
};

/**
 * @throws {CollectionError} When a listing cannot be rendered, or when the
 *   listings linked to no posting at all
 */
export async function* collectJobUrls(
  employer: Employer,
  deps: UrlCollectorDeps,
): AsyncGenerator<string, void, undefined> {
  const log = deps.log ?? logger;
  const seen = new Set<string>();

  for (const listingUrl of employer.listingUrls) {
    if (deps.signal?.aborted) {
      return;
    }

    const adapter = getPlatformAdapter(employer.platform ?? detectPlatform(listingUrl));

    let links: string[];
    try {
      const listing = await deps.renderer.render(listingUrl, deps.renderTimeoutMs, deps.signal);
      links = adapter.collectUrls(listing);
    } catch (err) {
      throw new CollectionError(employer.key, `listing ${listingUrl}: ${errorMessage(err)}`, err);
    }

    let added = 0;
    for (const link of links) {
      const normalized = normalizeSourceUrl(link);
      if (!normalized || seen.has(normalized)) {
        continue;
      }
      seen.add(normalized);
      added++;
      yield normalized;
    }

    log.debug("Listing collected", {
      employerKey: employer.key,
      listingUrl,
      platform: adapter.platform,
      links: links.length,
      added,
    });
  }

  if (seen.size === 0 && !deps.signal?.aborted) {
    throw new CollectionError(employer.key, "no posting links found on any listing page");
  }
}
