/**
 * Ashby boards (jobs.ashbyhq.com)
 *
 * Posting markup is built client-side; static extraction leans on the
 * embedded JobPosting JSON-LD.
 */

import type { ExtractedFields, RenderedPage } from "@/types";
import type { PlatformAdapter } from "@/interfaces";
import { PLATFORM_HOSTS } from "@/constants";
import { extractLinks } from "@/utils";
import { filterPostingLinks, hostMatches, isAtsPostingUrl } from "./shared/postingLinks";
import { composeFallbackFields, firstText, loadPage } from "./shared/pageFields";

export const ashbyAdapter: PlatformAdapter = {
  platform: "ashby",

  matchesUrl(url: URL): boolean {
    return hostMatches(url, PLATFORM_HOSTS.ashby);
  },

  collectUrls(listing: RenderedPage): string[] {
    return filterPostingLinks(extractLinks(listing.html, listing.url), listing.url, (url) =>
      isAtsPostingUrl("ashby", url),
    );
  },

  extractFallbackFields(page: RenderedPage): ExtractedFields {
    const $ = loadPage(page);
    return composeFallbackFields(page, {
      title: firstText($, ["h1"]),
    });
  },
};
