/**
 * Employer-hosted career pages without a recognized ATS
 *
 * Follows same-site links whose path looks like a posting, and links out
 * to any recognized ATS posting (embedded boards).
 */

import type { ExtractedFields, RenderedPage } from "@/types";
import type { PlatformAdapter } from "@/interfaces";
import { GENERIC_POSTING_PATH_PATTERNS } from "@/constants";
import { extractLinks, tryParseUrl } from "@/utils";
import { filterPostingLinks, isAnyAtsPostingUrl } from "./shared/postingLinks";
import { composeFallbackFields, firstBlockText, firstText, loadPage } from "./shared/pageFields";

function isSameSite(url: URL, listing: URL | null): boolean {
  if (!listing) {
    return false;
  }
  const strip = (host: string): string => host.replace(/^www\./, "");
  return strip(url.hostname) === strip(listing.hostname);
}

export const genericAdapter: PlatformAdapter = {
  platform: "generic",

  matchesUrl(): boolean {
    return true;
  },

  collectUrls(listing: RenderedPage): string[] {
    const listingUrl = tryParseUrl(listing.url);
    return filterPostingLinks(extractLinks(listing.html, listing.url), listing.url, (url) => {
      if (isAnyAtsPostingUrl(url)) {
        return true;
      }
      return (
        isSameSite(url, listingUrl) &&
        GENERIC_POSTING_PATH_PATTERNS.some((pattern) => pattern.test(url.pathname))
      );
    });
  },

  extractFallbackFields(page: RenderedPage): ExtractedFields {
    const $ = loadPage(page);
    return composeFallbackFields(page, {
      title: firstText($, ["h1", "title"]),
      location: firstText($, ['[class*="job-location"]', '[class*="jobLocation"]', ".location"]),
      description: firstBlockText($, [
        '[class*="job-description"]',
        '[class*="jobDescription"]',
        "article",
        "main",
      ]),
    });
  },
};
