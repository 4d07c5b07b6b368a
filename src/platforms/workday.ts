/**
 * Workday career sites (*.myworkdayjobs.com)
 */

import type { ExtractedFields, RenderedPage } from "@/types";
import type { PlatformAdapter } from "@/interfaces";
import { PLATFORM_HOSTS } from "@/constants";
import { extractLinks } from "@/utils";
import { filterPostingLinks, hostMatches, isAtsPostingUrl } from "./shared/postingLinks";
import { composeFallbackFields, firstBlockText, firstText, loadPage } from "./shared/pageFields";

export const workdayAdapter: PlatformAdapter = {
  platform: "workday",

  matchesUrl(url: URL): boolean {
    return hostMatches(url, PLATFORM_HOSTS.workday);
  },

  collectUrls(listing: RenderedPage): string[] {
    return filterPostingLinks(extractLinks(listing.html, listing.url), listing.url, (url) =>
      isAtsPostingUrl("workday", url),
    );
  },

  extractFallbackFields(page: RenderedPage): ExtractedFields {
    const $ = loadPage(page);
    return composeFallbackFields(page, {
      title: firstText($, ['[data-automation-id="jobPostingHeader"]', "h2", "h1"]),
      location: firstText($, ['[data-automation-id="locations"] dd', '[data-automation-id="locations"]']),
      employmentType: firstText($, ['[data-automation-id="time"] dd', '[data-automation-id="time"]']),
      description: firstBlockText($, ['[data-automation-id="jobPostingDescription"]']),
    });
  },
};
