/**
 * Lever boards (jobs.lever.co)
 */

import type { ExtractedFields, RenderedPage } from "@/types";
import type { PlatformAdapter } from "@/interfaces";
import { PLATFORM_HOSTS } from "@/constants";
import { extractLinks } from "@/utils";
import { filterPostingLinks, hostMatches, isAtsPostingUrl } from "./shared/postingLinks";
import { allText, composeFallbackFields, firstText, loadPage } from "./shared/pageFields";

function trimSlash(value: string | null): string | null {
  return value ? value.replace(/\s*\/\s*$/, "").trim() || null : null;
}

export const leverAdapter: PlatformAdapter = {
  platform: "lever",

  matchesUrl(url: URL): boolean {
    return hostMatches(url, PLATFORM_HOSTS.lever);
  },

  collectUrls(listing: RenderedPage): string[] {
    return filterPostingLinks(extractLinks(listing.html, listing.url), listing.url, (url) =>
      isAtsPostingUrl("lever", url),
    );
  },

  extractFallbackFields(page: RenderedPage): ExtractedFields {
    const $ = loadPage(page);
    // Category labels render as "San Francisco, CA /" with a trailing divider
    return composeFallbackFields(page, {
      title: firstText($, [".posting-headline h2", "h2"]),
      location: trimSlash(firstText($, [".posting-categories .location", ".posting-category.location"])),
      employmentType: trimSlash(firstText($, [".posting-categories .commitment"])),
      workEnvironment: trimSlash(firstText($, [".posting-categories .workplaceTypes"])),
      description: allText($, '[data-qa="job-description"], .posting-page .section.page-centered'),
    });
  },
};
