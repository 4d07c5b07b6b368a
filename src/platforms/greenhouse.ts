/**
 * Greenhouse boards (boards.greenhouse.io, job-boards.greenhouse.io, embeds)
 */

import type { ExtractedFields, RenderedPage } from "@/types";
import type { PlatformAdapter } from "@/interfaces";
import { PLATFORM_HOSTS } from "@/constants";
import { extractLinks } from "@/utils";
import { filterPostingLinks, hostMatches, isAtsPostingUrl } from "./shared/postingLinks";
import { composeFallbackFields, firstBlockText, firstText, loadPage } from "./shared/pageFields";

function stripCompanyPrefix(value: string | null): string | null {
  return value ? value.replace(/^at\s+/i, "").trim() || null : null;
}

export const greenhouseAdapter: PlatformAdapter = {
  platform: "greenhouse",

  matchesUrl(url: URL): boolean {
    return hostMatches(url, PLATFORM_HOSTS.greenhouse);
  },

  collectUrls(listing: RenderedPage): string[] {
    return filterPostingLinks(extractLinks(listing.html, listing.url), listing.url, (url) =>
      isAtsPostingUrl("greenhouse", url),
    );
  },

  extractFallbackFields(page: RenderedPage): ExtractedFields {
    const $ = loadPage(page);
    return composeFallbackFields(page, {
      title: firstText($, ["h1.app-title", ".job__title h1", ".job-title", "h1"]),
      company: stripCompanyPrefix(firstText($, [".company-name"])),
      location: firstText($, ["#header .location", ".job__location", ".location"]),
      description: firstBlockText($, ["#content", ".job__description", "#app_body"]),
    });
  },
};
