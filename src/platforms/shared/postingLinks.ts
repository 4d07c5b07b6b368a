/**
 * Posting link recognition and filtering
 */

import type { AtsPlatform } from "@/types";
import { ATS_PLATFORMS, LINK_LIMITS, PLATFORM_HOSTS, PLATFORM_POSTING_PATHS } from "@/constants";
import { tryParseUrl } from "@/utils";

export function hostMatches(url: URL, suffixes: readonly string[]): boolean {
  const host = url.hostname.toLowerCase();
  return suffixes.some((suffix) => host === suffix || host.endsWith(`.${suffix}`));
}

/**
 * Whether a URL is a posting page of the given ATS
 *
 * Embedded Greenhouse boards carry the posting id in gh_jid on the
 * employer's own host; those count as Greenhouse postings too.
 */
export function isAtsPostingUrl(platform: AtsPlatform, url: URL): boolean {
  if (platform === "greenhouse" && url.searchParams.has("gh_jid")) {
    return true;
  }
  return hostMatches(url, PLATFORM_HOSTS[platform]) && PLATFORM_POSTING_PATHS[platform].test(url.pathname);
}

export function isAnyAtsPostingUrl(url: URL): boolean {
  return ATS_PLATFORMS.some((p) => isAtsPostingUrl(p, url));
}

function hasIgnoredExtension(url: URL): boolean {
  const path = url.pathname.toLowerCase();
  return LINK_LIMITS.IGNORE_EXTENSIONS.some((ext) => path.endsWith(ext));
}

/**
 * Keep links accepted by `predicate`, in document order, without repeats
 * (fragment ignored), skipping the listing itself, over-long URLs and
 * non-page files; capped at MAX_LINKS_PER_LISTING
 */
export function filterPostingLinks(
  links: readonly string[],
  listingUrl: string,
  predicate: (url: URL) => boolean,
): string[] {
  const listing = tryParseUrl(listingUrl);
  const seen = new Set<string>();
  const result: string[] = [];

  for (const link of links) {
    if (result.length >= LINK_LIMITS.MAX_LINKS_PER_LISTING) {
      break;
    }
    if (link.length > LINK_LIMITS.MAX_URL_LENGTH) {
      continue;
    }
    const url = tryParseUrl(link);
    if (!url || (url.protocol !== "http:" && url.protocol !== "https:")) {
      continue;
    }
    url.hash = "";
    const key = url.toString();
    if (seen.has(key) || hasIgnoredExtension(url)) {
      continue;
    }
    if (listing && url.origin === listing.origin && url.pathname === listing.pathname && url.search === listing.search) {
      continue;
    }
    if (!predicate(url)) {
      continue;
    }
    seen.add(key);
    result.push(key);
  }

  return result;
}
