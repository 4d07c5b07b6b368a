/**
 * Posting URL normalization
 *
 * The normalized URL is the record identity: two links to the same posting
 * that differ only in tracking parameters, fragment, host case or a
 * trailing slash normalize to the same string.
 */

import { TRACKING_PARAM_PREFIXES, TRACKING_PARAMS } from "@/constants";

function isTrackingParam(name: string): boolean {
  const lower = name.toLowerCase();
  return (
    TRACKING_PARAMS.includes(lower) ||
    TRACKING_PARAM_PREFIXES.some((prefix) => lower.startsWith(prefix))
  );
}

/**
 * Normalize a posting URL
 *
 * - resolves relative URLs against `baseUrl`
 * - http(s) only
 * - lowercases the host, drops the fragment and default port
 * - removes tracking query parameters, keeps the others in order
 * - removes a trailing slash from non-root paths
 *
 * @returns Normalized URL, or null when the input is not a usable http(s) URL
 */
export function normalizeSourceUrl(rawUrl: string, baseUrl?: string): string | null {
  const trimmed = rawUrl.trim();
  if (!trimmed) {
    return null;
  }

  let url: URL;
  try {
    url = baseUrl ? new URL(trimmed, baseUrl) : new URL(trimmed);
  } catch {
    return null;
  }

  if (url.protocol !== "http:" && url.protocol !== "https:") {
    return null;
  }

  url.hash = "";
  url.hostname = url.hostname.toLowerCase();

  const kept: Array<[string, string]> = [];
  url.searchParams.forEach((value, name) => {
    if (!isTrackingParam(name)) {
      kept.push([name, value]);
    }
  });
  url.search = "";
  for (const [name, value] of kept) {
    url.searchParams.append(name, value);
  }

  if (url.pathname.length > 1 && url.pathname.endsWith("/")) {
    url.pathname = url.pathname.replace(/\/+$/, "");
  }

  return url.toString();
}

/**
 * Parse a URL without throwing
 */
export function tryParseUrl(value: string): URL | null {
  try {
    return new URL(value);
  } catch {
    return null;
  }
}
