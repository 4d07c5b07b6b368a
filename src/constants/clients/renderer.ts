/**
 * HTTP renderer constants
 */

/**
 * Headers sent when fetching listing and posting pages
 */
export const RENDERER_HTTP_HEADERS: Record<string, string> = {
  Accept: "text/html,application/xhtml+xml;q=0.9,*/*;q=0.8",
  "User-Agent":
    "Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0 Safari/537.36",
};

/**
 * Pages whose visible text is shorter than this count as empty
 */
export const MIN_RENDERED_TEXT_LENGTH = 50;
