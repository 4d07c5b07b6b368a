/**
 * PlatformAdapter interface: what every ATS variant provides
 *
 * Each variant knows how its listing pages link to postings and how its
 * posting pages lay out fields, so the rule-based fallback does not need
 * open-ended branching on the platform.
 */

import type { ExtractedFields, Platform, RenderedPage } from "@/types";

export interface PlatformAdapter {
  readonly platform: Platform;

  /**
   * Whether a URL belongs to this platform
   */
  matchesUrl(url: URL): boolean;

  /**
   * Enumerate posting URLs linked from a rendered listing page
   *
   * Returned URLs are absolute but not yet normalized or deduplicated.
   */
  collectUrls(listing: RenderedPage): string[];

  /**
   * Rule-based field extraction from a rendered posting page
   */
  extractFallbackFields(page: RenderedPage): ExtractedFields;
}
