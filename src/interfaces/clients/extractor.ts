/**
 * Extractor interface: AI service turning raw page text into candidate fields
 */

import type { ExtractedFields, PlatformHint } from "@/types";

/**
 * Observable usage of the extraction service
 */
export type ExtractorUsage = {
  calls: number;
  failures: number;
  promptTokens: number;
  completionTokens: number;
};

export interface Extractor {
  /**
   * Extract structured fields from raw content
   *
   * @throws {ExtractionError} When the service fails or returns an invalid result
   */
  extract(
    rawContent: string,
    platformHint: PlatformHint,
    sourceUrl: string,
  ): Promise<ExtractedFields>;

  /**
   * Cumulative usage since construction
   */
  usage(): ExtractorUsage;
}
