/**
 * Extraction type definitions
 *
 * Types for turning one posting URL into a candidate job record.
 */

import type { JobRecord } from "./job";
import type { Platform } from "./platforms";

/**
 * Field map produced by AI or rule-based extraction, before normalization
 *
 * Every field may be missing; normalization turns missing values into "".
 */
export type ExtractedFields = {
  title?: string | null;
  company?: string | null;
  aboutCompany?: string | null;
  location?: string | null;
  alternateLocations?: string[] | null;
  employmentType?: string | null;
  aboutJob?: string | null;
  qualifications?: string | null;
  benefits?: string | null;
  salary?: string | null;
  workEnvironment?: string | null;
};

/**
 * Which extraction path produced the field map
 */
export type ExtractionSource = "ai" | "fallback";

/**
 * Why a candidate was dropped by a normalization filter (not an error)
 */
export type ValidationRejectionReason =
  | "non_us_location"
  | "unconfirmed_location"
  | "non_full_time"
  | "hourly_only_salary";

export type ValidationRejection = {
  sourceUrl: string;
  reason: ValidationRejectionReason;
  detail: string;
};

export type ExtractionFailureReason = "render_failed" | "missing_title";

export type ExtractionFailure = {
  sourceUrl: string;
  reason: ExtractionFailureReason;
  message: string;
};

/**
 * Cost/latency metrics of one extraction, reported to the orchestrator
 */
export type ExtractionMetrics = {
  renderAttempts: number;
  aiAttempted: boolean;
  aiSucceeded: boolean;
  fallbackUsed: boolean;
  durationMs: number;
};

export type ExtractionOutcome =
  | {
      kind: "accepted";
      record: JobRecord;
      source: ExtractionSource;
      metrics: ExtractionMetrics;
    }
  | {
      kind: "rejected";
      rejection: ValidationRejection;
      metrics: ExtractionMetrics;
    }
  | {
      kind: "failed";
      failure: ExtractionFailure;
      metrics: ExtractionMetrics;
    };

/**
 * Result of the normalization filters for one field map
 */
export type FilterResult =
  | { ok: true }
  | { ok: false; reason: ValidationRejectionReason; detail: string };

/**
 * Platform hint passed to the AI extractor
 */
export type PlatformHint = Platform;
