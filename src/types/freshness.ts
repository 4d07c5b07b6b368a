/**
 * Freshness evaluation type definitions
 */

import type { EmployerCrawlState } from "./employer";

export type FreshnessDecisionKind = "skip" | "full_crawl";

/**
 * Outcome of the per-employer freshness check
 */
export type FreshnessDecision = {
  decision: FreshnessDecisionKind;
  /** Human-readable reason, reported in logs and run summaries */
  reason: string;
  state: EmployerCrawlState;
};
