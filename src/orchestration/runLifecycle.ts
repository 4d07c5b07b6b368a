/**
 * Run lifecycle helpers: track crawl runs in the database
 *
 * One run = one orchestrator invocation. Every started run is finalized,
 * with the summary counters when the orchestrator produced one.
 */

import type { CrawlRunStatus, RunSummary } from "@/types";
import { createCrawlRun, finishCrawlRun } from "@/db";
import { MAX_ERROR_MESSAGE_LENGTH } from "@/constants";
import { errorMessage, truncate } from "@/utils";

export function startCrawlRun(ownerId: string): number {
  return createCrawlRun(ownerId);
}

/**
 * Numeric fields of a summary, persisted as counters_json
 */
export function summaryCounters(summary: RunSummary): Record<string, number> {
  const counters: Record<string, number> = {};
  for (const [key, value] of Object.entries(summary)) {
    if (typeof value === "number" && key !== "runId" && key !== "startIndex" && key !== "nextIndex") {
      counters[key] = value;
    }
  }
  return counters;
}

export function finishCrawlRunWithSummary(runId: number, summary: RunSummary): void {
  const status: CrawlRunStatus = summary.stopReason === "fatal" ? "failure" : "success";
  finishCrawlRun(runId, {
    status,
    stopReason: summary.stopReason,
    startIndex: summary.startIndex,
    nextIndex: summary.nextIndex,
    counters: summaryCounters(summary),
    error: summary.error ?? null,
  });
}

/**
 * Finalize a run that ended before the orchestrator could summarize it
 */
export function failCrawlRun(runId: number, err: unknown): void {
  finishCrawlRun(runId, {
    status: "failure",
    stopReason: "fatal",
    error: truncate(errorMessage(err), MAX_ERROR_MESSAGE_LENGTH),
  });
}
