/**
 * Run orchestration type definitions
 */

import type { FreshnessDecisionKind } from "./freshness";

/**
 * Orchestrator state machine
 *
 * idle → selecting_employer → crawling_employer → submitting → checkpointing
 *   → (selecting_employer | done); interrupted is reachable from any
 *   in-flight state when the stop signal fires.
 */
export type OrchestratorState =
  | "idle"
  | "selecting_employer"
  | "crawling_employer"
  | "submitting"
  | "checkpointing"
  | "interrupted"
  | "done";

/**
 * How one employer ended in this run
 */
export type EmployerOutcome = "skipped" | "crawled" | "failed" | "interrupted";

/**
 * Per-employer report line (always logged, regardless of run outcome)
 */
export type EmployerReport = {
  employerKey: string;
  decision: FreshnessDecisionKind;
  reason: string;
  outcome: EmployerOutcome;
  counters: EmployerCounters;
  error?: string;
};

/**
 * Counters accumulated while crawling one employer
 */
export type EmployerCounters = {
  collected: number;
  inserted: number;
  updated: number;
  skipped: number;
  rejected: number;
  failed: number;
  constraintViolations: number;
  aiCalls: number;
  aiSucceeded: number;
  fallbacks: number;
  extractionMs: number;
};

/**
 * Why the run stopped
 *
 * - completed: every employer of the cycle has been processed
 * - batch_limit: the per-invocation employer limit was reached
 * - interrupted: the stop signal fired
 * - fatal: store or checkpoint failure
 */
export type RunStopReason = "completed" | "batch_limit" | "interrupted" | "fatal";

/**
 * Per-run summary
 */
export type RunSummary = EmployerCounters & {
  runId: number | null;
  stopReason: RunStopReason;
  employersProcessed: number;
  employersSkipped: number;
  employersFailed: number;
  delivered: number;
  submissionRejected: number;
  submissionFailed: number;
  startIndex: number;
  nextIndex: number;
  employers: EmployerReport[];
  error?: string;
};

/**
 * Result of one CLI runner pass (lock handling included)
 */
export type RunnerResult =
  | { status: "ran"; summary: RunSummary }
  | { status: "locked"; reason: string };
