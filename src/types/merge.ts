/**
 * Deduplication & merge type definitions
 */

import type { JobRecord } from "./job";

/**
 * Pure decision for one candidate against the stored record (if any)
 *
 * - insert: URL never seen
 * - update: stored record incomplete and candidate more complete; `merged`
 *   is the record to persist
 * - skip: nothing to gain; store untouched, nothing forwarded
 */
export type MergeDecision =
  | { kind: "insert"; record: JobRecord }
  | { kind: "update"; record: JobRecord; previous: JobRecord }
  | {
      kind: "skip";
      reason: "already_complete" | "not_more_complete";
      existing: JobRecord;
    };

/**
 * Result of executing a merge decision against the store
 */
export type MergeResult = {
  decision: MergeDecision["kind"];
  sourceUrl: string;
  /** Record to hand to the batch submitter (insert/update only) */
  forward: JobRecord | null;
  /** True when an insert hit the uniqueness constraint and was re-routed */
  constraintViolation: boolean;
  reason?: string;
};
