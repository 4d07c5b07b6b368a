/**
 * Run progress type definitions
 */

/**
 * Durable resume state shared across invocations
 *
 * Written to the progress file after every employer so that a later run
 * never reprocesses an employer that was completed.
 */
export type RunProgress = {
  version: 1;
  /** Ordered employer keys of the current cycle */
  employers: string[];
  /** Index of the last fully processed employer (-1 when none) */
  lastCompletedIndex: number;
  /** Employers processed per invocation when the progress was written */
  batchSize: number;
  cycleStartedAt: string;
  updatedAt: string;
  /** Set when the last employer of the cycle has been checkpointed */
  completedAt: string | null;
};
