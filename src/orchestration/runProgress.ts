/**
 * Run progress checkpointing
 *
 * The progress file is the resume pointer shared across invocations. It is
 * written after every employer (temp file + rename), so a crash never
 * leaves a half-written file behind.
 */

import fs from "fs";
import path from "path";
import type { Logger, RunProgress } from "@/types";
import { RUN_PROGRESS_VERSION } from "@/constants";
import { errorMessage } from "@/utils";
import * as logger from "@/logger";

/**
 * Progress could not be persisted; fatal to the run
 */
export class CheckpointError extends Error {
  constructor(filePath: string, cause: unknown) {
    super(`Failed to write run progress to ${filePath}: ${errorMessage(cause)}`, { cause });
    this.name = "CheckpointError";
  }
}

/**
 * Why the run starts where it starts
 */
export type ProgressStartReason =
  | "no_progress"
  | "resumed"
  | "resume_disabled"
  | "employers_changed"
  | "new_cycle";

export type ProgressStart = {
  progress: RunProgress;
  /** Index of the first employer to process */
  startIndex: number;
  reason: ProgressStartReason;
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Validate a parsed progress file
 *
 * @returns null when the content is not a progress document of this version
 */
export function parseRunProgress(raw: unknown): RunProgress | null {
  if (!isRecord(raw) || raw.version !== RUN_PROGRESS_VERSION) {
    return null;
  }
  const { employers, lastCompletedIndex, batchSize, cycleStartedAt, updatedAt, completedAt } = raw;
  if (!Array.isArray(employers) || !employers.every((e): e is string => typeof e === "string")) {
    return null;
  }
  if (
    typeof lastCompletedIndex !== "number" ||
    !Number.isInteger(lastCompletedIndex) ||
    lastCompletedIndex < -1
  ) {
    return null;
  }
  if (typeof batchSize !== "number" || typeof cycleStartedAt !== "string" || typeof updatedAt !== "string") {
    return null;
  }
  if (completedAt !== null && typeof completedAt !== "string") {
    return null;
  }
  return {
    version: RUN_PROGRESS_VERSION,
    employers,
    lastCompletedIndex,
    batchSize,
    cycleStartedAt,
    updatedAt,
    completedAt,
  };
}

/**
 * Read the progress file
 *
 * A missing file yields null. An unreadable or invalid file is logged and
 * also yields null: the cycle restarts, and records already stored
 * complete resolve to skips.
 */
export function loadRunProgress(filePath: string, log: Logger = logger): RunProgress | null {
  if (!fs.existsSync(filePath)) {
    return null;
  }
  try {
    const parsed = parseRunProgress(JSON.parse(fs.readFileSync(filePath, "utf-8")));
    if (!parsed) {
      log.warn("Ignoring invalid run progress file", { filePath });
    }
    return parsed;
  } catch (err) {
    log.warn("Ignoring unreadable run progress file", { filePath, error: errorMessage(err) });
    return null;
  }
}

/**
 * Persist progress atomically
 *
 * @throws {CheckpointError}
 */
export function saveRunProgress(filePath: string, progress: RunProgress): void {
  const tempPath = `${filePath}.${process.pid}.tmp`;
  try {
    fs.mkdirSync(path.dirname(path.resolve(filePath)), { recursive: true });
    fs.writeFileSync(tempPath, JSON.stringify(progress, null, 2) + "\n", "utf-8");
    fs.renameSync(tempPath, filePath);
  } catch (err) {
    throw new CheckpointError(filePath, err);
  }
}

export function createRunProgress(employers: string[], batchSize: number, now: Date): RunProgress {
  const timestamp = now.toISOString();
  return {
    version: RUN_PROGRESS_VERSION,
    employers: [...employers],
    lastCompletedIndex: -1,
    batchSize,
    cycleStartedAt: timestamp,
    updatedAt: timestamp,
    completedAt: null,
  };
}

function sameEmployers(a: readonly string[], b: readonly string[]): boolean {
  return a.length === b.length && a.every((key, i) => key === b[i]);
}

/**
 * Decide where this invocation starts
 *
 * - no stored progress, or resume disabled → index 0 of a fresh cycle
 * - employer list changed since the progress was written → fresh cycle
 * - previous cycle finished → fresh cycle
 * - otherwise → the employer after lastCompletedIndex
 */
export function resolveRunStart(
  stored: RunProgress | null,
  employers: string[],
  options: { resume: boolean; batchSize: number; now: Date },
): ProgressStart {
  const fresh = (reason: ProgressStartReason): ProgressStart => ({
    progress: createRunProgress(employers, options.batchSize, options.now),
    startIndex: 0,
    reason,
  });

  if (!stored) {
    return fresh("no_progress");
  }
  if (!options.resume) {
    return fresh("resume_disabled");
  }
  if (!sameEmployers(stored.employers, employers)) {
    return fresh("employers_changed");
  }
  const startIndex = stored.lastCompletedIndex + 1;
  if (startIndex >= employers.length) {
    return fresh("new_cycle");
  }
  return {
    progress: { ...stored, batchSize: options.batchSize },
    startIndex,
    reason: "resumed",
  };
}

/**
 * Progress after the employer at `index` has been fully processed
 */
export function advanceRunProgress(progress: RunProgress, index: number, now: Date): RunProgress {
  const timestamp = now.toISOString();
  return {
    ...progress,
    lastCompletedIndex: index,
    updatedAt: timestamp,
    completedAt: index >= progress.employers.length - 1 ? timestamp : null,
  };
}
