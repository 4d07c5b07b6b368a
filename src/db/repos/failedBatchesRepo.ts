/**
 * Failed batches repository
 *
 * Batches whose downstream delivery exhausted every attempt. Only source
 * URLs are kept; payloads are rebuilt from the jobs table on redelivery.
 */

import type { FailedBatch, FailedBatchRow } from "@/types";
import { getDb } from "../connection";

function parseUrls(json: string): string[] {
  try {
    const parsed: unknown = JSON.parse(json);
    return Array.isArray(parsed)
      ? parsed.filter((v): v is string => typeof v === "string")
      : [];
  } catch {
    return [];
  }
}

function rowToFailedBatch(row: FailedBatchRow): FailedBatch {
  return {
    id: row.id,
    runId: row.run_id,
    sourceUrls: parseUrls(row.source_urls_json),
    error: row.error,
    attempts: row.attempts,
    createdAt: row.created_at,
    resolvedAt: row.resolved_at,
  };
}

/**
 * Record a failed batch
 * Returns the row id
 */
export function recordFailedBatch(input: {
  runId: number | null;
  sourceUrls: string[];
  error: string;
  attempts: number;
}): number {
  const db = getDb();
  const result = db
    .prepare(
      `
    INSERT INTO failed_batches (run_id, source_urls_json, error, attempts)
    VALUES (?, ?, ?, ?)
  `,
    )
    .run(input.runId, JSON.stringify(input.sourceUrls), input.error, input.attempts);

  return Number(result.lastInsertRowid);
}

/**
 * Unresolved failed batches, oldest first
 */
export function listUnresolvedFailedBatches(): FailedBatch[] {
  const db = getDb();
  const rows = db
    .prepare("SELECT * FROM failed_batches WHERE resolved_at IS NULL ORDER BY id")
    .all() as FailedBatchRow[];
  return rows.map(rowToFailedBatch);
}

export function markFailedBatchResolved(id: number): void {
  const db = getDb();
  db.prepare("UPDATE failed_batches SET resolved_at = datetime('now') WHERE id = ?").run(id);
}

/**
 * Record another unsuccessful delivery attempt of a stored batch
 */
export function recordFailedBatchRetry(id: number, error: string, attempts: number): void {
  const db = getDb();
  db.prepare(
    "UPDATE failed_batches SET error = ?, attempts = attempts + ? WHERE id = ?",
  ).run(error, attempts, id);
}
