/**
 * Crawl runs repository
 *
 * Data access layer for the crawl_runs table.
 */

import type { CrawlRunRow, CrawlRunUpdate } from "@/types";
import { getDb } from "../connection";

/**
 * Create a new crawl run in status "running"
 * Returns the run id
 */
export function createCrawlRun(ownerId: string): number {
  const db = getDb();
  const result = db.prepare("INSERT INTO crawl_runs (owner_id) VALUES (?)").run(ownerId);
  return Number(result.lastInsertRowid);
}

/**
 * Finish a crawl run
 */
export function finishCrawlRun(runId: number, update: CrawlRunUpdate): void {
  const db = getDb();

  const fields: string[] = ["finished_at = datetime('now')", "status = ?"];
  const values: Array<string | number | null> = [update.status];

  if (update.stopReason !== undefined) {
    fields.push("stop_reason = ?");
    values.push(update.stopReason);
  }
  if (update.startIndex !== undefined) {
    fields.push("start_index = ?");
    values.push(update.startIndex);
  }
  if (update.nextIndex !== undefined) {
    fields.push("next_index = ?");
    values.push(update.nextIndex);
  }
  if (update.counters !== undefined) {
    fields.push("counters_json = ?");
    values.push(JSON.stringify(update.counters));
  }
  if (update.error !== undefined) {
    fields.push("error = ?");
    values.push(update.error);
  }

  values.push(runId);
  db.prepare(`UPDATE crawl_runs SET ${fields.join(", ")} WHERE id = ?`).run(...values);
}

export function getCrawlRunById(id: number): CrawlRunRow | undefined {
  const db = getDb();
  return db.prepare("SELECT * FROM crawl_runs WHERE id = ?").get(id) as
    | CrawlRunRow
    | undefined;
}

export function getLatestCrawlRun(): CrawlRunRow | undefined {
  const db = getDb();
  return db.prepare("SELECT * FROM crawl_runs ORDER BY id DESC LIMIT 1").get() as
    | CrawlRunRow
    | undefined;
}
