/**
 * RecordStore interface: persistent keyed storage of collected job records
 *
 * The store is the authoritative copy of every record the crawler has
 * accepted. Normalized source URL is the only key; the store itself
 * enforces its uniqueness.
 */

import type { EmployerCrawlState, JobRecord } from "@/types";

export interface RecordStore {
  /**
   * Look up a record by normalized source URL
   */
  findByUrl(sourceUrl: string): JobRecord | null;

  /**
   * Insert a record whose URL is not stored yet
   *
   * @throws {StoreConstraintViolation} When the URL is already present
   */
  insert(record: JobRecord): void;

  /**
   * Overwrite the stored record that shares `record.sourceUrl`
   *
   * @throws {Error} When no record with that URL exists
   */
  update(record: JobRecord): void;

  /**
   * Summarize the employer's records, completeness recomputed per row
   */
  countByEmployer(employerKey: string): EmployerCrawlState;

  /**
   * Run `fn` atomically (find-then-write sequences for one URL)
   */
  transaction<T>(fn: () => T): T;
}
