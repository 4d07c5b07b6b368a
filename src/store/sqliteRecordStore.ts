/**
 * SQLite-backed RecordStore
 *
 * Thin adapter over the jobs repository. Uniqueness of source_url is
 * enforced by the table; the adapter maps SQLite's constraint error to
 * StoreConstraintViolation.
 */

import type { EmployerCrawlState, JobRecord } from "@/types";
import type { RecordStore } from "@/interfaces";
import {
  getDb,
  getJobByUrl,
  insertJob,
  listJobsByEmployer,
  rowToJobRecord,
  updateJobByUrl,
} from "@/db";
import { isUniqueConstraintError } from "@/utils";
import { isJobComplete } from "@/freshness/completeness";
import { RecordNotFoundError, StoreConstraintViolation } from "./storeErrors";

export class SqliteRecordStore implements RecordStore {
  findByUrl(sourceUrl: string): JobRecord | null {
    const row = getJobByUrl(sourceUrl);
    return row ? rowToJobRecord(row) : null;
  }

  insert(record: JobRecord): void {
    try {
      insertJob(record);
    } catch (err) {
      if (isUniqueConstraintError(err, "jobs.source_url")) {
        throw new StoreConstraintViolation(record.sourceUrl, err);
      }
      throw err;
    }
  }

  update(record: JobRecord): void {
    if (updateJobByUrl(record) === 0) {
      throw new RecordNotFoundError(record.sourceUrl);
    }
  }

  countByEmployer(employerKey: string): EmployerCrawlState {
    const records = listJobsByEmployer(employerKey).map(rowToJobRecord);
    const completeJobs = records.filter((r) => isJobComplete(r)).length;
    return {
      totalJobs: records.length,
      completeJobs,
      incompleteJobs: records.length - completeJobs,
    };
  }

  transaction<T>(fn: () => T): T {
    return getDb().transaction(fn)();
  }
}
