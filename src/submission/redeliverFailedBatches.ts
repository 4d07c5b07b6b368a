/**
 * Redelivery of failed batches
 *
 * Payloads are rebuilt from the current stored records, so a record that
 * was updated since the failure is sent in its latest form. One attempt per
 * batch per pass; the next pass picks up whatever is still open.
 */

import type { JobRecord, Logger, RedeliveryResult } from "@/types";
import type { RecordStore } from "@/interfaces";
import { HttpError } from "@/clients/http";
import { IngestionApiClient, toNormalizedJob } from "@/clients/ingestion";
import { listUnresolvedFailedBatches, markFailedBatchResolved, recordFailedBatchRetry } from "@/db";
import { errorMessage, truncate } from "@/utils";
import { MAX_ERROR_MESSAGE_LENGTH } from "@/constants";
import * as logger from "@/logger";

export async function redeliverFailedBatches(
  client: IngestionApiClient,
  store: RecordStore,
  log: Logger = logger,
): Promise<RedeliveryResult> {
  const batches = listUnresolvedFailedBatches();
  const result: RedeliveryResult = {
    batches: batches.length,
    resolved: 0,
    stillFailing: 0,
    missingRecords: 0,
  };

  if (batches.length === 0) {
    return result;
  }
  log.info("Redelivering failed batches", { batches: batches.length });

  for (const batch of batches) {
    const records: JobRecord[] = [];
    for (const url of batch.sourceUrls) {
      const record = store.findByUrl(url);
      if (record) {
        records.push(record);
      } else {
        result.missingRecords++;
      }
    }

    if (records.length === 0) {
      markFailedBatchResolved(batch.id);
      result.resolved++;
      log.warn("Failed batch has no stored records left, closing it", { failedBatchId: batch.id });
      continue;
    }

    try {
      const response = await client.submitBatch(records.map((r) => toNormalizedJob(r, client.source)));
      markFailedBatchResolved(batch.id);
      result.resolved++;
      for (const entry of response.rejected) {
        log.warn("Job rejected by ingestion API", { sourceUrl: entry.url, reason: entry.reason });
      }
      log.info("Failed batch redelivered", {
        failedBatchId: batch.id,
        created: response.created,
        skipped: response.skipped,
        rejected: response.rejected.length,
      });
    } catch (err) {
      if (err instanceof HttpError && err.isClientError) {
        // A refused payload will not be accepted on a later pass either
        markFailedBatchResolved(batch.id);
        result.resolved++;
        log.error("Failed batch refused on redelivery, closing it", {
          failedBatchId: batch.id,
          status: err.status,
        });
        continue;
      }
      recordFailedBatchRetry(batch.id, truncate(errorMessage(err), MAX_ERROR_MESSAGE_LENGTH), 1);
      result.stillFailing++;
      log.warn("Failed batch redelivery failed", { failedBatchId: batch.id, error: errorMessage(err) });
    }
  }

  log.info("Redelivery finished", { ...result });
  return result;
}
