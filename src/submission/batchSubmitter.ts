/**
 * Batch submitter
 *
 * Buffers forwarded records and delivers them to the ingestion API in
 * batches. Transport failures are retried for the whole batch with
 * exponential backoff; a batch that exhausts its attempts is recorded in
 * failed_batches and the run continues. Records the API rejects are logged
 * and never retried.
 */

import type {
  BatchDeliveryOutcome,
  IngestionRejectedJob,
  JobRecord,
  Logger,
  SubmissionCounters,
} from "@/types";
import { HttpError, computeBackoffDelay, isTransientHttpError, sleep } from "@/clients/http";
import {
  IngestionApiClient,
  MalformedIngestionResponseError,
  toNormalizedJob,
} from "@/clients/ingestion";
import { recordFailedBatch } from "@/db";
import {
  MAX_ERROR_MESSAGE_LENGTH,
  SUBMIT_BASE_DELAY_MS,
  SUBMIT_MAX_ATTEMPTS,
  SUBMIT_MAX_DELAY_MS,
} from "@/constants";
import { errorMessage, truncate } from "@/utils";
import * as logger from "@/logger";
import { SubmissionTransportError } from "./submissionErrors";

export type BatchSubmitterOptions = {
  client: IngestionApiClient;
  batchSize: number;
  /** crawl_runs id stored with failed batches */
  runId?: number | null;
  log?: Logger;
  maxAttempts?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  /** Delay function between attempts (tests pass a no-op) */
  sleep?: (ms: number) => Promise<void>;
};

/**
 * Network errors, timeouts, 408/429/5xx and malformed bodies
 */
export function isRetryableSubmissionError(err: unknown): boolean {
  return err instanceof MalformedIngestionResponseError || isTransientHttpError(err);
}

function emptyCounters(): SubmissionCounters {
  return {
    batchesSent: 0,
    recordsForwarded: 0,
    recordsDelivered: 0,
    recordsRejected: 0,
    recordsFailed: 0,
    batchesFailed: 0,
  };
}

export class BatchSubmitter {
  private readonly client: IngestionApiClient;
  private readonly batchSize: number;
  private readonly runId: number | null;
  private readonly log: Logger;
  private readonly maxAttempts: number;
  private readonly baseDelayMs: number;
  private readonly maxDelayMs: number;
  private readonly wait: (ms: number) => Promise<void>;

  private pending: JobRecord[] = [];
  private readonly inFlight = new Set<Promise<BatchDeliveryOutcome>>();
  private readonly totals: SubmissionCounters = emptyCounters();

  constructor(options: BatchSubmitterOptions) {
    if (!Number.isInteger(options.batchSize) || options.batchSize < 1) {
      throw new Error(`Invalid submit batch size: ${options.batchSize}`);
    }
    this.client = options.client;
    this.batchSize = options.batchSize;
    this.runId = options.runId ?? null;
    this.log = options.log ?? logger;
    this.maxAttempts = options.maxAttempts ?? SUBMIT_MAX_ATTEMPTS;
    this.baseDelayMs = options.baseDelayMs ?? SUBMIT_BASE_DELAY_MS;
    this.maxDelayMs = options.maxDelayMs ?? SUBMIT_MAX_DELAY_MS;
    this.wait = options.sleep ?? ((ms) => sleep(ms));
  }

  /**
   * Queue one forwarded record; delivers a batch once batchSize are pending
   */
  async enqueue(record: JobRecord): Promise<void> {
    this.pending.push(record);
    this.totals.recordsForwarded++;
    if (this.pending.length >= this.batchSize) {
      await this.deliverNext();
    }
  }

  /**
   * Deliver everything pending and wait for batches already on the wire
   */
  async flush(): Promise<void> {
    while (this.pending.length > 0) {
      await this.deliverNext();
    }
    await Promise.all([...this.inFlight]);
  }

  pendingCount(): number {
    return this.pending.length;
  }

  counters(): SubmissionCounters {
    return { ...this.totals };
  }

  private async deliverNext(): Promise<void> {
    // Taken synchronously, so concurrent callers never share a record
    const batch = this.pending.splice(0, this.batchSize);
    if (batch.length === 0) {
      return;
    }
    const delivery = this.deliver(batch);
    this.inFlight.add(delivery);
    try {
      await delivery;
    } finally {
      this.inFlight.delete(delivery);
    }
  }

  /**
   * Deliver one batch; never throws for downstream failures
   *
   * @throws Store errors while recording a failed batch
   */
  async deliver(records: JobRecord[]): Promise<BatchDeliveryOutcome> {
    const jobs = records.map((r) => toNormalizedJob(r, this.client.source));
    const sourceUrls = records.map((r) => r.sourceUrl);
    this.totals.batchesSent++;

    let lastError: unknown;
    let attempt = 0;

    while (attempt < this.maxAttempts) {
      attempt++;
      try {
        const response = await this.client.submitBatch(jobs);
        const accepted = response.created + response.skipped;
        this.totals.recordsDelivered += accepted;
        this.totals.recordsRejected += response.rejected.length;
        this.logRejections(response.rejected);

        this.log.info("Batch delivered", {
          size: records.length,
          created: response.created,
          skipped: response.skipped,
          rejected: response.rejected.length,
          attempts: attempt,
        });
        return { status: "delivered", attempts: attempt, accepted, rejected: response.rejected };
      } catch (err) {
        lastError = err;

        if (err instanceof HttpError && err.isClientError) {
          const rejected = sourceUrls.map((url) => ({ url, reason: `HTTP ${err.status}` }));
          this.totals.recordsRejected += rejected.length;
          this.log.error("Batch refused by ingestion API", {
            size: records.length,
            status: err.status,
            error: err.message,
          });
          return { status: "refused", attempts: attempt, httpStatus: err.status, rejected };
        }

        if (!isRetryableSubmissionError(err) || attempt >= this.maxAttempts) {
          break;
        }

        const delayMs = computeBackoffDelay(attempt, this.baseDelayMs, this.maxDelayMs);
        this.log.warn("Batch delivery failed, retrying", {
          size: records.length,
          attempt,
          maxAttempts: this.maxAttempts,
          delayMs,
          error: errorMessage(err),
        });
        await this.wait(delayMs);
      }
    }

    const failure = new SubmissionTransportError(attempt, lastError);
    const failedBatchId = recordFailedBatch({
      runId: this.runId,
      sourceUrls,
      error: truncate(failure.message, MAX_ERROR_MESSAGE_LENGTH),
      attempts: attempt,
    });
    this.totals.batchesFailed++;
    this.totals.recordsFailed += records.length;
    this.log.error("Batch recorded as failed", {
      failedBatchId,
      size: records.length,
      error: failure.message,
    });

    return { status: "failed", attempts: attempt, sourceUrls, error: failure.message, failedBatchId };
  }

  private logRejections(rejected: IngestionRejectedJob[]): void {
    for (const entry of rejected) {
      this.log.warn("Job rejected by ingestion API", { sourceUrl: entry.url, reason: entry.reason });
    }
  }
}
