/**
 * Crawl runner: one locked, recorded orchestrator invocation
 *
 * Responsibilities around the orchestrator itself:
 * - Acquire the crawl run lock (one orchestrator per store), refresh it
 *   while the run lasts, always release it
 * - Record the run in crawl_runs
 * - Redeliver failed batches of earlier runs when enabled
 * - Wire the default collaborators (HTTP renderer, OpenAI extractor,
 *   ingestion client) unless injected
 *
 * The database must be open and migrated.
 */

import { randomUUID } from "crypto";
import type { CrawlConfig, Employer, HttpRequestFn, Logger, RunnerResult } from "@/types";
import type { Extractor, RecordStore, Renderer } from "@/interfaces";
import { acquireRunLock, refreshRunLock, releaseRunLock } from "@/db";
import { HttpRenderer } from "@/clients/renderer";
import { OpenAiExtractor } from "@/clients/openai";
import { IngestionApiClient } from "@/clients/ingestion";
import { SqliteRecordStore } from "@/store";
import { BatchSubmitter, redeliverFailedBatches } from "@/submission";
import { CRAWL_LOCK_NAME, RUN_LOCK_REFRESH_INTERVAL_MS, RUN_LOCK_TTL_SECONDS } from "@/constants";
import * as logger from "@/logger";
import { RunOrchestrator } from "./runOrchestrator";
import { failCrawlRun, finishCrawlRunWithSummary, startCrawlRun } from "./runLifecycle";

export type CrawlRunnerDeps = {
  store?: RecordStore;
  renderer?: Renderer;
  /** Overrides the extractor built from config.openai; null disables AI */
  extractor?: Extractor | null;
  /** HTTP function used by the ingestion client */
  ingestionHttp?: HttpRequestFn;
  signal?: AbortSignal;
  now?: () => Date;
  /** Delay between batch delivery attempts */
  sleep?: (ms: number) => Promise<void>;
  log?: Logger;
};

function buildExtractor(config: CrawlConfig): Extractor | null {
  if (!config.openai) {
    return null;
  }
  return new OpenAiExtractor({ model: config.openai.model, apiKey: config.openai.apiKey });
}

export async function runCrawl(
  config: CrawlConfig,
  employers: Employer[],
  deps: CrawlRunnerDeps = {},
): Promise<RunnerResult> {
  const log = deps.log ?? logger;
  const ownerId = randomUUID();

  const lock = acquireRunLock(CRAWL_LOCK_NAME, ownerId, RUN_LOCK_TTL_SECONDS);
  if (!lock.ok) {
    log.warn("Failed to acquire run lock - another crawl may be in progress", {
      reason: lock.reason,
      heldBy: lock.heldBy,
    });
    return { status: "locked", reason: lock.reason };
  }
  log.info("Run lock acquired", { ownerId });

  const refreshTimer = setInterval(() => {
    if (!refreshRunLock(CRAWL_LOCK_NAME, ownerId, RUN_LOCK_TTL_SECONDS)) {
      log.warn("Run lock refresh failed (lock no longer owned)", { ownerId });
    }
  }, RUN_LOCK_REFRESH_INTERVAL_MS);
  refreshTimer.unref();

  let runId: number | null = null;
  try {
    runId = startCrawlRun(ownerId);

    const store = deps.store ?? new SqliteRecordStore();
    const client = new IngestionApiClient(config.ingestion, deps.ingestionHttp);
    const extractor = deps.extractor !== undefined ? deps.extractor : buildExtractor(config);

    if (!extractor) {
      log.info("AI extraction disabled, using rule-based extraction only");
    }

    if (config.redeliverFailedBatches) {
      await redeliverFailedBatches(client, store, log);
    }

    const submitter = new BatchSubmitter({
      client,
      batchSize: config.submitBatchSize,
      runId,
      log,
      sleep: deps.sleep,
    });

    const orchestrator = new RunOrchestrator({
      store,
      renderer: deps.renderer ?? new HttpRenderer(),
      extractor,
      submitter,
      progressFilePath: config.progressFilePath,
      crawlBatchSize: config.crawlBatchSize,
      resume: config.resume,
      renderTimeoutMs: config.renderTimeoutMs,
      renderRetryTimeoutMs: config.renderRetryTimeoutMs,
      extractionConcurrency: config.extractionConcurrency,
      runId,
      signal: deps.signal,
      now: deps.now,
      log,
    });

    const summary = await orchestrator.run(employers);
    finishCrawlRunWithSummary(runId, summary);

    if (extractor) {
      log.info("AI extraction usage", { ...extractor.usage() });
    }

    return { status: "ran", summary };
  } catch (err) {
    if (runId !== null) {
      failCrawlRun(runId, err);
    }
    throw err;
  } finally {
    clearInterval(refreshTimer);
    if (releaseRunLock(CRAWL_LOCK_NAME, ownerId)) {
      log.info("Run lock released", { ownerId });
    } else {
      log.warn("Failed to release run lock (may not be owned)", { ownerId });
    }
  }
}
