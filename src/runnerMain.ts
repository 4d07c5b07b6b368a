#!/usr/bin/env node
/**
 * Runner entrypoint: one crawl invocation
 *
 * Processes up to CRAWL_BATCH_SIZE employers from the resume pointer, then
 * exits. SIGINT/SIGTERM request a graceful stop: in-flight pages finish,
 * forwarded records are flushed, the current employer is not checkpointed.
 * A second signal exits immediately.
 *
 * Usage:
 *   npm run build && node dist/runnerMain.js
 *   npm run crawl            (tsx, no build)
 *
 * Exit codes: 0 finished (completed, batch limit or lock held elsewhere),
 * 1 fatal error, 2 invalid configuration, 130 interrupted.
 *
 * Environment: see .env.example
 */

import "dotenv/config";
import type { CrawlConfig, Employer } from "./types";
import { loadCrawlConfig, ConfigError } from "./config/crawlConfig";
import { loadEmployers } from "./employers/loader";
import { EmployersValidationError } from "./utils";
import { closeDb, openDb, runMigrations } from "./db";
import { runCrawl } from "./orchestration";
import * as logger from "./logger";

const EXIT_OK = 0;
const EXIT_FATAL = 1;
const EXIT_CONFIG = 2;
const EXIT_INTERRUPTED = 130;

/**
 * Configuration and employer list, or null when either is invalid
 */
function loadInputs(): { config: CrawlConfig; employers: Employer[] } | null {
  try {
    const config = loadCrawlConfig();
    return { config, employers: loadEmployers(config.employersFilePath) };
  } catch (error) {
    if (error instanceof ConfigError || error instanceof EmployersValidationError) {
      logger.error(error.message);
      return null;
    }
    throw error;
  }
}

async function main(): Promise<number> {
  const inputs = loadInputs();
  if (!inputs) {
    return EXIT_CONFIG;
  }
  const { config, employers } = inputs;

  logger.info("Starting crawl", {
    employers: employers.length,
    crawlBatchSize: config.crawlBatchSize,
    resume: config.resume,
    aiEnabled: config.openai !== undefined,
  });

  runMigrations(openDb(config.dbPath));

  const controller = new AbortController();
  const handleSignal = (signal: NodeJS.Signals): void => {
    if (controller.signal.aborted) {
      logger.warn("Forced shutdown - exiting immediately", { signal });
      process.exit(EXIT_INTERRUPTED);
    }
    logger.info("Stop requested, finishing in-flight work", { signal });
    controller.abort();
  };
  process.on("SIGINT", handleSignal);
  process.on("SIGTERM", handleSignal);

  try {
    const result = await runCrawl(config, employers, { signal: controller.signal });
    if (result.status === "locked") {
      return EXIT_OK;
    }
    switch (result.summary.stopReason) {
      case "fatal":
        return EXIT_FATAL;
      case "interrupted":
        return EXIT_INTERRUPTED;
      case "completed":
      case "batch_limit":
        return EXIT_OK;
    }
  } finally {
    closeDb();
  }
}

main()
  .then((code) => process.exit(code))
  .catch((error: unknown) => {
    logger.error("Runner failed with fatal error", {
      error: error instanceof Error ? error.message : String(error),
      stack: error instanceof Error ? error.stack : undefined,
    });
    process.exit(EXIT_FATAL);
  });
