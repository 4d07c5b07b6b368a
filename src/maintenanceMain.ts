#!/usr/bin/env node
/**
 * Maintenance entrypoint
 *
 * Usage:
 *   node dist/maintenanceMain.js audit
 *   node dist/maintenanceMain.js purge [--apply]
 *   node dist/maintenanceMain.js redeliver
 *   node dist/maintenanceMain.js migrate
 *
 * purge is a dry run unless --apply is given.
 */

import "dotenv/config";
import { loadCrawlConfig, ConfigError } from "./config/crawlConfig";
import { closeDb, openDb, runMigrations } from "./db";
import { IngestionApiClient } from "./clients/ingestion";
import { SqliteRecordStore } from "./store";
import { redeliverFailedBatches } from "./submission";
import { auditDataQuality, purgeNonConformingJobs } from "./maintenance";
import * as logger from "./logger";

const COMMANDS = ["audit", "purge", "redeliver", "migrate"] as const;
type Command = (typeof COMMANDS)[number];

function isCommand(value: string): value is Command {
  return COMMANDS.some((c) => c === value);
}

async function runCommand(command: Command, args: string[]): Promise<number> {
  switch (command) {
    case "migrate": {
      const applied = runMigrations(openDb());
      logger.info("Migrations up to date", { applied: applied.length });
      return 0;
    }
    case "audit":
      runMigrations(openDb());
      auditDataQuality();
      return 0;
    case "purge": {
      runMigrations(openDb());
      const result = purgeNonConformingJobs({ dryRun: !args.includes("--apply") });
      if (result.dryRun && result.candidates.length > 0) {
        logger.info("Dry run only; re-run with --apply to delete");
      }
      return 0;
    }
    case "redeliver": {
      const config = loadCrawlConfig();
      runMigrations(openDb(config.dbPath));
      const result = await redeliverFailedBatches(
        new IngestionApiClient(config.ingestion),
        new SqliteRecordStore(),
      );
      return result.stillFailing > 0 ? 1 : 0;
    }
  }
}

async function main(): Promise<number> {
  const [command = "", ...args] = process.argv.slice(2);
  if (!isCommand(command)) {
    logger.error("Unknown maintenance command", { command, validCommands: [...COMMANDS] });
    return 2;
  }

  try {
    return await runCommand(command, args);
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.error(error.message);
      return 2;
    }
    throw error;
  } finally {
    closeDb();
  }
}

main()
  .then((code) => process.exit(code))
  .catch((error: unknown) => {
    logger.error("Maintenance command failed", {
      error: error instanceof Error ? error.message : String(error),
    });
    process.exit(1);
  });
