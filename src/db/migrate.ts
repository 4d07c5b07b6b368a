/**
 * Database migration runner
 *
 * Applies SQL files from migrations/ in lexical order, each inside its own
 * transaction together with its schema_migrations row.
 */

import type Database from "better-sqlite3";
import { readdirSync, readFileSync } from "fs";
import { join } from "path";
import * as logger from "@/logger";

function migrationsDir(): string {
  return join(process.cwd(), "migrations");
}

function ensureMigrationsTable(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      version TEXT NOT NULL UNIQUE,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    );
  `);
}

function getAppliedMigrations(db: Database.Database): Set<string> {
  const rows = db.prepare("SELECT version FROM schema_migrations").all() as {
    version: string;
  }[];
  return new Set(rows.map((r) => r.version));
}

/**
 * List migration files (sorted); empty when the directory does not exist
 */
export function listMigrationFiles(): string[] {
  let files: string[];
  try {
    files = readdirSync(migrationsDir());
  } catch {
    return [];
  }
  return files.filter((f) => f.endsWith(".sql")).sort();
}

function applyMigration(db: Database.Database, filename: string): void {
  const sql = readFileSync(join(migrationsDir(), filename), "utf-8");

  const transaction = db.transaction(() => {
    db.exec(sql);
    db.prepare("INSERT INTO schema_migrations (version) VALUES (?)").run(filename);
  });

  transaction();
}

/**
 * Apply pending migrations to the given connection
 *
 * @returns File names applied in this call
 */
export function runMigrations(db: Database.Database): string[] {
  ensureMigrationsTable(db);

  const applied = getAppliedMigrations(db);
  const pending = listMigrationFiles().filter((f) => !applied.has(f));

  if (pending.length === 0) {
    logger.debug("No pending migrations");
    return [];
  }

  logger.info("Applying migrations", { count: pending.length });
  for (const migration of pending) {
    logger.debug("Applying migration", { migration });
    applyMigration(db, migration);
  }

  return pending;
}
