/**
 * SQLite database connection
 *
 * Process-wide singleton; repositories call getDb().
 */

import Database from "better-sqlite3";
import { mkdirSync } from "fs";
import { dirname, resolve } from "path";
import { DEFAULT_DB_PATH } from "@/constants";

let db: Database.Database | null = null;

/**
 * Resolve the database file path (explicit path, then DB_PATH, then default)
 */
export function resolveDbPath(explicitPath?: string): string {
  const dbPath = explicitPath || process.env.DB_PATH || DEFAULT_DB_PATH;

  if (dbPath === ":memory:") {
    return dbPath;
  }

  const absolute = resolve(process.cwd(), dbPath);
  mkdirSync(dirname(absolute), { recursive: true });
  return absolute;
}

/**
 * Open database connection with required pragmas
 * Returns existing connection if already open
 */
export function openDb(dbPath?: string): Database.Database {
  if (db) {
    return db;
  }

  db = new Database(resolveDbPath(dbPath));
  db.pragma("foreign_keys = ON");
  db.pragma("journal_mode = WAL");

  return db;
}

export function closeDb(): void {
  if (db) {
    db.close();
    db = null;
  }
}

/**
 * Get current database connection (must be opened first)
 */
export function getDb(): Database.Database {
  if (!db) {
    throw new Error("Database not opened. Call openDb() first.");
  }
  return db;
}

/**
 * Inject a database into the singleton
 *
 * @internal Test use only
 */
export function setDbForTesting(testDb: Database.Database | null): void {
  db = testDb;
}
