/**
 * Test Database Harness
 *
 * Creates a fresh temporary SQLite database per test with the real
 * migrations applied, injected into the connection singleton so the repos
 * and SqliteRecordStore use it transparently.
 *
 * Usage:
 *   harness = createTestDbSync();
 *   // ... exercise repos ...
 *   harness.cleanup();
 */

import Database from "better-sqlite3";
import { mkdirSync, rmSync } from "fs";
import { join } from "path";
import { tmpdir } from "os";
import { runMigrations, setDbForTesting } from "@/db";

export interface TestDbHarness {
  db: Database.Database;
  dbPath: string;
  /** Close the connection and delete the temp files */
  cleanup: () => void;
}

function generateTempDbPath(): string {
  const random = Math.random().toString(36).substring(2, 8);
  const tempDir = join(tmpdir(), "job-board-crawler-tests");
  mkdirSync(tempDir, { recursive: true });
  return join(tempDir, `test-${Date.now()}-${random}.db`);
}

export function createTestDbSync(): TestDbHarness {
  const dbPath = generateTempDbPath();

  const db = new Database(dbPath);
  db.pragma("foreign_keys = ON");
  runMigrations(db);

  setDbForTesting(db);

  const cleanup = (): void => {
    setDbForTesting(null);
    if (db.open) {
      db.close();
    }
    for (const suffix of ["", "-wal", "-shm"]) {
      rmSync(dbPath + suffix, { force: true });
    }
  };

  return { db, dbPath, cleanup };
}
