/**
 * SQLite error classification
 */

import Database from "better-sqlite3";

const UNIQUE_CODES: readonly string[] = ["SQLITE_CONSTRAINT_UNIQUE", "SQLITE_CONSTRAINT_PRIMARYKEY"];

/**
 * Columns named by a constraint failure ("UNIQUE constraint failed: jobs.source_url")
 */
function failedColumns(message: string): string[] {
  const colon = message.indexOf(":");
  if (colon === -1) {
    return [];
  }
  return message
    .slice(colon + 1)
    .split(",")
    .map((c) => c.trim())
    .filter((c) => c.length > 0);
}

/**
 * True for a UNIQUE / PRIMARY KEY violation, optionally on a given
 * `table.column`
 */
export function isUniqueConstraintError(err: unknown, column?: string): boolean {
  if (!(err instanceof Database.SqliteError) || !UNIQUE_CODES.includes(err.code)) {
    return false;
  }
  return column === undefined || failedColumns(err.message).includes(column);
}
