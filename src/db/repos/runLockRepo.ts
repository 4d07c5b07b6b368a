/**
 * Run lock repository
 *
 * DB-based named lock with TTL. Acquisition is a single
 * INSERT ... ON CONFLICT statement, so it is atomic across processes that
 * share the database file; an expired lock is taken over.
 */

import type { RunLockRow, RunLockAcquireResult } from "@/types";
import { getDb } from "../connection";
import { RUN_LOCK_TTL_SECONDS } from "@/constants";

function getLockRow(lockName: string): RunLockRow | null {
  const row = getDb()
    .prepare("SELECT * FROM run_lock WHERE lock_name = ?")
    .get(lockName) as RunLockRow | undefined;
  return row ?? null;
}

/**
 * Acquire a named lock
 *
 * @param ttlSeconds - Lock lifetime; a holder must refresh before it elapses
 */
export function acquireRunLock(
  lockName: string,
  ownerId: string,
  ttlSeconds: number = RUN_LOCK_TTL_SECONDS,
): RunLockAcquireResult {
  try {
    const db = getDb();

    // Insert, or take over only when the current holder's lease has expired
    const result = db
      .prepare(
        `
      INSERT INTO run_lock (lock_name, owner_id, acquired_at, expires_at)
      VALUES (
        ?,
        ?,
        datetime('now'),
        datetime('now', '+' || ? || ' seconds')
      )
      ON CONFLICT(lock_name) DO UPDATE SET
        owner_id = excluded.owner_id,
        acquired_at = excluded.acquired_at,
        expires_at = excluded.expires_at,
        updated_at = datetime('now')
      WHERE datetime('now') >= expires_at
    `,
      )
      .run(lockName, ownerId, ttlSeconds);

    if (result.changes > 0) {
      return { ok: true, lockName, ownerId };
    }

    return { ok: false, reason: "LOCKED", heldBy: getLockRow(lockName)?.owner_id ?? null };
  } catch (err) {
    if (err instanceof Error && err.message.includes("not opened")) {
      return { ok: false, reason: "DB_NOT_OPEN", heldBy: null };
    }
    return { ok: false, reason: "UNKNOWN", heldBy: null };
  }
}

/**
 * Extend the lock expiry if owned by `ownerId`
 *
 * @returns false when the lock is no longer ours
 */
export function refreshRunLock(
  lockName: string,
  ownerId: string,
  ttlSeconds: number = RUN_LOCK_TTL_SECONDS,
): boolean {
  const result = getDb()
    .prepare(
      `
    UPDATE run_lock
    SET expires_at = datetime('now', '+' || ? || ' seconds'),
        updated_at = datetime('now')
    WHERE lock_name = ?
      AND owner_id = ?
  `,
    )
    .run(ttlSeconds, lockName, ownerId);

  return result.changes > 0;
}

/**
 * Release the lock if owned by `ownerId`
 */
export function releaseRunLock(lockName: string, ownerId: string): boolean {
  const result = getDb()
    .prepare("DELETE FROM run_lock WHERE lock_name = ? AND owner_id = ?")
    .run(lockName, ownerId);

  return result.changes > 0;
}

export function getRunLock(lockName: string): RunLockRow | null {
  return getLockRow(lockName);
}
