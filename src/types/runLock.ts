/**
 * Run lock type definitions
 *
 * A run lock keeps a single orchestrator writing to a store at a time.
 */

/**
 * Run lock row (database entity)
 */
export type RunLockRow = {
  lock_name: string;
  /** Owner process identifier (UUID) */
  owner_id: string;
  acquired_at: string;
  expires_at: string;
  updated_at: string;
};

export type RunLockAcquireResult =
  | { ok: true; lockName: string; ownerId: string }
  | { ok: false; reason: "LOCKED"; heldBy: string | null }
  | { ok: false; reason: "DB_NOT_OPEN" | "UNKNOWN"; heldBy: null };
