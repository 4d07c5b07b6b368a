/**
 * Run lock constants
 *
 * One orchestrator per record store at a time.
 */

/**
 * Lock name held by the crawl orchestrator
 */
export const CRAWL_LOCK_NAME = "crawl";

/**
 * Lock TTL in seconds
 * After this time, a stale lock (crashed process) can be taken over.
 * Default: 2 hours, above the longest observed crawl batch.
 */
export const RUN_LOCK_TTL_SECONDS = 7200;

/**
 * Lock refresh interval in milliseconds (1/4 of TTL)
 */
export const RUN_LOCK_REFRESH_INTERVAL_MS = (RUN_LOCK_TTL_SECONDS / 4) * 1000;
