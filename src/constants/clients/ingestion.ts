/**
 * Downstream ingestion API constants
 */

export const INGESTION_BATCH_PATH = "/batch";
export const INGESTION_WEBHOOK_PATH = "/webhook";
export const INGESTION_HEALTH_PATH = "/health";

/**
 * Header carrying the API key
 */
export const INGESTION_API_KEY_HEADER = "X-API-Key";

/**
 * Per-call timeout for ingestion requests
 */
export const INGESTION_HTTP_TIMEOUT_MS = 30_000;

/**
 * Whole-batch delivery attempts on transport failure (1 initial + 2 retries)
 */
export const SUBMIT_MAX_ATTEMPTS = 3;

/**
 * Backoff between batch attempts: base * 2^(attempt-1), capped
 */
export const SUBMIT_BASE_DELAY_MS = 2_000;
export const SUBMIT_MAX_DELAY_MS = 30_000;

/**
 * Separator used when sending alternate locations as one string
 */
export const ALTERNATE_LOCATIONS_SEPARATOR = "; ";
