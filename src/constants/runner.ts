/**
 * Run orchestration constants
 */

/**
 * Default number of employers processed per invocation
 */
export const DEFAULT_CRAWL_BATCH_SIZE = 10;

/**
 * Default number of forwarded records per downstream batch call
 */
export const DEFAULT_SUBMIT_BATCH_SIZE = 25;

/**
 * Default size of the per-employer extraction worker pool
 */
export const DEFAULT_EXTRACTION_CONCURRENCY = 3;

/**
 * Upper bound for the extraction worker pool
 * Each worker holds one rendered page in memory.
 */
export const MAX_EXTRACTION_CONCURRENCY = 16;

/**
 * Progress file format version
 */
export const RUN_PROGRESS_VERSION = 1;

/**
 * Maximum length of error messages persisted in run rows and reports
 */
export const MAX_ERROR_MESSAGE_LENGTH = 500;
