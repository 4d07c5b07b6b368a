/**
 * Configuration defaults (overridable through the environment)
 */

/**
 * Default SQLite database path (relative to the working directory)
 */
export const DEFAULT_DB_PATH = "data/app.db";

/**
 * Default progress file path (relative to the working directory)
 */
export const DEFAULT_PROGRESS_FILE_PATH = "data/crawl-progress.json";

/**
 * Default employers file path (relative to the working directory)
 */
export const DEFAULT_EMPLOYERS_FILE_PATH = "data/employers.json";

/**
 * Source label sent with every downstream batch
 */
export const DEFAULT_INGESTION_SOURCE = "Job Board Crawler";

/**
 * Render timeouts (first attempt, then the single longer retry)
 */
export const DEFAULT_RENDER_TIMEOUT_MS = 30_000;
export const DEFAULT_RENDER_RETRY_TIMEOUT_MS = 60_000;

/**
 * Default model for AI extraction
 */
export const DEFAULT_OPENAI_MODEL = "gpt-4o-mini";
