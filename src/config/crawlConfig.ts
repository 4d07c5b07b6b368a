/**
 * Crawl configuration loader
 *
 * Resolves CrawlConfig from environment variables (dotenv is loaded by the
 * entrypoints). Invalid values fail fast with a ConfigError naming the
 * variable.
 */

import type { CrawlConfig, EnvLike } from "@/types";
import {
  DEFAULT_CRAWL_BATCH_SIZE,
  DEFAULT_DB_PATH,
  DEFAULT_EMPLOYERS_FILE_PATH,
  DEFAULT_EXTRACTION_CONCURRENCY,
  DEFAULT_INGESTION_SOURCE,
  DEFAULT_OPENAI_MODEL,
  DEFAULT_PROGRESS_FILE_PATH,
  DEFAULT_RENDER_RETRY_TIMEOUT_MS,
  DEFAULT_RENDER_TIMEOUT_MS,
  DEFAULT_SUBMIT_BATCH_SIZE,
  MAX_EXTRACTION_CONCURRENCY,
} from "@/constants";

export class ConfigError extends Error {
  constructor(message: string) {
    super(`Invalid configuration: ${message}`);
    this.name = "ConfigError";
  }
}

function readString(env: EnvLike, name: string): string | undefined {
  const value = env[name];
  if (value === undefined) {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function requireString(env: EnvLike, name: string): string {
  const value = readString(env, name);
  if (value === undefined) {
    throw new ConfigError(`${name} is required`);
  }
  return value;
}

function readPositiveInt(
  env: EnvLike,
  name: string,
  fallback: number,
  max?: number,
): number {
  const raw = readString(env, name);
  if (raw === undefined) {
    return fallback;
  }
  if (!/^\d+$/.test(raw)) {
    throw new ConfigError(`${name} must be a positive integer, got "${raw}"`);
  }
  const value = parseInt(raw, 10);
  if (value < 1) {
    throw new ConfigError(`${name} must be >= 1, got ${value}`);
  }
  if (max !== undefined && value > max) {
    throw new ConfigError(`${name} must be <= ${max}, got ${value}`);
  }
  return value;
}

function readBoolean(env: EnvLike, name: string, fallback: boolean): boolean {
  const raw = readString(env, name);
  if (raw === undefined) {
    return fallback;
  }
  const lower = raw.toLowerCase();
  if (["1", "true", "yes", "on"].includes(lower)) {
    return true;
  }
  if (["0", "false", "no", "off"].includes(lower)) {
    return false;
  }
  throw new ConfigError(`${name} must be a boolean (true/false), got "${raw}"`);
}

function readBaseUrl(env: EnvLike, name: string): string {
  const raw = requireString(env, name);
  let url: URL;
  try {
    url = new URL(raw);
  } catch {
    throw new ConfigError(`${name} must be an absolute URL, got "${raw}"`);
  }
  if (url.protocol !== "http:" && url.protocol !== "https:") {
    throw new ConfigError(`${name} must use http or https, got "${url.protocol}"`);
  }
  // Endpoint paths are appended to the base
  return raw.replace(/\/+$/, "");
}

/**
 * Load the crawl configuration
 *
 * @param env - Environment (defaults to process.env)
 * @throws {ConfigError} On a missing required variable or an invalid value
 */
export function loadCrawlConfig(env: EnvLike = process.env): CrawlConfig {
  const renderTimeoutMs = readPositiveInt(env, "RENDER_TIMEOUT_MS", DEFAULT_RENDER_TIMEOUT_MS);
  const renderRetryTimeoutMs = readPositiveInt(
    env,
    "RENDER_RETRY_TIMEOUT_MS",
    Math.max(DEFAULT_RENDER_RETRY_TIMEOUT_MS, renderTimeoutMs),
  );
  if (renderRetryTimeoutMs < renderTimeoutMs) {
    throw new ConfigError(
      `RENDER_RETRY_TIMEOUT_MS (${renderRetryTimeoutMs}) must be >= RENDER_TIMEOUT_MS (${renderTimeoutMs})`,
    );
  }

  const openaiKey = readString(env, "OPENAI_API_KEY");

  return {
    dbPath: readString(env, "DB_PATH") ?? DEFAULT_DB_PATH,
    progressFilePath: readString(env, "PROGRESS_FILE_PATH") ?? DEFAULT_PROGRESS_FILE_PATH,
    employersFilePath: readString(env, "EMPLOYERS_FILE_PATH") ?? DEFAULT_EMPLOYERS_FILE_PATH,
    crawlBatchSize: readPositiveInt(env, "CRAWL_BATCH_SIZE", DEFAULT_CRAWL_BATCH_SIZE),
    resume: readBoolean(env, "CRAWL_RESUME", true),
    submitBatchSize: readPositiveInt(env, "SUBMIT_BATCH_SIZE", DEFAULT_SUBMIT_BATCH_SIZE),
    ingestion: {
      baseUrl: readBaseUrl(env, "INGESTION_API_URL"),
      apiKey: requireString(env, "INGESTION_API_KEY"),
      source: readString(env, "INGESTION_SOURCE") ?? DEFAULT_INGESTION_SOURCE,
    },
    renderTimeoutMs,
    renderRetryTimeoutMs,
    extractionConcurrency: readPositiveInt(
      env,
      "EXTRACTION_CONCURRENCY",
      DEFAULT_EXTRACTION_CONCURRENCY,
      MAX_EXTRACTION_CONCURRENCY,
    ),
    openai: openaiKey
      ? { apiKey: openaiKey, model: readString(env, "OPENAI_MODEL") ?? DEFAULT_OPENAI_MODEL }
      : undefined,
    redeliverFailedBatches: readBoolean(env, "REDELIVER_FAILED_BATCHES", true),
  };
}
