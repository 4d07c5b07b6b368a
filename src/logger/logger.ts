/**
 * Micro-logger: level-filtered structured lines on console.*
 *
 * Every line carries an ISO timestamp, the level and an optional JSON meta
 * object, so per-employer reports and run summaries stay greppable.
 */

import type { LogLevel, LogMeta, Logger } from "@/types";
import { DEFAULT_LOG_LEVEL, LOG_LEVEL_ENV_VAR, LOG_LEVELS } from "@/constants";

function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVELS;
}

function resolveLevel(raw: string | undefined): LogLevel {
  const normalized = (raw ?? "").trim().toLowerCase();
  return isLogLevel(normalized) ? normalized : DEFAULT_LOG_LEVEL;
}

const currentLevel: LogLevel = resolveLevel(process.env[LOG_LEVEL_ENV_VAR]);

function formatMeta(meta?: LogMeta): string {
  if (!meta || Object.keys(meta).length === 0) {
    return "";
  }
  return " " + JSON.stringify(meta);
}

function log(level: LogLevel, message: string, meta?: LogMeta): void {
  if (LOG_LEVELS[level] < LOG_LEVELS[currentLevel]) {
    return;
  }

  const timestamp = new Date().toISOString();
  const line = `[${timestamp}] [${level.toUpperCase()}] ${message}${formatMeta(meta)}`;

  switch (level) {
    case "debug":
    case "info":
      console.log(line);
      break;
    case "warn":
      console.warn(line);
      break;
    case "error":
      console.error(line);
      break;
  }
}

export function debug(message: string, meta?: LogMeta): void {
  log("debug", message, meta);
}

export function info(message: string, meta?: LogMeta): void {
  log("info", message, meta);
}

export function warn(message: string, meta?: LogMeta): void {
  log("warn", message, meta);
}

export function error(message: string, meta?: LogMeta): void {
  log("error", message, meta);
}

/**
 * Logger that merges `context` into every line's meta
 *
 * Wraps this module unless another Logger is given.
 */
export function withContext(context: LogMeta, parent: Logger = { debug, info, warn, error }): Logger {
  return {
    debug: (message, meta) => parent.debug(message, { ...context, ...meta }),
    info: (message, meta) => parent.info(message, { ...context, ...meta }),
    warn: (message, meta) => parent.warn(message, { ...context, ...meta }),
    error: (message, meta) => parent.error(message, { ...context, ...meta }),
  };
}
