/**
 * Logger levels and defaults
 */

import type { LogLevel } from "@/types";

/** Lines below the active level's priority are dropped */
export const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export const DEFAULT_LOG_LEVEL: LogLevel = "info";

export const LOG_LEVEL_ENV_VAR = "LOG_LEVEL";
