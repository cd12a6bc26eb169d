/**
 * Logger constants
 */

import type { LogLevel } from "@/types";

// Lower number = more verbose
export const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export const DEFAULT_LOG_LEVEL: LogLevel = "info";
