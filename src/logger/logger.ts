/**
 * Micro-logger wrapper — minimal logging with level filtering
 *
 * Every level writes to stderr: stdout carries the MCP stdio protocol and
 * must stay clean.
 */

import type { ContextLogger, LogLevel, LogMeta } from "@/types";
import { DEFAULT_LOG_LEVEL, LOG_LEVELS } from "@/constants/logger";

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LOG_LEVELS;
}

// LOG_LEVEL applies before config is loaded; main.ts may override it
const envLevel = process.env.LOG_LEVEL;
let currentLevel: LogLevel = isLogLevel(envLevel) ? envLevel : DEFAULT_LOG_LEVEL;

/**
 * Override the level read from LOG_LEVEL at startup
 */
export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

/**
 * Format meta object as JSON string
 */
function formatMeta(meta?: LogMeta): string {
  if (!meta || Object.keys(meta).length === 0) {
    return "";
  }
  return " " + JSON.stringify(meta);
}

/**
 * Log message if level is enabled
 */
function log(level: LogLevel, message: string, meta?: LogMeta): void {
  if (LOG_LEVELS[level] < LOG_LEVELS[currentLevel]) {
    return;
  }
  const timestamp = new Date().toISOString();
  const formattedMeta = formatMeta(meta);
  process.stderr.write(`[${timestamp}] [${level.toUpperCase()}] ${message}${formattedMeta}\n`);
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
 * Create a logger with bound context (meta merged into all calls)
 */
export function withContext(context: LogMeta): ContextLogger {
  return {
    debug: (message, meta) => debug(message, { ...context, ...meta }),
    info: (message, meta) => info(message, { ...context, ...meta }),
    warn: (message, meta) => warn(message, { ...context, ...meta }),
    error: (message, meta) => error(message, { ...context, ...meta }),
  };
}

/**
 * Extract a loggable message from an unknown thrown value
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
