/**
 * Application configuration from environment variables
 *
 * Entrypoints load .env first (dotenv/config); this module only reads the
 * resulting environment and validates it.
 */

import type { AppConfig, LogLevel } from "@/types";
import {
  CATALOG_CACHE_TTL_MS,
  DEFAULT_DATA_URL,
  DEFAULT_EMBEDDING_DIMENSIONS,
  DEFAULT_EMBEDDING_MODEL,
  EMBEDDING_TIMEOUT_MS,
  ENV,
  LOG_LEVELS,
} from "@/constants";
import { resolveCacheRoot } from "@/cache";

/**
 * Error thrown when an environment variable holds an unusable value
 */
export class ConfigValidationError extends Error {
  constructor(variable: string, value: string, expected: string) {
    super(`Invalid ${variable}="${value}": expected ${expected}`);
    this.name = "ConfigValidationError";
  }
}

function readString(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

function readBoolean(env: NodeJS.ProcessEnv, name: string): boolean {
  const value = readString(env, name);
  if (value === undefined) {
    return false;
  }
  const lowered = value.toLowerCase();
  if (["1", "true", "yes", "on"].includes(lowered)) {
    return true;
  }
  if (["0", "false", "no", "off"].includes(lowered)) {
    return false;
  }
  throw new ConfigValidationError(name, value, "true or false");
}

function readPositiveInteger(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const value = readString(env, name);
  if (value === undefined) {
    return undefined;
  }
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new ConfigValidationError(name, value, "a positive integer");
  }
  return parsed;
}

function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVELS;
}

function readLogLevel(env: NodeJS.ProcessEnv): LogLevel {
  if (readBoolean(env, ENV.DEBUG)) {
    return "debug";
  }
  const value = readString(env, ENV.LOG_LEVEL)?.toLowerCase();
  if (value === undefined) {
    return "info";
  }
  if (!isLogLevel(value)) {
    throw new ConfigValidationError(ENV.LOG_LEVEL, value, Object.keys(LOG_LEVELS).join("|"));
  }
  return value;
}

/**
 * Parse and validate configuration
 *
 * @throws {ConfigValidationError}
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  platform: NodeJS.Platform = process.platform,
): AppConfig {
  const ttlSeconds = readPositiveInteger(env, ENV.CATALOG_TTL_SECONDS);

  return {
    logLevel: readLogLevel(env),
    cacheRoot: resolveCacheRoot({ env, platform }),
    dataUrl: readString(env, ENV.DATA_URL) ?? DEFAULT_DATA_URL,
    skipPrecomputed: readBoolean(env, ENV.SKIP_PRECOMPUTED),
    catalogTtlMs: ttlSeconds === undefined ? CATALOG_CACHE_TTL_MS : ttlSeconds * 1000,
    embeddings: {
      url: readString(env, ENV.EMBEDDINGS_URL) ?? null,
      model: readString(env, ENV.EMBEDDINGS_MODEL) ?? DEFAULT_EMBEDDING_MODEL,
      dimensions:
        readPositiveInteger(env, ENV.EMBEDDINGS_DIMENSIONS) ?? DEFAULT_EMBEDDING_DIMENSIONS,
      apiKey: readString(env, ENV.EMBEDDINGS_API_KEY) ?? null,
      timeoutMs: EMBEDDING_TIMEOUT_MS,
    },
  };
}
