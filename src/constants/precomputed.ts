/**
 * Precomputed bundle constants
 */

/**
 * Stable "latest" release location of the publisher bundle
 */
export const DEFAULT_DATA_URL =
  "https://github.com/mcp-scout/mcp-scout/releases/download/data-latest";

export const BUNDLE_FILES = {
  SERVERS: "servers.json",
  EMBEDDINGS: "embeddings.json",
  DATA_INFO: "data_info.json",
} as const;

export const PRECOMPUTED_TIMEOUT_MS = 30_000;

/**
 * Release downloads fail fast; the next tier is cheap
 */
export const PRECOMPUTED_MAX_ATTEMPTS = 1;
