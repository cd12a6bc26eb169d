/**
 * Cache manager constants
 */

/**
 * Directory name under the user cache home
 */
export const CACHE_APP_DIR = "mcp-scout";

export const CATALOG_CACHE_DIR = "servers";
export const CATALOG_CACHE_FILE = "server_list.json";
export const EMBEDDINGS_CACHE_DIR = "embeddings";

/**
 * Catalog freshness window (3 hours). Past it the catalog is stale but
 * still usable as a last resort.
 */
export const CATALOG_CACHE_TTL_MS = 3 * 60 * 60 * 1000;

/**
 * Embedding snapshots kept after cleanup
 */
export const EMBEDDINGS_CACHE_KEEP = 5;

export const EMBEDDINGS_FILE_PREFIX = "embeddings_";
export const EMBEDDINGS_FILE_SUFFIX = ".json";
