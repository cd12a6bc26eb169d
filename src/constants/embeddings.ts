/**
 * Embedding model constants
 */

export const DEFAULT_EMBEDDING_MODEL = "all-MiniLM-L6-v2";

export const DEFAULT_EMBEDDING_DIMENSIONS = 384;

export const EMBEDDING_TIMEOUT_MS = 15_000;

/**
 * Texts per embeddings request when embedding a whole catalog
 */
export const EMBEDDING_BATCH_SIZE = 64;

/**
 * Text embedded once when the model handle is loaded
 */
export const EMBEDDING_PROBE_TEXT = "mcp server discovery";
