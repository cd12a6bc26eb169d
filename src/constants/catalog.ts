/**
 * Catalog constants
 */

/**
 * Separator between merged descriptions of the same url
 */
export const DESCRIPTION_SEPARATOR = "; ";

/**
 * Separator between merged source labels
 */
export const SOURCE_SEPARATOR = "+";

/**
 * Source label for payloads written before provenance was tracked
 */
export const UNKNOWN_SOURCE = "unknown";

/**
 * Bump when the embedding text or hashing changes; invalidates cached matrices
 */
export const EMBEDDINGS_VERSION = "v1";

/**
 * Length of hex content hashes
 */
export const CONTENT_HASH_LENGTH = 16;
