/**
 * Cache record types
 */

import type { Catalog } from "./entry";

/**
 * On-disk shape of the catalog cache file
 */
export interface CatalogCacheFile {
  schemaVersion: string;
  retrievedAt: number;
  entryCount: number;
  contentHash: string;
  servers: unknown[];
}

/**
 * On-disk shape of an embeddings cache file
 */
export interface EmbeddingCacheFile {
  schemaVersion: string;
  contentHash: string;
  createdAt: number;
  model: string;
  dimensions: number;
  vectors: number[][];
}

export type CatalogCacheLookup =
  | { kind: "miss" }
  | { kind: "hit"; catalog: Catalog; ageMs: number; stale: boolean };

export interface CatalogCacheInfo {
  path: string;
  exists: boolean;
  ageSeconds?: number;
  fresh?: boolean;
  ttlSeconds: number;
  entryCount?: number;
}

export interface EmbeddingCacheInfo {
  dir: string;
  files: number;
}
