/**
 * Catalog entry types
 */

/**
 * Categories emitted by the official server list.
 * Awesome-list sources contribute slugged section names instead.
 */
export type OfficialCategory = "reference" | "official" | "community" | "archived";

/**
 * One discoverable MCP server descriptor
 */
export interface ServerEntry {
  name: string;
  description: string;
  /** Canonical link to source code / docs; dedup key */
  url: string;
  category: string;
  /** Provenance label; "a+b" after merge */
  source: string;
}

/**
 * Deduplicated, ordered collection of entries at a point in time.
 * Built once and never mutated; a refresh produces a new Catalog.
 */
export interface Catalog {
  readonly entries: readonly ServerEntry[];
  /** Epoch milliseconds */
  readonly retrievedAt: number;
  readonly schemaVersion: string;
  readonly entryCount: number;
}

/**
 * One vector per catalog entry, aligned by index
 */
export interface EmbeddingMatrix {
  readonly model: string;
  readonly dimensions: number;
  readonly vectors: readonly (readonly number[])[];
}

/**
 * Where the published catalog came from
 */
export type CatalogOrigin = "precomputed" | "cache" | "live" | "stale-cache";
