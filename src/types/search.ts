/**
 * Search types
 */

import type { CatalogOrigin, ServerEntry } from "./entry";
import type { CatalogCacheInfo, EmbeddingCacheInfo } from "./cache";

export type SearchMode = "semantic" | "lexical";

export interface SearchHit {
  entry: ServerEntry;
  score: number;
}

/**
 * Lexical scorer weights
 */
export interface LexicalWeights {
  exactName: number;
  nameSubstring: number;
  descriptionSubstring: number;
  nameWord: number;
  descriptionWord: number;
  fuzzyName: number;
  fuzzyDescription: number;
  fuzzyMinLength: number;
  categoryBonus: Readonly<Record<string, number>>;
}

/**
 * Index status reported by the database
 */
export interface SearchInfo {
  totalServers: number;
  searchMode: SearchMode;
  semanticSearchAvailable: boolean;
  catalogOrigin: CatalogOrigin;
  /** ISO timestamp of when the catalog content was retrieved */
  retrievedAt: string;
  schemaVersion: string;
  embeddingModel: string | null;
  catalogCache: CatalogCacheInfo;
  embeddingCache: EmbeddingCacheInfo;
}
