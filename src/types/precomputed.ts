/**
 * Precomputed bundle types
 */

import type { Catalog, EmbeddingMatrix } from "./entry";
import type { DataInfo } from "./schema";

/**
 * On-the-wire shape of embeddings.json
 */
export interface EmbeddingsPayload {
  model: string;
  dimensions: number;
  vectors: number[][];
}

/**
 * Result of a precomputed load: never an exception
 */
export type PrecomputedLoadResult =
  | {
      status: "available";
      catalog: Catalog;
      matrix: EmbeddingMatrix;
      info: DataInfo;
    }
  | { status: "unavailable"; reason: string };
