/**
 * Semantic search engine
 *
 * Ranks catalog entries by cosine similarity between the query embedding and
 * the precomputed matrix. The catalog and matrix are fixed at construction;
 * a refresh builds a new engine.
 *
 * Modes:
 * - semantic: matrix present and embedder loaded
 * - lexical:  no matrix, no embedder, or the embedder failed to load
 *
 * A query whose embedding fails is answered lexically; the engine stays
 * semantic for later queries.
 */

import type { Catalog, EmbeddingMatrix, SearchHit, SearchMode } from "@/types";
import type { Embedder, EmbedderLoader } from "@/interfaces";
import { isAligned } from "@/catalog";
import * as logger from "@/logger";
import { cosineSimilarity, rankDescending } from "./cosine";
import { lexicalSearch } from "./lexicalScorer";

/**
 * Error thrown when a matrix does not have exactly one row per entry
 */
export class CatalogAlignmentError extends Error {
  constructor(entries: number, rows: number) {
    super(`Embedding matrix has ${rows} rows for ${entries} catalog entries`);
    this.name = "CatalogAlignmentError";
  }
}

/**
 * Error thrown when the loaded model cannot produce vectors comparable to
 * the matrix
 */
export class EmbeddingModelMismatchError extends Error {
  constructor(expected: EmbeddingMatrix, embedder: Embedder) {
    super(
      `Embedder ${embedder.modelName} (${embedder.dimensions}d) does not match matrix ` +
        `${expected.model} (${expected.dimensions}d)`,
    );
    this.name = "EmbeddingModelMismatchError";
  }
}

export interface SemanticSearchEngineOptions {
  catalog: Catalog;
  /** null → lexical engine */
  matrix: EmbeddingMatrix | null;
  /** null → lexical engine */
  loadEmbedder: EmbedderLoader | null;
}

export class SemanticSearchEngine {
  readonly catalog: Catalog;
  private readonly matrix: EmbeddingMatrix | null;
  private readonly loadEmbedder: EmbedderLoader | null;
  private embedder: Embedder | null = null;
  private loading: Promise<SearchMode> | null = null;
  private currentMode: SearchMode;

  private constructor(options: SemanticSearchEngineOptions) {
    this.catalog = options.catalog;
    this.matrix = options.matrix;
    this.loadEmbedder = options.loadEmbedder;
    this.currentMode = options.matrix && options.loadEmbedder ? "semantic" : "lexical";
  }

  /**
   * Build an engine over a catalog and its matrix
   *
   * @throws {CatalogAlignmentError} If the matrix is not aligned with the catalog
   */
  static create(options: SemanticSearchEngineOptions): SemanticSearchEngine {
    const { catalog, matrix } = options;
    if (matrix && !isAligned(catalog.entries.length, matrix)) {
      throw new CatalogAlignmentError(catalog.entries.length, matrix.vectors.length);
    }
    return new SemanticSearchEngine(options);
  }

  /**
   * Lexical-only engine
   */
  static lexical(catalog: Catalog): SemanticSearchEngine {
    return new SemanticSearchEngine({ catalog, matrix: null, loadEmbedder: null });
  }

  get mode(): SearchMode {
    return this.currentMode;
  }

  get modelName(): string | null {
    return this.matrix?.model ?? null;
  }

  /**
   * Resolve the embedder. Idempotent.
   *
   * A loader failure switches the engine to lexical for its lifetime.
   *
   * @throws {EmbeddingModelMismatchError} If the loaded model does not match the matrix
   */
  load(): Promise<SearchMode> {
    if (!this.loading) {
      this.loading = this.resolveEmbedder();
    }
    return this.loading;
  }

  private async resolveEmbedder(): Promise<SearchMode> {
    const { matrix, loadEmbedder } = this;
    if (!matrix || !loadEmbedder) {
      this.currentMode = "lexical";
      return this.currentMode;
    }

    let embedder: Embedder;
    try {
      embedder = await loadEmbedder();
    } catch (error) {
      logger.warn("Embedding model failed to load; using lexical search", {
        error: logger.errorMessage(error),
      });
      this.currentMode = "lexical";
      return this.currentMode;
    }

    if (embedder.modelName !== matrix.model || embedder.dimensions !== matrix.dimensions) {
      throw new EmbeddingModelMismatchError(matrix, embedder);
    }

    this.embedder = embedder;
    this.currentMode = "semantic";
    return this.currentMode;
  }

  /**
   * Top `topK` entries for a query, best first. Ties keep catalog order.
   */
  async search(query: string, topK: number): Promise<SearchHit[]> {
    if (!query.trim() || topK <= 0) {
      return [];
    }

    await this.load();
    const { embedder, matrix } = this;
    if (this.currentMode === "lexical" || !embedder || !matrix) {
      return lexicalSearch(query, this.catalog.entries, topK);
    }

    let queryVector: number[];
    try {
      const [vector] = await embedder.embed([query]);
      if (!vector || vector.length !== matrix.dimensions) {
        throw new Error(`query embedding has ${vector ? vector.length : 0} dimensions`);
      }
      queryVector = vector;
    } catch (error) {
      logger.warn("Query embedding failed; answering lexically", {
        error: logger.errorMessage(error),
      });
      return lexicalSearch(query, this.catalog.entries, topK);
    }

    const scores = matrix.vectors.map((row) => cosineSimilarity(queryVector, row));
    return rankDescending(scores)
      .slice(0, topK)
      .map((index) => ({ entry: this.catalog.entries[index], score: scores[index] }));
  }
}
