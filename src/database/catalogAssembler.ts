/**
 * Catalog assembly across tiers
 *
 * Catalog tiers, first success wins:
 * 1. precomputed bundle (written through to the cache)
 * 2. fresh catalog cache
 * 3. live fetch of every source
 * 4. stale catalog cache
 *
 * Embeddings: precomputed matrix, else embedding cache by content hash, else
 * computed with the embedder and cached. Without an embedder the engine is
 * lexical.
 */

import type {
  Catalog,
  CatalogOrigin,
  EmbeddingMatrix,
  HttpRequestFn,
} from "@/types";
import type { EmbedderLoader, ServerListSource } from "@/interfaces";
import { httpRequest as defaultHttpRequest } from "@/clients/http";
import { buildCatalog, computeContentHash, entryEmbeddingText, isAligned } from "@/catalog";
import type { CatalogCache, EmbeddingCache } from "@/cache";
import type { PrecomputedDataLoader } from "@/precomputed";
import { fetchAllSources } from "@/sources";
import { SemanticSearchEngine } from "@/search";
import * as logger from "@/logger";

/**
 * Error thrown when no tier can produce a catalog
 */
export class CatalogUnavailableError extends Error {
  constructor(message: string) {
    super(`No catalog available: ${message}`);
    this.name = "CatalogUnavailableError";
  }
}

export interface ServerDatabaseDeps {
  sources: readonly ServerListSource[];
  catalogCache: CatalogCache;
  embeddingCache: EmbeddingCache;
  /** null disables the precomputed tier */
  precomputed: PrecomputedDataLoader | null;
  /** null → lexical search only */
  loadEmbedder: EmbedderLoader | null;
  /** Model the embedder serves; keys the embedding cache */
  embeddingModel: string;
  /** Vector length the embedder returns */
  embeddingDimensions: number;
  httpRequest?: HttpRequestFn;
  now?: () => number;
}

interface AssembledCatalog {
  catalog: Catalog;
  origin: CatalogOrigin;
  matrix: EmbeddingMatrix | null;
}

export interface PublishedState {
  catalog: Catalog;
  origin: CatalogOrigin;
  engine: SemanticSearchEngine;
}

export interface AssembleOptions {
  /** Skip the fresh-cache tier (refresh wants new data) */
  skipFreshCache: boolean;
}

export class CatalogAssembler {
  private readonly httpRequest: HttpRequestFn;
  private readonly now: () => number;

  constructor(private readonly deps: ServerDatabaseDeps) {
    this.httpRequest = deps.httpRequest ?? defaultHttpRequest;
    this.now = deps.now ?? Date.now;
  }

  async build(options: AssembleOptions): Promise<PublishedState> {
    const assembled = await this.assembleCatalog(options);
    const engine = await this.buildEngine(assembled);
    logger.info("Server database ready", {
      origin: assembled.origin,
      entries: assembled.catalog.entryCount,
      mode: engine.mode,
    });
    return { catalog: assembled.catalog, origin: assembled.origin, engine };
  }

  private async assembleCatalog(options: AssembleOptions): Promise<AssembledCatalog> {
    const precomputed = await this.loadPrecomputed();
    if (precomputed) {
      return precomputed;
    }

    if (!options.skipFreshCache) {
      const cached = await this.deps.catalogCache.load({ allowStale: false });
      if (cached.kind === "hit") {
        return { catalog: cached.catalog, origin: "cache", matrix: null };
      }
    }

    return this.loadLiveOrStale();
  }

  private async loadPrecomputed(): Promise<AssembledCatalog | null> {
    const { precomputed } = this.deps;
    if (!precomputed) {
      return null;
    }

    const result = await precomputed.load();
    if (result.status === "unavailable") {
      return null;
    }

    const { catalog, matrix } = result;
    await this.persist(catalog, matrix);

    if (!this.matchesEmbedder(matrix)) {
      logger.warn("Precomputed embeddings do not match the configured embedder; ignoring them", {
        bundleModel: matrix.model,
        bundleDimensions: matrix.dimensions,
        configuredModel: this.deps.embeddingModel,
        configuredDimensions: this.deps.embeddingDimensions,
      });
      return { catalog, origin: "precomputed", matrix: null };
    }
    return { catalog, origin: "precomputed", matrix };
  }

  /**
   * Live fetch with stale-cache fallback.
   *
   * When a source failed, a stale catalog with more entries beats the
   * partial live result.
   */
  private async loadLiveOrStale(): Promise<AssembledCatalog> {
    const live = await fetchAllSources(this.deps.sources, this.httpRequest);
    const liveCatalog = buildCatalog(live.entries, this.now());

    const needsStale = live.failedSources.length > 0 || liveCatalog.entryCount === 0;
    const stale = needsStale ? await this.deps.catalogCache.load({ allowStale: true }) : null;

    if (stale?.kind === "hit") {
      const staleWins =
        liveCatalog.entryCount === 0 || stale.catalog.entryCount > liveCatalog.entryCount;
      if (staleWins) {
        logger.warn("Using cached catalog over partial live fetch", {
          cachedEntries: stale.catalog.entryCount,
          liveEntries: liveCatalog.entryCount,
          failedSources: live.failedSources,
        });
        return {
          catalog: stale.catalog,
          origin: stale.stale ? "stale-cache" : "cache",
          matrix: null,
        };
      }
    }

    if (liveCatalog.entryCount === 0) {
      throw new CatalogUnavailableError(
        `precomputed, cache and live tiers all failed (failed sources: ${
          live.failedSources.join(", ") || "none"
        })`,
      );
    }

    await this.persist(liveCatalog, null);
    return { catalog: liveCatalog, origin: "live", matrix: null };
  }

  /**
   * Write a catalog (and its matrix) through to the cache. Failures are
   * logged; the in-memory catalog is still served.
   */
  private async persist(catalog: Catalog, matrix: EmbeddingMatrix | null): Promise<void> {
    try {
      await this.deps.catalogCache.save(catalog);
      if (matrix) {
        await this.deps.embeddingCache.save(
          computeContentHash(catalog.entries, matrix.model),
          matrix,
        );
      }
    } catch (error) {
      logger.warn("Failed to write cache", { error: logger.errorMessage(error) });
    }
  }

  private async buildEngine(assembled: AssembledCatalog): Promise<SemanticSearchEngine> {
    const { catalog } = assembled;
    const { loadEmbedder } = this.deps;
    if (!loadEmbedder) {
      return SemanticSearchEngine.lexical(catalog);
    }

    const matrix = assembled.matrix ?? (await this.resolveMatrix(catalog, loadEmbedder));
    if (!matrix) {
      return SemanticSearchEngine.lexical(catalog);
    }

    try {
      const engine = SemanticSearchEngine.create({ catalog, matrix, loadEmbedder });
      await engine.load();
      return engine;
    } catch (error) {
      logger.error("Semantic search disabled", { error: logger.errorMessage(error) });
      return SemanticSearchEngine.lexical(catalog);
    }
  }

  private matchesEmbedder(matrix: EmbeddingMatrix): boolean {
    return (
      matrix.model === this.deps.embeddingModel &&
      matrix.dimensions === this.deps.embeddingDimensions
    );
  }

  /**
   * Embedding cache by content hash, else compute and cache
   */
  private async resolveMatrix(
    catalog: Catalog,
    loadEmbedder: EmbedderLoader,
  ): Promise<EmbeddingMatrix | null> {
    const { embeddingCache, embeddingModel } = this.deps;
    const contentHash = computeContentHash(catalog.entries, embeddingModel);

    const cached = await embeddingCache.load(contentHash);
    if (cached && this.matchesEmbedder(cached) && isAligned(catalog.entryCount, cached)) {
      return cached;
    }

    let matrix: EmbeddingMatrix;
    try {
      const embedder = await loadEmbedder();
      logger.info("Computing embeddings", { entries: catalog.entryCount });
      const vectors = await embedder.embed(catalog.entries.map(entryEmbeddingText));
      matrix = { model: embedder.modelName, dimensions: embedder.dimensions, vectors };
    } catch (error) {
      logger.warn("Could not compute embeddings; using lexical search", {
        error: logger.errorMessage(error),
      });
      return null;
    }

    try {
      await embeddingCache.save(contentHash, matrix);
      await embeddingCache.cleanup();
    } catch (error) {
      logger.warn("Failed to write embedding cache", { error: logger.errorMessage(error) });
    }
    return matrix;
  }
}
