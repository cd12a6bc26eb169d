/**
 * Server database: owns the published catalog and its search engine
 *
 * The published catalog and engine are never mutated; refresh() builds a new
 * pair and swaps the reference.
 */

import type { CatalogOrigin, Catalog, SearchHit, SearchInfo } from "@/types";
import { DEFAULT_TOP_K, MIN_SIMILARITY } from "@/constants";
import * as logger from "@/logger";
import { CatalogAssembler } from "./catalogAssembler";
import type { PublishedState, ServerDatabaseDeps } from "./catalogAssembler";

export class ServerDatabase {
  private state: PublishedState;
  private refreshing: Promise<CatalogOrigin> | null = null;

  private constructor(
    private readonly deps: ServerDatabaseDeps,
    private readonly assembler: CatalogAssembler,
    state: PublishedState,
  ) {
    this.state = state;
  }

  /**
   * Assemble the catalog and engine.
   *
   * @throws {CatalogUnavailableError} If every tier fails
   */
  static async create(deps: ServerDatabaseDeps): Promise<ServerDatabase> {
    const assembler = new CatalogAssembler(deps);
    const state = await assembler.build({ skipFreshCache: false });
    return new ServerDatabase(deps, assembler, state);
  }

  get catalog(): Catalog {
    return this.state.catalog;
  }

  get origin(): CatalogOrigin {
    return this.state.origin;
  }

  /**
   * Search the published catalog. Semantic hits under MIN_SIMILARITY are dropped.
   */
  async search(query: string, topK: number = DEFAULT_TOP_K): Promise<SearchHit[]> {
    if (!query.trim()) {
      return [];
    }
    const { engine } = this.state;
    const hits = await engine.search(query, topK);
    return hits.filter((hit) => hit.score >= MIN_SIMILARITY);
  }

  async getSearchInfo(): Promise<SearchInfo> {
    const { catalog, origin, engine } = this.state;
    const [catalogCache, embeddingCache] = await Promise.all([
      this.deps.catalogCache.describe(),
      this.deps.embeddingCache.describe(),
    ]);
    return {
      totalServers: catalog.entryCount,
      searchMode: engine.mode,
      semanticSearchAvailable: engine.mode === "semantic",
      catalogOrigin: origin,
      retrievedAt: new Date(catalog.retrievedAt).toISOString(),
      schemaVersion: catalog.schemaVersion,
      embeddingModel: engine.mode === "semantic" ? engine.modelName : null,
      catalogCache,
      embeddingCache,
    };
  }

  /**
   * Rebuild catalog and engine from precomputed or live data and swap them in.
   * Concurrent calls share one rebuild. On failure the current state stays.
   *
   * @throws {CatalogUnavailableError} If no tier produced a catalog
   */
  refresh(): Promise<CatalogOrigin> {
    if (!this.refreshing) {
      this.refreshing = this.assembler
        .build({ skipFreshCache: true })
        .then((state) => {
          this.state = state;
          logger.info("Catalog refreshed", {
            origin: state.origin,
            entries: state.catalog.entryCount,
          });
          return state.origin;
        })
        .finally(() => {
          this.refreshing = null;
        });
    }
    return this.refreshing;
  }
}
