/**
 * Last assembled catalog, persisted on disk
 *
 * One file (servers/server_list.json), overwritten on every save. Freshness is
 * measured from the catalog's retrievedAt, not the file mtime.
 */

import { join } from "path";
import type { Catalog, CatalogCacheFile, CatalogCacheInfo, CatalogCacheLookup } from "@/types";
import {
  CATALOG_CACHE_DIR,
  CATALOG_CACHE_FILE,
  CATALOG_CACHE_TTL_MS,
  KNOWN_SCHEMA_VERSIONS,
} from "@/constants";
import {
  computeEntriesHash,
  createCatalog,
  isRecord,
  parseServerEntries,
  PayloadValidationError,
} from "@/catalog";
import { checkCompatibility } from "@/schema";
import * as logger from "@/logger";
import { readJsonFile, removeFile, writeJsonFileAtomic } from "./jsonFile";

export interface CatalogCacheOptions {
  /** Cache root; the catalog lives under <root>/servers */
  root: string;
  ttlMs?: number;
  /** Clock override (for testing) */
  now?: () => number;
}

export interface CatalogLoadOptions {
  /** Return a catalog past its TTL instead of a miss */
  allowStale?: boolean;
}

/**
 * Validate a parsed cache file and rebuild the catalog
 *
 * @throws {PayloadValidationError}
 */
function parseCacheFile(value: unknown): Catalog {
  if (!isRecord(value)) {
    throw new PayloadValidationError("catalog cache must be an object");
  }
  const { schemaVersion, retrievedAt, entryCount } = value;
  if (typeof schemaVersion !== "string") {
    throw new PayloadValidationError("schemaVersion must be a string");
  }
  if (checkCompatibility(KNOWN_SCHEMA_VERSIONS, schemaVersion) === "incompatible") {
    throw new PayloadValidationError(`unsupported schemaVersion ${schemaVersion}`);
  }
  if (typeof retrievedAt !== "number" || !Number.isFinite(retrievedAt)) {
    throw new PayloadValidationError("retrievedAt must be a number");
  }

  const entries = parseServerEntries(value.servers, "servers");
  if (entryCount !== entries.length) {
    throw new PayloadValidationError(
      `entryCount ${String(entryCount)} does not match ${entries.length} servers`,
    );
  }

  return createCatalog(entries, retrievedAt, schemaVersion);
}

export class CatalogCache {
  readonly path: string;
  readonly ttlMs: number;
  private readonly now: () => number;

  constructor(options: CatalogCacheOptions) {
    this.path = join(options.root, CATALOG_CACHE_DIR, CATALOG_CACHE_FILE);
    this.ttlMs = options.ttlMs ?? CATALOG_CACHE_TTL_MS;
    this.now = options.now ?? Date.now;
  }

  /**
   * Load the cached catalog.
   *
   * - Missing file → miss
   * - Corrupt or unsupported file → warning, file deleted, miss
   * - Past TTL → miss, unless allowStale (file kept either way)
   */
  async load(options: CatalogLoadOptions = {}): Promise<CatalogCacheLookup> {
    let catalog: Catalog;
    try {
      const raw = await readJsonFile(this.path);
      if (raw === undefined) {
        logger.debug("Catalog cache miss: no file", { path: this.path });
        return { kind: "miss" };
      }
      catalog = parseCacheFile(raw);
    } catch (error) {
      logger.warn("Catalog cache corrupt, discarding", {
        path: this.path,
        error: logger.errorMessage(error),
      });
      await removeFile(this.path);
      return { kind: "miss" };
    }

    const ageMs = Math.max(0, this.now() - catalog.retrievedAt);
    const stale = ageMs > this.ttlMs;

    if (stale && !options.allowStale) {
      logger.debug("Catalog cache expired", { ageSeconds: Math.round(ageMs / 1000) });
      return { kind: "miss" };
    }

    if (stale) {
      logger.warn("Using stale catalog cache", {
        ageSeconds: Math.round(ageMs / 1000),
        entries: catalog.entryCount,
      });
    } else {
      logger.info("Catalog cache hit", {
        ageSeconds: Math.round(ageMs / 1000),
        entries: catalog.entryCount,
      });
    }

    return { kind: "hit", catalog, ageMs, stale };
  }

  /**
   * Persist a catalog, replacing the previous one
   */
  async save(catalog: Catalog): Promise<void> {
    const file: CatalogCacheFile = {
      schemaVersion: catalog.schemaVersion,
      retrievedAt: catalog.retrievedAt,
      entryCount: catalog.entryCount,
      contentHash: computeEntriesHash(catalog.entries),
      servers: [...catalog.entries],
    };
    await writeJsonFileAtomic(this.path, file);
    logger.debug("Catalog cache saved", { path: this.path, entries: catalog.entryCount });
  }

  /**
   * Report path, age and freshness without validating content
   */
  async describe(): Promise<CatalogCacheInfo> {
    const info: CatalogCacheInfo = {
      path: this.path,
      exists: false,
      ttlSeconds: Math.round(this.ttlMs / 1000),
    };

    let raw: unknown;
    try {
      raw = await readJsonFile(this.path);
    } catch (error) {
      logger.debug("Catalog cache unreadable", { error: logger.errorMessage(error) });
      return info;
    }
    if (!isRecord(raw)) {
      return info;
    }

    info.exists = true;
    if (typeof raw.retrievedAt === "number") {
      const ageMs = Math.max(0, this.now() - raw.retrievedAt);
      info.ageSeconds = Math.round(ageMs / 1000);
      info.fresh = ageMs <= this.ttlMs;
    }
    if (typeof raw.entryCount === "number") {
      info.entryCount = raw.entryCount;
    }
    return info;
  }
}
