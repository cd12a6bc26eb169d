/**
 * Embedding matrices on disk, keyed by catalog content hash
 *
 * Files: embeddings/embeddings_<hash>.json. A changed catalog or model gets a
 * new hash and therefore a new file; old snapshots are pruned by cleanup().
 */

import { readdir, stat } from "fs/promises";
import { join } from "path";
import type { EmbeddingCacheFile, EmbeddingCacheInfo, EmbeddingMatrix } from "@/types";
import {
  CURRENT_SCHEMA_VERSION,
  EMBEDDINGS_CACHE_DIR,
  EMBEDDINGS_CACHE_KEEP,
  EMBEDDINGS_FILE_PREFIX,
  EMBEDDINGS_FILE_SUFFIX,
} from "@/constants";
import { isRecord, parseVectors, PayloadValidationError } from "@/catalog";
import * as logger from "@/logger";
import { readJsonFile, removeFile, writeJsonFileAtomic } from "./jsonFile";

export interface EmbeddingCacheOptions {
  root: string;
  now?: () => number;
}

/**
 * @throws {PayloadValidationError}
 */
function parseCacheFile(value: unknown, contentHash: string): EmbeddingMatrix {
  if (!isRecord(value)) {
    throw new PayloadValidationError("embedding cache must be an object");
  }
  if (value.contentHash !== contentHash) {
    throw new PayloadValidationError("contentHash does not match file name");
  }
  const { model, dimensions } = value;
  if (typeof model !== "string" || model.length === 0) {
    throw new PayloadValidationError("model must be a non-empty string");
  }
  if (typeof dimensions !== "number" || !Number.isInteger(dimensions) || dimensions <= 0) {
    throw new PayloadValidationError("dimensions must be a positive integer");
  }
  const vectors = parseVectors(value.vectors, dimensions, "vectors");
  return { model, dimensions, vectors };
}

export class EmbeddingCache {
  readonly dir: string;
  private readonly now: () => number;

  constructor(options: EmbeddingCacheOptions) {
    this.dir = join(options.root, EMBEDDINGS_CACHE_DIR);
    this.now = options.now ?? Date.now;
  }

  pathFor(contentHash: string): string {
    return join(this.dir, `${EMBEDDINGS_FILE_PREFIX}${contentHash}${EMBEDDINGS_FILE_SUFFIX}`);
  }

  /**
   * Load the matrix for a content hash.
   *
   * The caller still checks alignment against its catalog; this only checks
   * the file is internally consistent.
   */
  async load(contentHash: string): Promise<EmbeddingMatrix | null> {
    const path = this.pathFor(contentHash);
    try {
      const raw = await readJsonFile(path);
      if (raw === undefined) {
        logger.debug("Embedding cache miss", { contentHash });
        return null;
      }
      const matrix = parseCacheFile(raw, contentHash);
      logger.info("Embedding cache hit", { contentHash, rows: matrix.vectors.length });
      return matrix;
    } catch (error) {
      logger.warn("Embedding cache corrupt, discarding", {
        path,
        error: logger.errorMessage(error),
      });
      await removeFile(path);
      return null;
    }
  }

  async save(contentHash: string, matrix: EmbeddingMatrix): Promise<void> {
    const file: EmbeddingCacheFile = {
      schemaVersion: CURRENT_SCHEMA_VERSION,
      contentHash,
      createdAt: this.now(),
      model: matrix.model,
      dimensions: matrix.dimensions,
      vectors: matrix.vectors.map((row) => [...row]),
    };
    await writeJsonFileAtomic(this.pathFor(contentHash), file);
    logger.debug("Embedding cache saved", { contentHash, rows: file.vectors.length });
  }

  /**
   * Cached embedding files, newest first
   */
  private async listFiles(): Promise<Array<{ path: string; mtimeMs: number }>> {
    let names: string[];
    try {
      names = await readdir(this.dir);
    } catch (error) {
      logger.debug("Embedding cache dir unreadable", { error: logger.errorMessage(error) });
      return [];
    }

    const files = await Promise.all(
      names
        .filter(
          (name) =>
            name.startsWith(EMBEDDINGS_FILE_PREFIX) && name.endsWith(EMBEDDINGS_FILE_SUFFIX),
        )
        .map(async (name) => {
          const path = join(this.dir, name);
          try {
            const stats = await stat(path);
            return { path, mtimeMs: stats.mtimeMs };
          } catch {
            // Removed between readdir and stat
            return null;
          }
        }),
    );

    return files
      .filter((file): file is { path: string; mtimeMs: number } => file !== null)
      .sort((a, b) => b.mtimeMs - a.mtimeMs);
  }

  /**
   * Keep the `keep` most recently written snapshots, delete the rest
   *
   * @returns Number of files deleted
   */
  async cleanup(keep: number = EMBEDDINGS_CACHE_KEEP): Promise<number> {
    const files = await this.listFiles();
    const expired = files.slice(Math.max(0, keep));
    await Promise.all(expired.map((file) => removeFile(file.path)));
    if (expired.length > 0) {
      logger.info("Embedding cache cleaned", {
        deleted: expired.length,
        kept: files.length - expired.length,
      });
    }
    return expired.length;
  }

  async describe(): Promise<EmbeddingCacheInfo> {
    const files = await this.listFiles();
    return { dir: this.dir, files: files.length };
  }
}
