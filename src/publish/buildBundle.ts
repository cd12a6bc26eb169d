/**
 * Publisher bundle builder
 *
 * Fetches every source, deduplicates, embeds and writes the three bundle
 * files. Vectors of entries unchanged since the previous release are reused
 * (matched by entry hash), so only new or edited entries are embedded.
 */

import { mkdir, writeFile } from "fs/promises";
import { join } from "path";
import type { DataInfo, EmbeddingMatrix, HttpRequestFn, ServerEntry } from "@/types";
import type { Embedder, ServerListSource } from "@/interfaces";
import { httpRequest as defaultHttpRequest } from "@/clients/http";
import { BUNDLE_FILES, CURRENT_SCHEMA_VERSION, EMBEDDINGS_VERSION } from "@/constants";
import {
  computeEntriesHash,
  computeEntryHash,
  deduplicateEntries,
  entryEmbeddingText,
} from "@/catalog";
import { fetchAllSources } from "@/sources";
import { PrecomputedDataLoader } from "@/precomputed";
import * as logger from "@/logger";

/**
 * Last published bundle, used for change detection and vector reuse
 */
export interface PreviousBundle {
  entries: readonly ServerEntry[];
  matrix: EmbeddingMatrix;
  info: DataInfo;
}

export interface BuildBundleOptions {
  sources: readonly ServerListSource[];
  embedder: Embedder;
  outDir: string;
  previous: PreviousBundle | null;
  httpRequest?: HttpRequestFn;
  now?: () => number;
}

export type BuildBundleResult =
  | { changed: false; serversCount: number; serversHash: string }
  | {
      changed: true;
      serversCount: number;
      serversHash: string;
      reused: number;
      embedded: number;
      info: DataInfo;
    };

/**
 * Download the currently published bundle; null when there is none usable
 */
export async function downloadPreviousBundle(
  baseUrl: string,
  httpRequest: HttpRequestFn = defaultHttpRequest,
): Promise<PreviousBundle | null> {
  const result = await new PrecomputedDataLoader({ baseUrl, httpRequest }).load();
  if (result.status === "unavailable") {
    logger.info("No previous bundle; embedding every entry", { reason: result.reason });
    return null;
  }
  return { entries: result.catalog.entries, matrix: result.matrix, info: result.info };
}

/**
 * Vectors for `entries`, reusing previous rows by entry hash and embedding
 * the rest in one call
 */
export async function embedIncremental(
  entries: readonly ServerEntry[],
  embedder: Embedder,
  previous: PreviousBundle | null,
): Promise<{ matrix: EmbeddingMatrix; reused: number; embedded: number }> {
  const reusable = new Map<string, readonly number[]>();
  if (
    previous &&
    previous.matrix.model === embedder.modelName &&
    previous.matrix.dimensions === embedder.dimensions
  ) {
    previous.entries.forEach((entry, index) => {
      reusable.set(computeEntryHash(entry), previous.matrix.vectors[index]);
    });
  }

  const vectors: number[][] = new Array<number[]>(entries.length);
  const changed: number[] = [];
  entries.forEach((entry, index) => {
    const row = reusable.get(computeEntryHash(entry));
    if (row) {
      vectors[index] = [...row];
    } else {
      changed.push(index);
    }
  });

  if (changed.length > 0) {
    logger.info("Embedding changed entries", { changed: changed.length });
    const fresh = await embedder.embed(changed.map((index) => entryEmbeddingText(entries[index])));
    changed.forEach((entryIndex, position) => {
      vectors[entryIndex] = fresh[position];
    });
  }

  return {
    matrix: { model: embedder.modelName, dimensions: embedder.dimensions, vectors },
    reused: entries.length - changed.length,
    embedded: changed.length,
  };
}

async function writeJson(path: string, value: unknown): Promise<void> {
  await writeFile(path, `${JSON.stringify(value, null, 2)}\n`, "utf-8");
}

/**
 * Build and write the bundle.
 *
 * Nothing is written when the entry set is identical to the previous
 * release (same servers_hash and model).
 *
 * @throws {Error} When every source failed
 */
export async function buildBundle(options: BuildBundleOptions): Promise<BuildBundleResult> {
  const { sources, embedder, outDir, previous } = options;
  const now = options.now ?? Date.now;

  const live = await fetchAllSources(sources, options.httpRequest ?? defaultHttpRequest);
  if (live.failedSources.length === sources.length) {
    throw new Error("Every source failed; refusing to publish an empty bundle");
  }

  const entries = deduplicateEntries(live.entries);
  const serversHash = computeEntriesHash(entries);
  logger.info("Bundle entries ready", { entries: entries.length, serversHash });

  if (
    previous &&
    previous.info.servers_hash === serversHash &&
    previous.info.model_name === embedder.modelName
  ) {
    logger.info("No changes since previous bundle");
    return { changed: false, serversCount: entries.length, serversHash };
  }

  const { matrix, reused, embedded } = await embedIncremental(entries, embedder, previous);

  const builtAt = now();
  const info: DataInfo = {
    schema_version: CURRENT_SCHEMA_VERSION,
    servers_count: entries.length,
    servers_hash: serversHash,
    embeddings_shape: [matrix.vectors.length, matrix.dimensions],
    model_name: matrix.model,
    embeddings_version: EMBEDDINGS_VERSION,
    build_timestamp: builtAt / 1000,
    build_date: new Date(builtAt).toISOString(),
    sources: sources.map((source) => source.name),
  };

  await mkdir(outDir, { recursive: true });
  await writeJson(join(outDir, BUNDLE_FILES.SERVERS), entries);
  await writeJson(join(outDir, BUNDLE_FILES.EMBEDDINGS), {
    model: matrix.model,
    dimensions: matrix.dimensions,
    vectors: matrix.vectors,
  });
  await writeJson(join(outDir, BUNDLE_FILES.DATA_INFO), info);

  logger.info("Bundle written", { outDir, entries: entries.length, reused, embedded });
  return { changed: true, serversCount: entries.length, serversHash, reused, embedded, info };
}
