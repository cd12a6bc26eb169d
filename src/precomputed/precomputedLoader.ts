/**
 * Precomputed data loader (publisher bundle download)
 *
 * Bundle layout at <baseUrl>/:
 * - data_info.json   metadata and schema version
 * - servers.json     catalog entries
 * - embeddings.json  { model, dimensions, vectors } aligned with servers.json
 *
 * The loader never throws: every failure becomes `unavailable` with a reason
 * and the caller moves on to the next tier.
 */

import type { DataInfo, EmbeddingMatrix, HttpRequestFn, PrecomputedLoadResult } from "@/types";
import { httpRequest as defaultHttpRequest } from "@/clients/http";
import {
  BUNDLE_FILES,
  KNOWN_SCHEMA_VERSIONS,
  PRECOMPUTED_MAX_ATTEMPTS,
  PRECOMPUTED_TIMEOUT_MS,
} from "@/constants";
import {
  createCatalog,
  isAligned,
  normalizeUrlKey,
  isRecord,
  parseServerEntries,
  parseVectors,
  PayloadValidationError,
} from "@/catalog";
import { checkCompatibility, describeCompatibility, validateDataInfo } from "@/schema";
import * as logger from "@/logger";

export interface PrecomputedDataLoaderConfig {
  /** Release directory URL, without trailing file name */
  baseUrl: string;
  /**
   * Optional HTTP request function (for testing/mocking)
   */
  httpRequest?: HttpRequestFn;
  /** Clock used to stamp the downloaded catalog */
  now?: () => number;
}

/**
 * @throws {PayloadValidationError}
 */
export function parseEmbeddingsPayload(value: unknown, info: DataInfo): EmbeddingMatrix {
  if (!isRecord(value)) {
    throw new PayloadValidationError("embeddings.json must be an object");
  }
  const model = typeof value.model === "string" ? value.model : info.model_name;
  const [rows, dimensions] = info.embeddings_shape;
  if (value.dimensions !== undefined && value.dimensions !== dimensions) {
    throw new PayloadValidationError(
      `embeddings.json dimensions ${String(value.dimensions)} != embeddings_shape ${dimensions}`,
    );
  }
  const vectors = parseVectors(value.vectors, dimensions, "embeddings.vectors");
  if (vectors.length !== rows) {
    throw new PayloadValidationError(
      `embeddings.json has ${vectors.length} rows, embeddings_shape says ${rows}`,
    );
  }
  return { model, dimensions, vectors };
}

export class PrecomputedDataLoader {
  private readonly baseUrl: string;
  private readonly httpRequest: HttpRequestFn;
  private readonly now: () => number;

  constructor(config: PrecomputedDataLoaderConfig) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, "");
    this.httpRequest = config.httpRequest ?? defaultHttpRequest;
    this.now = config.now ?? Date.now;
  }

  private fetchJson(file: string): Promise<unknown> {
    return this.httpRequest<unknown>({
      method: "GET",
      url: `${this.baseUrl}/${file}`,
      // Release assets are served as application/octet-stream
      responseType: "json",
      timeoutMs: PRECOMPUTED_TIMEOUT_MS,
      retry: { maxAttempts: PRECOMPUTED_MAX_ATTEMPTS },
    });
  }

  /**
   * Download, validate and assemble the bundle
   */
  async load(): Promise<PrecomputedLoadResult> {
    const log = logger.withContext({ tier: "precomputed", baseUrl: this.baseUrl });

    let info: DataInfo;
    try {
      info = validateDataInfo(await this.fetchJson(BUNDLE_FILES.DATA_INFO));
    } catch (error) {
      const reason = `data_info unavailable: ${logger.errorMessage(error)}`;
      log.info("Precomputed data unavailable", { reason });
      return { status: "unavailable", reason };
    }

    const compatibility = checkCompatibility(KNOWN_SCHEMA_VERSIONS, info.schema_version);
    if (compatibility === "incompatible") {
      const reason = describeCompatibility(info.schema_version, compatibility);
      log.warn("Precomputed data skipped", { reason });
      return { status: "unavailable", reason };
    }

    try {
      const [serversRaw, embeddingsRaw] = await Promise.all([
        this.fetchJson(BUNDLE_FILES.SERVERS),
        this.fetchJson(BUNDLE_FILES.EMBEDDINGS),
      ]);

      const entries = parseServerEntries(serversRaw, "servers");
      if (entries.length !== info.servers_count) {
        throw new PayloadValidationError(
          `servers.json has ${entries.length} entries, servers_count says ${info.servers_count}`,
        );
      }

      const urlKeys = new Set(entries.map((entry) => normalizeUrlKey(entry.url)));
      if (urlKeys.size !== entries.length) {
        throw new PayloadValidationError(
          `servers.json has ${entries.length - urlKeys.size} duplicate urls`,
        );
      }

      const matrix = parseEmbeddingsPayload(embeddingsRaw, info);
      if (!isAligned(entries.length, matrix)) {
        throw new PayloadValidationError(
          `${matrix.vectors.length} vectors for ${entries.length} entries`,
        );
      }

      // Cache TTL runs from the download; build_timestamp stays in info
      const catalog = createCatalog(entries, this.now(), info.schema_version);
      log.info("Precomputed data loaded", {
        entries: catalog.entryCount,
        model: matrix.model,
        schemaVersion: info.schema_version,
      });
      return { status: "available", catalog, matrix, info };
    } catch (error) {
      const reason = `bundle invalid: ${logger.errorMessage(error)}`;
      log.warn("Precomputed data unavailable", { reason });
      return { status: "unavailable", reason };
    }
  }
}
