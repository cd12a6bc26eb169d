/**
 * Lazy embedder loading
 *
 * The model handle is resolved on first use and memoized, so startup never
 * waits on the embeddings endpoint. A failed load is remembered as well:
 * the caller switches to lexical mode instead of retrying per query.
 */

import type { EmbeddingsConfig, HttpRequestFn } from "@/types";
import type { Embedder, EmbedderLoader } from "@/interfaces";
import { httpRequest } from "@/clients/http";
import { EMBEDDING_PROBE_TEXT } from "@/constants";
import * as logger from "@/logger";
import { HttpEmbedder } from "./httpEmbedder";

/**
 * Error thrown when no embedding model can be loaded
 */
export class EmbedderUnavailableError extends Error {
  constructor(message: string) {
    super(`Embedding model unavailable: ${message}`);
    this.name = "EmbedderUnavailableError";
  }
}

/**
 * Memoize a loader: concurrent and later calls share one attempt
 */
export function memoizeLoader(load: EmbedderLoader): EmbedderLoader {
  let pending: Promise<Embedder> | null = null;
  return () => {
    if (!pending) {
      pending = load();
    }
    return pending;
  };
}

/**
 * Build the loader for the configured endpoint.
 *
 * Loading embeds a probe text once to confirm the endpoint answers with the
 * configured dimensions.
 *
 * @returns null when no endpoint is configured (lexical search only)
 */
export function createEmbedderLoader(
  config: EmbeddingsConfig,
  request: HttpRequestFn = httpRequest,
): EmbedderLoader | null {
  const { url } = config;
  if (!url) {
    logger.info("No embeddings endpoint configured; search will be lexical");
    return null;
  }

  return memoizeLoader(async () => {
    const embedder = new HttpEmbedder({
      url,
      model: config.model,
      dimensions: config.dimensions,
      apiKey: config.apiKey,
      timeoutMs: config.timeoutMs,
      httpRequest: request,
    });
    try {
      await embedder.embed([EMBEDDING_PROBE_TEXT]);
    } catch (error) {
      throw new EmbedderUnavailableError(logger.errorMessage(error));
    }
    logger.info("Embedding model loaded", {
      model: embedder.modelName,
      dimensions: embedder.dimensions,
    });
    return embedder;
  });
}
