/**
 * HTTP embedder for OpenAI-compatible /embeddings endpoints
 *
 * Request:  { model, input: string[] }
 * Response: { data: [{ embedding: number[], index: number }] }
 *
 * Works against any server exposing that contract (a local inference server,
 * a hosted API) so no model weights are downloaded by this process.
 */

import type { HttpRequestFn } from "@/types";
import type { Embedder } from "@/interfaces";
import { httpRequest as defaultHttpRequest } from "@/clients/http";
import { isRecord } from "@/catalog";
import { EMBEDDING_BATCH_SIZE } from "@/constants";

/**
 * Error thrown when the endpoint answers with something that is not a usable
 * set of vectors
 */
export class EmbeddingResponseError extends Error {
  constructor(message: string) {
    super(`Invalid embeddings response: ${message}`);
    this.name = "EmbeddingResponseError";
  }
}

/**
 * Extract vectors from an embeddings response, ordered by `index`
 *
 * @throws {EmbeddingResponseError}
 */
export function parseEmbeddingResponse(
  body: unknown,
  expectedCount: number,
  dimensions: number,
): number[][] {
  if (!isRecord(body) || !Array.isArray(body.data)) {
    throw new EmbeddingResponseError("missing data array");
  }
  if (body.data.length !== expectedCount) {
    throw new EmbeddingResponseError(
      `expected ${expectedCount} vectors, got ${body.data.length}`,
    );
  }

  const vectors: number[][] = new Array<number[]>(expectedCount);
  body.data.forEach((item: unknown, position: number) => {
    if (!isRecord(item) || !Array.isArray(item.embedding)) {
      throw new EmbeddingResponseError(`data[${position}].embedding missing`);
    }
    const index = typeof item.index === "number" ? item.index : position;
    if (!Number.isInteger(index) || index < 0 || index >= expectedCount) {
      throw new EmbeddingResponseError(`data[${position}].index out of range`);
    }
    const vector = item.embedding.map((cell: unknown) => {
      if (typeof cell !== "number" || !Number.isFinite(cell)) {
        throw new EmbeddingResponseError(`data[${position}] contains a non-finite value`);
      }
      return cell;
    });
    if (vector.length !== dimensions) {
      throw new EmbeddingResponseError(
        `data[${position}] has ${vector.length} dimensions, expected ${dimensions}`,
      );
    }
    vectors[index] = vector;
  });

  for (let i = 0; i < expectedCount; i++) {
    if (!vectors[i]) {
      throw new EmbeddingResponseError(`no vector for input ${i}`);
    }
  }

  return vectors;
}

export interface HttpEmbedderConfig {
  url: string;
  model: string;
  dimensions: number;
  apiKey: string | null;
  timeoutMs: number;
  /**
   * Optional HTTP request function (for testing/mocking)
   */
  httpRequest?: HttpRequestFn;
}

/**
 * Embedder backed by an OpenAI-compatible HTTP endpoint
 */
export class HttpEmbedder implements Embedder {
  readonly modelName: string;
  readonly dimensions: number;
  private readonly url: string;
  private readonly apiKey: string | null;
  private readonly timeoutMs: number;
  private readonly httpRequest: HttpRequestFn;

  constructor(config: HttpEmbedderConfig) {
    this.url = config.url;
    this.modelName = config.model;
    this.dimensions = config.dimensions;
    this.apiKey = config.apiKey;
    this.timeoutMs = config.timeoutMs;
    this.httpRequest = config.httpRequest ?? defaultHttpRequest;
  }

  async embed(texts: readonly string[]): Promise<number[][]> {
    const vectors: number[][] = [];
    for (let start = 0; start < texts.length; start += EMBEDDING_BATCH_SIZE) {
      const batch = texts.slice(start, start + EMBEDDING_BATCH_SIZE);
      vectors.push(...(await this.embedBatch(batch)));
    }
    return vectors;
  }

  private async embedBatch(batch: readonly string[]): Promise<number[][]> {
    const headers: Record<string, string> = {};
    if (this.apiKey) {
      headers.Authorization = `Bearer ${this.apiKey}`;
    }

    const body = await this.httpRequest<unknown>({
      method: "POST",
      url: this.url,
      headers,
      json: { model: this.modelName, input: batch },
      responseType: "json",
      timeoutMs: this.timeoutMs,
      idempotent: true,
    });

    return parseEmbeddingResponse(body, batch.length, this.dimensions);
  }
}
