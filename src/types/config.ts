/**
 * Application configuration types
 */

import type { LogLevel } from "./logger";

export interface EmbeddingsConfig {
  /** OpenAI-compatible /embeddings endpoint; unset means lexical search only */
  url: string | null;
  model: string;
  dimensions: number;
  apiKey: string | null;
  timeoutMs: number;
}

export interface AppConfig {
  logLevel: LogLevel;
  cacheRoot: string;
  dataUrl: string;
  skipPrecomputed: boolean;
  catalogTtlMs: number;
  embeddings: EmbeddingsConfig;
}
