/**
 * Deterministic embedder for tests
 *
 * Each vector counts occurrences of a fixed vocabulary in the text, so cosine
 * similarity tracks shared keywords and expected rankings can be derived by
 * hand.
 */

import type { Embedder } from "@/interfaces";

export const FAKE_VOCABULARY = [
  "weather",
  "forecast",
  "database",
  "sql",
  "file",
  "git",
  "browser",
  "search",
] as const;

export const FAKE_MODEL = "fake-model";

export interface FakeEmbedder extends Embedder {
  /** Every batch passed to embed() */
  readonly calls: string[][];
}

export function vectorFor(text: string): number[] {
  const tokens = text.toLowerCase().split(/[^a-z]+/);
  return FAKE_VOCABULARY.map((word) => tokens.filter((token) => token === word).length);
}

export function createFakeEmbedder(
  options: { model?: string; dimensions?: number; failQueries?: boolean } = {},
): FakeEmbedder {
  const calls: string[][] = [];
  return {
    modelName: options.model ?? FAKE_MODEL,
    dimensions: options.dimensions ?? FAKE_VOCABULARY.length,
    calls,
    async embed(texts: readonly string[]): Promise<number[][]> {
      calls.push([...texts]);
      if (options.failQueries) {
        throw new Error("embedding endpoint down");
      }
      return texts.map(vectorFor);
    },
  };
}
