/**
 * Shared test data builders
 */

import { mkdtempSync, rmSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import type { EmbeddingMatrix, ServerEntry } from "@/types";
import type { ServerListSource } from "@/interfaces";
import { entryEmbeddingText } from "@/catalog";
import { FAKE_MODEL, FAKE_VOCABULARY, vectorFor } from "./fakeEmbedder";

export function makeEntry(overrides: Partial<ServerEntry> = {}): ServerEntry {
  return {
    name: "example-server",
    description: "An example server",
    url: "https://github.com/example/server",
    category: "community",
    source: "official",
    ...overrides,
  };
}

/**
 * Small catalog with one obvious match per fake-vocabulary topic
 */
export function sampleEntries(): ServerEntry[] {
  return [
    makeEntry({
      name: "postgres",
      description: "Read-only database access with sql queries",
      url: "https://github.com/example/postgres",
      category: "reference",
    }),
    makeEntry({
      name: "filesystem",
      description: "Secure file operations",
      url: "https://github.com/example/filesystem",
      category: "reference",
    }),
    makeEntry({
      name: "mcp-weather",
      description: "Current weather and forecast data",
      url: "https://github.com/example/mcp-weather",
    }),
    makeEntry({
      name: "browser-use",
      description: "Browser automation and web search",
      url: "https://github.com/example/browser-use",
    }),
  ];
}

/**
 * Source whose listing is one "name url" pair per line
 */
export function lineSource(id: string): ServerListSource {
  return {
    id,
    name: `Test source ${id}`,
    url: `https://listings.test/${id}.md`,
    parse: (content) => ({
      sourceId: id,
      skipped: [],
      entries: content
        .split("\n")
        .filter((line) => line.length > 0)
        .map((line) => {
          const [name, url] = line.split(" ");
          return makeEntry({ name, url, source: id });
        }),
    }),
  };
}

export function listing(entries: readonly ServerEntry[]): string {
  return entries.map((entry) => `${entry.name} ${entry.url}`).join("\n");
}

/**
 * Matrix built with the fake embedder's vectors
 */
export function fakeMatrix(entries: readonly ServerEntry[]): EmbeddingMatrix {
  return {
    model: FAKE_MODEL,
    dimensions: FAKE_VOCABULARY.length,
    vectors: entries.map((entry) => vectorFor(entryEmbeddingText(entry))),
  };
}

export interface TempDir {
  path: string;
  cleanup(): void;
}

export function createTempDir(prefix = "mcp-scout-test-"): TempDir {
  const path = mkdtempSync(join(tmpdir(), prefix));
  return {
    path,
    cleanup: () => rmSync(path, { recursive: true, force: true }),
  };
}
