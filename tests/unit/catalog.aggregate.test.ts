/**
 * Unit tests for catalog aggregation and deduplication
 */

import { describe, it, expect } from "vitest";
import { buildCatalog, deduplicateEntries, normalizeUrlKey } from "@/catalog";
import { makeEntry } from "../helpers/fixtures";

describe("normalizeUrlKey", () => {
  it("ignores case and trailing slashes", () => {
    expect(normalizeUrlKey(" https://GitHub.com/Org/Repo/ ")).toBe("https://github.com/org/repo");
  });
});

describe("deduplicateEntries", () => {
  it("keeps both descriptions verbatim when two entries share a url", () => {
    const merged = deduplicateEntries([
      makeEntry({ name: "weather", description: "Forecasts", source: "official" }),
      makeEntry({
        name: "Weather MCP",
        description: "Weather alerts, worldwide",
        url: "https://github.com/Example/Server/",
        source: "punkpeye-awesome",
      }),
    ]);

    expect(merged).toEqual([
      {
        name: "weather",
        description: "Forecasts; Weather alerts, worldwide",
        url: "https://github.com/example/server",
        category: "community",
        source: "official+punkpeye-awesome",
      },
    ]);
  });

  it("produces unique urls in first-seen order", () => {
    const merged = deduplicateEntries([
      makeEntry({ url: "https://github.com/a/one" }),
      makeEntry({ url: "https://github.com/b/two" }),
      makeEntry({ url: "https://github.com/a/one/" }),
      makeEntry({ url: "https://github.com/c/three" }),
    ]);

    const keys = merged.map((entry) => normalizeUrlKey(entry.url));
    expect(keys).toEqual([
      "https://github.com/a/one",
      "https://github.com/b/two",
      "https://github.com/c/three",
    ]);
    expect(new Set(keys).size).toBe(keys.length);
  });

  it("does not repeat identical descriptions or sources", () => {
    const [merged] = deduplicateEntries([
      makeEntry({ description: "Same", source: "official+appcypher-awesome" }),
      makeEntry({ description: "Same ", source: "appcypher-awesome" }),
    ]);
    expect(merged.description).toBe("Same");
    expect(merged.source).toBe("official+appcypher-awesome");
  });

  it("takes the first non-empty category", () => {
    const [merged] = deduplicateEntries([
      makeEntry({ category: "" }),
      makeEntry({ category: "databases", description: "other" }),
    ]);
    expect(merged.category).toBe("databases");
  });

  it("leaves single entries untouched", () => {
    const entry = makeEntry({ description: "  padded  " });
    expect(deduplicateEntries([entry])).toEqual([entry]);
  });
});

describe("buildCatalog", () => {
  it("wraps merged entries with metadata and freezes them", () => {
    const catalog = buildCatalog(
      [makeEntry(), makeEntry({ description: "again" })],
      1_700_000_000_000,
    );
    expect(catalog.entryCount).toBe(1);
    expect(catalog.retrievedAt).toBe(1_700_000_000_000);
    expect(catalog.schemaVersion).toBe("1.0");
    expect(Object.isFrozen(catalog.entries)).toBe(true);
  });
});
