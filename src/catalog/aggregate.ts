/**
 * Catalog aggregation and deduplication
 *
 * Pure in-memory merge of every source's entries into one catalog.
 * No I/O, deterministic.
 */

import type { Catalog, ServerEntry } from "@/types";
import {
  CURRENT_SCHEMA_VERSION,
  DESCRIPTION_SEPARATOR,
  SOURCE_SEPARATOR,
} from "@/constants";
import * as logger from "@/logger";

/**
 * Dedup key for a url: case-insensitive, trailing-slash-insensitive
 *
 * @example
 * normalizeUrlKey("https://GitHub.com/Org/Repo/") // "https://github.com/org/repo"
 */
export function normalizeUrlKey(url: string): string {
  return url.trim().toLowerCase().replace(/\/+$/, "");
}

/**
 * Append a value if it is non-empty and not already present
 */
function pushDistinct(values: string[], value: string): void {
  const trimmed = value.trim();
  if (trimmed && !values.includes(trimmed)) {
    values.push(trimmed);
  }
}

/**
 * Merge entries that share a url.
 *
 * Per url group:
 * - name and url: first seen
 * - description: ordered distinct descriptions joined with "; " (lossless, no
 *   "best" pick)
 * - category: first non-empty
 * - source: ordered distinct labels joined with "+" (a label that is already
 *   composite, e.g. "a+b", is split first)
 *
 * Output keeps the first-seen order of url groups.
 */
export function deduplicateEntries(entries: readonly ServerEntry[]): ServerEntry[] {
  const groups = new Map<string, ServerEntry[]>();

  for (const entry of entries) {
    const key = normalizeUrlKey(entry.url);
    const group = groups.get(key);
    if (group) {
      group.push(entry);
    } else {
      groups.set(key, [entry]);
    }
  }

  const merged: ServerEntry[] = [];
  for (const group of groups.values()) {
    const [first] = group;
    if (group.length === 1) {
      merged.push({ ...first });
      continue;
    }

    const descriptions: string[] = [];
    const sources: string[] = [];
    let category = "";

    for (const entry of group) {
      pushDistinct(descriptions, entry.description);
      for (const label of entry.source.split(SOURCE_SEPARATOR)) {
        pushDistinct(sources, label);
      }
      if (!category && entry.category.trim()) {
        category = entry.category.trim();
      }
    }

    merged.push({
      name: first.name,
      description: descriptions.join(DESCRIPTION_SEPARATOR),
      url: first.url,
      category,
      source: sources.join(SOURCE_SEPARATOR),
    });

    logger.debug("Merged duplicate entries", {
      name: first.name,
      count: group.length,
      sources,
    });
  }

  return merged;
}

/**
 * Wrap entries into an immutable Catalog
 */
export function createCatalog(
  entries: readonly ServerEntry[],
  retrievedAt: number,
  schemaVersion: string = CURRENT_SCHEMA_VERSION,
): Catalog {
  const frozen = Object.freeze(entries.map((entry) => Object.freeze({ ...entry })));
  return Object.freeze({
    entries: frozen,
    retrievedAt,
    schemaVersion,
    entryCount: frozen.length,
  });
}

/**
 * Deduplicate raw parser output and produce the cycle's Catalog
 */
export function buildCatalog(
  rawEntries: readonly ServerEntry[],
  retrievedAt: number,
): Catalog {
  const unique = deduplicateEntries(rawEntries);
  logger.info("Catalog aggregated", {
    rawEntries: rawEntries.length,
    uniqueEntries: unique.length,
  });
  return createCatalog(unique, retrievedAt);
}
