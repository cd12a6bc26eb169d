/**
 * Content hashing for cache invalidation and incremental embedding
 */

import { createHash } from "crypto";
import type { ServerEntry } from "@/types";
import { CONTENT_HASH_LENGTH, EMBEDDINGS_VERSION } from "@/constants";

function sha256Prefix(input: string): string {
  return createHash("sha256").update(input).digest("hex").slice(0, CONTENT_HASH_LENGTH);
}

/**
 * Hash of a catalog's embeddable content for a given model.
 *
 * Entry order is part of the hash: matrix rows are aligned by index, so a
 * reordered catalog must not reuse a cached matrix. Source labels are
 * excluded since they are never embedded.
 */
export function computeContentHash(
  entries: readonly ServerEntry[],
  model: string,
): string {
  const content = entries.map((entry) => ({
    name: entry.name,
    description: entry.description,
    category: entry.category,
    url: entry.url,
  }));
  return sha256Prefix(`${EMBEDDINGS_VERSION}:${model}:${JSON.stringify(content)}`);
}

/**
 * Hash of a single entry's content (keys sorted, source excluded)
 */
export function computeEntryHash(entry: ServerEntry): string {
  return sha256Prefix(
    JSON.stringify({
      category: entry.category,
      description: entry.description,
      name: entry.name,
      url: entry.url,
    }),
  );
}

/**
 * Order-independent hash of a whole entry set, used to detect "no change"
 * between two published bundles
 */
export function computeEntriesHash(entries: readonly ServerEntry[]): string {
  const hashes = entries.map(computeEntryHash).sort();
  return sha256Prefix(hashes.join("|"));
}
