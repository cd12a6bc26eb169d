import type { ServerEntry } from "@/types";

/**
 * Text embedded for an entry: name, description and category together give
 * the model more context than the description alone.
 */
export function entryEmbeddingText(entry: ServerEntry): string {
  return `${entry.name}. ${entry.description}. Category: ${entry.category}`;
}
