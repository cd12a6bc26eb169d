/**
 * Live fetch across every listing source
 */

import type { HttpRequestFn, LiveFetchResult, ServerEntry } from "@/types";
import type { ServerListSource } from "@/interfaces";
import { httpRequest } from "@/clients/http";
import * as logger from "@/logger";
import { fetchSourceEntries } from "./shared";

/**
 * Fetch all sources concurrently.
 *
 * A failed source contributes zero entries; the others proceed. Entries are
 * concatenated in source order so aggregation stays deterministic.
 */
export async function fetchAllSources(
  sources: readonly ServerListSource[],
  request: HttpRequestFn = httpRequest,
): Promise<LiveFetchResult> {
  const outcomes = await Promise.all(
    sources.map((source) => fetchSourceEntries(source, request)),
  );

  const entries: ServerEntry[] = [];
  const failedSources: string[] = [];

  for (const outcome of outcomes) {
    if (outcome.status === "ok") {
      entries.push(...outcome.result.entries);
    } else {
      failedSources.push(outcome.sourceId);
    }
  }

  logger.info("Live fetch finished", {
    sources: sources.length,
    failed: failedSources.length,
    rawEntries: entries.length,
  });

  return { entries, outcomes, failedSources };
}
