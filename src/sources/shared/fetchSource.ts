/**
 * Fetch + parse for a single listing source
 */

import type { HttpRequestFn, SourceFetchOutcome } from "@/types";
import type { ServerListSource } from "@/interfaces";
import { httpRequest } from "@/clients/http";
import { SOURCE_FETCH_MAX_ATTEMPTS, SOURCE_FETCH_TIMEOUT_MS } from "@/constants";
import * as logger from "@/logger";

/**
 * Download and parse one source.
 *
 * Error handling:
 * - HTTP error, timeout or network failure → `failed` outcome (zero entries)
 * - Malformed rows → skipped inside the parser
 */
export async function fetchSourceEntries(
  source: ServerListSource,
  request: HttpRequestFn = httpRequest,
): Promise<SourceFetchOutcome> {
  logger.debug(`[${source.id}] Fetching listing`, { url: source.url });

  let content: string;
  try {
    content = await request<string>({
      method: "GET",
      url: source.url,
      responseType: "text",
      timeoutMs: SOURCE_FETCH_TIMEOUT_MS,
      retry: { maxAttempts: SOURCE_FETCH_MAX_ATTEMPTS },
    });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.warn(`[${source.id}] Failed to fetch listing`, {
      url: source.url,
      error: message,
    });
    return { status: "failed", sourceId: source.id, error: message };
  }

  const result = source.parse(content);
  logger.info(`[${source.id}] Parsed listing`, {
    entries: result.entries.length,
    skipped: result.skipped.length,
  });

  return { status: "ok", sourceId: source.id, result };
}
