/**
 * Line-oriented listing parser shared by all sources
 */

import type { LineOutcome, SkippedRow, SourceParseResult, ServerEntry } from "@/types";
import * as logger from "@/logger";

/**
 * Parses one trimmed line given the category currently in effect
 */
export type LineParser = (line: string, category: string | null) => LineOutcome;

/**
 * Walk a listing line by line.
 *
 * Headings switch the current category; rows become entries or recorded
 * skips. One malformed row never fails the batch.
 */
export function parseListing(
  content: string,
  sourceId: string,
  parseLine: LineParser,
): SourceParseResult {
  const entries: ServerEntry[] = [];
  const skipped: SkippedRow[] = [];
  let category: string | null = null;

  const lines = content.split(/\r?\n/);
  lines.forEach((rawLine, index) => {
    const line = rawLine.trim();
    if (!line) {
      return;
    }

    const outcome = parseLine(line, category);
    switch (outcome.kind) {
      case "heading":
        category = outcome.category;
        break;
      case "entry":
        entries.push(outcome.entry);
        break;
      case "skip":
        skipped.push({ lineNumber: index + 1, reason: outcome.reason, line: outcome.line });
        break;
      case "ignore":
        break;
    }
  });

  if (skipped.length > 0) {
    logger.debug(`[${sourceId}] Skipped malformed rows`, {
      skipped: skipped.length,
      firstReason: skipped[0].reason,
    });
  }

  return { sourceId, entries, skipped };
}
