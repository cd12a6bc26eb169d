/**
 * Source parser result types
 */

import type { ServerEntry } from "./entry";

/**
 * Outcome of parsing a single listing line
 */
export type LineOutcome =
  | { kind: "heading"; category: string | null }
  | { kind: "entry"; entry: ServerEntry }
  | { kind: "skip"; reason: string; line: string }
  | { kind: "ignore" };

export interface SkippedRow {
  lineNumber: number;
  reason: string;
  line: string;
}

/**
 * Result of parsing one source listing
 */
export interface SourceParseResult {
  sourceId: string;
  entries: ServerEntry[];
  skipped: SkippedRow[];
}

/**
 * Outcome of fetching + parsing one source during a refresh cycle
 */
export type SourceFetchOutcome =
  | { status: "ok"; sourceId: string; result: SourceParseResult }
  | { status: "failed"; sourceId: string; error: string };

/**
 * Combined result of fetching every source
 */
export interface LiveFetchResult {
  entries: ServerEntry[];
  outcomes: SourceFetchOutcome[];
  failedSources: string[];
}
