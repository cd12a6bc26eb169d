/**
 * Server List Source Interface
 *
 * Behavioral contract for listings that enumerate MCP servers
 * (the official servers README, community awesome lists, ...)
 */

import type { SourceParseResult } from "@/types";

/**
 * Each source declares where its listing lives and how to parse it.
 * Fetching is shared (see fetchSourceEntries) so every source gets the same
 * timeout and failure semantics.
 */
export interface ServerListSource {
  /**
   * Provenance label applied to every entry this source emits
   */
  id: string;

  /**
   * Human-readable name for logs and index info
   */
  name: string;

  /**
   * Raw listing location
   */
  url: string;

  /**
   * Parse raw listing text. Malformed rows are skipped, never thrown.
   */
  parse(content: string): SourceParseResult;
}
