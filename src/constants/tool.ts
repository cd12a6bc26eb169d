/**
 * Query tool constants
 */

import type { PromotionOptions } from "@/types";

export const TOOL_NAMES = {
  FIND_SERVER: "find_mcp_server",
  INDEX_INFO: "get_index_info",
} as const;

/**
 * Alternatives returned next to the primary result
 */
export const MAX_ALTERNATIVES = 3;

/**
 * Candidates fetched from the database per query
 */
export const TOOL_SEARCH_TOP_K = 20;

/**
 * Promotion of a documented candidate over an undocumented top match.
 * Tuned empirically; override per call rather than editing here.
 */
export const PROMOTION: PromotionOptions = {
  window: 4,
  minScoreRatio: 0.8,
};

export const README_FILENAMES = ["README.md", "README.txt", "README", "readme.md"] as const;

export const README_TIMEOUT_MS = 10_000;

export const RAW_GITHUB_BASE = "https://raw.githubusercontent.com";

export const NOT_FOUND_SUGGESTIONS = [
  "Try broader terms (e.g. 'database' instead of 'postgres replication')",
  "Describe the capability rather than a product name",
  "Check https://github.com/modelcontextprotocol/servers for the full list",
];
