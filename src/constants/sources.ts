/**
 * Live source listing constants
 */

export const SOURCE_URLS = {
  OFFICIAL:
    "https://raw.githubusercontent.com/modelcontextprotocol/servers/refs/heads/main/README.md",
  PUNKPEYE_AWESOME:
    "https://raw.githubusercontent.com/punkpeye/awesome-mcp-servers/main/README.md",
  APPCYPHER_AWESOME:
    "https://raw.githubusercontent.com/appcypher/awesome-mcp-servers/main/README.md",
} as const;

/**
 * Base for relative links in the official README (e.g. "src/fetch")
 */
export const OFFICIAL_LINK_BASE =
  "https://github.com/modelcontextprotocol/servers/tree/main/";

/**
 * Official README section headings -> category.
 * Matched as substrings so emoji prefixes do not matter.
 */
export const OFFICIAL_SECTIONS: ReadonlyArray<{ marker: string; category: string }> = [
  { marker: "reference servers", category: "reference" },
  { marker: "archived", category: "archived" },
  { marker: "official integrations", category: "official" },
  { marker: "community servers", category: "community" },
];

/**
 * Per-source fetch timeout. A timed-out source contributes zero entries.
 */
export const SOURCE_FETCH_TIMEOUT_MS = 30_000;

/**
 * Attempts per source fetch
 */
export const SOURCE_FETCH_MAX_ATTEMPTS = 2;
