/**
 * Environment variable names
 */

export const ENV = {
  LOG_LEVEL: "LOG_LEVEL",
  DEBUG: "MCP_SCOUT_DEBUG",
  CACHE_DIR: "MCP_SCOUT_CACHE_DIR",
  XDG_CACHE_HOME: "XDG_CACHE_HOME",
  LOCALAPPDATA: "LOCALAPPDATA",
  DATA_URL: "MCP_SCOUT_DATA_URL",
  SKIP_PRECOMPUTED: "MCP_SCOUT_SKIP_PRECOMPUTED",
  CATALOG_TTL_SECONDS: "MCP_SCOUT_CATALOG_TTL_SECONDS",
  EMBEDDINGS_URL: "MCP_SCOUT_EMBEDDINGS_URL",
  EMBEDDINGS_MODEL: "MCP_SCOUT_EMBEDDINGS_MODEL",
  EMBEDDINGS_DIMENSIONS: "MCP_SCOUT_EMBEDDINGS_DIMENSIONS",
  EMBEDDINGS_API_KEY: "MCP_SCOUT_EMBEDDINGS_API_KEY",
} as const;

export const SERVER_INFO = {
  NAME: "mcp-scout",
  VERSION: "0.1.0",
} as const;
