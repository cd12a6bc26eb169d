/**
 * Cache root resolution
 */

import { homedir } from "os";
import { join, win32 } from "path";
import { CACHE_APP_DIR, ENV } from "@/constants";

export interface CacheRootOptions {
  env?: NodeJS.ProcessEnv;
  platform?: NodeJS.Platform;
  home?: string;
}

/**
 * Resolve the cache root directory.
 *
 * Order:
 * 1. MCP_SCOUT_CACHE_DIR (used as-is)
 * 2. $XDG_CACHE_HOME/mcp-scout
 * 3. %LOCALAPPDATA%\mcp-scout on Windows
 * 4. ~/.cache/mcp-scout
 */
export function resolveCacheRoot(options: CacheRootOptions = {}): string {
  const env = options.env ?? process.env;
  const platform = options.platform ?? process.platform;
  const home = options.home ?? homedir();

  const explicit = env[ENV.CACHE_DIR]?.trim();
  if (explicit) {
    return explicit;
  }

  const xdg = env[ENV.XDG_CACHE_HOME]?.trim();
  if (xdg) {
    return join(xdg, CACHE_APP_DIR);
  }

  if (platform === "win32") {
    const localAppData = env[ENV.LOCALAPPDATA]?.trim();
    return win32.join(localAppData || win32.join(home, "AppData", "Local"), CACHE_APP_DIR);
  }

  return join(home, ".cache", CACHE_APP_DIR);
}
