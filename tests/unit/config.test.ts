/**
 * Unit tests for configuration loading
 */

import { describe, it, expect } from "vitest";
import { join, win32 } from "path";
import { ConfigValidationError, loadConfig } from "@/config";
import { resolveCacheRoot } from "@/cache";

describe("loadConfig", () => {
  it("applies defaults", () => {
    const config = loadConfig({ XDG_CACHE_HOME: "/tmp/xdg" }, "linux");
    expect(config).toEqual({
      logLevel: "info",
      cacheRoot: join("/tmp/xdg", "mcp-scout"),
      dataUrl: "https://github.com/mcp-scout/mcp-scout/releases/download/data-latest",
      skipPrecomputed: false,
      catalogTtlMs: 3 * 60 * 60 * 1000,
      embeddings: {
        url: null,
        model: "all-MiniLM-L6-v2",
        dimensions: 384,
        apiKey: null,
        timeoutMs: 15_000,
      },
    });
  });

  it("reads overrides", () => {
    const config = loadConfig(
      {
        MCP_SCOUT_CACHE_DIR: "/srv/cache",
        MCP_SCOUT_SKIP_PRECOMPUTED: "true",
        MCP_SCOUT_CATALOG_TTL_SECONDS: "60",
        MCP_SCOUT_EMBEDDINGS_URL: "http://localhost:8080/v1/embeddings",
        MCP_SCOUT_EMBEDDINGS_DIMENSIONS: "8",
        MCP_SCOUT_DEBUG: "1",
      },
      "linux",
    );
    expect(config.cacheRoot).toBe("/srv/cache");
    expect(config.skipPrecomputed).toBe(true);
    expect(config.catalogTtlMs).toBe(60_000);
    expect(config.embeddings.url).toBe("http://localhost:8080/v1/embeddings");
    expect(config.embeddings.dimensions).toBe(8);
    expect(config.logLevel).toBe("debug");
  });

  it("rejects a non-numeric TTL", () => {
    expect(() => loadConfig({ MCP_SCOUT_CATALOG_TTL_SECONDS: "soon" }, "linux")).toThrow(
      ConfigValidationError,
    );
  });

  it("rejects an unknown log level", () => {
    expect(() => loadConfig({ LOG_LEVEL: "verbose" }, "linux")).toThrow(
      'Invalid LOG_LEVEL="verbose"',
    );
  });
});

describe("resolveCacheRoot", () => {
  it("uses LOCALAPPDATA on Windows", () => {
    expect(
      resolveCacheRoot({
        env: { LOCALAPPDATA: "C:\\Users\\test\\AppData\\Local" },
        platform: "win32",
        home: "C:\\Users\\test",
      }),
    ).toBe(win32.join("C:\\Users\\test\\AppData\\Local", "mcp-scout"));
  });

  it("falls back to ~/.cache", () => {
    expect(resolveCacheRoot({ env: {}, platform: "linux", home: "/home/test" })).toBe(
      join("/home/test", ".cache", "mcp-scout"),
    );
  });
});
