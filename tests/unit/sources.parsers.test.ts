/**
 * Unit tests for the listing parsers
 *
 * Fixtures are trimmed copies of the real READMEs' structure.
 */

import { describe, it, expect } from "vitest";
import {
  appcypherServerSource,
  officialServerSource,
  parseOfficialLine,
  punkpeyeServerSource,
} from "@/sources";
import { loadFixtureText } from "../helpers/mockHttp";

describe("official source", () => {
  const result = officialServerSource.parse(loadFixtureText("sources/official.md"));

  it("emits entries from the four server sections only", () => {
    expect(result.entries.map((entry) => [entry.name, entry.category])).toEqual([
      ["Everything", "reference"],
      ["Fetch", "reference"],
      ["Git", "reference"],
      ["PostgreSQL", "archived"],
      ["Acme Cloud", "official"],
      ["mcp-weather", "community"],
    ]);
  });

  it("resolves relative links and strips inline images", () => {
    expect(result.entries[2]).toEqual({
      name: "Git",
      description: "Tools to read, search, and manipulate Git repositories",
      url: "https://github.com/modelcontextprotocol/servers/tree/main/src/git",
      category: "reference",
      source: "official",
    });
  });

  it("records malformed rows with their line number", () => {
    expect(result.skipped).toHaveLength(1);
    expect(result.skipped[0].lineNumber).toBe(16);
    expect(result.skipped[0].line).toBe("- Broken row without a link");
  });

  it("treats an unknown level-3 heading as a sub-heading", () => {
    expect(parseOfficialLine("### Something else", "community")).toEqual({ kind: "ignore" });
    expect(parseOfficialLine("## Resources", "community")).toEqual({
      kind: "heading",
      category: null,
    });
  });
});

describe("punkpeye source", () => {
  const result = punkpeyeServerSource.parse(loadFixtureText("sources/punkpeye.md"));

  it("uses slugged section headings as categories", () => {
    expect(result.entries.map((entry) => entry.category)).toEqual([
      "aggregators",
      "databases",
      "databases",
    ]);
  });

  it("cleans emoji out of descriptions", () => {
    expect(result.entries[0].description).toBe("Access many services through one MCP server");
    expect(result.entries[1]).toEqual({
      name: "someone/mcp-weather",
      description: "Weather forecasts, alerts!",
      url: "https://github.com/someone/mcp-weather",
      category: "databases",
      source: "punkpeye-awesome",
    });
  });

  it("falls back to a category description when none is given", () => {
    expect(result.entries[2].description).toBe("MCP server for databases");
  });

  it("skips rows without a GitHub link", () => {
    expect(result.skipped.map((row) => row.reason)).toEqual(["no GitHub link"]);
  });
});

describe("appcypher source", () => {
  const result = appcypherServerSource.parse(loadFixtureText("sources/appcypher.md"));

  it("keeps level-2 categories across level-3 sub-headings", () => {
    expect(result.entries.map((entry) => [entry.name, entry.category])).toEqual([
      ["Filesystem", "file-systems"],
      ["Nested", "file-systems"],
      ["Search Tool", "web-search"],
    ]);
  });

  it("strips the leading image and separator", () => {
    expect(result.entries[0].description).toBe(
      "Secure file operations with configurable access controls",
    );
    expect(result.entries[0].source).toBe("appcypher-awesome");
  });

  it("falls back to a category description when none is given", () => {
    expect(result.entries[2].description).toBe("MCP server for web-search");
  });

  it("skips non-GitHub rows", () => {
    expect(result.skipped).toHaveLength(1);
  });
});
