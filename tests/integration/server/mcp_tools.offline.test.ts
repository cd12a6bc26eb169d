import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { z } from "zod";
import { CatalogCache, EmbeddingCache } from "@/cache";
import { createCatalog } from "@/catalog";
import { ServerDatabase } from "@/database";
import { createScoutServer } from "@/server";
import { createTempDir, sampleEntries, type TempDir } from "../../helpers/fixtures";

const NOW = 1_750_000_000_000;

const textResult = z.object({
  content: z.array(z.object({ type: z.literal("text"), text: z.string() })),
  isError: z.boolean().optional(),
});

function parseText(result: unknown): unknown {
  const [first] = textResult.parse(result).content;
  return JSON.parse(first.text);
}

describe("Integration: MCP tools over an in-memory transport", () => {
  let tmp: TempDir;
  let client: Client;

  beforeEach(async () => {
    tmp = createTempDir();
    const catalogCache = new CatalogCache({ root: tmp.path, now: () => NOW });
    await catalogCache.save(createCatalog(sampleEntries(), NOW));
    const database = await ServerDatabase.create({
      sources: [],
      catalogCache,
      embeddingCache: new EmbeddingCache({ root: tmp.path }),
      precomputed: null,
      loadEmbedder: null,
      embeddingModel: "unused",
      embeddingDimensions: 8,
      now: () => NOW,
    });

    const server = createScoutServer({
      database,
      fetchReadme: async (url) => (url.endsWith("/postgres") ? "# Postgres" : null),
    });
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    client = new Client({ name: "test-client", version: "0.0.0" });
    await Promise.all([server.connect(serverTransport), client.connect(clientTransport)]);
  });

  afterEach(async () => {
    await client.close();
    tmp.cleanup();
  });

  it("lists both tools", async () => {
    const { tools } = await client.listTools();
    expect(tools.map((tool) => tool.name).sort()).toEqual(["find_mcp_server", "get_index_info"]);
  });

  it("answers find_mcp_server with the best match", async () => {
    const result = await client.callTool({
      name: "find_mcp_server",
      arguments: { description: "database" },
    });

    expect(parseText(result)).toMatchObject({
      status: "found",
      server: { name: "postgres", readme: "# Postgres" },
      alternatives: [{ name: "mcp-weather", readme: null }],
    });
  });

  it("reports index info", async () => {
    const result = await client.callTool({ name: "get_index_info", arguments: {} });

    expect(parseText(result)).toMatchObject({
      totalServers: 4,
      searchMode: "lexical",
      catalogOrigin: "cache",
      retrievedAt: new Date(NOW).toISOString(),
    });
  });
});
