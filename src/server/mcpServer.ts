/**
 * MCP server exposing the discovery tools over stdio
 *
 * Tools:
 * - find_mcp_server: best server for a capability description
 * - get_index_info: catalog size, search mode and cache state
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { z } from "zod";
import type { ServerDatabase } from "@/database";
import { SERVER_INFO, TOOL_NAMES } from "@/constants";
import { findMcpServer } from "@/tool";
import type { ReadmeFetcher } from "@/tool";
import * as logger from "@/logger";

export interface ScoutServerDeps {
  database: ServerDatabase;
  fetchReadme: ReadmeFetcher;
}

function jsonContent(value: unknown) {
  return {
    content: [{ type: "text" as const, text: JSON.stringify(value, null, 2) }],
  };
}

/**
 * Build the MCP server with both tools registered
 */
export function createScoutServer(deps: ScoutServerDeps): McpServer {
  const server = new McpServer(
    { name: SERVER_INFO.NAME, version: SERVER_INFO.VERSION },
    { capabilities: { tools: {} } },
  );

  server.registerTool(
    TOOL_NAMES.FIND_SERVER,
    {
      description:
        "Find the best MCP server for a capability. Describe what you need in plain words; " +
        "returns the top match with its README plus up to three alternatives.",
      inputSchema: {
        description: z
          .string()
          .min(1)
          .describe("What the server should do, e.g. 'query a PostgreSQL database'"),
        example_question: z
          .string()
          .optional()
          .describe("An example question the server should help answer"),
      },
    },
    async ({ description, example_question }) => {
      const result = await findMcpServer(
        { description, exampleQuestion: example_question },
        { database: deps.database, fetchReadme: deps.fetchReadme },
      );
      return jsonContent(result);
    },
  );

  server.registerTool(
    TOOL_NAMES.INDEX_INFO,
    {
      description: "Report catalog size, search mode and cache state of the server index.",
      inputSchema: {},
    },
    async () => {
      try {
        return jsonContent(await deps.database.getSearchInfo());
      } catch (error) {
        const message = logger.errorMessage(error);
        logger.error("get_index_info failed", { error: message });
        return { ...jsonContent({ status: "error", message }), isError: true };
      }
    },
  );

  return server;
}

/**
 * Connect the server to stdin/stdout
 */
export async function startStdioServer(server: McpServer): Promise<void> {
  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info("MCP server listening on stdio", { name: SERVER_INFO.NAME });
}
