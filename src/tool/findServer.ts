/**
 * find_mcp_server: resolve a capability description to a server
 */

import type {
  FindServerInput,
  FindServerResult,
  PromotionOptions,
  SearchHit,
  ServerDetails,
} from "@/types";
import type { ServerDatabase } from "@/database";
import { MAX_ALTERNATIVES, NOT_FOUND_SUGGESTIONS, PROMOTION, TOOL_SEARCH_TOP_K } from "@/constants";
import * as logger from "@/logger";
import { promoteDocumented } from "./promotion";
import type { ReadmeFetcher } from "./readmeFetcher";

export interface FindServerDeps {
  database: Pick<ServerDatabase, "search">;
  fetchReadme: ReadmeFetcher;
  promotion?: PromotionOptions;
}

function toDetails(hit: SearchHit, readme: string | null): ServerDetails {
  const { name, description, url, category, source } = hit.entry;
  return { name, description, url, category, source, readme };
}

/**
 * Search the catalog and return the best server with up to three alternatives
 */
export async function findMcpServer(
  input: FindServerInput,
  deps: FindServerDeps,
): Promise<FindServerResult> {
  const description = input.description.trim();
  if (!description) {
    return { status: "error", message: "description must not be empty" };
  }

  if (input.exampleQuestion) {
    logger.debug("find_mcp_server example question", { exampleQuestion: input.exampleQuestion });
  }

  try {
    const hits = await deps.database.search(description, TOOL_SEARCH_TOP_K);
    const promoted = await promoteDocumented(hits, deps.fetchReadme, deps.promotion ?? PROMOTION);

    if (!promoted) {
      return {
        status: "not_found",
        message: `No MCP servers found for: ${description}`,
        suggestions: [...NOT_FOUND_SUGGESTIONS],
      };
    }

    logger.info("find_mcp_server resolved", {
      query: description,
      server: promoted.primary.entry.name,
      hasReadme: promoted.readme !== null,
    });

    return {
      status: "found",
      server: toDetails(promoted.primary, promoted.readme),
      alternatives: promoted.rest.slice(0, MAX_ALTERNATIVES).map((hit) => toDetails(hit, null)),
    };
  } catch (error) {
    const message = logger.errorMessage(error);
    logger.error("find_mcp_server failed", { query: description, error: message });
    return { status: "error", message: `Search failed: ${message}` };
  }
}
