/**
 * appcypher/awesome-mcp-servers source
 *
 * Format:
 * - Categories: "## 📂 File Systems"
 * - Rows: "- <img src=... /> [Name](https://github.com/...) - Description"
 */

import type { LineOutcome } from "@/types";
import type { ServerListSource } from "@/interfaces";
import { SOURCE_URLS } from "@/constants";
import {
  extractGithubLink,
  isListRow,
  normalizeWhitespace,
  parseHeading,
  parseListing,
  slugifyCategory,
  stripLeadingSeparator,
  stripMarkup,
} from "../shared";

export const APPCYPHER_SOURCE_ID = "appcypher-awesome";

export function parseAppcypherLine(line: string, category: string | null): LineOutcome {
  const heading = parseHeading(line);
  if (heading) {
    if (heading.level !== 2) {
      return { kind: "ignore" };
    }
    const slug = slugifyCategory(heading.text);
    return { kind: "heading", category: slug || null };
  }

  if (!isListRow(line) || category === null) {
    return { kind: "ignore" };
  }

  const link = extractGithubLink(normalizeWhitespace(stripMarkup(line.slice(2))));
  if (!link) {
    return { kind: "skip", reason: "no GitHub link", line };
  }

  const description = stripLeadingSeparator(link.rest).trim();

  return {
    kind: "entry",
    entry: {
      name: link.name,
      description: description || `MCP server for ${category}`,
      url: link.url,
      category,
      source: APPCYPHER_SOURCE_ID,
    },
  };
}

export const appcypherServerSource: ServerListSource = {
  id: APPCYPHER_SOURCE_ID,

  name: "Appcypher Awesome MCP Servers",

  url: SOURCE_URLS.APPCYPHER_AWESOME,

  parse: (content: string) => parseListing(content, APPCYPHER_SOURCE_ID, parseAppcypherLine),
};
