/**
 * punkpeye/awesome-mcp-servers source
 *
 * Format:
 * - Categories: "## ..." and "### 🔗 <a name=...></a>Aggregators"
 * - Rows: "- [owner/repo](https://github.com/owner/repo) 🐍 ☁️ - Description"
 *
 * Language/deployment emoji between link and description are dropped with the
 * rest of the symbols.
 */

import type { LineOutcome } from "@/types";
import type { ServerListSource } from "@/interfaces";
import { SOURCE_URLS } from "@/constants";
import {
  cleanDescription,
  extractGithubLink,
  isListRow,
  parseHeading,
  parseListing,
  slugifyCategory,
  stripLeadingSeparator,
  stripMarkup,
} from "../shared";

export const PUNKPEYE_SOURCE_ID = "punkpeye-awesome";

export function parsePunkpeyeLine(line: string, category: string | null): LineOutcome {
  const heading = parseHeading(line);
  if (heading) {
    if (heading.level < 2 || heading.level > 3) {
      return { kind: "ignore" };
    }
    const slug = slugifyCategory(heading.text);
    return { kind: "heading", category: slug || null };
  }

  if (!isListRow(line) || category === null) {
    return { kind: "ignore" };
  }

  const link = extractGithubLink(stripMarkup(line.slice(2)));
  if (!link) {
    return { kind: "skip", reason: "no GitHub link", line };
  }

  const description = stripLeadingSeparator(cleanDescription(link.rest)).trim();

  return {
    kind: "entry",
    entry: {
      name: link.name,
      description: description || `MCP server for ${category}`,
      url: link.url,
      category,
      source: PUNKPEYE_SOURCE_ID,
    },
  };
}

export const punkpeyeServerSource: ServerListSource = {
  id: PUNKPEYE_SOURCE_ID,

  name: "Punkpeye Awesome MCP Servers",

  url: SOURCE_URLS.PUNKPEYE_AWESOME,

  parse: (content: string) => parseListing(content, PUNKPEYE_SOURCE_ID, parsePunkpeyeLine),
};
