/**
 * Official MCP servers source
 *
 * Parses the modelcontextprotocol/servers README.
 *
 * Format:
 * - Sections: "## 🌟 Reference Servers", "### Archived",
 *   "### 🎖️ Official Integrations", "### 🌎 Community Servers"
 * - Rows: "- <img ...> **[Name](url)** - Description"
 * - Reference servers link relatively ("src/fetch")
 *
 * Any other level-2 heading closes the current section so that trailing
 * sections (frameworks, resources) are not read as servers.
 */

import type { LineOutcome } from "@/types";
import type { ServerListSource } from "@/interfaces";
import { OFFICIAL_LINK_BASE, OFFICIAL_SECTIONS, SOURCE_URLS } from "@/constants";
import {
  isListRow,
  normalizeWhitespace,
  parseHeading,
  parseListing,
  resolveLink,
  stripMarkup,
} from "../shared";

export const OFFICIAL_SOURCE_ID = "official";

const ROW_PATTERN = /^-\s*\*\*\[([^\]]+)\]\(([^)]+)\)\*\*\s*-\s*(.+)$/;

function categoryForHeading(text: string): string | null {
  const lowered = text.toLowerCase();
  const section = OFFICIAL_SECTIONS.find(({ marker }) => lowered.includes(marker));
  return section ? section.category : null;
}

/**
 * Parse one trimmed README line
 */
export function parseOfficialLine(line: string, category: string | null): LineOutcome {
  const heading = parseHeading(line);
  if (heading) {
    const matched = categoryForHeading(heading.text);
    if (matched) {
      return { kind: "heading", category: matched };
    }
    // Unknown level-2 heading ends the section; deeper ones are sub-headings
    return heading.level <= 2 ? { kind: "heading", category: null } : { kind: "ignore" };
  }

  if (!isListRow(line) || category === null) {
    return { kind: "ignore" };
  }

  const cleaned = normalizeWhitespace(stripMarkup(line));
  const match = ROW_PATTERN.exec(cleaned);
  if (!match) {
    return { kind: "skip", reason: "row does not match **[Name](url)** - Description", line };
  }

  const url = resolveLink(match[2], OFFICIAL_LINK_BASE);
  if (!url) {
    return { kind: "skip", reason: `unresolvable link: ${match[2]}`, line };
  }

  return {
    kind: "entry",
    entry: {
      name: match[1].trim(),
      description: match[3].trim(),
      url,
      category,
      source: OFFICIAL_SOURCE_ID,
    },
  };
}

export const officialServerSource: ServerListSource = {
  id: OFFICIAL_SOURCE_ID,

  name: "Official MCP Servers",

  url: SOURCE_URLS.OFFICIAL,

  parse: (content: string) => parseListing(content, OFFICIAL_SOURCE_ID, parseOfficialLine),
};
