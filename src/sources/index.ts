/**
 * Server list sources
 *
 * Each source has its own subdirectory with source-specific parsing logic.
 * All sources emit ServerEntry[] through the shared line parser.
 */

import type { ServerListSource } from "@/interfaces";
import { officialServerSource } from "./official";
import { punkpeyeServerSource } from "./punkpeye";
import { appcypherServerSource } from "./appcypher";

export { officialServerSource, parseOfficialLine, OFFICIAL_SOURCE_ID } from "./official";
export { punkpeyeServerSource, parsePunkpeyeLine, PUNKPEYE_SOURCE_ID } from "./punkpeye";
export { appcypherServerSource, parseAppcypherLine, APPCYPHER_SOURCE_ID } from "./appcypher";
export { fetchAllSources } from "./fetchAllSources";
export { fetchSourceEntries } from "./shared";

/**
 * Every live source, in merge-priority order
 */
export function getAllSources(): ServerListSource[] {
  return [officialServerSource, punkpeyeServerSource, appcypherServerSource];
}
