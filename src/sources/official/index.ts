export { officialServerSource, parseOfficialLine, OFFICIAL_SOURCE_ID } from "./officialSource";
