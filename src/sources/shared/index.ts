export {
  normalizeWhitespace,
  stripMarkup,
  parseHeading,
  slugifyCategory,
  extractGithubLink,
  stripLeadingSeparator,
  cleanDescription,
  resolveLink,
  isListRow,
} from "./markdown";
export type { MarkdownHeading, MarkdownLink } from "./markdown";
export { parseListing } from "./parseListing";
export type { LineParser } from "./parseListing";
export { fetchSourceEntries } from "./fetchSource";
