/**
 * Markdown listing helpers shared by the source parsers
 */

const IMG_TAG_PATTERN = /<img[^>]*?>/gi;
const HTML_TAG_PATTERN = /<\/?[a-z][^>]*>/gi;
const GITHUB_LINK_PATTERN = /\[([^\]]+)\]\((https:\/\/github\.com\/[^)\s]+)\)/;
const HEADING_PATTERN = /^(#{1,6})\s+(.*)$/;
// Letters, digits, underscore, whitespace and hyphen survive slugging
const NON_SLUG_CHARS = /[^\p{L}\p{N}_\s-]/gu;
// Description cleanup keeps basic punctuation
const NON_DESCRIPTION_CHARS = /[^\p{L}\p{N}_\s.,!?()-]/gu;

export function normalizeWhitespace(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

/**
 * Remove <img> tags and any other inline HTML
 */
export function stripMarkup(text: string): string {
  return text.replace(IMG_TAG_PATTERN, "").replace(HTML_TAG_PATTERN, "");
}

export interface MarkdownHeading {
  level: number;
  text: string;
}

/**
 * Parse a markdown ATX heading ("## Title")
 */
export function parseHeading(line: string): MarkdownHeading | null {
  const match = HEADING_PATTERN.exec(line);
  if (!match) {
    return null;
  }
  return { level: match[1].length, text: match[2] };
}

/**
 * Turn a section heading into a category slug
 *
 * @example
 * slugifyCategory("🔗 <a name=\"aggregators\"></a>Aggregators") // "aggregators"
 * slugifyCategory("Browser Automation (12)") // "browser-automation"
 */
export function slugifyCategory(headingText: string): string {
  const withoutMarkup = stripMarkup(headingText);
  const withoutCount = withoutMarkup.replace(/\s*\([^)]*\)\s*$/, "");
  return normalizeWhitespace(withoutCount.replace(NON_SLUG_CHARS, ""))
    .toLowerCase()
    .replace(/ /g, "-");
}

export interface MarkdownLink {
  name: string;
  url: string;
  /** Text following the link */
  rest: string;
}

/**
 * Find the first [name](https://github.com/...) link in a row
 */
export function extractGithubLink(content: string): MarkdownLink | null {
  const match = GITHUB_LINK_PATTERN.exec(content);
  if (!match) {
    return null;
  }
  return {
    name: match[1].trim(),
    url: match[2],
    rest: content.slice(match.index + match[0].length),
  };
}

/**
 * Drop the " - " separator between link and description
 */
export function stripLeadingSeparator(text: string): string {
  return text.replace(/^\s*[-–—]\s*/, "");
}

/**
 * Remove emoji and other symbols from a description
 */
export function cleanDescription(text: string): string {
  return normalizeWhitespace(text.replace(NON_DESCRIPTION_CHARS, ""));
}

/**
 * Resolve a possibly-relative link against a known base
 *
 * @returns Absolute URL, or null when the link cannot be resolved
 */
export function resolveLink(href: string, base: string): string | null {
  const trimmed = href.trim();
  if (/^https?:\/\//i.test(trimmed)) {
    return trimmed;
  }
  try {
    return new URL(trimmed, base).toString();
  } catch {
    return null;
  }
}

/**
 * List rows start with "- " (after trimming)
 */
export function isListRow(line: string): boolean {
  return line.startsWith("- ");
}
