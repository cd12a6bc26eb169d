/**
 * Unit tests for the shared markdown helpers
 */

import { describe, it, expect } from "vitest";
import {
  cleanDescription,
  extractGithubLink,
  parseHeading,
  resolveLink,
  slugifyCategory,
  stripLeadingSeparator,
  stripMarkup,
} from "@/sources/shared";

describe("markdown helpers", () => {
  it("strips img and inline html tags", () => {
    expect(stripMarkup('<img src="x.png" /> **[A](b)** <b>bold</b>')).toBe(" **[A](b)** bold");
  });

  it("parses heading level and text", () => {
    expect(parseHeading("### 🌎 Community Servers")).toEqual({
      level: 3,
      text: "🌎 Community Servers",
    });
    expect(parseHeading("- not a heading")).toBeNull();
  });

  describe("slugifyCategory", () => {
    it("drops emoji, anchors and trailing counts", () => {
      expect(slugifyCategory('🔗 <a name="aggregators"></a>Aggregators')).toBe("aggregators");
      expect(slugifyCategory("Browser Automation (12)")).toBe("browser-automation");
    });

    it("returns empty for a heading with no words", () => {
      expect(slugifyCategory("🌟")).toBe("");
    });
  });

  it("extracts the first GitHub link and the text after it", () => {
    expect(
      extractGithubLink("[org/repo](https://github.com/org/repo) 🐍 - Does things"),
    ).toEqual({
      name: "org/repo",
      url: "https://github.com/org/repo",
      rest: " 🐍 - Does things",
    });
    expect(extractGithubLink("[x](https://gitlab.com/x/y) - nope")).toBeNull();
  });

  it("cleans symbols but keeps punctuation", () => {
    expect(cleanDescription(" ☁️ 🏠 - Fast, local (offline) search!")).toBe(
      "- Fast, local (offline) search!",
    );
  });

  it("removes the leading dash separator only", () => {
    expect(stripLeadingSeparator(" - read-only access")).toBe("read-only access");
    expect(stripLeadingSeparator("no separator")).toBe("no separator");
  });

  describe("resolveLink", () => {
    const base = "https://github.com/modelcontextprotocol/servers/tree/main/";

    it("keeps absolute links", () => {
      expect(resolveLink(" https://example.com/x ", base)).toBe("https://example.com/x");
    });

    it("resolves relative links against the base", () => {
      expect(resolveLink("src/fetch", base)).toBe(
        "https://github.com/modelcontextprotocol/servers/tree/main/src/fetch",
      );
    });
  });
});
