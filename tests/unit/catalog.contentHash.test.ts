/**
 * Unit tests for content hashing
 */

import { describe, it, expect } from "vitest";
import { computeContentHash, computeEntriesHash, computeEntryHash } from "@/catalog";
import { makeEntry } from "../helpers/fixtures";

const first = makeEntry({ name: "one", url: "https://github.com/a/one" });
const second = makeEntry({ name: "two", url: "https://github.com/a/two" });

describe("computeContentHash", () => {
  it("is 16 hex characters", () => {
    expect(computeContentHash([first, second], "model-a")).toMatch(/^[0-9a-f]{16}$/);
  });

  it("changes with the model", () => {
    expect(computeContentHash([first], "model-a")).not.toBe(computeContentHash([first], "model-b"));
  });

  it("changes when entries are reordered", () => {
    expect(computeContentHash([first, second], "m")).not.toBe(
      computeContentHash([second, first], "m"),
    );
  });

  it("ignores the source label", () => {
    expect(computeContentHash([{ ...first, source: "official" }], "m")).toBe(
      computeContentHash([{ ...first, source: "official+appcypher-awesome" }], "m"),
    );
  });
});

describe("computeEntriesHash", () => {
  it("does not depend on order", () => {
    expect(computeEntriesHash([first, second])).toBe(computeEntriesHash([second, first]));
  });

  it("detects an edited description", () => {
    expect(computeEntryHash(first)).not.toBe(
      computeEntryHash({ ...first, description: "edited" }),
    );
  });
});
