/**
 * Unit tests for documented-result promotion
 */

import { describe, it, expect } from "vitest";
import type { SearchHit } from "@/types";
import { promoteDocumented } from "@/tool";
import { makeEntry } from "../helpers/fixtures";

function hit(name: string, score: number): SearchHit {
  return { entry: makeEntry({ name, url: `https://github.com/test/${name}` }), score };
}

function readmesFor(names: string[]) {
  const requested: string[] = [];
  const fetchReadme = async (url: string) => {
    requested.push(url);
    const name = url.split("/").pop() ?? "";
    return names.includes(name) ? `# ${name}` : null;
  };
  return { fetchReadme, requested };
}

describe("promoteDocumented", () => {
  it("keeps the top hit when it has a README", async () => {
    const { fetchReadme, requested } = readmesFor(["a", "b"]);
    const result = await promoteDocumented([hit("a", 1), hit("b", 0.9)], fetchReadme);

    expect(result?.primary.entry.name).toBe("a");
    expect(result?.readme).toBe("# a");
    expect(requested).toEqual(["https://github.com/test/a"]);
  });

  it("promotes a close documented candidate", async () => {
    const { fetchReadme } = readmesFor(["c"]);
    const result = await promoteDocumented(
      [hit("a", 1), hit("b", 0.95), hit("c", 0.85), hit("d", 0.84)],
      fetchReadme,
    );

    expect(result?.primary.entry.name).toBe("c");
    expect(result?.rest.map((h) => h.entry.name)).toEqual(["a", "b", "d"]);
  });

  it("ignores candidates below the score ratio", async () => {
    const { fetchReadme, requested } = readmesFor(["b"]);
    const result = await promoteDocumented([hit("a", 1), hit("b", 0.5)], fetchReadme);

    expect(result?.primary.entry.name).toBe("a");
    expect(result?.readme).toBeNull();
    expect(requested).toEqual(["https://github.com/test/a"]);
  });

  it("stops at the first candidate under the score ratio", async () => {
    const { fetchReadme, requested } = readmesFor(["c", "d"]);
    const result = await promoteDocumented(
      [hit("a", 1), hit("b", 0.9), hit("c", 0.7), hit("d", 0.7)],
      fetchReadme,
    );

    expect(result?.primary.entry.name).toBe("a");
    expect(result?.readme).toBeNull();
    expect(requested).toEqual(["https://github.com/test/a", "https://github.com/test/b"]);
  });

  it("only looks inside the window", async () => {
    const { fetchReadme } = readmesFor(["e"]);
    const hits = ["a", "b", "c", "d", "e"].map((name) => hit(name, 1));
    const result = await promoteDocumented(hits, fetchReadme);
    expect(result?.primary.entry.name).toBe("a");

    const wider = await promoteDocumented(hits, fetchReadme, { window: 5, minScoreRatio: 0.8 });
    expect(wider?.primary.entry.name).toBe("e");
  });

  it("returns null for no hits", async () => {
    const { fetchReadme } = readmesFor([]);
    expect(await promoteDocumented([], fetchReadme)).toBeNull();
  });
});
