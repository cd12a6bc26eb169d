import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { existsSync, readFileSync } from "fs";
import { join } from "path";
import type { ServerEntry } from "@/types";
import { buildBundle } from "@/publish";
import type { PreviousBundle } from "@/publish";
import { computeEntriesHash } from "@/catalog";
import { createMockHttp } from "../../helpers/mockHttp";
import { createFakeEmbedder, FAKE_MODEL } from "../../helpers/fakeEmbedder";
import { createTempDir, lineSource, listing, makeEntry, type TempDir } from "../../helpers/fixtures";

const NOW = 1_750_000_000_000;

function repo(name: string): ServerEntry {
  return makeEntry({ name, url: `https://github.com/example/${name}` });
}

function readJson(path: string): unknown {
  return JSON.parse(readFileSync(path, "utf-8"));
}

describe("Integration: bundle build (offline)", () => {
  const mockHttp = createMockHttp();
  const sources = [lineSource("alpha"), lineSource("beta")];
  let tmp: TempDir;
  let outDir: string;

  beforeEach(() => {
    mockHttp.reset();
    mockHttp.on("GET", sources[0].url, listing([repo("weather-tool"), repo("git-helper")]));
    mockHttp.on("GET", sources[1].url, listing([repo("weather-tool"), repo("file-browser")]));
    tmp = createTempDir();
    outDir = join(tmp.path, "bundle");
  });

  afterEach(() => {
    tmp.cleanup();
  });

  function build(previous: PreviousBundle | null, embedder = createFakeEmbedder()) {
    return buildBundle({
      sources,
      embedder,
      outDir,
      previous,
      httpRequest: mockHttp.request,
      now: () => NOW,
    });
  }

  it("writes servers, embeddings and data_info", async () => {
    const embedder = createFakeEmbedder();
    const result = await build(null, embedder);

    expect(result).toMatchObject({ changed: true, serversCount: 3, reused: 0, embedded: 3 });
    expect(embedder.calls).toHaveLength(1);

    const servers = readJson(join(outDir, "servers.json"));
    expect(servers).toEqual([
      { ...repo("weather-tool"), source: "alpha+beta" },
      { ...repo("git-helper"), source: "alpha" },
      { ...repo("file-browser"), source: "beta" },
    ]);

    expect(readJson(join(outDir, "embeddings.json"))).toEqual({
      model: FAKE_MODEL,
      dimensions: 8,
      vectors: [
        [1, 0, 0, 0, 0, 0, 0, 0],
        [0, 0, 0, 0, 0, 1, 0, 0],
        [0, 0, 0, 0, 1, 0, 1, 0],
      ],
    });

    expect(readJson(join(outDir, "data_info.json"))).toEqual({
      schema_version: "1.0",
      servers_count: 3,
      servers_hash: computeEntriesHash([repo("weather-tool"), repo("git-helper"), repo("file-browser")]),
      embeddings_shape: [3, 8],
      model_name: FAKE_MODEL,
      embeddings_version: "v1",
      build_timestamp: 1_750_000_000,
      build_date: new Date(NOW).toISOString(),
      sources: ["Test source alpha", "Test source beta"],
    });
  });

  it("embeds only entries missing from the previous bundle", async () => {
    const marker = [7, 7, 7, 7, 7, 7, 7, 7];
    const previous: PreviousBundle = {
      entries: [repo("git-helper"), repo("weather-tool")],
      matrix: { model: FAKE_MODEL, dimensions: 8, vectors: [marker, [...marker].fill(3)] },
      info: {
        schema_version: "1.0",
        servers_count: 2,
        servers_hash: "previous-hash",
        embeddings_shape: [2, 8],
        model_name: FAKE_MODEL,
        build_timestamp: 1_700_000_000,
      },
    };
    const embedder = createFakeEmbedder();

    const result = await build(previous, embedder);

    expect(result).toMatchObject({ changed: true, reused: 2, embedded: 1 });
    expect(embedder.calls).toEqual([["file-browser. An example server. Category: community"]]);
    expect(readJson(join(outDir, "embeddings.json"))).toMatchObject({
      vectors: [[3, 3, 3, 3, 3, 3, 3, 3], marker, [0, 0, 0, 0, 1, 0, 1, 0]],
    });
  });

  it("re-embeds everything when the previous bundle used another model", async () => {
    const previous: PreviousBundle = {
      entries: [repo("git-helper")],
      matrix: { model: "older-model", dimensions: 8, vectors: [[1, 1, 1, 1, 1, 1, 1, 1]] },
      info: {
        schema_version: "1.0",
        servers_count: 1,
        embeddings_shape: [1, 8],
        model_name: "older-model",
        build_timestamp: 1_700_000_000,
      },
    };

    const result = await build(previous);

    expect(result).toMatchObject({ changed: true, reused: 0, embedded: 3 });
  });

  it("writes nothing when the entry set is unchanged", async () => {
    const entries = [repo("file-browser"), repo("git-helper"), repo("weather-tool")];
    const previous: PreviousBundle = {
      entries,
      matrix: { model: FAKE_MODEL, dimensions: 8, vectors: entries.map(() => Array<number>(8).fill(0)) },
      info: {
        schema_version: "1.0",
        servers_count: 3,
        servers_hash: computeEntriesHash(entries),
        embeddings_shape: [3, 8],
        model_name: FAKE_MODEL,
        build_timestamp: 1_700_000_000,
      },
    };
    const embedder = createFakeEmbedder();

    const result = await build(previous, embedder);

    expect(result).toEqual({
      changed: false,
      serversCount: 3,
      serversHash: computeEntriesHash(entries),
    });
    expect(embedder.calls).toEqual([]);
    expect(existsSync(outDir)).toBe(false);
  });

  it("refuses to publish when every source fails", async () => {
    mockHttp.onResponse("GET", sources[0].url, { status: 500, body: "" });
    mockHttp.onResponse("GET", sources[1].url, { status: 500, body: "" });

    await expect(build(null)).rejects.toThrow(
      "Every source failed; refusing to publish an empty bundle",
    );
  });
});
