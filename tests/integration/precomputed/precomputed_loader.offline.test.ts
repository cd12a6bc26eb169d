import { describe, it, expect, beforeEach } from "vitest";
import { PrecomputedDataLoader } from "@/precomputed";
import { createMockHttp } from "../../helpers/mockHttp";
import { BUNDLE_BASE_URL, mockBundle } from "../../helpers/bundle";
import { fakeMatrix, sampleEntries } from "../../helpers/fixtures";

const DOWNLOADED_AT = 1_760_000_000_000;

describe("Integration: precomputed data loader (offline)", () => {
  const mockHttp = createMockHttp();
  const loader = () =>
    new PrecomputedDataLoader({
      baseUrl: `${BUNDLE_BASE_URL}/`,
      httpRequest: mockHttp.request,
      now: () => DOWNLOADED_AT,
    });

  beforeEach(() => {
    mockHttp.reset();
  });

  it("loads an aligned, compatible bundle", async () => {
    mockBundle(mockHttp, sampleEntries());

    const result = await loader().load();

    expect(result.status).toBe("available");
    if (result.status !== "available") return;
    expect(result.catalog.entries).toEqual(sampleEntries());
    // stamped with the download time, not the bundle's build time
    expect(result.catalog.retrievedAt).toBe(DOWNLOADED_AT);
    expect(result.info.build_timestamp).toBe(1_750_000_000);
    expect(result.matrix).toEqual(fakeMatrix(sampleEntries()));
    expect(mockHttp.getRecordedRequests().every((req) => req.responseType === "json")).toBe(true);
  });

  it("stops after data_info when the schema is incompatible", async () => {
    mockBundle(mockHttp, sampleEntries(), { info: { schema_version: "2.0" } });

    const result = await loader().load();

    expect(result).toEqual({
      status: "unavailable",
      reason: "Schema 2.0 is not supported by this client (supported: 1.0)",
    });
    expect(mockHttp.getRecordedRequests().map((req) => req.url)).toEqual([
      `${BUNDLE_BASE_URL}/data_info.json`,
    ]);
  });

  it("rejects a matrix with fewer rows than entries", async () => {
    const entries = sampleEntries();
    mockBundle(mockHttp, entries, { vectors: fakeMatrix(entries.slice(1)).vectors.map((v) => [...v]) });

    const result = await loader().load();

    expect(result).toEqual({
      status: "unavailable",
      reason: "bundle invalid: Payload validation failed: embeddings.json has 3 rows, embeddings_shape says 4",
    });
  });

  it("rejects a servers count mismatch", async () => {
    mockBundle(mockHttp, sampleEntries(), { info: { servers_count: 5 } });

    const result = await loader().load();

    expect(result.status).toBe("unavailable");
    if (result.status !== "unavailable") return;
    expect(result.reason).toBe(
      "bundle invalid: Payload validation failed: servers.json has 4 entries, servers_count says 5",
    );
  });

  it("rejects entries sharing a url", async () => {
    const entries = sampleEntries();
    entries[3] = { ...entries[3], url: "https://github.com/Example/postgres/" };
    mockBundle(mockHttp, entries);

    const result = await loader().load();

    expect(result).toEqual({
      status: "unavailable",
      reason: "bundle invalid: Payload validation failed: servers.json has 1 duplicate urls",
    });
  });

  it("reports a missing release as unavailable", async () => {
    mockHttp.onResponse("GET", `${BUNDLE_BASE_URL}/data_info.json`, {
      status: 404,
      body: "Not Found",
    });

    const result = await loader().load();

    expect(result).toEqual({
      status: "unavailable",
      reason: `data_info unavailable: HTTP 404 Mock Response - ${BUNDLE_BASE_URL}/data_info.json - Not Found`,
    });
  });
});
