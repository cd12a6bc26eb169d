/**
 * Unit tests for schema compatibility
 */

import { describe, it, expect } from "vitest";
import {
  checkCompatibility,
  describeCompatibility,
  parseSchemaVersion,
  validateDataInfo,
} from "@/schema";
import { PayloadValidationError } from "@/catalog";

const known = new Map([[1, [0, 1, 2]]]);

describe("parseSchemaVersion", () => {
  it("accepts major.minor and major.minor.patch", () => {
    expect(parseSchemaVersion("1.2")).toEqual({ major: 1, minor: 2 });
    expect(parseSchemaVersion("1.2.9")).toEqual({ major: 1, minor: 2 });
  });

  it("rejects other shapes", () => {
    expect(parseSchemaVersion("1")).toBeNull();
    expect(parseSchemaVersion("v1.0")).toBeNull();
    expect(parseSchemaVersion("1.0.0.0")).toBeNull();
  });
});

describe("checkCompatibility", () => {
  it("accepts known minors of a known major", () => {
    expect(checkCompatibility(known, "1.1")).toBe("compatible");
    expect(checkCompatibility(known, "1.0")).toBe("compatible");
  });

  it("rejects an unknown major", () => {
    expect(checkCompatibility(known, "2.0")).toBe("incompatible");
  });

  it("rejects a newer minor", () => {
    expect(checkCompatibility(known, "1.5")).toBe("incompatible");
  });

  it("rejects an unparseable version", () => {
    expect(checkCompatibility(known, "latest")).toBe("incompatible");
  });

  it("accepts a parsed version", () => {
    expect(checkCompatibility(known, { major: 1, minor: 2 })).toBe("compatible");
  });
});

describe("describeCompatibility", () => {
  it("lists supported versions", () => {
    expect(describeCompatibility("2.0", "incompatible", known)).toBe(
      "Schema 2.0 is not supported by this client (supported: 1.0, 1.1, 1.2)",
    );
  });
});

describe("validateDataInfo", () => {
  const valid = {
    servers_count: 2,
    embeddings_shape: [2, 8],
    model_name: "fake-model",
    build_timestamp: 1750000000,
  };

  it("defaults a missing schema_version to 1.0", () => {
    expect(validateDataInfo(valid)).toMatchObject({ schema_version: "1.0", servers_count: 2 });
  });

  it("names missing required fields", () => {
    expect(() => validateDataInfo({ servers_count: 1 })).toThrow(
      "data_info is missing embeddings_shape, model_name, build_timestamp",
    );
  });

  it("rejects a malformed embeddings_shape", () => {
    expect(() => validateDataInfo({ ...valid, embeddings_shape: [2] })).toThrow(
      PayloadValidationError,
    );
  });
});
