/**
 * Schema compatibility checker
 *
 * Decides whether this build can read a catalog or bundle written under a
 * given schema version. The decision is binary; there is no partial mode.
 */

import type { Compatibility, DataInfo, KnownSchemaVersions, SchemaVersion } from "@/types";
import {
  KNOWN_SCHEMA_VERSIONS,
  LEGACY_SCHEMA_VERSION,
  REQUIRED_DATA_INFO_FIELDS,
} from "@/constants";
import { isRecord, PayloadValidationError } from "@/catalog";

const VERSION_PATTERN = /^(\d+)\.(\d+)(?:\.(\d+))?$/;

/**
 * Parse "major.minor" or "major.minor.patch" (patch ignored)
 *
 * @returns null for any other shape
 */
export function parseSchemaVersion(value: string): SchemaVersion | null {
  const match = VERSION_PATTERN.exec(value.trim());
  if (!match) {
    return null;
  }
  return { major: Number(match[1]), minor: Number(match[2]) };
}

/**
 * Data at (M, m) is compatible iff M is a known major and m is not newer than
 * the newest minor known for M. Older minors are readable; newer minors and
 * unknown majors are not.
 *
 * @example
 * checkCompatibility(new Map([[1, [0, 1, 2]]]), "1.1") // "compatible"
 * checkCompatibility(new Map([[1, [0, 1, 2]]]), "1.5") // "incompatible"
 */
export function checkCompatibility(
  known: KnownSchemaVersions,
  dataVersion: string | SchemaVersion,
): Compatibility {
  const version =
    typeof dataVersion === "string" ? parseSchemaVersion(dataVersion) : dataVersion;
  if (!version) {
    return "incompatible";
  }

  const minors = known.get(version.major);
  if (!minors || minors.length === 0) {
    return "incompatible";
  }

  return version.minor <= Math.max(...minors) ? "compatible" : "incompatible";
}

/**
 * One-line log message for a compatibility decision
 */
export function describeCompatibility(
  dataVersion: string,
  compatibility: Compatibility,
  known: KnownSchemaVersions = KNOWN_SCHEMA_VERSIONS,
): string {
  const supported = Array.from(known.entries())
    .map(([major, minors]) => minors.map((minor) => `${major}.${minor}`).join(", "))
    .join(", ");
  return compatibility === "compatible"
    ? `Schema ${dataVersion} is compatible (supported: ${supported})`
    : `Schema ${dataVersion} is not supported by this client (supported: ${supported})`;
}

function isNonNegativeInteger(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value >= 0;
}

function optionalString(record: Record<string, unknown>, field: string): string | undefined {
  const value = record[field];
  return typeof value === "string" ? value : undefined;
}

/**
 * Validate a data_info.json document.
 *
 * A missing schema_version means a legacy bundle and is read as "1.0".
 *
 * @throws {PayloadValidationError} On a missing or mistyped required field
 */
export function validateDataInfo(value: unknown): DataInfo {
  if (!isRecord(value)) {
    throw new PayloadValidationError("data_info must be an object");
  }

  const missing = REQUIRED_DATA_INFO_FIELDS.filter((field) => value[field] === undefined);
  if (missing.length > 0) {
    throw new PayloadValidationError(`data_info is missing ${missing.join(", ")}`);
  }

  const { servers_count, embeddings_shape, model_name, build_timestamp } = value;

  if (!isNonNegativeInteger(servers_count)) {
    throw new PayloadValidationError("data_info.servers_count must be a non-negative integer");
  }
  if (
    !Array.isArray(embeddings_shape) ||
    embeddings_shape.length !== 2 ||
    !isNonNegativeInteger(embeddings_shape[0]) ||
    !isNonNegativeInteger(embeddings_shape[1])
  ) {
    throw new PayloadValidationError("data_info.embeddings_shape must be [rows, dimensions]");
  }
  if (typeof model_name !== "string" || model_name.length === 0) {
    throw new PayloadValidationError("data_info.model_name must be a non-empty string");
  }
  if (typeof build_timestamp !== "number" || !Number.isFinite(build_timestamp)) {
    throw new PayloadValidationError("data_info.build_timestamp must be a number");
  }

  const schemaVersion =
    value.schema_version === undefined ? LEGACY_SCHEMA_VERSION : value.schema_version;
  if (typeof schemaVersion !== "string") {
    throw new PayloadValidationError("data_info.schema_version must be a string");
  }

  const sources = Array.isArray(value.sources)
    ? value.sources.filter((item: unknown): item is string => typeof item === "string")
    : undefined;

  return {
    schema_version: schemaVersion,
    servers_count,
    embeddings_shape: [embeddings_shape[0], embeddings_shape[1]],
    model_name,
    build_timestamp,
    servers_hash: optionalString(value, "servers_hash"),
    embeddings_version: optionalString(value, "embeddings_version"),
    build_date: optionalString(value, "build_date"),
    sources,
  };
}
