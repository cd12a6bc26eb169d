/**
 * Validation of entries and matrices read from disk or the network
 *
 * Everything persisted or downloaded is untrusted: shapes are checked
 * before anything reaches the search engine.
 */

import type { EmbeddingMatrix, ServerEntry } from "@/types";
import { UNKNOWN_SOURCE } from "@/constants";

/**
 * Error thrown when a payload fails structural validation
 */
export class PayloadValidationError extends Error {
  constructor(message: string) {
    super(`Payload validation failed: ${message}`);
    this.name = "PayloadValidationError";
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function requireString(
  record: Record<string, unknown>,
  field: string,
  path: string,
): string {
  const value = record[field];
  if (typeof value !== "string") {
    throw new PayloadValidationError(`${path}.${field} must be a string, got ${typeof value}`);
  }
  return value;
}

/**
 * Parse one entry. A missing `source` (legacy payloads) becomes "unknown".
 *
 * @throws {PayloadValidationError} If a required field is missing or mistyped
 */
export function parseServerEntry(value: unknown, path: string): ServerEntry {
  if (!isRecord(value)) {
    throw new PayloadValidationError(`${path} must be an object`);
  }

  const url = requireString(value, "url", path);
  if (url.trim().length === 0) {
    throw new PayloadValidationError(`${path}.url cannot be empty`);
  }

  const source = value.source === undefined ? UNKNOWN_SOURCE : requireString(value, "source", path);

  return {
    name: requireString(value, "name", path),
    description: requireString(value, "description", path),
    url,
    category: requireString(value, "category", path),
    source,
  };
}

/**
 * Parse an array of entries; any malformed entry rejects the whole payload
 * because matrix rows are aligned by index.
 *
 * @throws {PayloadValidationError}
 */
export function parseServerEntries(value: unknown, path: string): ServerEntry[] {
  if (!Array.isArray(value)) {
    throw new PayloadValidationError(`${path} must be an array`);
  }
  return value.map((item, index) => parseServerEntry(item, `${path}[${index}]`));
}

/**
 * Parse a vector list and check every row has `dimensions` finite numbers
 *
 * @throws {PayloadValidationError}
 */
export function parseVectors(
  value: unknown,
  dimensions: number,
  path: string,
): number[][] {
  if (!Array.isArray(value)) {
    throw new PayloadValidationError(`${path} must be an array`);
  }
  return value.map((row, index) => {
    if (!Array.isArray(row) || row.length !== dimensions) {
      throw new PayloadValidationError(
        `${path}[${index}] must be an array of ${dimensions} numbers`,
      );
    }
    return row.map((cell) => {
      if (typeof cell !== "number" || !Number.isFinite(cell)) {
        throw new PayloadValidationError(`${path}[${index}] contains a non-finite value`);
      }
      return cell;
    });
  });
}

/**
 * Check the alignment invariant: one vector per entry
 */
export function isAligned(entryCount: number, matrix: EmbeddingMatrix): boolean {
  return matrix.vectors.length === entryCount;
}
