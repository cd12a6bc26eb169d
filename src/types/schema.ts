/**
 * Schema version types
 */

export interface SchemaVersion {
  major: number;
  minor: number;
}

/**
 * Binary compatibility decision; there is no degraded mode
 */
export type Compatibility = "compatible" | "incompatible";

/**
 * Schema versions a client understands: major -> known minors
 */
export type KnownSchemaVersions = ReadonlyMap<number, readonly number[]>;

/**
 * Metadata document published next to the precomputed bundle (data_info.json)
 */
export interface DataInfo {
  schema_version: string;
  servers_count: number;
  embeddings_shape: [number, number];
  model_name: string;
  /** Epoch seconds */
  build_timestamp: number;
  servers_hash?: string;
  embeddings_version?: string;
  build_date?: string;
  sources?: string[];
}
