/**
 * Schema version constants
 */

import type { KnownSchemaVersions } from "@/types";

/**
 * Version written into caches and bundles by this build
 */
export const CURRENT_SCHEMA_VERSION = "1.0";

/**
 * Versions this build can read: major -> known minors
 */
export const KNOWN_SCHEMA_VERSIONS: KnownSchemaVersions = new Map([[1, [0]]]);

/**
 * Assumed for bundles published before data_info carried a schema_version
 */
export const LEGACY_SCHEMA_VERSION = "1.0";

/**
 * Fields every data_info.json must carry
 */
export const REQUIRED_DATA_INFO_FIELDS = [
  "servers_count",
  "embeddings_shape",
  "model_name",
  "build_timestamp",
] as const;
