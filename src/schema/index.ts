export {
  parseSchemaVersion,
  checkCompatibility,
  describeCompatibility,
  validateDataInfo,
} from "./schemaVersions";
