export {
  normalizeUrlKey,
  deduplicateEntries,
  createCatalog,
  buildCatalog,
} from "./aggregate";
export { computeContentHash, computeEntryHash, computeEntriesHash } from "./contentHash";
export { entryEmbeddingText } from "./entryText";
export {
  PayloadValidationError,
  isRecord,
  parseServerEntry,
  parseServerEntries,
  parseVectors,
  isAligned,
} from "./entryValidation";
