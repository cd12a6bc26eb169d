export { cosineSimilarity, rankDescending } from "./cosine";
export { scoreEntry, lexicalSearch } from "./lexicalScorer";
export {
  SemanticSearchEngine,
  CatalogAlignmentError,
  EmbeddingModelMismatchError,
} from "./semanticEngine";
export type { SemanticSearchEngineOptions } from "./semanticEngine";
