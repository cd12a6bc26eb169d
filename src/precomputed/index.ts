export { PrecomputedDataLoader, parseEmbeddingsPayload } from "./precomputedLoader";
export type { PrecomputedDataLoaderConfig } from "./precomputedLoader";
