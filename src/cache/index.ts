export { resolveCacheRoot } from "./cacheDir";
export type { CacheRootOptions } from "./cacheDir";
export { CatalogCache } from "./catalogCache";
export type { CatalogCacheOptions, CatalogLoadOptions } from "./catalogCache";
export { EmbeddingCache } from "./embeddingCache";
export type { EmbeddingCacheOptions } from "./embeddingCache";
