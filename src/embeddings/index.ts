export { HttpEmbedder, EmbeddingResponseError, parseEmbeddingResponse } from "./httpEmbedder";
export type { HttpEmbedderConfig } from "./httpEmbedder";
export { createEmbedderLoader, memoizeLoader, EmbedderUnavailableError } from "./lazyEmbedder";
