export type { ServerListSource } from "./sources/serverListSource";
export type { Embedder, EmbedderLoader } from "./embeddings/embedder";
