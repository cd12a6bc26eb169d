import "dotenv/config";
import { loadConfig } from "@/config";
import { CatalogCache, EmbeddingCache } from "@/cache";
import { PrecomputedDataLoader } from "@/precomputed";
import { createEmbedderLoader } from "@/embeddings";
import { ServerDatabase } from "@/database";
import { getAllSources } from "@/sources";
import { createReadmeFetcher } from "@/tool";
import { createScoutServer, startStdioServer } from "@/server";
import * as logger from "@/logger";

async function main() {
  const config = loadConfig();
  logger.setLogLevel(config.logLevel);
  logger.info("Starting mcp-scout...", { cacheRoot: config.cacheRoot });
  logger.debug("Debug mode enabled");

  const database = await ServerDatabase.create({
    sources: getAllSources(),
    catalogCache: new CatalogCache({ root: config.cacheRoot, ttlMs: config.catalogTtlMs }),
    embeddingCache: new EmbeddingCache({ root: config.cacheRoot }),
    precomputed: config.skipPrecomputed
      ? null
      : new PrecomputedDataLoader({ baseUrl: config.dataUrl }),
    loadEmbedder: createEmbedderLoader(config.embeddings),
    embeddingModel: config.embeddings.model,
    embeddingDimensions: config.embeddings.dimensions,
  });

  const server = createScoutServer({ database, fetchReadme: createReadmeFetcher() });
  await startStdioServer(server);
}

main().catch((error: unknown) => {
  logger.error("Fatal error", {
    error: logger.errorMessage(error),
    stack: error instanceof Error ? error.stack : undefined,
  });
  process.exit(1);
});
