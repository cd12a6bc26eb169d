#!/usr/bin/env tsx
/**
 * Build the precomputed bundle (servers.json, embeddings.json, data_info.json)
 *
 * Usage:
 *   MCP_SCOUT_EMBEDDINGS_URL=http://localhost:8080/v1/embeddings \
 *     npm run build-data -- [outDir] [--full]
 *
 * --full ignores the previously published bundle and embeds every entry.
 */

import "dotenv/config";
import { loadConfig } from "@/config";
import { HttpEmbedder } from "@/embeddings";
import { buildBundle, downloadPreviousBundle } from "@/publish";
import { getAllSources } from "@/sources";
import * as logger from "@/logger";

const DEFAULT_OUT_DIR = "dist-data";

async function main() {
  const args = process.argv.slice(2);
  const full = args.includes("--full");
  const outDir = args.find((arg) => !arg.startsWith("--")) ?? DEFAULT_OUT_DIR;

  const config = loadConfig();
  logger.setLogLevel(config.logLevel);

  const { url } = config.embeddings;
  if (!url) {
    logger.error("MCP_SCOUT_EMBEDDINGS_URL is required to build the bundle");
    process.exit(1);
  }

  const embedder = new HttpEmbedder({
    url,
    model: config.embeddings.model,
    dimensions: config.embeddings.dimensions,
    apiKey: config.embeddings.apiKey,
    timeoutMs: config.embeddings.timeoutMs,
  });

  const previous = full ? null : await downloadPreviousBundle(config.dataUrl);
  const result = await buildBundle({ sources: getAllSources(), embedder, outDir, previous });

  if (result.changed) {
    logger.info("Bundle built", {
      outDir,
      servers: result.serversCount,
      reused: result.reused,
      embedded: result.embedded,
    });
  } else {
    logger.info("Bundle unchanged; nothing written", { servers: result.serversCount });
  }
}

main().catch((error: unknown) => {
  logger.error("Bundle build failed", { error: logger.errorMessage(error) });
  process.exit(1);
});
