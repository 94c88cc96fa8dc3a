/**
 * Application entry point.
 *
 * High-level flow:
 * 1. Load environment configuration (.env at project root, then process env).
 * 2. Point the transformers model cache at a local directory.
 * 3. Construct the shared services once (embedder, vector store, generator,
 *    ingestion + query pipelines) and load the models eagerly.
 * 4. Optionally seed the index from SEED_DIR.
 * 5. Serve either the REST API (TRANSPORT=http, default) or MCP tools over
 *    stdio (TRANSPORT=stdio).
 *
 * ENVIRONMENT VARIABLES (all optional):
 *  - TRANSPORT              'http' (default) or 'stdio'.
 *  - HOST / PORT            HTTP bind address (default 127.0.0.1:8000).
 *  - VECTOR_STORE           'qdrant' (default) or 'memory'.
 *  - QDRANT_URL             Default http://localhost:6333.
 *  - QDRANT_API_KEY         Sent when set.
 *  - QDRANT_TIMEOUT_MS      Request timeout (default 30000).
 *  - COLLECTION_NAME        Default 'documents'.
 *  - INDEX_STORE_PATH       JSON snapshot for VECTOR_STORE=memory.
 *  - EMBEDDING_MODEL        Default Xenova/all-MiniLM-L6-v2.
 *  - GENERATOR_MODEL        Default Xenova/flan-t5-base; 'none' for extractive answers only.
 *  - CHUNK_SIZE / CHUNK_OVERLAP   Default 800 / 100 characters.
 *  - TOP_K / SCORE_THRESHOLD      Default 5 / 0.3.
 *  - QUERY_TIMEOUT_MS       Overall budget per question (default 30000).
 *  - INGEST_CONCURRENCY     Documents ingested at once in a batch (default 2).
 *  - INGEST_RETRY_ATTEMPTS  Whole-document retries after a failure (default 0).
 *  - SEED_DIR               Directory indexed at start-up.
 *  - MAX_UPLOAD_MB          Per-file upload limit (default 20).
 *  - VERBOSE                '1'/'true'/... for extra logging.
 *  - TRANSFORMERS_CACHE     Model download directory.
 */
import { configureTransformersCache } from "./cache";
import { getConfig } from "./config";
import { DirectoryIndexer } from "./indexer";
import { createServices, initServices } from "./services";
import { startHttpTransport } from "./transport/http";
import { startStdioTransport } from "./transport/stdio";

const config = getConfig();

await configureTransformersCache(config.TRANSFORMERS_CACHE);

const services = createServices(config);
await initServices(services);

if (config.SEED_DIR) {
  const indexer = new DirectoryIndexer({
    root: config.SEED_DIR,
    pipeline: services.ingestion,
    verbose: config.VERBOSE,
  });
  await indexer.build();
}
services.status.markReady();

if (config.TRANSPORT === "stdio") {
  services.status.markTransport("stdio");
  await startStdioTransport(services);
} else {
  services.status.markTransport("http");
  await startHttpTransport(services);
}
