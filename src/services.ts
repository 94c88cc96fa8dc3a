import path from "node:path";
import { Chunker } from "./chunker";
import type { Config } from "./config";
import { TransformersEmbedder, type TextEmbedder } from "./embeddings";
import { TransformersGenerator, type AnswerGenerator } from "./generator";
import { IngestionPipeline } from "./ingestion";
import { Persistence } from "./persistence";
import { QueryPipeline } from "./query";
import { Retriever } from "./retriever";
import { statusManager, type StatusManager } from "./status";
import { MemoryVectorStore } from "./store/memory";
import { QdrantVectorStore } from "./store/qdrant";
import type { VectorStore } from "./store/types";
import { AnswerSynthesizer } from "./synthesizer";

/**
 * Everything the transports need, constructed once per process. The embedder
 * instance is shared by both pipelines.
 */
export interface Services {
  config: Config;
  embedder: TextEmbedder;
  generator?: AnswerGenerator;
  store: VectorStore;
  ingestion: IngestionPipeline;
  query: QueryPipeline;
  status: StatusManager;
}

/** Pre-built collaborators, mainly for tests. */
export interface ServiceOverrides {
  embedder?: TextEmbedder;
  store?: VectorStore;
  /** `null` forces the fallback-only synthesizer regardless of config. */
  generator?: AnswerGenerator | null;
  status?: StatusManager;
}

function createStore(config: Config, modelName: string): VectorStore {
  if (config.VECTOR_STORE === "memory") {
    const persistence = config.INDEX_STORE_PATH
      ? new Persistence(path.resolve(config.INDEX_STORE_PATH), config.VERBOSE)
      : undefined;
    return new MemoryVectorStore({ persistence, modelName });
  }
  return new QdrantVectorStore({
    url: config.QDRANT_URL,
    apiKey: config.QDRANT_API_KEY,
    timeoutMs: config.QDRANT_TIMEOUT_MS,
    verbose: config.VERBOSE,
  });
}

/** Wire the pipelines. Models are not loaded until {@link initServices}. */
export function createServices(config: Config, overrides: ServiceOverrides = {}): Services {
  const embedder = overrides.embedder ?? new TransformersEmbedder(config.EMBEDDING_MODEL, config.VERBOSE);
  const generator =
    overrides.generator === null
      ? undefined
      : (overrides.generator ??
        (config.GENERATOR_MODEL ? new TransformersGenerator(config.GENERATOR_MODEL) : undefined));
  const store = overrides.store ?? createStore(config, embedder.modelName);
  const status = overrides.status ?? statusManager;
  status.setModels(embedder.modelName, generator?.modelName);
  status.setStore(store.kind, config.COLLECTION_NAME);

  const ingestion = new IngestionPipeline({
    chunker: new Chunker({ chunkSize: config.CHUNK_SIZE, chunkOverlap: config.CHUNK_OVERLAP }),
    embedder,
    store,
    collection: config.COLLECTION_NAME,
    concurrency: config.INGEST_CONCURRENCY,
    retryAttempts: config.INGEST_RETRY_ATTEMPTS,
    status,
    verbose: config.VERBOSE,
  });
  const query = new QueryPipeline({
    embedder,
    retriever: new Retriever({
      store,
      collection: config.COLLECTION_NAME,
      topK: config.TOP_K,
      scoreThreshold: config.SCORE_THRESHOLD,
    }),
    synthesizer: new AnswerSynthesizer({ generator, verbose: config.VERBOSE }),
    timeoutMs: config.QUERY_TIMEOUT_MS,
    verbose: config.VERBOSE,
  });
  return { config, embedder, generator, store, ingestion, query, status };
}

/**
 * Load models eagerly so the first request is fast. A generator that fails to
 * load is only logged: answers then use the fallback path.
 */
export async function initServices(services: Services): Promise<void> {
  await services.embedder.init();
  if (services.generator) {
    try {
      await services.generator.init();
    } catch (e) {
      console.error(`[RAG] Generator unavailable, answers will use the fallback:`, e);
    }
  }
}
