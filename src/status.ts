import { APP_VERSION } from "./config";
import type { IngestResult } from "./types";

/** Monotonic ingestion counters since process start. */
export interface IngestionStatus {
  documentsIndexed: number;
  /** Documents that produced no chunks (empty extracted text). */
  documentsEmpty: number;
  documentsFailed: number;
  chunksIndexed: number;
}

/**
 * Snapshot served by /health and the MCP `collection_info` tool.
 * `ready` flips once the embedder is loaded and any seed directory ingested.
 */
export interface ServerStatus {
  version: string;
  service: string;
  embeddingModel: string;
  /** Empty when answers come from the extractive fallback only. */
  generatorModel: string;
  vectorStore: string;
  collection: string;
  /** 'http' | 'stdio' | 'unknown' */
  transport: string;
  ready: boolean;
  startedAt: string;
  ingestion: IngestionStatus;
}

/** Owns the mutable status object; everything else only reads it. */
export class StatusManager {
  private readonly data: ServerStatus;

  public constructor(initial?: Partial<ServerStatus>) {
    this.data = {
      version: initial?.version ?? APP_VERSION,
      service: initial?.service ?? "document-chatbot",
      embeddingModel: initial?.embeddingModel ?? "",
      generatorModel: initial?.generatorModel ?? "",
      vectorStore: initial?.vectorStore ?? "",
      collection: initial?.collection ?? "",
      transport: initial?.transport ?? "unknown",
      ready: initial?.ready ?? false,
      startedAt: initial?.startedAt ?? new Date().toISOString(),
      ingestion: initial?.ingestion ?? {
        documentsIndexed: 0,
        documentsEmpty: 0,
        documentsFailed: 0,
        chunksIndexed: 0,
      },
    };
  }

  public markTransport(t: string) {
    this.data.transport = t;
  }

  public setModels(embeddingModel: string, generatorModel: string | undefined) {
    this.data.embeddingModel = embeddingModel;
    this.data.generatorModel = generatorModel ?? "";
  }

  public setStore(kind: string, collection: string) {
    this.data.vectorStore = kind;
    this.data.collection = collection;
  }

  /** Fold one document outcome into the counters. */
  public recordIngest(result: IngestResult) {
    const s = this.data.ingestion;
    if (result.status === "indexed") {
      s.documentsIndexed++;
      s.chunksIndexed += result.chunks;
    } else if (result.status === "empty") {
      s.documentsEmpty++;
    } else {
      s.documentsFailed++;
    }
  }

  public markReady() {
    this.data.ready = true;
  }

  /** Live reference (treat as read-only). */
  public getStatus(): ServerStatus {
    return this.data;
  }

  public toJSON() {
    return this.data;
  }
}

// Process-wide instance shared by the pipelines, transports and health checks.
export const statusManager = new StatusManager();
