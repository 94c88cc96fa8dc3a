import type { Chunker } from "./chunker";
import { KeyedMutex, mapPool } from "./concurrency";
import type { TextEmbedder } from "./embeddings";
import { AppError } from "./errors";
import type { StatusManager } from "./status";
import type { VectorStore } from "./store/types";
import type { BatchSummary, IndexedPoint, IngestResult, SourceDocument } from "./types";

export interface IngestionPipelineOptions {
  chunker: Chunker;
  embedder: TextEmbedder;
  store: VectorStore;
  collection: string;
  /** Documents processed at once by {@link IngestionPipeline.ingestMany} (default 2). */
  concurrency?: number;
  /** Extra whole-document attempts after a failure (default 0). */
  retryAttempts?: number;
  status?: StatusManager;
  verbose?: boolean;
}

/**
 * Chunk → embed → upsert for one document at a time.
 *
 * A document is indexed as a unit: all of its points are built in memory and
 * written with a single upsert, so a failure anywhere leaves nothing of that
 * document written by this attempt. Re-ingesting an id replaces its points.
 */
export class IngestionPipeline {
  private readonly chunker: Chunker;
  private readonly embedder: TextEmbedder;
  private readonly store: VectorStore;
  private readonly collection: string;
  private readonly concurrency: number;
  private readonly retryAttempts: number;
  private readonly status?: StatusManager;
  private readonly verbose: boolean;
  private readonly locks = new KeyedMutex();

  public constructor(opts: IngestionPipelineOptions) {
    this.chunker = opts.chunker;
    this.embedder = opts.embedder;
    this.store = opts.store;
    this.collection = opts.collection;
    this.concurrency = Math.max(1, opts.concurrency ?? 2);
    this.retryAttempts = Math.max(0, opts.retryAttempts ?? 0);
    this.status = opts.status;
    this.verbose = !!opts.verbose;
  }

  /** Ingest one document. Never throws; failures come back as `status: "failed"`. */
  public async ingest(doc: SourceDocument): Promise<IngestResult> {
    // Same-id ingestions are serialized so their upserts never interleave.
    const result = await this.locks.run(doc.id, () => this.ingestWithRetry(doc));
    this.status?.recordIngest(result);
    return result;
  }

  /**
   * Ingest several documents through a bounded pool. A failing document never
   * affects its siblings; results keep input order.
   */
  public async ingestMany(docs: readonly SourceDocument[]): Promise<BatchSummary> {
    const documents = await mapPool(docs, this.concurrency, (doc) => this.ingest(doc));
    return summarize(documents);
  }

  private async ingestWithRetry(doc: SourceDocument): Promise<IngestResult> {
    let result = await this.ingestOnce(doc);
    for (let attempt = 1; result.status === "failed" && attempt <= this.retryAttempts; attempt++) {
      console.error(`[RAG] Retrying ${doc.source} (attempt ${attempt + 1}/${this.retryAttempts + 1})`);
      result = await this.ingestOnce(doc);
    }
    return result;
  }

  private async ingestOnce(doc: SourceDocument): Promise<IngestResult> {
    const base = { documentId: doc.id, source: doc.source };
    const chunks = this.chunker.chunk(doc);
    if (chunks.length === 0) {
      console.error(`[RAG] Nothing to index in ${doc.source}`);
      return { ...base, chunks: 0, status: "empty" };
    }
    if (this.verbose) console.error(`[RAG][verbose] ${doc.source}: ${chunks.length} chunks`);

    try {
      const vectors = await this.embedder.embed(chunks.map((c) => c.text));
      if (vectors.length !== chunks.length) {
        throw new AppError(`Expected ${chunks.length} embeddings, got ${vectors.length}`);
      }
      const points: IndexedPoint[] = chunks.map((c, i) => ({
        id: c.id,
        vector: vectors[i],
        payload: {
          text: c.text,
          source: c.source,
          documentId: c.documentId,
          index: c.index,
          metadata: c.metadata,
        },
      }));
      await this.store.ensureCollection(this.collection, this.embedder.dimension);
      await this.store.upsert(this.collection, points);
    } catch (e) {
      console.error(`[RAG] Failed to index ${doc.source}:`, e);
      return { ...base, chunks: chunks.length, status: "failed", error: failureMessage(e) };
    }
    console.error(`[RAG] Indexed ${chunks.length} chunks from ${doc.source}`);
    return { ...base, chunks: chunks.length, status: "indexed" };
  }
}

function failureMessage(e: unknown): string {
  return e instanceof AppError ? e.message : "Unexpected error while indexing";
}

/** Collapse per-document outcomes into one batch status. */
export function summarize(documents: IngestResult[]): BatchSummary {
  const failed = documents.filter((d) => d.status === "failed").length;
  const chunks = documents.reduce((n, d) => (d.status === "indexed" ? n + d.chunks : n), 0);
  const status =
    failed === 0 ? "success" : failed === documents.length ? "failed" : "partial";
  return { status, chunks, failed, documents };
}
