import type { VectorStore } from "./store/types";
import type { ScoredChunk } from "./types";

export interface RetrieverOptions {
  store: VectorStore;
  collection: string;
  /** Default number of hits (default 5). */
  topK?: number;
  /** Default minimum similarity (default 0.3). */
  scoreThreshold?: number;
}

export interface RetrieveParams {
  topK?: number;
  scoreThreshold?: number;
  /** Only keep hits whose source label is in this list. */
  sources?: string[];
}

/**
 * Policy layer over {@link VectorStore.search}: applies the configured top-k
 * and threshold and any payload filtering. "No hits" is an empty array, never
 * an error.
 */
export class Retriever {
  private readonly store: VectorStore;
  private readonly collection: string;
  private readonly topK: number;
  private readonly scoreThreshold: number;

  public constructor(opts: RetrieverOptions) {
    this.store = opts.store;
    this.collection = opts.collection;
    this.topK = opts.topK ?? 5;
    this.scoreThreshold = opts.scoreThreshold ?? 0.3;
  }

  public async retrieve(queryVector: number[], params: RetrieveParams = {}): Promise<ScoredChunk[]> {
    const topK = Math.max(1, Math.min(50, params.topK ?? this.topK));
    const threshold = params.scoreThreshold ?? this.scoreThreshold;
    const sources = params.sources?.length ? new Set(params.sources) : null;
    // Over-fetch when filtering client-side so the filter does not starve top-k.
    const limit = sources ? topK * 4 : topK;
    const hits = await this.store.search(this.collection, queryVector, limit, threshold);
    const kept = sources ? hits.filter((h) => sources.has(h.payload.source)) : hits;
    return kept.slice(0, topK);
  }
}
