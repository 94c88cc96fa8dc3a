import type { IndexedPoint, ScoredChunk } from "../types";

export type DistanceMetric = "Cosine";

export interface CollectionInfo {
  name: string;
  points: number;
  /** "not_created" when the collection does not exist yet. */
  status: string;
  dimension?: number;
}

/**
 * Durable nearest-neighbour index. Implementations wrap every backend failure
 * in a StoreError and hold no cache of points beyond what the backend itself
 * stores.
 */
export interface VectorStore {
  /** Backend label shown in status output. */
  readonly kind: string;

  /**
   * Create the collection when missing. No-op when it exists with the same
   * dimension; throws StoreError when the dimension differs.
   */
  ensureCollection(name: string, dimension: number, distance?: DistanceMetric): Promise<void>;

  /**
   * Write (or replace by id) a batch of points. The batch is validated before
   * anything is written; the call either applies all points or throws.
   */
  upsert(collection: string, points: IndexedPoint[]): Promise<void>;

  /**
   * Up to `topK` points by descending similarity, excluding scores below
   * `scoreThreshold`. A missing collection yields an empty list.
   */
  search(
    collection: string,
    vector: number[],
    topK: number,
    scoreThreshold: number,
  ): Promise<ScoredChunk[]>;

  deleteCollection(name: string): Promise<void>;

  info(name: string): Promise<CollectionInfo>;
}
