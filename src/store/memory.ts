import { cosine } from "../similarity";
import { StoreError } from "../errors";
import type { CollectionSnapshot, Persistence } from "../persistence";
import type { IndexedPoint, ScoredChunk } from "../types";
import type { CollectionInfo, DistanceMetric, VectorStore } from "./types";

interface MemoryCollection {
  dimension: number;
  readonly points: Map<string, IndexedPoint>;
}

export interface MemoryVectorStoreOptions {
  /** Optional on-disk snapshot; written after every mutation. */
  persistence?: Persistence;
  /** Model identity recorded in (and checked against) the snapshot. */
  modelName?: string;
}

/**
 * In-process vector store with a linear cosine scan. Points live in a Map so
 * replacing an id keeps its original insertion slot, which is also the tie
 * break between equal scores.
 */
export class MemoryVectorStore implements VectorStore {
  public readonly kind = "memory";
  private readonly collections = new Map<string, MemoryCollection>();
  private readonly persistence?: Persistence;
  private readonly modelName: string;
  private loading?: Promise<void>;
  private writeChain: Promise<void> = Promise.resolve();

  public constructor(opts: MemoryVectorStoreOptions = {}) {
    this.persistence = opts.persistence;
    this.modelName = opts.modelName ?? "";
  }

  /** Hydrate from the snapshot, if one is configured and compatible. */
  public load(): Promise<void> {
    this.loading ??= this.hydrate();
    return this.loading;
  }

  private async hydrate(): Promise<void> {
    if (!this.persistence) return;
    const snap = await this.persistence.load(this.modelName);
    if (!snap) return;
    for (const [name, c] of snap) {
      this.collections.set(name, {
        dimension: c.dimension,
        points: new Map(c.points.map((p) => [p.id, p])),
      });
    }
  }

  public async ensureCollection(
    name: string,
    dimension: number,
    _distance: DistanceMetric = "Cosine",
  ): Promise<void> {
    await this.load();
    const existing = this.collections.get(name);
    if (existing) {
      if (existing.dimension !== dimension) {
        throw new StoreError(
          `Collection ${name} has dimension ${existing.dimension}, expected ${dimension}`,
        );
      }
      return;
    }
    this.collections.set(name, { dimension, points: new Map() });
    await this.persist();
  }

  public async upsert(collection: string, points: IndexedPoint[]): Promise<void> {
    await this.load();
    const c = this.collections.get(collection);
    if (!c) throw new StoreError(`Collection ${collection} does not exist`);
    // validate the whole batch before touching the map
    for (const p of points) {
      if (p.vector.length !== c.dimension) {
        throw new StoreError(
          `Point ${p.id} has dimension ${p.vector.length}, collection ${collection} expects ${c.dimension}`,
        );
      }
    }
    const replaced = new Map<string, IndexedPoint | undefined>();
    for (const p of points) {
      if (!replaced.has(p.id)) replaced.set(p.id, c.points.get(p.id));
      c.points.set(p.id, p);
    }
    const written = new Map(points.map((p) => [p.id, p]));
    try {
      await this.persist();
    } catch (e) {
      // Undo only this call's writes; a concurrent upsert may own the rest.
      for (const [id, before] of replaced) {
        if (c.points.get(id) !== written.get(id)) continue;
        if (before) c.points.set(id, before);
        else c.points.delete(id);
      }
      throw e;
    }
  }

  public async search(
    collection: string,
    vector: number[],
    topK: number,
    scoreThreshold: number,
  ): Promise<ScoredChunk[]> {
    await this.load();
    const c = this.collections.get(collection);
    if (!c) return [];
    if (vector.length !== c.dimension) {
      throw new StoreError(
        `Query vector has dimension ${vector.length}, collection ${collection} expects ${c.dimension}`,
      );
    }
    const scored: ScoredChunk[] = [];
    for (const p of c.points.values()) {
      const score = cosine(p.vector, vector);
      if (score >= scoreThreshold) scored.push({ id: p.id, score, payload: p.payload });
    }
    // Array.prototype.sort is stable: equal scores keep insertion order.
    scored.sort((a, b) => b.score - a.score);
    return scored.slice(0, Math.max(0, topK));
  }

  public async deleteCollection(name: string): Promise<void> {
    await this.load();
    if (!this.collections.delete(name)) return;
    await this.persist();
  }

  public async info(name: string): Promise<CollectionInfo> {
    await this.load();
    const c = this.collections.get(name);
    if (!c) return { name, points: 0, status: "not_created" };
    return { name, points: c.points.size, status: "green", dimension: c.dimension };
  }

  /** Snapshot writes are chained so two mutations never write the file at once. */
  private persist(): Promise<void> {
    const run = this.writeChain.then(() => this.writeSnapshot());
    this.writeChain = run.catch(() => undefined);
    return run;
  }

  private async writeSnapshot(): Promise<void> {
    if (!this.persistence) return;
    const snap = new Map<string, CollectionSnapshot>();
    for (const [name, c] of this.collections) {
      snap.set(name, { dimension: c.dimension, points: Array.from(c.points.values()) });
    }
    try {
      await this.persistence.save(this.modelName, snap);
    } catch (e) {
      throw new StoreError(`Failed to persist index to ${this.persistence.getStorePath()}`, {
        cause: e,
      });
    }
  }
}
