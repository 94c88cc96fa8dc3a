import { createHash } from "node:crypto";
import { QdrantClient } from "@qdrant/js-client-rest";
import { StoreError, describeError } from "../errors";
import type { IndexedPoint, Metadata, PointPayload, ScoredChunk } from "../types";
import type { CollectionInfo, DistanceMetric, VectorStore } from "./types";

export interface QdrantVectorStoreOptions {
  url: string;
  apiKey?: string;
  /** Request timeout in milliseconds. */
  timeoutMs?: number;
  verbose?: boolean;
}

/**
 * Qdrant only accepts unsigned integers or UUIDs as point ids, so chunk ids
 * are mapped onto a name-based UUID (SHA-1, RFC 4122 variant bits). The same
 * chunk id always maps to the same point, which keeps upserts idempotent.
 */
export function pointIdFor(chunkId: string): string {
  const h = createHash("sha1").update(`docchat:${chunkId}`).digest();
  h[6] = (h[6] & 0x0f) | 0x50;
  h[8] = (h[8] & 0x3f) | 0x80;
  const hex = h.subarray(0, 16).toString("hex");
  return `${hex.slice(0, 8)}-${hex.slice(8, 12)}-${hex.slice(12, 16)}-${hex.slice(16, 20)}-${hex.slice(20)}`;
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function isNotFound(e: unknown): boolean {
  return isRecord(e) && e.status === 404;
}

/** Wire payload: snake_case like the rest of the collection schema. */
function toWirePayload(id: string, p: PointPayload): Record<string, unknown> {
  return {
    chunk_id: id,
    text: p.text,
    source: p.source,
    document_id: p.documentId,
    chunk_index: p.index,
    metadata: p.metadata,
  };
}

function fromWirePayload(
  raw: Record<string, unknown> | null | undefined,
): { id: string; payload: PointPayload } | null {
  if (!raw || typeof raw.text !== "string") return null;
  const metadata: Metadata = isRecord(raw.metadata) ? raw.metadata : {};
  const documentId = typeof raw.document_id === "string" ? raw.document_id : "";
  const index = typeof raw.chunk_index === "number" ? raw.chunk_index : 0;
  return {
    id: typeof raw.chunk_id === "string" ? raw.chunk_id : `${documentId}#${index}`,
    payload: {
      text: raw.text,
      source: typeof raw.source === "string" ? raw.source : "Unknown",
      documentId,
      index,
      metadata,
    },
  };
}

/** Vector store backed by a Qdrant server over its REST API. */
export class QdrantVectorStore implements VectorStore {
  public readonly kind = "qdrant";
  private readonly client: QdrantClient;
  private readonly verbose: boolean;
  /** Collections already verified in this process, by name. */
  private readonly ensured = new Map<string, Promise<number>>();

  public constructor(opts: QdrantVectorStoreOptions) {
    this.client = new QdrantClient({
      url: opts.url,
      apiKey: opts.apiKey,
      timeout: opts.timeoutMs ?? 30000,
    });
    this.verbose = !!opts.verbose;
    console.error(`[RAG] Using Qdrant at: ${opts.url}`);
  }

  public async ensureCollection(
    name: string,
    dimension: number,
    distance: DistanceMetric = "Cosine",
  ): Promise<void> {
    let pending = this.ensured.get(name);
    if (!pending) {
      pending = this.createIfMissing(name, dimension, distance);
      this.ensured.set(name, pending);
      // forget failures so the next caller retries
      void pending.catch(() => this.ensured.delete(name));
    }
    const actual = await pending;
    if (actual !== dimension) {
      throw new StoreError(`Collection ${name} has dimension ${actual}, expected ${dimension}`);
    }
  }

  private async createIfMissing(
    name: string,
    dimension: number,
    distance: DistanceMetric,
  ): Promise<number> {
    try {
      const { exists } = await this.client.collectionExists(name);
      if (!exists) {
        console.error(`[RAG] Creating collection: ${name} (size ${dimension}, ${distance})`);
        await this.client.createCollection(name, { vectors: { size: dimension, distance } });
        return dimension;
      }
      const info = await this.client.getCollection(name);
      const vectors = info.config.params.vectors;
      if (vectors && "size" in vectors && typeof vectors.size === "number") return vectors.size;
      throw new StoreError(`Collection ${name} does not use a single unnamed vector`);
    } catch (e) {
      if (e instanceof StoreError) throw e;
      throw new StoreError(`Could not ensure collection ${name}: ${describeError(e)}`, {
        cause: e,
      });
    }
  }

  public async upsert(collection: string, points: IndexedPoint[]): Promise<void> {
    if (points.length === 0) return;
    const dimension = points[0].vector.length;
    const bad = points.find((p) => p.vector.length !== dimension);
    if (bad) {
      throw new StoreError(`Point ${bad.id} has dimension ${bad.vector.length}, expected ${dimension}`);
    }
    try {
      const res = await this.client.upsert(collection, {
        wait: true,
        points: points.map((p) => ({
          id: pointIdFor(p.id),
          vector: p.vector,
          payload: toWirePayload(p.id, p.payload),
        })),
      });
      if (this.verbose) {
        console.error(`[RAG][verbose] Upserted ${points.length} points. Status: ${res.status}`);
      }
    } catch (e) {
      throw new StoreError(`Failed to store vectors: ${describeError(e)}`, { cause: e });
    }
  }

  public async search(
    collection: string,
    vector: number[],
    topK: number,
    scoreThreshold: number,
  ): Promise<ScoredChunk[]> {
    let hits: Awaited<ReturnType<QdrantClient["search"]>>;
    try {
      hits = await this.client.search(collection, {
        vector,
        limit: topK,
        score_threshold: scoreThreshold,
        with_payload: true,
      });
    } catch (e) {
      if (isNotFound(e)) return [];
      throw new StoreError(`Search failed: ${describeError(e)}`, { cause: e });
    }
    const out: ScoredChunk[] = [];
    for (const hit of hits) {
      const parsed = fromWirePayload(hit.payload);
      if (parsed) out.push({ id: parsed.id, score: hit.score, payload: parsed.payload });
    }
    if (this.verbose) console.error(`[RAG][verbose] Search returned ${out.length} results`);
    return out;
  }

  public async deleteCollection(name: string): Promise<void> {
    this.ensured.delete(name);
    try {
      await this.client.deleteCollection(name);
      console.error(`[RAG] Collection ${name} deleted`);
    } catch (e) {
      throw new StoreError(`Error clearing collection: ${describeError(e)}`, { cause: e });
    }
  }

  public async info(name: string): Promise<CollectionInfo> {
    try {
      const { exists } = await this.client.collectionExists(name);
      if (!exists) return { name, points: 0, status: "not_created" };
      const info = await this.client.getCollection(name);
      const vectors = info.config.params.vectors;
      const dimension =
        vectors && "size" in vectors && typeof vectors.size === "number" ? vectors.size : undefined;
      return { name, points: info.points_count ?? 0, status: String(info.status), dimension };
    } catch (e) {
      throw new StoreError(`Could not read collection ${name}: ${describeError(e)}`, { cause: e });
    }
  }
}
