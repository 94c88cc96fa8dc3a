import fs from "node:fs/promises";
import fsSync from "node:fs";
import path from "node:path";
import type { IndexedPoint, PointPayload } from "./types";

/** One collection as held by the in-process store. */
export interface CollectionSnapshot {
  dimension: number;
  /** Points in first-insertion order. */
  points: IndexedPoint[];
}

/**
 * Serialized form of the in-process vector store. Vectors are stored as
 * base64-encoded little-endian float32 to keep the file compact; `modelName`
 * guards against reloading vectors produced by a different embedding model.
 */
interface SnapshotFile {
  version: 2;
  meta: { modelName: string; savedAt: string; embEncoding: "f32-base64" };
  collections: Record<string, { dimension: number; points: SerializedPoint[] }>;
}

interface SerializedPoint {
  id: string;
  emb: string;
  payload: PointPayload;
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function toPayload(v: unknown): PointPayload | null {
  if (!isRecord(v)) return null;
  const { text, source, documentId, index, metadata } = v;
  if (
    typeof text !== "string" ||
    typeof source !== "string" ||
    typeof documentId !== "string" ||
    typeof index !== "number"
  )
    return null;
  return { text, source, documentId, index, metadata: isRecord(metadata) ? metadata : {} };
}

function encodeVector(v: number[]): string {
  const arr = Float32Array.from(v);
  return Buffer.from(arr.buffer, arr.byteOffset, arr.byteLength).toString("base64");
}

function decodeVector(s: string): number[] | null {
  const buf = Buffer.from(s, "base64");
  if (buf.byteLength === 0 || buf.byteLength % 4 !== 0) return null;
  // copy into an aligned buffer before viewing as float32
  const aligned = new Uint8Array(buf);
  return Array.from(new Float32Array(aligned.buffer));
}

/**
 * Load / save snapshots of the in-process vector store. A snapshot written
 * under another embedding model is ignored rather than mixed in.
 */
export class Persistence {
  private readonly storePath: string;
  private readonly verbose: boolean;

  public constructor(storePath: string, verbose = false) {
    this.storePath = storePath;
    this.verbose = verbose;
  }

  public getStorePath(): string {
    return this.storePath;
  }

  /** @returns The collections on disk, or null when absent, unreadable or incompatible. */
  public async load(modelName: string): Promise<Map<string, CollectionSnapshot> | null> {
    if (!fsSync.existsSync(this.storePath)) return null;
    let parsed: unknown;
    try {
      parsed = JSON.parse(await fs.readFile(this.storePath, "utf8"));
    } catch (e) {
      console.error(`[RAG] Failed to load store at ${this.storePath}:`, e);
      return null;
    }
    if (!isRecord(parsed) || !isRecord(parsed.collections)) return null;
    const meta = isRecord(parsed.meta) ? parsed.meta : {};
    if (typeof meta.modelName === "string" && meta.modelName !== modelName) {
      console.error(
        `[RAG] Stored index was built with ${meta.modelName}, current model is ${modelName}. Ignoring it.`,
      );
      return null;
    }

    const out = new Map<string, CollectionSnapshot>();
    let total = 0;
    for (const [name, raw] of Object.entries(parsed.collections)) {
      if (!isRecord(raw) || typeof raw.dimension !== "number" || !Array.isArray(raw.points)) continue;
      const points: IndexedPoint[] = [];
      for (const p of raw.points) {
        if (!isRecord(p) || typeof p.id !== "string" || typeof p.emb !== "string") continue;
        const vector = decodeVector(p.emb);
        const payload = toPayload(p.payload);
        if (!vector || !payload || vector.length !== raw.dimension) continue;
        points.push({ id: p.id, vector, payload });
      }
      out.set(name, { dimension: raw.dimension, points });
      total += points.length;
    }
    console.error(`[RAG] Loaded persisted index: ${total} points in ${out.size} collection(s).`);
    return out;
  }

  /** Write the full snapshot. Errors propagate so a failed write fails the mutation. */
  public async save(modelName: string, collections: Map<string, CollectionSnapshot>): Promise<void> {
    const out: SnapshotFile = {
      version: 2,
      meta: { modelName, savedAt: new Date().toISOString(), embEncoding: "f32-base64" },
      collections: {},
    };
    for (const [name, c] of collections) {
      out.collections[name] = {
        dimension: c.dimension,
        points: c.points.map((p) => ({ id: p.id, emb: encodeVector(p.vector), payload: p.payload })),
      };
    }
    await fs.mkdir(path.dirname(this.storePath), { recursive: true });
    // write-then-rename so a crash never leaves a truncated file behind
    const tmp = `${this.storePath}.tmp`;
    await fs.writeFile(tmp, JSON.stringify(out));
    await fs.rename(tmp, this.storePath);
    if (this.verbose) console.error(`[RAG][verbose] Persisted index to ${this.storePath}`);
  }
}
