import dotenv from "dotenv";
import fsSync from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import pkg from "../package.json";

// Centralized single dotenv.config() call.
// Prefer the project-root .env (resolved relative to this file), otherwise the default cwd lookup.
(() => {
  try {
    const __filename = fileURLToPath(import.meta.url);
    const __dirname = path.dirname(__filename);
    const rootEnv = path.resolve(__dirname, "../.env");
    if (fsSync.existsSync(rootEnv)) {
      dotenv.config({ path: rootEnv });
      return;
    }
  } catch (e) {
    console.error("[RAG] Could not resolve project .env, using default lookup:", e);
  }
  dotenv.config();
})();

/** Application version sourced from package.json. */
export const APP_VERSION: string = pkg.version;

export type TransportMode = "http" | "stdio";
export type VectorStoreKind = "qdrant" | "memory";

export interface Config {
  TRANSPORT: TransportMode;
  HOST: string;
  PORT: number;
  VECTOR_STORE: VectorStoreKind;
  QDRANT_URL: string;
  QDRANT_API_KEY: string | undefined;
  QDRANT_TIMEOUT_MS: number;
  COLLECTION_NAME: string;
  INDEX_STORE_PATH: string | undefined;
  EMBEDDING_MODEL: string;
  /** undefined disables the generative path; answers then come from the extractive fallback. */
  GENERATOR_MODEL: string | undefined;
  CHUNK_SIZE: number;
  CHUNK_OVERLAP: number;
  TOP_K: number;
  SCORE_THRESHOLD: number;
  QUERY_TIMEOUT_MS: number;
  INGEST_CONCURRENCY: number;
  /** Extra whole-document attempts after a failed ingestion. 0 leaves re-upload to the user. */
  INGEST_RETRY_ATTEMPTS: number;
  SEED_DIR: string | undefined;
  MAX_UPLOAD_MB: number;
  /** Model download directory. */
  TRANSFORMERS_CACHE: string | undefined;
  VERBOSE: boolean;
}

type Env = Record<string, string | undefined>;

export const DEFAULT_EMBEDDING_MODEL = "Xenova/all-MiniLM-L6-v2";
export const DEFAULT_GENERATOR_MODEL = "Xenova/flan-t5-base";

/** Tolerant truthy parsing (1/true/yes/on). */
export function parseBool(raw: string | undefined, fallback = false): boolean {
  const v = (raw ?? "").trim().toLowerCase();
  if (!v) return fallback;
  return v === "1" || v === "true" || v === "yes" || v === "on";
}

/** Parse an integer and clamp it into [min, max]; anything unparsable yields the fallback. */
export function parseInteger(
  raw: string | undefined,
  fallback: number,
  min: number,
  max: number,
): number {
  const v = raw?.trim();
  if (!v) return fallback;
  const n = Number(v);
  if (!Number.isFinite(n)) return fallback;
  return Math.min(max, Math.max(min, Math.floor(n)));
}

function parseFloatIn(raw: string | undefined, fallback: number, min: number, max: number): number {
  const v = raw?.trim();
  if (!v) return fallback;
  const n = Number(v);
  return Number.isFinite(n) ? Math.min(max, Math.max(min, n)) : fallback;
}

function optional(raw: string | undefined): string | undefined {
  return raw?.trim() || undefined;
}

/**
 * Read the runtime configuration from the environment. Pure apart from reading
 * `env`, so tests can pass their own map.
 */
export function getConfig(env: Env = process.env): Config {
  const transportRaw = (env.TRANSPORT ?? "").trim().toLowerCase();
  const TRANSPORT: TransportMode = transportRaw === "stdio" ? "stdio" : "http";

  const storeRaw = (env.VECTOR_STORE ?? "").trim().toLowerCase();
  const VECTOR_STORE: VectorStoreKind = storeRaw === "memory" ? "memory" : "qdrant";

  // "none" / "off" / "false" switch generation off entirely.
  const generatorRaw = env.GENERATOR_MODEL?.trim();
  const GENERATOR_MODEL =
    generatorRaw === undefined
      ? DEFAULT_GENERATOR_MODEL
      : ["", "none", "off", "false"].includes(generatorRaw.toLowerCase())
        ? undefined
        : generatorRaw;

  // Chunk size impacts recall (too large) vs. precision (too small).
  const CHUNK_SIZE = parseInteger(env.CHUNK_SIZE, 800, 50, 8000);
  const CHUNK_OVERLAP = parseInteger(env.CHUNK_OVERLAP, 100, 0, 4000);

  return {
    TRANSPORT,
    HOST: env.HOST?.trim() || "127.0.0.1",
    PORT: parseInteger(env.PORT, 8000, 0, 65535),
    VECTOR_STORE,
    QDRANT_URL: env.QDRANT_URL?.trim() || "http://localhost:6333",
    QDRANT_API_KEY: optional(env.QDRANT_API_KEY),
    QDRANT_TIMEOUT_MS: parseInteger(env.QDRANT_TIMEOUT_MS, 30000, 1000, 600000),
    COLLECTION_NAME: env.COLLECTION_NAME?.trim() || "documents",
    INDEX_STORE_PATH: optional(env.INDEX_STORE_PATH),
    EMBEDDING_MODEL: env.EMBEDDING_MODEL?.trim() || DEFAULT_EMBEDDING_MODEL,
    GENERATOR_MODEL,
    CHUNK_SIZE,
    CHUNK_OVERLAP,
    TOP_K: parseInteger(env.TOP_K, 5, 1, 50),
    SCORE_THRESHOLD: parseFloatIn(env.SCORE_THRESHOLD, 0.3, -1, 1),
    QUERY_TIMEOUT_MS: parseInteger(env.QUERY_TIMEOUT_MS, 30000, 100, 600000),
    INGEST_CONCURRENCY: parseInteger(env.INGEST_CONCURRENCY, 2, 1, 32),
    INGEST_RETRY_ATTEMPTS: parseInteger(env.INGEST_RETRY_ATTEMPTS, 0, 0, 5),
    SEED_DIR: optional(env.SEED_DIR),
    MAX_UPLOAD_MB: parseInteger(env.MAX_UPLOAD_MB, 20, 1, 512),
    TRANSFORMERS_CACHE: optional(env.TRANSFORMERS_CACHE),
    VERBOSE: parseBool(env.VERBOSE),
  };
}
