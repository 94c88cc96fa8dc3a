/** Arbitrary JSON-ish metadata carried from a document onto each of its chunks. */
export type Metadata = Record<string, unknown>;

/**
 * A named unit of source text: an uploaded file after extraction, or a block
 * of CMS content. `id` namespaces the chunk ids produced from it.
 */
export interface SourceDocument {
  /** Stable identifier (file name for uploads, caller id or source label for CMS). */
  readonly id: string;
  /** Human readable label surfaced in citations. */
  readonly source: string;
  /** Already extracted plain text. */
  readonly text: string;
  readonly metadata: Metadata;
}

/**
 * An ordered fragment of a {@link SourceDocument}.
 * `text` always equals `sourceText.slice(start, end)`.
 */
export interface Chunk {
  /** `<documentId>#<index>` */
  readonly id: string;
  readonly documentId: string;
  /** 0-based position within the document. */
  readonly index: number;
  readonly text: string;
  readonly start: number;
  readonly end: number;
  readonly source: string;
  readonly metadata: Metadata;
}

/** Payload persisted next to each vector. */
export interface PointPayload {
  text: string;
  source: string;
  documentId: string;
  index: number;
  metadata: Metadata;
}

/** The unit persisted in the vector store: one per chunk, keyed by chunk id. */
export interface IndexedPoint {
  readonly id: string;
  readonly vector: number[];
  readonly payload: PointPayload;
}

/** A search hit. `score` is the raw cosine similarity reported by the store. */
export interface ScoredChunk {
  readonly id: string;
  readonly score: number;
  readonly payload: PointPayload;
}

export interface Citation {
  /** Verbatim chunk text. */
  text: string;
  source: string;
  score: number;
}

/** How an answer was produced. */
export type AnswerMode = "generated" | "fallback" | "empty";

export interface Answer {
  answer: string;
  sources: Citation[];
  mode: AnswerMode;
}

export type IngestStatus = "indexed" | "empty" | "failed";

export interface IngestResult {
  documentId: string;
  source: string;
  chunks: number;
  status: IngestStatus;
  /** Short human readable reason when status is "failed". */
  error?: string;
}

export interface BatchSummary {
  status: "success" | "partial" | "failed";
  /** Total chunks indexed across successful documents. */
  chunks: number;
  failed: number;
  documents: IngestResult[];
}
