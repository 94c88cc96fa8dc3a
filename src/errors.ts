/**
 * Error taxonomy shared by the pipelines and both transports. Lower-level
 * exceptions are wrapped into one of these before they leave a component, so
 * callers only ever see a short message plus a status code.
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number = 500,
    public readonly code: string = "INTERNAL_ERROR",
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "AppError";
  }
}

/** Empty query, empty file, unsupported input shape. */
export class ValidationError extends AppError {
  constructor(message: string) {
    super(message, 400, "VALIDATION_ERROR");
    this.name = "ValidationError";
  }
}

/** A file could not be turned into plain text. */
export class ExtractionError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 422, "EXTRACTION_ERROR", options);
    this.name = "ExtractionError";
  }
}

/** Embedding model unavailable, timed out or returned something unusable. */
export class EmbeddingError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 502, "EMBEDDING_ERROR", options);
    this.name = "EmbeddingError";
  }
}

/** Vector database unreachable, rejected a write, or has a mismatched schema. */
export class StoreError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 502, "STORE_ERROR", options);
    this.name = "StoreError";
  }
}

/** Generative backend failure. Only ever logged; the synthesizer falls back. */
export class SynthesisError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 500, "SYNTHESIS_ERROR", options);
    this.name = "SynthesisError";
  }
}

export interface ErrorResponse {
  statusCode: number;
  code: string;
  detail: string;
}

/** Map any thrown value to a transport-neutral response. Unknown errors never leak their message. */
export function toErrorResponse(error: unknown): ErrorResponse {
  if (error instanceof AppError) {
    return { statusCode: error.statusCode, code: error.code, detail: error.message };
  }
  return {
    statusCode: 500,
    code: "INTERNAL_ERROR",
    detail: "Internal server error during processing.",
  };
}

/** Best-effort message extraction for logs and wrapped errors. */
export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
