import { pipeline, FeatureExtractionPipeline } from "@xenova/transformers";
import { EmbeddingError, describeError } from "./errors";
import { l2normalize } from "./similarity";

/**
 * Anything able to turn text into unit-length vectors of a fixed dimension.
 * Ingestion and querying must share one instance so both sides live in the
 * same vector space.
 */
export interface TextEmbedder {
  /** Identifier of the underlying model; recorded next to persisted vectors. */
  readonly modelName: string;
  /** Vector length. Only meaningful after {@link init}. */
  readonly dimension: number;
  init(): Promise<void>;
  /** Embed a batch; output order and length match the input. All-or-nothing. */
  embed(texts: string[]): Promise<number[][]>;
  embedOne(text: string): Promise<number[]>;
}

/** Inputs past this many characters are cut before inference. */
export const MAX_EMBED_CHARS = 10000;

/**
 * Local sentence-embedding model run through @xenova/transformers
 * (mean pooling + normalization). The pipeline is loaded once and is
 * read-only afterwards.
 */
export class TransformersEmbedder implements TextEmbedder {
  public readonly modelName: string;
  private extractor: FeatureExtractionPipeline | null = null;
  private loading: Promise<void> | null = null;
  private dim = 0;
  private readonly verbose: boolean;

  public constructor(modelName: string, verbose = false) {
    this.modelName = modelName;
    this.verbose = verbose;
  }

  public get dimension(): number {
    return this.dim;
  }

  /** Load the model and probe its output dimension (idempotent). */
  public async init(): Promise<void> {
    if (this.extractor) return;
    this.loading ??= this.load();
    try {
      await this.loading;
    } catch (e) {
      this.loading = null;
      throw e;
    }
  }

  private async load(): Promise<void> {
    console.error(`[RAG] Loading embedding model: ${this.modelName}`);
    let extractor: FeatureExtractionPipeline;
    try {
      extractor = await pipeline("feature-extraction", this.modelName);
    } catch (e) {
      throw new EmbeddingError(`Failed to load embedding model ${this.modelName}`, { cause: e });
    }
    this.extractor = extractor;
    try {
      const [probe] = await this.embed(["dimension probe"]);
      this.dim = probe.length;
    } catch (e) {
      this.extractor = null;
      throw e;
    }
    console.error(`[RAG] Model ready: ${this.modelName} (dimension ${this.dim})`);
  }

  public async embedOne(text: string): Promise<number[]> {
    const [vector] = await this.embed([text]);
    return vector;
  }

  public async embed(texts: string[]): Promise<number[][]> {
    if (!this.extractor) throw new EmbeddingError("Embedder not initialized. Call init() first.");
    if (texts.length === 0) return [];
    const inputs = texts.map((text, i) => {
      if (!text.trim()) throw new EmbeddingError(`Text at position ${i} is empty`);
      if (text.length <= MAX_EMBED_CHARS) return text;
      if (this.verbose) {
        console.error(`[RAG][verbose] Text too long (${text.length} chars), truncating.`);
      }
      return text.slice(0, MAX_EMBED_CHARS);
    });

    let data: Float32Array;
    let dims: number[];
    try {
      const output = await this.extractor(inputs, { pooling: "mean", normalize: true });
      data = output.data as Float32Array;
      dims = output.dims;
    } catch (e) {
      throw new EmbeddingError(`Embedding failed: ${describeError(e)}`, { cause: e });
    }

    const width = dims[dims.length - 1];
    if (!width || data.length !== width * inputs.length) {
      throw new EmbeddingError(
        `Unexpected embedding output shape [${dims.join(", ")}] for ${inputs.length} inputs`,
      );
    }
    if (this.dim && width !== this.dim) {
      throw new EmbeddingError(`Embedding dimension changed from ${this.dim} to ${width}`);
    }
    const out: number[][] = [];
    for (let i = 0; i < inputs.length; i++) {
      out.push(l2normalize(data.subarray(i * width, (i + 1) * width)));
    }
    return out;
  }
}
