import { TimeoutError, withTimeout } from "./concurrency";
import type { TextEmbedder } from "./embeddings";
import { AppError, EmbeddingError, ValidationError, describeError } from "./errors";
import type { RetrieveParams, Retriever } from "./retriever";
import type { AnswerSynthesizer } from "./synthesizer";
import type { Answer, ScoredChunk } from "./types";

export interface QueryPipelineOptions {
  embedder: TextEmbedder;
  retriever: Retriever;
  synthesizer: AnswerSynthesizer;
  /** Overall budget for one query in milliseconds (default 30000). */
  timeoutMs?: number;
  verbose?: boolean;
}

/**
 * question → embed → retrieve → synthesize.
 *
 * Failures before retrieval (validation, embedding, store) surface as errors.
 * Once candidates exist the caller always gets an answer: running out of time
 * while waiting on the generator yields the extractive fallback instead.
 */
export class QueryPipeline {
  private readonly embedder: TextEmbedder;
  private readonly retriever: Retriever;
  private readonly synthesizer: AnswerSynthesizer;
  private readonly timeoutMs: number;
  private readonly verbose: boolean;

  public constructor(opts: QueryPipelineOptions) {
    this.embedder = opts.embedder;
    this.retriever = opts.retriever;
    this.synthesizer = opts.synthesizer;
    this.timeoutMs = Math.max(1, opts.timeoutMs ?? 30000);
    this.verbose = !!opts.verbose;
  }

  public async answerQuery(queryText: string, params: RetrieveParams = {}): Promise<Answer> {
    const query = queryText.trim();
    if (!query) throw new ValidationError("Query cannot be empty");
    const deadline = Date.now() + this.timeoutMs;
    const remaining = () => Math.max(0, deadline - Date.now());
    console.error(`[RAG] Chat query: ${query}`);

    let vector: number[];
    try {
      vector = await withTimeout(this.embedder.embedOne(query), remaining(), "Query embedding");
    } catch (e) {
      if (e instanceof AppError) throw e;
      throw new EmbeddingError(
        e instanceof TimeoutError ? e.message : `Query embedding failed: ${describeError(e)}`,
        { cause: e },
      );
    }

    let candidates: ScoredChunk[];
    try {
      candidates = await withTimeout(this.retriever.retrieve(vector, params), remaining(), "Search");
    } catch (e) {
      if (!(e instanceof TimeoutError)) throw e;
      console.error(`[RAG] ${e.message}; answering without candidates.`);
      return this.synthesizer.fallback([]);
    }
    if (this.verbose) console.error(`[RAG][verbose] ${candidates.length} candidates retrieved`);

    // Only the generator wait is cancelled here; the synthesizer degrades on abort.
    const signal = AbortSignal.timeout(Math.max(1, remaining()));
    return this.synthesizer.synthesize(query, candidates, { signal });
  }
}
