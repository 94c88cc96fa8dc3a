import type { TextEmbedder } from "./embeddings";
import { EmbeddingError } from "./errors";
import { abortable, type AnswerGenerator, type GenerateOptions } from "./generator";
import { l2normalize } from "./similarity";
import type { ScoredChunk } from "./types";

/**
 * Deterministic bag-of-words embedder for tests. Each new lower-cased token
 * gets the next slot, so texts sharing words get a positive cosine.
 */
export class VocabEmbedder implements TextEmbedder {
  public readonly modelName = "test-vocab";
  public readonly dimension: number;
  public calls = 0;
  private readonly vocab = new Map<string, number>();
  private failWhen?: (texts: string[]) => boolean;

  public constructor(dimension = 256) {
    this.dimension = dimension;
  }

  /** Make `embed` throw an EmbeddingError whenever `predicate` matches the batch. */
  public failOn(predicate: ((texts: string[]) => boolean) | undefined) {
    this.failWhen = predicate;
  }

  public async init(): Promise<void> {}

  public vectorFor(text: string): number[] {
    const v = new Array<number>(this.dimension).fill(0);
    for (const token of text.toLowerCase().match(/[a-z0-9]+/g) ?? []) {
      let slot = this.vocab.get(token);
      if (slot === undefined) {
        slot = this.vocab.size % this.dimension;
        this.vocab.set(token, slot);
      }
      v[slot] += 1;
    }
    return l2normalize(v);
  }

  public async embed(texts: string[]): Promise<number[][]> {
    this.calls++;
    if (this.failWhen?.(texts)) throw new EmbeddingError("Embedding failed: test failure");
    return texts.map((t) => this.vectorFor(t));
  }

  public async embedOne(text: string): Promise<number[]> {
    const [v] = await this.embed([text]);
    return v;
  }
}

/** Generator returning a fixed reply, or one that never settles unless aborted. */
export class StubGenerator implements AnswerGenerator {
  public readonly modelName = "test-generator";
  public prompts: string[] = [];

  public constructor(private readonly reply: string | Error | "hang") {}

  public async init(): Promise<void> {}

  public async generate(prompt: string, opts: GenerateOptions = {}): Promise<string> {
    this.prompts.push(prompt);
    if (this.reply === "hang") return abortable(new Promise<string>(() => undefined), opts.signal);
    if (this.reply instanceof Error) throw this.reply;
    return this.reply;
  }
}

export function scored(id: string, score: number, text = `text of ${id}`, source = "doc.txt"): ScoredChunk {
  return {
    id,
    score,
    payload: { text, source, documentId: id.split("#")[0], index: 0, metadata: {} },
  };
}
