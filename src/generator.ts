import { pipeline, Text2TextGenerationPipeline } from "@xenova/transformers";
import { SynthesisError, describeError } from "./errors";

export interface GenerateOptions {
  /** Aborting stops waiting for the result; the model run itself is not interrupted. */
  signal?: AbortSignal;
}

/** A generative backend that turns a grounded prompt into answer text. */
export interface AnswerGenerator {
  readonly modelName: string;
  init(): Promise<void>;
  generate(prompt: string, opts?: GenerateOptions): Promise<string>;
}

/** Reject as soon as `signal` aborts, otherwise settle with `work`. */
export function abortable<T>(work: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return work;
  if (signal.aborted) return Promise.reject(signal.reason);
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    signal.addEventListener("abort", onAbort, { once: true });
    work.then(
      (v) => {
        signal.removeEventListener("abort", onAbort);
        resolve(v);
      },
      (e: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(e);
      },
    );
  });
}

function generatedText(output: unknown): string {
  const first = Array.isArray(output) ? output[0] : output;
  if (typeof first === "object" && first !== null && "generated_text" in first) {
    const text = first.generated_text;
    if (typeof text === "string") return text;
  }
  if (typeof first === "string") return first;
  throw new SynthesisError("Generator returned no text");
}

/**
 * Local seq2seq model (flan-t5 family) through @xenova/transformers' text2text
 * pipeline. Loaded lazily on first use unless {@link init} is called at start-up.
 */
export class TransformersGenerator implements AnswerGenerator {
  public readonly modelName: string;
  private generator: Text2TextGenerationPipeline | null = null;
  private loading: Promise<Text2TextGenerationPipeline> | null = null;

  public constructor(modelName: string) {
    this.modelName = modelName;
  }

  public async init(): Promise<void> {
    await this.load();
  }

  private async load(): Promise<Text2TextGenerationPipeline> {
    if (this.generator) return this.generator;
    if (!this.loading) {
      console.error(`[RAG] Loading generator model: ${this.modelName}`);
      this.loading = pipeline("text2text-generation", this.modelName);
    }
    try {
      this.generator = await this.loading;
      console.error(`[RAG] Generator ready: ${this.modelName}`);
      return this.generator;
    } catch (e) {
      this.loading = null;
      throw new SynthesisError(`Failed to load generator ${this.modelName}: ${describeError(e)}`, {
        cause: e,
      });
    }
  }

  public async generate(prompt: string, opts: GenerateOptions = {}): Promise<string> {
    const generator = await abortable(this.load(), opts.signal);
    const output: unknown = await abortable(
      generator(prompt, {
        max_new_tokens: 200,
        do_sample: true,
        temperature: 0.3,
        repetition_penalty: 1.2,
      }),
      opts.signal,
    );
    return generatedText(output).trim();
  }
}
