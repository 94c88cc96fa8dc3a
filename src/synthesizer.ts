import { SynthesisError, describeError } from "./errors";
import type { AnswerGenerator } from "./generator";
import type { Answer, Citation, ScoredChunk } from "./types";

export const NO_INFORMATION_ANSWER =
  "I couldn't find any relevant information in the documents. Please try a different question or upload more relevant documents.";

export const FALLBACK_PREFIX = "Based on the available information: ";

export interface SynthesizerOptions {
  /** Generative backend; without one every answer takes the extractive fallback. */
  generator?: AnswerGenerator;
  /** Candidates scoring above this are preferred as context (default 0.4). */
  contextMinScore?: number;
  /** Maximum excerpts placed in the prompt (default 3). */
  maxContextChunks?: number;
  verbose?: boolean;
}

export interface SynthesizeOptions {
  /** Aborts the wait on the generator; the synthesizer then falls back. */
  signal?: AbortSignal;
}

// Leading list markers the model sometimes emits.
const INVALID_STARTS = ["i. ", "ii. ", "iii. ", "iv. ", "v. ", "- ", "* "];

function toCitation(c: ScoredChunk): Citation {
  return { text: c.payload.text, source: c.payload.source, score: c.score };
}

/** Strip leading/trailing punctuation noise from an excerpt before prompting. */
export function cleanExcerpt(text: string): string {
  return text.replace(/^[^a-zA-Z0-9"']+/, "").replace(/[^a-zA-Z0-9"'.!?]+$/, "");
}

/**
 * Remove list-marker prefixes and make sure the answer ends like a sentence.
 * Only the first letter after a stripped marker is upper-cased; the rest keeps
 * its case.
 */
export function tidyAnswer(raw: string): string {
  let answer = raw.trim();
  for (const prefix of INVALID_STARTS) {
    if (answer.toLowerCase().startsWith(prefix)) {
      const rest = answer.slice(prefix.length);
      answer = rest.charAt(0).toUpperCase() + rest.slice(1);
    }
  }
  if (answer && !/[.!?]$/.test(answer)) answer += ".";
  return answer;
}

export function buildPrompt(query: string, context: ScoredChunk[]): string {
  const excerpts = context
    .map((c, i) => `[Excerpt ${i + 1} | ${c.payload.source}]: ${cleanExcerpt(c.payload.text)}`)
    .join("\n\n");
  return `Based on the following document excerpts, answer the user's question.
If the answer cannot be found in the excerpts, say "I don't have enough information to answer that question based on the provided documents."

DOCUMENT EXCERPTS:
${excerpts}

QUESTION: ${query}

INSTRUCTIONS:
- Answer in a clear, complete sentence
- Do not use bullet points or numbered lists
- Reference the excerpts if they contain the answer
- If excerpts conflict, mention any uncertainties

ANSWER:`;
}

/**
 * Turns a question plus ranked candidates into a cited answer.
 *
 * `synthesize` never throws: without a generator, or when generation fails or
 * is aborted, the answer is built directly from the best candidate.
 */
export class AnswerSynthesizer {
  private readonly generator?: AnswerGenerator;
  private readonly contextMinScore: number;
  private readonly maxContextChunks: number;
  private readonly verbose: boolean;

  public constructor(opts: SynthesizerOptions = {}) {
    this.generator = opts.generator;
    this.contextMinScore = opts.contextMinScore ?? 0.4;
    this.maxContextChunks = Math.max(1, opts.maxContextChunks ?? 3);
    this.verbose = !!opts.verbose;
  }

  public hasGenerator(): boolean {
    return this.generator !== undefined;
  }

  /**
   * Excerpts used as prompt context: best first, preferring those above the
   * minimum score, otherwise the top two regardless of score.
   */
  public selectContext(candidates: ScoredChunk[]): ScoredChunk[] {
    const sorted = [...candidates].sort((a, b) => b.score - a.score);
    const strong = sorted.filter((c) => c.score > this.contextMinScore);
    const chosen = strong.length ? strong : sorted.slice(0, 2);
    return chosen.slice(0, this.maxContextChunks);
  }

  public async synthesize(
    query: string,
    candidates: ScoredChunk[],
    opts: SynthesizeOptions = {},
  ): Promise<Answer> {
    if (!this.generator || candidates.length === 0) return this.fallback(candidates);
    const context = this.selectContext(candidates);
    try {
      const raw = await this.generator.generate(buildPrompt(query, context), {
        signal: opts.signal,
      });
      const answer = tidyAnswer(raw);
      if (!answer) throw new SynthesisError("Generator returned an empty answer");
      return { answer, sources: context.map(toCitation), mode: "generated" };
    } catch (e) {
      const err =
        e instanceof SynthesisError
          ? e
          : new SynthesisError(`Generation failed: ${describeError(e)}`, { cause: e });
      console.error(`[RAG] ${err.message}. Using fallback answer.`);
      return this.fallback(candidates);
    }
  }

  /** Deterministic answer from the top candidate, or the fixed "nothing found" message. */
  public fallback(candidates: ScoredChunk[]): Answer {
    if (candidates.length === 0) {
      return { answer: NO_INFORMATION_ANSWER, sources: [], mode: "empty" };
    }
    let top = candidates[0];
    for (const c of candidates) if (c.score > top.score) top = c;
    if (this.verbose) {
      console.error(`[RAG][verbose] Fallback answer from ${top.payload.source} (${top.score.toFixed(3)})`);
    }
    return { answer: `${FALLBACK_PREFIX}${top.payload.text}`, sources: [toCitation(top)], mode: "fallback" };
  }
}
