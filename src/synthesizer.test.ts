import { beforeEach, describe, expect, it, vi } from "vitest";
import {
  AnswerSynthesizer,
  FALLBACK_PREFIX,
  NO_INFORMATION_ANSWER,
  buildPrompt,
  cleanExcerpt,
  tidyAnswer,
} from "./synthesizer";
import { StubGenerator, scored } from "./test-helpers";

describe("tidyAnswer", () => {
  it("drops list markers, capitalizes and ends the sentence", () => {
    expect(tidyAnswer("- paris is the capital")).toBe("Paris is the capital.");
    expect(tidyAnswer("ii. the answer")).toBe("The answer.");
    expect(tidyAnswer("  Done!  ")).toBe("Done!");
    expect(tidyAnswer("   ")).toBe("");
  });

  it("keeps the case of the words after a stripped marker", () => {
    expect(tidyAnswer("* the Eiffel Tower is in Paris")).toBe("The Eiffel Tower is in Paris.");
  });
});

describe("cleanExcerpt", () => {
  it("trims punctuation noise at both ends", () => {
    expect(cleanExcerpt("... hello world. --")).toBe("hello world.");
  });
});

describe("buildPrompt", () => {
  it("labels excerpts with their source", () => {
    const prompt = buildPrompt("Where?", [scored("a#0", 0.9, "In Paris.", "a.txt")]);
    expect(prompt).toContain("[Excerpt 1 | a.txt]: In Paris.");
    expect(prompt).toContain("QUESTION: Where?");
  });
});

describe("AnswerSynthesizer", () => {
  beforeEach(() => {
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  it("answers from the top candidate with exactly one citation when no generator is set", async () => {
    const synth = new AnswerSynthesizer();
    const answer = await synth.synthesize("q", [
      scored("a#0", 0.42, "Second best."),
      scored("b#0", 0.71, "Paris is the capital of France.", "b.txt"),
    ]);
    expect(answer).toEqual({
      answer: `${FALLBACK_PREFIX}Paris is the capital of France.`,
      sources: [{ text: "Paris is the capital of France.", source: "b.txt", score: 0.71 }],
      mode: "fallback",
    });
  });

  it("returns the fixed message and no sources without candidates", async () => {
    const answer = await new AnswerSynthesizer({ generator: new StubGenerator("unused") }).synthesize("q", []);
    expect(answer).toEqual({ answer: NO_INFORMATION_ANSWER, sources: [], mode: "empty" });
  });

  it("uses the generated answer and cites the prompt context", async () => {
    const generator = new StubGenerator("- paris is the capital");
    const synth = new AnswerSynthesizer({ generator });
    const answer = await synth.synthesize("What is the capital?", [
      scored("a#0", 0.9),
      scored("b#0", 0.5),
      scored("c#0", 0.3),
      scored("d#0", 0.45),
    ]);
    expect(answer.answer).toBe("Paris is the capital.");
    expect(answer.mode).toBe("generated");
    expect(answer.sources.map((s) => s.score)).toEqual([0.9, 0.5, 0.45]);
    expect(generator.prompts).toHaveLength(1);
    expect(generator.prompts[0]).toContain("QUESTION: What is the capital?");
  });

  it("falls back when the generator fails", async () => {
    const synth = new AnswerSynthesizer({ generator: new StubGenerator(new Error("model crashed")) });
    const answer = await synth.synthesize("q", [scored("a#0", 0.6, "Only chunk.")]);
    expect(answer.mode).toBe("fallback");
    expect(answer.answer).toBe(`${FALLBACK_PREFIX}Only chunk.`);
    expect(answer.sources).toHaveLength(1);
  });

  it("falls back when the generator returns nothing usable", async () => {
    const synth = new AnswerSynthesizer({ generator: new StubGenerator("   ") });
    const answer = await synth.synthesize("q", [scored("a#0", 0.6, "Only chunk.")]);
    expect(answer.mode).toBe("fallback");
  });

  it("falls back when the wait on the generator is aborted", async () => {
    const synth = new AnswerSynthesizer({ generator: new StubGenerator("hang") });
    const controller = new AbortController();
    const pending = synth.synthesize("q", [scored("a#0", 0.6, "Only chunk.")], {
      signal: controller.signal,
    });
    controller.abort();
    const answer = await pending;
    expect(answer.mode).toBe("fallback");
    expect(answer.answer).toBe(`${FALLBACK_PREFIX}Only chunk.`);
  });

  it("uses the two best candidates as context when none clears the minimum score", () => {
    const synth = new AnswerSynthesizer();
    const context = synth.selectContext([scored("a#0", 0.2), scored("b#0", 0.35), scored("c#0", 0.1)]);
    expect(context.map((c) => c.id)).toEqual(["b#0", "a#0"]);
  });
});
