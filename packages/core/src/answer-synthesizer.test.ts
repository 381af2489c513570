import { describe, it, expect } from "vitest";
import type { ScoredChunk } from "@docquery/types";
import { SynthesisFailure } from "@docquery/errors";
import { AnswerSynthesizer, NO_CONTEXT_NOTICE, buildAnswerPrompt } from "./answer-synthesizer.js";
import { ScriptedModel } from "./testing/fakes.js";

const CONTEXT: ScoredChunk[] = [
  { chunkId: "c1", sourceId: "a.txt", content: "Speed limit is 60.", score: 0.9, metadata: {} },
];

describe("buildAnswerPrompt", () => {
  it("frames numbered context before the verbatim question", () => {
    expect(buildAnswerPrompt("How fast?", CONTEXT)).toBe(
      [
        "You answer questions about a collection of documents.",
        "Answer the question based ONLY on the following context. If the context does not contain the answer, say that you do not know.",
        "",
        "Context:",
        "[1] (Source: a.txt)",
        "Speed limit is 60.",
        "",
        "Question: How fast?",
        "Answer:",
      ].join("\n"),
    );
  });

  it("says so when there is no context", () => {
    expect(buildAnswerPrompt("How fast?", [])).toContain(`Context:\n${NO_CONTEXT_NOTICE}\n`);
  });
});

describe("AnswerSynthesizer", () => {
  it("returns the model output verbatim", async () => {
    const model = new ScriptedModel(() => "  It is 60 km/h.\n");
    const synthesizer = new AnswerSynthesizer({ model });

    expect(await synthesizer.synthesize("How fast?", CONTEXT)).toBe("  It is 60 km/h.\n");
    expect(model.prompts).toEqual([buildAnswerPrompt("How fast?", CONTEXT)]);
  });

  it("still asks the model when the context is empty", async () => {
    const model = new ScriptedModel(() => "I have no information about that.");
    const synthesizer = new AnswerSynthesizer({ model });

    expect(await synthesizer.synthesize("How fast?", [])).toBe("I have no information about that.");
    expect(model.prompts).toHaveLength(1);
  });

  it("reports a model failure as a typed result", async () => {
    const synthesizer = new AnswerSynthesizer({ model: ScriptedModel.failing("model offline") });

    const result = await synthesizer.attempt("How fast?", CONTEXT);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(SynthesisFailure);
      expect(result.error.message).toBe("Answer generation failed: model offline");
      expect(result.error.details).toEqual({ contextChunks: 1 });
    }
  });

  it("renders a model failure as text", async () => {
    const synthesizer = new AnswerSynthesizer({ model: ScriptedModel.failing("model offline") });

    expect(await synthesizer.synthesize("How fast?", CONTEXT)).toBe(
      "Sorry, I could not produce an answer right now. Answer generation failed: model offline",
    );
  });

  it("treats a blank reply as a failure", async () => {
    const synthesizer = new AnswerSynthesizer({ model: new ScriptedModel(() => "  \n") });

    expect(await synthesizer.synthesize("How fast?", CONTEXT)).toBe(
      "Sorry, I could not produce an answer right now. The model returned an empty answer.",
    );
  });
});
