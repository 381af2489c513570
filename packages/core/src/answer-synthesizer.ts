import type { ScoredChunk } from "@docquery/types";
import { SynthesisFailure, describeError, err, ok } from "@docquery/errors";
import type { Result } from "@docquery/errors";
import type { IGenerativeModel } from "@docquery/llm";
import { silentLogger } from "@docquery/logger";
import type { Logger } from "@docquery/logger";
import { assembleContext } from "./context-assembler.js";

export const NO_CONTEXT_NOTICE = "(No relevant passages were found in the indexed documents.)";

export function buildAnswerPrompt(question: string, context: ScoredChunk[]): string {
  const blocks = context.length > 0 ? assembleContext(context) : NO_CONTEXT_NOTICE;
  return [
    "You answer questions about a collection of documents.",
    "Answer the question based ONLY on the following context. If the context does not contain the answer, say that you do not know.",
    "",
    "Context:",
    blocks,
    "",
    `Question: ${question}`,
    "Answer:",
  ].join("\n");
}

export function renderFailure(failure: SynthesisFailure): string {
  return `Sorry, I could not produce an answer right now. ${failure.message}`;
}

export interface AnswerSynthesizerDependencies {
  model: IGenerativeModel;
  logger?: Logger;
}

export class AnswerSynthesizer {
  private model: IGenerativeModel;
  private logger: Logger;

  constructor(deps: AnswerSynthesizerDependencies) {
    this.model = deps.model;
    this.logger = deps.logger ?? silentLogger();
  }

  /**
   * One generation over the grounding prompt. The model is called even with
   * no context so it can say it has nothing to go on.
   */
  async attempt(question: string, context: ScoredChunk[]): Promise<Result<string, SynthesisFailure>> {
    const prompt = buildAnswerPrompt(question, context);

    let answer: string;
    try {
      answer = await this.model.generate(prompt);
    } catch (error: unknown) {
      return err(
        new SynthesisFailure(`Answer generation failed: ${describeError(error)}`, {
          cause: error,
          details: { contextChunks: context.length },
        }),
      );
    }

    if (answer.trim().length === 0) {
      return err(new SynthesisFailure("The model returned an empty answer."));
    }
    return ok(answer);
  }

  async synthesize(question: string, context: ScoredChunk[]): Promise<string> {
    const result = await this.attempt(question, context);
    if (result.ok) return result.value;

    this.logger.error({ err: result.error, contextChunks: context.length }, "answer synthesis failed");
    return renderFailure(result.error);
  }
}
