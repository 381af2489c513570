import type { AnswerResult } from "@docquery/types";
import { EmptyQuestionError, describeError } from "@docquery/errors";
import { previewText, silentLogger } from "@docquery/logger";
import type { Logger } from "@docquery/logger";
import type { Retriever } from "./retriever.js";
import type { AnswerSynthesizer } from "./answer-synthesizer.js";

export const EMPTY_QUESTION_MESSAGE = "Please enter a question about your documents.";

export interface RagPipelineDependencies {
  retriever: Retriever;
  synthesizer: AnswerSynthesizer;
  logger?: Logger;
}

/**
 * question -> retrieve -> synthesize. Every failure ends up as answer text.
 */
export class RagPipeline {
  private retriever: Retriever;
  private synthesizer: AnswerSynthesizer;
  private logger: Logger;

  constructor(deps: RagPipelineDependencies) {
    this.retriever = deps.retriever;
    this.synthesizer = deps.synthesizer;
    this.logger = deps.logger ?? silentLogger();
  }

  async answer(question: string): Promise<string> {
    const result = await this.ask(question);
    return result.answer;
  }

  async ask(question: string): Promise<AnswerResult> {
    if (question.trim().length === 0) {
      this.logger.info({ code: new EmptyQuestionError().code }, "empty question rejected");
      return { question, answer: EMPTY_QUESTION_MESSAGE, queries: [], context: [] };
    }

    const startTime = Date.now();
    this.logger.info({ question: previewText(question) }, "answering question");

    let queries: string[];
    let context: AnswerResult["context"];
    try {
      ({ queries, chunks: context } = await this.retriever.retrieveWithQueries(question));
    } catch (error: unknown) {
      this.logger.error({ err: error }, "retrieval failed");
      return {
        question,
        answer: `Sorry, I could not search the documents: ${describeError(error)}`,
        queries: [],
        context: [],
      };
    }

    const answer = await this.synthesizer.synthesize(question, context);

    this.logger.info(
      { queries: queries.length, contextChunks: context.length, durationMs: Date.now() - startTime },
      "question answered",
    );
    return { question, answer, queries, context };
  }
}
