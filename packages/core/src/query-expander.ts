import { ExpansionFailure, describeError } from "@docquery/errors";
import type { IGenerativeModel } from "@docquery/llm";
import { previewText, silentLogger } from "@docquery/logger";
import type { Logger } from "@docquery/logger";

export const DEFAULT_VARIANT_COUNT = 5;

const LIST_MARKER = /^\s*(?:\d+[.)]|[-*•])\s+/;
const QUOTED = /^["'“‘](.*)["'”’]$/;

export function buildExpansionPrompt(question: string, count: number): string {
  return [
    `You are an AI language model assistant. Your task is to generate ${String(count)} different versions of the given user question to retrieve relevant documents from a vector database.`,
    "By generating multiple perspectives on the user question, your goal is to help the user overcome some of the limitations of distance-based similarity search.",
    "Provide these alternative questions separated by newlines, with no numbering and no other text.",
    `Original question: ${question}`,
  ].join("\n");
}

function cleanLine(line: string): string {
  let text = line.trim().replace(LIST_MARKER, "").trim();
  const quoted = QUOTED.exec(text);
  if (quoted?.[1] !== undefined) {
    text = quoted[1].trim();
  }
  return text;
}

/**
 * Turn free model output into at most `count` distinct paraphrases. Lines
 * equal to the question, blank lines and case-insensitive repeats are dropped.
 */
export function parseVariants(raw: string, question: string, count: number): string[] {
  const seen = new Set<string>([question.trim().toLowerCase()]);
  const variants: string[] = [];

  for (const line of raw.split(/\r?\n/)) {
    if (variants.length >= count) break;

    const text = cleanLine(line);
    if (text.length === 0) continue;

    const key = text.toLowerCase();
    if (seen.has(key)) continue;
    seen.add(key);
    variants.push(text);
  }

  return variants;
}

export interface QueryExpanderDependencies {
  model: IGenerativeModel;
  logger?: Logger;
  defaultCount?: number;
}

/**
 * Multi-query expansion. The result always starts with the original question;
 * expansion problems only cost the extra variants.
 */
export class QueryExpander {
  private model: IGenerativeModel;
  private logger: Logger;
  private defaultCount: number;

  constructor(deps: QueryExpanderDependencies) {
    this.model = deps.model;
    this.logger = deps.logger ?? silentLogger();
    this.defaultCount = deps.defaultCount ?? DEFAULT_VARIANT_COUNT;
  }

  async expand(question: string, count: number = this.defaultCount): Promise<string[]> {
    if (count <= 0) return [question];

    let raw: string;
    try {
      raw = await this.model.generate(buildExpansionPrompt(question, count));
    } catch (error: unknown) {
      const failure = new ExpansionFailure(`Query expansion failed: ${describeError(error)}`, {
        cause: error,
      });
      this.logger.warn({ err: failure, question: previewText(question) }, "using the original question only");
      return [question];
    }

    const variants = parseVariants(raw, question, count);
    if (variants.length === 0) {
      const failure = new ExpansionFailure("Model returned no usable query variants", {
        details: { output: previewText(raw) },
      });
      this.logger.warn({ err: failure, question: previewText(question) }, "using the original question only");
      return [question];
    }

    this.logger.debug({ variants: variants.length }, "question expanded");
    return [question, ...variants];
  }
}
