import { createHash } from "node:crypto";
import type { Document, EmbeddingResult } from "@docquery/types";
import type { IEmbeddingProvider } from "@docquery/embeddings";
import type { IGenerativeModel } from "@docquery/llm";
import type { ILoader } from "@docquery/loader";
import { IngestionError } from "@docquery/errors";

function tokenize(text: string): string[] {
  return text.toLowerCase().match(/[a-z0-9]+/g) ?? [];
}

/**
 * Bag-of-words embedder over a fixed vocabulary: one dimension per term,
 * holding that term's count in the text.
 */
export class VocabularyEmbedder implements IEmbeddingProvider {
  readonly name = "vocabulary";
  readonly dimensions: number;
  readonly queries: string[] = [];
  readonly batches: string[][] = [];
  private vocabulary: string[];
  private failWhen?: (text: string) => boolean;

  constructor(vocabulary: string[], options: { failWhen?: (text: string) => boolean } = {}) {
    this.vocabulary = vocabulary.map((term) => term.toLowerCase());
    this.dimensions = vocabulary.length;
    this.failWhen = options.failWhen;
  }

  vectorFor(text: string): number[] {
    const counts = new Map<string, number>();
    for (const token of tokenize(text)) {
      counts.set(token, (counts.get(token) ?? 0) + 1);
    }
    return this.vocabulary.map((term) => counts.get(term) ?? 0);
  }

  async embed(text: string): Promise<EmbeddingResult> {
    this.queries.push(text);
    return this.result([text]);
  }

  async batchEmbed(texts: string[]): Promise<EmbeddingResult> {
    this.batches.push([...texts]);
    return this.result(texts);
  }

  async healthCheck(): Promise<boolean> {
    return true;
  }

  private result(texts: string[]): EmbeddingResult {
    for (const text of texts) {
      if (this.failWhen?.(text)) {
        throw new Error(`embedding service unreachable for "${text}"`);
      }
    }
    return {
      embeddings: texts.map((text) => this.vectorFor(text)),
      model: this.name,
      tokensUsed: texts.reduce((sum, text) => sum + tokenize(text).length, 0),
      dimensions: this.dimensions,
    };
  }
}

export type Script = (prompt: string) => string | Promise<string>;

/** Generative model that answers from a script and remembers every prompt. */
export class ScriptedModel implements IGenerativeModel {
  readonly name = "scripted";
  readonly prompts: string[] = [];
  private script: Script;

  constructor(script: Script) {
    this.script = script;
  }

  static failing(message = "model offline"): ScriptedModel {
    return new ScriptedModel(() => {
      throw new Error(message);
    });
  }

  async generate(prompt: string): Promise<string> {
    this.prompts.push(prompt);
    return this.script(prompt);
  }
}

/** Loader over an in-memory map of source id to text. */
export class InMemoryLoader implements ILoader {
  readonly loaded: string[] = [];
  private files: Map<string, string>;

  constructor(files: Record<string, string>) {
    this.files = new Map(Object.entries(files));
  }

  sourceId(input: string): string {
    return input;
  }

  set(sourceId: string, text: string): void {
    this.files.set(sourceId, text);
  }

  async load(sourceId: string): Promise<Document[]> {
    this.loaded.push(sourceId);
    const text = this.files.get(sourceId);
    if (text === undefined) {
      throw new IngestionError(`Source not found: ${sourceId}`, sourceId);
    }
    return [{ sourceId, text, metadata: { format: "text" } }];
  }

  /** Stands in for the file checksum used to detect changed sources. */
  fingerprint = async (sourceId: string): Promise<string> => {
    const text = this.files.get(sourceId);
    if (text === undefined) {
      throw new IngestionError(`Source not found: ${sourceId}`, sourceId);
    }
    return createHash("sha256").update(text).digest("hex");
  };
}
