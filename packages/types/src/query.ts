export interface ScoredChunk {
  chunkId: string;
  sourceId: string;
  content: string;
  score: number;
  metadata: Record<string, unknown>;
}

export interface AnswerResult {
  question: string;
  answer: string;
  queries: string[];
  context: ScoredChunk[];
}
