import type { Document } from "@docquery/types";

/**
 * Turns one source into Documents. Implementations surface unreadable or
 * unsupported sources as IngestionError.
 */
export interface ILoader {
  /** Canonical id for a source as the user named it; records are keyed by it. */
  sourceId(input: string): string;
  load(sourcePath: string): Promise<Document[]>;
}
