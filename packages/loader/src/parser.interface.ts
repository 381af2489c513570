import type { Document, SourceFormat } from "@docquery/types";

export interface IParser {
  readonly format: SourceFormat;
  /** Lower-case file extensions without the dot. */
  readonly extensions: string[];
  parse(input: Uint8Array | string, sourceId: string): Promise<Document[]>;
}
