/**
 * A unit of loaded text. A PDF yields one Document per page; plain text files
 * yield a single Document.
 */
export interface Document {
  /** Source identifier, normally the path the loader read from. */
  sourceId: string;
  text: string;
  pageNumber?: number;
  metadata: Record<string, unknown>;
}

export type SourceFormat = "text" | "markdown" | "html" | "json" | "csv" | "pdf";
