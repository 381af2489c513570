import type { Document, SourceFormat } from "@docquery/types";
import type { IParser } from "./parser.interface.js";

const EXTENSIONS: Record<Exclude<SourceFormat, "pdf">, string[]> = {
  text: ["txt", "text", "log"],
  markdown: ["md", "markdown", "mdx"],
  html: ["html", "htm"],
  json: ["json"],
  csv: ["csv", "tsv"],
};

/**
 * Plain text formats. Handled directly without external dependencies; HTML is
 * reduced to its visible text.
 */
export class TextParser implements IParser {
  readonly format: Exclude<SourceFormat, "pdf">;
  readonly extensions: string[];

  constructor(format: Exclude<SourceFormat, "pdf"> = "text") {
    this.format = format;
    this.extensions = EXTENSIONS[format];
  }

  async parse(input: Uint8Array | string, sourceId: string): Promise<Document[]> {
    const raw = typeof input === "string" ? input : new TextDecoder().decode(input);
    const text = this.format === "html" ? this.stripHtml(raw) : raw.replace(/\r\n/g, "\n");

    return [
      {
        sourceId,
        text,
        metadata: {
          format: this.format,
          charCount: text.length,
          wordCount: text.split(/\s+/).filter((w) => w.length > 0).length,
        },
      },
    ];
  }

  private stripHtml(html: string): string {
    return html
      .replace(/<script[^>]*>[\s\S]*?<\/script>/gi, "")
      .replace(/<style[^>]*>[\s\S]*?<\/style>/gi, "")
      .replace(/<\/(p|div|h[1-6]|li|tr|section|article)>/gi, "\n\n")
      .replace(/<br\s*\/?>/gi, "\n")
      .replace(/<[^>]+>/g, " ")
      .replace(/&nbsp;/g, " ")
      .replace(/&amp;/g, "&")
      .replace(/&lt;/g, "<")
      .replace(/&gt;/g, ">")
      .replace(/[ \t]+/g, " ")
      .replace(/ *\n */g, "\n")
      .replace(/\n{3,}/g, "\n\n")
      .trim();
  }
}
