import path from "node:path";
import type { IParser } from "./parser.interface.js";
import { TextParser } from "./text-parser.js";
import { PdfParser } from "./pdf-parser.js";

const allParsers: IParser[] = [
  new TextParser("text"),
  new TextParser("markdown"),
  new TextParser("html"),
  new TextParser("json"),
  new TextParser("csv"),
  new PdfParser(),
];

/**
 * Select the parser for a file path by its extension. Returns undefined for
 * formats nothing here can read.
 */
export function getParser(filePath: string): IParser | undefined {
  const extension = path.extname(filePath).slice(1).toLowerCase();
  return allParsers.find((p) => p.extensions.includes(extension));
}

export function supportedExtensions(): string[] {
  return allParsers.flatMap((p) => p.extensions);
}
