export type { IParser } from "./parser.interface.js";
export type { ILoader } from "./loader.interface.js";
export { TextParser } from "./text-parser.js";
export { PdfParser } from "./pdf-parser.js";
export { getParser, supportedExtensions } from "./factory.js";
export { FileLoader, resolveSources } from "./file-loader.js";
