import type { Stats } from "node:fs";
import { readFile, readdir, stat } from "node:fs/promises";
import path from "node:path";
import type { Document } from "@docquery/types";
import { IngestionError, describeError } from "@docquery/errors";
import type { ILoader } from "./loader.interface.js";
import { getParser } from "./factory.js";

/**
 * Reads documents from the local filesystem, dispatching on file extension.
 */
export class FileLoader implements ILoader {
  /** Absolute path, so `docs/a.txt` and `./docs/a.txt` name the same source. */
  sourceId(input: string): string {
    return path.resolve(input);
  }

  async load(sourcePath: string): Promise<Document[]> {
    const parser = getParser(sourcePath);
    if (!parser) {
      throw new IngestionError(`Unsupported document format: ${sourcePath}`, sourcePath);
    }

    let bytes: Uint8Array;
    try {
      bytes = await readFile(sourcePath);
    } catch (error: unknown) {
      throw new IngestionError(`Cannot read ${sourcePath}: ${describeError(error)}`, sourcePath, {
        cause: error,
      });
    }

    try {
      return await parser.parse(bytes, sourcePath);
    } catch (error: unknown) {
      throw new IngestionError(
        `Cannot parse ${sourcePath} as ${parser.format}: ${describeError(error)}`,
        sourcePath,
        { cause: error },
      );
    }
  }
}

/**
 * Expand files and directories into the sorted list of loadable files, as
 * absolute paths. Directories are walked recursively; hidden entries are skipped.
 */
export async function resolveSources(inputs: string[]): Promise<string[]> {
  const found = new Set<string>();

  async function visit(entry: string, explicit: boolean): Promise<void> {
    let info: Stats;
    try {
      info = await stat(entry);
    } catch (error: unknown) {
      throw new IngestionError(`Source not found: ${entry}`, entry, { cause: error });
    }

    if (info.isDirectory()) {
      const children = await readdir(entry);
      for (const child of children) {
        if (child.startsWith(".")) continue;
        await visit(path.join(entry, child), false);
      }
      return;
    }

    if (explicit || getParser(entry)) {
      found.add(entry);
    }
  }

  for (const input of inputs) {
    await visit(path.resolve(input), true);
  }

  return [...found].sort();
}
