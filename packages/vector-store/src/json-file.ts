import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import path from "node:path";

export function isNotFound(error: unknown): boolean {
  return typeof error === "object" && error !== null && "code" in error && error.code === "ENOENT";
}

/**
 * Read and JSON-parse a file. Resolves undefined when the file does not exist;
 * any other failure, parse errors included, rejects.
 */
export async function readJsonFile(filePath: string): Promise<unknown> {
  let raw: string;
  try {
    raw = await readFile(filePath, "utf-8");
  } catch (error: unknown) {
    if (isNotFound(error)) return undefined;
    throw error;
  }
  const parsed: unknown = JSON.parse(raw);
  return parsed;
}

/** Write through a temp file and rename so readers never see a partial file. */
export async function writeJsonAtomic(filePath: string, data: unknown): Promise<void> {
  await mkdir(path.dirname(filePath), { recursive: true });
  const tmp = `${filePath}.${process.pid}.tmp`;
  await writeFile(tmp, JSON.stringify(data), "utf-8");
  await rename(tmp, filePath);
}
