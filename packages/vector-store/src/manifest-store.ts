import { createHash } from "node:crypto";
import { readFile, rm } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import type { CollectionManifest } from "@docquery/types";
import { IndexCorruptionError, describeError } from "@docquery/errors";
import { readJsonFile, writeJsonAtomic } from "./json-file.js";

const manifestSchema = z.object({
  version: z.literal(1),
  collection: z.string(),
  embeddingModel: z.string(),
  dimensions: z.number().int().positive(),
  chunkSize: z.number().int().positive(),
  chunkOverlap: z.number().int().nonnegative(),
  builtAt: z.string(),
  sources: z.record(z.string()),
});

/** SHA-256 of a file's bytes, hex encoded. */
export async function checksumFile(filePath: string): Promise<string> {
  const bytes = await readFile(filePath);
  return createHash("sha256").update(bytes).digest("hex");
}

/**
 * Sources whose checksum changed, that were added, or that disappeared,
 * sorted by source id.
 */
export function diffSources(previous: Record<string, string>, current: Record<string, string>): string[] {
  const changed = new Set<string>();
  for (const [sourceId, checksum] of Object.entries(current)) {
    if (previous[sourceId] !== checksum) changed.add(sourceId);
  }
  for (const sourceId of Object.keys(previous)) {
    if (!(sourceId in current)) changed.add(sourceId);
  }
  return [...changed].sort();
}

/**
 * Keeps `<root>/<collection>.manifest.json` next to the collection it
 * describes.
 */
export class ManifestStore {
  private readonly root: string;

  constructor(root: string) {
    this.root = root;
  }

  pathFor(collection: string): string {
    return path.join(this.root, `${collection}.manifest.json`);
  }

  async read(collection: string): Promise<CollectionManifest | undefined> {
    const filePath = this.pathFor(collection);
    let raw: unknown;
    try {
      raw = await readJsonFile(filePath);
    } catch (error: unknown) {
      throw new IndexCorruptionError(`Cannot read ${filePath}: ${describeError(error)}`, collection, {
        cause: error,
      });
    }
    if (raw === undefined) return undefined;

    const parsed = manifestSchema.safeParse(raw);
    if (!parsed.success) {
      throw new IndexCorruptionError(`Manifest ${filePath} is malformed`, collection);
    }
    return parsed.data;
  }

  async write(manifest: CollectionManifest): Promise<void> {
    await writeJsonAtomic(this.pathFor(manifest.collection), manifest);
  }

  async remove(collection: string): Promise<void> {
    await rm(this.pathFor(collection), { force: true });
  }
}
