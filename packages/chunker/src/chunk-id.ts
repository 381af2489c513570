import { createHash } from "node:crypto";

/**
 * Stable chunk identifier: same source, page and offset always hash to the same id.
 */
export function chunkId(sourceId: string, pageNumber: number | undefined, startChar: number): string {
  return createHash("sha256")
    .update(`${sourceId}\u0000${String(pageNumber ?? 0)}\u0000${String(startChar)}`)
    .digest("hex");
}
