import { ConfigurationError, InvalidArgumentError } from "@docquery/errors";

export function assertTopK(topK: number): void {
  if (!Number.isInteger(topK) || topK < 1) {
    throw new InvalidArgumentError(`topK must be an integer >= 1, got ${topK}`, "topK");
  }
}

export function assertDimensions(dimensions: number): void {
  if (!Number.isInteger(dimensions) || dimensions <= 0) {
    throw new ConfigurationError(`Vector dimensions must be a positive integer, got ${dimensions}`, {
      dimensions: "must be a positive integer",
    });
  }
}

export function assertVectorLength(vector: number[], dimensions: number, what: string): void {
  if (vector.length !== dimensions) {
    throw new ConfigurationError(
      `${what} has ${vector.length} dimensions, collection expects ${dimensions}`,
      { dimensions: `expected ${dimensions}, got ${vector.length}` },
    );
  }
}
