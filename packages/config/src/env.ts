import { z } from "zod";
import type { AppConfig } from "@docquery/types";
import { ConfigurationError } from "@docquery/errors";

const intString = (fallback: string) => z.string().default(fallback).transform(Number);

const booleanString = (fallback: "true" | "false") =>
  z
    .enum(["true", "false", "1", "0"])
    .default(fallback)
    .transform((value) => value === "true" || value === "1");

/**
 * Zod schema for every environment variable the pipeline reads.
 * Validates, transforms, and provides defaults so that the resulting object
 * is a strongly-typed AppConfig.
 */
export const envSchema = z
  .object({
    // ---------- Core ----------
    NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
    LOG_LEVEL: z.enum(["debug", "info", "warn", "error", "silent"]).default("info"),

    // ---------- Index ----------
    INDEX_ROOT: z.string().min(1).default(".docquery/indexes"),
    COLLECTION_NAME: z
      .string()
      .regex(/^[A-Za-z0-9][A-Za-z0-9_-]*$/, {
        message: "COLLECTION_NAME may only contain letters, digits, '-' and '_'",
      })
      .default("default"),
    VECTOR_STORE: z.enum(["file", "qdrant"]).default("file"),
    QDRANT_URL: z.string().url().optional(),
    QDRANT_API_KEY: z.string().optional(),
    REBUILD_ON_STALE: booleanString("false"),

    // ---------- Models ----------
    EMBEDDING_PROVIDER: z.enum(["cohere", "ollama"]).default("ollama"),
    EMBEDDING_MODEL: z.string().min(1).default("nomic-embed-text"),
    EMBEDDING_DIMENSIONS: intString("768").pipe(z.number().int().positive()),
    LLM_PROVIDER: z.enum(["cohere", "ollama"]).default("ollama"),
    LLM_MODEL: z.string().min(1).default("llama3.1"),
    LLM_TEMPERATURE: z.string().default("0").transform(Number).pipe(z.number().min(0).max(2)),
    COHERE_API_KEY: z.string().optional(),
    OLLAMA_BASE_URL: z.string().url().default("http://localhost:11434"),

    // ---------- Chunking ----------
    CHUNK_SIZE: intString("1000").pipe(z.number().int().positive()),
    CHUNK_OVERLAP: intString("200").pipe(z.number().int().nonnegative()),

    // ---------- Retrieval ----------
    QUERY_VARIANTS: intString("5").pipe(z.number().int().nonnegative().max(20)),
    RETRIEVAL_TOP_K: intString("4").pipe(z.number().int().positive()),
    MAX_CANDIDATES: intString("10").pipe(z.number().int().positive()),
    MAX_CONTEXT_CHARS: intString("8000").pipe(z.number().int().positive()),

    // ---------- Resilience ----------
    MODEL_TIMEOUT_MS: intString("60000").pipe(z.number().int().positive()),
    MODEL_MAX_RETRIES: intString("2").pipe(z.number().int().nonnegative()),
  })
  .superRefine((env, ctx) => {
    if (env.CHUNK_OVERLAP >= env.CHUNK_SIZE) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["CHUNK_OVERLAP"],
        message: "CHUNK_OVERLAP must be smaller than CHUNK_SIZE",
      });
    }
    if (env.MAX_CONTEXT_CHARS < env.CHUNK_SIZE) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["MAX_CONTEXT_CHARS"],
        message: "MAX_CONTEXT_CHARS must be at least CHUNK_SIZE",
      });
    }
    const usesCohere = env.EMBEDDING_PROVIDER === "cohere" || env.LLM_PROVIDER === "cohere";
    if (usesCohere && !env.COHERE_API_KEY) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["COHERE_API_KEY"],
        message: "COHERE_API_KEY is required when a provider is 'cohere'",
      });
    }
    if (env.VECTOR_STORE === "qdrant" && !env.QDRANT_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["QDRANT_URL"],
        message: "QDRANT_URL is required when VECTOR_STORE is 'qdrant'",
      });
    }
  });

function toConfigurationError(error: z.ZodError): ConfigurationError {
  const fields: Record<string, string> = {};
  for (const issue of error.issues) {
    const key = issue.path.join(".") || "(root)";
    fields[key] ??= issue.message;
  }
  const summary = Object.entries(fields)
    .map(([key, message]) => `${key}: ${message}`)
    .join("; ");
  return new ConfigurationError(`Invalid environment: ${summary}`, fields, { cause: error });
}

/**
 * Parse and validate process.env (or any compatible record) against
 * the envSchema and return a strongly-typed {@link AppConfig}.
 *
 * Throws a ConfigurationError naming every offending variable.
 */
export function parseEnv(env: Record<string, string | undefined> = process.env): AppConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    throw toConfigurationError(result.error);
  }
  const parsed = result.data;

  return {
    nodeEnv: parsed.NODE_ENV,
    logLevel: parsed.LOG_LEVEL,

    index: {
      root: parsed.INDEX_ROOT,
      collection: parsed.COLLECTION_NAME,
      store: parsed.VECTOR_STORE,
      qdrantUrl: parsed.QDRANT_URL,
      qdrantApiKey: parsed.QDRANT_API_KEY,
      rebuildOnStale: parsed.REBUILD_ON_STALE,
    },

    embedding: {
      provider: parsed.EMBEDDING_PROVIDER,
      model: parsed.EMBEDDING_MODEL,
      dimensions: parsed.EMBEDDING_DIMENSIONS,
    },

    llm: {
      provider: parsed.LLM_PROVIDER,
      model: parsed.LLM_MODEL,
      temperature: parsed.LLM_TEMPERATURE,
    },

    cohere: {
      apiKey: parsed.COHERE_API_KEY ?? "",
    },

    ollama: {
      baseUrl: parsed.OLLAMA_BASE_URL,
    },

    chunking: {
      chunkSize: parsed.CHUNK_SIZE,
      chunkOverlap: parsed.CHUNK_OVERLAP,
    },

    retrieval: {
      queryVariants: parsed.QUERY_VARIANTS,
      topKPerQuery: parsed.RETRIEVAL_TOP_K,
      maxCandidates: parsed.MAX_CANDIDATES,
      maxContextChars: parsed.MAX_CONTEXT_CHARS,
    },

    resilience: {
      modelTimeoutMs: parsed.MODEL_TIMEOUT_MS,
      maxRetries: parsed.MODEL_MAX_RETRIES,
    },
  };
}
