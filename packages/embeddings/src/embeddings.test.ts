import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { CohereError } from "cohere-ai";
import { ConfigurationError } from "@docquery/errors";
import { createEmbeddingProvider } from "./factory.js";
import { CohereEmbeddingProvider } from "./cohere-provider.js";
import { OllamaEmbeddingProvider } from "./ollama-provider.js";

const { embedMock } = vi.hoisted(() => ({ embedMock: vi.fn() }));

vi.mock("cohere-ai", () => {
  class CohereError extends Error {
    readonly statusCode?: number;
    constructor(opts: { message?: string; statusCode?: number }) {
      super(opts.message);
      this.statusCode = opts.statusCode;
    }
  }
  class CohereTimeoutError extends Error {}
  class CohereClient {
    v2 = { embed: embedMock };
  }
  return { CohereClient, CohereError, CohereTimeoutError };
});

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

describe("createEmbeddingProvider factory", () => {
  it("creates CohereEmbeddingProvider for type 'cohere'", () => {
    const provider = createEmbeddingProvider({
      provider: "cohere",
      cohere: { apiKey: "test-cohere-key" },
    });
    expect(provider).toBeInstanceOf(CohereEmbeddingProvider);
    expect(provider.name).toBe("cohere");
    expect(provider.dimensions).toBe(1024);
  });

  it("creates OllamaEmbeddingProvider for type 'ollama'", () => {
    const provider = createEmbeddingProvider({
      provider: "ollama",
      ollama: { baseUrl: "http://localhost:11434" },
    });
    expect(provider).toBeInstanceOf(OllamaEmbeddingProvider);
    expect(provider.name).toBe("ollama");
    expect(provider.dimensions).toBe(768);
  });

  it("respects custom dimensions", () => {
    const provider = createEmbeddingProvider({
      provider: "ollama",
      ollama: { baseUrl: "http://localhost:11434", dimensions: 1024 },
    });
    expect(provider.dimensions).toBe(1024);
  });

  it("throws ConfigurationError for missing provider settings", () => {
    expect(() => createEmbeddingProvider({ provider: "cohere" })).toThrow(ConfigurationError);
    expect(() => createEmbeddingProvider({ provider: "ollama" })).toThrow(
      "Ollama config is required when provider is 'ollama'",
    );
  });
});

describe("CohereEmbeddingProvider", () => {
  beforeEach(() => {
    embedMock.mockReset();
    embedMock.mockImplementation(async (request: { texts: string[] }) => ({
      embeddings: { float: request.texts.map(() => [0.1, 0.2]) },
      meta: { billedUnits: { inputTokens: request.texts.length } },
    }));
  });

  it("embeds queries with the search_query input type", async () => {
    const provider = new CohereEmbeddingProvider({ apiKey: "test-cohere-key", dimensions: 2 });

    const result = await provider.embed("what is the speed limit?");

    expect(embedMock).toHaveBeenCalledWith({
      texts: ["what is the speed limit?"],
      model: "embed-v4.0",
      inputType: "search_query",
      embeddingTypes: ["float"],
      outputDimension: 2,
    });
    expect(result).toEqual({
      embeddings: [[0.1, 0.2]],
      model: "embed-v4.0",
      tokensUsed: 1,
      dimensions: 2,
    });
  });

  it("splits document batches at 96 texts and sums billed tokens", async () => {
    const provider = new CohereEmbeddingProvider({ apiKey: "test-cohere-key", dimensions: 2 });
    const texts = Array.from({ length: 100 }, (_, i) => `chunk ${i}`);

    const result = await provider.batchEmbed(texts);

    expect(embedMock).toHaveBeenCalledTimes(2);
    expect(embedMock.mock.calls[0]?.[0]).toMatchObject({ inputType: "search_document" });
    expect(embedMock.mock.calls[1]?.[0].texts).toHaveLength(4);
    expect(result.embeddings).toHaveLength(100);
    expect(result.tokensUsed).toBe(100);
  });

  it("does not retry rejected requests", async () => {
    embedMock.mockRejectedValue(new CohereError({ message: "invalid api token", statusCode: 401 }));
    const provider = new CohereEmbeddingProvider({
      apiKey: "test-cohere-key",
      retry: { maxRetries: 2, baseDelayMs: 1 },
    });

    await expect(provider.embed("hello")).rejects.toMatchObject({
      code: "EXTERNAL_SERVICE_ERROR",
      statusCode: 401,
      service: "cohere",
    });
    expect(embedMock).toHaveBeenCalledTimes(1);
  });

  it("retries upstream failures", async () => {
    embedMock.mockRejectedValueOnce(new CohereError({ message: "overloaded", statusCode: 503 }));
    const provider = new CohereEmbeddingProvider({
      apiKey: "test-cohere-key",
      retry: { maxRetries: 2, baseDelayMs: 1 },
    });

    const result = await provider.embed("hello");

    expect(embedMock).toHaveBeenCalledTimes(2);
    expect(result.embeddings).toEqual([[0.1, 0.2]]);
  });

  it("retries after a rate limit", async () => {
    embedMock.mockRejectedValueOnce(new CohereError({ message: "slow down", statusCode: 429 }));
    const provider = new CohereEmbeddingProvider({
      apiKey: "test-cohere-key",
      retry: { maxRetries: 1, baseDelayMs: 1, maxDelayMs: 1 },
    });

    const result = await provider.embed("hello");

    expect(embedMock).toHaveBeenCalledTimes(2);
    expect(result.embeddings).toEqual([[0.1, 0.2]]);
  });

  it("surfaces a rate limit once the retries run out", async () => {
    embedMock.mockRejectedValue(new CohereError({ message: "slow down", statusCode: 429 }));
    const provider = new CohereEmbeddingProvider({
      apiKey: "test-cohere-key",
      retry: { maxRetries: 1, baseDelayMs: 1, maxDelayMs: 1 },
    });

    await expect(provider.embed("hello")).rejects.toMatchObject({
      code: "RATE_LIMITED",
      statusCode: 429,
      service: "cohere",
    });
    expect(embedMock).toHaveBeenCalledTimes(2);
  });
});

describe("OllamaEmbeddingProvider", () => {
  const fetchMock = vi.fn<typeof fetch>();

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal("fetch", fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("posts texts to /api/embed and returns the vectors", async () => {
    fetchMock.mockResolvedValueOnce(
      jsonResponse({ model: "nomic-embed-text", embeddings: [[1, 0, 0]], prompt_eval_count: 3 }),
    );
    const provider = new OllamaEmbeddingProvider({ baseUrl: "http://localhost:11434/", dimensions: 3 });

    const result = await provider.embed("hello");

    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(url).toBe("http://localhost:11434/api/embed");
    expect(init?.method).toBe("POST");
    expect(init?.body).toBe(JSON.stringify({ model: "nomic-embed-text", input: ["hello"] }));
    expect(result).toEqual({
      embeddings: [[1, 0, 0]],
      model: "nomic-embed-text",
      tokensUsed: 3,
      dimensions: 3,
    });
  });

  it("skips the request for an empty batch", async () => {
    const provider = new OllamaEmbeddingProvider({ baseUrl: "http://localhost:11434" });

    const result = await provider.batchEmbed([]);

    expect(fetchMock).not.toHaveBeenCalled();
    expect(result.embeddings).toEqual([]);
  });

  it("splits document batches at 64 texts and sums evaluated tokens", async () => {
    fetchMock.mockImplementation(async (_url, init) => {
      const body: unknown = JSON.parse(String(init?.body));
      const count = typeof body === "object" && body !== null && "input" in body && Array.isArray(body.input)
        ? body.input.length
        : 0;
      return jsonResponse({ embeddings: Array.from({ length: count }, () => [1, 0]), prompt_eval_count: count });
    });
    const provider = new OllamaEmbeddingProvider({ baseUrl: "http://localhost:11434", dimensions: 2 });
    const texts = Array.from({ length: 70 }, (_, i) => `chunk ${i}`);

    const result = await provider.batchEmbed(texts);

    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(fetchMock.mock.calls[1]?.[1]?.body).toBe(
      JSON.stringify({ model: "nomic-embed-text", input: texts.slice(64) }),
    );
    expect(result.embeddings).toHaveLength(70);
    expect(result.tokensUsed).toBe(70);
  });

  it("retries 5xx responses", async () => {
    fetchMock
      .mockResolvedValueOnce(new Response("busy", { status: 503, statusText: "Service Unavailable" }))
      .mockResolvedValueOnce(jsonResponse({ embeddings: [[0, 1]] }));
    const provider = new OllamaEmbeddingProvider({
      baseUrl: "http://localhost:11434",
      dimensions: 2,
      retry: { maxRetries: 1, baseDelayMs: 1 },
    });

    const result = await provider.embed("hello");

    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(result.embeddings).toEqual([[0, 1]]);
    expect(result.tokensUsed).toBe(0);
  });

  it("surfaces 4xx responses without retrying", async () => {
    fetchMock.mockResolvedValue(new Response("model not found", { status: 404, statusText: "Not Found" }));
    const provider = new OllamaEmbeddingProvider({
      baseUrl: "http://localhost:11434",
      retry: { maxRetries: 3, baseDelayMs: 1 },
    });

    await expect(provider.embed("hello")).rejects.toThrow("Ollama embedding failed: 404 Not Found");
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it("rejects malformed responses", async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ embedding: [1, 2] }));
    const provider = new OllamaEmbeddingProvider({
      baseUrl: "http://localhost:11434",
      retry: { maxRetries: 0 },
    });

    await expect(provider.embed("hello")).rejects.toThrow("Ollama returned a malformed embedding response");
  });

  it("rejects a response with the wrong number of vectors", async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ embeddings: [[1], [2]] }));
    const provider = new OllamaEmbeddingProvider({ baseUrl: "http://localhost:11434" });

    await expect(provider.embed("hello")).rejects.toThrow("Ollama returned 2 embeddings for 1 texts");
  });

  it("reports unhealthy when the server is unreachable", async () => {
    fetchMock.mockRejectedValueOnce(new TypeError("fetch failed"));
    const provider = new OllamaEmbeddingProvider({ baseUrl: "http://localhost:11434" });

    expect(await provider.healthCheck()).toBe(false);
  });
});
