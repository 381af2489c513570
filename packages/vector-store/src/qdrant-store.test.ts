import { describe, it, expect, vi, beforeEach } from "vitest";
import { ConfigurationError, IndexCorruptionError, InvalidArgumentError } from "@docquery/errors";
import { QdrantVectorStore, pointIdFor } from "./qdrant-store.js";
import { createVectorStore } from "./factory.js";
import { FileVectorStore } from "./file-store.js";

const client = vi.hoisted(() => ({
  collectionExists: vi.fn(),
  getCollection: vi.fn(),
  createCollection: vi.fn(),
  createPayloadIndex: vi.fn(),
  upsert: vi.fn(),
  search: vi.fn(),
  count: vi.fn(),
  delete: vi.fn(),
  deleteCollection: vi.fn(),
  getCollections: vi.fn(),
}));

vi.mock("@qdrant/js-client-rest", () => ({
  QdrantClient: class {
    constructor() {
      return client;
    }
  },
}));

const CHUNK_ID = "0123456789abcdef0123456789abcdef0123456789abcdef0123456789abcdef";

function existingCollection(size: number): void {
  client.collectionExists.mockResolvedValue({ exists: true });
  client.getCollection.mockResolvedValue({ config: { params: { vectors: { size, distance: "Cosine" } } } });
}

describe("pointIdFor", () => {
  it("lays the first 128 bits of a chunk id out as a UUID", () => {
    expect(pointIdFor(CHUNK_ID)).toBe("01234567-89ab-cdef-0123-456789abcdef");
  });
});

describe("QdrantVectorStore", () => {
  beforeEach(() => {
    for (const fn of Object.values(client)) fn.mockReset();
  });

  it("creates a cosine collection with a sourceId index", async () => {
    client.collectionExists.mockResolvedValue({ exists: false });
    const store = new QdrantVectorStore("http://localhost:6333");

    await store.ensureCollection("docs", 3);

    expect(client.createCollection).toHaveBeenCalledWith("docs", {
      vectors: { size: 3, distance: "Cosine" },
    });
    expect(client.createPayloadIndex).toHaveBeenCalledWith("docs", {
      field_name: "sourceId",
      field_schema: "keyword",
    });
  });

  it("rejects an existing collection with other dimensions", async () => {
    existingCollection(4);
    const store = new QdrantVectorStore("http://localhost:6333");

    await expect(store.ensureCollection("docs", 3)).rejects.toBeInstanceOf(IndexCorruptionError);
    expect(client.createCollection).not.toHaveBeenCalled();
  });

  it("upserts points keyed by UUID with the chunk id in the payload", async () => {
    existingCollection(2);
    const store = new QdrantVectorStore("http://localhost:6333");

    await store.upsert("docs", [
      { id: CHUNK_ID, sourceId: "a.txt", vector: [1, 0], content: "hello", metadata: { index: 0 } },
    ]);

    expect(client.upsert).toHaveBeenCalledWith("docs", {
      wait: true,
      points: [
        {
          id: "01234567-89ab-cdef-0123-456789abcdef",
          vector: [1, 0],
          payload: { index: 0, chunkId: CHUNK_ID, sourceId: "a.txt", content: "hello" },
        },
      ],
    });
  });

  it("rejects records of the wrong dimension", async () => {
    existingCollection(2);
    const store = new QdrantVectorStore("http://localhost:6333");

    await expect(
      store.upsert("docs", [{ id: "x", sourceId: "a.txt", vector: [1], content: "", metadata: {} }]),
    ).rejects.toBeInstanceOf(ConfigurationError);
  });

  it("maps search hits back to chunk ids and sorts ties by id", async () => {
    existingCollection(2);
    client.search.mockResolvedValue([
      { id: "p2", score: 0.5, payload: { chunkId: "b", sourceId: "a.txt", content: "B", index: 1 } },
      { id: "p1", score: 0.5, payload: { chunkId: "a", sourceId: "a.txt", content: "A", index: 0 } },
    ]);
    const store = new QdrantVectorStore("http://localhost:6333");

    const results = await store.search("docs", { vector: [1, 0], topK: 2 });

    expect(client.search).toHaveBeenCalledWith("docs", {
      vector: [1, 0],
      limit: 2,
      score_threshold: undefined,
      with_payload: true,
    });
    expect(results).toEqual([
      { id: "a", score: 0.5, sourceId: "a.txt", content: "A", metadata: { index: 0 } },
      { id: "b", score: 0.5, sourceId: "a.txt", content: "B", metadata: { index: 1 } },
    ]);
  });

  it("returns nothing for a missing collection", async () => {
    client.collectionExists.mockResolvedValue({ exists: false });
    const store = new QdrantVectorStore("http://localhost:6333");

    expect(await store.search("docs", { vector: [1, 0], topK: 2 })).toEqual([]);
    expect(client.search).not.toHaveBeenCalled();
  });

  it("validates topK before calling the server", async () => {
    const store = new QdrantVectorStore("http://localhost:6333");

    await expect(store.search("docs", { vector: [1, 0], topK: 0 })).rejects.toBeInstanceOf(InvalidArgumentError);
    expect(client.collectionExists).not.toHaveBeenCalled();
  });

  it("deletes by source and reports how many points went", async () => {
    client.collectionExists.mockResolvedValue({ exists: true });
    client.count.mockResolvedValue({ count: 3 });
    const store = new QdrantVectorStore("http://localhost:6333");

    const removed = await store.deleteBySource("docs", "a.txt");

    const filter = { must: [{ key: "sourceId", match: { value: "a.txt" } }] };
    expect(removed).toBe(3);
    expect(client.count).toHaveBeenCalledWith("docs", { filter, exact: true });
    expect(client.delete).toHaveBeenCalledWith("docs", { wait: true, filter });
  });

  it("is unhealthy when the server cannot be reached", async () => {
    client.getCollections.mockRejectedValue(new Error("ECONNREFUSED"));
    const store = new QdrantVectorStore("http://localhost:6333");

    expect(await store.healthCheck()).toBe(false);
  });
});

describe("createVectorStore", () => {
  it("creates the file store by default type", () => {
    expect(createVectorStore({ type: "file", root: "/tmp/index" })).toBeInstanceOf(FileVectorStore);
  });

  it("creates a Qdrant store when a URL is given", () => {
    expect(
      createVectorStore({ type: "qdrant", root: "/tmp/index", qdrantUrl: "http://localhost:6333" }),
    ).toBeInstanceOf(QdrantVectorStore);
  });

  it("requires a URL for Qdrant", () => {
    expect(() => createVectorStore({ type: "qdrant", root: "/tmp/index" })).toThrow("qdrantUrl is required");
  });
});
