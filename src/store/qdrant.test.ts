import { beforeEach, describe, expect, it, vi } from "vitest";

const client = vi.hoisted(() => ({
  collectionExists: vi.fn(),
  getCollection: vi.fn(),
  createCollection: vi.fn(),
  upsert: vi.fn(),
  search: vi.fn(),
  deleteCollection: vi.fn(),
}));

vi.mock("@qdrant/js-client-rest", () => ({
  QdrantClient: class {
    constructor() {
      return client;
    }
  },
}));

import { StoreError } from "../errors";
import type { IndexedPoint } from "../types";
import { QdrantVectorStore, pointIdFor } from "./qdrant";

const UUID = /^[0-9a-f]{8}-[0-9a-f]{4}-5[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;

function point(id: string, vector: number[]): IndexedPoint {
  return {
    id,
    vector,
    payload: { text: "Paris is nice.", source: "travel.txt", documentId: "travel.txt", index: 0, metadata: { lang: "en" } },
  };
}

describe("pointIdFor", () => {
  it("maps a chunk id onto a stable name-based UUID", () => {
    expect(pointIdFor("a.txt#0")).toMatch(UUID);
    expect(pointIdFor("a.txt#0")).toBe(pointIdFor("a.txt#0"));
    expect(pointIdFor("a.txt#0")).not.toBe(pointIdFor("a.txt#1"));
  });
});

describe("QdrantVectorStore", () => {
  let store: QdrantVectorStore;

  beforeEach(() => {
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    for (const fn of Object.values(client)) fn.mockReset();
    store = new QdrantVectorStore({ url: "http://qdrant.test:6333" });
  });

  it("creates a missing collection once", async () => {
    client.collectionExists.mockResolvedValue({ exists: false });
    client.createCollection.mockResolvedValue(true);
    await store.ensureCollection("documents", 3);
    await store.ensureCollection("documents", 3);
    expect(client.collectionExists).toHaveBeenCalledOnce();
    expect(client.createCollection).toHaveBeenCalledWith("documents", {
      vectors: { size: 3, distance: "Cosine" },
    });
  });

  it("refuses an existing collection with another dimension", async () => {
    client.collectionExists.mockResolvedValue({ exists: true });
    client.getCollection.mockResolvedValue({
      status: "green",
      points_count: 10,
      config: { params: { vectors: { size: 384, distance: "Cosine" } } },
    });
    const err = await store.ensureCollection("documents", 3).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(StoreError);
    expect(err).toHaveProperty("message", "Collection documents has dimension 384, expected 3");
  });

  it("retries ensureCollection after a connection failure", async () => {
    client.collectionExists.mockRejectedValueOnce(new Error("ECONNREFUSED"));
    await expect(store.ensureCollection("documents", 3)).rejects.toThrow(
      "Could not ensure collection documents: ECONNREFUSED",
    );
    client.collectionExists.mockResolvedValue({ exists: false });
    await store.ensureCollection("documents", 3);
    expect(client.createCollection).toHaveBeenCalledOnce();
  });

  it("upserts points with UUID ids and snake_case payloads", async () => {
    client.upsert.mockResolvedValue({ status: "completed" });
    await store.upsert("documents", [point("travel.txt#0", [0.1, 0.2, 0.3])]);
    expect(client.upsert).toHaveBeenCalledWith("documents", {
      wait: true,
      points: [
        {
          id: pointIdFor("travel.txt#0"),
          vector: [0.1, 0.2, 0.3],
          payload: {
            chunk_id: "travel.txt#0",
            text: "Paris is nice.",
            source: "travel.txt",
            document_id: "travel.txt",
            chunk_index: 0,
            metadata: { lang: "en" },
          },
        },
      ],
    });
  });

  it("rejects mixed dimensions before calling the server", async () => {
    await expect(
      store.upsert("documents", [point("a#0", [1, 0]), point("a#1", [1, 0, 0])]),
    ).rejects.toBeInstanceOf(StoreError);
    expect(client.upsert).not.toHaveBeenCalled();
  });

  it("maps search hits back to chunks", async () => {
    client.search.mockResolvedValue([
      {
        id: pointIdFor("travel.txt#2"),
        version: 1,
        score: 0.82,
        payload: {
          chunk_id: "travel.txt#2",
          text: "Paris is nice.",
          source: "travel.txt",
          document_id: "travel.txt",
          chunk_index: 2,
          metadata: {},
        },
      },
      { id: "no-payload", version: 1, score: 0.5, payload: null },
    ]);
    const hits = await store.search("documents", [1, 0, 0], 5, 0.3);
    expect(client.search).toHaveBeenCalledWith("documents", {
      vector: [1, 0, 0],
      limit: 5,
      score_threshold: 0.3,
      with_payload: true,
    });
    expect(hits).toEqual([
      {
        id: "travel.txt#2",
        score: 0.82,
        payload: { text: "Paris is nice.", source: "travel.txt", documentId: "travel.txt", index: 2, metadata: {} },
      },
    ]);
  });

  it("treats a missing collection as no hits and other failures as StoreError", async () => {
    client.search.mockRejectedValueOnce({ status: 404 });
    expect(await store.search("documents", [1, 0, 0], 5, 0.3)).toEqual([]);
    client.search.mockRejectedValueOnce(new Error("socket hang up"));
    await expect(store.search("documents", [1, 0, 0], 5, 0.3)).rejects.toThrow(
      "Search failed: socket hang up",
    );
  });

  it("reports collection info", async () => {
    client.collectionExists.mockResolvedValue({ exists: true });
    client.getCollection.mockResolvedValue({
      status: "green",
      points_count: 7,
      config: { params: { vectors: { size: 3, distance: "Cosine" } } },
    });
    expect(await store.info("documents")).toEqual({
      name: "documents",
      points: 7,
      status: "green",
      dimension: 3,
    });
  });
});
