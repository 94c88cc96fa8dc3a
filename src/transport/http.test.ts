import { once } from "node:events";
import type { Server } from "node:http";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

vi.mock("@xenova/transformers", () => ({ pipeline: vi.fn(), env: {} }));

import { getConfig } from "../config";
import { createServices, type Services } from "../services";
import { StatusManager } from "../status";
import { MemoryVectorStore } from "../store/memory";
import { FALLBACK_PREFIX, NO_INFORMATION_ANSWER } from "../synthesizer";
import { VocabEmbedder } from "../test-helpers";
import { createHttpApp } from "./http";

const PARIS = "Paris is the capital of France. It is known for the Eiffel Tower.";

describe("HTTP API", () => {
  let services: Services;
  let embedder: VocabEmbedder;
  let server: Server;
  let base: string;

  beforeEach(async () => {
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    embedder = new VocabEmbedder();
    services = createServices(getConfig({ VECTOR_STORE: "memory", GENERATOR_MODEL: "none" }), {
      embedder,
      store: new MemoryVectorStore(),
      generator: null,
      status: new StatusManager(),
    });
    server = createHttpApp(services).listen(0, "127.0.0.1");
    await once(server, "listening");
    const address = server.address();
    if (!address || typeof address === "string") throw new Error("Server is not listening on a port");
    base = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    server.closeAllConnections();
    server.close();
    await once(server, "close");
  });

  const postJson = (path: string, body: unknown) =>
    fetch(`${base}${path}`, {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: JSON.stringify(body),
    });

  const upload = (files: Array<[string, string]>, field = "file") => {
    const form = new FormData();
    for (const [name, content] of files) form.append(field, new Blob([content], { type: "text/plain" }), name);
    return fetch(`${base}/upload`, { method: "POST", body: form });
  };

  it("imports CMS content and answers from it", async () => {
    const imported = await postJson("/import-cms", { content: PARIS, source: "travel-cms" });
    expect(imported.status).toBe(200);
    expect(await imported.json()).toEqual({
      status: "success",
      source: "travel-cms",
      chunks: 1,
      message: "CMS content imported successfully",
    });

    const chat = await postJson("/chat", { query: "What is the capital of France?" });
    expect(chat.status).toBe(200);
    expect(await chat.json()).toEqual({
      answer: `${FALLBACK_PREFIX}${PARIS}`,
      sources: [{ text: PARIS, source: "travel-cms", score: 0.693 }],
    });
  });

  it("answers with the fixed message when nothing is indexed", async () => {
    const chat = await postJson("/chat", { query: "Anything there?" });
    expect(await chat.json()).toEqual({ answer: NO_INFORMATION_ANSWER, sources: [] });
  });

  it("rejects empty and missing queries with 400", async () => {
    const blank = await postJson("/chat", { query: "   " });
    expect(blank.status).toBe(400);
    expect(await blank.json()).toEqual({ detail: "Query cannot be empty" });

    const missing = await postJson("/chat", {});
    expect(missing.status).toBe(400);
    expect(await missing.json()).toEqual({ detail: "Invalid request: query: query is required" });
  });

  it("rejects malformed JSON with 400", async () => {
    const res = await fetch(`${base}/chat`, {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: "{not json",
    });
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ detail: "Malformed JSON body" });
  });

  it("rejects an oversized JSON body with 413", async () => {
    const res = await postJson("/chat", { query: "x".repeat(11 * 1024 * 1024) });
    expect(res.status).toBe(413);
    expect(await res.json()).toEqual({ detail: "Request body too large" });
  });

  it("ingests an uploaded text file", async () => {
    const res = await upload([["notes.txt", "Owls hunt at night."]]);
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ status: "success", filename: "notes.txt", chunks: 1 });
    expect(services.status.getStatus().ingestion).toMatchObject({ documentsIndexed: 1, chunksIndexed: 1 });
  });

  it("reports whitespace-only files as zero chunks", async () => {
    const res = await upload([["blank.txt", "   \n  "]]);
    expect(await res.json()).toEqual({
      status: "success",
      filename: "blank.txt",
      chunks: 0,
      message: "No content extracted.",
    });
  });

  it("rejects unsupported, empty and missing uploads with 400", async () => {
    const exe = await upload([["tool.exe", "MZ"]]);
    expect(exe.status).toBe(400);
    expect(await exe.json()).toEqual({ detail: "File type '.exe' not supported. Use: .pdf, .docx, .csv, .txt" });

    const empty = await upload([["empty.txt", ""]]);
    expect(empty.status).toBe(400);
    expect(await empty.json()).toEqual({ detail: "Uploaded file is empty" });

    const none = await postJson("/upload", {});
    expect(none.status).toBe(400);
    expect(await none.json()).toEqual({ detail: "No file uploaded" });
  });

  it("reports each file of a multi-file upload on its own", async () => {
    const res = await upload(
      [
        ["a.txt", "Apples grow on trees."],
        ["b.exe", "MZ"],
      ],
      "files",
    );
    expect(await res.json()).toEqual({
      status: "partial",
      chunks: 1,
      files: [
        { filename: "a.txt", status: "indexed", chunks: 1 },
        {
          filename: "b.exe",
          status: "failed",
          chunks: 0,
          error: "File type '.exe' not supported. Use: .pdf, .docx, .csv, .txt",
        },
      ],
    });
  });

  it("returns 500 with a detail when indexing fails", async () => {
    embedder.failOn(() => true);
    const res = await postJson("/import-cms", { content: PARIS, source: "travel-cms" });
    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({ detail: "Embedding failed: test failure" });
  });

  it("reports health and clears the index", async () => {
    await postJson("/import-cms", { content: PARIS });
    const health = await fetch(`${base}/health`);
    expect(await health.json()).toMatchObject({
      status: "healthy",
      service: "document-chatbot",
      embeddingModel: "test-vocab",
      generatorModel: "",
      vectorStore: "memory",
      collection: "documents",
      ingestion: { documentsIndexed: 1, chunksIndexed: 1 },
    });

    const cleared = await fetch(`${base}/clear`, { method: "DELETE" });
    expect(await cleared.json()).toEqual({ status: "success", message: "Database cleared" });
    const chat = await postJson("/chat", { query: "What is the capital of France?" });
    expect(await chat.json()).toEqual({ answer: NO_INFORMATION_ANSWER, sources: [] });
  });
});
