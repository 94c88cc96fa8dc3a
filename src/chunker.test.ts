import { describe, expect, it, vi } from "vitest";
import { Chunker } from "./chunker";
import type { SourceDocument } from "./types";

function doc(text: string, id = "doc-1"): SourceDocument {
  return { id, source: "notes.txt", text, metadata: { type: "file" } };
}

describe("Chunker", () => {
  it("returns no chunks for empty or whitespace-only text", () => {
    const chunker = new Chunker();
    expect(chunker.chunk(doc(""))).toEqual([]);
    expect(chunker.chunk(doc(" \n\t  "))).toEqual([]);
  });

  it("keeps short text as a single verbatim chunk", () => {
    const chunks = new Chunker({ chunkSize: 20, chunkOverlap: 5 }).chunk(doc("  hello  "));
    expect(chunks).toHaveLength(1);
    expect(chunks[0]).toMatchObject({ id: "doc-1#0", index: 0, text: "  hello  ", start: 0, end: 9 });
  });

  it("prefers sentence boundaries and overlaps consecutive chunks", () => {
    const text = "One two. Three four. Five six seven.";
    const chunks = new Chunker({ chunkSize: 20, chunkOverlap: 4 }).chunk(doc(text));
    expect(chunks.map((c) => c.text)).toEqual(["One two. ", "wo. Three four. ", "ur. Five six seven."]);
    expect(chunks.map((c) => [c.start, c.end])).toEqual([
      [0, 9],
      [5, 21],
      [17, 36],
    ]);
  });

  it("hard-cuts text without any boundary", () => {
    const spans = new Chunker({ chunkSize: 20, chunkOverlap: 5 }).split("a".repeat(50));
    expect(spans).toEqual([
      [0, 20],
      [15, 35],
      [30, 50],
    ]);
  });

  it("bounds length, overlaps exactly and reconstructs the input", () => {
    const paragraph = (n: number) =>
      `Paragraph ${n} talks about topic ${n}. It has a second sentence! And a third one?`;
    const text = Array.from({ length: 12 }, (_, i) => paragraph(i)).join("\n\n");
    const chunker = new Chunker({ chunkSize: 120, chunkOverlap: 20 });
    const chunks = chunker.chunk(doc(text));

    expect(chunks.length).toBeGreaterThan(1);
    let rebuilt = "";
    chunks.forEach((c, i) => {
      expect(c.text.length).toBeLessThanOrEqual(120);
      expect(c.text).toBe(text.slice(c.start, c.end));
      expect(c.id).toBe(`doc-1#${i}`);
      if (i > 0) expect(c.start).toBe(chunks[i - 1].end - 20);
      rebuilt += i === 0 ? c.text : c.text.slice(20);
    });
    expect(rebuilt).toBe(text);
    expect(chunks[chunks.length - 1].end).toBe(text.length);
  });

  it("skips a whitespace run longer than a chunk", () => {
    const text = `Intro paragraph.${" ".repeat(3000)}Closing paragraph.`;
    const chunks = new Chunker({ chunkSize: 800, chunkOverlap: 100 }).chunk(doc(text));
    expect(chunks.map((c) => [c.start, c.end])).toEqual([
      [0, 800],
      [2916, 3034],
    ]);
    expect(chunks.map((c) => c.text.trim())).toEqual(["Intro paragraph.", "Closing paragraph."]);
    for (const c of chunks) expect(c.text).toBe(text.slice(c.start, c.end));
  });

  it("never starts a window inside leading whitespace wider than the overlap", () => {
    const text = `${" ".repeat(50)}${"word ".repeat(10)}`;
    const spans = new Chunker({ chunkSize: 30, chunkOverlap: 5 }).split(text);
    expect(spans[0]).toEqual([45, 75]);
    for (const [start, end] of spans) expect(text.slice(start, end).trim()).not.toBe("");
  });

  it("is deterministic", () => {
    const text = "Alpha beta gamma. ".repeat(40);
    const a = new Chunker({ chunkSize: 100, chunkOverlap: 10 }).chunk(doc(text));
    const b = new Chunker({ chunkSize: 100, chunkOverlap: 10 }).chunk(doc(text));
    expect(a).toEqual(b);
  });

  it("copies the document source and metadata onto every chunk", () => {
    const chunks = new Chunker({ chunkSize: 50, chunkOverlap: 5 }).chunk(doc("word ".repeat(40)));
    for (const c of chunks) {
      expect(c.source).toBe("notes.txt");
      expect(c.documentId).toBe("doc-1");
      expect(c.metadata).toEqual({ type: "file" });
    }
  });

  it("falls back to 15% overlap when overlap is not smaller than the size", () => {
    const spy = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const chunker = new Chunker({ chunkSize: 100, chunkOverlap: 100 });
    expect(chunker.getChunkOverlap()).toBe(15);
    expect(spy).toHaveBeenCalledOnce();
    spy.mockRestore();
  });
});
