import type { Chunk, SourceDocument } from "./types";

export interface ChunkerOptions {
  /** Maximum characters per chunk (default 800). */
  chunkSize?: number;
  /** Characters shared by consecutive chunks (default 100). Must be < chunkSize. */
  chunkOverlap?: number;
}

// Boundary classes, strongest first. Each match marks the cut position right
// after the separator so the separator stays with the preceding chunk.
const BOUNDARIES: RegExp[] = [/\n[ \t]*\n/g, /\n/g, /[.!?]["')\]]?\s/g, /\s/g];
const NON_SPACE = /\S/g;

/**
 * Splits document text into bounded, overlapping windows.
 *
 * Every chunk is a verbatim slice of the input (`text.slice(start, end)`), so
 * spans stay meaningful and the document can be rebuilt by dropping the first
 * `chunkOverlap` characters of every chunk after the first. A whitespace run
 * wider than the overlap is skipped rather than emitted, so the chunks on
 * either side of it do not overlap. Pure: the same text and options always
 * give the same chunks.
 */
export class Chunker {
  private readonly chunkSize: number;
  private readonly chunkOverlap: number;

  public constructor(opts: ChunkerOptions = {}) {
    this.chunkSize = Math.max(1, Math.floor(opts.chunkSize ?? 800));
    let overlap = Math.max(0, Math.floor(opts.chunkOverlap ?? 100));
    // Forward progress needs overlap < size.
    if (overlap >= this.chunkSize) {
      const fallback = Math.max(0, Math.floor(this.chunkSize * 0.15));
      console.error(
        `[RAG] Provided chunkOverlap (=${overlap}) >= chunkSize (=${this.chunkSize}). Using fallback overlap ${fallback}.`,
      );
      overlap = fallback;
    }
    this.chunkOverlap = overlap;
  }

  public getChunkSize(): number {
    return this.chunkSize;
  }

  public getChunkOverlap(): number {
    return this.chunkOverlap;
  }

  /** Chunk a document; chunks inherit its id, source label and metadata. */
  public chunk(doc: SourceDocument): Chunk[] {
    return this.split(doc.text).map(([start, end], index) => ({
      id: `${doc.id}#${index}`,
      documentId: doc.id,
      index,
      text: doc.text.slice(start, end),
      start,
      end,
      source: doc.source,
      metadata: doc.metadata,
    }));
  }

  /**
   * Compute `[start, end)` windows over `text`. Empty or whitespace-only input
   * yields no windows; input that fits yields exactly one. Every window holds
   * at least one non-whitespace character.
   */
  public split(text: string): Array<[number, number]> {
    if (!text.trim()) return [];
    if (text.length <= this.chunkSize) return [[0, text.length]];

    const spans: Array<[number, number]> = [];
    let start = 0;
    for (;;) {
      NON_SPACE.lastIndex = start;
      const next = NON_SPACE.exec(text);
      if (next === null) break;
      // Jump over whitespace the overlap cannot reach.
      if (next.index > start + this.chunkOverlap) start = next.index - this.chunkOverlap;
      const limit = start + this.chunkSize;
      if (limit >= text.length) {
        spans.push([start, text.length]);
        break;
      }
      // The cut must land beyond start + overlap, otherwise the next window
      // would not advance.
      const end = this.findCut(text, start, start + this.chunkOverlap + 1, limit);
      spans.push([start, end]);
      start = end - this.chunkOverlap;
    }
    return spans;
  }

  /** Latest natural boundary in [min, max], falling back to a hard cut at max. */
  private findCut(text: string, from: number, min: number, max: number): number {
    const window = text.slice(from, max);
    for (const pattern of BOUNDARIES) {
      let best = -1;
      pattern.lastIndex = 0;
      let m: RegExpExecArray | null;
      while ((m = pattern.exec(window)) !== null) {
        const cut = from + m.index + m[0].length;
        if (cut >= min && cut <= max) best = cut;
        if (m[0].length === 0) pattern.lastIndex++;
      }
      if (best !== -1) return best;
    }
    return max;
  }
}
