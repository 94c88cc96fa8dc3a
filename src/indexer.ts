import fs from "node:fs/promises";
import path from "node:path";
import fg from "fast-glob";
import { fileDocument } from "./documents";
import { ALLOWED_EXTENSIONS, extractText } from "./extractor";
import { describeError } from "./errors";
import { summarize, type IngestionPipeline } from "./ingestion";
import type { BatchSummary, IngestResult, SourceDocument } from "./types";

export interface DirectoryIndexerOptions {
  /** Directory scanned recursively for supported files. */
  root: string;
  pipeline: IngestionPipeline;
  /** Folder names pruned from the scan. */
  excludedFolders?: string[];
  verbose?: boolean;
}

const DEFAULT_EXCLUDED = ["node_modules", ".git", ".cache", "dist", "build"];

/**
 * Seeds the index from a directory at start-up. Every supported file becomes
 * one document keyed by its path relative to the root, so re-seeding the same
 * tree replaces the previous points instead of duplicating them.
 */
export class DirectoryIndexer {
  private readonly root: string;
  private readonly pipeline: IngestionPipeline;
  private readonly excludedFolders: string[];
  private readonly verbose: boolean;

  public constructor(opts: DirectoryIndexerOptions) {
    this.root = path.resolve(opts.root);
    this.pipeline = opts.pipeline;
    this.excludedFolders = opts.excludedFolders ?? DEFAULT_EXCLUDED;
    this.verbose = !!opts.verbose;
  }

  /** Relative, forward-slash paths of all supported files under the root, sorted. */
  public async discoverFiles(): Promise<string[]> {
    const patterns = ALLOWED_EXTENSIONS.map((ext) => `**/*${ext}`);
    const files = await fg(patterns, {
      cwd: this.root,
      dot: false,
      onlyFiles: true,
      caseSensitiveMatch: false,
      ignore: this.excludedFolders.map((f) => `**/${f}/**`),
    });
    return files.sort();
  }

  /** Extract and ingest every discovered file. Unreadable files count as failed documents. */
  public async build(): Promise<BatchSummary> {
    const files = await this.discoverFiles();
    console.error(`[RAG] Seeding index from ${this.root} (${files.length} files)`);
    const docs: SourceDocument[] = [];
    const unreadable: IngestResult[] = [];
    for (const rel of files) {
      try {
        const data = await fs.readFile(path.join(this.root, rel));
        const { text, fileType, pages } = await extractText(data, rel);
        docs.push(fileDocument(rel, text, fileType, pages ? { pages } : {}));
        if (this.verbose) console.error(`[RAG][verbose] Extracted ${rel} (${text.length} chars)`);
      } catch (e) {
        console.error(`[RAG] Skipping ${rel}: ${describeError(e)}`);
        unreadable.push({ documentId: rel, source: rel, chunks: 0, status: "failed", error: describeError(e) });
      }
    }
    const summary = await this.pipeline.ingestMany(docs);
    const result = summarize([...summary.documents, ...unreadable]);
    console.error(
      `[RAG] Seed complete: ${result.chunks} chunks from ${result.documents.length - result.failed} files, ${result.failed} failed`,
    );
    return result;
  }
}
