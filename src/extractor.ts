/**
 * Plain-text extraction for uploaded files.
 *
 * Supported: .txt, .csv, .pdf, .docx. Whatever comes back is handed to the
 * ingestion pipeline as-is; an empty string simply means "zero chunks".
 * Parser failures are reported as ExtractionError.
 */
import path from "node:path";
import { parse as parseCsv } from "csv-parse/sync";
import mammoth from "mammoth";
import { PDFParse } from "pdf-parse";
import { ExtractionError, ValidationError, describeError } from "./errors";

export const ALLOWED_EXTENSIONS = [".pdf", ".docx", ".csv", ".txt"] as const;
export type SupportedExtension = (typeof ALLOWED_EXTENSIONS)[number];

/** CSV rows beyond this are summarized rather than indexed. */
export const MAX_CSV_ROWS = 100;

export interface ExtractedText {
  text: string;
  fileType: SupportedExtension;
  /** Page count for PDFs. */
  pages?: number;
}

function isSupported(ext: string): ext is SupportedExtension {
  return (ALLOWED_EXTENSIONS as readonly string[]).includes(ext);
}

/** Lower-cased extension of `filename`, validated against {@link ALLOWED_EXTENSIONS}. */
export function fileTypeOf(filename: string): SupportedExtension {
  const ext = path.extname(filename).toLowerCase();
  if (!isSupported(ext)) {
    throw new ValidationError(
      `File type '${ext}' not supported. Use: ${ALLOWED_EXTENSIONS.join(", ")}`,
    );
  }
  return ext;
}

/** UTF-8 when valid (BOM stripped), otherwise latin1, which accepts any byte sequence. */
export function decodeText(data: Buffer): string {
  try {
    return new TextDecoder("utf-8", { fatal: true, ignoreBOM: false }).decode(data);
  } catch {
    return data.toString("latin1");
  }
}

/**
 * Flatten a CSV into one line per row: a header line, then
 * `Row n: col: value, ...` with empty cells skipped.
 */
export function csvToText(raw: string, maxRows = MAX_CSV_ROWS): string {
  const parsed: unknown = parseCsv(raw, {
    skip_empty_lines: true,
    relax_column_count: true,
    relax_quotes: true,
    bom: true,
  });
  if (!Array.isArray(parsed) || parsed.length === 0) return "";
  const rows = parsed.map((r: unknown) =>
    Array.isArray(r) ? r.map((cell: unknown) => String(cell ?? "").trim()) : [],
  );
  const [headers, ...body] = rows;
  const lines = [`CSV Headers: ${headers.join(", ")}`];
  body.slice(0, maxRows).forEach((row, i) => {
    const cells = row
      .map((value, c) => (value ? `${headers[c] || `column ${c + 1}`}: ${value}` : ""))
      .filter(Boolean);
    if (cells.length) lines.push(`Row ${i + 1}: ${cells.join(", ")}`);
  });
  if (body.length > maxRows) lines.push(`... and ${body.length - maxRows} more rows`);
  return lines.join("\n");
}

async function pdfToText(data: Buffer): Promise<{ text: string; pages: number }> {
  const parser = new PDFParse({ data });
  try {
    const result = await parser.getText();
    return { text: result.text || "", pages: result.pages.length };
  } finally {
    await parser.destroy();
  }
}

async function docxToText(data: Buffer): Promise<string> {
  const result = await mammoth.extractRawText({ buffer: data });
  return result.value || "";
}

/**
 * Extract plain text from an uploaded file.
 *
 * @throws {ValidationError} Unsupported extension.
 * @throws {ExtractionError} The parser rejected the file.
 */
export async function extractText(data: Buffer, filename: string): Promise<ExtractedText> {
  const fileType = fileTypeOf(filename);
  try {
    if (fileType === ".txt") return { text: decodeText(data), fileType };
    if (fileType === ".csv") return { text: csvToText(decodeText(data)), fileType };
    if (fileType === ".pdf") {
      const { text, pages } = await pdfToText(data);
      return { text, fileType, pages };
    }
    return { text: await docxToText(data), fileType };
  } catch (e) {
    console.error(`[RAG] Error parsing file ${filename}:`, e);
    throw new ExtractionError(`Could not read ${path.basename(filename)}: ${describeError(e)}`, {
      cause: e,
    });
  }
}
