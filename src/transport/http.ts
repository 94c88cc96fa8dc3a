/**
 * REST transport.
 *
 * Endpoints:
 *  - POST   /upload      : multipart `file` (or several under `files`); text is
 *                          extracted and ingested. 400 on unsupported/empty input.
 *  - POST   /import-cms  : JSON `{ content, source?, metadata?, id? }`, already plain text.
 *  - POST   /chat        : JSON `{ query, top_k?, sources? }` → `{ answer, sources }`.
 *  - GET    /health      : status snapshot (liveness only).
 *  - DELETE /clear       : drop every indexed point.
 *
 * Errors are always `{ detail }` with the status code of the mapped AppError;
 * unknown exceptions become a generic 500.
 *
 * Keep this file free of pipeline logic; it only translates HTTP to service calls.
 */
import express from "express";
import multer from "multer";
import { z } from "zod";
import { cmsDocument, fileDocument } from "../documents";
import { ValidationError, describeError, toErrorResponse } from "../errors";
import { extractText, fileTypeOf } from "../extractor";
import { summarize } from "../ingestion";
import type { Services } from "../services";
import type { Citation, IngestResult, SourceDocument } from "../types";

/** 4xx status carried by body-parser and other http-errors style errors. */
function clientErrorStatus(err: unknown): number | undefined {
  if (!(err instanceof Error) || !("status" in err)) return undefined;
  const status = err.status;
  return typeof status === "number" && status >= 400 && status < 500 ? status : undefined;
}

const CmsContentSchema = z.object({
  content: z.string({ required_error: "content is required" }),
  source: z.string().trim().min(1).default("cms"),
  metadata: z.record(z.unknown()).default({}),
  id: z.string().optional(),
});

const ChatRequestSchema = z.object({
  query: z.string({ required_error: "query is required" }),
  top_k: z.number().int().min(1).max(50).optional(),
  sources: z.array(z.string()).optional(),
});

/** Parse `body` with `schema`, turning the first issue into a ValidationError. */
export function parseBody<T extends z.ZodTypeAny>(schema: T, body: unknown): z.infer<T> {
  const parsed = schema.safeParse(body ?? {});
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue?.path.length ? `${issue.path.join(".")}: ` : "";
    throw new ValidationError(`Invalid request: ${where}${issue?.message ?? "malformed body"}`);
  }
  return parsed.data;
}

/** Scores are rounded only at the wire boundary. */
function toWireCitation(c: Citation) {
  return { text: c.text, source: c.source, score: Math.round(c.score * 1000) / 1000 };
}

type AsyncHandler = (req: express.Request, res: express.Response) => Promise<void>;

/** Express 4 does not forward rejected promises; route them to the error handler. */
function route(handler: AsyncHandler): express.RequestHandler {
  return (req, res, next) => {
    handler(req, res).catch(next);
  };
}

function uploadedFiles(req: express.Request): Express.Multer.File[] {
  const files = req.files;
  if (!files) return [];
  if (Array.isArray(files)) return files;
  return [...(files.file ?? []), ...(files.files ?? [])];
}

/** Build the express app. Separate from {@link startHttpTransport} so tests can mount it. */
export function createHttpApp(services: Services): express.Express {
  const { ingestion, query, store, status, config } = services;
  const app = express();
  app.use(express.json({ limit: "10mb" }));
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: config.MAX_UPLOAD_MB * 1024 * 1024 },
  });

  app.get("/", (_req, res) => {
    res.json({ message: "Document Chatbot API is running" });
  });

  app.post(
    "/upload",
    upload.fields([{ name: "file" }, { name: "files" }]),
    route(async (req, res) => {
      const files = uploadedFiles(req);
      if (files.length === 0) throw new ValidationError("No file uploaded");

      if (files.length === 1) {
        const [file] = files;
        const filename = file.originalname || "unknown_file";
        console.error(`[RAG] Processing upload: ${filename}`);
        fileTypeOf(filename);
        if (file.size === 0) throw new ValidationError("Uploaded file is empty");
        const { text, fileType, pages } = await extractText(file.buffer, filename);
        const result = await ingestion.ingest(
          fileDocument(filename, text, fileType, pages ? { pages } : {}),
        );
        if (result.status === "failed") {
          res.status(500).json({ detail: result.error ?? "Database storage failed." });
          return;
        }
        res.json({
          status: "success",
          filename,
          chunks: result.chunks,
          ...(result.status === "empty" ? { message: "No content extracted." } : {}),
        });
        return;
      }

      // Several files: each one succeeds or fails on its own.
      const docs: SourceDocument[] = [];
      const rejected: IngestResult[] = [];
      for (const file of files) {
        const filename = file.originalname || "unknown_file";
        try {
          if (file.size === 0) throw new ValidationError("Uploaded file is empty");
          const { text, fileType, pages } = await extractText(file.buffer, filename);
          docs.push(fileDocument(filename, text, fileType, pages ? { pages } : {}));
        } catch (e) {
          rejected.push({
            documentId: filename,
            source: filename,
            chunks: 0,
            status: "failed",
            error: toErrorResponse(e).detail,
          });
        }
      }
      const batch = await ingestion.ingestMany(docs);
      const summary = summarize([...batch.documents, ...rejected]);
      res.json({
        status: summary.status,
        chunks: summary.chunks,
        files: summary.documents.map((d) => ({
          filename: d.source,
          status: d.status,
          chunks: d.chunks,
          ...(d.error ? { error: d.error } : {}),
        })),
      });
    }),
  );

  app.post(
    "/import-cms",
    route(async (req, res) => {
      const body = parseBody(CmsContentSchema, req.body);
      console.error(`[RAG] Importing CMS content from: ${body.source}`);
      const result = await ingestion.ingest(cmsDocument(body));
      if (result.status === "failed") {
        res.status(500).json({ detail: result.error ?? "Failed to store CMS content in database" });
        return;
      }
      res.json({
        status: "success",
        source: body.source,
        chunks: result.chunks,
        message:
          result.status === "empty" ? "No content to import" : "CMS content imported successfully",
      });
    }),
  );

  app.post(
    "/chat",
    route(async (req, res) => {
      const body = parseBody(ChatRequestSchema, req.body);
      const answer = await query.answerQuery(body.query, {
        topK: body.top_k,
        sources: body.sources,
      });
      res.json({ answer: answer.answer, sources: answer.sources.map(toWireCitation) });
    }),
  );

  app.get("/health", (_req, res) => {
    res.json({ status: "healthy", ...status.getStatus() });
  });

  app.delete(
    "/clear",
    route(async (_req, res) => {
      await store.deleteCollection(config.COLLECTION_NAME);
      res.json({ status: "success", message: "Database cleared" });
    }),
  );

  // Error mapping: AppError → its status; multer / JSON syntax → 400; other body-parser 4xx keep
  // their status; rest → 500.
  app.use(
    (err: unknown, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
      if (err instanceof multer.MulterError) {
        res.status(400).json({ detail: err.message });
        return;
      }
      if (err instanceof SyntaxError) {
        res.status(400).json({ detail: "Malformed JSON body" });
        return;
      }
      const clientStatus = clientErrorStatus(err);
      if (clientStatus !== undefined && err instanceof Error) {
        res
          .status(clientStatus)
          .json({ detail: clientStatus === 413 ? "Request body too large" : err.message });
        return;
      }
      const mapped = toErrorResponse(err);
      if (mapped.statusCode >= 500) console.error(`[RAG] Request failed: ${describeError(err)}`);
      res.status(mapped.statusCode).json({ detail: mapped.detail });
    },
  );

  return app;
}

/** Listen on the configured host/port. Resolves once bound. */
export async function startHttpTransport(services: Services): Promise<void> {
  const app = createHttpApp(services);
  const { HOST, PORT } = services.config;
  await new Promise<void>((resolve, reject) => {
    const server = app.listen(PORT, HOST, () => {
      console.error(`[RAG] HTTP API listening at http://${HOST}:${PORT}`);
      resolve();
    });
    server.on("error", reject);
  });
}
