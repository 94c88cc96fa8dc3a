import { z } from "zod";
import { APP_VERSION } from "./config";
import { cmsDocument } from "./documents";
import { AppError, ValidationError, toErrorResponse } from "./errors";
import {
  CallToolRequestSchema,
  ErrorCode,
  ListToolsRequestSchema,
  McpError,
  Server,
  type CallToolResult,
} from "./mcp-sdk";
import type { Services } from "./services";

const AskArgs = z.object({
  query: z.string(),
  top_k: z.number().int().min(1).max(50).optional(),
});

const ImportArgs = z.object({
  content: z.string(),
  source: z.string().trim().min(1).default("cms"),
  metadata: z.record(z.unknown()).default({}),
  id: z.string().optional(),
});

function parseArgs<T extends z.ZodTypeAny>(schema: T, args: unknown): z.infer<T> {
  const parsed = schema.safeParse(args ?? {});
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new McpError(
      ErrorCode.InvalidParams,
      `${issue?.path.join(".") || "arguments"}: ${issue?.message ?? "invalid"}`,
    );
  }
  return parsed.data;
}

function textResult(value: unknown): CallToolResult {
  return { content: [{ type: "text", text: JSON.stringify(value, null, 2) }] };
}

/**
 * MCP server exposing the pipelines as tools. One instance per transport
 * session; all sessions share the same services.
 *
 * Tools:
 *  ask             { query, top_k? }                      → { answer, sources }
 *  import_content  { content, source?, metadata?, id? }   → ingest result
 *  collection_info {}                                     → collection + server status
 */
export function createMcpServer(services: Services): Server {
  const server = new Server(
    { name: "docchat-rag-server", version: APP_VERSION },
    { capabilities: { tools: {} } },
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: [
      {
        name: "ask",
        description:
          "Answer a question from the indexed documents and return the answer with cited excerpts (text, source, score).",
        inputSchema: {
          type: "object",
          properties: {
            query: { type: "string", description: "Natural language question." },
            top_k: {
              type: "number",
              description: "Maximum number of excerpts to retrieve (1-50).",
              minimum: 1,
              maximum: 50,
            },
          },
          required: ["query"],
        },
      },
      {
        name: "import_content",
        description:
          "Index a block of plain text (e.g. CMS content) under a source label. Re-importing the same id replaces it.",
        inputSchema: {
          type: "object",
          properties: {
            content: { type: "string", description: "Plain text to index." },
            source: { type: "string", description: "Label shown in citations (default 'cms')." },
            metadata: { type: "object", description: "Arbitrary metadata stored with each chunk." },
            id: { type: "string", description: "Document id (default 'cms:<source>')." },
          },
          required: ["content"],
        },
      },
      {
        name: "collection_info",
        description: "Report vector collection size and server status.",
        inputSchema: { type: "object", properties: {} },
      },
    ],
  }));

  server.setRequestHandler(CallToolRequestSchema, async (req): Promise<CallToolResult> => {
    try {
      switch (req.params.name) {
        case "ask": {
          const { query, top_k } = parseArgs(AskArgs, req.params.arguments);
          const answer = await services.query.answerQuery(query, { topK: top_k });
          return textResult({ answer: answer.answer, sources: answer.sources });
        }
        case "import_content": {
          const args = parseArgs(ImportArgs, req.params.arguments);
          const result = await services.ingestion.ingest(cmsDocument(args));
          return { ...textResult(result), isError: result.status === "failed" };
        }
        case "collection_info": {
          const info = await services.store.info(services.config.COLLECTION_NAME);
          return textResult({ collection: info, status: services.status.getStatus() });
        }
        default:
          throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${req.params.name}`);
      }
    } catch (e) {
      if (e instanceof ValidationError) throw new McpError(ErrorCode.InvalidParams, e.message);
      if (e instanceof AppError) {
        return { content: [{ type: "text", text: toErrorResponse(e).detail }], isError: true };
      }
      throw e;
    }
  });

  return server;
}
