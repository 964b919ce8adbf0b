/**
 * MCP service surface.
 *
 * A fresh MCP `Server` (and a fresh conversation) is created per transport session, so every
 * HTTP client keeps its own history while the index, registry and retrieval tools are shared.
 *
 * Tool contracts:
 *  ask                { query, intent?, scope?, deadline_ms? } -> answer, evidence, tool outcomes
 *  index_documents    { files?, urls? }                        -> per-document ingestion report
 *  remove_documents   { documents }                            -> generation after removal
 *  index_status       {}                                       -> live counters + current generation
 *  list_documents     { status? }                              -> registry records
 *  reset_conversation {}                                       -> clears this session's history
 */
import { z } from "zod";
import { ConversationContext } from "./conversation";
import { errorMessage, isRagError } from "./errors";
import type { Indexer } from "./indexer";
import {
  CallToolRequestSchema,
  ErrorCode,
  ListToolsRequestSchema,
  McpError,
  Server,
} from "./mcp-sdk";
import type { Orchestrator } from "./orchestrator";
import type { DocumentRegistry } from "./registry";
import type { StatusManager } from "./status";
import { CAPABILITY_ORDER } from "./tools/types";
import type { CapabilityTag } from "./types";

const CapabilityTagSchema = z.enum([
  "document-index",
  "fast-factual",
  "deep-contextual",
  "academic",
  "web",
  "fixed-corpus",
] as const satisfies readonly CapabilityTag[]);

const AskArgsSchema = z.object({
  query: z.string().trim().min(1, "Missing query"),
  intent: z.array(CapabilityTagSchema).optional(),
  scope: z.array(z.string()).optional(),
  deadline_ms: z.number().int().positive().optional(),
});

const IndexArgsSchema = z
  .object({
    files: z.array(z.string()).optional(),
    urls: z.array(z.string()).optional(),
  })
  .refine((a) => (a.files?.length ?? 0) + (a.urls?.length ?? 0) > 0, {
    message: "Provide at least one file or URL",
  });

const RemoveArgsSchema = z.object({
  documents: z.array(z.string()).min(1, "Provide at least one document"),
});

const ListArgsSchema = z.object({
  status: z.enum(["unindexed", "indexing", "indexed", "failed"]).optional(),
});

export interface ServerDeps {
  name: string;
  version: string;
  orchestrator: Orchestrator;
  indexer: Indexer;
  registry: DocumentRegistry;
  status: StatusManager;
}

function parseArgs<S extends z.ZodTypeAny>(schema: S, args: unknown): z.infer<S> {
  const parsed = schema.safeParse(args ?? {});
  if (!parsed.success) {
    const message = parsed.error.issues.map((i) => (i.path.length ? `${i.path.join(".")}: ${i.message}` : i.message));
    throw new McpError(ErrorCode.InvalidParams, message.join("; "));
  }
  return parsed.data;
}

function json(value: unknown) {
  return { content: [{ type: "text" as const, text: JSON.stringify(value, null, 2) }] };
}

/**
 * Map core failures onto the protocol: bad requests become `McpError`s, every other core error
 * is reported as a tool error result carrying its code.
 */
function toToolError(e: unknown) {
  if (e instanceof McpError) throw e;
  if (isRagError(e, "InvalidRequest") || isRagError(e, "InvalidConfig")) {
    throw new McpError(ErrorCode.InvalidParams, e.message);
  }
  const code = isRagError(e) ? e.code : "Internal";
  return { ...json({ error: { code, message: errorMessage(e) } }), isError: true };
}

/** Static tool listing (JSON schemas mirror the zod argument schemas above). */
export function toolDefinitions(tools: readonly { tag: CapabilityTag; description: string }[]) {
  const available = tools.map((t) => `${t.tag}: ${t.description}`).join("\n");
  return [
    {
      name: "ask",
      description: `Answer a question from the best matching knowledge sources. Available sources:\n${available}`,
      inputSchema: {
        type: "object" as const,
        properties: {
          query: { type: "string", description: "Natural language question." },
          intent: {
            type: "array",
            description: "Explicit source tags to consult instead of automatic selection.",
            items: { type: "string", enum: [...CAPABILITY_ORDER] },
          },
          scope: {
            type: "array",
            description:
              "Indexed documents (ids, paths or URLs) the document search may use. An empty list excludes all documents.",
            items: { type: "string" },
          },
          deadline_ms: { type: "number", description: "Overall retrieval deadline.", minimum: 1 },
        },
        required: ["query"],
      },
    },
    {
      name: "index_documents",
      description:
        "Build a new document index covering exactly the given files and URLs. Documents not named are excluded from it.",
      inputSchema: {
        type: "object" as const,
        properties: {
          files: { type: "array", items: { type: "string" }, description: "Local file paths." },
          urls: { type: "array", items: { type: "string" }, description: "http(s) URLs." },
        },
      },
    },
    {
      name: "remove_documents",
      description: "Drop documents from the current document index.",
      inputSchema: {
        type: "object" as const,
        properties: {
          documents: { type: "array", items: { type: "string" }, description: "Document ids, paths or URLs." },
        },
        required: ["documents"],
      },
    },
    {
      name: "index_status",
      description: "Indexing progress, embedding cache and current index generation.",
      inputSchema: { type: "object" as const, properties: {} },
    },
    {
      name: "list_documents",
      description: "Known documents and their ingestion status.",
      inputSchema: {
        type: "object" as const,
        properties: {
          status: { type: "string", enum: ["unindexed", "indexing", "indexed", "failed"] },
        },
      },
    },
    {
      name: "reset_conversation",
      description: "Forget the conversation history of this session.",
      inputSchema: { type: "object" as const, properties: {} },
    },
  ];
}

/** Factory producing one MCP server (with its own conversation) per transport session. */
export function createServerFactory(deps: ServerDeps): () => Server {
  const { orchestrator, indexer, registry, status } = deps;

  return () => {
    const server = new Server({ name: deps.name, version: deps.version }, { capabilities: { tools: {} } });
    const conversation = new ConversationContext();

    server.setRequestHandler(ListToolsRequestSchema, async () => ({
      tools: toolDefinitions(orchestrator.listTools()),
    }));

    server.setRequestHandler(CallToolRequestSchema, async (req) => {
      const args = req.params.arguments;
      switch (req.params.name) {
        case "ask": {
          const a = parseArgs(AskArgsSchema, args);
          try {
            return json(
              await orchestrator.ask(a.query, conversation, {
                intent: a.intent,
                scope: a.scope,
                deadlineMs: a.deadline_ms,
              }),
            );
          } catch (e) {
            return toToolError(e);
          }
        }
        case "index_documents": {
          const a = parseArgs(IndexArgsSchema, args);
          try {
            return json(await indexer.indexSelection({ files: a.files, urls: a.urls }));
          } catch (e) {
            return toToolError(e);
          }
        }
        case "remove_documents": {
          const a = parseArgs(RemoveArgsSchema, args);
          try {
            const gen = await indexer.removeDocuments(a.documents);
            return json({
              generationId: gen?.id ?? null,
              documents: gen ? [...gen.documentIds].sort() : [],
            });
          } catch (e) {
            return toToolError(e);
          }
        }
        case "index_status": {
          const gen = indexer.current();
          return json({
            ...status.getStatus(),
            generation: gen
              ? {
                  id: gen.id,
                  documents: gen.documentIds.size,
                  chunks: gen.index.size,
                  dimension: gen.index.dimension ?? null,
                  createdAt: gen.createdAt,
                }
              : null,
          });
        }
        case "list_documents": {
          const a = parseArgs(ListArgsSchema, args);
          return json({ documents: registry.list(a.status) });
        }
        case "reset_conversation": {
          const turns = conversation.size;
          conversation.reset();
          return json({ cleared: turns });
        }
        default:
          throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${req.params.name}`);
      }
    });

    return server;
  };
}
