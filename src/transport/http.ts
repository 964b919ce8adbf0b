/**
 * Streamable HTTP transport.
 *
 * Session model: a client opens a session with a JSON-RPC `initialize` request to POST /mcp
 * without an `mcp-session-id` header. A new transport and MCP server (with its own conversation)
 * are created and the generated session id is returned in the response headers. Every later
 * request of that session carries the header and reuses the same pair. Closing the transport
 * evicts the session.
 *
 * Endpoints:
 *  - POST   /mcp    JSON-RPC requests (initial + subsequent).
 *  - GET    /mcp    Streaming channel of an existing session.
 *  - DELETE /mcp    Session teardown.
 *  - GET    /health Server and indexing status.
 *
 * Environment variables:
 *  MCP_PORT (default 3000), HOST (default 127.0.0.1), ALLOWED_HOSTS (comma list of host[:port]),
 *  ENABLE_DNS_REBINDING_PROTECTION (set to "false" to disable).
 */
import express from "express";
import { randomUUID } from "node:crypto";
import { type Server, StreamableHTTPServerTransport, isInitializeRequest } from "../mcp-sdk";
import type { StatusManager } from "../status";

/**
 * Bootstraps the Express HTTP server and the per-session MCP transport layer.
 *
 * @param createServer Factory producing a new, unconnected MCP `Server` instance for each session.
 * @param status Source of the `/health` payload.
 * @returns Resolves once the HTTP listener is bound.
 */
export async function startHttpTransport(createServer: () => Server, status: StatusManager) {
  status.markTransport("http");
  const app = express();
  app.use(express.json({ limit: "2mb" }));

  const port = Number(process.env.MCP_PORT ?? 3000);
  const host = (process.env.HOST ?? "127.0.0.1").trim();
  const defaultAllowedHosts = Array.from(
    new Set(["127.0.0.1", `127.0.0.1:${port}`, "localhost", `localhost:${port}`, host, `${host}:${port}`]),
  );

  /** Active session transports mapped by session id. */
  const transports = new Map<string, StreamableHTTPServerTransport>();

  const openSession = async (): Promise<StreamableHTTPServerTransport> => {
    const transport: StreamableHTTPServerTransport = new StreamableHTTPServerTransport({
      sessionIdGenerator: () => randomUUID(),
      onsessioninitialized: (sid: string) => {
        transports.set(sid, transport);
      },
      enableDnsRebindingProtection: (process.env.ENABLE_DNS_REBINDING_PROTECTION ?? "true") !== "false",
      allowedHosts: (process.env.ALLOWED_HOSTS ?? defaultAllowedHosts.join(","))
        .split(",")
        .map((s) => s.trim())
        .filter(Boolean),
    });

    const server = createServer();
    let closing = false;
    transport.onclose = () => {
      if (closing) return;
      closing = true;
      if (transport.sessionId) transports.delete(transport.sessionId);
      // server.close() closes the transport again, which would re-enter this handler.
      transport.onclose = undefined;
      server.close().catch((e: unknown) => console.error("[RAG] Error closing MCP session:", e));
    };
    await server.connect(transport);
    return transport;
  };

  const sessionOf = (req: express.Request): StreamableHTTPServerTransport | undefined => {
    const header = req.headers["mcp-session-id"];
    const sessionId = Array.isArray(header) ? header[0] : header;
    return sessionId ? transports.get(sessionId) : undefined;
  };

  app.post("/mcp", async (req: express.Request, res: express.Response) => {
    try {
      let transport = sessionOf(req);
      if (!transport && !req.headers["mcp-session-id"] && isInitializeRequest(req.body)) {
        transport = await openSession();
      }
      if (!transport) {
        res.status(400).json({
          jsonrpc: "2.0",
          error: { code: -32000, message: "Bad Request: No valid session ID provided" },
          id: null,
        });
        return;
      }
      await transport.handleRequest(req, res, req.body);
    } catch (err) {
      console.error("[RAG] HTTP POST error:", err);
      if (!res.headersSent) {
        res.status(500).json({
          jsonrpc: "2.0",
          error: { code: -32603, message: "Internal server error" },
          id: null,
        });
      }
    }
  });

  /** GET and DELETE /mcp only make sense for an existing session. */
  const handleSessionRequest = async (req: express.Request, res: express.Response) => {
    const transport = sessionOf(req);
    if (!transport) {
      res.status(400).send("Invalid or missing session ID");
      return;
    }
    try {
      await transport.handleRequest(req, res);
    } catch (err) {
      console.error(`[RAG] HTTP ${req.method} error:`, err);
      if (!res.headersSent) res.status(500).send("Internal server error");
    }
  };

  app.get("/mcp", handleSessionRequest);
  app.delete("/mcp", handleSessionRequest);

  app.get("/health", (_req, res) => {
    res.json(status.getStatus());
  });

  await new Promise<void>((resolve) => {
    app.listen(port, host, () => {
      console.error(`[RAG] Streamable HTTP listening at http://${host}:${port}/mcp`);
      resolve();
    });
  });
}
