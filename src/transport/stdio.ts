import { type Server, StdioServerTransport } from "../mcp-sdk";
import type { StatusManager } from "../status";

/**
 * Serve one MCP session over stdin/stdout. The process hosts a single conversation, which ends
 * when the client closes the pipe.
 */
export async function startStdioTransport(createServer: () => Server, status: StatusManager): Promise<void> {
  status.markTransport("stdio");
  const server = createServer();
  server.onclose = () => {
    console.error("[RAG] stdio session closed");
  };
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error("[RAG] MCP server connected over stdio");
}
