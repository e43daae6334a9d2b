import { Server, StdioServerTransport } from "../mcp-sdk";

/**
 * Start the MCP stdio transport. Logs go to stderr; stdout carries protocol
 * frames only.
 *
 * @param createServer Factory returning a new, unconnected MCP Server instance.
 */
export async function startStdioTransport(createServer: () => Server) {
  const server = createServer();
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error("[Policy] Listening on stdio");
}
