import { Server, StdioServerTransport } from "../mcp-sdk";

/**
 * Connect a freshly created MCP server over stdio. stdout carries the protocol,
 * so all logging in this process goes to stderr.
 *
 * @param createServer Factory returning a new, unconnected MCP Server instance.
 * @returns The connected server, for shutdown.
 */
export async function startStdioTransport(createServer: () => Server): Promise<Server> {
  const server = createServer();
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error(`[RAG] MCP server listening on stdio.`);
  return server;
}
