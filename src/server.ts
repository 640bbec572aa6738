import { APP_VERSION } from "./config";
import { CallToolRequestSchema, ListToolsRequestSchema, Server } from "./mcp-sdk";
import { callTool, toolDefinitions, type ToolContext } from "./tools";

/**
 * Construct an MCP server exposing the retrieval tools over `ctx`.
 *
 * Tool results are returned as a single text content block: plain text for
 * read_document, pretty-printed JSON otherwise. The index itself is shared
 * through `ctx.indexer`, so a server instance is cheap to create.
 */
export function createServer(ctx: ToolContext): Server {
  const server = new Server(
    { name: "lexical-rag-server", version: APP_VERSION },
    { capabilities: { tools: {} } },
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: toolDefinitions(ctx.folderName),
  }));

  server.setRequestHandler(CallToolRequestSchema, async (req) => {
    const result = await callTool(ctx, req.params.name, req.params.arguments ?? {});
    const text = typeof result === "string" ? result : JSON.stringify(result, null, 2);
    return { content: [{ type: "text" as const, text }] };
  });

  return server;
}
