import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from "@modelcontextprotocol/sdk/types.js";
import type { ServerConfig } from "@/lib/config";
import { SERVER_NAME, SERVER_VERSION } from "@/lib/constants";
import { handleToolCall, listTools } from "./tools";

/**
 * Build the tool server. Transport is attached by the caller so the
 * server can be exercised without stdio.
 */
export function createServer(config: ServerConfig): Server {
  const server = new Server(
    { name: SERVER_NAME, version: SERVER_VERSION },
    { capabilities: { tools: {} } }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: listTools(),
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request) =>
    handleToolCall(request.params.name, request.params.arguments, config)
  );

  return server;
}
