import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { loadConfig } from "@/lib/config";
import { SERVER_NAME, SERVER_VERSION } from "@/lib/constants";
import { createServer } from "@/server";

async function main(): Promise<void> {
  const config = loadConfig();
  const server = createServer(config);
  await server.connect(new StdioServerTransport());
  // stdout carries the protocol; logs go to stderr
  console.error(
    `[Server] ${SERVER_NAME} ${SERVER_VERSION} ready on stdio ` +
      `(maxInputLength=${config.maxInputLength}, contextWindow=${config.contextWindow})`
  );
}

main().catch((error) => {
  console.error("[Server] Fatal error:", error);
  process.exit(1);
});
