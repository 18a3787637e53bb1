import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from "@modelcontextprotocol/sdk/types.js";
import {
  closeServerContext,
  createServerContext,
  type ServerContext,
} from "./context.js";
import type { ToolRegistry } from "./tool-registry.js";
import { createToolRegistry } from "./tools.js";
import { logInfo, logError, getErrorMessage } from "../core/logging.js";

// Server configuration
const SERVER_NAME = "grant-screening-mcp";
const SERVER_VERSION = "1.0.0";

function createServer(registry: ToolRegistry, ctx: ServerContext): Server {
  const server = new Server(
    {
      name: SERVER_NAME,
      version: SERVER_VERSION,
    },
    {
      capabilities: {
        tools: {},
      },
    },
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: registry.listTools(),
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;
    try {
      return await registry.callTool(name, args, ctx);
    } catch (error) {
      return {
        content: [{ type: "text" as const, text: `Error: ${getErrorMessage(error)}` }],
        isError: true,
      };
    }
  });

  return server;
}

// Start server
export async function startServer(): Promise<void> {
  const ctx = await createServerContext();
  const server = createServer(createToolRegistry(), ctx);

  const shutdown = (signal: string) => {
    logInfo(`Received ${signal}, shutting down...`);
    closeServerContext(ctx);
    process.exit(0);
  };
  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));

  const transport = new StdioServerTransport();
  await server.connect(transport);
  logInfo(`${SERVER_NAME} v${SERVER_VERSION} running on stdio`);
}

startServer().catch((err) => {
  logError("Fatal:", getErrorMessage(err));
  process.exit(1);
});
