/**
 * MCP server exposing heading numbering and contents generation for .ipynb
 * files. Paths resolve against the server's working directory.
 */

import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from "@modelcontextprotocol/sdk/types.js";
import { PACKAGE_NAME, VERSION } from "./config.js";
import type { ToolHandlers, ToolResult } from "./handler-types.js";
import { handlers as outlineHandlers } from "./handlers/outline.js";
import { toolSchemas } from "./schemas.js";
import { errorResult } from "./tool-helpers.js";

export function createServer(handlers: ToolHandlers = outlineHandlers): Server {
  const server = new Server(
    {
      name: PACKAGE_NAME,
      version: VERSION,
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return { tools: toolSchemas };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request): Promise<ToolResult> => {
    const { name, arguments: args } = request.params;

    try {
      const handler = handlers[name];
      if (!handler) {
        throw new Error(`Unknown tool: ${name}`);
      }
      return await handler(args ?? {});
    } catch (error) {
      console.error(`Tool ${name} failed:`, error instanceof Error ? error.message : error);
      return errorResult(error);
    }
  });

  return server;
}
