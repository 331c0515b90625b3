#!/usr/bin/env node
/**
 * Stdio entry point for the MCP server.
 */

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { createServer } from "./server.js";

async function main() {
  const server = createServer();
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error(`Notebook outline MCP server started in ${process.cwd()}`);
}

main().catch((error) => {
  console.error("Fatal error:", error);
  process.exit(1);
});
