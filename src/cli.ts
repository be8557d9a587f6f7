#!/usr/bin/env node
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { createMcpServer } from "./mcp/index.js";

// stdout belongs to the transport; diagnostics go to stderr.
const server = createMcpServer({ dataDir: process.argv[2] });
const transport = new StdioServerTransport();

server.connect(transport).catch((err: unknown) => {
  process.stderr.write(`day-attachments: ${err instanceof Error ? err.message : String(err)}\n`);
  process.exitCode = 1;
});
