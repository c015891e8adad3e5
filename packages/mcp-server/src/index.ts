#!/usr/bin/env node
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { closeFilingVectorIndex, createLogger, getFilingVectorIndex } from "@filing-vectors/core";
import { registerFilingTools } from "./tools/filings.js";

const log = createLogger("mcp-server");

const server = new McpServer({
  name: "filing-vectors",
  version: "0.1.0",
});

registerFilingTools(server, getFilingVectorIndex());

async function shutdown(signal: string) {
  log.info(`${signal} received, closing vector store`);
  try {
    await closeFilingVectorIndex();
  } catch (err: unknown) {
    log.error("error closing vector store", err);
  }
  process.exit(0);
}

process.once("SIGINT", () => void shutdown("SIGINT"));
process.once("SIGTERM", () => void shutdown("SIGTERM"));

const transport = new StdioServerTransport();
await server.connect(transport);
