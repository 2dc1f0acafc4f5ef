#!/usr/bin/env node
import "dotenv/config";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { createPipelineApp } from "@pipelines/agents";
import { registerPipelineTools } from "./tools/pipelines.js";

const app = await createPipelineApp();

const server = new McpServer({
  name: "finance-call-pipelines",
  version: "0.1.0",
});

registerPipelineTools(server, app);

const shutdown = async () => {
  await server.close();
  await app.close();
  process.exit(0);
};

process.on("SIGINT", () => {
  shutdown().catch((err: unknown) => {
    app.logger.error("Shutdown failed", { error: err instanceof Error ? err.message : String(err) });
    process.exit(1);
  });
});

const transport = new StdioServerTransport();
await server.connect(transport);
