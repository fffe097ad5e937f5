#!/usr/bin/env node

import * as dotenv from "dotenv";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";

dotenv.config();

import { getAuditLogger } from "./audit/AuditLogger.js";
import { getEnvironmentManager } from "./config/EnvironmentManager.js";
import { createServer } from "./server.js";
import { createTools } from "./tools/registry.js";
import { ToolRunner } from "./tools/ToolRunner.js";

async function runServer() {
  const environmentManager = getEnvironmentManager();
  const runner = new ToolRunner({
    environments: environmentManager,
    provider: environmentManager,
    auditLogger: getAuditLogger(),
  });

  const server = createServer({
    tools: createTools(),
    runner,
    readOnly: process.env.READONLY === "true",
  });

  const shutdown = () => {
    environmentManager
      .closeAll()
      .then(() => process.exit(0))
      .catch((error) => {
        console.error("Error closing connection pools:", error);
        process.exit(1);
      });
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);

  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error(`mssql-routine-mcp running on stdio (session ${runner.sessionId})`);
}

runServer().catch((error) => {
  console.error("Fatal error running server:", error);
  process.exit(1);
});
