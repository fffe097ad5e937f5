import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { CallToolRequestSchema, ListToolsRequestSchema } from "@modelcontextprotocol/sdk/types.js";
import { jsonReplacer } from "./audit/AuditLogger.js";
import type { OperationResult } from "./engine/OperationResult.js";
import { exposedTools } from "./tools/registry.js";
import type { SqlTool } from "./tools/SqlTool.js";
import type { ToolRunner } from "./tools/ToolRunner.js";

export interface ServerOptions {
  tools: SqlTool<unknown>[];
  runner: ToolRunner;
  readOnly: boolean;
}

export function toCallToolResult(result: OperationResult) {
  return {
    content: [{ type: "text" as const, text: JSON.stringify(result, jsonReplacer, 2) }],
    isError: !result.success,
  };
}

export function createServer({ tools, runner, readOnly }: ServerOptions): Server {
  const server = new Server(
    {
      name: "mssql-routine-mcp",
      version: "0.1.0",
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  const exposed = exposedTools(tools, readOnly);
  const registry = new Map(exposed.map((tool) => [tool.name, tool]));

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: exposed.map((tool) => tool.definition()),
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;
    const tool = registry.get(name);
    if (!tool) {
      return {
        content: [{ type: "text" as const, text: `Unknown tool: ${name}` }],
        isError: true,
      };
    }
    return toCallToolResult(await runner.run(tool, args));
  });

  return server;
}
