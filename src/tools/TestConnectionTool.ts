import type { Tool } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { ok } from "../engine/OperationResult.js";
import { SqlTool, type ToolContext } from "./SqlTool.js";

const SERVER_INFO_QUERY = `
  SELECT
    SERVERPROPERTY('ProductVersion') AS version,
    SERVERPROPERTY('ProductLevel') AS productLevel,
    SERVERPROPERTY('Edition') AS edition,
    SERVERPROPERTY('EngineEdition') AS engineEdition,
    SERVERPROPERTY('ServerName') AS serverName
`;

const ENGINE_EDITIONS: Record<number, string> = {
  1: "Personal/Desktop Engine",
  2: "Standard",
  3: "Enterprise",
  4: "Express",
  5: "Azure SQL Database",
  6: "Azure Synapse Analytics",
  8: "Azure SQL Managed Instance",
  9: "Azure SQL Edge",
  11: "Azure Synapse Serverless",
};

export function engineEditionName(edition: unknown): string {
  const name = typeof edition === "number" ? ENGINE_EDITIONS[edition] : undefined;
  return name ?? `Unknown (${String(edition)})`;
}

const argsSchema = z.object({
  verbose: z.boolean().default(false),
});

type TestConnectionArgs = z.infer<typeof argsSchema>;

export class TestConnectionTool extends SqlTool<TestConnectionArgs> {
  name = "test_connection";
  description = "Tests connectivity to a database environment and returns status, latency, and basic server info.";
  annotations = {
    title: "Test Connection",
    readOnlyHint: true,
    idempotentHint: true,
    destructiveHint: false,
  };
  inputSchema: Tool["inputSchema"] = {
    type: "object",
    properties: {
      verbose: {
        type: "boolean",
        description: "If true, returns additional server info (version, edition, etc.)",
      },
    },
    required: [],
  };
  protected argsSchema = argsSchema;

  protected async execute({ verbose }: TestConnectionArgs, context: ToolContext) {
    const startTime = Date.now();

    return this.withSession(context, undefined, async (session) => {
      const connectionMs = Date.now() - startTime;

      const queryStart = Date.now();
      await session.query("SELECT 1 AS connected");
      const queryMs = Date.now() - queryStart;

      const serverInfo: Record<string, unknown> = {
        environment: context.environment,
        database: session.database,
      };

      if (verbose) {
        const { recordsets } = await session.query(SERVER_INFO_QUERY);
        const info = recordsets[0]?.[0];
        if (info) {
          Object.assign(serverInfo, {
            version: info.version,
            productLevel: info.productLevel,
            edition: info.edition,
            engineEdition: engineEditionName(info.engineEdition),
            serverName: info.serverName,
          });
        }
      }

      return ok({
        connected: true,
        latency: { connectionMs, queryMs, totalMs: Date.now() - startTime },
        serverInfo,
      });
    });
  }
}
