import type { Tool } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { ok } from "../engine/OperationResult.js";
import { textBinding } from "../engine/ParameterBinder.js";
import { AccessDeniedError } from "../errors/ToolError.js";
import { SqlTool, type ToolContext } from "./SqlTool.js";

const DATABASE_STATES = ["ONLINE", "OFFLINE", "RESTORING", "RECOVERING", "SUSPECT", "ALL"] as const;

const argsSchema = z.object({
  includeSystemDbs: z.boolean().default(false),
  stateFilter: z.enum(DATABASE_STATES).default("ONLINE"),
});

type ListDatabasesArgs = z.infer<typeof argsSchema>;

export class ListDatabasesTool extends SqlTool<ListDatabasesArgs> {
  name = "list_databases";
  description = "Lists databases on the SQL Server instance. Requires server-level access. Filtered by environment policies.";
  annotations = {
    title: "List Databases",
    readOnlyHint: true,
    idempotentHint: true,
    destructiveHint: false,
  };
  inputSchema: Tool["inputSchema"] = {
    type: "object",
    properties: {
      includeSystemDbs: {
        type: "boolean",
        description: "Include system databases (master, msdb, model, tempdb). Default: false",
      },
      stateFilter: {
        type: "string",
        enum: [...DATABASE_STATES],
        description: "Filter by database state. Default: ONLINE",
      },
    },
    required: [],
  };
  protected argsSchema = argsSchema;

  protected async execute({ includeSystemDbs, stateFilter }: ListDatabasesArgs, context: ToolContext) {
    if (context.accessLevel !== "server") {
      throw new AccessDeniedError(
        `Environment '${context.environment}' has database-level access only. ` +
          `list_databases requires server-level access (accessLevel: "server").`
      );
    }

    const bindings = stateFilter === "ALL" ? [] : [textBinding("state", stateFilter)];
    const query = `
      SELECT
        d.name AS database_name,
        d.database_id,
        d.state_desc AS state,
        d.recovery_model_desc AS recovery_model,
        d.compatibility_level,
        d.collation_name,
        d.create_date,
        d.is_read_only
      FROM sys.databases d
      WHERE 1=1
      ${bindings.length > 0 ? "AND d.state_desc = @state" : ""}
      ${includeSystemDbs ? "" : "AND d.database_id > 4"}
      ORDER BY d.name
    `;

    const { recordsets } = await this.withSession(context, undefined, (session) => session.query(query, bindings));
    const databases = (recordsets[0] ?? []).map((row) => {
      const check = context.isDatabaseAllowed?.(String(row.database_name)) ?? { allowed: true };
      return { ...row, accessible: check.allowed, restriction_reason: check.reason };
    });

    return ok(databases);
  }
}
