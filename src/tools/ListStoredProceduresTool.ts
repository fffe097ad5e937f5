import type { Tool } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { ok } from "../engine/OperationResult.js";
import { SqlTool, databaseProperty, type ToolContext } from "./SqlTool.js";

const LIST_PROCEDURES_QUERY = "SELECT ROUTINE_SCHEMA, ROUTINE_NAME FROM INFORMATION_SCHEMA.ROUTINES WHERE ROUTINE_TYPE = 'PROCEDURE' ORDER BY ROUTINE_SCHEMA, ROUTINE_NAME";

const argsSchema = z.object({
  database: z.string().min(1).optional(),
});

type ListStoredProceduresArgs = z.infer<typeof argsSchema>;

export class ListStoredProceduresTool extends SqlTool<ListStoredProceduresArgs> {
  name = "list_stored_procedures";
  description = "Lists all stored procedures in the SQL Database as 'schema.procedure' names.";
  annotations = {
    title: "List Stored Procedures",
    readOnlyHint: true,
    idempotentHint: true,
    destructiveHint: false,
  };
  inputSchema: Tool["inputSchema"] = {
    type: "object",
    properties: {
      database: databaseProperty,
    },
    required: [],
  };
  protected argsSchema = argsSchema;

  protected async execute({ database }: ListStoredProceduresArgs, context: ToolContext) {
    const { recordsets } = await this.withSession(context, database, (session) => session.query(LIST_PROCEDURES_QUERY));
    return ok((recordsets[0] ?? []).map((row) => `${row.ROUTINE_SCHEMA}.${row.ROUTINE_NAME}`));
  }
}
