import type { Tool } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { ok } from "../engine/OperationResult.js";
import { SqlTool, databaseProperty, type ToolContext } from "./SqlTool.js";

const LIST_FUNCTIONS_QUERY = "SELECT ROUTINE_SCHEMA, ROUTINE_NAME FROM INFORMATION_SCHEMA.ROUTINES WHERE ROUTINE_TYPE = 'FUNCTION' ORDER BY ROUTINE_SCHEMA, ROUTINE_NAME";

const argsSchema = z.object({
  database: z.string().min(1).optional(),
});

type ListFunctionsArgs = z.infer<typeof argsSchema>;

export class ListFunctionsTool extends SqlTool<ListFunctionsArgs> {
  name = "list_functions";
  description = "Lists all scalar and table-valued functions in the SQL Database as 'schema.function' names.";
  annotations = {
    title: "List Functions",
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

  protected async execute({ database }: ListFunctionsArgs, context: ToolContext) {
    const { recordsets } = await this.withSession(context, database, (session) => session.query(LIST_FUNCTIONS_QUERY));
    return ok((recordsets[0] ?? []).map((row) => `${row.ROUTINE_SCHEMA}.${row.ROUTINE_NAME}`));
  }
}
