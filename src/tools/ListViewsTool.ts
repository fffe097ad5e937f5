import type { Tool } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { ok } from "../engine/OperationResult.js";
import { SqlTool, databaseProperty, type ToolContext } from "./SqlTool.js";

const LIST_VIEWS_QUERY = "SELECT TABLE_SCHEMA, TABLE_NAME FROM INFORMATION_SCHEMA.VIEWS ORDER BY TABLE_SCHEMA, TABLE_NAME";

const argsSchema = z.object({
  database: z.string().min(1).optional(),
});

type ListViewsArgs = z.infer<typeof argsSchema>;

export class ListViewsTool extends SqlTool<ListViewsArgs> {
  name = "list_views";
  description = "Lists all views in the SQL Database as 'schema.view' names.";
  annotations = {
    title: "List Views",
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

  protected async execute({ database }: ListViewsArgs, context: ToolContext) {
    const { recordsets } = await this.withSession(context, database, (session) => session.query(LIST_VIEWS_QUERY));
    return ok((recordsets[0] ?? []).map((row) => `${row.TABLE_SCHEMA}.${row.TABLE_NAME}`));
  }
}
