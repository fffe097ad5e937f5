import type { Tool } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { parseQualifiedName, quoteIdentifier, renderRoutine } from "../engine/BatchBuilder.js";
import { written } from "../engine/OperationResult.js";
import { valueBinding } from "../engine/ParameterBinder.js";
import type { BindVariable } from "../engine/types.js";
import { InvalidArgumentsError } from "../errors/ToolError.js";
import { SqlTool, databaseProperty, type ToolContext } from "./SqlTool.js";

const argsSchema = z.object({
  tableName: z.string().min(1),
  updates: z.record(z.unknown()),
  whereClause: z.string(),
  database: z.string().min(1).optional(),
});

type UpdateDataArgs = z.infer<typeof argsSchema>;

/** SET values are bound; the WHERE clause is taken as written and may not be blank. */
export function buildUpdate(
  tableName: string,
  updates: Record<string, unknown>,
  whereClause: string
): { text: string; bindings: BindVariable[] } {
  if (whereClause.trim() === "") {
    throw new InvalidArgumentsError(
      "WHERE clause is required for security reasons. Use 'WHERE 1=1' to update all rows (not recommended)."
    );
  }

  const columns = Object.keys(updates);
  if (columns.length === 0) {
    throw new InvalidArgumentsError("No columns provided to update");
  }

  const bindings = columns.map((column, index) => valueBinding(`update_${index}`, updates[column]));
  const setClause = columns.map((column, index) => `${quoteIdentifier(column)} = @${bindings[index].name}`).join(", ");
  const condition = whereClause.trim().replace(/^WHERE\s+/i, "");
  const table = renderRoutine(parseQualifiedName(tableName, "dbo"));

  return { text: `UPDATE ${table} SET ${setClause} WHERE ${condition}`, bindings };
}

export class UpdateDataTool extends SqlTool<UpdateDataArgs> {
  name = "update_data";
  description = "Updates data in an MSSQL Database table. The WHERE clause must be provided for security.";
  annotations = {
    title: "Update Data",
    readOnlyHint: false,
    idempotentHint: false,
    destructiveHint: true,
  };
  inputSchema: Tool["inputSchema"] = {
    type: "object",
    properties: {
      tableName: {
        type: "string",
        description: "Name of the table to update (can include schema: 'dbo.TableName')",
      },
      updates: {
        type: "object",
        description: "Key-value pairs of columns to update. Example: { 'status': 'active', 'last_updated': '2025-01-01' }",
      },
      whereClause: {
        type: "string",
        description: "WHERE clause to identify which records to update. Example: \"genre = 'comedy' AND created_date <= '2025-07-05'\"",
      },
      database: databaseProperty,
    },
    required: ["tableName", "updates", "whereClause"],
  };
  protected argsSchema = argsSchema;

  protected async execute({ tableName, updates, whereClause, database }: UpdateDataArgs, context: ToolContext) {
    const { text, bindings } = buildUpdate(tableName, updates, whereClause);

    const { rowsAffected } = await this.withSession(context, database, (session) => session.query(text, bindings));
    return written(rowsAffected[0] ?? 0);
  }
}
