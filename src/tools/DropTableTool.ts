import type { Tool } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { parseQualifiedName, renderRoutine } from "../engine/BatchBuilder.js";
import { written } from "../engine/OperationResult.js";
import { SqlTool, databaseProperty, type ToolContext } from "./SqlTool.js";

const argsSchema = z.object({
  tableName: z.string().min(1),
  database: z.string().min(1).optional(),
});

type DropTableArgs = z.infer<typeof argsSchema>;

export class DropTableTool extends SqlTool<DropTableArgs> {
  name = "drop_table";
  description = "Drops a table from the MSSQL Database if it exists.";
  annotations = {
    title: "Drop Table",
    readOnlyHint: false,
    idempotentHint: true,
    destructiveHint: true,
  };
  inputSchema: Tool["inputSchema"] = {
    type: "object",
    properties: {
      tableName: {
        type: "string",
        description: "Name of the table to drop (can include schema: 'dbo.TableName')",
      },
      database: databaseProperty,
    },
    required: ["tableName"],
  };
  protected argsSchema = argsSchema;

  protected async execute({ tableName, database }: DropTableArgs, context: ToolContext) {
    const table = renderRoutine(parseQualifiedName(tableName, "dbo"));

    await this.withSession(context, database, (session) => session.query(`DROP TABLE IF EXISTS ${table}`));
    return written(0);
  }
}
