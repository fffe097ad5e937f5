import type { Tool } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { written } from "../engine/OperationResult.js";
import { InvalidArgumentsError } from "../errors/ToolError.js";
import { SqlTool, databaseProperty, type ToolContext } from "./SqlTool.js";

const argsSchema = z.object({
  sql: z.string().min(1),
  database: z.string().min(1).optional(),
});

type CreateTableArgs = z.infer<typeof argsSchema>;

export class CreateTableTool extends SqlTool<CreateTableArgs> {
  name = "create_table";
  description = "Creates a new table in the MSSQL Database from a CREATE TABLE statement.";
  annotations = {
    title: "Create Table",
    readOnlyHint: false,
    idempotentHint: false,
    destructiveHint: false,
  };
  inputSchema: Tool["inputSchema"] = {
    type: "object",
    properties: {
      sql: {
        type: "string",
        description: "CREATE TABLE statement. Example: CREATE TABLE dbo.Movies (Id INT PRIMARY KEY, Title NVARCHAR(200) NOT NULL)",
      },
      database: databaseProperty,
    },
    required: ["sql"],
  };
  protected argsSchema = argsSchema;

  protected async execute({ sql, database }: CreateTableArgs, context: ToolContext) {
    if (!/^\s*CREATE\s+TABLE\b/i.test(sql)) {
      throw new InvalidArgumentsError("Statement must start with CREATE TABLE");
    }

    await this.withSession(context, database, (session) => session.query(sql));
    return written(0);
  }
}
