import type { Tool } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { ok } from "../engine/OperationResult.js";
import { textBinding } from "../engine/ParameterBinder.js";
import { SqlTool, databaseProperty, type ToolContext } from "./SqlTool.js";

const argsSchema = z.object({
  database: z.string().min(1).optional(),
  schemas: z.array(z.string().min(1)).optional(),
});

type ListTableArgs = z.infer<typeof argsSchema>;

export class ListTableTool extends SqlTool<ListTableArgs> {
  name = "list_tables";
  description = "Lists tables in an MSSQL Database as 'schema.table' names, optionally filtered by schema.";
  annotations = {
    title: "List Tables",
    readOnlyHint: true,
    idempotentHint: true,
    destructiveHint: false,
  };
  inputSchema: Tool["inputSchema"] = {
    type: "object",
    properties: {
      database: databaseProperty,
      schemas: {
        type: "array",
        description: "Schemas to filter by (optional)",
        items: {
          type: "string",
        },
        minItems: 0,
      },
    },
    required: [],
  };
  protected argsSchema = argsSchema;

  protected async execute({ database, schemas = [] }: ListTableArgs, context: ToolContext) {
    const bindings = schemas.map((schema, index) => textBinding(`schema${index}`, schema));
    const schemaFilter =
      bindings.length > 0
        ? `AND TABLE_SCHEMA IN (${bindings.map((binding) => `@${binding.name}`).join(", ")})`
        : "";

    const query = `
      SELECT TABLE_SCHEMA + '.' + TABLE_NAME AS table_name
      FROM INFORMATION_SCHEMA.TABLES
      WHERE TABLE_TYPE = 'BASE TABLE' ${schemaFilter}
      ORDER BY TABLE_SCHEMA, TABLE_NAME
    `;

    const { recordsets } = await this.withSession(context, database, (session) => session.query(query, bindings));
    return ok((recordsets[0] ?? []).map((row) => String(row.table_name)));
  }
}
