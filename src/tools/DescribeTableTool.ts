import type { Tool } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { parseQualifiedName } from "../engine/BatchBuilder.js";
import { ok } from "../engine/OperationResult.js";
import { textBinding } from "../engine/ParameterBinder.js";
import { NotFoundError } from "../errors/ToolError.js";
import { SqlTool, databaseProperty, type ToolContext } from "./SqlTool.js";

const COLUMNS_QUERY = `
  SELECT
    COLUMN_NAME AS name,
    DATA_TYPE AS type,
    CHARACTER_MAXIMUM_LENGTH AS max_length,
    NUMERIC_PRECISION AS precision,
    NUMERIC_SCALE AS scale,
    IS_NULLABLE AS nullable,
    COLUMN_DEFAULT AS default_value,
    ORDINAL_POSITION AS position
  FROM INFORMATION_SCHEMA.COLUMNS
  WHERE TABLE_NAME = @tableName AND TABLE_SCHEMA = @schemaName
  ORDER BY ORDINAL_POSITION
`;

const argsSchema = z.object({
  tableName: z.string().min(1),
  database: z.string().min(1).optional(),
});

type DescribeTableArgs = z.infer<typeof argsSchema>;

export class DescribeTableTool extends SqlTool<DescribeTableArgs> {
  name = "describe_table";
  description = "Describes the schema (columns and types) of a specified MSSQL Database table.";
  annotations = {
    title: "Describe Table",
    readOnlyHint: true,
    idempotentHint: true,
    destructiveHint: false,
  };
  inputSchema: Tool["inputSchema"] = {
    type: "object",
    properties: {
      tableName: {
        type: "string",
        description: "Name of the table to describe (can include schema: 'dbo.TableName')",
      },
      database: databaseProperty,
    },
    required: ["tableName"],
  };
  protected argsSchema = argsSchema;

  protected async execute({ tableName, database }: DescribeTableArgs, context: ToolContext) {
    const table = parseQualifiedName(tableName, "dbo");
    const bindings = [textBinding("tableName", table.name), textBinding("schemaName", table.schema)];

    const { recordsets } = await this.withSession(context, database, (session) =>
      session.query(COLUMNS_QUERY, bindings)
    );
    const columns = recordsets[0] ?? [];

    if (columns.length === 0) {
      throw new NotFoundError(`Table '${table.schema}.${table.name}' not found${database ? ` in database [${database}]` : ""}.`);
    }

    return ok({
      schema: table.schema,
      tableName: table.name,
      columns,
    });
  }
}
