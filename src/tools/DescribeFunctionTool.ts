import type { Tool } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { ok } from "../engine/OperationResult.js";
import { NotFoundError } from "../errors/ToolError.js";
import {
  DEFINITION_QUERY,
  DEPENDENCIES_QUERY,
  OBJECT_INFO_QUERY,
  definitionOf,
  objectBindings,
  objectIdPreamble,
  recordsetAt,
} from "./catalog.js";
import { SqlTool, databaseProperty, type ToolContext } from "./SqlTool.js";

// parameter_id 0 is the scalar return value; table-valued functions have none.
const PARAMETERS_QUERY = `
  SELECT
    param.name,
    TYPE_NAME(param.user_type_id) AS type,
    param.max_length AS length,
    param.precision,
    param.scale,
    param.has_default_value,
    param.default_value
  FROM sys.parameters param
  WHERE param.object_id = @object_id AND param.parameter_id > 0
  ORDER BY param.parameter_id;
`;

const RETURN_TYPE_QUERY = `
  SELECT TYPE_NAME(param.user_type_id) AS type, param.max_length AS length, param.precision, param.scale
  FROM sys.parameters param
  WHERE param.object_id = @object_id AND param.parameter_id = 0;
`;

const TABLE_COLUMNS_QUERY = `
  SELECT c.name, TYPE_NAME(c.user_type_id) AS type, c.max_length AS length, c.precision, c.scale, c.is_nullable AS nullable
  FROM sys.columns c
  WHERE c.object_id = @object_id
  ORDER BY c.column_id;
`;

const DESCRIBE_FUNCTION_BATCH = [
  objectIdPreamble("function"),
  OBJECT_INFO_QUERY,
  PARAMETERS_QUERY,
  RETURN_TYPE_QUERY,
  TABLE_COLUMNS_QUERY,
  DEFINITION_QUERY,
  DEPENDENCIES_QUERY,
].join("\n");

const argsSchema = z.object({
  name: z.string().min(1),
  database: z.string().min(1).optional(),
});

type DescribeFunctionArgs = z.infer<typeof argsSchema>;

export class DescribeFunctionTool extends SqlTool<DescribeFunctionArgs> {
  name = "describe_function";
  description = "Returns function metadata including parameters, return type, result columns and definition";
  annotations = {
    title: "Describe Function",
    readOnlyHint: true,
    idempotentHint: true,
    destructiveHint: false,
  };
  inputSchema: Tool["inputSchema"] = {
    type: "object",
    properties: {
      name: {
        type: "string",
        description: "Name of scalar or table-valued function (can include schema, e.g. 'dbo.AddTax')",
      },
      database: databaseProperty,
    },
    required: ["name"],
  };
  protected argsSchema = argsSchema;

  protected async execute({ name, database }: DescribeFunctionArgs, context: ToolContext) {
    const target = objectBindings(name);
    const outcome = await this.withSession(context, database, (session) =>
      session.query(DESCRIBE_FUNCTION_BATCH, target.bindings)
    );

    const fn = recordsetAt(outcome, 0)[0];
    if (!fn) {
      throw new NotFoundError(`Function '${name}' not found.`);
    }

    const tableColumns = recordsetAt(outcome, 3);
    return ok({
      function: fn,
      parameters: recordsetAt(outcome, 1),
      return_type: recordsetAt(outcome, 2)[0] ?? null,
      table_columns: tableColumns.length > 0 ? tableColumns : undefined,
      definition: definitionOf(recordsetAt(outcome, 4)),
      dependencies: recordsetAt(outcome, 5),
    });
  }
}
