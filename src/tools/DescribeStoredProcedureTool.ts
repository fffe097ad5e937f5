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

const PARAMETERS_QUERY = `
  SELECT
    param.name,
    TYPE_NAME(param.user_type_id) AS type,
    param.max_length AS length,
    param.precision,
    param.scale,
    param.is_output,
    param.has_default_value,
    param.default_value
  FROM sys.parameters param
  WHERE param.object_id = @object_id
  ORDER BY param.parameter_id;
`;

const DESCRIBE_PROCEDURE_BATCH = [
  objectIdPreamble("procedure"),
  OBJECT_INFO_QUERY,
  PARAMETERS_QUERY,
  DEFINITION_QUERY,
  DEPENDENCIES_QUERY,
].join("\n");

const argsSchema = z.object({
  name: z.string().min(1),
  database: z.string().min(1).optional(),
});

type DescribeStoredProcedureArgs = z.infer<typeof argsSchema>;

export class DescribeStoredProcedureTool extends SqlTool<DescribeStoredProcedureArgs> {
  name = "describe_stored_procedure";
  description = "Returns stored procedure metadata including parameters and definition";
  annotations = {
    title: "Describe Stored Procedure",
    readOnlyHint: true,
    idempotentHint: true,
    destructiveHint: false,
  };
  inputSchema: Tool["inputSchema"] = {
    type: "object",
    properties: {
      name: {
        type: "string",
        description: "Name of stored procedure (can include schema, e.g. 'dbo.GetCustomerOrders')",
      },
      database: databaseProperty,
    },
    required: ["name"],
  };
  protected argsSchema = argsSchema;

  protected async execute({ name, database }: DescribeStoredProcedureArgs, context: ToolContext) {
    const target = objectBindings(name);
    const outcome = await this.withSession(context, database, (session) =>
      session.query(DESCRIBE_PROCEDURE_BATCH, target.bindings)
    );

    const procedure = recordsetAt(outcome, 0)[0];
    if (!procedure) {
      throw new NotFoundError(`Stored procedure '${name}' not found.`);
    }

    return ok({
      procedure,
      parameters: recordsetAt(outcome, 1),
      definition: definitionOf(recordsetAt(outcome, 2)),
      dependencies: recordsetAt(outcome, 3),
    });
  }
}
