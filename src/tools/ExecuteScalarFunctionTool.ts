import type { Tool } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { RoutineInvoker } from "../engine/RoutineInvoker.js";
import { SqlTool, databaseProperty, type ToolContext } from "./SqlTool.js";

const argsSchema = z.object({
  name: z.string().min(1),
  parameters: z.union([z.string(), z.record(z.unknown())]).nullish(),
  database: z.string().min(1).optional(),
});

type ExecuteScalarFunctionArgs = z.infer<typeof argsSchema>;

export class ExecuteScalarFunctionTool extends SqlTool<ExecuteScalarFunctionArgs> {
  name = "execute_scalar_function";
  description = "Executes a scalar function and returns the result value";
  annotations = {
    title: "Execute Scalar Function",
    readOnlyHint: true,
    idempotentHint: true,
    destructiveHint: false,
  };
  inputSchema: Tool["inputSchema"] = {
    type: "object",
    properties: {
      name: {
        type: "string",
        description: "Name of scalar function (can include schema, e.g. 'dbo.MyFunction'; defaults to dbo)",
      },
      parameters: {
        type: "string",
        description:
          "Optional arguments, either a JSON object whose values are passed in order, e.g. {\"@amount\": 100.00, \"@rate\": 0.08}, " +
          "or comma-separated SQL literals spliced into the call as written, e.g. \"'value1', 123, '2024-01-01'\"",
      },
      database: databaseProperty,
    },
    required: ["name"],
  };
  protected argsSchema = argsSchema;

  protected execute(args: ExecuteScalarFunctionArgs, context: ToolContext) {
    return new RoutineInvoker(context.provider).invokeScalarFunction({
      name: args.name,
      parameters: args.parameters,
      database: args.database,
      environment: context.environment,
    });
  }
}
