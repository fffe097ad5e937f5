import type { Tool } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { RoutineInvoker } from "../engine/RoutineInvoker.js";
import { SqlTool, databaseProperty, type ToolContext } from "./SqlTool.js";

const argsSchema = z.object({
  name: z.string().min(1),
  parameters: z.union([z.string(), z.record(z.unknown())]).nullish(),
  database: z.string().min(1).optional(),
});

type ExecuteTableFunctionArgs = z.infer<typeof argsSchema>;

export class ExecuteTableFunctionTool extends SqlTool<ExecuteTableFunctionArgs> {
  name = "execute_table_function";
  description = "Executes a table-valued function and returns its rows";
  annotations = {
    title: "Execute Table Function",
    readOnlyHint: true,
    idempotentHint: true,
    destructiveHint: false,
  };
  inputSchema: Tool["inputSchema"] = {
    type: "object",
    properties: {
      name: {
        type: "string",
        description: "Name of table-valued function (can include schema, e.g. 'dbo.MyTableFunction'; defaults to dbo)",
      },
      parameters: {
        type: "string",
        description:
          "Optional arguments, either a JSON object whose values are passed in order, e.g. {\"@StartDate\": \"2024-01-01\", \"@EndDate\": \"2024-12-31\"}, " +
          "or comma-separated SQL literals spliced into the call as written, e.g. \"'value1', 123, '2024-01-01'\"",
      },
      database: databaseProperty,
    },
    required: ["name"],
  };
  protected argsSchema = argsSchema;

  protected execute(args: ExecuteTableFunctionArgs, context: ToolContext) {
    return new RoutineInvoker(context.provider).invokeTableFunction({
      name: args.name,
      parameters: args.parameters,
      database: args.database,
      environment: context.environment,
    });
  }
}
