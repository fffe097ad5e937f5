import type { Tool } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { RoutineInvoker } from "../engine/RoutineInvoker.js";
import { SqlTool, databaseProperty, type ToolContext } from "./SqlTool.js";

const argsSchema = z.object({
  name: z.string().min(1),
  parameters: z.union([z.string(), z.record(z.unknown())]).nullish(),
  outputParameters: z.array(z.string().min(1)).optional(),
  database: z.string().min(1).optional(),
});

type ExecuteStoredProcedureArgs = z.infer<typeof argsSchema>;

export class ExecuteStoredProcedureTool extends SqlTool<ExecuteStoredProcedureArgs> {
  name = "execute_stored_procedure";
  description =
    "Executes a stored procedure with optional parameters and returns its result sets, output parameters and return value.";
  annotations = {
    title: "Execute Stored Procedure",
    readOnlyHint: false,
    idempotentHint: false,
    destructiveHint: false,
  };
  inputSchema: Tool["inputSchema"] = {
    type: "object",
    properties: {
      name: {
        type: "string",
        description: "Name of stored procedure (can include schema, e.g. 'dbo.MyProc')",
      },
      parameters: {
        type: "string",
        description:
          "Optional JSON object of parameter names and values, e.g. {\"@param1\": \"value1\", \"@param2\": 123}",
      },
      outputParameters: {
        type: "array",
        items: { type: "string" },
        description:
          "Optional names of OUTPUT parameters, e.g. [\"@total\"]. A value given in 'parameters' seeds the parameter and sets its type.",
      },
      database: databaseProperty,
    },
    required: ["name"],
  };
  protected argsSchema = argsSchema;

  protected execute(args: ExecuteStoredProcedureArgs, context: ToolContext) {
    return new RoutineInvoker(context.provider).invokeProcedure({
      name: args.name,
      parameters: args.parameters,
      outputParameters: args.outputParameters,
      database: args.database,
      environment: context.environment,
    });
  }
}
