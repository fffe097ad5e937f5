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

const COLUMNS_QUERY = `
  SELECT c.name, ty.name AS type, c.max_length AS length, c.precision, c.scale, c.is_nullable AS nullable, p.value AS description
  FROM sys.columns c
  INNER JOIN sys.types ty ON c.user_type_id = ty.user_type_id
  LEFT JOIN sys.extended_properties p ON p.major_id = c.object_id AND p.minor_id = c.column_id AND p.name = 'MS_Description'
  WHERE c.object_id = @object_id
  ORDER BY c.column_id;
`;

const INDEXES_QUERY = `
  SELECT i.name, i.type_desc AS type, p.value AS description,
    STUFF((SELECT ',' + c.name FROM sys.index_columns ic
      INNER JOIN sys.columns c ON ic.object_id = c.object_id AND ic.column_id = c.column_id
      WHERE ic.object_id = i.object_id AND ic.index_id = i.index_id ORDER BY ic.key_ordinal FOR XML PATH('')), 1, 1, '') AS keys
  FROM sys.indexes i
  LEFT JOIN sys.extended_properties p ON p.major_id = i.object_id AND p.minor_id = i.index_id AND p.name = 'MS_Description'
  WHERE i.object_id = @object_id AND i.type > 0;
`;

const DESCRIBE_VIEW_BATCH = [
  objectIdPreamble("view"),
  OBJECT_INFO_QUERY,
  COLUMNS_QUERY,
  INDEXES_QUERY,
  DEFINITION_QUERY,
  DEPENDENCIES_QUERY,
].join("\n");

const argsSchema = z.object({
  name: z.string().min(1),
  database: z.string().min(1).optional(),
});

type DescribeViewArgs = z.infer<typeof argsSchema>;

export class DescribeViewTool extends SqlTool<DescribeViewArgs> {
  name = "describe_view";
  description = "Returns view schema including columns, indexes, definition and dependencies";
  annotations = {
    title: "Describe View",
    readOnlyHint: true,
    idempotentHint: true,
    destructiveHint: false,
  };
  inputSchema: Tool["inputSchema"] = {
    type: "object",
    properties: {
      name: {
        type: "string",
        description: "Name of view (can include schema, e.g. 'dbo.ActiveCustomers')",
      },
      database: databaseProperty,
    },
    required: ["name"],
  };
  protected argsSchema = argsSchema;

  protected async execute({ name, database }: DescribeViewArgs, context: ToolContext) {
    const target = objectBindings(name);
    const outcome = await this.withSession(context, database, (session) =>
      session.query(DESCRIBE_VIEW_BATCH, target.bindings)
    );

    const view = recordsetAt(outcome, 0)[0];
    if (!view) {
      throw new NotFoundError(`View '${name}' not found.`);
    }

    return ok({
      view,
      columns: recordsetAt(outcome, 1),
      indexes: recordsetAt(outcome, 2),
      definition: definitionOf(recordsetAt(outcome, 3)),
      dependencies: recordsetAt(outcome, 4),
    });
  }
}
