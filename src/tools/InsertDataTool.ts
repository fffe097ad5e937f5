import type { Tool } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { parseQualifiedName, quoteIdentifier, renderRoutine } from "../engine/BatchBuilder.js";
import { written } from "../engine/OperationResult.js";
import { valueBinding } from "../engine/ParameterBinder.js";
import type { BindVariable } from "../engine/types.js";
import { InvalidArgumentsError } from "../errors/ToolError.js";
import { SqlTool, databaseProperty, type ToolContext } from "./SqlTool.js";

const recordSchema = z.record(z.unknown());

const argsSchema = z.object({
  tableName: z.string().min(1),
  data: z.union([recordSchema, z.array(recordSchema).min(1)]),
  database: z.string().min(1).optional(),
});

type InsertDataArgs = z.infer<typeof argsSchema>;

/** Builds one multi-row INSERT; every record must carry the same columns. */
export function buildInsert(
  tableName: string,
  records: Record<string, unknown>[]
): { text: string; bindings: BindVariable[] } {
  const columns = Object.keys(records[0] ?? {}).sort();
  if (columns.length === 0) {
    throw new InvalidArgumentsError("No columns provided for insertion");
  }

  records.forEach((record, index) => {
    const current = Object.keys(record).sort();
    if (current.join("\u0000") !== columns.join("\u0000")) {
      throw new InvalidArgumentsError(
        `Column mismatch: Record ${index + 1} has different columns than the first record. ` +
          `Expected columns: [${columns.join(", ")}], but got: [${current.join(", ")}]`
      );
    }
  });

  const bindings: BindVariable[] = [];
  const valueClauses = records.map((record, recordIndex) => {
    const names = columns.map((column, columnIndex) => {
      const binding = valueBinding(`value${recordIndex}_${columnIndex}`, record[column]);
      bindings.push(binding);
      return `@${binding.name}`;
    });
    return `(${names.join(", ")})`;
  });

  const table = renderRoutine(parseQualifiedName(tableName, "dbo"));
  const text = `INSERT INTO ${table} (${columns.map(quoteIdentifier).join(", ")}) VALUES ${valueClauses.join(", ")}`;
  return { text, bindings };
}

export class InsertDataTool extends SqlTool<InsertDataArgs> {
  name = "insert_data";
  description =
    "Inserts one or more records into an MSSQL table. Pass data as an object (single) or array of objects (batch). Uses parameterized queries for safety.";
  annotations = {
    title: "Insert Data",
    readOnlyHint: false,
    idempotentHint: false,
    destructiveHint: false,
  };
  inputSchema: Tool["inputSchema"] = {
    type: "object",
    properties: {
      tableName: {
        type: "string",
        description: "Name of the table to insert data into (can include schema: 'dbo.TableName')",
      },
      data: {
        oneOf: [
          {
            type: "object",
            description:
              "Single record data object with column names as keys and values as the data to insert. Example: {\"name\": \"John\", \"age\": 30}",
          },
          {
            type: "array",
            items: { type: "object" },
            description:
              "Array of data objects for multiple record insertion. Each object must have identical column structure.",
          },
        ],
      },
      database: databaseProperty,
    },
    required: ["tableName", "data"],
  };
  protected argsSchema = argsSchema;

  protected async execute({ tableName, data, database }: InsertDataArgs, context: ToolContext) {
    const records = Array.isArray(data) ? data : [data];
    const { text, bindings } = buildInsert(tableName, records);

    const { rowsAffected } = await this.withSession(context, database, (session) => session.query(text, bindings));
    return written(rowsAffected.reduce((total, count) => total + count, 0));
  }
}
