import type { Tool } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { ok } from "../engine/OperationResult.js";
import { InvalidArgumentsError } from "../errors/ToolError.js";
import { SqlTool, databaseProperty, type ToolContext } from "./SqlTool.js";

const MAX_ROWS_CEILING = 100000;
const MAX_QUERY_LENGTH = 10000;

const DANGEROUS_KEYWORDS = [
  "DELETE", "DROP", "UPDATE", "INSERT", "ALTER", "CREATE",
  "TRUNCATE", "EXEC", "EXECUTE", "MERGE", "REPLACE",
  "GRANT", "REVOKE", "COMMIT", "ROLLBACK", "TRANSACTION",
  "BEGIN", "DECLARE", "SET", "USE", "BACKUP",
  "RESTORE", "KILL", "SHUTDOWN", "WAITFOR", "OPENROWSET",
  "OPENDATASOURCE", "OPENQUERY", "OPENXML", "BULK", "INTO",
];

const DANGEROUS_PATTERNS = [
  /EXEC(UTE)?\s*\(/i,
  /\bsp_/i,
  /\bxp_/i,
  /@@/,
  /WAITFOR\s+(DELAY|TIME)/i,
  /\+\s*N?CHAR\s*\(/i,
  /\+\s*ASCII\s*\(/i,
];

function stripComments(query: string): string {
  return query
    .replace(/--.*$/gm, "")
    .replace(/\/\*[\s\S]*?\*\//g, "")
    .replace(/\s+/g, " ")
    .trim();
}

/**
 * Accepts a single SELECT statement and nothing that writes, executes or
 * escapes the session. Throws InvalidArgumentsError describing the first problem.
 */
export function validateSelectQuery(query: string): void {
  if (query.length > MAX_QUERY_LENGTH) {
    throw new InvalidArgumentsError("Query is too long. Maximum allowed length is 10,000 characters.");
  }

  const cleanQuery = stripComments(query);
  if (!cleanQuery) {
    throw new InvalidArgumentsError("Query cannot be empty after removing comments");
  }
  if (!/^SELECT\b/i.test(cleanQuery)) {
    throw new InvalidArgumentsError("Query must start with SELECT");
  }

  for (const keyword of DANGEROUS_KEYWORDS) {
    if (new RegExp(`(^|[^A-Za-z0-9_])${keyword}($|[^A-Za-z0-9_])`, "i").test(cleanQuery)) {
      throw new InvalidArgumentsError(
        `Dangerous keyword '${keyword}' detected in query. Only SELECT operations are allowed.`
      );
    }
  }

  if (DANGEROUS_PATTERNS.some((pattern) => pattern.test(cleanQuery))) {
    throw new InvalidArgumentsError("Potentially malicious SQL pattern detected. Only simple SELECT queries are allowed.");
  }

  if (cleanQuery.split(";").filter((statement) => statement.trim().length > 0).length > 1) {
    throw new InvalidArgumentsError("Multiple SQL statements are not allowed. Use only a single SELECT statement.");
  }
}

/** Injects `TOP n` after SELECT (and DISTINCT) unless the query already limits itself. */
export function enforceRowLimit(query: string, maxRows: number): { query: string; limitAdded: boolean } {
  if (/\bSELECT\s+(DISTINCT\s+)?TOP\s*\(?\s*\d+/i.test(query)) {
    return { query, limitAdded: false };
  }
  return {
    query: query.replace(/^(\s*SELECT\s+)(DISTINCT\s+)?/i, `$1$2TOP ${maxRows} `),
    limitAdded: true,
  };
}

function clampRows(value: number): number {
  return Math.min(Math.max(Math.trunc(value), 1), MAX_ROWS_CEILING);
}

function defaultMaxRows(): number {
  const fromEnv = Number.parseInt(process.env.MAX_ROWS_DEFAULT ?? "", 10);
  return Number.isNaN(fromEnv) ? 1000 : clampRows(fromEnv);
}

/** The caller may ask for fewer or more rows; the environment's maxRowsDefault is a hard cap. */
export function resolveMaxRows(requested: number | undefined, environmentCap: number | undefined): number {
  const effective = requested === undefined ? defaultMaxRows() : clampRows(requested);
  return environmentCap === undefined ? effective : Math.min(effective, environmentCap);
}

const argsSchema = z.object({
  query: z.string().min(1),
  database: z.string().min(1).optional(),
  maxRows: z.number().int().positive().optional(),
});

type ReadDataArgs = z.infer<typeof argsSchema>;

export class ReadDataTool extends SqlTool<ReadDataArgs> {
  name = "read_data";
  description = "Executes a read-only SELECT query. Auto-limits results if no TOP clause present. Blocks destructive operations.";
  annotations = {
    title: "Read Data",
    readOnlyHint: true,
    idempotentHint: true,
    destructiveHint: false,
  };
  inputSchema: Tool["inputSchema"] = {
    type: "object",
    properties: {
      query: {
        type: "string",
        description:
          "SQL SELECT query to execute (must start with SELECT and cannot contain destructive operations). Example: SELECT * FROM movies WHERE genre = 'comedy'",
      },
      database: databaseProperty,
      maxRows: {
        type: "number",
        description: "Optional override for maximum rows returned (1-100000).",
      },
    },
    required: ["query"],
  };
  protected argsSchema = argsSchema;

  protected async execute({ query, database, maxRows }: ReadDataArgs, context: ToolContext) {
    validateSelectQuery(query);

    const rowLimit = resolveMaxRows(maxRows, context.maxRowsDefault);
    const limited = enforceRowLimit(query, rowLimit);
    if (limited.limitAdded) {
      console.error(`read_data auto-limited to ${rowLimit} rows${database ? ` on [${database}]` : ""}`);
    }

    const { recordsets } = await this.withSession(context, database, (session) => session.query(limited.query));
    return ok(recordsets[0] ?? []);
  }
}
