import type { Tool } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { ok } from "../engine/OperationResult.js";
import { NotFoundError } from "../errors/ToolError.js";
import { recordsetAt } from "./catalog.js";
import { SqlTool, databaseProperty, type ToolContext } from "./SqlTool.js";

const DESCRIBE_DATABASE_BATCH = `
  SELECT
    db.name,
    db.database_id,
    db.create_date,
    db.compatibility_level,
    db.collation_name AS collation,
    db.user_access_desc AS user_access,
    db.is_read_only,
    db.is_auto_close_on,
    db.is_auto_shrink_on,
    db.is_encrypted,
    db.state_desc AS state,
    db.recovery_model_desc AS recovery_model,
    SUSER_SNAME(db.owner_sid) AS owner
  FROM sys.databases db
  WHERE db.name = DB_NAME();

  SELECT
    SUM(CAST(size AS BIGINT) * 8 / 1024) AS total_size_mb,
    SUM(CASE WHEN type = 0 THEN CAST(size AS BIGINT) * 8 / 1024 ELSE 0 END) AS data_size_mb,
    SUM(CASE WHEN type = 1 THEN CAST(size AS BIGINT) * 8 / 1024 ELSE 0 END) AS log_size_mb
  FROM sys.database_files;

  SELECT
    name AS file_name,
    physical_name,
    type_desc AS file_type,
    CAST(size AS BIGINT) * 8 / 1024 AS size_mb,
    CASE
      WHEN max_size = -1 THEN 'Unlimited'
      WHEN max_size = 0 THEN 'No Growth'
      ELSE CAST(CAST(max_size AS BIGINT) * 8 / 1024 AS VARCHAR) + ' MB'
    END AS max_size,
    CASE
      WHEN is_percent_growth = 1 THEN CAST(growth AS VARCHAR) + '%'
      ELSE CAST(CAST(growth AS BIGINT) * 8 / 1024 AS VARCHAR) + ' MB'
    END AS growth_setting,
    state_desc
  FROM sys.database_files
  ORDER BY type, file_id;

  SELECT
    (SELECT COUNT(*) FROM sys.tables WHERE is_ms_shipped = 0) AS table_count,
    (SELECT COUNT(*) FROM sys.views WHERE is_ms_shipped = 0) AS view_count,
    (SELECT COUNT(*) FROM sys.procedures WHERE is_ms_shipped = 0) AS procedure_count,
    (SELECT COUNT(*) FROM sys.objects WHERE type IN ('FN', 'IF', 'TF') AND is_ms_shipped = 0) AS function_count,
    (SELECT COUNT(*) FROM sys.triggers WHERE is_ms_shipped = 0) AS trigger_count;

  SELECT s.name AS schema_name, USER_NAME(s.principal_id) AS owner, s.schema_id
  FROM sys.schemas s
  WHERE s.schema_id > 4 AND s.schema_id < 16384
  ORDER BY s.name;
`;

const argsSchema = z.object({
  database: z.string().min(1).optional(),
});

type DescribeDatabaseArgs = z.infer<typeof argsSchema>;

export class DescribeDatabaseTool extends SqlTool<DescribeDatabaseArgs> {
  name = "describe_database";
  description =
    "Returns metadata about a database including properties, size, file information, object counts and schemas";
  annotations = {
    title: "Describe Database",
    readOnlyHint: true,
    idempotentHint: true,
    destructiveHint: false,
  };
  inputSchema: Tool["inputSchema"] = {
    type: "object",
    properties: {
      database: databaseProperty,
    },
    required: [],
  };
  protected argsSchema = argsSchema;

  protected async execute({ database }: DescribeDatabaseArgs, context: ToolContext) {
    const outcome = await this.withSession(context, database, (session) => session.query(DESCRIBE_DATABASE_BATCH));

    const info = recordsetAt(outcome, 0)[0];
    if (!info) {
      throw new NotFoundError(`Database '${database ?? "(default)"}' not found.`);
    }

    return ok({
      database: info,
      size: recordsetAt(outcome, 1)[0] ?? null,
      files: recordsetAt(outcome, 2),
      object_counts: recordsetAt(outcome, 3)[0] ?? null,
      schemas: recordsetAt(outcome, 4),
    });
  }
}
