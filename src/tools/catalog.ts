import type { QueryOutcome } from "../db/ConnectionProvider.js";
import { parseQualifiedName } from "../engine/BatchBuilder.js";
import { textBinding } from "../engine/ParameterBinder.js";
import type { BindVariable, Row } from "../engine/types.js";

/** sys.objects type codes for each kind of describable module. */
export const OBJECT_TYPES = {
  view: ["V"],
  procedure: ["P"],
  function: ["FN", "IF", "TF"],
} as const;

export type CatalogObjectKind = keyof typeof OBJECT_TYPES;

/**
 * Opens a describe batch: resolves `@object_id` once from `@name` and the
 * optional `@schema`, so every following SELECT can filter on it. An
 * unqualified name matches in any schema.
 */
export function objectIdPreamble(kind: CatalogObjectKind): string {
  const types = OBJECT_TYPES[kind].map((type) => `'${type}'`).join(", ");
  return `
    DECLARE @object_id INT = (
      SELECT TOP 1 o.object_id
      FROM sys.objects o
      INNER JOIN sys.schemas s ON o.schema_id = s.schema_id
      WHERE o.type IN (${types}) AND o.name = @name AND (s.name = @schema OR @schema IS NULL)
      ORDER BY CASE WHEN s.name = 'dbo' THEN 0 ELSE 1 END, s.name
    );
  `;
}

export const OBJECT_INFO_QUERY = `
  SELECT
    o.object_id AS id,
    o.name,
    s.name AS [schema],
    ep.value AS description,
    o.type,
    o.type_desc,
    USER_NAME(OBJECTPROPERTY(o.object_id, 'OwnerId')) AS owner,
    o.create_date,
    o.modify_date
  FROM sys.objects o
  INNER JOIN sys.schemas s ON o.schema_id = s.schema_id
  LEFT JOIN sys.extended_properties ep ON ep.major_id = o.object_id AND ep.minor_id = 0 AND ep.name = 'MS_Description'
  WHERE o.object_id = @object_id;
`;

export const DEFINITION_QUERY = `
  SELECT m.definition FROM sys.sql_modules m WHERE m.object_id = @object_id;
`;

export const DEPENDENCIES_QUERY = `
  SELECT DISTINCT
    SCHEMA_NAME(o.schema_id) AS referenced_schema,
    o.name AS referenced_object,
    o.type_desc AS object_type
  FROM sys.sql_expression_dependencies d
  INNER JOIN sys.objects o ON d.referenced_id = o.object_id
  WHERE d.referencing_id = @object_id;
`;

export function objectBindings(qualifiedName: string): { name: string; schema?: string; bindings: BindVariable[] } {
  const target = parseQualifiedName(qualifiedName);
  return {
    ...target,
    bindings: [textBinding("name", target.name), textBinding("schema", target.schema)],
  };
}

/** Positional access to the result sets of a multi-SELECT batch. */
export function recordsetAt(outcome: QueryOutcome, index: number): Row[] {
  return outcome.recordsets[index] ?? [];
}

export function definitionOf(rows: Row[]): unknown {
  return rows[0]?.definition ?? null;
}
