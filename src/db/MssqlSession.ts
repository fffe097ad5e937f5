import sql from "mssql";
import { textLength } from "../engine/TypeInferencer.js";
import type { BindVariable, Row, SqlValue } from "../engine/types.js";
import type { DatabaseSession, ProcedureOutcome, QueryOutcome } from "./ConnectionProvider.js";

type DriverType = sql.ISqlType | (() => sql.ISqlType);

const NVARCHAR_LIMIT = 4000;

/** Driver type used to bind a decoded value. */
export function driverType(value: SqlValue): DriverType {
  switch (value.kind) {
    case "int":
      return sql.Int;
    case "bigint":
      return sql.BigInt;
    case "decimal":
      return sql.Decimal(38, value.scale);
    case "float":
      return sql.Float;
    case "bit":
      return sql.Bit;
    case "temporal":
      return sql.DateTime2;
    case "text": {
      const length = textLength(value.value);
      return length > NVARCHAR_LIMIT ? sql.NVarChar(sql.MAX) : sql.NVarChar(length);
    }
    // sql_variant cannot be bound directly; these are copied into a
    // SQL_VARIANT variable or read back as text.
    case "null":
    case "other":
      return sql.NVarChar(NVARCHAR_LIMIT);
  }
}

export function driverValue(value: SqlValue): unknown {
  return value.kind === "null" ? null : value.value;
}

export function applyBindings(request: Pick<sql.Request, "input" | "output">, bindings: BindVariable[]): void {
  for (const binding of bindings) {
    const type = driverType(binding.value);
    const value = driverValue(binding.value);
    if (binding.direction === "output") {
      request.output(binding.name, type, value);
    } else {
      request.input(binding.name, type, value);
    }
  }
}

const INTEGER_TEXT = /^-?\d+$/;

/** The driver materializes BIGINT as text; integer text becomes a bigint again. */
export function toBigInt(value: unknown): unknown {
  return typeof value === "string" && INTEGER_TEXT.test(value) ? BigInt(value) : value;
}

type ColumnTypes = Record<string, { name: string; type: unknown }>;

/** Copies a recordset, restoring BIGINT columns to bigint. */
export function materializeRows(rows: Row[], columns: ColumnTypes = {}): Row[] {
  const bigintColumns = Object.values(columns)
    .filter((column) => column.type === sql.BigInt)
    .map((column) => column.name);
  if (bigintColumns.length === 0) {
    return [...rows];
  }

  return rows.map((row) => {
    const copy = { ...row };
    for (const name of bigintColumns) {
      copy[name] = toBigInt(copy[name]);
    }
    return copy;
  });
}

/** Output values keyed by name; outputs bound as BIGINT come back as bigint. */
export function materializeOutput(output: Record<string, unknown>, bindings: BindVariable[]): Record<string, unknown> {
  const values = { ...output };
  for (const binding of bindings) {
    if (binding.direction === "output" && binding.value.kind === "bigint" && binding.name in values) {
      values[binding.name] = toBigInt(values[binding.name]);
    }
  }
  return values;
}

/**
 * Session over a shared pool. Each request borrows one pooled connection for
 * the duration of its batch, so a multi-statement batch runs on one connection.
 */
export class MssqlSession implements DatabaseSession {
  private released = false;

  constructor(
    private readonly pool: sql.ConnectionPool,
    readonly database?: string
  ) {}

  private request(bindings: BindVariable[]): sql.Request {
    if (this.released) {
      throw new Error("Database session has already been released");
    }
    const request = this.pool.request();
    applyBindings(request, bindings);
    return request;
  }

  async query(text: string, bindings: BindVariable[] = []): Promise<QueryOutcome> {
    const result = await this.request(bindings).query<Row>(text);
    return {
      recordsets: result.recordsets.map((recordset) => materializeRows(recordset, recordset.columns)),
      rowsAffected: result.rowsAffected,
    };
  }

  async execute(procedure: string, bindings: BindVariable[] = []): Promise<ProcedureOutcome> {
    const result = await this.request(bindings).execute<Row>(procedure);
    return {
      recordsets: result.recordsets.map((recordset) => materializeRows(recordset, recordset.columns)),
      rowsAffected: result.rowsAffected,
      returnValue: result.returnValue,
      output: materializeOutput(result.output, bindings),
    };
  }

  async release(): Promise<void> {
    this.released = true;
  }
}
