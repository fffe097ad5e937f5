import { isLosslessNumber, parse, stringify } from "lossless-json";
import { MalformedParametersError, errorMessage } from "../errors/ToolError.js";
import type { SqlValue } from "./types.js";

const INT32_MIN = -(2n ** 31n);
const INT32_MAX = 2n ** 31n - 1n;
const INT64_MIN = -(2n ** 63n);
const INT64_MAX = 2n ** 63n - 1n;

// Variables are declared DECIMAL(38,10). The driver sends a decimal as
// round(value * 10^scale) through a double, so the unscaled integer must stay
// within the digits a double holds exactly.
const DECIMAL_SCALE = 10;
const DOUBLE_SIGNIFICANT_DIGITS = 15;

const INTEGER_LITERAL = /^-?\d+$/;
const NUMBER_LITERAL = /^-?(\d+)(?:\.(\d+))?(?:[eE]([+-]?\d+))?$/;
const ISO_TEMPORAL =
  /^(\d{4})-(\d{2})-(\d{2})(?:T(\d{2}):(\d{2})(?::(\d{2})(?:\.\d{1,3})?)?(Z|[+-]\d{2}:\d{2})?)?$/;

const NVARCHAR_FLOOR = 50;
const NVARCHAR_LIMIT = 4000;

/**
 * Classifies a JSON number from its source text. Tries a 32-bit integer, a
 * 64-bit integer, an exact DECIMAL(38,10), then falls back to FLOAT.
 */
export function classifyNumber(text: string): SqlValue {
  if (INTEGER_LITERAL.test(text)) {
    const integer = BigInt(text);
    if (integer >= INT32_MIN && integer <= INT32_MAX) {
      return { kind: "int", value: Number(integer) };
    }
    if (integer >= INT64_MIN && integer <= INT64_MAX) {
      return { kind: "bigint", value: integer };
    }
  }

  const scale = decimalScale(text);
  if (scale !== undefined) {
    return { kind: "decimal", value: Number(text), text, scale };
  }

  return { kind: "float", value: Number(text) };
}

/**
 * Scale of a literal that binds exactly as a decimal, ignoring trailing
 * fractional zeros; undefined when the literal needs FLOAT.
 */
function decimalScale(text: string): number | undefined {
  const match = NUMBER_LITERAL.exec(text);
  if (!match) return undefined;

  const [, integerPart, fractionPart = "", exponentPart = "0"] = match;
  let digits = `${integerPart}${fractionPart}`.replace(/^0+/, "");
  let exponent = Number(exponentPart) - fractionPart.length;

  if (digits === "") return 0;

  while (exponent < 0 && digits.endsWith("0")) {
    digits = digits.slice(0, -1);
    exponent++;
  }

  const scale = Math.max(0, -exponent);
  const unscaledDigits = digits.length + Math.max(0, exponent);

  return scale <= DECIMAL_SCALE && unscaledDigits <= DOUBLE_SIGNIFICANT_DIGITS ? scale : undefined;
}

/**
 * Parses an ISO-8601 date or date-time. Calendar fields must name a real
 * instant as written; a date-time without a zone is read as UTC, the zone
 * the driver binds DATETIME2 values in.
 */
function parseTemporal(value: string): Date | undefined {
  const match = ISO_TEMPORAL.exec(value);
  if (!match) return undefined;

  const [, year, month, day, hour, minute, second = "0", zone] = match;
  const calendar = new Date(0);
  calendar.setUTCFullYear(Number(year), Number(month) - 1, Number(day));
  if (
    calendar.getUTCFullYear() !== Number(year) ||
    calendar.getUTCMonth() !== Number(month) - 1 ||
    calendar.getUTCDate() !== Number(day)
  ) {
    return undefined;
  }

  if (hour !== undefined && (Number(hour) > 23 || Number(minute) > 59 || Number(second) > 59)) {
    return undefined;
  }

  const parsed = new Date(hour !== undefined && zone === undefined ? `${value}Z` : value);
  return Number.isNaN(parsed.getTime()) ? undefined : parsed;
}

function classifyString(value: string): SqlValue {
  const parsed = parseTemporal(value);
  return parsed ? { kind: "temporal", value: parsed, text: value } : { kind: "text", value };
}

/** Classifies a value that was decoded either by lossless-json or by plain JSON.parse. */
export function classifyValue(value: unknown): SqlValue {
  if (value === null || value === undefined) {
    return { kind: "null" };
  }
  if (isLosslessNumber(value)) {
    return classifyNumber(value.value);
  }

  switch (typeof value) {
    case "boolean":
      return { kind: "bit", value };
    case "bigint":
      return classifyNumber(value.toString());
    case "number":
      return Number.isFinite(value) ? classifyNumber(String(value)) : { kind: "float", value };
    case "string":
      return classifyString(value);
    default:
      break;
  }

  if (value instanceof Date) {
    return { kind: "temporal", value, text: value.toISOString() };
  }

  return { kind: "other", value: stringify(value) ?? "null" };
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Decodes a JSON object of parameter names to values. Key order is kept and
 * numbers are classified from their source text, so 100.00 stays a decimal
 * and 9007199254740993 keeps every digit.
 */
export function decodeParameters(text: string): Map<string, SqlValue> {
  const trimmed = text.trim();
  if (trimmed === "") {
    return new Map();
  }

  let decoded: unknown;
  try {
    decoded = parse(trimmed);
  } catch (error) {
    throw new MalformedParametersError(errorMessage(error));
  }

  if (!isPlainObject(decoded)) {
    throw new MalformedParametersError("expected a JSON object mapping parameter names to values");
  }
  return parametersFromObject(decoded);
}

export function parametersFromObject(record: Record<string, unknown>): Map<string, SqlValue> {
  const parameters = new Map<string, SqlValue>();
  for (const [key, value] of Object.entries(record)) {
    parameters.set(key, classifyValue(value));
  }
  return parameters;
}

/** SQL type for declaring an intermediate variable that holds the value. */
export function inferSqlType(value: SqlValue): string {
  switch (value.kind) {
    case "null":
    case "other":
      return "SQL_VARIANT";
    case "int":
      return "INT";
    case "bigint":
      return "BIGINT";
    case "decimal":
      return `DECIMAL(38,${DECIMAL_SCALE})`;
    case "float":
      return "FLOAT";
    case "bit":
      return "BIT";
    case "text": {
      const length = textLength(value.value);
      return length > NVARCHAR_LIMIT ? "NVARCHAR(MAX)" : `NVARCHAR(${length})`;
    }
    case "temporal":
      return "DATETIME2";
  }
}

/** Declared NVARCHAR length: twice the character count, never below the floor. */
export function textLength(value: string): number {
  return Math.max(value.length * 2, NVARCHAR_FLOOR);
}

/** T-SQL literal form of a value, for diagnostics. */
export function renderValue(value: SqlValue): string {
  switch (value.kind) {
    case "null":
      return "NULL";
    case "int":
    case "float":
      return String(value.value);
    case "bigint":
      return value.value.toString();
    case "decimal":
    case "temporal":
      return value.text;
    case "bit":
      return value.value ? "1" : "0";
    case "text":
    case "other":
      return `N'${value.value.replace(/'/g, "''")}'`;
  }
}
