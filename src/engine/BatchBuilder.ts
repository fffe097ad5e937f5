import { InvalidArgumentsError } from "../errors/ToolError.js";
import type { Batch, BatchPlan, InvocationStyle, RoutineReference } from "./types.js";

export function quoteIdentifier(identifier: string): string {
  return `[${identifier.replace(/]/g, "]]")}]`;
}

function unquoteSegment(segment: string): string {
  const trimmed = segment.trim();
  if (trimmed.startsWith("[") && trimmed.endsWith("]") && trimmed.length >= 2) {
    return trimmed.slice(1, -1).replace(/]]/g, "]");
  }
  return trimmed;
}

function splitSegments(name: string): string[] {
  const segments: string[] = [];
  let current = "";
  let bracketed = false;

  for (let i = 0; i < name.length; i++) {
    const char = name[i];
    if (bracketed) {
      if (char === "]" && name[i + 1] === "]") {
        current += "]]";
        i++;
        continue;
      }
      if (char === "]") bracketed = false;
      current += char;
      continue;
    }
    if (char === "[") bracketed = true;
    if (char === ".") {
      segments.push(current);
      current = "";
      continue;
    }
    current += char;
  }
  segments.push(current);
  return segments;
}

/**
 * Parses `[schema.]name` for routines, tables and views. Segments may
 * already be bracket-quoted, in which case dots inside the brackets belong
 * to the identifier. Three-part names are rejected, not truncated.
 */
export function parseQualifiedName(name: string, defaultSchema?: string): RoutineReference {
  const segments = splitSegments(name.trim()).map(unquoteSegment);

  if (segments.length > 2) {
    throw new InvalidArgumentsError(
      `Object name '${name}' has ${segments.length} parts; expected [schema.]name`
    );
  }
  if (segments.some((segment) => segment === "")) {
    throw new InvalidArgumentsError(`Object name '${name}' is empty or has an empty part`);
  }

  if (segments.length === 2) {
    return { schema: segments[0], name: segments[1] };
  }
  return defaultSchema ? { schema: defaultSchema, name: segments[0] } : { name: segments[0] };
}

export function renderRoutine(routine: RoutineReference): string {
  const name = quoteIdentifier(routine.name);
  return routine.schema ? `${quoteIdentifier(routine.schema)}.${name}` : name;
}

function renderPreamble(plan: BatchPlan): string[] {
  return [
    ...plan.declarations.map((d) => `DECLARE ${d.variable} ${d.sqlType}`),
    ...plan.assignments.map((a) => `SET ${a.variable} = ${a.bindName}`),
  ];
}

function renderCall(routine: RoutineReference, style: "scalar" | "table", args: string): string {
  const target = `${renderRoutine(routine)}(${args})`;
  return style === "scalar" ? `SELECT ${target} AS Result` : `SELECT * FROM ${target}`;
}

export function buildBatch(routine: RoutineReference, style: InvocationStyle, plan: BatchPlan): Batch {
  if (style === "procedure") {
    return { style, procedure: renderRoutine(routine), bindings: plan.bindings };
  }

  const statements = [...renderPreamble(plan), renderCall(routine, style, plan.argumentList.join(", "))];
  return { style, text: statements.join("; "), bindings: plan.bindings };
}

/**
 * Literal-list convention: the caller's text is spliced into the argument
 * list as written. The caller owns the safety of those literals.
 */
export function buildLiteralBatch(
  routine: RoutineReference,
  style: "scalar" | "table",
  literals: string
): Batch {
  return { style, text: renderCall(routine, style, literals.trim()), bindings: [] };
}
