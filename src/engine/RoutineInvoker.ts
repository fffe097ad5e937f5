import { withSession, type ConnectionProvider, type DatabaseSession } from "../db/ConnectionProvider.js";
import { errorMessage } from "../errors/ToolError.js";
import { buildBatch, buildLiteralBatch, parseQualifiedName } from "./BatchBuilder.js";
import { failed, ok, type OperationResult } from "./OperationResult.js";
import { bindName, bindParameters, describeBindings } from "./ParameterBinder.js";
import { aggregate, toPayload, type ExecutedBatch, type RoutinePayload } from "./ResultAggregator.js";
import { decodeParameters, parametersFromObject } from "./TypeInferencer.js";
import type { Batch, SqlValue } from "./types.js";

/** JSON text, an already-decoded object, or (functions only) a literal argument list. */
export type ParameterInput = string | Record<string, unknown> | null | undefined;

export interface InvocationRequest {
  name: string;
  parameters?: ParameterInput;
  database?: string;
  environment?: string;
}

export interface ProcedureInvocationRequest extends InvocationRequest {
  /** Parameter names to register as OUTPUT; seeded from `parameters` when present. */
  outputParameters?: string[];
}

type DecodedInput =
  | { kind: "map"; parameters: Map<string, SqlValue> }
  | { kind: "literals"; text: string };

// ODBC escapes such as {d '2024-01-01'} or {fn NOW()} open with a brace too.
const ODBC_ESCAPE = /^\{\s*(?:d|t|ts|fn|guid|oj|call|escape)\s/i;

function looksLikeJson(text: string): boolean {
  return (text.startsWith("{") && !ODBC_ESCAPE.test(text)) || text.startsWith("[");
}

function decodeInput(input: ParameterInput, allowLiterals: boolean): DecodedInput {
  if (input === null || input === undefined) {
    return { kind: "map", parameters: new Map() };
  }
  if (typeof input !== "string") {
    return { kind: "map", parameters: parametersFromObject(input) };
  }

  const trimmed = input.trim();
  if (allowLiterals && trimmed !== "" && !looksLikeJson(trimmed)) {
    return { kind: "literals", text: trimmed };
  }
  return { kind: "map", parameters: decodeParameters(trimmed) };
}

async function executeBatch(session: DatabaseSession, batch: Batch): Promise<ExecutedBatch> {
  if (batch.style === "procedure") {
    return { style: batch.style, outcome: await session.execute(batch.procedure, batch.bindings) };
  }
  return { style: batch.style, outcome: await session.query(batch.text, batch.bindings) };
}

/**
 * Invokes stored procedures, scalar functions and table-valued functions.
 * Input is decoded and the batch built before a connection is taken, so a
 * malformed request never reaches the database. Failures come back as an
 * error envelope; nothing is thrown past these methods.
 */
export class RoutineInvoker {
  constructor(private readonly provider: ConnectionProvider) {}

  invokeProcedure(request: ProcedureInvocationRequest): Promise<OperationResult<RoutinePayload>> {
    return this.guard("invokeProcedure", request, () => {
      const routine = parseQualifiedName(request.name);
      const decoded = decodeInput(request.parameters, false);
      const parameters = decoded.kind === "map" ? decoded.parameters : undefined;
      const outputNames = new Set((request.outputParameters ?? []).map(bindName));
      const plan = bindParameters(parameters, "procedure", outputNames);
      return { batch: buildBatch(routine, "procedure", plan), outputNames: [...outputNames] };
    });
  }

  invokeScalarFunction(request: InvocationRequest): Promise<OperationResult<RoutinePayload>> {
    return this.guard("invokeScalarFunction", request, () => ({
      batch: this.functionBatch(request, "scalar"),
      outputNames: [],
    }));
  }

  invokeTableFunction(request: InvocationRequest): Promise<OperationResult<RoutinePayload>> {
    return this.guard("invokeTableFunction", request, () => ({
      batch: this.functionBatch(request, "table"),
      outputNames: [],
    }));
  }

  private functionBatch(request: InvocationRequest, style: "scalar" | "table"): Batch {
    // Scalar UDFs must be schema-qualified to resolve, so functions default to dbo.
    const routine = parseQualifiedName(request.name, "dbo");
    const decoded = decodeInput(request.parameters, true);
    if (decoded.kind === "literals") {
      return buildLiteralBatch(routine, style, decoded.text);
    }
    return buildBatch(routine, style, bindParameters(decoded.parameters, style));
  }

  private async guard(
    operation: string,
    request: InvocationRequest,
    prepare: () => { batch: Batch; outputNames: string[] }
  ): Promise<OperationResult<RoutinePayload>> {
    let batch: Batch | undefined;
    try {
      const prepared = prepare();
      batch = prepared.batch;
      const executed = await withSession(this.provider, request, (session) => executeBatch(session, prepared.batch));
      return ok(toPayload(aggregate(executed, prepared.outputNames)));
    } catch (error) {
      const bound = batch && batch.bindings.length > 0 ? ` with ${describeBindings(batch.bindings)}` : "";
      console.error(`${operation} failed for '${request.name}'${bound}: ${errorMessage(error)}`);
      return failed(error);
    }
  }
}
