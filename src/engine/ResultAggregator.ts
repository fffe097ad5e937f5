import type { ProcedureOutcome, QueryOutcome } from "../db/ConnectionProvider.js";
import type { Row, RoutineResult } from "./types.js";

export const RETURN_VALUE_NAME = "@RETURN_VALUE";

export interface ProcedurePayload {
  return_value: unknown;
  result_set?: Row[];
  result_sets?: Row[][];
  output_parameters?: Record<string, unknown>;
}

export interface ScalarPayload {
  result: unknown;
}

export type RoutinePayload = ProcedurePayload | ScalarPayload | Row[];

function nullable(value: unknown): unknown {
  return value === undefined ? null : value;
}

function lastRecordset(outcome: QueryOutcome): Row[] {
  return outcome.recordsets.length > 0 ? outcome.recordsets[outcome.recordsets.length - 1] : [];
}

export function aggregateProcedure(
  outcome: ProcedureOutcome,
  outputNames: readonly string[] = []
): RoutineResult {
  const outputParameters = new Map<string, unknown>();
  outputParameters.set(RETURN_VALUE_NAME, nullable(outcome.returnValue));
  for (const name of outputNames) {
    outputParameters.set(`@${name}`, nullable(outcome.output[name]));
  }

  return {
    shape: "procedure",
    resultSets: outcome.recordsets.filter((recordset) => recordset.length > 0),
    returnValue: nullable(outcome.returnValue),
    outputParameters,
  };
}

export function aggregateScalar(outcome: QueryOutcome): RoutineResult {
  const [firstRow] = lastRecordset(outcome);
  const value = firstRow ? Object.values(firstRow)[0] : null;
  return { shape: "scalar", value: nullable(value) };
}

export function aggregateTable(outcome: QueryOutcome): RoutineResult {
  return { shape: "table", rows: lastRecordset(outcome) };
}

export type ExecutedBatch =
  | { style: "procedure"; outcome: ProcedureOutcome }
  | { style: "scalar" | "table"; outcome: QueryOutcome };

export function aggregate(executed: ExecutedBatch, outputNames: readonly string[] = []): RoutineResult {
  switch (executed.style) {
    case "procedure":
      return aggregateProcedure(executed.outcome, outputNames);
    case "scalar":
      return aggregateScalar(executed.outcome);
    case "table":
      return aggregateTable(executed.outcome);
  }
}

export function toPayload(result: RoutineResult): RoutinePayload {
  switch (result.shape) {
    case "procedure": {
      const payload: ProcedurePayload = { return_value: result.returnValue };
      if (result.resultSets.length === 1) {
        payload.result_set = result.resultSets[0];
      } else if (result.resultSets.length > 1) {
        payload.result_sets = result.resultSets;
      }
      // The return code alone does not count as an output parameter.
      if (result.outputParameters.size > 1) {
        payload.output_parameters = Object.fromEntries(result.outputParameters);
      }
      return payload;
    }
    case "scalar":
      return { result: result.value };
    case "table":
      return result.rows;
  }
}
