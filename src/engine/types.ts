/**
 * Decoded parameter value. The tag decides both the declared SQL type of the
 * intermediate variable and the driver type the value is bound with.
 */
export type SqlValue =
  | { kind: "null" }
  | { kind: "int"; value: number }
  | { kind: "bigint"; value: bigint }
  | { kind: "decimal"; value: number; text: string; scale: number }
  | { kind: "float"; value: number }
  | { kind: "bit"; value: boolean }
  | { kind: "text"; value: string }
  | { kind: "temporal"; value: Date; text: string }
  | { kind: "other"; value: string };

export type InvocationStyle = "procedure" | "scalar" | "table";

export interface RoutineReference {
  schema?: string;
  name: string;
}

export type BindDirection = "input" | "output";

export interface BindVariable {
  /** Driver-level parameter name, without the leading `@`. */
  name: string;
  value: SqlValue;
  direction: BindDirection;
}

export interface Declaration {
  variable: string;
  sqlType: string;
}

export interface Assignment {
  variable: string;
  bindName: string;
}

export interface BatchPlan {
  declarations: Declaration[];
  assignments: Assignment[];
  bindings: BindVariable[];
  /** Argument expressions in call order; empty for zero-argument calls. */
  argumentList: string[];
}

/**
 * The statement the engine hands to a session. Procedures go out as an RPC
 * call (`execute`); functions go out as a text batch (`query`).
 */
export type Batch =
  | { style: "procedure"; procedure: string; bindings: BindVariable[] }
  | { style: "scalar" | "table"; text: string; bindings: BindVariable[] };

export type Row = Record<string, unknown>;

export type RoutineResult =
  | {
      shape: "procedure";
      resultSets: Row[][];
      returnValue: unknown;
      outputParameters: Map<string, unknown>;
    }
  | { shape: "scalar"; value: unknown }
  | { shape: "table"; rows: Row[] };
