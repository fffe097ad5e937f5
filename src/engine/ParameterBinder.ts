import { classifyValue, inferSqlType, renderValue } from "./TypeInferencer.js";
import type { BatchPlan, BindVariable, InvocationStyle, SqlValue } from "./types.js";

/** Input binding for a fixed query; strings stay text even when date-shaped. */
export function textBinding(name: string, value: string | null | undefined): BindVariable {
  return {
    name,
    value: value === null || value === undefined ? { kind: "null" } : { kind: "text", value },
    direction: "input",
  };
}

/** Input binding whose type is inferred from the value. */
export function valueBinding(name: string, value: unknown): BindVariable {
  return { name, value: classifyValue(value), direction: "input" };
}

/** `@name = literal` pairs for log lines. */
export function describeBindings(bindings: BindVariable[]): string {
  return bindings.map((binding) => `@${binding.name} = ${renderValue(binding.value)}`).join(", ");
}

export function emptyPlan(): BatchPlan {
  return { declarations: [], assignments: [], bindings: [], argumentList: [] };
}

/** Driver parameter names are registered without the `@` prefix T-SQL uses. */
export function bindName(parameterName: string): string {
  return parameterName.startsWith("@") ? parameterName.slice(1) : parameterName;
}

/**
 * Turns decoded parameters into bind variables.
 *
 * Function calls go through typed variables: entry `i` is bound as `@p{i}`,
 * copied into `@v{i}` declared with the inferred type, and `@v{i}` is passed
 * as the i-th argument. Procedure calls bind the caller's names directly and
 * need no preamble; names listed in `outputNames` bind as output parameters.
 */
export function bindParameters(
  parameters: Map<string, SqlValue> | undefined,
  style: InvocationStyle,
  outputNames: ReadonlySet<string> = new Set()
): BatchPlan {
  const plan = emptyPlan();

  if (style === "procedure") {
    for (const [key, value] of parameters ?? []) {
      const name = bindName(key);
      plan.bindings.push({
        name,
        value,
        direction: outputNames.has(name) ? "output" : "input",
      });
    }
    // Outputs without a seed value still need a slot to receive the result.
    for (const name of outputNames) {
      if (!plan.bindings.some((binding) => binding.name === name)) {
        plan.bindings.push({ name, value: { kind: "null" }, direction: "output" });
      }
    }
    return plan;
  }

  if (!parameters || parameters.size === 0) {
    return plan;
  }

  let index = 0;
  for (const value of parameters.values()) {
    const binding: BindVariable = { name: `p${index}`, value, direction: "input" };
    const variable = `@v${index}`;

    plan.bindings.push(binding);
    plan.declarations.push({ variable, sqlType: inferSqlType(value) });
    plan.assignments.push({ variable, bindName: `@${binding.name}` });
    plan.argumentList.push(variable);
    index++;
  }

  return plan;
}
