export type ErrorCode =
  | "MALFORMED_PARAMETERS"
  | "EXECUTION_FAILURE"
  | "NOT_FOUND"
  | "ACCESS_DENIED"
  | "INVALID_ARGUMENTS";

export class ToolError extends Error {
  readonly code: ErrorCode;
  readonly details?: unknown;

  constructor(code: ErrorCode, message: string, details?: unknown) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.details = details;
  }
}

/** Parameter text could not be decoded; nothing was sent to the database. */
export class MalformedParametersError extends ToolError {
  constructor(detail: string) {
    super("MALFORMED_PARAMETERS", `Invalid parameter JSON: ${detail}`);
  }
}

export class ExecutionFailureError extends ToolError {
  constructor(message: string, details?: unknown) {
    super("EXECUTION_FAILURE", message, details);
  }
}

export class NotFoundError extends ToolError {
  constructor(message: string) {
    super("NOT_FOUND", message);
  }
}

export class AccessDeniedError extends ToolError {
  constructor(message: string) {
    super("ACCESS_DENIED", message);
  }
}

export class InvalidArgumentsError extends ToolError {
  constructor(message: string, details?: unknown) {
    super("INVALID_ARGUMENTS", message, details);
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

/** Anything that is not already a ToolError is treated as a database-side failure. */
export function toToolError(error: unknown): ToolError {
  if (error instanceof ToolError) return error;
  return new ExecutionFailureError(errorMessage(error), error);
}
