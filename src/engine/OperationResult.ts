import { toToolError, type ErrorCode } from "../errors/ToolError.js";

export interface OperationSuccess<T = unknown> {
  success: true;
  data?: T;
  rowsAffected?: number;
}

export interface OperationFailure {
  success: false;
  error: string;
  code: ErrorCode;
}

/** Envelope every tool returns: data on success, a message on failure, never both. */
export type OperationResult<T = unknown> = OperationSuccess<T> | OperationFailure;

export function ok<T>(data: T): OperationSuccess<T> {
  return { success: true, data };
}

export function written(rowsAffected: number): OperationSuccess<never> {
  return { success: true, rowsAffected };
}

export function failed(error: unknown): OperationFailure {
  const toolError = toToolError(error);
  return { success: false, error: toolError.message, code: toolError.code };
}
