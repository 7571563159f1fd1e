/**
 * Result type returned across the service boundary.
 * Errors are values here; nothing is thrown to the caller.
 */

import { CoreError, type ErrorContext } from "./errors.js";

export interface OperationFailure {
  kind: string;
  message: string;
  context: ErrorContext;
}

export type OperationResult<T> =
  | { success: true; value: T }
  | { success: false; error: OperationFailure };

export function ok<T>(value: T): OperationResult<T> {
  return { success: true, value };
}

export function fail<T>(
  kind: string,
  message: string,
  context: ErrorContext = {}
): OperationResult<T> {
  return { success: false, error: { kind, message, context } };
}

/**
 * Convert a caught value into a failure. CoreErrors keep their kind;
 * anything else becomes INTERNAL.
 */
export function failFrom<T>(err: unknown): OperationResult<T> {
  if (err instanceof CoreError) {
    return { success: false, error: err.toJSON() };
  }
  const message = err instanceof Error ? err.message : String(err);
  return fail("INTERNAL", message);
}
