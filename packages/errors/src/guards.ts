/**
 * Type guards for code-level discrimination.
 */

import { StockroomError } from "./base.js";
import type { ErrorCode } from "./catalog.js";

/** Check if an error carries a specific catalog code */
export function hasCode<C extends ErrorCode>(
  error: unknown,
  code: C,
): error is StockroomError & { readonly code: C } {
  return error instanceof StockroomError && error.code === code;
}

/** Expected errors are part of normal operation (bad input, missing files) */
export function isExpectedError(error: unknown): error is StockroomError {
  return error instanceof StockroomError && error.isExpected;
}
