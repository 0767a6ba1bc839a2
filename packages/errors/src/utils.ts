import { StockroomError } from "./base.js";
import { InternalError } from "./internal.js";

/**
 * Wrap an unknown error into a StockroomError.
 * If the error is already a StockroomError, return it as-is.
 * Otherwise, wrap it in an InternalError.
 */
export function wrapError(error: unknown): StockroomError {
  if (error instanceof StockroomError) {
    return error;
  }

  if (error instanceof Error) {
    return new InternalError(error.message, { originalName: error.name }, error);
  }

  const message = typeof error === "string" ? error : "An unknown error occurred";
  return new InternalError(message);
}

/**
 * Extract error message from unknown error
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }

  if (typeof error === "string") {
    return error;
  }

  return "An unknown error occurred";
}
