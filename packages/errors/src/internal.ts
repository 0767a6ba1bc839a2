import { StockroomError } from "./base.js";
import { type BaseErrorType, ERROR_CATALOG, type ErrorDomain } from "./catalog.js";

/**
 * Errors caused by bugs or by values thrown that were not Errors at all.
 */
export class InternalError extends StockroomError {
  readonly _tag = "InternalError" as const;
  readonly code = "INTERNAL_ERROR" as const;
  readonly domain: ErrorDomain;
  readonly baseType: BaseErrorType;
  readonly isExpected: boolean;

  constructor(message: string, metadata?: Record<string, string>, cause?: unknown) {
    super(message, metadata, { cause });
    const entry = ERROR_CATALOG.INTERNAL_ERROR;
    this.domain = entry.domain;
    this.baseType = entry.baseType;
    this.isExpected = entry.isExpected;
  }
}
