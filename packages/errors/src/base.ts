import type { BaseErrorType, ErrorCode, ErrorDomain } from "./catalog.js";

/**
 * Serialized form of a StockroomError.
 */
export interface ErrorJSON {
  _tag: string;
  name: string;
  code: ErrorCode;
  message: string;
  domain: ErrorDomain;
  baseType: BaseErrorType;
  isExpected: boolean;
  metadata?: Record<string, string>;
  timestamp: string;
  cause?: string;
}

/**
 * Root of the Stockroom error hierarchy.
 *
 * Subclasses pin `code` to an ERROR_CATALOG key; `domain`, `baseType` and
 * `isExpected` are looked up from the catalog by the subclass constructor.
 */
export abstract class StockroomError extends Error {
  abstract readonly _tag: string;
  abstract readonly code: ErrorCode;
  abstract readonly domain: ErrorDomain;
  abstract readonly baseType: BaseErrorType;
  abstract readonly isExpected: boolean;

  readonly metadata: Record<string, string> | undefined;
  readonly timestamp: Date;

  constructor(message: string, metadata?: Record<string, string>, options?: { cause?: unknown }) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = new.target.name;
    this.metadata = metadata;
    this.timestamp = new Date();
    Object.setPrototypeOf(this, new.target.prototype);
  }

  toJSON(): ErrorJSON {
    return {
      _tag: this._tag,
      name: this.name,
      code: this.code,
      message: this.message,
      domain: this.domain,
      baseType: this.baseType,
      isExpected: this.isExpected,
      ...(this.metadata ? { metadata: this.metadata } : {}),
      timestamp: this.timestamp.toISOString(),
      ...(this.cause instanceof Error ? { cause: this.cause.message } : {}),
    };
  }
}

/**
 * Check whether a value is a StockroomError.
 */
export function isStockroomError(value: unknown): value is StockroomError {
  return value instanceof StockroomError;
}
