import { StockroomError } from "./base.js";
import { type BaseErrorType, ERROR_CATALOG, type ErrorDomain } from "./catalog.js";

// ---------------------------------------------------------------------------
// Abstract base for all registry errors
// ---------------------------------------------------------------------------

/**
 * Abstract base class for catalog (Registry) errors.
 *
 * Enables generic catch: `if (e instanceof RegistryError)`
 */
export abstract class RegistryError extends StockroomError {}

// ---------------------------------------------------------------------------
// Duplicate definition
// ---------------------------------------------------------------------------

/**
 * Reported when an existing catalog key is added again with a different
 * type reference. The first type reference is always kept.
 */
export class DuplicateDefinitionConflict extends RegistryError {
  readonly _tag = "RegistryError" as const;
  readonly code = "REGISTRY_DEFINITION_CONFLICT" as const;
  readonly domain: ErrorDomain;
  readonly baseType: BaseErrorType;
  readonly isExpected: boolean;
  readonly category: string;
  readonly entryName: string;

  constructor(category: string, name: string) {
    super(
      `Catalog entry "${category}-${name}" is already defined with a different type; keeping the original`,
      { category, name },
    );
    const entry = ERROR_CATALOG.REGISTRY_DEFINITION_CONFLICT;
    this.domain = entry.domain;
    this.baseType = entry.baseType;
    this.isExpected = entry.isExpected;
    this.category = category;
    this.entryName = name;
  }
}

// ---------------------------------------------------------------------------
// Invalid key
// ---------------------------------------------------------------------------

/**
 * Thrown when add() is called without a usable category or name.
 */
export class InvalidCatalogKeyError extends RegistryError {
  readonly _tag = "RegistryError" as const;
  readonly code = "REGISTRY_INVALID_KEY" as const;
  readonly domain: ErrorDomain;
  readonly baseType: BaseErrorType;
  readonly isExpected: boolean;

  constructor(field: "category" | "name") {
    super(`Catalog entries require a non-empty ${field}`, { field });
    const entry = ERROR_CATALOG.REGISTRY_INVALID_KEY;
    this.domain = entry.domain;
    this.baseType = entry.baseType;
    this.isExpected = entry.isExpected;
  }
}

// ---------------------------------------------------------------------------
// Invalid query
// ---------------------------------------------------------------------------

/**
 * Thrown when a find() criterion cannot be used, e.g. a category pattern
 * that is not a valid regular expression.
 */
export class CatalogQueryError extends RegistryError {
  readonly _tag = "RegistryError" as const;
  readonly code = "REGISTRY_INVALID_QUERY" as const;
  readonly domain: ErrorDomain;
  readonly baseType: BaseErrorType;
  readonly isExpected: boolean;
  readonly criterion: string;

  constructor(criterion: string, reason: string, cause?: unknown) {
    super(`Invalid ${criterion} criterion: ${reason}`, { criterion }, { cause });
    const entry = ERROR_CATALOG.REGISTRY_INVALID_QUERY;
    this.domain = entry.domain;
    this.baseType = entry.baseType;
    this.isExpected = entry.isExpected;
    this.criterion = criterion;
  }
}

// ---------------------------------------------------------------------------
// Disposed
// ---------------------------------------------------------------------------

/**
 * Thrown when entries are added to a registry after dispose().
 */
export class RegistryDisposedError extends RegistryError {
  readonly _tag = "RegistryError" as const;
  readonly code = "REGISTRY_DISPOSED" as const;
  readonly domain: ErrorDomain;
  readonly baseType: BaseErrorType;
  readonly isExpected: boolean;

  constructor() {
    super("Registry has been disposed");
    const entry = ERROR_CATALOG.REGISTRY_DISPOSED;
    this.domain = entry.domain;
    this.baseType = entry.baseType;
    this.isExpected = entry.isExpected;
  }
}

// ---------------------------------------------------------------------------
// Entry not found
// ---------------------------------------------------------------------------

/**
 * Thrown by operations that need an existing entry, such as instantiate().
 * Plain lookups never throw this; they return an empty result.
 */
export class CatalogEntryNotFoundError extends RegistryError {
  readonly _tag = "RegistryError" as const;
  readonly code = "REGISTRY_ENTRY_NOT_FOUND" as const;
  readonly domain: ErrorDomain;
  readonly baseType: BaseErrorType;
  readonly isExpected: boolean;

  constructor(category: string, name: string, reason = "not registered") {
    super(`Catalog entry "${category}-${name}" ${reason}`, { category, name });
    const entry = ERROR_CATALOG.REGISTRY_ENTRY_NOT_FOUND;
    this.domain = entry.domain;
    this.baseType = entry.baseType;
    this.isExpected = entry.isExpected;
  }
}
