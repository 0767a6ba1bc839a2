/**
 * Error Catalog - Single Source of Truth
 *
 * Every error code raised or reported by Stockroom is declared here together
 * with its domain and the behavioral base type it belongs to.
 *
 * Naming convention: DOMAIN_SPECIFIC_ERROR (UPPER_SNAKE_CASE)
 * Domains: REGISTRY, TEMPLATE, PLUGIN, CONFIG, INTERNAL
 */

/**
 * Behavioral base types that all error codes map to.
 */
export type BaseErrorType =
  | "ValidationError"
  | "NotFoundError"
  | "ConflictError"
  | "ExternalError"
  | "InternalError";

export const ERROR_CATALOG = {
  // ============================================================================
  // INTERNAL ERRORS
  // ============================================================================
  INTERNAL_ERROR: {
    domain: "internal",
    baseType: "InternalError" as const,
    isExpected: false,
    title: "Internal error",
    description: "An unexpected error occurred",
  },

  // ============================================================================
  // REGISTRY ERRORS - Catalog entries and queries
  // ============================================================================
  REGISTRY_DEFINITION_CONFLICT: {
    domain: "registry",
    baseType: "ConflictError" as const,
    isExpected: true,
    title: "Duplicate definition",
    description: "A catalog key was re-registered with a different type reference",
  },
  REGISTRY_INVALID_KEY: {
    domain: "registry",
    baseType: "ValidationError" as const,
    isExpected: true,
    title: "Invalid catalog key",
    description: "Catalog entries require a non-empty category and name",
  },
  REGISTRY_INVALID_QUERY: {
    domain: "registry",
    baseType: "ValidationError" as const,
    isExpected: true,
    title: "Invalid catalog query",
    description: "A find() criterion could not be compiled",
  },
  REGISTRY_DISPOSED: {
    domain: "registry",
    baseType: "InternalError" as const,
    isExpected: false,
    title: "Registry disposed",
    description: "The registry was disposed and no longer accepts entries",
  },
  REGISTRY_ENTRY_NOT_FOUND: {
    domain: "registry",
    baseType: "NotFoundError" as const,
    isExpected: true,
    title: "Catalog entry not found",
    description: "No catalog entry exists for the requested key",
  },

  // ============================================================================
  // TEMPLATE ERRORS - Template scanning
  // ============================================================================
  TEMPLATE_PATH_INVALID: {
    domain: "template",
    baseType: "ValidationError" as const,
    isExpected: true,
    title: "Invalid template path",
    description: "A template file is not nested under a category directory",
  },
  TEMPLATE_PARSE_FAILED: {
    domain: "template",
    baseType: "ValidationError" as const,
    isExpected: true,
    title: "Template parse failed",
    description: "A template file could not be read or parsed",
  },

  // ============================================================================
  // PLUGIN ERRORS - Discovery and installation
  // ============================================================================
  PLUGIN_LOAD_FAILED: {
    domain: "plugin",
    baseType: "ExternalError" as const,
    isExpected: true,
    title: "Plugin load failed",
    description: "A plugin package or module could not be loaded",
  },
  PLUGIN_METADATA_MISSING: {
    domain: "plugin",
    baseType: "NotFoundError" as const,
    isExpected: true,
    title: "Plugin metadata missing",
    description: "A plugin package has no readable metadata file",
  },
  PLUGIN_INSTALL_FAILED: {
    domain: "plugin",
    baseType: "ExternalError" as const,
    isExpected: true,
    title: "Plugin install failed",
    description: "The package manager exited unsuccessfully",
  },
  PLUGIN_SOURCE_INVALID: {
    domain: "plugin",
    baseType: "ValidationError" as const,
    isExpected: true,
    title: "Invalid plugin source",
    description: "A declared plugin source or plugins file could not be used",
  },

  // ============================================================================
  // CONFIG ERRORS
  // ============================================================================
  CONFIG_INVALID: {
    domain: "config",
    baseType: "ValidationError" as const,
    isExpected: true,
    title: "Invalid configuration",
    description: "The configuration failed validation",
  },
  CONFIG_NOT_FOUND: {
    domain: "config",
    baseType: "NotFoundError" as const,
    isExpected: true,
    title: "Configuration not found",
    description: "The configuration file does not exist",
  },
} as const;

// ============================================================================
// TYPE EXPORTS
// ============================================================================

/**
 * Union type of all error codes
 */
export type ErrorCode = keyof typeof ERROR_CATALOG;

/**
 * Type representing a single error catalog entry
 */
export type ErrorCatalogEntry = (typeof ERROR_CATALOG)[ErrorCode];

/**
 * Union type of all domain names
 */
export type ErrorDomain = ErrorCatalogEntry["domain"];

/**
 * Extract all ErrorCodes that belong to a specific BaseErrorType
 */
export type CodesForBase<B extends BaseErrorType> = {
  [K in ErrorCode]: (typeof ERROR_CATALOG)[K]["baseType"] extends B ? K : never;
}[ErrorCode];
