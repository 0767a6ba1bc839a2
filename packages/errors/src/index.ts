/**
 * @stockroom/errors
 *
 * Shared error taxonomy for the Stockroom catalog and plugin pipeline.
 *
 * Each error carries a `.code` from the catalog that discriminates the
 * specific condition. Use `error.code === "XXX"` (or `hasCode`) for
 * fine-grained matching, or `instanceof` a domain base for category matching.
 */

// ============================================================================
// CORE EXPORTS
// ============================================================================

export { type ErrorJSON, isStockroomError, StockroomError } from "./base.js";

export {
  type BaseErrorType,
  type CodesForBase,
  ERROR_CATALOG,
  type ErrorCatalogEntry,
  type ErrorCode,
  type ErrorDomain,
} from "./catalog.js";

export { getErrorMessage, wrapError } from "./utils.js";

export { hasCode, isExpectedError } from "./guards.js";

// ============================================================================
// DOMAIN ERRORS
// ============================================================================

export { InternalError } from "./internal.js";

export {
  CatalogEntryNotFoundError,
  CatalogQueryError,
  DuplicateDefinitionConflict,
  InvalidCatalogKeyError,
  RegistryDisposedError,
  RegistryError,
} from "./registry.js";

export { TemplateError, TemplateParseError, TemplatePathError } from "./template.js";

export {
  PluginError,
  PluginInstallError,
  PluginLoadError,
  type PluginLoadPhase,
  PluginMetadataError,
  PluginSourceError,
} from "./plugin.js";

export { ConfigFileNotFoundError, ConfigurationError } from "./config.js";
