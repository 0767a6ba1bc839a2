import { StockroomError } from "./base.js";
import { type BaseErrorType, ERROR_CATALOG, type ErrorDomain } from "./catalog.js";

/**
 * Configuration failed schema validation or could not be parsed.
 */
export class ConfigurationError extends StockroomError {
  readonly _tag = "ConfigError" as const;
  readonly code = "CONFIG_INVALID" as const;
  readonly domain: ErrorDomain;
  readonly baseType: BaseErrorType;
  readonly isExpected: boolean;
  readonly issues: readonly string[];

  constructor(issues: readonly string[], cause?: unknown) {
    super(`Invalid configuration: ${issues.join("; ")}`, undefined, { cause });
    const entry = ERROR_CATALOG.CONFIG_INVALID;
    this.domain = entry.domain;
    this.baseType = entry.baseType;
    this.isExpected = entry.isExpected;
    this.issues = issues;
  }
}

/**
 * The configuration file does not exist.
 */
export class ConfigFileNotFoundError extends StockroomError {
  readonly _tag = "ConfigError" as const;
  readonly code = "CONFIG_NOT_FOUND" as const;
  readonly domain: ErrorDomain;
  readonly baseType: BaseErrorType;
  readonly isExpected: boolean;
  readonly filePath: string;

  constructor(filePath: string) {
    super(`Configuration file not found: ${filePath}`, { filePath });
    const entry = ERROR_CATALOG.CONFIG_NOT_FOUND;
    this.domain = entry.domain;
    this.baseType = entry.baseType;
    this.isExpected = entry.isExpected;
    this.filePath = filePath;
  }
}
