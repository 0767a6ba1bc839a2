import { StockroomError } from "./base.js";
import { type BaseErrorType, ERROR_CATALOG, type ErrorDomain } from "./catalog.js";

/**
 * Abstract base class for template scanning errors.
 */
export abstract class TemplateError extends StockroomError {}

/**
 * A template file sits directly under `templates/` (or deeper in a way that
 * leaves no category tag or no name).
 */
export class TemplatePathError extends TemplateError {
  readonly _tag = "TemplateError" as const;
  readonly code = "TEMPLATE_PATH_INVALID" as const;
  readonly domain: ErrorDomain;
  readonly baseType: BaseErrorType;
  readonly isExpected: boolean;
  readonly filePath: string;

  constructor(filePath: string, reason: string) {
    super(`Invalid template path ${filePath}: ${reason}`, { filePath });
    const entry = ERROR_CATALOG.TEMPLATE_PATH_INVALID;
    this.domain = entry.domain;
    this.baseType = entry.baseType;
    this.isExpected = entry.isExpected;
    this.filePath = filePath;
  }
}

/**
 * A template file could not be read or its content is not valid YAML.
 */
export class TemplateParseError extends TemplateError {
  readonly _tag = "TemplateError" as const;
  readonly code = "TEMPLATE_PARSE_FAILED" as const;
  readonly domain: ErrorDomain;
  readonly baseType: BaseErrorType;
  readonly isExpected: boolean;
  readonly filePath: string;
  readonly line: number | undefined;

  constructor(filePath: string, reason: string, line?: number, cause?: unknown) {
    const where = line !== undefined ? ` (line ${line})` : "";
    super(`Failed to parse template ${filePath}${where}: ${reason}`, { filePath }, { cause });
    const entry = ERROR_CATALOG.TEMPLATE_PARSE_FAILED;
    this.domain = entry.domain;
    this.baseType = entry.baseType;
    this.isExpected = entry.isExpected;
    this.filePath = filePath;
    this.line = line;
  }
}
