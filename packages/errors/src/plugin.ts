import { StockroomError } from "./base.js";
import { type BaseErrorType, ERROR_CATALOG, type ErrorDomain } from "./catalog.js";

// ---------------------------------------------------------------------------
// Abstract base for all plugin errors
// ---------------------------------------------------------------------------

/**
 * Abstract base class for plugin system errors.
 *
 * Enables generic catch: `if (e instanceof PluginError)`
 */
export abstract class PluginError extends StockroomError {}

// ---------------------------------------------------------------------------
// Load failed (discovery / import / validate)
// ---------------------------------------------------------------------------

/** Phase of plugin loading where the failure occurred. */
export type PluginLoadPhase = "discovery" | "import" | "register";

/**
 * A plugin package or one of its modules failed to load.
 */
export class PluginLoadError extends PluginError {
  readonly _tag = "PluginError" as const;
  readonly code = "PLUGIN_LOAD_FAILED" as const;
  readonly domain: ErrorDomain;
  readonly baseType: BaseErrorType;
  readonly isExpected: boolean;
  readonly pluginName: string;
  readonly phase: PluginLoadPhase;

  constructor(pluginName: string, phase: PluginLoadPhase, message: string, cause?: unknown) {
    super(`Plugin load failed [${phase}] "${pluginName}": ${message}`, { pluginName, phase }, { cause });
    const entry = ERROR_CATALOG.PLUGIN_LOAD_FAILED;
    this.domain = entry.domain;
    this.baseType = entry.baseType;
    this.isExpected = entry.isExpected;
    this.pluginName = pluginName;
    this.phase = phase;
  }
}

// ---------------------------------------------------------------------------
// Metadata missing
// ---------------------------------------------------------------------------

/**
 * A plugin package has no readable metadata sidecar. Registration continues
 * without metadata.
 */
export class PluginMetadataError extends PluginError {
  readonly _tag = "PluginError" as const;
  readonly code = "PLUGIN_METADATA_MISSING" as const;
  readonly domain: ErrorDomain;
  readonly baseType: BaseErrorType;
  readonly isExpected: boolean;
  readonly pluginName: string;
  readonly filePath: string;

  constructor(pluginName: string, filePath: string, reason: string) {
    super(`Plugin "${pluginName}" metadata unavailable at ${filePath}: ${reason}`, {
      pluginName,
      filePath,
    });
    const entry = ERROR_CATALOG.PLUGIN_METADATA_MISSING;
    this.domain = entry.domain;
    this.baseType = entry.baseType;
    this.isExpected = entry.isExpected;
    this.pluginName = pluginName;
    this.filePath = filePath;
  }
}

// ---------------------------------------------------------------------------
// Install failed
// ---------------------------------------------------------------------------

/**
 * The package manager exited with a non-zero status (or could not be spawned).
 */
export class PluginInstallError extends PluginError {
  readonly _tag = "PluginError" as const;
  readonly code = "PLUGIN_INSTALL_FAILED" as const;
  readonly domain: ErrorDomain;
  readonly baseType: BaseErrorType;
  readonly isExpected: boolean;
  readonly exitCode: number | null;
  readonly stdout: string;
  readonly stderr: string;

  constructor(
    command: string,
    exitCode: number | null,
    output: { readonly stdout: string; readonly stderr: string },
    cause?: unknown,
  ) {
    const status = exitCode === null ? "did not exit normally" : `exited with code ${exitCode}`;
    super(`Plugin install command "${command}" ${status}`, { command }, { cause });
    const entry = ERROR_CATALOG.PLUGIN_INSTALL_FAILED;
    this.domain = entry.domain;
    this.baseType = entry.baseType;
    this.isExpected = entry.isExpected;
    this.exitCode = exitCode;
    this.stdout = output.stdout;
    this.stderr = output.stderr;
  }
}

// ---------------------------------------------------------------------------
// Source invalid
// ---------------------------------------------------------------------------

/**
 * A declared plugin source or the plugins file cannot be used.
 */
export class PluginSourceError extends PluginError {
  readonly _tag = "PluginError" as const;
  readonly code = "PLUGIN_SOURCE_INVALID" as const;
  readonly domain: ErrorDomain;
  readonly baseType: BaseErrorType;
  readonly isExpected: boolean;
  readonly source: string;

  constructor(source: string, reason: string, cause?: unknown) {
    super(`Invalid plugin source "${source}": ${reason}`, { source }, { cause });
    const entry = ERROR_CATALOG.PLUGIN_SOURCE_INVALID;
    this.domain = entry.domain;
    this.baseType = entry.baseType;
    this.isExpected = entry.isExpected;
    this.source = source;
  }
}
