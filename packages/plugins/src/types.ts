import type { Constructor, Logger, PluginMetadata } from "@stockroom/core";
import type { PluginLoadError } from "@stockroom/errors";
import type { Registrar } from "@stockroom/registry";

// ---------------------------------------------------------------------------
// Package sources
// ---------------------------------------------------------------------------

/** Exports of an imported module, keyed by export name. */
export type ModuleExports = Readonly<Record<string, unknown>>;

/** A candidate plugin package. */
export interface PackageRef {
  /** Package name, e.g. `stockroom-plugin-aws` or `@acme/stockroom-plugin-k8s` */
  readonly name: string;
  /** Package root directory */
  readonly root: string;
}

/** One imported module of a package. */
export interface ModuleHandle {
  readonly packageName: string;
  /** Package name followed by the dotted module path, e.g. `stockroom-plugin-aws.tasks.copy` */
  readonly moduleName: string;
  readonly exports: ModuleExports;
}

/** Outcome of importing one module: the handle, or the error its import raised. */
export type ModuleLoadResult =
  | { readonly status: "loaded"; readonly module: ModuleHandle }
  | { readonly status: "failed"; readonly moduleName: string; readonly error: PluginLoadError };

export interface LoadModulesOptions {
  /** Skip `index.*` modules (path-scan mode) */
  readonly skipIndex?: boolean;
}

/**
 * Where discovery finds plugin code. Swapping the source swaps the scanning
 * strategy: the filesystem in production, an in-memory table in tests.
 */
export interface PackageSource {
  /** Candidate packages, sorted by name. */
  listPackages(): Promise<readonly PackageRef[]>;
  /** Import every module of a package. A failing module does not stop the others. */
  loadModules(pkg: PackageRef, options?: LoadModulesOptions): Promise<readonly ModuleLoadResult[]>;
  /**
   * Import the registration entry point `moduleName` at the package root.
   * Resolves to `undefined` when the package has no such module.
   *
   * @throws {PluginLoadError} when the module exists but cannot be imported
   */
  loadEntryPoint(pkg: PackageRef, moduleName: string): Promise<ModuleExports | undefined>;
  /** Raw content of the metadata sidecar. Rejects when the file is unreadable. */
  readMetadata(pkg: PackageRef, fileName: string): Promise<unknown>;
}

// ---------------------------------------------------------------------------
// Plugin catalog queries
// ---------------------------------------------------------------------------

/** Which catalog sections findClasses() searches. */
export type CatalogSection = "classes" | "instantiated" | "both";

export interface ClassFilter {
  /** Class name: the catalog key for classes, the constructor name for instances */
  readonly className?: string;
  readonly packageName?: string;
  /** Keep values that are `instanceof` this constructor */
  readonly isInstanceOf?: Constructor;
  /** Keep classes (or instances' constructors) that are or extend this class */
  readonly isSubclassOf?: Constructor;
}

export interface FindClassesQuery extends ClassFilter {
  /** Return every match instead of the first (default: false) */
  readonly returnAllMatching?: boolean;
  /** Sections to search (default: "classes"); "both" always returns a list */
  readonly returnType?: CatalogSection;
}

// ---------------------------------------------------------------------------
// Discovery
// ---------------------------------------------------------------------------

export interface PluginDiscoveryOptions {
  readonly source: PackageSource;
  /** Receives entries from packages' registration entry points (default: the shared registry) */
  readonly registrar?: Registrar;
  /** Registration entry-point module name (default: "register") */
  readonly registerModule?: string;
  /** Metadata sidecar file name (default: "meta.json") */
  readonly metadataFile?: string;
  /** Host classes that plugins re-export (base classes); never recorded as plugin classes */
  readonly hostClasses?: readonly Constructor[];
  readonly logger?: Logger;
}

/** Result of one discovery run. */
export interface DiscoverySummary {
  /** Packages scanned by this run */
  readonly loaded: readonly string[];
  /** Packages skipped because an earlier run already loaded them */
  readonly skipped: readonly string[];
  /** Classes newly recorded in the catalog */
  readonly classes: number;
  /** Instances newly recorded in the catalog */
  readonly instances: number;
}

/**
 * Signature of the `register` export of a plugin's registration entry point.
 */
export type RegisterFunction = (
  registrar: Registrar,
  metadata: PluginMetadata | undefined,
) => void | Promise<void>;
