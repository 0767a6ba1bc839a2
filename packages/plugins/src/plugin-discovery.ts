import { basename, join, resolve } from "node:path";

import {
  createConsoleLogger,
  isClass,
  isObject,
  type Logger,
  type PluginMetadata,
  PluginMetadataSchema,
} from "@stockroom/core";
import { getErrorMessage, PluginLoadError, PluginMetadataError } from "@stockroom/errors";
import { getDefaultRegistry, type Registrar, scopedRegistrar } from "@stockroom/registry";

import { DEFAULT_METADATA_FILE, DEFAULT_REGISTER_MODULE } from "./constants.js";
import type { PluginCatalog } from "./plugin-catalog.js";
import type {
  DiscoverySummary,
  ModuleExports,
  ModuleHandle,
  ModuleLoadResult,
  PackageRef,
  PackageSource,
  PluginDiscoveryOptions,
  RegisterFunction,
} from "./types.js";

function isRegisterFunction(value: unknown): value is RegisterFunction {
  return typeof value === "function" && !isClass(value);
}

/**
 * Finds plugin code through a PackageSource and records it in a PluginCatalog.
 *
 * - `scanPackages()` loads every candidate package not loaded before: runs
 *   its registration entry point, reads its metadata and records the classes
 *   its modules export.
 * - `scanPath(dir)` imports the modules below a directory and records the
 *   object instances they export.
 *
 * Runs are queued: a call starts only after every earlier call has settled,
 * so catalog mutations from overlapping calls never interleave.
 */
export class PluginDiscovery {
  private readonly source: PackageSource;
  private readonly catalog: PluginCatalog;
  private readonly registrar: Registrar;
  private readonly registerModule: string;
  private readonly metadataFile: string;
  private readonly hostClasses: ReadonlySet<unknown>;
  private readonly logger: Logger;

  private readonly loadedPackages = new Set<string>();
  private readonly scannedPaths = new Set<string>();
  private queue: Promise<void> = Promise.resolve();

  constructor(catalog: PluginCatalog, options: PluginDiscoveryOptions) {
    this.catalog = catalog;
    this.source = options.source;
    this.registrar = options.registrar ?? getDefaultRegistry();
    this.registerModule = options.registerModule ?? DEFAULT_REGISTER_MODULE;
    this.metadataFile = options.metadataFile ?? DEFAULT_METADATA_FILE;
    this.hostClasses = new Set(options.hostClasses ?? []);
    this.logger = options.logger ?? createConsoleLogger("plugins");
  }

  /** Whether a package was loaded by an earlier package scan. */
  isLoaded(packageName: string): boolean {
    return this.loadedPackages.has(packageName);
  }

  /**
   * Package-scan mode. Packages loaded by an earlier run are skipped.
   */
  scanPackages(): Promise<DiscoverySummary> {
    return this.enqueue(async () => {
      const loaded: string[] = [];
      const skipped: string[] = [];
      let classes = 0;

      for (const pkg of await this.source.listPackages()) {
        if (this.loadedPackages.has(pkg.name)) {
          skipped.push(pkg.name);
          continue;
        }
        this.loadedPackages.add(pkg.name);

        classes += await this.loadPackage(pkg);
        loaded.push(pkg.name);
      }

      if (loaded.length > 0) {
        this.logger.info(`Loaded ${loaded.length} plugin package(s), ${classes} class(es)`);
      }
      return { loaded, skipped, classes, instances: 0 };
    });
  }

  /**
   * Path-scan mode. The directory's base name is the package name; `index`
   * modules are skipped; exported objects whose names do not start with `_`
   * are recorded as instances. A directory already scanned is skipped.
   */
  scanPath(dir: string): Promise<DiscoverySummary> {
    return this.enqueue(async () => {
      const root = resolve(dir);
      const pkg: PackageRef = { name: basename(root), root };
      if (this.scannedPaths.has(root)) {
        return { loaded: [], skipped: [pkg.name], classes: 0, instances: 0 };
      }
      this.scannedPaths.add(root);

      let instances = 0;
      for (const handle of this.loadedModules(await this.source.loadModules(pkg, { skipIndex: true }))) {
        for (const [exportName, value] of Object.entries(handle.exports)) {
          if (exportName.startsWith("_") || !isObject(value)) continue;
          if (this.catalog.addInstance(pkg.name, handle.moduleName, value)) instances++;
        }
      }

      return { loaded: [pkg.name], skipped: [], classes: 0, instances };
    });
  }

  // -------------------------------------------------------------------------
  // Package loading
  // -------------------------------------------------------------------------

  /**
   * A class belongs to the first package that exports it. Classes a plugin
   * re-exports from the host are only recognised when listed in
   * `hostClasses`; any other re-export is recorded as the plugin's own.
   */
  private async loadPackage(pkg: PackageRef): Promise<number> {
    const metadata = await this.readMetadata(pkg);
    if (metadata) this.catalog.setMetadata(pkg.name, metadata);

    await this.runEntryPoint(pkg, metadata);

    let modules: readonly ModuleLoadResult[];
    try {
      modules = await this.source.loadModules(pkg);
    } catch (error) {
      this.logger.debug(`Skipping ${pkg.name}: ${getErrorMessage(error)}`, error);
      return 0;
    }

    let classes = 0;
    for (const handle of this.loadedModules(modules)) {
      for (const [exportName, value] of Object.entries(handle.exports)) {
        if (!isClass(value) || this.hostClasses.has(value)) continue;

        const className = value.name || exportName;
        if (this.catalog.addClass(pkg.name, className, value, metadata)) {
          classes++;
        }
      }
    }
    return classes;
  }

  /**
   * Import the registration entry point and call its `register` export with
   * a registrar that stamps the package's metadata on every entry.
   */
  private async runEntryPoint(pkg: PackageRef, metadata: PluginMetadata | undefined): Promise<void> {
    let entryPoint: ModuleExports | undefined;
    try {
      entryPoint = await this.source.loadEntryPoint(pkg, this.registerModule);
    } catch (error) {
      this.logger.debug(`Skipping entry point of ${pkg.name}: ${getErrorMessage(error)}`, error);
      return;
    }

    const register = entryPoint?.register;
    if (!isRegisterFunction(register)) return;

    try {
      await register(scopedRegistrar(this.registrar, { metadata }), metadata);
    } catch (error) {
      const failure = new PluginLoadError(pkg.name, "register", getErrorMessage(error), error);
      this.logger.warn(failure.message, failure);
    }
  }

  /**
   * Read and validate the metadata sidecar. A missing or invalid file is
   * logged as an error and loading continues without metadata.
   */
  private async readMetadata(pkg: PackageRef): Promise<PluginMetadata | undefined> {
    const filePath = join(pkg.root, this.metadataFile);

    let raw: unknown;
    try {
      raw = await this.source.readMetadata(pkg, this.metadataFile);
    } catch (error) {
      const failure = new PluginMetadataError(pkg.name, filePath, getErrorMessage(error));
      this.logger.error(failure.message, failure);
      return undefined;
    }

    const result = PluginMetadataSchema.safeParse(raw);
    if (!result.success) {
      const issues = result.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
      const failure = new PluginMetadataError(pkg.name, filePath, issues.join("; "));
      this.logger.error(failure.message, failure);
      return undefined;
    }
    return result.data;
  }

  /** Handles of the modules that imported; failures are logged at debug level. */
  private *loadedModules(results: readonly ModuleLoadResult[]): Generator<ModuleHandle> {
    for (const result of results) {
      if (result.status === "failed") {
        this.logger.debug(result.error.message, result.error);
        continue;
      }
      yield result.module;
    }
  }

  private enqueue<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task);
    this.queue = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }
}
