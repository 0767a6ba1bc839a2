import type { Dirent } from "node:fs";
import { readdir, readFile, stat } from "node:fs/promises";
import { extname, join, relative } from "node:path";
import { pathToFileURL } from "node:url";

import { isRecord, listPluginPackages } from "@stockroom/core";
import { getErrorMessage, PluginLoadError } from "@stockroom/errors";

import { IGNORED_DIRS, MODULE_EXTENSIONS } from "./constants.js";
import type {
  LoadModulesOptions,
  ModuleExports,
  ModuleLoadResult,
  PackageRef,
  PackageSource,
} from "./types.js";

// ---------------------------------------------------------------------------
// Module naming
// ---------------------------------------------------------------------------

/**
 * Dotted module name from the package name and the module's path segments
 * (extension stripped). A trailing `index` names its directory, so
 * `index.js` is the package itself and `tasks/index.js` is `<pkg>.tasks`.
 */
export function moduleNameFor(packageName: string, segments: readonly string[]): string {
  const parts = segments.at(-1) === "index" ? segments.slice(0, -1) : segments;
  return [packageName, ...parts].join(".");
}

function isIndexModule(segments: readonly string[]): boolean {
  return segments.at(-1) === "index";
}

// ---------------------------------------------------------------------------
// Installed packages
// ---------------------------------------------------------------------------

export interface NodeModulesSourceOptions {
  /** Installed-packages directory, e.g. `<project>/node_modules` */
  readonly packagesDir: string;
  /** Package-name prefix of plugin packages */
  readonly prefix: string;
  /** Module extensions to import (default: .js, .mjs, .cjs) */
  readonly extensions?: readonly string[];
}

/**
 * Plugin packages installed on disk, imported with dynamic `import()`.
 */
export class NodeModulesSource implements PackageSource {
  private readonly packagesDir: string;
  private readonly prefix: string;
  private readonly extensions: ReadonlySet<string>;

  constructor(options: NodeModulesSourceOptions) {
    this.packagesDir = options.packagesDir;
    this.prefix = options.prefix;
    this.extensions = new Set(options.extensions ?? MODULE_EXTENSIONS);
  }

  async listPackages(): Promise<readonly PackageRef[]> {
    return listPluginPackages(this.packagesDir, this.prefix);
  }

  async loadModules(
    pkg: PackageRef,
    options: LoadModulesOptions = {},
  ): Promise<readonly ModuleLoadResult[]> {
    const results: ModuleLoadResult[] = [];

    for (const filePath of await listModuleFiles(pkg.root, this.extensions)) {
      const rel = relative(pkg.root, filePath);
      const segments = rel.slice(0, rel.length - extname(rel).length).split(/[\\/]/);
      if (options.skipIndex && isIndexModule(segments)) continue;

      const moduleName = moduleNameFor(pkg.name, segments);
      try {
        const exports = await importModule(filePath);
        results.push({
          status: "loaded",
          module: { packageName: pkg.name, moduleName, exports },
        });
      } catch (error) {
        results.push({
          status: "failed",
          moduleName,
          error: new PluginLoadError(pkg.name, "import", `${moduleName}: ${getErrorMessage(error)}`, error),
        });
      }
    }

    return results;
  }

  async loadEntryPoint(pkg: PackageRef, moduleName: string): Promise<ModuleExports | undefined> {
    for (const ext of this.extensions) {
      const filePath = join(pkg.root, `${moduleName}${ext}`);
      if (!(await isFile(filePath))) continue;

      try {
        return await importModule(filePath);
      } catch (error) {
        throw new PluginLoadError(pkg.name, "import", `${moduleName}${ext}: ${getErrorMessage(error)}`, error);
      }
    }
    return undefined;
  }

  async readMetadata(pkg: PackageRef, fileName: string): Promise<unknown> {
    const text = await readFile(join(pkg.root, fileName), "utf-8");
    const raw: unknown = JSON.parse(text);
    return raw;
  }
}

async function importModule(filePath: string): Promise<ModuleExports> {
  const mod: unknown = await import(pathToFileURL(filePath).href);
  if (!isRecord(mod)) {
    throw new Error("module did not evaluate to a namespace object");
  }
  return mod;
}

async function isFile(filePath: string): Promise<boolean> {
  try {
    return (await stat(filePath)).isFile();
  } catch {
    // Missing — not an entry point
    return false;
  }
}

/**
 * Module files below `root`, depth-first and sorted by name at each level.
 * Dot-directories, nested `node_modules` and declaration files are skipped.
 */
async function listModuleFiles(root: string, extensions: ReadonlySet<string>): Promise<string[]> {
  const files: string[] = [];

  async function visit(dir: string): Promise<void> {
    let entries: Dirent[];
    try {
      entries = await readdir(dir, { withFileTypes: true });
    } catch {
      // Unreadable directory — nothing to import
      return;
    }
    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    for (const entry of entries) {
      const fullPath = join(dir, entry.name);
      if (entry.isDirectory()) {
        if (entry.name.startsWith(".") || IGNORED_DIRS.includes(entry.name)) continue;
        await visit(fullPath);
      } else if (entry.isFile() && extensions.has(extname(entry.name)) && !entry.name.includes(".d.")) {
        files.push(fullPath);
      }
    }
  }

  await visit(root);
  return files;
}

// ---------------------------------------------------------------------------
// In-memory packages
// ---------------------------------------------------------------------------

/**
 * A package served from memory by StaticPackageSource.
 */
export interface StaticPackage {
  readonly name: string;
  /** Reported package root (default: `static:<name>`) */
  readonly root?: string;
  /**
   * Module path, dotted and relative to the package (`index`, `tasks.copy`),
   * mapped to its exports or to the error importing it raises
   */
  readonly modules?: Readonly<Record<string, ModuleExports | Error>>;
  /** Registration entry points by module name */
  readonly entryPoints?: Readonly<Record<string, ModuleExports>>;
  /** Raw metadata sidecar content; absent means the file is missing */
  readonly metadata?: unknown;
}

/**
 * Package source backed by a fixed table, for hosts that bundle their
 * plugins and for tests.
 */
export class StaticPackageSource implements PackageSource {
  private readonly packages = new Map<string, StaticPackage>();

  constructor(packages: readonly StaticPackage[] = []) {
    for (const pkg of packages) this.add(pkg);
  }

  /** Add or replace a package. */
  add(pkg: StaticPackage): void {
    this.packages.set(pkg.name, pkg);
  }

  async listPackages(): Promise<readonly PackageRef[]> {
    return [...this.packages.values()]
      .map((pkg) => ({ name: pkg.name, root: pkg.root ?? `static:${pkg.name}` }))
      .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  }

  async loadModules(
    pkg: PackageRef,
    options: LoadModulesOptions = {},
  ): Promise<readonly ModuleLoadResult[]> {
    const modules = this.packages.get(pkg.name)?.modules ?? {};
    const results: ModuleLoadResult[] = [];

    for (const [path, value] of Object.entries(modules)) {
      const segments = path.split(".");
      if (options.skipIndex && isIndexModule(segments)) continue;

      const moduleName = moduleNameFor(pkg.name, segments);
      if (value instanceof Error) {
        results.push({
          status: "failed",
          moduleName,
          error: new PluginLoadError(pkg.name, "import", `${moduleName}: ${value.message}`, value),
        });
      } else {
        results.push({ status: "loaded", module: { packageName: pkg.name, moduleName, exports: value } });
      }
    }

    return results;
  }

  async loadEntryPoint(pkg: PackageRef, moduleName: string): Promise<ModuleExports | undefined> {
    const entryPoints = this.packages.get(pkg.name)?.entryPoints;
    return entryPoints !== undefined && Object.hasOwn(entryPoints, moduleName)
      ? entryPoints[moduleName]
      : undefined;
  }

  async readMetadata(pkg: PackageRef, fileName: string): Promise<unknown> {
    const metadata = this.packages.get(pkg.name)?.metadata;
    if (metadata === undefined) {
      throw new Error(`${fileName} not found`);
    }
    return metadata;
  }
}
