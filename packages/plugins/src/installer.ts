import { spawnSync } from "node:child_process";

import { createConsoleLogger, type Logger } from "@stockroom/core";
import { PluginInstallError, PluginSourceError, wrapError } from "@stockroom/errors";

import { buildInstallSpecs } from "./install-specs.js";
import type { PluginCatalog } from "./plugin-catalog.js";
import type { PluginDiscovery } from "./plugin-discovery.js";
import { readPluginsFile, writePluginsFile } from "./plugins-file.js";
import type { DiscoverySummary } from "./types.js";

// ---------------------------------------------------------------------------
// Command runner
// ---------------------------------------------------------------------------

export interface CommandOutput {
  /** Exit status, or null when the process did not exit normally */
  readonly status: number | null;
  readonly stdout: string;
  readonly stderr: string;
  /** Set when the process could not be spawned */
  readonly error?: Error;
}

/** Runs a command to completion in `cwd`. */
export type CommandRunner = (command: string, args: readonly string[], cwd: string) => CommandOutput;

/**
 * Default runner: blocking `spawnSync` with captured output and no timeout.
 */
export const spawnCommand: CommandRunner = (command, args, cwd) => {
  const result = spawnSync(command, [...args], { cwd, encoding: "utf-8" });
  return {
    status: result.status,
    stdout: result.stdout ?? "",
    stderr: result.stderr ?? "",
    ...(result.error ? { error: result.error } : {}),
  };
};

// ---------------------------------------------------------------------------
// Installer
// ---------------------------------------------------------------------------

export interface PluginInstallerOptions {
  /** Directory the package manager runs in */
  readonly projectDir: string;
  /** Package manager executable (default: "npm") */
  readonly packageManager?: string;
  /** Plugins file used by fromPluginsFile() / savePluginsFile() */
  readonly pluginsFile?: string;
  readonly runner?: CommandRunner;
  readonly logger?: Logger;
}

export interface InstallOptions {
  /** Pass `--silent` to the package manager */
  readonly quiet?: boolean;
}

export type InstallResult =
  | {
      readonly ok: true;
      readonly specs: readonly string[];
      /** Discovery run triggered by the install; absent when nothing was declared */
      readonly discovery: DiscoverySummary | undefined;
    }
  | { readonly ok: false; readonly specs: readonly string[]; readonly error: PluginInstallError };

/**
 * Installs the plugins declared in a PluginCatalog with an external package
 * manager, then runs package discovery so new plugins become queryable.
 *
 * Failures are logged and returned, never thrown, and never retried.
 */
export class PluginInstaller {
  private readonly catalog: PluginCatalog;
  private readonly discovery: PluginDiscovery;
  private readonly projectDir: string;
  private readonly packageManager: string;
  private readonly pluginsFile: string | undefined;
  private readonly runner: CommandRunner;
  private readonly logger: Logger;

  constructor(catalog: PluginCatalog, discovery: PluginDiscovery, options: PluginInstallerOptions) {
    this.catalog = catalog;
    this.discovery = discovery;
    this.projectDir = options.projectDir;
    this.packageManager = options.packageManager ?? "npm";
    this.pluginsFile = options.pluginsFile;
    this.runner = options.runner ?? spawnCommand;
    this.logger = options.logger ?? createConsoleLogger("installer");
  }

  /** Declare a plugin: a package name with a version, or a URL with a ref. */
  declare(source: string, versionOrRef = ""): void {
    this.catalog.declare(source, versionOrRef);
  }

  /**
   * Install every declared plugin in one package-manager call.
   */
  async install(options: InstallOptions = {}): Promise<InstallResult> {
    const specs = buildInstallSpecs(this.catalog.declaredRecord());
    if (specs.length === 0) {
      this.logger.warn("No plugins declared; nothing to install");
      return { ok: true, specs, discovery: undefined };
    }

    const args = ["install", ...(options.quiet ? ["--silent"] : []), ...specs];
    const command = [this.packageManager, ...args].join(" ");
    this.logger.debug(`Running ${command} in ${this.projectDir}`);

    const output = this.run(args);
    if (output.error !== undefined || output.status !== 0) {
      const error = new PluginInstallError(command, output.status, output, output.error);
      this.logger.error(formatFailure(error), error);
      return { ok: false, specs, error };
    }

    this.logger.info(`Installed ${specs.length} plugin(s): ${specs.join(", ")}`);
    const discovery = await this.discovery.scanPackages();
    return { ok: true, specs, discovery };
  }

  /**
   * Declare every plugin listed in the plugins file.
   *
   * @throws {PluginSourceError} if no plugins file is configured or it cannot be read
   */
  async fromPluginsFile(filePath = this.pluginsFile): Promise<Record<string, string>> {
    if (filePath === undefined) {
      throw new PluginSourceError("plugins file", "no plugins file configured");
    }
    const declared = await readPluginsFile(filePath);
    this.catalog.declareAll(declared);
    return declared;
  }

  /**
   * Write the declared plugins to the plugins file.
   *
   * @throws {PluginSourceError} if no plugins file is configured
   */
  async savePluginsFile(filePath = this.pluginsFile): Promise<void> {
    if (filePath === undefined) {
      throw new PluginSourceError("plugins file", "no plugins file configured");
    }
    await writePluginsFile(filePath, this.catalog.declaredRecord());
  }

  private run(args: readonly string[]): CommandOutput {
    try {
      return this.runner(this.packageManager, args, this.projectDir);
    } catch (error) {
      return {
        status: null,
        stdout: "",
        stderr: "",
        error: wrapError(error),
      };
    }
  }
}

function formatFailure(error: PluginInstallError): string {
  const sections = [error.message];
  if (error.cause instanceof Error) sections.push(error.cause.message);
  if (error.stdout.trim()) sections.push(`stdout:\n${error.stdout.trimEnd()}`);
  if (error.stderr.trim()) sections.push(`stderr:\n${error.stderr.trimEnd()}`);
  return sections.join("\n");
}
