import {
  type Constructor,
  createConsoleLogger,
  type Logger,
  resolveConfig,
  type StockroomConfig,
} from "@stockroom/core";
import { Registry } from "@stockroom/registry";
import { loadTemplates, type TemplateScanResult } from "@stockroom/templates";

import { type CommandRunner, type InstallResult, PluginInstaller } from "./installer.js";
import { NodeModulesSource } from "./package-source.js";
import { PluginCatalog } from "./plugin-catalog.js";
import { PluginDiscovery } from "./plugin-discovery.js";
import type { DiscoverySummary, PackageSource } from "./types.js";

export interface StockroomOptions {
  /** Resolved configuration (default: defaults resolved against the cwd) */
  readonly config?: StockroomConfig;
  /** Catalog to fill (default: a new Registry) */
  readonly registry?: Registry;
  /** Where plugin code comes from (default: the configured packages directory) */
  readonly source?: PackageSource;
  /** Host base classes that plugins may re-export */
  readonly hostClasses?: readonly Constructor[];
  readonly runner?: CommandRunner;
  readonly logger?: Logger;
}

/**
 * The components of a host, wired to one configuration.
 */
export interface Stockroom {
  readonly config: StockroomConfig;
  readonly registry: Registry;
  readonly catalog: PluginCatalog;
  readonly discovery: PluginDiscovery;
  readonly installer: PluginInstaller;
  readonly logger: Logger;
}

/**
 * Wire a Registry, PluginCatalog, PluginDiscovery and PluginInstaller.
 * Plugins declared in the configuration are declared in the catalog.
 *
 * @example
 * ```typescript
 * const stockroom = createStockroom({ config: await loadConfigFrom(process.cwd()) });
 * await bootstrap(stockroom, { install: true });
 *
 * stockroom.registry.find("name", { category: "template_.*", limit: null });
 * ```
 */
export function createStockroom(options: StockroomOptions = {}): Stockroom {
  const config = options.config ?? resolveConfig();
  const logger = options.logger ?? createConsoleLogger("stockroom", config.logLevel);
  const registry = options.registry ?? new Registry({ logger });

  const catalog = new PluginCatalog();
  catalog.declareAll(config.plugins);

  const discovery = new PluginDiscovery(catalog, {
    source:
      options.source ??
      new NodeModulesSource({ packagesDir: config.packagesDir, prefix: config.pluginPrefix }),
    registrar: registry,
    registerModule: config.registerModule,
    metadataFile: config.metadataFile,
    hostClasses: options.hostClasses,
    logger,
  });

  const installer = new PluginInstaller(catalog, discovery, {
    projectDir: config.projectDir,
    packageManager: config.packageManager,
    pluginsFile: config.pluginsFile,
    ...(options.runner ? { runner: options.runner } : {}),
    logger,
  });

  return { config, registry, catalog, discovery, installer, logger };
}

export interface BootstrapOptions {
  /** Install declared plugins before discovery (default: false) */
  readonly install?: boolean;
  /** Pass `--silent` to the package manager */
  readonly quiet?: boolean;
}

export interface BootstrapResult {
  /** Present when an install was attempted */
  readonly install: InstallResult | undefined;
  /** Absent when a failed install stopped discovery */
  readonly discovery: DiscoverySummary | undefined;
  readonly templates: TemplateScanResult;
}

/**
 * Startup sequence: install (when asked and plugins are declared, which
 * triggers discovery) or a plain package scan, then template loading.
 */
export async function bootstrap(
  stockroom: Stockroom,
  options: BootstrapOptions = {},
): Promise<BootstrapResult> {
  let install: InstallResult | undefined;
  let discovery: DiscoverySummary | undefined;

  if (options.install && stockroom.catalog.declared.size > 0) {
    install = await stockroom.installer.install({ quiet: options.quiet ?? false });
    discovery = install.ok ? install.discovery : undefined;
  } else {
    discovery = await stockroom.discovery.scanPackages();
  }

  const templates = await loadTemplates(stockroom.registry, stockroom.config, {
    logger: stockroom.logger,
  });

  return { install, discovery, templates };
}
