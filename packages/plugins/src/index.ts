// ---------------------------------------------------------------------------
// @stockroom/plugins — plugin discovery, installation and host bootstrap
// ---------------------------------------------------------------------------

export {
  type BootstrapOptions,
  type BootstrapResult,
  bootstrap,
  createStockroom,
  type Stockroom,
  type StockroomOptions,
} from "./bootstrap.js";
export {
  DEFAULT_GIT_REF,
  DEFAULT_METADATA_FILE,
  DEFAULT_REGISTER_MODULE,
  MODULE_EXTENSIONS,
} from "./constants.js";
export { buildInstallSpec, buildInstallSpecs } from "./install-specs.js";
export {
  type CommandOutput,
  type CommandRunner,
  type InstallOptions,
  type InstallResult,
  PluginInstaller,
  type PluginInstallerOptions,
  spawnCommand,
} from "./installer.js";
export {
  moduleNameFor,
  NodeModulesSource,
  type NodeModulesSourceOptions,
  type StaticPackage,
  StaticPackageSource,
} from "./package-source.js";
export { PluginCatalog } from "./plugin-catalog.js";
export { PluginDiscovery } from "./plugin-discovery.js";
export {
  formatPluginsFile,
  parsePluginsFile,
  readPluginsFile,
  writePluginsFile,
} from "./plugins-file.js";
export type {
  CatalogSection,
  ClassFilter,
  DiscoverySummary,
  FindClassesQuery,
  LoadModulesOptions,
  ModuleExports,
  ModuleHandle,
  ModuleLoadResult,
  PackageRef,
  PackageSource,
  PluginDiscoveryOptions,
  RegisterFunction,
} from "./types.js";

// Package metadata
export const PACKAGE_NAME = "@stockroom/plugins";
