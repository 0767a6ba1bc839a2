// ---------------------------------------------------------------------------
// @stockroom/core — shared types, logging and configuration
// ---------------------------------------------------------------------------

export const PACKAGE_NAME = "@stockroom/core" as const;

// Configuration
export {
  applyEnvOverrides,
  type LoadConfigOptions,
  loadConfig,
  loadConfigFrom,
  parseConfigYaml,
  resolveConfig,
} from "./config-loader.js";
export {
  DEFAULT_CONFIG_FILE,
  DEFAULT_PLUGIN_PREFIX,
  DEFAULT_PLUGINS_FILE,
  DeclaredPluginsSchema,
  type StockroomConfig,
  type StockroomConfigInput,
  StockroomConfigSchema,
} from "./config-schema.js";
export { interpolateEnvVars } from "./interpolation.js";
// Logging
export {
  createConsoleLogger,
  LOG_LEVELS,
  type Logger,
  type LogLevel,
  type LogMethod,
  silentLogger,
} from "./logger.js";
// Installed plugin packages
export { listPluginPackages, type PluginPackageDir } from "./plugin-packages.js";
// Type guards
export { isClass, isObject, isRecord, isSubclassOf } from "./type-guards.js";
// Types
export {
  type Constructor,
  type DeclaredPlugins,
  type PluginMetadata,
  PluginMetadataSchema,
} from "./types.js";
