/**
 * Zod schema for the host configuration (`stockroom.yaml`).
 */

import { z } from "zod";
import { LOG_LEVELS, type LogLevel } from "./logger.js";
import type { DeclaredPlugins } from "./types.js";

export const DEFAULT_PLUGIN_PREFIX = "stockroom-plugin-";
export const DEFAULT_CONFIG_FILE = "stockroom.yaml";
export const DEFAULT_PLUGINS_FILE = "plugins.txt";

const LogLevelSchema = z.custom<LogLevel>(
  (value) => typeof value === "string" && LOG_LEVELS.some((level) => level === value),
  { message: `Expected one of: ${LOG_LEVELS.join(", ")}` },
);

export const DeclaredPluginsSchema = z.record(z.string().min(1), z.string());

export const StockroomConfigSchema = z
  .object({
    /** Root of the host project; scanned for templates (default: cwd) */
    projectDir: z.string().min(1).optional(),
    /** Installed-packages location (default: <projectDir>/node_modules) */
    packagesDir: z.string().min(1).optional(),
    /** Package-name prefix that marks a plugin package */
    pluginPrefix: z.string().min(1).default(DEFAULT_PLUGIN_PREFIX),
    /** Directory name that holds template files */
    templatesDirName: z.string().min(1).default("templates"),
    /** Extensions of template files (leading dot) */
    templateExtensions: z
      .array(z.string().regex(/^\.[\w-]+$/, "Extensions must start with a dot"))
      .min(1)
      .default([".yaml", ".yml"]),
    /** Registration entry-point module imported before a package is scanned */
    registerModule: z.string().min(1).default("register"),
    /** Plugin metadata sidecar at each package root */
    metadataFile: z.string().min(1).default("meta.json"),
    /** Package manager executable used by the installer */
    packageManager: z.string().min(1).default("npm"),
    /** Plugins file read and written by the installer (default: <projectDir>/plugins.txt) */
    pluginsFile: z.string().min(1).optional(),
    /** Declared plugins: source → version or branch */
    plugins: DeclaredPluginsSchema.default({}),
    logLevel: LogLevelSchema.default("info"),
  })
  .strict();

export type StockroomConfigInput = z.input<typeof StockroomConfigSchema>;

/**
 * Resolved configuration with all defaults applied and paths made absolute.
 */
export interface StockroomConfig {
  readonly projectDir: string;
  readonly packagesDir: string;
  readonly pluginPrefix: string;
  readonly templatesDirName: string;
  readonly templateExtensions: readonly string[];
  readonly registerModule: string;
  readonly metadataFile: string;
  readonly packageManager: string;
  readonly pluginsFile: string;
  readonly plugins: DeclaredPlugins;
  readonly logLevel: LogLevel;
}
