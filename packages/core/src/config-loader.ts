/**
 * Configuration resolution and file loading.
 */

import { readFile } from "node:fs/promises";
import { dirname, join, resolve } from "node:path";

import { ConfigFileNotFoundError, ConfigurationError, getErrorMessage } from "@stockroom/errors";
import { parse as parseYaml, YAMLParseError } from "yaml";

import {
  DEFAULT_CONFIG_FILE,
  DEFAULT_PLUGINS_FILE,
  type StockroomConfig,
  StockroomConfigSchema,
} from "./config-schema.js";
import { interpolateEnvVars } from "./interpolation.js";
import { isRecord } from "./type-guards.js";

type Env = Readonly<Record<string, string | undefined>>;

/** Environment variables that override file values. */
const ENV_OVERRIDES = {
  STOCKROOM_LOG_LEVEL: "logLevel",
  STOCKROOM_PACKAGES_DIR: "packagesDir",
  STOCKROOM_PLUGIN_PREFIX: "pluginPrefix",
} as const;

export interface LoadConfigOptions {
  readonly env?: Env;
  readonly skipInterpolation?: boolean;
}

/**
 * Validate raw configuration and apply defaults.
 *
 * Relative paths resolve against `baseDir`; `projectDir` defaults to it.
 *
 * @throws {ConfigurationError} listing every schema issue
 */
export function resolveConfig(input: unknown = {}, baseDir: string = process.cwd()): StockroomConfig {
  const result = StockroomConfigSchema.safeParse(input ?? {});
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
    throw new ConfigurationError(issues, result.error);
  }

  const data = result.data;
  const projectDir = resolve(baseDir, data.projectDir ?? ".");

  return {
    projectDir,
    packagesDir: resolve(projectDir, data.packagesDir ?? "node_modules"),
    pluginPrefix: data.pluginPrefix,
    templatesDirName: data.templatesDirName,
    templateExtensions: data.templateExtensions.map((ext) => ext.toLowerCase()),
    registerModule: data.registerModule,
    metadataFile: data.metadataFile,
    packageManager: data.packageManager,
    pluginsFile: resolve(projectDir, data.pluginsFile ?? DEFAULT_PLUGINS_FILE),
    plugins: { ...data.plugins },
    logLevel: data.logLevel,
  };
}

/**
 * Apply `STOCKROOM_*` environment overrides on top of raw file values.
 */
export function applyEnvOverrides(raw: Record<string, unknown>, env: Env): Record<string, unknown> {
  const merged: Record<string, unknown> = { ...raw };
  for (const [variable, key] of Object.entries(ENV_OVERRIDES)) {
    const value = env[variable];
    if (value !== undefined && value.length > 0) {
      merged[key] = value;
    }
  }
  return merged;
}

/**
 * Parse a YAML configuration string. An empty document is an empty config.
 */
export function parseConfigYaml(yamlString: string, options?: LoadConfigOptions): Record<string, unknown> {
  const interpolated =
    options?.skipInterpolation === true ? yamlString : interpolateEnvVars(yamlString, options?.env);

  let parsed: unknown;
  try {
    parsed = parseYaml(interpolated);
  } catch (error: unknown) {
    if (error instanceof YAMLParseError) {
      const pos = error.linePos?.[0];
      const where = pos ? ` at line ${pos.line}, column ${pos.col}` : "";
      throw new ConfigurationError([`YAML syntax error${where}: ${error.message}`], error);
    }
    throw new ConfigurationError([getErrorMessage(error)], error);
  }

  if (parsed === null || parsed === undefined) return {};
  if (!isRecord(parsed)) {
    throw new ConfigurationError(["(root): Expected a mapping at the top level"]);
  }
  return parsed;
}

/**
 * Reads a YAML configuration file and returns the resolved configuration.
 * Relative paths inside the file resolve against the file's directory.
 *
 * @throws {ConfigFileNotFoundError} if the file does not exist
 * @throws {ConfigurationError} on syntax or schema errors
 */
export async function loadConfig(filePath: string, options?: LoadConfigOptions): Promise<StockroomConfig> {
  const absolutePath = resolve(filePath);

  let content: string;
  try {
    content = await readFile(absolutePath, "utf-8");
  } catch (error: unknown) {
    if (isNodeError(error) && error.code === "ENOENT") {
      throw new ConfigFileNotFoundError(absolutePath);
    }
    throw error;
  }

  const env = options?.env ?? process.env;
  const raw = parseConfigYaml(content, { ...options, env });
  return resolveConfig(applyEnvOverrides(raw, env), dirname(absolutePath));
}

/**
 * Look for the default configuration file in `dir`; fall back to defaults when absent.
 */
export async function loadConfigFrom(dir: string, options?: LoadConfigOptions): Promise<StockroomConfig> {
  try {
    return await loadConfig(join(dir, DEFAULT_CONFIG_FILE), options);
  } catch (error: unknown) {
    if (error instanceof ConfigFileNotFoundError) {
      return resolveConfig(applyEnvOverrides({}, options?.env ?? process.env), dir);
    }
    throw error;
  }
}

function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}
