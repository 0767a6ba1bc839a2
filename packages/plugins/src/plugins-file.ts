import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname } from "node:path";

import type { DeclaredPlugins } from "@stockroom/core";
import { getErrorMessage, PluginSourceError } from "@stockroom/errors";

import { DEFAULT_GIT_REF, GIT_SOURCE } from "./constants.js";
import { buildInstallSpecs } from "./install-specs.js";

const HEADER = "# Declared plugins, one install spec per line\n";

/**
 * Render declared plugins as a plugins file: one install spec per line.
 */
export function formatPluginsFile(declared: DeclaredPlugins): string {
  return HEADER + buildInstallSpecs(declared).map((spec) => `${spec}\n`).join("");
}

/**
 * Parse a plugins file back into declared plugins.
 *
 * Blank lines and `#` comment lines are ignored. Source-control specs
 * (`git+https://…#ref`) map the URL to its ref (default `main`); registry
 * specs (`name@version`) map the name to its version (default `latest`).
 *
 * @throws {PluginSourceError} on a line that is not an install spec
 */
export function parsePluginsFile(text: string, fileName = "plugins file"): Record<string, string> {
  const declared: Record<string, string> = {};

  for (const [index, rawLine] of text.split(/\r?\n/).entries()) {
    const line = rawLine.trim();
    if (line.length === 0 || line.startsWith("#")) continue;
    if (/\s/.test(line)) {
      throw new PluginSourceError(`${fileName}:${index + 1}`, `"${line}" is not a single install spec`);
    }

    if (GIT_SOURCE.test(line)) {
      const hash = line.lastIndexOf("#");
      const url = (hash === -1 ? line : line.slice(0, hash)).replace(/^git\+/i, "");
      const ref = hash === -1 ? "" : line.slice(hash + 1);
      declared[url] = ref || DEFAULT_GIT_REF;
      continue;
    }

    // lastIndexOf keeps the scope of `@scope/name@1.0.0` in the name
    const at = line.lastIndexOf("@");
    if (at > 0) {
      declared[line.slice(0, at)] = line.slice(at + 1) || "latest";
    } else {
      declared[line] = "latest";
    }
  }

  return declared;
}

/**
 * Write declared plugins to `filePath`, creating parent directories.
 */
export async function writePluginsFile(filePath: string, declared: DeclaredPlugins): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });
  await writeFile(filePath, formatPluginsFile(declared), "utf-8");
}

/**
 * Read declared plugins from `filePath`.
 *
 * @throws {PluginSourceError} if the file cannot be read or parsed
 */
export async function readPluginsFile(filePath: string): Promise<Record<string, string>> {
  let text: string;
  try {
    text = await readFile(filePath, "utf-8");
  } catch (error) {
    throw new PluginSourceError(filePath, `cannot read plugins file: ${getErrorMessage(error)}`, error);
  }
  return parsePluginsFile(text, filePath);
}
