/**
 * Template scanner — finds structured-data files below `templates/`
 * directories and derives a unique key for each from its path.
 *
 * First writer wins: when two files produce the same category tag and name,
 * the one found later is dropped with a debug diagnostic.
 */

import type { Dirent } from "node:fs";
import { readdir, readFile } from "node:fs/promises";
import { extname, join, relative, resolve } from "node:path";

import { createConsoleLogger, type Logger } from "@stockroom/core";
import { getErrorMessage, TemplateParseError, TemplatePathError } from "@stockroom/errors";
import { parse as parseYaml, YAMLParseError } from "yaml";

import type { ScanTemplatesOptions, TemplateRecord, TemplateScanResult } from "./types.js";

const DEFAULT_EXTENSIONS: readonly string[] = [".yaml", ".yml"];
const DEFAULT_IGNORE_DIRS: readonly string[] = ["node_modules"];

/** Path-derived identity of a template file. */
export interface TemplateKey {
  readonly categoryTag: string;
  readonly name: string;
}

/**
 * Derive the template key from a path relative to a scan root.
 *
 * Returns `undefined` when no directory segment is `templatesDirName`.
 *
 * @throws {TemplatePathError} when the file has no category tag or no name
 */
export function deriveTemplateKey(
  relativePath: string,
  templatesDirName = "templates",
): TemplateKey | undefined {
  const segments = relativePath.split(/[\\/]/).filter((s) => s.length > 0);
  const fileName = segments.at(-1);
  if (fileName === undefined) return undefined;

  const dirIndex = segments.slice(0, -1).indexOf(templatesDirName);
  if (dirIndex === -1) return undefined;

  const below = segments.slice(dirIndex + 1);
  if (below.length < 2) {
    throw new TemplatePathError(
      relativePath,
      `expected ${templatesDirName}/<category>/[...]/<name>, found no category directory`,
    );
  }

  const categoryTag = below[0] ?? "";
  const baseName = fileName.slice(0, fileName.length - extname(fileName).length);
  if (baseName.length === 0) {
    throw new TemplatePathError(relativePath, "file name is empty once the extension is removed");
  }

  return { categoryTag, name: [...below.slice(1, -1), baseName].join(".") };
}

/**
 * Scan each root in order and parse every template file found.
 */
export async function scanTemplates(
  roots: readonly string[],
  options: ScanTemplatesOptions = {},
): Promise<TemplateScanResult> {
  const logger: Logger = options.logger ?? createConsoleLogger("templates");
  const templatesDirName = options.templatesDirName ?? "templates";
  const extensions = new Set((options.extensions ?? DEFAULT_EXTENSIONS).map((e) => e.toLowerCase()));
  const ignoreDirs = new Set(options.ignoreDirs ?? DEFAULT_IGNORE_DIRS);

  const templates: TemplateRecord[] = [];
  const seen = new Map<string, string>();
  let duplicates = 0;
  let skipped = 0;

  for (const root of roots) {
    const absoluteRoot = resolve(root);
    const files = await walkFiles(absoluteRoot, ignoreDirs);

    for (const filePath of files) {
      if (!extensions.has(extname(filePath).toLowerCase())) continue;

      const relativePath = relative(absoluteRoot, filePath);
      let key: TemplateKey | undefined;
      try {
        key = deriveTemplateKey(relativePath, templatesDirName);
      } catch (error) {
        logger.warn(`Skipping template ${filePath}: ${getErrorMessage(error)}`, error);
        skipped++;
        continue;
      }
      if (!key) continue;

      const fullKey = `${key.categoryTag}.${key.name}`;
      const dedupKey = fullKey.toLowerCase();
      const firstPath = seen.get(dedupKey);
      if (firstPath !== undefined) {
        logger.debug(`Found duplicate template ${fullKey} at ${filePath}; keeping ${firstPath}`);
        duplicates++;
        continue;
      }

      let content: unknown;
      try {
        content = await parseTemplateFile(filePath);
      } catch (error) {
        logger.warn(`Skipping template ${filePath}: ${getErrorMessage(error)}`, error);
        skipped++;
        continue;
      }

      seen.set(dedupKey, filePath);
      templates.push({ ...key, key: fullKey, filePath, content });
    }
  }

  return { templates, duplicates, skipped };
}

/**
 * Read and parse a YAML (or JSON) template file.
 *
 * @throws {TemplateParseError} on read or syntax errors
 */
export async function parseTemplateFile(filePath: string): Promise<unknown> {
  let text: string;
  try {
    text = await readFile(filePath, "utf-8");
  } catch (error) {
    throw new TemplateParseError(filePath, getErrorMessage(error), undefined, error);
  }

  try {
    return parseYaml(text);
  } catch (error) {
    if (error instanceof YAMLParseError) {
      throw new TemplateParseError(filePath, error.message, error.linePos?.[0]?.line, error);
    }
    throw new TemplateParseError(filePath, getErrorMessage(error), undefined, error);
  }
}

/**
 * Depth-first list of files below `root`, sorted by name at each level.
 * Dot-directories and `ignoreDirs` below the root are not descended into.
 */
async function walkFiles(root: string, ignoreDirs: ReadonlySet<string>): Promise<string[]> {
  const files: string[] = [];

  async function visit(dir: string): Promise<void> {
    let entries: Dirent[];
    try {
      entries = await readdir(dir, { withFileTypes: true });
    } catch {
      // Unreadable or missing directory — nothing to scan
      return;
    }
    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    for (const entry of entries) {
      const fullPath = join(dir, entry.name);
      if (entry.isDirectory()) {
        if (entry.name.startsWith(".") || ignoreDirs.has(entry.name)) continue;
        await visit(fullPath);
      } else if (entry.isFile()) {
        files.push(fullPath);
      }
    }
  }

  await visit(root);
  return files;
}
