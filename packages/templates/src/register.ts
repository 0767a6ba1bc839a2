import {
  createConsoleLogger,
  listPluginPackages,
  type Logger,
  silentLogger,
  type StockroomConfig,
} from "@stockroom/core";
import type { Registrar } from "@stockroom/registry";

import { scanTemplates } from "./scanner.js";
import type { TemplateRecord, TemplateScanResult } from "./types.js";

/** Category prefix under which templates are registered. */
export const TEMPLATE_CATEGORY_PREFIX = "template_";

/**
 * Registry category for a template category tag, e.g. `reports` → `template_reports`.
 */
export function templateCategory(categoryTag: string): string {
  return `${TEMPLATE_CATEGORY_PREFIX}${categoryTag}`;
}

/**
 * Roots scanned for templates: the project directory first, then every
 * installed plugin package.
 */
export async function templateRoots(
  config: Pick<StockroomConfig, "projectDir" | "packagesDir" | "pluginPrefix">,
): Promise<string[]> {
  const packages = await listPluginPackages(config.packagesDir, config.pluginPrefix);
  return [config.projectDir, ...packages.map((p) => p.root)];
}

/**
 * Register each template as `template_<categoryTag>` / `<name>`, with the
 * parsed content as the type reference and the category tag as a tag.
 * A key that is already registered, e.g. by an earlier load, keeps its
 * first content. Returns the number of templates added.
 */
export function registerTemplates(
  registrar: Registrar,
  templates: readonly TemplateRecord[],
  logger: Logger = silentLogger,
): number {
  let added = 0;
  for (const template of templates) {
    const category = templateCategory(template.categoryTag);
    if (registrar.has(category, template.name)) {
      logger.debug(`Template ${template.key} is already registered; ignoring ${template.filePath}`);
      continue;
    }
    registrar.add(category, template.name, template.content, { tags: [template.categoryTag] });
    added++;
  }
  return added;
}

export interface LoadTemplatesOptions {
  readonly logger?: Logger;
  /** Roots to scan instead of the ones derived from the configuration */
  readonly roots?: readonly string[];
}

/**
 * Scan the project and installed plugins for templates and register them.
 */
export async function loadTemplates(
  registrar: Registrar,
  config: Pick<
    StockroomConfig,
    "projectDir" | "packagesDir" | "pluginPrefix" | "templatesDirName" | "templateExtensions"
  >,
  options: LoadTemplatesOptions = {},
): Promise<TemplateScanResult> {
  const logger = options.logger ?? createConsoleLogger("templates");
  const roots = options.roots ?? (await templateRoots(config));

  const result = await scanTemplates(roots, {
    templatesDirName: config.templatesDirName,
    extensions: config.templateExtensions,
    logger,
  });
  const added = registerTemplates(registrar, result.templates, logger);
  const duplicates = result.duplicates + result.templates.length - added;

  logger.info(
    `Registered ${added} template(s) from ${roots.length} root(s)` +
      (duplicates > 0 ? `, ${duplicates} duplicate(s) ignored` : ""),
  );
  return result;
}
