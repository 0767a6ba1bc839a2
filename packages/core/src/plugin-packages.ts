import { readdir } from "node:fs/promises";
import { join } from "node:path";

/** An installed package directory whose name carries the plugin prefix. */
export interface PluginPackageDir {
  /** Package name, including its `@scope/` when scoped */
  readonly name: string;
  /** Absolute package root */
  readonly root: string;
}

/**
 * List installed packages in `packagesDir` whose names start with `prefix`,
 * looking one level into `@scope` directories. Results are sorted by name.
 * A missing directory yields an empty list.
 */
export async function listPluginPackages(
  packagesDir: string,
  prefix: string,
): Promise<PluginPackageDir[]> {
  const results: PluginPackageDir[] = [];

  for (const entry of await safeReaddirDirs(packagesDir)) {
    if (entry.startsWith("@")) {
      const scopeDir = join(packagesDir, entry);
      for (const scoped of await safeReaddirDirs(scopeDir)) {
        if (scoped.startsWith(prefix)) {
          results.push({ name: `${entry}/${scoped}`, root: join(scopeDir, scoped) });
        }
      }
    } else if (entry.startsWith(prefix)) {
      results.push({ name: entry, root: join(packagesDir, entry) });
    }
  }

  return results.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
}

async function safeReaddirDirs(dir: string): Promise<string[]> {
  try {
    const entries = await readdir(dir, { withFileTypes: true });
    return entries
      .filter((entry) => entry.isDirectory() || entry.isSymbolicLink())
      .map((entry) => entry.name);
  } catch {
    // Directory doesn't exist — nothing installed
    return [];
  }
}
