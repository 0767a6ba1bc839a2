import type { DeclaredPlugins } from "@stockroom/core";

import { DEFAULT_GIT_REF, GIT_SOURCE, UNPINNED_VERSIONS } from "./constants.js";

/**
 * Package-manager install spec for one declared plugin.
 *
 * - URL sources install from source control at a ref: `git+<url>#<ref>`
 *   (ref defaults to `main`)
 * - Anything else is a registry package: `<name>@<version>`, or the bare
 *   name when the version is empty, `*` or `latest`
 */
export function buildInstallSpec(source: string, versionOrRef: string): string {
  const pin = versionOrRef.trim();
  if (GIT_SOURCE.test(source)) {
    return `git+${source.replace(/^git\+/i, "")}#${pin || DEFAULT_GIT_REF}`;
  }
  return UNPINNED_VERSIONS.has(pin) ? source : `${source}@${pin}`;
}

/** Install specs for every declared plugin, in declaration order. */
export function buildInstallSpecs(declared: DeclaredPlugins): string[] {
  return Object.entries(declared).map(([source, versionOrRef]) =>
    buildInstallSpec(source, versionOrRef),
  );
}
