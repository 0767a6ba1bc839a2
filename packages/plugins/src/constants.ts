/** Default registration entry-point module at a plugin package root. */
export const DEFAULT_REGISTER_MODULE = "register";

/** Default plugin metadata sidecar at a plugin package root. */
export const DEFAULT_METADATA_FILE = "meta.json";

/** Module extensions imported from installed packages. */
export const MODULE_EXTENSIONS: readonly string[] = [".js", ".mjs", ".cjs"];

/** Directory names never descended into inside a package. */
export const IGNORED_DIRS: readonly string[] = ["node_modules"];

/** Ref installed for source-control plugins declared without one. */
export const DEFAULT_GIT_REF = "main";

/** Versions that install the latest release. */
export const UNPINNED_VERSIONS: ReadonlySet<string> = new Set(["", "*", "latest"]);

/** Sources installed from source control rather than the registry. */
export const GIT_SOURCE = /^(git\+)?https?:\/\//i;
