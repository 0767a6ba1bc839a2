import { z } from "zod";

/**
 * Any class, including abstract ones. Used as an opaque type reference and as
 * the target of subclass / instance-of filters.
 */
export type Constructor<T = unknown> = abstract new (...args: never[]) => T;

/**
 * Mapping of plugin source (npm package name or source-control URL) to the
 * version (registry packages) or branch / ref (source control) to install.
 */
export type DeclaredPlugins = Readonly<Record<string, string>>;

// ---------------------------------------------------------------------------
// Plugin metadata sidecar
// ---------------------------------------------------------------------------

export const PluginMetadataSchema = z
  .object({
    name: z.string().min(1),
    version: z.string().min(1),
    author: z.string().optional(),
    description: z.string().optional(),
    url: z.string().optional(),
  })
  .passthrough();

/**
 * Identity of a plugin package, read from the metadata file at the package
 * root and attached to everything discovery registers from that package.
 */
export type PluginMetadata = Readonly<z.infer<typeof PluginMetadataSchema>>;
