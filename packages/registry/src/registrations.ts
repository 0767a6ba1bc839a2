import type { PluginMetadata } from "@stockroom/core";
import type { AddOptions, CatalogEntry, Registrar } from "./types.js";

/**
 * One row of a static registration table.
 */
export interface RegistrationRecord {
  readonly category: string;
  readonly name: string;
  readonly typeRef: unknown;
  readonly tags?: readonly string[];
  readonly instances?: readonly unknown[];
}

/**
 * Register a table of definitions in order.
 *
 * Plugins and hosts declare what they contribute as a plain array built after
 * all their types are defined, and call this once during initialization.
 *
 * @example
 * ```typescript
 * export const registrations: RegistrationRecord[] = [
 *   { category: "task", name: "copy", typeRef: CopyTask },
 *   { category: "blueprint", name: "health", typeRef: HealthBlueprint, tags: ["api"] },
 * ];
 *
 * applyRegistrations(registry, registrations);
 * ```
 */
export function applyRegistrations(
  registrar: Registrar,
  table: readonly RegistrationRecord[],
  defaults: Omit<AddOptions, "instances"> = {},
): CatalogEntry[] {
  return table.map((record) => {
    const tags = [...(defaults.tags ?? []), ...(record.tags ?? [])];
    return registrar.add(record.category, record.name, record.typeRef, {
      ...(record.instances ? { instances: record.instances } : {}),
      ...(tags.length > 0 ? { tags } : {}),
      ...(defaults.metadata ? { metadata: defaults.metadata } : {}),
    });
  });
}

/**
 * A Registrar that forwards to `registrar`, attaching `metadata` and extra
 * tags to every entry it adds.
 */
export function scopedRegistrar(
  registrar: Registrar,
  scope: { readonly metadata?: PluginMetadata | undefined; readonly tags?: readonly string[] },
): Registrar {
  return {
    add(category, name, typeRef, options = {}) {
      const tags = [...(scope.tags ?? []), ...(options.tags ?? [])];
      const metadata = options.metadata ?? scope.metadata;
      return registrar.add(category, name, typeRef, {
        ...options,
        ...(tags.length > 0 ? { tags } : {}),
        ...(metadata ? { metadata } : {}),
      });
    },
    has: (category, name) => registrar.has(category, name),
  };
}
