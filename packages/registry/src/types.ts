import type { Constructor, Logger, PluginMetadata } from "@stockroom/core";
import type { DuplicateDefinitionConflict } from "@stockroom/errors";

/**
 * One catalog record. Entries are created by `Registry.add()` and mutated in
 * place by later calls for the same key; consumers see them read-only.
 */
export interface CatalogEntry {
  /** Lowercase name, unique within the category */
  readonly name: string;
  /** Lowercase category, e.g. `task` or `template_reports` */
  readonly category: string;
  /** Non-owning reference to a class, or parsed template content */
  readonly typeRef: unknown;
  /** Instances in insertion order, without duplicate references */
  readonly instances: readonly unknown[];
  readonly tags: ReadonlySet<string>;
  /** Constructor chain of `typeRef`, captured at registration (empty for non-classes) */
  readonly lineage: readonly object[];
  /** Identity of the plugin that registered the entry, if any */
  readonly metadata: PluginMetadata | undefined;
}

export interface AddOptions {
  readonly instances?: readonly unknown[];
  readonly tags?: readonly string[] | ReadonlySet<string>;
  readonly metadata?: PluginMetadata;
}

/** Fields that find() can project. `*` emits whole entries. */
export type ResultKey = "name" | "category" | "typeRef" | "instances" | "tags" | "metadata" | "*";

export interface FindQuery {
  /** Exact, case-insensitive */
  readonly name?: string;
  /** Case-insensitive regular expression, matched against the whole category */
  readonly category?: string;
  /** Entry's type must be this class or a subclass of it */
  readonly typeRef?: Constructor;
  /** Entry passes if it has at least one of these tags */
  readonly tags?: readonly string[] | ReadonlySet<string>;
  /** Stop once this many results are collected; `null` or `0` is unbounded (default 1) */
  readonly limit?: number | null;
}

export interface RemoveWhereCriteria {
  /** Delete entries whose category fully matches this pattern */
  readonly category?: string;
  /** Delete entries registered with exactly this type reference */
  readonly typeRef?: unknown;
  /** Strip these references from every entry's instance list */
  readonly instances?: readonly unknown[];
}

/**
 * The write side of the Registry, as handed to plugin entry points.
 */
export interface Registrar {
  add(category: string, name: string, typeRef: unknown, options?: AddOptions): CatalogEntry;
  has(category: string, name: string): boolean;
}

/** Called when an existing key is re-added with a different type reference. */
export type ConflictHandler = (conflict: DuplicateDefinitionConflict) => void;

export interface RegistryOptions {
  /** Throw DuplicateDefinitionConflict instead of reporting it */
  readonly strict?: boolean;
  /** Receives conflicts in non-strict mode (default: logged as a warning) */
  readonly onConflict?: ConflictHandler;
  readonly logger?: Logger;
}
