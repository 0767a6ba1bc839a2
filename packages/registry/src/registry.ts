import { createConsoleLogger, isClass, type Logger, type PluginMetadata } from "@stockroom/core";
import {
  CatalogEntryNotFoundError,
  CatalogQueryError,
  DuplicateDefinitionConflict,
  InvalidCatalogKeyError,
  RegistryDisposedError,
} from "@stockroom/errors";
import type {
  AddOptions,
  CatalogEntry,
  ConflictHandler,
  FindQuery,
  RegistryOptions,
  RemoveWhereCriteria,
  ResultKey,
} from "./types.js";

// ---------------------------------------------------------------------------
// Catalog entry (internal, mutable)
// ---------------------------------------------------------------------------

interface MutableEntry {
  readonly name: string;
  readonly category: string;
  readonly typeRef: unknown;
  readonly instances: unknown[];
  readonly tags: Set<string>;
  readonly lineage: readonly object[];
  metadata: PluginMetadata | undefined;
}

type Instantiable = new (...args: unknown[]) => unknown;

function isInstantiable(value: unknown): value is Instantiable {
  return isClass(value);
}

/** Composite key of an entry: `category-name`, both lowercase. */
export function catalogKey(category: string, name: string): string {
  return `${category.toLowerCase()}-${name.toLowerCase()}`;
}

/**
 * Constructor chain of a type reference, most derived first. Computed once
 * when the entry is created so the type filter in find() is a list lookup.
 */
export function lineageOf(typeRef: unknown): object[] {
  const chain: object[] = [];
  let current: unknown = typeRef;
  while (typeof current === "function" && current !== Function.prototype) {
    chain.push(current);
    current = Object.getPrototypeOf(current);
  }
  return chain;
}

function compileCategoryPattern(pattern: string): RegExp {
  try {
    return new RegExp(`^(?:${pattern})$`, "i");
  } catch (error) {
    throw new CatalogQueryError("category", `"${pattern}" is not a valid regular expression`, error);
  }
}

// ---------------------------------------------------------------------------
// Registry
// ---------------------------------------------------------------------------

/**
 * In-process catalog of class definitions, templates and live instances,
 * keyed by `(category, name)`.
 *
 * All operations are synchronous, so a single call never interleaves with
 * another. Callers that mutate the registry from several async flows
 * (discovery runs, for instance) serialize those flows themselves.
 *
 * @example
 * ```typescript
 * const registry = new Registry();
 * registry.add("task", "copy", CopyTask, { tags: ["fs"] });
 *
 * registry.find("typeRef", { name: "copy", category: "task" }); // [CopyTask]
 * registry.find("name", { category: "template_.*", limit: null });
 * ```
 */
export class Registry {
  private readonly entriesByKey = new Map<string, MutableEntry>();
  private readonly strict: boolean;
  private readonly onConflict: ConflictHandler;
  private disposed = false;

  constructor(options: RegistryOptions = {}) {
    const logger: Logger = options.logger ?? createConsoleLogger("registry");
    this.strict = options.strict ?? false;
    this.onConflict = options.onConflict ?? ((conflict) => logger.warn(conflict.message, conflict));
  }

  /**
   * Add an entry, or extend the existing entry for the same key.
   *
   * New instances are appended unless the same reference is already listed,
   * and tags are merged. The type reference of an existing entry is never
   * replaced; a different one is reported as a DuplicateDefinitionConflict
   * (thrown in strict mode).
   */
  add(category: string, name: string, typeRef: unknown, options: AddOptions = {}): CatalogEntry {
    if (this.disposed) throw new RegistryDisposedError();
    if (!category) throw new InvalidCatalogKeyError("category");
    if (!name) throw new InvalidCatalogKeyError("name");

    const normalizedCategory = category.toLowerCase();
    const normalizedName = name.toLowerCase();
    const key = catalogKey(normalizedCategory, normalizedName);

    let entry = this.entriesByKey.get(key);
    if (!entry) {
      entry = {
        name: normalizedName,
        category: normalizedCategory,
        typeRef,
        instances: [],
        tags: new Set(),
        lineage: lineageOf(typeRef),
        metadata: options.metadata,
      };
      this.entriesByKey.set(key, entry);
    } else if (typeRef !== undefined && entry.typeRef !== typeRef) {
      const conflict = new DuplicateDefinitionConflict(normalizedCategory, normalizedName);
      if (this.strict) throw conflict;
      this.onConflict(conflict);
    }

    for (const instance of options.instances ?? []) {
      if (!entry.instances.includes(instance)) {
        entry.instances.push(instance);
      }
    }
    for (const tag of options.tags ?? []) {
      entry.tags.add(tag);
    }
    if (entry.metadata === undefined && options.metadata !== undefined) {
      entry.metadata = options.metadata;
    }

    return entry;
  }

  /**
   * Find entries matching every given criterion and project one field.
   *
   * Results follow insertion order. List-valued fields (`instances`, `tags`)
   * are flattened into the result; fields that are unset contribute nothing.
   * Iteration stops once the result holds at least `limit` items.
   *
   * @throws {CatalogQueryError} if `category` is not a valid pattern
   */
  find(resultKey: "*", query?: FindQuery): CatalogEntry[];
  find(resultKey: "name" | "category" | "tags", query?: FindQuery): string[];
  find(resultKey: "metadata", query?: FindQuery): PluginMetadata[];
  find(resultKey: "typeRef" | "instances", query?: FindQuery): unknown[];
  find(resultKey: ResultKey, query?: FindQuery): unknown[];
  find(resultKey: ResultKey, query: FindQuery = {}): unknown[] {
    const name = query.name?.toLowerCase();
    const categoryPattern =
      query.category !== undefined ? compileCategoryPattern(query.category) : undefined;
    const tags = query.tags !== undefined ? new Set(query.tags) : undefined;
    const limit = query.limit === undefined ? 1 : query.limit;
    const bounded = limit !== null && limit > 0;

    const result: unknown[] = [];

    for (const entry of this.entriesByKey.values()) {
      if (name !== undefined && entry.name !== name) continue;
      if (categoryPattern && !categoryPattern.test(entry.category)) continue;
      if (query.typeRef !== undefined && !entry.lineage.includes(query.typeRef)) continue;
      if (tags && ![...entry.tags].some((tag) => tags.has(tag))) continue;

      result.push(...project(entry, resultKey));

      if (bounded && result.length >= limit) break;
    }

    return result;
  }

  /** The entry for an exact key, if present. */
  get(category: string, name: string): CatalogEntry | undefined {
    return this.entriesByKey.get(catalogKey(category, name));
  }

  has(category: string, name: string): boolean {
    return this.entriesByKey.has(catalogKey(category, name));
  }

  /** Snapshot of all entries in insertion order. */
  entries(): readonly CatalogEntry[] {
    return [...this.entriesByKey.values()];
  }

  get size(): number {
    return this.entriesByKey.size;
  }

  /**
   * Delete the entry at the exact `(category, name)` key. No-op when absent.
   */
  remove(name: string, category: string): void {
    this.entriesByKey.delete(catalogKey(category, name));
  }

  /**
   * Bulk removal. Entries whose category matches `category`, or whose type
   * reference is `typeRef`, are deleted; the given `instances` are stripped
   * from every remaining entry.
   *
   * @returns number of entries deleted
   */
  removeWhere(criteria: RemoveWhereCriteria): number {
    const categoryPattern =
      criteria.category !== undefined ? compileCategoryPattern(criteria.category) : undefined;
    const hasTypeRef = criteria.typeRef !== undefined;
    let removed = 0;

    for (const [key, entry] of [...this.entriesByKey]) {
      if (
        (categoryPattern && categoryPattern.test(entry.category)) ||
        (hasTypeRef && entry.typeRef === criteria.typeRef)
      ) {
        this.entriesByKey.delete(key);
        removed++;
        continue;
      }

      for (const instance of criteria.instances ?? []) {
        const index = entry.instances.indexOf(instance);
        if (index !== -1) entry.instances.splice(index, 1);
      }
    }

    return removed;
  }

  /**
   * Construct the class registered at `(category, name)` and record the new
   * instance on its entry.
   *
   * @throws {CatalogEntryNotFoundError} if the key is absent or not a class
   */
  instantiate(category: string, name: string, ...args: unknown[]): unknown {
    const entry = this.entriesByKey.get(catalogKey(category, name));
    if (!entry) throw new CatalogEntryNotFoundError(category, name);

    const cls = entry.typeRef;
    if (!isInstantiable(cls)) {
      throw new CatalogEntryNotFoundError(category, name, "is not a constructible class");
    }

    const instance = new cls(...args);
    this.add(entry.category, entry.name, cls, { instances: [instance] });
    return instance;
  }

  /** Remove every entry. */
  clear(): void {
    this.entriesByKey.clear();
  }

  /** Clear the registry and refuse further additions. */
  dispose(): void {
    this.clear();
    this.disposed = true;
  }

  get isDisposed(): boolean {
    return this.disposed;
  }
}

function project(entry: MutableEntry, resultKey: ResultKey): unknown[] {
  const key = resultKey;
  switch (key) {
    case "*":
      return [entry];
    case "name":
      return [entry.name];
    case "category":
      return [entry.category];
    case "typeRef":
      return entry.typeRef === undefined || entry.typeRef === null ? [] : [entry.typeRef];
    case "instances":
      return [...entry.instances];
    case "tags":
      return [...entry.tags];
    case "metadata":
      return entry.metadata === undefined ? [] : [entry.metadata];
    default: {
      const _exhaustive: never = key;
      throw new CatalogQueryError("resultKey", `unknown result key "${String(_exhaustive)}"`);
    }
  }
}

// ---------------------------------------------------------------------------
// Process-wide default
// ---------------------------------------------------------------------------

let defaultRegistry: Registry | undefined;

/**
 * The shared registry used when a component is not handed one explicitly.
 */
export function getDefaultRegistry(): Registry {
  defaultRegistry ??= new Registry();
  return defaultRegistry;
}

/**
 * Dispose the shared registry; the next getDefaultRegistry() call builds a
 * fresh one. Call between independent test runs or application reloads.
 */
export function resetDefaultRegistry(): void {
  defaultRegistry?.dispose();
  defaultRegistry = undefined;
}
