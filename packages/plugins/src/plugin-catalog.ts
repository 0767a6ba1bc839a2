import { type Constructor, isClass, isObject, isSubclassOf, type PluginMetadata } from "@stockroom/core";
import type { CatalogSection, ClassFilter, FindClassesQuery } from "./types.js";

interface Candidate {
  readonly packageName: string;
  /** Catalog key for classes, constructor name for instances */
  readonly className: string;
  /** Class, or the instance's constructor */
  readonly type: unknown;
  readonly value: unknown;
}

/**
 * Secondary index filled by plugin discovery and the installer.
 *
 * - `classes`: package → class name → class
 * - `instantiated`: package → module name → instances (no duplicate references)
 * - `declared`: plugin source (package name or URL) → version or branch
 * - `metadata`: package → plugin metadata
 *
 * A class belongs to the first package that recorded it; the same class
 * re-exported by another package is not recorded again.
 */
export class PluginCatalog {
  private readonly classesByPackage = new Map<string, Map<string, Constructor>>();
  private readonly instancesByPackage = new Map<string, Map<string, unknown[]>>();
  private readonly declaredPlugins = new Map<string, string>();
  private readonly metadataByPackage = new Map<string, PluginMetadata>();
  private owners = new WeakMap<Constructor, string>();
  private classMetadata = new WeakMap<Constructor, PluginMetadata>();

  get classes(): ReadonlyMap<string, ReadonlyMap<string, Constructor>> {
    return this.classesByPackage;
  }

  get instantiated(): ReadonlyMap<string, ReadonlyMap<string, readonly unknown[]>> {
    return this.instancesByPackage;
  }

  get declared(): ReadonlyMap<string, string> {
    return this.declaredPlugins;
  }

  get metadata(): ReadonlyMap<string, PluginMetadata> {
    return this.metadataByPackage;
  }

  // -------------------------------------------------------------------------
  // Mutation
  // -------------------------------------------------------------------------

  /**
   * Record a class under its package.
   *
   * @returns false when the class is already recorded (by this or another package)
   */
  addClass(
    packageName: string,
    className: string,
    cls: Constructor,
    metadata?: PluginMetadata,
  ): boolean {
    if (this.owners.has(cls)) return false;

    let byName = this.classesByPackage.get(packageName);
    if (!byName) {
      byName = new Map();
      this.classesByPackage.set(packageName, byName);
    }
    if (byName.has(className)) return false;

    byName.set(className, cls);
    this.owners.set(cls, packageName);
    if (metadata) this.classMetadata.set(cls, metadata);
    return true;
  }

  /**
   * Record an instance under its package and module.
   *
   * @returns false when the same reference is already listed there
   */
  addInstance(packageName: string, moduleName: string, instance: unknown): boolean {
    let byModule = this.instancesByPackage.get(packageName);
    if (!byModule) {
      byModule = new Map();
      this.instancesByPackage.set(packageName, byModule);
    }
    let list = byModule.get(moduleName);
    if (!list) {
      list = [];
      byModule.set(moduleName, list);
    }
    if (list.includes(instance)) return false;

    list.push(instance);
    return true;
  }

  /** Declare a plugin to install: a package name with a version, or a URL with a ref. */
  declare(source: string, versionOrRef: string): void {
    this.declaredPlugins.set(source, versionOrRef);
  }

  declareAll(plugins: Readonly<Record<string, string>>): void {
    for (const [source, versionOrRef] of Object.entries(plugins)) {
      this.declare(source, versionOrRef);
    }
  }

  setMetadata(packageName: string, metadata: PluginMetadata): void {
    this.metadataByPackage.set(packageName, metadata);
  }

  /** Declared plugins as a plain record, in declaration order. */
  declaredRecord(): Record<string, string> {
    return Object.fromEntries(this.declaredPlugins);
  }

  // -------------------------------------------------------------------------
  // Queries
  // -------------------------------------------------------------------------

  /** Package that recorded `cls`, if any. */
  ownerOf(cls: Constructor): string | undefined {
    return this.owners.get(cls);
  }

  /** Metadata of the package a discovered class came from. */
  metadataFor(typeRef: unknown): PluginMetadata | undefined {
    return isClass(typeRef) ? this.classMetadata.get(typeRef) : undefined;
  }

  /**
   * Search discovered classes and/or instances.
   *
   * Returns the first match, or `null` when nothing matches. With
   * `returnAllMatching` or `returnType: "both"` a (possibly empty) list is
   * returned instead. Classes come before instances; each section follows
   * recording order.
   *
   * @example
   * ```typescript
   * catalog.findClasses({ className: "CopyTask" });            // class or null
   * catalog.findClasses({ isSubclassOf: Task, returnAllMatching: true });
   * catalog.findClasses({ className: "Widget", returnType: "both" }); // [Widget, widget]
   * ```
   */
  findClasses(query: ClassFilter & { readonly returnType: "both"; readonly returnAllMatching?: boolean }): unknown[];
  findClasses(
    query: ClassFilter & { readonly returnType?: "classes"; readonly returnAllMatching: true },
  ): Constructor[];
  findClasses(
    query?: ClassFilter & { readonly returnType?: "classes"; readonly returnAllMatching?: false },
  ): Constructor | null;
  findClasses(query: FindClassesQuery): unknown;
  findClasses(query: FindClassesQuery = {}): unknown {
    const section: CatalogSection = query.returnType ?? "classes";
    const all = query.returnAllMatching === true || section === "both";

    const matches: unknown[] = [];
    for (const candidate of this.candidates(section)) {
      if (!matchesFilter(candidate, query)) continue;
      if (!all) return candidate.value;
      matches.push(candidate.value);
    }

    return all ? matches : null;
  }

  /** Forget everything, declarations included. */
  clear(): void {
    this.classesByPackage.clear();
    this.instancesByPackage.clear();
    this.declaredPlugins.clear();
    this.metadataByPackage.clear();
    this.owners = new WeakMap();
    this.classMetadata = new WeakMap();
  }

  private *candidates(section: CatalogSection): Generator<Candidate> {
    if (section === "classes" || section === "both") {
      for (const [packageName, byName] of this.classesByPackage) {
        for (const [className, cls] of byName) {
          yield { packageName, className, type: cls, value: cls };
        }
      }
    }
    if (section === "instantiated" || section === "both") {
      for (const [packageName, byModule] of this.instancesByPackage) {
        for (const instances of byModule.values()) {
          for (const instance of instances) {
            const type = constructorOf(instance);
            yield {
              packageName,
              className: typeof type === "function" ? type.name : "",
              type,
              value: instance,
            };
          }
        }
      }
    }
  }
}

function matchesFilter(candidate: Candidate, filter: ClassFilter): boolean {
  if (filter.className !== undefined && candidate.className !== filter.className) return false;
  if (filter.packageName !== undefined && candidate.packageName !== filter.packageName) return false;
  if (filter.isInstanceOf !== undefined && !(candidate.value instanceof filter.isInstanceOf)) {
    return false;
  }
  if (filter.isSubclassOf !== undefined && !isSubclassOf(candidate.type, filter.isSubclassOf)) {
    return false;
  }
  return true;
}

function constructorOf(value: unknown): unknown {
  if (!isObject(value)) return undefined;
  const proto: unknown = Object.getPrototypeOf(value);
  return isObject(proto) ? Reflect.get(proto, "constructor") : undefined;
}
