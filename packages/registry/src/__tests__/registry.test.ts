import {
  CatalogEntryNotFoundError,
  CatalogQueryError,
  DuplicateDefinitionConflict,
  InvalidCatalogKeyError,
  RegistryDisposedError,
} from "@stockroom/errors";
import { RecordingLogger } from "@stockroom/test-utils";
import { beforeEach, describe, expect, it, vi } from "vitest";
import { getDefaultRegistry, Registry, resetDefaultRegistry } from "../registry.js";

class BaseTask {}
class CopyTask extends BaseTask {}
class DeleteTask extends BaseTask {}
class Blueprint {}

describe("Registry", () => {
  let logger: RecordingLogger;
  let registry: Registry;

  beforeEach(() => {
    logger = new RecordingLogger();
    registry = new Registry({ logger });
  });

  // -------------------------------------------------------------------------
  // add()
  // -------------------------------------------------------------------------

  describe("add", () => {
    it("should create an entry with lowercase key fields", () => {
      const entry = registry.add("Task", "Copy", CopyTask);

      expect(entry.category).toBe("task");
      expect(entry.name).toBe("copy");
      expect(entry.typeRef).toBe(CopyTask);
      expect(entry.instances).toEqual([]);
      expect([...entry.tags]).toEqual([]);
      expect(registry.has("TASK", "COPY")).toBe(true);
    });

    it("should union instances across calls without duplicates", () => {
      const a = new CopyTask();
      const b = new CopyTask();
      const c = new CopyTask();

      registry.add("task", "copy", CopyTask, { instances: [a, b] });
      const entry = registry.add("task", "copy", CopyTask, { instances: [b, c, a] });

      expect(registry.size).toBe(1);
      expect(entry.instances).toEqual([a, b, c]);
      expect(entry.instances[0]).toBe(a);
    });

    it("should deduplicate by reference, not equality", () => {
      const entry = registry.add("task", "copy", CopyTask, { instances: [{ id: 1 }, { id: 1 }] });
      expect(entry.instances).toHaveLength(2);
    });

    it("should merge tags", () => {
      registry.add("task", "copy", CopyTask, { tags: ["fs"] });
      const entry = registry.add("task", "copy", CopyTask, { tags: ["fs", "io"] });

      expect([...entry.tags].sort()).toEqual(["fs", "io"]);
    });

    it("should return the same entry object on re-add", () => {
      const first = registry.add("task", "copy", CopyTask);
      const second = registry.add("task", "copy", CopyTask);
      expect(second).toBe(first);
    });

    it("should keep the first type and report a conflict", () => {
      registry.add("task", "copy", CopyTask);
      const entry = registry.add("task", "copy", DeleteTask);

      expect(entry.typeRef).toBe(CopyTask);
      expect(logger.messages("warn")).toEqual([
        'Catalog entry "task-copy" is already defined with a different type; keeping the original',
      ]);
      expect(logger.errors("warn")[0]).toBeInstanceOf(DuplicateDefinitionConflict);
    });

    it("should not report a conflict when typeRef is omitted", () => {
      registry.add("task", "copy", CopyTask);
      registry.add("task", "copy", undefined, { instances: [new CopyTask()] });

      expect(logger.records).toEqual([]);
    });

    it("should pass conflicts to onConflict", () => {
      const onConflict = vi.fn();
      const reg = new Registry({ onConflict, logger });

      reg.add("task", "copy", CopyTask);
      reg.add("task", "copy", DeleteTask);

      expect(onConflict).toHaveBeenCalledOnce();
      expect(logger.records).toEqual([]);
    });

    it("should throw conflicts in strict mode", () => {
      const reg = new Registry({ strict: true, logger });
      reg.add("task", "copy", CopyTask);

      expect(() => reg.add("task", "copy", DeleteTask)).toThrow(DuplicateDefinitionConflict);
    });

    it("should reject empty category or name", () => {
      expect(() => registry.add("", "copy", CopyTask)).toThrow(InvalidCatalogKeyError);
      expect(() => registry.add("task", "", CopyTask)).toThrow(InvalidCatalogKeyError);
    });

    it("should keep the first metadata", () => {
      const meta = { name: "stockroom-plugin-fs", version: "1.0.0" };
      registry.add("task", "copy", CopyTask, { metadata: meta });
      const entry = registry.add("task", "copy", CopyTask, {
        metadata: { name: "other", version: "2.0.0" },
      });

      expect(entry.metadata).toBe(meta);
    });

    it("should compute the constructor lineage of classes", () => {
      expect(registry.add("task", "copy", CopyTask).lineage).toEqual([CopyTask, BaseTask]);
      expect(registry.add("template_reports", "x", { a: 1 }).lineage).toEqual([]);
    });
  });

  // -------------------------------------------------------------------------
  // find()
  // -------------------------------------------------------------------------

  describe("find", () => {
    beforeEach(() => {
      registry.add("task", "copy", CopyTask, { tags: ["fs", "io"] });
      registry.add("task", "delete", DeleteTask, { tags: ["fs"] });
      registry.add("blueprint", "health", Blueprint, { tags: ["api"] });
      registry.add("template_reports", "aws.rds.instances", { fields: ["id"] });
      registry.add("template_services", "aws.rds.instances", { fields: ["name"] });
      registry.add("other", "misc", { x: 1 });
    });

    it("should default to one result", () => {
      expect(registry.find("name", { category: "task" })).toEqual(["copy"]);
    });

    it("should return everything with limit null or 0", () => {
      expect(registry.find("name", { category: "task", limit: null })).toEqual(["copy", "delete"]);
      expect(registry.find("name", { limit: 0 })).toHaveLength(6);
    });

    it("should match name exactly and case-insensitively", () => {
      expect(registry.find("typeRef", { name: "COPY" })).toEqual([CopyTask]);
      expect(registry.find("typeRef", { name: "cop" })).toEqual([]);
    });

    it("should full-match category as a regular expression", () => {
      const categories = registry.find("category", { category: "template_.*", limit: null });
      expect(categories).toEqual(["template_reports", "template_services"]);
    });

    it("should not treat category as a substring", () => {
      expect(registry.find("name", { category: "temp", limit: null })).toEqual([]);
      expect(registry.find("name", { category: "TASK", limit: null })).toEqual(["copy", "delete"]);
    });

    it("should throw CatalogQueryError for an invalid pattern", () => {
      expect(() => registry.find("name", { category: "task(" })).toThrow(CatalogQueryError);
    });

    it("should filter by type including subclasses", () => {
      expect(registry.find("typeRef", { typeRef: BaseTask, limit: null })).toEqual([
        CopyTask,
        DeleteTask,
      ]);
      expect(registry.find("typeRef", { typeRef: CopyTask, limit: null })).toEqual([CopyTask]);
    });

    it("should match any of the given tags", () => {
      expect(registry.find("name", { tags: ["io", "api"], limit: null })).toEqual([
        "copy",
        "health",
      ]);
      expect(registry.find("name", { tags: ["fs"], limit: null })).toEqual(["copy", "delete"]);
      expect(registry.find("name", { tags: ["none"], limit: null })).toEqual([]);
    });

    it("should match whole tags only", () => {
      registry.add("task", "short", CopyTask, { tags: new Set(["f"]) });

      expect(registry.find("name", { tags: new Set(["fs"]), limit: null })).toEqual(["copy", "delete"]);
      expect(registry.find("name", { tags: ["f"], limit: null })).toEqual(["short"]);
    });

    it("should combine criteria", () => {
      expect(registry.find("name", { category: "task", tags: ["io"], limit: null })).toEqual([
        "copy",
      ]);
    });

    it("should emit whole entries for *", () => {
      const [entry] = registry.find("*", { name: "health" });
      expect(entry?.category).toBe("blueprint");
      expect(entry?.typeRef).toBe(Blueprint);
    });

    it("should flatten list-valued fields", () => {
      const a = new CopyTask();
      const b = new CopyTask();
      registry.add("task", "copy", CopyTask, { instances: [a, b] });

      expect(registry.find("instances", { name: "copy" })).toEqual([a, b]);
      expect(registry.find("tags", { name: "copy" })).toEqual(["fs", "io"]);
    });

    it("should stop after the entry that reaches the limit", () => {
      const a = new CopyTask();
      const b = new CopyTask();
      const c = new DeleteTask();
      registry.add("task", "copy", CopyTask, { instances: [a, b] });
      registry.add("task", "delete", DeleteTask, { instances: [c] });

      expect(registry.find("instances", { category: "task", limit: 1 })).toEqual([a, b]);
      expect(registry.find("instances", { category: "task", limit: 3 })).toEqual([a, b, c]);
    });

    it("should skip empty instance lists", () => {
      expect(registry.find("instances", { category: "task", limit: null })).toEqual([]);
    });

    it("should project metadata only where present", () => {
      const meta = { name: "stockroom-plugin-fs", version: "1.0.0" };
      registry.add("task", "copy", CopyTask, { metadata: meta });

      expect(registry.find("metadata", { limit: null })).toEqual([meta]);
    });

    it("should return an empty list on a miss", () => {
      expect(registry.find("*", { name: "nope" })).toEqual([]);
    });
  });

  // -------------------------------------------------------------------------
  // remove() / removeWhere()
  // -------------------------------------------------------------------------

  describe("remove", () => {
    it("should delete the exact key", () => {
      registry.add("task", "copy", CopyTask);
      registry.add("blueprint", "copy", Blueprint);

      registry.remove("copy", "task");

      expect(registry.find("name", { name: "copy", category: "task" })).toEqual([]);
      expect(registry.has("blueprint", "copy")).toBe(true);
    });

    it("should be case-insensitive", () => {
      registry.add("task", "copy", CopyTask);
      registry.remove("COPY", "Task");
      expect(registry.size).toBe(0);
    });

    it("should ignore missing keys", () => {
      expect(() => registry.remove("nope", "task")).not.toThrow();
    });
  });

  describe("removeWhere", () => {
    it("should delete entries by category pattern", () => {
      registry.add("template_reports", "a", {});
      registry.add("template_services", "b", {});
      registry.add("task", "copy", CopyTask);

      expect(registry.removeWhere({ category: "template_.*" })).toBe(2);
      expect(registry.entries().map((e) => e.name)).toEqual(["copy"]);
    });

    it("should delete entries by type reference identity", () => {
      registry.add("task", "copy", CopyTask);
      registry.add("task", "delete", DeleteTask);

      expect(registry.removeWhere({ typeRef: CopyTask })).toBe(1);
      expect(registry.has("task", "delete")).toBe(true);
    });

    it("should strip instances without deleting entries", () => {
      const a = new CopyTask();
      const b = new CopyTask();
      registry.add("task", "copy", CopyTask, { instances: [a, b] });

      expect(registry.removeWhere({ instances: [a] })).toBe(0);
      expect(registry.get("task", "copy")?.instances).toEqual([b]);
    });
  });

  // -------------------------------------------------------------------------
  // instantiate()
  // -------------------------------------------------------------------------

  describe("instantiate", () => {
    it("should construct and record the instance", () => {
      class Greeter {
        constructor(readonly greeting: string) {}
      }
      registry.add("service", "greeter", Greeter);

      const instance = registry.instantiate("service", "greeter", "hello");

      expect(instance).toBeInstanceOf(Greeter);
      expect(registry.find("instances", { name: "greeter" })).toEqual([instance]);
    });

    it("should throw for unknown keys or non-classes", () => {
      registry.add("template_reports", "x", { a: 1 });

      expect(() => registry.instantiate("task", "nope")).toThrow(CatalogEntryNotFoundError);
      expect(() => registry.instantiate("template_reports", "x")).toThrow(
        CatalogEntryNotFoundError,
      );
    });
  });

  // -------------------------------------------------------------------------
  // lifecycle
  // -------------------------------------------------------------------------

  describe("lifecycle", () => {
    it("clear() empties the registry", () => {
      registry.add("task", "copy", CopyTask);
      registry.clear();

      expect(registry.size).toBe(0);
      registry.add("task", "copy", CopyTask);
      expect(registry.size).toBe(1);
    });

    it("dispose() refuses further additions", () => {
      registry.add("task", "copy", CopyTask);
      registry.dispose();

      expect(registry.isDisposed).toBe(true);
      expect(registry.size).toBe(0);
      expect(() => registry.add("task", "copy", CopyTask)).toThrow(RegistryDisposedError);
    });

    it("the default registry is shared until reset", () => {
      const first = getDefaultRegistry();
      expect(getDefaultRegistry()).toBe(first);

      resetDefaultRegistry();

      expect(first.isDisposed).toBe(true);
      expect(getDefaultRegistry()).not.toBe(first);
      resetDefaultRegistry();
    });
  });
});
