import { join } from "node:path";
import { PluginLoadError } from "@stockroom/errors";
import { createTempDir, removeTempDir, writeFiles } from "@stockroom/test-utils";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { moduleNameFor, NodeModulesSource, StaticPackageSource } from "../package-source.js";
import type { ModuleLoadResult } from "../types.js";
import { writeTempPlugin } from "./helpers.js";

function loadedNames(results: readonly ModuleLoadResult[]): string[] {
  return results.flatMap((r) => (r.status === "loaded" ? [r.module.moduleName] : []));
}

describe("moduleNameFor", () => {
  it("dots the path onto the package name", () => {
    expect(moduleNameFor("stockroom-plugin-aws", ["tasks", "copy"])).toBe("stockroom-plugin-aws.tasks.copy");
  });

  it("names index modules after their directory", () => {
    expect(moduleNameFor("stockroom-plugin-aws", ["index"])).toBe("stockroom-plugin-aws");
    expect(moduleNameFor("stockroom-plugin-aws", ["tasks", "index"])).toBe("stockroom-plugin-aws.tasks");
  });
});

describe("NodeModulesSource", () => {
  let tempDir: string;
  let packagesDir: string;
  let source: NodeModulesSource;

  beforeEach(async () => {
    tempDir = await createTempDir("stockroom-package-source-");
    packagesDir = join(tempDir, "node_modules");
    source = new NodeModulesSource({ packagesDir, prefix: "stockroom-plugin-" });
  });

  afterEach(async () => {
    await removeTempDir(tempDir);
  });

  it("lists prefixed packages, scoped ones included", async () => {
    await writeTempPlugin(packagesDir, "stockroom-plugin-b");
    await writeTempPlugin(packagesDir, "@acme/stockroom-plugin-a");
    await writeTempPlugin(packagesDir, "left-pad");

    const packages = await source.listPackages();

    expect(packages.map((p) => p.name)).toEqual(["@acme/stockroom-plugin-a", "stockroom-plugin-b"]);
  });

  it("imports every module below the package root", async () => {
    const root = await writeTempPlugin(packagesDir, "stockroom-plugin-a", {
      "tasks/copy.mjs": "export class CopyTask {}\n",
      "tasks/index.mjs": "export const tasks = [];\n",
      "types.d.mjs": "export {};\n",
      "node_modules/dep/index.mjs": "export const dep = 1;\n",
    });

    const results = await source.loadModules({ name: "stockroom-plugin-a", root });

    expect(loadedNames(results)).toEqual([
      "stockroom-plugin-a",
      "stockroom-plugin-a.tasks.copy",
      "stockroom-plugin-a.tasks",
    ]);
    const copy = results.find((r) => r.status === "loaded" && r.module.moduleName.endsWith(".copy"));
    expect(copy?.status === "loaded" ? Object.keys(copy.module.exports) : []).toEqual(["CopyTask"]);
  });

  it("skips index modules on request", async () => {
    const root = await writeTempPlugin(packagesDir, "stockroom-plugin-a", {
      "widgets.mjs": "export const widget = {};\n",
    });

    const results = await source.loadModules({ name: "stockroom-plugin-a", root }, { skipIndex: true });

    expect(loadedNames(results)).toEqual(["stockroom-plugin-a.widgets"]);
  });

  it("reports a failing import without stopping the others", async () => {
    const root = await writeTempPlugin(packagesDir, "stockroom-plugin-a", {
      "broken.mjs": 'throw new Error("broken on import");\n',
    });

    const results = await source.loadModules({ name: "stockroom-plugin-a", root });

    const failed = results.find((r) => r.status === "failed");
    expect(failed?.status).toBe("failed");
    if (failed?.status === "failed") {
      expect(failed.moduleName).toBe("stockroom-plugin-a.broken");
      expect(failed.error).toBeInstanceOf(PluginLoadError);
      expect(failed.error.message).toBe(
        'Plugin load failed [import] "stockroom-plugin-a": stockroom-plugin-a.broken: broken on import',
      );
    }
    expect(loadedNames(results)).toEqual(["stockroom-plugin-a"]);
  });

  it("loads the registration entry point when present", async () => {
    const root = await writeTempPlugin(packagesDir, "stockroom-plugin-a", {
      "register.mjs": "export function register() {}\n",
    });

    const entryPoint = await source.loadEntryPoint({ name: "stockroom-plugin-a", root }, "register");

    expect(typeof entryPoint?.register).toBe("function");
  });

  it("resolves undefined without an entry point", async () => {
    const root = await writeTempPlugin(packagesDir, "stockroom-plugin-a");

    await expect(source.loadEntryPoint({ name: "stockroom-plugin-a", root }, "register")).resolves.toBeUndefined();
  });

  it("throws PluginLoadError when the entry point fails to import", async () => {
    const root = await writeTempPlugin(packagesDir, "stockroom-plugin-a", {
      "register.mjs": 'throw new Error("nope");\n',
    });

    await expect(source.loadEntryPoint({ name: "stockroom-plugin-a", root }, "register")).rejects.toThrow(
      PluginLoadError,
    );
  });

  it("reads the metadata sidecar as JSON", async () => {
    const root = await writeTempPlugin(packagesDir, "stockroom-plugin-a");

    await expect(source.readMetadata({ name: "stockroom-plugin-a", root }, "meta.json")).resolves.toEqual({
      name: "stockroom-plugin-a",
      version: "0.1.0",
    });
    await expect(source.readMetadata({ name: "stockroom-plugin-a", root }, "missing.json")).rejects.toThrow();
  });

  it("treats a missing packages directory as empty", async () => {
    const missing = new NodeModulesSource({ packagesDir: join(tempDir, "nope"), prefix: "stockroom-plugin-" });
    await expect(missing.listPackages()).resolves.toEqual([]);
  });

  it("ignores files outside the configured extensions", async () => {
    const root = join(packagesDir, "plain");
    await writeFiles(root, { "index.mjs": "export const a = 1;\n", "notes.txt": "hello" });

    const results = await source.loadModules({ name: "plain", root });

    expect(loadedNames(results)).toEqual(["plain"]);
  });
});

describe("StaticPackageSource", () => {
  const source = new StaticPackageSource([
    {
      name: "stockroom-plugin-b",
      modules: { index: { a: 1 }, "tasks.copy": { b: 2 }, broken: new Error("boom") },
      entryPoints: { register: { register: () => undefined } },
      metadata: { name: "b", version: "1.0.0" },
    },
    { name: "stockroom-plugin-a", root: "/plugins/a" },
  ]);

  it("lists packages sorted by name", async () => {
    await expect(source.listPackages()).resolves.toEqual([
      { name: "stockroom-plugin-a", root: "/plugins/a" },
      { name: "stockroom-plugin-b", root: "static:stockroom-plugin-b" },
    ]);
  });

  it("serves modules and their failures", async () => {
    const results = await source.loadModules({ name: "stockroom-plugin-b", root: "" });

    expect(loadedNames(results)).toEqual(["stockroom-plugin-b", "stockroom-plugin-b.tasks.copy"]);
    expect(results[2]?.status).toBe("failed");
  });

  it("serves entry points and metadata", async () => {
    const pkg = { name: "stockroom-plugin-b", root: "" };

    expect(await source.loadEntryPoint(pkg, "register")).toHaveProperty("register");
    expect(await source.loadEntryPoint(pkg, "setup")).toBeUndefined();
    await expect(source.readMetadata(pkg, "meta.json")).resolves.toEqual({ name: "b", version: "1.0.0" });
    await expect(source.readMetadata({ name: "stockroom-plugin-a", root: "" }, "meta.json")).rejects.toThrow(
      "meta.json not found",
    );
  });
});
