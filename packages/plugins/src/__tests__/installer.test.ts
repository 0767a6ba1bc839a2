import { join } from "node:path";
import { silentLogger } from "@stockroom/core";
import { InternalError, PluginInstallError, PluginSourceError } from "@stockroom/errors";
import { Registry } from "@stockroom/registry";
import { createTempDir, RecordingLogger, removeTempDir, writeFiles } from "@stockroom/test-utils";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { type CommandRunner, PluginInstaller } from "../installer.js";
import { StaticPackageSource } from "../package-source.js";
import { PluginCatalog } from "../plugin-catalog.js";
import { PluginDiscovery } from "../plugin-discovery.js";
import { createStubRunner } from "./helpers.js";

class AwsTask {}

describe("PluginInstaller", () => {
  let catalog: PluginCatalog;
  let discovery: PluginDiscovery;
  let logger: RecordingLogger;

  beforeEach(() => {
    catalog = new PluginCatalog();
    logger = new RecordingLogger();
    const source = new StaticPackageSource([
      {
        name: "stockroom-plugin-aws",
        metadata: { name: "aws", version: "1.2.0" },
        modules: { index: { AwsTask } },
      },
    ]);
    discovery = new PluginDiscovery(catalog, {
      source,
      registrar: new Registry({ logger: silentLogger }),
      logger: silentLogger,
    });
  });

  function createInstaller(runner: CommandRunner, pluginsFile?: string): PluginInstaller {
    return new PluginInstaller(catalog, discovery, {
      projectDir: "/project",
      runner,
      logger,
      ...(pluginsFile ? { pluginsFile } : {}),
    });
  }

  it("does nothing but warn when no plugins are declared", async () => {
    const { runner, calls } = createStubRunner();
    const installer = createInstaller(runner);

    const result = await installer.install();

    expect(result).toEqual({ ok: true, specs: [], discovery: undefined });
    expect(calls).toEqual([]);
    expect(logger.messages("warn")).toEqual(["No plugins declared; nothing to install"]);
    expect(catalog.classes.size).toBe(0);
    expect(catalog.instantiated.size).toBe(0);
  });

  it("installs every declared plugin in one call", async () => {
    const { runner, calls } = createStubRunner();
    const installer = createInstaller(runner);
    installer.declare("stockroom-plugin-aws", "1.2.0");
    installer.declare("https://example.com/acme/plugin.git");

    await installer.install({ quiet: true });

    expect(calls).toEqual([
      {
        command: "npm",
        args: [
          "install",
          "--silent",
          "stockroom-plugin-aws@1.2.0",
          "git+https://example.com/acme/plugin.git#main",
        ],
        cwd: "/project",
      },
    ]);
  });

  it("runs package discovery after a successful install", async () => {
    const { runner } = createStubRunner();
    const installer = createInstaller(runner);
    installer.declare("stockroom-plugin-aws", "1.2.0");

    const result = await installer.install();

    expect(result.ok).toBe(true);
    expect(result.ok && result.discovery?.loaded).toEqual(["stockroom-plugin-aws"]);
    expect(catalog.findClasses({ className: "AwsTask" })).toBe(AwsTask);
    expect(logger.messages("info")).toEqual(["Installed 1 plugin(s): stockroom-plugin-aws@1.2.0"]);
  });

  it("logs captured output and skips discovery on a non-zero exit", async () => {
    const { runner } = createStubRunner({ status: 1, stdout: "resolving\n", stderr: "E404 not found\n" });
    const installer = createInstaller(runner);
    installer.declare("stockroom-plugin-aws", "1.2.0");

    const result = await installer.install();

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(PluginInstallError);
      expect(result.error.exitCode).toBe(1);
      expect(result.error.stderr).toBe("E404 not found\n");
    }
    expect(logger.messages("error")).toEqual([
      'Plugin install command "npm install stockroom-plugin-aws@1.2.0" exited with code 1\nstdout:\nresolving\nstderr:\nE404 not found',
    ]);
    expect(discovery.isLoaded("stockroom-plugin-aws")).toBe(false);
    expect(catalog.classes.size).toBe(0);
  });

  it("reports a package manager that cannot be spawned", async () => {
    const { runner } = createStubRunner({ status: null, error: new Error("spawn npm ENOENT") });
    const installer = createInstaller(runner);
    installer.declare("stockroom-plugin-aws", "1.2.0");

    const result = await installer.install();

    expect(result.ok).toBe(false);
    expect(logger.messages("error")).toEqual([
      'Plugin install command "npm install stockroom-plugin-aws@1.2.0" did not exit normally\nspawn npm ENOENT',
    ]);
  });

  it("turns a throwing runner into a failed result", async () => {
    const runner: CommandRunner = () => {
      throw new Error("runner exploded");
    };
    const installer = createInstaller(runner);
    installer.declare("stockroom-plugin-aws", "1.2.0");

    const result = await installer.install();

    expect(result.ok).toBe(false);
    expect(logger.errors("error")[0]).toBeInstanceOf(PluginInstallError);
  });

  it("wraps a non-Error thrown by the runner as the failure cause", async () => {
    const runner: CommandRunner = () => {
      throw "runner gave up";
    };
    const installer = createInstaller(runner);
    installer.declare("stockroom-plugin-aws", "1.2.0");

    const result = await installer.install();

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.cause).toBeInstanceOf(InternalError);
      expect(result.error.exitCode).toBeNull();
    }
    expect(logger.messages("error")[0]).toContain("runner gave up");
  });

  describe("plugins file", () => {
    let tempDir: string;

    beforeEach(async () => {
      tempDir = await createTempDir("stockroom-installer-");
    });

    afterEach(async () => {
      await removeTempDir(tempDir);
    });

    it("declares the plugins listed in the file", async () => {
      const pluginsFile = join(tempDir, "plugins.txt");
      await writeFiles(tempDir, { "plugins.txt": "stockroom-plugin-aws@1.2.0\nstockroom-plugin-db\n" });
      const installer = createInstaller(createStubRunner().runner, pluginsFile);

      const declared = await installer.fromPluginsFile();

      expect(declared).toEqual({ "stockroom-plugin-aws": "1.2.0", "stockroom-plugin-db": "latest" });
      expect(catalog.declaredRecord()).toEqual(declared);
    });

    it("saves the declared plugins", async () => {
      const pluginsFile = join(tempDir, "out", "plugins.txt");
      const installer = createInstaller(createStubRunner().runner, pluginsFile);
      installer.declare("stockroom-plugin-aws", "1.2.0");

      await installer.savePluginsFile();

      await expect(installer.fromPluginsFile()).resolves.toEqual({ "stockroom-plugin-aws": "1.2.0" });
    });

    it("requires a configured plugins file", async () => {
      const installer = createInstaller(createStubRunner().runner);

      await expect(installer.fromPluginsFile()).rejects.toThrow(PluginSourceError);
    });
  });
});
