import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { listPluginPackages } from "../../plugin-packages.js";

describe("listPluginPackages", () => {
  let packagesDir: string;

  beforeEach(async () => {
    packagesDir = await mkdtemp(join(tmpdir(), "stockroom-packages-"));
  });

  afterEach(async () => {
    await rm(packagesDir, { recursive: true, force: true });
  });

  it("returns an empty list for a missing directory", async () => {
    expect(await listPluginPackages(join(packagesDir, "nope"), "stockroom-plugin-")).toEqual([]);
  });

  it("lists prefixed packages, including scoped ones, sorted by name", async () => {
    await mkdir(join(packagesDir, "stockroom-plugin-gcp"));
    await mkdir(join(packagesDir, "stockroom-plugin-aws"));
    await mkdir(join(packagesDir, "left-pad"));
    await mkdir(join(packagesDir, "@acme", "stockroom-plugin-internal"), { recursive: true });
    await mkdir(join(packagesDir, "@acme", "utils"), { recursive: true });
    await writeFile(join(packagesDir, "stockroom-plugin-file.txt"), "not a directory");

    const result = await listPluginPackages(packagesDir, "stockroom-plugin-");

    expect(result).toEqual([
      { name: "@acme/stockroom-plugin-internal", root: join(packagesDir, "@acme", "stockroom-plugin-internal") },
      { name: "stockroom-plugin-aws", root: join(packagesDir, "stockroom-plugin-aws") },
      { name: "stockroom-plugin-gcp", root: join(packagesDir, "stockroom-plugin-gcp") },
    ]);
  });
});
