import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";

/**
 * Create a fresh temporary directory. Pair with `removeTempDir` in afterEach.
 */
export async function createTempDir(prefix = "stockroom-test-"): Promise<string> {
  return mkdtemp(join(tmpdir(), prefix));
}

export async function removeTempDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

/**
 * Write a tree of files below `root`. Keys are `/`-separated relative paths.
 */
export async function writeFiles(
  root: string,
  files: Readonly<Record<string, string>>,
): Promise<string[]> {
  const written: string[] = [];
  for (const [relativePath, content] of Object.entries(files)) {
    const filePath = join(root, ...relativePath.split("/"));
    await mkdir(dirname(filePath), { recursive: true });
    await writeFile(filePath, content, "utf-8");
    written.push(filePath);
  }
  return written;
}
