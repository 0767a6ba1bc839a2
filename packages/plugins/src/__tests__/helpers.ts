import { join } from "node:path";
import { writeFiles } from "@stockroom/test-utils";
import type { CommandOutput, CommandRunner } from "../installer.js";

export interface RecordedCommand {
  readonly command: string;
  readonly args: readonly string[];
  readonly cwd: string;
}

/**
 * Command runner that records its calls and returns a fixed output.
 */
export function createStubRunner(output: Partial<CommandOutput> = {}): {
  runner: CommandRunner;
  calls: RecordedCommand[];
} {
  const calls: RecordedCommand[] = [];
  const runner: CommandRunner = (command, args, cwd) => {
    calls.push({ command, args: [...args], cwd });
    return { status: 0, stdout: "", stderr: "", ...output };
  };
  return { runner, calls };
}

/**
 * Write a real ESM plugin package below `packagesDir` for integration tests.
 * Returns the package root.
 */
export async function writeTempPlugin(
  packagesDir: string,
  packageName: string,
  files: Readonly<Record<string, string>> = {},
): Promise<string> {
  const root = join(packagesDir, ...packageName.split("/"));
  await writeFiles(root, {
    "package.json": JSON.stringify({ name: packageName, version: "0.1.0", type: "module" }),
    "meta.json": JSON.stringify({ name: packageName, version: "0.1.0" }),
    "index.mjs": "export class PluginTask {}\n",
    ...files,
  });
  return root;
}
