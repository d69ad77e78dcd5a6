import fs from "node:fs/promises";
import { constants as fsConstants } from "node:fs";
import path from "node:path";
import { MissingDependencyError, MissingDirectoryError } from "./errors.js";

export type ToolLookup = (tool: string) => Promise<boolean>;

/** Looks for an executable named `tool` in each PATH entry. */
export const findOnPath: ToolLookup = async (tool) => {
  const dirs = (process.env.PATH ?? "").split(path.delimiter).filter(Boolean);
  const exts =
    process.platform === "win32"
      ? (process.env.PATHEXT ?? ".EXE;.CMD;.BAT").split(";")
      : [""];

  for (const dir of dirs) {
    for (const ext of exts) {
      try {
        await fs.access(path.join(dir, tool + ext), fsConstants.X_OK);
        return true;
      } catch {
        // not in this entry
      }
    }
  }
  return false;
};

export async function checkDependencies(
  tools: string[],
  lookup: ToolLookup = findOnPath,
) {
  for (const tool of tools) {
    if (!(await lookup(tool))) throw new MissingDependencyError(tool);
  }
}

export async function checkDirectories(dirs: string[]) {
  for (const dir of dirs) {
    const stats = await fs.stat(dir).catch(() => null);
    if (!stats?.isDirectory()) throw new MissingDirectoryError(dir);
  }
}
