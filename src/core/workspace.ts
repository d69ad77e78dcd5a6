import fs from "node:fs/promises";
import { rmSync } from "node:fs";
import os from "node:os";
import path from "node:path";

export const INTERRUPTED_EXIT_CODE = 130;

export type WorkspaceOptions = {
  parent?: string;
  onInterrupt?: (signal: NodeJS.Signals) => void;
};

/**
 * Runs `fn` with a fresh temp directory and removes it afterwards, whether
 * `fn` resolves, throws, or the process receives SIGINT/SIGTERM.
 */
export async function withWorkspace<T>(
  fn: (dir: string) => Promise<T>,
  options: WorkspaceOptions = {},
): Promise<T> {
  const dir = await fs.mkdtemp(path.join(options.parent ?? os.tmpdir(), "pdf-refile-"));

  const onSignal = (signal: NodeJS.Signals) => {
    // Signal handlers cannot await, so this cleanup is synchronous.
    rmSync(dir, { recursive: true, force: true });
    if (options.onInterrupt) options.onInterrupt(signal);
    else process.exit(INTERRUPTED_EXIT_CODE);
  };
  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);

  try {
    return await fn(dir);
  } finally {
    process.off("SIGINT", onSignal);
    process.off("SIGTERM", onSignal);
    await fs.rm(dir, { recursive: true, force: true });
  }
}
