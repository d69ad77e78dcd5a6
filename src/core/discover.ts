import fs from "node:fs/promises";
import path from "node:path";

export type RawFileEntry = {
  readonly path: string;
  readonly filename: string;
  readonly creationTime: Date;
};

/** Scan dir plus one level of subfolders. */
const MAX_DEPTH = 2;

async function collect(dir: string, depth: number, out: string[]) {
  const entries = await fs.readdir(dir, { withFileTypes: true });
  for (const entry of entries) {
    const full = path.join(dir, entry.name);
    if (entry.isFile() && entry.name.endsWith(".pdf")) {
      out.push(full);
    } else if (entry.isDirectory() && depth < MAX_DEPTH) {
      await collect(full, depth + 1, out);
    }
  }
}

export async function findPdfs(scanDir: string) {
  const found: string[] = [];
  await collect(scanDir, 1, found);
  return found.sort();
}

/**
 * Birth time where the file system records one, otherwise the
 * modification time.
 */
export async function readFileEntry(filePath: string): Promise<RawFileEntry> {
  const stats = await fs.stat(filePath);
  const creationTime = stats.birthtimeMs > 0 ? stats.birthtime : stats.mtime;
  return { path: filePath, filename: path.basename(filePath), creationTime };
}
