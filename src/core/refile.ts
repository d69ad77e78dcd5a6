import fs from "node:fs/promises";
import { constants as fsConstants } from "node:fs";
import path from "node:path";
import { toDateStamp, type CalendarDate } from "./date.js";
import { RefileError } from "./errors.js";
import type { Logger } from "./logger.js";
import { isNodeError, pad2 } from "./utils.js";

export type RefileTarget = {
  destFolder: string;
  destFile: string;
};

export type RefileRequest = {
  /** The scanned original, removed once the processed copy is in place. */
  sourcePath: string;
  /** The searchable copy that gets moved into the datetree. */
  processedPath: string;
  filename: string;
  date: CalendarDate;
  destRoot: string;
  dryRun: boolean;
};

export type RefileResult = RefileTarget & {
  moved: boolean;
  sourceRemoved: boolean;
};

export function datetreeFolder(destRoot: string, { year, month, day }: CalendarDate) {
  return path.join(destRoot, String(year).padStart(4, "0"), pad2(month), pad2(day));
}

async function exists(p: string) {
  try {
    await fs.access(p);
    return true;
  } catch {
    return false;
  }
}

/**
 * First free path in the folder: "name.pdf", then "name_1.pdf",
 * "name_2.pdf", ...
 */
export async function uniqueDestination(destFolder: string, filename: string) {
  const ext = path.extname(filename);
  const base = filename.slice(0, filename.length - ext.length);

  let destFile = path.join(destFolder, filename);
  for (let counter = 1; await exists(destFile); counter++) {
    destFile = path.join(destFolder, `${base}_${counter}${ext}`);
  }
  return destFile;
}

async function moveFile(from: string, to: string) {
  try {
    await fs.rename(from, to);
  } catch (err) {
    // The temp workspace usually lives on another file system.
    if (!isNodeError(err) || err.code !== "EXDEV") throw err;
    await fs.copyFile(from, to, fsConstants.COPYFILE_EXCL);
    await fs.unlink(from);
  }
}

export async function refile(
  req: RefileRequest,
  logger: Logger,
): Promise<RefileResult> {
  const destFolder = datetreeFolder(req.destRoot, req.date);

  if (!req.dryRun) {
    try {
      await fs.mkdir(destFolder, { recursive: true });
    } catch (err) {
      throw new RefileError(
        "mkdir",
        `Failed to create destination folder ${destFolder}`,
        err,
      );
    }
  }

  const destFile = await uniqueDestination(destFolder, req.filename);

  if (req.dryRun) {
    logger.info(
      `Dry-run mode enabled. Not moving ${req.processedPath} to ${destFile} (${toDateStamp(req.date)})`,
    );
    return { destFolder, destFile, moved: false, sourceRemoved: false };
  }

  logger.info(`Moving processed file to ${destFile}`);
  try {
    await moveFile(req.processedPath, destFile);
  } catch (err) {
    throw new RefileError(
      "move",
      `Failed to move ${req.processedPath} to ${destFile}`,
      err,
    );
  }

  let sourceRemoved = true;
  try {
    await fs.unlink(req.sourcePath);
  } catch (err) {
    sourceRemoved = false;
    logger.error(`Failed to remove ${req.sourcePath}`, err);
  }

  return { destFolder, destFile, moved: true, sourceRemoved };
}
