import path from "node:path";
import type { RunConfig } from "./config.js";
import { confirmDate } from "./confirm.js";
import { toDateStamp, type DateCandidate } from "./date.js";
import { findPdfs, readFileEntry, type RawFileEntry } from "./discover.js";
import { RefileToolError } from "./errors.js";
import type { TextExtractor } from "./extract.js";
import type { Logger } from "./logger.js";
import type { OcrEngine } from "./ocr.js";
import type { FileOpener, Prompt } from "./prompt.js";
import { refile, type RefileResult } from "./refile.js";
import { resolveDate } from "./resolve.js";
import { describeError } from "./utils.js";

export type PipelineDeps = {
  ocr: OcrEngine;
  extractor: TextExtractor;
  prompt: Prompt;
  logger: Logger;
  open?: FileOpener;
  now?: () => Date;
};

export type SkipReason = "missing" | "ocr-failed" | "refile-failed";

export type FileOutcome =
  | { status: "refiled"; file: string; date: DateCandidate; target: RefileResult }
  | { status: "planned"; file: string; date: DateCandidate; target: RefileResult }
  | { status: "skipped"; file: string; reason: SkipReason; message: string };

export type RunSummary = {
  total: number;
  refiled: number;
  planned: number;
  skipped: number;
  sourcesLeft: number;
};

/** Extraction errors end the line stream instead of failing the file. */
async function* tolerantLines(
  extractor: TextExtractor,
  pdfPath: string,
  logger: Logger,
): AsyncGenerator<string> {
  try {
    for await (const line of extractor.lines(pdfPath)) {
      logger.debug(`Trying to parse: ${line}`);
      yield line;
    }
  } catch (err) {
    logger.warn(`Text extraction failed for ${pdfPath}: ${describeError(err)}`);
  }
}

export async function processFile(
  entry: RawFileEntry,
  index: number,
  workDir: string,
  config: RunConfig,
  deps: PipelineDeps,
): Promise<FileOutcome> {
  const { logger } = deps;
  const file = entry.path;
  const processedPath = path.join(workDir, `${index}-${entry.filename}`);

  try {
    await deps.ocr.run(file, processedPath);
  } catch (err) {
    logger.error(`OCR processing failed for ${file}`, err instanceof RefileToolError ? err.cause : err);
    return { status: "skipped", file, reason: "ocr-failed", message: describeError(err) };
  }

  const resolution = await resolveDate({
    filename: entry.filename,
    creationTime: entry.creationTime,
    lines: tolerantLines(deps.extractor, processedPath, logger),
    now: deps.now?.(),
    options: { maxAgeDays: config.maxAgeDays, yearPivot: config.yearPivot },
  });

  if (resolution.reason === "no-date") {
    logger.info(`No date stamp could be extracted from ${file}.`);
  } else if (resolution.reason === "stale") {
    logger.info(
      `The parsed date stamp is more than ${config.maxAgeDays} days away from today's date.`,
    );
  } else if (resolution.candidate) {
    logger.debug(
      `Date stamp from ${resolution.candidate.source}: ${toDateStamp(resolution.candidate)}`,
    );
  }

  const date = await confirmDate(resolution, {
    file,
    prompt: deps.prompt,
    logger,
    open: deps.open,
  });
  logger.info(`Date stamp: ${toDateStamp(date)}`);

  try {
    const target = await refile(
      {
        sourcePath: file,
        processedPath,
        filename: entry.filename,
        date,
        destRoot: config.destDir,
        dryRun: config.dryRun,
      },
      logger,
    );
    return { status: config.dryRun ? "planned" : "refiled", file, date, target };
  } catch (err) {
    logger.error(describeError(err), err instanceof RefileToolError ? err.cause : undefined);
    return { status: "skipped", file, reason: "refile-failed", message: describeError(err) };
  }
}

export function summarize(outcomes: FileOutcome[]): RunSummary {
  const count = (status: FileOutcome["status"]) =>
    outcomes.filter((o) => o.status === status).length;
  return {
    total: outcomes.length,
    refiled: count("refiled"),
    planned: count("planned"),
    skipped: count("skipped"),
    sourcesLeft: outcomes.filter(
      (o) => o.status === "refiled" && !o.target.sourceRemoved,
    ).length,
  };
}

/**
 * OCR, date and refile every PDF in the scan dir, one at a time.
 * A failing file is skipped; the run carries on with the next one.
 */
export async function processFiles(
  config: RunConfig,
  workDir: string,
  deps: PipelineDeps,
): Promise<FileOutcome[]> {
  const { logger } = deps;
  const files = await findPdfs(config.scanDir);
  const outcomes: FileOutcome[] = [];

  for (const [index, file] of files.entries()) {
    logger.info(`Processing ${path.relative(config.scanDir, file)}...`);

    let entry: RawFileEntry;
    try {
      entry = await readFileEntry(file);
    } catch (err) {
      logger.error(`File ${file} does not exist.`);
      outcomes.push({ status: "skipped", file, reason: "missing", message: describeError(err) });
      continue;
    }

    outcomes.push(await processFile(entry, index, workDir, config, deps));
  }

  return outcomes;
}

export function logSummary(summary: RunSummary, logger: Logger) {
  const parts = [`${summary.total} file(s)`];
  if (summary.refiled) parts.push(`${summary.refiled} refiled`);
  if (summary.planned) parts.push(`${summary.planned} planned (dry run)`);
  if (summary.skipped) parts.push(`${summary.skipped} skipped`);
  logger.info(`Done: ${parts.join(", ")}`);
  if (summary.sourcesLeft) {
    logger.warn(`${summary.sourcesLeft} original(s) could not be removed after refiling`);
  }
}
