#!/usr/bin/env node
import dotenv from "dotenv";
import { loadConfig, type RunConfig } from "../core/config.js";
import { toDateStamp } from "../core/date.js";
import { ConfigError, InterruptedError, RefileToolError } from "../core/errors.js";
import { pdfjsExtractor } from "../core/extract.js";
import { createLogger } from "../core/logger.js";
import { createOcrMyPdfEngine } from "../core/ocr.js";
import { parseDate } from "../core/parse-date.js";
import { logSummary, processFiles, summarize } from "../core/pipeline.js";
import { checkDependencies, checkDirectories } from "../core/preflight.js";
import { createConsolePrompt, openInViewer } from "../core/prompt.js";
import { INTERRUPTED_EXIT_CODE, withWorkspace } from "../core/workspace.js";
import { parseCliArgs, USAGE, type CliCommand } from "./args.js";

async function run(config: RunConfig) {
  const logger = createLogger(config.logLevel);
  const ocr = createOcrMyPdfEngine();

  await checkDependencies(ocr.requires);
  await checkDirectories([config.scanDir, config.destDir]);

  const prompt = createConsolePrompt();
  try {
    const outcomes = await withWorkspace(
      (workDir) =>
        processFiles(config, workDir, {
          ocr,
          extractor: pdfjsExtractor,
          prompt,
          logger,
          open: openInViewer,
        }),
      {
        onInterrupt: () => {
          console.error("Interrupted.");
          process.exit(INTERRUPTED_EXIT_CODE);
        },
      },
    );
    logSummary(summarize(outcomes), logger);
  } finally {
    prompt.close();
  }
}

async function main(argv: string[]): Promise<number> {
  dotenv.config();

  let command: CliCommand;
  try {
    command = parseCliArgs(argv);
  } catch (err) {
    console.error(err instanceof Error ? err.message : err);
    console.error(USAGE);
    return 1;
  }

  if (command.kind === "help") {
    console.log(USAGE);
    return 0;
  }

  try {
    const config = loadConfig(command.flags);

    if (command.kind === "test-date") {
      const candidate = parseDate(command.input, { yearPivot: config.yearPivot });
      if (!candidate) {
        createLogger(config.logLevel).warn(`No date found in "${command.input}"`);
        return 1;
      }
      console.log(toDateStamp(candidate));
      return 0;
    }

    await run(config);
    return 0;
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(`[ERROR] ${err.message}`);
      console.error(USAGE);
      return 1;
    }
    if (err instanceof InterruptedError) {
      // withWorkspace has already removed the temp directory.
      if (err.reason === "SIGINT") {
        console.error(err.message);
        return INTERRUPTED_EXIT_CODE;
      }
      console.error(`[ERROR] ${err.message}`);
      return 1;
    }
    if (err instanceof RefileToolError) {
      console.error(`[ERROR] ${err.message}`);
      return 1;
    }
    throw err;
  }
}

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    console.error(err);
    process.exit(1);
  });
