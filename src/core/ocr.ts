import { execFile } from "node:child_process";
import { promisify } from "node:util";
import { OcrError } from "./errors.js";

const execFileAsync = promisify(execFile);

export type OcrEngine = {
  /** Tools that must be on PATH before a run starts. */
  readonly requires: string[];
  /** Writes a searchable copy of `input` to `output`. */
  run(input: string, output: string): Promise<void>;
};

/**
 * ocrmypdf with --skip-text: pages that already carry text are passed
 * through, so searchable PDFs come out unchanged.
 */
export function createOcrMyPdfEngine(binary = "ocrmypdf"): OcrEngine {
  return {
    requires: [binary],
    async run(input, output) {
      try {
        await execFileAsync(binary, [
          "-q",
          "--skip-text",
          "--output-type",
          "pdf",
          input,
          output,
        ]);
      } catch (err) {
        throw new OcrError(input, err);
      }
    },
  };
}
