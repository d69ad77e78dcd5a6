import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { RunConfig } from "./config.js";
import { InterruptedError, OcrError } from "./errors.js";
import type { TextExtractor } from "./extract.js";
import { silentLogger } from "./logger.js";
import type { OcrEngine } from "./ocr.js";
import { processFiles, summarize, type FileOutcome, type PipelineDeps } from "./pipeline.js";
import type { Prompt } from "./prompt.js";

const NOW = new Date(2026, 9, 18, 12, 0, 0);

let root: string;
let scanDir: string;
let destDir: string;
let workDir: string;

beforeEach(async () => {
  root = await fs.mkdtemp(path.join(os.tmpdir(), "pipeline-test-"));
  scanDir = path.join(root, "scans");
  destDir = path.join(root, "dest");
  workDir = path.join(root, "work");
  await Promise.all([scanDir, destDir, workDir].map((d) => fs.mkdir(d)));
});

afterEach(async () => {
  await fs.rm(root, { recursive: true, force: true });
});

function config(overrides: Partial<RunConfig> = {}): RunConfig {
  return {
    scanDir,
    destDir,
    logLevel: "error",
    dryRun: false,
    maxAgeDays: 365,
    yearPivot: 50,
    ...overrides,
  };
}

async function addScan(rel: string) {
  const full = path.join(scanDir, rel);
  await fs.mkdir(path.dirname(full), { recursive: true });
  await fs.writeFile(full, `scan of ${rel}`);
}

const copyingOcr: OcrEngine = {
  requires: [],
  run: (input, output) => fs.copyFile(input, output),
};

/** Text keyed by original file name; work files are named "<index>-<name>". */
function fakeExtractor(text: Record<string, string[]>): TextExtractor {
  return {
    async *lines(pdfPath) {
      const name = path.basename(pdfPath).replace(/^\d+-/, "");
      yield* text[name] ?? [];
    },
  };
}

function answering(answers: string[]): Prompt {
  return {
    async ask() {
      const answer = answers.shift();
      if (answer === undefined) throw new Error("unexpected prompt");
      return answer;
    },
    close() {},
  };
}

function deps(overrides: Partial<PipelineDeps> = {}): PipelineDeps {
  return {
    ocr: copyingOcr,
    extractor: fakeExtractor({}),
    prompt: answering([]),
    logger: silentLogger,
    now: () => NOW,
    ...overrides,
  };
}

async function snapshotTree(dir: string, base = dir): Promise<Record<string, string>> {
  const out: Record<string, string> = {};
  for (const entry of await fs.readdir(dir, { withFileTypes: true })) {
    const full = path.join(dir, entry.name);
    if (entry.isDirectory()) Object.assign(out, await snapshotTree(full, base));
    else out[path.relative(base, full)] = await fs.readFile(full, "utf8");
  }
  return out;
}

describe("processFiles", () => {
  it("files each scan under its resolved date", async () => {
    await addScan("20230401-invoice.pdf");
    await addScan("letter.pdf");
    await addScan(path.join("inbox", "memo.pdf"));

    const outcomes = await processFiles(
      config(),
      workDir,
      deps({
        extractor: fakeExtractor({
          "letter.pdf": ["Dear customer", "Date: 2026-09-30"],
          "memo.pdf": ["no date here"],
        }),
        prompt: answering(["20250102"]),
      }),
    );

    expect(outcomes.map((o) => o.status)).toEqual(["refiled", "refiled", "refiled"]);
    expect(await snapshotTree(destDir)).toEqual({
      [path.join("2023", "04", "01", "20230401-invoice.pdf")]: "scan of 20230401-invoice.pdf",
      [path.join("2026", "09", "30", "letter.pdf")]: "scan of letter.pdf",
      [path.join("2025", "01", "02", "memo.pdf")]: `scan of ${path.join("inbox", "memo.pdf")}`,
    });
    expect(await snapshotTree(scanDir)).toEqual({});
  });

  it("gives same-named scans of one day distinct names", async () => {
    await addScan(path.join("a", "20240101-report.pdf"));
    await addScan(path.join("b", "20240101-report.pdf"));

    await processFiles(config(), workDir, deps());

    expect(Object.keys(await snapshotTree(destDir)).sort()).toEqual([
      path.join("2024", "01", "01", "20240101-report.pdf"),
      path.join("2024", "01", "01", "20240101-report_1.pdf"),
    ]);
  });

  it("leaves both trees untouched in dry-run mode", async () => {
    await addScan("20230401-invoice.pdf");
    await addScan("letter.pdf");
    await fs.mkdir(path.join(destDir, "2023", "04", "01"), { recursive: true });
    await fs.writeFile(path.join(destDir, "2023", "04", "01", "20230401-invoice.pdf"), "kept");

    const scanBefore = await snapshotTree(scanDir);
    const destBefore = await snapshotTree(destDir);

    const outcomes = await processFiles(
      config({ dryRun: true }),
      workDir,
      deps({ extractor: fakeExtractor({ "letter.pdf": ["2026-10-01"] }) }),
    );

    expect(await snapshotTree(scanDir)).toEqual(scanBefore);
    expect(await snapshotTree(destDir)).toEqual(destBefore);
    expect(outcomes.map((o) => (o.status === "skipped" ? null : o.target.destFile))).toEqual([
      path.join(destDir, "2023", "04", "01", "20230401-invoice_1.pdf"),
      path.join(destDir, "2026", "10", "01", "letter.pdf"),
    ]);
    expect(outcomes.every((o) => o.status === "planned")).toBe(true);
  });

  it("skips files whose OCR fails and carries on", async () => {
    await addScan("20240101-bad.pdf");
    await addScan("20240102-good.pdf");
    const ocr: OcrEngine = {
      requires: [],
      async run(input, output) {
        if (input.endsWith("bad.pdf")) throw new OcrError(input, new Error("exit 2"));
        await fs.copyFile(input, output);
      },
    };

    const outcomes = await processFiles(config(), workDir, deps({ ocr }));

    expect(outcomes[0]).toMatchObject({ status: "skipped", reason: "ocr-failed" });
    expect(outcomes[1]).toMatchObject({ status: "refiled" });
    expect(await snapshotTree(scanDir)).toEqual({ "20240101-bad.pdf": "scan of 20240101-bad.pdf" });
  });

  it("falls back to the prompt when text extraction fails", async () => {
    await addScan("scan.pdf");
    const extractor: TextExtractor = {
      async *lines() {
        throw new Error("bad xref table");
      },
    };

    const outcomes = await processFiles(
      config(),
      workDir,
      deps({ extractor, prompt: answering(["20240607"]) }),
    );

    expect(outcomes[0]).toMatchObject({
      status: "refiled",
      date: { year: 2024, month: 6, day: 7, source: "user" },
    });
  });

  it("asks about stale text dates", async () => {
    await addScan("old.pdf");
    const asked: string[] = [];
    const prompt: Prompt = {
      async ask(question) {
        asked.push(question);
        return "";
      },
      close() {},
    };

    await processFiles(
      config(),
      workDir,
      deps({ extractor: fakeExtractor({ "old.pdf": ["01/31/2019"] }), prompt }),
    );

    expect(asked).toEqual([
      `Please validate/enter the date for ${path.join(scanDir, "old.pdf")} (YYYYMMDD) [20190131]: `,
    ]);
    expect(Object.keys(await snapshotTree(destDir))).toEqual([
      path.join("2019", "01", "31", "old.pdf"),
    ]);
  });

  it("stops the run and leaves the scan in place when the operator quits", async () => {
    await addScan("scan.pdf");
    const prompt: Prompt = {
      ask: () => Promise.reject(new InterruptedError("input-closed")),
      close() {},
    };

    await expect(processFiles(config(), workDir, deps({ prompt }))).rejects.toBeInstanceOf(
      InterruptedError,
    );
    expect(await snapshotTree(scanDir)).toEqual({ "scan.pdf": "scan of scan.pdf" });
    expect(await snapshotTree(destDir)).toEqual({});
  });
});

describe("summarize", () => {
  it("counts outcomes by status", () => {
    const date = { year: 2024, month: 1, day: 1, source: "filename", confident: true } as const;
    const target = { destFolder: "/d", destFile: "/d/a.pdf", moved: true, sourceRemoved: false };
    const outcomes: FileOutcome[] = [
      { status: "refiled", file: "a.pdf", date, target },
      { status: "skipped", file: "b.pdf", reason: "ocr-failed", message: "boom" },
      { status: "planned", file: "c.pdf", date, target: { ...target, moved: false } },
    ];

    expect(summarize(outcomes)).toEqual({
      total: 3,
      refiled: 1,
      planned: 1,
      skipped: 1,
      sourcesLeft: 1,
    });
  });
});
