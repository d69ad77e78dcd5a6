import fs from "node:fs/promises";
import { getDocument } from "pdfjs-dist/legacy/build/pdf.mjs";

export type TextExtractor = {
  /** Fresh extraction on every call; lines come out page by page. */
  lines(pdfPath: string): AsyncIterable<string>;
};

// The parts of pdf.js TextItem / TextMarkedContent this module reads.
type TextRun = { str: string; hasEOL: boolean };
type MarkedContent = { type: string };

/** Joins the text runs of one page into its lines, dropping blank ones. */
export function pageLines(items: ReadonlyArray<TextRun | MarkedContent>) {
  const lines: string[] = [];
  let current = "";

  for (const item of items) {
    if (!("str" in item)) continue;
    current += item.str;
    if (item.hasEOL) {
      lines.push(current);
      current = "";
    }
  }
  if (current) lines.push(current);

  return lines.map((l) => l.trim()).filter((l) => l.length > 0);
}

/**
 * Pages are parsed one at a time, so a consumer that stops early never pays
 * for the rest of the document.
 */
export async function* pdfLines(pdfPath: string): AsyncGenerator<string> {
  const data = new Uint8Array(await fs.readFile(pdfPath));
  const doc = await getDocument({ data, verbosity: 0, isEvalSupported: false }).promise;

  try {
    for (let pageNum = 1; pageNum <= doc.numPages; pageNum++) {
      const page = await doc.getPage(pageNum);
      const content = await page.getTextContent();
      page.cleanup();
      yield* pageLines(content.items);
    }
  } finally {
    await doc.destroy();
  }
}

export const pdfjsExtractor: TextExtractor = { lines: pdfLines };
