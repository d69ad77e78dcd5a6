import {
  DEFAULT_MAX_AGE_DAYS,
  fromDateStamp,
  isValidCalendarDate,
  localCalendarDate,
  type CalendarDate,
  type DateCandidate,
} from "./date.js";
import { parseDate, parseMonthNameDate, type ParseDateOptions } from "./parse-date.js";
import { daysBetween } from "./utils.js";

export type ResolveOptions = ParseDateOptions & {
  maxAgeDays?: number;
};

export type ResolveInput = {
  filename: string;
  creationTime: Date;
  /** Read lazily, and only when the file name carries no date. */
  lines: Iterable<string> | AsyncIterable<string>;
  now?: Date;
  options?: ResolveOptions;
};

export type Resolution = {
  candidate: DateCandidate | null;
  needsConfirmation: boolean;
  reason: "trusted" | "stale" | "no-date";
};

type FilenameRule = {
  source: "filename" | "scanned-prefix";
  match(filename: string): CalendarDate | null;
};

function stampRule(source: FilenameRule["source"], re: RegExp): FilenameRule {
  return {
    source,
    match(filename) {
      const m = filename.match(re);
      return m ? fromDateStamp(m[1]) : null;
    },
  };
}

// Order matters: explicit naming conventions first.
const FILENAME_RULES: FilenameRule[] = [
  stampRule("filename", /^(\d{8})-.*\.pdf$/),
  stampRule("scanned-prefix", /^Scanned_(\d{8})-.*\.pdf$/),
  stampRule("filename", /^(\d{8})_.*\.pdf$/),
  {
    // "Receipt - CVS - May 17, 2024.pdf"
    source: "filename",
    match(filename) {
      const m = filename.match(/^.*\s-\s.*\s-\s([A-Za-z]+\s\d{1,2},\s\d{4})\.pdf$/);
      return m ? parseMonthNameDate(m[1]) : null;
    },
  },
];

export function dateFromFilename(filename: string): DateCandidate | null {
  for (const rule of FILENAME_RULES) {
    const date = rule.match(filename);
    if (date) return { ...date, source: rule.source, confident: true };
  }
  return null;
}

export async function dateFromText(
  lines: Iterable<string> | AsyncIterable<string>,
  options: ParseDateOptions = {},
): Promise<DateCandidate | null> {
  // Leaving the loop early closes the iterator, so the rest of the
  // document is never extracted.
  for await (const line of lines) {
    const candidate = parseDate(line, options);
    if (candidate) return candidate;
  }
  return null;
}

export function dateFromTimestamp(creationTime: Date): DateCandidate | null {
  const date = localCalendarDate(creationTime);
  if (!isValidCalendarDate(date)) return null;
  return { ...date, source: "fs-timestamp", confident: false };
}

export function isStale(date: CalendarDate, now: Date, maxAgeDays: number) {
  return Math.abs(daysBetween(date, localCalendarDate(now))) > maxAgeDays;
}

/**
 * Picks the date for a file: file name, then the first dated line of its
 * text, then its creation time. Text-derived dates too far from today and
 * timestamp guesses are returned as suggestions that need confirmation.
 */
export async function resolveDate(input: ResolveInput): Promise<Resolution> {
  const { filename, creationTime, lines, now = new Date(), options = {} } = input;

  const fromName = dateFromFilename(filename);
  if (fromName) {
    return { candidate: fromName, needsConfirmation: false, reason: "trusted" };
  }

  const fromText = await dateFromText(lines, options);
  if (fromText) {
    const stale = isStale(fromText, now, options.maxAgeDays ?? DEFAULT_MAX_AGE_DAYS);
    return {
      candidate: fromText,
      needsConfirmation: stale,
      reason: stale ? "stale" : "trusted",
    };
  }

  return {
    candidate: dateFromTimestamp(creationTime),
    needsConfirmation: true,
    reason: "no-date",
  };
}
