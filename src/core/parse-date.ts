import {
  DEFAULT_YEAR_PIVOT,
  isValidCalendarDate,
  type CalendarDate,
  type DateCandidate,
} from "./date.js";

export type ParseDateOptions = {
  yearPivot?: number;
};

// 2020-03-15, 15.03.2020, 03/15/20 ... same delimiter on both sides
const DATE_TOKEN = /^(\d{2,4})([-./])(\d{2})\2(\d{2,4})$/;

const MONTHS: Record<string, number> = {
  jan: 1, january: 1,
  feb: 2, february: 2,
  mar: 3, march: 3,
  apr: 4, april: 4,
  may: 5,
  jun: 6, june: 6,
  jul: 7, july: 7,
  aug: 8, august: 8,
  sep: 9, sept: 9, september: 9,
  oct: 10, october: 10,
  nov: 11, november: 11,
  dec: 12, december: 12,
};

/**
 * "12 / 03 / 2020" -> "12/03/2020". OCR output often pads delimiters with
 * spaces, which would otherwise split one date into three tokens.
 */
export function collapseDelimiters(line: string) {
  return line.replace(/\s*([-./])\s*/g, "$1");
}

export function expandYear(raw: string, pivot: number = DEFAULT_YEAR_PIVOT) {
  const n = parseInt(raw, 10);
  if (raw.length !== 2) return n;
  return n > pivot ? 1900 + n : 2000 + n;
}

/**
 * Finds the first date-shaped token in a line of free text.
 *
 * Slash-delimited dates read month/day/year (US). Dash and dot dates read
 * year/month/day when the first part has four digits, day/month/year
 * otherwise. Only the first date-shaped token is considered; if it is out of
 * range the line has no date.
 */
export function parseDate(
  line: string,
  options: ParseDateOptions = {},
): DateCandidate | null {
  const tokens = collapseDelimiters(line).split(/\s+/);
  const match = tokens
    .map((token) => token.match(DATE_TOKEN))
    .find((m) => m !== null);
  if (!match) return null;

  const [, first, delimiter, middle, last] = match;

  let parts: { year: string; month: string; day: string };
  if (delimiter === "/") {
    parts = { month: first, day: middle, year: last };
  } else if (first.length === 4) {
    parts = { year: first, month: middle, day: last };
  } else {
    parts = { day: first, month: middle, year: last };
  }

  const date: CalendarDate = {
    year: expandYear(parts.year, options.yearPivot),
    month: parseInt(parts.month, 10),
    day: parseInt(parts.day, 10),
  };
  if (!isValidCalendarDate(date)) return null;

  return { ...date, source: "text-scan", confident: true };
}

/** "May 17, 2024" / "Sep 3, 2021" */
export function parseMonthNameDate(text: string): CalendarDate | null {
  const m = text.trim().match(/^([A-Za-z]+)\s+(\d{1,2}),\s*(\d{4})$/);
  if (!m) return null;

  const key = m[1].toLowerCase();
  if (!Object.hasOwn(MONTHS, key)) return null;
  const month = MONTHS[key];

  const date = { year: parseInt(m[3], 10), month, day: parseInt(m[2], 10) };
  return isValidCalendarDate(date) ? date : null;
}
