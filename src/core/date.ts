import { pad2 } from "./utils.js";

export const MIN_YEAR = 1900;
export const MAX_YEAR = 2050;

/** Days a text-derived date may sit from today before the operator must confirm it. */
export const DEFAULT_MAX_AGE_DAYS = 365;

/** Two-digit years above this map to 19xx, the rest to 20xx. */
export const DEFAULT_YEAR_PIVOT = 50;

export type CalendarDate = { year: number; month: number; day: number };

export type DateSource =
  | "filename"
  | "scanned-prefix"
  | "text-scan"
  | "fs-timestamp"
  | "user";

export type DateCandidate = CalendarDate &
  (
    | { source: "filename" | "scanned-prefix" | "text-scan" | "user"; confident: true }
    | { source: "fs-timestamp"; confident: false }
  );

export function isValidCalendarDate({ year, month, day }: CalendarDate) {
  return (
    Number.isInteger(year) &&
    Number.isInteger(month) &&
    Number.isInteger(day) &&
    year >= MIN_YEAR &&
    year <= MAX_YEAR &&
    month >= 1 &&
    month <= 12 &&
    day >= 1 &&
    day <= 31
  );
}

export function toDateStamp({ year, month, day }: CalendarDate) {
  return `${String(year).padStart(4, "0")}${pad2(month)}${pad2(day)}`;
}

/** Splits an 8-digit YYYYMMDD stamp; null when it is malformed or out of range. */
export function fromDateStamp(stamp: string): CalendarDate | null {
  const m = stamp.match(/^(\d{4})(\d{2})(\d{2})$/);
  if (!m) return null;
  const date = {
    year: parseInt(m[1], 10),
    month: parseInt(m[2], 10),
    day: parseInt(m[3], 10),
  };
  return isValidCalendarDate(date) ? date : null;
}

export function localCalendarDate(d: Date): CalendarDate {
  return { year: d.getFullYear(), month: d.getMonth() + 1, day: d.getDate() };
}
