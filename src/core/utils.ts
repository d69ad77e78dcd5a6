export function pad2(n: number) {
  return String(n).padStart(2, "0");
}

/**
 * Whole calendar days between two dates, ignoring the time of day.
 * Computed on UTC day numbers so DST shifts never produce a fractional day.
 */
export function daysBetween(
  a: { year: number; month: number; day: number },
  b: { year: number; month: number; day: number },
) {
  const da = Date.UTC(a.year, a.month - 1, a.day);
  const db = Date.UTC(b.year, b.month - 1, b.day);
  return Math.round((da - db) / 86_400_000);
}

export function isNodeError(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}

export function describeError(err: unknown) {
  return err instanceof Error ? err.message : String(err);
}
