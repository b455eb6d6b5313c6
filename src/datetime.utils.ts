/**
 * Calendar-day helpers.
 *
 * Every date in the planner is a `YYYY-MM-DD` day string interpreted at UTC
 * midnight, so day arithmetic never crosses a DST boundary and day strings
 * compare correctly with `<` and `>`.
 */

const MS_PER_DAY = 24 * 60 * 60 * 1000;

const DAY_STRING_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

/** Days per month used for draft windows and penalty month conversions. */
export const DAYS_PER_MONTH = 30;

/**
 * Returns true when `value` is a well-formed `YYYY-MM-DD` string naming a
 * real calendar day.
 */
export function isDayString(value: string): boolean {
  if (!DAY_STRING_PATTERN.test(value)) return false;
  const date = parseDayString(value);
  return !Number.isNaN(date.getTime()) && formatDayString(date) === value;
}

/**
 * Parse a day string (YYYY-MM-DD) to a UTC Date.
 */
export function parseDayString(day: string): Date {
  return new Date(`${day}T00:00:00Z`);
}

/**
 * Formats a date as a YYYY-MM-DD string using its UTC fields.
 */
export function formatDayString(date: Date): string {
  const year = date.getUTCFullYear().toString().padStart(4, "0");
  const month = (date.getUTCMonth() + 1).toString().padStart(2, "0");
  const day = date.getUTCDate().toString().padStart(2, "0");
  return `${year}-${month}-${day}`;
}

export function addDays(day: string, days: number): string {
  return formatDayString(new Date(parseDayString(day).getTime() + days * MS_PER_DAY));
}

/**
 * Whole days from `from` to `to` (negative when `to` is earlier).
 */
export function daysBetween(from: string, to: string): number {
  return Math.round((parseDayString(to).getTime() - parseDayString(from).getTime()) / MS_PER_DAY);
}

/**
 * Calendar months from `from` to `to`, ignoring the day of month.
 *
 * @example
 * ```typescript
 * monthsBetween("2025-01-31", "2025-02-01"); // 1
 * monthsBetween("2024-11-15", "2025-02-15"); // 3
 * ```
 */
export function monthsBetween(from: string, to: string): number {
  const a = parseDayString(from);
  const b = parseDayString(to);
  return (
    (b.getUTCFullYear() - a.getUTCFullYear()) * 12 + (b.getUTCMonth() - a.getUTCMonth())
  );
}

export function minDay(days: Iterable<string>): string | undefined {
  let result: string | undefined;
  for (const day of days) {
    if (result === undefined || day < result) result = day;
  }
  return result;
}

export function maxDay(days: Iterable<string>): string | undefined {
  let result: string | undefined;
  for (const day of days) {
    if (result === undefined || day > result) result = day;
  }
  return result;
}

export function laterDay(a: string, b: string): string {
  return a > b ? a : b;
}

/**
 * Today's UTC calendar day.
 */
export function todayDayString(now: Date = new Date()): string {
  return formatDayString(now);
}

/**
 * The `YYYY-MM` month key of a day string.
 */
export function monthKey(day: string): string {
  return day.slice(0, 7);
}

/**
 * The `YYYY-Qn` quarter key of a day string.
 */
export function quarterKey(day: string): string {
  const quarter = Math.floor((Number(day.slice(5, 7)) - 1) / 3) + 1;
  return `${day.slice(0, 4)}-Q${quarter}`;
}
