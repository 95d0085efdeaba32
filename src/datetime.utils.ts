import * as z from "zod";

const DayStringSchema = z.iso.date();

const US_DATE_PATTERN = /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/;

const MS_PER_DAY = 24 * 60 * 60 * 1000;

/**
 * Returns true for a valid calendar date in YYYY-MM-DD format.
 */
export function isDayString(value: string): boolean {
  return DayStringSchema.safeParse(value).success;
}

/**
 * Parse a day string (YYYY-MM-DD) to a UTC Date.
 * Used for date arithmetic that must not depend on the local time zone.
 */
export function parseDayString(day: string): Date {
  return new Date(`${day}T00:00:00Z`);
}

/**
 * Formats a date as a YYYY-MM-DD string using its UTC components.
 */
export function formatDayString(date: Date): string {
  const year = date.getUTCFullYear();
  const month = (date.getUTCMonth() + 1).toString().padStart(2, "0");
  const day = date.getUTCDate().toString().padStart(2, "0");
  return `${year}-${month}-${day}`;
}

/**
 * Formats a day string the way the daily matrix shows it (MM/DD/YYYY).
 *
 * @example
 * ```typescript
 * formatDisplayDate("2025-07-02"); // "07/02/2025"
 * ```
 */
export function formatDisplayDate(day: string): string {
  const [year, month, date] = day.split("-");
  return `${month}/${date}/${year}`;
}

/**
 * Normalizes a date cell to YYYY-MM-DD.
 *
 * Accepts ISO days and US-style `M/D/YYYY` dates. Returns `undefined`
 * for anything that is not a real calendar date.
 *
 * @example
 * ```typescript
 * normalizeDayInput("7/2/2025");   // "2025-07-02"
 * normalizeDayInput("2025-07-02"); // "2025-07-02"
 * normalizeDayInput("Total");      // undefined
 * ```
 */
export function normalizeDayInput(value: string): string | undefined {
  const trimmed = value.trim();
  if (isDayString(trimmed)) return trimmed;

  const match = US_DATE_PATTERN.exec(trimmed);
  if (!match) return undefined;

  const [, month = "", day = "", year = ""] = match;
  const candidate = `${year}-${month.padStart(2, "0")}-${day.padStart(2, "0")}`;
  return isDayString(candidate) ? candidate : undefined;
}

/**
 * Shifts a day string by a number of calendar days.
 */
export function addDays(day: string, amount: number): string {
  const date = parseDayString(day);
  date.setUTCDate(date.getUTCDate() + amount);
  return formatDayString(date);
}

/**
 * Whole calendar days from `start` to `end` (negative when `end` is earlier).
 */
export function daysBetween(start: string, end: string): number {
  return Math.round((parseDayString(end).getTime() - parseDayString(start).getTime()) / MS_PER_DAY);
}

/**
 * Generates every day string from `start` to `end`, both inclusive.
 *
 * @example
 * ```typescript
 * generateDayRange("2025-01-30", "2025-02-02");
 * // ["2025-01-30", "2025-01-31", "2025-02-01", "2025-02-02"]
 * ```
 */
export function generateDayRange(start: string, end: string): string[] {
  const days: string[] = [];
  const last = parseDayString(end);
  const current = parseDayString(start);

  while (current <= last) {
    days.push(formatDayString(current));
    current.setUTCDate(current.getUTCDate() + 1);
  }

  return days;
}
