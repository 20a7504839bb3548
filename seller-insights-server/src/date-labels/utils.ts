/**
 * Calendar Date Utilities
 *
 * Calendar dates are represented as Date objects at UTC midnight so that
 * arithmetic never crosses a DST boundary. All helpers are pure.
 */

const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * Parse a YYYY-MM-DD string into a UTC-midnight Date.
 * Returns null for malformed or impossible dates (e.g. 2025-02-30).
 */
export function parseIsoDate(input: string): Date | null {
  const match = ISO_DATE_PATTERN.exec(input.trim());
  if (!match) return null;

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  if (month < 1 || month > 12 || day < 1 || day > getDaysInMonth(year, month)) {
    return null;
  }
  return new Date(Date.UTC(year, month - 1, day));
}

export function isIsoDate(input: string): boolean {
  return parseIsoDate(input) !== null;
}

/**
 * Format a UTC-midnight Date as YYYY-MM-DD
 */
export function formatIsoDate(date: Date): string {
  const year = String(date.getUTCFullYear()).padStart(4, "0");
  const month = String(date.getUTCMonth() + 1).padStart(2, "0");
  const day = String(date.getUTCDate()).padStart(2, "0");
  return `${year}-${month}-${day}`;
}

export function makeDate(year: number, month: number, day: number): Date {
  return new Date(Date.UTC(year, month - 1, day));
}

export function addDays(date: Date, days: number): Date {
  const result = new Date(date.getTime());
  result.setUTCDate(result.getUTCDate() + days);
  return result;
}

/**
 * Number of days in a month (month is 1-indexed)
 */
export function getDaysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

export function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

/**
 * Days since the most recent Monday (Monday = 0 … Sunday = 6)
 */
export function isoWeekdayIndex(date: Date): number {
  return (date.getUTCDay() + 6) % 7;
}

export function startOfIsoWeek(date: Date): Date {
  return addDays(date, -isoWeekdayIndex(date));
}

export function startOfMonth(date: Date): Date {
  return makeDate(date.getUTCFullYear(), date.getUTCMonth() + 1, 1);
}

export function endOfMonth(date: Date): Date {
  const year = date.getUTCFullYear();
  const month = date.getUTCMonth() + 1;
  return makeDate(year, month, getDaysInMonth(year, month));
}

/**
 * Today's calendar date in the given IANA timezone, as YYYY-MM-DD
 */
export function todayInTimeZone(timezone: string, now: Date = new Date()): string {
  return new Intl.DateTimeFormat("en-CA", {
    timeZone: timezone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
  }).format(now);
}
