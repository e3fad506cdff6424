import { statSync } from "fs";
import { basename } from "path";

/**
 * Build a local-midnight Date, or null if the parts don't form a real calendar day.
 * Uses setFullYear so years below 100 are not shifted into the 1900s.
 */
export function makeCalendarDate(year: number, month: number, day: number): Date | null {
  if (year < 1 || month < 1 || month > 12 || day < 1) return null;

  const date = new Date(0);
  date.setFullYear(year, month - 1, day);
  date.setHours(0, 0, 0, 0);

  if (date.getFullYear() !== year || date.getMonth() !== month - 1 || date.getDate() !== day) {
    return null;
  }
  return date;
}

/**
 * Extract a Date from a leading YYYYMMDD prefix of the filename, or null if not found.
 */
export function extractDateFromFilename(filename: string): Date | null {
  const match = filename.match(/^(\d{4})(\d{2})(\d{2})/);
  if (!match) return null;

  const [, y, m, d] = match;
  return makeCalendarDate(parseInt(y, 10), parseInt(m, 10), parseInt(d, 10));
}

/**
 * Drop the time of day, keeping the local calendar date.
 */
export function truncateToDate(date: Date): Date {
  const truncated = new Date(date.getTime());
  truncated.setHours(0, 0, 0, 0);
  return truncated;
}

/**
 * Date used for range filtering: filename prefix first, file mtime otherwise.
 * Throws if the filename carries no date and the file can't be stat'ed.
 */
export function getEffectiveDate(filePath: string): Date {
  const fromName = extractDateFromFilename(basename(filePath));
  if (fromName) return fromName;

  return truncateToDate(statSync(filePath).mtime);
}

/**
 * Format date as YYYY-MM-DD (local calendar date)
 */
export function formatDate(date: Date): string {
  const y = String(date.getFullYear()).padStart(4, "0");
  const m = String(date.getMonth() + 1).padStart(2, "0");
  const d = String(date.getDate()).padStart(2, "0");
  return `${y}-${m}-${d}`;
}

/**
 * Inclusive on both ends; only calendar dates are compared.
 */
export function isInDateRange(date: Date, from: Date, to: Date): boolean {
  const key = formatDate(date);
  return formatDate(from) <= key && key <= formatDate(to);
}

/**
 * Parse a strict YYYY-MM-DD string to a local-midnight Date.
 */
export function parseDate(value: string): Date {
  const match = value.match(/^(\d{4})-(\d{2})-(\d{2})$/);
  const date = match
    ? makeCalendarDate(parseInt(match[1], 10), parseInt(match[2], 10), parseInt(match[3], 10))
    : null;
  if (!date) {
    throw new Error(`Invalid date format: ${value}. Use YYYY-MM-DD`);
  }
  return date;
}

export function yesterday(now: Date = new Date()): Date {
  const date = truncateToDate(now);
  date.setDate(date.getDate() - 1);
  return date;
}
