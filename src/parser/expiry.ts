/**
 * Expiry resolution for month tokens such as "Jun26" or "feb".
 *
 * Standard monthly options expire on the third Friday; the 16th is used as a
 * fixed stand-in. Real third Fridays fall between the 15th and the 21st, so
 * these dates will not line up with a listed chain.
 */

import { InvalidOrderError } from "../utils/errors.js";
import { MONTHS } from "./tables.js";

export const EXPIRY_DAY = 16;

const MONTH_LABELS = [
  "Jan", "Feb", "Mar", "Apr", "May", "Jun",
  "Jul", "Aug", "Sep", "Oct", "Nov", "Dec",
] as const;

/**
 * Resolve a month abbreviation (and optional 2-digit year) to an expiry date.
 * Without a year the next occurrence after today's month is used.
 */
export function parseExpiry(
  month: string,
  yearSuffix?: string | null,
  today: Date = new Date()
): Date {
  const monthNum = MONTHS.get(month.slice(0, 3).toLowerCase());
  if (monthNum === undefined) {
    throw new InvalidOrderError(`Unknown month: ${month}`);
  }

  let year: number;
  if (yearSuffix) {
    year = 2000 + parseInt(yearSuffix, 10);
  } else {
    year = today.getFullYear();
    if (monthNum <= today.getMonth() + 1) year += 1;
  }

  return new Date(Date.UTC(year, monthNum - 1, EXPIRY_DAY));
}

/** "2026-06-16" */
export function formatIsoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/** "Jun26" */
export function formatExpiryLabel(date: Date): string {
  const yy = String(date.getUTCFullYear() % 100).padStart(2, "0");
  return `${MONTH_LABELS[date.getUTCMonth()]}${yy}`;
}

/** Parse "YYYY-MM-DD" into a UTC-midnight date, or null if malformed */
export function parseIsoDate(value: string): Date | null {
  const m = /^(\d{4})-(\d{2})-(\d{2})$/.exec(value.trim());
  if (!m) return null;
  const date = new Date(Date.UTC(Number(m[1]), Number(m[2]) - 1, Number(m[3])));
  return formatIsoDate(date) === value.trim() ? date : null;
}
