/**
 * Calendar date parsing for order headers.
 *
 * Dates are returned as UTC midnight so day arithmetic never crosses a
 * timezone boundary.
 */

import { DAY_MONTH_YEAR, ISO_DATE, MONTHS, MONTH_DAY_YEAR } from './constants';

/**
 * Builds a UTC-midnight date, rejecting impossible days ("February 30").
 */
export function calendarDate(year: number, monthIndex: number, day: number): Date | null {
  const date = new Date(Date.UTC(year, monthIndex, day));
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== monthIndex ||
    date.getUTCDate() !== day
  ) {
    return null;
  }
  return date;
}

function monthIndexOf(name: string): number | undefined {
  return MONTHS[name.slice(0, 3).toLowerCase()];
}

/**
 * Parses a line holding only a date (optionally labelled "Ordered on" etc).
 *
 * @example
 * parseDateLine('July 31, 2025')        // 2025-07-31T00:00:00.000Z
 * parseDateLine('Ordered on 31 Jul 2025') // 2025-07-31T00:00:00.000Z
 * parseDateLine('Delivered August 2')   // null
 */
export function parseDateLine(line: string): Date | null {
  const text = line.trim();

  const monthFirst = text.match(MONTH_DAY_YEAR);
  if (monthFirst) {
    const month = monthIndexOf(monthFirst[1]);
    return month === undefined
      ? null
      : calendarDate(Number(monthFirst[3]), month, Number(monthFirst[2]));
  }

  const dayFirst = text.match(DAY_MONTH_YEAR);
  if (dayFirst) {
    const month = monthIndexOf(dayFirst[2]);
    return month === undefined
      ? null
      : calendarDate(Number(dayFirst[3]), month, Number(dayFirst[1]));
  }

  const iso = text.match(ISO_DATE);
  if (iso) {
    return calendarDate(Number(iso[1]), Number(iso[2]) - 1, Number(iso[3]));
  }

  return null;
}

/**
 * Formats a date as YYYY-MM-DD (UTC).
 */
export function toIsoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}
