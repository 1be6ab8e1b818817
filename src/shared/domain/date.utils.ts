/**
 * Calendar date utilities.
 *
 * A CalendarDate is a plain (year, month, day) value with no time or zone.
 * Arithmetic goes through UTC midnight so the host timezone never shifts a
 * day. Months are 1-based everywhere outside this file.
 */
import { DateOutOfBoundsError, InvalidDateFormatError } from './errors';

export interface CalendarDate {
  readonly year: number;
  /** 1 = January */
  readonly month: number;
  readonly day: number;
}

export const MIN_YEAR = 1;
export const MAX_YEAR = 9999;

const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * Build the UTC midnight instant of a calendar date.
 * setUTCFullYear keeps years 0-99 literal, unlike Date.UTC.
 */
export function toUTCDate(date: CalendarDate): Date {
  const result = new Date(0);
  result.setUTCFullYear(date.year, date.month - 1, date.day);
  return result;
}

export function fromUTCDate(date: Date): CalendarDate {
  return Object.freeze({
    year: date.getUTCFullYear(),
    month: date.getUTCMonth() + 1,
    day: date.getUTCDate(),
  });
}

export function daysInMonth(year: number, month: number): number {
  // Day 0 of the following month is the last day of this one
  const last = new Date(0);
  last.setUTCFullYear(year, month, 0);
  return last.getUTCDate();
}

export function isValidCalendarDate(
  year: number,
  month: number,
  day: number,
): boolean {
  return (
    Number.isInteger(year) &&
    Number.isInteger(month) &&
    Number.isInteger(day) &&
    year >= MIN_YEAR &&
    year <= MAX_YEAR &&
    month >= 1 &&
    month <= 12 &&
    day >= 1 &&
    day <= daysInMonth(year, month)
  );
}

/**
 * Parse a strict YYYY-MM-DD string.
 *
 * @throws InvalidDateFormatError when the shape is wrong or the date does
 * not exist (2023-02-30, 2023-13-01, 0000-01-01)
 */
export function parseISODate(dateString: string): CalendarDate {
  const match = ISO_DATE_PATTERN.exec(dateString);
  if (!match) {
    throw new InvalidDateFormatError(dateString);
  }

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);

  if (!isValidCalendarDate(year, month, day)) {
    throw new InvalidDateFormatError(dateString);
  }

  return Object.freeze({ year, month, day });
}

/**
 * Format date as ISO date string (YYYY-MM-DD)
 */
export function formatISODate(date: CalendarDate): string {
  const year = String(date.year).padStart(4, '0');
  const month = String(date.month).padStart(2, '0');
  const day = String(date.day).padStart(2, '0');
  return `${year}-${month}-${day}`;
}

/**
 * Add days to a date, rolling over months, years and leap days.
 *
 * @throws DateOutOfBoundsError when the result leaves years 1..9999
 */
export function addDays(date: CalendarDate, days: number): CalendarDate {
  const result = toUTCDate(date);
  result.setUTCDate(result.getUTCDate() + days);

  const year = result.getUTCFullYear();
  if (Number.isNaN(year) || year < MIN_YEAR || year > MAX_YEAR) {
    throw new DateOutOfBoundsError();
  }

  return fromUTCDate(result);
}

/**
 * Get the day of week (0 = Sunday, 6 = Saturday)
 */
export function getDayOfWeek(date: CalendarDate): number {
  return toUTCDate(date).getUTCDay();
}

/**
 * Day of the year, 1 for January 1st
 */
export function getDayOfYear(date: CalendarDate): number {
  let total = date.day;
  for (let month = 1; month < date.month; month++) {
    total += daysInMonth(date.year, month);
  }
  return total;
}

/**
 * Negative when a is earlier, positive when later, 0 for the same day
 */
export function compareDates(a: CalendarDate, b: CalendarDate): number {
  return a.year - b.year || a.month - b.month || a.day - b.day;
}

/**
 * Check if a date falls within a range (inclusive)
 */
export function isWithinRange(
  date: CalendarDate,
  from: CalendarDate,
  to: CalendarDate,
): boolean {
  return compareDates(date, from) >= 0 && compareDates(date, to) <= 0;
}
