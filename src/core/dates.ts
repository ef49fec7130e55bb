/**
 * Calendar Date Helpers
 *
 * The domain works with calendar dates, not instants. A calendar date is a
 * `Date` at local midnight; every helper here normalizes its input to that
 * form before comparing so a stray time-of-day never shifts a status.
 */

import { differenceInCalendarDays, format, isValid, parse, startOfDay } from 'date-fns';

/**
 * Returns the calendar date (local midnight) of the given instant.
 */
export function toCalendarDate(date: Date): Date {
  return startOfDay(date);
}

/**
 * Today's calendar date.
 */
export function today(): Date {
  return startOfDay(new Date());
}

/**
 * Whole calendar days from `from` to `to`. Negative when `to` lies before `from`.
 */
export function daysBetween(from: Date, to: Date): number {
  return differenceInCalendarDays(to, from);
}

/**
 * Whether `date` is a real date (not `Invalid Date`).
 */
export function isValidDate(date: Date): boolean {
  return isValid(date);
}

/**
 * Parses a strict `YYYY-MM-DD` string into a calendar date.
 *
 * @returns the date, or null if the text is not an ISO calendar date
 */
export function parseIsoDate(text: string): Date | null {
  if (!/^\d{4}-\d{2}-\d{2}$/.test(text)) {
    return null;
  }
  const parsed = parse(text, 'yyyy-MM-dd', new Date(0));
  return isValid(parsed) ? startOfDay(parsed) : null;
}

/**
 * Parses `DD.MM.YYYY` into a calendar date.
 *
 * @returns the date, or null if the text does not match
 */
export function parseDisplayDate(text: string): Date | null {
  if (!/^\d{1,2}\.\d{1,2}\.\d{4}$/.test(text)) {
    return null;
  }
  const parsed = parse(text, 'd.M.yyyy', new Date(0));
  return isValid(parsed) ? startOfDay(parsed) : null;
}

/**
 * Formats a date as `YYYY-MM-DD` for storage.
 */
export function formatIsoDate(date: Date): string {
  return format(date, 'yyyy-MM-dd');
}

/**
 * Formats a date as `DD.MM.YYYY` for display.
 */
export function formatDisplayDate(date: Date): string {
  return format(date, 'dd.MM.yyyy');
}
