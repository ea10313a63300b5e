/**
 * Calendar-date helpers.
 *
 * A calendar date is represented as a Date at UTC midnight. Order timestamps
 * are reduced to their UTC calendar date for every same-day and 30-day
 * comparison.
 */

const MS_PER_DAY = 24 * 60 * 60 * 1000;

export function toCalendarDate(timestamp: Date): Date {
  return new Date(Date.UTC(timestamp.getUTCFullYear(), timestamp.getUTCMonth(), timestamp.getUTCDate()));
}

export function addDays(date: Date, days: number): Date {
  return new Date(date.getTime() + days * MS_PER_DAY);
}

export function isSameCalendarDate(a: Date, b: Date): boolean {
  return toCalendarDate(a).getTime() === toCalendarDate(b).getTime();
}

/**
 * Whole days from `from` to `to`, by calendar date
 */
export function daysBetween(from: Date, to: Date): number {
  return Math.round((toCalendarDate(to).getTime() - toCalendarDate(from).getTime()) / MS_PER_DAY);
}

/** `YYYY-MM-DD` of the UTC calendar date */
export function formatIsoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}
