import { CalendarDate } from './models.js';

const CALENDAR_DATE_RE = /^\d{4}-\d{2}-\d{2}$/;

// UTC calendar day of an instant
export function toCalendarDate(date: Date): CalendarDate {
  return date.toISOString().slice(0, 10);
}

// midnight UTC of the given day
export function fromCalendarDate(value: CalendarDate): Date {
  return new Date(`${value}T00:00:00.000Z`);
}

// rejects shapes like 2025-02-30 that Date would silently roll over
export function isCalendarDate(value: unknown): value is CalendarDate {
  if (typeof value !== 'string' || !CALENDAR_DATE_RE.test(value)) return false;
  const parsed = fromCalendarDate(value);
  return !Number.isNaN(parsed.getTime()) && toCalendarDate(parsed) === value;
}

// zero-padded ISO days order lexicographically
export function compareCalendarDates(a: CalendarDate, b: CalendarDate): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}
