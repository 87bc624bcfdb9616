import { z } from 'zod';

/**
 * A UTC calendar day formatted as `YYYY-MM-DD`. Lexicographic order equals
 * chronological order, which the planner relies on.
 */
export type CalendarDate = string;

const CALENDAR_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

export function toCalendarDate(date: Date): CalendarDate {
  return date.toISOString().slice(0, 10);
}

export function parseCalendarDate(value: CalendarDate): Date {
  return new Date(`${value}T00:00:00.000Z`);
}

export function isCalendarDate(value: string): boolean {
  if (!CALENDAR_DATE_PATTERN.test(value)) {
    return false;
  }
  const parsed = parseCalendarDate(value);
  return !Number.isNaN(parsed.getTime()) && toCalendarDate(parsed) === value;
}

export function addDays(date: CalendarDate, days: number): CalendarDate {
  const next = parseCalendarDate(date);
  next.setUTCDate(next.getUTCDate() + days);
  return toCalendarDate(next);
}

export const CalendarDateSchema = z
  .string()
  .refine(isCalendarDate, { message: 'Expected a calendar date formatted as YYYY-MM-DD' });
