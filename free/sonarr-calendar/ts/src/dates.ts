/**
 * Date window and air-date helpers.
 *
 * All calendar arithmetic is done on UTC calendar days. A UTC day is held as a
 * local-midnight Date produced by parseISO('YYYY-MM-DD') so that date-fns
 * formatting gives the same result whatever the process time zone is.
 */

import { addDays, differenceInCalendarDays, format, isValid, parseISO, subDays } from 'date-fns';
import type { DateWindow } from './types.js';

const DAY_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

export function utcDayString(value: Date | string): string | null {
  const date = typeof value === 'string' ? new Date(value) : value;
  if (!value || isNaN(date.getTime())) return null;
  return date.toISOString().slice(0, 10);
}

export function parseDay(day: string | undefined): Date | null {
  if (!day || !DAY_PATTERN.test(day)) return null;
  const parsed = parseISO(day);
  return isValid(parsed) ? parsed : null;
}

function utcToday(now: Date): Date {
  return parseISO(now.toISOString().slice(0, 10));
}

export function buildDateWindow(now: Date, daysPast: number, daysFuture: number): DateWindow {
  const today = utcToday(now);
  const start = subDays(today, daysPast);
  const end = addDays(today, daysFuture);

  return {
    start: format(start, 'yyyy-MM-dd'),
    end: format(end, 'yyyy-MM-dd'),
    startDisplay: format(start, 'MMM dd, yyyy'),
    endDisplay: format(end, 'MMM dd, yyyy'),
    totalDays: daysPast + daysFuture + 1,
    daysPast,
    daysFuture,
  };
}

/** Inclusive on both ends */
export function isInWindow(day: string, window: DateWindow): boolean {
  return parseDay(day) !== null && day >= window.start && day <= window.end;
}

/** `Mon, Oct 19`; unparseable input is returned unchanged */
export function formatAirDate(airDate: string): string {
  const parsed = parseDay(airDate);
  return parsed ? format(parsed, 'EEE, MMM dd') : airDate;
}

/** `Oct 19, 2026`; unparseable input is returned unchanged */
export function formatDisplayDate(day: string): string {
  const parsed = parseDay(day);
  return parsed ? format(parsed, 'MMM dd, yyyy') : day;
}

/**
 * Whole calendar days from today (UTC) to the air date. Prefers the UTC
 * timestamp, falls back to the naive date, and yields 0 when neither parses.
 */
export function daysUntil(airDateUtc: string, airDate: string, now: Date): number {
  const day = utcDayString(airDateUtc) ?? (parseDay(airDate) ? airDate : null);
  if (!day) return 0;
  return differenceInCalendarDays(parseISO(day), utcToday(now));
}

/** `2026-10-19 08:30:00 UTC` */
export function formatUtcTimestamp(now: Date): string {
  return `${now.toISOString().replace('T', ' ').slice(0, 19)} UTC`;
}
