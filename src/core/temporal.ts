/**
 * Calendar date utilities for note dating and summary ranges.
 *
 * All dates are calendar days at UTC midnight, so a note dated 2024-01-15
 * means the same day regardless of the machine's timezone.
 */

import { ConfigError } from './errors.js';
import type { DateRange } from './types.js';

const DAY_MS = 24 * 60 * 60 * 1000;

/** Date shapes found in note filenames and bodies, tried in this order. */
export const DATE_PATTERNS: readonly RegExp[] = [
  /(\d{4}-\d{2}-\d{2})/,        // 2024-01-15
  /(\d{1,2}\/\d{1,2}\/\d{4})/,  // 1/15/2024 (month first)
  /(\d{1,2}-\d{1,2}-\d{4})/,    // 15-01-2024 (day first)
];

function utcDate(year: number, month: number, day: number): Date | null {
  const d = new Date(Date.UTC(year, month - 1, day));
  // Reject rollovers like 2024-02-31
  if (d.getUTCFullYear() !== year || d.getUTCMonth() !== month - 1 || d.getUTCDate() !== day) {
    return null;
  }
  return d;
}

/**
 * Parse a calendar date: YYYY-MM-DD (optionally followed by a time, which is
 * ignored), M/D/YYYY or D-M-YYYY. Returns null for anything else.
 */
export function parseCalendarDate(value: string): Date | null {
  const trimmed = value.trim();

  const iso = trimmed.match(/^(\d{4})-(\d{1,2})-(\d{1,2})(?:$|[T\s])/);
  if (iso) {
    return utcDate(parseInt(iso[1], 10), parseInt(iso[2], 10), parseInt(iso[3], 10));
  }

  const us = trimmed.match(/^(\d{1,2})\/(\d{1,2})\/(\d{4})$/);
  if (us) {
    return utcDate(parseInt(us[3], 10), parseInt(us[1], 10), parseInt(us[2], 10));
  }

  const eu = trimmed.match(/^(\d{1,2})-(\d{1,2})-(\d{4})$/);
  if (eu) {
    return utcDate(parseInt(eu[3], 10), parseInt(eu[2], 10), parseInt(eu[1], 10));
  }

  return null;
}

/** First parseable date in `text`, trying each of DATE_PATTERNS in turn. */
export function findDateIn(text: string): Date | null {
  for (const pattern of DATE_PATTERNS) {
    const match = text.match(pattern);
    if (!match) continue;
    const parsed = parseCalendarDate(match[1]);
    if (parsed) return parsed;
  }
  return null;
}

export function startOfDay(date: Date): Date {
  return new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()));
}

export function endOfDay(date: Date): Date {
  return new Date(startOfDay(date).getTime() + DAY_MS - 1);
}

export function addDays(date: Date, days: number): Date {
  return new Date(date.getTime() + days * DAY_MS);
}

/** Whole days from `from` to `to` (floored, negative when `to` is earlier). */
export function daysBetween(from: Date, to: Date): number {
  return Math.floor((to.getTime() - from.getTime()) / DAY_MS);
}

/** Monday 00:00 UTC of the week containing `date`. */
export function startOfWeek(date: Date): Date {
  const day = startOfDay(date);
  const sinceMonday = (day.getUTCDay() + 6) % 7;
  return addDays(day, -sinceMonday);
}

/** Sunday 23:59:59.999 UTC of the week containing `date`. */
export function endOfWeek(date: Date): Date {
  return endOfDay(addDays(startOfWeek(date), 6));
}

/**
 * Parse a date argument from CLI flags or MCP params.
 *
 * Supports:
 * - Calendar dates: "2025-06-01", "6/1/2025", "1-6-2025"
 * - Relative shorthand: "7d", "2w", "1m"
 * - Natural language: "today", "yesterday", "last week", "last month"
 *
 * Returns a UTC-midnight date or null on failure.
 */
export function parseDateArg(value: string, now: Date = new Date()): Date | null {
  if (!value) return null;
  const trimmed = value.trim().toLowerCase();

  const calendar = parseCalendarDate(trimmed);
  if (calendar) return calendar;

  const today = startOfDay(now);

  const relMatch = trimmed.match(/^(\d+)\s*(d|w|m)$/);
  if (relMatch) {
    const n = parseInt(relMatch[1], 10);
    const unit = relMatch[2];
    if (unit === 'd') return addDays(today, -n);
    if (unit === 'w') return addDays(today, -n * 7);
    const d = new Date(today);
    d.setUTCMonth(d.getUTCMonth() - n);
    return d;
  }

  switch (trimmed) {
    case 'today':
      return today;
    case 'yesterday':
      return addDays(today, -1);
    case 'last week':
      return addDays(today, -7);
    case 'last month': {
      const d = new Date(today);
      d.setUTCMonth(d.getUTCMonth() - 1);
      return d;
    }
    default:
      return null;
  }
}

/**
 * Resolve the summary window.
 *
 * Without a start, the window is the previous full Monday–Sunday week.
 * Without an end, it runs to the Sunday of the start's week. The end is
 * inclusive through 23:59:59.999 of its day.
 */
export function resolveDateRange(
  start?: string,
  end?: string,
  now: Date = new Date()
): { start: Date; end: Date } {
  const parsedStart = start ? parseDateArg(start, now) : null;
  if (start && !parsedStart) {
    throw new ConfigError(`Could not parse start date "${start}". Use YYYY-MM-DD, 7d, 2w, 1m, or "last week".`);
  }
  const parsedEnd = end ? parseDateArg(end, now) : null;
  if (end && !parsedEnd) {
    throw new ConfigError(`Could not parse end date "${end}". Use YYYY-MM-DD, 7d, 2w, 1m, or "today".`);
  }

  const rangeStart = parsedStart ?? addDays(startOfWeek(now), -7);
  const rangeEnd = parsedEnd ? endOfDay(parsedEnd) : endOfWeek(rangeStart);

  if (rangeEnd.getTime() < rangeStart.getTime()) {
    throw new ConfigError(`End date ${formatIsoDate(rangeEnd)} is before start date ${formatIsoDate(rangeStart)}`);
  }

  return { start: rangeStart, end: rangeEnd };
}

/** YYYY-MM-DD in UTC. */
export function formatIsoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/** Display form, e.g. "Feb 17, 2026". */
export function formatDate(date: Date): string {
  return date.toLocaleDateString('en-US', {
    month: 'short',
    day: 'numeric',
    year: 'numeric',
    timeZone: 'UTC',
  });
}

export function formatDateRange(range: DateRange): string | null {
  if (!range.start || !range.end) return null;
  return `${formatIsoDate(range.start)} to ${formatIsoDate(range.end)}`;
}

/** Human-readable duration: "4.2s", "3.5m", "1.1h". */
export function formatDuration(ms: number): string {
  const seconds = ms / 1000;
  if (seconds < 60) {
    return `${seconds.toFixed(1)}s`;
  }
  if (seconds < 3600) {
    return `${(seconds / 60).toFixed(1)}m`;
  }
  return `${(seconds / 3600).toFixed(1)}h`;
}
