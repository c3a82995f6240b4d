import { statSync, type Stats } from 'fs';
import { dirname } from 'path';
import { format } from 'date-fns';
import type { CalendarDate } from './types.js';

export type TimestampResolver = (filePath: string) => Date;

function tryStat(path: string): Stats | null {
  try {
    return statSync(path);
  } catch {
    return null;
  }
}

/**
 * Earliest of modification and creation time. Filesystems that do not record
 * a birth time report 0 (or ctime), in which case ctime stands in for it.
 *
 * Never throws: a vanished file resolves to its parent's mtime, a vanished
 * parent to `now()`.
 */
export function resolveEarliestTimestamp(filePath: string, now: () => Date = () => new Date()): Date {
  const stats = tryStat(filePath);
  if (stats) {
    const created = stats.birthtimeMs > 0 ? stats.birthtimeMs : stats.ctimeMs;
    return new Date(Math.min(stats.mtimeMs, created));
  }

  const parent = tryStat(dirname(filePath));
  if (parent) {
    return new Date(parent.mtimeMs);
  }

  return now();
}

export function toCalendarDate(date: Date): CalendarDate {
  return {
    year: date.getFullYear(),
    month: date.getMonth() + 1,
    day: date.getDate(),
  };
}

/** `2019-09-03` */
export function calendarKey(date: CalendarDate): string {
  return [
    String(date.year).padStart(4, '0'),
    String(date.month).padStart(2, '0'),
    String(date.day).padStart(2, '0'),
  ].join('-');
}

export function sameCalendarDate(left: CalendarDate, right: CalendarDate): boolean {
  return left.year === right.year && left.month === right.month && left.day === right.day;
}

/** `08-August` */
export function formatMonthFolder(date: Date): string {
  return format(date, 'MM-MMMM');
}
