/**
 * Backup folder dates
 *
 * A backup folder is an old import dump named after the day (or month) it was
 * taken: `09-07-21`, `09-07-2021`, `2021-09-07`, `2019-09`, `09-2019`, with
 * `-` and `_` interchangeable as separators.
 */

import { basename } from 'path';
import { isExists } from 'date-fns';
import type { SorterConfig } from './config.js';
import { listMediaFiles } from './media-files.js';
import { calendarKey, resolveEarliestTimestamp, toCalendarDate, type TimestampResolver } from './timestamp-resolver.js';
import type { BackupInference, CalendarDate, ParsedBackupDate } from './types.js';

const SEP = '[-_]';

export const BACKUP_NAME_PATTERN = new RegExp(
  '^(?:' +
    [
      `\\d{1,2}${SEP}\\d{1,2}${SEP}(?:\\d{2}|\\d{4})`, // MM-DD-YY, MM-DD-YYYY
      `\\d{4}${SEP}\\d{1,2}${SEP}\\d{1,2}`, // YYYY-MM-DD
      `\\d{4}${SEP}\\d{1,2}`, // YYYY-MM
      `\\d{1,2}${SEP}\\d{4}`, // MM-YYYY
    ].join('|') +
    ')$'
);

export function isBackupFolderName(name: string): boolean {
  return BACKUP_NAME_PATTERN.test(name);
}

function isValidMonth(month: number): boolean {
  return Number.isInteger(month) && month >= 1 && month <= 12;
}

/**
 * Calendar date encoded in a backup folder name, or null when the name does
 * not follow the grammar or names an impossible date (month 13, Feb 30).
 */
export function parseBackupDate(name: string): ParsedBackupDate | null {
  if (!isBackupFolderName(name)) {
    return null;
  }

  const parts = name.split(/[-_]/);

  if (parts.length === 3) {
    let year: number;
    let month: number;
    let day: number;

    if (parts[0].length === 4) {
      [year, month, day] = parts.map(Number);
    } else {
      [month, day, year] = parts.map(Number);
      if (parts[2].length === 2) {
        year += 2000;
      }
    }

    if (!isExists(year, month - 1, day)) {
      return null;
    }
    return { year, month, day, precision: 'day' };
  }

  const [first, second] = parts;

  // YYYY-MM first, then MM-YYYY
  if (first.length === 4 && isValidMonth(Number(second))) {
    return { year: Number(first), month: Number(second), day: 1, precision: 'month' };
  }
  if (second.length === 4 && isValidMonth(Number(first))) {
    return { year: Number(second), month: Number(first), day: 1, precision: 'month' };
  }

  return null;
}

/**
 * Date a backup folder's contents belong to.
 *
 * Day-precision names are trusted as-is. For month-precision names the direct
 * media children whose own date falls in the named month vote; a date held by
 * more than half of the votes wins. Without such a majority the folder is
 * unresolved and its files are dispersed by their own timestamps.
 */
export function inferBackupDate(
  folderPath: string,
  config: SorterConfig,
  resolveTimestamp: TimestampResolver = resolveEarliestTimestamp
): BackupInference {
  const parsed = parseBackupDate(basename(folderPath));
  if (!parsed) {
    return { confidence: 'unresolved', date: null };
  }

  const named: CalendarDate = { year: parsed.year, month: parsed.month, day: parsed.day };
  if (parsed.precision === 'day') {
    return { confidence: 'exact', date: named };
  }

  const tally = new Map<string, { date: CalendarDate; count: number }>();
  let total = 0;

  for (const file of listMediaFiles(folderPath, config)) {
    const date = toCalendarDate(resolveTimestamp(file));
    if (date.year !== parsed.year || date.month !== parsed.month) {
      continue;
    }
    total += 1;
    const key = calendarKey(date);
    const bucket = tally.get(key);
    if (bucket) {
      bucket.count += 1;
    } else {
      tally.set(key, { date, count: 1 });
    }
  }

  let best: { date: CalendarDate; count: number } | null = null;
  for (const bucket of tally.values()) {
    if (!best || bucket.count > best.count) {
      best = bucket;
    }
  }

  if (best && best.count * 2 > total) {
    return { confidence: 'majority', date: best.date };
  }

  return { confidence: 'unresolved', date: null };
}
