/**
 * Filename date extraction
 *
 * Source files encode their acquisition date in the filename. Patterns are
 * tried in order and the first one producing at least one valid calendar
 * date wins; every match of that pattern is used.
 *
 * | Pattern      | Example                      |
 * |--------------|------------------------------|
 * | YYYY-MM-DD   | modis_2021-08-14_band1.tif   |
 * | YYYYMMDD     | no2_20210814.tif             |
 * | YYYYMM       | data_202108.tif              |
 * | _YYYY        | scene_2021_2022.tif          |
 */

import { NoDateFoundError } from '../core/errors.js';
import type { DatetimeRange } from '../validation/schemas/dataset.js';

export type ExtractedDates =
  | { readonly kind: 'instant'; readonly datetime: Date }
  | { readonly kind: 'range'; readonly start: Date; readonly end: Date };

interface DatePattern {
  readonly name: string;
  readonly regex: RegExp;
  readonly parse: (match: string) => Date | null;
}

function daysInMonth(year: number, month: number): number {
  // Day 0 of the next month is the last day of this one
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

function utcDate(year: number, month: number, day: number): Date | null {
  if (month < 1 || month > 12 || day < 1 || day > daysInMonth(year, month)) {
    return null;
  }
  const date = new Date(Date.UTC(year, month - 1, day));
  // Date.UTC maps years 0-99 onto 1900-1999
  date.setUTCFullYear(year);
  return date;
}

const digits = (value: string, start: number, end: number): number =>
  Number.parseInt(value.slice(start, end), 10);

export const DATE_PATTERNS: readonly DatePattern[] = [
  {
    name: 'YYYY-MM-DD',
    regex: /\d{4}-\d{2}-\d{2}/g,
    parse: (m) => utcDate(digits(m, 0, 4), digits(m, 5, 7), digits(m, 8, 10)),
  },
  {
    name: 'YYYYMMDD',
    regex: /\d{8}/g,
    parse: (m) => utcDate(digits(m, 0, 4), digits(m, 4, 6), digits(m, 6, 8)),
  },
  {
    name: 'YYYYMM',
    regex: /\d{6}/g,
    parse: (m) => utcDate(digits(m, 0, 4), digits(m, 4, 6), 1),
  },
  {
    name: 'YYYY',
    regex: /_\d{4}/g,
    parse: (m) => utcDate(digits(m, 1, 5), 1, 1),
  },
];

/**
 * All valid dates of the first pattern that matches `filename`
 */
export function findDates(filename: string): Date[] {
  for (const pattern of DATE_PATTERNS) {
    const dates = (filename.match(pattern.regex) ?? [])
      .map((match) => pattern.parse(match))
      .filter((date): date is Date => date !== null);

    if (dates.length > 0) {
      return dates;
    }
  }
  return [];
}

/**
 * Expand a single date to the calendar period it stands for
 */
function expandToRange(date: Date, granularity: DatetimeRange): ExtractedDates {
  const year = date.getUTCFullYear();

  if (granularity === 'year') {
    return {
      kind: 'range',
      start: new Date(Date.UTC(year, 0, 1)),
      end: new Date(Date.UTC(year, 11, 31)),
    };
  }

  const month = date.getUTCMonth() + 1;
  return {
    kind: 'range',
    start: new Date(Date.UTC(year, month - 1, 1)),
    end: new Date(Date.UTC(year, month - 1, daysInMonth(year, month))),
  };
}

/**
 * Extract the datetime or datetime range a filename describes
 *
 * @param filename - File name (basename is enough; directories are not special)
 * @param granularity - Calendar period a single date stands for
 * @throws {NoDateFoundError} When no pattern yields a valid date
 */
export function extractDates(
  filename: string,
  granularity?: DatetimeRange | null
): ExtractedDates {
  const dates = findDates(filename);

  if (dates.length === 0) {
    throw new NoDateFoundError(filename);
  }

  if (dates.length > 1) {
    const sorted = [...dates].sort((a, b) => a.getTime() - b.getTime());
    const start = sorted[0];
    const end = sorted[sorted.length - 1];
    if (start !== undefined && end !== undefined) {
      return { kind: 'range', start, end };
    }
  }

  const [date] = dates;
  if (date === undefined) {
    throw new NoDateFoundError(filename);
  }

  return granularity ? expandToRange(date, granularity) : { kind: 'instant', datetime: date };
}
