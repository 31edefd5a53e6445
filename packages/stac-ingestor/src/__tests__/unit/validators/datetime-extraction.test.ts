/**
 * Filename date extraction tests
 */

import { describe, it, expect } from 'vitest';
import { extractDates, findDates } from '../../../validators/datetime-extraction.js';
import { NoDateFoundError } from '../../../core/errors.js';

const iso = (date: Date): string => date.toISOString().slice(0, 10);

describe('extractDates', () => {
  it('reads a YYYY-MM-DD date as an instant', () => {
    const result = extractDates('modis_2021-08-14_band1.tif');

    expect(result.kind).toBe('instant');
    expect(result).toEqual({ kind: 'instant', datetime: new Date('2021-08-14T00:00:00Z') });
  });

  it('reads YYYYMMDD', () => {
    expect(extractDates('no2_20210814.tif')).toEqual({
      kind: 'instant',
      datetime: new Date('2021-08-14T00:00:00Z'),
    });
  });

  it('expands a YYYYMM date to its month', () => {
    const result = extractDates('data_202108.tif', 'month');
    if (result.kind !== 'range') throw new Error('expected a range');

    expect(iso(result.start)).toBe('2021-08-01');
    expect(iso(result.end)).toBe('2021-08-31');
  });

  it('expands a single date to its year', () => {
    const result = extractDates('data_202102.tif', 'year');
    if (result.kind !== 'range') throw new Error('expected a range');

    expect(iso(result.start)).toBe('2021-01-01');
    expect(iso(result.end)).toBe('2021-12-31');
  });

  it('handles leap-year Februaries', () => {
    const result = extractDates('data_202402.tif', 'month');
    if (result.kind !== 'range') throw new Error('expected a range');

    expect(iso(result.end)).toBe('2024-02-29');
  });

  it('turns several matches into a sorted range', () => {
    const result = extractDates('scene_2022_2021.tif');

    expect(result).toEqual({
      kind: 'range',
      start: new Date('2021-01-01T00:00:00Z'),
      end: new Date('2022-01-01T00:00:00Z'),
    });
  });

  it('ignores granularity when the filename already holds a range', () => {
    const result = extractDates('scene_2021_2022.tif', 'month');

    expect(result).toEqual({
      kind: 'range',
      start: new Date('2021-01-01T00:00:00Z'),
      end: new Date('2022-01-01T00:00:00Z'),
    });
  });

  it('throws NoDateFoundError without a date', () => {
    expect(() => extractDates('readme.txt')).toThrow(NoDateFoundError);
    expect(() => extractDates('readme.txt')).toThrow('No dates found in filename: readme.txt');
  });
});

describe('findDates', () => {
  it('skips invalid calendar dates and falls through to the next pattern', () => {
    // 2021-13-45 is not a date; "_2021" is
    expect(findDates('x_2021-13-45.tif').map(iso)).toEqual(['2021-01-01']);
  });

  it('uses the first pattern that matches', () => {
    expect(findDates('a_2020-02-03_20210405.tif').map(iso)).toEqual(['2020-02-03']);
  });
});
