/**
 * Dataset validation tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import {
  DatasetValidator,
  checkSampleFiles,
  checkTimeDensity,
  sampleFileMatches,
} from '../../../validators/dataset-validator.js';
import {
  AssetUnreachableError,
  InvalidTimeDensityError,
  SampleFileMismatchError,
  UnreachableAssetsError,
  ValidationError,
} from '../../../core/errors.js';
import { S3DiscoveryItemSchema, DiscoveryItemSchema } from '../../../validation/schemas/index.js';
import { InMemoryObjectStore } from '../../utils/fakes.js';
import { COLLECTION, makeCogDataset } from '../../utils/fixtures.js';

const s3Item = (fields: Record<string, unknown>) =>
  S3DiscoveryItemSchema.parse({ discovery: 's3', bucket: 'test-bucket', ...fields });

describe('checkTimeDensity', () => {
  it('accepts consistent periodicity', () => {
    expect(checkTimeDensity(true, 'day')).toBe('day');
    expect(checkTimeDensity(true, 'month')).toBe('month');
    expect(checkTimeDensity(true, 'year')).toBe('year');
    expect(checkTimeDensity(false, null)).toBeNull();
    expect(checkTimeDensity(false, undefined)).toBeNull();
  });

  it('rejects densities other than day, month and year', () => {
    expect(() => checkTimeDensity(true, 'week')).toThrow(
      'Periodic datasets require time_density of day, month or year (got week)'
    );
  });

  it('requires a density for periodic datasets', () => {
    expect(() => checkTimeDensity(true, null)).toThrow(InvalidTimeDensityError);
    expect(() => checkTimeDensity(true, undefined)).toThrow(
      'Periodic datasets require time_density of day, month or year (got null)'
    );
  });

  it('forbids a density on non-periodic datasets', () => {
    expect(() => checkTimeDensity(false, 'day')).toThrow(
      'Non-periodic datasets must not declare a time_density (got day)'
    );
  });
});

describe('sampleFileMatches', () => {
  it('requires the prefix', () => {
    expect(sampleFileMatches('bar/foo.tif', s3Item({ prefix: 'foo/' }))).toBe(false);
    expect(sampleFileMatches('foo/foo.tif', s3Item({ prefix: 'foo/' }))).toBe(true);
  });

  it('matches the regex against the basename only', () => {
    const item = s3Item({ prefix: 'cogs/', filename_regex: '^data_\\d+\\.tif$' });

    expect(sampleFileMatches('cogs/data_1.tif', item)).toBe(true);
    expect(sampleFileMatches('cogs/nested/data_1.tif', item)).toBe(true);
    expect(sampleFileMatches('cogs/data_1.tif.aux.xml', item)).toBe(false);
  });

  it('requires an extractable date when the item declares datetime_range', () => {
    const item = s3Item({ prefix: 'cogs/', datetime_range: 'month' });

    expect(sampleFileMatches('cogs/data_202108.tif', item)).toBe(true);
    expect(sampleFileMatches('cogs/data_latest.tif', item)).toBe(false);
  });
});

describe('checkSampleFiles', () => {
  it('lists every file no s3 item covers', () => {
    const items = [s3Item({ prefix: 'a/' }), s3Item({ prefix: 'b/' })];

    let caught: unknown;
    try {
      checkSampleFiles(['a/1.tif', 'c/2.tif', 'd/3.tif', 'b/4.tif'], items);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(SampleFileMismatchError);
    expect(caught).toMatchObject({ files: ['c/2.tif', 'd/3.tif'] });
  });

  it('skips the check when there are only cmr items', () => {
    const cmr = DiscoveryItemSchema.parse({ discovery: 'cmr', version: '2' });
    expect(() => checkSampleFiles(['anything.tif'], [cmr])).not.toThrow();
  });
});

describe('DatasetValidator', () => {
  let objects: InMemoryObjectStore;
  let validator: DatasetValidator;

  beforeEach(() => {
    objects = new InMemoryObjectStore();
    validator = new DatasetValidator(objects, { listPageSize: 10, timeoutMs: 1_000 });
  });

  it('accepts a dataset whose discovery items find data and fills defaults', async () => {
    objects.put('test-bucket', 'cogs/data_202108.tif', 'raster');

    const dataset = await validator.validate(makeCogDataset());

    expect(dataset.data_type).toBe('cog');
    expect(dataset.collection).toBe(COLLECTION);
    expect(dataset.discovery_items[0]).toMatchObject({ cogify: false, upload: false, dry_run: false });
  });

  it('reads an empty time_density as absent', async () => {
    objects.put('test-bucket', 'cogs/data_202108.tif', 'raster');

    const dataset = await validator.validate(makeCogDataset({ is_periodic: false, time_density: '' }));

    expect(dataset.time_density).toBeNull();
  });

  it('rejects malformed collection ids', async () => {
    await expect(validator.validate(makeCogDataset({ collection: 'Bad_Name' }))).rejects.toMatchObject({
      message: 'Invalid dataset: 1 issue(s)',
      issues: [{ path: 'collection', message: 'collection must be lowercase words separated by hyphens' }],
    });
  });

  it('rejects inconsistent periodicity before touching storage', async () => {
    await expect(validator.validate(makeCogDataset({ time_density: null }))).rejects.toThrow(
      InvalidTimeDensityError
    );
  });

  it('reports an unsupported density as a time density error', async () => {
    const rejection = validator.validate(makeCogDataset({ time_density: 'week' }));

    await expect(rejection).rejects.toBeInstanceOf(InvalidTimeDensityError);
    await expect(rejection).rejects.toMatchObject({ isPeriodic: true, timeDensity: 'week' });
  });

  it('rejects sample files outside every discovery item', async () => {
    objects.put('test-bucket', 'cogs/data_202108.tif', 'raster');

    await expect(
      validator.validate(makeCogDataset({ sample_files: ['bar/foo.tif'] }))
    ).rejects.toThrow('Sample files do not match any discovery item: bar/foo.tif');
  });

  it('rejects a discovery item whose prefix holds only empty objects', async () => {
    objects.put('test-bucket', 'cogs/data_202108.tif', '');

    const rejection = validator.validate(makeCogDataset());

    await expect(rejection).rejects.toThrow(AssetUnreachableError);
    await expect(rejection).rejects.toThrow(
      'Asset not accessible: no non-empty objects under prefix (s3://test-bucket/cogs/)'
    );
  });

  it('reports every empty discovery item together', async () => {
    const dataset = makeCogDataset({
      sample_files: ['cogs/data_202108.tif'],
      discovery_items: [
        { discovery: 's3', bucket: 'test-bucket', prefix: 'cogs/' },
        { discovery: 's3', bucket: 'other-bucket', prefix: 'more/' },
      ],
    });

    const rejection = validator.validate(dataset);

    await expect(rejection).rejects.toThrow(UnreachableAssetsError);
    await expect(rejection).rejects.toThrow(
      '2 assets not accessible: s3://test-bucket/cogs/, s3://other-bucket/more/'
    );
  });

  it('is a ValidationError for every failure', async () => {
    await expect(validator.validate({})).rejects.toThrow(ValidationError);
  });
});
