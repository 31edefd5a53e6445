import { describe, it, expect } from 'vitest';
import { ObjectStoreError, parseS3Url, toS3Url } from '../../../storage/object-store.js';

describe('parseS3Url', () => {
  it('splits bucket and key', () => {
    expect(parseS3Url('s3://test-bucket/cogs/a%20b.tif')).toEqual({
      bucket: 'test-bucket',
      key: 'cogs/a b.tif',
    });
  });

  it('returns an empty key for a bare bucket', () => {
    expect(parseS3Url('s3://test-bucket')).toEqual({ bucket: 'test-bucket', key: '' });
  });

  it('returns null for other schemes and non-URLs', () => {
    expect(parseS3Url('https://test-bucket.s3.amazonaws.com/a.tif')).toBeNull();
    expect(parseS3Url('test-bucket/a.tif')).toBeNull();
  });

  it('inverts toS3Url', () => {
    expect(parseS3Url(toS3Url('test-bucket', 'cogs/data_202108.tif'))).toEqual({
      bucket: 'test-bucket',
      key: 'cogs/data_202108.tif',
    });
  });
});

describe('ObjectStoreError', () => {
  it('flags 404s as not found', () => {
    expect(new ObjectStoreError('NoSuchKey', 'b', 'k', 404).notFound).toBe(true);
    expect(new ObjectStoreError('AccessDenied', 'b', 'k', 403).notFound).toBe(false);
  });
});
