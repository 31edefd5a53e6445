import { describe, it, expect } from 'vitest';
import { EXIT_CODES, exitCodeFor } from '../../../cli/lib/exit-codes.js';
import {
  BulkLoadFailureError,
  NotFoundError,
  NumericPrecisionError,
  ValidationError,
} from '../../../core/errors.js';
import { HTTPError, HTTPTimeoutError } from '../../../core/http-client.js';
import { ObjectStoreError } from '../../../storage/object-store.js';

describe('exitCodeFor', () => {
  it('flags data integrity failures', () => {
    expect(exitCodeFor(new NumericPrecisionError('item.bbox.0', '0.1000000000000000055511'))).toBe(
      EXIT_CODES.DATA_INTEGRITY_ERROR
    );
    expect(exitCodeFor(new BulkLoadFailureError(3, { cause: new Error('deadlock') }))).toBe(
      EXIT_CODES.DATA_INTEGRITY_ERROR
    );
  });

  it('flags upstream failures as network errors', () => {
    expect(exitCodeFor(new HTTPError(503, 'Service Unavailable', 'https://api.example.com'))).toBe(
      EXIT_CODES.NETWORK_ERROR
    );
    expect(exitCodeFor(new HTTPTimeoutError('https://api.example.com', 10))).toBe(EXIT_CODES.NETWORK_ERROR);
    expect(exitCodeFor(new ObjectStoreError('AccessDenied', 'b', 'k', 403))).toBe(EXIT_CODES.NETWORK_ERROR);
  });

  it('maps everything else to ERRORS', () => {
    expect(exitCodeFor(new ValidationError('bad'))).toBe(EXIT_CODES.ERRORS);
    expect(exitCodeFor(new NotFoundError('ingestion', 'alice/item-1'))).toBe(EXIT_CODES.ERRORS);
    expect(exitCodeFor('boom')).toBe(EXIT_CODES.ERRORS);
  });
});
