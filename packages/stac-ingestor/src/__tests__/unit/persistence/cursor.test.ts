import { describe, it, expect } from 'vitest';
import { decodeCursor, encodeCursor } from '../../../persistence/cursor.js';
import { InvalidCursorError } from '../../../core/errors.js';

const KEY = {
  created_by: 'alice',
  id: 'item-7',
  status: 'failed',
  created_at: '2024-05-01T00:00:00.000Z',
} as const;

describe('listing cursors', () => {
  it('is base64 of the JSON key', () => {
    const cursor = encodeCursor(KEY);

    expect(JSON.parse(Buffer.from(cursor, 'base64').toString('utf-8'))).toEqual(KEY);
    expect(decodeCursor(cursor)).toEqual(KEY);
  });

  it('ignores record fields outside the key', () => {
    const cursor = encodeCursor({ ...KEY, status: 'queued' });
    expect(Object.keys(decodeCursor(cursor))).toEqual(['created_by', 'id', 'status', 'created_at']);
  });

  it.each([
    ['not base64', 'abc$'],
    ['not base64', 'abcde'],
    ['not JSON', Buffer.from('{oops').toString('base64')],
    ['missing key fields', Buffer.from(JSON.stringify({ id: 'x' })).toString('base64')],
  ])('rejects a cursor that is %s', (reason, cursor) => {
    expect(() => decodeCursor(cursor)).toThrow(InvalidCursorError);
    expect(() => decodeCursor(cursor)).toThrow(`Invalid pagination cursor: ${reason}`);
  });

  it('reports 422', () => {
    expect(new InvalidCursorError('x', 'not base64').httpStatus).toBe(422);
  });
});
