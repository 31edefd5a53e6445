/**
 * Listing cursors
 *
 * A cursor is base64 of the JSON key of the last record on a page. It is
 * opaque to clients and round-trips unchanged.
 */

import { z } from 'zod';
import { InvalidCursorError } from '../core/errors.js';
import type { IngestionRecord } from '../core/types/index.js';

const CursorSchema = z.object({
  created_by: z.string(),
  id: z.string(),
  status: z.string(),
  created_at: z.string(),
});

export interface CursorKey {
  readonly created_by: string;
  readonly id: string;
  readonly status: string;
  readonly created_at: string;
}

const BASE64 = /^[A-Za-z0-9+/]+={0,2}$/;

export function encodeCursor(record: Pick<IngestionRecord, keyof CursorKey>): string {
  const key: CursorKey = {
    created_by: record.created_by,
    id: record.id,
    status: record.status,
    created_at: record.created_at,
  };
  return Buffer.from(JSON.stringify(key), 'utf-8').toString('base64');
}

/**
 * @throws {InvalidCursorError} When the cursor was not produced by encodeCursor
 */
export function decodeCursor(cursor: string): CursorKey {
  if (!BASE64.test(cursor) || cursor.length % 4 !== 0) {
    throw new InvalidCursorError(cursor, 'not base64');
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(Buffer.from(cursor, 'base64').toString('utf-8'));
  } catch {
    throw new InvalidCursorError(cursor, 'not JSON');
  }

  const result = CursorSchema.safeParse(parsed);
  if (!result.success) {
    throw new InvalidCursorError(cursor, 'missing key fields');
  }
  return result.data;
}
