/**
 * Row types for schema.sql / schema.postgres.sql
 *
 * Rows use ISO8601 strings for timestamps and explicit null for absent
 * columns, exactly as the drivers return them.
 */

import type { ISO8601Timestamp } from '../core/types/index.js';

export type ChangeEventName = 'INSERT' | 'MODIFY';

export interface IngestionRow {
  readonly created_by: string;
  readonly id: string;
  readonly status: string;
  readonly message: string | null;
  /** JSON text of the item payload */
  readonly item: string;
  readonly created_at: ISO8601Timestamp;
  readonly updated_at: ISO8601Timestamp;
}

export interface IngestionChangeRow {
  /** BIGSERIAL arrives from pg as a string */
  readonly sequence_number: number | string;
  readonly shard: number;
  readonly event_name: ChangeEventName;
  readonly created_by: string;
  readonly id: string;
  /** JSON text of the attribute-encoded record */
  readonly new_image: string;
  readonly recorded_at: ISO8601Timestamp;
}

export function nowISO8601(): ISO8601Timestamp {
  return new Date().toISOString();
}
