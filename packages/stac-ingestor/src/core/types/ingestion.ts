/**
 * Ingestion Types
 *
 * One IngestionRecord tracks one submitted STAC item from intake to a
 * terminal state. `(created_by, id)` is the primary key.
 */

import type { ItemPayload } from './stac.js';

export type IngestionStatus =
  | 'queued'
  | 'started'
  | 'succeeded'
  | 'failed'
  | 'cancelled'
  | 'unknown';

export const INGESTION_STATUSES: readonly IngestionStatus[] = [
  'queued',
  'started',
  'succeeded',
  'failed',
  'cancelled',
  'unknown',
];

/**
 * ISO8601 timestamp string in UTC, e.g. "2025-12-17T10:30:00.000Z"
 */
export type ISO8601Timestamp = string;

export interface IngestionKey {
  readonly created_by: string;
  readonly id: string;
}

export interface IngestionRecord<TItem extends ItemPayload = ItemPayload>
  extends IngestionKey {
  readonly status: IngestionStatus;
  readonly message?: string;
  readonly item: TItem;
  readonly created_at: ISO8601Timestamp;
  readonly updated_at: ISO8601Timestamp;
}

/**
 * One page of a status listing
 */
export interface IngestionPage<TItem extends ItemPayload = ItemPayload> {
  readonly items: readonly IngestionRecord<TItem>[];
  /** Opaque cursor resuming after the last item, null when exhausted */
  readonly next: string | null;
}

export interface ListIngestionsOptions {
  readonly status?: IngestionStatus;
  /** Maximum items per page, unlimited when omitted */
  readonly limit?: number;
  readonly cursor?: string | null;
}
