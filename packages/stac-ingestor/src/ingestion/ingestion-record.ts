/**
 * Ingestion lifecycle
 *
 * ```
 * queued ──► started ──► succeeded
 *   │           └──────► failed
 *   └──────► cancelled
 * ```
 *
 * succeeded, failed, cancelled and unknown are terminal. Records are
 * immutable; every transition returns a new record.
 */

import { InvalidStateTransitionError } from '../core/errors.js';
import type {
  IngestionKey,
  IngestionRecord,
  IngestionStatus,
  ItemPayload,
} from '../core/types/index.js';
import { INGESTION_STATUSES } from '../core/types/index.js';

const TRANSITIONS: Readonly<Record<IngestionStatus, readonly IngestionStatus[]>> = {
  queued: ['started', 'cancelled'],
  started: ['succeeded', 'failed'],
  succeeded: [],
  failed: [],
  cancelled: [],
  unknown: [],
};

export function canTransition(from: IngestionStatus, to: IngestionStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

export function isTerminal(status: IngestionStatus): boolean {
  return TRANSITIONS[status].length === 0;
}

/**
 * Normalize a stored status string. Unrecognized values become `unknown`
 * rather than failing the read.
 */
export function parseStatus(value: unknown): IngestionStatus {
  if (typeof value !== 'string') {
    return 'unknown';
  }
  const normalized = value.trim().toLowerCase();
  return INGESTION_STATUSES.find((status) => status === normalized) ?? 'unknown';
}

export function formatKey(key: IngestionKey): string {
  return `${key.created_by}/${key.id}`;
}

export interface NewIngestion<TItem extends ItemPayload> {
  readonly id: string;
  readonly created_by: string;
  readonly item: TItem;
}

export function createIngestion<TItem extends ItemPayload>(
  input: NewIngestion<TItem>,
  now: Date = new Date()
): IngestionRecord<TItem> {
  const timestamp = now.toISOString();
  return {
    id: input.id,
    created_by: input.created_by,
    status: 'queued',
    item: input.item,
    created_at: timestamp,
    updated_at: timestamp,
  };
}

/**
 * Move a record to `to`
 *
 * The message is kept only for `failed`; any other target clears it.
 * `updated_at` is left to the repository, which stamps it on save.
 *
 * @throws {InvalidStateTransitionError} When the transition is not allowed
 */
export function transition<TItem extends ItemPayload>(
  record: IngestionRecord<TItem>,
  to: IngestionStatus,
  message?: string
): IngestionRecord<TItem> {
  if (!canTransition(record.status, to)) {
    throw new InvalidStateTransitionError(record.status, to, formatKey(record));
  }

  const { message: _previous, ...rest } = record;
  return to === 'failed' && message !== undefined
    ? { ...rest, status: to, message }
    : { ...rest, status: to };
}

/**
 * @throws {InvalidStateTransitionError} Unless the record is queued
 */
export function cancelIngestion<TItem extends ItemPayload>(
  record: IngestionRecord<TItem>
): IngestionRecord<TItem> {
  return transition(record, 'cancelled');
}
