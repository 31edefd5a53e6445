/**
 * Change-feed batch loader
 *
 * Drains queued ingestion records into the catalog store. One invocation
 * handles one micro-batch:
 *
 * 1. decode every event image (fast, falling back to decimal-safe)
 * 2. keep records still `queued`
 * 3. stop when none remain, touching nothing
 * 4. turn decimals in items back into floats
 * 5. load all items with a single insert_ignore call
 * 6. write every record back as `succeeded`, or `failed` with the error
 *    text, in one batched write
 *
 * The outcome is all-or-nothing per batch: the bulk call has no per-item
 * result. `started` is only an in-memory step between `queued` and the
 * terminal state. Redelivered events are harmless: insert_ignore keeps the
 * first copy of an item and the loader only acts on `queued` records.
 *
 * Write-back errors propagate so the feed redelivers the batch. A batch the
 * feed gives up on goes through `failUndeliverable` instead.
 */

import { BulkLoadFailureError, describeError } from '../core/errors.js';
import type { IngestionRecord, ItemPayload } from '../core/types/index.js';
import { createLogger } from '../core/utils/logger.js';
import type { CatalogStore } from '../catalog/catalog-store.js';
import { formatKey, transition } from '../ingestion/ingestion-record.js';
import type { ChangeEvent } from '../persistence/change-feed.js';
import type { IngestionRepository } from '../persistence/repository.js';
import { convertDecimalsToFloat } from './decimals.js';
import { decodeChangeImage, type DecodedRecord } from './decode-change.js';

const log = createLogger({ module: 'batch-loader' });

export type BatchOutcome = 'skipped' | 'succeeded' | 'failed';

export interface BatchLoadResult {
  readonly outcome: BatchOutcome;
  readonly records: readonly IngestionRecord[];
  readonly message?: string;
}

function isItemPayload(value: unknown): value is ItemPayload {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toLoadable(record: DecodedRecord): IngestionRecord {
  const item = convertDecimalsToFloat(record.item);
  if (!isItemPayload(item)) {
    throw new Error(`Item of ${record.created_by}/${record.id} is not an object`);
  }
  return { ...record, item };
}

export class BatchLoader {
  constructor(
    private readonly repository: IngestionRepository,
    private readonly catalog: CatalogStore
  ) {}

  /**
   * Change-feed handler
   */
  readonly handle = async (events: readonly ChangeEvent[]): Promise<void> => {
    await this.load(events);
  };

  async load(events: readonly ChangeEvent[]): Promise<BatchLoadResult> {
    const decoded = events.map((event) => {
      const { record, exact } = decodeChangeImage(event.newImage);
      if (exact) {
        log.debug('Decoded change image with decimal precision', {
          sequenceNumber: event.sequenceNumber,
        });
      }
      return record;
    });

    const queued = decoded.filter((record) => record.status === 'queued');
    if (queued.length === 0) {
      return { outcome: 'skipped', records: [] };
    }

    const started = queued.map((record) => transition(toLoadable(record), 'started'));
    const items = started.map((record) => record.item);

    let finished: IngestionRecord[];
    let message: string | undefined;
    try {
      await this.catalog.loadItems(items, 'insert_ignore');
      finished = started.map((record) => transition(record, 'succeeded'));
      log.info('Loaded batch', { items: items.length });
    } catch (error) {
      const failure = new BulkLoadFailureError(items.length, { cause: error });
      log.error(failure.toLogString(), { items: items.length });
      const reason = describeError(error) || failure.message;
      message = reason;
      finished = started.map((record) => transition(record, 'failed', reason));
    }

    const records = await this.repository.saveMany(finished);
    return message === undefined
      ? { outcome: 'succeeded', records }
      : { outcome: 'failed', records, message };
  }

  /**
   * Fail the still-queued records of a batch that could not be loaded, e.g.
   * because an image never decodes. Records are read back by key, so this
   * works without the images.
   */
  readonly failUndeliverable = async (
    events: readonly ChangeEvent[],
    error: unknown
  ): Promise<void> => {
    const reason = describeError(error);
    const keys = new Map(events.map((event) => [formatKey(event.key), event.key]));

    const failed: IngestionRecord[] = [];
    for (const key of keys.values()) {
      const record = await this.repository.find(key.created_by, key.id);
      if (record?.status === 'queued') {
        failed.push(transition(transition(record, 'started'), 'failed', reason));
      }
    }

    await this.repository.saveMany(failed);
    log.error('Failed undeliverable records', { records: failed.length, error: reason });
  };
}
