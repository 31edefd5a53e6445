/**
 * Change feed over ingestion_changes
 *
 * At-least-once delivery with per-shard order. Each consumer keeps one
 * checkpoint per shard; events at or below it are never delivered again,
 * events above it are redelivered until a batch containing them is committed.
 */

import type { IngestionKey } from '../core/types/index.js';
import { createLogger, type Logger } from '../core/utils/logger.js';
import { describeError } from '../core/errors.js';
import { parseImage, type AttributeMap } from './attribute-codec.js';
import type { DatabaseAdapter } from './repository.js';
import type { ChangeEventName, IngestionChangeRow } from './schema.types.js';
import { nowISO8601 } from './schema.types.js';

export interface ChangeEvent {
  readonly sequenceNumber: number;
  readonly shard: number;
  readonly eventName: ChangeEventName;
  readonly key: IngestionKey;
  readonly newImage: AttributeMap;
  readonly recordedAt: string;
}

function rowToEvent(row: IngestionChangeRow): ChangeEvent {
  return {
    sequenceNumber: Number(row.sequence_number),
    shard: row.shard,
    eventName: row.event_name,
    key: { created_by: row.created_by, id: row.id },
    newImage: parseImage(row.new_image),
    recordedAt: row.recorded_at,
  };
}

export interface ChangeFeedOptions {
  readonly consumer: string;
  /** Shards this consumer owns; all shards when omitted */
  readonly shards?: readonly number[];
}

export class ChangeFeed {
  readonly consumer: string;
  private readonly shards: readonly number[] | undefined;

  constructor(
    private readonly db: DatabaseAdapter,
    options: ChangeFeedOptions
  ) {
    this.consumer = options.consumer;
    this.shards = options.shards;
  }

  /**
   * Oldest unconsumed events, at most `limit`
   */
  async readBatch(limit: number): Promise<ChangeEvent[]> {
    const params: unknown[] = [this.consumer];
    let shardFilter = '';
    if (this.shards !== undefined) {
      if (this.shards.length === 0) {
        return [];
      }
      shardFilter = `AND c.shard IN (${this.shards.map(() => '?').join(', ')})`;
      params.push(...this.shards);
    }
    params.push(limit);

    const rows = await this.db.queryMany<IngestionChangeRow>(
      `SELECT c.* FROM ingestion_changes c
      LEFT JOIN feed_checkpoints f ON f.consumer = ? AND f.shard = c.shard
      WHERE c.sequence_number > COALESCE(f.sequence_number, 0) ${shardFilter}
      ORDER BY c.sequence_number
      LIMIT ?`,
      params
    );
    return rows.map(rowToEvent);
  }

  /**
   * Advance this consumer's checkpoints past every event in `events`
   */
  async commit(events: readonly ChangeEvent[]): Promise<void> {
    const highest = new Map<number, number>();
    for (const event of events) {
      highest.set(event.shard, Math.max(highest.get(event.shard) ?? 0, event.sequenceNumber));
    }
    if (highest.size === 0) {
      return;
    }

    const updatedAt = nowISO8601();
    await this.db.transaction(async () => {
      for (const [shard, sequenceNumber] of highest) {
        await this.db.execute(
          `INSERT INTO feed_checkpoints (consumer, shard, sequence_number, updated_at)
          VALUES (?, ?, ?, ?)
          ON CONFLICT (consumer, shard) DO UPDATE SET
            sequence_number = excluded.sequence_number,
            updated_at = excluded.updated_at
          WHERE feed_checkpoints.sequence_number < excluded.sequence_number`,
          [this.consumer, shard, sequenceNumber, updatedAt]
        );
      }
    });
  }
}

// ============================================================================
// Consumer
// ============================================================================

export type ChangeBatchHandler = (events: readonly ChangeEvent[]) => Promise<void>;

export interface ChangeFeedConsumerOptions {
  /** Upper bound of events per handler call */
  readonly batchSize: number;
  /** How long to keep topping up a partial batch before handing it over */
  readonly maxWaitMs: number;
  readonly pollIntervalMs: number;
  /**
   * Failed deliveries of a batch before `onUndeliverable` settles it. A batch
   * is identified by its oldest event. Without both options a failing batch
   * is redelivered indefinitely.
   */
  readonly maxDeliveries?: number;
  /** Settles a batch the handler keeps rejecting; the batch is committed after it resolves */
  readonly onUndeliverable?: (events: readonly ChangeEvent[], error: unknown) => Promise<void>;
  readonly sleep?: (ms: number) => Promise<void>;
  readonly now?: () => number;
  readonly logger?: Logger;
}

function batchKey(events: readonly ChangeEvent[]): string {
  const [oldest] = events;
  return oldest === undefined ? '' : `${oldest.shard}:${oldest.sequenceNumber}`;
}

const defaultSleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

export class ChangeFeedConsumer {
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => number;
  private readonly log: Logger;
  private failedDeliveries = { batch: '', count: 0 };

  constructor(
    private readonly feed: ChangeFeed,
    private readonly handler: ChangeBatchHandler,
    private readonly options: ChangeFeedConsumerOptions
  ) {
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? Date.now;
    this.log = options.logger ?? createLogger({ module: 'change-feed', consumer: feed.consumer });
  }

  /**
   * Wait until `batchSize` events are pending or `maxWaitMs` has passed
   */
  async assembleBatch(): Promise<ChangeEvent[]> {
    const deadline = this.now() + this.options.maxWaitMs;
    let events = await this.feed.readBatch(this.options.batchSize);

    while (events.length < this.options.batchSize && this.now() < deadline) {
      await this.sleep(Math.min(this.options.pollIntervalMs, Math.max(0, deadline - this.now())));
      events = await this.feed.readBatch(this.options.batchSize);
    }
    return events;
  }

  /**
   * Deliver one batch. Checkpoints move only after the handler resolves; a
   * rejected handler leaves the batch for redelivery and the error propagates,
   * until `maxDeliveries` is reached and `onUndeliverable` settles the batch.
   *
   * @returns Number of events delivered
   */
  async pollOnce(): Promise<number> {
    const events = await this.assembleBatch();
    if (events.length === 0) {
      return 0;
    }

    try {
      await this.handler(events);
    } catch (error) {
      if (!(await this.settleUndeliverable(events, error))) {
        throw error;
      }
    }
    this.failedDeliveries = { batch: '', count: 0 };
    await this.feed.commit(events);

    this.log.debug('Committed change batch', { events: events.length });
    return events.length;
  }

  /**
   * @returns Whether the batch was handed to `onUndeliverable` and may be committed
   */
  private async settleUndeliverable(events: readonly ChangeEvent[], error: unknown): Promise<boolean> {
    const { maxDeliveries, onUndeliverable } = this.options;
    if (maxDeliveries === undefined || onUndeliverable === undefined) {
      return false;
    }

    const batch = batchKey(events);
    const count = this.failedDeliveries.batch === batch ? this.failedDeliveries.count + 1 : 1;
    this.failedDeliveries = { batch, count };
    if (count < maxDeliveries) {
      return false;
    }

    this.log.error('Giving up on change batch', {
      events: events.length,
      deliveries: count,
      error: describeError(error),
    });
    await onUndeliverable(events, error);
    return true;
  }

  /**
   * Poll until `signal` aborts. Handler failures are logged and the batch is
   * retried after the poll interval.
   */
  async run(signal: AbortSignal): Promise<void> {
    this.log.info('Change feed consumer started');

    while (!signal.aborted) {
      let delivered = 0;
      try {
        delivered = await this.pollOnce();
      } catch (error) {
        this.log.error('Change batch failed, will redeliver', { error: describeError(error) });
      }
      if (delivered === 0 && !signal.aborted) {
        await this.sleep(this.options.pollIntervalMs);
      }
    }

    this.log.info('Change feed consumer stopped');
  }
}
