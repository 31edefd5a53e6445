/**
 * Ingestion Repository
 *
 * Durable queue of ingestion records. Works with both SQLite (better-sqlite3)
 * and PostgreSQL (pg).
 *
 * Every write is a full overwrite keyed by (created_by, id), last writer wins,
 * and appends a change event carrying the new image in the same transaction.
 * The change feed (change-feed.ts) reads those events.
 */

import { NotFoundError, InvalidCursorError } from '../core/errors.js';
import type {
  IngestionKey,
  IngestionPage,
  IngestionRecord,
  ItemPayload,
  ListIngestionsOptions,
} from '../core/types/index.js';
import { formatKey, parseStatus } from '../ingestion/ingestion-record.js';
import { marshallMap } from './attribute-codec.js';
import { decodeCursor, encodeCursor } from './cursor.js';
import type { ChangeEventName, IngestionRow } from './schema.types.js';
import { nowISO8601 } from './schema.types.js';
import { shardFor } from './sharding.js';

// ============================================================================
// Database Adapter Interface - Supports SQLite and PostgreSQL
// ============================================================================

/**
 * Unified database interface for SQLite and PostgreSQL.
 * Implementations handle driver-specific details; SQL uses `?` placeholders.
 */
export interface DatabaseAdapter {
  /**
   * Execute query returning single row or null.
   */
  queryOne<T>(sql: string, params?: ReadonlyArray<unknown>): Promise<T | null>;

  /**
   * Execute query returning multiple rows.
   */
  queryMany<T>(sql: string, params?: ReadonlyArray<unknown>): Promise<ReadonlyArray<T>>;

  /**
   * Execute statement (INSERT, UPDATE, DELETE).
   * Returns number of affected rows.
   */
  execute(sql: string, params?: ReadonlyArray<unknown>): Promise<number>;

  /**
   * Execute transaction with automatic rollback on error.
   */
  transaction<T>(fn: () => Promise<T>): Promise<T>;

  /**
   * Hold an exclusive write lock on a table until the enclosing transaction
   * ends. Must be called inside `transaction`.
   */
  lockTable(table: string): Promise<void>;

  /**
   * Close database connection.
   */
  close(): Promise<void>;
}

// ============================================================================
// Row mapping
// ============================================================================

function isItemPayload(value: unknown): value is ItemPayload {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function rowToRecord(row: IngestionRow): IngestionRecord {
  const item: unknown = JSON.parse(row.item);
  if (!isItemPayload(item)) {
    throw new Error(`Stored item for ${row.created_by}/${row.id} is not an object`);
  }

  const record: IngestionRecord = {
    created_by: row.created_by,
    id: row.id,
    status: parseStatus(row.status),
    item,
    created_at: row.created_at,
    updated_at: row.updated_at,
  };
  return row.message === null ? record : { ...record, message: row.message };
}

// ============================================================================
// Repository Implementation
// ============================================================================

export interface IngestionRepositoryOptions {
  /** Number of change-feed shards events are spread across */
  readonly shardCount: number;
  readonly now?: () => Date;
}

export class IngestionRepository {
  private readonly shardCount: number;
  private readonly now: () => Date;

  constructor(
    private readonly db: DatabaseAdapter,
    options: IngestionRepositoryOptions
  ) {
    this.shardCount = options.shardCount;
    this.now = options.now ?? (() => new Date());
  }

  async find(createdBy: string, id: string): Promise<IngestionRecord | null> {
    const row = await this.db.queryOne<IngestionRow>(
      'SELECT * FROM ingestions WHERE created_by = ? AND id = ?',
      [createdBy, id]
    );
    return row ? rowToRecord(row) : null;
  }

  /**
   * @throws {NotFoundError} When no record exists under the key
   */
  async get(createdBy: string, id: string): Promise<IngestionRecord> {
    const record = await this.find(createdBy, id);
    if (!record) {
      throw new NotFoundError('ingestion', formatKey({ created_by: createdBy, id }));
    }
    return record;
  }

  /**
   * Overwrite the record as given
   */
  async put(record: IngestionRecord): Promise<void> {
    await this.db.transaction(async () => {
      await this.lockChangeLog();
      await this.write(record);
    });
  }

  /**
   * Overwrite several records in one transaction
   */
  async putMany(records: readonly IngestionRecord[]): Promise<void> {
    if (records.length === 0) {
      return;
    }
    await this.db.transaction(async () => {
      await this.lockChangeLog();
      for (const record of records) {
        await this.write(record);
      }
    });
  }

  /**
   * Stamp `updated_at` and overwrite
   *
   * @returns The record as stored
   */
  async save<TItem extends ItemPayload>(
    record: IngestionRecord<TItem>
  ): Promise<IngestionRecord<TItem>> {
    const stamped = this.stamp(record);
    await this.put(stamped);
    return stamped;
  }

  async saveMany<TItem extends ItemPayload>(
    records: readonly IngestionRecord<TItem>[]
  ): Promise<IngestionRecord<TItem>[]> {
    const stamped = records.map((record) => this.stamp(record));
    await this.putMany(stamped);
    return stamped;
  }

  /**
   * One page of records in a status, oldest first
   *
   * Order is (created_at, created_by, id); the cursor resumes strictly after
   * the last record of the previous page.
   *
   * @throws {InvalidCursorError} For malformed cursors or a cursor issued for another status
   */
  async list(options: ListIngestionsOptions = {}): Promise<IngestionPage> {
    const status = options.status ?? 'queued';
    const conditions = ['status = ?'];
    const params: unknown[] = [status];

    if (options.cursor) {
      const after = decodeCursor(options.cursor);
      if (after.status !== status) {
        throw new InvalidCursorError(options.cursor, `issued for status ${after.status}`);
      }
      conditions.push('(created_at, created_by, id) > (?, ?, ?)');
      params.push(after.created_at, after.created_by, after.id);
    }

    let sql = `SELECT * FROM ingestions WHERE ${conditions.join(' AND ')}
      ORDER BY created_at, created_by, id`;
    if (options.limit !== undefined) {
      // One extra row tells whether another page exists
      sql += ' LIMIT ?';
      params.push(options.limit + 1);
    }

    const rows = await this.db.queryMany<IngestionRow>(sql, params);
    const hasMore = options.limit !== undefined && rows.length > options.limit;
    const items = (hasMore ? rows.slice(0, options.limit) : rows).map(rowToRecord);
    const last = items[items.length - 1];

    return {
      items,
      next: hasMore && last !== undefined ? encodeCursor(last) : null,
    };
  }

  private stamp<TItem extends ItemPayload>(
    record: IngestionRecord<TItem>
  ): IngestionRecord<TItem> {
    const now = this.now().toISOString();
    // updated_at never precedes created_at, even under clock skew
    return { ...record, updated_at: now > record.created_at ? now : record.created_at };
  }

  /**
   * Feed checkpoints are high-water marks, so a change event must never
   * become visible after one with a higher sequence number on its shard.
   * Writers hold this lock from before their first row write until commit,
   * which makes sequence order match commit order.
   */
  private async lockChangeLog(): Promise<void> {
    await this.db.lockTable('ingestion_changes');
  }

  private async write(record: IngestionRecord): Promise<void> {
    const existing = await this.db.queryOne<{ readonly found: number }>(
      'SELECT 1 AS found FROM ingestions WHERE created_by = ? AND id = ?',
      [record.created_by, record.id]
    );
    const eventName: ChangeEventName = existing ? 'MODIFY' : 'INSERT';

    await this.db.execute(
      `INSERT INTO ingestions (created_by, id, status, message, item, created_at, updated_at)
      VALUES (?, ?, ?, ?, ?, ?, ?)
      ON CONFLICT (created_by, id) DO UPDATE SET
        status = excluded.status,
        message = excluded.message,
        item = excluded.item,
        created_at = excluded.created_at,
        updated_at = excluded.updated_at`,
      [
        record.created_by,
        record.id,
        record.status,
        record.message ?? null,
        JSON.stringify(record.item),
        record.created_at,
        record.updated_at,
      ]
    );

    await this.appendChange(eventName, record);
  }

  private async appendChange(eventName: ChangeEventName, record: IngestionRecord): Promise<void> {
    const key: IngestionKey = { created_by: record.created_by, id: record.id };
    const image = marshallMap({
      created_by: record.created_by,
      id: record.id,
      status: record.status,
      message: record.message,
      item: record.item,
      created_at: record.created_at,
      updated_at: record.updated_at,
    });

    await this.db.execute(
      `INSERT INTO ingestion_changes (shard, event_name, created_by, id, new_image, recorded_at)
      VALUES (?, ?, ?, ?, ?, ?)`,
      [
        shardFor(key, this.shardCount),
        eventName,
        key.created_by,
        key.id,
        JSON.stringify(image),
        nowISO8601(),
      ]
    );
  }
}
