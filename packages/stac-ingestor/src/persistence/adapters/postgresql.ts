/**
 * PostgreSQL Database Adapter
 *
 * Implements DatabaseAdapter interface using node-postgres (pg).
 * Provides async operations with connection pooling and transaction support.
 * Serves both the ingestion queue and the pgstac catalog database.
 *
 * Each top-level transaction checks out its own pool client. The client is
 * bound to the async context of the transaction callback, so concurrent
 * transactions never share a connection and queries issued inside a callback
 * run on that callback's client.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import pg from 'pg';
import type { PoolClient, PoolConfig } from 'pg';
import type { DatabaseAdapter } from '../repository.js';
import { logger } from '../../core/utils/logger.js';

interface TransactionScope {
  readonly client: PoolClient;
  readonly depth: number;
}

export class PostgreSQLAdapter implements DatabaseAdapter {
  private pool: pg.Pool;
  private readonly scope = new AsyncLocalStorage<TransactionScope>();

  constructor(config: PoolConfig) {
    this.pool = new pg.Pool({
      max: 10,
      idleTimeoutMillis: 30000, // Close idle clients after 30s
      connectionTimeoutMillis: 5000, // Fail fast on connection issues
      ...config,
    });

    // Error handler for pool-level errors
    this.pool.on('error', (err: Error) => {
      logger.error('Unexpected PostgreSQL pool error', {
        error: err.message,
        stack: err.stack,
      });
    });
  }

  async queryOne<T>(
    sql: string,
    params: ReadonlyArray<unknown> = []
  ): Promise<T | null> {
    const result = await this.queryable().query(this.parameterize(sql), [...params]);
    return (result.rows[0] as T | undefined) ?? null;
  }

  async queryMany<T>(
    sql: string,
    params: ReadonlyArray<unknown> = []
  ): Promise<ReadonlyArray<T>> {
    const result = await this.queryable().query(this.parameterize(sql), [...params]);
    return result.rows as T[];
  }

  async execute(
    sql: string,
    params: ReadonlyArray<unknown> = []
  ): Promise<number> {
    const result = await this.queryable().query(this.parameterize(sql), [...params]);
    return result.rowCount ?? 0;
  }

  async transaction<T>(fn: () => Promise<T>): Promise<T> {
    const current = this.scope.getStore();
    if (current) {
      return this.runSavepoint(current, fn);
    }

    const client = await this.pool.connect();
    try {
      await client.query('BEGIN');
      const result = await this.scope.run({ client, depth: 1 }, fn);
      await client.query('COMMIT');
      return result;
    } catch (error) {
      await client.query('ROLLBACK');
      throw error;
    } finally {
      client.release();
    }
  }

  /**
   * `LOCK TABLE ... IN EXCLUSIVE MODE`: blocks other writers of the table
   * until this transaction ends, plain reads go through.
   */
  async lockTable(table: string): Promise<void> {
    const current = this.scope.getStore();
    if (!current) {
      throw new Error(`lockTable(${table}) requires an open transaction`);
    }
    await current.client.query(`LOCK TABLE ${table} IN EXCLUSIVE MODE`);
  }

  async close(): Promise<void> {
    await this.pool.end();
  }

  /**
   * Convert SQLite-style ? placeholders to PostgreSQL $1, $2, etc.
   */
  private parameterize(sql: string): string {
    let paramIndex = 1;
    return sql.replace(/\?/g, () => `$${paramIndex++}`);
  }

  /**
   * Initialize database schema from SQL file.
   */
  async initializeSchema(schemaSQL: string): Promise<void> {
    await this.pool.query(schemaSQL);
  }

  private queryable(): pg.Pool | PoolClient {
    return this.scope.getStore()?.client ?? this.pool;
  }

  private async runSavepoint<T>(current: TransactionScope, fn: () => Promise<T>): Promise<T> {
    const savepoint = `sp_${current.depth}`;
    await current.client.query(`SAVEPOINT ${savepoint}`);
    try {
      const result = await this.scope.run(
        { client: current.client, depth: current.depth + 1 },
        fn
      );
      await current.client.query(`RELEASE SAVEPOINT ${savepoint}`);
      return result;
    } catch (error) {
      await current.client.query(`ROLLBACK TO SAVEPOINT ${savepoint}`);
      throw error;
    }
  }
}
