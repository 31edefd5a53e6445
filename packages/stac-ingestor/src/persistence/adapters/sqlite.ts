/**
 * SQLite Database Adapter
 *
 * Implements DatabaseAdapter on better-sqlite3. The driver is synchronous;
 * methods are async only to share the interface with PostgreSQL.
 *
 * One connection serves the whole process, so top-level transactions are
 * queued and nested ones become savepoints of the enclosing transaction.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import Database from 'better-sqlite3';
import type { DatabaseAdapter } from '../repository.js';

export const IN_MEMORY = ':memory:';

export class SQLiteAdapter implements DatabaseAdapter {
  private readonly db: Database.Database;
  private readonly transactionDepth = new AsyncLocalStorage<number>();
  private queue: Promise<void> = Promise.resolve();

  constructor(filename: string = IN_MEMORY) {
    if (filename !== IN_MEMORY) {
      mkdirSync(dirname(filename), { recursive: true });
    }

    this.db = new Database(filename);

    if (filename !== IN_MEMORY) {
      // Concurrent readers while the loader writes
      this.db.pragma('journal_mode = WAL');
    }
    this.db.pragma('foreign_keys = ON');
    this.db.pragma('synchronous = NORMAL');
  }

  async queryOne<T>(sql: string, params: ReadonlyArray<unknown> = []): Promise<T | null> {
    return this.db.prepare<unknown[], T>(sql).get(...params) ?? null;
  }

  async queryMany<T>(sql: string, params: ReadonlyArray<unknown> = []): Promise<ReadonlyArray<T>> {
    return this.db.prepare<unknown[], T>(sql).all(...params);
  }

  async execute(sql: string, params: ReadonlyArray<unknown> = []): Promise<number> {
    return this.db.prepare(sql).run(...params).changes;
  }

  async transaction<T>(fn: () => Promise<T>): Promise<T> {
    const depth = this.transactionDepth.getStore();
    if (depth === undefined) {
      return this.exclusive(() => this.runTransaction(fn));
    }
    return this.runSavepoint(depth, fn);
  }

  /**
   * BEGIN IMMEDIATE already holds the database write lock; this only checks
   * that a transaction is open.
   */
  async lockTable(table: string): Promise<void> {
    if (this.transactionDepth.getStore() === undefined) {
      throw new Error(`lockTable(${table}) requires an open transaction`);
    }
  }

  async close(): Promise<void> {
    await this.queue;
    this.db.close();
  }

  /**
   * Execute a multi-statement schema script
   */
  async initializeSchema(schemaSQL: string): Promise<void> {
    this.db.exec(schemaSQL);
  }

  private async runTransaction<T>(fn: () => Promise<T>): Promise<T> {
    this.db.exec('BEGIN IMMEDIATE');
    try {
      const result = await this.transactionDepth.run(1, fn);
      this.db.exec('COMMIT');
      return result;
    } catch (error) {
      this.db.exec('ROLLBACK');
      throw error;
    }
  }

  private async runSavepoint<T>(depth: number, fn: () => Promise<T>): Promise<T> {
    const savepoint = `sp_${depth}`;
    this.db.exec(`SAVEPOINT ${savepoint}`);
    try {
      const result = await this.transactionDepth.run(depth + 1, fn);
      this.db.exec(`RELEASE SAVEPOINT ${savepoint}`);
      return result;
    } catch (error) {
      this.db.exec(`ROLLBACK TO SAVEPOINT ${savepoint}`);
      this.db.exec(`RELEASE SAVEPOINT ${savepoint}`);
      throw error;
    }
  }

  private async exclusive<T>(fn: () => Promise<T>): Promise<T> {
    const previous = this.queue;
    let release: () => void = () => undefined;
    this.queue = new Promise<void>((resolve) => {
      release = resolve;
    });

    await previous;
    try {
      return await fn();
    } finally {
      release();
    }
  }
}
