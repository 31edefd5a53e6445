/**
 * PostgreSQL Adapter Tests
 *
 * pg is replaced by an in-process pool. Its clients log every statement,
 * emulate LOCK TABLE as a mutex held until COMMIT or ROLLBACK, and hand out
 * change sequence numbers the way BIGSERIAL does: at INSERT, visible at COMMIT.
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { PostgreSQLAdapter } from '../../../persistence/adapters/postgresql.js';
import { IngestionRepository } from '../../../persistence/repository.js';
import { createIngestion } from '../../../ingestion/ingestion-record.js';

const pgFake = vi.hoisted(() => {
  interface VisibleChange {
    readonly sequence: number;
    readonly id: string;
  }

  interface FakeState {
    log: string[];
    visible: VisibleChange[];
    sequence: number;
    tableLock: Promise<void>;
    slowCommits: Set<string>;
  }

  const state: FakeState = {
    log: [],
    visible: [],
    sequence: 0,
    tableLock: Promise.resolve(),
    slowCommits: new Set<string>(),
  };

  function reset(): void {
    state.log = [];
    state.visible = [];
    state.sequence = 0;
    state.tableLock = Promise.resolve();
    state.slowCommits = new Set<string>();
  }

  class FakeClient {
    private pending: VisibleChange[] = [];
    private unlock: () => void = () => undefined;

    constructor(readonly name: string) {}

    async query(sql: string, values: unknown[] = []): Promise<{ rows: unknown[]; rowCount: number }> {
      const statement = sql.replace(/\s+/g, ' ').trim();
      state.log.push(`${this.name}:${statement}`);

      if (statement.startsWith('LOCK TABLE')) {
        const previous = state.tableLock;
        state.tableLock = new Promise<void>((resolve) => {
          this.unlock = resolve;
        });
        await previous;
      } else if (statement.startsWith('INSERT INTO ingestion_changes')) {
        state.sequence += 1;
        this.pending.push({ sequence: state.sequence, id: String(values[3]) });
      } else if (statement === 'COMMIT' || statement === 'ROLLBACK') {
        if (statement === 'COMMIT') {
          if (state.slowCommits.has(this.name)) {
            await new Promise((resolve) => setTimeout(resolve, 5));
          }
          state.visible.push(...this.pending);
        }
        this.pending = [];
        this.unlock();
        this.unlock = () => undefined;
      }
      return { rows: [], rowCount: 1 };
    }

    release(): void {
      state.log.push(`${this.name}:release`);
    }
  }

  class FakePool {
    private clients = 0;

    on(): void {}

    async connect(): Promise<FakeClient> {
      this.clients += 1;
      return new FakeClient(`c${this.clients}`);
    }

    async query(sql: string): Promise<{ rows: unknown[]; rowCount: number }> {
      state.log.push(`pool:${sql.replace(/\s+/g, ' ').trim()}`);
      return { rows: [], rowCount: 0 };
    }

    async end(): Promise<void> {}
  }

  return { state, reset, FakePool };
});

vi.mock('pg', () => ({ default: { Pool: pgFake.FakePool } }));

const tick = (): Promise<void> => new Promise((resolve) => setTimeout(resolve, 0));

function statementsOf(client: string): string[] {
  return pgFake.state.log
    .filter((entry) => entry.startsWith(`${client}:`))
    .map((entry) => entry.slice(client.length + 1));
}

describe('PostgreSQLAdapter', () => {
  let adapter: PostgreSQLAdapter;

  beforeEach(() => {
    pgFake.reset();
    adapter = new PostgreSQLAdapter({});
  });

  it('runs queries outside a transaction on the pool with numbered placeholders', async () => {
    await adapter.execute('DELETE FROM ingestions WHERE created_by = ? AND id = ?', ['alice', 'a']);

    expect(pgFake.state.log).toEqual(['pool:DELETE FROM ingestions WHERE created_by = $1 AND id = $2']);
  });

  it('gives concurrent transactions their own clients', async () => {
    await Promise.all([
      adapter.transaction(async () => {
        await adapter.execute('INSERT A');
        await tick();
        await adapter.execute('INSERT A2');
      }),
      adapter.transaction(async () => {
        await adapter.execute('INSERT B');
      }),
    ]);

    expect(statementsOf('c1')).toEqual(['BEGIN', 'INSERT A', 'INSERT A2', 'COMMIT', 'release']);
    expect(statementsOf('c2')).toEqual(['BEGIN', 'INSERT B', 'COMMIT', 'release']);
    expect(statementsOf('pool')).toEqual([]);
  });

  it('turns nested transactions into savepoints on the same client', async () => {
    await adapter.transaction(async () => {
      await adapter.execute('INSERT A');
      await adapter.transaction(() => adapter.execute('INSERT B'));
    });

    expect(statementsOf('c1')).toEqual([
      'BEGIN',
      'INSERT A',
      'SAVEPOINT sp_1',
      'INSERT B',
      'RELEASE SAVEPOINT sp_1',
      'COMMIT',
      'release',
    ]);
  });

  it('rolls back and releases the client when the callback throws', async () => {
    await expect(
      adapter.transaction(async () => {
        await adapter.execute('INSERT A');
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');

    expect(statementsOf('c1')).toEqual(['BEGIN', 'INSERT A', 'ROLLBACK', 'release']);
  });

  it('rolls a failed nested transaction back to its savepoint only', async () => {
    await adapter.transaction(async () => {
      await expect(
        adapter.transaction(async () => {
          await adapter.execute('INSERT B');
          throw new Error('inner');
        })
      ).rejects.toThrow('inner');
      await adapter.execute('INSERT C');
    });

    expect(statementsOf('c1')).toEqual([
      'BEGIN',
      'SAVEPOINT sp_1',
      'INSERT B',
      'ROLLBACK TO SAVEPOINT sp_1',
      'INSERT C',
      'COMMIT',
      'release',
    ]);
  });

  it('locks tables on the transaction client only', async () => {
    await expect(adapter.lockTable('ingestion_changes')).rejects.toThrow(
      'lockTable(ingestion_changes) requires an open transaction'
    );

    await adapter.transaction(() => adapter.lockTable('ingestion_changes'));

    expect(statementsOf('c1')).toEqual([
      'BEGIN',
      'LOCK TABLE ingestion_changes IN EXCLUSIVE MODE',
      'COMMIT',
      'release',
    ]);
  });
});

describe('IngestionRepository on PostgreSQL', () => {
  beforeEach(() => {
    pgFake.reset();
  });

  it('makes change events visible in sequence order when an earlier writer commits late', async () => {
    const repository = new IngestionRepository(new PostgreSQLAdapter({}), { shardCount: 1 });
    const now = new Date('2024-06-01T00:00:00.000Z');
    pgFake.state.slowCommits.add('c1');

    await Promise.all([
      repository.put(createIngestion({ id: 'a', created_by: 'alice', item: { id: 'a' } }, now)),
      repository.put(createIngestion({ id: 'b', created_by: 'bob', item: { id: 'b' } }, now)),
    ]);

    expect(pgFake.state.visible).toEqual([
      { sequence: 1, id: 'a' },
      { sequence: 2, id: 'b' },
    ]);
    expect(statementsOf('c2').slice(0, 2)).toEqual([
      'BEGIN',
      'LOCK TABLE ingestion_changes IN EXCLUSIVE MODE',
    ]);
  });
});
