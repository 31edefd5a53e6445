/**
 * Change feed tests
 *
 * At-least-once delivery: checkpoints move only after a handler resolves.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { ChangeFeed, ChangeFeedConsumer, type ChangeEvent } from '../../../persistence/change-feed.js';
import { createIngestion, transition } from '../../../ingestion/ingestion-record.js';
import { createTestRepository, type TestRepository } from '../../utils/fixtures.js';

const CREATED_AT = new Date('2024-05-01T00:00:00.000Z');

describe('ChangeFeed', () => {
  let ctx: TestRepository;

  async function queue(id: string): Promise<void> {
    await ctx.repository.put(createIngestion({ id, created_by: 'alice', item: { id } }, CREATED_AT));
  }

  beforeEach(async () => {
    ctx = await createTestRepository();
  });

  afterEach(async () => {
    await ctx.db.close();
  });

  describe('readBatch / commit', () => {
    it('delivers events oldest first with their images', async () => {
      await queue('a');
      await queue('b');

      const feed = new ChangeFeed(ctx.db, { consumer: 'loader' });
      const events = await feed.readBatch(10);

      expect(events.map((e) => [e.sequenceNumber, e.eventName, e.key.id])).toEqual([
        [1, 'INSERT', 'a'],
        [2, 'INSERT', 'b'],
      ]);
      expect(events[0]?.newImage.status).toEqual({ S: 'queued' });
      expect(events[0]?.shard).toBe(0);
    });

    it('honours the limit', async () => {
      await queue('a');
      await queue('b');
      await queue('c');

      const feed = new ChangeFeed(ctx.db, { consumer: 'loader' });
      expect((await feed.readBatch(2)).map((e) => e.key.id)).toEqual(['a', 'b']);
    });

    it('redelivers until committed', async () => {
      await queue('a');
      const feed = new ChangeFeed(ctx.db, { consumer: 'loader' });

      const first = await feed.readBatch(10);
      expect(await feed.readBatch(10)).toEqual(first);

      await feed.commit(first);
      expect(await feed.readBatch(10)).toEqual([]);

      await ctx.repository.put(
        transition(createIngestion({ id: 'a', created_by: 'alice', item: { id: 'a' } }, CREATED_AT), 'cancelled')
      );
      expect((await feed.readBatch(10)).map((e) => [e.sequenceNumber, e.eventName])).toEqual([
        [2, 'MODIFY'],
      ]);
    });

    it('keeps checkpoints per consumer', async () => {
      await queue('a');
      const loader = new ChangeFeed(ctx.db, { consumer: 'loader' });
      const audit = new ChangeFeed(ctx.db, { consumer: 'audit' });

      await loader.commit(await loader.readBatch(10));

      expect(await loader.readBatch(10)).toHaveLength(0);
      expect(await audit.readBatch(10)).toHaveLength(1);
    });

    it('never moves a checkpoint backwards', async () => {
      await queue('a');
      await queue('b');
      const feed = new ChangeFeed(ctx.db, { consumer: 'loader' });
      const events = await feed.readBatch(10);

      await feed.commit(events);
      await feed.commit(events.slice(0, 1));

      expect(await feed.readBatch(10)).toEqual([]);
      const checkpoint = await ctx.db.queryOne<{ sequence_number: number }>(
        "SELECT sequence_number FROM feed_checkpoints WHERE consumer = 'loader' AND shard = 0"
      );
      expect(checkpoint?.sequence_number).toBe(2);
    });

    it('reads only the shards it owns', async () => {
      await queue('a');

      expect(await new ChangeFeed(ctx.db, { consumer: 'x', shards: [1, 2] }).readBatch(10)).toEqual([]);
      expect(await new ChangeFeed(ctx.db, { consumer: 'x', shards: [] }).readBatch(10)).toEqual([]);
      expect(await new ChangeFeed(ctx.db, { consumer: 'x', shards: [0] }).readBatch(10)).toHaveLength(1);
    });
  });

  describe('ChangeFeedConsumer', () => {
    function fakeTime(onSleep: (ms: number) => Promise<void> = async () => {}) {
      let now = 0;
      const sleeps: number[] = [];
      return {
        now: () => now,
        sleeps,
        sleep: async (ms: number) => {
          sleeps.push(ms);
          now += ms;
          await onSleep(ms);
        },
      };
    }

    it('commits after the handler resolves', async () => {
      await queue('a');
      const feed = new ChangeFeed(ctx.db, { consumer: 'loader' });
      const delivered: ChangeEvent[][] = [];
      const time = fakeTime();
      const consumer = new ChangeFeedConsumer(
        feed,
        async (events) => {
          delivered.push([...events]);
        },
        { batchSize: 1, maxWaitMs: 0, pollIntervalMs: 10, ...time }
      );

      expect(await consumer.pollOnce()).toBe(1);
      expect(await consumer.pollOnce()).toBe(0);
      expect(delivered).toHaveLength(1);
    });

    it('leaves the batch for redelivery when the handler throws', async () => {
      await queue('a');
      const feed = new ChangeFeed(ctx.db, { consumer: 'loader' });
      let calls = 0;
      const consumer = new ChangeFeedConsumer(
        feed,
        async () => {
          calls++;
          if (calls === 1) throw new Error('catalog down');
        },
        { batchSize: 1, maxWaitMs: 0, pollIntervalMs: 10, ...fakeTime() }
      );

      await expect(consumer.pollOnce()).rejects.toThrow('catalog down');
      expect(await consumer.pollOnce()).toBe(1);
      expect(calls).toBe(2);
      expect(await feed.readBatch(10)).toEqual([]);
    });

    it('hands a batch that keeps failing to onUndeliverable and moves past it', async () => {
      await queue('a');
      const feed = new ChangeFeed(ctx.db, { consumer: 'loader' });
      const settled: Array<{ ids: string[]; error: unknown }> = [];
      const failure = new Error('image never decodes');
      const consumer = new ChangeFeedConsumer(
        feed,
        async () => {
          throw failure;
        },
        {
          batchSize: 1,
          maxWaitMs: 0,
          pollIntervalMs: 10,
          maxDeliveries: 3,
          onUndeliverable: async (events, error) => {
            settled.push({ ids: events.map((e) => e.key.id), error });
          },
          ...fakeTime(),
        }
      );

      await expect(consumer.pollOnce()).rejects.toThrow('image never decodes');
      await expect(consumer.pollOnce()).rejects.toThrow('image never decodes');
      expect(settled).toEqual([]);

      expect(await consumer.pollOnce()).toBe(1);
      expect(settled).toEqual([{ ids: ['a'], error: failure }]);
      expect(await feed.readBatch(10)).toEqual([]);
    });

    it('tops up a partial batch until it is full', async () => {
      await queue('a');
      let added = false;
      const time = fakeTime(async () => {
        if (!added) {
          added = true;
          await queue('b');
          await queue('c');
        }
      });
      const sizes: number[] = [];
      const consumer = new ChangeFeedConsumer(
        new ChangeFeed(ctx.db, { consumer: 'loader' }),
        async (events) => {
          sizes.push(events.length);
        },
        { batchSize: 3, maxWaitMs: 100, pollIntervalMs: 40, ...time }
      );

      expect(await consumer.pollOnce()).toBe(3);
      expect(sizes).toEqual([3]);
      expect(time.sleeps).toEqual([40]);
    });

    it('hands over a partial batch once maxWaitMs has passed', async () => {
      await queue('a');
      const time = fakeTime();
      const consumer = new ChangeFeedConsumer(
        new ChangeFeed(ctx.db, { consumer: 'loader' }),
        async () => {},
        { batchSize: 10, maxWaitMs: 100, pollIntervalMs: 40, ...time }
      );

      expect(await consumer.pollOnce()).toBe(1);
      expect(time.sleeps).toEqual([40, 40, 20]);
    });

    it('stops when the signal aborts', async () => {
      const controller = new AbortController();
      const consumer = new ChangeFeedConsumer(
        new ChangeFeed(ctx.db, { consumer: 'loader' }),
        async () => {},
        {
          batchSize: 1,
          maxWaitMs: 0,
          pollIntervalMs: 10,
          ...fakeTime(async () => controller.abort()),
        }
      );

      await consumer.run(controller.signal);
      expect(controller.signal.aborted).toBe(true);
    });
  });
});
