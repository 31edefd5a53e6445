/**
 * Ingestion service tests
 *
 * SQLite repository in memory, collection lookup and object store faked.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { IngestionService } from '../../../ingestion/ingestion-service.js';
import { AssetProbe } from '../../../validators/asset-accessibility.js';
import { CollectionRegistry } from '../../../validators/collection-registry.js';
import { HTTPClient } from '../../../core/http-client.js';
import {
  InvalidStateTransitionError,
  NotFoundError,
  UnknownCollectionError,
  ValidationError,
} from '../../../core/errors.js';
import { InMemoryObjectStore } from '../../utils/fakes.js';
import { COLLECTION, createTestRepository, makeItem, type TestRepository } from '../../utils/fixtures.js';

describe('IngestionService', () => {
  let store: TestRepository;
  let service: IngestionService;

  beforeEach(async () => {
    store = await createTestRepository();
    const objects = new InMemoryObjectStore().put('test-bucket', 'cogs/item-1.tif', 'raster');
    service = new IngestionService(
      store.repository,
      {
        collections: new CollectionRegistry(
          { collectionExists: async (id) => id === COLLECTION },
          { ttlMs: 60_000, maxEntries: 10 }
        ),
        assets: new AssetProbe(new HTTPClient(), objects, { timeoutMs: 1_000 }),
      },
      { defaultPageSize: 2 }
    );
  });

  afterEach(async () => {
    await store.db.close();
  });

  describe('submit', () => {
    it('queues a valid item under its own id', async () => {
      const record = await service.submit('alice', makeItem());

      expect(record).toMatchObject({ created_by: 'alice', id: 'item-1', status: 'queued' });
      expect(record.message).toBeUndefined();
      await expect(service.get('alice', 'item-1')).resolves.toMatchObject({
        status: 'queued',
        item: { id: 'item-1', collection: COLLECTION },
      });
    });

    it('accepts an explicit ingestion id', async () => {
      await service.submit('alice', makeItem(), { id: 'retry-1' });

      await expect(service.get('alice', 'retry-1')).resolves.toMatchObject({ id: 'retry-1' });
      await expect(service.get('alice', 'item-1')).rejects.toBeInstanceOf(NotFoundError);
    });

    it('stores nothing for a rejected item', async () => {
      await expect(
        service.submit('alice', makeItem({ collection: 'unknown-collection' }))
      ).rejects.toBeInstanceOf(UnknownCollectionError);
      await expect(service.submit('alice', { id: 'x' })).rejects.toBeInstanceOf(ValidationError);

      await expect(service.list()).resolves.toEqual({ items: [], next: null });
    });

    it('keys records by principal', async () => {
      await service.submit('alice', makeItem());
      await service.submit('bob', makeItem());

      await expect(service.get('bob', 'item-1')).resolves.toMatchObject({ created_by: 'bob' });
    });
  });

  describe('list', () => {
    it('pages queued records with the default page size', async () => {
      for (const id of ['a', 'b', 'c']) {
        await service.submit('alice', makeItem({ id }));
      }

      const first = await service.list();
      expect(first.items).toHaveLength(2);
      expect(first.next).not.toBeNull();

      const second = await service.list({ cursor: first.next });
      expect(second.items).toHaveLength(1);
      expect(second.next).toBeNull();

      const ids = [...first.items, ...second.items].map((record) => record.id).sort();
      expect(ids).toEqual(['a', 'b', 'c']);
    });

    it('filters by status', async () => {
      await service.submit('alice', makeItem({ id: 'a' }));
      await service.submit('alice', makeItem({ id: 'b' }));
      await service.cancel('alice', 'b');

      const page = await service.list({ status: 'cancelled', limit: 10 });

      expect(page.items.map((record) => record.id)).toEqual(['b']);
    });
  });

  describe('cancel', () => {
    it('cancels a queued record', async () => {
      await service.submit('alice', makeItem());

      const cancelled = await service.cancel('alice', 'item-1');

      expect(cancelled.status).toBe('cancelled');
      await expect(service.get('alice', 'item-1')).resolves.toMatchObject({ status: 'cancelled' });
    });

    it('refuses to cancel twice', async () => {
      await service.submit('alice', makeItem());
      await service.cancel('alice', 'item-1');

      await expect(service.cancel('alice', 'item-1')).rejects.toBeInstanceOf(InvalidStateTransitionError);
    });

    it('reports a missing record', async () => {
      await expect(service.cancel('alice', 'nope')).rejects.toThrow(
        'No ingestion found with key alice/nope'
      );
    });
  });
});
