/**
 * pgstac catalog store
 *
 * Items go through pgstac's staging tables, whose triggers partition and
 * index them; the staging table picked decides the write mode. Collections go
 * through pgstac's collection functions.
 */

import type { DatabaseAdapter } from '../persistence/repository.js';
import type { ItemPayload, StacCollection } from '../core/types/index.js';
import { createLogger } from '../core/utils/logger.js';
import type { CatalogStore, LoadMode } from './catalog-store.js';

const log = createLogger({ module: 'pgstac' });

const ITEM_STAGING_TABLES: Record<LoadMode, string> = {
  insert: 'pgstac.items_staging',
  insert_ignore: 'pgstac.items_staging_ignore',
  upsert: 'pgstac.items_staging_upsert',
};

const COLLECTION_STATEMENTS: Record<LoadMode, string> = {
  insert: 'SELECT pgstac.create_collection(?::jsonb)',
  insert_ignore:
    'INSERT INTO pgstac.collections (content) VALUES (?::jsonb) ON CONFLICT DO NOTHING',
  upsert: 'SELECT pgstac.upsert_collection(?::jsonb)',
};

export interface PgstacCatalogStoreOptions {
  /** Per-statement timeout applied inside each write transaction */
  readonly statementTimeoutMs: number;
}

interface CollectionRow {
  readonly collection: StacCollection | null;
}

interface ExistsRow {
  readonly exists: boolean;
}

export class PgstacCatalogStore implements CatalogStore {
  constructor(
    private readonly db: DatabaseAdapter,
    private readonly options: PgstacCatalogStoreOptions
  ) {}

  async loadItems(items: readonly ItemPayload[], mode: LoadMode): Promise<void> {
    if (items.length === 0) {
      return;
    }

    const table = ITEM_STAGING_TABLES[mode];
    await this.db.transaction(async () => {
      await this.applyStatementTimeout();
      await this.db.execute(
        `INSERT INTO ${table} (content) SELECT * FROM jsonb_array_elements(?::jsonb)`,
        [JSON.stringify(items)]
      );
    });

    log.info('Loaded items', { count: items.length, mode });
  }

  async loadCollection(collection: StacCollection, mode: LoadMode): Promise<void> {
    await this.db.transaction(async () => {
      await this.applyStatementTimeout();
      await this.db.execute(COLLECTION_STATEMENTS[mode], [JSON.stringify(collection)]);
    });

    log.info('Loaded collection', { collectionId: collection.id, mode });
  }

  async getCollection(collectionId: string): Promise<StacCollection | null> {
    const row = await this.db.queryOne<CollectionRow>(
      'SELECT pgstac.get_collection(?) AS collection',
      [collectionId]
    );
    return row?.collection ?? null;
  }

  async collectionExists(collectionId: string): Promise<boolean> {
    const row = await this.db.queryOne<ExistsRow>(
      'SELECT EXISTS (SELECT 1 FROM pgstac.collections WHERE id = ?) AS exists',
      [collectionId]
    );
    return row?.exists === true;
  }

  async deleteCollection(collectionId: string): Promise<void> {
    await this.db.transaction(async () => {
      await this.applyStatementTimeout();
      await this.db.execute('SELECT pgstac.delete_collection(?)', [collectionId]);
    });

    log.info('Deleted collection', { collectionId });
  }

  async updateCollectionSummaries(collectionId: string): Promise<void> {
    await this.db.transaction(async () => {
      await this.applyStatementTimeout();

      log.info('Updating dashboard summaries', { collectionId });
      await this.db.execute('SELECT dashboard.update_collection_default_summaries(?)', [
        collectionId,
      ]);

      log.info('Updating spatial and temporal extents', { collectionId });
      await this.db.execute(
        `UPDATE pgstac.collections SET
          content = content || jsonb_build_object(
            'extent', jsonb_build_object(
              'spatial', jsonb_build_object('bbox', pgstac.collection_bbox(collections.id)),
              'temporal', jsonb_build_object('interval', pgstac.collection_temporal_extent(collections.id))
            )
          )
        WHERE collections.id = ?`,
        [collectionId]
      );
    });
  }

  private async applyStatementTimeout(): Promise<void> {
    // SET does not take bind parameters
    const timeout = Math.max(0, Math.trunc(this.options.statementTimeoutMs));
    await this.db.execute(`SET LOCAL statement_timeout = ${timeout}`);
  }
}
