/**
 * Test fixtures
 */

import { SQLiteAdapter } from '../../persistence/adapters/sqlite.js';
import { loadSchema } from '../../persistence/adapters/factory.js';
import { IngestionRepository } from '../../persistence/repository.js';

export const COLLECTION = 'test-collection';

/**
 * A valid STAC item with one s3 asset
 */
export function makeItem(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    type: 'Feature',
    stac_version: '1.0.0',
    id: 'item-1',
    collection: COLLECTION,
    geometry: {
      type: 'Polygon',
      coordinates: [
        [
          [-10, -5],
          [10, -5],
          [10, 5],
          [-10, 5],
          [-10, -5],
        ],
      ],
    },
    bbox: [-10, -5, 10, 5],
    properties: { datetime: '2021-08-14T00:00:00Z' },
    links: [],
    assets: {
      cog_default: {
        href: 's3://test-bucket/cogs/item-1.tif',
        type: 'image/tiff; application=geotiff; profile=cloud-optimized',
        roles: ['data'],
      },
    },
    ...overrides,
  };
}

/**
 * A valid COG dataset with one s3 discovery item under `cogs/`
 */
export function makeCogDataset(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    collection: COLLECTION,
    title: 'Test collection',
    description: 'Monthly test rasters',
    license: 'CC0-1.0',
    is_periodic: true,
    time_density: 'month',
    spatial_extent: { xmin: -180, ymin: -90, xmax: 180, ymax: 90 },
    temporal_extent: { startdate: '2021-01-01T00:00:00Z', enddate: '2021-12-31T23:59:59Z' },
    sample_files: ['cogs/data_202108.tif'],
    discovery_items: [
      {
        discovery: 's3',
        bucket: 'test-bucket',
        prefix: 'cogs/',
        filename_regex: '^data_\\d{6}\\.tif$',
        datetime_range: 'month',
      },
    ],
    ...overrides,
  };
}

export interface TestRepository {
  readonly db: SQLiteAdapter;
  readonly repository: IngestionRepository;
}

/**
 * Repository over a fresh in-memory SQLite database
 */
export async function createTestRepository(
  options: { readonly shardCount?: number; readonly now?: () => Date } = {}
): Promise<TestRepository> {
  const db = new SQLiteAdapter();
  await db.initializeSchema(await loadSchema('sqlite'));
  const repository = new IngestionRepository(db, {
    shardCount: options.shardCount ?? 1,
    now: options.now,
  });
  return { db, repository };
}

/**
 * Clock that advances one second per call, starting at `start`
 */
export function steppingClock(start = '2024-01-01T00:00:00.000Z'): () => Date {
  let tick = 0;
  const origin = Date.parse(start);
  return () => new Date(origin + 1000 * tick++);
}
