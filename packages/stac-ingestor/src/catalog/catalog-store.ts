/**
 * Catalog store contract
 *
 * The catalog store is the final home of items and collections (pgstac in
 * production). Only these calls are made against it; the wire format of the
 * store's own query language stays behind the implementation.
 */

import type { ItemPayload, StacCollection } from '../core/types/index.js';

/**
 * Write mode for bulk loads
 *
 * - insert: fail when any record already exists
 * - insert_ignore: skip records whose id already exists, never overwrite
 * - upsert: overwrite existing records
 */
export type LoadMode = 'insert' | 'insert_ignore' | 'upsert';

export const LOAD_MODES: readonly LoadMode[] = ['insert', 'insert_ignore', 'upsert'];

/**
 * Answers whether a collection is registered
 */
export interface CollectionLookup {
  collectionExists(collectionId: string): Promise<boolean>;
}

export interface CatalogStore extends CollectionLookup {
  /**
   * Load items in a single bulk call. Either every item is handed to the
   * store or the call throws; there is no per-item outcome.
   */
  loadItems(items: readonly ItemPayload[], mode: LoadMode): Promise<void>;

  loadCollection(collection: StacCollection, mode: LoadMode): Promise<void>;

  getCollection(collectionId: string): Promise<StacCollection | null>;

  deleteCollection(collectionId: string): Promise<void>;

  /**
   * Recompute dashboard summaries and the spatial/temporal extent from the
   * items currently in the collection
   */
  updateCollectionSummaries(collectionId: string): Promise<void>;
}
