/**
 * Collection existence checks with a bounded TTL cache
 *
 * Only positive answers are cached: a collection published a moment ago must
 * become visible on the next check.
 */

import { UnknownCollectionError } from '../core/errors.js';
import { TTLCache } from '../core/utils/ttl-cache.js';
import type { CollectionLookup } from '../catalog/catalog-store.js';

export interface CollectionRegistryOptions {
  readonly ttlMs: number;
  readonly maxEntries: number;
  readonly now?: () => number;
}

export class CollectionRegistry {
  private readonly known: TTLCache<string, true>;

  constructor(
    private readonly lookup: CollectionLookup,
    options: CollectionRegistryOptions
  ) {
    this.known = new TTLCache(options.ttlMs, options.maxEntries, options.now);
  }

  async exists(collectionId: string): Promise<boolean> {
    if (this.known.has(collectionId)) {
      return true;
    }

    const found = await this.lookup.collectionExists(collectionId);
    if (found) {
      this.known.set(collectionId, true);
    }
    return found;
  }

  /**
   * @throws {UnknownCollectionError} When the collection is not registered
   */
  async assertExists(collectionId: string): Promise<void> {
    if (!(await this.exists(collectionId))) {
      throw new UnknownCollectionError(collectionId);
    }
  }

  /**
   * Forget a cached answer, e.g. after the collection was deleted
   */
  invalidate(collectionId: string): void {
    this.known.delete(collectionId);
  }
}
