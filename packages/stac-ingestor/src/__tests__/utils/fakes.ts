/**
 * In-process stand-ins for the external services
 *
 * Type-safe fakes behind the production interfaces: catalog store, object
 * store and discovery workflow client.
 */

import type { CatalogStore, LoadMode } from '../../catalog/catalog-store.js';
import type { ItemPayload, StacCollection } from '../../core/types/index.js';
import {
  ObjectStoreError,
  type ListObjectsOptions,
  type ObjectHead,
  type ObjectListing,
  type ObjectStore,
} from '../../storage/object-store.js';
import type {
  DiscoveryWorkflowClient,
  WorkflowConf,
  WorkflowRun,
} from '../../workflows/discovery-workflow.js';

// ============================================================================
// Catalog store
// ============================================================================

function itemKey(item: ItemPayload): string {
  return `${String(item.collection)}/${String(item.id)}`;
}

export class InMemoryCatalogStore implements CatalogStore {
  readonly items = new Map<string, ItemPayload>();
  readonly collections = new Map<string, StacCollection>();
  readonly loadCalls: { readonly items: readonly ItemPayload[]; readonly mode: LoadMode }[] = [];
  readonly summaryUpdates: string[] = [];
  /** Thrown from the next loadItems call, then cleared */
  failNextLoad: Error | null = null;

  async collectionExists(collectionId: string): Promise<boolean> {
    return this.collections.has(collectionId);
  }

  async loadItems(items: readonly ItemPayload[], mode: LoadMode): Promise<void> {
    this.loadCalls.push({ items, mode });
    if (this.failNextLoad) {
      const error = this.failNextLoad;
      this.failNextLoad = null;
      throw error;
    }
    for (const item of items) {
      const key = itemKey(item);
      if (this.items.has(key)) {
        if (mode === 'insert') throw new Error(`duplicate key value violates unique constraint: ${key}`);
        if (mode === 'insert_ignore') continue;
      }
      this.items.set(key, item);
    }
  }

  async loadCollection(collection: StacCollection, mode: LoadMode): Promise<void> {
    if (this.collections.has(collection.id)) {
      if (mode === 'insert') {
        throw new Error(`collection ${collection.id} already exists`);
      }
      if (mode === 'insert_ignore') return;
    }
    this.collections.set(collection.id, collection);
  }

  async getCollection(collectionId: string): Promise<StacCollection | null> {
    return this.collections.get(collectionId) ?? null;
  }

  async deleteCollection(collectionId: string): Promise<void> {
    this.collections.delete(collectionId);
    for (const [key, item] of this.items) {
      if (item.collection === collectionId) this.items.delete(key);
    }
  }

  async updateCollectionSummaries(collectionId: string): Promise<void> {
    this.summaryUpdates.push(collectionId);
  }
}

// ============================================================================
// Object store
// ============================================================================

export class InMemoryObjectStore implements ObjectStore {
  private readonly objects = new Map<string, Uint8Array>();
  readonly headCalls: string[] = [];

  put(bucket: string, key: string, body: Uint8Array | string): this {
    this.objects.set(
      `${bucket}/${key}`,
      typeof body === 'string' ? new TextEncoder().encode(body) : body
    );
    return this;
  }

  putJson(bucket: string, key: string, document: unknown): this {
    return this.put(bucket, key, JSON.stringify(document));
  }

  async headObject(bucket: string, key: string): Promise<ObjectHead> {
    this.headCalls.push(`${bucket}/${key}`);
    const body = this.objects.get(`${bucket}/${key}`);
    if (!body) {
      throw new ObjectStoreError('NotFound: Not Found', bucket, key, 404);
    }
    return { bucket, key, contentLength: body.byteLength };
  }

  async listObjects(
    bucket: string,
    prefix: string,
    options?: ListObjectsOptions
  ): Promise<ObjectListing> {
    const keys = [...this.objects.keys()]
      .filter((path) => path.startsWith(`${bucket}/${prefix}`))
      .map((path) => path.slice(bucket.length + 1))
      .sort();

    const start = options?.continuationToken ? Number(options.continuationToken) : 0;
    const end = options?.maxKeys === undefined ? keys.length : start + options.maxKeys;
    const page = keys.slice(start, end);

    return {
      objects: page.map((key) => ({
        key,
        size: this.objects.get(`${bucket}/${key}`)?.byteLength ?? 0,
      })),
      nextContinuationToken: end < keys.length ? String(end) : null,
    };
  }

  async getObject(bucket: string, key: string): Promise<Uint8Array> {
    const body = this.objects.get(`${bucket}/${key}`);
    if (!body) {
      throw new ObjectStoreError('NoSuchKey: The specified key does not exist.', bucket, key, 404);
    }
    return body;
  }
}

// ============================================================================
// Discovery workflows
// ============================================================================

export class FakeWorkflowClient implements DiscoveryWorkflowClient {
  readonly triggered: WorkflowConf[] = [];
  readonly runs = new Map<string, WorkflowRun>();
  /** Collections whose trigger is rejected */
  readonly rejectCollections = new Set<string>();

  async trigger(conf: WorkflowConf): Promise<WorkflowRun> {
    if (typeof conf.collection === 'string' && this.rejectCollections.has(conf.collection)) {
      throw new Error(`trigger rejected for ${conf.collection}`);
    }
    this.triggered.push(conf);
    const run: WorkflowRun = { id: `run-${this.triggered.length}`, status: 'started' };
    this.runs.set(run.id, run);
    return run;
  }

  async getStatus(runId: string): Promise<WorkflowRun> {
    return this.runs.get(runId) ?? { id: runId, status: 'nonexistent' };
  }
}
