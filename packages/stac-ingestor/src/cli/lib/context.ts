/**
 * CLI context
 *
 * Holds the loaded configuration and builds services on first use, so a
 * command that only reads the ingestion queue never opens a catalog
 * connection or an S3 client.
 */

import { loadConfig, type IngestorConfig } from '../../core/config.js';
import { HTTPClient } from '../../core/http-client.js';
import { createLogger, type Logger } from '../../core/utils/logger.js';
import type { CatalogStore, CollectionLookup } from '../../catalog/catalog-store.js';
import { PgstacCatalogStore } from '../../catalog/pgstac-catalog-store.js';
import { StacApiCollectionLookup } from '../../catalog/stac-api-lookup.js';
import { IngestionService } from '../../ingestion/ingestion-service.js';
import { BatchLoader } from '../../loader/batch-loader.js';
import { createCatalogDatabase, createIngestionDatabase } from '../../persistence/adapters/factory.js';
import { ChangeFeed, ChangeFeedConsumer } from '../../persistence/change-feed.js';
import { IngestionRepository, type DatabaseAdapter } from '../../persistence/repository.js';
import { CollectionPublisher } from '../../publisher/collection-publisher.js';
import type { ObjectStore } from '../../storage/object-store.js';
import { S3ObjectStore } from '../../storage/s3-object-store.js';
import { AssetProbe } from '../../validators/asset-accessibility.js';
import { CollectionRegistry } from '../../validators/collection-registry.js';
import { DatasetValidator } from '../../validators/dataset-validator.js';
import type { ItemValidatorDeps } from '../../validators/item-validator.js';
import {
  AirflowDiscoveryClient,
  type DiscoveryWorkflowClient,
} from '../../workflows/discovery-workflow.js';

export interface GlobalOptions {
  readonly config?: string;
  readonly verbose?: boolean;
  readonly databaseUrl?: string;
}

export interface GlobalContext {
  readonly config: IngestorConfig;
  readonly logger: Logger;
  readonly services: ServiceContainer;
  readonly verbose: boolean;
  readonly startTime: number;
}

let globalContext: GlobalContext | null = null;

export function getGlobalContext(): GlobalContext {
  if (!globalContext) {
    throw new Error('Global context not initialized. Call initializeContext first.');
  }
  return globalContext;
}

/**
 * @throws {Error} When the configuration is invalid
 */
export function initializeContext(options: GlobalOptions): GlobalContext {
  const config = loadConfig({
    configPath: options.config,
    overrides: { ingestionDatabaseUrl: options.databaseUrl },
  });

  globalContext = {
    config,
    logger: createLogger({ module: 'cli' }),
    services: new ServiceContainer(config),
    verbose: options.verbose === true,
    startTime: Date.now(),
  };
  return globalContext;
}

/**
 * Close whatever the command opened
 */
export async function disposeContext(): Promise<void> {
  if (globalContext) {
    await globalContext.services.close();
    globalContext = null;
  }
}

/**
 * Lazily wired services for one CLI invocation
 */
export class ServiceContainer {
  private ingestionDb?: Promise<DatabaseAdapter>;
  private catalogDb?: DatabaseAdapter;
  private httpClient?: HTTPClient;
  private objectStore?: ObjectStore;
  private catalogStore?: CatalogStore;
  private registry?: CollectionRegistry;
  private assetProbe?: AssetProbe;
  private repositoryInstance?: IngestionRepository;

  constructor(private readonly config: IngestorConfig) {}

  get http(): HTTPClient {
    return (this.httpClient ??= new HTTPClient());
  }

  get objects(): ObjectStore {
    return (this.objectStore ??= new S3ObjectStore(this.config.storage));
  }

  private database(): Promise<DatabaseAdapter> {
    return (this.ingestionDb ??= createIngestionDatabase(this.config.ingestionDatabaseUrl));
  }

  async repository(): Promise<IngestionRepository> {
    const db = await this.database();
    return (this.repositoryInstance ??= new IngestionRepository(db, {
      shardCount: this.config.feed.shardCount,
    }));
  }

  /**
   * @throws {Error} When no catalog database is configured
   */
  get catalog(): CatalogStore {
    if (this.catalogStore) {
      return this.catalogStore;
    }
    const url = this.config.catalogDatabaseUrl;
    if (url === null) {
      throw new Error('catalogDatabaseUrl is not configured (STAC_INGESTOR_CATALOG_DATABASE_URL)');
    }
    this.catalogDb = createCatalogDatabase(url);
    this.catalogStore = new PgstacCatalogStore(this.catalogDb, {
      statementTimeoutMs: this.config.catalog.statementTimeoutMs,
    });
    return this.catalogStore;
  }

  /**
   * Collection existence from the STAC API when one is configured, else
   * straight from the catalog database
   */
  get collections(): CollectionRegistry {
    if (this.registry) {
      return this.registry;
    }
    const lookup: CollectionLookup = this.config.stacApiUrl
      ? new StacApiCollectionLookup(this.config.stacApiUrl, this.http)
      : this.catalog;
    this.registry = new CollectionRegistry(lookup, {
      ttlMs: this.config.validation.collectionCacheTtlMs,
      maxEntries: this.config.validation.collectionCacheMaxEntries,
    });
    return this.registry;
  }

  get assets(): AssetProbe {
    return (this.assetProbe ??= new AssetProbe(this.http, this.objects, {
      timeoutMs: this.config.validation.probeTimeoutMs,
    }));
  }

  async ingestions(): Promise<IngestionService> {
    // Validators are resolved on submit only; status, list and cancel never
    // touch the catalog or object storage
    const services = this;
    const validators: ItemValidatorDeps = {
      get collections() {
        return services.collections;
      },
      get assets() {
        return services.assets;
      },
    };
    return new IngestionService(await this.repository(), validators, {
      defaultPageSize: this.config.validation.listPageSize,
    });
  }

  datasetValidator(): DatasetValidator {
    return new DatasetValidator(this.objects, {
      listPageSize: this.config.validation.listPageSize,
      timeoutMs: this.config.validation.probeTimeoutMs,
    });
  }

  /**
   * Null when no Airflow endpoint is configured
   */
  workflows(): DiscoveryWorkflowClient | null {
    const { airflowUrl, airflowToken, dagId, timeoutMs } = this.config.workflows;
    return airflowUrl
      ? new AirflowDiscoveryClient({ baseUrl: airflowUrl, token: airflowToken, dagId, timeoutMs })
      : null;
  }

  publisher(): CollectionPublisher {
    return new CollectionPublisher({
      validator: this.datasetValidator(),
      catalog: this.catalog,
      objects: this.objects,
      workflows: this.workflows(),
      collections: this.collections,
    });
  }

  async consumer(shards?: readonly number[]): Promise<ChangeFeedConsumer> {
    const feed = new ChangeFeed(await this.database(), {
      consumer: this.config.feed.consumerName,
      shards,
    });
    const loader = new BatchLoader(await this.repository(), this.catalog);
    return new ChangeFeedConsumer(feed, loader.handle, {
      batchSize: this.config.feed.batchSize,
      maxWaitMs: this.config.feed.maxWaitMs,
      pollIntervalMs: this.config.feed.pollIntervalMs,
      maxDeliveries: this.config.feed.maxDeliveries,
      onUndeliverable: loader.failUndeliverable,
    });
  }

  async close(): Promise<void> {
    if (this.ingestionDb) {
      const db = await this.ingestionDb;
      await db.close();
    }
    if (this.catalogDb) {
      await this.catalogDb.close();
    }
  }
}
