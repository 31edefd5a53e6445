/**
 * STAC Ingestor
 *
 * Validation rules, the ingestion record state machine, the durable queue
 * with its change feed, the batch loader and the collection publisher.
 *
 * @example
 * ```typescript
 * import { createIngestionDatabase, IngestionRepository, IngestionService } from 'stac-ingestor';
 *
 * const db = await createIngestionDatabase('sqlite://:memory:');
 * const repository = new IngestionRepository(db, { shardCount: 4 });
 * const service = new IngestionService(repository, validators, { defaultPageSize: 10 });
 * const record = await service.submit('alice', item);
 * ```
 */

// Core
export * from './core/types/index.js';
export * from './core/errors.js';
export { loadConfig, configFromEnv, ConfigSchema, DEFAULT_CONFIG, type IngestorConfig } from './core/config.js';
export {
  HTTPClient,
  HTTPError,
  HTTPTimeoutError,
  HTTPNetworkError,
  HTTPJSONParseError,
  type HTTPClientConfig,
  type FetchOptions,
} from './core/http-client.js';
export { Logger, createLogger, logger, type LogLevel } from './core/utils/logger.js';

// Validation
export * from './validation/schemas/index.js';
export { AssetProbe, type AssetProbeOptions } from './validators/asset-accessibility.js';
export { CollectionRegistry, type CollectionRegistryOptions } from './validators/collection-registry.js';
export {
  validateItemSubmission,
  bboxContains,
  geometryBBox,
  type ItemValidatorDeps,
} from './validators/item-validator.js';
export {
  DatasetValidator,
  checkTimeDensity,
  checkSampleFiles,
  sampleFileMatches,
  type DatasetValidatorOptions,
} from './validators/dataset-validator.js';
export { extractDates, findDates, type ExtractedDates } from './validators/datetime-extraction.js';

// Ingestion
export {
  createIngestion,
  cancelIngestion,
  transition,
  canTransition,
  isTerminal,
  parseStatus,
  formatKey,
} from './ingestion/ingestion-record.js';
export { IngestionService, type SubmitOptions, type ListOptions } from './ingestion/ingestion-service.js';

// Persistence
export { IngestionRepository, type DatabaseAdapter } from './persistence/repository.js';
export {
  ChangeFeed,
  ChangeFeedConsumer,
  type ChangeEvent,
  type ChangeBatchHandler,
} from './persistence/change-feed.js';
export { encodeCursor, decodeCursor } from './persistence/cursor.js';
export { marshall, marshallMap, unmarshall, unmarshallMap, type AttributeValue, type AttributeMap } from './persistence/attribute-codec.js';
export { createIngestionDatabase, createCatalogDatabase, parseDatabaseUrl } from './persistence/adapters/factory.js';
export { SQLiteAdapter } from './persistence/adapters/sqlite.js';
export { PostgreSQLAdapter } from './persistence/adapters/postgresql.js';

// Loader
export { BatchLoader, type BatchLoadResult, type BatchOutcome } from './loader/batch-loader.js';
export { decodeChangeImage } from './loader/decode-change.js';
export { convertDecimalsToFloat } from './loader/decimals.js';

// Catalog and storage
export type { CatalogStore, CollectionLookup, LoadMode } from './catalog/catalog-store.js';
export { PgstacCatalogStore } from './catalog/pgstac-catalog-store.js';
export { StacApiCollectionLookup } from './catalog/stac-api-lookup.js';
export { ObjectStoreError, parseS3Url, toS3Url, type ObjectStore } from './storage/object-store.js';
export { S3ObjectStore } from './storage/s3-object-store.js';

// Publisher and workflows
export {
  CollectionPublisher,
  type CollectionPublisherDeps,
  type PublishResult,
  type DiscoveryDispatch,
} from './publisher/collection-publisher.js';
export { buildCogCollection, buildZarrTemplate, collectionTemplate } from './publisher/collection-template.js';
export { introspectZarrStore, describeZarrStore } from './publisher/zarr-introspection.js';
export { ZarrStoreReader, ZarrStoreError } from './publisher/zarr-store.js';
export {
  AirflowDiscoveryClient,
  mapDagRunState,
  type DiscoveryWorkflowClient,
  type WorkflowRun,
  type WorkflowStatus,
} from './workflows/discovery-workflow.js';
