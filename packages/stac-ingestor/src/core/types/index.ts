/**
 * Core Types - Barrel Export
 */

export type {
  BBox2D,
  ItemPayload,
  StacLink,
  StacAsset,
  SpatioTemporalExtent,
  CubeDimension,
  CubeVariable,
  StacCollection,
  TimeDensity,
} from './stac.js';
export { TIME_DENSITIES } from './stac.js';

export type {
  IngestionStatus,
  ISO8601Timestamp,
  IngestionKey,
  IngestionRecord,
  IngestionPage,
  ListIngestionsOptions,
} from './ingestion.js';
export { INGESTION_STATUSES } from './ingestion.js';
