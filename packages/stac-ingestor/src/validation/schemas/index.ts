export {
  StacItemSchema,
  StacAssetSchema,
  StacLinkSchema,
  isGeometry,
  type StacItem,
  type StacItemAsset,
} from './stac-item.js';

export {
  COLLECTION_ID_PATTERN,
  DatasetSubmissionSchema,
  CogDatasetSchema,
  ZarrDatasetSchema,
  DiscoveryItemSchema,
  S3DiscoveryItemSchema,
  CmrDiscoveryItemSchema,
  SpatialExtentSchema,
  TemporalExtentSchema,
  isS3DiscoveryItem,
  type DatasetSubmission,
  type ParsedDatasetSubmission,
  type CogDataset,
  type ZarrDataset,
  type DiscoveryItem,
  type S3DiscoveryItem,
  type CmrDiscoveryItem,
  type DatetimeRange,
} from './dataset.js';

export { parseOrThrow, toValidationIssues } from './parse.js';
