/**
 * Dataset submission schemas
 *
 * A dataset submission describes one collection and where its source files
 * live. It is validated once at publish time and never persisted.
 *
 * Discovery items are a tagged union on `discovery`; datasets are a tagged
 * union on `data_type` (missing means `cog`).
 */

import { z } from 'zod';
import type { TimeDensity } from '../../core/types/index.js';

export const COLLECTION_ID_PATTERN = /^[a-z]+(-[a-z]+)*$/;

const IsoDateTime = z.string().datetime({ offset: true });

const RegexSource = z.string().refine(
  (source) => {
    try {
      new RegExp(source);
      return true;
    } catch {
      return false;
    }
  },
  { message: 'Invalid regular expression' }
);

const ProcessingFlags = {
  cogify: z.boolean().default(false),
  upload: z.boolean().default(false),
  dry_run: z.boolean().default(false),
};

// ============================================================================
// Discovery items
// ============================================================================

export const DatetimeRangeSchema = z.enum(['month', 'year']);

export const S3DiscoveryItemSchema = z.object({
  discovery: z.literal('s3'),
  collection: z.string().optional(),
  bucket: z.string().min(1),
  prefix: z.string(),
  filename_regex: RegexSource.default('^(.*)$'),
  datetime_range: DatetimeRangeSchema.nullable().optional(),
  start_datetime: IsoDateTime.nullable().optional(),
  end_datetime: IsoDateTime.nullable().optional(),
  /** Array store directory under prefix (zarr datasets only) */
  zarr_store: z.string().min(1).optional(),
  ...ProcessingFlags,
});

export const CmrDiscoveryItemSchema = z.object({
  discovery: z.literal('cmr'),
  collection: z.string().optional(),
  version: z.string().min(1),
  include: RegexSource.optional(),
  temporal: z.tuple([IsoDateTime, IsoDateTime]).optional(),
  bounding_box: z.tuple([z.number(), z.number(), z.number(), z.number()]).optional(),
  ...ProcessingFlags,
});

export const DiscoveryItemSchema = z.discriminatedUnion('discovery', [
  S3DiscoveryItemSchema,
  CmrDiscoveryItemSchema,
]);

export type S3DiscoveryItem = z.infer<typeof S3DiscoveryItemSchema>;
export type CmrDiscoveryItem = z.infer<typeof CmrDiscoveryItemSchema>;
export type DiscoveryItem = z.infer<typeof DiscoveryItemSchema>;
export type DatetimeRange = z.infer<typeof DatetimeRangeSchema>;

export function isS3DiscoveryItem(item: DiscoveryItem): item is S3DiscoveryItem {
  return item.discovery === 's3';
}

// ============================================================================
// Datasets
// ============================================================================

// Any string passes here; checkTimeDensity decides against is_periodic
const TimeDensitySchema = z.preprocess(
  (value) => (value === '' ? null : value),
  z.string().nullable().optional()
);

const DatasetBase = {
  collection: z
    .string()
    .regex(COLLECTION_ID_PATTERN, 'collection must be lowercase words separated by hyphens'),
  title: z.string().min(1),
  description: z.string().min(1),
  license: z.string().min(1),
  is_periodic: z.boolean(),
  time_density: TimeDensitySchema,
  discovery_items: z.array(DiscoveryItemSchema).min(1),
};

export const SpatialExtentSchema = z
  .object({
    xmin: z.number().min(-180).max(180),
    ymin: z.number().min(-90).max(90),
    xmax: z.number().min(-180).max(180),
    ymax: z.number().min(-90).max(90),
  })
  .refine((extent) => extent.ymin <= extent.ymax, {
    message: 'ymin must not exceed ymax',
  });

export const TemporalExtentSchema = z
  .object({
    startdate: IsoDateTime,
    enddate: IsoDateTime,
  })
  .refine((extent) => Date.parse(extent.startdate) <= Date.parse(extent.enddate), {
    message: 'startdate must not be after enddate',
  });

export const CogDatasetSchema = z.object({
  data_type: z.literal('cog'),
  ...DatasetBase,
  spatial_extent: SpatialExtentSchema,
  temporal_extent: TemporalExtentSchema,
  sample_files: z.array(z.string().min(1)).min(1),
});

export const ZarrDatasetSchema = z.object({
  data_type: z.literal('zarr'),
  ...DatasetBase,
  sample_files: z.array(z.string().min(1)).default([]),
  xarray_kwargs: z.record(z.unknown()).default({}),
  x_dimension: z.string().min(1).optional(),
  y_dimension: z.string().min(1).optional(),
  temporal_dimension: z.string().min(1).optional(),
  reference_system: z.number().int().positive().optional(),
});

export const DatasetSubmissionSchema = z.preprocess(
  (value) =>
    typeof value === 'object' && value !== null && !Array.isArray(value) && !('data_type' in value)
      ? { ...value, data_type: 'cog' }
      : value,
  z
    .discriminatedUnion('data_type', [CogDatasetSchema, ZarrDatasetSchema])
    .superRefine((dataset, ctx) => {
      if (dataset.data_type !== 'zarr') return;
      const first = dataset.discovery_items[0];
      if (first === undefined || first.discovery !== 's3' || first.zarr_store === undefined) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['discovery_items', 0, 'zarr_store'],
          message: 'zarr datasets require an s3 discovery item with zarr_store first',
        });
      }
    })
);

/** Structurally valid, time density not yet checked */
export type ParsedDatasetSubmission = z.infer<typeof DatasetSubmissionSchema>;

interface CheckedTimeDensity {
  readonly time_density: TimeDensity | null;
}

export type CogDataset = z.infer<typeof CogDatasetSchema> & CheckedTimeDensity;
export type ZarrDataset = z.infer<typeof ZarrDatasetSchema> & CheckedTimeDensity;
export type DatasetSubmission = CogDataset | ZarrDataset;
