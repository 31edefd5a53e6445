/**
 * Collection documents built from dataset submissions
 */

import type { StacAsset, StacCollection } from '../core/types/index.js';
import type {
  CogDataset,
  DatasetSubmission,
  S3DiscoveryItem,
  ZarrDataset,
} from '../validation/schemas/index.js';

export const STAC_VERSION = '1.0.0';

export const DATACUBE_EXTENSION = 'https://stac-extensions.github.io/datacube/v2.2.0/schema.json';

export const COG_DEFAULT_ASSET = {
  type: 'image/tiff; application=geotiff; profile=cloud-optimized',
  roles: ['data', 'layer'],
  title: 'Default COG Layer',
  description: 'Cloud optimized default layer to display on map',
} as const;

/**
 * ISO timestamp in UTC with a `Z` suffix and no zero milliseconds
 */
export function toZuluTimestamp(value: string | Date): string {
  const date = typeof value === 'string' ? new Date(value) : value;
  return date.toISOString().replace('.000Z', 'Z');
}

/**
 * Fields every published collection starts from. The extent is a
 * placeholder covering the globe and all time.
 */
export function collectionTemplate(dataset: DatasetSubmission): StacCollection {
  return {
    type: 'Collection',
    stac_version: STAC_VERSION,
    id: dataset.collection,
    title: dataset.title,
    description: dataset.description,
    license: dataset.license,
    extent: {
      spatial: { bbox: [[-180, -90, 180, 90]] },
      temporal: { interval: [[null, null]] },
    },
    links: [],
    'dashboard:is_periodic': dataset.is_periodic,
    'dashboard:time_density': dataset.time_density ?? null,
  };
}

export function buildCogCollection(dataset: CogDataset): StacCollection {
  const { xmin, ymin, xmax, ymax } = dataset.spatial_extent;
  return {
    ...collectionTemplate(dataset),
    extent: {
      spatial: { bbox: [[xmin, ymin, xmax, ymax]] },
      temporal: {
        interval: [
          [
            toZuluTimestamp(dataset.temporal_extent.startdate),
            toZuluTimestamp(dataset.temporal_extent.enddate),
          ],
        ],
      },
    },
    item_assets: { cog_default: COG_DEFAULT_ASSET },
  };
}

export function zarrStoreHref(item: S3DiscoveryItem): string {
  return `s3://${item.bucket}/${item.prefix}${item.zarr_store ?? ''}`;
}

export function zarrAsset(dataset: ZarrDataset, href: string): StacAsset {
  return {
    href,
    title: 'Zarr Array Store',
    description: 'Zarr array store with one or several arrays (variables)',
    roles: ['data', 'zarr'],
    type: 'application/vnd+zarr',
    'xarray:open_kwargs': {
      engine: 'zarr',
      chunks: {},
      ...dataset.xarray_kwargs,
    },
  };
}

/**
 * Zarr collection before its extent and datacube fields are filled in
 */
export function buildZarrTemplate(dataset: ZarrDataset, storeHref: string): StacCollection {
  return {
    ...collectionTemplate(dataset),
    assets: { zarr: zarrAsset(dataset, storeHref) },
  };
}
