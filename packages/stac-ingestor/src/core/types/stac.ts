/**
 * STAC Types
 *
 * Shapes of the catalog records that flow through the ingestor. Items are
 * validated structurally by the zod schemas in validation/schemas; once an item
 * is queued it travels as an opaque payload keyed by its `id`.
 */

/**
 * [xmin, ymin, xmax, ymax]
 */
export type BBox2D = readonly [number, number, number, number];

/**
 * Item payload as stored, fed through the change feed and bulk loaded
 */
export type ItemPayload = Readonly<Record<string, unknown>>;

export interface StacLink {
  readonly rel: string;
  readonly href: string;
  readonly type?: string;
  readonly title?: string;
}

export interface StacAsset {
  readonly href: string;
  readonly type?: string;
  readonly title?: string;
  readonly description?: string;
  readonly roles?: readonly string[];
  readonly [key: string]: unknown;
}

export interface SpatioTemporalExtent {
  readonly spatial: { readonly bbox: readonly (readonly number[])[] };
  readonly temporal: { readonly interval: readonly (readonly (string | null)[])[] };
}

/**
 * Datacube extension dimension (`cube:dimensions`)
 */
export interface CubeDimension {
  readonly type: 'spatial' | 'temporal' | string;
  readonly axis?: 'x' | 'y' | 'z';
  readonly extent?: readonly (number | string | null)[];
  readonly values?: readonly (number | string)[];
  readonly step?: number | string | null;
  readonly reference_system?: number | string;
  readonly description?: string;
}

/**
 * Datacube extension variable (`cube:variables`)
 */
export interface CubeVariable {
  readonly type: 'data' | 'auxiliary';
  readonly dimensions: readonly string[];
  readonly description?: string;
  readonly unit?: string;
  readonly attrs?: Readonly<Record<string, unknown>>;
}

export interface StacCollection {
  readonly type: 'Collection';
  readonly stac_version: string;
  readonly stac_extensions?: readonly string[];
  readonly id: string;
  readonly title: string;
  readonly description: string;
  readonly license: string;
  readonly extent: SpatioTemporalExtent;
  readonly links: readonly StacLink[];
  readonly assets?: Readonly<Record<string, StacAsset>>;
  readonly item_assets?: Readonly<Record<string, Omit<StacAsset, 'href'>>>;
  readonly 'cube:dimensions'?: Readonly<Record<string, CubeDimension>>;
  readonly 'cube:variables'?: Readonly<Record<string, CubeVariable>>;
  readonly 'dashboard:is_periodic': boolean;
  readonly 'dashboard:time_density': TimeDensity | null;
}

export type TimeDensity = 'day' | 'month' | 'year';

export const TIME_DENSITIES: readonly TimeDensity[] = ['day', 'month', 'year'];
