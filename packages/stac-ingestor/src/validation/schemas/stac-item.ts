/**
 * STAC Item schema
 *
 * Structural validation of submitted items. Unknown members are passed through
 * untouched: extensions own them, the catalog store stores them verbatim.
 */

import { z } from 'zod';
import type { Geometry } from 'geojson';

const GEOMETRY_TYPES = new Set([
  'Point',
  'MultiPoint',
  'LineString',
  'MultiLineString',
  'Polygon',
  'MultiPolygon',
]);

/**
 * Shallow GeoJSON geometry check: known type with a coordinates array, or a
 * GeometryCollection of such geometries
 */
export function isGeometry(value: unknown): value is Geometry {
  if (typeof value !== 'object' || value === null || !('type' in value)) {
    return false;
  }
  if (value.type === 'GeometryCollection') {
    return (
      'geometries' in value &&
      Array.isArray(value.geometries) &&
      value.geometries.every((geometry: unknown) => isGeometry(geometry))
    );
  }
  return (
    typeof value.type === 'string' &&
    GEOMETRY_TYPES.has(value.type) &&
    'coordinates' in value &&
    Array.isArray(value.coordinates)
  );
}

const GeometrySchema = z.custom<Geometry>(isGeometry, {
  message: 'Invalid GeoJSON geometry',
});

const IsoDateTime = z.string().datetime({ offset: true });

export const StacLinkSchema = z
  .object({
    rel: z.string().min(1),
    href: z.string().min(1),
    type: z.string().optional(),
    title: z.string().optional(),
  })
  .passthrough();

export const StacAssetSchema = z
  .object({
    href: z.string().min(1),
    type: z.string().optional(),
    title: z.string().optional(),
    description: z.string().optional(),
    roles: z.array(z.string()).optional(),
  })
  .passthrough();

export const StacItemSchema = z
  .object({
    type: z.literal('Feature'),
    stac_version: z.string().min(1),
    stac_extensions: z.array(z.string()).optional(),
    id: z.string().min(1),
    collection: z.string().min(1),
    geometry: GeometrySchema.nullable(),
    bbox: z
      .array(z.number())
      .refine((bbox) => bbox.length === 4 || bbox.length === 6, {
        message: 'bbox must have 4 or 6 numbers',
      })
      .optional(),
    properties: z
      .object({
        datetime: IsoDateTime.nullable(),
        start_datetime: IsoDateTime.optional(),
        end_datetime: IsoDateTime.optional(),
      })
      .passthrough(),
    links: z.array(StacLinkSchema),
    assets: z.record(StacAssetSchema),
  })
  .passthrough()
  .superRefine((item, ctx) => {
    if (
      item.properties.datetime === null &&
      (item.properties.start_datetime === undefined || item.properties.end_datetime === undefined)
    ) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['properties', 'datetime'],
        message: 'start_datetime and end_datetime are required when datetime is null',
      });
    }
    if (item.geometry !== null && item.bbox === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['bbox'],
        message: 'bbox is required when geometry is set',
      });
    }
  });

export type StacItem = z.infer<typeof StacItemSchema>;
export type StacItemAsset = z.infer<typeof StacAssetSchema>;
