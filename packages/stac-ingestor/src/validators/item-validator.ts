/**
 * STAC item submission validation
 *
 * Order matters only for cost: the structural check and bbox check are local,
 * the collection check is cached, asset probes go over the network.
 */

import bbox from '@turf/bbox';
import type { Geometry } from 'geojson';
import { UnreachableAssetsError, ValidationError } from '../core/errors.js';
import type { BBox2D } from '../core/types/index.js';
import { StacItemSchema, parseOrThrow, type StacItem } from '../validation/schemas/index.js';
import type { AssetProbe } from './asset-accessibility.js';
import type { CollectionRegistry } from './collection-registry.js';

export interface ItemValidatorDeps {
  readonly collections: CollectionRegistry;
  readonly assets: AssetProbe;
}

// Tolerates float noise between the declared bbox and computed coordinates
const BBOX_EPSILON = 1e-9;

/**
 * Reduce a 4 or 6 element STAC bbox to its horizontal part
 */
export function toBBox2D(values: readonly number[]): BBox2D | null {
  if (values.length === 4) {
    const [xmin, ymin, xmax, ymax] = values;
    if (xmin !== undefined && ymin !== undefined && xmax !== undefined && ymax !== undefined) {
      return [xmin, ymin, xmax, ymax];
    }
  }
  if (values.length === 6) {
    const [xmin, ymin, , xmax, ymax] = values;
    if (xmin !== undefined && ymin !== undefined && xmax !== undefined && ymax !== undefined) {
      return [xmin, ymin, xmax, ymax];
    }
  }
  return null;
}

export function geometryBBox(geometry: Geometry): BBox2D {
  const [xmin, ymin, xmax, ymax] = bbox(geometry);
  return [xmin, ymin, xmax, ymax];
}

export function bboxContains(outer: BBox2D, inner: BBox2D): boolean {
  return (
    inner[0] >= outer[0] - BBOX_EPSILON &&
    inner[1] >= outer[1] - BBOX_EPSILON &&
    inner[2] <= outer[2] + BBOX_EPSILON &&
    inner[3] <= outer[3] + BBOX_EPSILON
  );
}

function assertGeometryWithinBBox(item: StacItem): void {
  if (item.geometry === null || item.bbox === undefined) {
    return;
  }

  const declared = toBBox2D(item.bbox);
  if (!declared) {
    return;
  }

  const computed = geometryBBox(item.geometry);
  if (!bboxContains(declared, computed)) {
    throw new ValidationError('Item geometry extends beyond its bbox', [
      {
        path: 'bbox',
        message: `geometry bounds [${computed.join(', ')}] exceed bbox [${declared.join(', ')}]`,
      },
    ]);
  }
}

/**
 * Validate a submitted item
 *
 * @returns The parsed item
 * @throws {ValidationError} Structural or bbox problems
 * @throws {UnknownCollectionError} When the item's collection is not registered
 * @throws {AssetUnreachableError} When exactly one asset is unreachable
 * @throws {UnreachableAssetsError} When several assets are unreachable
 */
export async function validateItemSubmission(
  input: unknown,
  deps: ItemValidatorDeps
): Promise<StacItem> {
  const item = parseOrThrow(StacItemSchema, input, 'STAC item');

  assertGeometryWithinBBox(item);

  await deps.collections.assertExists(item.collection);

  const failures = await deps.assets.probeAll(
    Object.values(item.assets).map((asset) => asset.href)
  );
  const [first] = failures;
  if (first !== undefined) {
    throw failures.length === 1 ? first : new UnreachableAssetsError(failures);
  }

  return item;
}
