/**
 * Zarr collection fields
 *
 * Derives a collection's extent and datacube description from an array
 * store: x/y coordinates give the bbox, the time coordinate (CF encoded,
 * e.g. "days since 2000-01-01") gives the interval.
 */

import type {
  CubeDimension,
  CubeVariable,
  SpatioTemporalExtent,
} from '../core/types/index.js';
import { toZuluTimestamp } from './collection-template.js';
import {
  ZarrStoreError,
  type ZarrArrayInfo,
  type ZarrStoreMetadata,
  type ZarrStoreReader,
} from './zarr-store.js';

export interface ZarrDimensionNames {
  readonly x: string;
  readonly y: string;
  readonly time: string;
  /** EPSG code of the x/y coordinates */
  readonly referenceSystem: number;
}

export const DEFAULT_DIMENSIONS: ZarrDimensionNames = {
  x: 'lon',
  y: 'lat',
  time: 'time',
  referenceSystem: 4326,
};

export interface ZarrCollectionFields {
  readonly extent: SpatioTemporalExtent;
  readonly 'cube:dimensions': Readonly<Record<string, CubeDimension>>;
  readonly 'cube:variables': Readonly<Record<string, CubeVariable>>;
}

export interface CoordinateValues {
  readonly x: readonly number[];
  readonly y: readonly number[];
  readonly time: readonly Date[];
}

// ============================================================================
// CF time
// ============================================================================

const UNIT_MS: Readonly<Record<string, number>> = {
  millisecond: 1,
  milliseconds: 1,
  second: 1_000,
  seconds: 1_000,
  minute: 60_000,
  minutes: 60_000,
  hour: 3_600_000,
  hours: 3_600_000,
  day: 86_400_000,
  days: 86_400_000,
  week: 604_800_000,
  weeks: 604_800_000,
};

const REFERENCE_PATTERN =
  /^(\d{1,4})-(\d{1,2})-(\d{1,2})(?:[T ](\d{1,2}):(\d{2})(?::(\d{2}(?:\.\d+)?))?)?\s*(?:Z|UTC)?$/i;

/**
 * Milliseconds since the epoch of a CF reference date, read as UTC
 */
export function parseReferenceDate(reference: string): number | null {
  const match = REFERENCE_PATTERN.exec(reference.trim());
  if (!match) {
    return null;
  }
  const [, year, month, day, hours = '0', minutes = '0', seconds = '0'] = match;
  const date = new Date(0);
  // setUTCFullYear keeps years below 100 as written
  date.setUTCFullYear(Number(year), Number(month) - 1, Number(day));
  date.setUTCHours(Number(hours), Number(minutes), 0, 0);
  const time = date.getTime() + Number(seconds) * 1000;
  return Number.isNaN(time) ? null : time;
}

/**
 * Convert CF-encoded offsets ("days since 2000-01-01") to dates
 */
export function decodeCfTime(values: readonly number[], units: string): Date[] {
  const match = /^\s*(\w+)\s+since\s+(.+?)\s*$/i.exec(units);
  const unit = match?.[1]?.toLowerCase();
  const scale = unit === undefined ? undefined : UNIT_MS[unit];
  const reference = match?.[2];
  const epoch = reference === undefined ? null : parseReferenceDate(reference);
  if (scale === undefined || epoch === null) {
    throw new Error(`Unsupported time units: ${units}`);
  }

  return values.map((value) => new Date(epoch + value * scale));
}

// ============================================================================
// Extents and steps
// ============================================================================

function finite(values: readonly number[]): number[] {
  return values.filter((value) => Number.isFinite(value));
}

function range(values: readonly number[]): [number, number] | null {
  const usable = finite(values);
  if (usable.length === 0) {
    return null;
  }
  return [Math.min(...usable), Math.max(...usable)];
}

/**
 * Spacing of evenly spaced values, null when uneven or fewer than two
 */
export function regularStep(values: readonly number[]): number | null {
  const [first, second] = values;
  if (first === undefined || second === undefined) {
    return null;
  }
  const step = second - first;
  if (!Number.isFinite(step)) {
    return null;
  }
  const tolerance = Math.abs(step) * 1e-9;
  for (let index = 2; index < values.length; index++) {
    const current = values[index];
    const previous = values[index - 1];
    if (current === undefined || previous === undefined) return null;
    // Negated so that NaN gaps count as uneven
    if (!(Math.abs(current - previous - step) <= tolerance)) {
      return null;
    }
  }
  return step;
}

/**
 * ISO 8601 duration for a step in milliseconds
 */
export function durationFromMs(ms: number): string {
  const day = 86_400_000;
  if (ms % day === 0) {
    return `P${ms / day}D`;
  }
  return `PT${ms / 1000}S`;
}

// ============================================================================
// Datacube description
// ============================================================================

function dimensionsOf(array: ZarrArrayInfo): string[] {
  const dims = array.attrs._ARRAY_DIMENSIONS;
  return Array.isArray(dims) ? dims.filter((dim): dim is string => typeof dim === 'string') : [];
}

function stringAttr(array: ZarrArrayInfo, name: string): string | undefined {
  const value = array.attrs[name];
  return typeof value === 'string' ? value : undefined;
}

/**
 * Names referenced from any array's `coordinates` attribute
 */
function auxiliaryNames(arrays: readonly ZarrArrayInfo[]): Set<string> {
  const names = new Set<string>();
  for (const array of arrays) {
    for (const name of (stringAttr(array, 'coordinates') ?? '').split(/\s+/)) {
      if (name) names.add(name);
    }
  }
  return names;
}

export function findArray(metadata: ZarrStoreMetadata, name: string): ZarrArrayInfo {
  const array = metadata.arrays.find((candidate) => candidate.name === name);
  if (!array) {
    throw new Error(`Coordinate array '${name}' not found`);
  }
  return array;
}

/**
 * Build extent and datacube fields from metadata and decoded coordinates
 */
export function describeZarrStore(
  metadata: ZarrStoreMetadata,
  coordinates: CoordinateValues,
  names: ZarrDimensionNames = DEFAULT_DIMENSIONS
): ZarrCollectionFields {
  const xRange = range(coordinates.x);
  const yRange = range(coordinates.y);
  if (!xRange || !yRange) {
    throw new Error('Spatial coordinates hold no finite values');
  }

  const times = coordinates.time
    .map((date) => date.getTime())
    .filter((time) => Number.isFinite(time));
  const timeRange = range(times);
  if (!timeRange) {
    throw new Error('Time coordinate holds no valid dates');
  }
  const start = toZuluTimestamp(new Date(timeRange[0]));
  const end = toZuluTimestamp(new Date(timeRange[1]));
  const timeStep = regularStep(times);

  const dimensionNames = new Set(metadata.arrays.flatMap(dimensionsOf));
  const cubeDimensions: Record<string, CubeDimension> = {
    [names.x]: {
      type: 'spatial',
      axis: 'x',
      extent: xRange,
      step: regularStep(coordinates.x),
      reference_system: names.referenceSystem,
    },
    [names.y]: {
      type: 'spatial',
      axis: 'y',
      extent: yRange,
      step: regularStep(coordinates.y),
      reference_system: names.referenceSystem,
    },
    [names.time]: {
      type: 'temporal',
      extent: [start, end],
      step: timeStep === null ? null : durationFromMs(timeStep),
    },
  };
  for (const dimension of dimensionNames) {
    if (!(dimension in cubeDimensions)) {
      const coordinate = metadata.arrays.find((array) => array.name === dimension);
      const description = coordinate ? stringAttr(coordinate, 'long_name') : undefined;
      cubeDimensions[dimension] = description ? { type: 'other', description } : { type: 'other' };
    }
  }

  const auxiliary = auxiliaryNames(metadata.arrays);
  const cubeVariables: Record<string, CubeVariable> = {};
  for (const array of metadata.arrays) {
    if (dimensionNames.has(array.name)) continue;

    const description = stringAttr(array, 'long_name') ?? stringAttr(array, 'description');
    const unit = stringAttr(array, 'units');
    cubeVariables[array.name] = {
      type: auxiliary.has(array.name) ? 'auxiliary' : 'data',
      dimensions: dimensionsOf(array),
      ...(description !== undefined ? { description } : {}),
      ...(unit !== undefined ? { unit } : {}),
      attrs: array.attrs,
    };
  }

  return {
    extent: {
      spatial: { bbox: [[xRange[0], yRange[0], xRange[1], yRange[1]]] },
      temporal: { interval: [[start, end]] },
    },
    'cube:dimensions': cubeDimensions,
    'cube:variables': cubeVariables,
  };
}

/**
 * Read metadata and coordinates from the store and describe it
 *
 * @throws {ZarrStoreError}
 */
export async function introspectZarrStore(
  reader: ZarrStoreReader,
  options: { readonly consolidated: boolean; readonly names?: ZarrDimensionNames }
): Promise<ZarrCollectionFields> {
  const names = options.names ?? DEFAULT_DIMENSIONS;
  const metadata = await reader.readMetadata(options.consolidated);

  try {
    const timeArray = findArray(metadata, names.time);
    const units = stringAttr(timeArray, 'units');
    if (units === undefined) {
      throw new Error(`Time coordinate '${names.time}' has no units`);
    }

    const coordinates: CoordinateValues = {
      x: await reader.readCoordinate(findArray(metadata, names.x)),
      y: await reader.readCoordinate(findArray(metadata, names.y)),
      time: decodeCfTime(await reader.readCoordinate(timeArray), units),
    };
    return describeZarrStore(metadata, coordinates, names);
  } catch (error) {
    if (error instanceof ZarrStoreError) {
      throw error;
    }
    throw new ZarrStoreError(
      error instanceof Error ? error.message : String(error),
      reader.href,
      { cause: error }
    );
  }
}
