/**
 * Zarr (v2) store reader
 *
 * Reads just enough of an array store in object storage to describe it:
 * group and array metadata, and the values of 1-D coordinate arrays.
 * Chunks may be uncompressed, zlib or gzip; filters are not supported.
 */

import { gunzipSync, inflateSync } from 'node:zlib';
import { z } from 'zod';
import { ObjectStoreError, parseS3Url, type ObjectStore } from '../storage/object-store.js';

const ZarrArrayMetaSchema = z.object({
  zarr_format: z.literal(2),
  shape: z.array(z.number().int().nonnegative()),
  chunks: z.array(z.number().int().positive()),
  dtype: z.string(),
  compressor: z.object({ id: z.string() }).passthrough().nullable(),
  fill_value: z.unknown(),
  filters: z.array(z.unknown()).nullable().optional(),
  order: z.enum(['C', 'F']),
  dimension_separator: z.enum(['.', '/']).optional(),
});

const AttributesSchema = z.record(z.unknown());

const ConsolidatedSchema = z.object({
  metadata: z.record(z.unknown()),
});

export type ZarrArrayMeta = z.infer<typeof ZarrArrayMetaSchema>;
export type ZarrAttributes = Readonly<Record<string, unknown>>;

export interface ZarrArrayInfo {
  /** Path of the array relative to the store root */
  readonly name: string;
  readonly meta: ZarrArrayMeta;
  readonly attrs: ZarrAttributes;
}

export interface ZarrStoreMetadata {
  readonly attrs: ZarrAttributes;
  readonly arrays: readonly ZarrArrayInfo[];
}

export class ZarrStoreError extends Error {
  constructor(
    message: string,
    public readonly storeHref: string,
    options?: { readonly cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ZarrStoreError';
  }
}

interface DtypeInfo {
  readonly littleEndian: boolean;
  readonly kind: 'f' | 'i' | 'u';
  readonly size: 1 | 2 | 4 | 8;
}

const DTYPE_PATTERN = /^([<>|])([fiu])([1248])$/;

export function parseDtype(dtype: string): DtypeInfo | null {
  const match = DTYPE_PATTERN.exec(dtype);
  if (!match) {
    return null;
  }
  const [, order, kind, size] = match;
  if (kind !== 'f' && kind !== 'i' && kind !== 'u') {
    return null;
  }
  const bytes = Number(size);
  if (bytes !== 1 && bytes !== 2 && bytes !== 4 && bytes !== 8) {
    return null;
  }
  if (kind === 'f' && bytes < 4) {
    return null;
  }
  return { littleEndian: order !== '>', kind, size: bytes };
}

function readValue(view: DataView, offset: number, dtype: DtypeInfo): number {
  const le = dtype.littleEndian;
  if (dtype.kind === 'f') {
    return dtype.size === 4 ? view.getFloat32(offset, le) : view.getFloat64(offset, le);
  }
  const signed = dtype.kind === 'i';
  switch (dtype.size) {
    case 1:
      return signed ? view.getInt8(offset) : view.getUint8(offset);
    case 2:
      return signed ? view.getInt16(offset, le) : view.getUint16(offset, le);
    case 4:
      return signed ? view.getInt32(offset, le) : view.getUint32(offset, le);
    case 8:
      return Number(signed ? view.getBigInt64(offset, le) : view.getBigUint64(offset, le));
  }
}

/**
 * Decode `count` values of `dtype` from raw chunk bytes
 */
export function decodeValues(bytes: Uint8Array, dtype: DtypeInfo, count: number): number[] {
  if (bytes.byteLength < count * dtype.size) {
    throw new Error(`Chunk holds ${bytes.byteLength} bytes, expected ${count * dtype.size}`);
  }
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const values: number[] = [];
  for (let index = 0; index < count; index++) {
    values.push(readValue(view, index * dtype.size, dtype));
  }
  return values;
}

export function decompressChunk(bytes: Uint8Array, compressor: ZarrArrayMeta['compressor']): Uint8Array {
  if (compressor === null) {
    return bytes;
  }
  switch (compressor.id) {
    case 'zlib':
      return inflateSync(bytes);
    case 'gzip':
      return gunzipSync(bytes);
    default:
      throw new Error(`Unsupported compressor: ${compressor.id}`);
  }
}

function fillValue(meta: ZarrArrayMeta): number {
  const fill = meta.fill_value;
  if (typeof fill === 'number') return fill;
  if (fill === 'NaN' || fill === null || fill === undefined) return Number.NaN;
  if (fill === 'Infinity') return Number.POSITIVE_INFINITY;
  if (fill === '-Infinity') return Number.NEGATIVE_INFINITY;
  return Number.NaN;
}

export class ZarrStoreReader {
  readonly href: string;

  constructor(
    private readonly objects: ObjectStore,
    private readonly bucket: string,
    private readonly root: string
  ) {
    this.root = root.replace(/\/+$/, '');
    this.href = `s3://${bucket}/${this.root}`;
  }

  /**
   * @throws {ZarrStoreError} When href is not an s3 URL
   */
  static fromHref(objects: ObjectStore, href: string): ZarrStoreReader {
    const location = parseS3Url(href);
    if (!location || location.key === '') {
      throw new ZarrStoreError('Array store must be an s3://bucket/path URL', href);
    }
    return new ZarrStoreReader(objects, location.bucket, location.key);
  }

  /**
   * @param consolidated - Read `.zmetadata` instead of listing every array
   * @throws {ZarrStoreError}
   */
  async readMetadata(consolidated: boolean): Promise<ZarrStoreMetadata> {
    const documents = consolidated
      ? await this.readConsolidated()
      : await this.readListed();

    const arrays: ZarrArrayInfo[] = [];
    for (const [key, document] of documents) {
      if (!key.endsWith('.zarray')) continue;

      const name = key.slice(0, -'/.zarray'.length);
      const meta = ZarrArrayMetaSchema.safeParse(document);
      if (!meta.success) {
        throw new ZarrStoreError(`Invalid array metadata for ${name}`, this.href);
      }
      arrays.push({ name, meta: meta.data, attrs: this.attributes(documents.get(`${name}/.zattrs`)) });
    }

    arrays.sort((a, b) => a.name.localeCompare(b.name));
    return { attrs: this.attributes(documents.get('.zattrs')), arrays };
  }

  /**
   * All values of a 1-D array, chunk by chunk. Missing chunks read as the
   * fill value.
   *
   * @throws {ZarrStoreError}
   */
  async readCoordinate(array: ZarrArrayInfo): Promise<number[]> {
    const { meta } = array;
    const [length] = meta.shape;
    const [chunkLength] = meta.chunks;
    if (meta.shape.length !== 1 || length === undefined || chunkLength === undefined) {
      throw new ZarrStoreError(`Coordinate ${array.name} is not one-dimensional`, this.href);
    }
    if (meta.filters && meta.filters.length > 0) {
      throw new ZarrStoreError(`Coordinate ${array.name} uses filters`, this.href);
    }
    const dtype = parseDtype(meta.dtype);
    if (!dtype) {
      throw new ZarrStoreError(`Unsupported dtype ${meta.dtype} for ${array.name}`, this.href);
    }

    const values: number[] = [];
    const chunkCount = Math.ceil(length / chunkLength);
    for (let chunk = 0; chunk < chunkCount; chunk++) {
      const count = Math.min(chunkLength, length - chunk * chunkLength);
      const raw = await this.readOptional(`${array.name}/${chunk}`);
      if (raw === null) {
        values.push(...new Array<number>(count).fill(fillValue(meta)));
        continue;
      }
      try {
        // Chunks are always stored at full chunk length
        values.push(...decodeValues(decompressChunk(raw, meta.compressor), dtype, count));
      } catch (error) {
        throw new ZarrStoreError(
          `Cannot decode chunk ${chunk} of ${array.name}: ${error instanceof Error ? error.message : String(error)}`,
          this.href,
          { cause: error }
        );
      }
    }
    return values;
  }

  private attributes(document: unknown): ZarrAttributes {
    const parsed = AttributesSchema.safeParse(document ?? {});
    return parsed.success ? parsed.data : {};
  }

  private async readConsolidated(): Promise<Map<string, unknown>> {
    const raw = await this.readOptional('.zmetadata');
    if (raw === null) {
      throw new ZarrStoreError('Consolidated metadata (.zmetadata) not found', this.href);
    }
    const parsed = ConsolidatedSchema.safeParse(this.parseJson(raw, '.zmetadata'));
    if (!parsed.success) {
      throw new ZarrStoreError('Invalid consolidated metadata', this.href);
    }
    return new Map(Object.entries(parsed.data.metadata));
  }

  private async readListed(): Promise<Map<string, unknown>> {
    const prefix = `${this.root}/`;
    const keys: string[] = [];
    let continuationToken: string | undefined;
    do {
      const listing = await this.objects
        .listObjects(this.bucket, prefix, { continuationToken })
        .catch((error: unknown) => {
          throw new ZarrStoreError(
            `Cannot list array store: ${error instanceof Error ? error.message : String(error)}`,
            this.href,
            { cause: error }
          );
        });
      for (const object of listing.objects) {
        const relative = object.key.slice(prefix.length);
        if (/(^|\/)\.(zarray|zattrs)$/.test(relative)) {
          keys.push(relative);
        }
      }
      continuationToken = listing.nextContinuationToken ?? undefined;
    } while (continuationToken !== undefined);

    if (!keys.some((key) => key.endsWith('.zarray'))) {
      throw new ZarrStoreError('No arrays found in store', this.href);
    }

    const documents = new Map<string, unknown>();
    for (const key of keys) {
      const raw = await this.readOptional(key);
      if (raw !== null) {
        documents.set(key, this.parseJson(raw, key));
      }
    }
    return documents;
  }

  private async readOptional(relativeKey: string): Promise<Uint8Array | null> {
    try {
      return await this.objects.getObject(this.bucket, `${this.root}/${relativeKey}`);
    } catch (error) {
      if (error instanceof ObjectStoreError && error.notFound) {
        return null;
      }
      throw new ZarrStoreError(
        `Cannot read ${relativeKey}: ${error instanceof Error ? error.message : String(error)}`,
        this.href,
        { cause: error }
      );
    }
  }

  private parseJson(raw: Uint8Array, key: string): unknown {
    try {
      return JSON.parse(Buffer.from(raw).toString('utf-8'));
    } catch (error) {
      throw new ZarrStoreError(`${key} is not valid JSON`, this.href, { cause: error });
    }
  }
}
