/**
 * Change image to ingestion record
 *
 * Decoding tries doubles first. Only when an image holds a number a double
 * cannot represent exactly is it decoded again with Decimal values.
 */

import { Decimal } from 'decimal.js';
import { NumericPrecisionError } from '../core/errors.js';
import type { IngestionRecord } from '../core/types/index.js';
import { parseStatus } from '../ingestion/ingestion-record.js';
import {
  decodeNumberExact,
  decodeNumberFast,
  unmarshallMap,
  type AttributeMap,
  type DecodedValue,
  type NumberDecoder,
} from '../persistence/attribute-codec.js';

export type DecodedItem = { readonly [key: string]: DecodedValue };

export type DecodedRecord = IngestionRecord<DecodedItem>;

export interface DecodeResult {
  readonly record: DecodedRecord;
  /** Whether the decimal-safe decoder was needed */
  readonly exact: boolean;
}

function isDecodedItem(value: DecodedValue | undefined): value is DecodedItem {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    !Decimal.isDecimal(value)
  );
}

function requireString(
  fields: { readonly [key: string]: DecodedValue },
  name: string
): string {
  const value = fields[name];
  if (typeof value !== 'string') {
    throw new Error(`Malformed change image: ${name} is not a string`);
  }
  return value;
}

export function decodeImage(image: AttributeMap, decodeNumber: NumberDecoder): DecodedRecord {
  const fields = unmarshallMap(image, decodeNumber);
  const item = fields.item;
  if (!isDecodedItem(item)) {
    throw new Error('Malformed change image: item is not a map');
  }

  const record: DecodedRecord = {
    created_by: requireString(fields, 'created_by'),
    id: requireString(fields, 'id'),
    status: parseStatus(fields.status),
    item,
    created_at: requireString(fields, 'created_at'),
    updated_at: requireString(fields, 'updated_at'),
  };

  const message = fields.message;
  return typeof message === 'string' ? { ...record, message } : record;
}

/**
 * @throws {Error} When the image does not describe an ingestion record
 */
export function decodeChangeImage(image: AttributeMap): DecodeResult {
  try {
    return { record: decodeImage(image, decodeNumberFast), exact: false };
  } catch (error) {
    if (!(error instanceof NumericPrecisionError)) {
      throw error;
    }
    return { record: decodeImage(image, decodeNumberExact), exact: true };
  }
}
