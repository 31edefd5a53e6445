/**
 * Typed attribute encoding for change-feed images
 *
 * Numbers travel as decimal strings (`{ N: "12.5" }`) so an image carries
 * whatever precision the writer had. The reader picks how to turn them back
 * into numbers: the fast decoder uses doubles and refuses literals a double
 * cannot hold exactly, the exact decoder returns Decimal instances.
 */

import { Decimal } from 'decimal.js';
import { NumericPrecisionError } from '../core/errors.js';

export type AttributeValue =
  | { readonly S: string }
  | { readonly N: string }
  | { readonly BOOL: boolean }
  | { readonly NULL: true }
  | { readonly M: AttributeMap }
  | { readonly L: readonly AttributeValue[] };

export interface AttributeMap {
  readonly [name: string]: AttributeValue;
}

export type DecodedValue =
  | string
  | number
  | boolean
  | null
  | Decimal
  | readonly DecodedValue[]
  | { readonly [key: string]: DecodedValue };

export type NumberDecoder = (literal: string, path: string) => number | Decimal;

// ============================================================================
// Encoding
// ============================================================================

function isPlainObject(value: unknown): value is Readonly<Record<string, unknown>> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Encode a JSON-like value. `undefined` object members are dropped.
 *
 * @throws {TypeError} For non-finite numbers and non-JSON values
 */
export function marshall(value: unknown, path = ''): AttributeValue {
  if (value === null || value === undefined) {
    return { NULL: true };
  }
  if (typeof value === 'string') {
    return { S: value };
  }
  if (typeof value === 'boolean') {
    return { BOOL: value };
  }
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      throw new TypeError(`Cannot encode non-finite number at ${path || '<root>'}`);
    }
    return { N: String(value) };
  }
  if (Decimal.isDecimal(value)) {
    return { N: value.toString() };
  }
  if (Array.isArray(value)) {
    return { L: value.map((element, index) => marshall(element, `${path}[${index}]`)) };
  }
  if (isPlainObject(value)) {
    return { M: marshallMap(value, path) };
  }
  throw new TypeError(`Cannot encode ${typeof value} at ${path || '<root>'}`);
}

export function marshallMap(value: Readonly<Record<string, unknown>>, path = ''): AttributeMap {
  const map: Record<string, AttributeValue> = {};
  for (const [key, member] of Object.entries(value)) {
    if (member !== undefined) {
      map[key] = marshall(member, path ? `${path}.${key}` : key);
    }
  }
  return map;
}

// ============================================================================
// Decoding
// ============================================================================

const MAX_EXACT_DIGITS = 15;

/**
 * Count significant digits of a decimal literal, ignoring trailing zeros ("-0.00120e5" has 2)
 */
export function significantDigits(literal: string): number {
  const mantissa = literal.replace(/^[+-]/, '').replace(/[eE].*$/, '').replace('.', '');
  return mantissa.replace(/^0+/, '').replace(/0+$/, '').length;
}

/**
 * Decode a literal as a double
 *
 * @throws {NumericPrecisionError} When the double would not equal the literal
 */
export const decodeNumberFast: NumberDecoder = (literal, path) => {
  const value = Number(literal);
  if (!Number.isFinite(value)) {
    throw new NumericPrecisionError(path, literal);
  }
  if (significantDigits(literal) > MAX_EXACT_DIGITS) {
    if (!new Decimal(literal).equals(new Decimal(String(value)))) {
      throw new NumericPrecisionError(path, literal);
    }
  }
  return value;
};

export const decodeNumberExact: NumberDecoder = (literal) => new Decimal(literal);

export function unmarshall(
  value: AttributeValue,
  decodeNumber: NumberDecoder,
  path = ''
): DecodedValue {
  if ('S' in value) return value.S;
  if ('N' in value) return decodeNumber(value.N, path);
  if ('BOOL' in value) return value.BOOL;
  if ('NULL' in value) return null;
  if ('L' in value) {
    return value.L.map((element, index) => unmarshall(element, decodeNumber, `${path}[${index}]`));
  }
  return unmarshallMap(value.M, decodeNumber, path);
}

export function unmarshallMap(
  map: AttributeMap,
  decodeNumber: NumberDecoder,
  path = ''
): { readonly [key: string]: DecodedValue } {
  const result: Record<string, DecodedValue> = {};
  for (const [key, member] of Object.entries(map)) {
    result[key] = unmarshall(member, decodeNumber, path ? `${path}.${key}` : key);
  }
  return result;
}

// ============================================================================
// Image text
// ============================================================================

function isAttributeValue(value: unknown): value is AttributeValue {
  if (!isPlainObject(value)) {
    return false;
  }
  const keys = Object.keys(value);
  if (keys.length !== 1) {
    return false;
  }
  if ('S' in value) return typeof value.S === 'string';
  if ('N' in value) return typeof value.N === 'string';
  if ('BOOL' in value) return typeof value.BOOL === 'boolean';
  if ('NULL' in value) return value.NULL === true;
  if ('L' in value) return Array.isArray(value.L) && value.L.every(isAttributeValue);
  if ('M' in value) return isAttributeMap(value.M);
  return false;
}

export function isAttributeMap(value: unknown): value is AttributeMap {
  return isPlainObject(value) && Object.values(value).every(isAttributeValue);
}

/**
 * Parse a stored image
 *
 * @throws {Error} When the text is not an attribute map
 */
export function parseImage(text: string): AttributeMap {
  const parsed: unknown = JSON.parse(text);
  if (!isAttributeMap(parsed)) {
    throw new Error('Change image is not an attribute map');
  }
  return parsed;
}
