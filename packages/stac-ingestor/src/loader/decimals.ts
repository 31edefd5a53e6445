import { Decimal } from 'decimal.js';
import type { DecodedValue } from '../persistence/attribute-codec.js';

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | readonly JsonValue[]
  | { readonly [key: string]: JsonValue };

function isList(value: DecodedValue): value is readonly DecodedValue[] {
  return Array.isArray(value);
}

/**
 * Replace every Decimal with the nearest double, recursively
 */
export function convertDecimalsToFloat(value: DecodedValue): JsonValue {
  if (Decimal.isDecimal(value)) {
    return value.toNumber();
  }
  if (isList(value)) {
    return value.map((element) => convertDecimalsToFloat(element));
  }
  if (typeof value === 'object' && value !== null) {
    const result: Record<string, JsonValue> = {};
    for (const [key, member] of Object.entries(value)) {
      result[key] = convertDecimalsToFloat(member);
    }
    return result;
  }
  return value;
}
