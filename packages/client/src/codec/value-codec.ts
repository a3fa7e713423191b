/**
 * Value codec: converts native values to their wire form and back.
 *
 * Booleans, integers, floating-point numbers, strings, tags and links
 * round-trip. Any other value is stored as its string representation.
 */

import type { QueryResult, TObject, Value, WireType } from '../types.js';
import { Link, Tag } from './values.js';

export interface ValueCodec {
  encode(value: unknown): TObject;
  decode(wire: TObject): Value | null;
}

const WIRE_TYPES: readonly WireType[] = ['BOOLEAN', 'INTEGER', 'LONG', 'DOUBLE', 'STRING', 'TAG', 'LINK', 'NULL'];

const INT32_MIN = -(2 ** 31);
const INT32_MAX = 2 ** 31 - 1;

function isWireType(value: unknown): value is WireType {
  return WIRE_TYPES.some((type) => type === value);
}

/** Check whether an unknown payload is a wire-encoded value. */
export function isTObject(value: unknown): value is TObject {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return false;
  return 'type' in value && 'data' in value && isWireType(value.type) && typeof value.data === 'string';
}

export class JsonValueCodec implements ValueCodec {
  encode(value: unknown): TObject {
    if (value === null || value === undefined) {
      return { type: 'NULL', data: '' };
    }
    if (typeof value === 'boolean') {
      return { type: 'BOOLEAN', data: String(value) };
    }
    if (typeof value === 'number') {
      if (Number.isInteger(value) && value >= INT32_MIN && value <= INT32_MAX) {
        return { type: 'INTEGER', data: String(value) };
      }
      if (Number.isSafeInteger(value)) {
        return { type: 'LONG', data: String(value) };
      }
      return { type: 'DOUBLE', data: String(value) };
    }
    if (typeof value === 'bigint') {
      return { type: 'LONG', data: value.toString() };
    }
    if (value instanceof Link) {
      return { type: 'LINK', data: String(value.record) };
    }
    if (value instanceof Tag) {
      return { type: 'TAG', data: value.value };
    }
    return { type: 'STRING', data: String(value) };
  }

  decode(wire: TObject): Value | null {
    switch (wire.type) {
      case 'BOOLEAN':
        return wire.data === 'true';
      case 'INTEGER':
      case 'DOUBLE':
        return Number(wire.data);
      case 'LONG': {
        const big = BigInt(wire.data);
        const asNumber = Number(big);
        return Number.isSafeInteger(asNumber) ? asNumber : big;
      }
      case 'LINK':
        return new Link(Number(wire.data));
      case 'TAG':
        return new Tag(wire.data);
      case 'NULL':
        return null;
      case 'STRING':
        return wire.data;
    }
  }
}

/**
 * Walk a result tree from the server and decode every embedded TObject.
 * Plain booleans, numbers and strings (record ids, audit descriptions) pass
 * through unchanged.
 */
export function decodeResult(wire: unknown, codec: ValueCodec): QueryResult {
  if (wire === null || wire === undefined) return null;
  if (isTObject(wire)) return codec.decode(wire);
  if (Array.isArray(wire)) return wire.map((item) => decodeResult(item, codec));
  if (typeof wire === 'object') {
    const out: { [key: string]: QueryResult } = {};
    for (const [key, value] of Object.entries(wire)) {
      out[key] = decodeResult(value, codec);
    }
    return out;
  }
  if (typeof wire === 'boolean' || typeof wire === 'number' || typeof wire === 'string' || typeof wire === 'bigint') {
    return wire;
  }
  return String(wire);
}
