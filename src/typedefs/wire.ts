/**
 * Helpers for the wire's tagged value format.
 * @module typedefs/wire
 */

import type { AttributeValue } from '@aws-sdk/client-dynamodb';

export type AttributeMap = Record<string, AttributeValue>;

const TAGS = ['S', 'N', 'B', 'BOOL', 'NULL', 'SS', 'NS', 'BS', 'L', 'M'] as const;

export type WireTag = (typeof TAGS)[number];

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(item => typeof item === 'string');
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * True when `value` is a single-tag wire value such as `{S: "text"}`.
 * Nested lists and maps are checked recursively.
 */
export function isAttributeValue(value: unknown): value is AttributeValue {
  if (!isPlainObject(value)) {
    return false;
  }
  const keys = Object.keys(value).filter(key => value[key] !== undefined);
  if (keys.length !== 1) {
    return false;
  }
  const [tag] = keys;
  const inner = value[tag];
  switch (tag) {
    case 'S':
    case 'N':
      return typeof inner === 'string';
    case 'B':
      return inner instanceof Uint8Array;
    case 'BOOL':
    case 'NULL':
      return typeof inner === 'boolean';
    case 'SS':
    case 'NS':
      return isStringArray(inner);
    case 'BS':
      return Array.isArray(inner) && inner.every(item => item instanceof Uint8Array);
    case 'L':
      return Array.isArray(inner) && inner.every(isAttributeValue);
    case 'M':
      return isAttributeMap(inner);
    default:
      return false;
  }
}

export function isAttributeMap(value: unknown): value is AttributeMap {
  return isPlainObject(value) && Object.values(value).every(isAttributeValue);
}

/**
 * Name of the tag a wire value is stored under.
 */
export function wireTag(value: AttributeValue): WireTag | undefined {
  return TAGS.find(tag => value[tag] !== undefined);
}
