/**
 * Collection types: sets, lists and maps.
 * @module typedefs/collections
 */

import type { AttributeValue } from '@aws-sdk/client-dynamodb';
import type { BackingType, PathSegment, TypeDefinition, ValueOf } from './types.js';
import { wireTag } from './wire.js';
import { InvalidModelError } from '../error/categories.js';

function isPresent<T>(value: T | null | undefined): value is T {
  return value !== null && value !== undefined;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Set) &&
    !(value instanceof Date) && !(value instanceof Uint8Array);
}

function mismatch(typedef: TypeDefinition<unknown>, wire: AttributeValue): InvalidModelError {
  return new InvalidModelError(
    `${typedef.name} expected a ${typedef.backingType} value but found ${wireTag(wire) ?? 'an unknown tag'}`
  );
}

function invalidSegment(typedef: TypeDefinition<unknown>, segment: PathSegment): InvalidModelError {
  return new InvalidModelError(`${typedef.name} has no path segment ${JSON.stringify(segment)}`);
}

const SET_BACKING: Partial<Record<BackingType, BackingType>> = {
  S: 'SS',
  N: 'NS',
  B: 'BS',
};

/**
 * A set of strings, numbers or binary values.
 * Empty sets can't be stored, so they dump to `undefined`.
 *
 * @example
 * ```typescript
 * const tags = new Column(new SetType(new StringType()));
 * ```
 */
export class SetType<T> implements TypeDefinition<Set<T>> {
  readonly backingType: BackingType;
  readonly name: string;
  readonly inner: TypeDefinition<T>;

  constructor(inner: TypeDefinition<T>) {
    const backingType = SET_BACKING[inner.backingType];
    if (backingType === undefined) {
      throw new InvalidModelError(`Sets can only contain S, N or B types, not ${inner.name}`);
    }
    this.inner = inner;
    this.backingType = backingType;
    this.name = `Set<${inner.name}>`;
  }

  isValue(value: unknown): value is Set<T> {
    if (!(value instanceof Set)) {
      return false;
    }
    for (const item of value) {
      if (isPresent(item) && !this.inner.isValue(item)) {
        return false;
      }
    }
    return true;
  }

  dump(value: Set<T>): AttributeValue | undefined {
    const scalars: string[] = [];
    const bytes: Uint8Array[] = [];
    for (const item of value) {
      if (!isPresent(item)) {
        continue;
      }
      const wire = this.inner.dump(item);
      if (wire?.S !== undefined) {
        scalars.push(wire.S);
      } else if (wire?.N !== undefined) {
        scalars.push(wire.N);
      } else if (wire?.B !== undefined) {
        bytes.push(wire.B);
      }
    }

    switch (this.backingType) {
      case 'SS':
        return scalars.length ? { SS: scalars.sort() } : undefined;
      case 'NS':
        return scalars.length ? { NS: scalars.sort((a, b) => Number(a) - Number(b)) } : undefined;
      default:
        return bytes.length ? { BS: bytes } : undefined;
    }
  }

  load(wire: AttributeValue | undefined): Set<T> {
    if (wire === undefined) {
      return new Set();
    }
    let items: (T | undefined)[];
    if (this.backingType === 'SS' && wire.SS !== undefined) {
      items = wire.SS.map(S => this.inner.load({ S }));
    } else if (this.backingType === 'NS' && wire.NS !== undefined) {
      items = wire.NS.map(N => this.inner.load({ N }));
    } else if (this.backingType === 'BS' && wire.BS !== undefined) {
      items = wire.BS.map(B => this.inner.load({ B }));
    } else {
      throw mismatch(this, wire);
    }
    return new Set(items.filter(isPresent));
  }
}

/**
 * An ordered list of a single element type.
 */
export class ListType<T> implements TypeDefinition<T[]> {
  readonly backingType: BackingType = 'L';
  readonly name: string;
  readonly inner: TypeDefinition<T>;

  constructor(inner: TypeDefinition<T>) {
    this.inner = inner;
    this.name = `List<${inner.name}>`;
  }

  isValue(value: unknown): value is T[] {
    return Array.isArray(value) && value.every(item => !isPresent(item) || this.inner.isValue(item));
  }

  dump(value: T[]): AttributeValue | undefined {
    const items = value
      .filter(isPresent)
      .map(item => this.inner.dump(item))
      .filter(isPresent);
    return items.length ? { L: items } : undefined;
  }

  load(wire: AttributeValue | undefined): T[] {
    if (wire === undefined) {
      return [];
    }
    if (wire.L === undefined) {
      throw mismatch(this, wire);
    }
    return wire.L.map(item => this.inner.load(item)).filter(isPresent);
  }

  at(segment: PathSegment): TypeDefinition<unknown> {
    if (typeof segment !== 'number') {
      throw invalidSegment(this, segment);
    }
    return this.inner;
  }
}

export type MapSchema = Record<string, TypeDefinition<unknown>>;

export type MapValue<S extends MapSchema> = { [K in keyof S]?: ValueOf<S[K]> };

/**
 * A document with a fixed set of typed keys.
 *
 * @example
 * ```typescript
 * const address = new MapType({ street: new StringType(), zip: new IntegerType() });
 * ```
 */
export class MapType<S extends MapSchema> implements TypeDefinition<MapValue<S>> {
  readonly backingType: BackingType = 'M';
  readonly name: string;
  readonly types: S;

  constructor(types: S) {
    this.types = types;
    this.name = `Map<${Object.keys(types).join(', ')}>`;
  }

  isValue(value: unknown): value is MapValue<S> {
    if (!isPlainObject(value)) {
      return false;
    }
    return Object.entries(value).every(([key, item]) => {
      const typedef = this.typeFor(key);
      return typedef !== undefined && (!isPresent(item) || typedef.isValue(item));
    });
  }

  dump(value: MapValue<S>): AttributeValue | undefined {
    const M: Record<string, AttributeValue> = {};
    for (const [key, item] of Object.entries(value)) {
      const typedef = this.typeFor(key);
      if (typedef === undefined || !isPresent(item)) {
        continue;
      }
      const wire = typedef.dump(item);
      if (wire !== undefined) {
        M[key] = wire;
      }
    }
    return Object.keys(M).length ? { M } : undefined;
  }

  load(wire: AttributeValue | undefined): MapValue<S> {
    const result: Record<string, unknown> = {};
    if (wire !== undefined) {
      if (wire.M === undefined) {
        throw mismatch(this, wire);
      }
      for (const [key, typedef] of Object.entries(this.types)) {
        const item = typedef.load(wire.M[key]);
        if (isPresent(item)) {
          result[key] = item;
        }
      }
    }
    if (!this.isValue(result)) {
      throw new InvalidModelError(`${this.name} could not load ${JSON.stringify(wire)}`);
    }
    return result;
  }

  at(segment: PathSegment): TypeDefinition<unknown> {
    const typedef = typeof segment === 'string' ? this.typeFor(segment) : undefined;
    if (typedef === undefined) {
      throw invalidSegment(this, segment);
    }
    return typedef;
  }

  private typeFor(key: string): TypeDefinition<unknown> | undefined {
    return Object.prototype.hasOwnProperty.call(this.types, key) ? this.types[key] : undefined;
  }
}

/**
 * A document with arbitrary string keys sharing one value type.
 */
export class DynamicMapType<T> implements TypeDefinition<Record<string, T>> {
  readonly backingType: BackingType = 'M';
  readonly name: string;
  readonly inner: TypeDefinition<T>;

  constructor(inner: TypeDefinition<T>) {
    this.inner = inner;
    this.name = `DynamicMap<${inner.name}>`;
  }

  isValue(value: unknown): value is Record<string, T> {
    return isPlainObject(value) && Object.values(value).every(item => !isPresent(item) || this.inner.isValue(item));
  }

  dump(value: Record<string, T>): AttributeValue | undefined {
    const M: Record<string, AttributeValue> = {};
    for (const [key, item] of Object.entries(value)) {
      if (!isPresent(item)) {
        continue;
      }
      const wire = this.inner.dump(item);
      if (wire !== undefined) {
        M[key] = wire;
      }
    }
    return Object.keys(M).length ? { M } : undefined;
  }

  load(wire: AttributeValue | undefined): Record<string, T> {
    const result: Record<string, T> = {};
    if (wire === undefined) {
      return result;
    }
    if (wire.M === undefined) {
      throw mismatch(this, wire);
    }
    for (const [key, item] of Object.entries(wire.M)) {
      const value = this.inner.load(item);
      if (isPresent(value)) {
        result[key] = value;
      }
    }
    return result;
  }

  at(segment: PathSegment): TypeDefinition<unknown> {
    if (typeof segment !== 'string') {
      throw invalidSegment(this, segment);
    }
    return this.inner;
  }
}
