/**
 * Type definitions: how a native value is stored on the wire.
 * @module typedefs/types
 */

import type { AttributeValue } from '@aws-sdk/client-dynamodb';

/**
 * Wire tag a type stores its values under.
 */
export type BackingType = 'S' | 'N' | 'B' | 'BOOL' | 'SS' | 'NS' | 'BS' | 'L' | 'M';

/**
 * A segment of a document path: a map key or a list index.
 */
export type PathSegment = string | number;

/**
 * Converts values of type `T` to and from the wire's tagged format.
 *
 * `dump` returns `undefined` for values that should be omitted (empty
 * collections); `load(undefined)` returns `undefined` for scalars and an empty
 * container for collections.
 */
export interface TypeDefinition<T> {
  readonly backingType: BackingType;
  readonly name: string;

  /**
   * Element type, for the types `contains` can look inside of
   */
  readonly inner?: TypeDefinition<unknown>;

  isValue(value: unknown): value is T;
  dump(value: T): AttributeValue | undefined;
  load(wire: AttributeValue | undefined): T | undefined;

  /**
   * Type of the value at one step down a document path
   */
  at?(segment: PathSegment): TypeDefinition<unknown>;
}

/**
 * The native value type a definition produces.
 */
export type ValueOf<D> = D extends TypeDefinition<infer V> ? V : never;
