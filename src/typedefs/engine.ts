/**
 * Type engine: validated dump/load between native values and wire values.
 * @module typedefs/engine
 */

import type { AttributeValue } from '@aws-sdk/client-dynamodb';
import type { PathSegment, TypeDefinition } from './types.js';
import { InvalidModelError } from '../error/categories.js';

/**
 * Dumps and loads values through their type definitions.
 *
 * Missing values (`null`/`undefined`) always dump to `undefined`, which means
 * "omit this attribute". A wire `NULL` loads as a missing value.
 */
export class TypeEngine {
  /**
   * @throws {InvalidModelError} when the type does not accept the value
   */
  dump<T>(typedef: TypeDefinition<T>, value: unknown): AttributeValue | undefined {
    if (value === null || value === undefined) {
      return undefined;
    }
    if (!typedef.isValue(value)) {
      throw new InvalidModelError(`${typedef.name} can't store ${describe(value)}`, {
        type: typedef.name,
      });
    }
    return typedef.dump(value);
  }

  /**
   * @throws {InvalidModelError} when the wire value has the wrong tag
   */
  load<T>(typedef: TypeDefinition<T>, wire: AttributeValue | undefined): T | undefined {
    if (wire !== undefined && wire.NULL !== undefined) {
      return typedef.load(undefined);
    }
    return typedef.load(wire);
  }

  /**
   * Walks a document path down from a column's type.
   *
   * @example
   * ```typescript
   * engine.typeAt(new MapType({ tags: new ListType(new StringType()) }), ['tags', 0]); // StringType
   * ```
   */
  typeAt(typedef: TypeDefinition<unknown>, path: readonly PathSegment[]): TypeDefinition<unknown> {
    let current = typedef;
    for (const segment of path) {
      if (current.at === undefined) {
        throw new InvalidModelError(`${current.name} has no path segment ${JSON.stringify(segment)}`);
      }
      current = current.at(segment);
    }
    return current;
  }
}

function describe(value: unknown): string {
  if (value instanceof Set) {
    return `Set(${value.size})`;
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
}
