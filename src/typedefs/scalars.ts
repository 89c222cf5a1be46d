/**
 * Scalar types: strings, numbers, binary, booleans and dates.
 * @module typedefs/scalars
 */

import type { AttributeValue } from '@aws-sdk/client-dynamodb';
import type { BackingType, TypeDefinition } from './types.js';
import { wireTag } from './wire.js';
import { InvalidModelError } from '../error/categories.js';

function mismatch(typedef: TypeDefinition<unknown>, wire: AttributeValue): InvalidModelError {
  return new InvalidModelError(
    `${typedef.name} expected a ${typedef.backingType} value but found ${wireTag(wire) ?? 'an unknown tag'}`
  );
}

export class StringType implements TypeDefinition<string> {
  readonly backingType: BackingType = 'S';
  readonly name: string = 'String';

  isValue(value: unknown): value is string {
    return typeof value === 'string';
  }

  dump(value: string): AttributeValue | undefined {
    return { S: value };
  }

  load(wire: AttributeValue | undefined): string | undefined {
    if (wire === undefined) {
      return undefined;
    }
    if (wire.S === undefined) {
      throw mismatch(this, wire);
    }
    return wire.S;
  }
}

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

/**
 * A UUID stored as its canonical lowercase string.
 */
export class UUIDType extends StringType {
  override readonly name: string = 'UUID';

  override isValue(value: unknown): value is string {
    return typeof value === 'string' && UUID_PATTERN.test(value);
  }

  override dump(value: string): AttributeValue | undefined {
    return { S: value.toLowerCase() };
  }
}

/**
 * A JavaScript number. Values dump through `String`, so very large or small
 * magnitudes use exponent notation (`1e+21`). Loads go through `Number`, and
 * wire numbers with more precision than a double holds (integers beyond
 * 2^53, more than 17 significant digits) are rounded to the nearest double.
 */
export class NumberType implements TypeDefinition<number> {
  readonly backingType: BackingType = 'N';
  readonly name: string = 'Number';

  isValue(value: unknown): value is number {
    return typeof value === 'number' && Number.isFinite(value);
  }

  dump(value: number): AttributeValue | undefined {
    return { N: String(value) };
  }

  load(wire: AttributeValue | undefined): number | undefined {
    if (wire === undefined) {
      return undefined;
    }
    if (wire.N === undefined) {
      throw mismatch(this, wire);
    }
    return Number(wire.N);
  }
}

/**
 * A number that only accepts integers; loaded values are truncated.
 */
export class IntegerType extends NumberType {
  override readonly name: string = 'Integer';

  override isValue(value: unknown): value is number {
    return typeof value === 'number' && Number.isSafeInteger(value);
  }

  override load(wire: AttributeValue | undefined): number | undefined {
    const value = super.load(wire);
    return value === undefined ? undefined : Math.trunc(value);
  }
}

export class BinaryType implements TypeDefinition<Uint8Array> {
  readonly backingType: BackingType = 'B';
  readonly name: string = 'Binary';

  isValue(value: unknown): value is Uint8Array {
    return value instanceof Uint8Array;
  }

  dump(value: Uint8Array): AttributeValue | undefined {
    return { B: value };
  }

  load(wire: AttributeValue | undefined): Uint8Array | undefined {
    if (wire === undefined) {
      return undefined;
    }
    if (wire.B === undefined) {
      throw mismatch(this, wire);
    }
    return wire.B;
  }
}

export class BooleanType implements TypeDefinition<boolean> {
  readonly backingType: BackingType = 'BOOL';
  readonly name: string = 'Boolean';

  isValue(value: unknown): value is boolean {
    return typeof value === 'boolean';
  }

  dump(value: boolean): AttributeValue | undefined {
    return { BOOL: value };
  }

  load(wire: AttributeValue | undefined): boolean | undefined {
    if (wire === undefined) {
      return undefined;
    }
    if (wire.BOOL === undefined) {
      throw mismatch(this, wire);
    }
    return wire.BOOL;
  }
}

function isValidDate(value: unknown): value is Date {
  return value instanceof Date && !Number.isNaN(value.getTime());
}

/**
 * A Date stored as an ISO-8601 string in UTC, so that string comparison
 * and `begins_with` follow chronological order.
 */
export class DateTimeType implements TypeDefinition<Date> {
  readonly backingType: BackingType = 'S';
  readonly name: string = 'DateTime';

  isValue(value: unknown): value is Date {
    return isValidDate(value);
  }

  dump(value: Date): AttributeValue | undefined {
    return { S: value.toISOString() };
  }

  load(wire: AttributeValue | undefined): Date | undefined {
    if (wire === undefined) {
      return undefined;
    }
    if (wire.S === undefined) {
      throw mismatch(this, wire);
    }
    const date = new Date(wire.S);
    if (!isValidDate(date)) {
      throw new InvalidModelError(`DateTime could not parse ${JSON.stringify(wire.S)}`);
    }
    return date;
  }
}

/**
 * A Date stored as whole epoch seconds, usable as a TTL attribute.
 */
export class TimestampType implements TypeDefinition<Date> {
  readonly backingType: BackingType = 'N';
  readonly name: string = 'Timestamp';

  isValue(value: unknown): value is Date {
    return isValidDate(value);
  }

  dump(value: Date): AttributeValue | undefined {
    return { N: String(Math.floor(value.getTime() / 1000)) };
  }

  load(wire: AttributeValue | undefined): Date | undefined {
    if (wire === undefined) {
      return undefined;
    }
    if (wire.N === undefined) {
      throw mismatch(this, wire);
    }
    return new Date(Number(wire.N) * 1000);
  }
}
