/**
 * Tests for column types and the type engine
 */

import { describe, it, expect } from 'vitest';
import {
  BooleanType,
  DateTimeType,
  DynamicMapType,
  IntegerType,
  ListType,
  MapType,
  NumberType,
  SetType,
  StringType,
  TimestampType,
  TypeEngine,
  UUIDType,
} from '../index.js';
import { InvalidModelError } from '../../error/categories.js';

describe('scalar types', () => {
  it('should truncate loaded integers', () => {
    const integer = new IntegerType();

    expect(integer.load({ N: '3.9' })).toBe(3);
    expect(integer.load({ N: '-3.9' })).toBe(-3);
    expect(integer.isValue(1.5)).toBe(false);
  });

  it('should keep numbers as decimal strings', () => {
    expect(new NumberType().dump(1.25)).toEqual({ N: '1.25' });
    expect(new NumberType().isValue(Number.NaN)).toBe(false);
  });

  it('should round numbers beyond double precision', () => {
    const number = new NumberType();

    expect(number.dump(1e21)).toEqual({ N: '1e+21' });
    expect(number.load({ N: '9007199254740993' })).toBe(9007199254740992);
  });

  it('should store a DateTime as an ISO string', () => {
    const date = new Date('2024-02-03T04:05:06.000Z');

    expect(new DateTimeType().dump(date)).toEqual({ S: '2024-02-03T04:05:06.000Z' });
    expect(new DateTimeType().load({ S: '2024-02-03T04:05:06.000Z' })).toEqual(date);
  });

  it('should reject an unparseable DateTime', () => {
    expect(() => new DateTimeType().load({ S: 'not a date' })).toThrow('DateTime could not parse "not a date"');
  });

  it('should store a Timestamp as whole epoch seconds', () => {
    const timestamp = new TimestampType();

    expect(timestamp.dump(new Date('2023-11-14T22:13:20.500Z'))).toEqual({ N: '1700000000' });
    expect(timestamp.load({ N: '1700000000' })).toEqual(new Date('2023-11-14T22:13:20.000Z'));
  });

  it('should lowercase UUIDs', () => {
    const uuid = new UUIDType();

    expect(uuid.dump('0A1B2C3D-0000-4000-8000-00000000ABCD')).toEqual({ S: '0a1b2c3d-0000-4000-8000-00000000abcd' });
    expect(uuid.isValue('abc')).toBe(false);
  });

  it('should reject a wire value under the wrong tag', () => {
    expect(() => new StringType().load({ N: '1' })).toThrow('String expected a S value but found N');
    expect(() => new BooleanType().load({ S: 'true' })).toThrow(InvalidModelError);
  });
});

describe('collection types', () => {
  it('should dump string sets sorted', () => {
    expect(new SetType(new StringType()).dump(new Set(['b', 'a']))).toEqual({ SS: ['a', 'b'] });
  });

  it('should dump number sets in numeric order', () => {
    expect(new SetType(new IntegerType()).dump(new Set([10, 9]))).toEqual({ NS: ['9', '10'] });
  });

  it('should dump an empty set as nothing', () => {
    expect(new SetType(new StringType()).dump(new Set())).toBeUndefined();
  });

  it('should load a missing set as an empty one', () => {
    expect(new SetType(new StringType()).load(undefined)).toEqual(new Set());
    expect(new SetType(new NumberType()).load({ NS: ['1', '2'] })).toEqual(new Set([1, 2]));
  });

  it('should only build sets of scalars', () => {
    expect(() => new SetType(new ListType(new StringType()))).toThrow(
      'Sets can only contain S, N or B types, not List<String>'
    );
  });

  it('should drop missing list items', () => {
    const engine = new TypeEngine();

    expect(engine.dump(new ListType(new StringType()), ['a', null, 'b'])).toEqual({ L: [{ S: 'a' }, { S: 'b' }] });
    expect(new ListType(new StringType()).dump([])).toBeUndefined();
  });

  it('should load only the declared keys of a map', () => {
    const profile = new MapType({ bio: new StringType(), links: new ListType(new StringType()) });

    expect(profile.load({ M: { bio: { S: 'hi' }, extra: { S: 'x' } } })).toEqual({ bio: 'hi', links: [] });
  });

  it('should dump only the declared keys of a map', () => {
    const engine = new TypeEngine();
    const profile = new MapType({ bio: new StringType() });

    expect(engine.dump(profile, { bio: 'hi' })).toEqual({ M: { bio: { S: 'hi' } } });
    expect(profile.isValue({ bio: 'hi', extra: 'x' })).toBe(false);
  });

  it('should load any key of a dynamic map', () => {
    const counts = new DynamicMapType(new IntegerType());

    expect(counts.load({ M: { a: { N: '1' }, b: { N: '2' } } })).toEqual({ a: 1, b: 2 });
    expect(counts.dump({ a: 1 })).toEqual({ M: { a: { N: '1' } } });
  });
});

describe('TypeEngine', () => {
  const engine = new TypeEngine();

  it('should dump missing values as nothing', () => {
    expect(engine.dump(new StringType(), undefined)).toBeUndefined();
    expect(engine.dump(new StringType(), null)).toBeUndefined();
  });

  it('should reject values the type does not accept', () => {
    expect(() => engine.dump(new IntegerType(), 1.5)).toThrow("Integer can't store 1.5");
  });

  it('should load a wire NULL as a missing value', () => {
    expect(engine.load(new StringType(), { NULL: true })).toBeUndefined();
    expect(engine.load(new SetType(new StringType()), { NULL: true })).toEqual(new Set());
  });

  it('should walk a document path', () => {
    const profile = new MapType({ bio: new StringType(), links: new ListType(new StringType()) });

    expect(engine.typeAt(profile, ['links', 0])).toBeInstanceOf(StringType);
    expect(engine.typeAt(profile, [])).toBe(profile);
  });

  it('should reject a path the type cannot follow', () => {
    const profile = new MapType({ bio: new StringType() });

    expect(() => engine.typeAt(profile, [0])).toThrow('Map<bio> has no path segment 0');
    expect(() => engine.typeAt(new StringType(), ['x'])).toThrow('String has no path segment "x"');
  });
});
