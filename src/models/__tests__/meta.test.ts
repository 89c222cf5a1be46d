/**
 * Tests for model declarations
 */

import { describe, it, expect } from 'vitest';
import { Column } from '../column.js';
import { defineMeta } from '../meta.js';
import { GlobalSecondaryIndex, LocalSecondaryIndex } from '../indexes.js';
import { InvalidModelError } from '../../error/categories.js';
import { IntegerType, StringType } from '../../typedefs/scalars.js';
import { Tweet, User } from '../../testing/fixtures.js';

describe('defineMeta', () => {
  it('should resolve keys and wire names', () => {
    const { account, id } = Tweet.meta.columns;

    expect(Tweet.meta.hashKey).toBe(account);
    expect(Tweet.meta.rangeKey).toBe(id);
    expect(Tweet.meta.keys).toEqual([account, id]);
    expect(User.meta.rangeKey).toBeUndefined();
    expect(User.meta.columnsByDynamoName.get('j')).toBe(User.meta.columns.joined);
    expect(User.meta.columns.joined.name).toBe('joined');
  });

  it('should list columns in declaration order', () => {
    expect(Tweet.meta.columnList.map(column => column.name)).toEqual(['account', 'id', 'content', 'createdAt', 'likes']);
  });

  it('should resolve a local index onto the table hash key', () => {
    const { byCreation } = Tweet.meta.indexes;
    const { account, id, createdAt } = Tweet.meta.columns;

    expect(byCreation.name).toBe('byCreation');
    expect(byCreation.hashKey).toBe(account);
    expect(byCreation.rangeKey).toBe(createdAt);
    expect(byCreation.projected).toEqual(new Set([account, id, createdAt]));
  });

  it('should project listed columns and every key into a global index', () => {
    const { byContent } = Tweet.meta.indexes;
    const { account, id, content, likes } = Tweet.meta.columns;

    expect(byContent.hashKey).toBe(content);
    expect(byContent.rangeKey).toBeUndefined();
    expect(byContent.projected).toEqual(new Set([account, id, content, likes]));
    expect(byContent.modelTableName).toBe('tweets');
  });

  it('should keep the stream views', () => {
    expect(User.meta.stream?.include).toEqual(new Set(['new', 'old']));
    expect(Tweet.meta.stream).toBeUndefined();
  });

  it('should use an index wire name', () => {
    const meta = defineMeta({
      tableName: 'named',
      columns: {
        id: new Column(new StringType(), { hashKey: true }),
        email: new Column(new StringType()),
      },
      indexes: {
        byEmail: new GlobalSecondaryIndex({ hashKey: 'email', projection: 'all', name: 'email-index' }),
      },
    });

    expect(meta.indexes.byEmail.dynamoName).toBe('email-index');
    expect(meta.indexes.byEmail.projected.size).toBe(2);
  });

  it('should require a hash key', () => {
    expect(() => defineMeta({ tableName: 't', columns: { a: new Column(new StringType()) } })).toThrow(
      InvalidModelError
    );
  });

  it('should reject two hash keys', () => {
    expect(() =>
      defineMeta({
        tableName: 't',
        columns: {
          a: new Column(new StringType(), { hashKey: true }),
          b: new Column(new StringType(), { hashKey: true }),
        },
      })
    ).toThrow('t has more than one hash key');
  });

  it('should reject two range keys', () => {
    expect(() =>
      defineMeta({
        tableName: 't',
        columns: {
          a: new Column(new StringType(), { hashKey: true }),
          b: new Column(new StringType(), { rangeKey: true }),
          c: new Column(new IntegerType(), { rangeKey: true }),
        },
      })
    ).toThrow('t has more than one range key');
  });

  it('should reject a column that is both keys', () => {
    expect(() => new Column(new StringType(), { hashKey: true, rangeKey: true })).toThrow(InvalidModelError);
  });

  it('should reject columns sharing a wire name', () => {
    expect(() =>
      defineMeta({
        tableName: 't',
        columns: {
          a: new Column(new StringType(), { hashKey: true }),
          b: new Column(new StringType(), { name: 'a' }),
        },
      })
    ).toThrow('t: columns a and b share the wire name a');
  });

  it('should reject a column reused under another field name', () => {
    const shared = new Column(new StringType(), { hashKey: true });
    defineMeta({ tableName: 'first', columns: { id: shared } });

    expect(() => defineMeta({ tableName: 'second', columns: { key: shared } })).toThrow(InvalidModelError);
  });

  it('should reject a local index on a table without a range key', () => {
    expect(() =>
      defineMeta({
        tableName: 't',
        columns: {
          a: new Column(new StringType(), { hashKey: true }),
          b: new Column(new StringType()),
        },
        indexes: { byB: new LocalSecondaryIndex({ rangeKey: 'b', projection: 'keys' }) },
      })
    ).toThrow('t has a local index byB but no range key');
  });

  it('should reject an index naming an unknown column', () => {
    expect(() =>
      defineMeta({
        tableName: 't',
        columns: { a: new Column(new StringType(), { hashKey: true }) },
        indexes: { byB: new GlobalSecondaryIndex({ hashKey: 'b', projection: 'keys' }) },
      })
    ).toThrow('Index byB names unknown column b');
  });

  it('should reject an empty projection list', () => {
    expect(() => new GlobalSecondaryIndex({ hashKey: 'a', projection: [] })).toThrow(InvalidModelError);
  });

  it('should reject an empty stream include', () => {
    expect(() =>
      defineMeta({
        tableName: 't',
        columns: { a: new Column(new StringType(), { hashKey: true }) },
        stream: { include: [] },
      })
    ).toThrow('t: stream include must be a non-empty subset of keys, new and old');
  });

  it('should fail to name an unattached column', () => {
    expect(() => new Column(new StringType()).name).toThrow('Column is not attached to a model');
  });
});
