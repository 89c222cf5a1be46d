/**
 * Tests for table creation and validation
 */

import { describe, it, expect } from 'vitest';
import type { TableDescription } from '@aws-sdk/client-dynamodb';
import { createTableRequest, isTableActive, streamViewType, validateTable } from '../tables.js';
import { Column } from '../../models/column.js';
import { defineMeta } from '../../models/meta.js';
import { BooleanType } from '../../typedefs/scalars.js';
import { InvalidModelError, TableMismatchError } from '../../error/categories.js';
import { Tweet, User } from '../../testing/fixtures.js';

function describedAs(request: ReturnType<typeof createTableRequest>, extra: Partial<TableDescription> = {}): TableDescription {
  return {
    TableName: request.TableName,
    TableStatus: 'ACTIVE',
    KeySchema: request.KeySchema,
    AttributeDefinitions: request.AttributeDefinitions,
    GlobalSecondaryIndexes: request.GlobalSecondaryIndexes?.map(index => ({
      IndexName: index.IndexName,
      KeySchema: index.KeySchema,
      Projection: index.Projection,
      IndexStatus: 'ACTIVE' as const,
    })),
    LocalSecondaryIndexes: request.LocalSecondaryIndexes?.map(index => ({
      IndexName: index.IndexName,
      KeySchema: index.KeySchema,
      Projection: index.Projection,
    })),
    ...extra,
  };
}

describe('createTableRequest', () => {
  it('should describe keys, indexes and attribute types', () => {
    expect(createTableRequest(Tweet.meta, 'tweets')).toEqual({
      TableName: 'tweets',
      KeySchema: [
        { AttributeName: 'account', KeyType: 'HASH' },
        { AttributeName: 'id', KeyType: 'RANGE' },
      ],
      AttributeDefinitions: [
        { AttributeName: 'account', AttributeType: 'S' },
        { AttributeName: 'content', AttributeType: 'S' },
        { AttributeName: 'createdAt', AttributeType: 'S' },
        { AttributeName: 'id', AttributeType: 'S' },
      ],
      BillingMode: 'PAY_PER_REQUEST',
      GlobalSecondaryIndexes: [
        {
          IndexName: 'byContent',
          KeySchema: [{ AttributeName: 'content', KeyType: 'HASH' }],
          Projection: { ProjectionType: 'INCLUDE', NonKeyAttributes: ['likes'] },
        },
      ],
      LocalSecondaryIndexes: [
        {
          IndexName: 'byCreation',
          KeySchema: [
            { AttributeName: 'account', KeyType: 'HASH' },
            { AttributeName: 'createdAt', KeyType: 'RANGE' },
          ],
          Projection: { ProjectionType: 'KEYS_ONLY' },
        },
      ],
    });
  });

  it('should enable the declared stream', () => {
    const request = createTableRequest(User.meta, 'dev-users');

    expect(request.TableName).toBe('dev-users');
    expect(request.StreamSpecification).toEqual({ StreamEnabled: true, StreamViewType: 'NEW_AND_OLD_IMAGES' });
    expect(request.GlobalSecondaryIndexes?.[0].Projection).toEqual({ ProjectionType: 'KEYS_ONLY' });
  });

  it('should reject a key column that cannot be a key', () => {
    const meta = defineMeta({
      tableName: 'flags',
      columns: { flag: new Column(new BooleanType(), { hashKey: true }) },
    });

    expect(() => createTableRequest(meta, 'flags')).toThrow(InvalidModelError);
  });
});

describe('streamViewType', () => {
  it('should pick the view carrying the included images', () => {
    expect(streamViewType(new Set(['keys']))).toBe('KEYS_ONLY');
    expect(streamViewType(new Set(['new']))).toBe('NEW_IMAGE');
    expect(streamViewType(new Set(['keys', 'old']))).toBe('OLD_IMAGE');
    expect(streamViewType(new Set(['new', 'old']))).toBe('NEW_AND_OLD_IMAGES');
  });
});

describe('isTableActive', () => {
  it('should wait for global indexes', () => {
    const table = describedAs(createTableRequest(User.meta, 'users'));

    expect(isTableActive(table)).toBe(true);
    expect(
      isTableActive({ ...table, GlobalSecondaryIndexes: [{ IndexName: 'byEmail', IndexStatus: 'CREATING' }] })
    ).toBe(false);
    expect(isTableActive({ ...table, TableStatus: 'UPDATING' })).toBe(false);
  });
});

describe('validateTable', () => {
  it('should accept a matching table', () => {
    const expected = createTableRequest(Tweet.meta, 'tweets');

    expect(validateTable(expected, describedAs(expected))).toBeUndefined();
  });

  it('should return the stream arn', () => {
    const expected = createTableRequest(User.meta, 'users');
    const actual = describedAs(expected, {
      StreamSpecification: { StreamEnabled: true, StreamViewType: 'NEW_AND_OLD_IMAGES' },
      LatestStreamArn: 'arn:users-stream',
    });

    expect(validateTable(expected, actual)).toBe('arn:users-stream');
  });

  it('should accept indexes the model does not declare', () => {
    const expected = createTableRequest(Tweet.meta, 'tweets');
    const table = describedAs(expected);
    const actual: TableDescription = {
      ...table,
      GlobalSecondaryIndexes: [
        ...(table.GlobalSecondaryIndexes ?? []),
        { IndexName: 'extra', KeySchema: [{ AttributeName: 'likes', KeyType: 'HASH' }] },
      ],
    };

    expect(validateTable(expected, actual)).toBeUndefined();
  });

  it('should reject a missing index', () => {
    const expected = createTableRequest(Tweet.meta, 'tweets');

    expect(() => validateTable(expected, describedAs(expected, { LocalSecondaryIndexes: [] }))).toThrow(
      TableMismatchError
    );
  });

  it('should reject a key attribute of another type', () => {
    const expected = createTableRequest(Tweet.meta, 'tweets');
    const actual = describedAs(expected, {
      AttributeDefinitions: [
        { AttributeName: 'account', AttributeType: 'N' },
        { AttributeName: 'content', AttributeType: 'S' },
        { AttributeName: 'createdAt', AttributeType: 'S' },
        { AttributeName: 'id', AttributeType: 'S' },
      ],
    });

    expect(() => validateTable(expected, actual)).toThrow(TableMismatchError);
  });

  it('should reject a stream with other images', () => {
    const expected = createTableRequest(User.meta, 'users');
    const actual = describedAs(expected, {
      StreamSpecification: { StreamEnabled: true, StreamViewType: 'KEYS_ONLY' },
      LatestStreamArn: 'arn:users-stream',
    });

    expect(() => validateTable(expected, actual)).toThrow(TableMismatchError);
  });
});
