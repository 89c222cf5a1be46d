/**
 * Table creation and validation.
 * @module engine/tables
 */

import type {
  AttributeDefinition,
  CreateTableCommandInput,
  KeySchemaElement,
  Projection as TableProjection,
  StreamViewType,
  TableDescription,
} from '@aws-sdk/client-dynamodb';
import type { AnyColumn } from '../models/column.js';
import type { Index } from '../models/indexes.js';
import type { ModelMeta, StreamView } from '../models/meta.js';
import { InvalidModelError, TableMismatchError } from '../error/categories.js';

function keySchema(hashKey: AnyColumn, rangeKey: AnyColumn | undefined): KeySchemaElement[] {
  const schema: KeySchemaElement[] = [{ AttributeName: hashKey.dynamoName, KeyType: 'HASH' }];
  if (rangeKey !== undefined) {
    schema.push({ AttributeName: rangeKey.dynamoName, KeyType: 'RANGE' });
  }
  return schema;
}

function attributeType(column: AnyColumn): 'S' | 'N' | 'B' {
  const backing = column.typedef.backingType;
  if (backing === 'S' || backing === 'N' || backing === 'B') {
    return backing;
  }
  throw new InvalidModelError(`Key column ${column.name} must be a string, number or binary type, not ${backing}`);
}

function indexProjection(meta: ModelMeta, index: Index): TableProjection {
  if (index.projection === 'all') {
    return { ProjectionType: 'ALL' };
  }
  const keys = new Set([...meta.keys, index.hashKey, ...(index.rangeKey ? [index.rangeKey] : [])]);
  const nonKey = [...index.projected].filter(column => !keys.has(column)).map(column => column.dynamoName);
  if (index.projection === 'keys' || nonKey.length === 0) {
    return { ProjectionType: 'KEYS_ONLY' };
  }
  return { ProjectionType: 'INCLUDE', NonKeyAttributes: nonKey.sort() };
}

/**
 * Stream view type for a stream's `include` set. Keys come with every image.
 */
export function streamViewType(include: ReadonlySet<StreamView>): StreamViewType {
  const withNew = include.has('new');
  const withOld = include.has('old');
  if (withNew && withOld) {
    return 'NEW_AND_OLD_IMAGES';
  }
  if (withNew) {
    return 'NEW_IMAGE';
  }
  if (withOld) {
    return 'OLD_IMAGE';
  }
  return 'KEYS_ONLY';
}

/**
 * CreateTable request for a model, billed on demand.
 */
export function createTableRequest(meta: ModelMeta, tableName: string): CreateTableCommandInput {
  const indexes = Object.values(meta.indexes);
  const keyColumns = new Map<string, AnyColumn>();
  const indexKeys = indexes.flatMap(index => (index.rangeKey ? [index.hashKey, index.rangeKey] : [index.hashKey]));
  for (const column of [...meta.keys, ...indexKeys]) {
    keyColumns.set(column.dynamoName, column);
  }
  const attributeDefinitions: AttributeDefinition[] = [...keyColumns.values()]
    .map(column => ({ AttributeName: column.dynamoName, AttributeType: attributeType(column) }))
    .sort((a, b) => (a.AttributeName < b.AttributeName ? -1 : 1));

  const request: CreateTableCommandInput = {
    TableName: tableName,
    KeySchema: keySchema(meta.hashKey, meta.rangeKey),
    AttributeDefinitions: attributeDefinitions,
    BillingMode: 'PAY_PER_REQUEST',
  };

  const gsis = indexes.filter(index => index.kind === 'gsi');
  if (gsis.length > 0) {
    request.GlobalSecondaryIndexes = gsis.map(index => ({
      IndexName: index.dynamoName,
      KeySchema: keySchema(index.hashKey, index.rangeKey),
      Projection: indexProjection(meta, index),
    }));
  }
  const lsis = indexes.filter(index => index.kind === 'lsi');
  if (lsis.length > 0) {
    request.LocalSecondaryIndexes = lsis.map(index => ({
      IndexName: index.dynamoName,
      KeySchema: keySchema(index.hashKey, index.rangeKey),
      Projection: indexProjection(meta, index),
    }));
  }
  if (meta.stream !== undefined) {
    request.StreamSpecification = { StreamEnabled: true, StreamViewType: streamViewType(meta.stream.include) };
  }
  return request;
}

type SchemaField =
  | 'KeySchema'
  | 'AttributeDefinitions'
  | 'GlobalSecondaryIndexes'
  | 'LocalSecondaryIndexes'
  | 'StreamSpecification';

function sameKeySchema(expected: KeySchemaElement[] | undefined, actual: KeySchemaElement[] | undefined): boolean {
  const normalize = (schema: KeySchemaElement[] | undefined): string =>
    (schema ?? [])
      .map(element => `${element.KeyType}:${element.AttributeName}`)
      .sort()
      .join(',');
  return normalize(expected) === normalize(actual);
}

/**
 * Whether a table has finished creating, including its global indexes.
 */
export function isTableActive(table: TableDescription): boolean {
  const tableActive = table.TableStatus === undefined || table.TableStatus === 'ACTIVE';
  const indexesActive = (table.GlobalSecondaryIndexes ?? []).every(
    index => index.IndexStatus === undefined || index.IndexStatus === 'ACTIVE'
  );
  return tableActive && indexesActive;
}

/**
 * Checks that an existing table can store the model: same keys, every
 * declared index with the same keys, and a stream carrying the declared
 * images. Extra indexes on the table are fine.
 *
 * @returns The table's stream ARN when the model declares a stream
 * @throws {TableMismatchError} when the table doesn't fit
 */
export function validateTable(
  expected: CreateTableCommandInput,
  actual: TableDescription
): string | undefined {
  const tableName = expected.TableName ?? '';
  const mismatch = (what: SchemaField): TableMismatchError =>
    new TableMismatchError(tableName, { [what]: expected[what] }, { [what]: actual[what] });

  if (!sameKeySchema(expected.KeySchema, actual.KeySchema)) {
    throw mismatch('KeySchema');
  }
  const actualTypes = new Map((actual.AttributeDefinitions ?? []).map(def => [def.AttributeName, def.AttributeType]));
  for (const definition of expected.AttributeDefinitions ?? []) {
    if (actualTypes.get(definition.AttributeName) !== definition.AttributeType) {
      throw mismatch('AttributeDefinitions');
    }
  }
  for (const index of expected.GlobalSecondaryIndexes ?? []) {
    const found = (actual.GlobalSecondaryIndexes ?? []).find(candidate => candidate.IndexName === index.IndexName);
    if (found === undefined || !sameKeySchema(index.KeySchema, found.KeySchema)) {
      throw mismatch('GlobalSecondaryIndexes');
    }
  }
  for (const index of expected.LocalSecondaryIndexes ?? []) {
    const found = (actual.LocalSecondaryIndexes ?? []).find(candidate => candidate.IndexName === index.IndexName);
    if (found === undefined || !sameKeySchema(index.KeySchema, found.KeySchema)) {
      throw mismatch('LocalSecondaryIndexes');
    }
  }

  if (expected.StreamSpecification === undefined) {
    return undefined;
  }
  const stream = actual.StreamSpecification;
  if (
    stream?.StreamEnabled !== true ||
    stream.StreamViewType !== expected.StreamSpecification.StreamViewType ||
    actual.LatestStreamArn === undefined
  ) {
    throw mismatch('StreamSpecification');
  }
  return actual.LatestStreamArn;
}
