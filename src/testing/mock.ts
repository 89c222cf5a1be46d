/**
 * Mock Session for Testing
 *
 * In-memory stand-in for {@link AwsSession}: tables with stored items, and
 * streams whose shards hold scripted records. Every call is recorded.
 */

import type { Session } from '../session/session.js';
import type {
  CreateTableCommandInput,
  DeleteItemCommandInput,
  GetShardIteratorRequest,
  KeysAndAttributes,
  QueryCommandInput,
  RawStreamRecord,
  RecordsResponse,
  ScanCommandInput,
  SearchResponse,
  ShardDescription,
  StreamDescription,
  TableDescription,
  UpdateItemCommandInput,
} from '../session/types.js';
import type { AttributeMap } from '../typedefs/wire.js';
import { MapperError } from '../error/error.js';
import { InvalidStreamError, RecordsExpiredError, ShardIteratorExpiredError } from '../error/categories.js';

export type MockOperation =
  | 'saveItem'
  | 'deleteItem'
  | 'loadItems'
  | 'queryItems'
  | 'scanItems'
  | 'createTable'
  | 'describeTable'
  | 'describeStream'
  | 'getShardIterator'
  | 'getStreamRecords';

export interface RecordedCall {
  operation: MockOperation;
  request: unknown;
}

interface MockTable {
  description: TableDescription;
  items: AttributeMap[];
  /** DescribeTable calls left that report CREATING */
  creatingPolls: number;
}

interface MockShard {
  shardId: string;
  parentShardId: string | undefined;
  records: RawStreamRecord[];
  /** Records before this position are past the trim horizon */
  trimmed: number;
  closed: boolean;
}

interface MockStream {
  shards: MockShard[];
}

interface MockIterator {
  streamArn: string;
  shardId: string;
  position: number;
}

export interface MockSessionOptions {
  /** Records returned by one GetRecords call */
  pageSize?: number;
  /** DescribeTable calls that report CREATING after a table is created */
  creatingPolls?: number;
}

/**
 * Stream ARN the mock assigns to a table created with a stream
 */
export function mockStreamArn(tableName: string): string {
  return `arn:aws:dynamodb:local:000000000000:table/${tableName}/stream/test`;
}

/**
 * @example
 * ```typescript
 * const session = new MockSession();
 * const engine = new Engine({ session, logger: new NoopLogger() });
 * await engine.bind(User);
 * session.putItem('users', { id: { S: 'u1' } });
 * ```
 */
export class MockSession implements Session {
  readonly calls: RecordedCall[] = [];
  private readonly tables = new Map<string, MockTable>();
  private readonly streams = new Map<string, MockStream>();
  private readonly iterators = new Map<string, MockIterator>();
  private readonly searchPages: Record<'queryItems' | 'scanItems', SearchResponse[]> = {
    queryItems: [],
    scanItems: [],
  };
  private readonly failures: { operation: MockOperation; error: Error; skip: number }[] = [];
  private readonly pageSize: number;
  private readonly creatingPolls: number;
  private iteratorCounter = 0;

  constructor(options: MockSessionOptions = {}) {
    this.pageSize = options.pageSize ?? 1000;
    this.creatingPolls = options.creatingPolls ?? 0;
  }

  // ==========================================================================
  // Scripting
  // ==========================================================================

  /**
   * Makes a call of `operation` throw `error`: the next one, or the one after
   * `skip` more calls succeed.
   */
  failNext(operation: MockOperation, error: Error, skip = 0): void {
    this.failures.push({ operation, error, skip });
  }

  /**
   * Queues pages returned by the next query or scan calls, in order.
   */
  queuePages(operation: 'queryItems' | 'scanItems', ...pages: SearchResponse[]): void {
    this.searchPages[operation].push(...pages);
  }

  /**
   * Registers an existing table as DescribeTable reports it.
   */
  setTable(description: TableDescription): void {
    const tableName = description.TableName ?? '';
    this.tables.set(tableName, { description, items: [], creatingPolls: 0 });
  }

  putItem(tableName: string, item: AttributeMap): void {
    this.requireTable(tableName).items.push(item);
  }

  getItems(tableName: string): readonly AttributeMap[] {
    return this.requireTable(tableName).items;
  }

  addShard(streamArn: string, shardId: string, parentShardId?: string): void {
    const stream = this.streams.get(streamArn) ?? { shards: [] };
    stream.shards.push({ shardId, parentShardId, records: [], trimmed: 0, closed: false });
    this.streams.set(streamArn, stream);
  }

  addRecords(streamArn: string, shardId: string, ...records: RawStreamRecord[]): void {
    this.requireShard(streamArn, shardId).records.push(...records);
  }

  /**
   * Closes a shard; once read to the end it returns no next iterator.
   */
  closeShard(streamArn: string, shardId: string): void {
    this.requireShard(streamArn, shardId).closed = true;
  }

  /**
   * Moves a shard's trim horizon past its first `count` records.
   */
  trimShard(streamArn: string, shardId: string, count: number): void {
    this.requireShard(streamArn, shardId).trimmed = count;
  }

  /**
   * Expires every iterator handed out so far.
   */
  expireIterators(): void {
    this.iterators.clear();
  }

  callsOf(operation: MockOperation): unknown[] {
    return this.calls.filter(call => call.operation === operation).map(call => call.request);
  }

  // ==========================================================================
  // Session
  // ==========================================================================

  async saveItem(request: UpdateItemCommandInput): Promise<void> {
    this.record('saveItem', request);
  }

  async deleteItem(request: DeleteItemCommandInput): Promise<void> {
    this.record('deleteItem', request);
    const table = this.requireTable(request.TableName ?? '');
    const key = request.Key ?? {};
    table.items = table.items.filter(item => !matchesKey(item, key));
  }

  async loadItems(request: Record<string, KeysAndAttributes>): Promise<Record<string, AttributeMap[]>> {
    this.record('loadItems', request);
    const found: Record<string, AttributeMap[]> = {};
    for (const [tableName, keys] of Object.entries(request)) {
      const table = this.requireTable(tableName);
      const items = (keys.Keys ?? []).flatMap(key => table.items.filter(item => matchesKey(item, key)));
      if (items.length > 0) {
        found[tableName] = items;
      }
    }
    return found;
  }

  async queryItems(request: QueryCommandInput): Promise<SearchResponse> {
    this.record('queryItems', request);
    return this.searchPages.queryItems.shift() ?? { Count: 0, ScannedCount: 0, Items: [] };
  }

  async scanItems(request: ScanCommandInput): Promise<SearchResponse> {
    this.record('scanItems', request);
    return this.searchPages.scanItems.shift() ?? { Count: 0, ScannedCount: 0, Items: [] };
  }

  async createTable(request: CreateTableCommandInput): Promise<void> {
    this.record('createTable', request);
    const tableName = request.TableName ?? '';
    if (this.tables.has(tableName)) {
      return;
    }
    const description: TableDescription = {
      TableName: tableName,
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
    };
    if (request.StreamSpecification?.StreamEnabled) {
      description.StreamSpecification = request.StreamSpecification;
      description.LatestStreamArn = mockStreamArn(tableName);
      if (!this.streams.has(description.LatestStreamArn)) {
        this.streams.set(description.LatestStreamArn, { shards: [] });
      }
    }
    this.tables.set(tableName, { description, items: [], creatingPolls: this.creatingPolls });
  }

  async describeTable(tableName: string): Promise<TableDescription> {
    this.record('describeTable', tableName);
    const table = this.requireTable(tableName);
    if (table.creatingPolls > 0) {
      table.creatingPolls -= 1;
      return { ...table.description, TableStatus: 'CREATING' };
    }
    return table.description;
  }

  async describeStream(streamArn: string, firstShard?: string): Promise<StreamDescription> {
    this.record('describeStream', { streamArn, firstShard });
    const stream = this.requireStream(streamArn);
    const start = firstShard === undefined ? 0 : stream.shards.findIndex(shard => shard.shardId === firstShard) + 1;
    const shards: ShardDescription[] = stream.shards.slice(start).map(shard =>
      shard.parentShardId === undefined
        ? { ShardId: shard.shardId }
        : { ShardId: shard.shardId, ParentShardId: shard.parentShardId }
    );
    return { StreamArn: streamArn, Shards: shards };
  }

  async getShardIterator(request: GetShardIteratorRequest): Promise<string> {
    this.record('getShardIterator', request);
    const shard = this.requireShard(request.streamArn, request.shardId);
    let position = shard.trimmed;
    if (request.iteratorType === 'latest') {
      position = shard.records.length;
    } else if (request.iteratorType === 'at_sequence' || request.iteratorType === 'after_sequence') {
      const index = shard.records.findIndex(record => record.dynamodb.SequenceNumber === request.sequenceNumber);
      if (index === -1) {
        throw new InvalidStreamError(`Unknown sequence number ${request.sequenceNumber}`);
      }
      if (index < shard.trimmed) {
        throw new RecordsExpiredError();
      }
      position = request.iteratorType === 'at_sequence' ? index : index + 1;
    }
    return this.issueIterator({ streamArn: request.streamArn, shardId: request.shardId, position });
  }

  async getStreamRecords(iteratorId: string): Promise<RecordsResponse> {
    this.record('getStreamRecords', iteratorId);
    const iterator = this.iterators.get(iteratorId);
    if (iterator === undefined) {
      throw new ShardIteratorExpiredError();
    }
    const shard = this.requireShard(iterator.streamArn, iterator.shardId);
    if (iterator.position < shard.trimmed) {
      throw new RecordsExpiredError();
    }
    const records = shard.records.slice(iterator.position, iterator.position + this.pageSize);
    const position = iterator.position + records.length;
    if (shard.closed && position >= shard.records.length) {
      return { Records: records };
    }
    return {
      Records: records,
      NextShardIterator: this.issueIterator({ ...iterator, position }),
    };
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private record(operation: MockOperation, request: unknown): void {
    this.calls.push({ operation, request });
    const index = this.failures.findIndex(failure => failure.operation === operation);
    if (index === -1) {
      return;
    }
    const failure = this.failures[index];
    if (failure.skip > 0) {
      failure.skip -= 1;
      return;
    }
    this.failures.splice(index, 1);
    throw failure.error;
  }

  private issueIterator(iterator: MockIterator): string {
    this.iteratorCounter += 1;
    const id = `${iterator.shardId}/${iterator.position}/${this.iteratorCounter}`;
    this.iterators.set(id, iterator);
    return id;
  }

  private requireTable(tableName: string): MockTable {
    const table = this.tables.get(tableName);
    if (table === undefined) {
      throw new MapperError({ code: 'ResourceNotFoundException', message: `Table ${tableName} not found` });
    }
    return table;
  }

  private requireStream(streamArn: string): MockStream {
    const stream = this.streams.get(streamArn);
    if (stream === undefined) {
      throw new InvalidStreamError(`Stream ${streamArn} not found`);
    }
    return stream;
  }

  private requireShard(streamArn: string, shardId: string): MockShard {
    const shard = this.requireStream(streamArn).shards.find(candidate => candidate.shardId === shardId);
    if (shard === undefined) {
      throw new InvalidStreamError(`Shard ${shardId} not found`);
    }
    return shard;
  }
}

function matchesKey(item: AttributeMap, key: AttributeMap): boolean {
  return Object.entries(key).every(([name, value]) => JSON.stringify(item[name]) === JSON.stringify(value));
}
