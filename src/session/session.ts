/**
 * The calls the engine and the stream coordinator make against the service.
 * @module session/session
 */

import type { AttributeMap } from '../typedefs/wire.js';
import type {
  CreateTableCommandInput,
  DeleteItemCommandInput,
  GetShardIteratorRequest,
  KeysAndAttributes,
  QueryCommandInput,
  RecordsResponse,
  ScanCommandInput,
  SearchResponse,
  StreamDescription,
  TableDescription,
  UpdateItemCommandInput,
} from './types.js';

/**
 * Service calls, with errors already mapped into the library's taxonomy.
 */
export interface Session {
  /**
   * @throws {ConstraintViolationError} when the condition fails
   */
  saveItem(request: UpdateItemCommandInput): Promise<void>;

  /**
   * @throws {ConstraintViolationError} when the condition fails
   */
  deleteItem(request: DeleteItemCommandInput): Promise<void>;

  /**
   * Batch get, following unprocessed keys until every key was read.
   * Returns the found items by table name.
   */
  loadItems(request: Record<string, KeysAndAttributes>): Promise<Record<string, AttributeMap[]>>;

  queryItems(request: QueryCommandInput): Promise<SearchResponse>;

  scanItems(request: ScanCommandInput): Promise<SearchResponse>;

  /**
   * Creates a table; a table that already exists is not an error.
   */
  createTable(request: CreateTableCommandInput): Promise<void>;

  describeTable(tableName: string): Promise<TableDescription>;

  /**
   * Every shard of a stream, following pagination.
   *
   * @param firstShard - Shard to start listing from
   */
  describeStream(streamArn: string, firstShard?: string): Promise<StreamDescription>;

  /**
   * @throws {RecordsExpiredError} when the sequence number is past the trim horizon
   */
  getShardIterator(request: GetShardIteratorRequest): Promise<string>;

  /**
   * @throws {RecordsExpiredError} when the iterator points past the trim horizon
   * @throws {ShardIteratorExpiredError} when the iterator is too old
   */
  getStreamRecords(iteratorId: string): Promise<RecordsResponse>;
}
