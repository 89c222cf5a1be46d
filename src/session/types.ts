/**
 * Request and response shapes exchanged with a {@link Session}.
 * @module session/types
 */

import type {
  CreateTableCommandInput,
  DeleteItemCommandInput,
  KeysAndAttributes,
  QueryCommandInput,
  ScanCommandInput,
  TableDescription,
  UpdateItemCommandInput,
} from '@aws-sdk/client-dynamodb';
import type { AttributeMap } from '../typedefs/wire.js';

export type {
  CreateTableCommandInput,
  DeleteItemCommandInput,
  KeysAndAttributes,
  QueryCommandInput,
  ScanCommandInput,
  TableDescription,
  UpdateItemCommandInput,
};

/**
 * One page of a query or scan
 */
export interface SearchResponse {
  Count: number;
  ScannedCount: number;
  Items: AttributeMap[];
  LastEvaluatedKey?: AttributeMap;
}

export type ShardIteratorType = 'trim_horizon' | 'latest' | 'at_sequence' | 'after_sequence';

export const SHARD_ITERATOR_TYPES: readonly ShardIteratorType[] = [
  'trim_horizon',
  'latest',
  'at_sequence',
  'after_sequence',
];

export function isShardIteratorType(value: unknown): value is ShardIteratorType {
  return typeof value === 'string' && SHARD_ITERATOR_TYPES.some(type => type === value);
}

export interface ShardDescription {
  ShardId: string;
  ParentShardId?: string;
}

export interface StreamDescription {
  StreamArn: string;
  Shards: ShardDescription[];
}

export type StreamEventName = 'INSERT' | 'MODIFY' | 'REMOVE';

/**
 * A change record as returned by GetRecords
 */
export interface RawStreamRecord {
  eventID: string;
  eventName: StreamEventName;
  eventVersion: string;
  dynamodb: {
    ApproximateCreationDateTime: Date;
    SequenceNumber: string;
    Keys?: AttributeMap;
    NewImage?: AttributeMap;
    OldImage?: AttributeMap;
  };
}

export interface RecordsResponse {
  Records: RawStreamRecord[];
  /** Missing once the shard is closed and fully read */
  NextShardIterator?: string;
}

export interface GetShardIteratorRequest {
  streamArn: string;
  shardId: string;
  iteratorType: ShardIteratorType;
  sequenceNumber?: string;
}
