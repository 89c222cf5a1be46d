/**
 * Session
 *
 * The service calls the engine and stream coordinator depend on, and the AWS
 * SDK implementation of them.
 */

export type { Session } from './session.js';
export type {
  SearchResponse,
  ShardIteratorType,
  ShardDescription,
  StreamDescription,
  StreamEventName,
  RawStreamRecord,
  RecordsResponse,
  GetShardIteratorRequest,
} from './types.js';
export { SHARD_ITERATOR_TYPES, isShardIteratorType } from './types.js';
export type { AwsSessionOptions } from './aws.js';
export { AwsSession, toAttributeValue } from './aws.js';
