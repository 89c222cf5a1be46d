/**
 * Serialized stream positions.
 * @module stream/tokens
 */

import { type ShardIteratorType, isShardIteratorType } from '../session/types.js';
import { InvalidStreamError } from '../error/categories.js';

/**
 * One shard's position. The stream ARN lives on the enclosing token.
 */
export interface ShardToken {
  shard_id: string;
  iterator_type?: ShardIteratorType;
  sequence_number?: string;
  parent?: string;
}

/**
 * A stream position that can be saved as JSON and restored later with
 * `stream.moveTo(token)`.
 */
export interface StreamToken {
  stream_arn: string;
  active: string[];
  shards: ShardToken[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isOptionalString(value: unknown): value is string | undefined | null {
  return value === undefined || value === null || typeof value === 'string';
}

function parseShardToken(value: unknown): ShardToken {
  if (!isRecord(value) || typeof value.shard_id !== 'string') {
    throw new InvalidStreamError('Stream token has a shard without a shard_id');
  }
  const { shard_id, iterator_type, sequence_number, parent } = value;
  if (
    !(iterator_type === undefined || iterator_type === null || isShardIteratorType(iterator_type)) ||
    !isOptionalString(sequence_number) ||
    !isOptionalString(parent)
  ) {
    throw new InvalidStreamError(`Stream token has a malformed entry for shard ${shard_id}`);
  }
  const token: ShardToken = { shard_id };
  if (iterator_type !== undefined && iterator_type !== null) {
    token.iterator_type = iterator_type;
  }
  if (sequence_number !== undefined && sequence_number !== null) {
    token.sequence_number = sequence_number;
  }
  if (parent !== undefined && parent !== null) {
    token.parent = parent;
  }
  return token;
}

/**
 * Validates a token read back from storage.
 *
 * @throws {InvalidStreamError} when the value is not a stream token
 */
export function parseStreamToken(value: unknown): StreamToken {
  if (!isRecord(value) || typeof value.stream_arn !== 'string') {
    throw new InvalidStreamError('Stream token has no stream_arn');
  }
  const { stream_arn, active, shards } = value;
  if (!Array.isArray(active) || !active.every((id): id is string => typeof id === 'string')) {
    throw new InvalidStreamError('Stream token has a malformed active list');
  }
  if (!Array.isArray(shards)) {
    throw new InvalidStreamError('Stream token has a malformed shard list');
  }
  return { stream_arn, active: [...active], shards: shards.map(parseShardToken) };
}

/**
 * Whether a `moveTo` position looks like a stream token (as opposed to an
 * endpoint name or a date).
 */
export function isStreamTokenLike(value: unknown): value is Record<string, unknown> {
  return isRecord(value) && !(value instanceof Date) && 'stream_arn' in value;
}
