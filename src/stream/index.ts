/**
 * Streams
 *
 * Shard cursors, the coordinator that merges them, and the typed stream over
 * a model's table.
 */

export type { StreamRecord, RecordMeta, StreamEventType } from './record.js';
export { reformatRecord, compareSequenceNumbers } from './record.js';
export type { ShardToken, StreamToken } from './tokens.js';
export { parseStreamToken, isStreamTokenLike } from './tokens.js';
export type { ShardOptions, UnpackOptions } from './shard.js';
export { Shard, unpackShards, CALLS_TO_REACH_HEAD, EXHAUSTED_SENTINEL } from './shard.js';
export type { BufferedRecord } from './buffer.js';
export { RecordBuffer } from './buffer.js';
export type { StreamPosition, CoordinatorOptions } from './coordinator.js';
export { Coordinator } from './coordinator.js';
export type { RecordUnpacker, ModelStreamRecord } from './stream.js';
export { Stream } from './stream.js';
