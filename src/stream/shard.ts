/**
 * A cursor over one shard of a stream.
 * @module stream/shard
 */

import type { Session } from '../session/session.js';
import type { ShardDescription, ShardIteratorType, RecordsResponse } from '../session/types.js';
import { isShardIteratorType } from '../session/types.js';
import type { ShardToken } from './tokens.js';
import { type StreamRecord, reformatRecord } from './record.js';
import {
  InvalidShardIteratorTypeError,
  InvalidStreamError,
  RecordsExpiredError,
  ShardIteratorExpiredError,
} from '../error/categories.js';
import { type Logger, NoopLogger } from '../observability/logging.js';
import { type MetricsCollector, NoopMetricsCollector, MapperMetricNames } from '../observability/metrics.js';

/**
 * Consecutive empty GetRecords calls after which a shard is taken to be at
 * its head. Open shards can return several empty pages before reaching new
 * records.
 */
export const CALLS_TO_REACH_HEAD = 5;

/**
 * Iterator id of a shard that is closed and fully read.
 */
export const EXHAUSTED_SENTINEL = '<exhausted>';

export interface ShardOptions {
  streamArn: string;
  shardId: string;
  session: Session;
  iteratorId?: string;
  iteratorType?: ShardIteratorType;
  sequenceNumber?: string;
  parent?: Shard;
  logger?: Logger;
  metrics?: MetricsCollector;
}

/**
 * Position in a shard, as an iterator id plus the type and sequence number it
 * was derived from. Once a shard has a sequence number, only the coordinator
 * moves it, and only forward, as records are consumed.
 *
 * @example
 * ```typescript
 * const shard = new Shard({ streamArn, shardId: 'shardId-0001', session });
 * await shard.jumpTo('trim_horizon');
 * const records = await shard.next();
 * ```
 */
export class Shard {
  readonly streamArn: string;
  readonly shardId: string;
  readonly session: Session;
  iteratorId: string | undefined;
  iteratorType: ShardIteratorType | undefined;
  sequenceNumber: string | undefined;
  parent: Shard | undefined;
  readonly children: Shard[] = [];
  emptyResponses = 0;
  private readonly logger: Logger;
  private readonly metrics: MetricsCollector;

  constructor(options: ShardOptions) {
    this.streamArn = options.streamArn;
    this.shardId = options.shardId;
    this.session = options.session;
    this.iteratorId = options.iteratorId;
    this.iteratorType = options.iteratorType;
    this.sequenceNumber = options.sequenceNumber;
    this.parent = options.parent;
    this.logger = options.logger ?? new NoopLogger();
    this.metrics = options.metrics ?? new NoopMetricsCollector();
  }

  get exhausted(): boolean {
    return this.iteratorId === EXHAUSTED_SENTINEL;
  }

  /**
   * This shard's position, without its children.
   */
  get token(): ShardToken {
    const token: ShardToken = { shard_id: this.shardId };
    if (this.iteratorType !== undefined) {
      token.iterator_type = this.iteratorType;
    }
    if (this.sequenceNumber !== undefined) {
      token.sequence_number = this.sequenceNumber;
    }
    if (this.parent !== undefined) {
      token.parent = this.parent.shardId;
    }
    return token;
  }

  /**
   * Same shard, same iterator, and the same children.
   */
  equals(other: Shard): boolean {
    if (this.streamArn !== other.streamArn || this.iteratorId !== other.iteratorId) {
      return false;
    }
    const mine = this.token;
    const theirs = other.token;
    if (
      mine.shard_id !== theirs.shard_id ||
      mine.iterator_type !== theirs.iterator_type ||
      mine.sequence_number !== theirs.sequence_number ||
      mine.parent !== theirs.parent
    ) {
      return false;
    }
    const childIds = new Set(this.children.map(child => child.shardId));
    const otherIds = new Set(other.children.map(child => child.shardId));
    return childIds.size === otherIds.size && [...childIds].every(id => otherIds.has(id));
  }

  /**
   * This shard and every descendant, breadth first.
   */
  *walkTree(): Generator<Shard> {
    const queue: Shard[] = [this];
    for (let shard = queue.shift(); shard !== undefined; shard = queue.shift()) {
      yield shard;
      queue.push(...shard.children);
    }
  }

  /**
   * Fetches a new iterator for the position.
   *
   * @throws {RecordsExpiredError} when `sequenceNumber` is past the trim horizon
   */
  async jumpTo(iteratorType: ShardIteratorType, sequenceNumber?: string): Promise<void> {
    if (!isShardIteratorType(iteratorType)) {
      throw new InvalidShardIteratorTypeError(iteratorType);
    }
    const relative = iteratorType === 'trim_horizon' || iteratorType === 'latest';
    if (!relative && sequenceNumber === undefined) {
      throw new InvalidStreamError(`Iterator type ${iteratorType} needs a sequence number`);
    }
    this.iteratorId = await this.session.getShardIterator({
      streamArn: this.streamArn,
      shardId: this.shardId,
      iteratorType,
      sequenceNumber: relative ? undefined : sequenceNumber,
    });
    this.iteratorType = iteratorType;
    this.sequenceNumber = relative ? undefined : sequenceNumber;
    this.emptyResponses = 0;
  }

  /**
   * Records from the current position, refreshing an expired iterator from
   * the stored sequence number. A position past the trim horizon, found
   * while fetching or while refreshing, restarts from `trim_horizon`.
   *
   * @throws {ShardIteratorExpiredError} when a relative iterator expired
   */
  async next(): Promise<StreamRecord[]> {
    try {
      return await this.getRecords();
    } catch (error) {
      if (error instanceof ShardIteratorExpiredError) {
        if (this.iteratorType === undefined || this.sequenceNumber === undefined) {
          throw error;
        }
        this.metrics.incrementCounter(MapperMetricNames.ITERATOR_REFRESHES);
        this.logger.debug('Refreshing expired shard iterator', {
          shardId: this.shardId,
          iteratorType: this.iteratorType,
          sequenceNumber: this.sequenceNumber,
        });
        try {
          await this.jumpTo(this.iteratorType, this.sequenceNumber);
        } catch (refreshError) {
          if (!(refreshError instanceof RecordsExpiredError)) {
            throw refreshError;
          }
          await this.restartFromTrimHorizon();
        }
        return await this.getRecords();
      }
      if (error instanceof RecordsExpiredError) {
        await this.restartFromTrimHorizon();
        return await this.getRecords();
      }
      throw error;
    }
  }

  private async restartFromTrimHorizon(): Promise<void> {
    this.logger.warn('Shard position is past the trim horizon; restarting from trim_horizon', {
      shardId: this.shardId,
      sequenceNumber: this.sequenceNumber,
    });
    await this.jumpTo('trim_horizon');
  }

  /**
   * One GetRecords call, or up to {@link CALLS_TO_REACH_HEAD} calls while
   * the responses come back empty. A shard that already made that many empty
   * calls in a row makes exactly one.
   */
  async getRecords(): Promise<StreamRecord[]> {
    if (this.exhausted) {
      return [];
    }
    if (this.emptyResponses >= CALLS_TO_REACH_HEAD) {
      return this.applyResponse(await this.session.getStreamRecords(this.requireIterator()));
    }
    while (this.emptyResponses < CALLS_TO_REACH_HEAD && !this.exhausted) {
      const records = this.applyResponse(await this.session.getStreamRecords(this.requireIterator()));
      if (records.length > 0) {
        return records;
      }
    }
    return [];
  }

  /**
   * Moves to the first record created at or after `position`, scanning from
   * the trim horizon. Returns the records from that point in the batch that
   * reached it; an empty list means the shard ran out (or reached its head)
   * first.
   */
  async seekTo(position: Date): Promise<StreamRecord[]> {
    await this.jumpTo('trim_horizon');
    while (!this.exhausted && this.emptyResponses < CALLS_TO_REACH_HEAD) {
      const records = await this.getRecords();
      const last = records[records.length - 1];
      if (last !== undefined && last.meta.createdAt.getTime() >= position.getTime()) {
        for (let index = records.length - 1; index >= 0; index--) {
          if (records[index].meta.createdAt.getTime() < position.getTime()) {
            return records.slice(index + 1);
          }
        }
        return records;
      }
    }
    return [];
  }

  /**
   * Discovers this shard's descendants, unless it already knows its children.
   */
  async loadChildren(): Promise<Shard[]> {
    if (this.children.length > 0) {
      return this.children;
    }
    const description = await this.session.describeStream(this.streamArn, this.shardId);
    const byParent = new Map<string, ShardDescription[]>();
    for (const shard of description.Shards) {
      if (shard.ParentShardId !== undefined) {
        const siblings = byParent.get(shard.ParentShardId) ?? [];
        siblings.push(shard);
        byParent.set(shard.ParentShardId, siblings);
      }
    }

    const queue: Shard[] = [this];
    for (let parent = queue.shift(); parent !== undefined; parent = queue.shift()) {
      for (const description of byParent.get(parent.shardId) ?? []) {
        const child = parent.spawn(description.ShardId);
        parent.children.push(child);
        queue.push(child);
      }
    }
    return this.children;
  }

  toString(): string {
    let details = '';
    if (this.exhausted) {
      details = 'exhausted, ';
    } else if (this.iteratorType === 'at_sequence' || this.iteratorType === 'after_sequence') {
      details = `${this.iteratorType === 'at_sequence' ? 'at_seq' : 'after_seq'}=${this.sequenceNumber}, `;
    } else if (this.iteratorType !== undefined) {
      details = `${this.iteratorType}, `;
    }
    return `<Shard[${details}id=${this.shardId}]>`;
  }

  /**
   * A new shard on the same stream with this shard as its parent.
   */
  spawn(shardId: string, position: Pick<ShardOptions, 'iteratorType' | 'sequenceNumber'> = {}): Shard {
    return new Shard({
      streamArn: this.streamArn,
      shardId,
      session: this.session,
      parent: this,
      logger: this.logger,
      metrics: this.metrics,
      ...position,
    });
  }

  private applyResponse(response: RecordsResponse): StreamRecord[] {
    const records = response.Records.map(reformatRecord);
    this.iteratorId = response.NextShardIterator ?? EXHAUSTED_SENTINEL;
    if (records.length > 0 && this.sequenceNumber === undefined) {
      this.sequenceNumber = records[0].meta.sequenceNumber;
      this.iteratorType = 'at_sequence';
    } else if (records.length === 0) {
      this.emptyResponses += 1;
    }
    return records;
  }

  private requireIterator(): string {
    if (this.iteratorId === undefined) {
      throw new InvalidStreamError(`Shard ${this.shardId} has no iterator; call jumpTo first`);
    }
    return this.iteratorId;
  }
}

export interface UnpackOptions {
  streamArn: string;
  session: Session;
  logger?: Logger;
  metrics?: MetricsCollector;
}

/**
 * Builds shards from DescribeStream output or token entries, wiring parents
 * to children. A shard whose parent isn't in the list becomes a root.
 */
export function unpackShards(
  shards: readonly (ShardDescription | ShardToken)[],
  options: UnpackOptions
): Map<string, Shard> {
  const entries = shards.map(toShardToken);
  const byId = new Map<string, Shard>();
  for (const entry of entries) {
    byId.set(
      entry.shard_id,
      new Shard({
        streamArn: options.streamArn,
        shardId: entry.shard_id,
        session: options.session,
        iteratorType: entry.iterator_type,
        sequenceNumber: entry.sequence_number,
        logger: options.logger,
        metrics: options.metrics,
      })
    );
  }
  for (const entry of entries) {
    const shard = byId.get(entry.shard_id);
    const parent = entry.parent === undefined ? undefined : byId.get(entry.parent);
    if (shard !== undefined && parent !== undefined) {
      shard.parent = parent;
      parent.children.push(shard);
    }
  }
  return byId;
}

function toShardToken(shard: ShardDescription | ShardToken): ShardToken {
  if ('ShardId' in shard) {
    return shard.ParentShardId === undefined
      ? { shard_id: shard.ShardId }
      : { shard_id: shard.ShardId, parent: shard.ParentShardId };
  }
  return shard;
}
