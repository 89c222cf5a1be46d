/**
 * Merges every shard of a stream into one approximately ordered feed.
 * @module stream/coordinator
 */

import type { Session } from '../session/session.js';
import { type Shard, unpackShards } from './shard.js';
import { RecordBuffer } from './buffer.js';
import type { StreamRecord } from './record.js';
import { type StreamToken, isStreamTokenLike, parseStreamToken } from './tokens.js';
import { InvalidPositionError, InvalidStreamError, RecordsExpiredError } from '../error/categories.js';
import { type Logger, NoopLogger } from '../observability/logging.js';
import { type MetricsCollector, NoopMetricsCollector, MapperMetricNames } from '../observability/metrics.js';

/**
 * Where to move a stream: either end, the first record at or after a time,
 * or a saved token.
 */
export type StreamPosition = 'trim_horizon' | 'latest' | Date | StreamToken;

export interface CoordinatorOptions {
  session: Session;
  streamArn: string;
  logger?: Logger;
  metrics?: MetricsCollector;
  /** Current time, for deciding whether a date is in the future */
  now?: () => Date;
}

/**
 * Owns the shard forest of one stream. Roots are shards without a parent;
 * active shards are the ones being read. A record only moves its shard's
 * position once it is handed out by {@link Coordinator.next}.
 *
 * Nothing here runs in the background or sleeps: callers poll `next()` and
 * back off themselves when it returns `undefined`, and call `heartbeat()`
 * often enough to keep relative iterators alive.
 */
export class Coordinator {
  readonly session: Session;
  readonly streamArn: string;
  roots: Shard[] = [];
  active: Shard[] = [];
  readonly buffer = new RecordBuffer();
  private readonly logger: Logger;
  private readonly metrics: MetricsCollector;
  private readonly now: () => Date;

  constructor(options: CoordinatorOptions) {
    this.session = options.session;
    this.streamArn = options.streamArn;
    this.logger = options.logger ?? new NoopLogger();
    this.metrics = options.metrics ?? new NoopMetricsCollector();
    this.now = options.now ?? (() => new Date());
  }

  /**
   * The next record across all active shards, or `undefined` when none is
   * available right now.
   */
  async next(): Promise<StreamRecord | undefined> {
    if (this.buffer.length === 0) {
      await this.advanceShards();
    }
    const next = this.buffer.pop();
    if (next === undefined) {
      return undefined;
    }
    next.shard.sequenceNumber = next.record.meta.sequenceNumber;
    next.shard.iteratorType = 'after_sequence';
    this.metrics.incrementCounter(MapperMetricNames.RECORDS_READ);
    return next.record;
  }

  /**
   * Reads once from every active shard, unless records are still buffered.
   * Each shard's records are buffered as soon as they arrive, so a failing
   * shard doesn't discard what the others returned. Exhausted shards are
   * replaced by their children before and after reading.
   */
  async advanceShards(): Promise<void> {
    if (this.buffer.length > 0) {
      return;
    }
    await this.promoteExhausted();
    for (const shard of [...this.active]) {
      const records = await shard.next();
      this.buffer.pushAll(records.map(record => ({ record, shard })));
    }
    await this.promoteExhausted();
  }

  /**
   * Reads from active shards that don't have a sequence number yet, so they
   * get one before their iterator expires. Call at least every 15 minutes.
   */
  async heartbeat(): Promise<void> {
    for (const shard of [...this.active]) {
      if (shard.sequenceNumber === undefined) {
        const records = await shard.next();
        if (records.length > 0) {
          this.buffer.pushAll(records.map(record => ({ record, shard })));
        }
      }
    }
    await this.promoteExhausted();
  }

  /**
   * @throws {InvalidPositionError} for anything but an endpoint, a date or a token
   * @throws {InvalidStreamError} when a token has nothing in common with the stream
   */
  async moveTo(position: StreamPosition): Promise<void> {
    const value: unknown = position;
    if (value === 'trim_horizon' || value === 'latest') {
      await this.moveToEndpoint(value);
    } else if (value instanceof Date) {
      await this.moveToTime(value);
    } else if (isStreamTokenLike(value)) {
      await this.moveToToken(parseStreamToken(value));
    } else {
      throw new InvalidPositionError(value);
    }
  }

  /**
   * Drops a shard from the roots and active shards, putting its children in
   * whichever of those it held, and discards its buffered records.
   */
  removeShard(shard: Shard): void {
    const rootIndex = this.roots.indexOf(shard);
    if (rootIndex >= 0) {
      this.roots.splice(rootIndex, 1);
      this.roots.push(...shard.children);
    }
    const activeIndex = this.active.indexOf(shard);
    if (activeIndex >= 0) {
      this.active.splice(activeIndex, 1);
      this.active.push(...shard.children);
    }
    this.buffer.removeShard(shard);
  }

  /**
   * The current position of every known shard.
   */
  get token(): StreamToken {
    const shards = this.roots.flatMap(root => [...root.walkTree()].map(shard => shard.token));
    return {
      stream_arn: this.streamArn,
      active: this.active.map(shard => shard.shardId),
      shards,
    };
  }

  /**
   * Replaces exhausted active shards with their children. A shard with
   * records still in the buffer stays, so the token keeps its position until
   * the last of them is handed out.
   */
  private async promoteExhausted(): Promise<void> {
    for (const shard of this.active.filter(active => active.exhausted && !this.buffer.has(active))) {
      await shard.loadChildren();
      for (const child of shard.children) {
        await child.jumpTo('trim_horizon');
      }
      this.active.splice(this.active.indexOf(shard), 1, ...shard.children);
      const rootIndex = this.roots.indexOf(shard);
      if (rootIndex >= 0) {
        this.roots.splice(rootIndex, 1, ...shard.children);
      }
      this.metrics.incrementCounter(MapperMetricNames.SHARDS_PROMOTED, shard.children.length);
      this.logger.debug('Shard exhausted', {
        shardId: shard.shardId,
        children: shard.children.map(child => child.shardId),
      });
    }
  }

  private reset(): void {
    this.roots = [];
    this.active = [];
    this.buffer.clear();
  }

  private async loadForest(): Promise<Map<string, Shard>> {
    const description = await this.session.describeStream(this.streamArn);
    return unpackShards(description.Shards, {
      streamArn: this.streamArn,
      session: this.session,
      logger: this.logger,
      metrics: this.metrics,
    });
  }

  private async moveToEndpoint(endpoint: 'trim_horizon' | 'latest'): Promise<void> {
    this.reset();
    const byId = await this.loadForest();
    const shards = [...byId.values()];
    this.roots = shards.filter(shard => shard.parent === undefined);
    this.active = endpoint === 'trim_horizon' ? [...this.roots] : shards.filter(shard => shard.children.length === 0);
    for (const shard of this.active) {
      await shard.jumpTo(endpoint);
    }
  }

  private async moveToTime(position: Date): Promise<void> {
    if (position.getTime() > this.now().getTime()) {
      await this.moveToEndpoint('latest');
      return;
    }
    this.reset();
    const byId = await this.loadForest();
    this.roots = [...byId.values()].filter(shard => shard.parent === undefined);

    const queue = [...this.roots];
    for (let shard = queue.shift(); shard !== undefined; shard = queue.shift()) {
      const records = await shard.seekTo(position);
      if (records.length > 0 || !shard.exhausted) {
        const found = shard;
        this.active.push(found);
        this.buffer.pushAll(records.map(record => ({ record, shard: found })));
      } else {
        queue.push(...shard.children);
      }
    }
  }

  private async moveToToken(token: StreamToken): Promise<void> {
    if (token.stream_arn !== this.streamArn) {
      throw new InvalidStreamError(`Token is for stream ${token.stream_arn}, not ${this.streamArn}`);
    }
    this.reset();
    const byId = unpackShards(token.shards, {
      streamArn: this.streamArn,
      session: this.session,
      logger: this.logger,
      metrics: this.metrics,
    });
    this.roots = [...byId.values()].filter(shard => shard.parent === undefined);
    for (const shardId of token.active) {
      const shard = byId.get(shardId);
      if (shard === undefined) {
        throw new InvalidStreamError(`Token marks unknown shard ${shardId} as active`);
      }
      this.active.push(shard);
    }

    const live = await this.loadForest();
    const unverified = [...this.roots];
    for (let shard = unverified.shift(); shard !== undefined; shard = unverified.shift()) {
      if (!live.has(shard.shardId)) {
        this.logger.info('Pruning unknown or expired shard from stream token', { shardId: shard.shardId });
        this.removeShard(shard);
        unverified.push(...shard.children);
      }
    }
    if (this.roots.length === 0) {
      throw new InvalidStreamError('This token has no relation to the actual stream');
    }

    for (const shard of this.active) {
      const iteratorType = shard.iteratorType ?? 'trim_horizon';
      try {
        await shard.jumpTo(iteratorType, shard.sequenceNumber);
      } catch (error) {
        if (!(error instanceof RecordsExpiredError)) {
          throw error;
        }
        this.logger.info('Token position is past the trim horizon; starting shard from trim_horizon', {
          shardId: shard.shardId,
          sequenceNumber: shard.sequenceNumber,
        });
        await shard.jumpTo('trim_horizon');
      }
    }
  }
}
