/**
 * Typed stream over one model's table.
 * @module stream/stream
 */

import type { AttributeMap } from '../typedefs/wire.js';
import type { AnyColumn } from '../models/column.js';
import type { BaseModel, ModelClass } from '../models/model.js';
import type { StreamView } from '../models/meta.js';
import type { Coordinator, StreamPosition } from './coordinator.js';
import type { RecordMeta } from './record.js';
import type { StreamToken } from './tokens.js';
import { InvalidStreamError } from '../error/categories.js';

/**
 * Builds an object from an image, reading only the `expected` columns.
 */
export type RecordUnpacker<M extends BaseModel> = (attrs: AttributeMap, expected: readonly AnyColumn[]) => M;

/**
 * A stream record with its images loaded as objects. An image is `null` when
 * the record doesn't carry it, or the stream wasn't declared to include it.
 */
export interface ModelStreamRecord<M extends BaseModel> {
  key: M | null;
  new: M | null;
  old: M | null;
  meta: RecordMeta;
}

/**
 * Iterates the changes to a model's table.
 *
 * `next()` never waits for new records; poll it, and back off when it
 * returns `undefined`.
 *
 * @example
 * ```typescript
 * const stream = await engine.stream(User, 'trim_horizon');
 * for (;;) {
 *   const record = await stream.next();
 *   if (record === undefined) {
 *     await sleep(2000);
 *     continue;
 *   }
 *   console.log(record.meta.event.type, record.new?.id);
 *   saveToken(stream.token);
 * }
 * ```
 */
export class Stream<M extends BaseModel> {
  readonly model: ModelClass<M>;
  readonly coordinator: Coordinator;
  private readonly unpack: RecordUnpacker<M>;

  constructor(model: ModelClass<M>, coordinator: Coordinator, unpack: RecordUnpacker<M>) {
    if (model.meta.stream === undefined) {
      throw new InvalidStreamError(`${model.name} does not declare a stream`);
    }
    this.model = model;
    this.coordinator = coordinator;
    this.unpack = unpack;
  }

  async next(): Promise<ModelStreamRecord<M> | undefined> {
    const record = await this.coordinator.next();
    if (record === undefined) {
      return undefined;
    }
    const meta = this.model.meta;
    const include: ReadonlySet<StreamView> = meta.stream?.include ?? new Set();
    return {
      key: include.has('keys') && record.key !== null ? this.unpack(record.key, meta.keys) : null,
      new: include.has('new') && record.new !== null ? this.unpack(record.new, meta.columnList) : null,
      old: include.has('old') && record.old !== null ? this.unpack(record.old, meta.columnList) : null,
      meta: record.meta,
    };
  }

  /**
   * Yields the records available now, then ends.
   */
  async *[Symbol.asyncIterator](): AsyncGenerator<ModelStreamRecord<M>> {
    for (let record = await this.next(); record !== undefined; record = await this.next()) {
      yield record;
    }
  }

  async heartbeat(): Promise<void> {
    await this.coordinator.heartbeat();
  }

  async moveTo(position: StreamPosition): Promise<void> {
    await this.coordinator.moveTo(position);
  }

  get token(): StreamToken {
    return this.coordinator.token;
  }

  toString(): string {
    return `<Stream[${this.model.name}]>`;
  }
}
