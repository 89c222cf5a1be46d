/**
 * Approximate time ordering across shards.
 * @module stream/buffer
 */

import type { Shard } from './shard.js';
import { type StreamRecord, compareSequenceNumbers } from './record.js';

/**
 * A buffered record and the shard it came from
 */
export interface BufferedRecord {
  record: StreamRecord;
  shard: Shard;
}

interface HeapEntry extends BufferedRecord {
  clock: number;
}

/**
 * Min-heap of records ordered by creation time, then sequence number, then
 * insertion order. Creation times are approximate (whole seconds), and
 * sequence numbers are only unique within a shard, so the clock breaks the
 * remaining ties.
 */
export class RecordBuffer {
  private readonly heap: HeapEntry[] = [];
  private monotonic = 0;

  get length(): number {
    return this.heap.length;
  }

  push(record: StreamRecord, shard: Shard): void {
    this.heap.push({ record, shard, clock: this.clock() });
    this.siftUp(this.heap.length - 1);
  }

  /**
   * Adds every pair, then restores heap order once.
   */
  pushAll(pairs: Iterable<BufferedRecord>): void {
    for (const { record, shard } of pairs) {
      this.heap.push({ record, shard, clock: this.clock() });
    }
    this.heapify();
  }

  /**
   * Removes and returns the earliest record.
   */
  pop(): BufferedRecord | undefined {
    const top = this.heap[0];
    const last = this.heap.pop();
    if (top === undefined || last === undefined) {
      return undefined;
    }
    if (this.heap.length > 0) {
      this.heap[0] = last;
      this.siftDown(0);
    }
    return { record: top.record, shard: top.shard };
  }

  peek(): BufferedRecord | undefined {
    const top = this.heap[0];
    return top === undefined ? undefined : { record: top.record, shard: top.shard };
  }

  clear(): void {
    this.heap.length = 0;
  }

  /**
   * Whether any buffered record came from `shard`.
   */
  has(shard: Shard): boolean {
    return this.heap.some(entry => entry.shard === shard);
  }

  /**
   * Drops every record that came from `shard`. Linear in the buffer size.
   */
  removeShard(shard: Shard): void {
    const kept = this.heap.filter(entry => entry.shard !== shard);
    if (kept.length !== this.heap.length) {
      this.heap.length = 0;
      this.heap.push(...kept);
      this.heapify();
    }
  }

  /**
   * Buffered records in heap order (not sorted)
   */
  entries(): BufferedRecord[] {
    return this.heap.map(({ record, shard }) => ({ record, shard }));
  }

  /**
   * Strictly increasing; steps by two and hands out the odd value between.
   */
  private clock(): number {
    this.monotonic += 2;
    return this.monotonic - 1;
  }

  private heapify(): void {
    for (let index = Math.floor(this.heap.length / 2) - 1; index >= 0; index--) {
      this.siftDown(index);
    }
  }

  private siftUp(index: number): void {
    let child = index;
    while (child > 0) {
      const parent = Math.floor((child - 1) / 2);
      if (compareEntries(this.heap[child], this.heap[parent]) >= 0) {
        return;
      }
      this.swap(child, parent);
      child = parent;
    }
  }

  private siftDown(index: number): void {
    let parent = index;
    for (;;) {
      const left = 2 * parent + 1;
      const right = left + 1;
      let smallest = parent;
      if (left < this.heap.length && compareEntries(this.heap[left], this.heap[smallest]) < 0) {
        smallest = left;
      }
      if (right < this.heap.length && compareEntries(this.heap[right], this.heap[smallest]) < 0) {
        smallest = right;
      }
      if (smallest === parent) {
        return;
      }
      this.swap(parent, smallest);
      parent = smallest;
    }
  }

  private swap(a: number, b: number): void {
    const held = this.heap[a];
    this.heap[a] = this.heap[b];
    this.heap[b] = held;
  }
}

function compareEntries(a: HeapEntry, b: HeapEntry): number {
  const byTime = a.record.meta.createdAt.getTime() - b.record.meta.createdAt.getTime();
  if (byTime !== 0) {
    return byTime;
  }
  const bySequence = compareSequenceNumbers(a.record.meta.sequenceNumber, b.record.meta.sequenceNumber);
  if (bySequence !== 0) {
    return bySequence;
  }
  return a.clock - b.clock;
}
