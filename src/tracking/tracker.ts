/**
 * Change tracking: which fields of an object changed, and what the table held
 * when the object was last synchronized.
 * @module tracking/tracker
 */

import type { AnyColumn } from '../models/column.js';
import { type BaseModel, getAttribute, metaOf, pendingAction } from '../models/model.js';
import { ComparisonCondition, EmptyCondition, type Condition } from '../conditions/condition.js';
import { TypeEngine } from '../typedefs/engine.js';

interface TrackingRecord {
  readonly marked: Set<AnyColumn>;
  snapshot: Condition | undefined;
}

/**
 * Per-object tracking state, held weakly so an object's record goes away
 * with the object.
 *
 * Marks persist across syncs; a field that was ever set or deleted keeps
 * taking part in updates and snapshots.
 */
export class ChangeTracker {
  private readonly records = new WeakMap<BaseModel, TrackingRecord>();

  constructor(private readonly typeEngine: TypeEngine = new TypeEngine()) {}

  /**
   * Records that `column` was set or deleted on `obj`.
   */
  mark(obj: BaseModel, column: AnyColumn): void {
    this.recordFor(obj).marked.add(column);
  }

  unmark(obj: BaseModel, column: AnyColumn): void {
    this.records.get(obj)?.marked.delete(column);
  }

  getMarked(obj: BaseModel): ReadonlySet<AnyColumn> {
    return this.records.get(obj)?.marked ?? new Set();
  }

  /**
   * The condition an atomic write expects the stored item to meet. An object
   * that was never synchronized expects every column to be missing.
   */
  getSnapshot(obj: BaseModel): Condition {
    const record = this.recordFor(obj);
    if (record.snapshot === undefined) {
      let snapshot: Condition = new EmptyCondition();
      for (const column of byDynamoName(metaOf(obj).columnList)) {
        snapshot = snapshot.and(column.isNull());
      }
      record.snapshot = snapshot;
    }
    return record.snapshot;
  }

  /**
   * Rebuilds the snapshot from the marked non-key columns after a load or
   * save. Values are dumped now, so later in-place changes to a collection
   * don't leak into the snapshot. Columns with a pending ADD or DELETE are
   * left out: their stored value is no longer known.
   */
  sync(obj: BaseModel): void {
    const record = this.recordFor(obj);
    let snapshot: Condition = new EmptyCondition();
    const columns = [...record.marked].filter(column => !column.isKey && pendingAction(obj, column) === undefined);
    for (const column of byDynamoName(columns)) {
      const expected = new ComparisonCondition(
        column,
        '==',
        this.typeEngine.dump(column.typedef, getAttribute(obj, column))
      );
      expected.dumped = true;
      snapshot = snapshot.and(expected);
    }
    record.snapshot = snapshot;
  }

  /**
   * Forgets the snapshot after a delete; the next atomic write expects a
   * missing item again.
   */
  clear(obj: BaseModel): void {
    const record = this.records.get(obj);
    if (record !== undefined) {
      record.snapshot = undefined;
    }
  }

  private recordFor(obj: BaseModel): TrackingRecord {
    let record = this.records.get(obj);
    if (record === undefined) {
      record = { marked: new Set(), snapshot: undefined };
      this.records.set(obj, record);
    }
    return record;
  }
}

function byDynamoName(columns: readonly AnyColumn[]): AnyColumn[] {
  return [...columns].sort((a, b) => (a.dynamoName < b.dynamoName ? -1 : a.dynamoName > b.dynamoName ? 1 : 0));
}
