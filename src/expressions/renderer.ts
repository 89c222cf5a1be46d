/**
 * Renders conditions, projections and pending changes into the request
 * fields of one call.
 * @module expressions/renderer
 */

import type { AttributeValue } from '@aws-sdk/client-dynamodb';
import type { ColumnRef } from '../conditions/reference.js';
import type { ChangeTracker } from '../tracking/tracker.js';
import type { AnyColumn } from '../models/column.js';
import { ReferenceTracker } from '../conditions/reference.js';
import { EmptyCondition, type Condition } from '../conditions/condition.js';
import { type BaseModel, getAttribute, pendingAction } from '../models/model.js';
import { TypeEngine } from '../typedefs/engine.js';
import { InvalidConditionError } from '../error/categories.js';

export interface RenderOptions {
  /** Filter for a query or scan */
  filter?: Condition;
  /** Columns to read; rendered in first-seen order without duplicates */
  projection?: Iterable<ColumnRef>;
  /** Key condition for a query */
  key?: Condition;
  /** Precondition for a write */
  condition?: Condition;
  /** AND the object's tracked snapshot into the precondition */
  atomic?: boolean;
  /** Render the object's pending changes as an update */
  update?: boolean;
}

/**
 * Request fields produced by {@link ExpressionRenderer.render}. Only the
 * requested expressions are present, and the attribute maps only when
 * non-empty.
 */
export interface RenderedExpressions {
  ConditionExpression?: string;
  FilterExpression?: string;
  KeyConditionExpression?: string;
  ProjectionExpression?: string;
  UpdateExpression?: string;
  ExpressionAttributeNames?: Record<string, string>;
  ExpressionAttributeValues?: Record<string, AttributeValue>;
}

type UpdateKind = 'SET' | 'REMOVE' | 'ADD' | 'DELETE';

const UPDATE_KINDS: readonly UpdateKind[] = ['SET', 'REMOVE', 'ADD', 'DELETE'];

/**
 * Renders every expression of a request through one shared placeholder
 * tracker, so names are de-duplicated across them.
 *
 * @example
 * ```typescript
 * const renderer = new ExpressionRenderer(tracker);
 * const fields = renderer.render(user, { condition: User.meta.columns.age.ge(18), atomic: true, update: true });
 * // { ConditionExpression, UpdateExpression, ExpressionAttributeNames, ExpressionAttributeValues }
 * ```
 */
export class ExpressionRenderer {
  constructor(
    private readonly changes: ChangeTracker,
    private readonly typeEngine: TypeEngine = new TypeEngine()
  ) {}

  /**
   * @param obj - Target of `atomic` and `update`
   * @throws {InvalidConditionError} when a condition can't be rendered, or
   * `atomic`/`update` is requested without an object
   */
  render(obj: BaseModel | undefined, options: RenderOptions): RenderedExpressions {
    if ((options.atomic || options.update) && obj === undefined) {
      throw new InvalidConditionError('An object is required to render an atomic condition or an update');
    }
    const refs = new ReferenceTracker(this.typeEngine);
    const rendered: RenderedExpressions = {};

    if (options.filter !== undefined) {
      setIfDefined(rendered, 'FilterExpression', options.filter.render(refs));
    }
    if (options.projection !== undefined) {
      rendered.ProjectionExpression = this.renderProjection(refs, options.projection);
    }
    if (options.key !== undefined) {
      setIfDefined(rendered, 'KeyConditionExpression', options.key.render(refs));
    }

    let condition: Condition = options.condition ?? new EmptyCondition();
    if (options.atomic && obj !== undefined) {
      condition = condition.and(this.changes.getSnapshot(obj));
    }
    setIfDefined(rendered, 'ConditionExpression', condition.render(refs));

    if (options.update && obj !== undefined) {
      setIfDefined(rendered, 'UpdateExpression', this.renderUpdate(refs, obj));
    }

    const names = refs.attributeNames;
    if (Object.keys(names).length > 0) {
      rendered.ExpressionAttributeNames = names;
    }
    const values = refs.attributeValues;
    if (Object.keys(values).length > 0) {
      rendered.ExpressionAttributeValues = values;
    }
    return rendered;
  }

  private renderProjection(refs: ReferenceTracker, columns: Iterable<ColumnRef>): string {
    const seen = new Set<ColumnRef>();
    const names: string[] = [];
    for (const column of columns) {
      if (!seen.has(column)) {
        seen.add(column);
        names.push(refs.nameRef(column).name);
      }
    }
    if (names.length === 0) {
      throw new InvalidConditionError("Can't render an empty projection");
    }
    return names.join(', ');
  }

  /**
   * Marked non-key columns, in wire-name order. A present value is SET, a
   * missing one REMOVEd; pending actions render as ADD or DELETE.
   */
  private renderUpdate(refs: ReferenceTracker, obj: BaseModel): string | undefined {
    const clauses = new Map<UpdateKind, string[]>(UPDATE_KINDS.map(kind => [kind, []]));
    const columns = [...this.changes.getMarked(obj)]
      .filter(column => !column.isKey)
      .sort((a, b) => compare(a.dynamoName, b.dynamoName));

    for (const column of columns) {
      const [kind, entry] = this.renderUpdateEntry(refs, obj, column);
      clauses.get(kind)?.push(entry);
    }

    const rendered = UPDATE_KINDS.flatMap(kind => {
      const entries = clauses.get(kind) ?? [];
      return entries.length > 0 ? [`${kind} ${entries.join(', ')}`] : [];
    });
    return rendered.length > 0 ? rendered.join(' ') : undefined;
  }

  private renderUpdateEntry(refs: ReferenceTracker, obj: BaseModel, column: AnyColumn): [UpdateKind, string] {
    const action = pendingAction(obj, column);
    if (action !== undefined && (action.type === 'add' || action.type === 'delete')) {
      const nref = refs.nameRef(column);
      const wire = this.typeEngine.dump(column.typedef, action.value);
      if (wire === undefined) {
        refs.popRefs(nref);
        throw new InvalidConditionError(`Can't ${action.type.toUpperCase()} an empty value to ${column.name}`);
      }
      const vref = refs.valueRef(column, [], wire, { dumped: true });
      return [action.type === 'add' ? 'ADD' : 'DELETE', `${nref.name} ${vref.name}`];
    }

    const nref = refs.nameRef(column);
    const wire = this.typeEngine.dump(column.typedef, getAttribute(obj, column));
    if (wire === undefined) {
      return ['REMOVE', nref.name];
    }
    const vref = refs.valueRef(column, [], wire, { dumped: true });
    return ['SET', `${nref.name}=${vref.name}`];
  }
}

function setIfDefined(
  target: RenderedExpressions,
  key: 'FilterExpression' | 'KeyConditionExpression' | 'ConditionExpression' | 'UpdateExpression',
  value: string | undefined
): void {
  if (value !== undefined) {
    target[key] = value;
  }
}

function compare(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
