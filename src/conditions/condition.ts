/**
 * Condition trees: the boolean predicates behind condition, filter and key
 * expressions.
 *
 * Conditions compose with `and`, `or` and `not`. The empty condition is the
 * identity for both `and` and `or`, and negating it gives itself back.
 * Combining a meta condition (`and`/`or`) with another of the same kind
 * flattens into one node.
 *
 * @example
 * ```typescript
 * const { age, email } = User.meta.columns;
 * const condition = age.ge(18).and(email.beginsWith('admin@')).or(email.notExists());
 * ```
 * @module conditions/condition
 */

import type { PathSegment } from '../typedefs/types.js';
import type { ColumnRef, Reference, ReferenceTracker } from './reference.js';
import { deepEqual } from '../util/equal.js';
import { InvalidComparisonOperatorError, InvalidConditionError } from '../error/categories.js';

export type ConditionOperation =
  | 'empty'
  | 'and'
  | 'or'
  | 'not'
  | 'comparison'
  | 'exists'
  | 'begins_with'
  | 'between'
  | 'contains'
  | 'in';

export type ComparisonOperator = '==' | '!=' | '<' | '<=' | '>' | '>=';

const COMPARISON_ALIASES: Record<ComparisonOperator, string> = {
  '==': '=',
  '!=': '<>',
  '<': '<',
  '<=': '<=',
  '>': '>',
  '>=': '>=',
};

export function isComparisonOperator(value: string): value is ComparisonOperator {
  return Object.prototype.hasOwnProperty.call(COMPARISON_ALIASES, value);
}

/**
 * Base of every condition node.
 */
export abstract class Condition {
  abstract readonly operation: ConditionOperation;

  /**
   * Whether leaf values are already in wire format
   */
  dumped = false;

  /**
   * Number of distinct leaf conditions in the tree. Cycles are counted once.
   */
  get length(): number {
    let count = 0;
    for (const condition of iterConditions(this)) {
      if (!isMetaCondition(condition) && condition.operation !== 'empty') {
        count += 1;
      }
    }
    return count;
  }

  and(other: Condition): Condition {
    if (other.length === 0) {
      return this;
    }
    if (other instanceof AndCondition) {
      return new AndCondition(this, ...other.values);
    }
    return new AndCondition(this, other);
  }

  or(other: Condition): Condition {
    if (other.length === 0) {
      return this;
    }
    if (other instanceof OrCondition) {
      return new OrCondition(this, ...other.values);
    }
    return new OrCondition(this, other);
  }

  not(): Condition {
    return new NotCondition(this);
  }

  /**
   * Structural equality; safe on cyclic trees.
   */
  equals(other: Condition): boolean {
    return conditionsEqual(this, other, new Map());
  }

  /**
   * Renders the tree into wire syntax, allocating placeholders from `tracker`.
   * Returns `undefined` for the empty condition.
   *
   * @throws {InvalidConditionError} when the tree can't be rendered; every
   * placeholder the failed subtree allocated has been released
   */
  abstract render(tracker: ReferenceTracker, visiting?: Set<Condition>): string | undefined;

  /**
   * Compares this node's own fields, not its children.
   */
  abstract sameShape(other: Condition): boolean;
}

/**
 * The empty condition, for building conditions up iteratively.
 *
 * @example
 * ```typescript
 * let condition: Condition = new EmptyCondition();
 * for (const value of [1, 2, 3]) {
 *   condition = condition.and(Model.meta.columns.field.ne(value));
 * }
 * ```
 */
export class EmptyCondition extends Condition {
  readonly operation = 'empty' as const;

  override and(other: Condition): Condition {
    return other;
  }

  override or(other: Condition): Condition {
    return other;
  }

  override not(): Condition {
    return this;
  }

  render(): string | undefined {
    return undefined;
  }

  sameShape(other: Condition): boolean {
    return other instanceof EmptyCondition;
  }
}

// ============================================================================
// Meta conditions
// ============================================================================

abstract class MultiCondition extends Condition {
  readonly values: Condition[];
  protected abstract readonly joiner: 'AND' | 'OR';

  constructor(...values: Condition[]) {
    super();
    this.values = values;
  }

  render(tracker: ReferenceTracker, visiting: Set<Condition> = new Set()): string | undefined {
    return renderGuarded(this, tracker, visiting, () => {
      const rendered: string[] = [];
      for (const child of this.values) {
        const result = child.render(tracker, visiting);
        if (result !== undefined) {
          rendered.push(result);
        }
      }
      if (rendered.length === 0) {
        throw new InvalidConditionError(`Can't render an empty ${this.joiner} condition`);
      }
      if (rendered.length === 1) {
        return rendered[0];
      }
      return `(${rendered.join(` ${this.joiner} `)})`;
    });
  }

  sameShape(other: Condition): boolean {
    return other.operation === this.operation;
  }
}

export class AndCondition extends MultiCondition {
  readonly operation = 'and' as const;
  protected readonly joiner = 'AND' as const;

  override and(other: Condition): Condition {
    if (other.length === 0) {
      return this;
    }
    if (other instanceof AndCondition) {
      return new AndCondition(...this.values, ...other.values);
    }
    return new AndCondition(...this.values, other);
  }

  /**
   * Extends this node instead of building a new one.
   */
  andInPlace(other: Condition): this {
    if (other instanceof AndCondition) {
      this.values.push(...other.values);
    } else if (other.length > 0) {
      this.values.push(other);
    }
    return this;
  }
}

export class OrCondition extends MultiCondition {
  readonly operation = 'or' as const;
  protected readonly joiner = 'OR' as const;

  override or(other: Condition): Condition {
    if (other.length === 0) {
      return this;
    }
    if (other instanceof OrCondition) {
      return new OrCondition(...this.values, ...other.values);
    }
    return new OrCondition(...this.values, other);
  }

  /**
   * Extends this node instead of building a new one.
   */
  orInPlace(other: Condition): this {
    if (other instanceof OrCondition) {
      this.values.push(...other.values);
    } else if (other.length > 0) {
      this.values.push(other);
    }
    return this;
  }
}

export class NotCondition extends Condition {
  readonly operation = 'not' as const;
  readonly values: [Condition];

  constructor(value: Condition) {
    super();
    this.values = [value];
  }

  override not(): Condition {
    return this.values[0];
  }

  render(tracker: ReferenceTracker, visiting: Set<Condition> = new Set()): string | undefined {
    return renderGuarded(this, tracker, visiting, () => {
      const inner = this.values[0].render(tracker, visiting);
      if (inner === undefined) {
        throw new InvalidConditionError("Can't render a NOT of an empty condition");
      }
      return `(NOT ${inner})`;
    });
  }

  sameShape(other: Condition): boolean {
    return other instanceof NotCondition;
  }
}

export type MetaCondition = AndCondition | OrCondition | NotCondition;

export function isMetaCondition(condition: Condition): condition is MetaCondition {
  return condition instanceof MultiCondition || condition instanceof NotCondition;
}

// ============================================================================
// Leaf conditions
// ============================================================================

export abstract class LeafCondition extends Condition {
  readonly column: ColumnRef;
  readonly path: PathSegment[];
  readonly values: unknown[];

  constructor(column: ColumnRef, path: readonly PathSegment[], values: unknown[]) {
    super();
    this.column = column;
    this.path = [...path];
    this.values = values;
  }

  sameShape(other: Condition): boolean {
    return (
      other instanceof LeafCondition &&
      other.operation === this.operation &&
      other.column === this.column &&
      deepEqual(other.path, this.path) &&
      deepEqual(other.values, this.values)
    );
  }

  /**
   * Releases `refs` and fails the render.
   */
  protected fail(tracker: ReferenceTracker, refs: Reference[], message: string): never {
    tracker.popRefs(...refs);
    throw new InvalidConditionError(message, { column: this.column.name, path: this.path });
  }

  protected get printableName(): string {
    return [this.column.name, ...this.path.map(segment => `[${JSON.stringify(segment)}]`)].join('');
  }
}

export class ComparisonCondition extends LeafCondition {
  readonly operation = 'comparison' as const;
  readonly operator: ComparisonOperator;

  constructor(column: ColumnRef, operator: string, value: unknown, path: readonly PathSegment[] = []) {
    if (!isComparisonOperator(operator)) {
      throw new InvalidComparisonOperatorError(operator);
    }
    super(column, path, [value]);
    this.operator = operator;
  }

  /**
   * `== missing` and `!= missing` become existence checks; any other
   * comparison against a missing value is invalid.
   */
  render(tracker: ReferenceTracker): string {
    const nref = tracker.nameRef(this.column, this.path);
    const vref = tracker.valueRef(this.column, this.path, this.values[0], { dumped: this.dumped });

    if (vref.value === undefined) {
      tracker.popRefs(vref);
      if (this.operator === '==') {
        return `(attribute_not_exists(${nref.name}))`;
      }
      if (this.operator === '!=') {
        return `(attribute_exists(${nref.name}))`;
      }
      this.fail(tracker, [nref], `Can't compare ${this.printableName} ${this.operator} a missing value`);
    }
    return `(${nref.name} ${COMPARISON_ALIASES[this.operator]} ${vref.name})`;
  }

  override sameShape(other: Condition): boolean {
    return other instanceof ComparisonCondition && other.operator === this.operator && super.sameShape(other);
  }
}

export class ExistsCondition extends LeafCondition {
  readonly operation = 'exists' as const;
  readonly negate: boolean;

  constructor(column: ColumnRef, negate: boolean, path: readonly PathSegment[] = []) {
    super(column, path, []);
    this.negate = negate;
  }

  render(tracker: ReferenceTracker): string {
    const nref = tracker.nameRef(this.column, this.path);
    const fn = this.negate ? 'attribute_not_exists' : 'attribute_exists';
    return `(${fn}(${nref.name}))`;
  }

  override sameShape(other: Condition): boolean {
    return other instanceof ExistsCondition && other.negate === this.negate && super.sameShape(other);
  }
}

export class BeginsWithCondition extends LeafCondition {
  readonly operation = 'begins_with' as const;

  constructor(column: ColumnRef, value: unknown, path: readonly PathSegment[] = []) {
    super(column, path, [value]);
  }

  render(tracker: ReferenceTracker): string {
    const nref = tracker.nameRef(this.column, this.path);
    const vref = tracker.valueRef(this.column, this.path, this.values[0], { dumped: this.dumped });
    if (vref.value === undefined) {
      this.fail(tracker, [vref, nref], `Can't check if ${this.printableName} begins with a missing value`);
    }
    return `(begins_with(${nref.name}, ${vref.name}))`;
  }
}

export class ContainsCondition extends LeafCondition {
  readonly operation = 'contains' as const;

  constructor(column: ColumnRef, value: unknown, path: readonly PathSegment[] = []) {
    super(column, path, [value]);
  }

  render(tracker: ReferenceTracker): string {
    const nref = tracker.nameRef(this.column, this.path);
    const vref = tracker.valueRef(this.column, this.path, this.values[0], { dumped: this.dumped, inner: true });
    if (vref.value === undefined) {
      this.fail(tracker, [vref, nref], `Can't check if ${this.printableName} contains a missing value`);
    }
    return `(contains(${nref.name}, ${vref.name}))`;
  }
}

export class BetweenCondition extends LeafCondition {
  readonly operation = 'between' as const;

  constructor(column: ColumnRef, lower: unknown, upper: unknown, path: readonly PathSegment[] = []) {
    super(column, path, [lower, upper]);
  }

  render(tracker: ReferenceTracker): string {
    const nref = tracker.nameRef(this.column, this.path);
    const lower = tracker.valueRef(this.column, this.path, this.values[0], { dumped: this.dumped });
    const upper = tracker.valueRef(this.column, this.path, this.values[1], { dumped: this.dumped });
    if (lower.value === undefined || upper.value === undefined) {
      this.fail(tracker, [upper, lower, nref], `Can't check if ${this.printableName} is between a missing value`);
    }
    return `(${nref.name} BETWEEN ${lower.name} AND ${upper.name})`;
  }
}

export class InCondition extends LeafCondition {
  readonly operation = 'in' as const;

  constructor(column: ColumnRef, values: readonly unknown[], path: readonly PathSegment[] = []) {
    super(column, path, [...values]);
  }

  render(tracker: ReferenceTracker): string {
    if (this.values.length === 0) {
      throw new InvalidConditionError(`Can't check if ${this.printableName} is in an empty list`);
    }
    const nref = tracker.nameRef(this.column, this.path);
    const vrefs = this.values.map(value => tracker.valueRef(this.column, this.path, value, { dumped: this.dumped }));
    if (vrefs.some(vref => vref.value === undefined)) {
      this.fail(tracker, [...vrefs.reverse(), nref], `Can't check if ${this.printableName} is in a missing value`);
    }
    return `(${nref.name} IN (${vrefs.map(vref => vref.name).join(', ')}))`;
  }
}

// ============================================================================
// Traversal
// ============================================================================

/**
 * Yields every condition below `condition`, depth first, each distinct node
 * exactly once. A meta root is not yielded itself unless a cycle leads back
 * to it; a leaf root is yielded.
 */
export function* iterConditions(condition: Condition): Generator<Condition> {
  const visited = new Set<Condition>();
  const stack: Condition[] = isMetaCondition(condition) ? [...condition.values].reverse() : [condition];
  while (stack.length > 0) {
    const next = stack.pop();
    if (next === undefined || visited.has(next)) {
      continue;
    }
    visited.add(next);
    yield next;
    if (isMetaCondition(next)) {
      stack.push(...[...next.values].reverse());
    }
  }
}

/**
 * Yields the distinct columns referenced anywhere in a condition.
 */
export function* iterColumns(condition: Condition): Generator<ColumnRef> {
  const seen = new Set<ColumnRef>();
  for (const node of iterConditions(condition)) {
    if (node instanceof LeafCondition && !seen.has(node.column)) {
      seen.add(node.column);
      yield node.column;
    }
  }
}

export function isLeafCondition(condition: Condition): condition is LeafCondition {
  return condition instanceof LeafCondition;
}

function conditionsEqual(a: Condition, b: Condition, visited: Map<Condition, Set<Condition>>): boolean {
  if (a === b) {
    return true;
  }
  const seen = visited.get(a);
  if (seen?.has(b)) {
    // Already comparing this pair further up a cycle
    return true;
  }
  if (seen) {
    seen.add(b);
  } else {
    visited.set(a, new Set([b]));
  }

  if (a.dumped !== b.dumped || !a.sameShape(b)) {
    return false;
  }
  if (isMetaCondition(a) && isMetaCondition(b)) {
    if (a.values.length !== b.values.length) {
      return false;
    }
    return a.values.every((child, i) => conditionsEqual(child, b.values[i], visited));
  }
  return true;
}

function renderGuarded(
  node: Condition,
  tracker: ReferenceTracker,
  visiting: Set<Condition>,
  render: () => string
): string {
  if (visiting.has(node)) {
    throw new InvalidConditionError("Can't render a condition that contains itself");
  }
  visiting.add(node);
  const mark = tracker.checkpoint();
  try {
    return render();
  } catch (error) {
    tracker.rollback(mark);
    throw error;
  } finally {
    visiting.delete(node);
  }
}
