/**
 * Condition factories shared by columns and document paths.
 * @module conditions/comparable
 */

import type { PathSegment } from '../typedefs/types.js';
import type { ColumnRef } from './reference.js';
import {
  BeginsWithCondition,
  BetweenCondition,
  ComparisonCondition,
  ContainsCondition,
  ExistsCondition,
  InCondition,
} from './condition.js';

/**
 * Builds conditions against one attribute, or a path inside it.
 *
 * `eq(null)`/`isNull()` renders as `attribute_not_exists`, and
 * `ne(null)`/`isNotNull()` as `attribute_exists`.
 */
export abstract class Comparable<T> {
  protected abstract get target(): ColumnRef;
  protected abstract get segments(): readonly PathSegment[];

  /**
   * Comparison by operator symbol: `==`, `!=`, `<`, `<=`, `>` or `>=`.
   *
   * @throws {InvalidComparisonOperatorError} for any other operator
   */
  compare(operator: string, value: T | null | undefined): ComparisonCondition {
    return new ComparisonCondition(this.target, operator, value, this.segments);
  }

  eq(value: T | null | undefined): ComparisonCondition {
    return this.compare('==', value);
  }

  ne(value: T | null | undefined): ComparisonCondition {
    return this.compare('!=', value);
  }

  lt(value: T): ComparisonCondition {
    return this.compare('<', value);
  }

  le(value: T): ComparisonCondition {
    return this.compare('<=', value);
  }

  gt(value: T): ComparisonCondition {
    return this.compare('>', value);
  }

  ge(value: T): ComparisonCondition {
    return this.compare('>=', value);
  }

  isNull(): ComparisonCondition {
    return this.eq(null);
  }

  isNotNull(): ComparisonCondition {
    return this.ne(null);
  }

  exists(): ExistsCondition {
    return new ExistsCondition(this.target, false, this.segments);
  }

  notExists(): ExistsCondition {
    return new ExistsCondition(this.target, true, this.segments);
  }

  beginsWith(value: T): BeginsWithCondition {
    return new BeginsWithCondition(this.target, value, this.segments);
  }

  /**
   * For strings, a substring; for sets and lists, a single element.
   */
  contains(value: unknown): ContainsCondition {
    return new ContainsCondition(this.target, value, this.segments);
  }

  between(lower: T, upper: T): BetweenCondition {
    return new BetweenCondition(this.target, lower, upper, this.segments);
  }

  in(values: readonly T[]): InCondition {
    return new InCondition(this.target, values, this.segments);
  }

  /**
   * A document path below this attribute.
   *
   * @example
   * ```typescript
   * User.meta.columns.address.path('city').eq('Paris');
   * User.meta.columns.tags.path(0).exists();
   * ```
   */
  path(...segments: PathSegment[]): PathRef {
    return new PathRef(this.target, [...this.segments, ...segments]);
  }
}

/**
 * A document path inside a column. Values at a path are typed by walking the
 * column's type, so they are only checked when rendered.
 */
export class PathRef extends Comparable<unknown> {
  private readonly column: ColumnRef;
  private readonly pathSegments: readonly PathSegment[];

  constructor(column: ColumnRef, segments: readonly PathSegment[]) {
    super();
    this.column = column;
    this.pathSegments = segments;
  }

  protected get target(): ColumnRef {
    return this.column;
  }

  protected get segments(): readonly PathSegment[] {
    return this.pathSegments;
  }
}
