/**
 * Queries and scans.
 * @module engine/search
 */

import type { QueryCommandInput, ScanCommandInput, Select } from '@aws-sdk/client-dynamodb';
import type { Session } from '../session/session.js';
import type { SearchResponse } from '../session/types.js';
import type { AttributeMap } from '../typedefs/wire.js';
import type { AnyColumn } from '../models/column.js';
import type { Index } from '../models/indexes.js';
import type { ModelMeta } from '../models/meta.js';
import type { BaseModel } from '../models/model.js';
import type { ExpressionRenderer } from '../expressions/renderer.js';
import {
  AndCondition,
  BeginsWithCondition,
  BetweenCondition,
  ComparisonCondition,
  type Condition,
} from '../conditions/condition.js';
import { ConstraintViolationError, InvalidSearchError } from '../error/categories.js';

/**
 * Columns to read: everything, only the count, or a list of columns.
 * Key columns are always added to a list.
 */
export type SearchProjection = 'all' | 'count' | readonly AnyColumn[];

export interface ScanOptions {
  /** Scan an index instead of the table */
  index?: Index;
  filter?: Condition;
  projection?: SearchProjection;
  /** Maximum number of objects to yield */
  limit?: number;
  consistent?: boolean;
  /** One segment of a parallel scan */
  parallel?: { segment: number; totalSegments: number };
}

export interface QueryOptions extends Omit<ScanOptions, 'parallel'> {
  /** `hash == value`, optionally AND one condition on the range key */
  key: Condition;
  /** Ascending range key order; `false` reads in descending order */
  forward?: boolean;
}

/**
 * A request plus the columns objects are loaded from
 */
export interface PreparedSearch<R> {
  request: R;
  expected: readonly AnyColumn[];
}

interface SearchTarget {
  meta: ModelMeta;
  index: Index | undefined;
  tableName: string;
}

/**
 * Checks a query's key condition against the table's or index's keys.
 *
 * @throws {InvalidSearchError} unless the condition is `hash == value`,
 * optionally AND one range condition (`==`, `<`, `<=`, `>`, `>=`, between,
 * begins_with)
 */
export function validateKeyCondition(key: Condition, hashKey: AnyColumn, rangeKey: AnyColumn | undefined): void {
  const isHashCondition = (condition: Condition): boolean =>
    condition instanceof ComparisonCondition &&
    condition.operator === '==' &&
    condition.column === hashKey &&
    condition.path.length === 0 &&
    condition.values[0] !== null &&
    condition.values[0] !== undefined;

  const isRangeCondition = (condition: Condition): boolean => {
    if (rangeKey === undefined) {
      return false;
    }
    const supported =
      (condition instanceof ComparisonCondition && condition.operator !== '!=') ||
      condition instanceof BetweenCondition ||
      condition instanceof BeginsWithCondition;
    return supported && condition.column === rangeKey && condition.path.length === 0;
  };

  if (isHashCondition(key)) {
    return;
  }
  if (key instanceof AndCondition && key.values.length === 2) {
    const [first, second] = key.values;
    if ((isHashCondition(first) && isRangeCondition(second)) || (isHashCondition(second) && isRangeCondition(first))) {
      return;
    }
  }
  throw new InvalidSearchError(
    `Key condition must be ${hashKey.name} == value${rangeKey ? `, optionally AND one condition on ${rangeKey.name}` : ''}`
  );
}

function prepareCommon(
  target: SearchTarget,
  options: ScanOptions,
  renderer: ExpressionRenderer,
  key: Condition | undefined
): PreparedSearch<ScanCommandInput & QueryCommandInput> {
  const { meta, index } = target;
  if (options.consistent && index?.kind === 'gsi') {
    throw new InvalidSearchError(`Global index ${index.name} doesn't support consistent reads`);
  }
  if (options.limit !== undefined && (!Number.isInteger(options.limit) || options.limit < 0)) {
    throw new InvalidSearchError(`Limit must be a non-negative integer, got ${options.limit}`);
  }

  const available: readonly AnyColumn[] = index === undefined ? meta.columnList : [...index.projected];
  const projection = options.projection ?? 'all';
  let select: Select;
  let expected: readonly AnyColumn[];
  let projected: AnyColumn[] | undefined;

  if (projection === 'count') {
    select = 'COUNT';
    expected = [];
  } else if (projection === 'all') {
    select = index === undefined ? 'ALL_ATTRIBUTES' : 'ALL_PROJECTED_ATTRIBUTES';
    expected = available;
  } else {
    const keys = index === undefined ? meta.keys : [...meta.keys, index.hashKey, ...(index.rangeKey ? [index.rangeKey] : [])];
    const columns = [...new Set([...keys, ...projection])];
    for (const column of columns) {
      if (meta.column(column.name) !== column) {
        throw new InvalidSearchError(`${column.name} is not a column of ${meta.tableName}`);
      }
      if (index?.kind === 'gsi' && !index.projected.has(column)) {
        throw new InvalidSearchError(`Global index ${index.name} doesn't project ${column.name}`);
      }
    }
    select = 'SPECIFIC_ATTRIBUTES';
    expected = columns;
    projected = columns;
  }

  const rendered = renderer.render(undefined, { key, filter: options.filter, projection: projected });
  const request: ScanCommandInput & QueryCommandInput = {
    TableName: target.tableName,
    Select: select,
    ...rendered,
  };
  if (index !== undefined) {
    request.IndexName = index.dynamoName;
  }
  if (options.consistent !== undefined) {
    request.ConsistentRead = options.consistent;
  }
  return { request, expected };
}

export function prepareQuery(
  target: SearchTarget,
  options: QueryOptions,
  renderer: ExpressionRenderer
): PreparedSearch<QueryCommandInput> {
  const hashKey = target.index?.hashKey ?? target.meta.hashKey;
  const rangeKey = target.index === undefined ? target.meta.rangeKey : target.index.rangeKey;
  validateKeyCondition(options.key, hashKey, rangeKey);
  const prepared = prepareCommon(target, options, renderer, options.key);
  if (options.forward !== undefined) {
    prepared.request.ScanIndexForward = options.forward;
  }
  return prepared;
}

export function prepareScan(
  target: SearchTarget,
  options: ScanOptions,
  renderer: ExpressionRenderer
): PreparedSearch<ScanCommandInput> {
  const prepared = prepareCommon(target, options, renderer, undefined);
  if (options.parallel !== undefined) {
    const { segment, totalSegments } = options.parallel;
    if (!Number.isInteger(totalSegments) || totalSegments < 1 || !Number.isInteger(segment) || segment < 0 || segment >= totalSegments) {
      throw new InvalidSearchError(`Invalid parallel scan segment ${segment} of ${totalSegments}`);
    }
    prepared.request.Segment = segment;
    prepared.request.TotalSegments = totalSegments;
  }
  return prepared;
}

/**
 * Pages through a query or scan, loading each item into an object.
 *
 * Iterating again continues where the last iteration stopped; call
 * {@link SearchIterator.reset} to start over.
 *
 * @example
 * ```typescript
 * const query = engine.query(Tweet, { key: Tweet.meta.columns.account.eq('a1') });
 * for await (const tweet of query) {
 *   console.log(tweet.content);
 * }
 * console.log(query.count, query.scanned);
 * ```
 */
export class SearchIterator<M extends BaseModel> implements AsyncIterable<M> {
  /** Items returned by the service so far */
  count = 0;
  /** Items the service evaluated so far, before filtering */
  scanned = 0;
  private yielded = 0;
  private pending: AttributeMap[] = [];
  private lastEvaluatedKey: AttributeMap | undefined;
  private started = false;

  /**
   * @param request - The first page's request, attached to errors
   */
  constructor(
    private readonly fetch: PageFetcher,
    readonly request: object,
    private readonly unpack: (attrs: AttributeMap) => M,
    private readonly limit: number | undefined
  ) {}

  get exhausted(): boolean {
    const reachedLimit = this.limit !== undefined && this.yielded >= this.limit;
    return reachedLimit || (this.started && this.lastEvaluatedKey === undefined && this.pending.length === 0);
  }

  /**
   * The next object, or `undefined` when the search is done.
   */
  async next(): Promise<M | undefined> {
    if (this.limit !== undefined && this.yielded >= this.limit) {
      return undefined;
    }
    while (this.pending.length === 0) {
      if (this.started && this.lastEvaluatedKey === undefined) {
        return undefined;
      }
      await this.fetchPage();
    }
    const attrs = this.pending.shift();
    if (attrs === undefined) {
      return undefined;
    }
    this.yielded += 1;
    return this.unpack(attrs);
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<M> {
    for (let obj = await this.next(); obj !== undefined; obj = await this.next()) {
      yield obj;
    }
  }

  /**
   * Reads every page, so `count` and `scanned` cover the whole search.
   * Useful with the `count` projection.
   */
  async drain(): Promise<void> {
    while (!(this.started && this.lastEvaluatedKey === undefined)) {
      await this.fetchPage();
    }
    this.pending = [];
  }

  /**
   * The first result, from the start of the search.
   *
   * @throws {ConstraintViolationError} when there are no results
   */
  async first(): Promise<M> {
    this.reset();
    const obj = await this.next();
    if (obj === undefined) {
      throw new ConstraintViolationError('first', this.request);
    }
    return obj;
  }

  /**
   * The only result, from the start of the search.
   *
   * @throws {ConstraintViolationError} unless there is exactly one result
   */
  async one(): Promise<M> {
    this.reset();
    const obj = await this.next();
    if (obj === undefined || (await this.next()) !== undefined) {
      throw new ConstraintViolationError('one', this.request);
    }
    return obj;
  }

  /**
   * Every remaining result.
   */
  async all(): Promise<M[]> {
    const results: M[] = [];
    for await (const obj of this) {
      results.push(obj);
    }
    return results;
  }

  reset(): void {
    this.count = 0;
    this.scanned = 0;
    this.yielded = 0;
    this.pending = [];
    this.lastEvaluatedKey = undefined;
    this.started = false;
  }

  private async fetchPage(): Promise<void> {
    const page = await this.fetch(this.lastEvaluatedKey);
    this.started = true;
    this.count += page.Count;
    this.scanned += page.ScannedCount;
    this.pending.push(...page.Items);
    this.lastEvaluatedKey = page.LastEvaluatedKey;
  }
}

/**
 * Fetches the page that starts after `exclusiveStartKey`, or the first page
 */
export type PageFetcher = (exclusiveStartKey: AttributeMap | undefined) => Promise<SearchResponse>;

export function queryPages(session: Session, request: QueryCommandInput): PageFetcher {
  return exclusiveStartKey =>
    session.queryItems(exclusiveStartKey === undefined ? request : { ...request, ExclusiveStartKey: exclusiveStartKey });
}

export function scanPages(session: Session, request: ScanCommandInput): PageFetcher {
  return exclusiveStartKey =>
    session.scanItems(exclusiveStartKey === undefined ? request : { ...request, ExclusiveStartKey: exclusiveStartKey });
}
