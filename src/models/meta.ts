/**
 * Model metadata: table, columns, indexes and stream settings.
 * @module models/meta
 */

import type { AnyColumn } from './column.js';
import type { BaseModel } from './model.js';
import type { Index } from './indexes.js';
import { InvalidModelError } from '../error/categories.js';

export type StreamView = 'keys' | 'new' | 'old';

const STREAM_VIEWS: readonly StreamView[] = ['keys', 'new', 'old'];

export interface StreamOptions {
  /** Which images each stream record carries */
  include: readonly StreamView[];
}

export interface MetaOptions<C extends Record<string, AnyColumn>, I extends Record<string, Index>> {
  tableName: string;
  columns: C;
  indexes?: I;
  stream?: StreamOptions;
}

/**
 * Called with every object whose column was set or deleted.
 */
export type ModificationObserver = (obj: BaseModel, column: AnyColumn, value: unknown) => void;

/**
 * Everything the engine knows about a model class, built by {@link defineMeta}.
 */
export class ModelMeta<
  C extends Record<string, AnyColumn> = Record<string, AnyColumn>,
  I extends Record<string, Index> = Record<string, Index>,
> {
  readonly tableName: string;
  readonly columns: C;
  readonly indexes: I;
  readonly stream: { readonly include: ReadonlySet<StreamView> } | undefined;

  readonly hashKey: AnyColumn;
  readonly rangeKey: AnyColumn | undefined;
  /** Hash key, then range key when there is one */
  readonly keys: readonly AnyColumn[];
  readonly columnsByName: ReadonlyMap<string, AnyColumn>;
  readonly columnsByDynamoName: ReadonlyMap<string, AnyColumn>;

  private readonly observers = new Set<ModificationObserver>();

  constructor(tableName: string, columns: C, indexes: I, stream?: StreamOptions) {
    this.tableName = tableName;
    this.columns = columns;
    this.indexes = indexes;

    const byName = new Map<string, AnyColumn>();
    const byDynamoName = new Map<string, AnyColumn>();
    let hashKey: AnyColumn | undefined;
    let rangeKey: AnyColumn | undefined;

    for (const [field, column] of Object.entries(columns)) {
      column.attach(field);
      if (byDynamoName.has(column.dynamoName)) {
        throw new InvalidModelError(
          `${tableName}: columns ${byDynamoName.get(column.dynamoName)?.name} and ${field} share the wire name ${column.dynamoName}`
        );
      }
      byName.set(field, column);
      byDynamoName.set(column.dynamoName, column);
      if (column.hashKey) {
        if (hashKey !== undefined) {
          throw new InvalidModelError(`${tableName} has more than one hash key`);
        }
        hashKey = column;
      }
      if (column.rangeKey) {
        if (rangeKey !== undefined) {
          throw new InvalidModelError(`${tableName} has more than one range key`);
        }
        rangeKey = column;
      }
    }
    if (hashKey === undefined) {
      throw new InvalidModelError(`${tableName} has no hash key`);
    }

    this.hashKey = hashKey;
    this.rangeKey = rangeKey;
    this.keys = rangeKey === undefined ? [hashKey] : [hashKey, rangeKey];
    this.columnsByName = byName;
    this.columnsByDynamoName = byDynamoName;

    const indexNames = new Set<string>();
    for (const [field, index] of Object.entries(indexes)) {
      if (index.kind === 'lsi' && rangeKey === undefined) {
        throw new InvalidModelError(`${tableName} has a local index ${field} but no range key`);
      }
      index.attach(field, tableName, byName, this.keys, hashKey);
      if (indexNames.has(index.dynamoName)) {
        throw new InvalidModelError(`${tableName} has two indexes named ${index.dynamoName}`);
      }
      indexNames.add(index.dynamoName);
    }

    if (stream !== undefined) {
      const include = new Set(stream.include);
      if (include.size === 0 || [...include].some(view => !STREAM_VIEWS.includes(view))) {
        throw new InvalidModelError(
          `${tableName}: stream include must be a non-empty subset of keys, new and old`
        );
      }
      this.stream = { include };
    } else {
      this.stream = undefined;
    }
  }

  /**
   * Every column, in declaration order
   */
  get columnList(): AnyColumn[] {
    return [...this.columnsByName.values()];
  }

  column(name: string): AnyColumn | undefined {
    return this.columnsByName.get(name);
  }

  /**
   * Registers an observer for column modifications on this model's objects.
   * Returns a function that removes it.
   */
  observe(observer: ModificationObserver): () => void {
    this.observers.add(observer);
    return () => {
      this.observers.delete(observer);
    };
  }

  notifyModified(obj: BaseModel, column: AnyColumn, value: unknown): void {
    for (const observer of this.observers) {
      observer(obj, column, value);
    }
  }
}

/**
 * Declares a model's table. Assign the result to the class's static `meta`.
 *
 * @example
 * ```typescript
 * class Tweet extends BaseModel {
 *   static readonly meta = defineMeta({
 *     tableName: 'tweets',
 *     columns: {
 *       account: new Column(new StringType(), { hashKey: true }),
 *       id: new Column(new StringType(), { rangeKey: true }),
 *       content: new Column(new StringType()),
 *       createdAt: new Column(new DateTimeType()),
 *     },
 *     indexes: {
 *       byCreation: new LocalSecondaryIndex({ rangeKey: 'createdAt', projection: 'keys' }),
 *     },
 *     stream: { include: ['new', 'old'] },
 *   });
 *
 *   declare account: string;
 *   declare id: string;
 *   declare content?: string;
 *   declare createdAt?: Date;
 * }
 * ```
 * @throws {InvalidModelError} for a malformed declaration
 */
export function defineMeta<C extends Record<string, AnyColumn>, I extends Record<string, Index>>(
  options: MetaOptions<C, I> & { indexes: I }
): ModelMeta<C, I>;
export function defineMeta<C extends Record<string, AnyColumn>>(
  options: MetaOptions<C, Record<never, never>>
): ModelMeta<C, Record<never, never>>;
export function defineMeta<C extends Record<string, AnyColumn>, I extends Record<string, Index>>(
  options: MetaOptions<C, I>
): ModelMeta<C, I> | ModelMeta<C, Record<never, never>> {
  if (options.indexes === undefined) {
    return new ModelMeta<C, Record<never, never>>(options.tableName, options.columns, {}, options.stream);
  }
  return new ModelMeta(options.tableName, options.columns, options.indexes, options.stream);
}
