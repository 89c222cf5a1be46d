/**
 * Secondary indexes.
 * @module models/indexes
 */

import type { AnyColumn } from './column.js';
import { InvalidModelError } from '../error/categories.js';

/**
 * Attributes an index copies from the table: all of them, only the keys, or
 * the keys plus the named model fields.
 */
export type Projection = 'all' | 'keys' | readonly string[];

export type IndexKind = 'gsi' | 'lsi';

interface IndexOptions {
  projection: Projection;
  /** Index name on the wire, when it differs from the field name */
  name?: string;
}

export interface GlobalSecondaryIndexOptions extends IndexOptions {
  /** Model field name of the index's partition key */
  hashKey: string;
  /** Model field name of the index's sort key */
  rangeKey?: string;
}

export interface LocalSecondaryIndexOptions extends IndexOptions {
  /** Model field name of the index's sort key */
  rangeKey: string;
}

/**
 * Key columns and projection of an index, resolved against its model.
 */
export interface ResolvedIndex {
  readonly hashKey: AnyColumn;
  readonly rangeKey: AnyColumn | undefined;
  /** Every column readable through the index, keys included */
  readonly projected: ReadonlySet<AnyColumn>;
}

export abstract class Index {
  abstract readonly kind: IndexKind;
  readonly projection: Projection;
  protected readonly hashKeyName: string | undefined;
  protected readonly rangeKeyName: string | undefined;
  private readonly wireName: string | undefined;
  private fieldName: string | undefined;
  private resolved: ResolvedIndex | undefined;
  private tableName: string | undefined;

  protected constructor(options: IndexOptions, hashKey: string | undefined, rangeKey: string | undefined) {
    if (Array.isArray(options.projection) && options.projection.length === 0) {
      throw new InvalidModelError("An index projection can't be an empty list; use 'keys'");
    }
    this.projection = options.projection;
    this.hashKeyName = hashKey;
    this.rangeKeyName = rangeKey;
    this.wireName = options.name;
  }

  get name(): string {
    if (this.fieldName === undefined) {
      throw new InvalidModelError('Index is not attached to a model');
    }
    return this.fieldName;
  }

  get dynamoName(): string {
    return this.wireName ?? this.name;
  }

  get hashKey(): AnyColumn {
    return this.requireResolved().hashKey;
  }

  get rangeKey(): AnyColumn | undefined {
    return this.requireResolved().rangeKey;
  }

  get projected(): ReadonlySet<AnyColumn> {
    return this.requireResolved().projected;
  }

  /**
   * Name of the table the index belongs to, before any engine prefix
   */
  get modelTableName(): string {
    if (this.tableName === undefined) {
      throw new InvalidModelError('Index is not attached to a model');
    }
    return this.tableName;
  }

  /**
   * Resolves key names and the projection against the model's columns.
   *
   * @param columns - Model columns by field name
   * @param tableKeys - The table's hash and range key columns
   */
  attach(
    fieldName: string,
    tableName: string,
    columns: ReadonlyMap<string, AnyColumn>,
    tableKeys: readonly AnyColumn[],
    tableHashKey: AnyColumn
  ): void {
    if (this.fieldName !== undefined && this.fieldName !== fieldName) {
      throw new InvalidModelError(`Index ${this.fieldName} is already attached to a model`);
    }
    const lookup = (name: string): AnyColumn => {
      const column = columns.get(name);
      if (column === undefined) {
        throw new InvalidModelError(`Index ${fieldName} names unknown column ${name}`, { index: fieldName });
      }
      return column;
    };

    const hashKey = this.hashKeyName === undefined ? tableHashKey : lookup(this.hashKeyName);
    const rangeKey = this.rangeKeyName === undefined ? undefined : lookup(this.rangeKeyName);
    const indexKeys = rangeKey === undefined ? [hashKey] : [hashKey, rangeKey];

    let projected: Set<AnyColumn>;
    if (this.projection === 'all') {
      projected = new Set(columns.values());
    } else {
      projected = new Set([...tableKeys, ...indexKeys]);
      if (this.projection !== 'keys') {
        for (const name of this.projection) {
          projected.add(lookup(name));
        }
      }
    }

    this.fieldName = fieldName;
    this.tableName = tableName;
    this.resolved = { hashKey, rangeKey, projected };
  }

  private requireResolved(): ResolvedIndex {
    if (this.resolved === undefined) {
      throw new InvalidModelError('Index is not attached to a model');
    }
    return this.resolved;
  }
}

/**
 * An index with its own partition key.
 *
 * @example
 * ```typescript
 * byEmail: new GlobalSecondaryIndex({ hashKey: 'email', projection: 'keys' })
 * ```
 */
export class GlobalSecondaryIndex extends Index {
  readonly kind = 'gsi' as const;

  constructor(options: GlobalSecondaryIndexOptions) {
    super(options, options.hashKey, options.rangeKey);
  }
}

/**
 * An index sharing the table's partition key with a different sort key.
 * Only valid on a model with a range key.
 */
export class LocalSecondaryIndex extends Index {
  readonly kind = 'lsi' as const;

  constructor(options: LocalSecondaryIndexOptions) {
    super(options, undefined, options.rangeKey);
  }
}
