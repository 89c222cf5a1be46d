/**
 * Model columns.
 * @module models/column
 */

import type { PathSegment, TypeDefinition } from '../typedefs/types.js';
import type { ColumnRef } from '../conditions/reference.js';
import { Comparable } from '../conditions/comparable.js';
import { InvalidModelError } from '../error/categories.js';

export interface ColumnOptions {
  /** This column is the table's partition key */
  hashKey?: boolean;
  /** This column is the table's sort key */
  rangeKey?: boolean;
  /** Attribute name on the wire, when it differs from the field name */
  name?: string;
}

/**
 * A typed model attribute. Columns build conditions directly.
 *
 * @example
 * ```typescript
 * class User extends BaseModel {
 *   static readonly meta = defineMeta({
 *     tableName: 'users',
 *     columns: {
 *       id: new Column(new StringType(), { hashKey: true }),
 *       age: new Column(new IntegerType(), { name: 'a' }),
 *     },
 *   });
 * }
 *
 * User.meta.columns.age.ge(18);
 * ```
 */
export class Column<T> extends Comparable<T> implements ColumnRef {
  readonly typedef: TypeDefinition<T>;
  readonly hashKey: boolean;
  readonly rangeKey: boolean;
  private readonly wireName: string | undefined;
  private fieldName: string | undefined;

  constructor(typedef: TypeDefinition<T>, options: ColumnOptions = {}) {
    super();
    if (options.hashKey && options.rangeKey) {
      throw new InvalidModelError("A column can't be both the hash key and the range key");
    }
    this.typedef = typedef;
    this.hashKey = options.hashKey ?? false;
    this.rangeKey = options.rangeKey ?? false;
    this.wireName = options.name;
  }

  /**
   * Field name on the model
   */
  get name(): string {
    if (this.fieldName === undefined) {
      throw new InvalidModelError('Column is not attached to a model');
    }
    return this.fieldName;
  }

  get dynamoName(): string {
    return this.wireName ?? this.name;
  }

  get isKey(): boolean {
    return this.hashKey || this.rangeKey;
  }

  /**
   * Attaches the column to its field. A column belongs to one model field.
   */
  attach(fieldName: string): void {
    if (this.fieldName !== undefined && this.fieldName !== fieldName) {
      throw new InvalidModelError(
        `Column ${this.fieldName} is already attached; create a new Column for ${fieldName}`
      );
    }
    this.fieldName = fieldName;
  }

  protected get target(): ColumnRef {
    return this;
  }

  protected get segments(): readonly PathSegment[] {
    return [];
  }

  toString(): string {
    const key = this.hashKey ? ', hash' : this.rangeKey ? ', range' : '';
    return `<Column[${this.typedef.name}${key}] ${this.fieldName ?? '?'}>`;
  }
}

/**
 * Any column, whatever its value type
 */
export type AnyColumn = Column<unknown>;
