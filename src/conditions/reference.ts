/**
 * Placeholder allocation for rendered expressions.
 * @module conditions/reference
 */

import type { AttributeValue } from '@aws-sdk/client-dynamodb';
import type { PathSegment, TypeDefinition } from '../typedefs/types.js';
import { TypeEngine } from '../typedefs/engine.js';
import { isAttributeValue } from '../typedefs/wire.js';
import { InvalidConditionError } from '../error/categories.js';

/**
 * A model attribute that conditions can address: a column, or a document
 * path below one.
 */
export interface ColumnRef {
  /** Field name on the model */
  readonly name: string;
  /** Attribute name on the wire */
  readonly dynamoName: string;
  readonly typedef: TypeDefinition<unknown>;
}

/**
 * A placeholder standing for an attribute path (`#n0.#n1[2]`).
 */
export interface NameReference {
  readonly kind: 'name';
  readonly name: string;
  /** Every `#n` placeholder the path is built from */
  readonly placeholders: readonly string[];
}

/**
 * A placeholder standing for a literal (`:v3`).
 * `value` is undefined when the literal dumped to nothing.
 */
export interface ValueReference {
  readonly kind: 'value';
  readonly name: string;
  readonly value: AttributeValue | undefined;
}

export type Reference = NameReference | ValueReference;

export interface ValueRefOptions {
  /** The value is already in wire format */
  dumped?: boolean;
  /** Dump with the element type of the path's type, for `contains` */
  inner?: boolean;
}

/**
 * Allocates `#n<i>`/`:v<i>` placeholders for one render pass.
 *
 * Names are de-duplicated: the same attribute name always maps to the same
 * placeholder while it is in use. Values are never de-duplicated. Both share
 * one index counter that only grows, so a popped index is never issued again.
 */
export class ReferenceTracker {
  private nextIndex = 0;
  private readonly names = new Map<string, string>();
  private readonly values = new Map<string, AttributeValue | undefined>();
  private readonly placeholderByName = new Map<string, string>();
  private readonly counts = new Map<string, number>();
  private readonly allocations: Reference[] = [];
  private readonly released = new WeakSet<Reference>();

  constructor(readonly typeEngine: TypeEngine = new TypeEngine()) {}

  /**
   * Reference for a column, or a document path below it. String segments get
   * their own name placeholder; list indexes attach to the previous segment.
   */
  nameRef(column: ColumnRef, path: readonly PathSegment[] = []): NameReference {
    for (const segment of path) {
      if (typeof segment === 'number' && (!Number.isInteger(segment) || segment < 0)) {
        throw new InvalidConditionError(`Invalid list index ${segment} in path for ${column.name}`);
      }
    }
    const pieces: string[] = [];
    const placeholders: string[] = [];
    for (const segment of [column.dynamoName, ...path]) {
      if (typeof segment === 'number') {
        pieces[pieces.length - 1] += `[${segment}]`;
      } else {
        const placeholder = this.namePlaceholder(segment);
        placeholders.push(placeholder);
        pieces.push(placeholder);
      }
    }
    const ref: NameReference = { kind: 'name', name: pieces.join('.'), placeholders };
    this.allocations.push(ref);
    return ref;
  }

  /**
   * Reference for a literal compared against `column` at `path`.
   * Unless `dumped`, the value is dumped through the type at that path.
   */
  valueRef(
    column: ColumnRef,
    path: readonly PathSegment[],
    value: unknown,
    options: ValueRefOptions = {}
  ): ValueReference {
    let wire: AttributeValue | undefined;
    if (options.dumped) {
      if (value === undefined || value === null) {
        wire = undefined;
      } else if (isAttributeValue(value)) {
        wire = value;
      } else {
        throw new InvalidConditionError(`Expected a dumped wire value for ${column.name}`);
      }
    } else {
      let typedef = this.typeEngine.typeAt(column.typedef, path);
      if (options.inner && typedef.inner !== undefined) {
        typedef = typedef.inner;
      }
      wire = this.typeEngine.dump(typedef, value);
    }

    const name = `:v${this.nextIndex++}`;
    this.values.set(name, wire);
    this.counts.set(name, 1);
    const ref: ValueReference = { kind: 'value', name, value: wire };
    this.allocations.push(ref);
    return ref;
  }

  /**
   * Releases references. A placeholder leaves the emitted maps once nothing
   * uses it any more; releasing the same reference twice is a no-op.
   */
  popRefs(...refs: Reference[]): void {
    for (const ref of refs) {
      if (this.released.has(ref)) {
        continue;
      }
      this.released.add(ref);
      if (ref.kind === 'name') {
        for (const placeholder of ref.placeholders) {
          this.decrement(placeholder);
        }
      } else {
        this.decrement(ref.name);
      }
    }
  }

  /**
   * Position to roll back to if a render fails part way.
   */
  checkpoint(): number {
    return this.allocations.length;
  }

  /**
   * Releases every reference allocated since `mark` that is still held.
   */
  rollback(mark: number): void {
    const refs = this.allocations.splice(mark);
    this.popRefs(...refs.reverse());
  }

  get attributeNames(): Record<string, string> {
    return Object.fromEntries(this.names);
  }

  get attributeValues(): Record<string, AttributeValue> {
    const result: Record<string, AttributeValue> = {};
    for (const [name, value] of this.values) {
      if (value !== undefined) {
        result[name] = value;
      }
    }
    return result;
  }

  private namePlaceholder(name: string): string {
    let placeholder = this.placeholderByName.get(name);
    if (placeholder === undefined) {
      placeholder = `#n${this.nextIndex++}`;
      this.placeholderByName.set(name, placeholder);
      this.names.set(placeholder, name);
      this.counts.set(placeholder, 0);
    }
    this.counts.set(placeholder, (this.counts.get(placeholder) ?? 0) + 1);
    return placeholder;
  }

  private decrement(placeholder: string): void {
    const count = (this.counts.get(placeholder) ?? 0) - 1;
    if (count > 0) {
      this.counts.set(placeholder, count);
      return;
    }
    this.counts.delete(placeholder);
    this.values.delete(placeholder);
    const name = this.names.get(placeholder);
    if (name !== undefined) {
      this.names.delete(placeholder);
      this.placeholderByName.delete(name);
    }
  }
}
