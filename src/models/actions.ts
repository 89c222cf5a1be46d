/**
 * Update actions for a single field.
 * @module models/actions
 */

export type ActionType = 'set' | 'remove' | 'add' | 'delete';

/**
 * What the next save does to a field. Pass to `stageAction`.
 */
export class Action<T = unknown> {
  constructor(
    readonly type: ActionType,
    readonly value: T | undefined
  ) {}

  toString(): string {
    return `<Action[${this.type.toUpperCase()}]>`;
  }
}

export function isAction(value: unknown): value is Action {
  return value instanceof Action;
}

export function set<T>(value: T): Action<T> {
  return new Action('set', value);
}

export function remove(): Action<never> {
  return new Action<never>('remove', undefined);
}

/**
 * Adds to a number, or adds elements to a set.
 */
export function add<T>(value: T): Action<T> {
  return new Action('add', value);
}

/**
 * Removes elements from a set.
 */
export function del<T>(value: Set<T>): Action<Set<T>> {
  return new Action('delete', value);
}
