/**
 * Base class for mapped objects.
 * @module models/model
 */

import type { AnyColumn } from './column.js';
import { ModelMeta } from './meta.js';
import { isAction, type Action } from './actions.js';
import { InvalidModelError } from '../error/categories.js';

/**
 * Column values of an object, by field name
 */
export const ATTRIBUTES = Symbol('dynamap.attributes');

/**
 * Pending ADD/DELETE actions of an object, by field name
 */
export const ACTIONS = Symbol('dynamap.actions');

/**
 * A model class: a {@link BaseModel} subclass with its own static `meta`.
 */
export interface ModelClass<M extends BaseModel = BaseModel> {
  new (attrs?: Readonly<Record<string, unknown>>): M;
  readonly meta: ModelMeta;
  readonly name: string;
}

const proxies = new WeakMap<BaseModel, BaseModel>();

/**
 * Objects stored in a table. Column fields live in an attribute map; setting
 * or deleting one notifies the model's modification observers.
 *
 * Declare column fields with `declare` so no class field shadows them.
 *
 * @example
 * ```typescript
 * class User extends BaseModel {
 *   static readonly meta = defineMeta({
 *     tableName: 'users',
 *     columns: {
 *       id: new Column(new StringType(), { hashKey: true }),
 *       email: new Column(new StringType()),
 *     },
 *   });
 *
 *   declare id: string;
 *   declare email?: string;
 * }
 *
 * const user = new User({ id: 'u1', email: 'user@example.com' });
 * ```
 */
export abstract class BaseModel {
  readonly [ATTRIBUTES] = new Map<string, unknown>();
  readonly [ACTIONS] = new Map<string, Action>();

  constructor(attrs: Readonly<Record<string, unknown>> = {}) {
    const proxy = new Proxy(this, MODEL_HANDLER);
    proxies.set(this, proxy);
    for (const [name, value] of Object.entries(attrs)) {
      Reflect.set(proxy, name, value);
    }
    return proxy;
  }

  toString(): string {
    const meta = tryMetaOf(this);
    if (meta === undefined) {
      return `${this.constructor.name}()`;
    }
    const fields = meta.columnList
      .filter(column => this[ATTRIBUTES].has(column.name))
      .map(column => `${column.name}=${String(this[ATTRIBUTES].get(column.name))}`);
    return `${this.constructor.name}(${fields.join(', ')})`;
  }
}

const MODEL_HANDLER: ProxyHandler<BaseModel> = {
  get(target, property, receiver) {
    const column = columnFor(target, property);
    if (column !== undefined) {
      return target[ATTRIBUTES].get(column.name);
    }
    return Reflect.get(target, property, receiver);
  },

  set(target, property, value, receiver) {
    const column = columnFor(target, property);
    if (column === undefined) {
      return Reflect.set(target, property, value, receiver);
    }
    if (isAction(value)) {
      applyAction(proxyOf(target), column, value);
    } else {
      assignAttribute(proxyOf(target), column, value);
    }
    return true;
  },

  defineProperty(target, property, descriptor) {
    const column = columnFor(target, property);
    if (column === undefined) {
      return Reflect.defineProperty(target, property, descriptor);
    }
    if (!('value' in descriptor)) {
      return false;
    }
    assignAttribute(proxyOf(target), column, descriptor.value);
    return true;
  },

  deleteProperty(target, property) {
    const column = columnFor(target, property);
    if (column === undefined) {
      return Reflect.deleteProperty(target, property);
    }
    assignAttribute(proxyOf(target), column, undefined);
    return true;
  },

  has(target, property) {
    const column = columnFor(target, property);
    if (column !== undefined) {
      return target[ATTRIBUTES].has(column.name);
    }
    return Reflect.has(target, property);
  },
};

function proxyOf(target: BaseModel): BaseModel {
  return proxies.get(target) ?? target;
}

function columnFor(target: BaseModel, property: string | symbol): AnyColumn | undefined {
  if (typeof property !== 'string') {
    return undefined;
  }
  return tryMetaOf(target)?.column(property);
}

/**
 * Sets (or, for a missing value, deletes) a column's value and notifies the
 * model's observers. Clears any pending action on the column.
 */
export function assignAttribute(obj: BaseModel, column: AnyColumn, value: unknown): void {
  const meta = metaOf(obj);
  obj[ACTIONS].delete(column.name);
  if (value === undefined || value === null) {
    obj[ATTRIBUTES].delete(column.name);
  } else {
    obj[ATTRIBUTES].set(column.name, value);
  }
  meta.notifyModified(obj, column, value);
}

/**
 * Reads a column's current value.
 */
export function getAttribute(obj: BaseModel, column: AnyColumn): unknown {
  return obj[ATTRIBUTES].get(column.name);
}

/**
 * Stages an action for a field. SET and REMOVE apply to the object at once;
 * ADD and DELETE are sent with the next save.
 *
 * @example
 * ```typescript
 * stageAction(user, 'visits', add(1));
 * stageAction(user, 'tags', del(new Set(['stale'])));
 * await engine.save(user);
 * ```
 * @throws {InvalidModelError} for an unknown field, or ADD/DELETE on a column that can't take them
 */
export function stageAction<M extends BaseModel>(obj: M, field: keyof M & string, action: Action): void {
  const column = metaOf(obj).column(field);
  if (column === undefined) {
    throw new InvalidModelError(`${obj.constructor.name} has no column ${field}`);
  }
  applyAction(obj, column, action);
}

function applyAction(obj: BaseModel, column: AnyColumn, action: Action): void {
  switch (action.type) {
    case 'set':
      assignAttribute(obj, column, action.value);
      return;
    case 'remove':
      assignAttribute(obj, column, undefined);
      return;
    case 'add':
      if (!['N', 'SS', 'NS', 'BS'].includes(column.typedef.backingType)) {
        throw new InvalidModelError(`Can't ADD to ${column.name}: only numbers and sets support ADD`);
      }
      break;
    case 'delete':
      if (!['SS', 'NS', 'BS'].includes(column.typedef.backingType)) {
        throw new InvalidModelError(`Can't DELETE from ${column.name}: only sets support DELETE`);
      }
      break;
  }
  if (action.value === undefined || action.value === null) {
    throw new InvalidModelError(`${action.type.toUpperCase()} on ${column.name} needs a value`);
  }
  obj[ACTIONS].set(column.name, action);
  metaOf(obj).notifyModified(obj, column, action);
}

/**
 * Pending ADD/DELETE action for a column, if any.
 */
export function pendingAction(obj: BaseModel, column: AnyColumn): Action | undefined {
  return obj[ACTIONS].get(column.name);
}

export function clearActions(obj: BaseModel): void {
  obj[ACTIONS].clear();
}

/**
 * The metadata a model class declares itself.
 *
 * @throws {InvalidModelError} when the class has no `meta` of its own
 */
export function metaOf(model: object): ModelMeta {
  const meta = tryMetaOf(model);
  if (meta === undefined) {
    const name = typeof model === 'function' ? model.name : model.constructor.name;
    throw new InvalidModelError(`${name} is not a model: declare static readonly meta = defineMeta(...)`);
  }
  return meta;
}

/**
 * `metaOf` for a class or an instance, without throwing.
 */
function tryMetaOf(model: object): ModelMeta | undefined {
  const ctor: unknown = typeof model === 'function' ? model : model.constructor;
  if (typeof ctor !== 'function' || !Object.prototype.hasOwnProperty.call(ctor, 'meta')) {
    return undefined;
  }
  const meta: unknown = Reflect.get(ctor, 'meta');
  return meta instanceof ModelMeta ? meta : undefined;
}

export function isModelClass(value: unknown): value is ModelClass {
  return typeof value === 'function' && value.prototype instanceof BaseModel && tryMetaOf(value) !== undefined;
}
