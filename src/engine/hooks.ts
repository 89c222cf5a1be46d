/**
 * Lifecycle hooks.
 * @module engine/hooks
 */

import type { TableDescription } from '@aws-sdk/client-dynamodb';
import type { AnyColumn } from '../models/column.js';
import type { BaseModel, ModelClass } from '../models/model.js';

/**
 * Listener arguments for each engine event
 */
export interface EngineEvents {
  /** An object was populated from the table (load, query, scan or stream) */
  objectLoaded: [obj: BaseModel];
  objectSaved: [obj: BaseModel];
  objectDeleted: [obj: BaseModel];
  /** A column of a bound model's object was set or deleted */
  objectModified: [obj: BaseModel, column: AnyColumn, value: unknown];
  modelBound: [model: ModelClass];
  tableValidated: [model: ModelClass, table: TableDescription];
}

export type EngineEvent = keyof EngineEvents;

type Listener<A extends unknown[]> = (...args: A) => void;

/**
 * Synchronous listeners, called in registration order.
 */
export class Hooks<E extends { [K in keyof E]: unknown[] }> {
  private readonly listeners: { [K in keyof E]?: Listener<E[K]>[] } = {};

  on<K extends keyof E>(event: K, listener: Listener<E[K]>): void {
    const current = this.listeners[event] ?? [];
    this.listeners[event] = [...current, listener];
  }

  off<K extends keyof E>(event: K, listener: Listener<E[K]>): void {
    const current = this.listeners[event] ?? [];
    this.listeners[event] = current.filter(registered => registered !== listener);
  }

  emit<K extends keyof E>(event: K, ...args: E[K]): void {
    for (const listener of this.listeners[event] ?? []) {
      listener(...args);
    }
  }
}
