/**
 * Models
 *
 * Columns, indexes, model metadata and the base class for mapped objects.
 */

export type { ColumnOptions, AnyColumn } from './column.js';
export { Column } from './column.js';
export type {
  Projection,
  IndexKind,
  GlobalSecondaryIndexOptions,
  LocalSecondaryIndexOptions,
  ResolvedIndex,
} from './indexes.js';
export { Index, GlobalSecondaryIndex, LocalSecondaryIndex } from './indexes.js';
export type { StreamView, StreamOptions, MetaOptions, ModificationObserver } from './meta.js';
export { ModelMeta, defineMeta } from './meta.js';
export type { ModelClass } from './model.js';
export {
  BaseModel,
  ATTRIBUTES,
  ACTIONS,
  assignAttribute,
  getAttribute,
  stageAction,
  pendingAction,
  clearActions,
  metaOf,
  isModelClass,
} from './model.js';
export type { ActionType } from './actions.js';
export { Action, isAction, set, remove, add, del } from './actions.js';
