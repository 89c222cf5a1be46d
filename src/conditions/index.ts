/**
 * Conditions
 *
 * Condition trees, the factories that build them, and placeholder tracking
 * for rendering them.
 */

export type { ConditionOperation, ComparisonOperator, MetaCondition } from './condition.js';
export {
  Condition,
  EmptyCondition,
  AndCondition,
  OrCondition,
  NotCondition,
  LeafCondition,
  ComparisonCondition,
  ExistsCondition,
  BeginsWithCondition,
  ContainsCondition,
  BetweenCondition,
  InCondition,
  iterConditions,
  iterColumns,
  isMetaCondition,
  isLeafCondition,
  isComparisonOperator,
} from './condition.js';
export { Comparable, PathRef } from './comparable.js';
export type { ColumnRef, Reference, NameReference, ValueReference, ValueRefOptions } from './reference.js';
export { ReferenceTracker } from './reference.js';
