/**
 * dynamap
 *
 * Typed object mapper for DynamoDB: model declarations, a condition and
 * update expression compiler with change tracking, and a coordinator that
 * reads a table's change stream across its shards.
 *
 * @module dynamap
 */

// ============================================================================
// Engine
// ============================================================================

export type {
  EngineOptions,
  WriteOptions,
  LoadOptions,
  EngineEvents,
  EngineEvent,
  SearchProjection,
  ScanOptions,
  QueryOptions,
} from './engine/index.js';
export { Engine, Hooks, SearchIterator } from './engine/index.js';

// ============================================================================
// Configuration
// ============================================================================

export type {
  EngineConfig,
  CredentialsConfig,
  RetryConfig,
  CircuitBreakerConfig,
  ResolvedEngineConfig,
} from './config/index.js';
export {
  EngineConfigBuilder,
  resolveConfig,
  loadConfigFromEnv,
  validateConfig,
} from './config/index.js';

// ============================================================================
// Models
// ============================================================================

export type {
  ColumnOptions,
  AnyColumn,
  Projection,
  StreamView,
  StreamOptions,
  MetaOptions,
  ModelClass,
  ActionType,
} from './models/index.js';
export {
  Column,
  Index,
  GlobalSecondaryIndex,
  LocalSecondaryIndex,
  ModelMeta,
  defineMeta,
  BaseModel,
  stageAction,
  metaOf,
  Action,
  set,
  remove,
  add,
  del,
} from './models/index.js';

// ============================================================================
// Types
// ============================================================================

export type { BackingType, PathSegment, TypeDefinition, ValueOf, AttributeMap } from './typedefs/index.js';
export {
  StringType,
  UUIDType,
  NumberType,
  IntegerType,
  BinaryType,
  BooleanType,
  DateTimeType,
  TimestampType,
  SetType,
  ListType,
  MapType,
  DynamicMapType,
  TypeEngine,
} from './typedefs/index.js';

// ============================================================================
// Conditions and Expressions
// ============================================================================

export type { ConditionOperation, ComparisonOperator } from './conditions/index.js';
export {
  Condition,
  EmptyCondition,
  AndCondition,
  OrCondition,
  NotCondition,
  ComparisonCondition,
  ExistsCondition,
  BeginsWithCondition,
  ContainsCondition,
  BetweenCondition,
  InCondition,
  iterConditions,
  iterColumns,
  ReferenceTracker,
} from './conditions/index.js';
export type { RenderOptions, RenderedExpressions } from './expressions/index.js';
export { ExpressionRenderer } from './expressions/index.js';
export { ChangeTracker } from './tracking/index.js';

// ============================================================================
// Streams
// ============================================================================

export type {
  StreamRecord,
  RecordMeta,
  StreamEventType,
  ShardToken,
  StreamToken,
  StreamPosition,
  ModelStreamRecord,
} from './stream/index.js';
export { Stream, Coordinator, Shard, RecordBuffer } from './stream/index.js';

// ============================================================================
// Session
// ============================================================================

export type { Session, ShardIteratorType } from './session/index.js';
export { AwsSession } from './session/index.js';

// ============================================================================
// Error Handling
// ============================================================================

export {
  MapperError,
  ConfigurationError,
  InvalidModelError,
  UnboundModelError,
  InvalidConditionError,
  InvalidComparisonOperatorError,
  InvalidSearchError,
  TableMismatchError,
  ConstraintViolationError,
  MissingObjectsError,
  RecordsExpiredError,
  ShardIteratorExpiredError,
  InvalidStreamError,
  InvalidPositionError,
  InvalidShardIteratorTypeError,
  ThrottlingError,
  ServiceError,
} from './error/index.js';

// ============================================================================
// Observability
// ============================================================================

export type { Logger, LogLevel, LogContext, MetricsCollector } from './observability/index.js';
export {
  ConsoleLogger,
  NoopLogger,
  InMemoryMetricsCollector,
  NoopMetricsCollector,
  MapperMetricNames,
} from './observability/index.js';
