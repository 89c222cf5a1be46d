import { MapperError } from './error.js';

// ============================================================================
// Programmer errors (fail fast, never retried)
// ============================================================================

/**
 * Error thrown when the engine is misconfigured
 * (e.g., invalid region, malformed endpoint, empty static credentials)
 */
export class ConfigurationError extends MapperError {
  constructor(message: string, details?: Record<string, unknown>) {
    super({
      code: 'ConfigurationError',
      message,
      isRetryable: false,
      details,
    });
    this.name = 'ConfigurationError';
  }
}

/**
 * Error thrown when a model declaration is malformed, or a value does not
 * match the type of the column it is stored in.
 */
export class InvalidModelError extends MapperError {
  constructor(message: string, details?: Record<string, unknown>) {
    super({
      code: 'InvalidModel',
      message,
      isRetryable: false,
      details,
    });
    this.name = 'InvalidModelError';
  }
}

/**
 * Error thrown when an operation names a model that was never bound to the engine.
 */
export class UnboundModelError extends MapperError {
  constructor(modelName: string) {
    super({
      code: 'UnboundModel',
      message: `Model ${modelName} is not bound to this engine; call engine.bind() first`,
      isRetryable: false,
      details: { modelName },
    });
    this.name = 'UnboundModelError';
  }
}

/**
 * Error thrown when a condition tree cannot be rendered.
 */
export class InvalidConditionError extends MapperError {
  constructor(message: string, details?: Record<string, unknown>) {
    super({
      code: 'InvalidCondition',
      message,
      isRetryable: false,
      details,
    });
    this.name = 'InvalidConditionError';
  }
}

/**
 * Error for a comparison built with an operator the expression language does not know
 */
export class InvalidComparisonOperatorError extends InvalidConditionError {
  constructor(operator: string) {
    super(`${JSON.stringify(operator)} is not a valid comparison operator`, { operator });
    this.name = 'InvalidComparisonOperatorError';
  }
}

/**
 * Error thrown for a malformed query or scan (bad key condition, bad projection, bad index use).
 */
export class InvalidSearchError extends MapperError {
  constructor(message: string, details?: Record<string, unknown>) {
    super({
      code: 'InvalidSearch',
      message,
      isRetryable: false,
      details,
    });
    this.name = 'InvalidSearchError';
  }
}

/**
 * Error thrown when an existing table does not match the model's key schema.
 */
export class TableMismatchError extends MapperError {
  constructor(tableName: string, expected: unknown, actual: unknown) {
    super({
      code: 'TableMismatch',
      message: `Existing table ${tableName} does not match the model's key schema`,
      isRetryable: false,
      details: { tableName, expected, actual },
    });
    this.name = 'TableMismatchError';
  }
}

// ============================================================================
// Business-logic errors
// ============================================================================

/**
 * Error thrown when a conditional write's precondition was not satisfied.
 * Never retried; the failed operation and its request are attached.
 */
export class ConstraintViolationError extends MapperError {
  public readonly operation: string;
  public readonly request?: object;

  constructor(operation: string, request?: object, originalError?: Error) {
    super({
      code: 'ConstraintViolation',
      message: `The condition for ${operation} was not met`,
      httpStatusCode: 400,
      isRetryable: false,
      originalError,
      details: { operation, request },
    });
    this.name = 'ConstraintViolationError';
    this.operation = operation;
    this.request = request;
  }
}

/**
 * Error thrown when a load does not find every requested object.
 */
export class MissingObjectsError extends MapperError {
  public readonly objects: readonly unknown[];

  constructor(objects: readonly unknown[]) {
    super({
      code: 'MissingObjects',
      message: `Failed to load ${objects.length} object(s)`,
      isRetryable: false,
      details: { count: objects.length },
    });
    this.name = 'MissingObjectsError';
    this.objects = objects;
  }
}

// ============================================================================
// Stream errors
// ============================================================================

/**
 * Error thrown when a requested stream position is older than the shard's trim horizon.
 */
export class RecordsExpiredError extends MapperError {
  constructor(message: string = 'The requested stream records are beyond the trim horizon', originalError?: Error) {
    super({
      code: 'RecordsExpired',
      message,
      httpStatusCode: 400,
      isRetryable: false,
      originalError,
    });
    this.name = 'RecordsExpiredError';
  }
}

/**
 * Error thrown when a shard iterator handle is past its lifetime.
 */
export class ShardIteratorExpiredError extends MapperError {
  constructor(message: string = 'The shard iterator has expired', originalError?: Error) {
    super({
      code: 'ShardIteratorExpired',
      message,
      httpStatusCode: 400,
      isRetryable: false,
      originalError,
    });
    this.name = 'ShardIteratorExpiredError';
  }
}

/**
 * Error thrown when a stream is unknown, a model has no stream, or a token cannot be resolved.
 */
export class InvalidStreamError extends MapperError {
  constructor(message: string, originalError?: Error) {
    super({
      code: 'InvalidStream',
      message,
      isRetryable: false,
      originalError,
    });
    this.name = 'InvalidStreamError';
  }
}

/**
 * Error for a stream position that is not a known endpoint, a date or a token
 */
export class InvalidPositionError extends InvalidStreamError {
  constructor(position: unknown) {
    super(`Don't know how to move to position ${describe(position)}`);
    this.name = 'InvalidPositionError';
  }
}

/**
 * Error for a shard iterator type outside trim_horizon, latest, at_sequence and after_sequence
 */
export class InvalidShardIteratorTypeError extends InvalidStreamError {
  constructor(iteratorType: unknown) {
    super(`Unknown shard iterator type ${describe(iteratorType)}`);
    this.name = 'InvalidShardIteratorTypeError';
  }
}

// ============================================================================
// Infrastructure errors
// ============================================================================

/**
 * Error thrown when the service throttles a request.
 */
export class ThrottlingError extends MapperError {
  constructor(message: string, code: string = 'ThrottlingException', originalError?: Error) {
    super({
      code,
      message,
      httpStatusCode: 400,
      isRetryable: true,
      originalError,
    });
    this.name = 'ThrottlingError';
  }
}

/**
 * Error thrown for service-side failures and unexpected responses.
 * 5xx responses are retryable.
 */
export class ServiceError extends MapperError {
  constructor(message: string, code: string, httpStatusCode?: number, originalError?: Error) {
    super({
      code,
      message,
      httpStatusCode,
      isRetryable: httpStatusCode !== undefined && httpStatusCode >= 500,
      originalError,
    });
    this.name = 'ServiceError';
  }
}

function describe(value: unknown): string {
  if (value instanceof Date) {
    return value.toISOString();
  }
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
}
