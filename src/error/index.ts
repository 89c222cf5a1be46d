/**
 * Error Handling
 *
 * Error classes and error handling utilities for the mapper.
 */

export { MapperError } from './error.js';

// Error categories
export {
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
} from './categories.js';

// Error mapping
export { mapAwsError } from './mapper.js';
