/**
 * Error mapping utilities for converting AWS SDK errors to MapperError instances.
 */

import { MapperError } from './error.js';
import {
  ConstraintViolationError,
  InvalidStreamError,
  RecordsExpiredError,
  ServiceError,
  ShardIteratorExpiredError,
  ThrottlingError,
} from './categories.js';

/**
 * AWS SDK error interface
 */
interface AwsError extends Error {
  name: string;
  code?: string;
  statusCode?: number;
  $metadata?: {
    httpStatusCode?: number;
    requestId?: string;
  };
  $fault?: 'client' | 'server';
}

/**
 * Type guard to check if error is an AWS SDK error
 */
function isAwsError(error: unknown): error is AwsError {
  return (
    error instanceof Error &&
    (('code' in error && typeof error.code === 'string') || '$metadata' in error || '$fault' in error)
  );
}

const THROTTLING_CODES = new Set([
  'ProvisionedThroughputExceededException',
  'ThrottlingException',
  'RequestLimitExceeded',
  'LimitExceededException',
]);

/**
 * Maps AWS SDK errors to the mapper's error taxonomy.
 *
 * @param error - Error thrown by an SDK call
 * @param operation - Name of the session operation that failed
 * @param request - Request sent for that operation, attached to constraint violations
 */
export function mapAwsError(
  error: unknown,
  operation: string,
  request?: object
): MapperError {
  // Already mapped, return it as-is
  if (error instanceof MapperError) {
    return error;
  }

  if (!isAwsError(error)) {
    return new MapperError({
      code: 'UnknownError',
      message: error instanceof Error ? error.message : String(error),
      isRetryable: false,
      originalError: error instanceof Error ? error : undefined,
      details: { operation },
    });
  }

  const errorCode = error.code ?? error.name;
  const message = error.message;
  const httpStatusCode = error.$metadata?.httpStatusCode ?? error.statusCode;

  switch (errorCode) {
    case 'ConditionalCheckFailedException':
      return new ConstraintViolationError(operation, request, error);

    case 'TrimmedDataAccessException':
      return new RecordsExpiredError(message, error);

    case 'ExpiredIteratorException':
      return new ShardIteratorExpiredError(message, error);

    case 'ResourceNotFoundException':
      // Only stream calls surface this as a stream problem; table calls keep the service error
      if (isStreamOperation(operation)) {
        return new InvalidStreamError(message, error);
      }
      return new ServiceError(message, errorCode, httpStatusCode ?? 400, error);

    case 'RequestTimeout':
    case 'RequestTimeoutException':
      return new MapperError({
        code: errorCode,
        message: message || 'Request timeout',
        httpStatusCode: 408,
        isRetryable: true,
        originalError: error,
      });

    default:
      if (THROTTLING_CODES.has(errorCode)) {
        return new ThrottlingError(message, errorCode, error);
      }
      return mapByStatusOrFault(error, errorCode, message, httpStatusCode);
  }
}

function isStreamOperation(operation: string): boolean {
  return operation === 'DescribeStream' || operation === 'GetShardIterator' || operation === 'GetRecords';
}

/**
 * Maps errors based on HTTP status code or fault type
 */
function mapByStatusOrFault(
  error: AwsError,
  errorCode: string,
  message: string,
  httpStatusCode?: number
): MapperError {
  if (httpStatusCode !== undefined) {
    if (httpStatusCode === 429) {
      return new ThrottlingError(message, errorCode, error);
    }
    return new ServiceError(message || 'An error occurred', errorCode, httpStatusCode, error);
  }

  return new MapperError({
    code: errorCode,
    message: message || 'An error occurred',
    isRetryable: error.$fault === 'server',
    originalError: error,
  });
}
