/**
 * Retry executor with exponential backoff and jitter
 */

import { MapperError } from '../error/error.js';
import { ThrottlingError } from '../error/categories.js';
import type { RetryConfig } from '../config/config.js';

/**
 * Executes session calls with retry logic and exponential backoff
 *
 * Retry behavior:
 * - Only errors whose mapped `isRetryable` is true are retried
 * - Throttling errors back off from `baseDelayMs`, other retryable errors from twice that
 * - Adds jitter to prevent thundering herd
 * - Stream position errors and constraint violations are never retryable and surface at once
 */
export class RetryExecutor {
  private config: RetryConfig;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(config: RetryConfig, sleep: (ms: number) => Promise<void> = defaultSleep) {
    this.config = config;
    this.sleep = sleep;
  }

  /**
   * Execute an operation with retry logic
   * @param operation - The async operation to execute
   * @returns The result of the operation
   * @throws The last error if all retries are exhausted
   */
  async execute<T>(operation: () => Promise<T>): Promise<T> {
    let lastError: unknown;

    for (let attempt = 1; attempt <= this.config.maxAttempts; attempt++) {
      try {
        return await operation();
      } catch (error) {
        lastError = error;

        // Don't retry if error is not retryable or we've exhausted attempts
        if (!this.isRetryable(error) || attempt === this.config.maxAttempts) {
          throw error;
        }

        await this.sleep(this.calculateDelay(attempt, error));
      }
    }

    throw lastError ?? new Error('Retry loop exited unexpectedly');
  }

  private isRetryable(error: unknown): boolean {
    return error instanceof MapperError && error.isRetryable;
  }

  /**
   * Calculate the delay for a given retry attempt using exponential backoff with jitter
   * @param attempt - The current attempt number (1-indexed)
   * @param error - The error that triggered the retry
   * @returns Delay in milliseconds
   */
  calculateDelay(attempt: number, error: unknown): number {
    const baseDelay = error instanceof ThrottlingError ? this.config.baseDelayMs : this.config.baseDelayMs * 2;

    // Exponential backoff: baseDelay * 2^(attempt-1)
    const exponentialDelay = baseDelay * Math.pow(2, attempt - 1);

    // Cap at max delay
    const cappedDelay = Math.min(exponentialDelay, this.config.maxDelayMs);

    // Jitter formula: delay * (1 + random * jitterFactor)
    const jitterFactor = this.config.jitterFactor ?? 0.5;
    const jitter = cappedDelay * Math.random() * jitterFactor;

    return Math.floor(cappedDelay + jitter);
  }
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}
