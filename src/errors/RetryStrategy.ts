/**
 * Retry Strategy System
 *
 * Provides configurable retry policies for handling transient failures.
 * Works in conjunction with the ApplicationError hierarchy to make
 * retry decisions based on error type and context.
 */

import { setTimeout as sleep } from 'timers/promises';
import { ApplicationError, ErrorCode } from './ApplicationError.js';
import { logger } from '../utils/logging.js';

// ============================================
// RETRY POLICY CONFIGURATION
// ============================================

export interface RetryPolicy {
  /**
   * Maximum number of attempts (first try included)
   */
  maxAttempts: number;

  /**
   * Initial delay in milliseconds before first retry
   */
  initialDelayMs: number;

  /**
   * Maximum delay in milliseconds between retries
   */
  maxDelayMs: number;

  /**
   * Backoff multiplier (e.g., 2 for exponential backoff)
   */
  backoffMultiplier: number;

  /**
   * Jitter factor (0-1) to randomize retry delays
   */
  jitterFactor: number;

  /**
   * Error codes that should be retried
   */
  retryableErrorCodes?: ErrorCode[];
}

export type RetryResult<T> =
  | { success: true; value: T; attemptCount: number; totalDelayMs: number }
  | { success: false; error: Error; attemptCount: number; totalDelayMs: number };

// ============================================
// PREDEFINED RETRY POLICIES
// ============================================

/**
 * Default retry policy for general operational errors
 */
export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  initialDelayMs: 1000,
  maxDelayMs: 30000,
  backoffMultiplier: 2,
  jitterFactor: 0.1,
};

/**
 * Passes over a stream's mirror list. Short delays: each pass already tried every source.
 */
export const MIRROR_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 2,
  initialDelayMs: 500,
  maxDelayMs: 5000,
  backoffMultiplier: 2,
  jitterFactor: 0.2,
  retryableErrorCodes: [
    ErrorCode.NETWORK_CONNECTION_FAILED,
    ErrorCode.NETWORK_TIMEOUT,
    ErrorCode.NETWORK_HTTP_STATUS,
  ],
};

// ============================================
// RETRY STRATEGY CLASS
// ============================================

export class RetryStrategy {
  constructor(private readonly policy: RetryPolicy = DEFAULT_RETRY_POLICY) {}

  /**
   * Execute an operation with retry logic
   */
  async execute<T>(
    operation: () => Promise<T>,
    operationName: string = 'operation',
    signal?: AbortSignal
  ): Promise<T> {
    const result = await this.executeWithResult(operation, operationName, signal);
    if (result.success) {
      return result.value;
    }
    throw result.error;
  }

  /**
   * Execute an operation and return detailed result
   */
  async executeWithResult<T>(
    operation: () => Promise<T>,
    operationName: string = 'operation',
    signal?: AbortSignal
  ): Promise<RetryResult<T>> {
    let attemptCount = 0;
    let totalDelayMs = 0;

    for (;;) {
      attemptCount++;

      try {
        const value = await operation();
        return { success: true, value, attemptCount, totalDelayMs };
      } catch (error) {
        const lastError = error instanceof Error ? error : new Error(String(error));

        const shouldRetry =
          !signal?.aborted && this.shouldRetryError(lastError);

        if (!shouldRetry || attemptCount >= this.policy.maxAttempts) {
          logger.debug(`${operationName} failed after ${attemptCount} attempt(s)`, {
            error: lastError.message,
            attemptCount,
            totalDelayMs,
          });

          return { success: false, error: lastError, attemptCount, totalDelayMs };
        }

        const delayMs = this.calculateDelay(attemptCount);
        totalDelayMs += delayMs;

        logger.info(`Retrying ${operationName} after error`, {
          error: lastError.message,
          attemptNumber: attemptCount,
          nextAttemptIn: delayMs,
          totalAttempts: this.policy.maxAttempts,
        });

        try {
          await sleep(delayMs, undefined, signal ? { signal } : undefined);
        } catch (abortError) {
          return {
            success: false,
            error: abortError instanceof Error ? abortError : lastError,
            attemptCount,
            totalDelayMs,
          };
        }
      }
    }
  }

  /**
   * Determine if an error should be retried
   */
  private shouldRetryError(error: Error): boolean {
    if (error instanceof ApplicationError) {
      if (!error.retryable) {
        return false;
      }

      if (this.policy.retryableErrorCodes) {
        return this.policy.retryableErrorCodes.includes(error.code);
      }

      return true;
    }

    // Unknown errors are never retried
    return false;
  }

  /**
   * Exponential backoff with jitter
   */
  private calculateDelay(attemptNumber: number): number {
    const exponentialDelay =
      this.policy.initialDelayMs *
      Math.pow(this.policy.backoffMultiplier, attemptNumber - 1);

    const cappedDelay = Math.min(exponentialDelay, this.policy.maxDelayMs);

    const jitter = cappedDelay * this.policy.jitterFactor * (Math.random() - 0.5);
    const delayWithJitter = cappedDelay + jitter;

    return Math.max(0, Math.floor(delayWithJitter));
  }
}
