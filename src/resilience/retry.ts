/**
 * Retry logic with exponential backoff
 */

import type { S3RetryConfig } from '../config/index.js';
import { S3Error, TransferError, isRetryableError } from '../errors/index.js';
import { NoopLogger, type Logger } from '../observability/index.js';

/**
 * Retry options
 */
export interface RetryOptions {
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  jitterFactor: number;
}

/**
 * Per-call hooks
 */
export interface RetryHooks {
  /** Stops further attempts; the pending retry rejects with a CANCELLED TransferError */
  signal?: AbortSignal;
  /** Called before each retry with the 1-based retry number */
  onRetry?: (retry: number, delayMs: number, error: unknown) => void;
  /** Overrides the retryability check */
  isRetryable?: (error: unknown) => boolean;
  /** Included in retry log lines */
  context?: Record<string, unknown>;
}

/**
 * Retry executor that handles retryable errors with exponential backoff
 */
export class RetryExecutor {
  private readonly config: RetryOptions;
  private readonly logger: Logger;

  constructor(config: RetryOptions, logger: Logger = new NoopLogger()) {
    this.config = config;
    this.logger = logger;
  }

  get maxRetries(): number {
    return this.config.maxRetries;
  }

  /**
   * Executes an operation, retrying retryable failures up to maxRetries
   * times. The operation receives the 0-based attempt number.
   */
  async execute<T>(operation: (attempt: number) => Promise<T>, hooks: RetryHooks = {}): Promise<T> {
    const isRetryable = hooks.isRetryable ?? isRetryableError;

    for (let attempt = 0; ; attempt++) {
      if (hooks.signal?.aborted) {
        throw TransferError.cancelled();
      }

      try {
        return await operation(attempt);
      } catch (error) {
        if (!isRetryable(error) || attempt >= this.config.maxRetries || hooks.signal?.aborted) {
          throw error;
        }

        const delay = this.calculateDelay(attempt, error);
        this.logRetry(attempt, delay, error, hooks.context);
        hooks.onRetry?.(attempt + 1, delay, error);

        await this.sleep(delay, hooks.signal);
      }
    }
  }

  /**
   * Calculates delay for next retry attempt
   */
  calculateDelay(attempt: number, error: unknown): number {
    if (error instanceof S3Error && error.retryAfter) {
      return Math.min(error.retryAfter * 1000, this.config.maxDelayMs);
    }

    const exponentialDelay = this.config.baseDelayMs * Math.pow(2, attempt);
    const cappedDelay = Math.min(exponentialDelay, this.config.maxDelayMs);

    const jitter = cappedDelay * this.config.jitterFactor * (Math.random() * 2 - 1);
    return Math.max(0, Math.floor(cappedDelay + jitter));
  }

  private sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve, reject) => {
      if (signal?.aborted) {
        reject(TransferError.cancelled());
        return;
      }

      const onAbort = (): void => {
        clearTimeout(timer);
        reject(TransferError.cancelled());
      };
      const timer = setTimeout(() => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
      }, ms);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  private logRetry(attempt: number, delayMs: number, error: unknown, context?: Record<string, unknown>): void {
    this.logger.warn('Retrying after failure', {
      ...context,
      attempt: attempt + 1,
      maxAttempts: this.config.maxRetries + 1,
      delayMs,
      errorType: error instanceof S3Error ? error.type : 'unknown',
      errorCode: error instanceof S3Error ? error.code : undefined,
      errorMessage: error instanceof Error ? error.message : String(error),
    });
  }
}

/**
 * Creates a retry executor from retry config
 */
export function createRetryExecutor(config: S3RetryConfig, logger?: Logger): RetryExecutor {
  return new RetryExecutor(
    {
      maxRetries: config.maxRetries,
      baseDelayMs: config.baseDelayMs,
      maxDelayMs: config.maxDelayMs,
      jitterFactor: config.jitterFactor,
    },
    logger
  );
}
