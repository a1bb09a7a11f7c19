/**
 * Resilience module
 */

export { RetryExecutor, createRetryExecutor, type RetryOptions, type RetryHooks } from './retry.js';
