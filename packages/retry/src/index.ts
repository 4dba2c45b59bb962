/**
 * Retry strategies with a shared per-client retry quota
 */

export {
  AttemptState,
  type AttemptOutcome,
  type AttemptSequence,
  type Classification,
  type ErrorClassifier,
  type NonRetryableReason,
  type RetryAttempt,
  type RetryConfig,
  type RetryDecision,
  type RetryEvent,
  type RetryStrategy,
  type RetryToken,
  type RetryableReason,
  type SleepFn,
} from './types.js';

export { RetryTokenBucket, type TokenBucketSnapshot } from './token-bucket.js';
export { DelayCalculator, type RandomFn } from './delay-calculator.js';
export { ClientRateLimiter, type ClientRateLimiterOptions, type RateLimiterSnapshot } from './rate-limiter.js';
export { StandardAttemptSequence, type AttemptSequenceDependencies } from './attempt-sequence.js';
export {
  AdaptiveRetryStrategy,
  NoRetryStrategy,
  StandardRetryStrategy,
  type StrategyDependencies,
} from './strategies.js';
export {
  RetryStrategyResolver,
  createRetryStrategy,
  resolveRetryConfig,
  resolveRetryStrategy,
  type ResolverDependencies,
  type SharedRetryState,
} from './resolver.js';
export { ERROR_CODES, defaultErrorClassifier, readStatusCode, type ErrorCodeTable } from './classifier.js';
export {
  RetryExecutor,
  executeWithRetry,
  tryExecuteWithRetry,
  type AttemptContext,
  type ExecuteOptions,
  type RetryResult,
  type RetryableOperation,
} from './executor.js';
export { RetryingClient, type InvokeOptions, type RetryingClientOptions } from './client.js';
export { sleep } from './sleep.js';
