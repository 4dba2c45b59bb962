/**
 * Retry strategy types and interfaces
 */

import type { JitterMode, RetryMode } from '@retry-quota/configuration';
import type { ExhaustionReason, RetryableErrorType } from '@retry-quota/errors';

import type { RetryTokenBucket } from './token-bucket.js';

/**
 * Resolved retry configuration. Built once per client/operation pair and frozen.
 */
export interface RetryConfig {
  readonly mode: RetryMode;
  /** Total attempts, first attempt included; always 1 in `none` mode */
  readonly maxAttempts: number;
  readonly baseDelayMs: number;
  readonly maxDelayMs: number;
  /** Capacity and starting level of the client's retry token bucket */
  readonly initialTokens: number;
  readonly jitter: JitterMode;
  readonly retryCost: number;
  readonly timeoutPenalty: number;
  readonly successRefund: number;
}

/**
 * States of one call's attempt sequence
 */
export enum AttemptState {
  NOT_STARTED = 'not_started',
  ATTEMPTING = 'attempting',
  BACKING_OFF = 'backing_off',
  SUCCEEDED = 'succeeded',
  EXHAUSTED_RETRIES = 'exhausted_retries',
  NON_RETRYABLE_FAILED = 'non_retryable_failed',
  CANCELLED = 'cancelled',
}

export interface RetryableReason {
  readonly errorType: RetryableErrorType;
  /** The attempt timed out; drains extra tokens */
  readonly timeout: boolean;
  /** Server hint for the minimum wait before the next attempt */
  readonly retryAfterMs?: number;
}

export interface NonRetryableReason {
  readonly description: string;
}

/**
 * Classifier verdict for one failure
 */
export type Classification =
  | ({ readonly kind: 'retryable' } & RetryableReason)
  | ({ readonly kind: 'non_retryable' } & NonRetryableReason);

/**
 * Maps a transport-layer error into a classification.
 * Supplied by the transport layer; `defaultErrorClassifier` covers common cases.
 */
export type ErrorClassifier = (error: unknown) => Classification;

/**
 * Result of one attempt, fed back into the attempt sequence
 */
export type AttemptOutcome =
  | { readonly kind: 'success' }
  | { readonly kind: 'retryable_failure'; readonly reason: RetryableReason; readonly error: unknown }
  | {
      readonly kind: 'non_retryable_failure';
      readonly reason: NonRetryableReason;
      readonly error: unknown;
    };

/**
 * What the sequence decided after an attempt
 */
export type RetryDecision =
  | { readonly retry: true; readonly delayMs: number }
  | { readonly retry: false; readonly outcome: 'succeeded' | 'non_retryable' | ExhaustionReason };

/**
 * Permission for one attempt. The first attempt costs nothing; later ones hold
 * the tokens taken from the bucket for them.
 */
export interface RetryToken {
  /** 1-based attempt number */
  readonly attempt: number;
  readonly cost: number;
  readonly settled: boolean;
}

/**
 * Per-call state machine opened by {@link RetryStrategy.begin}
 */
export interface AttemptSequence {
  readonly state: AttemptState;
  /** Attempts started so far */
  readonly attempts: number;
  /** Wait until the strategy allows the next request to be sent */
  beforeAttempt(signal?: AbortSignal): Promise<void>;
  startAttempt(): RetryToken;
  record(outcome: AttemptOutcome): RetryDecision;
  /** Abandon the call, returning tokens taken for an attempt that never started */
  cancel(): void;
}

/**
 * A retry strategy, selected once when a client is constructed and shared by its calls
 */
export interface RetryStrategy {
  readonly mode: RetryMode;
  readonly config: RetryConfig;
  /** The client's retry token bucket; absent when retries are disabled */
  readonly bucket: RetryTokenBucket | undefined;
  begin(): AttemptSequence;
}

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

/**
 * Failed attempt record
 */
export interface RetryAttempt {
  readonly attempt: number;
  /** Delay scheduled after this attempt; 0 when no retry followed */
  readonly delayMs: number;
  /** Time since the call started */
  readonly elapsedMs: number;
  readonly error: unknown;
  readonly classification: Classification;
}

export interface RetryEvent {
  readonly operationName: string | undefined;
  readonly attempt: number;
  readonly delayMs: number;
  readonly error: unknown;
  readonly reason: RetryableReason;
}
