import type { DelayCalculator } from './delay-calculator.js';
import type { ClientRateLimiter } from './rate-limiter.js';
import type { RetryTokenBucket } from './token-bucket.js';
import {
  AttemptState,
  type AttemptOutcome,
  type AttemptSequence,
  type RetryConfig,
  type RetryDecision,
  type RetryToken,
} from './types.js';

class AttemptToken implements RetryToken {
  settled = false;

  constructor(
    readonly attempt: number,
    readonly cost: number
  ) {}
}

export interface AttemptSequenceDependencies {
  readonly config: RetryConfig;
  readonly calculator: DelayCalculator;
  /** Shared retry quota; without one, retries are limited by attempts only */
  readonly bucket?: RetryTokenBucket;
  /** Client send-rate limiter (adaptive mode) */
  readonly limiter?: ClientRateLimiter;
}

/**
 * State machine for the attempts of one call.
 *
 * not_started → attempting → (backing_off → attempting)* → succeeded |
 * exhausted_retries | non_retryable_failed, or cancelled from any
 * non-terminal state.
 */
export class StandardAttemptSequence implements AttemptSequence {
  private currentState = AttemptState.NOT_STARTED;
  private attemptCount = 0;
  private currentToken: AttemptToken | undefined;
  /** Tokens taken for the next attempt, not yet spent on it */
  private pendingCost = 0;

  constructor(private readonly deps: AttemptSequenceDependencies) {}

  get state(): AttemptState {
    return this.currentState;
  }

  get attempts(): number {
    return this.attemptCount;
  }

  async beforeAttempt(signal?: AbortSignal): Promise<void> {
    if (this.deps.limiter) {
      await this.deps.limiter.acquireSendToken(signal);
    }
  }

  startAttempt(): RetryToken {
    if (
      this.currentState !== AttemptState.NOT_STARTED &&
      this.currentState !== AttemptState.BACKING_OFF
    ) {
      throw new Error(`Cannot start an attempt in state ${this.currentState}`);
    }

    this.attemptCount += 1;
    this.currentToken = new AttemptToken(this.attemptCount, this.pendingCost);
    this.pendingCost = 0;
    this.currentState = AttemptState.ATTEMPTING;
    return this.currentToken;
  }

  record(outcome: AttemptOutcome): RetryDecision {
    if (this.currentState !== AttemptState.ATTEMPTING) {
      throw new Error(`Cannot record an outcome in state ${this.currentState}`);
    }
    if (this.currentToken) {
      this.currentToken.settled = true;
    }

    const { config, bucket, limiter } = this.deps;
    limiter?.updateSendingRate(
      outcome.kind === 'retryable_failure' && outcome.reason.errorType === 'throttling'
    );

    switch (outcome.kind) {
      case 'success':
        bucket?.refund(config.successRefund);
        this.currentState = AttemptState.SUCCEEDED;
        return { retry: false, outcome: 'succeeded' };

      case 'non_retryable_failure':
        this.currentState = AttemptState.NON_RETRYABLE_FAILED;
        return { retry: false, outcome: 'non_retryable' };

      case 'retryable_failure': {
        // Attempts run out before tokens are touched
        if (this.attemptCount >= config.maxAttempts) {
          this.currentState = AttemptState.EXHAUSTED_RETRIES;
          return { retry: false, outcome: 'max_attempts' };
        }

        if (bucket) {
          // Timeouts cost extra
          if (outcome.reason.timeout) {
            bucket.penalize(config.timeoutPenalty);
          }
          if (!bucket.acquire(config.retryCost)) {
            this.currentState = AttemptState.EXHAUSTED_RETRIES;
            return { retry: false, outcome: 'quota_exhausted' };
          }
          // Held until the next attempt starts, or refunded on cancel
          this.pendingCost = config.retryCost;
        }

        this.currentState = AttemptState.BACKING_OFF;
        return {
          retry: true,
          delayMs: this.deps.calculator.calculateDelay(
            this.attemptCount - 1,
            outcome.reason.retryAfterMs
          ),
        };
      }
    }
  }

  cancel(): void {
    if (
      this.currentState === AttemptState.SUCCEEDED ||
      this.currentState === AttemptState.EXHAUSTED_RETRIES ||
      this.currentState === AttemptState.NON_RETRYABLE_FAILED ||
      this.currentState === AttemptState.CANCELLED
    ) {
      return;
    }

    if (this.pendingCost > 0) {
      this.deps.bucket?.refund(this.pendingCost);
      this.pendingCost = 0;
    }
    this.currentState = AttemptState.CANCELLED;
  }
}
