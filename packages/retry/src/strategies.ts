/**
 * Retry strategy variants. Selected once per client by the resolver.
 */

import { StandardAttemptSequence } from './attempt-sequence.js';
import { DelayCalculator, type RandomFn } from './delay-calculator.js';
import type { ClientRateLimiter } from './rate-limiter.js';
import type { RetryTokenBucket } from './token-bucket.js';
import type { AttemptSequence, RetryConfig, RetryStrategy } from './types.js';

export interface StrategyDependencies {
  /** Jitter source, uniform in [0, 1) */
  random?: RandomFn;
}

/**
 * Single attempt; failures are surfaced as they are classified
 */
export class NoRetryStrategy implements RetryStrategy {
  readonly mode = 'none';
  readonly bucket = undefined;
  readonly config: RetryConfig;
  private readonly calculator: DelayCalculator;

  constructor(config: RetryConfig) {
    this.config = { ...config, maxAttempts: 1 };
    this.calculator = new DelayCalculator(this.config);
  }

  begin(): AttemptSequence {
    return new StandardAttemptSequence({ config: this.config, calculator: this.calculator });
  }
}

/**
 * Capped exponential backoff with full jitter, limited by the client's retry quota
 */
export class StandardRetryStrategy implements RetryStrategy {
  readonly mode = 'standard';
  private readonly calculator: DelayCalculator;

  constructor(
    readonly config: RetryConfig,
    readonly bucket: RetryTokenBucket,
    deps: StrategyDependencies = {}
  ) {
    this.calculator = new DelayCalculator(config, deps.random);
  }

  begin(): AttemptSequence {
    return new StandardAttemptSequence({
      config: this.config,
      calculator: this.calculator,
      bucket: this.bucket,
    });
  }
}

/**
 * Standard retries plus client-side send-rate limiting that backs off after throttling
 */
export class AdaptiveRetryStrategy implements RetryStrategy {
  readonly mode = 'adaptive';
  private readonly calculator: DelayCalculator;

  constructor(
    readonly config: RetryConfig,
    readonly bucket: RetryTokenBucket,
    readonly limiter: ClientRateLimiter,
    deps: StrategyDependencies = {}
  ) {
    this.calculator = new DelayCalculator(config, deps.random);
  }

  begin(): AttemptSequence {
    return new StandardAttemptSequence({
      config: this.config,
      calculator: this.calculator,
      bucket: this.bucket,
      limiter: this.limiter,
    });
  }
}
