/**
 * Backoff delay calculation for retry attempts
 */

import type { RetryConfig } from './types.js';

/**
 * Exponents past this point already exceed any sane cap; stops 2^n reaching Infinity
 */
const MAX_EXPONENT = 62;

export type RandomFn = () => number;

/**
 * Retry-after hints are only honoured when finite and positive
 */
export const isUsableHint = (retryAfterMs: number | undefined): retryAfterMs is number =>
  retryAfterMs !== undefined && Number.isFinite(retryAfterMs) && retryAfterMs > 0;

/**
 * Capped exponential backoff with optional full jitter
 */
export class DelayCalculator {
  constructor(
    private readonly config: Pick<RetryConfig, 'baseDelayMs' | 'maxDelayMs' | 'jitter'>,
    private readonly random: RandomFn = Math.random
  ) {}

  /**
   * Backoff before jitter: min(maxDelay, baseDelay × 2^attemptIndex)
   * @param attemptIndex 0-based retry number
   */
  backoffCeiling(attemptIndex: number): number {
    const { baseDelayMs, maxDelayMs } = this.config;
    if (baseDelayMs === 0) {
      return 0;
    }
    const exponent = Math.min(Math.max(0, Math.floor(attemptIndex)), MAX_EXPONENT);
    return Math.min(maxDelayMs, baseDelayMs * 2 ** exponent);
  }

  /**
   * Delay before the next attempt, in [0, maxDelay]
   * @param attemptIndex 0-based retry number
   * @param retryAfterMs server hint; raises the delay but never past maxDelay
   */
  calculateDelay(attemptIndex: number, retryAfterMs?: number): number {
    const ceiling = this.backoffCeiling(attemptIndex);
    const jittered = this.config.jitter === 'full' ? this.random() * ceiling : ceiling;
    const hinted = isUsableHint(retryAfterMs) ? Math.max(jittered, retryAfterMs) : jittered;

    return Math.max(0, Math.floor(Math.min(this.config.maxDelayMs, hinted)));
  }
}
