import { ConfigurationError } from '@retry-quota/errors';

export interface TokenBucketSnapshot {
  readonly capacity: number;
  readonly available: number;
}

function assertAmount(amount: number, operation: string): void {
  if (!Number.isFinite(amount) || amount < 0) {
    throw new ConfigurationError(`Token ${operation} amount must be a non-negative number: ${amount}`, {
      code: 'INVALID_TOKEN_AMOUNT',
    });
  }
}

/**
 * Retry quota shared by every call on one client.
 *
 * Retries take tokens, successes give them back. The level stays within
 * [0, capacity]. Every method is synchronous, so on the event loop each call
 * is atomic with respect to the others; concurrent operations only interleave
 * between their `await`s.
 */
export class RetryTokenBucket {
  public readonly capacity: number;
  private tokens: number;

  constructor(capacity: number, initial: number = capacity) {
    if (!Number.isInteger(capacity) || capacity < 0) {
      throw new ConfigurationError(`Retry token capacity must be a non-negative integer: ${capacity}`);
    }
    assertAmount(initial, 'initial');

    this.capacity = capacity;
    this.tokens = Math.min(capacity, initial);
  }

  get available(): number {
    return this.tokens;
  }

  /**
   * Take `amount` tokens if that many are available. Never blocks.
   */
  acquire(amount = 1): boolean {
    assertAmount(amount, 'acquire');
    if (this.tokens < amount) {
      return false;
    }
    this.tokens -= amount;
    return true;
  }

  /**
   * Return tokens after a success, up to capacity. Returns the new level.
   */
  refund(amount = 1): number {
    assertAmount(amount, 'refund');
    this.tokens = Math.min(this.capacity, this.tokens + amount);
    return this.tokens;
  }

  /**
   * Drain tokens on costly failures such as timeouts, down to zero. Returns the new level.
   */
  penalize(amount = 1): number {
    assertAmount(amount, 'penalty');
    this.tokens = Math.max(0, this.tokens - amount);
    return this.tokens;
  }

  snapshot(): TokenBucketSnapshot {
    return { capacity: this.capacity, available: this.tokens };
  }
}
