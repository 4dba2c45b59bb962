/**
 * Tests for the per-call attempt state machine
 */

import { describe, it, expect } from 'vitest';

import {
  AttemptState,
  DelayCalculator,
  RetryTokenBucket,
  StandardAttemptSequence,
  type AttemptOutcome,
  type RetryConfig,
} from '../index.js';

const config: RetryConfig = {
  mode: 'standard',
  maxAttempts: 3,
  baseDelayMs: 100,
  maxDelayMs: 2000,
  initialTokens: 10,
  jitter: 'none',
  retryCost: 1,
  timeoutPenalty: 1,
  successRefund: 1,
};

const throttled: AttemptOutcome = {
  kind: 'retryable_failure',
  reason: { errorType: 'throttling', timeout: false },
  error: new Error('throttled'),
};

function createSequence(
  overrides: Partial<RetryConfig> = {},
  bucket = new RetryTokenBucket(10)
): { sequence: StandardAttemptSequence; bucket: RetryTokenBucket } {
  const resolved = { ...config, ...overrides };
  const sequence = new StandardAttemptSequence({
    config: resolved,
    calculator: new DelayCalculator(resolved),
    bucket,
  });
  return { sequence, bucket };
}

describe('StandardAttemptSequence', () => {
  it('should succeed on the first attempt without spending tokens', () => {
    const { sequence, bucket } = createSequence({}, new RetryTokenBucket(10, 7));
    expect(sequence.state).toBe(AttemptState.NOT_STARTED);

    const token = sequence.startAttempt();
    expect(token).toMatchObject({ attempt: 1, cost: 0, settled: false });
    expect(sequence.state).toBe(AttemptState.ATTEMPTING);

    expect(sequence.record({ kind: 'success' })).toEqual({ retry: false, outcome: 'succeeded' });
    expect(token.settled).toBe(true);
    expect(sequence.state).toBe(AttemptState.SUCCEEDED);
    expect(bucket.available).toBe(8);
  });

  it('should back off exponentially and stop at max attempts', () => {
    const { sequence, bucket } = createSequence();

    sequence.startAttempt();
    expect(sequence.record(throttled)).toEqual({ retry: true, delayMs: 100 });
    expect(sequence.state).toBe(AttemptState.BACKING_OFF);

    expect(sequence.startAttempt()).toMatchObject({ attempt: 2, cost: 1 });
    expect(sequence.record(throttled)).toEqual({ retry: true, delayMs: 200 });

    sequence.startAttempt();
    expect(sequence.record(throttled)).toEqual({ retry: false, outcome: 'max_attempts' });
    expect(sequence.state).toBe(AttemptState.EXHAUSTED_RETRIES);
    expect(sequence.attempts).toBe(3);
    expect(bucket.available).toBe(8);
  });

  it('should stop with quota exhausted when no retry token is left', () => {
    const { sequence, bucket } = createSequence({ maxAttempts: 5 }, new RetryTokenBucket(1));

    sequence.startAttempt();
    expect(sequence.record(throttled).retry).toBe(true);
    sequence.startAttempt();
    expect(sequence.record(throttled)).toEqual({ retry: false, outcome: 'quota_exhausted' });
    expect(sequence.state).toBe(AttemptState.EXHAUSTED_RETRIES);
    expect(bucket.available).toBe(0);
  });

  it('should drain extra tokens after a timeout', () => {
    const { sequence, bucket } = createSequence({ timeoutPenalty: 2 });

    sequence.startAttempt();
    sequence.record({
      kind: 'retryable_failure',
      reason: { errorType: 'transient', timeout: true },
      error: new Error('timed out'),
    });
    expect(bucket.available).toBe(7);
  });

  it('should honour a retry-after hint', () => {
    const { sequence } = createSequence();

    sequence.startAttempt();
    expect(
      sequence.record({
        kind: 'retryable_failure',
        reason: { errorType: 'throttling', timeout: false, retryAfterMs: 500 },
        error: new Error('throttled'),
      })
    ).toEqual({ retry: true, delayMs: 500 });
  });

  it('should end at once on a non-retryable failure', () => {
    const { sequence, bucket } = createSequence();

    sequence.startAttempt();
    expect(
      sequence.record({
        kind: 'non_retryable_failure',
        reason: { description: 'HTTP 400' },
        error: new Error('bad request'),
      })
    ).toEqual({ retry: false, outcome: 'non_retryable' });
    expect(sequence.state).toBe(AttemptState.NON_RETRYABLE_FAILED);
    expect(bucket.available).toBe(10);
  });

  it('should return the pending retry token when cancelled during backoff', () => {
    const { sequence, bucket } = createSequence();

    sequence.startAttempt();
    sequence.record(throttled);
    expect(bucket.available).toBe(9);

    sequence.cancel();
    expect(sequence.state).toBe(AttemptState.CANCELLED);
    expect(bucket.available).toBe(10);
    expect(() => sequence.startAttempt()).toThrow('Cannot start an attempt in state cancelled');
  });

  it('should ignore cancel once the sequence has ended', () => {
    const { sequence } = createSequence();

    sequence.startAttempt();
    sequence.record({ kind: 'success' });
    sequence.cancel();
    expect(sequence.state).toBe(AttemptState.SUCCEEDED);
  });

  it('should reject outcomes outside an attempt', () => {
    const { sequence } = createSequence();

    expect(() => sequence.record({ kind: 'success' })).toThrow(
      'Cannot record an outcome in state not_started'
    );
    sequence.startAttempt();
    expect(() => sequence.startAttempt()).toThrow('Cannot start an attempt in state attempting');
  });

  it('should retry without a bucket when none is given', () => {
    const sequence = new StandardAttemptSequence({
      config,
      calculator: new DelayCalculator(config),
    });

    sequence.startAttempt();
    expect(sequence.record(throttled)).toEqual({ retry: true, delayMs: 100 });
    expect(sequence.startAttempt().cost).toBe(0);
  });
});
