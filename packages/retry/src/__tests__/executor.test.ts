/**
 * Tests for retried execution
 */

import {
  NonRetryableError,
  OperationAbortedError,
  RetriesExhaustedError,
  RetryableTransportError,
} from '@retry-quota/errors';
import { LogLevel, LoggerFactory } from '@retry-quota/logging';
import { describe, it, expect, vi } from 'vitest';

import {
  executeWithRetry,
  resolveRetryStrategy,
  tryExecuteWithRetry,
  type AttemptContext,
  type RetryEvent,
} from '../index.js';

const throttle = (): RetryableTransportError =>
  new RetryableTransportError('Rate exceeded', { errorType: 'throttling' });

function createSleep() {
  return vi.fn(async (_ms: number, _signal?: AbortSignal) => {});
}

/**
 * Operation that fails with the given errors in order, then returns `value`
 */
function failThenSucceed<T>(failures: unknown[], value: T) {
  const queue = [...failures];
  return vi.fn(async (_context: AttemptContext): Promise<T> => {
    if (queue.length > 0) {
      throw queue.shift();
    }
    return value;
  });
}

describe('executeWithRetry', () => {
  it('should recover from throttling within the quota', async () => {
    const strategy = resolveRetryStrategy(
      { max_attempts: 5, base_delay_ms: 100, max_delay_ms: 2000, initial_tokens: 5 },
      undefined,
      { random: () => 0.5 }
    );
    const sleep = createSleep();
    const operation = failThenSucceed([throttle(), throttle(), throttle()], 'ok');

    await expect(executeWithRetry(operation, strategy, { sleep })).resolves.toBe('ok');

    expect(operation).toHaveBeenCalledTimes(4);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([50, 100, 200]);
    expect(strategy.bucket?.available).toBe(3);
  });

  it('should make exactly max_attempts attempts on persistent failure', async () => {
    const strategy = resolveRetryStrategy({ max_attempts: 4, initial_tokens: 100 });
    const lastError = throttle();
    const operation = failThenSucceed([throttle(), throttle(), throttle(), lastError], 'never');

    const error = await executeWithRetry(operation, strategy, {
      sleep: createSleep(),
      operationName: 'GetItem',
    }).catch((e: unknown) => e);

    expect(operation).toHaveBeenCalledTimes(4);
    expect(error).toBeInstanceOf(RetriesExhaustedError);
    expect(error).toMatchObject({
      message: 'Operation GetItem failed after 4 attempts',
      attempts: 4,
      reason: 'max_attempts',
      code: 'MAX_ATTEMPTS_EXCEEDED',
      lastError,
      cause: lastError,
    });
    expect(strategy.bucket?.available).toBe(97);
  });

  it('should stop when the retry quota runs out', async () => {
    const strategy = resolveRetryStrategy({ max_attempts: 5, initial_tokens: 1 });
    const operation = failThenSucceed([throttle(), throttle(), throttle()], 'ok');

    const error = await executeWithRetry(operation, strategy, { sleep: createSleep() }).catch(
      (e: unknown) => e
    );

    expect(operation).toHaveBeenCalledTimes(2);
    expect(error).toMatchObject({
      message: 'Operation failed after 2 attempts: retry quota exhausted',
      reason: 'quota_exhausted',
      code: 'RETRY_QUOTA_EXHAUSTED',
    });
    expect(strategy.bucket?.available).toBe(0);
  });

  it('should surface a non-retryable failure after one attempt', async () => {
    const strategy = resolveRetryStrategy({ initial_tokens: 10 });
    const original = new Error('Validation failed');
    const operation = failThenSucceed([original], 'ok');
    const sleep = createSleep();

    const error = await executeWithRetry(operation, strategy, { sleep }).catch((e: unknown) => e);

    expect(operation).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
    expect(error).toBeInstanceOf(NonRetryableError);
    expect(error).toMatchObject({ message: 'Operation failed: Validation failed', cause: original });
    expect(strategy.bucket?.available).toBe(10);
  });

  it('should rethrow a non-retryable error as it is', async () => {
    const original = new NonRetryableError('Access denied');
    const operation = failThenSucceed([original], 'ok');

    await expect(executeWithRetry(operation, resolveRetryStrategy())).rejects.toBe(original);
  });

  it('should make a single attempt in none mode', async () => {
    const strategy = resolveRetryStrategy({ retry_mode: 'none', max_attempts: 5 });
    const operation = failThenSucceed([throttle()], 'ok');

    await expect(executeWithRetry(operation, strategy)).rejects.toThrow('Operation failed after 1 attempt');
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it('should use a custom classifier', async () => {
    const strategy = resolveRetryStrategy({ max_attempts: 3 });
    const operation = failThenSucceed([new Error('flaky'), new Error('flaky')], 'ok');

    await expect(
      executeWithRetry(operation, strategy, {
        sleep: createSleep(),
        classifier: () => ({ kind: 'retryable', errorType: 'transient', timeout: false }),
      })
    ).resolves.toBe('ok');
    expect(operation).toHaveBeenCalledTimes(3);
  });

  it('should back off normally when the retry-after header did not parse', async () => {
    const strategy = resolveRetryStrategy({}, undefined, { random: () => 0.5 });
    const sleep = createSleep();
    const unparsed = new RetryableTransportError('Rate exceeded', {
      errorType: 'throttling',
      retryAfterMs: Number('abc'),
    });

    await executeWithRetry(failThenSucceed([unparsed], 'ok'), strategy, { sleep });

    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([50]);
  });

  it('should pass the attempt number and one correlation id to every attempt', async () => {
    const operation = failThenSucceed([throttle(), throttle()], 'ok');

    await executeWithRetry(operation, resolveRetryStrategy(), {
      sleep: createSleep(),
      correlationId: 'call-1',
    });

    expect(operation.mock.calls.map(([context]) => [context.attempt, context.correlationId])).toEqual([
      [1, 'call-1'],
      [2, 'call-1'],
      [3, 'call-1'],
    ]);
    expect(operation.mock.calls.map(([context]) => context.token.cost)).toEqual([0, 1, 1]);
  });

  it('should report each retry', async () => {
    const events: RetryEvent[] = [];
    const strategy = resolveRetryStrategy({}, undefined, { random: () => 0 });
    const error = throttle();

    await executeWithRetry(failThenSucceed([error], 'ok'), strategy, {
      sleep: createSleep(),
      operationName: 'PutItem',
      onRetry: event => events.push(event),
    });

    expect(events).toEqual([
      {
        operationName: 'PutItem',
        attempt: 1,
        delayMs: 0,
        error,
        reason: { kind: 'retryable', errorType: 'throttling', timeout: false },
      },
    ]);
  });

  it('should log attempts at debug and exhaustion at warn', async () => {
    const { logger, transport } = LoggerFactory.createMemoryLogger('test');
    const strategy = resolveRetryStrategy({ max_attempts: 2 });

    await executeWithRetry(failThenSucceed([throttle()], 'ok'), strategy, {
      sleep: createSleep(),
      logger,
    });
    expect(transport.messages(LogLevel.DEBUG)).toEqual([
      'Starting attempt',
      'Attempt failed, retrying',
      'Starting attempt',
      'Attempt succeeded',
    ]);

    transport.clear();
    await executeWithRetry(failThenSucceed([throttle(), throttle()], 'ok'), strategy, {
      sleep: createSleep(),
      logger,
      operationName: 'Query',
    }).catch(() => undefined);
    expect(transport.messages(LogLevel.WARN)).toEqual(['Operation Query failed after 2 attempts']);
  });
});

describe('cancellation', () => {
  it('should abandon the backoff and return the pending token', async () => {
    const strategy = resolveRetryStrategy({ initial_tokens: 10, base_delay_ms: 1000 });
    const controller = new AbortController();
    const reason = new Error('caller went away');
    const operation = failThenSucceed([throttle(), throttle()], 'ok');

    const error = await executeWithRetry(operation, strategy, {
      signal: controller.signal,
      onRetry: () => controller.abort(reason),
    }).catch((e: unknown) => e);

    expect(operation).toHaveBeenCalledTimes(1);
    expect(error).toBeInstanceOf(OperationAbortedError);
    expect(error).toMatchObject({ message: 'Operation was cancelled', cause: reason });
    expect(strategy.bucket?.available).toBe(10);
  });

  it('should return the pending token when the retry hook throws', async () => {
    const strategy = resolveRetryStrategy({ initial_tokens: 10 });
    const operation = failThenSucceed([throttle(), throttle()], 'ok');

    await expect(
      executeWithRetry(operation, strategy, {
        sleep: createSleep(),
        onRetry: () => {
          throw new Error('hook');
        },
      })
    ).rejects.toThrow('hook');
    expect(operation).toHaveBeenCalledTimes(1);
    expect(strategy.bucket?.available).toBe(10);
  });

  it('should return the pending token when the wait fails', async () => {
    const strategy = resolveRetryStrategy({ initial_tokens: 10 });
    const sleep = vi.fn(async (_ms: number, _signal?: AbortSignal): Promise<void> => {
      throw new Error('timer broke');
    });

    await expect(
      executeWithRetry(failThenSucceed([throttle()], 'ok'), strategy, { sleep })
    ).rejects.toThrow('timer broke');
    expect(strategy.bucket?.available).toBe(10);
  });

  it('should not start when the signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort(new Error('too late'));
    const operation = failThenSucceed([], 'ok');

    await expect(
      executeWithRetry(operation, resolveRetryStrategy(), { signal: controller.signal })
    ).rejects.toBeInstanceOf(OperationAbortedError);
    expect(operation).not.toHaveBeenCalled();
  });

  it('should abort once the deadline passes', async () => {
    const strategy = resolveRetryStrategy({ initial_tokens: 10, base_delay_ms: 1000 }, undefined, {
      random: () => 0.5,
    });
    const operation = failThenSucceed([throttle(), throttle()], 'ok');

    const error = await executeWithRetry(operation, strategy, {
      timeoutMs: 10,
      operationName: 'Scan',
    }).catch((e: unknown) => e);

    expect(operation).toHaveBeenCalledTimes(1);
    expect(error).toBeInstanceOf(OperationAbortedError);
    expect(error).toMatchObject({ message: 'Operation Scan timed out after 10ms' });
    expect(strategy.bucket?.available).toBe(10);
  });

  it('should treat a failure caused by the abort as cancellation', async () => {
    const controller = new AbortController();
    const operation = vi.fn(async ({ signal }: AttemptContext): Promise<string> => {
      controller.abort(new Error('stop'));
      throw signal.reason;
    });

    await expect(
      executeWithRetry(operation, resolveRetryStrategy(), { signal: controller.signal })
    ).rejects.toBeInstanceOf(OperationAbortedError);
    expect(operation).toHaveBeenCalledTimes(1);
  });
});

describe('tryExecuteWithRetry', () => {
  it('should return a result record with the failed attempts', async () => {
    const strategy = resolveRetryStrategy({}, undefined, { random: () => 0.5 });
    const error = throttle();

    const result = await tryExecuteWithRetry(failThenSucceed([error], 'ok'), strategy, {
      sleep: createSleep(),
      now: () => 0,
    });

    expect(result).toEqual({
      success: true,
      data: 'ok',
      totalAttempts: 2,
      totalTimeMs: 0,
      attempts: [
        {
          attempt: 1,
          delayMs: 50,
          elapsedMs: 0,
          error,
          classification: { kind: 'retryable', errorType: 'throttling', timeout: false },
        },
      ],
    });
  });

  it('should return the terminal error instead of throwing', async () => {
    const result = await tryExecuteWithRetry(
      failThenSucceed([new Error('nope')], 'ok'),
      resolveRetryStrategy()
    );

    expect(result.success).toBe(false);
    expect(result.totalAttempts).toBe(1);
    if (!result.success) {
      expect(result.error).toBeInstanceOf(NonRetryableError);
    }
  });
});
