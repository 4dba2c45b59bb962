/**
 * Retry execution: drives one call through its strategy's attempt sequence
 */

import {
  NonRetryableError,
  OperationAbortedError,
  RetriesExhaustedError,
  contextForAttempt,
  createErrorContext,
  toError,
  type ErrorContext,
  type ExhaustionReason,
} from '@retry-quota/errors';
import { LoggerFactory, type Logger } from '@retry-quota/logging';

import { defaultErrorClassifier } from './classifier.js';
import { sleep as timerSleep } from './sleep.js';
import type {
  AttemptOutcome,
  AttemptSequence,
  Classification,
  ErrorClassifier,
  RetryAttempt,
  RetryEvent,
  RetryStrategy,
  RetryToken,
  SleepFn,
} from './types.js';

/**
 * What an operation receives for each attempt
 */
export interface AttemptContext {
  /** 1-based attempt number */
  readonly attempt: number;
  /** Aborts when the caller cancels or the deadline passes */
  readonly signal: AbortSignal;
  readonly token: RetryToken;
  /** Shared by every attempt of one call */
  readonly correlationId: string;
}

export type RetryableOperation<T> = (context: AttemptContext) => Promise<T>;

export interface ExecuteOptions {
  signal?: AbortSignal;
  /** Deadline for the whole call, backoff waits included */
  timeoutMs?: number;
  classifier?: ErrorClassifier;
  logger?: Logger;
  operationName?: string;
  onRetry?: (event: RetryEvent) => void;
  sleep?: SleepFn;
  correlationId?: string;
  now?: () => number;
}

export type RetryResult<T> =
  | {
      success: true;
      data: T;
      totalAttempts: number;
      totalTimeMs: number;
      attempts: RetryAttempt[];
    }
  | {
      success: false;
      error: Error;
      totalAttempts: number;
      totalTimeMs: number;
      attempts: RetryAttempt[];
    };

/**
 * Runs one call against a retry strategy
 */
export class RetryExecutor<T> {
  private readonly classifier: ErrorClassifier;
  private readonly logger: Logger;
  private readonly sleep: SleepFn;
  private readonly now: () => number;
  private attempts: RetryAttempt[] = [];
  private startTime = 0;

  constructor(
    private readonly strategy: RetryStrategy,
    private readonly options: ExecuteOptions = {}
  ) {
    this.classifier = options.classifier ?? defaultErrorClassifier;
    this.logger = options.logger ?? LoggerFactory.createSilentLogger('retry');
    this.sleep = options.sleep ?? timerSleep;
    this.now = options.now ?? Date.now;
  }

  /**
   * Execute the operation, returning a result record instead of throwing
   */
  async execute(operation: RetryableOperation<T>): Promise<RetryResult<T>> {
    this.startTime = this.now();
    this.attempts = [];
    const sequence = this.strategy.begin();

    try {
      const data = await this.run(operation, sequence);
      return {
        success: true,
        data,
        totalAttempts: sequence.attempts,
        totalTimeMs: this.now() - this.startTime,
        attempts: [...this.attempts],
      };
    } catch (error) {
      return {
        success: false,
        error: toError(error),
        totalAttempts: sequence.attempts,
        totalTimeMs: this.now() - this.startTime,
        attempts: [...this.attempts],
      };
    }
  }

  private async run(operation: RetryableOperation<T>, sequence: AttemptSequence): Promise<T> {
    const { operationName, timeoutMs } = this.options;
    const context = createErrorContext({
      component: 'retry',
      ...(this.options.correlationId !== undefined && {
        correlationId: this.options.correlationId,
      }),
      ...(operationName !== undefined && { operation: operationName }),
    });

    const controller = new AbortController();
    const callerSignal = this.options.signal;
    const onCallerAbort = (): void => controller.abort(callerSignal?.reason);
    let timedOut = false;
    let timer: ReturnType<typeof setTimeout> | undefined;

    if (callerSignal?.aborted) {
      controller.abort(callerSignal.reason);
    } else {
      callerSignal?.addEventListener('abort', onCallerAbort, { once: true });
    }
    if (timeoutMs !== undefined) {
      timer = setTimeout(() => {
        timedOut = true;
        controller.abort(new Error(`Deadline of ${timeoutMs}ms exceeded`));
      }, timeoutMs);
    }

    const { signal } = controller;
    const abort = (): OperationAbortedError => {
      sequence.cancel();
      const reason: unknown = signal.reason;
      const message = timedOut
        ? `${this.describe()} timed out after ${timeoutMs}ms`
        : `${this.describe()} was cancelled`;
      this.logger.debug(message, { attempts: sequence.attempts });
      return new OperationAbortedError(message, {
        cause: reason,
        context: contextForAttempt(context, sequence.attempts),
        data: { attempts: sequence.attempts, timedOut },
      });
    };

    try {
      for (;;) {
        if (signal.aborted) {
          throw abort();
        }
        // Adaptive mode may hold the attempt back until the client may send
        try {
          await sequence.beforeAttempt(signal);
        } catch (error) {
          if (signal.aborted) {
            throw abort();
          }
          throw error;
        }

        const token = sequence.startAttempt();
        this.logger.debug('Starting attempt', {
          operation: operationName,
          attempt: token.attempt,
          cost: token.cost,
          correlationId: context.correlationId,
        });

        // Execute the operation
        let result: T;
        try {
          result = await operation({
            attempt: token.attempt,
            signal,
            token,
            correlationId: context.correlationId,
          });
        } catch (error) {
          // A failure while aborting is the abort, not a retryable error
          if (signal.aborted) {
            throw abort();
          }

          // Throws once the sequence has ended
          const delayMs = this.handleFailure(sequence, error, token.attempt, context);
          // Wait before next attempt
          try {
            await this.sleep(delayMs, signal);
          } catch (sleepError) {
            if (signal.aborted) {
              throw abort();
            }
            throw sleepError;
          }
          continue;
        }

        sequence.record({ kind: 'success' });
        this.logger.debug('Attempt succeeded', {
          operation: operationName,
          attempt: token.attempt,
          tokens: this.strategy.bucket?.available,
        });
        return result;
      }
    } finally {
      // Returns tokens held for a retry that never started; no-op once the sequence ended
      sequence.cancel();
      clearTimeout(timer);
      callerSignal?.removeEventListener('abort', onCallerAbort);
    }
  }

  /**
   * Classify and record a failure. Returns the backoff delay, or throws the
   * terminal error when the sequence ends.
   */
  private handleFailure(
    sequence: AttemptSequence,
    error: unknown,
    attempt: number,
    context: ErrorContext
  ): number {
    const classification = this.classifier(error);
    const outcome: AttemptOutcome =
      classification.kind === 'retryable'
        ? { kind: 'retryable_failure', reason: classification, error }
        : { kind: 'non_retryable_failure', reason: classification, error };
    const decision = sequence.record(outcome);

    this.recordAttempt(attempt, decision.retry ? decision.delayMs : 0, error, classification);

    if (decision.retry) {
      if (classification.kind === 'retryable') {
        this.logger.debug('Attempt failed, retrying', {
          operation: this.options.operationName,
          attempt,
          delayMs: decision.delayMs,
          errorType: classification.errorType,
          tokens: this.strategy.bucket?.available,
        });
        this.options.onRetry?.({
          operationName: this.options.operationName,
          attempt,
          delayMs: decision.delayMs,
          error,
          reason: classification,
        });
      }
      return decision.delayMs;
    }

    const attemptContext = contextForAttempt(context, attempt);
    if (decision.outcome === 'non_retryable') {
      throw this.nonRetryable(error, classification, attemptContext);
    }
    if (decision.outcome === 'succeeded') {
      throw new Error(`Failed attempt ${attempt} was recorded as a success`);
    }
    throw this.exhausted(error, decision.outcome, attempt, attemptContext);
  }

  private nonRetryable(
    error: unknown,
    classification: Classification,
    context: ErrorContext
  ): NonRetryableError {
    if (error instanceof NonRetryableError) {
      return error;
    }
    const description =
      classification.kind === 'non_retryable' ? classification.description : 'non-retryable';
    this.logger.debug('Attempt failed with a non-retryable error', {
      operation: this.options.operationName,
      reason: description,
    });
    return new NonRetryableError(`${this.describe()} failed: ${toError(error).message}`, {
      cause: error,
      context,
      data: { reason: description },
    });
  }

  private exhausted(
    error: unknown,
    reason: ExhaustionReason,
    attempts: number,
    context: ErrorContext
  ): RetriesExhaustedError {
    const noun = attempts === 1 ? 'attempt' : 'attempts';
    const suffix = reason === 'quota_exhausted' ? ': retry quota exhausted' : '';
    const message = `${this.describe()} failed after ${attempts} ${noun}${suffix}`;

    this.logger.warn(message, {
      operation: this.options.operationName,
      reason,
      attempts,
      tokens: this.strategy.bucket?.available,
      lastError: toError(error).message,
    });
    return new RetriesExhaustedError(message, { attempts, reason, lastError: error, context });
  }

  private recordAttempt(
    attempt: number,
    delayMs: number,
    error: unknown,
    classification: Classification
  ): void {
    this.attempts.push({
      attempt,
      delayMs,
      elapsedMs: this.now() - this.startTime,
      error,
      classification,
    });
  }

  private describe(): string {
    return this.options.operationName ? `Operation ${this.options.operationName}` : 'Operation';
  }
}

/**
 * Run an operation under a retry strategy and return a result record
 */
export function tryExecuteWithRetry<T>(
  operation: RetryableOperation<T>,
  strategy: RetryStrategy,
  options: ExecuteOptions = {}
): Promise<RetryResult<T>> {
  return new RetryExecutor<T>(strategy, options).execute(operation);
}

/**
 * Run an operation under a retry strategy.
 *
 * Resolves with the operation's value. Rejects with `NonRetryableError` for a
 * non-retryable failure, `RetriesExhaustedError` once attempts or retry tokens
 * run out, and `OperationAbortedError` when the signal aborts or `timeoutMs`
 * passes.
 */
export async function executeWithRetry<T>(
  operation: RetryableOperation<T>,
  strategy: RetryStrategy,
  options: ExecuteOptions = {}
): Promise<T> {
  const result = await tryExecuteWithRetry(operation, strategy, options);
  if (result.success) {
    return result.data;
  }
  throw result.error;
}
