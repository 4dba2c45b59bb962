/**
 * Client seam: one resolver per client, one strategy per operation
 */

import type { ClientSettings, RetryOptionsInput } from '@retry-quota/configuration';
import { LoggerFactory, type Logger } from '@retry-quota/logging';

import {
  executeWithRetry,
  type ExecuteOptions,
  type RetryableOperation,
} from './executor.js';
import { RetryStrategyResolver, type ResolverDependencies } from './resolver.js';
import type { TokenBucketSnapshot } from './token-bucket.js';
import type { ErrorClassifier, RetryEvent, RetryStrategy, SleepFn } from './types.js';

export interface RetryingClientOptions extends ResolverDependencies {
  /** Client name, used as the logger component */
  name?: string;
  /** Client-level retry options */
  retry?: RetryOptionsInput;
  /** Per-operation overrides, keyed by operation name */
  operations?: Record<string, RetryOptionsInput>;
  classifier?: ErrorClassifier;
}

export interface InvokeOptions {
  signal?: AbortSignal;
  timeoutMs?: number;
  /** Overrides for this call, over the operation's configured options */
  retry?: RetryOptionsInput;
  onRetry?: (event: RetryEvent) => void;
}

/**
 * Base for service clients whose calls share one retry quota.
 *
 * Retry settings are resolved and validated at construction, so an invalid
 * operation override fails here rather than on first use.
 */
export class RetryingClient {
  readonly name: string;
  private readonly resolver: RetryStrategyResolver;
  private readonly operations: ReadonlyMap<string, RetryOptionsInput>;
  private readonly classifier: ErrorClassifier | undefined;
  private readonly sleep: SleepFn | undefined;
  private readonly now: (() => number) | undefined;
  protected readonly logger: Logger;

  constructor(options: RetryingClientOptions = {}) {
    this.name = options.name ?? 'client';
    this.logger = options.logger ?? LoggerFactory.createSilentLogger(this.name);
    this.classifier = options.classifier;
    this.sleep = options.sleep;
    this.now = options.now;
    this.resolver = new RetryStrategyResolver(options.retry, {
      ...options,
      logger: this.logger.child('retry'),
    });
    this.operations = new Map(Object.entries(options.operations ?? {}));

    for (const operationOptions of this.operations.values()) {
      this.resolver.resolve(operationOptions);
    }
  }

  /**
   * Build a client from a loaded settings document
   */
  static fromSettings(
    settings: ClientSettings,
    options: Omit<RetryingClientOptions, 'retry' | 'operations'> = {}
  ): RetryingClient {
    const name = options.name ?? 'client';
    return new RetryingClient({
      ...options,
      name,
      retry: settings.retry,
      operations: settings.operations,
      logger: options.logger ?? LoggerFactory.fromSettings(name, settings.logging),
    });
  }

  /**
   * The strategy calls to an operation run under
   */
  strategyFor(operationName: string, overrides?: RetryOptionsInput): RetryStrategy {
    const configured = this.operations.get(operationName);
    if (overrides) {
      // Per-call overrides are one-off; only configured operations are kept
      return this.resolver.resolve({ ...configured, ...overrides }, { cache: false });
    }
    return this.resolver.resolve(configured);
  }

  get retryQuota(): TokenBucketSnapshot {
    return this.resolver.bucket.snapshot();
  }

  /**
   * Run one call of an operation under its retry strategy
   */
  invoke<T>(
    operationName: string,
    operation: RetryableOperation<T>,
    options: InvokeOptions = {}
  ): Promise<T> {
    const strategy = this.strategyFor(operationName, options.retry);
    const executeOptions: ExecuteOptions = {
      operationName,
      logger: this.logger.child('retry', { operation: operationName }),
      ...(this.classifier && { classifier: this.classifier }),
      ...(this.sleep && { sleep: this.sleep }),
      ...(this.now && { now: this.now }),
      ...(options.signal && { signal: options.signal }),
      ...(options.timeoutMs !== undefined && { timeoutMs: options.timeoutMs }),
      ...(options.onRetry && { onRetry: options.onRetry }),
    };
    return executeWithRetry(operation, strategy, executeOptions);
  }
}
