/**
 * Retry strategy resolution: operation options over client options over defaults
 */

import {
  ConfigUtils,
  DEFAULT_RETRY_OPTIONS,
  parseCompleteRetryOptions,
  parseRetryOptions,
  type CompleteRetryOptions,
  type RetryOptions,
  type RetryOptionsInput,
} from '@retry-quota/configuration';
import { ConfigurationError } from '@retry-quota/errors';
import { LoggerFactory, type Logger } from '@retry-quota/logging';

import type { RandomFn } from './delay-calculator.js';
import { ClientRateLimiter } from './rate-limiter.js';
import { AdaptiveRetryStrategy, NoRetryStrategy, StandardRetryStrategy } from './strategies.js';
import { RetryTokenBucket } from './token-bucket.js';
import type { RetryConfig, RetryStrategy, SleepFn } from './types.js';

export interface ResolverDependencies {
  logger?: Logger;
  random?: RandomFn;
  /** Clock in milliseconds, used by the adaptive rate limiter */
  now?: () => number;
  /** Wait used by the adaptive rate limiter */
  sleep?: SleepFn;
}

/**
 * Per-client state shared by every strategy resolved for that client
 */
export interface SharedRetryState {
  readonly bucket: RetryTokenBucket;
  readonly limiter?: ClientRateLimiter;
}

function toRetryConfig(options: CompleteRetryOptions): RetryConfig {
  return Object.freeze({
    mode: options.retry_mode,
    maxAttempts: options.retry_mode === 'none' ? 1 : options.max_attempts,
    baseDelayMs: options.base_delay_ms,
    maxDelayMs: options.max_delay_ms,
    initialTokens: options.initial_tokens,
    jitter: options.jitter,
    retryCost: options.retry_cost,
    timeoutPenalty: options.timeout_penalty,
    successRefund: options.success_refund,
  });
}

/**
 * Merge option layers over the defaults and validate the result.
 * Later layers win: pass client options first, operation options last.
 *
 * @throws ConfigurationError when any layer or the merged result is invalid
 */
export function resolveRetryConfig(...layers: (RetryOptionsInput | undefined)[]): RetryConfig {
  const parsed = layers.map((layer, index) =>
    parseRetryOptions(layer, index === 0 ? 'client retry options' : 'operation retry options')
  );
  const merged = ConfigUtils.mergeConfigs<CompleteRetryOptions>(
    { ...DEFAULT_RETRY_OPTIONS },
    ...parsed
  );
  return toRetryConfig(parseCompleteRetryOptions(merged, 'resolved retry options'));
}

/**
 * Build the strategy variant for a resolved config around existing shared state
 */
export function createRetryStrategy(
  config: RetryConfig,
  shared: SharedRetryState,
  deps: ResolverDependencies = {}
): RetryStrategy {
  switch (config.mode) {
    case 'none':
      return new NoRetryStrategy(config);
    case 'standard':
      return new StandardRetryStrategy(config, shared.bucket, deps);
    case 'adaptive':
      return new AdaptiveRetryStrategy(
        config,
        shared.bucket,
        shared.limiter ?? new ClientRateLimiter(deps),
        deps
      );
  }
}

/**
 * Resolve a strategy with its own, new token bucket.
 * Clients should hold a {@link RetryStrategyResolver} instead so their calls share one bucket.
 */
export function resolveRetryStrategy(
  clientOptions?: RetryOptionsInput,
  operationOptions?: RetryOptionsInput,
  deps: ResolverDependencies = {}
): RetryStrategy {
  const config = resolveRetryConfig(clientOptions, operationOptions);
  return createRetryStrategy(config, { bucket: new RetryTokenBucket(config.initialTokens) }, deps);
}

/**
 * Resolves retry strategies for one client.
 *
 * Built once at client construction. Owns the client's token bucket and, in
 * adaptive mode, its rate limiter; every strategy it returns shares them.
 * Strategies are memoized per resolved config.
 */
export class RetryStrategyResolver {
  readonly clientConfig: RetryConfig;
  readonly bucket: RetryTokenBucket;
  private readonly clientLayer: RetryOptions;
  private readonly logger: Logger;
  private limiter: ClientRateLimiter | undefined;
  private readonly strategies = new Map<string, RetryStrategy>();

  constructor(
    clientOptions: RetryOptionsInput = {},
    private readonly deps: ResolverDependencies = {}
  ) {
    this.clientLayer = parseRetryOptions(clientOptions, 'client retry options');
    this.clientConfig = resolveRetryConfig(this.clientLayer);
    this.bucket = new RetryTokenBucket(this.clientConfig.initialTokens);
    this.logger = deps.logger ?? LoggerFactory.createSilentLogger('retry');

    this.logger.info('Resolved client retry strategy', {
      mode: this.clientConfig.mode,
      maxAttempts: this.clientConfig.maxAttempts,
      initialTokens: this.clientConfig.initialTokens,
    });
  }

  /**
   * Strategy for a call with the given operation overrides
   *
   * @param options.cache keep the strategy for later calls; off for one-off per-call overrides
   * @throws ConfigurationError for invalid overrides, or an `initial_tokens`
   * override (the bucket belongs to the client)
   */
  resolve(operationOptions?: RetryOptionsInput, options: { cache?: boolean } = {}): RetryStrategy {
    const operationLayer = parseRetryOptions(operationOptions, 'operation retry options');
    if (operationLayer.initial_tokens !== undefined) {
      throw new ConfigurationError(
        'initial_tokens is a client setting and cannot be overridden per operation',
        { code: 'CLIENT_SCOPED_OPTION' }
      );
    }

    const config = resolveRetryConfig(this.clientLayer, operationLayer);
    const cache = options.cache ?? true;
    const key = JSON.stringify(config);
    const cached = this.strategies.get(key);
    if (cached) {
      return cached;
    }

    const strategy = createRetryStrategy(
      config,
      config.mode === 'adaptive'
        ? { bucket: this.bucket, limiter: this.getLimiter() }
        : { bucket: this.bucket },
      this.deps
    );
    if (cache) {
      this.strategies.set(key, strategy);
    }
    this.logger.debug('Resolved operation retry strategy', {
      mode: config.mode,
      maxAttempts: config.maxAttempts,
      baseDelayMs: config.baseDelayMs,
      maxDelayMs: config.maxDelayMs,
    });
    return strategy;
  }

  private getLimiter(): ClientRateLimiter {
    if (!this.limiter) {
      this.limiter = new ClientRateLimiter(this.deps);
    }
    return this.limiter;
  }
}
