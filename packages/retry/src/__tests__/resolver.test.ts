/**
 * Tests for retry strategy resolution
 */

import { ConfigValidationError } from '@retry-quota/configuration';
import { LogLevel, LoggerFactory } from '@retry-quota/logging';
import { describe, it, expect } from 'vitest';

import {
  AdaptiveRetryStrategy,
  NoRetryStrategy,
  RetryStrategyResolver,
  StandardRetryStrategy,
  resolveRetryConfig,
  resolveRetryStrategy,
  type RetryStrategy,
} from '../index.js';

function asAdaptive(strategy: RetryStrategy): AdaptiveRetryStrategy {
  if (!(strategy instanceof AdaptiveRetryStrategy)) {
    throw new Error(`Expected an adaptive strategy, got ${strategy.mode}`);
  }
  return strategy;
}

describe('resolveRetryConfig', () => {
  it('should fall back to the defaults', () => {
    const config = resolveRetryConfig();

    expect(config).toEqual({
      mode: 'standard',
      maxAttempts: 3,
      baseDelayMs: 100,
      maxDelayMs: 20000,
      initialTokens: 500,
      jitter: 'full',
      retryCost: 1,
      timeoutPenalty: 1,
      successRefund: 1,
    });
    expect(Object.isFrozen(config)).toBe(true);
  });

  it('should let operation options win over client options', () => {
    const config = resolveRetryConfig(
      { max_attempts: 5, base_delay_ms: '250ms', max_delay_ms: '2s' },
      { max_attempts: 2 }
    );

    expect(config).toMatchObject({ maxAttempts: 2, baseDelayMs: 250, maxDelayMs: 2000 });
  });

  it('should allow a single attempt in none mode', () => {
    expect(resolveRetryConfig({ retry_mode: 'none', max_attempts: 4 }).maxAttempts).toBe(1);
  });

  it('should reject invalid options with the layer they came from', () => {
    expect(() => resolveRetryConfig({ max_attempts: 0 })).toThrow(
      'Invalid retry configuration in client retry options: max_attempts: must be at least 1'
    );
    expect(() => resolveRetryConfig({}, { base_delay_ms: -5 })).toThrow(
      'Invalid retry configuration in operation retry options: base_delay_ms: must be non-negative'
    );
    expect(() => resolveRetryConfig({ base_delay_ms: 500, max_delay_ms: 100 })).toThrow(
      'Invalid retry configuration in resolved retry options: max_delay_ms: must be greater than or equal to base_delay_ms'
    );
  });

  it('should reject an unknown retry mode from untyped settings', () => {
    const settings = JSON.parse('{"retry_mode":"legacy"}');

    expect(() => resolveRetryStrategy(settings)).toThrow(
      'Invalid retry configuration in client retry options: retry_mode: must be one of standard, adaptive, none'
    );
  });
});

describe('resolveRetryStrategy', () => {
  it('should build the strategy for each mode', () => {
    const standard = resolveRetryStrategy({ initial_tokens: 50 });
    expect(standard).toBeInstanceOf(StandardRetryStrategy);
    expect(standard.bucket?.snapshot()).toEqual({ capacity: 50, available: 50 });

    const none = resolveRetryStrategy({ retry_mode: 'none' });
    expect(none).toBeInstanceOf(NoRetryStrategy);
    expect(none.bucket).toBeUndefined();
    expect(none.config.maxAttempts).toBe(1);

    expect(resolveRetryStrategy({}, { retry_mode: 'adaptive' })).toBeInstanceOf(AdaptiveRetryStrategy);
  });

  it('should give each resolution its own bucket', () => {
    expect(resolveRetryStrategy().bucket).not.toBe(resolveRetryStrategy().bucket);
  });
});

describe('RetryStrategyResolver', () => {
  it('should share one bucket across every operation of a client', () => {
    const resolver = new RetryStrategyResolver({ initial_tokens: 20 });

    const defaults = resolver.resolve();
    const patient = resolver.resolve({ max_attempts: 6 });

    expect(defaults.bucket).toBe(resolver.bucket);
    expect(patient.bucket).toBe(resolver.bucket);
    expect(patient.config.maxAttempts).toBe(6);
    expect(resolver.bucket.capacity).toBe(20);
  });

  it('should memoize strategies per resolved config', () => {
    const resolver = new RetryStrategyResolver();

    expect(resolver.resolve({ max_attempts: 4 })).toBe(resolver.resolve({ max_attempts: 4 }));
    expect(resolver.resolve()).toBe(resolver.resolve({ max_attempts: 3 }));
    expect(resolver.resolve({ max_attempts: 4 })).not.toBe(resolver.resolve());
  });

  it('should not keep strategies resolved without caching', () => {
    const resolver = new RetryStrategyResolver();

    const first = resolver.resolve({ max_attempts: 7 }, { cache: false });
    const second = resolver.resolve({ max_attempts: 7 }, { cache: false });

    expect(first).not.toBe(second);
    expect(first.bucket).toBe(resolver.bucket);
    expect(resolver.resolve({ max_attempts: 7 })).toBe(resolver.resolve({ max_attempts: 7 }));
  });

  it('should share one rate limiter between adaptive strategies', () => {
    const resolver = new RetryStrategyResolver({ retry_mode: 'adaptive' });

    const first = asAdaptive(resolver.resolve());
    const second = asAdaptive(resolver.resolve({ max_attempts: 5 }));

    expect(first.limiter).toBe(second.limiter);
    expect(first.bucket).toBe(second.bucket);
  });

  it('should keep initial_tokens a client setting', () => {
    const resolver = new RetryStrategyResolver();

    expect(() => resolver.resolve({ initial_tokens: 3 })).toThrow(
      'initial_tokens is a client setting and cannot be overridden per operation'
    );
  });

  it('should fail at construction on invalid client options', () => {
    expect(() => new RetryStrategyResolver({ max_attempts: 0 })).toThrow(ConfigValidationError);
  });

  it('should log the resolved client strategy', () => {
    const { logger, transport } = LoggerFactory.createMemoryLogger('test');

    new RetryStrategyResolver({ max_attempts: 4 }, { logger });

    expect(transport.messages(LogLevel.INFO)).toEqual(['Resolved client retry strategy']);
    expect(transport.entries[0]?.data).toEqual({
      mode: 'standard',
      maxAttempts: 4,
      initialTokens: 500,
    });
  });
});
