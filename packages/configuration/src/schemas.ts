/**
 * Retry settings schemas
 *
 * Option names are snake_case, as they appear in settings files and
 * in generated client configuration.
 */

import { z } from 'zod';

import { ConfigUtils, TIME } from './utils.js';

export const RETRY_MODES = ['standard', 'adaptive', 'none'] as const;
export type RetryMode = (typeof RETRY_MODES)[number];

export const JITTER_MODES = ['full', 'none'] as const;
export type JitterMode = (typeof JITTER_MODES)[number];

/**
 * Milliseconds as a number, or a duration string such as "250ms" or "2s"
 */
const durationMs = z
  .union([z.number(), z.string()])
  .transform((value, ctx) => {
    try {
      return ConfigUtils.parseDuration(value);
    } catch (error) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: error instanceof Error ? error.message : String(error),
      });
      return z.NEVER;
    }
  })
  .pipe(z.number().finite().min(0, 'must be non-negative'));

const tokenCount = z.number().int('must be an integer').min(0, 'must be non-negative');

const retryOptionsShape = {
  /** Total attempts per call, first attempt included */
  max_attempts: z.number().int('must be an integer').min(1, 'must be at least 1'),
  retry_mode: z.enum(RETRY_MODES, {
    errorMap: () => ({ message: `must be one of ${RETRY_MODES.join(', ')}` }),
  }),
  /** Backoff base; delay before retry i is base × 2^i, capped */
  base_delay_ms: durationMs,
  /** Cap for any single backoff delay */
  max_delay_ms: durationMs,
  /** Capacity and starting level of the client's retry token bucket */
  initial_tokens: tokenCount,
  jitter: z.enum(JITTER_MODES, {
    errorMap: () => ({ message: `must be one of ${JITTER_MODES.join(', ')}` }),
  }),
  /** Tokens taken from the bucket for each retry */
  retry_cost: tokenCount,
  /** Extra tokens drained when an attempt timed out */
  timeout_penalty: tokenCount,
  /** Tokens returned to the bucket when a call succeeds */
  success_refund: tokenCount,
};

/**
 * One layer of retry options (client, operation, file, environment). Every key is optional.
 */
export const RetryOptionsSchema = z.object(retryOptionsShape).partial().strict();

/**
 * Fully resolved retry options
 */
export const CompleteRetryOptionsSchema = z
  .object(retryOptionsShape)
  .strict()
  .refine(options => options.max_delay_ms >= options.base_delay_ms, {
    message: 'must be greater than or equal to base_delay_ms',
    path: ['max_delay_ms'],
  });

/** Options as callers write them (durations may be strings) */
export type RetryOptionsInput = z.input<typeof RetryOptionsSchema>;
/** One parsed layer of options */
export type RetryOptions = z.output<typeof RetryOptionsSchema>;
/** Options with every key resolved */
export type CompleteRetryOptions = z.output<typeof CompleteRetryOptionsSchema>;

export const DEFAULT_RETRY_OPTIONS: Readonly<CompleteRetryOptions> = Object.freeze<CompleteRetryOptions>({
  max_attempts: 3,
  retry_mode: 'standard',
  base_delay_ms: 100 * TIME.MILLISECOND,
  max_delay_ms: 20 * TIME.SECOND,
  initial_tokens: 500,
  jitter: 'full',
  retry_cost: 1,
  timeout_penalty: 1,
  success_refund: 1,
});

export const LoggingSettingsSchema = z
  .object({
    level: z.enum(['DEBUG', 'INFO', 'WARN', 'ERROR', 'SILENT']).default('INFO'),
    format: z.enum(['json', 'text']).default('text'),
    colors: z.boolean().default(true),
  })
  .strict();

/**
 * Retry settings document: client defaults, per-operation overrides, logging
 */
export const ClientSettingsSchema = z
  .object({
    retry: RetryOptionsSchema.default({}),
    operations: z.record(z.string().min(1), RetryOptionsSchema).default({}),
    logging: LoggingSettingsSchema.default({}),
  })
  .strict();

export type LoggingSettingsConfig = z.output<typeof LoggingSettingsSchema>;
export type ClientSettings = z.output<typeof ClientSettingsSchema>;
export type ClientSettingsInput = z.input<typeof ClientSettingsSchema>;
