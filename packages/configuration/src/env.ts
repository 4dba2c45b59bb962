/**
 * Retry options read from environment variables
 */

import { parseRetryOptions } from './validation.js';
import type { RetryOptions } from './schemas.js';
import type { Environment } from './utils.js';

export const DEFAULT_ENV_PREFIX = 'AWS_';

/**
 * Variable suffix for each option; the prefix is prepended
 */
export const ENV_VARIABLES = {
  max_attempts: 'MAX_ATTEMPTS',
  retry_mode: 'RETRY_MODE',
  base_delay_ms: 'RETRY_BASE_DELAY_MS',
  max_delay_ms: 'RETRY_MAX_DELAY_MS',
  initial_tokens: 'RETRY_INITIAL_TOKENS',
} as const;

const INTEGER_OPTIONS = new Set<string>(['max_attempts', 'initial_tokens']);

/**
 * Read retry options from the environment, e.g. `AWS_MAX_ATTEMPTS=5`, `AWS_RETRY_MODE=adaptive`.
 * Unset and empty variables are ignored.
 */
export function readRetryOptionsFromEnv(
  env: Environment = process.env,
  prefix: string = DEFAULT_ENV_PREFIX
): RetryOptions {
  const raw: Record<string, unknown> = {};

  for (const [option, suffix] of Object.entries(ENV_VARIABLES)) {
    const value = env[`${prefix}${suffix}`]?.trim();
    if (!value) {
      continue;
    }

    if (INTEGER_OPTIONS.has(option) && /^-?\d+$/.test(value)) {
      raw[option] = parseInt(value, 10);
    } else if (option === 'retry_mode') {
      raw[option] = value.toLowerCase();
    } else {
      raw[option] = value;
    }
  }

  return parseRetryOptions(raw, 'environment');
}
