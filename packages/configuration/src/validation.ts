import { ConfigurationError } from '@retry-quota/errors';
import type { z } from 'zod';

import {
  ClientSettingsSchema,
  CompleteRetryOptionsSchema,
  RetryOptionsSchema,
  type ClientSettings,
  type CompleteRetryOptions,
  type RetryOptions,
} from './schemas.js';

/**
 * Settings that failed schema validation; one `path: message` line per issue
 */
export class ConfigValidationError extends ConfigurationError {
  public readonly issues: string[];

  constructor(
    public readonly source: string,
    errors: z.ZodError
  ) {
    const issues = errors.issues.map(issue => {
      const path = issue.path.join('.');
      return path ? `${path}: ${issue.message}` : issue.message;
    });
    super(`Invalid retry configuration in ${source}: ${issues.join('; ')}`, {
      code: 'CONFIG_VALIDATION_ERROR',
      cause: errors,
      data: { source, issues },
    });
    this.issues = issues;
  }
}

function parseWith<S extends z.ZodTypeAny>(schema: S, input: unknown, source: string): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ConfigValidationError(source, result.error);
  }
  return result.data;
}

/**
 * Validate one layer of retry options
 */
export function parseRetryOptions(input: unknown, source = 'retry options'): RetryOptions {
  return parseWith(RetryOptionsSchema, input ?? {}, source);
}

/**
 * Validate a fully merged set of retry options
 */
export function parseCompleteRetryOptions(
  input: unknown,
  source = 'retry options'
): CompleteRetryOptions {
  return parseWith(CompleteRetryOptionsSchema, input, source);
}

export function parseClientSettings(input: unknown, source = 'client settings'): ClientSettings {
  return parseWith(ClientSettingsSchema, input ?? {}, source);
}
