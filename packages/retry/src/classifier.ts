/**
 * Default classification of transport errors
 */

import { readFileSync } from 'fs';

import { RetryQuotaError, RetryableTransportError } from '@retry-quota/errors';
import { z } from 'zod';

import type { Classification, ErrorClassifier } from './types.js';

const ErrorCodeTableSchema = z.object({
  throttlingCodes: z.array(z.string()),
  transientCodes: z.array(z.string()),
  timeoutCodes: z.array(z.string()),
  throttlingStatusCodes: z.array(z.number().int()),
  transientStatusCodes: z.array(z.number().int()),
});

export type ErrorCodeTable = z.output<typeof ErrorCodeTableSchema>;

export const ERROR_CODES: Readonly<ErrorCodeTable> = ErrorCodeTableSchema.parse(
  JSON.parse(readFileSync(new URL('./data/error-codes.json', import.meta.url), 'utf8'))
);

const THROTTLING_CODES = new Set(ERROR_CODES.throttlingCodes);
const TRANSIENT_CODES = new Set(ERROR_CODES.transientCodes);
const TIMEOUT_CODES = new Set(ERROR_CODES.timeoutCodes);
const THROTTLING_STATUS = new Set(ERROR_CODES.throttlingStatusCodes);
const TRANSIENT_STATUS = new Set(ERROR_CODES.transientStatusCodes);

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null;

function readString(source: Record<string, unknown>, key: string): string | undefined {
  const value = source[key];
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

/**
 * HTTP status from `$metadata.httpStatusCode`, `statusCode` or `status`
 */
export function readStatusCode(error: unknown): number | undefined {
  if (!isRecord(error)) {
    return undefined;
  }
  const metadata = error['$metadata'];
  const candidates = [
    isRecord(metadata) ? metadata['httpStatusCode'] : undefined,
    error['statusCode'],
    error['status'],
  ];
  return candidates.find((value): value is number => typeof value === 'number');
}

const nonRetryable = (description: string): Classification => ({
  kind: 'non_retryable',
  description,
});

/**
 * Classify package errors by their own classification, then foreign errors by
 * error code or name, then by HTTP status. Anything unrecognized is not retried.
 */
export const defaultErrorClassifier: ErrorClassifier = error => {
  if (error instanceof RetryableTransportError) {
    return {
      kind: 'retryable',
      errorType: error.errorType,
      timeout: error.timeout,
      ...(error.retryAfterMs !== undefined && { retryAfterMs: error.retryAfterMs }),
    };
  }

  if (error instanceof RetryQuotaError) {
    return nonRetryable(error.code);
  }

  if (!isRecord(error)) {
    return nonRetryable('unrecognized failure');
  }

  const codes = [readString(error, 'code'), readString(error, 'name')].filter(
    (code): code is string => code !== undefined
  );

  for (const code of codes) {
    if (TIMEOUT_CODES.has(code)) {
      return { kind: 'retryable', errorType: 'transient', timeout: true };
    }
    if (THROTTLING_CODES.has(code)) {
      return { kind: 'retryable', errorType: 'throttling', timeout: false };
    }
    if (TRANSIENT_CODES.has(code)) {
      return { kind: 'retryable', errorType: 'transient', timeout: false };
    }
  }

  const status = readStatusCode(error);
  if (status !== undefined) {
    if (THROTTLING_STATUS.has(status)) {
      return { kind: 'retryable', errorType: 'throttling', timeout: false };
    }
    if (TRANSIENT_STATUS.has(status)) {
      return { kind: 'retryable', errorType: 'server_error', timeout: false };
    }
    return nonRetryable(`HTTP ${status}`);
  }

  return nonRetryable(codes[0] ?? 'unrecognized failure');
};
