/**
 * Error handling utilities and helper functions
 */

import { RetryQuotaError } from './types.js';

/**
 * Result type for operations that can fail
 */
export type Result<T, E = Error> =
  | { success: true; data: T; error?: never }
  | { success: false; data?: never; error: E };

export function success<T>(data: T): Result<T, never> {
  return { success: true, data };
}

export function failure<E = Error>(error: E): Result<never, E> {
  return { success: false, error };
}

/**
 * Normalize a thrown value into an Error
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

/**
 * Wrap an async operation to return a Result instead of throwing
 */
export async function safeAsync<T>(operation: () => Promise<T>): Promise<Result<T, Error>> {
  try {
    return success(await operation());
  } catch (error) {
    return failure(toError(error));
  }
}

/**
 * Wrap a sync operation to return a Result instead of throwing
 */
export function safe<T>(operation: () => T): Result<T, Error> {
  try {
    return success(operation());
  } catch (error) {
    return failure(toError(error));
  }
}

/**
 * Whether an error of this package is classified retryable.
 * Foreign errors are left to the transport classifier and count as not retryable here.
 */
export function isRetryableError(error: unknown): boolean {
  return error instanceof RetryQuotaError && error.isRetryable();
}

/**
 * The error followed by its `cause`s, outermost first. Stops on cycles.
 */
export function getCauseChain(error: unknown): unknown[] {
  const chain: unknown[] = [];
  const seen = new Set<unknown>();
  let current: unknown = error;

  while (current !== undefined && !seen.has(current)) {
    chain.push(current);
    seen.add(current);
    current = current instanceof Error ? current.cause : undefined;
  }

  return chain;
}

/**
 * Extract error information for logging
 */
export function extractErrorInfo(error: unknown): Record<string, unknown> {
  if (error instanceof RetryQuotaError) {
    return error.toLogFormat();
  }

  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      ...(error.cause !== undefined && { cause: toError(error.cause).message }),
    };
  }

  return { message: String(error) };
}
