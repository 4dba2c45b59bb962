/**
 * Error classes raised by retry resolution and execution
 */

import { createErrorContext } from './context.js';
import {
  ErrorCategory,
  ErrorSeverity,
  RetryClassification,
  RetryQuotaError,
  type ErrorMetadata,
  type RetryQuotaErrorOptions,
} from './types.js';

/**
 * Kind of retryable failure, as reported by the transport classifier
 */
export type RetryableErrorType = 'transient' | 'throttling' | 'server_error';

/**
 * Why a retried call gave up
 */
export type ExhaustionReason = 'max_attempts' | 'quota_exhausted';

type BaseMetadata = Partial<ErrorMetadata> & {
  severity: ErrorSeverity;
  category: ErrorCategory;
  context: ErrorMetadata['context'];
};

function buildMetadata(
  options: RetryQuotaErrorOptions,
  defaults: {
    severity: ErrorSeverity;
    category: ErrorCategory;
    retryClassification: RetryClassification;
    recoveryActions?: string[];
  }
): BaseMetadata {
  const metadata: BaseMetadata = {
    severity: options.severity ?? defaults.severity,
    category: defaults.category,
    retryClassification: defaults.retryClassification,
    context: options.context ?? createErrorContext(),
  };

  if (defaults.recoveryActions !== undefined) {
    metadata.recoveryActions = defaults.recoveryActions;
  }
  if (options.data !== undefined) {
    metadata.data = options.data;
  }

  return metadata;
}

/**
 * Invalid retry settings (max attempts below 1, unknown retry mode, negative delays).
 * Fatal; raised when a client resolves its retry strategy.
 */
export class ConfigurationError extends RetryQuotaError {
  constructor(message: string, options: RetryQuotaErrorOptions = {}) {
    super(
      message,
      options.code ?? 'CONFIGURATION_ERROR',
      buildMetadata(options, {
        severity: ErrorSeverity.CRITICAL,
        category: ErrorCategory.CONFIGURATION,
        retryClassification: RetryClassification.NON_RETRYABLE,
        recoveryActions: [
          'Check max_attempts is at least 1',
          'Use one of the retry modes: standard, adaptive, none',
          'Check delays and token counts are non-negative',
        ],
      }),
      options.cause
    );
  }
}

export interface RetryableTransportErrorOptions extends RetryQuotaErrorOptions {
  errorType?: RetryableErrorType;
  /** The attempt timed out (drains the retry quota faster) */
  timeout?: boolean;
  statusCode?: number;
  /** Server-provided hint of how long to wait before retrying */
  retryAfterMs?: number;
}

/**
 * A transport failure that a retry strategy may recover from
 */
export class RetryableTransportError extends RetryQuotaError {
  public readonly errorType: RetryableErrorType;
  public readonly timeout: boolean;
  public readonly statusCode: number | undefined;
  public readonly retryAfterMs: number | undefined;

  constructor(message: string, options: RetryableTransportErrorOptions = {}) {
    const errorType = options.errorType ?? 'transient';
    super(
      message,
      options.code ?? `TRANSPORT_${errorType.toUpperCase()}`,
      buildMetadata(
        {
          ...options,
          data: {
            ...options.data,
            errorType,
            ...(options.statusCode !== undefined && { statusCode: options.statusCode }),
          },
        },
        {
          severity: ErrorSeverity.MEDIUM,
          category: ErrorCategory.TRANSPORT,
          retryClassification: RetryClassification.RETRYABLE,
        }
      ),
      options.cause
    );
    this.errorType = errorType;
    this.timeout = options.timeout ?? false;
    this.statusCode = options.statusCode;
    // Unparseable or negative hints are dropped
    this.retryAfterMs =
      options.retryAfterMs !== undefined &&
      Number.isFinite(options.retryAfterMs) &&
      options.retryAfterMs >= 0
        ? options.retryAfterMs
        : undefined;
  }
}

/**
 * A failure that must be surfaced immediately and never retried
 */
export class NonRetryableError extends RetryQuotaError {
  constructor(message: string, options: RetryQuotaErrorOptions = {}) {
    super(
      message,
      options.code ?? 'NON_RETRYABLE_ERROR',
      buildMetadata(options, {
        severity: ErrorSeverity.HIGH,
        category: ErrorCategory.TRANSPORT,
        retryClassification: RetryClassification.NON_RETRYABLE,
      }),
      options.cause
    );
  }
}

export interface RetriesExhaustedErrorOptions extends RetryQuotaErrorOptions {
  attempts: number;
  reason: ExhaustionReason;
  lastError: unknown;
}

/**
 * Raised once attempts or retry tokens run out; `cause` is the last failure
 */
export class RetriesExhaustedError extends RetryQuotaError {
  public readonly attempts: number;
  public readonly reason: ExhaustionReason;
  public readonly lastError: unknown;

  constructor(message: string, options: RetriesExhaustedErrorOptions) {
    super(
      message,
      options.code ??
        (options.reason === 'quota_exhausted' ? 'RETRY_QUOTA_EXHAUSTED' : 'MAX_ATTEMPTS_EXCEEDED'),
      buildMetadata(
        {
          ...options,
          data: { ...options.data, attempts: options.attempts, reason: options.reason },
        },
        {
          severity: ErrorSeverity.HIGH,
          category: ErrorCategory.RETRY,
          retryClassification: RetryClassification.NON_RETRYABLE,
          recoveryActions:
            options.reason === 'quota_exhausted'
              ? ['Reduce request rate', 'Raise initial_tokens for the client']
              : ['Raise max_attempts', 'Check the health of the remote service'],
        }
      ),
      options.cause ?? options.lastError
    );
    this.attempts = options.attempts;
    this.reason = options.reason;
    this.lastError = options.lastError;
  }
}

/**
 * The caller cancelled the operation, or its deadline passed
 */
export class OperationAbortedError extends RetryQuotaError {
  constructor(message: string, options: RetryQuotaErrorOptions = {}) {
    super(
      message,
      options.code ?? 'OPERATION_ABORTED',
      buildMetadata(options, {
        severity: ErrorSeverity.LOW,
        category: ErrorCategory.CANCELLATION,
        retryClassification: RetryClassification.NON_RETRYABLE,
      }),
      options.cause
    );
  }
}
