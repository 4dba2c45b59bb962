/**
 * Error taxonomy for retry resolution and execution
 *
 * - ConfigurationError for invalid retry settings
 * - RetryableTransportError / NonRetryableError for classified transport failures
 * - RetriesExhaustedError and OperationAbortedError for terminal outcomes
 * - Result helpers and cause-chain utilities
 */

export {
  ErrorSeverity,
  RetryClassification,
  ErrorCategory,
  RetryQuotaError,
  type ErrorContext,
  type ErrorMetadata,
  type RetryQuotaErrorOptions,
} from './types.js';

export {
  ConfigurationError,
  RetryableTransportError,
  NonRetryableError,
  RetriesExhaustedError,
  OperationAbortedError,
  type RetryableErrorType,
  type RetryableTransportErrorOptions,
  type RetriesExhaustedErrorOptions,
  type ExhaustionReason,
} from './domain.js';

export {
  createErrorContext,
  contextForAttempt,
  generateCorrelationId,
  type ErrorContextOptions,
} from './context.js';

export {
  type Result,
  success,
  failure,
  safe,
  safeAsync,
  toError,
  isRetryableError,
  getCauseChain,
  extractErrorInfo,
} from './utils.js';
