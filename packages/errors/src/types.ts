/**
 * Error types and base classes shared by the retry-quota packages
 */

/**
 * Error severity levels for classification and handling
 */
export enum ErrorSeverity {
  LOW = 'low',
  MEDIUM = 'medium',
  HIGH = 'high',
  CRITICAL = 'critical',
}

/**
 * Whether an error may be retried by a retry strategy
 */
export enum RetryClassification {
  NON_RETRYABLE = 'non_retryable',
  RETRYABLE = 'retryable',
}

/**
 * Error categories
 */
export enum ErrorCategory {
  /** Invalid retry settings, surfaced at client construction */
  CONFIGURATION = 'configuration',
  /** Failures reported by the transport layer (network, 5xx, throttling) */
  TRANSPORT = 'transport',
  /** Terminal failures of a retried operation */
  RETRY = 'retry',
  /** Cancelled or timed-out operations */
  CANCELLATION = 'cancellation',
  UNKNOWN = 'unknown',
}

/**
 * Context attached to an error for correlating it with an operation call
 */
export interface ErrorContext {
  /** Correlation ID shared by every attempt of one operation call */
  correlationId: string;
  /** Operation name, e.g. `GetObject` */
  operation?: string;
  /** Component that raised the error */
  component?: string;
  /** 1-based attempt number the error belongs to */
  attempt?: number;
  metadata?: Record<string, unknown>;
  timestamp: Date;
}

export interface ErrorMetadata {
  severity: ErrorSeverity;
  category: ErrorCategory;
  retryClassification: RetryClassification;
  context: ErrorContext;
  /** Additional error-specific data */
  data?: Record<string, unknown>;
  /** Suggested recovery actions */
  recoveryActions?: string[];
}

/**
 * Options accepted by every error class in this package
 */
export interface RetryQuotaErrorOptions {
  code?: string;
  cause?: unknown;
  context?: ErrorContext;
  data?: Record<string, unknown>;
  severity?: ErrorSeverity;
}

/**
 * Base error class with metadata and a standard `cause` chain
 */
export abstract class RetryQuotaError extends Error {
  public readonly code: string;
  public readonly metadata: ErrorMetadata;

  constructor(
    message: string,
    code: string,
    metadata: Partial<ErrorMetadata> & {
      severity: ErrorSeverity;
      category: ErrorCategory;
      context: ErrorContext;
    },
    cause?: unknown
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = this.constructor.name;
    this.code = code;

    this.metadata = {
      retryClassification: RetryClassification.NON_RETRYABLE,
      ...metadata,
    };

    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Get formatted error information for logging
   */
  toLogFormat(): Record<string, unknown> {
    const { cause } = this;
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      severity: this.metadata.severity,
      category: this.metadata.category,
      retryClassification: this.metadata.retryClassification,
      correlationId: this.metadata.context.correlationId,
      operation: this.metadata.context.operation,
      attempt: this.metadata.context.attempt,
      timestamp: this.metadata.context.timestamp,
      ...(this.metadata.data && { data: this.metadata.data }),
      ...(cause !== undefined && { cause: cause instanceof Error ? cause.message : String(cause) }),
    };
  }

  isRetryable(): boolean {
    return this.metadata.retryClassification === RetryClassification.RETRYABLE;
  }
}
