/**
 * Error context helpers for correlating failures across attempts
 */

import { randomUUID } from 'crypto';

import type { ErrorContext } from './types.js';

export interface ErrorContextOptions {
  correlationId?: string;
  operation?: string;
  component?: string;
  attempt?: number;
  metadata?: Record<string, unknown>;
}

export function generateCorrelationId(): string {
  return randomUUID();
}

/**
 * Create a new error context, generating a correlation ID when none is given
 */
export function createErrorContext(options: ErrorContextOptions = {}): ErrorContext {
  const context: ErrorContext = {
    correlationId: options.correlationId || generateCorrelationId(),
    timestamp: new Date(),
  };

  if (options.operation !== undefined) {
    context.operation = options.operation;
  }
  if (options.component !== undefined) {
    context.component = options.component;
  }
  if (options.attempt !== undefined) {
    context.attempt = options.attempt;
  }
  if (options.metadata !== undefined) {
    context.metadata = options.metadata;
  }

  return context;
}

/**
 * Derive a context for a later attempt of the same call.
 * Keeps the correlation ID so every attempt of one call can be grouped.
 */
export function contextForAttempt(parent: ErrorContext, attempt: number): ErrorContext {
  return { ...parent, attempt, timestamp: new Date() };
}
