/**
 * Centralized error handling utilities for docs-keeper.
 * Provides consistent error types and handling patterns.
 */

import logger from './logger.js';

// ============================================================================
// Custom Error Classes
// ============================================================================

export interface DocsErrorOptions {
  code?: string;
  cause?: unknown;
  context?: Record<string, unknown>;
}

/**
 * Base error class for all docs-keeper errors
 */
export class DocsError extends Error {
  public readonly code: string;
  public readonly context?: Record<string, unknown>;

  constructor(message: string, options?: DocsErrorOptions) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = this.constructor.name;
    this.code = options?.code ?? 'DOCS_ERROR';
    this.context = options?.context;

    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert error to JSON-serializable object
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
    };
  }
}

type SubclassOptions = Omit<DocsErrorOptions, 'code'>;

/**
 * Error thrown when a configuration value is missing or invalid
 */
export class ConfigurationError extends DocsError {
  constructor(message: string, options?: SubclassOptions) {
    super(message, { ...options, code: 'CONFIG_ERROR' });
  }
}

/**
 * Error thrown when a file operation fails
 */
export class FileSystemError extends DocsError {
  constructor(message: string, options?: SubclassOptions) {
    super(message, { ...options, code: 'FS_ERROR' });
  }
}

/**
 * Error thrown when input validation fails
 */
export class ValidationError extends DocsError {
  constructor(message: string, options?: SubclassOptions) {
    super(message, { ...options, code: 'VALIDATION_ERROR' });
  }
}

/**
 * Error thrown when a requested document or directory is not found
 */
export class NotFoundError extends DocsError {
  constructor(message: string, options?: SubclassOptions) {
    super(message, { ...options, code: 'NOT_FOUND' });
  }
}

// ============================================================================
// Error Handling Utilities
// ============================================================================

export function isDocsError(error: unknown): error is DocsError {
  return error instanceof DocsError;
}

function messageOf(value: object): string {
  if ('message' in value && typeof value.message === 'string' && value.message) {
    return value.message;
  }
  if ('error' in value && typeof value.error === 'string' && value.error) {
    return value.error;
  }
  return JSON.stringify(value);
}

/**
 * Convert unknown error to Error object
 */
export function toError(error: unknown): Error {
  if (error instanceof Error) {
    return error;
  }

  if (typeof error === 'string') {
    return new Error(error);
  }

  if (typeof error === 'object' && error !== null) {
    return new Error(messageOf(error));
  }

  return new Error(String(error));
}

/**
 * Extract error message from unknown error type
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }

  if (typeof error === 'string') {
    return error;
  }

  if (typeof error === 'object' && error !== null) {
    return messageOf(error);
  }

  return String(error);
}

/**
 * Log error with appropriate context
 */
export function logError(
  error: unknown,
  context?: string,
  additionalData?: Record<string, unknown>
): void {
  const err = toError(error);
  const errorData: Record<string, unknown> = {
    ...additionalData,
    context,
    stack: err.stack,
  };

  if (isDocsError(err)) {
    errorData.code = err.code;
    errorData.docsContext = err.context;
  }

  logger.error(errorData, err.message);
}

// ============================================================================
// Error Aggregation
// ============================================================================

/**
 * Aggregate multiple errors into a single error
 */
export class AggregateDocsError extends DocsError {
  public readonly errors: Error[];

  constructor(errors: Error[], message?: string) {
    const errorMessages = errors.map(e => e.message).join('; ');
    super(message ?? `Multiple errors occurred: ${errorMessages}`, {
      code: 'AGGREGATE_ERROR',
    });
    this.errors = errors;
  }
}

/**
 * Collect errors from multiple operations
 */
export class ErrorCollector {
  private readonly errors: Error[] = [];

  add(error: unknown): void {
    this.errors.push(toError(error));
  }

  hasErrors(): boolean {
    return this.errors.length > 0;
  }

  throwIfAny(message?: string): void {
    if (this.hasErrors()) {
      throw new AggregateDocsError(this.errors, message);
    }
  }
}
