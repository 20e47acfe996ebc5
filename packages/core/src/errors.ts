import type { ZodIssue } from 'zod';

/**
 * Custom error classes for the clinic core
 * These errors provide safe, non-PII error messages for API responses
 */

export interface SafeErrorDetails {
  code: string;
  message: string;
  statusCode: number;
}

/**
 * Base application error with safe error details
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly isOperational: boolean;

  constructor(message: string, code: string, statusCode = 500, isOperational = true) {
    super(message);
    this.name = 'AppError';
    this.code = code;
    this.statusCode = statusCode;
    this.isOperational = isOperational;
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Get safe error details for API response (no sensitive info)
   */
  toSafeError(): SafeErrorDetails {
    return {
      code: this.code,
      message: this.message,
      statusCode: this.statusCode,
    };
  }
}

/**
 * Validation error for invalid input
 */
export class ValidationError extends AppError {
  public readonly details: unknown;

  constructor(message: string, details?: unknown) {
    super(message, 'VALIDATION_ERROR', 400);
    this.name = 'ValidationError';
    this.details = details;
  }

  /**
   * Build from zod issues, joining each issue as `path: message`
   */
  static fromZodIssues(issues: readonly ZodIssue[]): ValidationError {
    const message = issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    return new ValidationError(message || 'Invalid input', issues);
  }
}

/**
 * External service error (reasoning service, image classifier)
 */
export class ExternalServiceError extends AppError {
  public readonly service: string;
  public readonly originalError: Error | undefined;

  constructor(service: string, message: string, originalError?: Error) {
    super(`${service} error: ${message}`, 'EXTERNAL_SERVICE_ERROR', 502);
    this.name = 'ExternalServiceError';
    this.service = service;
    this.originalError = originalError;
  }
}

/**
 * Bounded call exceeded its deadline
 */
export class TimeoutError extends AppError {
  public readonly operation: string;
  public readonly timeoutMs: number;

  constructor(operation: string, timeoutMs: number) {
    super(`${operation} timed out after ${timeoutMs}ms`, 'TIMEOUT', 504);
    this.name = 'TimeoutError';
    this.operation = operation;
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Not found error
 */
export class NotFoundError extends AppError {
  constructor(resource: string) {
    super(`${resource} not found`, 'NOT_FOUND', 404);
    this.name = 'NotFoundError';
  }
}

/**
 * Concurrency error (compare-and-set lost)
 */
export class ConcurrencyError extends AppError {
  public readonly recordType: string;
  public readonly recordId: string;

  constructor(recordType: string, recordId: string) {
    super(`Concurrent modification detected for ${recordType}: ${recordId}`, 'CONCURRENCY_CONFLICT', 409);
    this.name = 'ConcurrencyError';
    this.recordType = recordType;
    this.recordId = recordId;
  }
}

/**
 * Broken internal invariant. A programming error, never expected at runtime.
 */
export class InvariantViolationError extends AppError {
  public readonly invariant: string;

  constructor(invariant: string, message: string) {
    super(message, 'INVARIANT_VIOLATION', 500, false);
    this.name = 'InvariantViolationError';
    this.invariant = invariant;
  }
}

/**
 * Check if an error is an operational error (expected) vs programming error
 */
export function isOperationalError(error: unknown): error is AppError {
  return error instanceof AppError && error.isOperational;
}

/**
 * Convert unknown error to safe error response
 */
export function toSafeErrorResponse(error: unknown): SafeErrorDetails {
  if (isOperationalError(error)) {
    return error.toSafeError();
  }

  // For unexpected errors, return a generic message
  return {
    code: 'INTERNAL_ERROR',
    message: 'An unexpected error occurred',
    statusCode: 500,
  };
}
