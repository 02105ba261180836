import { ErrorCode, ErrorSeverity, type ErrorContext, type ErrorDetails } from './types.js';

/**
 * Base error class for the documentation mirror server
 * Extends native Error with additional metadata
 */
export class DocMirrorError extends Error {
  public readonly code: ErrorCode;
  public readonly severity: ErrorSeverity;
  public readonly context?: ErrorContext;
  public readonly timestamp: number;
  public readonly originalError?: Error;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN_ERROR,
    severity: ErrorSeverity = ErrorSeverity.MEDIUM,
    context?: ErrorContext,
    originalError?: Error
  ) {
    super(message);
    this.name = 'DocMirrorError';
    this.code = code;
    this.severity = severity;
    this.context = context;
    this.timestamp = Date.now();
    this.originalError = originalError;

    // Maintains proper stack trace for where error was thrown
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert error to JSON format
   */
  toJSON(): ErrorDetails {
    return {
      code: this.code,
      message: this.message,
      severity: this.severity,
      context: this.context,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }

  /**
   * Convert error to string representation
   */
  override toString(): string {
    return `[${this.code}] ${this.message}`;
  }
}

/**
 * Configuration-related errors
 */
export class ConfigurationError extends DocMirrorError {
  constructor(message: string, context?: ErrorContext, originalError?: Error) {
    super(message, ErrorCode.CONFIGURATION_ERROR, ErrorSeverity.HIGH, context, originalError);
    this.name = 'ConfigurationError';
  }
}

/**
 * Conditions that must hold before any network activity:
 * free disk space, a writable cache location, downloads allowed
 */
export class PreconditionError extends DocMirrorError {
  constructor(message: string, code: ErrorCode, context?: ErrorContext, originalError?: Error) {
    super(message, code, ErrorSeverity.CRITICAL, context, originalError);
    this.name = 'PreconditionError';
  }
}

/**
 * Non-2xx HTTP response received while crawling
 */
export class HttpStatusError extends DocMirrorError {
  public readonly status: number;
  public readonly url: string;

  constructor(url: string, status: number, statusText = '') {
    super(
      `HTTP ${status}${statusText ? ` ${statusText}` : ''}: ${url}`,
      status === 404
        ? ErrorCode.HTTP_NOT_FOUND
        : status >= 500
          ? ErrorCode.HTTP_SERVER_ERROR
          : ErrorCode.HTTP_REQUEST_FAILED,
      status === 404 ? ErrorSeverity.LOW : ErrorSeverity.HIGH,
      { url, status }
    );
    this.name = 'HttpStatusError';
    this.status = status;
    this.url = url;
  }

  get isNotFound(): boolean {
    return this.status === 404;
  }

  get isServerError(): boolean {
    return this.status >= 500;
  }
}

/**
 * Connection failures and timeouts
 */
export class NetworkError extends DocMirrorError {
  constructor(message: string, context?: ErrorContext, originalError?: Error) {
    super(message, ErrorCode.NETWORK_ERROR, ErrorSeverity.HIGH, context, originalError);
    this.name = 'NetworkError';
  }
}

/**
 * Document store errors
 */
export class StoreError extends DocMirrorError {
  constructor(message: string, code: ErrorCode, context?: ErrorContext, originalError?: Error) {
    super(message, code, ErrorSeverity.HIGH, context, originalError);
    this.name = 'StoreError';
  }
}

/**
 * Tool execution errors
 */
export class ToolError extends DocMirrorError {
  constructor(message: string, code: ErrorCode, context?: ErrorContext, originalError?: Error) {
    super(message, code, ErrorSeverity.MEDIUM, context, originalError);
    this.name = 'ToolError';
  }
}

/**
 * Validation errors
 */
export class ValidationError extends DocMirrorError {
  constructor(message: string, context?: ErrorContext, originalError?: Error) {
    super(message, ErrorCode.VALIDATION_ERROR, ErrorSeverity.LOW, context, originalError);
    this.name = 'ValidationError';
  }
}

/**
 * Normalise an unknown thrown value into an Error
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

// Export types
export { ErrorCode, ErrorSeverity, type ErrorContext, type ErrorDetails } from './types.js';
