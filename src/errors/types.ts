/**
 * Error types and error codes for the documentation mirror server
 * Provides structured error handling with proper categorization
 */

export enum ErrorCode {
  // General errors (1000-1999)
  UNKNOWN_ERROR = 1000,
  VALIDATION_ERROR = 1001,
  CONFIGURATION_ERROR = 1002,
  INITIALIZATION_ERROR = 1003,

  // Cache precondition errors (2000-2999)
  CACHE_NOT_WRITABLE = 2001,
  INSUFFICIENT_DISK_SPACE = 2002,
  DOWNLOAD_SKIPPED = 2003,
  ARCHIVE_NOT_FOUND = 2004,

  // Crawl errors (3000-3999)
  HTTP_NOT_FOUND = 3001,
  HTTP_SERVER_ERROR = 3002,
  HTTP_REQUEST_FAILED = 3003,
  NETWORK_ERROR = 3004,
  PUBLISH_FAILED = 3005,

  // Store errors (4000-4999)
  STORE_NOT_INITIALIZED = 4001,
  INDEX_BUILD_ERROR = 4002,

  // Tool errors (5000-5999)
  TOOL_EXECUTION_ERROR = 5000,
  TOOL_INVALID_INPUT = 5001,
  TOOL_NOT_FOUND = 5002,
}

export enum ErrorSeverity {
  LOW = 'low',
  MEDIUM = 'medium',
  HIGH = 'high',
  CRITICAL = 'critical',
}

export interface ErrorContext {
  [key: string]: unknown;
}

export interface ErrorDetails {
  code: ErrorCode;
  message: string;
  severity: ErrorSeverity;
  context?: ErrorContext;
  originalError?: Error;
  timestamp: number;
  stack?: string;
}
