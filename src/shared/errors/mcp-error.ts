/**
 * MCP Error Types
 *
 * Structured error types for MCP tool responses with proper error handling
 */

import { ErrorCode, ErrorSeverity } from './error-codes.js';

/**
 * Base MCP Error class
 *
 * Extends Error with additional metadata for structured error responses
 */
export class McpError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode = ErrorCode.UNKNOWN_ERROR,
    public readonly severity: ErrorSeverity = ErrorSeverity.ERROR,
    public readonly details?: Record<string, unknown>,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'McpError';

    // Maintain proper stack trace for where error was thrown (V8 only)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, McpError);
    }
  }

  /**
   * Convert to structured error object for MCP responses
   */
  toStructured(): {
    error: string;
    code: ErrorCode;
    severity: ErrorSeverity;
    details?: Record<string, unknown>;
    stack?: string;
  } {
    return {
      error: this.message,
      code: this.code,
      severity: this.severity,
      details: this.details,
      stack: this.stack,
    };
  }

  /**
   * Create from standard Error
   */
  static fromError(
    error: Error,
    code: ErrorCode = ErrorCode.UNKNOWN_ERROR,
    severity: ErrorSeverity = ErrorSeverity.ERROR,
  ): McpError {
    return new McpError(error.message, code, severity, undefined, error);
  }

  /**
   * Create an error for a rejected tool or function argument
   */
  static invalidArgument(message: string, details?: Record<string, unknown>): McpError {
    return new McpError(message, ErrorCode.INVALID_ARGUMENT, ErrorSeverity.WARNING, details);
  }
}

/**
 * Domain-specific error classes
 */

/**
 * Thrown when a data file cannot be read or a record in it cannot be parsed.
 */
export class DataLoadError extends McpError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCode.DATA_LOAD_FAILED,
    details?: Record<string, unknown>,
    cause?: Error,
  ) {
    super(message, code, ErrorSeverity.ERROR, details, cause);
    this.name = 'DataLoadError';
  }
}

/**
 * Thrown when two NEO records share a primary designation.
 */
export class DuplicateDesignationError extends McpError {
  constructor(designation: string) {
    super(
      `Duplicate NEO designation: ${designation}`,
      ErrorCode.DUPLICATE_DESIGNATION,
      ErrorSeverity.ERROR,
      { designation },
    );
    this.name = 'DuplicateDesignationError';
  }
}

/**
 * Thrown when a close approach is linked to a second NEO.
 */
export class LinkageError extends McpError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCode.APPROACH_ALREADY_LINKED,
    details?: Record<string, unknown>,
  ) {
    super(message, code, ErrorSeverity.ERROR, details);
    this.name = 'LinkageError';
  }
}

/**
 * Thrown when a filter names an attribute that has no extractor.
 */
export class UnsupportedCriterionError extends McpError {
  constructor(kind: string) {
    super(`Unsupported filter criterion: ${kind}`, ErrorCode.UNSUPPORTED_CRITERION, ErrorSeverity.CRITICAL, {
      kind,
    });
    this.name = 'UnsupportedCriterionError';
  }
}
