/**
 * Error Codes
 *
 * Stable identifiers for every failure the database and its tools can report.
 */

/**
 * Error codes for programmatic handling
 */
export enum ErrorCode {
  // Loading
  DATA_LOAD_FAILED = 'DATA_LOAD_FAILED',
  INVALID_TIMESTAMP = 'INVALID_TIMESTAMP',

  // Linkage
  DUPLICATE_DESIGNATION = 'DUPLICATE_DESIGNATION',
  APPROACH_ALREADY_LINKED = 'APPROACH_ALREADY_LINKED',

  // Querying
  UNSUPPORTED_CRITERION = 'UNSUPPORTED_CRITERION',
  INVALID_ARGUMENT = 'INVALID_ARGUMENT',

  // Output
  UNSUPPORTED_OUTPUT_FORMAT = 'UNSUPPORTED_OUTPUT_FORMAT',
  WRITE_FAILED = 'WRITE_FAILED',

  // Server
  CONFIG_NOT_INITIALIZED = 'CONFIG_NOT_INITIALIZED',
  UNKNOWN_ERROR = 'UNKNOWN_ERROR',
}

/**
 * Error severity, mapped onto log levels when errors are reported
 */
export enum ErrorSeverity {
  DEBUG = 'debug',
  INFO = 'info',
  WARNING = 'warning',
  ERROR = 'error',
  CRITICAL = 'critical',
}
