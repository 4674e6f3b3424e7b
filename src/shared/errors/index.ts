/**
 * Error Handling and Observability
 *
 * Exports error types, codes, and utilities for structured error responses
 */

export * from './error-codes.js';
export * from './mcp-error.js';
export * from './error-response.js';
