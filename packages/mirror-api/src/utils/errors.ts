/**
 * Centralized Error Handling Utilities
 *
 * Error taxonomy for the mirror:
 * - ConfigurationError: unknown provider/dataset/axis, missing credentials (fatal)
 * - TransientFetchError: network, timeout, rate limit (retried)
 * - PermanentFetchError: bad parameters, auth (never retried)
 * - BatchFailureError: a batch that could not be fetched in strict mode
 * - CoverageInvariantError: the store's overlap constraint fired (a bug, always fatal)
 * - ValidationError: malformed request input
 *
 * Responses always carry the real error text; this is an internal service.
 */

import type { BatchedQuery } from '../types/index.js';

/**
 * Application-specific error with context
 */
export class AppError extends Error {
  public readonly statusCode: number;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    statusCode: number = 500,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AppError';
    this.statusCode = statusCode;
    this.context = context;
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ConfigurationError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 500, context);
    this.name = 'ConfigurationError';
  }
}

export class ValidationError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 400, context);
    this.name = 'ValidationError';
  }
}

export class TransientFetchError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 503, context);
    this.name = 'TransientFetchError';
  }
}

export class PermanentFetchError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 502, context);
    this.name = 'PermanentFetchError';
  }
}

export class BatchFailureError extends AppError {
  public readonly batch: BatchedQuery;

  constructor(batch: BatchedQuery, cause: unknown) {
    super(
      `Batch failed for ${batch.symbols.length} symbol(s) ` +
        `[${new Date(batch.start).toISOString()}, ${new Date(batch.end).toISOString()}): ` +
        formatErrorForResponse(cause),
      502,
      { symbols: batch.symbols.slice(0, 5), start: batch.start, end: batch.end }
    );
    this.name = 'BatchFailureError';
    this.batch = batch;
  }
}

export class CoverageInvariantError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 500, context);
    this.name = 'CoverageInvariantError';
  }
}

/**
 * Read a property from an error-like object (pg and node errors carry extra fields)
 */
function errorField(error: Error, key: string): unknown {
  return (error as unknown as Record<string, unknown>)[key];
}

/**
 * PostgreSQL exclusion_violation: the coverage no-overlap constraint fired
 */
export function isExclusionViolation(error: unknown): boolean {
  return error instanceof Error && errorField(error, 'code') === '23P01';
}

/**
 * Format error for logging - includes full details with stack trace
 */
export function formatErrorForLog(error: unknown, context?: Record<string, unknown>): string {
  const lines: string[] = [];

  if (error instanceof AppError) {
    lines.push(`[${error.name}] ${error.message}`);
    lines.push(`  Status: ${error.statusCode}`);
    if (error.context) {
      lines.push(`  Context: ${JSON.stringify(error.context)}`);
    }
    if (error.stack) {
      lines.push(`  Stack: ${error.stack}`);
    }
  } else if (error instanceof Error) {
    lines.push(`[Error] ${error.name}: ${error.message}`);

    const props = ['code', 'errno', 'syscall', 'address', 'port', 'hostname', 'detail', 'hint', 'schema', 'table', 'column', 'constraint'];
    for (const key of props) {
      const value = errorField(error, key);
      if (value !== undefined) {
        lines.push(`  ${key}: ${String(value)}`);
      }
    }

    if (error.stack) {
      lines.push(`  Stack: ${error.stack}`);
    }
  } else {
    lines.push(`[Unknown Error] ${String(error)}`);
  }

  if (context) {
    lines.push(`  Context: ${JSON.stringify(context)}`);
  }

  return lines.join('\n');
}

/**
 * Format error for API/CLI output - full details, no sanitization
 */
export function formatErrorForResponse(error: unknown): string {
  if (error instanceof AppError) {
    const parts: string[] = [error.message];
    if (error.context) {
      parts.push(`Context: ${JSON.stringify(error.context)}`);
    }
    return parts.join(' | ');
  }

  if (error instanceof Error) {
    const parts: string[] = [error.message];
    for (const key of ['code', 'detail', 'hint', 'constraint', 'table', 'column']) {
      const value = errorField(error, key);
      if (value) {
        parts.push(`${key}: ${String(value)}`);
      }
    }
    return parts.join(' | ');
  }

  return String(error);
}

/**
 * Get HTTP status code from error
 */
export function getErrorStatusCode(error: unknown): number {
  if (error instanceof AppError) {
    return error.statusCode;
  }

  if (error instanceof Error) {
    const code = errorField(error, 'code');

    // PostgreSQL error codes
    if (code === '23505') return 409; // unique_violation
    if (code === '23503') return 400; // foreign_key_violation
    if (code === '23502') return 400; // not_null_violation
    if (code === '28P01') return 503; // invalid_password (db auth)
    if (code === '3D000') return 503; // invalid_catalog_name (db doesn't exist)
    if (code === '57P03') return 503; // cannot_connect_now

    // Network errors
    if (code === 'ECONNREFUSED') return 503;
    if (code === 'ETIMEDOUT') return 504;
    if (code === 'ENOTFOUND') return 503;
    if (code === 'ECONNRESET') return 503;
  }

  return 500;
}

/**
 * Log error with full context to console
 */
export function logError(
  location: string,
  error: unknown,
  context?: Record<string, unknown>
): void {
  const timestamp = new Date().toISOString();
  console.error(`\n[${timestamp}] ERROR in ${location}:`);
  console.error(formatErrorForLog(error, context));
}

/**
 * Create standardized error response
 */
export function createErrorResponse(error: unknown): {
  success: false;
  errors: string[];
} {
  return {
    success: false,
    errors: [formatErrorForResponse(error)],
  };
}
