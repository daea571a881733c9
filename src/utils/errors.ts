/**
 * Error classes for the store and assistant layers
 *
 * The document store and completion clients throw these; services catch them
 * and translate them into `ServiceOperationResult` failures.
 *
 * @module utils/errors
 */

import type { ServiceErrorCode, ServiceOperationResult } from '../types/index.js';

interface AppErrorOptions {
  readonly statusCode?: number;
  readonly details?: Record<string, unknown>;
  readonly cause?: unknown;
}

/**
 * Base error carrying a service error code and the HTTP status it maps to
 */
export class AppError extends Error {
  /**
   * Error code for programmatic handling
   */
  public readonly code: ServiceErrorCode;

  /**
   * HTTP status code for the error
   */
  public readonly statusCode: number;

  /**
   * Additional error details
   */
  public readonly details?: Record<string, unknown>;

  constructor(message: string, code: ServiceErrorCode, defaultStatus: number, options?: AppErrorOptions) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'AppError';
    this.code = code;
    this.statusCode = options?.statusCode ?? defaultStatus;
    this.details = options?.details;

    // Maintain proper stack trace for where error was thrown (V8 only)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/**
 * A conditional write was rejected because the stored version moved on, or a
 * create found the file already present
 */
export class StoreConflictError extends AppError {
  constructor(message: string, options?: AppErrorOptions) {
    super(message, 'STORE_CONFLICT', 409, options);
    this.name = 'StoreConflictError';
  }
}

/**
 * The document store could not be reached or answered unexpectedly
 */
export class StoreTransportError extends AppError {
  constructor(message: string, options?: AppErrorOptions) {
    super(message, 'STORE_TRANSPORT_ERROR', 502, options);
    this.name = 'StoreTransportError';
  }
}

/**
 * A stored collection does not match its schema
 */
export class RecordFormatError extends AppError {
  constructor(message: string, options?: AppErrorOptions) {
    super(message, 'MALFORMED_RECORD', 500, options);
    this.name = 'RecordFormatError';
  }
}

/**
 * The completion service failed or is not configured
 */
export class AssistantError extends AppError {
  constructor(message: string, code: 'ASSISTANT_ERROR' | 'ASSISTANT_DISABLED' = 'ASSISTANT_ERROR', options?: AppErrorOptions) {
    super(message, code, code === 'ASSISTANT_DISABLED' ? 503 : 502, options);
    this.name = 'AssistantError';
  }
}

/**
 * Extract a message from anything that was thrown
 */
export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Service error code for anything that was thrown
 *
 * @param error - Caught value
 * @param fallback - Code for errors that are not `AppError`s
 */
export function getErrorCode(error: unknown, fallback: ServiceErrorCode = 'INTERNAL_ERROR'): ServiceErrorCode {
  return error instanceof AppError ? error.code : fallback;
}

/**
 * Failed service result timed from `startTime`
 */
export function serviceFailure<T>(
  startTime: number,
  error: string,
  errorCode: ServiceErrorCode
): ServiceOperationResult<T> {
  return {
    success: false,
    error,
    errorCode,
    executionTimeMs: Date.now() - startTime,
  };
}
