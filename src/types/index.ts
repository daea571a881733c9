/**
 * Central type definitions for the Vacation Desk service
 *
 * Core roles, the service-result envelope returned by every service method,
 * and the error response shape used by the HTTP layer.
 *
 * @module types
 */

/**
 * Session role enumeration
 *
 * The password gate issues one of two roles. Everyone who knows the shared
 * application password is an employee; the administrator password unlocks
 * approval and policy management.
 */
export enum UserRole {
  /**
   * Can submit requests, view balances and history, use the assistant
   */
  Employee = 'EMPLOYEE',

  /**
   * Can additionally approve/reject requests and manage employees and policy
   */
  Admin = 'ADMIN',
}

/**
 * Machine-readable error codes produced by the services
 */
export type ServiceErrorCode =
  | 'VALIDATION_ERROR'
  | 'EMPLOYEE_NOT_FOUND'
  | 'EMPLOYEE_EXISTS'
  | 'REQUEST_NOT_FOUND'
  | 'CONSTRAINT_NOT_FOUND'
  | 'DAILY_LIMIT_EXCEEDED'
  | 'EXCLUSION_CONFLICT'
  | 'INVALID_STATUS_TRANSITION'
  | 'STORE_CONFLICT'
  | 'STORE_TRANSPORT_ERROR'
  | 'MALFORMED_RECORD'
  | 'ASSISTANT_ERROR'
  | 'ASSISTANT_DISABLED'
  | 'INTERNAL_ERROR';

/**
 * Service operation result
 *
 * Services never throw to their callers; every outcome is reported through
 * this envelope.
 */
export interface ServiceOperationResult<T> {
  readonly success: boolean;
  readonly data?: T;
  readonly error?: string;
  readonly errorCode?: ServiceErrorCode;
  readonly executionTimeMs: number;
}

/**
 * API error response interface
 *
 * Standard structure for error responses from the API.
 */
export interface ApiErrorResponse {
  readonly success: false;

  /**
   * Error code for programmatic handling
   */
  readonly code: string;

  /**
   * Human-readable error message
   */
  readonly message: string;

  /**
   * Additional error details
   */
  readonly details?: Record<string, unknown>;

  readonly timestamp: string;
}

/**
 * Type guard to check if a value is a valid UserRole
 *
 * @param value - Value to check
 * @returns True if value is a valid UserRole
 */
export function isUserRole(value: unknown): value is UserRole {
  return value === UserRole.Employee || value === UserRole.Admin;
}
