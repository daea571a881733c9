/**
 * Authentication Type Definitions
 *
 * Token payloads for the placeholder password gate. The gate only separates
 * employees from administrators; it is not a security boundary.
 *
 * @module types/auth
 */

import { type UserRole, isUserRole } from './index.js';

/**
 * JWT access token payload
 */
export interface JWTPayload {
  /**
   * Session role granted at login
   */
  readonly role: UserRole;

  /**
   * Token type discriminator
   */
  readonly type: 'access';

  /**
   * Unique token identifier
   */
  readonly jti: string;

  /**
   * Issued at (Unix epoch seconds)
   */
  readonly iat: number;

  /**
   * Expiration (Unix epoch seconds)
   */
  readonly exp: number;
}

/**
 * Authenticated session attached to requests by the authenticate middleware
 */
export interface AuthenticatedUser {
  readonly role: UserRole;
  readonly jti: string;
  readonly exp: number;
}

/**
 * Login request body
 */
export interface LoginRequest {
  /**
   * Shared application password
   */
  readonly password: string;

  /**
   * Administrator password; when given and correct the session is an admin one
   */
  readonly adminPassword?: string;
}

/**
 * Login response payload
 */
export interface LoginResponse {
  readonly accessToken: string;
  readonly tokenType: 'Bearer';
  readonly expiresIn: number;
  readonly role: UserRole;
}

/**
 * Token validation result
 */
export interface TokenValidationResult {
  readonly valid: boolean;
  readonly payload?: JWTPayload;
  readonly error?: string;
  readonly errorCode?: 'EXPIRED' | 'INVALID' | 'MALFORMED';
  readonly expired?: boolean;
}

/**
 * Type guard to check if a value is a valid JWTPayload
 *
 * @param value - Value to check
 * @returns True if value is a valid JWTPayload
 */
export function isJWTPayload(value: unknown): value is JWTPayload {
  if (typeof value !== 'object' || value === null) {
    return false;
  }

  if (!('role' in value) || !('type' in value) || !('jti' in value) || !('iat' in value) || !('exp' in value)) {
    return false;
  }

  return (
    isUserRole(value.role) &&
    value.type === 'access' &&
    typeof value.jti === 'string' &&
    typeof value.iat === 'number' &&
    typeof value.exp === 'number'
  );
}
