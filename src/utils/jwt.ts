/**
 * JWT Token Utilities Module
 *
 * Issues and verifies the session tokens handed out by the password gate.
 * A token carries nothing but the session role.
 *
 * @module utils/jwt
 */

import crypto from 'crypto';
import jwt, { type SignOptions, type VerifyOptions } from 'jsonwebtoken';

import { getAuthConfig } from '../config/auth.js';
import { type JWTPayload, type TokenValidationResult, isJWTPayload } from '../types/auth.js';
import type { UserRole } from '../types/index.js';

/**
 * Token verification options interface
 */
interface TokenVerificationOptions {
  /**
   * Optional correlation ID for request tracing
   */
  readonly correlationId?: string;
}

function generateJwtId(): string {
  return crypto.randomBytes(16).toString('hex');
}

/**
 * Generate JWT access token
 *
 * @example
 * const token = generateAccessToken(UserRole.Admin);
 *
 * @throws {Error} If token generation fails
 */
export function generateAccessToken(role: UserRole, correlationId?: string): string {
  const cid = correlationId || `token_gen_${Date.now()}`;

  try {
    const config = getAuthConfig();
    const jti = generateJwtId();

    const payload: Omit<JWTPayload, 'exp'> = {
      role,
      type: 'access',
      jti,
      iat: Math.floor(Date.now() / 1000),
    };

    const signOptions: SignOptions = {
      algorithm: config.jwt.algorithm,
      expiresIn: config.jwt.expiresInSeconds,
      issuer: config.jwt.issuer,
      audience: config.jwt.audience,
    };

    const token = jwt.sign(payload, config.jwt.secret, signOptions);

    console.log('[JWT] Access token generated:', {
      role,
      jti,
      expiresInSeconds: config.jwt.expiresInSeconds,
      correlationId: cid,
      timestamp: new Date().toISOString(),
    });

    return token;
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : String(error);

    console.error('[JWT] Failed to generate access token:', {
      role,
      error: errorMessage,
      correlationId: cid,
      timestamp: new Date().toISOString(),
    });

    throw new Error(`[JWT] Access token generation failed: ${errorMessage}`);
  }
}

/**
 * Verify and decode JWT access token
 *
 * @example
 * const result = await verifyAccessToken(token);
 * if (result.valid && result.payload) {
 *   console.log('Role:', result.payload.role);
 * }
 */
export async function verifyAccessToken(
  token: string,
  options?: TokenVerificationOptions
): Promise<TokenValidationResult> {
  const correlationId = options?.correlationId || `token_verify_${Date.now()}`;

  try {
    const config = getAuthConfig();

    const verifyOptions: VerifyOptions = {
      algorithms: [config.jwt.algorithm],
      issuer: config.jwt.issuer,
      audience: config.jwt.audience,
    };

    const decoded = jwt.verify(token, config.jwt.secret, verifyOptions);

    if (!isJWTPayload(decoded)) {
      console.error('[JWT] Invalid access token payload structure:', {
        correlationId,
        timestamp: new Date().toISOString(),
      });

      return {
        valid: false,
        error: 'Invalid token payload structure',
        errorCode: 'MALFORMED',
      };
    }

    return {
      valid: true,
      payload: decoded,
    };
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : String(error);

    let errorCode: TokenValidationResult['errorCode'] = 'INVALID';
    let expired = false;

    if (error instanceof jwt.TokenExpiredError) {
      errorCode = 'EXPIRED';
      expired = true;
    } else if (error instanceof jwt.JsonWebTokenError) {
      errorCode = 'MALFORMED';
    }

    console.warn('[JWT] Access token verification failed:', {
      error: errorMessage,
      errorCode,
      expired,
      correlationId,
      timestamp: new Date().toISOString(),
    });

    return {
      valid: false,
      error: errorMessage,
      errorCode,
      expired,
    };
  }
}

/**
 * Extract token from a `Bearer` Authorization header
 *
 * @returns Extracted token or null if the header is absent or malformed
 */
export function extractTokenFromHeader(authHeader: string | undefined): string | null {
  if (!authHeader) {
    return null;
  }

  const parts = authHeader.trim().split(/\s+/);

  if (parts.length !== 2 || parts[0]?.toLowerCase() !== 'bearer') {
    return null;
  }

  const token = parts[1];
  return token && token.length > 0 ? token : null;
}
