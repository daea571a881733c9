/**
 * Authentication Middleware Module
 *
 * Validates the bearer token issued at login and attaches the session to the
 * request for the handlers downstream.
 *
 * @module middleware/authenticate
 */

import type { NextFunction, Request, Response } from 'express';

import type { AuthenticatedUser } from '../types/auth.js';
import { HTTP_STATUS, sendError } from '../utils/http.js';
import { extractTokenFromHeader, verifyAccessToken } from '../utils/jwt.js';

declare global {
  namespace Express {
    interface Request {
      /**
       * Session attached by the authenticate middleware
       */
      user?: AuthenticatedUser;

      /**
       * Correlation ID for request tracing
       */
      correlationId?: string;
    }
  }
}

function generateCorrelationId(): string {
  return `auth_${Date.now()}_${Math.random().toString(36).substring(2, 15)}`;
}

/**
 * Authentication Middleware
 *
 * @example
 * router.use(authenticate);
 * router.get('/employees', (req, res) => {
 *   // req.user is defined here
 * });
 */
export async function authenticate(req: Request, res: Response, next: NextFunction): Promise<void> {
  const correlationId = req.get('x-correlation-id') || generateCorrelationId();
  req.correlationId = correlationId;

  try {
    const authHeader = req.get('authorization');

    if (!authHeader) {
      console.warn('[AUTH_MIDDLEWARE] Missing authorization header:', {
        correlationId,
        path: req.path,
        timestamp: new Date().toISOString(),
      });
      sendError(res, HTTP_STATUS.UNAUTHORIZED, 'MISSING_TOKEN', 'Authorization header is required');
      return;
    }

    const token = extractTokenFromHeader(authHeader);

    if (!token) {
      sendError(res, HTTP_STATUS.UNAUTHORIZED, 'INVALID_TOKEN_FORMAT', 'Authorization header must use Bearer scheme');
      return;
    }

    const validationResult = await verifyAccessToken(token, { correlationId });

    if (!validationResult.valid || !validationResult.payload) {
      const expired = validationResult.errorCode === 'EXPIRED';

      sendError(
        res,
        HTTP_STATUS.UNAUTHORIZED,
        expired ? 'TOKEN_EXPIRED' : 'INVALID_TOKEN',
        expired ? 'Authentication token has expired' : 'Invalid authentication token'
      );
      return;
    }

    req.user = {
      role: validationResult.payload.role,
      jti: validationResult.payload.jti,
      exp: validationResult.payload.exp,
    };

    next();
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : String(error);

    console.error('[AUTH_MIDDLEWARE] Authentication error:', {
      correlationId,
      path: req.path,
      error: errorMessage,
      timestamp: new Date().toISOString(),
    });

    sendError(res, HTTP_STATUS.INTERNAL_SERVER_ERROR, 'AUTHENTICATION_ERROR', 'An error occurred during authentication');
  }
}
