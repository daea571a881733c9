/**
 * Authorization Middleware
 *
 * Role checks for routes mounted behind the authenticate middleware.
 *
 * @module middleware/authorize
 */

import type { NextFunction, Request, RequestHandler, Response } from 'express';

import { UserRole } from '../types/index.js';
import { HTTP_STATUS, sendError } from '../utils/http.js';

/**
 * Authorization Middleware Factory
 *
 * Responds 401 when no session is attached and 403 when the session's role
 * is not among `allowedRoles`.
 *
 * @example
 * router.patch('/:id/approve', authorize([UserRole.Admin]), handler);
 */
export function authorize(allowedRoles: readonly UserRole[]): RequestHandler {
  if (allowedRoles.length === 0) {
    throw new Error('[AUTHZ] authorize() requires at least one allowed role');
  }

  return (req: Request, res: Response, next: NextFunction): void => {
    const user = req.user;

    if (!user) {
      console.error('[AUTHZ] Authorization failed:', {
        correlationId: req.correlationId,
        method: req.method,
        path: req.path,
        reason: 'not authenticated',
        timestamp: new Date().toISOString(),
      });
      sendError(res, HTTP_STATUS.UNAUTHORIZED, 'AUTHENTICATION_REQUIRED', 'Authentication required');
      return;
    }

    if (!allowedRoles.includes(user.role)) {
      console.error('[AUTHZ] Authorization failed:', {
        correlationId: req.correlationId,
        method: req.method,
        path: req.path,
        userRole: user.role,
        allowedRoles,
        timestamp: new Date().toISOString(),
      });
      sendError(
        res,
        HTTP_STATUS.FORBIDDEN,
        'INSUFFICIENT_PERMISSIONS',
        'Insufficient permissions. User does not have required role.'
      );
      return;
    }

    next();
  };
}

/**
 * Administrator-only routes
 */
export function authorizeAdmin(): RequestHandler {
  return authorize([UserRole.Admin]);
}
