/**
 * Authentication Routes Module
 *
 * @module routes/auth
 */

import { Router } from 'express';
import rateLimit from 'express-rate-limit';

import { getAuthConfig } from '../config/auth.js';
import type { AuthController } from '../controllers/auth.controller.js';
import { HTTP_STATUS, sendError } from '../utils/http.js';

/**
 * Create Authentication Router
 *
 * Login attempts are rate limited per client IP. Each router gets its own
 * limiter, so separate app instances do not share counters.
 */
export function createAuthRouter(authController: AuthController): Router {
  const router = Router();
  const { windowMs, maxAttempts } = getAuthConfig().loginRateLimit;

  const loginRateLimiter = rateLimit({
    windowMs,
    max: maxAttempts,
    standardHeaders: true,
    legacyHeaders: false,
    handler: (req, res) => {
      console.warn('[AUTH_ROUTES] Login rate limit exceeded:', {
        ip: req.ip,
        path: req.path,
        timestamp: new Date().toISOString(),
      });

      sendError(res, HTTP_STATUS.TOO_MANY_REQUESTS, 'RATE_LIMIT_EXCEEDED', 'Too many login attempts. Please try again later.');
    },
  });

  /**
   * POST /api/auth/login
   */
  router.post('/login', loginRateLimiter, (req, res, next) => {
    authController.login(req, res).catch(next);
  });

  return router;
}
