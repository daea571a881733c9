/**
 * Authentication Controller Module
 *
 * Password gate in front of the API. The shared application password opens
 * an employee session; adding the administrator password opens an admin one.
 *
 * @module controllers/auth
 */

import crypto from 'crypto';
import type { Request, Response } from 'express';

import { getAuthConfig } from '../config/auth.js';
import type { LoginRequest, LoginResponse } from '../types/auth.js';
import { UserRole } from '../types/index.js';
import { HTTP_STATUS, generateCorrelationId, sendError, sendSuccess } from '../utils/http.js';
import { generateAccessToken } from '../utils/jwt.js';
import { isRecord, readString } from '../utils/validation.js';

/**
 * Constant-time string comparison
 */
function safeEqual(candidate: string, expected: string): boolean {
  const a = crypto.createHash('sha256').update(candidate).digest();
  const b = crypto.createHash('sha256').update(expected).digest();
  return crypto.timingSafeEqual(a, b);
}

/**
 * Credentials from a login body, or null when no password was sent
 */
function readLoginRequest(body: Record<string, unknown>): LoginRequest | null {
  const password = readString(body, 'password');
  if (!password) {
    return null;
  }

  const adminPassword = readString(body, 'adminPassword');
  return adminPassword ? { password, adminPassword } : { password };
}

/**
 * Authentication Controller Class
 */
export class AuthController {
  /**
   * POST /api/auth/login
   *
   * Request body:
   * {
   *   password: string,
   *   adminPassword?: string
   * }
   */
  async login(req: Request, res: Response): Promise<void> {
    const correlationId = generateCorrelationId(req, 'login');
    const body: unknown = req.body;

    if (!isRecord(body)) {
      sendError(res, HTTP_STATUS.BAD_REQUEST, 'VALIDATION_ERROR', 'Invalid request body');
      return;
    }

    const credentials = readLoginRequest(body);

    if (!credentials) {
      sendError(res, HTTP_STATUS.BAD_REQUEST, 'VALIDATION_ERROR', 'Password is required');
      return;
    }

    const { password, adminPassword } = credentials;

    const config = getAuthConfig();

    if (!safeEqual(password, config.appPassword)) {
      console.warn('[AUTH_CONTROLLER] Login failed - invalid password:', {
        correlationId,
        ip: req.ip,
        timestamp: new Date().toISOString(),
      });
      sendError(res, HTTP_STATUS.UNAUTHORIZED, 'INVALID_CREDENTIALS', 'Invalid password');
      return;
    }

    let role = UserRole.Employee;

    if (adminPassword) {
      if (!safeEqual(adminPassword, config.adminPassword)) {
        console.warn('[AUTH_CONTROLLER] Login failed - invalid admin password:', {
          correlationId,
          ip: req.ip,
          timestamp: new Date().toISOString(),
        });
        sendError(res, HTTP_STATUS.UNAUTHORIZED, 'INVALID_CREDENTIALS', 'Invalid administrator password');
        return;
      }
      role = UserRole.Admin;
    }

    const response: LoginResponse = {
      accessToken: generateAccessToken(role, correlationId),
      tokenType: 'Bearer',
      expiresIn: config.jwt.expiresInSeconds,
      role,
    };

    console.log('[AUTH_CONTROLLER] Login successful:', {
      role,
      correlationId,
      timestamp: new Date().toISOString(),
    });

    sendSuccess(res, HTTP_STATUS.OK, response);
  }
}
