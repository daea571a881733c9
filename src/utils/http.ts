/**
 * HTTP Response Utilities Module
 *
 * Status mapping and response envelopes shared by the controllers.
 *
 * @module utils/http
 */

import type { Request, Response } from 'express';

import type { ApiErrorResponse, ServiceErrorCode, ServiceOperationResult } from '../types/index.js';

/**
 * HTTP Status Codes
 */
export const HTTP_STATUS = {
  OK: 200,
  CREATED: 201,
  BAD_REQUEST: 400,
  UNAUTHORIZED: 401,
  FORBIDDEN: 403,
  NOT_FOUND: 404,
  CONFLICT: 409,
  UNPROCESSABLE_ENTITY: 422,
  TOO_MANY_REQUESTS: 429,
  INTERNAL_SERVER_ERROR: 500,
  BAD_GATEWAY: 502,
  SERVICE_UNAVAILABLE: 503,
} as const;

/**
 * Error code to HTTP status mapping
 */
export const ERROR_CODE_TO_STATUS: Record<ServiceErrorCode, number> = {
  VALIDATION_ERROR: HTTP_STATUS.BAD_REQUEST,
  EMPLOYEE_NOT_FOUND: HTTP_STATUS.NOT_FOUND,
  REQUEST_NOT_FOUND: HTTP_STATUS.NOT_FOUND,
  CONSTRAINT_NOT_FOUND: HTTP_STATUS.NOT_FOUND,
  EMPLOYEE_EXISTS: HTTP_STATUS.CONFLICT,
  DAILY_LIMIT_EXCEEDED: HTTP_STATUS.UNPROCESSABLE_ENTITY,
  EXCLUSION_CONFLICT: HTTP_STATUS.UNPROCESSABLE_ENTITY,
  INVALID_STATUS_TRANSITION: HTTP_STATUS.UNPROCESSABLE_ENTITY,
  STORE_CONFLICT: HTTP_STATUS.CONFLICT,
  STORE_TRANSPORT_ERROR: HTTP_STATUS.BAD_GATEWAY,
  MALFORMED_RECORD: HTTP_STATUS.INTERNAL_SERVER_ERROR,
  ASSISTANT_ERROR: HTTP_STATUS.BAD_GATEWAY,
  ASSISTANT_DISABLED: HTTP_STATUS.SERVICE_UNAVAILABLE,
  INTERNAL_ERROR: HTTP_STATUS.INTERNAL_SERVER_ERROR,
};

export function getStatusFromErrorCode(errorCode: ServiceErrorCode | undefined): number {
  return errorCode ? ERROR_CODE_TO_STATUS[errorCode] : HTTP_STATUS.INTERNAL_SERVER_ERROR;
}

/**
 * Reuse the caller's correlation ID or mint one
 */
export function generateCorrelationId(req: Request, prefix: string): string {
  const existingId = req.get('x-correlation-id');
  if (existingId) {
    return existingId;
  }

  return `${prefix}_${Date.now()}_${Math.random().toString(36).substring(2, 15)}`;
}

export function sendError(
  res: Response,
  statusCode: number,
  code: string,
  message: string,
  details?: Record<string, unknown>
): void {
  const body: ApiErrorResponse = {
    success: false,
    code,
    message,
    details,
    timestamp: new Date().toISOString(),
  };

  res.status(statusCode).json(body);
}

export function sendSuccess<T>(res: Response, statusCode: number, data: T): void {
  res.status(statusCode).json({ success: true, data });
}

/**
 * Write a service result as the response
 *
 * @returns Whether the operation succeeded
 */
export function sendServiceResult<T>(
  res: Response,
  result: ServiceOperationResult<T>,
  successStatus: number = HTTP_STATUS.OK
): boolean {
  if (result.success) {
    sendSuccess(res, successStatus, result.data);
    return true;
  }

  sendError(
    res,
    getStatusFromErrorCode(result.errorCode),
    result.errorCode ?? 'INTERNAL_ERROR',
    result.error ?? 'Operation failed'
  );
  return false;
}
