/**
 * Admin Controller Module
 *
 * HTTP adapter for roster, daily limit and constraint management.
 *
 * @module controllers/admin
 */

import type { Request, Response } from 'express';

import type { AdminService } from '../services/admin.service.js';
import { DEFAULT_TOTAL_LEAVE_DAYS } from '../types/vacation.js';
import { HTTP_STATUS, generateCorrelationId, sendError, sendServiceResult } from '../utils/http.js';
import { isRecord, readNumber, readString } from '../utils/validation.js';

/**
 * Both names of a constraint pair from a request body
 */
function readPair(body: unknown): { readonly employeeName1: string; readonly employeeName2: string } | null {
  if (!isRecord(body)) {
    return null;
  }

  const employeeName1 = readString(body, 'employeeName1');
  const employeeName2 = readString(body, 'employeeName2');

  return employeeName1 && employeeName2 ? { employeeName1, employeeName2 } : null;
}

/**
 * Admin Controller Class
 */
export class AdminController {
  constructor(private readonly adminService: AdminService) {}

  /**
   * GET /api/admin/policy
   */
  async policy(req: Request, res: Response): Promise<void> {
    const correlationId = generateCorrelationId(req, 'admin');
    sendServiceResult(res, await this.adminService.getPolicy(correlationId));
  }

  /**
   * POST /api/admin/employees
   *
   * Request body:
   * {
   *   name: string,
   *   totalLeaveDays?: number (default 15)
   * }
   */
  async addEmployee(req: Request, res: Response): Promise<void> {
    const correlationId = generateCorrelationId(req, 'admin');
    const body: unknown = req.body;

    if (!isRecord(body)) {
      sendError(res, HTTP_STATUS.BAD_REQUEST, 'VALIDATION_ERROR', 'Invalid request body');
      return;
    }

    const name = readString(body, 'name');
    if (!name) {
      sendError(res, HTTP_STATUS.BAD_REQUEST, 'VALIDATION_ERROR', 'name is required');
      return;
    }

    const totalLeaveDays = body.totalLeaveDays === undefined ? DEFAULT_TOTAL_LEAVE_DAYS : readNumber(body, 'totalLeaveDays');
    if (totalLeaveDays === undefined) {
      sendError(res, HTTP_STATUS.BAD_REQUEST, 'VALIDATION_ERROR', 'totalLeaveDays must be a number');
      return;
    }

    const result = await this.adminService.addEmployee(name, totalLeaveDays, correlationId);
    sendServiceResult(res, result, HTTP_STATUS.CREATED);
  }

  /**
   * DELETE /api/admin/employees/:name
   */
  async removeEmployee(req: Request, res: Response): Promise<void> {
    const correlationId = generateCorrelationId(req, 'admin');
    sendServiceResult(res, await this.adminService.removeEmployee(req.params.name, correlationId));
  }

  /**
   * PUT /api/admin/policy/daily-limit
   *
   * Request body: { dailyLimit: number }
   */
  async setDailyLimit(req: Request, res: Response): Promise<void> {
    const correlationId = generateCorrelationId(req, 'admin');
    const body: unknown = req.body;
    const dailyLimit = isRecord(body) ? readNumber(body, 'dailyLimit') : undefined;

    if (dailyLimit === undefined) {
      sendError(res, HTTP_STATUS.BAD_REQUEST, 'VALIDATION_ERROR', 'dailyLimit is required');
      return;
    }

    sendServiceResult(res, await this.adminService.setDailyLimit(dailyLimit, correlationId));
  }

  /**
   * POST /api/admin/constraints
   *
   * Request body: { employeeName1: string, employeeName2: string }
   *
   * Responds 201 when the pair was added and 200 when it already existed.
   */
  async addConstraint(req: Request, res: Response): Promise<void> {
    const correlationId = generateCorrelationId(req, 'admin');
    const pair = readPair(req.body);

    if (!pair) {
      sendError(res, HTTP_STATUS.BAD_REQUEST, 'VALIDATION_ERROR', 'employeeName1 and employeeName2 are required');
      return;
    }

    const result = await this.adminService.addConstraint(pair.employeeName1, pair.employeeName2, correlationId);
    sendServiceResult(res, result, result.data?.created === false ? HTTP_STATUS.OK : HTTP_STATUS.CREATED);
  }

  /**
   * DELETE /api/admin/constraints
   *
   * Request body: { employeeName1: string, employeeName2: string }
   */
  async removeConstraint(req: Request, res: Response): Promise<void> {
    const correlationId = generateCorrelationId(req, 'admin');
    const pair = readPair(req.body);

    if (!pair) {
      sendError(res, HTTP_STATUS.BAD_REQUEST, 'VALIDATION_ERROR', 'employeeName1 and employeeName2 are required');
      return;
    }

    sendServiceResult(
      res,
      await this.adminService.removeConstraint(pair.employeeName1, pair.employeeName2, correlationId)
    );
  }
}
