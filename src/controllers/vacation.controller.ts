/**
 * Vacation Controller Module
 *
 * HTTP adapter for request submission, decisions, history and leave
 * balances. Bodies and path parameters are checked here; everything else is
 * the service's job.
 *
 * @module controllers/vacation
 */

import type { Request, Response } from 'express';

import type { VacationService } from '../services/vacation.service.js';
import { LeaveType, isLeaveType, type SubmitVacationRequest } from '../types/vacation.js';
import { HTTP_STATUS, generateCorrelationId, sendError, sendServiceResult } from '../utils/http.js';
import { isRecord, parseIdParam, readString } from '../utils/validation.js';

type SubmissionParseResult =
  | { readonly valid: true; readonly value: SubmitVacationRequest }
  | { readonly valid: false; readonly error: string };

/**
 * Check the shape of a submission body
 */
export function parseSubmission(body: unknown): SubmissionParseResult {
  if (!isRecord(body)) {
    return { valid: false, error: 'Invalid request body' };
  }

  const employeeName = readString(body, 'employeeName');
  const startDate = readString(body, 'startDate');
  const endDate = readString(body, 'endDate');
  const leaveType = readString(body, 'leaveType');

  if (!employeeName) {
    return { valid: false, error: 'employeeName is required' };
  }
  if (!startDate || !endDate) {
    return { valid: false, error: 'startDate and endDate are required (YYYY-MM-DD)' };
  }
  if (!isLeaveType(leaveType)) {
    return { valid: false, error: `leaveType must be one of: ${Object.values(LeaveType).join(', ')}` };
  }

  return { valid: true, value: { employeeName, startDate, endDate, leaveType } };
}

/**
 * Vacation Controller Class
 */
export class VacationController {
  constructor(private readonly vacationService: VacationService) {}

  /**
   * POST /api/vacations
   *
   * Request body:
   * {
   *   employeeName: string,
   *   startDate: string (YYYY-MM-DD),
   *   endDate: string (YYYY-MM-DD),
   *   leaveType: '연차' | '반차' | '병가' | '기타'
   * }
   */
  async submit(req: Request, res: Response): Promise<void> {
    const correlationId = generateCorrelationId(req, 'vacation');
    const parsed = parseSubmission(req.body);

    if (!parsed.valid) {
      sendError(res, HTTP_STATUS.BAD_REQUEST, 'VALIDATION_ERROR', parsed.error);
      return;
    }

    const result = await this.vacationService.submitRequest(parsed.value, correlationId);
    sendServiceResult(res, result, HTTP_STATUS.CREATED);
  }

  /**
   * POST /api/vacations/validate
   *
   * Same body as submission; nothing is stored.
   */
  async validate(req: Request, res: Response): Promise<void> {
    const correlationId = generateCorrelationId(req, 'vacation');
    const parsed = parseSubmission(req.body);

    if (!parsed.valid) {
      sendError(res, HTTP_STATUS.BAD_REQUEST, 'VALIDATION_ERROR', parsed.error);
      return;
    }

    const result = await this.vacationService.validateRequest(parsed.value, correlationId);
    sendServiceResult(res, result);
  }

  /**
   * PATCH /api/vacations/:id/approve
   */
  async approve(req: Request, res: Response): Promise<void> {
    await this.decide(req, res, true);
  }

  /**
   * PATCH /api/vacations/:id/reject
   */
  async reject(req: Request, res: Response): Promise<void> {
    await this.decide(req, res, false);
  }

  /**
   * GET /api/vacations/employees/:name
   */
  async history(req: Request, res: Response): Promise<void> {
    const correlationId = generateCorrelationId(req, 'vacation');
    const result = await this.vacationService.getHistory(req.params.name, correlationId);
    sendServiceResult(res, result);
  }

  /**
   * GET /api/vacations/approved
   */
  async approved(req: Request, res: Response): Promise<void> {
    const correlationId = generateCorrelationId(req, 'vacation');
    sendServiceResult(res, await this.vacationService.listApproved(correlationId));
  }

  /**
   * GET /api/vacations/pending
   */
  async pending(req: Request, res: Response): Promise<void> {
    const correlationId = generateCorrelationId(req, 'vacation');
    sendServiceResult(res, await this.vacationService.listPending(correlationId));
  }

  /**
   * GET /api/employees
   */
  async employees(req: Request, res: Response): Promise<void> {
    const correlationId = generateCorrelationId(req, 'employee');
    sendServiceResult(res, await this.vacationService.listEmployees(correlationId));
  }

  /**
   * GET /api/employees/:name/balance
   */
  async balance(req: Request, res: Response): Promise<void> {
    const correlationId = generateCorrelationId(req, 'employee');
    const result = await this.vacationService.getBalance(req.params.name, correlationId);
    sendServiceResult(res, result);
  }

  private async decide(req: Request, res: Response, approve: boolean): Promise<void> {
    const correlationId = generateCorrelationId(req, 'vacation');
    const requestId = parseIdParam(req.params.id);

    if (requestId === null) {
      sendError(res, HTTP_STATUS.BAD_REQUEST, 'VALIDATION_ERROR', 'Request id must be a non-negative integer');
      return;
    }

    const result = await this.vacationService.decideRequest(requestId, approve, correlationId);
    sendServiceResult(res, result);
  }
}
