/**
 * Vacation Service Module
 *
 * Request lifecycle (submission, approval, rejection) and the read-only
 * queries over vacation requests and leave balances. Reads come from the
 * cached snapshot; every write re-checks the stored version first.
 *
 * @module services/vacation
 */

import type { ServiceOperationResult } from '../types/index.js';
import {
  VacationStatus,
  isLeaveType,
  validateStatusTransition,
  type CivilDate,
  type EligibilityResult,
  type LeaveBalanceSummary,
  type SubmitVacationRequest,
  type VacationRequest,
} from '../types/vacation.js';
import { compareCivilDates, isCivilDate, todayCivilDate } from '../utils/date.js';
import { getErrorCode, getErrorMessage, serviceFailure as failure } from '../utils/errors.js';
import { commitChange, writeFailureCode } from './commit.service.js';
import { leaveSummary, validateVacationRequest } from './eligibility.service.js';
import type { RecordStore } from './recordStore.service.js';
import type { SnapshotCache } from './snapshot.service.js';

/**
 * Vacation Service Class
 */
export class VacationService {
  constructor(
    private readonly recordStore: RecordStore,
    private readonly cache: SnapshotCache,
    private readonly today: () => CivilDate = todayCivilDate
  ) {}

  /**
   * Check a prospective request without persisting anything
   *
   * An ineligible request is still a successful check; the verdict is in the
   * returned data.
   */
  async validateRequest(
    request: SubmitVacationRequest,
    correlationId?: string
  ): Promise<ServiceOperationResult<EligibilityResult>> {
    const startTime = Date.now();
    const cid = correlationId || `validate_vacation_${Date.now()}`;

    try {
      const inputError = validateSubmission(request);
      if (inputError) {
        return failure(startTime, inputError, 'VALIDATION_ERROR');
      }

      const snapshot = await this.cache.get();
      const result = validateVacationRequest(snapshot, request.employeeName, request.startDate, request.endDate);

      console.log('[VACATION_SERVICE] Eligibility checked:', {
        employeeName: request.employeeName,
        startDate: request.startDate,
        endDate: request.endDate,
        eligible: result.eligible,
        correlationId: cid,
        timestamp: new Date().toISOString(),
      });

      return {
        success: true,
        data: result,
        executionTimeMs: Date.now() - startTime,
      };
    } catch (error) {
      return this.handleError(startTime, 'Eligibility check failed', error, cid);
    }
  }

  /**
   * Submit a new request in pending status
   *
   * The request is checked against the cached snapshot; the write is refused
   * with `STORE_CONFLICT` if the stored vacations moved on since that snapshot
   * was loaded.
   */
  async submitRequest(
    request: SubmitVacationRequest,
    correlationId?: string
  ): Promise<ServiceOperationResult<VacationRequest>> {
    const startTime = Date.now();
    const cid = correlationId || `submit_vacation_${Date.now()}`;

    console.log('[VACATION_SERVICE] Submitting vacation request:', {
      employeeName: request.employeeName,
      startDate: request.startDate,
      endDate: request.endDate,
      leaveType: request.leaveType,
      correlationId: cid,
      timestamp: new Date().toISOString(),
    });

    try {
      const inputError = validateSubmission(request);
      if (inputError) {
        console.warn('[VACATION_SERVICE] Vacation request validation failed:', {
          error: inputError,
          correlationId: cid,
          timestamp: new Date().toISOString(),
        });
        return failure(startTime, inputError, 'VALIDATION_ERROR');
      }

      const snapshot = await this.cache.get();
      const eligibility = validateVacationRequest(snapshot, request.employeeName, request.startDate, request.endDate);

      if (!eligibility.eligible) {
        console.warn('[VACATION_SERVICE] Vacation request rejected:', {
          employeeName: request.employeeName,
          code: eligibility.code,
          reason: eligibility.reason,
          correlationId: cid,
          timestamp: new Date().toISOString(),
        });
        return failure(startTime, eligibility.reason, eligibility.code);
      }

      // The write only goes through if the stored rows are the snapshot's rows,
      // so the new row lands at the snapshot's length
      const created: VacationRequest = {
        id: snapshot.requests().length,
        employeeName: request.employeeName,
        startDate: request.startDate,
        endDate: request.endDate,
        leaveType: request.leaveType,
        status: VacationStatus.Pending,
        requestDate: this.today(),
      };

      const writeResult = await commitChange({
        collection: 'vacations',
        expectedVersion: snapshot.versions.vacations,
        read: () => this.recordStore.readVacations(),
        write: (current) =>
          this.recordStore.writeVacations(
            [...current.rows, created],
            current.versionTag,
            `Vacation request by ${request.employeeName}`
          ),
        cache: this.cache,
        correlationId: cid,
      });

      if (writeResult.status !== 'success') {
        return failure(startTime, writeResult.message, writeFailureCode(writeResult));
      }

      const executionTimeMs = Date.now() - startTime;

      console.log('[VACATION_SERVICE] Vacation request submitted successfully:', {
        requestId: created.id,
        employeeName: created.employeeName,
        versionTag: writeResult.versionTag,
        executionTimeMs,
        correlationId: cid,
        timestamp: new Date().toISOString(),
      });

      return {
        success: true,
        data: created,
        executionTimeMs,
      };
    } catch (error) {
      return this.handleError(startTime, 'Vacation request submission failed', error, cid);
    }
  }

  /**
   * Approve a pending request
   *
   * Eligibility is not re-checked; the administrator's decision stands.
   */
  async approveRequest(requestId: number, correlationId?: string): Promise<ServiceOperationResult<VacationRequest>> {
    return this.decideRequest(requestId, true, correlationId);
  }

  async rejectRequest(requestId: number, correlationId?: string): Promise<ServiceOperationResult<VacationRequest>> {
    return this.decideRequest(requestId, false, correlationId);
  }

  /**
   * Move a pending request to approved or rejected
   */
  async decideRequest(
    requestId: number,
    approve: boolean,
    correlationId?: string
  ): Promise<ServiceOperationResult<VacationRequest>> {
    const startTime = Date.now();
    const cid = correlationId || `decide_vacation_${Date.now()}`;
    const newStatus = approve ? VacationStatus.Approved : VacationStatus.Rejected;

    console.log('[VACATION_SERVICE] Deciding vacation request:', {
      requestId,
      newStatus,
      correlationId: cid,
      timestamp: new Date().toISOString(),
    });

    try {
      const snapshot = await this.cache.get();
      const request = snapshot.findRequest(requestId);

      if (!request) {
        console.warn('[VACATION_SERVICE] Vacation request not found:', {
          requestId,
          correlationId: cid,
          timestamp: new Date().toISOString(),
        });
        return failure(startTime, `Vacation request ${requestId} not found`, 'REQUEST_NOT_FOUND');
      }

      const transition = validateStatusTransition(request.status, newStatus);
      if (!transition.isValid) {
        console.warn('[VACATION_SERVICE] Invalid status transition:', {
          requestId,
          currentStatus: request.status,
          newStatus,
          correlationId: cid,
          timestamp: new Date().toISOString(),
        });
        return failure(startTime, transition.errors.join('; '), 'INVALID_STATUS_TRANSITION');
      }

      const decided: VacationRequest = { ...request, status: newStatus };

      const writeResult = await commitChange({
        collection: 'vacations',
        expectedVersion: snapshot.versions.vacations,
        read: () => this.recordStore.readVacations(),
        write: (current) =>
          this.recordStore.writeVacations(
            current.rows.map((row) => (row.id === requestId ? { ...row, status: newStatus } : row)),
            current.versionTag,
            `${approve ? 'Approved' : 'Rejected'} request for ${request.employeeName}`
          ),
        cache: this.cache,
        correlationId: cid,
      });

      if (writeResult.status !== 'success') {
        return failure(startTime, writeResult.message, writeFailureCode(writeResult));
      }

      const executionTimeMs = Date.now() - startTime;

      console.log('[VACATION_SERVICE] Vacation request decided successfully:', {
        requestId,
        employeeName: request.employeeName,
        status: newStatus,
        executionTimeMs,
        correlationId: cid,
        timestamp: new Date().toISOString(),
      });

      return {
        success: true,
        data: decided,
        executionTimeMs,
      };
    } catch (error) {
      return this.handleError(startTime, 'Vacation request decision failed', error, cid);
    }
  }

  /**
   * An employee's requests, latest start date first
   */
  async getHistory(employeeName: string, correlationId?: string): Promise<ServiceOperationResult<VacationRequest[]>> {
    const startTime = Date.now();
    const cid = correlationId || `vacation_history_${Date.now()}`;

    try {
      const snapshot = await this.cache.get();

      if (!snapshot.findEmployee(employeeName)) {
        return failure(startTime, `Unknown employee: ${employeeName}`, 'EMPLOYEE_NOT_FOUND');
      }

      const history = snapshot
        .requestsFor(employeeName)
        .sort((a, b) => compareCivilDates(b.startDate, a.startDate));

      return {
        success: true,
        data: history,
        executionTimeMs: Date.now() - startTime,
      };
    } catch (error) {
      return this.handleError(startTime, 'Failed to fetch vacation history', error, cid);
    }
  }

  /**
   * All approved requests, earliest start date first
   */
  async listApproved(correlationId?: string): Promise<ServiceOperationResult<VacationRequest[]>> {
    const startTime = Date.now();
    const cid = correlationId || `approved_vacations_${Date.now()}`;

    try {
      const snapshot = await this.cache.get();
      const approved = snapshot
        .requests()
        .filter((request) => request.status === VacationStatus.Approved)
        .sort((a, b) => compareCivilDates(a.startDate, b.startDate));

      return {
        success: true,
        data: approved,
        executionTimeMs: Date.now() - startTime,
      };
    } catch (error) {
      return this.handleError(startTime, 'Failed to fetch approved vacations', error, cid);
    }
  }

  /**
   * Requests awaiting a decision, in submission order
   */
  async listPending(correlationId?: string): Promise<ServiceOperationResult<VacationRequest[]>> {
    const startTime = Date.now();
    const cid = correlationId || `pending_vacations_${Date.now()}`;

    try {
      const snapshot = await this.cache.get();

      return {
        success: true,
        data: snapshot.requests().filter((request) => request.status === VacationStatus.Pending),
        executionTimeMs: Date.now() - startTime,
      };
    } catch (error) {
      return this.handleError(startTime, 'Failed to fetch pending vacations', error, cid);
    }
  }

  /**
   * Every employee with their leave balance, in stored order
   */
  async listEmployees(correlationId?: string): Promise<ServiceOperationResult<LeaveBalanceSummary[]>> {
    const startTime = Date.now();
    const cid = correlationId || `list_employees_${Date.now()}`;

    try {
      const snapshot = await this.cache.get();
      const summaries: LeaveBalanceSummary[] = [];

      for (const employee of snapshot.employees()) {
        const summary = leaveSummary(snapshot, employee.name);
        if (summary) {
          summaries.push(summary);
        }
      }

      return {
        success: true,
        data: summaries,
        executionTimeMs: Date.now() - startTime,
      };
    } catch (error) {
      return this.handleError(startTime, 'Failed to fetch employees', error, cid);
    }
  }

  async getBalance(employeeName: string, correlationId?: string): Promise<ServiceOperationResult<LeaveBalanceSummary>> {
    const startTime = Date.now();
    const cid = correlationId || `leave_balance_${Date.now()}`;

    try {
      const snapshot = await this.cache.get();
      const summary = leaveSummary(snapshot, employeeName);

      if (!summary) {
        return failure(startTime, `Unknown employee: ${employeeName}`, 'EMPLOYEE_NOT_FOUND');
      }

      return {
        success: true,
        data: summary,
        executionTimeMs: Date.now() - startTime,
      };
    } catch (error) {
      return this.handleError(startTime, 'Failed to fetch leave balance', error, cid);
    }
  }

  private handleError<T>(
    startTime: number,
    operation: string,
    error: unknown,
    correlationId: string
  ): ServiceOperationResult<T> {
    const executionTimeMs = Date.now() - startTime;
    const errorMessage = getErrorMessage(error);

    console.error(`[VACATION_SERVICE] ${operation}:`, {
      error: errorMessage,
      executionTimeMs,
      correlationId,
      timestamp: new Date().toISOString(),
    });

    return {
      success: false,
      error: errorMessage,
      errorCode: getErrorCode(error),
      executionTimeMs,
    };
  }
}

/**
 * Shape checks on a submission; returns the first problem found
 */
function validateSubmission(request: SubmitVacationRequest): string | null {
  if (request.employeeName.trim().length === 0) {
    return 'Employee name is required';
  }
  if (!isCivilDate(request.startDate)) {
    return `Invalid start date: ${request.startDate}`;
  }
  if (!isCivilDate(request.endDate)) {
    return `Invalid end date: ${request.endDate}`;
  }
  if (request.startDate > request.endDate) {
    return `Start date ${request.startDate} is after end date ${request.endDate}`;
  }
  if (!isLeaveType(request.leaveType)) {
    return `Invalid leave type: ${String(request.leaveType)}`;
  }
  return null;
}
