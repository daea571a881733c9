/**
 * Admin Service Module
 *
 * Employee roster, daily limit and exclusion constraint management. Each
 * command validates against the cached snapshot and commits through the same
 * version-checked write as request submission.
 *
 * @module services/admin
 */

import type { ServiceOperationResult } from '../types/index.js';
import {
  DEFAULT_TOTAL_LEAVE_DAYS,
  isSameConstraint,
  type Employee,
  type ExclusionConstraint,
} from '../types/vacation.js';
import { getErrorCode, getErrorMessage, serviceFailure as failure } from '../utils/errors.js';
import { commitChange, writeFailureCode } from './commit.service.js';
import type { RecordStore } from './recordStore.service.js';
import type { SnapshotCache } from './snapshot.service.js';

/**
 * Current policy as shown to administrators
 */
export interface PolicyOverview {
  readonly dailyLimit: number;
  readonly constraints: readonly ExclusionConstraint[];
}

/**
 * Outcome of adding a constraint; `created` is false when the pair existed
 */
export interface ConstraintChange {
  readonly constraint: ExclusionConstraint;
  readonly created: boolean;
}

/**
 * Admin Service Class
 */
export class AdminService {
  constructor(
    private readonly recordStore: RecordStore,
    private readonly cache: SnapshotCache
  ) {}

  async getPolicy(correlationId?: string): Promise<ServiceOperationResult<PolicyOverview>> {
    const startTime = Date.now();
    const cid = correlationId || `get_policy_${Date.now()}`;

    try {
      const snapshot = await this.cache.get();

      return {
        success: true,
        data: {
          dailyLimit: snapshot.dailyLimit,
          constraints: snapshot.constraints(),
        },
        executionTimeMs: Date.now() - startTime,
      };
    } catch (error) {
      return this.handleError(startTime, 'Failed to fetch policy', error, cid);
    }
  }

  /**
   * Add an employee with the given yearly allocation
   */
  async addEmployee(
    name: string,
    totalLeaveDays: number = DEFAULT_TOTAL_LEAVE_DAYS,
    correlationId?: string
  ): Promise<ServiceOperationResult<Employee>> {
    const startTime = Date.now();
    const cid = correlationId || `add_employee_${Date.now()}`;
    const employeeName = name.trim();

    console.log('[ADMIN_SERVICE] Adding employee:', {
      employeeName,
      totalLeaveDays,
      correlationId: cid,
      timestamp: new Date().toISOString(),
    });

    try {
      if (employeeName.length === 0) {
        return failure(startTime, 'Employee name is required', 'VALIDATION_ERROR');
      }
      if (!Number.isFinite(totalLeaveDays) || totalLeaveDays < 0) {
        return failure(startTime, 'Total leave days must be a non-negative number', 'VALIDATION_ERROR');
      }

      const snapshot = await this.cache.get();
      if (snapshot.findEmployee(employeeName)) {
        return failure(startTime, `Employee ${employeeName} already exists`, 'EMPLOYEE_EXISTS');
      }

      const employee: Employee = { name: employeeName, totalLeaveDays };

      const writeResult = await commitChange({
        collection: 'employees',
        expectedVersion: snapshot.versions.employees,
        read: () => this.recordStore.readEmployees(),
        write: (current) =>
          this.recordStore.writeEmployees(
            [...current.rows, employee],
            current.versionTag,
            `Add employee ${employeeName}`
          ),
        cache: this.cache,
        correlationId: cid,
      });

      if (writeResult.status !== 'success') {
        return failure(startTime, writeResult.message, writeFailureCode(writeResult));
      }

      console.log('[ADMIN_SERVICE] Employee added:', {
        employeeName,
        correlationId: cid,
        timestamp: new Date().toISOString(),
      });

      return {
        success: true,
        data: employee,
        executionTimeMs: Date.now() - startTime,
      };
    } catch (error) {
      return this.handleError(startTime, 'Failed to add employee', error, cid);
    }
  }

  /**
   * Remove an employee; their requests and constraints stay on record
   */
  async removeEmployee(name: string, correlationId?: string): Promise<ServiceOperationResult<Employee>> {
    const startTime = Date.now();
    const cid = correlationId || `remove_employee_${Date.now()}`;

    console.log('[ADMIN_SERVICE] Removing employee:', {
      employeeName: name,
      correlationId: cid,
      timestamp: new Date().toISOString(),
    });

    try {
      const snapshot = await this.cache.get();
      const employee = snapshot.findEmployee(name);

      if (!employee) {
        return failure(startTime, `Unknown employee: ${name}`, 'EMPLOYEE_NOT_FOUND');
      }

      const writeResult = await commitChange({
        collection: 'employees',
        expectedVersion: snapshot.versions.employees,
        read: () => this.recordStore.readEmployees(),
        write: (current) =>
          this.recordStore.writeEmployees(
            current.rows.filter((row) => row.name !== name),
            current.versionTag,
            `Remove employee ${name}`
          ),
        cache: this.cache,
        correlationId: cid,
      });

      if (writeResult.status !== 'success') {
        return failure(startTime, writeResult.message, writeFailureCode(writeResult));
      }

      return {
        success: true,
        data: employee,
        executionTimeMs: Date.now() - startTime,
      };
    } catch (error) {
      return this.handleError(startTime, 'Failed to remove employee', error, cid);
    }
  }

  /**
   * Change the daily limit, keeping every other config field
   *
   * Existing approved requests are not revisited when the limit drops.
   */
  async setDailyLimit(dailyLimit: number, correlationId?: string): Promise<ServiceOperationResult<number>> {
    const startTime = Date.now();
    const cid = correlationId || `set_daily_limit_${Date.now()}`;

    console.log('[ADMIN_SERVICE] Setting daily limit:', {
      dailyLimit,
      correlationId: cid,
      timestamp: new Date().toISOString(),
    });

    try {
      if (!Number.isInteger(dailyLimit) || dailyLimit < 1) {
        return failure(startTime, 'Daily limit must be a positive integer', 'VALIDATION_ERROR');
      }

      const snapshot = await this.cache.get();

      const writeResult = await commitChange({
        collection: 'config',
        expectedVersion: snapshot.versions.config,
        read: () => this.recordStore.readPolicy(),
        write: (current) =>
          this.recordStore.writePolicy(
            { ...current.policy, dailyLimit },
            current.versionTag,
            `Update daily limit to ${dailyLimit}`
          ),
        cache: this.cache,
        correlationId: cid,
      });

      if (writeResult.status !== 'success') {
        return failure(startTime, writeResult.message, writeFailureCode(writeResult));
      }

      return {
        success: true,
        data: dailyLimit,
        executionTimeMs: Date.now() - startTime,
      };
    } catch (error) {
      return this.handleError(startTime, 'Failed to set daily limit', error, cid);
    }
  }

  /**
   * Forbid two employees from sharing a day of approved leave
   */
  async addConstraint(
    employeeName1: string,
    employeeName2: string,
    correlationId?: string
  ): Promise<ServiceOperationResult<ConstraintChange>> {
    const startTime = Date.now();
    const cid = correlationId || `add_constraint_${Date.now()}`;

    console.log('[ADMIN_SERVICE] Adding constraint:', {
      employeeName1,
      employeeName2,
      correlationId: cid,
      timestamp: new Date().toISOString(),
    });

    try {
      if (employeeName1 === employeeName2) {
        return failure(startTime, 'A constraint needs two different employees', 'VALIDATION_ERROR');
      }

      const snapshot = await this.cache.get();

      for (const name of [employeeName1, employeeName2]) {
        if (!snapshot.findEmployee(name)) {
          return failure(startTime, `Unknown employee: ${name}`, 'VALIDATION_ERROR');
        }
      }

      const existing = snapshot
        .constraints()
        .find((constraint) => isSameConstraint(constraint, employeeName1, employeeName2));

      if (existing) {
        return {
          success: true,
          data: { constraint: existing, created: false },
          executionTimeMs: Date.now() - startTime,
        };
      }

      const constraint: ExclusionConstraint = { employeeName1, employeeName2 };

      const writeResult = await commitChange({
        collection: 'constraints',
        expectedVersion: snapshot.versions.constraints,
        read: () => this.recordStore.readConstraints(),
        write: (current) =>
          this.recordStore.writeConstraints(
            [...current.rows, constraint],
            current.versionTag,
            `Add constraint between ${employeeName1} and ${employeeName2}`
          ),
        cache: this.cache,
        correlationId: cid,
      });

      if (writeResult.status !== 'success') {
        return failure(startTime, writeResult.message, writeFailureCode(writeResult));
      }

      return {
        success: true,
        data: { constraint, created: true },
        executionTimeMs: Date.now() - startTime,
      };
    } catch (error) {
      return this.handleError(startTime, 'Failed to add constraint', error, cid);
    }
  }

  /**
   * Remove the constraint between two employees, given in either order
   */
  async removeConstraint(
    employeeName1: string,
    employeeName2: string,
    correlationId?: string
  ): Promise<ServiceOperationResult<ExclusionConstraint>> {
    const startTime = Date.now();
    const cid = correlationId || `remove_constraint_${Date.now()}`;

    try {
      const snapshot = await this.cache.get();
      const existing = snapshot
        .constraints()
        .find((constraint) => isSameConstraint(constraint, employeeName1, employeeName2));

      if (!existing) {
        return failure(
          startTime,
          `No constraint between ${employeeName1} and ${employeeName2}`,
          'CONSTRAINT_NOT_FOUND'
        );
      }

      const writeResult = await commitChange({
        collection: 'constraints',
        expectedVersion: snapshot.versions.constraints,
        read: () => this.recordStore.readConstraints(),
        write: (current) =>
          this.recordStore.writeConstraints(
            current.rows.filter((constraint) => !isSameConstraint(constraint, employeeName1, employeeName2)),
            current.versionTag,
            `Remove constraint between ${employeeName1} and ${employeeName2}`
          ),
        cache: this.cache,
        correlationId: cid,
      });

      if (writeResult.status !== 'success') {
        return failure(startTime, writeResult.message, writeFailureCode(writeResult));
      }

      return {
        success: true,
        data: existing,
        executionTimeMs: Date.now() - startTime,
      };
    } catch (error) {
      return this.handleError(startTime, 'Failed to remove constraint', error, cid);
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

    console.error(`[ADMIN_SERVICE] ${operation}:`, {
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
