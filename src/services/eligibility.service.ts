/**
 * Eligibility Service Module
 *
 * Pure checks of a prospective request against the daily headcount cap and
 * the pairwise exclusion constraints, plus leave balance bookkeeping. Only
 * approved requests count; pending ones are ignored.
 *
 * @module services/eligibility
 */

import {
  LeaveType,
  VacationStatus,
  type CivilDate,
  type EligibilityResult,
  type LeaveBalanceSummary,
} from '../types/vacation.js';
import { calculateDaysBetween, eachCivilDay, isCivilDate } from '../utils/date.js';
import type { VacationSnapshot } from './snapshot.service.js';

/**
 * Check whether a request for the given range could be admitted
 *
 * Days are checked in ascending order and the first violation wins. On each
 * day the headcount cap is checked before the employee's constraints, and
 * constraints are checked in stored order.
 *
 * @example
 * // limit 2, A and B approved 2024-01-10..12
 * validateVacationRequest(snapshot, 'C', '2024-01-11', '2024-01-13');
 * // { eligible: false, code: 'DAILY_LIMIT_EXCEEDED', date: '2024-01-11', ... }
 */
export function validateVacationRequest(
  snapshot: VacationSnapshot,
  employeeName: string,
  startDate: CivilDate,
  endDate: CivilDate
): EligibilityResult {
  if (!snapshot.findEmployee(employeeName)) {
    return {
      eligible: false,
      code: 'EMPLOYEE_NOT_FOUND',
      reason: `Unknown employee: ${employeeName}`,
    };
  }

  if (!isCivilDate(startDate) || !isCivilDate(endDate)) {
    return {
      eligible: false,
      code: 'VALIDATION_ERROR',
      reason: 'Dates must be valid YYYY-MM-DD calendar dates',
    };
  }

  if (startDate > endDate) {
    return {
      eligible: false,
      code: 'VALIDATION_ERROR',
      reason: `Start date ${startDate} is after end date ${endDate}`,
    };
  }

  const partners = snapshot.constraintsFor(employeeName);

  for (const day of eachCivilDay(startDate, endDate)) {
    const approvedNames = snapshot.approvedOn(day);

    if (approvedNames.length >= snapshot.dailyLimit) {
      return {
        eligible: false,
        code: 'DAILY_LIMIT_EXCEEDED',
        reason: `Daily limit exceeded on ${day} (max ${snapshot.dailyLimit})`,
        date: day,
      };
    }

    const partner = partners.find((name) => approvedNames.includes(name));
    if (partner !== undefined) {
      return {
        eligible: false,
        code: 'EXCLUSION_CONFLICT',
        reason: `Conflicts with ${partner} on ${day}`,
        date: day,
        partner,
      };
    }
  }

  return { eligible: true };
}

/**
 * Days consumed by the employee's approved full-day requests
 */
export function calculateUsedLeave(snapshot: VacationSnapshot, employeeName: string): number {
  return snapshot
    .requestsFor(employeeName)
    .filter((request) => request.status === VacationStatus.Approved && request.leaveType === LeaveType.FullDay)
    .reduce((used, request) => used + calculateDaysBetween(request.startDate, request.endDate), 0);
}

/**
 * Remaining full-day leave, or null for an unknown employee
 *
 * @example
 * // total 15, approved 연차 2024-02-01..03
 * remainingLeave(snapshot, 'A'); // 12
 */
export function remainingLeave(snapshot: VacationSnapshot, employeeName: string): number | null {
  const employee = snapshot.findEmployee(employeeName);
  if (!employee) {
    return null;
  }
  return employee.totalLeaveDays - calculateUsedLeave(snapshot, employeeName);
}

export function leaveSummary(snapshot: VacationSnapshot, employeeName: string): LeaveBalanceSummary | null {
  const employee = snapshot.findEmployee(employeeName);
  if (!employee) {
    return null;
  }

  const used = calculateUsedLeave(snapshot, employeeName);

  return {
    employeeName,
    total: employee.totalLeaveDays,
    used,
    remaining: employee.totalLeaveDays - used,
  };
}
