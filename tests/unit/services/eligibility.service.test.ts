import { describe, it, expect } from 'vitest';

import {
  calculateUsedLeave,
  leaveSummary,
  remainingLeave,
  validateVacationRequest,
} from '../../../src/services/eligibility.service.js';
import { VacationSnapshot } from '../../../src/services/snapshot.service.js';
import {
  LeaveType,
  VacationStatus,
  type ExclusionConstraint,
  type VacationRequest,
} from '../../../src/types/vacation.js';

let nextId = 0;

function approved(
  employeeName: string,
  startDate: string,
  endDate: string,
  leaveType: LeaveType = LeaveType.FullDay
): VacationRequest {
  return {
    id: nextId++,
    employeeName,
    startDate,
    endDate,
    leaveType,
    status: VacationStatus.Approved,
    requestDate: null,
  };
}

function pending(employeeName: string, startDate: string, endDate: string): VacationRequest {
  return { ...approved(employeeName, startDate, endDate), status: VacationStatus.Pending };
}

function office(
  requests: VacationRequest[],
  options: { dailyLimit?: number; constraints?: ExclusionConstraint[] } = {}
): VacationSnapshot {
  return VacationSnapshot.from({
    employees: ['A', 'B', 'C', 'D'].map((name) => ({ name, totalLeaveDays: 15 })),
    requests,
    constraints: options.constraints ?? [],
    policy: { dailyLimit: options.dailyLimit ?? 5, settings: {} },
  });
}

describe('validateVacationRequest', () => {
  it('should report the first day the daily limit is reached', () => {
    const snapshot = office([approved('A', '2024-01-10', '2024-01-12'), approved('B', '2024-01-10', '2024-01-12')], {
      dailyLimit: 2,
    });

    expect(validateVacationRequest(snapshot, 'C', '2024-01-11', '2024-01-13')).toEqual({
      eligible: false,
      code: 'DAILY_LIMIT_EXCEEDED',
      reason: 'Daily limit exceeded on 2024-01-11 (max 2)',
      date: '2024-01-11',
    });
  });

  it('should reject a conflict with a constraint partner on the shared day', () => {
    const snapshot = office([approved('A', '2024-01-05', '2024-01-06')], {
      constraints: [{ employeeName1: 'A', employeeName2: 'B' }],
    });

    expect(validateVacationRequest(snapshot, 'B', '2024-01-06', '2024-01-07')).toEqual({
      eligible: false,
      code: 'EXCLUSION_CONFLICT',
      reason: 'Conflicts with A on 2024-01-06',
      date: '2024-01-06',
      partner: 'A',
    });
  });

  it('should accept a request below the limit with no partner away', () => {
    const snapshot = office([approved('A', '2024-01-10', '2024-01-12')], {
      dailyLimit: 2,
      constraints: [{ employeeName1: 'A', employeeName2: 'B' }],
    });

    expect(validateVacationRequest(snapshot, 'C', '2024-01-10', '2024-01-12')).toEqual({ eligible: true });
    expect(validateVacationRequest(snapshot, 'B', '2024-01-13', '2024-01-14')).toEqual({ eligible: true });
  });

  it('should check the limit before constraints on the same day', () => {
    const snapshot = office([approved('A', '2024-01-10', '2024-01-10')], {
      dailyLimit: 1,
      constraints: [{ employeeName1: 'A', employeeName2: 'B' }],
    });

    const result = validateVacationRequest(snapshot, 'B', '2024-01-10', '2024-01-10');

    expect(result.eligible).toBe(false);
    if (!result.eligible) {
      expect(result.code).toBe('DAILY_LIMIT_EXCEEDED');
    }
  });

  it('should report the partner listed first when several are away', () => {
    const snapshot = office([approved('C', '2024-01-10', '2024-01-10'), approved('B', '2024-01-10', '2024-01-10')], {
      constraints: [
        { employeeName1: 'A', employeeName2: 'B' },
        { employeeName1: 'C', employeeName2: 'A' },
      ],
    });

    const result = validateVacationRequest(snapshot, 'A', '2024-01-10', '2024-01-10');

    expect(result).toMatchObject({ eligible: false, code: 'EXCLUSION_CONFLICT', partner: 'B' });
  });

  it('should ignore pending and rejected requests', () => {
    const snapshot = office(
      [
        pending('A', '2024-01-10', '2024-01-10'),
        { ...approved('D', '2024-01-10', '2024-01-10'), status: VacationStatus.Rejected },
      ],
      { dailyLimit: 1, constraints: [{ employeeName1: 'A', employeeName2: 'B' }] }
    );

    expect(validateVacationRequest(snapshot, 'B', '2024-01-10', '2024-01-10')).toEqual({ eligible: true });
  });

  it('should count two overlapping approvals of one employee twice', () => {
    const snapshot = office([approved('A', '2024-01-10', '2024-01-10'), approved('A', '2024-01-10', '2024-01-11')], {
      dailyLimit: 2,
    });

    expect(validateVacationRequest(snapshot, 'C', '2024-01-10', '2024-01-10')).toMatchObject({
      eligible: false,
      code: 'DAILY_LIMIT_EXCEEDED',
    });
    expect(validateVacationRequest(snapshot, 'C', '2024-01-11', '2024-01-11')).toEqual({ eligible: true });
  });

  it('should reject unknown employees', () => {
    expect(validateVacationRequest(office([]), 'Z', '2024-01-10', '2024-01-10')).toEqual({
      eligible: false,
      code: 'EMPLOYEE_NOT_FOUND',
      reason: 'Unknown employee: Z',
    });
  });

  it('should reject a reversed range', () => {
    expect(validateVacationRequest(office([]), 'A', '2024-01-11', '2024-01-10')).toEqual({
      eligible: false,
      code: 'VALIDATION_ERROR',
      reason: 'Start date 2024-01-11 is after end date 2024-01-10',
    });
  });

  it('should reject impossible dates', () => {
    expect(validateVacationRequest(office([]), 'A', '2023-02-29', '2023-03-01')).toMatchObject({
      eligible: false,
      code: 'VALIDATION_ERROR',
    });
  });
});

describe('leave balance', () => {
  const snapshot = office([
    approved('A', '2024-02-01', '2024-02-03'),
    approved('A', '2024-02-10', '2024-02-10', LeaveType.HalfDay),
    approved('A', '2024-02-12', '2024-02-13', LeaveType.Sick),
    pending('A', '2024-03-01', '2024-03-05'),
  ]);

  it('should only count approved full-day leave', () => {
    expect(calculateUsedLeave(snapshot, 'A')).toBe(3);
  });

  it('should subtract used days from the allocation', () => {
    expect(remainingLeave(snapshot, 'A')).toBe(12);
    expect(remainingLeave(snapshot, 'B')).toBe(15);
  });

  it('should return null for unknown employees', () => {
    expect(remainingLeave(snapshot, 'Z')).toBeNull();
    expect(leaveSummary(snapshot, 'Z')).toBeNull();
  });

  it('should allow the balance to go negative', () => {
    const overdrawn = office([approved('B', '2024-01-01', '2024-01-20')]);

    expect(leaveSummary(overdrawn, 'B')).toEqual({ employeeName: 'B', total: 15, used: 20, remaining: -5 });
  });
});
