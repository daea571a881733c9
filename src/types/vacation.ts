/**
 * Vacation Management Type Definitions
 *
 * Employees, vacation requests, the daily-limit policy and pairwise exclusion
 * constraints, together with the type guards and small pure helpers that
 * operate on them.
 *
 * @module types/vacation
 */

/**
 * Civil date in `YYYY-MM-DD` form. No time of day and no time zone.
 */
export type CivilDate = string;

/**
 * Leave type enumeration
 *
 * Values are the labels stored in the vacations collection.
 */
export enum LeaveType {
  /**
   * Full-day annual leave; the only type that consumes the balance
   */
  FullDay = '연차',

  /**
   * Half-day leave
   */
  HalfDay = '반차',

  /**
   * Sick leave
   */
  Sick = '병가',

  /**
   * Anything else
   */
  Other = '기타',
}

/**
 * Vacation request status enumeration
 *
 * Values are the labels stored in the vacations collection.
 */
export enum VacationStatus {
  /**
   * Awaiting an administrator decision
   */
  Pending = '대기',

  /**
   * Approved (terminal)
   */
  Approved = '승인',

  /**
   * Rejected (terminal)
   */
  Rejected = '반려',
}

/**
 * Default daily limit when the config collection or its field is absent
 */
export const DEFAULT_DAILY_LIMIT = 5;

/**
 * Default leave allocation for newly added employees
 */
export const DEFAULT_TOTAL_LEAVE_DAYS = 15;

/**
 * Employee record
 */
export interface Employee {
  /**
   * Unique employee name
   */
  readonly name: string;

  /**
   * Yearly full-day leave allocation (non-negative)
   */
  readonly totalLeaveDays: number;
}

/**
 * Vacation request record
 */
export interface VacationRequest {
  /**
   * Position of the row in the vacations collection. Rows are never deleted,
   * so positions are stable identifiers.
   */
  readonly id: number;

  readonly employeeName: string;

  /**
   * First day of leave (inclusive)
   */
  readonly startDate: CivilDate;

  /**
   * Last day of leave (inclusive)
   */
  readonly endDate: CivilDate;

  readonly leaveType: LeaveType;

  readonly status: VacationStatus;

  /**
   * Day the request was submitted; absent in rows written before the
   * column existed
   */
  readonly requestDate: CivilDate | null;
}

/**
 * Unordered pair of employees who may never be on approved leave on the
 * same day
 */
export interface ExclusionConstraint {
  readonly employeeName1: string;
  readonly employeeName2: string;
}

/**
 * Policy configuration
 */
export interface PolicyConfig {
  /**
   * Maximum number of approved vacationers on any calendar day
   */
  readonly dailyLimit: number;

  /**
   * Full stored config object, kept so unknown fields survive a rewrite
   */
  readonly settings: Readonly<Record<string, unknown>>;
}

/**
 * Vacation request submission data
 */
export interface SubmitVacationRequest {
  readonly employeeName: string;
  readonly startDate: CivilDate;
  readonly endDate: CivilDate;
  readonly leaveType: LeaveType;
}

/**
 * Leave balance summary for a single employee
 */
export interface LeaveBalanceSummary {
  readonly employeeName: string;

  /**
   * Allocated full-day leave
   */
  readonly total: number;

  /**
   * Days consumed by approved full-day requests
   */
  readonly used: number;

  /**
   * `total - used`; may go negative, over-drawing is not blocked
   */
  readonly remaining: number;
}

/**
 * Codes an eligibility check can reject with
 */
export type EligibilityRejectionCode =
  | 'VALIDATION_ERROR'
  | 'EMPLOYEE_NOT_FOUND'
  | 'DAILY_LIMIT_EXCEEDED'
  | 'EXCLUSION_CONFLICT';

/**
 * Outcome of checking a prospective request against the headcount and
 * exclusion rules
 */
export type EligibilityResult =
  | { readonly eligible: true }
  | {
      readonly eligible: false;
      readonly code: EligibilityRejectionCode;
      readonly reason: string;
      /**
       * First offending day, for limit and conflict rejections
       */
      readonly date?: CivilDate;
      /**
       * Constraint partner already on approved leave, for conflict rejections
       */
      readonly partner?: string;
    };

/**
 * Status transition validation result
 */
export interface StatusTransitionResult {
  readonly isValid: boolean;
  readonly errors: string[];
}

/**
 * Type guard to check if a value is a valid LeaveType
 *
 * @param value - Value to check
 * @returns True if value is a valid LeaveType
 */
export function isLeaveType(value: unknown): value is LeaveType {
  return Object.values<unknown>(LeaveType).includes(value);
}

/**
 * Type guard to check if a value is a valid VacationStatus
 *
 * @param value - Value to check
 * @returns True if value is a valid VacationStatus
 */
export function isVacationStatus(value: unknown): value is VacationStatus {
  return Object.values<unknown>(VacationStatus).includes(value);
}

/**
 * Validate vacation request status transition
 *
 * Pending requests move exactly once to approved or rejected; decided
 * requests are immutable.
 *
 * @param currentStatus - Current request status
 * @param newStatus - Status to transition to
 * @returns Validation result with errors
 */
export function validateStatusTransition(
  currentStatus: VacationStatus,
  newStatus: VacationStatus
): StatusTransitionResult {
  const errors: string[] = [];

  const validTransitions: Record<VacationStatus, VacationStatus[]> = {
    [VacationStatus.Pending]: [VacationStatus.Approved, VacationStatus.Rejected],
    [VacationStatus.Approved]: [],
    [VacationStatus.Rejected]: [],
  };

  const allowedTransitions = validTransitions[currentStatus];

  if (!allowedTransitions.includes(newStatus)) {
    errors.push(
      `Invalid status transition from ${currentStatus} to ${newStatus}. ` +
        `Allowed transitions: ${allowedTransitions.length > 0 ? allowedTransitions.join(', ') : 'none'}`
    );
  }

  return {
    isValid: errors.length === 0,
    errors,
  };
}

/**
 * Order-independent key for a constraint pair
 */
export function constraintKey(employeeName1: string, employeeName2: string): string {
  return [employeeName1, employeeName2].sort().join('\u0000');
}

/**
 * Check whether a constraint joins the two given employees, in either order
 */
export function isSameConstraint(
  constraint: ExclusionConstraint,
  employeeName1: string,
  employeeName2: string
): boolean {
  return (
    constraintKey(constraint.employeeName1, constraint.employeeName2) ===
    constraintKey(employeeName1, employeeName2)
  );
}

/**
 * Drop duplicate pairs (in either order), keeping the first occurrence
 */
export function dedupeConstraints(
  constraints: readonly ExclusionConstraint[]
): ExclusionConstraint[] {
  const seen = new Set<string>();
  const unique: ExclusionConstraint[] = [];

  for (const constraint of constraints) {
    const key = constraintKey(constraint.employeeName1, constraint.employeeName2);
    if (!seen.has(key)) {
      seen.add(key);
      unique.push(constraint);
    }
  }

  return unique;
}
