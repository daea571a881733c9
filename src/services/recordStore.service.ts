/**
 * Record Store Service Module
 *
 * Translates employees, vacation requests, exclusion constraints and the
 * policy config to and from their stored text form, and reads/writes them
 * through the document store with version tags. Rows that do not match the
 * schema reject the whole collection; nothing is coerced.
 *
 * @module services/recordStore
 */

import { getDocumentStore } from '../db/index.js';
import { getStoreConfig, type CollectionPaths } from '../config/store.js';
import type { CollectionSnapshot, CollectionWriteResult, DocumentStore } from '../types/store.js';
import {
  DEFAULT_DAILY_LIMIT,
  dedupeConstraints,
  isLeaveType,
  isVacationStatus,
  type Employee,
  type ExclusionConstraint,
  type PolicyConfig,
  type VacationRequest,
} from '../types/vacation.js';
import { parseCsv, stringifyCsv, type CsvRow } from '../utils/csv.js';
import { isCivilDate } from '../utils/date.js';
import { RecordFormatError, StoreConflictError, StoreTransportError } from '../utils/errors.js';

/**
 * Row codec for one tabular collection
 */
export interface CollectionCodec<T> {
  /**
   * Collection name used in error messages
   */
  readonly name: string;

  /**
   * Written column order
   */
  readonly columns: readonly string[];

  /**
   * Columns a stored file must contain
   */
  readonly requiredColumns: readonly string[];

  decode(row: CsvRow, index: number): T;

  encode(record: T): string[];
}

/**
 * Policy config and the version it was read at
 */
export interface PolicySnapshot {
  readonly policy: PolicyConfig;
  readonly versionTag: string | null;
}

function malformed(collection: string, index: number, message: string): RecordFormatError {
  return new RecordFormatError(`${collection} row ${index + 1}: ${message}`, {
    details: { collection, row: index + 1 },
  });
}

function requireName(collection: string, row: CsvRow, column: string, index: number): string {
  const value = (row[column] ?? '').trim();
  if (value.length === 0) {
    throw malformed(collection, index, `${column} is empty`);
  }
  return value;
}

export const employeeCodec: CollectionCodec<Employee> = {
  name: 'employees',
  columns: ['employee_name', 'total_leave_days'],
  requiredColumns: ['employee_name', 'total_leave_days'],

  decode(row, index) {
    const name = requireName(this.name, row, 'employee_name', index);
    const rawDays = (row.total_leave_days ?? '').trim();
    const totalLeaveDays = Number(rawDays);

    if (rawDays.length === 0 || !Number.isFinite(totalLeaveDays) || totalLeaveDays < 0) {
      throw malformed(this.name, index, `total_leave_days "${rawDays}" is not a non-negative number`);
    }

    return { name, totalLeaveDays };
  },

  encode(employee) {
    return [employee.name, String(employee.totalLeaveDays)];
  },
};

export const vacationCodec: CollectionCodec<VacationRequest> = {
  name: 'vacations',
  columns: ['employee_name', 'start_date', 'end_date', 'leave_type', 'status', 'request_date'],
  // request_date was added after the first files were written
  requiredColumns: ['employee_name', 'start_date', 'end_date', 'leave_type', 'status'],

  decode(row, index) {
    const employeeName = requireName(this.name, row, 'employee_name', index);
    const startDate = (row.start_date ?? '').trim();
    const endDate = (row.end_date ?? '').trim();
    const leaveType = (row.leave_type ?? '').trim();
    const status = (row.status ?? '').trim();
    const requestDate = (row.request_date ?? '').trim();

    if (!isCivilDate(startDate)) {
      throw malformed(this.name, index, `start_date "${startDate}" is not a YYYY-MM-DD date`);
    }
    if (!isCivilDate(endDate)) {
      throw malformed(this.name, index, `end_date "${endDate}" is not a YYYY-MM-DD date`);
    }
    if (startDate > endDate) {
      throw malformed(this.name, index, `start_date ${startDate} is after end_date ${endDate}`);
    }
    if (!isLeaveType(leaveType)) {
      throw malformed(this.name, index, `unknown leave_type "${leaveType}"`);
    }
    if (!isVacationStatus(status)) {
      throw malformed(this.name, index, `unknown status "${status}"`);
    }
    if (requestDate.length > 0 && !isCivilDate(requestDate)) {
      throw malformed(this.name, index, `request_date "${requestDate}" is not a YYYY-MM-DD date`);
    }

    return {
      id: index,
      employeeName,
      startDate,
      endDate,
      leaveType,
      status,
      requestDate: requestDate.length > 0 ? requestDate : null,
    };
  },

  encode(request) {
    return [
      request.employeeName,
      request.startDate,
      request.endDate,
      request.leaveType,
      request.status,
      request.requestDate ?? '',
    ];
  },
};

export const constraintCodec: CollectionCodec<ExclusionConstraint> = {
  name: 'constraints',
  columns: ['employee_name_1', 'employee_name_2'],
  requiredColumns: ['employee_name_1', 'employee_name_2'],

  decode(row, index) {
    const employeeName1 = requireName(this.name, row, 'employee_name_1', index);
    const employeeName2 = requireName(this.name, row, 'employee_name_2', index);

    if (employeeName1 === employeeName2) {
      throw malformed(this.name, index, `constraint pairs ${employeeName1} with themself`);
    }

    return { employeeName1, employeeName2 };
  },

  encode(constraint) {
    return [constraint.employeeName1, constraint.employeeName2];
  },
};

/**
 * Decode a whole CSV collection
 *
 * @throws {RecordFormatError} If a required column is missing or a row is malformed
 */
export function decodeCollection<T>(content: string, codec: CollectionCodec<T>): T[] {
  const { header, rows } = parseCsv(content);

  if (header.length === 0) {
    return [];
  }

  const missing = codec.requiredColumns.filter((column) => !header.includes(column));
  if (missing.length > 0) {
    throw new RecordFormatError(`${codec.name} is missing columns: ${missing.join(', ')}`, {
      details: { collection: codec.name, missing },
    });
  }

  return rows.map((row, index) => codec.decode(row, index));
}

/**
 * Encode a collection with its fixed column order
 */
export function encodeCollection<T>(rows: readonly T[], codec: CollectionCodec<T>): string {
  return stringifyCsv(
    codec.columns,
    rows.map((row) => codec.encode(row))
  );
}

/**
 * Decode the policy config JSON
 *
 * @throws {RecordFormatError} If the content is not a JSON object or
 *   `daily_limit` is not a positive integer
 */
export function decodePolicy(content: string): PolicyConfig {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new RecordFormatError('config is not valid JSON', { cause: error });
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new RecordFormatError('config must be a JSON object');
  }

  const settings: Record<string, unknown> = { ...parsed };
  const dailyLimit = settings.daily_limit;

  if (dailyLimit === undefined) {
    return { dailyLimit: DEFAULT_DAILY_LIMIT, settings };
  }

  if (typeof dailyLimit !== 'number' || !Number.isInteger(dailyLimit) || dailyLimit < 1) {
    throw new RecordFormatError(`config daily_limit ${JSON.stringify(dailyLimit)} is not a positive integer`);
  }

  return { dailyLimit, settings };
}

/**
 * Encode the policy config, keeping any fields this service does not know
 */
export function encodePolicy(policy: PolicyConfig): string {
  return JSON.stringify({ ...policy.settings, daily_limit: policy.dailyLimit }, null, 2);
}

/**
 * Record Store Class
 *
 * Read-modify-write access to the four collections.
 */
export class RecordStore {
  constructor(
    private readonly store: DocumentStore = getDocumentStore(),
    readonly paths: CollectionPaths = getStoreConfig().paths
  ) {}

  /**
   * Read and decode a tabular collection
   *
   * A missing file reads as an empty collection with no version tag.
   *
   * @throws {StoreTransportError} If the store cannot be reached
   * @throws {RecordFormatError} If the stored content is malformed
   */
  async readCollection<T>(path: string, codec: CollectionCodec<T>): Promise<CollectionSnapshot<T>> {
    const file = await this.store.readFile(path);

    if (!file.found) {
      return { rows: [], versionTag: null };
    }

    return {
      rows: decodeCollection(file.content, codec),
      versionTag: file.versionTag,
    };
  }

  /**
   * Encode and write a tabular collection
   *
   * With a version tag the write only succeeds if the stored file is still at
   * that version; without one the file is created and must not exist yet.
   */
  async writeCollection<T>(
    path: string,
    codec: CollectionCodec<T>,
    rows: readonly T[],
    versionTag: string | null,
    message: string
  ): Promise<CollectionWriteResult> {
    return this.writeContent(path, encodeCollection(rows, codec), versionTag, message);
  }

  async readEmployees(): Promise<CollectionSnapshot<Employee>> {
    const snapshot = await this.readCollection(this.paths.employees, employeeCodec);
    const seen = new Set<string>();

    snapshot.rows.forEach((employee, index) => {
      if (seen.has(employee.name)) {
        throw malformed(employeeCodec.name, index, `duplicate employee_name "${employee.name}"`);
      }
      seen.add(employee.name);
    });

    return snapshot;
  }

  async readVacations(): Promise<CollectionSnapshot<VacationRequest>> {
    return this.readCollection(this.paths.vacations, vacationCodec);
  }

  /**
   * Read constraints, dropping duplicate pairs in either order
   */
  async readConstraints(): Promise<CollectionSnapshot<ExclusionConstraint>> {
    const snapshot = await this.readCollection(this.paths.constraints, constraintCodec);
    return { rows: dedupeConstraints(snapshot.rows), versionTag: snapshot.versionTag };
  }

  /**
   * Read the policy config; a missing file yields the defaults
   */
  async readPolicy(): Promise<PolicySnapshot> {
    const file = await this.store.readFile(this.paths.config);

    if (!file.found) {
      return { policy: { dailyLimit: DEFAULT_DAILY_LIMIT, settings: {} }, versionTag: null };
    }

    return { policy: decodePolicy(file.content), versionTag: file.versionTag };
  }

  async writeEmployees(
    rows: readonly Employee[],
    versionTag: string | null,
    message: string
  ): Promise<CollectionWriteResult> {
    return this.writeCollection(this.paths.employees, employeeCodec, rows, versionTag, message);
  }

  async writeVacations(
    rows: readonly VacationRequest[],
    versionTag: string | null,
    message: string
  ): Promise<CollectionWriteResult> {
    return this.writeCollection(this.paths.vacations, vacationCodec, rows, versionTag, message);
  }

  async writeConstraints(
    rows: readonly ExclusionConstraint[],
    versionTag: string | null,
    message: string
  ): Promise<CollectionWriteResult> {
    return this.writeCollection(this.paths.constraints, constraintCodec, dedupeConstraints(rows), versionTag, message);
  }

  async writePolicy(policy: PolicyConfig, versionTag: string | null, message: string): Promise<CollectionWriteResult> {
    return this.writeContent(this.paths.config, encodePolicy(policy), versionTag, message);
  }

  private async writeContent(
    path: string,
    content: string,
    versionTag: string | null,
    message: string
  ): Promise<CollectionWriteResult> {
    try {
      const result =
        versionTag === null
          ? await this.store.createFile(path, content, message)
          : await this.store.writeFile(path, content, versionTag, message);

      return { status: 'success', versionTag: result.versionTag };
    } catch (error) {
      if (error instanceof StoreConflictError) {
        console.warn('[RECORD_STORE] Write conflict:', {
          path,
          versionTag,
          error: error.message,
          timestamp: new Date().toISOString(),
        });
        return { status: 'conflict', message: error.message };
      }

      if (error instanceof StoreTransportError) {
        console.error('[RECORD_STORE] Write failed:', {
          path,
          versionTag,
          error: error.message,
          timestamp: new Date().toISOString(),
        });
        return { status: 'transport_error', message: error.message };
      }

      throw error;
    }
  }
}
