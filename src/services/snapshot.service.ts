/**
 * Snapshot Service Module
 *
 * Loads the four collections into one immutable in-memory snapshot and keeps
 * it for a bounded freshness window. Every read path works off a snapshot;
 * every write path invalidates it.
 *
 * @module services/snapshot
 */

import { getStoreConfig } from '../config/store.js';
import {
  VacationStatus,
  type CivilDate,
  type Employee,
  type ExclusionConstraint,
  type PolicyConfig,
  type VacationRequest,
} from '../types/vacation.js';
import { isDateInRange } from '../utils/date.js';
import { RecordStore } from './recordStore.service.js';

/**
 * Version tags of the collections a snapshot was built from
 */
export interface SnapshotVersions {
  readonly employees: string | null;
  readonly vacations: string | null;
  readonly constraints: string | null;
  readonly config: string | null;
}

/**
 * Raw material of a snapshot
 */
export interface SnapshotData {
  readonly employees: readonly Employee[];
  readonly requests: readonly VacationRequest[];
  readonly constraints: readonly ExclusionConstraint[];
  readonly policy: PolicyConfig;
  readonly versions: SnapshotVersions;
}

const NO_VERSIONS: SnapshotVersions = {
  employees: null,
  vacations: null,
  constraints: null,
  config: null,
};

/**
 * Read-only view over one consistent load of all collections
 */
export class VacationSnapshot {
  readonly dailyLimit: number;
  readonly policy: PolicyConfig;
  readonly versions: SnapshotVersions;
  readonly loadedAt: Date;

  private readonly employeeList: readonly Employee[];
  private readonly employeesByName: ReadonlyMap<string, Employee>;
  private readonly requestList: readonly VacationRequest[];
  private readonly constraintList: readonly ExclusionConstraint[];

  constructor(data: SnapshotData, loadedAt: Date = new Date()) {
    this.employeeList = Object.freeze([...data.employees]);
    this.employeesByName = new Map(data.employees.map((employee) => [employee.name, employee]));
    this.requestList = Object.freeze([...data.requests]);
    this.constraintList = Object.freeze([...data.constraints]);
    this.policy = data.policy;
    this.dailyLimit = data.policy.dailyLimit;
    this.versions = data.versions;
    this.loadedAt = loadedAt;
  }

  /**
   * Build a snapshot from in-memory data; unset versions are null
   */
  static from(data: Omit<SnapshotData, 'versions'> & { readonly versions?: SnapshotVersions }): VacationSnapshot {
    return new VacationSnapshot({ ...data, versions: data.versions ?? NO_VERSIONS });
  }

  employees(): readonly Employee[] {
    return this.employeeList;
  }

  findEmployee(name: string): Employee | undefined {
    return this.employeesByName.get(name);
  }

  requests(): readonly VacationRequest[] {
    return this.requestList;
  }

  requestsFor(employeeName: string): VacationRequest[] {
    return this.requestList.filter((request) => request.employeeName === employeeName);
  }

  findRequest(id: number): VacationRequest | undefined {
    return this.requestList.find((request) => request.id === id);
  }

  /**
   * Names on every approved request covering the day, in stored order
   *
   * One entry per request: an employee holding two overlapping approved
   * requests occupies two slots of the daily limit.
   */
  approvedOn(date: CivilDate): string[] {
    return this.requestList
      .filter(
        (request) =>
          request.status === VacationStatus.Approved &&
          isDateInRange(date, { start: request.startDate, end: request.endDate })
      )
      .map((request) => request.employeeName);
  }

  constraints(): readonly ExclusionConstraint[] {
    return this.constraintList;
  }

  /**
   * Partners the employee may not share a day of approved leave with, in
   * stored constraint order
   */
  constraintsFor(employeeName: string): string[] {
    const partners: string[] = [];

    for (const constraint of this.constraintList) {
      if (constraint.employeeName1 === employeeName) {
        partners.push(constraint.employeeName2);
      } else if (constraint.employeeName2 === employeeName) {
        partners.push(constraint.employeeName1);
      }
    }

    return partners;
  }
}

/**
 * Read all four collections concurrently
 *
 * @throws {StoreTransportError} If the store cannot be reached
 * @throws {RecordFormatError} If any collection is malformed
 */
export async function loadSnapshot(recordStore: RecordStore): Promise<VacationSnapshot> {
  const startTime = Date.now();

  const [employees, vacations, constraints, policy] = await Promise.all([
    recordStore.readEmployees(),
    recordStore.readVacations(),
    recordStore.readConstraints(),
    recordStore.readPolicy(),
  ]);

  const snapshot = new VacationSnapshot({
    employees: employees.rows,
    requests: vacations.rows,
    constraints: constraints.rows,
    policy: policy.policy,
    versions: {
      employees: employees.versionTag,
      vacations: vacations.versionTag,
      constraints: constraints.versionTag,
      config: policy.versionTag,
    },
  });

  console.log('[SNAPSHOT] Snapshot loaded:', {
    employees: employees.rows.length,
    requests: vacations.rows.length,
    constraints: constraints.rows.length,
    dailyLimit: snapshot.dailyLimit,
    executionTimeMs: Date.now() - startTime,
    timestamp: new Date().toISOString(),
  });

  return snapshot;
}

export type SnapshotLoader = () => Promise<VacationSnapshot>;

/**
 * Time-bounded snapshot cache
 *
 * Concurrent callers share a single in-flight load. A load that started
 * before `invalidate()` is handed to its callers but not kept.
 */
export class SnapshotCache {
  private current: VacationSnapshot | null = null;
  private loadedAtMs = 0;
  private inFlight: Promise<VacationSnapshot> | null = null;
  private generation = 0;

  constructor(
    private readonly loader: SnapshotLoader,
    private readonly ttlMs: number,
    private readonly now: () => number = Date.now
  ) {}

  /**
   * Current snapshot, reloading it when absent or older than the TTL
   */
  async get(): Promise<VacationSnapshot> {
    if (this.current && this.now() - this.loadedAtMs < this.ttlMs) {
      return this.current;
    }

    if (this.inFlight) {
      return this.inFlight;
    }

    const generation = this.generation;
    const load = this.loader().then(
      (snapshot) => {
        if (generation === this.generation) {
          this.current = snapshot;
          this.loadedAtMs = this.now();
        }
        return snapshot;
      }
    );

    this.inFlight = load;
    // Cleared on settle so a failed load is retried by the next caller
    const clear = (): void => {
      if (this.inFlight === load) {
        this.inFlight = null;
      }
    };
    void load.then(clear, clear);

    return load;
  }

  /**
   * Drop the cached snapshot; the next `get()` reloads
   */
  invalidate(): void {
    this.generation += 1;
    this.current = null;
    this.inFlight = null;
    console.log('[SNAPSHOT] Cache invalidated:', { timestamp: new Date().toISOString() });
  }
}

/**
 * Cache backed by the given record store with the configured freshness window
 */
export function createSnapshotCache(
  recordStore: RecordStore = new RecordStore(),
  ttlMs: number = getStoreConfig().snapshotTtlMs
): SnapshotCache {
  return new SnapshotCache(() => loadSnapshot(recordStore), ttlMs);
}
