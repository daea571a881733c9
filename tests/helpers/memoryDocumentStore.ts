/**
 * In-memory document store for tests
 *
 * Behaves like the GitHub store: every write produces a new version tag,
 * a stale tag or a create over an existing file raises StoreConflictError.
 */

import type { DocumentStore, ReadFileResult, WriteFileSuccess } from '../../src/types/store.js';
import { StoreConflictError, StoreTransportError } from '../../src/utils/errors.js';

interface StoredFile {
  readonly content: string;
  readonly versionTag: string;
}

export interface RecordedWrite {
  readonly path: string;
  readonly message: string;
  readonly created: boolean;
}

export const TEST_PATHS = {
  employees: 'data/employees.csv',
  vacations: 'data/vacations.csv',
  constraints: 'data/constraints.csv',
  config: 'data/config.json',
} as const;

export class MemoryDocumentStore implements DocumentStore {
  private readonly files = new Map<string, StoredFile>();
  private counter = 0;

  readonly writes: RecordedWrite[] = [];
  reads = 0;

  /**
   * When set, every call fails as if the store were unreachable
   */
  offline = false;

  seed(path: string, content: string): string {
    const versionTag = this.nextTag();
    this.files.set(path, { content, versionTag });
    return versionTag;
  }

  content(path: string): string | undefined {
    return this.files.get(path)?.content;
  }

  versionOf(path: string): string | undefined {
    return this.files.get(path)?.versionTag;
  }

  async readFile(path: string): Promise<ReadFileResult> {
    this.ensureOnline(path);
    this.reads += 1;

    const file = this.files.get(path);
    return file ? { found: true, content: file.content, versionTag: file.versionTag } : { found: false };
  }

  async writeFile(path: string, content: string, versionTag: string, message: string): Promise<WriteFileSuccess> {
    this.ensureOnline(path);

    const file = this.files.get(path);
    if (!file || file.versionTag !== versionTag) {
      throw new StoreConflictError(`${path} was modified since version ${versionTag} was read`);
    }

    return this.store(path, content, message, false);
  }

  async createFile(path: string, content: string, message: string): Promise<WriteFileSuccess> {
    this.ensureOnline(path);

    if (this.files.has(path)) {
      throw new StoreConflictError(`${path} already exists`);
    }

    return this.store(path, content, message, true);
  }

  private store(path: string, content: string, message: string, created: boolean): WriteFileSuccess {
    const versionTag = this.nextTag();
    this.files.set(path, { content, versionTag });
    this.writes.push({ path, message, created });
    return { versionTag };
  }

  private ensureOnline(path: string): void {
    if (this.offline) {
      throw new StoreTransportError(`Failed to reach store for ${path}`);
    }
  }

  private nextTag(): string {
    this.counter += 1;
    return `v${this.counter}`;
  }
}

/**
 * Standard data set used across service and API tests
 *
 * Kim and Lee may not be away together. Kim has an approved full-day
 * request 2024-02-01..03 and a pending one; Park has an approved half day.
 */
export function seedOffice(store: MemoryDocumentStore): void {
  store.seed(TEST_PATHS.employees, 'employee_name,total_leave_days\nKim,15\nLee,15\nPark,10\n');
  store.seed(
    TEST_PATHS.vacations,
    [
      'employee_name,start_date,end_date,leave_type,status,request_date',
      'Kim,2024-02-01,2024-02-03,연차,승인,2024-01-20',
      'Park,2024-02-02,2024-02-02,반차,승인,2024-01-21',
      'Kim,2024-03-04,2024-03-05,연차,대기,2024-02-25',
      '',
    ].join('\n')
  );
  store.seed(TEST_PATHS.constraints, 'employee_name_1,employee_name_2\nKim,Lee\n');
  store.seed(TEST_PATHS.config, '{\n  "daily_limit": 2\n}');
}
