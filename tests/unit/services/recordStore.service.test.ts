import { describe, it, expect, beforeEach } from 'vitest';

import {
  RecordStore,
  constraintCodec,
  decodeCollection,
  decodePolicy,
  employeeCodec,
  encodeCollection,
  encodePolicy,
  vacationCodec,
} from '../../../src/services/recordStore.service.js';
import { LeaveType, VacationStatus, type VacationRequest } from '../../../src/types/vacation.js';
import { RecordFormatError } from '../../../src/utils/errors.js';
import { MemoryDocumentStore, TEST_PATHS } from '../../helpers/memoryDocumentStore.js';

const VACATION_HEADER = 'employee_name,start_date,end_date,leave_type,status,request_date';

describe('Record codecs', () => {
  describe('employees', () => {
    it('should decode names and allocations', () => {
      expect(decodeCollection('employee_name,total_leave_days\nKim, 15\nLee,12.5\n', employeeCodec)).toEqual([
        { name: 'Kim', totalLeaveDays: 15 },
        { name: 'Lee', totalLeaveDays: 12.5 },
      ]);
    });

    it('should reject a negative allocation', () => {
      expect(() => decodeCollection('employee_name,total_leave_days\nKim,-1\n', employeeCodec)).toThrow(
        'employees row 1: total_leave_days "-1" is not a non-negative number'
      );
    });

    it('should reject a missing name', () => {
      expect(() => decodeCollection('employee_name,total_leave_days\n ,15\n', employeeCodec)).toThrow(
        'employees row 1: employee_name is empty'
      );
    });

    it('should reject a file without the required columns', () => {
      expect(() => decodeCollection('name,days\nKim,15\n', employeeCodec)).toThrow(
        'employees is missing columns: employee_name, total_leave_days'
      );
    });

    it('should read an empty file as no rows', () => {
      expect(decodeCollection('', employeeCodec)).toEqual([]);
    });
  });

  describe('vacations', () => {
    it('should use the row position as id', () => {
      const rows = decodeCollection(
        `${VACATION_HEADER}\nKim,2024-02-01,2024-02-03,연차,승인,2024-01-20\nLee,2024-02-05,2024-02-05,병가,대기,\n`,
        vacationCodec
      );

      expect(rows).toEqual([
        {
          id: 0,
          employeeName: 'Kim',
          startDate: '2024-02-01',
          endDate: '2024-02-03',
          leaveType: LeaveType.FullDay,
          status: VacationStatus.Approved,
          requestDate: '2024-01-20',
        },
        {
          id: 1,
          employeeName: 'Lee',
          startDate: '2024-02-05',
          endDate: '2024-02-05',
          leaveType: LeaveType.Sick,
          status: VacationStatus.Pending,
          requestDate: null,
        },
      ]);
    });

    it('should accept files written before request_date existed', () => {
      const rows = decodeCollection(
        'employee_name,start_date,end_date,leave_type,status\nKim,2024-02-01,2024-02-01,반차,반려\n',
        vacationCodec
      );

      expect(rows[0]?.requestDate).toBeNull();
      expect(rows[0]?.status).toBe(VacationStatus.Rejected);
    });

    it('should reject an unknown status', () => {
      expect(() =>
        decodeCollection(`${VACATION_HEADER}\nKim,2024-02-01,2024-02-01,연차,done,\n`, vacationCodec)
      ).toThrow('vacations row 1: unknown status "done"');
    });

    it('should reject an unknown leave type', () => {
      expect(() =>
        decodeCollection(`${VACATION_HEADER}\nKim,2024-02-01,2024-02-01,holiday,대기,\n`, vacationCodec)
      ).toThrow('vacations row 1: unknown leave_type "holiday"');
    });

    it('should reject an impossible date', () => {
      expect(() =>
        decodeCollection(`${VACATION_HEADER}\nKim,2024-02-30,2024-03-01,연차,대기,\n`, vacationCodec)
      ).toThrow('vacations row 1: start_date "2024-02-30" is not a YYYY-MM-DD date');
    });

    it('should reject a reversed range', () => {
      expect(() =>
        decodeCollection(`${VACATION_HEADER}\nKim,2024-02-03,2024-02-01,연차,대기,\n`, vacationCodec)
      ).toThrow('vacations row 1: start_date 2024-02-03 is after end_date 2024-02-01');
    });

    it('should write every column in fixed order', () => {
      const request: VacationRequest = {
        id: 0,
        employeeName: 'Kim',
        startDate: '2024-02-01',
        endDate: '2024-02-03',
        leaveType: LeaveType.FullDay,
        status: VacationStatus.Pending,
        requestDate: null,
      };

      expect(encodeCollection([request], vacationCodec)).toBe(
        `${VACATION_HEADER}\nKim,2024-02-01,2024-02-03,연차,대기,\n`
      );
    });
  });

  describe('constraints', () => {
    it('should reject a pair of the same employee', () => {
      expect(() => decodeCollection('employee_name_1,employee_name_2\nKim,Kim\n', constraintCodec)).toThrow(
        'constraints row 1: constraint pairs Kim with themself'
      );
    });
  });

  describe('policy', () => {
    it('should default the daily limit', () => {
      expect(decodePolicy('{}')).toEqual({ dailyLimit: 5, settings: {} });
    });

    it('should keep unknown fields through a rewrite', () => {
      const policy = decodePolicy('{"daily_limit": 3, "team": "ops"}');

      expect(policy.dailyLimit).toBe(3);
      expect(encodePolicy({ ...policy, dailyLimit: 4 })).toBe('{\n  "daily_limit": 4,\n  "team": "ops"\n}');
    });

    it('should reject a non-positive daily limit', () => {
      expect(() => decodePolicy('{"daily_limit": 0}')).toThrow('config daily_limit 0 is not a positive integer');
      expect(() => decodePolicy('{"daily_limit": "5"}')).toThrow(RecordFormatError);
    });

    it('should reject content that is not a JSON object', () => {
      expect(() => decodePolicy('[5]')).toThrow('config must be a JSON object');
      expect(() => decodePolicy('daily_limit=5')).toThrow('config is not valid JSON');
    });
  });
});

describe('RecordStore', () => {
  let documentStore: MemoryDocumentStore;
  let recordStore: RecordStore;

  beforeEach(() => {
    documentStore = new MemoryDocumentStore();
    recordStore = new RecordStore(documentStore, TEST_PATHS);
  });

  it('should read a missing collection as empty and unversioned', async () => {
    expect(await recordStore.readVacations()).toEqual({ rows: [], versionTag: null });
    expect(await recordStore.readPolicy()).toEqual({
      policy: { dailyLimit: 5, settings: {} },
      versionTag: null,
    });
  });

  it('should return rows with their version tag', async () => {
    const tag = documentStore.seed(TEST_PATHS.employees, 'employee_name,total_leave_days\nKim,15\n');

    expect(await recordStore.readEmployees()).toEqual({
      rows: [{ name: 'Kim', totalLeaveDays: 15 }],
      versionTag: tag,
    });
  });

  it('should reject duplicate employee names', async () => {
    documentStore.seed(TEST_PATHS.employees, 'employee_name,total_leave_days\nKim,15\nKim,10\n');

    await expect(recordStore.readEmployees()).rejects.toThrow('employees row 2: duplicate employee_name "Kim"');
  });

  it('should drop duplicate constraint pairs in either order', async () => {
    documentStore.seed(TEST_PATHS.constraints, 'employee_name_1,employee_name_2\nKim,Lee\nLee,Kim\nKim,Park\n');

    const result = await recordStore.readConstraints();

    expect(result.rows).toEqual([
      { employeeName1: 'Kim', employeeName2: 'Lee' },
      { employeeName1: 'Kim', employeeName2: 'Park' },
    ]);
  });

  it('should create a collection when no version tag is given', async () => {
    const result = await recordStore.writeEmployees([{ name: 'Kim', totalLeaveDays: 15 }], null, 'Add employee Kim');

    expect(result).toEqual({ status: 'success', versionTag: 'v1' });
    expect(documentStore.content(TEST_PATHS.employees)).toBe('employee_name,total_leave_days\nKim,15\n');
    expect(documentStore.writes).toEqual([{ path: TEST_PATHS.employees, message: 'Add employee Kim', created: true }]);
  });

  it('should leave the collection unchanged when the version tag is stale', async () => {
    const original = 'employee_name,start_date,end_date,leave_type,status,request_date\n';
    const staleTag = documentStore.seed(TEST_PATHS.vacations, original);
    documentStore.seed(TEST_PATHS.vacations, original);

    const result = await recordStore.writeVacations([], staleTag, 'Vacation request by Kim');

    expect(result.status).toBe('conflict');
    expect(documentStore.content(TEST_PATHS.vacations)).toBe(original);
    expect(documentStore.writes).toEqual([]);
  });

  it('should report an unreachable store as a transport error', async () => {
    documentStore.offline = true;

    const result = await recordStore.writePolicy({ dailyLimit: 3, settings: {} }, 'v1', 'Update daily limit to 3');

    expect(result).toEqual({ status: 'transport_error', message: 'Failed to reach store for data/config.json' });
  });

  it('should write the policy with unknown fields kept', async () => {
    const tag = documentStore.seed(TEST_PATHS.config, '{"daily_limit": 5, "note": "x"}');
    const current = await recordStore.readPolicy();

    await recordStore.writePolicy({ ...current.policy, dailyLimit: 2 }, tag, 'Update daily limit to 2');

    expect(documentStore.content(TEST_PATHS.config)).toBe('{\n  "daily_limit": 2,\n  "note": "x"\n}');
  });
});
