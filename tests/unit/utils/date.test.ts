import { describe, it, expect } from 'vitest';

import {
  calculateDaysBetween,
  compareCivilDates,
  eachCivilDay,
  formatCivilDate,
  isCivilDate,
  isDateInRange,
  parseCivilDate,
} from '../../../src/utils/date.js';

describe('Date Utility Functions', () => {
  describe('parseCivilDate', () => {
    it('should parse a valid date to local midnight', () => {
      const result = parseCivilDate('2024-02-29');
      expect(result).not.toBeNull();
      expect(result?.getFullYear()).toBe(2024);
      expect(result?.getMonth()).toBe(1);
      expect(result?.getDate()).toBe(29);
      expect(result?.getHours()).toBe(0);
    });

    it('should reject days that do not exist', () => {
      expect(parseCivilDate('2023-02-29')).toBeNull();
      expect(parseCivilDate('2024-04-31')).toBeNull();
      expect(parseCivilDate('2024-13-01')).toBeNull();
    });

    it('should reject other formats', () => {
      expect(parseCivilDate('2024-2-1')).toBeNull();
      expect(parseCivilDate('2024/02/01')).toBeNull();
      expect(parseCivilDate('2024-02-01T00:00:00Z')).toBeNull();
      expect(parseCivilDate('')).toBeNull();
    });
  });

  describe('isCivilDate', () => {
    it('should accept only valid date strings', () => {
      expect(isCivilDate('2024-01-15')).toBe(true);
      expect(isCivilDate('2024-01-32')).toBe(false);
      expect(isCivilDate(20240115)).toBe(false);
      expect(isCivilDate(null)).toBe(false);
    });
  });

  describe('formatCivilDate', () => {
    it('should format the local calendar day', () => {
      expect(formatCivilDate(new Date(2024, 0, 5, 23, 59))).toBe('2024-01-05');
    });

    it('should throw for an invalid date', () => {
      expect(() => formatCivilDate(new Date('invalid'))).toThrow('Invalid date provided');
    });
  });

  describe('eachCivilDay', () => {
    it('should enumerate an inclusive range across a leap day', () => {
      expect(eachCivilDay('2024-02-28', '2024-03-01')).toEqual(['2024-02-28', '2024-02-29', '2024-03-01']);
    });

    it('should return a single day for a one-day range', () => {
      expect(eachCivilDay('2024-01-10', '2024-01-10')).toEqual(['2024-01-10']);
    });

    it('should cross year boundaries', () => {
      expect(eachCivilDay('2023-12-31', '2024-01-01')).toEqual(['2023-12-31', '2024-01-01']);
    });

    it('should throw when start is after end', () => {
      expect(() => eachCivilDay('2024-01-11', '2024-01-10')).toThrow(
        'Start date 2024-01-11 is after end date 2024-01-10'
      );
    });

    it('should throw for an invalid date', () => {
      expect(() => eachCivilDay('2024-02-30', '2024-03-01')).toThrow('Invalid start date provided: 2024-02-30');
    });
  });

  describe('calculateDaysBetween', () => {
    it('should return 1 for same day', () => {
      expect(calculateDaysBetween('2024-01-15', '2024-01-15')).toBe(1);
    });

    it('should count both ends', () => {
      expect(calculateDaysBetween('2024-02-01', '2024-02-03')).toBe(3);
    });

    it('should handle leap and non-leap years', () => {
      expect(calculateDaysBetween('2024-02-28', '2024-03-01')).toBe(3);
      expect(calculateDaysBetween('2023-02-28', '2023-03-01')).toBe(2);
    });

    it('should handle a full year', () => {
      expect(calculateDaysBetween('2024-01-01', '2024-12-31')).toBe(366);
    });
  });

  describe('isDateInRange', () => {
    const range = { start: '2024-01-10', end: '2024-01-12' };

    it('should include both ends', () => {
      expect(isDateInRange('2024-01-10', range)).toBe(true);
      expect(isDateInRange('2024-01-12', range)).toBe(true);
    });

    it('should exclude days outside', () => {
      expect(isDateInRange('2024-01-09', range)).toBe(false);
      expect(isDateInRange('2024-01-13', range)).toBe(false);
    });
  });

  describe('compareCivilDates', () => {
    it('should sort ascending', () => {
      expect(['2024-03-01', '2023-12-31', '2024-01-15'].sort(compareCivilDates)).toEqual([
        '2023-12-31',
        '2024-01-15',
        '2024-03-01',
      ]);
    });
  });
});
