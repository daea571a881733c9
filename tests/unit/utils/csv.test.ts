import { describe, it, expect } from 'vitest';

import { parseCsv, stringifyCsv } from '../../../src/utils/csv.js';
import { RecordFormatError } from '../../../src/utils/errors.js';

describe('CSV codec', () => {
  describe('parseCsv', () => {
    it('should key rows by header name', () => {
      const result = parseCsv('employee_name,total_leave_days\nKim,15\nLee,12\n');

      expect(result.header).toEqual(['employee_name', 'total_leave_days']);
      expect(result.rows).toEqual([
        { employee_name: 'Kim', total_leave_days: '15' },
        { employee_name: 'Lee', total_leave_days: '12' },
      ]);
    });

    it('should accept CRLF line endings and a byte-order mark', () => {
      const result = parseCsv('\uFEFFa,b\r\n1,2\r\n');

      expect(result.header).toEqual(['a', 'b']);
      expect(result.rows).toEqual([{ a: '1', b: '2' }]);
    });

    it('should read a last line without a trailing newline', () => {
      expect(parseCsv('a,b\n1,2').rows).toEqual([{ a: '1', b: '2' }]);
    });

    it('should unquote fields with commas, quotes and newlines', () => {
      const result = parseCsv('name,note\n"Kim, J","say ""hi""\nbye"\n');

      expect(result.rows).toEqual([{ name: 'Kim, J', note: 'say "hi"\nbye' }]);
    });

    it('should skip blank lines', () => {
      expect(parseCsv('a\n1\n\n2\n\n').rows).toEqual([{ a: '1' }, { a: '2' }]);
    });

    it('should return an empty document for empty text', () => {
      expect(parseCsv('')).toEqual({ header: [], rows: [] });
    });

    it('should reject rows with the wrong field count', () => {
      expect(() => parseCsv('a,b\n1\n')).toThrow('Row 1 has 1 fields, expected 2');
    });

    it('should reject duplicate header names', () => {
      expect(() => parseCsv('a,a\n1,2\n')).toThrow(RecordFormatError);
    });

    it('should reject an unterminated quote', () => {
      expect(() => parseCsv('a\n"open\n')).toThrow('Unterminated quoted field on line 3');
    });

    it('should reject a quote inside an unquoted field', () => {
      expect(() => parseCsv('a\nab"c\n')).toThrow('Unexpected quote inside unquoted field on line 2');
    });
  });

  describe('stringifyCsv', () => {
    it('should write LF lines with a trailing newline', () => {
      expect(stringifyCsv(['a', 'b'], [['1', '2']])).toBe('a,b\n1,2\n');
    });

    it('should quote fields that need it', () => {
      expect(stringifyCsv(['name', 'note'], [['Kim, J', 'say "hi"']])).toBe('name,note\n"Kim, J","say ""hi"""\n');
    });

    it('should write a header-only document for no rows', () => {
      expect(stringifyCsv(['a', 'b'], [])).toBe('a,b\n');
    });

    it('should read back what it writes', () => {
      const text = stringifyCsv(['name', 'note'], [['Kim, J', 'line1\nline2']]);
      expect(parseCsv(text).rows).toEqual([{ name: 'Kim, J', note: 'line1\nline2' }]);
    });
  });
});
