/**
 * CSV codec for the tabular collections
 *
 * Comma separated, first line is the header, RFC 4180 quoting. Reads accept
 * LF or CRLF line endings and an optional byte-order mark; writes always use
 * LF and end with a newline.
 *
 * @module utils/csv
 */

import { RecordFormatError } from './errors.js';

/**
 * A data row keyed by header name
 */
export type CsvRow = Readonly<Record<string, string>>;

/**
 * Parsed CSV document
 */
export interface ParsedCsv {
  readonly header: readonly string[];
  readonly rows: readonly CsvRow[];
}

function splitRecords(source: string): string[][] {
  const records: string[][] = [];
  let record: string[] = [];
  let field = '';
  let inQuotes = false;
  let line = 1;

  for (let i = 0; i < source.length; i++) {
    const char = source.charAt(i);

    if (inQuotes) {
      if (char === '"') {
        if (source.charAt(i + 1) === '"') {
          field += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        if (char === '\n') {
          line++;
        }
        field += char;
      }
      continue;
    }

    switch (char) {
      case '"':
        if (field.length > 0) {
          throw new RecordFormatError(`Unexpected quote inside unquoted field on line ${line}`, {
            details: { line },
          });
        }
        inQuotes = true;
        break;
      case ',':
        record.push(field);
        field = '';
        break;
      case '\r':
        // CRLF is handled by the LF branch; a lone CR is ignored
        break;
      case '\n':
        record.push(field);
        records.push(record);
        record = [];
        field = '';
        line++;
        break;
      default:
        field += char;
    }
  }

  if (inQuotes) {
    throw new RecordFormatError(`Unterminated quoted field on line ${line}`, { details: { line } });
  }

  if (field.length > 0 || record.length > 0) {
    record.push(field);
    records.push(record);
  }

  // Blank lines carry no record
  return records.filter((fields) => !(fields.length === 1 && fields[0] === ''));
}

/**
 * Parse CSV text into header and rows
 *
 * @throws {RecordFormatError} On unbalanced quotes, duplicate header names,
 *   or rows whose field count differs from the header's
 */
export function parseCsv(text: string): ParsedCsv {
  const source = text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
  const records = splitRecords(source);

  const [headerRecord, ...dataRecords] = records;
  if (!headerRecord) {
    return { header: [], rows: [] };
  }

  const header = headerRecord.map((name) => name.trim());
  if (new Set(header).size !== header.length) {
    throw new RecordFormatError('Duplicate column names in CSV header', { details: { header } });
  }

  const rows = dataRecords.map((fields, index) => {
    if (fields.length !== header.length) {
      throw new RecordFormatError(
        `Row ${index + 1} has ${fields.length} fields, expected ${header.length}`,
        { details: { row: index + 1 } }
      );
    }

    const row: Record<string, string> = {};
    header.forEach((name, column) => {
      row[name] = fields[column] ?? '';
    });
    return row;
  });

  return { header, rows };
}

function escapeField(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/**
 * Serialize a header and rows to CSV text
 *
 * @example
 * stringifyCsv(['name', 'days'], [['Kim, J', '15']]);
 * // 'name,days\n"Kim, J",15\n'
 */
export function stringifyCsv(header: readonly string[], rows: readonly (readonly string[])[]): string {
  const lines = [header, ...rows].map((fields) => fields.map(escapeField).join(','));
  return `${lines.join('\n')}\n`;
}
