/**
 * CSV Reading and Writing
 *
 * A small RFC 4180 reader and writer for vocabulary files:
 * - quoted fields may contain separators, line breaks and doubled quotes
 * - records end at CRLF, LF or a lone CR
 * - a quote inside an unquoted field is kept as a literal character
 *
 * Uploaded files may use `,`, `;` or tab as the separator; `detectDelimiter`
 * picks the one that gives the most rows a consistent column count.
 */

import { ValidationError } from '../errors';

export type Delimiter = ',' | ';' | '\t';

/** One parsed record with the 1-based line it starts on. */
export interface CsvRecord {
  line: number;
  fields: string[];
}

const BOM = '\uFEFF';
const CANDIDATES: readonly Delimiter[] = [',', ';', '\t'];
const SAMPLE_RECORDS = 20;

export function stripBom(text: string): string {
  return text.startsWith(BOM) ? text.slice(BOM.length) : text;
}

/**
 * Splits CSV text into records.
 *
 * @throws {ValidationError} If a quoted field is never closed
 *
 * @example
 * ```typescript
 * parseCsv('a,"b ""c"""\r\nd,e', ',');
 * // [{ line: 1, fields: ['a', 'b "c"'] }, { line: 2, fields: ['d', 'e'] }]
 * ```
 */
export function parseCsv(text: string, delimiter: Delimiter): CsvRecord[] {
  const records: CsvRecord[] = [];
  let fields: string[] = [];
  let field = '';
  let inQuotes = false;
  let atFieldStart = true;
  let line = 1;
  let recordLine = 1;
  let i = 0;

  const endField = (): void => {
    fields.push(field);
    field = '';
    atFieldStart = true;
  };
  const endRecord = (): void => {
    endField();
    records.push({ line: recordLine, fields });
    fields = [];
  };

  while (i < text.length) {
    const char = text[i];

    if (inQuotes) {
      if (char === '"') {
        if (text[i + 1] === '"') {
          field += '"';
          i += 2;
          continue;
        }
        inQuotes = false;
        i++;
        continue;
      }
      if (char === '\n' || (char === '\r' && text[i + 1] !== '\n')) {
        line++;
      }
      field += char;
      i++;
      continue;
    }

    if (char === '"' && atFieldStart) {
      inQuotes = true;
      atFieldStart = false;
      i++;
      continue;
    }

    if (char === delimiter) {
      endField();
      i++;
      continue;
    }

    if (char === '\r' || char === '\n') {
      endRecord();
      i += char === '\r' && text[i + 1] === '\n' ? 2 : 1;
      line++;
      recordLine = line;
      continue;
    }

    field += char;
    atFieldStart = false;
    i++;
  }

  if (inQuotes) {
    throw new ValidationError(`Unclosed quote in the record starting on line ${recordLine}`);
  }
  if (field.length > 0 || fields.length > 0) {
    endRecord();
  }
  return records;
}

export function isBlankRecord(fields: readonly string[]): boolean {
  return fields.every((value) => value.trim() === '');
}

/**
 * Picks the separator under which the most of the first 20 non-blank
 * records share one column count of two or more. Ties keep the earlier
 * candidate (`,` then `;` then tab); comma is the fallback.
 */
export function detectDelimiter(text: string): Delimiter {
  let best: Delimiter = ',';
  let bestScore = 0;

  for (const candidate of CANDIDATES) {
    let records: CsvRecord[];
    try {
      records = parseCsv(text, candidate);
    } catch (error) {
      if (error instanceof ValidationError) {
        continue;
      }
      throw error;
    }

    const counts = new Map<number, number>();
    for (const record of records.filter((r) => !isBlankRecord(r.fields)).slice(0, SAMPLE_RECORDS)) {
      if (record.fields.length >= 2) {
        counts.set(record.fields.length, (counts.get(record.fields.length) ?? 0) + 1);
      }
    }

    const score = Math.max(0, ...counts.values());
    if (score > bestScore) {
      best = candidate;
      bestScore = score;
    }
  }

  return best;
}

function escapeCell(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

/**
 * Serializes rows as comma-separated CSV with CRLF line endings, prefixed
 * with a UTF-8 byte order mark.
 */
export function writeCsv(rows: readonly (readonly string[])[]): string {
  return BOM + rows.map((row) => row.map(escapeCell).join(',') + '\r\n').join('');
}
