import { describe, it, expect } from 'vitest';
import { ValidationError } from '../errors';
import { detectDelimiter, isBlankRecord, parseCsv, stripBom, writeCsv } from './csv';

describe('parseCsv', () => {
  it('reads quoted fields with doubled quotes', () => {
    expect(parseCsv('a,"b ""c"""\r\nd,e', ',')).toEqual([
      { line: 1, fields: ['a', 'b "c"'] },
      { line: 2, fields: ['d', 'e'] },
    ]);
  });

  it('keeps line breaks inside quotes and tracks source lines', () => {
    expect(parseCsv('x,"one\ntwo"\ny,z', ',')).toEqual([
      { line: 1, fields: ['x', 'one\ntwo'] },
      { line: 3, fields: ['y', 'z'] },
    ]);
  });

  it('does not produce a record for a trailing newline', () => {
    expect(parseCsv('a,b\n', ',')).toEqual([{ line: 1, fields: ['a', 'b'] }]);
  });

  it('reports blank lines as blank records', () => {
    const records = parseCsv('a,b\n\nc,d', ',');
    expect(records).toEqual([
      { line: 1, fields: ['a', 'b'] },
      { line: 2, fields: [''] },
      { line: 3, fields: ['c', 'd'] },
    ]);
    expect(records.map((record) => isBlankRecord(record.fields))).toEqual([false, true, false]);
  });

  it('splits on the given delimiter only', () => {
    expect(parseCsv('Hund;dog,noun', ';')).toEqual([{ line: 1, fields: ['Hund', 'dog,noun'] }]);
  });

  it('rejects an unclosed quote', () => {
    expect(() => parseCsv('a,"b\nc', ',')).toThrow(ValidationError);
    expect(() => parseCsv('a,"b\nc', ',')).toThrow(
      'Unclosed quote in the record starting on line 1'
    );
  });
});

describe('detectDelimiter', () => {
  it('picks the separator with the most consistent column count', () => {
    expect(detectDelimiter('a;b\nc;d\ne,f;g')).toBe(';');
    expect(detectDelimiter('front\tback\nHund\tdog')).toBe('\t');
  });

  it('prefers comma on a tie and as a fallback', () => {
    expect(detectDelimiter('a,b;c')).toBe(',');
    expect(detectDelimiter('single')).toBe(',');
  });
});

describe('stripBom', () => {
  it('removes a leading byte order mark only', () => {
    expect(stripBom('\uFEFFa,b')).toBe('a,b');
    expect(stripBom('a,b')).toBe('a,b');
  });
});

describe('writeCsv', () => {
  it('writes a BOM, CRLF line endings and quotes where needed', () => {
    expect(
      writeCsv([
        ['Hund', 'dog'],
        ['say "hi"', 'a, b'],
      ])
    ).toBe('\uFEFFHund,dog\r\n"say ""hi""","a, b"\r\n');
  });

  it('reads back through parseCsv', () => {
    const rows = [
      ['line\nbreak', 'x'],
      ['plain', 'quote "q"'],
    ];
    const parsed = parseCsv(stripBom(writeCsv(rows)), ',');
    expect(parsed.map((record) => record.fields)).toEqual(rows);
  });
});
