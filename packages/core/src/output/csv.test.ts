import { describe, it, expect } from 'vitest';
import { csvEscape, formatCsvRow, parseCsv, serializeValue } from './csv.js';

describe('csvEscape', () => {
  it('should leave plain values untouched', () => {
    expect(csvEscape('World War I')).toBe('World War I');
  });

  it('should quote values with separators and double embedded quotes', () => {
    expect(csvEscape('Apple Inc., Google')).toBe('"Apple Inc., Google"');
    expect(csvEscape('the "Great" War')).toBe('"the ""Great"" War"');
    expect(csvEscape('line\nbreak')).toBe('"line\nbreak"');
  });
});

describe('serializeValue', () => {
  it('should serialize each value kind', () => {
    expect(serializeValue(3)).toBe('3');
    expect(serializeValue(0.95)).toBe('0.95');
    expect(serializeValue(false)).toBe('false');
    expect(serializeValue(['World War I', 'Europe'])).toBe('["World War I","Europe"]');
    expect(serializeValue(null)).toBe('');
    expect(serializeValue(undefined)).toBe('');
  });
});

describe('formatCsvRow', () => {
  it('should follow the header order and escape list columns', () => {
    const row = formatCsvRow(['id', 'entities', 'missing'], {
      entities: ['World War I', 'World War II'],
      id: 'evt_1',
    });

    expect(row).toBe('evt_1,"[""World War I"",""World War II""]",');
  });
});

describe('parseCsv', () => {
  it('should read quoted fields, escaped quotes and CRLF endings', () => {
    const rows = parseCsv('id,question\r\n1,"Which came first, A or B?"\r\n2,"say ""hi"""\r\n');

    expect(rows).toEqual([
      ['id', 'question'],
      ['1', 'Which came first, A or B?'],
      ['2', 'say "hi"'],
    ]);
  });

  it('should keep a final row without a trailing newline', () => {
    expect(parseCsv('a,b\n1,')).toEqual([
      ['a', 'b'],
      ['1', ''],
    ]);
  });

  it('should read back what formatCsvRow writes', () => {
    const line = formatCsvRow(['q', 'list'], { q: 'He said "no", twice', list: ['x,y'] });

    expect(parseCsv(line)).toEqual([['He said "no", twice', '["x,y"]']]);
  });
});
