import { describe, expect, it } from 'vitest';
import { FAILED_BEAD, FAILED_STANDARDS, MISSING, formatCell, numeric, parseReading } from './cell.js';

describe('parseReading', () => {
  it('parses finite numbers', () => {
    expect(parseReading(' 1010 ')).toEqual(numeric(1010));
    expect(parseReading('-2.5')).toEqual(numeric(-2.5));
    expect(parseReading('1e3')).toEqual(numeric(1000));
  });

  it.each(['', 'NA', 'NaN', 'n/a', 'NULL', 'None', '#DIV/0!', 'abc', 'Infinity'])('treats %j as missing', (raw) => {
    expect(parseReading(raw)).toEqual(MISSING);
  });
});

describe('formatCell', () => {
  it('renders values and sentinels', () => {
    expect(formatCell(numeric(0.5))).toBe('0.5');
    expect(formatCell(MISSING)).toBe('');
    expect(formatCell(FAILED_BEAD)).toBe('Failed QC (bead)');
    expect(formatCell(FAILED_STANDARDS)).toBe('Failed QC (standards)');
  });
});
