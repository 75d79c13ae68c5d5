import { describe, expect, it } from 'vitest';
import { SourceReadError } from '../generation/errors.js';
import { parseCsvTable, splitCsvLine } from './csvTable.js';

describe('splitCsvLine', () => {
  it('splits and trims plain cells', () => {
    expect(splitCsvLine('a, b ,c', 1)).toEqual(['a', 'b', 'c']);
  });

  it('keeps commas and escaped quotes inside quoted cells', () => {
    expect(splitCsvLine('"A1, left","say ""hi""",3', 1)).toEqual(['A1, left', 'say "hi"', '3']);
  });

  it('keeps empty trailing cells', () => {
    expect(splitCsvLine('1,2,', 1)).toEqual(['1', '2', '']);
  });

  it('rejects an unterminated quote', () => {
    expect(() => splitCsvLine('"A1,2', 4)).toThrow('Unterminated quoted cell on line 4');
  });
});

describe('parseCsvTable', () => {
  it('reads the header and numbered data rows', () => {
    const table = parseCsvTable('x,y\n1,2\n\n3,4\n');
    expect(table.header).toEqual(['x', 'y']);
    expect(table.rows).toEqual([
      { line: 2, cells: ['1', '2'] },
      { line: 4, cells: ['3', '4'] },
    ]);
  });

  it('strips a byte order mark and handles CRLF', () => {
    const table = parseCsvTable('\uFEFFx,y\r\n1,2\r\n');
    expect(table.header).toEqual(['x', 'y']);
    expect(table.rows).toEqual([{ line: 2, cells: ['1', '2'] }]);
  });

  it('accepts a header with no data rows', () => {
    expect(parseCsvTable('x,y\n')).toEqual({ header: ['x', 'y'], rows: [] });
  });

  it('rejects rows with the wrong number of cells', () => {
    expect(() => parseCsvTable('x,y\n1,2,3\n')).toThrow('Line 2 has 3 cells, header has 2');
  });

  it('rejects empty text', () => {
    expect(() => parseCsvTable('\n  \n')).toThrow(SourceReadError);
    expect(() => parseCsvTable('')).toThrow('CSV header missing');
  });
});
