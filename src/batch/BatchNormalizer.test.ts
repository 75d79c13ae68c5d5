import { describe, expect, it } from 'vitest';
import { SchemaError, SourceReadError } from '../generation/errors.js';
import { batchToRows, normalizeCsv, normalizeTable } from './BatchNormalizer.js';

describe('BatchNormalizer', () => {
  describe('normalizeTable', () => {
    it('normalizes row records in order', () => {
      const batch = normalizeTable([
        { colorA: 10, colorB: 20, colorC: 30, DispensePos: 'A1' },
        { colorA: 5.5, colorB: 0, colorC: 1, DispensePos: 'B2' },
      ]);
      expect(batch).toEqual({
        colorA: [10, 5.5],
        colorB: [20, 0],
        colorC: [30, 1],
        dispensePosition: ['A1', 'B2'],
      });
    });

    it('normalizes a column map and ignores extra columns', () => {
      const batch = normalizeTable({
        colorA: [1, 2],
        colorB: [3, 4],
        colorC: [5, 6],
        DispensePos: ['C3', 'D4'],
        predicted: [0.1, 0.2],
      });
      expect(batch.colorA).toEqual([1, 2]);
      expect(batch.dispensePosition).toEqual(['C3', 'D4']);
      expect(Object.keys(batch)).toEqual(['colorA', 'colorB', 'colorC', 'dispensePosition']);
    });

    it('returns an empty batch for an empty table', () => {
      expect(normalizeTable([])).toEqual({ colorA: [], colorB: [], colorC: [], dispensePosition: [] });
    });

    it('freezes the batch and its sequences', () => {
      const batch = normalizeTable([{ colorA: 1, colorB: 2, colorC: 3, DispensePos: 'A1' }]);
      expect(Object.isFrozen(batch)).toBe(true);
      expect(Object.isFrozen(batch.colorA)).toBe(true);
      expect(Object.isFrozen(batch.dispensePosition)).toBe(true);
    });

    it('reports a column missing from a row', () => {
      const act = () => normalizeTable([{ colorA: 1, colorB: 2, DispensePos: 'A1' }]);
      expect(act).toThrow(SchemaError);
      expect(act).toThrow('Missing required column: colorC (row 1)');
    });

    it('reports a column missing from a column map', () => {
      expect(() => normalizeTable({ colorA: [1], colorB: [2], colorC: [3] })).toThrow(
        'Missing required column: DispensePos',
      );
    });

    it('reports columns of unequal length', () => {
      expect(() =>
        normalizeTable({ colorA: [1, 2], colorB: [1], colorC: [1, 2], DispensePos: ['A1', 'A2'] }),
      ).toThrow('Column colorB has 1 values, expected 2');
    });

    it('reports a value of the wrong type with its column and row', () => {
      try {
        normalizeTable([
          { colorA: 1, colorB: 2, colorC: 3, DispensePos: 'A1' },
          { colorA: '7', colorB: 2, colorC: 3, DispensePos: 'A2' },
        ]);
        expect.fail('expected SchemaError');
      } catch (err) {
        expect(err).toBeInstanceOf(SchemaError);
        if (err instanceof SchemaError) {
          expect(err.column).toBe('colorA');
          expect(err.code).toBe('SCHEMA');
          expect(err.message.startsWith('Column colorA, row 2: ')).toBe(true);
        }
      }
    });

    it('rejects an empty dispense position', () => {
      expect(() => normalizeTable([{ colorA: 1, colorB: 2, colorC: 3, DispensePos: '' }])).toThrow(
        /^Column DispensePos, row 1: /,
      );
    });
  });

  describe('normalizeCsv', () => {
    it('parses numbers and keeps positions verbatim', () => {
      const batch = normalizeCsv('colorA,colorB,colorC,DispensePos\n10,20,30,A1\n0.5,1e1,-2,B12\n');
      expect(batch).toEqual({
        colorA: [10, 0.5],
        colorB: [20, 10],
        colorC: [30, -2],
        dispensePosition: ['A1', 'B12'],
      });
    });

    it('locates columns by header name', () => {
      const batch = normalizeCsv('DispensePos,colorC,score,colorB,colorA\nH12,3,0.9,2,1\n');
      expect(batch).toEqual({ colorA: [1], colorB: [2], colorC: [3], dispensePosition: ['H12'] });
    });

    it('accepts a header-only table', () => {
      expect(normalizeCsv('colorA,colorB,colorC,DispensePos\n').colorA).toEqual([]);
    });

    it('rejects a non-numeric cell', () => {
      const act = () => normalizeCsv('colorA,colorB,colorC,DispensePos\nabc,1,1,A1\n');
      expect(act).toThrow(SourceReadError);
      expect(act).toThrow('Column colorA on line 2 is not a number: "abc"');
    });

    it('rejects an empty dispense position', () => {
      expect(() => normalizeCsv('colorA,colorB,colorC,DispensePos\n1,2,3,\n')).toThrow(
        'Column DispensePos on line 2 is empty',
      );
    });

    it('reports a missing header column as a schema error', () => {
      const act = () => normalizeCsv('colorA,colorC,DispensePos\n1,3,A1\n');
      expect(act).toThrow(SchemaError);
      expect(act).toThrow('Missing required column: colorB');
    });
  });

  describe('batchToRows', () => {
    it('expands a batch into row records', () => {
      const batch = normalizeTable({ colorA: [1, 2], colorB: [3, 4], colorC: [5, 6], DispensePos: ['A1', 'A2'] });
      expect(batchToRows(batch)).toEqual([
        { colorA: 1, colorB: 3, colorC: 5, DispensePos: 'A1' },
        { colorA: 2, colorB: 4, colorC: 6, DispensePos: 'A2' },
      ]);
    });
  });
});
