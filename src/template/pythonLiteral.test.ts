import { describe, expect, it } from 'vitest';
import { GenerationError, TemplateMalformedError } from '../generation/errors.js';
import type { ExperimentBatch } from '../types/batch.js';
import { lineAt, parseDictLiteral, pyNumber, pyString, serializeBatch } from './pythonLiteral.js';

const batch: ExperimentBatch = {
  colorA: [10, 5.5],
  colorB: [20, 0],
  colorC: [30, 1],
  dispensePosition: ['A1', 'B2'],
};

describe('pyNumber', () => {
  it('prints integral values with a trailing .0', () => {
    expect(pyNumber(10)).toBe('10.0');
    expect(pyNumber(-2)).toBe('-2.0');
    expect(pyNumber(0)).toBe('0.0');
  });

  it('prints fractional values as-is', () => {
    expect(pyNumber(0.5)).toBe('0.5');
    expect(pyNumber(12.25)).toBe('12.25');
  });

  it('rejects non-finite values', () => {
    expect(() => pyNumber(Number.NaN)).toThrow(GenerationError);
    expect(() => pyNumber(Number.POSITIVE_INFINITY)).toThrow('Cannot render non-finite number: Infinity');
  });
});

describe('pyString', () => {
  it('single-quotes and escapes', () => {
    expect(pyString('A1')).toBe("'A1'");
    expect(pyString("it's")).toBe("'it\\'s'");
    expect(pyString('a\\b')).toBe("'a\\\\b'");
    expect(pyString('a\nb')).toBe("'a\\nb'");
  });
});

describe('serializeBatch', () => {
  it('renders the fixed key order at top level', () => {
    expect(serializeBatch(batch)).toBe(
      [
        '{',
        "    'colorA': [10.0, 5.5],",
        "    'colorB': [20.0, 0.0],",
        "    'colorC': [30.0, 1.0],",
        "    'DispensePos': ['A1', 'B2'],",
        '}',
      ].join('\n'),
    );
  });

  it('indents entries one level below the given indent', () => {
    const text = serializeBatch(batch, '    ', '\r\n');
    const lines = text.split('\r\n');
    expect(lines[0]).toBe('{');
    expect(lines[1]).toBe("        'colorA': [10.0, 5.5],");
    expect(lines[5]).toBe('    }');
  });

  it('renders an empty batch with empty lists', () => {
    const empty: ExperimentBatch = { colorA: [], colorB: [], colorC: [], dispensePosition: [] };
    expect(serializeBatch(empty)).toBe(
      "{\n    'colorA': [],\n    'colorB': [],\n    'colorC': [],\n    'DispensePos': [],\n}",
    );
  });

  it('rejects sequences of unequal length', () => {
    const ragged: ExperimentBatch = { colorA: [1, 2], colorB: [1], colorC: [1, 2], dispensePosition: ['A1', 'A2'] };
    expect(() => serializeBatch(ragged)).toThrow('Batch sequences must have equal length');
  });
});

describe('parseDictLiteral', () => {
  it('reads back a serialized batch', () => {
    const { value } = parseDictLiteral(serializeBatch(batch));
    expect(value).toEqual({
      colorA: [10, 5.5],
      colorB: [20, 0],
      colorC: [30, 1],
      DispensePos: ['A1', 'B2'],
    });
  });

  it('accepts double quotes, trailing commas and comments', () => {
    const { value } = parseDictLiteral("{'a': [1, -2.5e1], \"b\": ['x',],  # note\n}");
    expect(value).toEqual({ a: [1, -25], b: ['x'] });
  });

  it('unescapes string values', () => {
    const { value } = parseDictLiteral(`{'p': [${pyString("it's")}]}`);
    expect(value).toEqual({ p: ["it's"] });
  });

  it('starts at an offset and reports where the literal ends', () => {
    const text = "X = {'a': []} tail";
    expect(parseDictLiteral(text, 4)).toEqual({ value: { a: [] }, end: 13 });
  });

  it('reports missing separators with the line number', () => {
    const act = () => parseDictLiteral("{\n'a': [1 2]}");
    expect(act).toThrow(TemplateMalformedError);
    expect(act).toThrow("Expected ',' or ']' (line 2)");
  });

  it('rejects unquoted keys', () => {
    try {
      parseDictLiteral('{a: [1]}');
      expect.fail('expected TemplateMalformedError');
    } catch (err) {
      expect(err).toBeInstanceOf(TemplateMalformedError);
      if (err instanceof TemplateMalformedError) {
        expect(err.code).toBe('LITERAL_SYNTAX');
        expect(err.line).toBe(1);
        expect(err.message).toBe("Unexpected character 'a' in data literal (line 1)");
      }
    }
  });

  it('rejects truncated text', () => {
    expect(() => parseDictLiteral("{'a': [1,")).toThrow('Unexpected end of text in data literal (line 1)');
  });
});

describe('lineAt', () => {
  it('counts lines up to an offset', () => {
    expect(lineAt('a\nb\nc', 0)).toBe(1);
    expect(lineAt('a\nb\nc', 4)).toBe(3);
  });
});
