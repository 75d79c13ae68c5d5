/**
 * Python literal rendering and parsing for the embedded batch mapping.
 *
 * Only the subset the data block uses is supported: a dict of string keys
 * to lists of numbers and strings.
 */

import { GenerationError, TemplateMalformedError } from '../generation/errors.js';
import { batchSize, type ExperimentBatch } from '../types/batch.js';

const INNER_INDENT = '    ';

export function pyString(value: string): string {
  const escaped = value
    .replaceAll('\\', '\\\\')
    .replaceAll("'", "\\'")
    .replaceAll('\n', '\\n')
    .replaceAll('\r', '\\r');
  return `'${escaped}'`;
}

/**
 * Render a number the way Python prints a float: integral values keep a
 * trailing `.0`.
 */
export function pyNumber(value: number): string {
  if (!Number.isFinite(value)) {
    throw new GenerationError('INVALID_BATCH', `Cannot render non-finite number: ${value}`, 400);
  }
  if (Number.isInteger(value) && Math.abs(value) < 1e21) {
    return value.toFixed(1);
  }
  return String(value);
}

function pyList(values: readonly string[]): string {
  return `[${values.join(', ')}]`;
}

/**
 * Serialize a batch as a Python dict literal with keys in the fixed order
 * colorA, colorB, colorC, DispensePos.
 *
 * The opening brace carries no indentation (it follows `NAME = `); entries
 * are indented one level deeper than `indent` and the closing brace sits at
 * `indent`.
 */
export function serializeBatch(batch: ExperimentBatch, indent = '', newline = '\n'): string {
  const size = batchSize(batch);
  if (
    batch.colorB.length !== size ||
    batch.colorC.length !== size ||
    batch.dispensePosition.length !== size
  ) {
    throw new GenerationError('INVALID_BATCH', 'Batch sequences must have equal length', 400);
  }

  const entries: Array<[string, string]> = [
    ['colorA', pyList(batch.colorA.map(pyNumber))],
    ['colorB', pyList(batch.colorB.map(pyNumber))],
    ['colorC', pyList(batch.colorC.map(pyNumber))],
    ['DispensePos', pyList(batch.dispensePosition.map(pyString))],
  ];

  return [
    '{',
    ...entries.map(([key, value]) => `${indent}${INNER_INDENT}${pyString(key)}: ${value},`),
    `${indent}}`,
  ].join(newline);
}

// ============================================================================
// Parsing
// ============================================================================

export type PyScalar = number | string;

type Token =
  | { kind: 'punct'; value: '{' | '}' | '[' | ']' | ':' | ','; pos: number }
  | { kind: 'string'; value: string; pos: number }
  | { kind: 'number'; value: number; pos: number };

const NUMBER_PATTERN = /[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?/y;

const ESCAPES: Record<string, string> = {
  n: '\n',
  r: '\r',
  t: '\t',
  '\\': '\\',
  "'": "'",
  '"': '"',
};

export function lineAt(text: string, pos: number): number {
  let line = 1;
  for (let i = 0; i < pos && i < text.length; i += 1) {
    if (text[i] === '\n') line += 1;
  }
  return line;
}

class LiteralParser {
  private pos: number;
  private peeked: Token | null = null;

  constructor(
    private readonly text: string,
    start: number,
  ) {
    this.pos = start;
  }

  get offset(): number {
    return this.peeked ? this.peeked.pos : this.pos;
  }

  private fail(message: string, pos: number): never {
    throw new TemplateMalformedError('LITERAL_SYNTAX', message, lineAt(this.text, pos));
  }

  private skipTrivia(): void {
    while (this.pos < this.text.length) {
      const ch = this.text[this.pos];
      if (ch === '#') {
        const end = this.text.indexOf('\n', this.pos);
        this.pos = end < 0 ? this.text.length : end;
        continue;
      }
      if (ch === ' ' || ch === '\t' || ch === '\n' || ch === '\r') {
        this.pos += 1;
        continue;
      }
      return;
    }
  }

  private readString(quote: string): Token {
    const start = this.pos;
    let value = '';
    this.pos += 1;
    while (this.pos < this.text.length) {
      const ch = this.text[this.pos];
      if (ch === quote) {
        this.pos += 1;
        return { kind: 'string', value, pos: start };
      }
      if (ch === '\n') break;
      if (ch === '\\') {
        const next = this.text[this.pos + 1] ?? '';
        value += ESCAPES[next] ?? `\\${next}`;
        this.pos += 2;
        continue;
      }
      value += ch;
      this.pos += 1;
    }
    return this.fail('Unterminated string', start);
  }

  private readToken(): Token {
    this.skipTrivia();
    const pos = this.pos;
    const ch = this.text[pos];
    if (ch === undefined) {
      return this.fail('Unexpected end of text in data literal', pos);
    }
    if (ch === '{' || ch === '}' || ch === '[' || ch === ']' || ch === ':' || ch === ',') {
      this.pos += 1;
      return { kind: 'punct', value: ch, pos };
    }
    if (ch === "'" || ch === '"') {
      return this.readString(ch);
    }
    NUMBER_PATTERN.lastIndex = pos;
    const match = NUMBER_PATTERN.exec(this.text);
    if (match) {
      this.pos += match[0].length;
      return { kind: 'number', value: Number.parseFloat(match[0]), pos };
    }
    return this.fail(`Unexpected character '${ch}' in data literal`, pos);
  }

  peek(): Token {
    if (!this.peeked) this.peeked = this.readToken();
    return this.peeked;
  }

  next(): Token {
    const token = this.peek();
    this.peeked = null;
    return token;
  }

  expect(value: '{' | '}' | '[' | ']' | ':'): void {
    const token = this.next();
    if (token.kind !== 'punct' || token.value !== value) {
      this.fail(`Expected '${value}'`, token.pos);
    }
  }

  private isPunct(token: Token, value: string): boolean {
    return token.kind === 'punct' && token.value === value;
  }

  /**
   * Parse a comma-separated sequence up to `close`, allowing a trailing comma.
   */
  private sequence(close: '}' | ']', item: () => void): void {
    while (!this.isPunct(this.peek(), close)) {
      item();
      const after = this.peek();
      if (this.isPunct(after, ',')) {
        this.next();
        continue;
      }
      if (!this.isPunct(after, close)) {
        this.fail(`Expected ',' or '${close}'`, after.pos);
      }
    }
    this.next();
  }

  parseList(): PyScalar[] {
    this.expect('[');
    const values: PyScalar[] = [];
    this.sequence(']', () => {
      const token = this.next();
      if (token.kind === 'punct') {
        return this.fail('Expected a number or string', token.pos);
      }
      values.push(token.value);
    });
    return values;
  }

  parseDict(): Record<string, PyScalar[]> {
    this.expect('{');
    const result: Record<string, PyScalar[]> = {};
    this.sequence('}', () => {
      const key = this.next();
      if (key.kind !== 'string') {
        return this.fail('Expected a string key', key.pos);
      }
      this.expect(':');
      result[key.value] = this.parseList();
    });
    return result;
  }
}

/**
 * Parse a dict-of-lists literal starting at `start` (the opening brace).
 *
 * @returns the parsed mapping and the offset just past the closing brace
 */
export function parseDictLiteral(
  text: string,
  start = 0,
): { value: Record<string, PyScalar[]>; end: number } {
  const parser = new LiteralParser(text, start);
  const value = parser.parseDict();
  return { value, end: parser.offset };
}
