/**
 * TemplateRegion — splits a base template around its mutable data region.
 *
 * The region is a marker comment line followed by `NAME = {...}`. The end
 * of the literal is found by brace counting that skips string literals and
 * comments, so nested braces in data values never truncate the match.
 */

import { TemplateMalformedError } from '../generation/errors.js';
import { lineAt } from './pythonLiteral.js';

export type MultipleRegionPolicy = 'error' | 'first';

export interface RegionLocatorOptions {
  /** Comment line announcing the replaceable block (compared trimmed) */
  markerComment: string;
  /** Name assigned the data literal on the following line */
  variable: string;
  multipleRegions: MultipleRegionPolicy;
}

/**
 * Template text split around the data region.
 * `prefix + <marker line> + newline + assignmentPrefix + literal + suffix`
 * reproduces the original text exactly.
 */
export interface TemplateRegion {
  prefix: string;
  /** Leading whitespace of the marker line */
  indent: string;
  /** Line terminator following the marker line */
  newline: string;
  /** Assignment line up to the opening brace, e.g. `    BO_DATA = ` */
  assignmentPrefix: string;
  /** Original literal, braces included */
  literal: string;
  suffix: string;
  /** 1-based line of the marker comment */
  line: number;
}

type LineSpan = { start: number; end: number; newline: string };

function lineSpans(text: string): LineSpan[] {
  const spans: LineSpan[] = [];
  const pattern = /\r?\n/g;
  let start = 0;
  let match: RegExpExecArray | null;
  while ((match = pattern.exec(text)) !== null) {
    spans.push({ start, end: match.index, newline: match[0] });
    start = match.index + match[0].length;
  }
  spans.push({ start, end: text.length, newline: '' });
  return spans;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Find the brace closing the one at `openIndex`.
 *
 * @returns index of the matching `}`
 * @throws TemplateMalformedError when the text ends before the braces balance
 */
export function findClosingBrace(text: string, openIndex: number): number {
  let depth = 0;
  let i = openIndex;
  while (i < text.length) {
    const ch = text[i];
    if (ch === "'" || ch === '"') {
      const stringStart = i;
      i += 1;
      while (i < text.length && text[i] !== ch) {
        if (text[i] === '\n') {
          throw new TemplateMalformedError(
            'REGION_MALFORMED',
            'Unterminated string in data literal',
            lineAt(text, stringStart),
          );
        }
        i += text[i] === '\\' ? 2 : 1;
      }
    } else if (ch === '#') {
      const end = text.indexOf('\n', i);
      i = end < 0 ? text.length : end;
      continue;
    } else if (ch === '{') {
      depth += 1;
    } else if (ch === '}') {
      depth -= 1;
      if (depth === 0) return i;
    }
    i += 1;
  }
  throw new TemplateMalformedError(
    'UNBALANCED_BRACES',
    `Data literal has ${depth} unclosed brace${depth === 1 ? '' : 's'}`,
    lineAt(text, openIndex),
  );
}

/**
 * Locate the single mutable data region of a template.
 */
export function locateDataRegion(text: string, options: RegionLocatorOptions): TemplateRegion {
  const marker = options.markerComment.trim();
  const spans = lineSpans(text);
  const markerLines: number[] = [];
  spans.forEach((span, idx) => {
    if (text.slice(span.start, span.end).trim() === marker) markerLines.push(idx);
  });

  const first = markerLines[0];
  if (first === undefined) {
    throw new TemplateMalformedError('REGION_NOT_FOUND', `Marker comment not found: "${marker}"`);
  }
  const second = markerLines[1];
  if (second !== undefined && options.multipleRegions === 'error') {
    throw new TemplateMalformedError(
      'AMBIGUOUS_REGION',
      `Found ${markerLines.length} marker comments, expected exactly one`,
      second + 1,
    );
  }

  const markerSpan = spans[first];
  const assignmentSpan = spans[first + 1];
  if (!markerSpan || !assignmentSpan) {
    throw new TemplateMalformedError(
      'REGION_MALFORMED',
      `Marker comment is not followed by a ${options.variable} assignment`,
      first + 1,
    );
  }

  const assignmentLine = text.slice(assignmentSpan.start, assignmentSpan.end);
  const assignment = new RegExp(`^([ \\t]*${escapeRegExp(options.variable)}[ \\t]*=[ \\t]*)\\{`).exec(assignmentLine);
  const assignmentPrefix = assignment?.[1];
  if (assignmentPrefix === undefined) {
    throw new TemplateMalformedError(
      'REGION_MALFORMED',
      `Expected "${options.variable} = {" after marker comment`,
      first + 2,
    );
  }

  const openIndex = assignmentSpan.start + assignmentPrefix.length;
  const closeIndex = findClosingBrace(text, openIndex);
  const markerLine = text.slice(markerSpan.start, markerSpan.end);

  return {
    prefix: text.slice(0, markerSpan.start),
    indent: /^[ \t]*/.exec(markerLine)?.[0] ?? '',
    newline: markerSpan.newline,
    assignmentPrefix,
    literal: text.slice(openIndex, closeIndex + 1),
    suffix: text.slice(closeIndex + 1),
    line: first + 1,
  };
}

/**
 * Locate `NAME = {...}` anywhere in the text, regardless of the comment
 * above it. Used to read back a generated protocol's data block.
 */
export function locateAssignment(text: string, variable: string): { openIndex: number; closeIndex: number } {
  const pattern = new RegExp(`^[ \\t]*${escapeRegExp(variable)}[ \\t]*=[ \\t]*\\{`, 'm');
  const match = pattern.exec(text);
  if (!match) {
    throw new TemplateMalformedError('REGION_NOT_FOUND', `No ${variable} assignment found`);
  }
  const openIndex = match.index + match[0].length - 1;
  return { openIndex, closeIndex: findClosingBrace(text, openIndex) };
}
