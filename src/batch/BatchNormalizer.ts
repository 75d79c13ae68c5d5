/**
 * BatchNormalizer — builds an ExperimentBatch from a tabular source.
 *
 * Accepts delimited text, a column map or an array of row records. Row
 * order is kept exactly; values keep their native representation.
 */

import { z } from 'zod';
import { SchemaError, SourceReadError } from '../generation/errors.js';
import {
  BATCH_COLUMNS,
  NUMERIC_COLUMNS,
  type BatchColumn,
  type ColumnTable,
  type ExperimentBatch,
  type RowTable,
  type TabularSource,
} from '../types/batch.js';
import { parseCsvTable } from './csvTable.js';

const batchRowSchema = z.object({
  colorA: z.number(),
  colorB: z.number(),
  colorC: z.number(),
  DispensePos: z.string().min(1),
});

type BatchRow = z.infer<typeof batchRowSchema>;

const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

function isRowTable(source: TabularSource): source is RowTable {
  return Array.isArray(source);
}

function hasColumn(record: object, column: string): boolean {
  return Object.prototype.hasOwnProperty.call(record, column);
}

function buildBatch(rows: BatchRow[]): ExperimentBatch {
  return Object.freeze({
    colorA: Object.freeze(rows.map((row) => row.colorA)),
    colorB: Object.freeze(rows.map((row) => row.colorB)),
    colorC: Object.freeze(rows.map((row) => row.colorC)),
    dispensePosition: Object.freeze(rows.map((row) => row.DispensePos)),
  });
}

function validateRow(record: Readonly<Record<string, unknown>>, rowNumber: number): BatchRow {
  for (const column of BATCH_COLUMNS) {
    if (!hasColumn(record, column)) {
      throw new SchemaError(column, `Missing required column: ${column} (row ${rowNumber})`);
    }
  }
  const result = batchRowSchema.safeParse(record);
  if (!result.success) {
    const issue = result.error.issues[0];
    const column = typeof issue?.path[0] === 'string' ? issue.path[0] : 'unknown';
    throw new SchemaError(column, `Column ${column}, row ${rowNumber}: ${issue?.message ?? 'invalid value'}`);
  }
  return result.data;
}

function rowsFromColumns(source: ColumnTable): Array<Record<BatchColumn, unknown>> {
  let length: number | undefined;
  for (const column of BATCH_COLUMNS) {
    const values = hasColumn(source, column) ? source[column] : undefined;
    if (!Array.isArray(values)) {
      throw new SchemaError(column, `Missing required column: ${column}`);
    }
    if (length !== undefined && values.length !== length) {
      throw new SchemaError(column, `Column ${column} has ${values.length} values, expected ${length}`);
    }
    length = values.length;
  }

  const rows: Array<Record<BatchColumn, unknown>> = [];
  for (let i = 0; i < (length ?? 0); i += 1) {
    rows.push({
      colorA: source['colorA']?.[i],
      colorB: source['colorB']?.[i],
      colorC: source['colorC']?.[i],
      DispensePos: source['DispensePos']?.[i],
    });
  }
  return rows;
}

/**
 * Normalize an in-memory table (column map or row records).
 *
 * @throws SchemaError when a required column is absent or a value has the wrong type
 */
export function normalizeTable(source: TabularSource): ExperimentBatch {
  const records: RowTable = isRowTable(source) ? source : rowsFromColumns(source);
  return buildBatch(records.map((record, i) => validateRow(record, i + 1)));
}

function parseCsvNumber(cell: string, column: string, line: number): number {
  if (!DECIMAL_PATTERN.test(cell)) {
    throw new SourceReadError(`Column ${column} on line ${line} is not a number: "${cell}"`);
  }
  const value = Number.parseFloat(cell);
  if (!Number.isFinite(value)) {
    throw new SourceReadError(`Column ${column} on line ${line} is out of range: "${cell}"`);
  }
  return value;
}

/**
 * Normalize comma-delimited text with a header row.
 *
 * @throws SourceReadError when the text cannot be parsed
 * @throws SchemaError when a required column is absent
 */
export function normalizeCsv(content: string): ExperimentBatch {
  const { header, rows } = parseCsvTable(content);

  const indexes = new Map<BatchColumn, number>();
  for (const column of BATCH_COLUMNS) {
    const idx = header.indexOf(column);
    if (idx < 0) {
      throw new SchemaError(column, `Missing required column: ${column}`);
    }
    indexes.set(column, idx);
  }

  const records = rows.map(({ line, cells }) => {
    const cell = (column: BatchColumn): string => cells[indexes.get(column) ?? -1] ?? '';
    const record: Record<string, unknown> = {};
    for (const column of NUMERIC_COLUMNS) {
      record[column] = parseCsvNumber(cell(column), column, line);
    }
    const position = cell('DispensePos');
    if (position.length === 0) {
      throw new SourceReadError(`Column DispensePos on line ${line} is empty`);
    }
    record['DispensePos'] = position;
    return record;
  });

  return normalizeTable(records);
}

/**
 * Expand a batch back into row records, in batch order.
 */
export function batchToRows(batch: ExperimentBatch): BatchRow[] {
  return batch.colorA.map((colorA, i) => ({
    colorA,
    colorB: batch.colorB[i] ?? Number.NaN,
    colorC: batch.colorC[i] ?? Number.NaN,
    DispensePos: batch.dispensePosition[i] ?? '',
  }));
}
