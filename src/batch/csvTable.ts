import { SourceReadError } from '../generation/errors.js';

export type CsvTable = {
  header: string[];
  /** Data rows with the 1-based source line each came from */
  rows: Array<{ line: number; cells: string[] }>;
};

export function splitCsvLine(line: string, lineNumber: number): string[] {
  const out: string[] = [];
  let current = '';
  let inQuotes = false;
  for (let i = 0; i < line.length; i += 1) {
    const ch = line[i];
    if (ch === '"') {
      if (inQuotes && line[i + 1] === '"') {
        current += '"';
        i += 1;
        continue;
      }
      inQuotes = !inQuotes;
      continue;
    }
    if (ch === ',' && !inQuotes) {
      out.push(current.trim());
      current = '';
      continue;
    }
    current += ch;
  }
  if (inQuotes) {
    throw new SourceReadError(`Unterminated quoted cell on line ${lineNumber}`);
  }
  out.push(current.trim());
  return out;
}

/**
 * Parse comma-delimited text with a header row. Header names are kept
 * verbatim; blank lines are skipped. A header with no data rows is valid.
 */
export function parseCsvTable(content: string): CsvTable {
  const lines = content.replace(/^\uFEFF/, '').split(/\r?\n/);

  let header: string[] | undefined;
  const rows: CsvTable['rows'] = [];
  for (let i = 0; i < lines.length; i += 1) {
    const line = lines[i];
    if (line === undefined || line.trim().length === 0) continue;
    const lineNumber = i + 1;
    const cells = splitCsvLine(line, lineNumber);
    if (!header) {
      header = cells;
      continue;
    }
    if (cells.length !== header.length) {
      throw new SourceReadError(
        `Line ${lineNumber} has ${cells.length} cells, header has ${header.length}`,
      );
    }
    rows.push({ line: lineNumber, cells });
  }

  if (!header) {
    throw new SourceReadError('CSV header missing');
  }
  return { header, rows };
}
