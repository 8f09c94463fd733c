/**
 * Safe CSV Reading Utility
 *
 * Handles:
 * - Quoted commas and multiline fields
 * - BOM removal
 * - Header-mapped rows with trimmed values
 *
 * Parse failures are rethrown as CsvReadError carrying the file path.
 */

import { readFileSync } from 'fs';
import { parse } from 'csv-parse/sync';

export interface CsvRow {
  [key: string]: string;
}

export interface CsvTable {
  headers: string[];
  rows: CsvLine[];
}

export interface CsvLine {
  /** 1-based line number where the record ends, header is line 1 */
  line: number;
  row: CsvRow;
}

export class CsvReadError extends Error {
  constructor(readonly filePath: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Error reading ${filePath}: ${detail}`, { cause });
    this.name = 'CsvReadError';
  }
}

interface ParsedRecord {
  values: string[];
  line: number;
}

function toParsedRecord(entry: unknown): ParsedRecord {
  if (!entry || typeof entry !== 'object' || !('record' in entry) || !('info' in entry)) {
    return { values: [], line: 0 };
  }
  const values = Array.isArray(entry.record) ? entry.record.map(v => String(v ?? '')) : [];
  const info = entry.info;
  const line = info && typeof info === 'object' && 'lines' in info && typeof info.lines === 'number'
    ? info.lines
    : 0;
  return { values, line };
}

/**
 * Parse CSV text whose first line is a header row.
 * Short rows are kept (missing cells read as ''), so callers decide what is malformed.
 */
export function parseCsv(content: string): CsvTable {
  const parsed: unknown = parse(content, {
    bom: true,
    info: true,
    skip_empty_lines: true,
    relax_column_count: true,
    trim: true,
  });

  if (!Array.isArray(parsed) || parsed.length === 0) {
    return { headers: [], rows: [] };
  }

  const [header, ...data] = parsed.map(toParsedRecord);
  const headers = header.values;

  const rows = data.map(({ values, line }) => {
    const row: CsvRow = {};
    headers.forEach((name, idx) => {
      row[name] = values[idx] ?? '';
    });
    return { line, row };
  });

  return { headers, rows };
}

/**
 * Read and parse a CSV file, throwing CsvReadError on any I/O or parse failure
 */
export function readCsvSafe(filePath: string): CsvTable {
  try {
    return parseCsv(readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new CsvReadError(filePath, error);
  }
}

/**
 * Get a value from a row, matching the column name case-insensitively
 */
export function getColumn(row: CsvRow, name: string): string | undefined {
  const wanted = name.toLowerCase();
  for (const [key, value] of Object.entries(row)) {
    if (key.toLowerCase() === wanted) return value;
  }
  return undefined;
}
