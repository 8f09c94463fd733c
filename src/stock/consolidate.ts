/**
 * CSV consolidation
 *
 * Reads every *.csv file directly inside a directory (name order, not recursive)
 * and concatenates their rows into one table of stock records.
 *
 * Malformed rows are skipped with a warning. A file that cannot be parsed, or
 * whose header lacks a required column, is skipped as a whole with a warning.
 */

import { readdirSync, statSync } from 'fs';
import path from 'path';
import { STOCK_FIELDS, type ConsolidatedTable, type SkippedRow, type SourceFileSummary, type StockRecord } from '../types/Stock.js';
import { getColumn, readCsvSafe, type CsvRow, type CsvTable } from '../utils/csvSafeRead.js';
import { writeCsvFile } from '../utils/csvWrite.js';
import { parsePrice, parseQuantity } from './fields.js';
import { createLogger, type Logger } from '../utils/logger.js';
import {
  DirectoryNotFoundError,
  MalformedRowError,
  NoCsvFilesFoundError,
  OutputWriteFailureError,
  describeError,
  errorCode,
} from './errors.js';

export interface ConsolidateOptions {
  logger?: Logger;
}

export type RowParseResult =
  | { ok: true; record: StockRecord }
  | { ok: false; reason: string };

const defaultLogger = createLogger('consolidate');

function isCsvFile(fileName: string): boolean {
  return fileName.toLowerCase().endsWith('.csv');
}

export function isDirectory(directory: string): boolean {
  try {
    return statSync(directory).isDirectory();
  } catch {
    return false;
  }
}

/**
 * List CSV files in a directory, sorted by name
 */
export function listCsvFiles(directory: string): string[] {
  if (!isDirectory(directory)) {
    throw new DirectoryNotFoundError(directory);
  }

  return readdirSync(directory, { withFileTypes: true })
    .filter(entry => entry.isFile() && isCsvFile(entry.name))
    .map(entry => entry.name)
    .sort((a, b) => a.localeCompare(b));
}

/**
 * Turn one header-mapped CSV row into a stock record, or explain why not
 */
export function parseStockRow(row: CsvRow): RowParseResult {
  const name = getColumn(row, 'name') ?? '';
  const category = getColumn(row, 'category') ?? '';
  const quantityText = getColumn(row, 'quantity') ?? '';
  const priceText = getColumn(row, 'price') ?? '';

  if (!name) return { ok: false, reason: 'missing name' };
  if (!category) return { ok: false, reason: 'missing category' };

  const quantity = parseQuantity(quantityText);
  if (quantity === undefined) {
    return { ok: false, reason: `quantity '${quantityText}' is not a non-negative integer` };
  }

  const price = parsePrice(priceText);
  if (price === undefined) {
    return { ok: false, reason: `price '${priceText}' is not a non-negative number` };
  }

  return { ok: true, record: { name, quantity, price, category } };
}

function missingColumns(headers: string[]): string[] {
  const present = new Set(headers.map(h => h.toLowerCase()));
  return STOCK_FIELDS.filter(field => !present.has(field));
}

/**
 * Consolidate all CSV files in a directory into one table
 */
export function consolidateDirectory(directory: string, options: ConsolidateOptions = {}): ConsolidatedTable {
  const log = options.logger ?? defaultLogger;
  const files = listCsvFiles(directory);

  if (files.length === 0) {
    throw new NoCsvFilesFoundError(directory);
  }

  const records: StockRecord[] = [];
  const sources: SourceFileSummary[] = [];
  const skipped: SkippedRow[] = [];
  let unreadable = 0;

  for (const file of files) {
    let table: CsvTable;
    try {
      table = readCsvSafe(path.join(directory, file));
    } catch (error) {
      unreadable++;
      log.warn(`Skipping ${file}: ${describeError(error)}`);
      continue;
    }

    const missing = missingColumns(table.headers);
    if (missing.length > 0) {
      unreadable++;
      log.warn(`Skipping ${file}: missing required column(s) ${missing.join(', ')}`);
      continue;
    }

    const summary: SourceFileSummary = { file, rowsAccepted: 0, rowsSkipped: 0 };
    for (const { line, row } of table.rows) {
      const result = parseStockRow(row);
      if (result.ok) {
        records.push(result.record);
        summary.rowsAccepted++;
      } else {
        const malformed = new MalformedRowError(file, line, result.reason);
        skipped.push({ file, line, reason: result.reason });
        summary.rowsSkipped++;
        log.warn(`Skipping row: ${malformed.message}`);
      }
    }

    sources.push(summary);
    log.debug(`${file}: ${summary.rowsAccepted} rows, ${summary.rowsSkipped} skipped`);
  }

  if (sources.length === 0) {
    throw new NoCsvFilesFoundError(directory, unreadable);
  }

  return { records, sources, skipped };
}

/**
 * Write records to one combined CSV (name,quantity,price,category).
 * Returns the absolute path written.
 */
export function writeConsolidatedCsv(records: readonly StockRecord[], outputFile: string): string {
  const target = path.resolve(outputFile);
  try {
    writeCsvFile(
      target,
      STOCK_FIELDS,
      records.map(r => [r.name, r.quantity, r.price, r.category])
    );
  } catch (error) {
    throw new OutputWriteFailureError(target, errorCode(error), error);
  }
  return target;
}
