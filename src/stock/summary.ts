/**
 * Per-category summary report
 *
 * Aggregation is a single pass keeping (count, quantity sum, price sum) per
 * category; categories appear in first-seen order.
 */

import path from 'path';
import { DEFAULT_REPORT_FILENAME } from '../config/env.js';
import type { StockRecord, SummaryRow } from '../types/Stock.js';
import { readCsvSafe } from '../utils/csvSafeRead.js';
import { writeCsvFile } from '../utils/csvWrite.js';
import { OutputWriteFailureError, errorCode } from './errors.js';

export const REPORT_HEADER = ['category', 'total_quantity', 'average_price'] as const;

interface CategoryAccumulator {
  count: number;
  quantitySum: number;
  priceSum: number;
}

export function summarizeByCategory(records: readonly StockRecord[]): SummaryRow[] {
  const groups = new Map<string, CategoryAccumulator>();

  for (const record of records) {
    const acc = groups.get(record.category);
    if (acc) {
      acc.count++;
      acc.quantitySum += record.quantity;
      acc.priceSum += record.price;
    } else {
      groups.set(record.category, { count: 1, quantitySum: record.quantity, priceSum: record.price });
    }
  }

  return Array.from(groups, ([category, acc]) => ({
    category,
    totalQuantity: acc.quantitySum,
    averagePrice: acc.priceSum / acc.count,
    count: acc.count,
  }));
}

/** Two decimals, as written in the report */
export function formatPrice(value: number): string {
  return (Math.round(value * 100) / 100).toFixed(2);
}

/**
 * Write the report CSV and return the absolute path written.
 * Without an output file the report goes to report.csv in the working directory.
 */
export function writeSummaryReport(rows: readonly SummaryRow[], outputFile: string = DEFAULT_REPORT_FILENAME): string {
  const target = path.resolve(outputFile || DEFAULT_REPORT_FILENAME);
  try {
    writeCsvFile(
      target,
      REPORT_HEADER,
      rows.map(row => [row.category, row.totalQuantity, formatPrice(row.averagePrice)])
    );
  } catch (error) {
    throw new OutputWriteFailureError(target, errorCode(error), error);
  }
  return target;
}

/**
 * Read a report written by writeSummaryReport. `count` is not stored and reads as 0.
 */
export function readSummaryReport(filePath: string): SummaryRow[] {
  const { rows } = readCsvSafe(filePath);
  return rows.map(({ row }) => ({
    category: row.category ?? '',
    totalQuantity: Number(row.total_quantity),
    averagePrice: Number(row.average_price),
    count: 0,
  }));
}
