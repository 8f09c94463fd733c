import { STOCK_FIELDS, type StockRecord, type SummaryRow } from '../types/Stock.js';
import { fieldValue } from './fields.js';
import { formatPrice, REPORT_HEADER } from './summary.js';

function renderTable(header: readonly string[], rows: readonly string[][]): string[] {
  const widths = header.map((h, col) => Math.max(h.length, ...rows.map(r => r[col].length)));
  const render = (cells: readonly string[]) =>
    cells.map((cell, col) => cell.padEnd(widths[col])).join('  ').trimEnd();
  return [render(header), ...rows.map(render)];
}

/**
 * Plain-text table of records, one line per record after the header
 */
export function formatRecordTable(records: readonly StockRecord[]): string[] {
  return renderTable(
    STOCK_FIELDS,
    records.map(record => STOCK_FIELDS.map(field => String(fieldValue(record, field))))
  );
}

export function formatSearchResults(results: readonly StockRecord[]): string[] {
  if (results.length === 0) return ['No matching records found.'];
  return ['Search Results:', ...formatRecordTable(results)];
}

export function formatSummaryTable(rows: readonly SummaryRow[]): string[] {
  return renderTable(
    REPORT_HEADER,
    rows.map(row => [row.category, String(row.totalQuantity), formatPrice(row.averagePrice)])
  );
}
