import type { StockRecord } from '../types/Stock.js';
import { fieldValue, NUMERIC_FIELDS, parsePrice, parseStockField } from './fields.js';

/**
 * Records whose `column` equals `value`.
 *
 * quantity/price compare numerically ("5.0" matches 5); a target that is not a
 * plain decimal number matches nothing. name/category compare as exact, case-sensitive strings.
 * Throws UnknownColumnError for any other column.
 */
export function searchRecords(records: readonly StockRecord[], column: string, value: string): StockRecord[] {
  const field = parseStockField(column);
  const target = value.trim();

  if (NUMERIC_FIELDS.has(field)) {
    const wanted = parsePrice(target);
    if (wanted === undefined) return [];
    return records.filter(record => fieldValue(record, field) === wanted);
  }

  return records.filter(record => fieldValue(record, field) === target);
}
