import { STOCK_FIELDS, type StockField, type StockRecord } from '../types/Stock.js';
import { UnknownColumnError } from './errors.js';

export const NUMERIC_FIELDS: ReadonlySet<StockField> = new Set<StockField>(['quantity', 'price']);

/**
 * Map user-supplied column text onto the fixed field set.
 * Matching ignores case and surrounding whitespace.
 */
export function parseStockField(input: string): StockField {
  const wanted = input.trim().toLowerCase();
  const field = STOCK_FIELDS.find(f => f === wanted);
  if (!field) {
    throw new UnknownColumnError(input, STOCK_FIELDS);
  }
  return field;
}

const DECIMAL_INTEGER = /^\d+$/;
const DECIMAL_NUMBER = /^\d+(\.\d+)?$/;

/**
 * Plain decimal non-negative integer ("12"), or undefined.
 * Hex/octal/binary literals, exponents and values past the safe-integer range are rejected.
 */
export function parseQuantity(text: string): number | undefined {
  if (!DECIMAL_INTEGER.test(text)) return undefined;
  const value = Number(text);
  return Number.isSafeInteger(value) ? value : undefined;
}

/**
 * Plain decimal non-negative number ("4", "4.25"), or undefined
 */
export function parsePrice(text: string): number | undefined {
  if (!DECIMAL_NUMBER.test(text)) return undefined;
  const value = Number(text);
  return Number.isFinite(value) ? value : undefined;
}

export function fieldValue(record: StockRecord, field: StockField): string | number {
  switch (field) {
    case 'name':
      return record.name;
    case 'quantity':
      return record.quantity;
    case 'price':
      return record.price;
    case 'category':
      return record.category;
  }
}
