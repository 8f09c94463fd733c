export const STOCK_FIELDS = ['name', 'quantity', 'price', 'category'] as const;

export type StockField = (typeof STOCK_FIELDS)[number];

export interface StockRecord {
  name: string;
  quantity: number;
  price: number;
  category: string;
}

export interface SourceFileSummary {
  file: string;
  rowsAccepted: number;
  rowsSkipped: number;
}

export interface SkippedRow {
  file: string;
  line: number;        // 1-based line in the source file, header is line 1
  reason: string;
}

export interface ConsolidatedTable {
  records: StockRecord[];
  sources: SourceFileSummary[];
  skipped: SkippedRow[];
}

export interface SummaryRow {
  category: string;
  totalQuantity: number;
  averagePrice: number;
  count: number;       // contributing records, always >= 1 when computed
}
