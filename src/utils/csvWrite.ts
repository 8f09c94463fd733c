import { writeFileSync } from 'fs';

export type CsvCell = string | number;

export function escapeCsv(value: CsvCell): string {
  const s = String(value);
  if (s.includes(',') || s.includes('"') || s.includes('\n') || s.includes('\r')) {
    return `"${s.replace(/"/g, '""')}"`;
  }
  return s;
}

export function toCsv(header: readonly string[], rows: readonly (readonly CsvCell[])[]): string {
  const lines = [header.map(escapeCsv).join(',')];
  for (const row of rows) {
    lines.push(row.map(escapeCsv).join(','));
  }
  return lines.join('\n') + '\n';
}

export function writeCsvFile(
  filePath: string,
  header: readonly string[],
  rows: readonly (readonly CsvCell[])[]
): void {
  writeFileSync(filePath, toCsv(header, rows), 'utf-8');
}
