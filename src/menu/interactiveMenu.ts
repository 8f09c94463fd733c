/**
 * Interactive menu
 *
 * A small state machine: each input line moves the session from one state to
 * the next and yields the lines to print. The line reader at the bottom only
 * feeds it stdin and writes its output.
 *
 *   MainMenu ──1──▶ AwaitingDirectoryInput ──dir──▶ MainMenu
 *   MainMenu ──2──▶ AwaitingSearchParams (column, then value) ──▶ MainMenu
 *   MainMenu ──3──▶ AwaitingOutputPath ──path|empty──▶ MainMenu
 *   MainMenu ──4──▶ Exiting
 */

import { createInterface } from 'readline';
import type { Readable, Writable } from 'stream';
import { DEFAULT_REPORT_FILENAME } from '../config/env.js';
import type { ConsolidatedTable, StockRecord, SummaryRow } from '../types/Stock.js';
import { consolidateDirectory, isDirectory } from '../stock/consolidate.js';
import { describeError } from '../stock/errors.js';
import { parseStockField } from '../stock/fields.js';
import { formatSearchResults } from '../stock/format.js';
import { searchRecords } from '../stock/search.js';
import { summarizeByCategory, writeSummaryReport } from '../stock/summary.js';

export type MenuState =
  | { kind: 'MainMenu' }
  | { kind: 'AwaitingDirectoryInput' }
  | { kind: 'AwaitingSearchParams'; column?: string }
  | { kind: 'AwaitingOutputPath' }
  | { kind: 'Exiting' };

export interface MenuOperations {
  isDirectory(directory: string): boolean;
  consolidate(directory: string): ConsolidatedTable;
  search(records: readonly StockRecord[], column: string, value: string): StockRecord[];
  summarize(records: readonly StockRecord[]): SummaryRow[];
  writeReport(rows: readonly SummaryRow[], outputFile: string): string;
}

export const defaultMenuOperations: MenuOperations = {
  isDirectory,
  consolidate: directory => consolidateDirectory(directory),
  search: searchRecords,
  summarize: summarizeByCategory,
  writeReport: writeSummaryReport,
};

export const MENU_LINES = [
  'Welcome to the Stock Management Tool',
  '1. Consolidate CSV Files',
  '2. Search Data',
  '3. Generate Summary Report',
  '4. Exit',
];

const NO_DATA = 'No data available. Please consolidate CSV files first.';

export class MenuSession {
  private current: MenuState = { kind: 'MainMenu' };
  private table: ConsolidatedTable | null = null;

  constructor(private readonly ops: MenuOperations = defaultMenuOperations) {}

  get state(): MenuState {
    return this.current;
  }

  get done(): boolean {
    return this.current.kind === 'Exiting';
  }

  /** Records from the last successful consolidation, if any */
  get records(): readonly StockRecord[] | null {
    return this.table ? this.table.records : null;
  }

  prompt(): string {
    switch (this.current.kind) {
      case 'MainMenu':
        return 'Enter your choice: ';
      case 'AwaitingDirectoryInput':
        return 'Enter the directory containing CSV files: ';
      case 'AwaitingSearchParams':
        return this.current.column === undefined
          ? 'Enter the column to search: '
          : 'Enter the search value: ';
      case 'AwaitingOutputPath':
        return 'Enter the output file name for the summary report (or press Enter for default): ';
      case 'Exiting':
        return '';
    }
  }

  /**
   * Feed one line of user input; returns the lines to print
   */
  handle(input: string): string[] {
    const answer = input.trim();
    const state = this.current;

    switch (state.kind) {
      case 'MainMenu':
        return this.chooseOption(answer);
      case 'AwaitingDirectoryInput':
        return this.consolidate(answer);
      case 'AwaitingSearchParams':
        return state.column === undefined ? this.takeColumn(answer) : this.search(state.column, answer);
      case 'AwaitingOutputPath':
        return this.writeReport(answer);
      case 'Exiting':
        return [];
    }
  }

  /** Input ran out before the user chose Exit */
  endOfInput(): string[] {
    if (this.done) return [];
    this.current = { kind: 'Exiting' };
    return ['', 'Exiting the program. Goodbye!'];
  }

  private chooseOption(choice: string): string[] {
    switch (choice) {
      case '1':
        this.current = { kind: 'AwaitingDirectoryInput' };
        return [];
      case '2':
        if (!this.table) return [NO_DATA];
        this.current = { kind: 'AwaitingSearchParams' };
        return [];
      case '3':
        if (!this.table) return [NO_DATA];
        this.current = { kind: 'AwaitingOutputPath' };
        return [];
      case '4':
        this.current = { kind: 'Exiting' };
        return ['Exiting the program. Goodbye!'];
      default:
        return ['Invalid choice. Please try again.'];
    }
  }

  private consolidate(directory: string): string[] {
    this.current = { kind: 'MainMenu' };
    if (!directory || !this.ops.isDirectory(directory)) {
      return ['Invalid directory. Please try again.'];
    }
    try {
      this.table = this.ops.consolidate(directory);
    } catch (error) {
      return [`Error: ${describeError(error)}`];
    }
    const { records, sources, skipped } = this.table;
    const lines = [
      'CSV files consolidated successfully.',
      `Records: ${records.length} from ${sources.length} file(s)`,
    ];
    if (skipped.length > 0) {
      lines.push(`Skipped rows: ${skipped.length}`);
    }
    return lines;
  }

  private takeColumn(column: string): string[] {
    try {
      parseStockField(column);
    } catch (error) {
      this.current = { kind: 'MainMenu' };
      return [`Error: ${describeError(error)}`];
    }
    this.current = { kind: 'AwaitingSearchParams', column };
    return [];
  }

  private search(column: string, value: string): string[] {
    this.current = { kind: 'MainMenu' };
    if (!this.table) return [NO_DATA];
    try {
      return formatSearchResults(this.ops.search(this.table.records, column, value));
    } catch (error) {
      return [`Error: ${describeError(error)}`];
    }
  }

  private writeReport(outputFile: string): string[] {
    this.current = { kind: 'MainMenu' };
    if (!this.table) return [NO_DATA];
    try {
      const written = this.ops.writeReport(
        this.ops.summarize(this.table.records),
        outputFile || DEFAULT_REPORT_FILENAME
      );
      return [`Summary report saved to ${written}`];
    } catch (error) {
      return [`Error: ${describeError(error)}`];
    }
  }
}

export interface MenuStreams {
  input: Readable;
  output: Writable;
}

/**
 * Drive a session from a line-oriented input until Exit or end of input
 */
export async function runInteractiveMenu(
  session: MenuSession = new MenuSession(),
  streams: MenuStreams = { input: process.stdin, output: process.stdout }
): Promise<void> {
  const { input, output } = streams;
  const write = (lines: string[]) => {
    for (const line of lines) output.write(line + '\n');
  };

  const rl = createInterface({ input, terminal: false });

  try {
    write(MENU_LINES);
    output.write(session.prompt());

    for await (const line of rl) {
      write(session.handle(line));
      if (session.done) break;
      output.write(session.prompt());
    }

    write(session.endOfInput());
  } finally {
    rl.close();
  }
}
