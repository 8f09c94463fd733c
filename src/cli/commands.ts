/**
 * Stock tool command dispatch
 *
 * Parses argv into one of the commands below and runs it against the stock
 * operations. Returns the process exit code instead of exiting, so the entry
 * script owns process.exit.
 */

import { DEFAULT_REPORT_FILENAME } from '../config/env.js';
import { consolidateDirectory, writeConsolidatedCsv } from '../stock/consolidate.js';
import { describeError } from '../stock/errors.js';
import { formatSearchResults, formatSummaryTable } from '../stock/format.js';
import { searchRecords } from '../stock/search.js';
import { summarizeByCategory, writeSummaryReport } from '../stock/summary.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { defaultMenuOperations, MenuSession, runInteractiveMenu, type MenuStreams } from '../menu/interactiveMenu.js';

export type StockCommand =
  | { kind: 'help' }
  | { kind: 'interactive' }
  | { kind: 'consolidate'; directory: string; output?: string }
  | { kind: 'search'; directory: string; column: string; value: string }
  | { kind: 'summary'; directory: string; output?: string };

export type ParseResult =
  | { ok: true; command: StockCommand }
  | { ok: false; message: string };

export interface CliIO {
  out(line: string): void;
  err(line: string): void;
  logger: Logger;
  streams?: MenuStreams;
}

export const consoleIO: CliIO = {
  out: line => console.log(line),
  err: line => console.error(line),
  logger: createLogger('stock'),
};

export function usage(): string {
  return `
Stock Management Tool

Usage:
  stock-tool <command> [options]

Commands:
  consolidate   Merge every CSV file in a directory
                  --directory <path>   Directory containing CSV files (required)
                  --output <file>      Also write the merged rows to this CSV
  search        Consolidate, then list rows where a column equals a value
                  --directory <path>   Directory containing CSV files (required)
                  --column <name>      name | quantity | price | category (required)
                  --value <value>      Value to match (required)
  summary       Consolidate, then write total quantity and average price per category
                  --directory <path>   Directory containing CSV files (required)
                  --output <file>      Report file (default: ${DEFAULT_REPORT_FILENAME})
  interactive   Numbered menu on stdin/stdout (default when no command is given)

Options:
  -h, --help    Show this help

Input CSV files need a header row with name, quantity, price and category.
Rows with a missing field or a non-numeric quantity/price are skipped with a warning.

Environment:
  STOCK_LOG_LEVEL   debug | info | warn | error | silent (default: info)

Examples:
  npx tsx src/cli/stockTool.ts consolidate --directory ./samples
  npx tsx src/cli/stockTool.ts search --directory ./samples --column category --value Electronics
  npx tsx src/cli/stockTool.ts summary --directory ./samples --output summary.csv
`.trim();
}

/**
 * Read `--name value` or `--name=value`. The argument after a named flag is
 * its value whatever it looks like; undefined means the flag is absent.
 */
function readFlag(args: string[], name: string): string | undefined {
  const flag = `--${name}`;
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === flag) {
      return args[i + 1];
    }
    if (arg.startsWith(`${flag}=`)) {
      return arg.slice(flag.length + 1);
    }
  }
  return undefined;
}

function missingFlags(args: string[], names: readonly string[]): string[] {
  return names.filter(name => readFlag(args, name) === undefined).map(name => `--${name}`);
}

function missingResult(command: string, missing: string[]): ParseResult {
  return { ok: false, message: `${command}: missing required option(s) ${missing.join(', ')}` };
}

export function parseArgs(argv: string[]): ParseResult {
  if (argv.includes('--help') || argv.includes('-h')) {
    return { ok: true, command: { kind: 'help' } };
  }

  const [name, ...args] = argv;

  switch (name) {
    case undefined:
    case 'interactive':
      return { ok: true, command: { kind: 'interactive' } };
    case 'help':
      return { ok: true, command: { kind: 'help' } };
    case 'consolidate':
    case 'summary': {
      const missing = missingFlags(args, ['directory']);
      if (missing.length > 0) return missingResult(name, missing);
      return {
        ok: true,
        command: { kind: name, directory: readFlag(args, 'directory') ?? '', output: readFlag(args, 'output') },
      };
    }
    case 'search': {
      const missing = missingFlags(args, ['directory', 'column', 'value']);
      if (missing.length > 0) return missingResult(name, missing);
      return {
        ok: true,
        command: {
          kind: 'search',
          directory: readFlag(args, 'directory') ?? '',
          column: readFlag(args, 'column') ?? '',
          value: readFlag(args, 'value') ?? '',
        },
      };
    }
    default:
      return { ok: false, message: `Unknown command: ${name}` };
  }
}

async function execute(command: StockCommand, io: CliIO): Promise<void> {
  switch (command.kind) {
    case 'help':
      io.out(usage());
      return;

    case 'interactive':
      await runInteractiveMenu(
        new MenuSession({
          ...defaultMenuOperations,
          consolidate: directory => consolidateDirectory(directory, { logger: io.logger }),
        }),
        io.streams
      );
      return;

    case 'consolidate': {
      const table = consolidateDirectory(command.directory, { logger: io.logger });
      io.out('✅ CSV files consolidated successfully.');
      io.out(`   Files: ${table.sources.length} | Records: ${table.records.length} | Skipped rows: ${table.skipped.length}`);
      if (command.output) {
        const written = writeConsolidatedCsv(table.records, command.output);
        io.out(`📁 Saved to: ${written}`);
      }
      return;
    }

    case 'search': {
      const table = consolidateDirectory(command.directory, { logger: io.logger });
      for (const line of formatSearchResults(searchRecords(table.records, command.column, command.value))) {
        io.out(line);
      }
      return;
    }

    case 'summary': {
      const table = consolidateDirectory(command.directory, { logger: io.logger });
      const rows = summarizeByCategory(table.records);
      const written = writeSummaryReport(rows, command.output ?? DEFAULT_REPORT_FILENAME);
      for (const line of formatSummaryTable(rows)) {
        io.out(line);
      }
      io.out(`✅ Summary report saved to ${written}`);
      return;
    }
  }
}

/**
 * Run the tool for the given arguments (without node and script path)
 */
export async function runCli(argv: string[], io: CliIO = consoleIO): Promise<number> {
  const parsed = parseArgs(argv);
  if (!parsed.ok) {
    io.err(`❌ ${parsed.message}`);
    io.err('');
    io.err(usage());
    return 1;
  }

  try {
    await execute(parsed.command, io);
    return 0;
  } catch (error) {
    io.err(`❌ Error: ${describeError(error)}`);
    return 1;
  }
}
