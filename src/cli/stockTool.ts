#!/usr/bin/env node
/**
 * Stock Management Tool
 *
 * Consolidates stock CSV files, searches them and writes per-category reports.
 * Run without a command (or with `interactive`) for the numbered menu.
 *
 * RUN: npx tsx src/cli/stockTool.ts --help
 */

import { runCli } from './commands.js';

runCli(process.argv.slice(2))
  .then(code => {
    process.exitCode = code;
  })
  .catch(err => {
    console.error('[stock] Unhandled error:', err);
    process.exit(1);
  });
