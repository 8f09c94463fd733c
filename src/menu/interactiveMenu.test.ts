import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import os from 'os';
import path from 'path';
import { Readable, Writable } from 'stream';
import { consolidateDirectory } from '../stock/consolidate.js';
import { silentLogger } from '../utils/logger.js';
import { defaultMenuOperations, MENU_LINES, MenuSession, runInteractiveMenu, type MenuOperations } from './interactiveMenu.js';

const NO_DATA = 'No data available. Please consolidate CSV files first.';

function quietOperations(overrides: Partial<MenuOperations> = {}): MenuOperations {
  return {
    ...defaultMenuOperations,
    consolidate: directory => consolidateDirectory(directory, { logger: silentLogger }),
    ...overrides,
  };
}

describe('MenuSession', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(path.join(os.tmpdir(), 'stock-menu-'));
    writeFileSync(
      path.join(dir, 'stock.csv'),
      'name,quantity,price,category\nSprocket,12,3.5,Widgets\nLaptop,5,999.99,Electronics\nGear,12,7,Widgets\n'
    );
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  const consolidated = () => {
    const session = new MenuSession(quietOperations());
    session.handle('1');
    session.handle(dir);
    return session;
  };

  it('starts at the main menu', () => {
    const session = new MenuSession(quietOperations());

    expect(session.state).toEqual({ kind: 'MainMenu' });
    expect(session.prompt()).toBe('Enter your choice: ');
    expect(session.records).toBeNull();
  });

  it('refuses search and summary before any consolidation', () => {
    const session = new MenuSession(quietOperations());

    expect(session.handle('2')).toEqual([NO_DATA]);
    expect(session.handle('3')).toEqual([NO_DATA]);
    expect(session.state).toEqual({ kind: 'MainMenu' });
  });

  it('rejects unknown choices', () => {
    const session = new MenuSession(quietOperations());

    expect(session.handle('7')).toEqual(['Invalid choice. Please try again.']);
    expect(session.handle('')).toEqual(['Invalid choice. Please try again.']);
    expect(session.state).toEqual({ kind: 'MainMenu' });
  });

  it('returns to the menu on an invalid directory', () => {
    const session = new MenuSession(quietOperations());

    expect(session.handle('1')).toEqual([]);
    expect(session.state).toEqual({ kind: 'AwaitingDirectoryInput' });
    expect(session.prompt()).toBe('Enter the directory containing CSV files: ');
    expect(session.handle(path.join(dir, 'nope'))).toEqual(['Invalid directory. Please try again.']);
    expect(session.state).toEqual({ kind: 'MainMenu' });
  });

  it('consolidates a directory and keeps the table for later choices', () => {
    const session = new MenuSession(quietOperations());
    session.handle('1');

    expect(session.handle(`  ${dir}  `)).toEqual(['CSV files consolidated successfully.', 'Records: 3 from 1 file(s)']);
    expect(session.state).toEqual({ kind: 'MainMenu' });
    expect(session.records).toHaveLength(3);
  });

  it('reports consolidation errors and stays usable', () => {
    const empty = mkdtempSync(path.join(os.tmpdir(), 'stock-menu-empty-'));
    try {
      const session = new MenuSession(quietOperations());
      session.handle('1');

      expect(session.handle(empty)).toEqual([`Error: No CSV files found in ${empty}.`]);
      expect(session.state).toEqual({ kind: 'MainMenu' });
      expect(session.handle('4')).toEqual(['Exiting the program. Goodbye!']);
    } finally {
      rmSync(empty, { recursive: true, force: true });
    }
  });

  it('asks for the column, then the value, then prints matches', () => {
    const session = consolidated();

    expect(session.handle('2')).toEqual([]);
    expect(session.prompt()).toBe('Enter the column to search: ');
    expect(session.handle('name')).toEqual([]);
    expect(session.state).toEqual({ kind: 'AwaitingSearchParams', column: 'name' });
    expect(session.prompt()).toBe('Enter the search value: ');
    expect(session.handle('Gear')).toEqual([
      'Search Results:',
      'name  quantity  price  category',
      'Gear  12        7      Widgets',
    ]);
    expect(session.state).toEqual({ kind: 'MainMenu' });
  });

  it('prints a message when the search matches nothing', () => {
    const session = consolidated();
    session.handle('2');
    session.handle('category');

    expect(session.handle('Gadgets')).toEqual(['No matching records found.']);
  });

  it('rejects an unknown column before asking for a value', () => {
    const session = consolidated();
    session.handle('2');

    expect(session.handle('color')).toEqual([
      "Error: Column 'color' not found. Expected one of: name, quantity, price, category.",
    ]);
    expect(session.state).toEqual({ kind: 'MainMenu' });
  });

  it('writes the summary report to the given file', () => {
    const session = consolidated();
    const file = path.join(dir, 'out.csv');

    expect(session.handle('3')).toEqual([]);
    expect(session.state).toEqual({ kind: 'AwaitingOutputPath' });
    expect(session.handle(file)).toEqual([`Summary report saved to ${file}`]);
    expect(readFileSync(file, 'utf-8')).toBe(
      'category,total_quantity,average_price\nWidgets,24,5.25\nElectronics,5,999.99\n'
    );
  });

  it('uses report.csv when no output file is given', () => {
    const writeReport = jest.fn<string, Parameters<MenuOperations['writeReport']>>(() => '/work/report.csv');
    const session = new MenuSession(quietOperations({ writeReport }));
    session.handle('1');
    session.handle(dir);
    session.handle('3');

    expect(session.handle('   ')).toEqual(['Summary report saved to /work/report.csv']);
    expect(writeReport).toHaveBeenCalledTimes(1);
    expect(writeReport.mock.calls[0][1]).toBe('report.csv');
  });

  it('reports write failures and returns to the menu', () => {
    const session = consolidated();
    session.handle('3');

    const file = path.join(dir, 'missing', 'out.csv');
    const lines = session.handle(file);

    expect(lines).toHaveLength(1);
    expect(lines[0].startsWith(`Error: Could not write ${file}:`)).toBe(true);
    expect(session.state).toEqual({ kind: 'MainMenu' });
  });

  it('exits on 4 and ignores further input', () => {
    const session = new MenuSession(quietOperations());

    expect(session.handle('4')).toEqual(['Exiting the program. Goodbye!']);
    expect(session.done).toBe(true);
    expect(session.handle('1')).toEqual([]);
    expect(session.endOfInput()).toEqual([]);
  });
});

describe('runInteractiveMenu', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(path.join(os.tmpdir(), 'stock-menu-run-'));
    writeFileSync(path.join(dir, 'stock.csv'), 'name,quantity,price,category\nGear,12,7,Widgets\n');
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function capture(): { output: Writable; text: () => string } {
    const chunks: string[] = [];
    const output = new Writable({
      write(chunk, _encoding, callback) {
        chunks.push(String(chunk));
        callback();
      },
    });
    return { output, text: () => chunks.join('') };
  }

  it('drives a session from input lines until exit', async () => {
    const { output, text } = capture();
    const input = Readable.from([`1\n${dir}\n2\nname\nGear\n4\n`]);

    await runInteractiveMenu(new MenuSession(quietOperations()), { input, output });

    expect(text()).toBe(
      [
        ...MENU_LINES,
        'Enter your choice: Enter the directory containing CSV files: CSV files consolidated successfully.',
        'Records: 1 from 1 file(s)',
        'Enter your choice: Enter the column to search: Enter the search value: Search Results:',
        'name  quantity  price  category',
        'Gear  12        7      Widgets',
        'Enter your choice: Exiting the program. Goodbye!',
        '',
      ].join('\n')
    );
  });

  it('exits when input ends', async () => {
    const { output, text } = capture();
    const input = Readable.from(['9\n']);

    await runInteractiveMenu(new MenuSession(quietOperations()), { input, output });

    expect(text()).toBe(
      [
        ...MENU_LINES,
        'Enter your choice: Invalid choice. Please try again.',
        'Enter your choice: ',
        'Exiting the program. Goodbye!',
        '',
      ].join('\n')
    );
  });
});
