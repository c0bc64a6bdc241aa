/**
 * Column-aligned tables for session listings and revert previews
 */

import * as colors from '../colors.js';
import { box } from './theme.js';
import { print } from './output.js';

export interface TableOptions {
  /** Bold title printed above the table */
  title?: string;
  columns: string[];
  rows: string[][];
  /** Printed dimmed instead of the table when there are no rows */
  emptyMessage?: string;
}

/**
 * Print rows under a header line, each column padded to its widest cell
 */
export function printTable(options: TableOptions): void {
  if (options.title) {
    print('');
    print(colors.bold(options.title));
    print('');
  }

  if (options.rows.length === 0) {
    if (options.emptyMessage) {
      print(colors.dim(`  ${options.emptyMessage}`));
    }
    return;
  }

  const widths = options.columns.map((column, i) =>
    Math.max(column.length, ...options.rows.map((row) => (row[i] ?? '').length))
  );
  const line = (cells: string[]) =>
    `  ${cells.map((cell, i) => cell.padEnd(widths[i])).join('  ')}`.trimEnd();

  print(colors.bold(line(options.columns)));
  print(colors.dim(`  ${widths.map((w) => box.line.repeat(w)).join('  ')}`));
  for (const row of options.rows) {
    print(line(row));
  }
}
