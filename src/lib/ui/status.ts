/**
 * Status and run output for the CLI
 */

import * as colors from '../colors.js';
import type { RunSummary } from '../sync/summary.js';
import { formatCounts } from '../sync/summary.js';
import type { CompatibilityReport, ItemResult } from '../sync/types.js';
import { box, icons, statusBadge } from './theme.js';
import { print } from './output.js';

type StatusType = 'success' | 'error' | 'warning' | 'info';

const statusFn: Record<StatusType, (msg: string) => string> = {
  success: colors.success,
  error: colors.error,
  warning: colors.warning,
  info: colors.info,
};

/**
 * Print a message with the icon and color of its status
 */
export function printStatus(type: StatusType, message: string): void {
  print(statusFn[type](message));
}

/**
 * Blank line, bold title, blank line
 */
export function printHeader(title: string): void {
  print('');
  print(colors.bold(title));
  print('');
}

export function printDetail(label: string, value: string, indent: number = 2): void {
  print(`${' '.repeat(indent)}${label}: ${value}`);
}

export function printDim(message: string, indent: number = 0): void {
  print(`${' '.repeat(indent)}${colors.dim(message)}`);
}

/**
 * Dry-run output: one block per target, per-file flags underneath
 */
export function printReports(reports: readonly CompatibilityReport[]): void {
  printHeader('Compatibility');
  for (const report of reports) {
    const mark = report.compatible ? colors.green(icons.success) : colors.yellow(icons.warning);
    print(`  ${mark} ${colors.bold(report.target)} ${colors.dim(report.reason)}`);
    for (const file of report.files ?? []) {
      const text = `${file.path} (${file.reason})`;
      print(`      ${file.compatible ? colors.dim(text) : colors.yellow(text)}`);
    }
  }
  print('');
}

/**
 * "path -> target [STATUS: Reason]", printed as results arrive
 */
export function printItem(item: ItemResult): void {
  const line = `  ${item.item} ${icons.arrow} ${item.target} ${statusBadge(item.status, item.reason)}`;
  print(item.detail ? `${line} ${colors.dim(item.detail)}` : line);
}

/**
 * Box-framed totals, one line per target
 */
export function printRunSummary(title: string, summary: RunSummary, sessionId?: string): void {
  const border = box.horizontal.repeat(58);
  const color = summary.hasFailures ? colors.red : colors.green;

  print('');
  print(color(border));
  print(color(`  ${title}`));
  print(color(border));
  print('');

  const width = Math.max(0, ...summary.targets.map((t) => t.target.length));
  for (const group of summary.targets) {
    print(`  ${group.target.padEnd(width + 4)}${formatCounts(group.counts)}`);
  }
  if (summary.targets.length > 0) {
    print('');
  }
  print(`  ${colors.bold('Total')}: ${formatCounts(summary.counts)}`);
  if (sessionId) {
    print(`  ${colors.bold('Session')}: ${sessionId}`);
  }
  print('');
}
