/**
 * Run summaries
 */

import type { ItemResult, ItemStatus } from './types.js';

export interface TargetSummary {
  target: string;
  items: ItemResult[];
  counts: Record<ItemStatus, number>;
}

export interface RunSummary {
  total: number;
  counts: Record<ItemStatus, number>;
  targets: TargetSummary[];
  /** Whether any item FAILED */
  hasFailures: boolean;
}

function emptyCounts(): Record<ItemStatus, number> {
  return { OK: 0, APPLIED: 0, SKIPPED: 0, FAILED: 0, RESTORED: 0, REVERTED: 0 };
}

/**
 * Group results by target, in first-seen order, with per-status counts
 */
export function summarize(results: readonly ItemResult[]): RunSummary {
  const counts = emptyCounts();
  const byTarget = new Map<string, TargetSummary>();

  for (const item of results) {
    counts[item.status]++;
    let group = byTarget.get(item.target);
    if (!group) {
      group = { target: item.target, items: [], counts: emptyCounts() };
      byTarget.set(item.target, group);
    }
    group.items.push(item);
    group.counts[item.status]++;
  }

  return {
    total: results.length,
    counts,
    targets: [...byTarget.values()],
    hasFailures: counts.FAILED > 0,
  };
}

/**
 * One line per item: "path -> target [STATUS: Reason]"
 */
export function formatItem(item: ItemResult): string {
  const label = item.reason ? `${item.status}: ${item.reason}` : item.status;
  return `${item.item} -> ${item.target} [${label}]`;
}

/**
 * Non-zero counts as "3 OK, 1 SKIPPED"
 */
export function formatCounts(counts: Record<ItemStatus, number>): string {
  const parts = Object.entries(counts)
    .filter(([, n]) => n > 0)
    .map(([status, n]) => `${n} ${status}`);
  return parts.length > 0 ? parts.join(', ') : 'nothing to report';
}
