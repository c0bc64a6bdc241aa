import { describe, it, expect } from 'vitest';
import { formatCounts, formatItem, summarize } from './summary.js';
import type { ItemResult } from './types.js';

describe('summary', () => {
  const results: ItemResult[] = [
    { target: 'web', item: 'a.txt', status: 'OK' },
    { target: 'admin', item: 'a.txt', status: 'SKIPPED', reason: 'Conflict' },
    { target: 'web', item: 'b.txt', status: 'FAILED', reason: 'Backup', detail: 'disk full' },
  ];

  it('should group by target in first-seen order', () => {
    const summary = summarize(results);
    expect(summary.targets.map((t) => t.target)).toEqual(['web', 'admin']);
    expect(summary.targets[0].items.map((i) => i.item)).toEqual(['a.txt', 'b.txt']);
    expect(summary.targets[0].counts.FAILED).toBe(1);
  });

  it('should count statuses and flag failures', () => {
    const summary = summarize(results);
    expect(summary.total).toBe(3);
    expect(summary.counts).toEqual({ OK: 1, APPLIED: 0, SKIPPED: 1, FAILED: 1, RESTORED: 0, REVERTED: 0 });
    expect(summary.hasFailures).toBe(true);
  });

  it('should not flag skips as failures', () => {
    expect(summarize([results[1]]).hasFailures).toBe(false);
  });

  it('should format items with their reason', () => {
    expect(formatItem(results[0])).toBe('a.txt -> web [OK]');
    expect(formatItem(results[1])).toBe('a.txt -> admin [SKIPPED: Conflict]');
  });

  it('should format non-zero counts', () => {
    expect(formatCounts(summarize(results).counts)).toBe('1 OK, 1 SKIPPED, 1 FAILED');
    expect(formatCounts(summarize([]).counts)).toBe('nothing to report');
  });
});
