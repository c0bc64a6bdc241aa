/**
 * Operator selection parsing: index lists, commit ids, ranges
 */

import { SelectionError } from '../errors.js';

/**
 * Parse an index list such as "0 2 3" or "1,4".
 * "a" or "all" selects every index when allowed.
 * Indices are returned de-duplicated in the order given.
 */
export function parseIndexSelection(
  input: string,
  count: number,
  options: { allowAll?: boolean } = {}
): number[] {
  const trimmed = input.trim();
  if (!trimmed) {
    throw new SelectionError('No selection entered', { input });
  }

  if (options.allowAll && ['a', 'all'].includes(trimmed.toLowerCase())) {
    return Array.from({ length: count }, (_, i) => i);
  }

  const indices: number[] = [];
  for (const token of trimmed.split(/[\s,]+/).filter(Boolean)) {
    if (!/^\d+$/.test(token)) {
      throw new SelectionError(`Invalid index: ${token}`, { input });
    }
    const index = parseInt(token, 10);
    if (index >= count) {
      throw new SelectionError(`Index out of range: ${index} (0-${count - 1})`, { input });
    }
    if (!indices.includes(index)) {
      indices.push(index);
    }
  }
  return indices;
}

/**
 * Split "a..b" into its ends. Three-dot and open-ended ranges are rejected.
 */
export function parseRange(range: string): { from: string; to: string } {
  const match = range.trim().match(/^([^.\s][^\s]*?)\.\.([^.\s][^\s]*)$/);
  if (!match || range.includes('...')) {
    throw new SelectionError(`Malformed commit range: ${range} (expected <from>..<to>)`, {
      input: range,
    });
  }
  return { from: match[1], to: match[2] };
}

/**
 * Split a list of commit ids separated by spaces or commas
 */
export function parseCommitList(input: string): string[] {
  const commits = input
    .trim()
    .split(/[\s,]+/)
    .filter(Boolean);
  if (commits.length === 0) {
    throw new SelectionError('No commits entered', { input });
  }
  return commits;
}
