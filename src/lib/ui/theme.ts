/**
 * Raw icons and box-drawing characters.
 * colors.ts combines them with color for the semantic helpers.
 */

import * as colors from '../colors.js';
import type { ItemStatus } from '../sync/types.js';

export const icons = {
  success: '✓',
  error: '✗',
  warning: '⚠',
  info: 'ℹ',
  bullet: '•',
  arrow: '→',
} as const;

export const box = {
  horizontal: '═',
  line: '─',
} as const;

/**
 * "[STATUS: Reason]" with the status colored
 */
export function statusBadge(status: ItemStatus, reason?: string): string {
  const label = reason ? `${colors.status(status)}: ${reason}` : colors.status(status);
  return `[${label}]`;
}
