/**
 * Decision gates
 *
 * Every operator confirmation the engines need goes through a
 * DecisionPolicy. The interactive policy asks on the terminal; the table
 * policy answers from a pre-declared default per gate, for --yes runs and
 * sessions without a TTY.
 */

import { promptConfirm } from '../prompts.js';
import { UserCancelledError } from '../errors.js';
import { logger } from '../logger.js';

/**
 * Recognized outcomes of a gate
 */
export type Decision = 'proceed' | 'skip' | 'abort';

/**
 * - confirm-run: start mutating targets after the dry run
 * - copy-binaries: propagate files classified as binary (whole-file only)
 * - create-directory: create a missing destination directory
 * - conflict: overwrite a locally modified file, or apply a patch that failed its trial
 * - critical: overwrite a file matching a critical glob
 * - confirm-revert: revert the selected session
 * - revert-now: revert the session that just ran
 */
export type GateName =
  | 'confirm-run'
  | 'copy-binaries'
  | 'create-directory'
  | 'conflict'
  | 'critical'
  | 'confirm-revert'
  | 'revert-now';

export const GATE_NAMES: readonly GateName[] = [
  'confirm-run',
  'copy-binaries',
  'create-directory',
  'conflict',
  'critical',
  'confirm-revert',
  'revert-now',
];

export interface Gate {
  name: GateName;
  /** Question shown to the operator */
  message: string;
  /** Target repository the gate applies to, if any */
  target?: string;
  /** Relative path or directory the gate applies to, if any */
  subject?: string;
}

export interface DecisionPolicy {
  decide(gate: Gate): Promise<Decision>;
}

/**
 * Answers used when nobody is at the terminal
 */
export const DEFAULT_GATE_DECISIONS: Readonly<Record<GateName, Decision>> = {
  'confirm-run': 'proceed',
  'copy-binaries': 'proceed',
  'create-directory': 'proceed',
  conflict: 'skip',
  critical: 'skip',
  'confirm-revert': 'proceed',
  'revert-now': 'skip',
};

/**
 * Asks every gate on the terminal. Ctrl+C aborts the run.
 */
export class InteractivePolicy implements DecisionPolicy {
  private readonly confirm: (message: string, defaultValue: boolean) => Promise<boolean>;

  constructor(confirm: (message: string, defaultValue: boolean) => Promise<boolean> = promptConfirm) {
    this.confirm = confirm;
  }

  async decide(gate: Gate): Promise<Decision> {
    try {
      const yes = await this.confirm(gate.message, false);
      return yes ? 'proceed' : 'skip';
    } catch (error) {
      if (error instanceof UserCancelledError) {
        return 'abort';
      }
      throw error;
    }
  }
}

/**
 * Answers every gate from a fixed table
 */
export class TablePolicy implements DecisionPolicy {
  private readonly table: Readonly<Record<GateName, Decision>>;

  constructor(overrides: Partial<Record<GateName, Decision>> = {}) {
    this.table = { ...DEFAULT_GATE_DECISIONS, ...overrides };
  }

  async decide(gate: Gate): Promise<Decision> {
    const decision = this.table[gate.name];
    logger.info(`Gate ${gate.name}${gate.subject ? ` (${gate.subject})` : ''}: ${decision}`);
    return decision;
  }
}
