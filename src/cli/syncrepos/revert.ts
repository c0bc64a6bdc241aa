/**
 * syncrepos revert - Undo a recorded session
 */

import type { CommandModule } from 'yargs';
import { DiscoveryError } from '../../lib/errors.js';
import { createSuccessResult } from '../../lib/json-output.js';
import { logger } from '../../lib/logger.js';
import { promptChoice } from '../../lib/prompts.js';
import type { DecisionPolicy } from '../../lib/sync/decisions.js';
import { previewRevert, revertSession } from '../../lib/sync/revert.js';
import type { SessionLedger } from '../../lib/sync/session.js';
import { summarize } from '../../lib/sync/summary.js';
import type { ItemResult } from '../../lib/sync/types.js';
import {
  printHeader,
  printItem,
  printJson,
  printRunSummary,
  printStatus,
  printTable,
  setJsonMode,
} from '../../lib/ui/index.js';
import {
  createPolicy,
  defaultDeps,
  isInteractive,
  missing,
  openWorkspace,
  reportFailure,
  runExitCode,
} from './workspace.js';
import type { CommandDeps, GlobalArgs, Workspace } from './workspace.js';

export interface RevertArgs extends GlobalArgs {
  session?: string;
  yes?: boolean;
  dryRun?: boolean;
  failOnError?: boolean;
  json?: boolean;
}

/**
 * Revert every entry of a loaded session and print the outcome
 */
export async function revertLedger(
  ws: Workspace,
  policy: DecisionPolicy,
  ledger: SessionLedger
): Promise<ItemResult[]> {
  printHeader(`Reverting session ${ledger.id}`);
  const results = await revertSession(
    { vcs: ws.vcs, policy, sessionDir: ws.store.sessionDir(ledger.id), onResult: printItem },
    ledger
  );
  printRunSummary('Revert complete', summarize(results), ledger.id);
  return results;
}

async function resolveSessionId(
  ws: Workspace,
  requested: string | undefined,
  interactive: boolean
): Promise<string> {
  if (requested && requested !== 'latest') {
    return requested;
  }

  const sessions = ws.store.listSessions();
  if (sessions.length === 0) {
    throw new DiscoveryError('No sessions recorded');
  }
  if (requested === 'latest') {
    return sessions[sessions.length - 1].id;
  }
  if (!interactive) {
    return missing('session id');
  }

  return promptChoice(
    'Select the session to revert:',
    [...sessions].reverse().map((s) => ({
      label: `${s.id}  ${s.strategy} from ${s.source}`,
      description: `${s.entries} item(s)${s.targets.length ? ` in ${s.targets.join(', ')}` : ''}`,
      value: s.id,
    }))
  );
}

export async function runRevert(args: RevertArgs, deps: CommandDeps = defaultDeps()): Promise<number> {
  setJsonMode(!!args.json);
  try {
    const ws = openWorkspace(args.root, deps.vcs, { discover: false });
    const interactive = isInteractive(args, deps);
    const policy = createPolicy(ws.config, interactive);

    const id = await resolveSessionId(ws, args.session, interactive);
    const ledger = ws.store.loadSession(id);
    const preview = previewRevert(ledger, ws.store.sessionDir(id));

    printTable({
      title: `Session ${id} (${ledger.strategy} from ${ledger.source})`,
      columns: ['Target', 'Item', 'Action'],
      rows: preview.map((p) => [p.target, p.item, p.available ? p.action : `${p.action} (backup missing)`]),
      emptyMessage: 'The session recorded no changes',
    });

    if (args.dryRun) {
      printJson(createSuccessResult('revert', { sessionId: id, dryRun: true, preview }));
      return 0;
    }

    const decision = await policy.decide({
      name: 'confirm-revert',
      message: `Revert session ${id} (${preview.length} item(s))?`,
    });
    if (decision !== 'proceed') {
      printStatus('info', 'Revert not confirmed; nothing was changed');
      printJson(createSuccessResult('revert', { sessionId: id, stopped: decision, results: [] }));
      return 0;
    }

    const results = await revertLedger(ws, policy, ledger);
    const summary = summarize(results);
    logger.info(`revert ${id}: ${results.length} item(s), failures=${summary.hasFailures}`);
    printJson(createSuccessResult('revert', { sessionId: id, results, counts: summary.counts }));
    return runExitCode(summary.hasFailures, args.failOnError);
  } catch (error) {
    return reportFailure('revert', error, !!args.json);
  }
}

export const revertCommand: CommandModule<object, RevertArgs> = {
  command: ['revert [session]', 'r'],
  describe: 'Revert a recorded session',
  builder: (yargs) => {
    return yargs
      .positional('session', {
        type: 'string',
        description: 'Session id, or "latest"',
      })
      .option('yes', {
        alias: 'y',
        type: 'boolean',
        description: 'Answer every confirmation from the configured gate table',
        default: false,
      })
      .option('dry-run', {
        type: 'boolean',
        description: 'Show what would be restored without changing anything',
        default: false,
      })
      .option('fail-on-error', {
        type: 'boolean',
        description: 'Exit with code 2 when any item failed',
        default: false,
      })
      .option('json', {
        alias: 'j',
        type: 'boolean',
        description: 'Output as JSON',
        default: false,
      })
      .example('$0 revert', 'Pick a session to revert')
      .example('$0 revert latest --yes', 'Revert the most recent session without prompts')
      .example('$0 revert 20260301101500 --dry-run', 'Preview a revert');
  },
  handler: async (argv) => {
    process.exitCode = await runRevert(argv);
  },
};
