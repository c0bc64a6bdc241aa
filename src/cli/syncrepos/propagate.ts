/**
 * syncrepos propagate - Carry changes from one repository to its siblings
 *
 * Every choice can come from flags; whatever is missing is prompted for
 * on a terminal and is an error otherwise.
 */

import type { CommandModule } from 'yargs';
import { dim } from '../../lib/colors.js';
import { DiscoveryError } from '../../lib/errors.js';
import { createSuccessResult } from '../../lib/json-output.js';
import { logger } from '../../lib/logger.js';
import { findRepository, isValidRepository, selectTargets } from '../../lib/sync/discovery.js';
import { describeChangeSet, extract } from '../../lib/sync/extractor.js';
import { propagate } from '../../lib/sync/propagate.js';
import type { PropagateResult } from '../../lib/sync/propagate.js';
import { parseCommitList } from '../../lib/sync/selection.js';
import { summarize } from '../../lib/sync/summary.js';
import type {
  ChangeScope,
  ChangeSelection,
  ItemResult,
  SelectionMode,
  Strategy,
} from '../../lib/sync/types.js';
import {
  print,
  printHeader,
  printItem,
  printJson,
  printReports,
  printRunSummary,
  printStatus,
  setJsonMode,
} from '../../lib/ui/index.js';
import { revertLedger } from './revert.js';
import { promptSelection, promptSource, promptStrategy, promptTargets } from './selection-prompts.js';
import {
  createPolicy,
  defaultDeps,
  isInteractive,
  missing,
  openWorkspace,
  reportFailure,
  runExitCode,
} from './workspace.js';
import type { CommandDeps, GlobalArgs } from './workspace.js';

export interface PropagateArgs extends GlobalArgs {
  source?: string;
  targets?: string;
  strategy?: Strategy;
  mode?: SelectionMode;
  scope?: ChangeScope;
  commit?: string;
  commits?: string;
  range?: string;
  files?: string[];
  skipBinaries?: boolean;
  yes?: boolean;
  dryRun?: boolean;
  failOnError?: boolean;
  json?: boolean;
}

function inferMode(args: PropagateArgs): SelectionMode | undefined {
  if (args.mode) return args.mode;
  if (args.commit) return 'commit';
  if (args.range) return 'range';
  if (args.commits) return 'commits';
  if (args.files?.length) return 'manual';
  if (args.scope) return 'working-tree';
  return undefined;
}

/**
 * Selection given entirely by flags, or undefined when none was given
 */
export function selectionFromArgs(args: PropagateArgs): ChangeSelection | undefined {
  const mode = inferMode(args);
  switch (mode) {
    case undefined:
      return undefined;
    case 'working-tree':
      return { mode, scope: args.scope ?? 'both' };
    case 'commit':
      return { mode, commit: args.commit ?? missing('--commit') };
    case 'range':
      return { mode, range: args.range ?? missing('--range') };
    case 'commits':
      return { mode, commits: parseCommitList(args.commits ?? missing('--commits')) };
    case 'manual':
      return { mode, paths: args.files?.length ? args.files : missing('--files') };
  }
}

const STOPPED_MESSAGES: Record<NonNullable<PropagateResult['stopped']>, string> = {
  'dry-run': 'Dry run: no target was modified',
  declined: 'Run not confirmed; no target was modified',
  aborted: 'Run aborted; no target was modified',
};

export async function runPropagate(
  args: PropagateArgs,
  deps: CommandDeps = defaultDeps()
): Promise<number> {
  setJsonMode(!!args.json);
  try {
    const ws = openWorkspace(args.root, deps.vcs);
    const interactive = isInteractive(args, deps);
    const policy = createPolicy(ws.config, interactive);

    const source = args.source
      ? findRepository(ws.repositories, args.source)
      : interactive
        ? await promptSource(ws.repositories)
        : missing('--source');
    if (!isValidRepository(ws.vcs, source)) {
      throw new DiscoveryError(`${source.name} is not a valid git repository`);
    }

    const targets = args.targets
      ? selectTargets(ws.repositories, source, args.targets)
      : interactive
        ? await promptTargets(ws.repositories, source)
        : missing('--targets');

    const strategy = args.strategy ?? (interactive ? await promptStrategy() : 'file');
    const selection =
      selectionFromArgs(args) ??
      (interactive ? await promptSelection(ws, source) : missing('--mode'));

    const changeSet = extract(ws.vcs, source, selection, {
      strategy,
      excludeGlobs: ws.config.excludeGlobs,
      contextLines: ws.config.contextLines,
    });
    logger.info(
      `propagate ${describeChangeSet(changeSet)} from ${source.name} to ${targets.map((t) => t.name).join(', ')}`
    );

    printHeader(`Propagating ${describeChangeSet(changeSet)} from ${source.name}`);
    for (const p of changeSet.paths) {
      print(`  ${dim(p)}`);
    }

    const result = await propagate({
      vcs: ws.vcs,
      policy,
      store: ws.store,
      changeSet,
      targets,
      criticalGlobs: ws.config.criticalGlobs,
      skipBinaries: args.skipBinaries,
      dryRun: args.dryRun,
      onReports: printReports,
      onResult: printItem,
    });

    if (result.stopped) {
      printStatus('info', STOPPED_MESSAGES[result.stopped]);
    }

    const summary = summarize(result.results);
    if (result.sessionId) {
      printRunSummary('Propagation complete', summary, result.sessionId);
    }

    let reverted: ItemResult[] | undefined;
    if (result.sessionId) {
      const decision = await policy.decide({
        name: 'revert-now',
        message: `Revert session ${result.sessionId} now?`,
      });
      if (decision === 'proceed') {
        reverted = await revertLedger(ws, policy, ws.store.loadSession(result.sessionId));
      }
    }

    printJson(
      createSuccessResult('propagate', {
        source: source.name,
        targets: targets.map((t) => t.name),
        strategy,
        selection,
        paths: changeSet.paths,
        reports: result.reports,
        results: result.results,
        counts: summary.counts,
        sessionId: result.sessionId,
        stopped: result.stopped,
        reverted,
      })
    );

    const failed = summary.hasFailures || (reverted ? summarize(reverted).hasFailures : false);
    return runExitCode(failed, args.failOnError);
  } catch (error) {
    return reportFailure('propagate', error, !!args.json);
  }
}

export const propagateCommand: CommandModule<object, PropagateArgs> = {
  command: ['propagate', 'p'],
  describe: 'Propagate changes from a source repository to targets',
  builder: (yargs) => {
    return yargs
      .option('source', {
        alias: 's',
        type: 'string',
        description: 'Source repository (name or index)',
      })
      .option('targets', {
        alias: 't',
        type: 'string',
        description: 'Targets: names or indices separated by commas, or "all"',
      })
      .option('strategy', {
        choices: ['file', 'patch'] as const,
        description: 'Whole-file copy or patch application',
      })
      .option('mode', {
        alias: 'm',
        choices: ['working-tree', 'commit', 'range', 'commits', 'manual'] as const,
        description: 'What to propagate',
      })
      .option('scope', {
        choices: ['unstaged', 'staged', 'both'] as const,
        description: 'Working-tree changes to include',
      })
      .option('commit', {
        type: 'string',
        description: 'Commit to propagate',
      })
      .option('commits', {
        type: 'string',
        description: 'Commits to propagate, newest first, separated by commas or spaces',
      })
      .option('range', {
        type: 'string',
        description: 'Commit range <from>..<to>',
      })
      .option('files', {
        type: 'string',
        array: true,
        description: 'Changed files to propagate (manual mode)',
      })
      .option('skip-binaries', {
        type: 'boolean',
        description: 'Leave binary files out (whole-file strategy)',
      })
      .option('yes', {
        alias: 'y',
        type: 'boolean',
        description: 'Answer every confirmation from the configured gate table',
        default: false,
      })
      .option('dry-run', {
        alias: 'n',
        type: 'boolean',
        description: 'Probe the targets and stop before changing anything',
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
      .example('$0 propagate', 'Choose everything interactively')
      .example('$0 p -s api -t all --scope both', 'Copy working-tree changes to every sibling')
      .example('$0 p -s api -t web,admin --strategy patch --commit HEAD', 'Apply the last commit')
      .example('$0 p -s 0 -t 1 --range v1.2..v1.3 --strategy patch --dry-run', 'Probe a range');
  },
  handler: async (argv) => {
    process.exitCode = await runPropagate(argv);
  },
};
