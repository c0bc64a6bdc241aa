/**
 * Propagation run: probe, confirm, open a session, apply, close
 */

import fs from 'fs';
import os from 'os';
import path from 'path';
import { logger, setRunContext } from '../logger.js';
import { runApply } from './apply.js';
import type { DecisionPolicy } from './decisions.js';
import { probeAll } from './prober.js';
import { SessionStore } from './session.js';
import type { ChangeSet, CompatibilityReport, ItemResult, Repository, Vcs } from './types.js';

export interface PropagateOptions {
  vcs: Vcs;
  policy: DecisionPolicy;
  store: SessionStore;
  changeSet: ChangeSet;
  targets: readonly Repository[];
  criticalGlobs: readonly string[];
  /** Skip binaries; when undefined the copy-binaries gate decides (whole-file only) */
  skipBinaries?: boolean;
  /** Stop after the probes */
  dryRun?: boolean;
  onReports?: (reports: CompatibilityReport[]) => void;
  onResult?: (result: ItemResult) => void;
}

export interface PropagateResult {
  reports: CompatibilityReport[];
  results: ItemResult[];
  /** Session id when targets were mutated */
  sessionId?: string;
  /** Why the run stopped before applying, if it did */
  stopped?: 'dry-run' | 'declined' | 'aborted';
}

async function resolveSkipBinaries(options: PropagateOptions): Promise<boolean> {
  if (options.changeSet.kind !== 'files') return false;
  if (options.skipBinaries !== undefined) return options.skipBinaries;
  const decision = await options.policy.decide({
    name: 'copy-binaries',
    message: 'Copy binary files too?',
  });
  return decision !== 'proceed';
}

/**
 * Run one propagation of an extracted change set to the chosen targets
 */
export async function propagate(options: PropagateOptions): Promise<PropagateResult> {
  const { vcs, policy, store, changeSet, targets } = options;
  const skipBinaries = await resolveSkipBinaries(options);

  const scratch = fs.mkdtempSync(path.join(os.tmpdir(), 'syncrepos-'));
  try {
    let trialPatch: string | undefined;
    if (changeSet.kind === 'patch') {
      trialPatch = path.join(scratch, 'trial.patch');
      fs.writeFileSync(trialPatch, changeSet.content);
    }

    const reports = probeAll(vcs, targets, changeSet, trialPatch);
    options.onReports?.(reports);

    if (options.dryRun) {
      logger.info('Dry run: no target was modified');
      return { reports, results: [], stopped: 'dry-run' };
    }

    const decision = await policy.decide({
      name: 'confirm-run',
      message: `Apply to ${targets.length} target(s)?`,
    });
    if (decision !== 'proceed') {
      logger.info('Run not confirmed; no target was modified');
      return { reports, results: [], stopped: decision === 'abort' ? 'aborted' : 'declined' };
    }

    const session = store.openSession({
      strategy: changeSet.kind === 'files' ? 'file' : 'patch',
      source: changeSet.source.name,
      selection: changeSet.selection,
    });
    setRunContext({ sessionId: session.id });
    logger.info(`Session ${session.id} opened`);

    try {
      const patchFile = changeSet.kind === 'patch' ? session.storePatch(changeSet.content) : undefined;
      const results = await runApply(
        {
          vcs,
          session,
          policy,
          criticalGlobs: options.criticalGlobs,
          skipBinaries,
          reports: new Map(reports.map((r) => [r.target, r])),
          onResult: options.onResult,
        },
        changeSet,
        targets,
        patchFile
      );
      return { reports, results, sessionId: session.id };
    } finally {
      session.close();
    }
  } finally {
    fs.rmSync(scratch, { recursive: true, force: true });
  }
}
