/**
 * Non-mutating compatibility checks, one report per target
 */

import fs from 'fs';
import path from 'path';
import { logger } from '../logger.js';
import { isValidRepository } from './discovery.js';
import type {
  ChangeSet,
  CompatibilityReport,
  FileCompatibility,
  Repository,
  Vcs,
} from './types.js';

function firstLine(output: string): string {
  return output.split('\n').find((line) => line.trim()) ?? '';
}

function probeFile(vcs: Vcs, target: Repository, relativePath: string): FileCompatibility {
  if (!fs.existsSync(path.join(target.root, relativePath))) {
    return { path: relativePath, compatible: true, reason: 'new file' };
  }
  if (vcs.isPathDivergent(target.root, relativePath)) {
    return { path: relativePath, compatible: false, reason: 'local changes in target' };
  }
  return { path: relativePath, compatible: true, reason: 'clean' };
}

/**
 * Check whether a change set can be applied to a target.
 * Leaves the target exactly as found: a trial that starts an `am` session is unwound.
 */
export function probe(
  vcs: Vcs,
  target: Repository,
  changeSet: ChangeSet,
  patchFile?: string
): CompatibilityReport {
  if (!isValidRepository(vcs, target)) {
    return { target: target.name, compatible: false, reason: 'not a git repository' };
  }

  if (changeSet.kind === 'files') {
    const files = changeSet.paths.map((p) => probeFile(vcs, target, p));
    const divergent = files.filter((f) => !f.compatible).length;
    return {
      target: target.name,
      compatible: divergent === 0,
      reason: divergent === 0 ? 'no local changes' : `${divergent} file(s) with local changes`,
      files,
    };
  }

  if (!patchFile) {
    throw new Error('A patch file is required to probe a patch change set');
  }

  const inProgressBefore = vcs.isApplyInProgress(target.root);
  if (inProgressBefore) {
    return { target: target.name, compatible: false, reason: 'an apply session is already in progress' };
  }

  const outcome = vcs.checkPatch(target.root, patchFile, changeSet.patchKind);
  if (vcs.isApplyInProgress(target.root)) {
    const abort = vcs.abortApply(target.root);
    if (!abort.ok) {
      logger.error(`Could not unwind trial apply in ${target.name}: ${abort.output}`);
    }
  }

  if (outcome.ok) {
    return { target: target.name, compatible: true, reason: 'applies cleanly' };
  }
  logger.debug(`Trial apply in ${target.name} failed:\n${outcome.output}`);
  return {
    target: target.name,
    compatible: false,
    reason: firstLine(outcome.output) || 'patch does not apply',
  };
}

/**
 * Probe every target in order
 */
export function probeAll(
  vcs: Vcs,
  targets: readonly Repository[],
  changeSet: ChangeSet,
  patchFile?: string
): CompatibilityReport[] {
  return targets.map((target) => probe(vcs, target, changeSet, patchFile));
}
