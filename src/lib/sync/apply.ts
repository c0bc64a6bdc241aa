/**
 * Apply engine
 *
 * Mutates targets one item at a time. Every overwrite is preceded by a
 * backup recorded in the open session; an item whose backup fails is never
 * mutated. Results stream through `onResult` as they happen.
 */

import fs from 'fs';
import path from 'path';
import { BackupError, ConflictError, MutationError, PathError, errorMessage } from '../errors.js';
import { logger } from '../logger.js';
import type { DecisionPolicy } from './decisions.js';
import { isValidRepository } from './discovery.js';
import { describeChangeSet } from './extractor.js';
import { classifyFile, isCritical } from './policy.js';
import type { RepositoryBackupEntry, Session } from './session.js';
import type {
  ChangeSet,
  CompatibilityReport,
  FileChangeSet,
  ItemReason,
  ItemResult,
  ItemStatus,
  PatchChangeSet,
  Repository,
  Vcs,
} from './types.js';

export interface ApplyContext {
  vcs: Vcs;
  session: Session;
  policy: DecisionPolicy;
  criticalGlobs: readonly string[];
  /** Skip files classified as binary (whole-file strategy) */
  skipBinaries: boolean;
  /** Prober reports by target name */
  reports?: ReadonlyMap<string, CompatibilityReport>;
  onResult?: (result: ItemResult) => void;
}

function result(
  target: Repository,
  item: string,
  status: ItemStatus,
  reason?: ItemReason,
  detail?: string
): ItemResult {
  return { target: target.name, item, status, reason, detail };
}

/**
 * Item result for an error thrown while mutating one item
 */
export function failureResult(target: Repository, item: string, error: unknown): ItemResult {
  if (error instanceof PathError) {
    return result(target, item, 'FAILED', 'NoPath', error.message);
  }
  if (error instanceof BackupError) {
    return result(target, item, 'FAILED', 'Backup', error.message);
  }
  if (error instanceof ConflictError) {
    return result(target, item, 'SKIPPED', 'Conflict', error.message);
  }
  return result(target, item, 'FAILED', 'Mutation', errorMessage(error));
}

function ensureDirectory(dir: string): void {
  try {
    fs.mkdirSync(dir, { recursive: true });
  } catch (error) {
    throw new PathError(`Cannot create ${dir}: ${errorMessage(error)}`, { filePath: dir });
  }
}

function copyInto(target: Repository, sourceFile: string, destFile: string): void {
  try {
    fs.copyFileSync(sourceFile, destFile);
  } catch (error) {
    throw new MutationError(`Copy to ${target.name} failed: ${errorMessage(error)}`, {
      target: target.name,
    });
  }
}

function isDivergent(ctx: ApplyContext, target: Repository, relativePath: string): boolean {
  const flagged = ctx.reports?.get(target.name)?.files?.find((f) => f.path === relativePath);
  if (flagged) {
    return !flagged.compatible && flagged.reason !== 'new file';
  }
  return (
    fs.existsSync(path.join(target.root, relativePath)) &&
    ctx.vcs.isPathDivergent(target.root, relativePath)
  );
}

/**
 * Propagate one file from source to target
 */
export async function applyFile(
  ctx: ApplyContext,
  source: Repository,
  target: Repository,
  relativePath: string
): Promise<ItemResult> {
  const sourceFile = path.join(source.root, relativePath);
  const destFile = path.join(target.root, relativePath);

  if (!fs.existsSync(sourceFile) || !fs.statSync(sourceFile).isFile()) {
    return result(target, relativePath, 'FAILED', 'MissingSource', 'source file is missing');
  }

  const destDir = path.dirname(destFile);
  const needsDir = !fs.existsSync(destDir);
  if (needsDir) {
    const decision = await ctx.policy.decide({
      name: 'create-directory',
      message: `Create directory ${path.relative(target.root, destDir)} in ${target.name}?`,
      target: target.name,
      subject: path.relative(target.root, destDir),
    });
    if (decision === 'abort') {
      return result(target, relativePath, 'SKIPPED', 'Aborted');
    }
    if (decision === 'skip') {
      return result(target, relativePath, 'FAILED', 'NoPath', 'destination directory is missing');
    }
  }

  if (ctx.skipBinaries && classifyFile(sourceFile) === 'binary') {
    return result(target, relativePath, 'SKIPPED', 'Binary');
  }

  if (isDivergent(ctx, target, relativePath)) {
    const decision = await ctx.policy.decide({
      name: 'conflict',
      message: `${relativePath} has local changes in ${target.name}. Overwrite?`,
      target: target.name,
      subject: relativePath,
    });
    if (decision === 'abort') return result(target, relativePath, 'SKIPPED', 'Aborted');
    if (decision === 'skip') {
      return result(target, relativePath, 'SKIPPED', 'Conflict', 'local changes in target');
    }
  }

  if (isCritical(relativePath, ctx.criticalGlobs)) {
    const decision = await ctx.policy.decide({
      name: 'critical',
      message: `${relativePath} is a critical file. Overwrite it in ${target.name}?`,
      target: target.name,
      subject: relativePath,
    });
    if (decision === 'abort') return result(target, relativePath, 'SKIPPED', 'Aborted');
    if (decision === 'skip') return result(target, relativePath, 'SKIPPED', 'Critical');
  }

  if (!isValidRepository(ctx.vcs, target)) {
    return result(target, relativePath, 'FAILED', 'InvalidRepository', 'not a git repository');
  }

  // Directory creation waits until every gate has passed
  try {
    if (needsDir) {
      ensureDirectory(destDir);
    } else if (fs.existsSync(destFile)) {
      ctx.session.recordFileBackup(target, relativePath);
    }
    copyInto(target, sourceFile, destFile);
  } catch (error) {
    logger.error(`${relativePath} in ${target.name}: ${errorMessage(error)}`);
    return failureResult(target, relativePath, error);
  }

  const identical =
    fs.existsSync(destFile) && fs.readFileSync(sourceFile).equals(fs.readFileSync(destFile));
  if (!identical) {
    return result(target, relativePath, 'FAILED', 'Verify', 'copied file differs from source');
  }

  logger.debug(`Copied ${relativePath} -> ${target.name}`);
  return result(target, relativePath, 'OK');
}

/**
 * Apply a patch to one target: pre-state backup, apply, commit for working-tree diffs
 */
export async function applyPatch(
  ctx: ApplyContext,
  changeSet: PatchChangeSet,
  target: Repository,
  patchFile: string
): Promise<ItemResult> {
  const label = describeChangeSet(changeSet);
  const { vcs, session } = ctx;

  if (!isValidRepository(vcs, target)) {
    return result(target, label, 'FAILED', 'InvalidRepository', 'not a git repository');
  }

  const report = ctx.reports?.get(target.name);
  if (report && !report.compatible) {
    const decision = await ctx.policy.decide({
      name: 'conflict',
      message: `Patch did not pass its trial in ${target.name} (${report.reason}). Apply anyway?`,
      target: target.name,
      subject: label,
    });
    if (decision === 'abort') return result(target, label, 'SKIPPED', 'Aborted');
    if (decision === 'skip') return result(target, label, 'SKIPPED', 'Conflict', report.reason);
  }

  const baseCommit = vcs.headCommit(target.root);
  if (!baseCommit) {
    logger.error(`${target.name} has no commits; its pre-state cannot be recorded`);
    return result(
      target,
      label,
      'FAILED',
      'Backup',
      'target has no commits to record a pre-state against'
    );
  }

  let entry: RepositoryBackupEntry;
  try {
    const preState = vcs.diffWorkingTree(target.root, baseCommit);
    entry = session.recordRepositoryBackup(target, baseCommit, changeSet.patchKind, preState);
  } catch (error) {
    logger.error(`Backup of ${target.name} failed: ${errorMessage(error)}`);
    return failureResult(target, label, error);
  }

  const outcome = vcs.applyPatch(target.root, patchFile, changeSet.patchKind);
  if (!outcome.ok) {
    logger.error(`Patch failed in ${target.name}:\n${outcome.output}`);
    return result(target, label, 'FAILED', 'Mutation', 'patch did not apply');
  }
  if (outcome.output) {
    logger.debug(`Patch output for ${target.name}:\n${outcome.output}`);
  }

  if (changeSet.patchKind === 'diff') {
    const commit = vcs.commitTracked(
      target.root,
      `Sync apply (working tree) from ${changeSet.source.name} @ ${session.id}`,
      changeSet.paths
    );
    if (!commit.ok) {
      logger.warn(`Applied to ${target.name} but could not commit: ${commit.output}`);
    }
  }

  const appliedCommit = vcs.headCommit(target.root);
  if (appliedCommit && appliedCommit !== baseCommit) {
    try {
      session.recordAppliedCommit(entry, appliedCommit);
    } catch (error) {
      logger.error(
        `Applied to ${target.name} but could not record commit ${appliedCommit}; ` +
          `revert will leave ${target.name} as is: ${errorMessage(error)}`
      );
    }
  }

  return result(target, label, 'APPLIED');
}

function itemsOf(changeSet: ChangeSet): readonly string[] {
  return changeSet.kind === 'files' ? changeSet.paths : [describeChangeSet(changeSet)];
}

async function applyFilesTo(
  ctx: ApplyContext,
  changeSet: FileChangeSet,
  target: Repository,
  emit: (r: ItemResult) => void
): Promise<boolean> {
  for (let i = 0; i < changeSet.paths.length; i++) {
    const relativePath = changeSet.paths[i];
    let item: ItemResult;
    try {
      item = await applyFile(ctx, changeSet.source, target, relativePath);
    } catch (error) {
      logger.error(`Unexpected failure on ${relativePath} in ${target.name}: ${errorMessage(error)}`);
      item = failureResult(target, relativePath, error);
    }
    emit(item);
    if (item.reason === 'Aborted') {
      for (const rest of changeSet.paths.slice(i + 1)) {
        emit(result(target, rest, 'SKIPPED', 'Aborted'));
      }
      return false;
    }
  }
  return true;
}

/**
 * Whole-file propagation to every target, target by target
 */
export async function applyFiles(
  ctx: ApplyContext,
  changeSet: FileChangeSet,
  targets: readonly Repository[]
): Promise<ItemResult[]> {
  return runApply(ctx, changeSet, targets);
}

/**
 * Apply a change set to every target in order.
 * An abort answer at any gate skips everything not yet attempted.
 */
export async function runApply(
  ctx: ApplyContext,
  changeSet: ChangeSet,
  targets: readonly Repository[],
  patchFile?: string
): Promise<ItemResult[]> {
  const results: ItemResult[] = [];
  const emit = (r: ItemResult): void => {
    results.push(r);
    ctx.onResult?.(r);
  };

  let aborted = false;
  for (const target of targets) {
    if (aborted) {
      for (const item of itemsOf(changeSet)) {
        emit(result(target, item, 'SKIPPED', 'Aborted'));
      }
      continue;
    }

    logger.info(`Applying to ${target.name}`);
    if (changeSet.kind === 'files') {
      aborted = !(await applyFilesTo(ctx, changeSet, target, emit));
      continue;
    }

    if (!patchFile) {
      throw new Error('A patch file is required to apply a patch change set');
    }
    let item: ItemResult;
    try {
      item = await applyPatch(ctx, changeSet, target, patchFile);
    } catch (error) {
      logger.error(`Unexpected failure in ${target.name}: ${errorMessage(error)}`);
      item = failureResult(target, describeChangeSet(changeSet), error);
    }
    emit(item);
    aborted = item.reason === 'Aborted';
  }

  return results;
}
