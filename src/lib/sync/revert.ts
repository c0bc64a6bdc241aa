/**
 * Revert engine
 *
 * Restores every target recorded in a session ledger to its pre-session
 * state. File entries copy the backup over the live file. Repository
 * entries reverse only the commits the session produced (base..applied),
 * commit that, then reapply the uncommitted edits recorded before the run.
 * Later work on the target is kept. A session whose changes no longer
 * reverse cleanly, including one already reverted, is skipped untouched.
 */

import fs from 'fs';
import os from 'os';
import path from 'path';
import { ConflictError, errorMessage } from '../errors.js';
import { logger } from '../logger.js';
import { failureResult } from './apply.js';
import type { DecisionPolicy } from './decisions.js';
import type {
  FileBackupEntry,
  LedgerEntry,
  RepositoryBackupEntry,
  SessionLedger,
} from './session.js';
import type { ItemResult, Repository, Vcs } from './types.js';

export interface RevertContext {
  vcs: Vcs;
  policy: DecisionPolicy;
  /** Directory holding the session's artifacts */
  sessionDir: string;
  onResult?: (result: ItemResult) => void;
}

export interface RevertPreviewItem {
  target: string;
  item: string;
  action: string;
  available: boolean;
}

function entryItem(entry: LedgerEntry): string {
  return entry.kind === 'file' ? entry.relativePath : `repository @ ${shortId(entry.baseCommit)}`;
}

function shortId(commit: string): string {
  return commit.slice(0, 7);
}

/**
 * What a revert would do, entry by entry, in execution order
 */
export function previewRevert(ledger: SessionLedger, sessionDir: string): RevertPreviewItem[] {
  return [...ledger.entries].reverse().map((entry) => {
    const available = fs.existsSync(path.join(sessionDir, entry.artifact));
    const action =
      entry.kind === 'file'
        ? `restore ${entry.relativePath}`
        : entry.appliedCommit
          ? `reverse ${shortId(entry.baseCommit)}..${shortId(entry.appliedCommit)}` +
            (entry.patchKind === 'diff' ? ' and reapply local edits' : '')
          : 'check nothing was applied';
    return { target: entry.target, item: entryItem(entry), action, available };
  });
}

function repositoryOf(entry: LedgerEntry): Repository {
  return { name: entry.target, root: entry.targetRoot };
}

async function restoreFile(ctx: RevertContext, entry: FileBackupEntry): Promise<ItemResult> {
  const base = { target: entry.target, item: entry.relativePath };
  const backup = path.join(ctx.sessionDir, entry.artifact);
  const live = path.join(entry.targetRoot, entry.relativePath);

  if (!fs.existsSync(backup)) {
    return { ...base, status: 'FAILED', reason: 'MissingBackup', detail: 'backup artifact is missing' };
  }

  const liveDir = path.dirname(live);
  if (!fs.existsSync(liveDir)) {
    const decision = await ctx.policy.decide({
      name: 'create-directory',
      message: `Recreate directory ${path.relative(entry.targetRoot, liveDir)} in ${entry.target}?`,
      target: entry.target,
      subject: path.relative(entry.targetRoot, liveDir),
    });
    if (decision === 'abort') return { ...base, status: 'SKIPPED', reason: 'Aborted' };
    if (decision === 'skip') {
      return { ...base, status: 'SKIPPED', reason: 'NoPath', detail: 'directory is missing' };
    }
    fs.mkdirSync(liveDir, { recursive: true });
  }

  fs.copyFileSync(backup, live);
  if (!fs.readFileSync(backup).equals(fs.readFileSync(live))) {
    return { ...base, status: 'FAILED', reason: 'Verify', detail: 'restored file differs from backup' };
  }
  return { ...base, status: 'RESTORED' };
}

function revertRepository(
  ctx: RevertContext,
  entry: RepositoryBackupEntry,
  sessionId: string
): ItemResult {
  const base = { target: entry.target, item: entryItem(entry) };
  const { vcs } = ctx;
  const repo = repositoryOf(entry);

  if (!vcs.isWorkTree(repo.root)) {
    return { ...base, status: 'FAILED', reason: 'InvalidRepository', detail: 'not a git repository' };
  }
  const preStateFile = path.join(ctx.sessionDir, entry.artifact);
  if (!fs.existsSync(preStateFile)) {
    return { ...base, status: 'FAILED', reason: 'MissingBackup', detail: 'pre-state artifact is missing' };
  }

  if (!entry.appliedCommit) {
    return checkUnlanded(ctx, entry, preStateFile);
  }

  const range = `${entry.baseCommit}..${entry.appliedCommit}`;
  const delta = vcs.diffCommits(repo.root, entry.baseCommit, entry.appliedCommit);
  if (delta.length === 0) {
    return { ...base, status: 'REVERTED', detail: 'session changed nothing' };
  }

  const scratch = fs.mkdtempSync(path.join(os.tmpdir(), 'syncrepos-revert-'));
  try {
    const deltaFile = path.join(scratch, 'delta.patch');
    fs.writeFileSync(deltaFile, delta);
    const reversed = vcs.applyDiff(repo.root, deltaFile, { reverse: true });
    if (!reversed.ok) {
      logger.debug(`Reverse apply of ${range} in ${entry.target}:\n${reversed.output}`);
      throw new ConflictError('session changes no longer reverse cleanly; target left as is', {
        target: entry.target,
      });
    }
  } finally {
    fs.rmSync(scratch, { recursive: true, force: true });
  }

  const touched = vcs.changedPaths(repo.root, { kind: 'range', range });
  const commit = vcs.commitPaths(repo.root, `Revert sync session ${sessionId}`, touched);
  if (!commit.ok) {
    logger.warn(`Reverted ${entry.target} but could not commit: ${commit.output}`);
  }

  if (entry.patchKind === 'diff' && fs.statSync(preStateFile).size > 0) {
    const restored = vcs.applyDiff(repo.root, preStateFile, { reverse: false });
    if (!restored.ok) {
      logger.error(`Could not reapply local edits in ${entry.target}:\n${restored.output}`);
      return {
        ...base,
        status: 'FAILED',
        reason: 'Mutation',
        detail: `local edits not restored; they remain in ${preStateFile}`,
      };
    }
  }

  return { ...base, status: 'REVERTED' };
}

/**
 * An entry whose patch never produced a commit: the target is reverted only
 * if it still matches the recorded pre-state.
 */
function checkUnlanded(
  ctx: RevertContext,
  entry: RepositoryBackupEntry,
  preStateFile: string
): ItemResult {
  const base = { target: entry.target, item: entryItem(entry) };
  const head = ctx.vcs.headCommit(entry.targetRoot);
  if (head !== entry.baseCommit) {
    return {
      ...base,
      status: 'SKIPPED',
      reason: 'Conflict',
      detail: `HEAD moved from ${shortId(entry.baseCommit)} without a recorded apply; target left as is`,
    };
  }
  const current = ctx.vcs.diffWorkingTree(entry.targetRoot, entry.baseCommit);
  if (current.equals(fs.readFileSync(preStateFile))) {
    return { ...base, status: 'REVERTED', detail: 'nothing was applied' };
  }
  return {
    ...base,
    status: 'SKIPPED',
    reason: 'Conflict',
    detail: `working tree changed since the session; pre-state kept in ${preStateFile}`,
  };
}

/**
 * Revert every entry of a session, most recent first
 */
export async function revertSession(
  ctx: RevertContext,
  ledger: SessionLedger
): Promise<ItemResult[]> {
  const results: ItemResult[] = [];
  let aborted = false;

  for (const entry of [...ledger.entries].reverse()) {
    let item: ItemResult;
    if (aborted) {
      item = { target: entry.target, item: entryItem(entry), status: 'SKIPPED', reason: 'Aborted' };
    } else {
      try {
        item =
          entry.kind === 'file'
            ? await restoreFile(ctx, entry)
            : revertRepository(ctx, entry, ledger.id);
      } catch (error) {
        logger.error(`Revert of ${entryItem(entry)} in ${entry.target} failed: ${errorMessage(error)}`);
        item = failureResult(repositoryOf(entry), entryItem(entry), error);
      }
      aborted = item.reason === 'Aborted';
    }
    results.push(item);
    ctx.onResult?.(item);
  }

  logger.info(`Reverted session ${ledger.id}: ${results.length} item(s)`);
  return results;
}
