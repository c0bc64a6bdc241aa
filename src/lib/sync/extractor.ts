/**
 * Change extraction
 *
 * Turns a selection on the source repository into a change set: a sorted
 * path list for whole-file propagation, or a portable patch. Exclude globs
 * apply before anything is shown to the operator, in every mode.
 */

import { EmptyChangeSetError, SelectionError } from '../errors.js';
import { logger } from '../logger.js';
import { filterPaths, normalizePaths } from './policy.js';
import { parseRange } from './selection.js';
import type { ChangeSelection, ChangeSet, Repository, Strategy, Vcs } from './types.js';

export interface ExtractOptions {
  strategy: Strategy;
  excludeGlobs: readonly string[];
  contextLines: number;
}

/**
 * Working-tree changes offered for manual picking, exclusions applied
 */
export function listCandidates(
  vcs: Vcs,
  source: Repository,
  excludeGlobs: readonly string[]
): string[] {
  return filterPaths(normalizePaths(vcs.workingTreeChanges(source.root)), excludeGlobs);
}

function resolveOrThrow(vcs: Vcs, source: Repository, ref: string): string {
  const commit = vcs.resolveCommit(source.root, ref.trim());
  if (!commit) {
    throw new SelectionError(`Unknown commit in ${source.name}: ${ref}`, { input: ref });
  }
  return commit;
}

/**
 * Commits named by a selection, oldest first
 */
export function resolveCommits(vcs: Vcs, source: Repository, selection: ChangeSelection): string[] {
  switch (selection.mode) {
    case 'commit':
      return [resolveOrThrow(vcs, source, selection.commit)];
    case 'range': {
      const { from, to } = parseRange(selection.range);
      const range = `${resolveOrThrow(vcs, source, from)}..${resolveOrThrow(vcs, source, to)}`;
      return vcs.listRange(source.root, range);
    }
    case 'commits':
      if (selection.commits.length === 0) {
        throw new SelectionError('No commits selected');
      }
      // entered newest first, replayed oldest first
      return selection.commits.map((ref) => resolveOrThrow(vcs, source, ref)).reverse();
    case 'working-tree':
    case 'manual':
      return [];
  }
}

function selectedPaths(
  vcs: Vcs,
  source: Repository,
  selection: ChangeSelection,
  commits: readonly string[],
  excludeGlobs: readonly string[]
): string[] {
  switch (selection.mode) {
    case 'working-tree':
      return normalizePaths(vcs.changedPaths(source.root, { kind: 'working-tree', scope: selection.scope }));
    case 'manual': {
      const candidates = listCandidates(vcs, source, excludeGlobs);
      const picked = normalizePaths(selection.paths);
      const unknown = picked.filter((p) => !candidates.includes(p));
      if (unknown.length > 0) {
        throw new SelectionError(`Not a changed file in ${source.name}: ${unknown.join(', ')}`);
      }
      return picked;
    }
    case 'range': {
      if (commits.length === 0) {
        return [];
      }
      const { from, to } = parseRange(selection.range);
      const range = `${resolveOrThrow(vcs, source, from)}..${resolveOrThrow(vcs, source, to)}`;
      return normalizePaths(vcs.changedPaths(source.root, { kind: 'range', range }));
    }
    case 'commit':
    case 'commits':
      return normalizePaths(
        commits.flatMap((commit) => vcs.changedPaths(source.root, { kind: 'commit', commit }))
      );
  }
}

/**
 * Extract a change set from the source repository.
 * Throws SelectionError for bad input and EmptyChangeSetError when nothing qualifies.
 */
export function extract(
  vcs: Vcs,
  source: Repository,
  selection: ChangeSelection,
  options: ExtractOptions
): ChangeSet {
  const commits = resolveCommits(vcs, source, selection);
  const all = selectedPaths(vcs, source, selection, commits, options.excludeGlobs);
  const paths = filterPaths(all, options.excludeGlobs);

  if (all.length !== paths.length) {
    logger.debug(`Excluded ${all.length - paths.length} path(s) from ${source.name}`);
  }
  if (paths.length === 0) {
    throw new EmptyChangeSetError(source.name);
  }

  if (options.strategy === 'file') {
    return { kind: 'files', source, selection, paths };
  }

  // pass a pathspec only when exclusions removed something
  const pathspec = paths.length === all.length && selection.mode !== 'manual' ? undefined : paths;

  if (commits.length > 0) {
    const content = vcs.exportPatch(source.root, { kind: 'mailbox', commits, paths: pathspec });
    if (content.length === 0) {
      throw new EmptyChangeSetError(source.name);
    }
    return { kind: 'patch', source, selection, patchKind: 'mailbox', content, paths, commits };
  }

  const scope = selection.mode === 'working-tree' ? selection.scope : 'both';
  const content = vcs.exportPatch(source.root, {
    kind: 'diff',
    scope,
    paths: pathspec,
    contextLines: options.contextLines,
  });
  if (content.length === 0) {
    throw new EmptyChangeSetError(source.name);
  }
  return { kind: 'patch', source, selection, patchKind: 'diff', content, paths, commits: [] };
}

/**
 * Short label for a change set in results and prompts
 */
export function describeChangeSet(changeSet: ChangeSet): string {
  if (changeSet.kind === 'files') {
    return `${changeSet.paths.length} file(s)`;
  }
  if (changeSet.patchKind === 'mailbox') {
    const first = changeSet.commits[0].slice(0, 7);
    const last = changeSet.commits[changeSet.commits.length - 1].slice(0, 7);
    return changeSet.commits.length === 1 ? `commit ${first}` : `commits ${first}..${last}`;
  }
  return 'working-tree patch';
}
