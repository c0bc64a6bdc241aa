import { spawnSync } from 'child_process';
import fs from 'fs';
import path from 'path';
import { GitCommandError } from './errors.js';
import type {
  ApplyOutcome,
  ChangeScope,
  CommitSummary,
  PatchKind,
  PatchQuery,
  PathQuery,
  Vcs,
} from './sync/types.js';

/**
 * Raw result of a git invocation
 */
export interface GitRunResult {
  status: number;
  stdout: Buffer;
  stderr: string;
}

/**
 * Flags shared by every apply/reverse-apply: tolerate whitespace and line-ending drift
 */
const APPLY_TOLERANCE = ['--ignore-space-change', '--whitespace=nowarn'];

/**
 * Run git without a shell and capture raw output
 */
export function run(args: string[], options: { cwd?: string } = {}): GitRunResult {
  const result = spawnSync('git', args, {
    cwd: options.cwd,
    encoding: 'buffer',
    stdio: ['ignore', 'pipe', 'pipe'],
    maxBuffer: 256 * 1024 * 1024,
  });

  if (result.error) {
    throw new GitCommandError(`Failed to run git: ${result.error.message}`, {
      command: `git ${args.join(' ')}`,
    });
  }

  return {
    status: result.status ?? 1,
    stdout: result.stdout ?? Buffer.alloc(0),
    stderr: result.stderr ? result.stderr.toString() : '',
  };
}

/**
 * Execute a git command and return output
 */
export function exec(args: string[], options: { cwd?: string } = {}): string {
  const result = run(args, options);
  if (result.status !== 0) {
    const command = `git ${args.join(' ')}`;
    throw new GitCommandError(`Git command failed: ${command}\n${result.stderr}`, {
      command,
      exitCode: result.status,
      stderr: result.stderr,
    });
  }
  // trimEnd keeps the leading whitespace that porcelain output relies on
  return result.stdout.toString().trimEnd();
}

/**
 * Execute a git command, returning null on failure instead of throwing
 */
export function execSafe(args: string[], options: { cwd?: string } = {}): string | null {
  try {
    return exec(args, options);
  } catch {
    return null;
  }
}

/**
 * Execute a git command and return its raw stdout
 */
export function execBuffer(args: string[], options: { cwd?: string } = {}): Buffer {
  const result = run(args, options);
  if (result.status !== 0) {
    const command = `git ${args.join(' ')}`;
    throw new GitCommandError(`Git command failed: ${command}\n${result.stderr}`, {
      command,
      exitCode: result.status,
      stderr: result.stderr,
    });
  }
  return result.stdout;
}

/**
 * Run a mutating git command and report success plus its diagnostics
 */
function attempt(args: string[], cwd: string): ApplyOutcome {
  const result = run(args, { cwd });
  const output = [result.stdout.toString().trim(), result.stderr.trim()].filter(Boolean).join('\n');
  return { ok: result.status === 0, output };
}

function splitNul(output: string): string[] {
  return output.split('\0').filter(Boolean);
}

/**
 * Get the root directory of the repository containing cwd
 */
export function getRepoRoot(cwd?: string): string {
  return path.normalize(exec(['rev-parse', '--show-toplevel'], { cwd }));
}

/**
 * Check that `root` is the top level of a working tree (not a subdirectory of one)
 */
export function isWorkTree(root: string): boolean {
  if (!fs.existsSync(root)) {
    return false;
  }
  const inside = execSafe(['rev-parse', '--is-inside-work-tree'], { cwd: root });
  if (inside !== 'true') {
    return false;
  }
  const top = execSafe(['rev-parse', '--show-toplevel'], { cwd: root });
  return top !== null && path.resolve(top) === fs.realpathSync(path.resolve(root));
}

/**
 * Resolve a revision to a commit id, or null when it names no commit
 */
export function resolveCommit(root: string, ref: string): string | null {
  if (!ref || ref.startsWith('-')) {
    return null;
  }
  return execSafe(['rev-parse', '--verify', '--quiet', `${ref}^{commit}`], { cwd: root });
}

/**
 * Get the current commit SHA, or null in a repository without commits
 */
export function getHeadCommit(root: string): string | null {
  return execSafe(['rev-parse', '--verify', '--quiet', 'HEAD'], { cwd: root });
}

/**
 * Commits reachable in a range, oldest first
 */
export function listRange(root: string, range: string): string[] {
  const result = exec(['rev-list', '--reverse', range], { cwd: root });
  return result.split('\n').filter(Boolean);
}

function scopeDiffArgs(scope: ChangeScope): string[][] {
  switch (scope) {
    case 'unstaged':
      return [['diff']];
    case 'staged':
      return [['diff', '--cached']];
    case 'both':
      return [['diff'], ['diff', '--cached']];
  }
}

/**
 * List paths changed by scope, commit or range
 */
export function getChangedPaths(root: string, query: PathQuery): string[] {
  const commands: string[][] = [];
  switch (query.kind) {
    case 'working-tree':
      for (const base of scopeDiffArgs(query.scope)) {
        commands.push([...base, '--name-only', '-z']);
      }
      break;
    case 'commit':
      commands.push(['show', '--name-only', '-z', '--pretty=format:', query.commit]);
      break;
    case 'range':
      commands.push(['diff', '--name-only', '-z', query.range]);
      break;
  }

  const paths = new Set<string>();
  for (const args of commands) {
    for (const file of splitNul(exec(args, { cwd: root }))) {
      const trimmed = file.trim();
      if (trimmed) paths.add(trimmed);
    }
  }
  return [...paths];
}

/**
 * Paths with any working-tree change, including untracked files.
 * Renames report their new path.
 */
export function getWorkingTreeChanges(root: string): string[] {
  const entries = splitNul(exec(['status', '--porcelain', '-z'], { cwd: root }));
  const files: string[] = [];

  for (let i = 0; i < entries.length; i++) {
    const entry = entries[i];
    const status = entry.substring(0, 2);
    files.push(entry.substring(3));
    // -z prints the rename/copy origin as the next entry
    if (status.includes('R') || status.includes('C')) {
      i++;
    }
  }

  return files;
}

/**
 * Recent commits for interactive picking
 */
export function getRecentCommits(root: string, count: number): CommitSummary[] {
  const result = execSafe(['log', `-n${count}`, '--format=%H%x09%s'], { cwd: root });
  if (!result) {
    return [];
  }
  return result
    .split('\n')
    .filter(Boolean)
    .map((line) => {
      const [hash, ...subject] = line.split('\t');
      return { hash, subject: subject.join('\t') };
    });
}

/**
 * Export a binary-safe, re-applicable patch
 */
export function exportPatch(root: string, query: PatchQuery): Buffer {
  const pathspec = query.paths && query.paths.length > 0 ? ['--', ...query.paths] : [];
  if (query.kind === 'mailbox') {
    const parts = query.commits.map((commit) =>
      execBuffer(['format-patch', '-1', '--stdout', '--binary', commit, ...pathspec], { cwd: root })
    );
    return Buffer.concat(parts);
  }

  const context = `-U${query.contextLines}`;
  switch (query.scope) {
    case 'unstaged':
      return execBuffer(['diff', context, '--binary', ...pathspec], { cwd: root });
    case 'staged':
      return execBuffer(['diff', '--cached', context, '--binary', ...pathspec], { cwd: root });
    case 'both':
      return execBuffer(['diff', 'HEAD', context, '--binary', ...pathspec], { cwd: root });
  }
}

/**
 * Whether a file differs from its last-committed version
 */
export function isPathDivergent(root: string, relativePath: string): boolean {
  const result = run(['diff', '--quiet', 'HEAD', '--', relativePath], { cwd: root });
  return result.status !== 0;
}

/**
 * Trial application that never touches the working tree or index
 */
export function checkPatch(root: string, patchFile: string, kind: PatchKind): ApplyOutcome {
  const args =
    kind === 'diff'
      ? ['apply', '--check', '--3way', ...APPLY_TOLERANCE, patchFile]
      : ['apply', '--check', ...APPLY_TOLERANCE, patchFile];
  return attempt(args, root);
}

/**
 * Mutating application.
 * Diffs apply three-way, leaving rejected hunks visible; mailboxes replay
 * with `am -3 --keep-cr` and are aborted on failure.
 */
export function applyPatch(root: string, patchFile: string, kind: PatchKind): ApplyOutcome {
  if (kind === 'diff') {
    const before = diffWorkingTree(root, 'HEAD');
    const threeWay = attempt(['apply', '--3way', ...APPLY_TOLERANCE, patchFile], root);
    if (threeWay.ok || !before.equals(diffWorkingTree(root, 'HEAD'))) {
      return threeWay;
    }
    // --3way refused the patch outright; apply what applies and keep .rej files
    const rejected = attempt(['apply', ...APPLY_TOLERANCE, '--reject', patchFile], root);
    return { ok: rejected.ok, output: [threeWay.output, rejected.output].filter(Boolean).join('\n') };
  }

  const outcome = attempt(['am', '-3', '--keep-cr', patchFile], root);
  if (!outcome.ok && isAmInProgress(root)) {
    const abort = abortAm(root);
    return { ok: false, output: [outcome.output, abort.output].filter(Boolean).join('\n') };
  }
  return outcome;
}

/**
 * Apply a binary diff to the working tree with the apply-time tolerance
 */
export function applyDiff(
  root: string,
  patchFile: string,
  options: { reverse: boolean }
): ApplyOutcome {
  const args = ['apply', ...(options.reverse ? ['-R'] : []), ...APPLY_TOLERANCE, patchFile];
  return attempt(args, root);
}

/**
 * Binary diff of the working tree against a commit
 */
export function diffWorkingTree(root: string, base: string): Buffer {
  return execBuffer(['diff', base, '--binary'], { cwd: root });
}

/**
 * Binary diff between two commits
 */
export function diffCommits(root: string, from: string, to: string): Buffer {
  return execBuffer(['diff', '--binary', from, to], { cwd: root });
}

/**
 * Stage tracked changes (including deletions) plus the listed paths that exist, then commit.
 * Untracked files outside the list stay untracked. "Nothing to commit" counts as success.
 */
export function commitTracked(
  root: string,
  message: string,
  paths: readonly string[] = []
): ApplyOutcome {
  const add = attempt(['add', '-u'], root);
  if (!add.ok) {
    return add;
  }
  const present = paths.filter((p) => fs.existsSync(path.join(root, p)));
  if (present.length > 0) {
    const addPaths = attempt(['add', '--', ...present], root);
    if (!addPaths.ok) {
      return addPaths;
    }
  }
  const staged = run(['diff', '--cached', '--quiet'], { cwd: root });
  if (staged.status === 0) {
    return { ok: true, output: 'nothing to commit' };
  }
  return attempt(['commit', '-m', message], root);
}

/**
 * Stage the listed paths (additions, edits and deletions) and commit only those.
 * Other staged or unstaged changes are left as they are.
 */
export function commitPaths(root: string, message: string, paths: readonly string[]): ApplyOutcome {
  if (paths.length === 0) {
    return { ok: true, output: 'nothing to commit' };
  }
  const add = attempt(['add', '-A', '--', ...paths], root);
  if (!add.ok) {
    return add;
  }
  const staged = run(['diff', '--cached', '--quiet', '--', ...paths], { cwd: root });
  if (staged.status === 0) {
    return { ok: true, output: 'nothing to commit' };
  }
  return attempt(['commit', '-m', message, '--', ...paths], root);
}

function gitDir(root: string): string | null {
  const dir = execSafe(['rev-parse', '--git-dir'], { cwd: root });
  return dir === null ? null : path.resolve(root, dir);
}

/**
 * Whether an `am` session is in progress
 */
export function isAmInProgress(root: string): boolean {
  const dir = gitDir(root);
  return dir !== null && fs.existsSync(path.join(dir, 'rebase-apply'));
}

/**
 * Abort an in-progress `am` session
 */
export function abortAm(root: string): ApplyOutcome {
  return attempt(['am', '--abort'], root);
}

/**
 * The git-backed version-control capability used by the CLI
 */
export function createGitVcs(): Vcs {
  return {
    isWorkTree,
    resolveCommit,
    headCommit: getHeadCommit,
    listRange,
    changedPaths: getChangedPaths,
    workingTreeChanges: getWorkingTreeChanges,
    recentCommits: getRecentCommits,
    exportPatch,
    isPathDivergent,
    checkPatch,
    applyPatch,
    applyDiff,
    diffWorkingTree,
    diffCommits,
    commitTracked,
    commitPaths,
    isApplyInProgress: isAmInProgress,
    abortApply: abortAm,
  };
}
