/**
 * Types for the change-propagation engine
 */

/**
 * A locally rooted git working copy. Source or target is a per-run role.
 */
export interface Repository {
  /** Directory basename */
  name: string;
  /** Absolute path of the working tree root */
  root: string;
}

/**
 * How a change set is carried to the targets
 * - file: whole-file replacement with per-file backups
 * - patch: patch/commit application with a per-repository pre-state backup
 */
export type Strategy = 'file' | 'patch';

/**
 * Which working-tree changes count
 */
export type ChangeScope = 'unstaged' | 'staged' | 'both';

/**
 * What to extract from the source repository
 */
export type ChangeSelection =
  | { mode: 'working-tree'; scope: ChangeScope }
  | { mode: 'commit'; commit: string }
  | { mode: 'range'; range: string }
  | { mode: 'commits'; commits: string[] }
  | { mode: 'manual'; paths: string[] };

export type SelectionMode = ChangeSelection['mode'];

/**
 * diff: a working-tree diff applied with `git apply`
 * mailbox: format-patch output replayed with `git am`
 */
export type PatchKind = 'diff' | 'mailbox';

export interface FileChangeSet {
  readonly kind: 'files';
  readonly source: Repository;
  readonly selection: ChangeSelection;
  readonly paths: readonly string[];
}

export interface PatchChangeSet {
  readonly kind: 'patch';
  readonly source: Repository;
  readonly selection: ChangeSelection;
  readonly patchKind: PatchKind;
  readonly content: Buffer;
  /** Paths the patch touches, after exclusion */
  readonly paths: readonly string[];
  /** Resolved commit ids, oldest first; empty for working-tree patches */
  readonly commits: readonly string[];
}

export type ChangeSet = FileChangeSet | PatchChangeSet;

/**
 * Per-(target, item) outcome
 */
export type ItemStatus = 'OK' | 'APPLIED' | 'SKIPPED' | 'FAILED' | 'RESTORED' | 'REVERTED';

export type ItemReason =
  | 'MissingSource'
  | 'NoPath'
  | 'Binary'
  | 'Conflict'
  | 'Critical'
  | 'Backup'
  | 'Mutation'
  | 'Verify'
  | 'InvalidRepository'
  | 'MissingBackup'
  | 'Aborted';

export interface ItemResult {
  /** Target repository name */
  target: string;
  /** Relative file path, or the patch label in patch mode */
  item: string;
  status: ItemStatus;
  reason?: ItemReason;
  /** Human-readable detail (tool diagnostics go to the log) */
  detail?: string;
}

/**
 * Non-mutating compatibility check result for one target
 */
export interface CompatibilityReport {
  target: string;
  compatible: boolean;
  reason: string;
  /** Per-file flags, whole-file strategy only */
  files?: FileCompatibility[];
}

export interface FileCompatibility {
  path: string;
  compatible: boolean;
  reason: string;
}

/**
 * Outcome of a git apply/am/commit invocation
 */
export interface ApplyOutcome {
  ok: boolean;
  /** Combined stdout/stderr of the underlying tool */
  output: string;
}

export interface CommitSummary {
  hash: string;
  subject: string;
}

/**
 * Change enumeration by scope, commit, range, or against a base commit
 */
export type PathQuery =
  | { kind: 'working-tree'; scope: ChangeScope }
  | { kind: 'commit'; commit: string }
  | { kind: 'range'; range: string };

/**
 * Portable patch export request
 */
export type PatchQuery =
  | { kind: 'diff'; scope: ChangeScope; paths?: readonly string[]; contextLines: number }
  | { kind: 'mailbox'; commits: readonly string[]; paths?: readonly string[] };

/**
 * Version-control capability consumed by the engine.
 * The git implementation lives in lib/git.ts; tests supply an in-memory fake.
 */
export interface Vcs {
  /** Whether `root` is the top of a valid working tree */
  isWorkTree(root: string): boolean;
  /** Resolve a revision to a full commit id, or null when it does not name a commit */
  resolveCommit(root: string, ref: string): string | null;
  /** HEAD commit id, or null for a repository without commits */
  headCommit(root: string): string | null;
  /** Commits in a range, oldest first */
  listRange(root: string, range: string): string[];
  changedPaths(root: string, query: PathQuery): string[];
  /** Paths shown by `status --porcelain`, including untracked files */
  workingTreeChanges(root: string): string[];
  recentCommits(root: string, count: number): CommitSummary[];
  exportPatch(root: string, query: PatchQuery): Buffer;
  /** Whether a file differs from its last-committed version */
  isPathDivergent(root: string, relativePath: string): boolean;
  checkPatch(root: string, patchFile: string, kind: PatchKind): ApplyOutcome;
  applyPatch(root: string, patchFile: string, kind: PatchKind): ApplyOutcome;
  /** Apply a binary diff to the working tree, optionally in reverse */
  applyDiff(root: string, patchFile: string, options: { reverse: boolean }): ApplyOutcome;
  /** Binary diff of the working tree against a commit */
  diffWorkingTree(root: string, base: string): Buffer;
  /** Binary diff between two commits */
  diffCommits(root: string, from: string, to: string): Buffer;
  /** Stage tracked modifications and deletions plus any listed paths that exist, then commit */
  commitTracked(root: string, message: string, paths?: readonly string[]): ApplyOutcome;
  /** Stage and commit exactly the listed paths, leaving every other change alone */
  commitPaths(root: string, message: string, paths: readonly string[]): ApplyOutcome;
  /** Whether an `am` session is left in progress */
  isApplyInProgress(root: string): boolean;
  abortApply(root: string): ApplyOutcome;
}
