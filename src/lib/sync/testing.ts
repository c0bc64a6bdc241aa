/**
 * In-memory Vcs for engine tests. Files still live on disk (temp dirs);
 * only the version-control answers are scripted.
 */

import type {
  ApplyOutcome,
  CommitSummary,
  PatchKind,
  PatchQuery,
  PathQuery,
  Vcs,
} from './types.js';

export interface VcsCall {
  method: keyof Vcs;
  root: string;
  args: unknown[];
}

const OK: ApplyOutcome = { ok: true, output: '' };

export class FakeVcs implements Vcs {
  readonly calls: VcsCall[] = [];

  /** Roots that count as valid working trees */
  readonly workTrees = new Set<string>();
  /** `${root}:${path}` entries with local changes */
  readonly divergent = new Set<string>();
  /** Ref -> commit id, shared by every repository */
  readonly refs = new Map<string, string>();
  readonly heads = new Map<string, string | null>();
  /** `${root}:${range}` -> commits oldest first */
  readonly ranges = new Map<string, string[]>();
  /** `${root}:${JSON.stringify(query)}` -> paths */
  readonly changed = new Map<string, string[]>();
  readonly statusPaths = new Map<string, string[]>();
  readonly recent = new Map<string, CommitSummary[]>();
  /** Root -> exported patch content */
  readonly exports = new Map<string, Buffer>();
  readonly checkOutcomes = new Map<string, ApplyOutcome>();
  readonly applyOutcomes = new Map<string, ApplyOutcome>();
  /** Side effects run on a successful apply, keyed by root */
  readonly applyEffects = new Map<string, () => void>();
  /** `${root}@${base}` -> working-tree diff */
  readonly diffs = new Map<string, Buffer>();
  /** `${root}:${from}..${to}` -> diff between commits */
  readonly commitDiffs = new Map<string, Buffer>();
  /** Root -> HEAD after a successful apply */
  readonly appliedHeads = new Map<string, string>();
  /** `${root}:reverse` or `${root}:forward` -> applyDiff outcome */
  readonly diffOutcomes = new Map<string, ApplyOutcome>();
  readonly applyInProgress = new Set<string>();
  /** Roots whose checkPatch leaves an `am` session behind */
  readonly leavesAmBehind = new Set<string>();

  private record(method: keyof Vcs, root: string, ...args: unknown[]): void {
    this.calls.push({ method, root, args });
  }

  callsTo(method: keyof Vcs): VcsCall[] {
    return this.calls.filter((c) => c.method === method);
  }

  isWorkTree(root: string): boolean {
    this.record('isWorkTree', root);
    return this.workTrees.has(root);
  }

  resolveCommit(root: string, ref: string): string | null {
    this.record('resolveCommit', root, ref);
    return this.refs.get(ref) ?? null;
  }

  headCommit(root: string): string | null {
    this.record('headCommit', root);
    return this.heads.get(root) ?? null;
  }

  listRange(root: string, range: string): string[] {
    this.record('listRange', root, range);
    return this.ranges.get(`${root}:${range}`) ?? [];
  }

  changedPaths(root: string, query: PathQuery): string[] {
    this.record('changedPaths', root, query);
    return this.changed.get(`${root}:${JSON.stringify(query)}`) ?? [];
  }

  workingTreeChanges(root: string): string[] {
    this.record('workingTreeChanges', root);
    return this.statusPaths.get(root) ?? [];
  }

  recentCommits(root: string, count: number): CommitSummary[] {
    this.record('recentCommits', root, count);
    return (this.recent.get(root) ?? []).slice(0, count);
  }

  exportPatch(root: string, query: PatchQuery): Buffer {
    this.record('exportPatch', root, query);
    return this.exports.get(root) ?? Buffer.alloc(0);
  }

  isPathDivergent(root: string, relativePath: string): boolean {
    this.record('isPathDivergent', root, relativePath);
    return this.divergent.has(`${root}:${relativePath}`);
  }

  checkPatch(root: string, patchFile: string, kind: PatchKind): ApplyOutcome {
    this.record('checkPatch', root, patchFile, kind);
    if (this.leavesAmBehind.has(root)) {
      this.applyInProgress.add(root);
    }
    return this.checkOutcomes.get(root) ?? OK;
  }

  applyPatch(root: string, patchFile: string, kind: PatchKind): ApplyOutcome {
    this.record('applyPatch', root, patchFile, kind);
    const outcome = this.applyOutcomes.get(root) ?? OK;
    if (outcome.ok) {
      this.applyEffects.get(root)?.();
      const applied = this.appliedHeads.get(root);
      if (applied) {
        this.heads.set(root, applied);
      }
    }
    return outcome;
  }

  applyDiff(root: string, patchFile: string, options: { reverse: boolean }): ApplyOutcome {
    this.record('applyDiff', root, patchFile, options);
    return this.diffOutcomes.get(`${root}:${options.reverse ? 'reverse' : 'forward'}`) ?? OK;
  }

  diffWorkingTree(root: string, base: string): Buffer {
    this.record('diffWorkingTree', root, base);
    return this.diffs.get(`${root}@${base}`) ?? Buffer.alloc(0);
  }

  diffCommits(root: string, from: string, to: string): Buffer {
    this.record('diffCommits', root, from, to);
    return this.commitDiffs.get(`${root}:${from}..${to}`) ?? Buffer.alloc(0);
  }

  commitPaths(root: string, message: string, paths: readonly string[]): ApplyOutcome {
    this.record('commitPaths', root, message, paths);
    return OK;
  }

  commitTracked(root: string, message: string, paths?: readonly string[]): ApplyOutcome {
    this.record('commitTracked', root, message, paths);
    return OK;
  }

  isApplyInProgress(root: string): boolean {
    this.record('isApplyInProgress', root);
    return this.applyInProgress.has(root);
  }

  abortApply(root: string): ApplyOutcome {
    this.record('abortApply', root);
    this.applyInProgress.delete(root);
    return OK;
  }
}
