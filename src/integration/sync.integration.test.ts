import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { execSync } from 'child_process';
import fs from 'fs';
import path from 'path';
import os from 'os';
import * as git from '../lib/git.js';
import { TablePolicy } from '../lib/sync/decisions.js';
import { extract } from '../lib/sync/extractor.js';
import { propagate, type PropagateResult } from '../lib/sync/propagate.js';
import { revertSession } from '../lib/sync/revert.js';
import { SessionStore } from '../lib/sync/session.js';
import type { ChangeSelection, Repository, Vcs } from '../lib/sync/types.js';

vi.mock('../lib/logger.js', () => ({
  logger: { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() },
  setRunContext: vi.fn(),
}));

/**
 * Propagation and revert against real git repositories in a temp directory.
 */

const ORIGINAL = 'one\ntwo\nthree\n';
const EDITED = 'one\nTWO\nthree\n';

function sh(command: string, cwd: string): string {
  return execSync(command, { cwd, encoding: 'utf8', stdio: 'pipe' });
}

describe('sync integration', () => {
  let tempDir: string;
  let vcs: Vcs;
  let store: SessionStore;

  const initRepo = (name: string, files: Record<string, string>, commit = true): Repository => {
    const root = path.join(tempDir, name);
    fs.mkdirSync(root);
    sh('git init', root);
    sh('git config user.email "test@test.com"', root);
    sh('git config user.name "Test User"', root);
    sh('git config commit.gpgsign false', root);
    sh('git config core.autocrlf false', root);
    for (const [file, content] of Object.entries(files)) {
      fs.writeFileSync(path.join(root, file), content);
    }
    if (commit) {
      sh('git add .', root);
      sh('git commit -m "Initial commit"', root);
    }
    return { name, root };
  };

  const read = (repo: Repository, file: string): string =>
    fs.readFileSync(path.join(repo.root, file), 'utf8');
  const head = (repo: Repository): string => git.getHeadCommit(repo.root) ?? '';
  const treeOf = (repo: Repository, rev: string): string =>
    sh(`git rev-parse ${rev}^{tree}`, repo.root).trim();
  const status = (repo: Repository): string => sh('git status --porcelain', repo.root);

  const run = async (
    source: Repository,
    selection: ChangeSelection,
    targets: Repository[],
    policy = new TablePolicy()
  ): Promise<PropagateResult> => {
    const changeSet = extract(vcs, source, selection, {
      strategy: 'patch',
      excludeGlobs: [],
      contextLines: 3,
    });
    return propagate({ vcs, policy, store, changeSet, targets, criticalGlobs: [] });
  };

  const revert = async (sessionId: string | undefined) => {
    const id = sessionId ?? '';
    return revertSession(
      { vcs, policy: new TablePolicy(), sessionDir: store.sessionDir(id) },
      store.loadSession(id)
    );
  };

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'syncrepos-integration-'));
    vcs = git.createGitVcs();
    store = new SessionStore(path.join(tempDir, '.data'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('reverts a working-tree patch and keeps local edits', async () => {
    const api = initRepo('api', { 'a.txt': ORIGINAL, 'notes.txt': 'notes\n' });
    const web = initRepo('web', { 'a.txt': ORIGINAL, 'notes.txt': 'notes\n' });
    const base = head(web);
    fs.writeFileSync(path.join(web.root, 'notes.txt'), 'notes\nlocal\n');
    fs.writeFileSync(path.join(api.root, 'a.txt'), EDITED);

    const outcome = await run(api, { mode: 'working-tree', scope: 'both' }, [web]);

    expect(outcome.results.map((r) => r.status)).toEqual(['APPLIED']);
    expect(read(web, 'a.txt')).toBe(EDITED);
    expect(head(web)).not.toBe(base);

    const results = await revert(outcome.sessionId);

    expect(results).toEqual([
      { target: 'web', item: `repository @ ${base.slice(0, 7)}`, status: 'REVERTED' },
    ]);
    expect(treeOf(web, 'HEAD')).toBe(treeOf(web, base));
    expect(read(web, 'a.txt')).toBe(ORIGINAL);
    expect(read(web, 'notes.txt')).toBe('notes\nlocal\n');
    expect(status(web)).toBe(' M notes.txt\n');
  });

  it('reverts one session without undoing a later one', async () => {
    const api = initRepo('api', { 'a.txt': ORIGINAL });
    const web = initRepo('web', { 'a.txt': ORIGINAL });
    const base = head(web);

    fs.writeFileSync(path.join(api.root, 'a.txt'), EDITED);
    const first = await run(api, { mode: 'working-tree', scope: 'both' }, [web]);
    sh('git commit -am "Edit a"', api.root);
    fs.writeFileSync(path.join(api.root, 'b.txt'), 'bee\n');
    sh('git add b.txt', api.root);
    const second = await run(api, { mode: 'working-tree', scope: 'both' }, [web]);

    expect([...first.results, ...second.results].map((r) => r.status)).toEqual([
      'APPLIED',
      'APPLIED',
    ]);
    expect(first.sessionId).not.toBe(second.sessionId);

    const firstRevert = await revert(first.sessionId);

    expect(firstRevert.map((r) => r.status)).toEqual(['REVERTED']);
    expect(read(web, 'a.txt')).toBe(ORIGINAL);
    expect(read(web, 'b.txt')).toBe('bee\n');
    expect(status(web)).toBe('');

    const again = await revert(first.sessionId);
    expect(again[0]).toMatchObject({ status: 'SKIPPED', reason: 'Conflict' });
    expect(read(web, 'b.txt')).toBe('bee\n');

    const secondRevert = await revert(second.sessionId);

    expect(secondRevert.map((r) => r.status)).toEqual(['REVERTED']);
    expect(fs.existsSync(path.join(web.root, 'b.txt'))).toBe(false);
    expect(treeOf(web, 'HEAD')).toBe(treeOf(web, base));
  });

  it('applies a commit range where it fits and leaves the rest untouched', async () => {
    const api = initRepo('api', { 'a.txt': ORIGINAL });
    fs.writeFileSync(path.join(api.root, 'a.txt'), EDITED);
    sh('git commit -am "Edit a"', api.root);
    fs.writeFileSync(path.join(api.root, 'b.txt'), 'bee\n');
    sh('git add b.txt', api.root);
    sh('git commit -m "Add b"', api.root);

    const web = initRepo('web', { 'a.txt': ORIGINAL });
    const admin = initRepo('admin', { 'a.txt': 'alpha\nbeta\ngamma\n' });
    const docs = initRepo('docs', { 'a.txt': ORIGINAL });
    const webBase = head(web);
    const adminBase = head(admin);
    const docsBase = head(docs);

    const outcome = await run(
      api,
      { mode: 'range', range: 'HEAD~2..HEAD' },
      [web, admin],
      new TablePolicy({ conflict: 'proceed' })
    );

    expect(outcome.results.map((r) => [r.target, r.status, r.reason])).toEqual([
      ['web', 'APPLIED', undefined],
      ['admin', 'FAILED', 'Mutation'],
    ]);
    expect(read(web, 'a.txt')).toBe(EDITED);
    expect(read(web, 'b.txt')).toBe('bee\n');
    expect(head(admin)).toBe(adminBase);
    expect(status(admin)).toBe('');
    expect(fs.existsSync(path.join(admin.root, 'b.txt'))).toBe(false);

    const results = await revert(outcome.sessionId);

    expect(results).toEqual([
      {
        target: 'admin',
        item: `repository @ ${adminBase.slice(0, 7)}`,
        status: 'REVERTED',
        detail: 'nothing was applied',
      },
      { target: 'web', item: `repository @ ${webBase.slice(0, 7)}`, status: 'REVERTED' },
    ]);
    expect(treeOf(web, 'HEAD')).toBe(treeOf(web, webBase));
    expect(head(admin)).toBe(adminBase);
    expect(head(docs)).toBe(docsBase);
    expect(status(docs)).toBe('');
    expect(read(docs, 'a.txt')).toBe(ORIGINAL);
  });

  it('refuses a patch for a target without commits', async () => {
    const api = initRepo('api', { 'a.txt': ORIGINAL });
    fs.writeFileSync(path.join(api.root, 'new.txt'), 'fresh\n');
    sh('git add new.txt', api.root);
    sh('git commit -m "Add new"', api.root);
    const empty = initRepo('empty', {}, false);

    const outcome = await run(api, { mode: 'commit', commit: 'HEAD' }, [empty]);

    expect(outcome.results).toEqual([
      {
        target: 'empty',
        item: `commit ${head(api).slice(0, 7)}`,
        status: 'FAILED',
        reason: 'Backup',
        detail: 'target has no commits to record a pre-state against',
      },
    ]);
    expect(git.getHeadCommit(empty.root)).toBeNull();
    expect(fs.existsSync(path.join(empty.root, 'new.txt'))).toBe(false);
    expect(store.loadSession(outcome.sessionId ?? '').entries).toEqual([]);
  });
});
