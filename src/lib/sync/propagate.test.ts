import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { TablePolicy } from './decisions.js';
import { propagate } from './propagate.js';
import { SessionStore } from './session.js';
import { FakeVcs } from './testing.js';
import type { ChangeSet, CompatibilityReport, Repository } from './types.js';

vi.mock('../logger.js', () => ({
  logger: { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() },
  setRunContext: vi.fn(),
}));

describe('propagate', () => {
  let workspace: string;
  let source: Repository;
  let web: Repository;
  let vcs: FakeVcs;
  let store: SessionStore;

  const files = (...paths: string[]): ChangeSet => ({
    kind: 'files',
    source,
    selection: { mode: 'working-tree', scope: 'unstaged' },
    paths,
  });

  beforeEach(() => {
    workspace = fs.mkdtempSync(path.join(os.tmpdir(), 'propagate-test-'));
    source = { name: 'api', root: path.join(workspace, 'api') };
    web = { name: 'web', root: path.join(workspace, 'web') };
    fs.mkdirSync(source.root);
    fs.mkdirSync(web.root);
    vcs = new FakeVcs();
    vcs.workTrees.add(source.root);
    vcs.workTrees.add(web.root);
    store = new SessionStore(path.join(workspace, '.syncrepos'));
  });

  afterEach(() => {
    fs.rmSync(workspace, { recursive: true, force: true });
  });

  it('should probe, open a session, apply and close it', async () => {
    fs.writeFileSync(path.join(source.root, 'a.txt'), 'v2');
    fs.writeFileSync(path.join(web.root, 'a.txt'), 'v1');
    const reports: CompatibilityReport[][] = [];

    const outcome = await propagate({
      vcs,
      policy: new TablePolicy(),
      store,
      changeSet: files('a.txt'),
      targets: [web],
      criticalGlobs: [],
      onReports: (r) => reports.push(r),
    });

    expect(reports[0][0]).toMatchObject({ target: 'web', compatible: true });
    expect(outcome.results.map((r) => r.status)).toEqual(['OK']);
    expect(outcome.sessionId).toBeDefined();
    const ledger = store.loadSession(outcome.sessionId ?? '');
    expect(ledger.closedAt).toBeDefined();
    expect(ledger.entries).toHaveLength(1);
  });

  it('should stop after the probes on a dry run', async () => {
    fs.writeFileSync(path.join(source.root, 'a.txt'), 'v2');

    const outcome = await propagate({
      vcs,
      policy: new TablePolicy(),
      store,
      changeSet: files('a.txt'),
      targets: [web],
      criticalGlobs: [],
      dryRun: true,
    });

    expect(outcome).toMatchObject({ stopped: 'dry-run', results: [] });
    expect(fs.existsSync(path.join(web.root, 'a.txt'))).toBe(false);
    expect(store.listSessionIds()).toEqual([]);
  });

  it('should not open a session when the run is declined', async () => {
    fs.writeFileSync(path.join(source.root, 'a.txt'), 'v2');

    const outcome = await propagate({
      vcs,
      policy: new TablePolicy({ 'confirm-run': 'skip' }),
      store,
      changeSet: files('a.txt'),
      targets: [web],
      criticalGlobs: [],
    });

    expect(outcome.stopped).toBe('declined');
    expect(store.listSessionIds()).toEqual([]);
  });

  it('should ask about binaries when not told', async () => {
    fs.writeFileSync(path.join(source.root, 'logo.png'), Buffer.from([0, 1, 2]));

    const outcome = await propagate({
      vcs,
      policy: new TablePolicy({ 'copy-binaries': 'skip' }),
      store,
      changeSet: files('logo.png'),
      targets: [web],
      criticalGlobs: [],
    });

    expect(outcome.results[0]).toMatchObject({ status: 'SKIPPED', reason: 'Binary' });
  });

  it('should trial and apply patches from the session copy', async () => {
    vcs.heads.set(web.root, 'base000001');
    const changeSet: ChangeSet = {
      kind: 'patch',
      source,
      selection: { mode: 'commit', commit: 'abc' },
      patchKind: 'mailbox',
      content: Buffer.from('From abc1234567'),
      paths: ['a.txt'],
      commits: ['abc1234567'],
    };

    const outcome = await propagate({
      vcs,
      policy: new TablePolicy(),
      store,
      changeSet,
      targets: [web],
      criticalGlobs: [],
    });

    expect(outcome.results[0].status).toBe('APPLIED');
    const sessionDir = store.sessionDir(outcome.sessionId ?? '');
    expect(vcs.callsTo('applyPatch')[0].args[0]).toBe(path.join(sessionDir, 'change.patch'));
    expect(fs.readFileSync(path.join(sessionDir, 'change.patch'), 'utf8')).toBe('From abc1234567');
    expect(vcs.callsTo('checkPatch')[0].args[0]).not.toBe(path.join(sessionDir, 'change.patch'));
  });
});
