import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { resolveConfig } from '../../lib/config.js';
import { DATA_DIR_ENV } from '../../lib/constants.js';
import {
  BackupError,
  ConfigurationError,
  EmptyChangeSetError,
  SelectionError,
  UserCancelledError,
} from '../../lib/errors.js';
import { logger } from '../../lib/logger.js';
import { InteractivePolicy, TablePolicy } from '../../lib/sync/decisions.js';
import { FakeVcs } from '../../lib/sync/testing.js';
import { setColorEnabled } from '../../lib/colors.js';
import { setJsonMode } from '../../lib/ui/index.js';
import { createPolicy, isInteractive, openWorkspace, reportFailure, runExitCode } from './workspace.js';

vi.mock('../../lib/logger.js', () => ({
  logger: { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() },
}));

describe('workspace helpers', () => {
  let ws: string;
  let savedDataDir: string | undefined;

  beforeEach(() => {
    ws = fs.mkdtempSync(path.join(os.tmpdir(), 'syncrepos-ws-'));
    savedDataDir = process.env[DATA_DIR_ENV];
    delete process.env[DATA_DIR_ENV];
    setColorEnabled(false);
  });

  afterEach(() => {
    fs.rmSync(ws, { recursive: true, force: true });
    if (savedDataDir !== undefined) {
      process.env[DATA_DIR_ENV] = savedDataDir;
    }
    setJsonMode(false);
    vi.restoreAllMocks();
  });

  describe('openWorkspace', () => {
    it('discovers repositories and places sessions under the data directory', () => {
      fs.mkdirSync(path.join(ws, 'web', '.git'), { recursive: true });
      fs.mkdirSync(path.join(ws, 'notes'));

      const workspace = openWorkspace(ws, new FakeVcs());

      expect(workspace.repositories).toEqual([{ name: 'web', root: path.join(ws, 'web') }]);
      expect(workspace.store.sessionsDir).toBe(path.join(ws, '.syncrepos', 'sessions'));
    });

    it('can skip discovery', () => {
      expect(openWorkspace(ws, new FakeVcs(), { discover: false }).repositories).toEqual([]);
    });

    it('surfaces an invalid config', () => {
      fs.writeFileSync(path.join(ws, '.syncreposrc'), '{"contextLines": "ten"}');
      expect(() => openWorkspace(ws, new FakeVcs(), { discover: false })).toThrow(ConfigurationError);
    });
  });

  describe('isInteractive', () => {
    it('is off with --yes or --json', () => {
      const deps = { vcs: new FakeVcs(), interactive: true };
      expect(isInteractive({ yes: true }, deps)).toBe(false);
      expect(isInteractive({ json: true }, deps)).toBe(false);
      expect(isInteractive({}, deps)).toBe(true);
    });
  });

  it('createPolicy picks the prompt or the gate table', () => {
    const config = resolveConfig(ws);
    expect(createPolicy(config, true)).toBeInstanceOf(InteractivePolicy);
    expect(createPolicy(config, false)).toBeInstanceOf(TablePolicy);
  });

  describe('reportFailure', () => {
    it('treats an empty change set as success', () => {
      vi.spyOn(console, 'log').mockImplementation(() => {});
      expect(reportFailure('propagate', new EmptyChangeSetError('api'), false)).toBe(0);
    });

    it('returns 130 for a cancelled prompt', () => {
      vi.spyOn(console, 'log').mockImplementation(() => {});
      expect(reportFailure('propagate', new UserCancelledError(), false)).toBe(130);
    });

    it('returns 1 and prints the error otherwise', () => {
      const errSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
      expect(reportFailure('revert', new Error('disk full'), false)).toBe(1);
      expect(errSpy).toHaveBeenCalledWith('[ERROR] disk full');
    });

    it('logs operator errors as a stop', () => {
      vi.spyOn(console, 'error').mockImplementation(() => {});
      expect(reportFailure('revert', new SelectionError('Session not found: 1'), false)).toBe(1);
      expect(logger.info).toHaveBeenCalledWith('revert stopped: Session not found: 1');
      expect(logger.error).not.toHaveBeenCalledWith('revert failed: Session not found: 1');
    });

    it('logs anything that escaped an item as a failure', () => {
      vi.spyOn(console, 'error').mockImplementation(() => {});
      const error = new BackupError('Cannot create session directory: EACCES', { sessionId: '1' });
      expect(reportFailure('propagate', error, false)).toBe(1);
      expect(logger.error).toHaveBeenCalledWith(
        'propagate failed: Cannot create session directory: EACCES'
      );
    });
  });

  it('runExitCode only fails runs when asked to', () => {
    expect(runExitCode(true, false)).toBe(0);
    expect(runExitCode(true, true)).toBe(2);
    expect(runExitCode(false, true)).toBe(0);
  });
});
