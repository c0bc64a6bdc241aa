import { describe, it, expect, vi, beforeEach } from 'vitest';

vi.mock('inquirer', () => ({
  default: {
    prompt: vi.fn(),
    Separator: class {},
  },
}));

vi.mock('./propagate.js', () => ({ runPropagate: vi.fn().mockResolvedValue(0) }));
vi.mock('./revert.js', () => ({ runRevert: vi.fn().mockResolvedValue(0) }));
vi.mock('./sessions.js', () => ({ runSessions: vi.fn().mockResolvedValue(0) }));

import inquirer from 'inquirer';
import { FakeVcs } from '../../lib/sync/testing.js';
import { showMainMenu } from './interactive-menu.js';
import { runPropagate } from './propagate.js';
import { runRevert } from './revert.js';
import { runSessions } from './sessions.js';

describe('showMainMenu', () => {
  const deps = { vcs: new FakeVcs() };

  beforeEach(() => {
    vi.clearAllMocks();
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  it('runs the chosen actions until exit', async () => {
    vi.mocked(inquirer.prompt)
      .mockResolvedValueOnce({ action: 'sessions' })
      .mockResolvedValueOnce({ action: 'propagate' })
      .mockResolvedValueOnce({ action: 'revert' })
      .mockResolvedValueOnce({ action: 'exit' });

    await showMainMenu({ root: '/ws' }, deps);

    expect(runSessions).toHaveBeenCalledWith({ root: '/ws' }, deps);
    expect(runPropagate).toHaveBeenCalledWith({ root: '/ws' }, deps);
    expect(runRevert).toHaveBeenCalledWith({ root: '/ws' }, deps);
    expect(inquirer.prompt).toHaveBeenCalledTimes(4);
  });

  it('returns straight away on exit', async () => {
    vi.mocked(inquirer.prompt).mockResolvedValueOnce({ action: 'exit' });

    await showMainMenu({}, deps);

    expect(runPropagate).not.toHaveBeenCalled();
  });
});
