import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import readline from 'readline';
import { UserCancelledError } from './errors.js';
import { promptChoice, promptConfirm, promptInput } from './prompts.js';

// Mock readline
vi.mock('readline', () => ({
  default: {
    createInterface: vi.fn(),
  },
}));

// Mock console.log
const consoleSpy = vi.spyOn(console, 'log').mockImplementation(() => {});

type Answer = (answer: string) => void;

describe('prompts', () => {
  let mockRl: {
    question: ReturnType<typeof vi.fn>;
    close: ReturnType<typeof vi.fn>;
    on: ReturnType<typeof vi.fn>;
  };

  /** Feed answers to successive questions */
  function answer(...answers: string[]): void {
    let i = 0;
    mockRl.question.mockImplementation((_prompt: string, callback: Answer) => {
      callback(answers[Math.min(i++, answers.length - 1)]);
    });
  }

  beforeEach(() => {
    vi.clearAllMocks();
    mockRl = {
      question: vi.fn(),
      close: vi.fn(),
      on: vi.fn(),
    };
    vi.mocked(readline.createInterface).mockReturnValue(mockRl as unknown as readline.Interface);
  });

  afterEach(() => {
    consoleSpy.mockClear();
  });

  describe('promptChoice', () => {
    const options = [
      { label: 'api', value: 'A' },
      { label: 'web', value: 'W', description: 'frontend' },
    ];

    it('lists options with 0-based indices', async () => {
      answer('0');
      await promptChoice('Select source:', options);
      expect(consoleSpy).toHaveBeenCalledWith(expect.stringContaining('[0]'));
      expect(consoleSpy).toHaveBeenCalledWith(expect.stringContaining('web'));
      expect(consoleSpy).toHaveBeenCalledWith(expect.stringContaining('frontend'));
    });

    it('returns the value of the chosen option', async () => {
      answer('1');
      await expect(promptChoice('Select:', options)).resolves.toBe('W');
      expect(mockRl.close).toHaveBeenCalled();
    });

    it('re-prompts on invalid input', async () => {
      answer('x', '5', '', '0');
      await expect(promptChoice('Select:', options)).resolves.toBe('A');
      expect(mockRl.question).toHaveBeenCalledTimes(4);
    });

    it('rejects with UserCancelledError on q', async () => {
      answer('q');
      await expect(promptChoice('Select:', options)).rejects.toBeInstanceOf(UserCancelledError);
    });
  });

  describe('promptConfirm', () => {
    it.each([
      ['y', true],
      ['YES', true],
      ['n', false],
      ['no', false],
    ])('maps "%s" to %s', async (input, expected) => {
      answer(input);
      await expect(promptConfirm('Continue?')).resolves.toBe(expected);
    });

    it('uses the default on empty or unknown input', async () => {
      answer('');
      await expect(promptConfirm('Continue?', true)).resolves.toBe(true);
      answer('maybe');
      await expect(promptConfirm('Continue?')).resolves.toBe(false);
    });

    it('shows the default in the hint', async () => {
      answer('');
      await promptConfirm('Continue?', true);
      expect(mockRl.question).toHaveBeenCalledWith(expect.stringContaining('[Y/n]'), expect.any(Function));
    });

    it('rejects with UserCancelledError on Ctrl+C', async () => {
      mockRl.on.mockImplementation((event: string, handler: () => void) => {
        if (event === 'SIGINT') handler();
      });
      await expect(promptConfirm('Continue?')).rejects.toBeInstanceOf(UserCancelledError);
    });
  });

  describe('promptInput', () => {
    it('returns trimmed input', async () => {
      answer('  abc123  ');
      await expect(promptInput('Commit')).resolves.toBe('abc123');
    });

    it('falls back to the default', async () => {
      answer('');
      await expect(promptInput('Scope', 'both')).resolves.toBe('both');
    });
  });
});
