/**
 * Tests for logger.ts (consola-based)
 *
 * Covers:
 * - parseLogLevel mapping
 * - initializeLogger level resolution (flag > env > config > default)
 * - LogFileReporter (text, JSONL, directory creation, rotation)
 * - ConditionalStderrReporter (verbose/non-verbose conditional output)
 * - Process exit handler (RUN record)
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'fs';
import path from 'path';
import os from 'os';
import { MAX_LOG_FILE_SIZE } from './constants.js';
import {
  parseLogLevel,
  initializeLogger,
  logger,
  LogLevel,
  setRunContext,
  _resetForTesting,
} from './logger.js';

// ---------------------------------------------------------------------------
// Test-level helpers
// ---------------------------------------------------------------------------

let savedLevel: string | undefined;
let tempDir: string;
let stderr: string[];

function captureStderr(): void {
  stderr = [];
  vi.spyOn(process.stderr, 'write').mockImplementation((chunk: string | Uint8Array) => {
    stderr.push(String(chunk));
    return true;
  });
}

beforeEach(() => {
  _resetForTesting();
  savedLevel = process.env.SYNCREPOS_LOG_LEVEL;
  delete process.env.SYNCREPOS_LOG_LEVEL;
  tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'logger-test-'));
  captureStderr();
});

afterEach(() => {
  vi.restoreAllMocks();
  _resetForTesting();
  if (savedLevel === undefined) {
    delete process.env.SYNCREPOS_LOG_LEVEL;
  } else {
    process.env.SYNCREPOS_LOG_LEVEL = savedLevel;
  }
  fs.rmSync(tempDir, { recursive: true, force: true });
});

// ---------------------------------------------------------------------------
// parseLogLevel
// ---------------------------------------------------------------------------

describe('parseLogLevel', () => {
  it.each([
    ['silent', -999],
    ['error', 0],
    ['warn', 1],
    ['warning', 1],
    ['info', 3],
    ['debug', 4],
    ['verbose', 4],
    ['trace', 5],
  ])('parses "%s" to %d', (name, level) => {
    expect(parseLogLevel(name)).toBe(level);
  });

  it('is case insensitive and trims whitespace', () => {
    expect(parseLogLevel(' DEBUG\n')).toBe(4);
  });

  it('returns undefined for unknown names', () => {
    expect(parseLogLevel('bananas')).toBeUndefined();
    expect(parseLogLevel('3')).toBeUndefined();
  });
});

// ---------------------------------------------------------------------------
// initializeLogger — level resolution
// ---------------------------------------------------------------------------

describe('initializeLogger level resolution', () => {
  it('defaults to INFO', () => {
    initializeLogger({});
    expect(logger.level).toBe(LogLevel.INFO);
  });

  it('quiet wins over verbose and env', () => {
    process.env.SYNCREPOS_LOG_LEVEL = 'debug';
    initializeLogger({ quiet: true, verbose: true });
    expect(logger.level).toBe(LogLevel.ERROR);
  });

  it('verbose wins over env', () => {
    process.env.SYNCREPOS_LOG_LEVEL = 'warn';
    initializeLogger({ verbose: true });
    expect(logger.level).toBe(LogLevel.DEBUG);
  });

  it('env wins over config', () => {
    process.env.SYNCREPOS_LOG_LEVEL = 'warn';
    initializeLogger({ configLevel: 'trace' });
    expect(logger.level).toBe(LogLevel.WARN);
  });

  it('uses the config level when nothing else is set', () => {
    initializeLogger({ configLevel: 'debug' });
    expect(logger.level).toBe(LogLevel.DEBUG);
  });

  it('falls back to INFO for an invalid env value', () => {
    process.env.SYNCREPOS_LOG_LEVEL = 'bananas';
    initializeLogger({});
    expect(logger.level).toBe(LogLevel.INFO);
  });
});

// ---------------------------------------------------------------------------
// LogFileReporter
// ---------------------------------------------------------------------------

describe('LogFileReporter', () => {
  it('appends text lines with timestamp, level and message', () => {
    const logFile = path.join(tempDir, 'syncrepos.log');
    initializeLogger({ logFile });

    logger.warn('something went wrong');

    const content = fs.readFileSync(logFile, 'utf8');
    expect(content).toMatch(/^\[\d{4}-\d{2}-\d{2}T[\d:.]+Z\] WARN something went wrong\n$/);
  });

  it('writes JSONL when json mode is active', () => {
    const logFile = path.join(tempDir, 'syncrepos.log');
    initializeLogger({ logFile, json: true });

    logger.info('json message');

    const entry = JSON.parse(fs.readFileSync(logFile, 'utf8').trim());
    expect(entry).toMatchObject({ level: 'INFO', message: 'json message' });
  });

  it('creates the log directory', () => {
    const logFile = path.join(tempDir, 'nested', 'data', 'syncrepos.log');
    initializeLogger({ logFile });
    expect(fs.existsSync(path.dirname(logFile))).toBe(true);
  });

  it('keeps messages below the console level out of the file', () => {
    const logFile = path.join(tempDir, 'syncrepos.log');
    initializeLogger({ logFile });

    logger.debug('hidden');
    logger.info('shown');

    expect(fs.readFileSync(logFile, 'utf8')).not.toContain('hidden');
  });

  it('rotates a file past the size limit and shifts older files', () => {
    const logFile = path.join(tempDir, 'syncrepos.log');
    const big = 'x'.repeat(MAX_LOG_FILE_SIZE + 1);
    fs.writeFileSync(logFile, big);
    fs.writeFileSync(`${logFile}.1`, 'rotated-1');
    fs.writeFileSync(`${logFile}.2`, 'rotated-2');

    initializeLogger({ logFile });

    expect(fs.readFileSync(`${logFile}.2`, 'utf8')).toBe('rotated-1');
    expect(fs.readFileSync(`${logFile}.1`, 'utf8')).toBe(big);
    expect(fs.existsSync(logFile)).toBe(false);
  });

  it('warns once on stderr when the log cannot be written', () => {
    const blocker = path.join(tempDir, 'blocker');
    fs.writeFileSync(blocker, '');
    initializeLogger({ logFile: path.join(blocker, 'syncrepos.log') });

    logger.error('first');
    logger.error('second');

    expect(stderr.filter((line) => line.includes('Log file unavailable'))).toHaveLength(1);
  });
});

// ---------------------------------------------------------------------------
// ConditionalStderrReporter
// ---------------------------------------------------------------------------

describe('ConditionalStderrReporter', () => {
  it('prints warnings and errors without verbose', () => {
    initializeLogger({ noColor: true });

    logger.error('err-msg');
    logger.warn('wrn-msg');
    logger.info('inf-msg');

    expect(stderr).toEqual(['[ERROR] err-msg\n', '[WARN] wrn-msg\n']);
  });

  it('prints info and debug in verbose mode', () => {
    initializeLogger({ verbose: true, noColor: true });

    logger.info('inf-verbose');
    logger.debug('dbg-verbose');

    expect(stderr).toEqual(['[INFO] inf-verbose\n', '[DEBUG] dbg-verbose\n']);
  });
});

// ---------------------------------------------------------------------------
// Process exit handler
// ---------------------------------------------------------------------------

describe('Process exit handler', () => {
  it('appends a RUN record with the session id', () => {
    const logFile = path.join(tempDir, 'syncrepos.log');
    initializeLogger({ logFile, commandName: 'propagate', root: '/ws' });
    setRunContext({ sessionId: '20261018140509' });

    process.emit('exit', 0);

    const lines = fs.readFileSync(logFile, 'utf8').trim().split('\n');
    expect(lines[lines.length - 1]).toMatch(
      /RUN command=propagate root=\/ws session=20261018140509 exit=0 duration=\d+ms$/
    );
  });

  it('writes nothing without a log file', () => {
    initializeLogger({ commandName: 'sessions' });
    expect(() => process.emit('exit', 0)).not.toThrow();
  });
});
