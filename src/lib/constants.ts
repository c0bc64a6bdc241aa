/**
 * Centralized constants and defaults for syncrepos
 */

import path from 'path';

/**
 * Default data directory, relative to the workspace root
 */
export const DEFAULT_DATA_DIR = '.syncrepos';

/**
 * Environment variable overriding the data directory
 */
export const DATA_DIR_ENV = 'SYNCREPOS_DATA_DIR';

/**
 * Environment variable selecting the log level
 */
export const LOG_LEVEL_ENV = 'SYNCREPOS_LOG_LEVEL';

/**
 * Log file name inside the data directory
 */
export const LOG_FILE_NAME = 'syncrepos.log';

/**
 * Sessions directory name inside the data directory
 */
export const SESSIONS_DIR_NAME = 'sessions';

/**
 * Ledger file written into every session directory
 */
export const SESSION_LEDGER_FILE = 'session.json';

/**
 * File name of the propagated patch inside a session directory
 */
export const SESSION_PATCH_FILE = 'change.patch';

/**
 * Config file names to look for at the workspace root (in order of priority)
 */
export const CONFIG_FILE_NAMES = ['.syncreposrc', '.syncreposrc.json'];

/**
 * Lines of context around each hunk in exported working-tree patches
 */
export const DEFAULT_CONTEXT_LINES = 10;

/**
 * Number of commits shown when picking commits from recent history
 */
export const DEFAULT_RECENT_COMMIT_COUNT = 30;

/**
 * Paths never offered for propagation.
 * The data directory pattern is appended at runtime from the resolved config.
 */
export const DEFAULT_EXCLUDE_GLOBS = [
  'node_modules/**',
  'vendor/**',
  'storage/**',
  'build/**',
  'dist/**',
  '.git/**',
];

/**
 * Paths that need an explicit confirmation before they are overwritten
 */
export const DEFAULT_CRITICAL_GLOBS = [
  '**/.env',
  '**/*.env',
  '**/.env.*',
  'config/*.php',
  'config/*.json',
  'app/Providers/*.php',
];

/**
 * Log levels (consola numeric levels)
 */
export enum LogLevel {
  SILENT = -999,
  ERROR = 0,
  WARN = 1,
  INFO = 3,
  DEBUG = 4,
  TRACE = 5,
}

/**
 * Size at which the log file rotates (5 MB)
 */
export const MAX_LOG_FILE_SIZE = 5 * 1024 * 1024;

/**
 * Number of log files kept, including the active one
 */
export const MAX_LOG_FILES = 3;

/**
 * Resolve the data directory for a workspace root.
 * SYNCREPOS_DATA_DIR wins over the configured value; relative values
 * resolve against the workspace root.
 */
export function resolveDataDir(root: string, configured: string = DEFAULT_DATA_DIR): string {
  const value = process.env[DATA_DIR_ENV] || configured;
  return path.isAbsolute(value) ? value : path.resolve(root, value);
}
