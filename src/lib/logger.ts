/**
 * Logging system for syncrepos
 *
 * Consola-based singleton logger with:
 * - LogFileReporter: append-only run log in the data directory, size-based rotation
 * - ConditionalStderrReporter: verbose/quiet aware stderr output
 * - Run record (command, root, exit code, duration) appended on exit
 *
 * Configuration sources (in order of priority):
 * 1. CLI flags (--verbose, --quiet, --no-color)
 * 2. Environment variable (SYNCREPOS_LOG_LEVEL)
 * 3. Config file (logging.level)
 * 4. Default (INFO)
 */

import fs from 'fs';
import path from 'path';
import { createConsola } from 'consola';
import type { ConsolaReporter, LogObject } from 'consola';
import { LogLevel, LOG_LEVEL_ENV, MAX_LOG_FILE_SIZE, MAX_LOG_FILES } from './constants.js';
import { setColorEnabled } from './colors.js';

export { LogLevel };

// ---------------------------------------------------------------------------
// Module-level state
// ---------------------------------------------------------------------------

/** Whether JSON output mode is active */
let jsonMode = false;

/** Run context for the process exit handler */
let runContext: {
  command?: string;
  startTime?: number;
  root?: string;
  sessionId?: string;
} = {};

/** Track whether exit handler has been registered */
let exitHandlerRegistered = false;

/** Track whether log file warning has been issued */
let logFileWarned = false;

/** Reference to the LogFileReporter for exit-time sync write */
let activeFileReporter: LogFileReporter | null = null;

// ---------------------------------------------------------------------------
// LogFileReporter
// ---------------------------------------------------------------------------

/**
 * Appends log entries to the run log. Writes are synchronous so the log
 * holds every diagnostic before the next git command runs.
 * Human-readable text lines by default; JSONL when json mode is active.
 */
class LogFileReporter implements ConsolaReporter {
  readonly filePath: string;
  private writable = true;

  constructor(filePath: string) {
    this.filePath = filePath;
    try {
      fs.mkdirSync(path.dirname(filePath), { recursive: true });
      rotateIfNeeded(filePath);
    } catch (err) {
      this.disable(err);
    }
  }

  log(logObj: LogObject): void {
    if (!this.writable) return;

    const timestamp = new Date().toISOString();
    const levelName = levelToName(logObj.level);
    const message = formatLogArgs(logObj.args);

    const line = jsonMode
      ? JSON.stringify({
          timestamp,
          level: levelName,
          ...(logObj.tag ? { tag: logObj.tag } : {}),
          message,
        })
      : `[${timestamp}] ${levelName}${logObj.tag ? ` [${logObj.tag}]` : ''} ${message}`;

    try {
      fs.appendFileSync(this.filePath, line + '\n');
    } catch (err) {
      this.disable(err);
    }
  }

  private disable(err: unknown): void {
    this.writable = false;
    if (!logFileWarned) {
      logFileWarned = true;
      const msg = err instanceof Error ? err.message : String(err);
      process.stderr.write(`[syncrepos] Log file unavailable: ${msg}\n`);
    }
  }
}

// ---------------------------------------------------------------------------
// ConditionalStderrReporter
// ---------------------------------------------------------------------------

/**
 * Writes to stderr based on log level and verbose mode.
 * WARN and ERROR always print; DEBUG/INFO/TRACE only print when verbose=true.
 */
class ConditionalStderrReporter implements ConsolaReporter {
  private verbose: boolean;
  private useColors: boolean;

  constructor(verbose: boolean, useColors: boolean) {
    this.verbose = verbose;
    this.useColors = useColors;
  }

  log(logObj: LogObject): void {
    // warn (1) and error (0) always print
    if (logObj.level >= 2 && !this.verbose) {
      return;
    }

    const levelName = levelToName(logObj.level);
    const tag = logObj.tag ? ` [${logObj.tag}]` : '';
    const message = formatLogArgs(logObj.args);
    const prefix = this.useColors ? colorizeLevel(levelName, logObj.level) : `[${levelName}]`;

    process.stderr.write(`${prefix}${tag} ${message}\n`);
  }
}

// ---------------------------------------------------------------------------
// Rotation logic
// ---------------------------------------------------------------------------

function rotateIfNeeded(filePath: string): void {
  if (!fs.existsSync(filePath)) return;
  const stats = fs.statSync(filePath);
  if (stats.size <= MAX_LOG_FILE_SIZE) return;

  // Shift: log.2 deleted, log.1 -> .2, log -> .1
  for (let i = MAX_LOG_FILES - 1; i >= 1; i--) {
    const older = `${filePath}.${i}`;
    const newer = i === 1 ? filePath : `${filePath}.${i - 1}`;

    if (fs.existsSync(newer)) {
      if (i === MAX_LOG_FILES - 1 && fs.existsSync(older)) {
        fs.unlinkSync(older);
      }
      fs.renameSync(newer, older);
    }
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function levelToName(level: number): string {
  if (level <= 0) {
    return level === 0 ? 'ERROR' : 'SILENT';
  }
  switch (level) {
    case 1:
      return 'WARN';
    case 2:
      return 'LOG';
    case 3:
      return 'INFO';
    case 4:
      return 'DEBUG';
    default:
      return 'TRACE';
  }
}

function colorizeLevel(name: string, level: number): string {
  const RED = '\x1b[31m';
  const YELLOW = '\x1b[33m';
  const CYAN = '\x1b[36m';
  const GRAY = '\x1b[90m';
  const RESET = '\x1b[0m';

  switch (true) {
    case level <= 0:
      return `${RED}[${name}]${RESET}`;
    case level === 1:
      return `${YELLOW}[${name}]${RESET}`;
    case level <= 3:
      return `${CYAN}[${name}]${RESET}`;
    default:
      return `${GRAY}[${name}]${RESET}`;
  }
}

function formatLogArgs(args: unknown[]): string {
  return args
    .map((a) => {
      if (a instanceof Error) return a.message;
      return typeof a === 'object' && a !== null ? JSON.stringify(a) : String(a);
    })
    .join(' ');
}

// ---------------------------------------------------------------------------
// Logger singleton
// ---------------------------------------------------------------------------

/**
 * The singleton consola logger instance.
 * Starts with empty reporters — call initializeLogger() to configure.
 */
export const logger = createConsola({
  level: LogLevel.INFO,
  reporters: [],
});

// ---------------------------------------------------------------------------
// initializeLogger
// ---------------------------------------------------------------------------

export interface LoggerOptions {
  verbose?: boolean;
  quiet?: boolean;
  noColor?: boolean;
  json?: boolean;
  /** Level name from the config file, used when no flag or env var is set */
  configLevel?: string;
  /** Absolute path of the run log; omit to log to stderr only */
  logFile?: string;
  commandName?: string;
  root?: string;
}

/**
 * Configure the logger with CLI flags, env vars, and reporters.
 * Safe to call multiple times (replaces reporters each time).
 */
export function initializeLogger(options: LoggerOptions = {}): void {
  // 1. Resolve level: CLI flag > env var > config > default
  let level: number = LogLevel.INFO;
  const envLevel = process.env[LOG_LEVEL_ENV];

  if (options.quiet) {
    level = LogLevel.ERROR;
  } else if (options.verbose) {
    level = LogLevel.DEBUG;
  } else if (envLevel) {
    level = parseLogLevel(envLevel) ?? LogLevel.INFO;
  } else if (options.configLevel) {
    level = parseLogLevel(options.configLevel) ?? LogLevel.INFO;
  }

  logger.level = level;

  // 2. Handle color
  const useColors = !options.noColor && process.env.NO_COLOR === undefined;
  if (options.noColor) {
    setColorEnabled(false);
  }

  // 3. JSON mode
  jsonMode = options.json ?? false;

  // 4. Build reporters
  const reporters: ConsolaReporter[] = [];

  activeFileReporter = null;
  if (options.logFile) {
    activeFileReporter = new LogFileReporter(options.logFile);
    reporters.push(activeFileReporter);
  }

  reporters.push(new ConditionalStderrReporter(options.verbose ?? false, useColors));
  logger.setReporters(reporters);

  // 5. Run tracking
  if (options.commandName) {
    runContext.command = options.commandName;
    runContext.startTime = Date.now();
    runContext.root = options.root ?? process.cwd();
  }

  if (!exitHandlerRegistered) {
    exitHandlerRegistered = true;
    process.on('exit', (code) => {
      if (!runContext.command || !activeFileReporter) return;

      const duration = runContext.startTime ? Date.now() - runContext.startTime : 0;
      const timestamp = new Date().toISOString();
      const session = runContext.sessionId ? ` session=${runContext.sessionId}` : '';
      const line = jsonMode
        ? JSON.stringify({
            type: 'run',
            timestamp,
            command: runContext.command,
            root: runContext.root,
            sessionId: runContext.sessionId,
            exitCode: code,
            durationMs: duration,
          })
        : `[${timestamp}] RUN command=${runContext.command} root=${runContext.root}${session} exit=${code} duration=${duration}ms`;

      // Must be synchronous — Node.js does not process async after 'exit'
      try {
        fs.appendFileSync(activeFileReporter.filePath, line + '\n');
      } catch {
        // Nothing left to report to once the process is exiting
      }
    });
  }
}

/**
 * Merge additional metadata into the run context.
 * Called from command handlers once a session id is known.
 */
export function setRunContext(ctx: Partial<typeof runContext>): void {
  Object.assign(runContext, ctx);
}

/**
 * Parse a string log level name to its numeric consola equivalent.
 * Returns undefined for unrecognized values.
 */
export function parseLogLevel(value: string): number | undefined {
  const normalized = value.toLowerCase().trim();
  const mapping: Record<string, number> = {
    silent: LogLevel.SILENT,
    error: LogLevel.ERROR,
    warn: LogLevel.WARN,
    warning: LogLevel.WARN,
    info: LogLevel.INFO,
    debug: LogLevel.DEBUG,
    verbose: LogLevel.DEBUG,
    trace: LogLevel.TRACE,
  };
  return mapping[normalized];
}

/**
 * Reset all module-level state for test isolation.
 * Prefixed with _ to signal internal-only use.
 */
export function _resetForTesting(): void {
  jsonMode = false;
  runContext = {};
  logFileWarned = false;
  activeFileReporter = null;
  // process.on('exit') handlers cannot be removed cleanly; registered once per process
  logger.setReporters([]);
  logger.level = LogLevel.INFO;
}
