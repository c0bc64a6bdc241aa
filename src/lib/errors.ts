/**
 * Custom error classes for syncrepos
 *
 * These provide structured error handling with specific error types
 * that can be caught and handled differently based on the error kind.
 * Per-item errors (PathError, ConflictError, MutationError, BackupError)
 * are converted to item results by the engines; selection, discovery and
 * configuration errors propagate to the CLI and end the process.
 */

/**
 * Base error class for all syncrepos errors
 */
export class SyncError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SyncError';
    // Maintains proper stack trace for where error was thrown
    Error.captureStackTrace?.(this, this.constructor);
  }
}

/**
 * Error thrown when a git command fails
 */
export class GitCommandError extends SyncError {
  public readonly command: string;
  public readonly exitCode?: number;
  public readonly stderr?: string;

  constructor(message: string, options: { command: string; exitCode?: number; stderr?: string }) {
    super(message);
    this.name = 'GitCommandError';
    this.command = options.command;
    this.exitCode = options.exitCode;
    this.stderr = options.stderr;
  }
}

/**
 * Error thrown for bad operator input: invalid index, malformed commit id or range
 */
export class SelectionError extends SyncError {
  public readonly input?: string;

  constructor(message: string, options: { input?: string } = {}) {
    super(message);
    this.name = 'SelectionError';
    this.input = options.input;
  }
}

/**
 * Error thrown when there is nothing to operate on (no repositories, no targets, no sessions)
 */
export class DiscoveryError extends SyncError {
  constructor(message: string) {
    super(message);
    this.name = 'DiscoveryError';
  }
}

/**
 * Raised when an extraction yields no qualifying changes.
 * A "nothing to do" outcome rather than a failure.
 */
export class EmptyChangeSetError extends DiscoveryError {
  public readonly source: string;

  constructor(source: string, message: string = `No changes to sync from ${source}`) {
    super(message);
    this.name = 'EmptyChangeSetError';
    this.source = source;
  }
}

/**
 * Error thrown when a source file or destination directory is missing
 */
export class PathError extends SyncError {
  public readonly filePath: string;

  constructor(message: string, options: { filePath: string }) {
    super(message);
    this.name = 'PathError';
    this.filePath = options.filePath;
  }
}

/**
 * Error thrown when a target has diverged locally or a patch does not apply cleanly
 */
export class ConflictError extends SyncError {
  public readonly target: string;

  constructor(message: string, options: { target: string }) {
    super(message);
    this.name = 'ConflictError';
    this.target = options.target;
  }
}

/**
 * Error thrown when a copy or apply step itself fails
 */
export class MutationError extends SyncError {
  public readonly target: string;
  public readonly stderr?: string;

  constructor(message: string, options: { target: string; stderr?: string }) {
    super(message);
    this.name = 'MutationError';
    this.target = options.target;
    this.stderr = options.stderr;
  }
}

/**
 * Error thrown when a pre-state snapshot cannot be written.
 * The mutation it guards must not run.
 */
export class BackupError extends SyncError {
  public readonly sessionId: string;

  constructor(message: string, options: { sessionId: string }) {
    super(message);
    this.name = 'BackupError';
    this.sessionId = options.sessionId;
  }
}

/**
 * Error thrown when configuration is invalid
 */
export class ConfigurationError extends SyncError {
  public readonly configFile?: string;
  public readonly issues?: string[];

  constructor(message: string, options: { configFile?: string; issues?: string[] } = {}) {
    super(message);
    this.name = 'ConfigurationError';
    this.configFile = options.configFile;
    this.issues = options.issues;
  }
}

/**
 * Error thrown when user cancels an operation
 */
export class UserCancelledError extends SyncError {
  constructor(message: string = 'Operation cancelled by user') {
    super(message);
    this.name = 'UserCancelledError';
  }
}

/**
 * Type guard to check if error is a SyncError
 */
export function isSyncError(error: unknown): error is SyncError {
  return error instanceof SyncError;
}

/**
 * Type guard to check if error is a GitCommandError
 */
export function isGitCommandError(error: unknown): error is GitCommandError {
  return error instanceof GitCommandError;
}

/**
 * Errors that end the process with a non-zero exit code
 */
export function isFatalError(error: unknown): boolean {
  if (error instanceof EmptyChangeSetError) {
    return false;
  }
  return (
    error instanceof SelectionError ||
    error instanceof DiscoveryError ||
    error instanceof ConfigurationError
  );
}

/**
 * Message of any thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
