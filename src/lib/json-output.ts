/**
 * JSON output utilities for machine-readable CLI output
 *
 * Provides structured results for `--json` runs so scripts can drive
 * syncrepos without scraping the human-readable tables.
 */

/**
 * Standard error codes for programmatic handling
 */
export enum ErrorCode {
  // Repository errors
  NOT_GIT_REPO = 'NOT_GIT_REPO',
  NO_REPOSITORIES = 'NO_REPOSITORIES',
  NO_TARGETS = 'NO_TARGETS',
  NO_CHANGES = 'NO_CHANGES',
  NO_SESSIONS = 'NO_SESSIONS',
  SESSION_NOT_FOUND = 'SESSION_NOT_FOUND',

  // Config errors
  INVALID_CONFIG = 'INVALID_CONFIG',

  // User errors
  USER_CANCELLED = 'USER_CANCELLED',
  INVALID_SELECTION = 'INVALID_SELECTION',

  // Operation errors
  BACKUP_FAILED = 'BACKUP_FAILED',
  APPLY_FAILED = 'APPLY_FAILED',

  // System errors
  UNKNOWN_ERROR = 'UNKNOWN_ERROR',
  OPERATION_FAILED = 'OPERATION_FAILED',
}

/**
 * Error information for structured error responses
 */
export interface ErrorInfo {
  code: ErrorCode;
  message: string;
  details?: Record<string, unknown>;
}

/**
 * Standard JSON response schema for all commands
 */
export interface CommandResult<T = Record<string, unknown>> {
  success: boolean;
  command: string;
  timestamp: string;

  /** Command-specific data */
  data?: T;

  /** Error information (present when success is false) */
  error?: ErrorInfo;

  /** Warnings that didn't prevent success */
  warnings?: string[];
}

/**
 * Create a successful command result
 */
export function createSuccessResult<T>(
  command: string,
  data: T,
  warnings?: string[]
): CommandResult<T> {
  return {
    success: true,
    command,
    timestamp: new Date().toISOString(),
    data,
    warnings: warnings?.length ? warnings : undefined,
  };
}

/**
 * Create a failed command result
 */
export function createErrorResult(
  command: string,
  code: ErrorCode,
  message: string,
  details?: Record<string, unknown>
): CommandResult<never> {
  return {
    success: false,
    command,
    timestamp: new Date().toISOString(),
    error: {
      code,
      message,
      details,
    },
  };
}

/**
 * Map error class names to error codes
 */
export function getErrorCodeFromError(error: unknown): ErrorCode {
  if (error instanceof Error) {
    switch (error.name) {
      case 'EmptyChangeSetError':
        return ErrorCode.NO_CHANGES;
      case 'DiscoveryError':
        if (error.message.startsWith('No targets')) return ErrorCode.NO_TARGETS;
        if (error.message.startsWith('No sessions')) return ErrorCode.NO_SESSIONS;
        return ErrorCode.NO_REPOSITORIES;
      case 'SelectionError':
        if (error.message.startsWith('Session not found')) return ErrorCode.SESSION_NOT_FOUND;
        return ErrorCode.INVALID_SELECTION;
      case 'ConfigurationError':
        return ErrorCode.INVALID_CONFIG;
      case 'UserCancelledError':
        return ErrorCode.USER_CANCELLED;
      case 'BackupError':
        return ErrorCode.BACKUP_FAILED;
      case 'MutationError':
        return ErrorCode.APPLY_FAILED;
      case 'GitCommandError':
        if (/not a git repository/i.test(error.message)) {
          return ErrorCode.NOT_GIT_REPO;
        }
        return ErrorCode.OPERATION_FAILED;
      default:
        if (/not a git repository/i.test(error.message)) {
          return ErrorCode.NOT_GIT_REPO;
        }
        return ErrorCode.UNKNOWN_ERROR;
    }
  }
  return ErrorCode.UNKNOWN_ERROR;
}

const suggestions: Partial<Record<ErrorCode, string>> = {
  [ErrorCode.NOT_GIT_REPO]: 'Make sure the directory is a git repository (git init).',
  [ErrorCode.NO_REPOSITORIES]:
    'Run syncrepos from a directory whose subdirectories are git repositories, or pass --root.',
  [ErrorCode.INVALID_SELECTION]: 'Check the index, commit id or range and try again.',
  [ErrorCode.INVALID_CONFIG]: 'Fix the reported keys in .syncreposrc.',
  [ErrorCode.SESSION_NOT_FOUND]: 'Run `syncrepos sessions` to list recorded sessions.',
  [ErrorCode.BACKUP_FAILED]: 'Check that the data directory is writable.',
};

/**
 * Suggested next step for an error code, if any
 */
export function getErrorSuggestion(code: ErrorCode): string | undefined {
  return suggestions[code];
}
