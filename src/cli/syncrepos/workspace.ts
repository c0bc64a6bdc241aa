/**
 * Shared command plumbing: workspace loading, gate policy, failure reporting
 */

import path from 'path';
import { loadConfig } from '../../lib/config.js';
import type { ResolvedConfig } from '../../lib/config.js';
import {
  EmptyChangeSetError,
  SelectionError,
  UserCancelledError,
  errorMessage,
  isFatalError,
  isSyncError,
} from '../../lib/errors.js';
import { createGitVcs } from '../../lib/git.js';
import {
  createErrorResult,
  createSuccessResult,
  getErrorCodeFromError,
  getErrorSuggestion,
} from '../../lib/json-output.js';
import { logger } from '../../lib/logger.js';
import { InteractivePolicy, TablePolicy } from '../../lib/sync/decisions.js';
import type { DecisionPolicy } from '../../lib/sync/decisions.js';
import { discoverRepositories } from '../../lib/sync/discovery.js';
import { SessionStore } from '../../lib/sync/session.js';
import type { Repository, Vcs } from '../../lib/sync/types.js';
import { errorToDisplay, printError, printJson, printStatus } from '../../lib/ui/index.js';

/**
 * Options every command accepts
 */
export interface GlobalArgs {
  root?: string;
  verbose?: boolean;
  quiet?: boolean;
  color?: boolean;
}

export interface Workspace {
  /** Absolute directory whose subdirectories are the repositories */
  root: string;
  config: ResolvedConfig;
  vcs: Vcs;
  store: SessionStore;
  /** Discovered repositories in listing order; empty when discovery was skipped */
  repositories: Repository[];
}

export interface CommandDeps {
  vcs: Vcs;
  /** Overrides terminal detection */
  interactive?: boolean;
}

export function defaultDeps(): CommandDeps {
  return { vcs: createGitVcs() };
}

/**
 * Load the config and discover repositories under the workspace root
 */
export function openWorkspace(
  rootArg: string | undefined,
  vcs: Vcs,
  options: { discover?: boolean } = {}
): Workspace {
  const root = path.resolve(rootArg ?? process.cwd());
  const config = loadConfig(root);
  const repositories = options.discover === false ? [] : discoverRepositories(root);
  logger.debug(`Workspace ${root}: ${repositories.length} repositories`);
  return { root, config, vcs, store: new SessionStore(config.dataDir), repositories };
}

/**
 * Prompts are only shown on a terminal, and never with --yes or --json
 */
export function isInteractive(options: { yes?: boolean; json?: boolean }, deps: CommandDeps): boolean {
  if (options.yes || options.json) {
    return false;
  }
  return deps.interactive ?? (process.stdin.isTTY === true && process.stdout.isTTY === true);
}

export function createPolicy(config: ResolvedConfig, interactive: boolean): DecisionPolicy {
  return interactive ? new InteractivePolicy() : new TablePolicy(config.gates);
}

/**
 * Fail for input that would otherwise be prompted for
 */
export function missing(what: string): never {
  throw new SelectionError(`Missing ${what} (required when not running interactively)`);
}

/**
 * Report an error that ended a command and return its exit code.
 * An empty change set is "nothing to do", not a failure.
 */
export function reportFailure(command: string, error: unknown, json: boolean): number {
  if (error instanceof EmptyChangeSetError) {
    printStatus('info', error.message);
    printJson(createSuccessResult(command, { nothingToDo: true, message: error.message }));
    return 0;
  }

  const code = getErrorCodeFromError(error);
  if (isFatalError(error) || error instanceof UserCancelledError) {
    logger.info(`${command} stopped: ${errorMessage(error)}`);
  } else {
    // Anything else escaped the item boundary
    logger.error(`${command} failed: ${errorMessage(error)}`);
    if (!isSyncError(error) && error instanceof Error && error.stack) {
      logger.debug(error.stack);
    }
  }

  if (json) {
    const suggestion = getErrorSuggestion(code);
    printJson(
      createErrorResult(command, code, errorMessage(error), suggestion ? { suggestion } : undefined)
    );
  } else if (error instanceof UserCancelledError) {
    printStatus('warning', error.message);
  } else {
    printError(errorToDisplay(error));
  }

  return error instanceof UserCancelledError ? 130 : 1;
}

/**
 * Exit code for a finished run
 */
export function runExitCode(hasFailures: boolean, failOnError: boolean | undefined): number {
  return hasFailures && failOnError ? 2 : 0;
}
