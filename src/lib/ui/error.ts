/**
 * Structured error display: message, tool output, suggested next step
 */

import * as colors from '../colors.js';
import { ConfigurationError, MutationError, errorMessage, isGitCommandError } from '../errors.js';
import { getErrorCodeFromError, getErrorSuggestion } from '../json-output.js';
import { printErr } from './output.js';

export interface ErrorDisplayOptions {
  title: string;
  detail?: string;
  hint?: string;
}

/**
 * Display a structured error to stderr
 *
 * ```
 * ✗ {title}
 *   {detail}
 *   Hint: {hint}
 * ```
 */
export function printError(options: ErrorDisplayOptions): void {
  printErr(colors.error(options.title));
  if (options.detail) {
    for (const line of options.detail.split('\n')) {
      printErr(`  ${line}`);
    }
  }
  if (options.hint) {
    printErr(`  ${colors.dim(`Hint: ${options.hint}`)}`);
  }
}

function detailOf(error: unknown): string | undefined {
  if (isGitCommandError(error) || error instanceof MutationError) {
    return error.stderr?.trim() || undefined;
  }
  if (error instanceof ConfigurationError && error.issues?.length) {
    return error.issues.join('\n');
  }
  return undefined;
}

/**
 * Map an error to what printError shows
 */
export function errorToDisplay(error: unknown): ErrorDisplayOptions {
  return {
    title: errorMessage(error),
    detail: detailOf(error),
    hint: getErrorSuggestion(getErrorCodeFromError(error)),
  };
}
