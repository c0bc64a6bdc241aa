/**
 * Logger setup for a CLI invocation, run once before the command handler
 */

import path from 'path';
import { loadConfig } from '../../lib/config.js';
import { LOG_FILE_NAME } from '../../lib/constants.js';
import { initializeLogger } from '../../lib/logger.js';
import type { GlobalArgs } from './workspace.js';

export interface EnvironmentArgs extends GlobalArgs {
  json?: boolean;
  _: Array<string | number>;
}

/**
 * Point the logger at the workspace's data directory with the configured level.
 * An invalid config file surfaces here and ends the run.
 */
export function initializeCliEnvironment(argv: EnvironmentArgs): void {
  const root = path.resolve(argv.root ?? process.cwd());
  const config = loadConfig(root);

  initializeLogger({
    verbose: argv.verbose,
    quiet: argv.quiet,
    noColor: argv.color === false,
    json: argv.json,
    configLevel: config.logLevel,
    logFile: path.join(config.dataDir, LOG_FILE_NAME),
    commandName: String(argv._[0] ?? 'menu'),
    root,
  });
}
