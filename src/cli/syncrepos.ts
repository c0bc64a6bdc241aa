#!/usr/bin/env node
/**
 * syncrepos - Propagate changes across sibling git repositories
 *
 * Commands:
 *   syncrepos                    Interactive main menu
 *   syncrepos propagate          Propagate changes from a source to targets
 *   syncrepos revert [session]   Revert a recorded session
 *   syncrepos sessions           List recorded sessions
 *
 * Short Aliases:
 *   syncrepos p   -> syncrepos propagate
 *   syncrepos r   -> syncrepos revert
 *   syncrepos ls  -> syncrepos sessions
 */

import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';

import { propagateCommand } from './syncrepos/propagate.js';
import { revertCommand } from './syncrepos/revert.js';
import { sessionsCommand } from './syncrepos/sessions.js';
import { showMainMenu } from './syncrepos/interactive-menu.js';
import { initializeCliEnvironment } from './syncrepos/environment.js';
import { errorToDisplay, printError } from '../lib/ui/index.js';

yargs(hideBin(process.argv))
  .scriptName('syncrepos')
  .usage('$0 [command] [options]')
  .option('root', {
    type: 'string',
    description: 'Workspace directory holding the repositories (default: cwd)',
    global: true,
  })
  .option('verbose', {
    alias: 'v',
    type: 'boolean',
    description: 'Show debug output',
    global: true,
  })
  .option('quiet', {
    alias: 'q',
    type: 'boolean',
    description: 'Only show errors',
    global: true,
  })
  .option('color', {
    type: 'boolean',
    description: 'Colorize output (--no-color to disable)',
    default: true,
    global: true,
  })
  .middleware((argv) => {
    initializeCliEnvironment(argv);
  })
  .command(
    '$0',
    'Interactive main menu (when no command specified)',
    () => {},
    async (argv) => {
      await showMainMenu({ root: argv.root });
    }
  )
  .command(propagateCommand)
  .command(revertCommand)
  .command(sessionsCommand)
  .alias('h', 'help')
  .help()
  .version()
  .wrap(Math.min(100, process.stdout.columns ?? 100))
  .example('syncrepos', 'Launch the interactive main menu')
  .example('syncrepos p -s api -t all --scope both', 'Copy working-tree changes to every sibling')
  .example('syncrepos revert latest', 'Revert the most recent session')
  .example('syncrepos ls --json', 'List sessions as JSON')
  .strict()
  .fail((msg, err) => {
    if (err) {
      printError(errorToDisplay(err));
    } else {
      console.error(msg);
    }
    process.exit(1);
  })
  .parseAsync()
  .catch((err: unknown) => {
    printError(errorToDisplay(err));
    process.exit(1);
  });
