/**
 * Main menu shown when syncrepos runs without a command
 */

import inquirer from 'inquirer';
import * as colors from '../../lib/colors.js';
import { runPropagate } from './propagate.js';
import { runRevert } from './revert.js';
import { runSessions } from './sessions.js';
import { defaultDeps } from './workspace.js';
import type { CommandDeps, GlobalArgs } from './workspace.js';

type MenuAction = 'propagate' | 'revert' | 'sessions' | 'exit';

/**
 * Loop until the operator exits. Each action reports its own errors.
 */
export async function showMainMenu(args: GlobalArgs = {}, deps: CommandDeps = defaultDeps()): Promise<void> {
  console.log(colors.header('\nsyncrepos'));
  console.log(colors.dim(`  ${args.root ?? process.cwd()}\n`));

  for (;;) {
    const { action } = await inquirer.prompt<{ action: MenuAction }>([
      {
        type: 'list',
        name: 'action',
        message: 'What would you like to do?',
        choices: [
          { name: 'Propagate changes', value: 'propagate' },
          { name: 'Revert a session', value: 'revert' },
          { name: 'List sessions', value: 'sessions' },
          new inquirer.Separator(),
          { name: 'Exit', value: 'exit' },
        ],
      },
    ]);

    switch (action) {
      case 'propagate':
        await runPropagate({ root: args.root }, deps);
        break;
      case 'revert':
        await runRevert({ root: args.root }, deps);
        break;
      case 'sessions':
        await runSessions({ root: args.root }, deps);
        break;
      case 'exit':
        return;
    }
  }
}
