/**
 * syncrepos sessions - List recorded sessions
 */

import type { CommandModule } from 'yargs';
import { createSuccessResult } from '../../lib/json-output.js';
import type { SessionSummary } from '../../lib/sync/session.js';
import { printJson, printTable, setJsonMode } from '../../lib/ui/index.js';
import { defaultDeps, openWorkspace, reportFailure } from './workspace.js';
import type { CommandDeps, GlobalArgs } from './workspace.js';

export interface SessionsArgs extends GlobalArgs {
  json?: boolean;
}

function sessionRow(s: SessionSummary): string[] {
  return [
    s.id,
    s.createdAt.replace('T', ' ').slice(0, 19),
    s.strategy,
    s.source,
    s.targets.join(', ') || '-',
    String(s.entries),
    s.closed ? 'closed' : 'open',
  ];
}

export async function runSessions(args: SessionsArgs, deps: CommandDeps = defaultDeps()): Promise<number> {
  setJsonMode(!!args.json);
  try {
    const ws = openWorkspace(args.root, deps.vcs, { discover: false });
    const sessions = ws.store.listSessions().reverse();

    printTable({
      title: 'Sessions',
      columns: ['ID', 'Created', 'Strategy', 'Source', 'Targets', 'Items', 'State'],
      rows: sessions.map(sessionRow),
      emptyMessage: 'No sessions recorded',
    });
    printJson(createSuccessResult('sessions', { sessions }));
    return 0;
  } catch (error) {
    return reportFailure('sessions', error, !!args.json);
  }
}

export const sessionsCommand: CommandModule<object, SessionsArgs> = {
  command: ['sessions', 'ls'],
  describe: 'List recorded sessions, newest first',
  builder: (yargs) => {
    return yargs
      .option('json', {
        alias: 'j',
        type: 'boolean',
        description: 'Output as JSON',
        default: false,
      })
      .example('$0 sessions', 'List sessions')
      .example('$0 ls --json', 'Sessions as JSON');
  },
  handler: async (argv) => {
    process.exitCode = await runSessions(argv);
  },
};
