/**
 * Interactive pickers for the propagate flow
 */

import { cyan, dim } from '../../lib/colors.js';
import { EmptyChangeSetError, SelectionError } from '../../lib/errors.js';
import { promptChoice, promptInput } from '../../lib/prompts.js';
import { selectTargets } from '../../lib/sync/discovery.js';
import { listCandidates } from '../../lib/sync/extractor.js';
import { parseCommitList, parseIndexSelection, parseRange } from '../../lib/sync/selection.js';
import type {
  ChangeScope,
  ChangeSelection,
  Repository,
  SelectionMode,
  Strategy,
} from '../../lib/sync/types.js';
import { print, printHeader } from '../../lib/ui/index.js';
import type { Workspace } from './workspace.js';

function printIndexed(items: readonly string[]): void {
  items.forEach((item, i) => print(`  ${cyan(`[${i}]`)} ${item}`));
  print('');
}

export async function promptSource(repos: readonly Repository[]): Promise<Repository> {
  return promptChoice(
    'Select the source repository:',
    repos.map((repo) => ({ label: repo.name, value: repo }))
  );
}

export async function promptTargets(
  repos: readonly Repository[],
  source: Repository
): Promise<Repository[]> {
  printHeader('Target repositories');
  printIndexed(repos.map((repo) => (repo.root === source.root ? `${repo.name} ${dim('(source)')}` : repo.name)));
  const input = await promptInput('Targets (indices or names, "a" for all)');
  return selectTargets(repos, source, input);
}

export async function promptStrategy(): Promise<Strategy> {
  return promptChoice<Strategy>('How should the changes be carried?', [
    { label: 'Whole files', value: 'file', description: 'copy each file, backing up the one it replaces' },
    { label: 'Patch', value: 'patch', description: 'apply a diff or commits, backing up the repository state' },
  ]);
}

/**
 * Pick from the recent history by index, or type commit ids
 */
async function pickCommits(ws: Workspace, source: Repository, multiple: boolean): Promise<string[]> {
  const recent = ws.vcs.recentCommits(source.root, ws.config.recentCommitCount);
  if (recent.length === 0) {
    throw new EmptyChangeSetError(source.name, `No commits in ${source.name}`);
  }

  printHeader(`Recent commits in ${source.name}`);
  printIndexed(recent.map((c) => `${c.hash.slice(0, 7)} ${c.subject}`));

  const input = await promptInput(
    multiple ? 'Commits (indices or commit ids, newest first)' : 'Commit (index or commit id)'
  );
  const tokens = input.trim().split(/[\s,]+/).filter(Boolean);
  const byIndex =
    tokens.length > 0 && tokens.every((t) => /^\d+$/.test(t) && parseInt(t, 10) < recent.length);

  // the listing is newest first; keep that order whatever order indices were typed in
  const commits = byIndex
    ? parseIndexSelection(input, recent.length)
        .sort((a, b) => a - b)
        .map((i) => recent[i].hash)
    : parseCommitList(input);

  if (!multiple && commits.length > 1) {
    throw new SelectionError('Select a single commit', { input });
  }
  return commits;
}

async function pickFiles(ws: Workspace, source: Repository): Promise<string[]> {
  const candidates = listCandidates(ws.vcs, source, ws.config.excludeGlobs);
  if (candidates.length === 0) {
    throw new EmptyChangeSetError(source.name);
  }

  printHeader(`Changed files in ${source.name}`);
  printIndexed(candidates);
  const input = await promptInput('Files (indices, "a" for all)');
  return parseIndexSelection(input, candidates.length, { allowAll: true }).map((i) => candidates[i]);
}

export async function promptSelection(ws: Workspace, source: Repository): Promise<ChangeSelection> {
  const mode = await promptChoice<SelectionMode>('What should be propagated?', [
    { label: 'Working-tree changes', value: 'working-tree' },
    { label: 'A single commit', value: 'commit' },
    { label: 'A commit range', value: 'range', description: '<from>..<to>' },
    { label: 'Several commits', value: 'commits' },
    { label: 'Hand-picked files', value: 'manual', description: 'from the working-tree changes' },
  ]);

  switch (mode) {
    case 'working-tree': {
      const scope = await promptChoice<ChangeScope>('Which changes?', [
        { label: 'Staged and unstaged', value: 'both' },
        { label: 'Unstaged only', value: 'unstaged' },
        { label: 'Staged only', value: 'staged' },
      ]);
      return { mode, scope };
    }
    case 'commit': {
      const [commit] = await pickCommits(ws, source, false);
      return { mode, commit };
    }
    case 'commits':
      return { mode, commits: await pickCommits(ws, source, true) };
    case 'range': {
      const range = await promptInput('Commit range (<from>..<to>)');
      parseRange(range);
      return { mode, range: range.trim() };
    }
    case 'manual':
      return { mode, paths: await pickFiles(ws, source) };
  }
}
