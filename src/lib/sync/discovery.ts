/**
 * Repository discovery and target selection
 */

import fs from 'fs';
import path from 'path';
import { DiscoveryError, SelectionError } from '../errors.js';
import { parseIndexSelection } from './selection.js';
import type { Repository, Vcs } from './types.js';

/**
 * List the immediate subdirectories of `root` that hold a .git entry, sorted by name
 */
export function discoverRepositories(root: string): Repository[] {
  const resolved = path.resolve(root);
  let entries: fs.Dirent[];
  try {
    entries = fs.readdirSync(resolved, { withFileTypes: true });
  } catch {
    throw new DiscoveryError(`Cannot read workspace directory: ${resolved}`);
  }

  const repos = entries
    .filter((entry) => entry.isDirectory())
    .filter((entry) => fs.existsSync(path.join(resolved, entry.name, '.git')))
    .map((entry) => ({ name: entry.name, root: path.join(resolved, entry.name) }))
    .sort((a, b) => a.name.localeCompare(b.name));

  if (repos.length === 0) {
    throw new DiscoveryError(`No git repositories found in ${resolved}`);
  }
  return repos;
}

/**
 * Find one repository by index or name
 */
export function findRepository(repos: readonly Repository[], key: string): Repository {
  const trimmed = key.trim();
  const byName = repos.find((repo) => repo.name === trimmed);
  if (byName) {
    return byName;
  }
  if (/^\d+$/.test(trimmed)) {
    const repo = repos[parseInt(trimmed, 10)];
    if (repo) {
      return repo;
    }
  }
  throw new SelectionError(`Unknown repository: ${key}`, { input: key });
}

/**
 * Resolve a target selection: "a"/"all", or indices/names separated by spaces or commas.
 * The source is never a target; the result keeps listing order.
 */
export function selectTargets(
  repos: readonly Repository[],
  source: Repository,
  input: string
): Repository[] {
  const trimmed = input.trim();
  let chosen: Repository[];

  if (['a', 'all'].includes(trimmed.toLowerCase())) {
    chosen = [...repos];
  } else {
    const tokens = trimmed.split(/[\s,]+/).filter(Boolean);
    const byName = tokens.every((token) => repos.some((repo) => repo.name === token));
    chosen = byName
      ? tokens.map((token) => findRepository(repos, token))
      : parseIndexSelection(trimmed, repos.length).map((i) => repos[i]);
  }

  const targets = repos.filter(
    (repo) => repo.root !== source.root && chosen.some((c) => c.root === repo.root)
  );
  if (targets.length === 0) {
    throw new DiscoveryError('No targets selected');
  }
  return targets;
}

/**
 * Whether a repository is still a valid working tree
 */
export function isValidRepository(vcs: Vcs, repo: Repository): boolean {
  try {
    return vcs.isWorkTree(repo.root);
  } catch {
    return false;
  }
}
