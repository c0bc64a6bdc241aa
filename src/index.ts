/**
 * syncrepos - Propagate changes across sibling git repositories
 *
 * @packageDocumentation
 */

// Propagation engine
export * from './lib/sync/index.js';

// Infrastructure
export * as git from './lib/git.js';
export * as colors from './lib/colors.js';
export * as prompts from './lib/prompts.js';
export { loadConfig, resolveConfig } from './lib/config.js';
export { createGitVcs } from './lib/git.js';
export * from './lib/errors.js';

export type { SyncConfig, ResolvedConfig } from './lib/config.js';
export type { PromptOption } from './lib/prompts.js';
