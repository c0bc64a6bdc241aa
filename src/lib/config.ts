import fs from 'fs';
import path from 'path';
import JSON5 from 'json5';
import {
  CONFIG_FILE_NAMES,
  DEFAULT_CONTEXT_LINES,
  DEFAULT_CRITICAL_GLOBS,
  DEFAULT_DATA_DIR,
  DEFAULT_EXCLUDE_GLOBS,
  DEFAULT_RECENT_COMMIT_COUNT,
  resolveDataDir,
} from './constants.js';
import { ConfigurationError } from './errors.js';
import { validateConfig } from './config-validation.js';
import type { Decision, GateName } from './sync/decisions.js';
import { DEFAULT_GATE_DECISIONS } from './sync/decisions.js';

/**
 * Configuration for syncrepos, read from .syncreposrc at the workspace root
 */
export interface SyncConfig {
  /** Replaces the default exclude globs */
  excludeGlobs?: string[];

  /** Added to the exclude globs */
  extraExcludeGlobs?: string[];

  /** Replaces the default critical globs */
  criticalGlobs?: string[];

  /** Added to the critical globs */
  extraCriticalGlobs?: string[];

  /**
   * Data directory for the log and sessions
   * Relative to the workspace root. Default: ".syncrepos"
   */
  dataDir?: string;

  /** Context lines in exported working-tree patches. Default: 10 */
  contextLines?: number;

  /** Commits offered when picking from recent history. Default: 30 */
  recentCommitCount?: number;

  /** Answers for confirmation gates in non-interactive runs */
  gates?: Partial<Record<GateName, Decision>>;

  logging?: {
    level?: string;
  };
}

/**
 * Fully resolved configuration
 */
export interface ResolvedConfig {
  excludeGlobs: string[];
  criticalGlobs: string[];
  /** Absolute data directory */
  dataDir: string;
  contextLines: number;
  recentCommitCount: number;
  gates: Record<GateName, Decision>;
  logLevel?: string;
  /** Config file the values came from, if any */
  configFile: string | null;
}

/**
 * Find config file in the workspace root
 */
export function findConfigFile(root: string): string | null {
  for (const fileName of CONFIG_FILE_NAMES) {
    const configPath = path.join(root, fileName);
    if (fs.existsSync(configPath)) {
      return configPath;
    }
  }
  return null;
}

/**
 * Parse a config file, trying JSON first then JSON5 for comments and trailing commas
 */
export function parseConfigFile(configPath: string): unknown {
  const content = fs.readFileSync(configPath, 'utf8');
  try {
    return JSON.parse(content);
  } catch {
    try {
      return JSON5.parse(content);
    } catch (json5Error) {
      const message = json5Error instanceof Error ? json5Error.message : String(json5Error);
      throw new ConfigurationError(`Invalid JSON in ${configPath}: ${message}`, {
        configFile: configPath,
      });
    }
  }
}

/**
 * Glob that keeps the data directory out of every change set
 */
function dataDirGlob(root: string, dataDir: string): string | null {
  const relative = path.relative(root, dataDir).split(path.sep).join('/');
  if (!relative || relative.startsWith('..') || path.isAbsolute(relative)) {
    return null;
  }
  return `${relative}/**`;
}

/**
 * Merge a user config over the defaults
 */
export function resolveConfig(
  root: string,
  userConfig: SyncConfig = {},
  configFile: string | null = null
): ResolvedConfig {
  const dataDir = resolveDataDir(root, userConfig.dataDir ?? DEFAULT_DATA_DIR);

  const excludeGlobs = [
    ...(userConfig.excludeGlobs ?? DEFAULT_EXCLUDE_GLOBS),
    ...(userConfig.extraExcludeGlobs ?? []),
  ];
  const dataGlob = dataDirGlob(root, dataDir);
  if (dataGlob && !excludeGlobs.includes(dataGlob)) {
    excludeGlobs.push(dataGlob);
  }

  return {
    excludeGlobs,
    criticalGlobs: [
      ...(userConfig.criticalGlobs ?? DEFAULT_CRITICAL_GLOBS),
      ...(userConfig.extraCriticalGlobs ?? []),
    ],
    dataDir,
    contextLines: userConfig.contextLines ?? DEFAULT_CONTEXT_LINES,
    recentCommitCount: userConfig.recentCommitCount ?? DEFAULT_RECENT_COMMIT_COUNT,
    gates: { ...DEFAULT_GATE_DECISIONS, ...userConfig.gates },
    logLevel: userConfig.logging?.level,
    configFile,
  };
}

/**
 * Load configuration for a workspace root.
 * A missing file yields the defaults; an unreadable or invalid one is an error.
 */
export function loadConfig(root: string): ResolvedConfig {
  const configPath = findConfigFile(root);
  if (!configPath) {
    return resolveConfig(root);
  }

  const raw = parseConfigFile(configPath);
  const validation = validateConfig(raw);
  if (!validation.valid) {
    const issues = validation.errors.map((e) => (e.path ? `${e.path}: ${e.message}` : e.message));
    throw new ConfigurationError(`Invalid configuration in ${configPath}`, {
      configFile: configPath,
      issues,
    });
  }

  return resolveConfig(root, validation.config, configPath);
}
