/**
 * Config Validation Module
 *
 * Validates .syncreposrc configuration files against the shape described
 * by schemas/syncreposrc.schema.json.
 */

import type { SyncConfig } from './config.js';
import { GATE_NAMES } from './sync/decisions.js';
import type { Decision, GateName } from './sync/decisions.js';

/**
 * Validation error with path and message
 */
export interface ValidationError {
  path: string;
  message: string;
}

/**
 * Result of config validation
 */
export type ValidationResult =
  | { valid: true; errors: []; config: SyncConfig }
  | { valid: false; errors: ValidationError[] };

/**
 * Valid gate answers
 */
const VALID_DECISIONS = ['proceed', 'skip', 'abort'];

/**
 * Valid log levels
 */
const VALID_LOG_LEVELS = ['silent', 'error', 'warn', 'info', 'debug', 'trace'];

/**
 * Known top-level config keys
 */
const KNOWN_TOP_LEVEL_KEYS = [
  '$schema',
  'excludeGlobs',
  'extraExcludeGlobs',
  'criticalGlobs',
  'extraCriticalGlobs',
  'dataDir',
  'contextLines',
  'recentCommitCount',
  'gates',
  'logging',
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

function validateStringArray(
  obj: Record<string, unknown>,
  key: string,
  errors: ValidationError[]
): void {
  const value = obj[key];
  if (value === undefined) return;
  if (!Array.isArray(value)) {
    errors.push({ path: key, message: `${key} must be an array` });
    return;
  }
  value.forEach((item, i) => {
    if (typeof item !== 'string' || item.length === 0) {
      errors.push({ path: `${key}[${i}]`, message: `${key} items must be non-empty strings` });
    }
  });
}

function validatePositiveInteger(
  obj: Record<string, unknown>,
  key: string,
  minimum: number,
  errors: ValidationError[]
): void {
  const value = obj[key];
  if (value === undefined) return;
  if (typeof value !== 'number' || !Number.isInteger(value) || value < minimum) {
    errors.push({ path: key, message: `${key} must be an integer >= ${minimum}` });
  }
}

/**
 * Validate a config object
 */
export function validateConfig(config: unknown): ValidationResult {
  const errors: ValidationError[] = [];

  if (!isRecord(config)) {
    return { valid: false, errors: [{ path: '', message: 'Config must be an object' }] };
  }

  for (const key of Object.keys(config)) {
    if (!KNOWN_TOP_LEVEL_KEYS.includes(key)) {
      errors.push({ path: key, message: `Unknown config property: ${key}` });
    }
  }

  validateStringArray(config, 'excludeGlobs', errors);
  validateStringArray(config, 'extraExcludeGlobs', errors);
  validateStringArray(config, 'criticalGlobs', errors);
  validateStringArray(config, 'extraCriticalGlobs', errors);

  if (config.dataDir !== undefined && (typeof config.dataDir !== 'string' || !config.dataDir)) {
    errors.push({ path: 'dataDir', message: 'dataDir must be a non-empty string' });
  }

  validatePositiveInteger(config, 'contextLines', 0, errors);
  validatePositiveInteger(config, 'recentCommitCount', 1, errors);

  const gates: Partial<Record<GateName, Decision>> = {};
  if (config.gates !== undefined) {
    if (!isRecord(config.gates)) {
      errors.push({ path: 'gates', message: 'gates must be an object' });
    } else {
      for (const [name, decision] of Object.entries(config.gates)) {
        const gate = GATE_NAMES.find((g) => g === name);
        if (!gate) {
          errors.push({ path: `gates.${name}`, message: `Unknown gate: ${name}` });
          continue;
        }
        if (decision === 'proceed' || decision === 'skip' || decision === 'abort') {
          gates[gate] = decision;
        } else {
          errors.push({
            path: `gates.${name}`,
            message: `Gate answer must be one of: ${VALID_DECISIONS.join(', ')}`,
          });
        }
      }
    }
  }

  let logLevel: string | undefined;
  if (config.logging !== undefined) {
    if (!isRecord(config.logging)) {
      errors.push({ path: 'logging', message: 'logging must be an object' });
    } else if (config.logging.level !== undefined) {
      const level = config.logging.level;
      if (typeof level !== 'string' || !VALID_LOG_LEVELS.includes(level)) {
        errors.push({
          path: 'logging.level',
          message: `logging.level must be one of: ${VALID_LOG_LEVELS.join(', ')}`,
        });
      } else {
        logLevel = level;
      }
    }
  }

  if (errors.length > 0) {
    return { valid: false, errors };
  }

  const pick = (key: string): string[] | undefined => {
    const value = config[key];
    return isStringArray(value) ? value : undefined;
  };
  const number = (key: string): number | undefined => {
    const value = config[key];
    return typeof value === 'number' ? value : undefined;
  };

  return {
    valid: true,
    errors: [],
    config: {
      excludeGlobs: pick('excludeGlobs'),
      extraExcludeGlobs: pick('extraExcludeGlobs'),
      criticalGlobs: pick('criticalGlobs'),
      extraCriticalGlobs: pick('extraCriticalGlobs'),
      dataDir: typeof config.dataDir === 'string' ? config.dataDir : undefined,
      contextLines: number('contextLines'),
      recentCommitCount: number('recentCommitCount'),
      gates: config.gates === undefined ? undefined : gates,
      logging: logLevel === undefined ? undefined : { level: logLevel },
    },
  };
}
