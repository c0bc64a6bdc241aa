/**
 * Tests for config validation
 */

import { describe, it, expect } from 'vitest';
import { validateConfig } from './config-validation.js';

function errorsOf(config: unknown): string[] {
  const result = validateConfig(config);
  return result.valid ? [] : result.errors.map((e) => `${e.path}: ${e.message}`);
}

describe('validateConfig', () => {
  describe('valid configs', () => {
    it('accepts an empty object', () => {
      const result = validateConfig({});
      expect(result.valid).toBe(true);
    });

    it('accepts every known property', () => {
      const result = validateConfig({
        $schema: './node_modules/syncrepos/schemas/syncreposrc.schema.json',
        excludeGlobs: ['vendor/**'],
        extraExcludeGlobs: ['*.log'],
        criticalGlobs: ['.env'],
        extraCriticalGlobs: ['config/*.yml'],
        dataDir: 'data/sync',
        contextLines: 0,
        recentCommitCount: 5,
        gates: { conflict: 'proceed', 'revert-now': 'abort' },
        logging: { level: 'debug' },
      });

      expect(result.valid).toBe(true);
      if (result.valid) {
        expect(result.config).toEqual({
          excludeGlobs: ['vendor/**'],
          extraExcludeGlobs: ['*.log'],
          criticalGlobs: ['.env'],
          extraCriticalGlobs: ['config/*.yml'],
          dataDir: 'data/sync',
          contextLines: 0,
          recentCommitCount: 5,
          gates: { conflict: 'proceed', 'revert-now': 'abort' },
          logging: { level: 'debug' },
        });
      }
    });
  });

  describe('invalid configs', () => {
    it('rejects non-objects', () => {
      expect(errorsOf(null)).toEqual([': Config must be an object']);
      expect(errorsOf([])).toEqual([': Config must be an object']);
      expect(errorsOf('x')).toEqual([': Config must be an object']);
    });

    it('rejects unknown properties', () => {
      expect(errorsOf({ baseBranch: 'main' })).toEqual(['baseBranch: Unknown config property: baseBranch']);
    });

    it('rejects non-array glob lists', () => {
      expect(errorsOf({ excludeGlobs: 'vendor/**' })).toEqual([
        'excludeGlobs: excludeGlobs must be an array',
      ]);
    });

    it('rejects empty or non-string glob items with their index', () => {
      expect(errorsOf({ criticalGlobs: ['.env', '', 3] })).toEqual([
        'criticalGlobs[1]: criticalGlobs items must be non-empty strings',
        'criticalGlobs[2]: criticalGlobs items must be non-empty strings',
      ]);
    });

    it('rejects an empty data directory', () => {
      expect(errorsOf({ dataDir: '' })).toEqual(['dataDir: dataDir must be a non-empty string']);
    });

    it('rejects bad numbers', () => {
      expect(errorsOf({ contextLines: 1.5 })).toEqual(['contextLines: contextLines must be an integer >= 0']);
      expect(errorsOf({ recentCommitCount: 0 })).toEqual([
        'recentCommitCount: recentCommitCount must be an integer >= 1',
      ]);
    });

    it('rejects unknown gates and answers', () => {
      expect(errorsOf({ gates: { overwrite: 'proceed', critical: 'yes' } })).toEqual([
        'gates.overwrite: Unknown gate: overwrite',
        'gates.critical: Gate answer must be one of: proceed, skip, abort',
      ]);
    });

    it('rejects a non-object gates value', () => {
      expect(errorsOf({ gates: ['conflict'] })).toEqual(['gates: gates must be an object']);
    });

    it('rejects an unknown log level', () => {
      expect(errorsOf({ logging: { level: 'verbose' } })).toEqual([
        'logging.level: logging.level must be one of: silent, error, warn, info, debug, trace',
      ]);
    });

    it('reports every problem at once', () => {
      expect(errorsOf({ contextLines: 'ten', dataDir: 5 })).toHaveLength(2);
    });
  });
});
