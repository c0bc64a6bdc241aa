/**
 * Tests for the JSON Schema of .syncreposrc
 *
 * The schema and validateConfig must agree on what a valid config is.
 */

import { describe, it, expect } from 'vitest';
import AjvModule from 'ajv';
import fs from 'fs';
import { fileURLToPath } from 'url';
import { validateConfig } from './config-validation.js';

const schemaPath = fileURLToPath(new URL('../../schemas/syncreposrc.schema.json', import.meta.url));
const schema: Record<string, unknown> = JSON.parse(fs.readFileSync(schemaPath, 'utf8'));
// ajv ships CommonJS; the class sits on the default property under NodeNext
const Ajv = AjvModule.default;

function compile() {
  const ajv = new Ajv({ allErrors: true });
  return ajv.compile(schema);
}

describe('JSON Schema', () => {
  it('compiles as draft-07', () => {
    expect(typeof compile()).toBe('function');
  });

  it('documents every gate and the default values', () => {
    const text = fs.readFileSync(schemaPath, 'utf8');
    expect(text).toContain('"revert-now"');
    expect(text).toContain('"default": ".syncrepos"');
  });

  const valid: Array<[string, unknown]> = [
    ['empty config', {}],
    ['glob lists', { excludeGlobs: ['vendor/**'], extraCriticalGlobs: ['.env.local'] }],
    ['numbers', { contextLines: 0, recentCommitCount: 50 }],
    ['gates', { gates: { conflict: 'proceed', critical: 'abort' } }],
    ['logging', { logging: { level: 'warn' } }],
  ];

  const invalid: Array<[string, unknown]> = [
    ['unknown property', { baseBranch: 'main' }],
    ['empty glob', { excludeGlobs: [''] }],
    ['negative context', { contextLines: -1 }],
    ['zero recent count', { recentCommitCount: 0 }],
    ['unknown gate', { gates: { overwrite: 'skip' } }],
    ['unknown answer', { gates: { conflict: 'yes' } }],
    ['unknown log level', { logging: { level: 'verbose' } }],
  ];

  it.each(valid)('accepts %s in both validators', (_name, config) => {
    expect(compile()(config)).toBe(true);
    expect(validateConfig(config).valid).toBe(true);
  });

  it.each(invalid)('rejects %s in both validators', (_name, config) => {
    expect(compile()(config)).toBe(false);
    expect(validateConfig(config).valid).toBe(false);
  });
});
