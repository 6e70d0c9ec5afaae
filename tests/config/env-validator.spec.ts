import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { clearConfigCacheForTests } from '../../src/config/config-loader.js';
import { CONFIG_SCHEMA } from '../../src/config/env-schema.js';
import { validateConfiguration } from '../../src/config/env-validator.js';

describe('validateConfiguration', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(path.join(tmpdir(), 'causal-env-'));
    vi.stubEnv('CAUSAL_ENGINE_CONFIG_PATH', path.join(dir, 'missing.json'));
    for (const spec of CONFIG_SCHEMA) {
      vi.stubEnv(spec.key, '');
    }
    clearConfigCacheForTests();
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    clearConfigCacheForTests();
    rmSync(dir, { recursive: true, force: true });
  });

  it('passes with the built-in defaults', () => {
    const result = validateConfiguration();

    expect(result.ok).toBe(true);
    expect(result.issues).toEqual([]);
    expect(result.presentKeys).toContain('DATABASE_PATH');
    expect(result.presentKeys).not.toContain('API_SECRET');
  });

  it('fails when a required key is blank everywhere', () => {
    const file = path.join(dir, 'causal-engine.json');
    writeFileSync(file, JSON.stringify({ runtime: { databasePath: '' } }));
    vi.stubEnv('CAUSAL_ENGINE_CONFIG_PATH', file);
    clearConfigCacheForTests();

    const result = validateConfiguration();

    expect(result.ok).toBe(false);
    expect(result.issues).toEqual([
      {
        key: 'DATABASE_PATH',
        class: 'missing_required',
        message: 'DATABASE_PATH is required but not configured.',
        remediation: 'Set runtime.databasePath in causal-engine.json or DATABASE_PATH.',
      },
    ]);
  });

  it('reports format errors without failing', () => {
    vi.stubEnv('API_PORT', '70000');
    vi.stubEnv('EDGE_UPDATE_CRON', 'x');

    const result = validateConfiguration();

    expect(result.ok).toBe(true);
    expect(result.issues.map((issue) => issue.message)).toEqual([
      "API_PORT must be an integer in range 1–65535, got '70000'.",
      "EDGE_UPDATE_CRON is not a valid cron expression: 'x'.",
    ]);
  });

  it('only checks secrets for presence', () => {
    vi.stubEnv('API_SECRET', 'test-secret');

    const result = validateConfiguration();

    expect(result.presentKeys).toContain('API_SECRET');
    expect(JSON.stringify(result)).not.toContain('test-secret');
  });
});
