import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import {
  DEFAULT_CONFIG,
  clearConfigCacheForTests,
  getConfigValue,
  getNumericConfigValue,
  readConfig,
  reloadConfigSync,
} from '../../src/config/config-loader.js';

describe('config-loader', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(path.join(tmpdir(), 'causal-config-'));
    vi.stubEnv('CAUSAL_ENGINE_CONFIG_PATH', path.join(dir, 'missing.json'));
    for (const key of ['API_SECRET', 'API_PORT', 'DATABASE_PATH', 'GROQ_API_KEY', 'ANALYSIS_WINDOW_HOURS', 'NARRATIVE_MODEL']) {
      vi.stubEnv(key, '');
    }
    clearConfigCacheForTests();
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
    clearConfigCacheForTests();
    rmSync(dir, { recursive: true, force: true });
  });

  function writeConfig(contents: string): string {
    const file = path.join(dir, 'causal-engine.json');
    writeFileSync(file, contents);
    vi.stubEnv('CAUSAL_ENGINE_CONFIG_PATH', file);
    clearConfigCacheForTests();
    return file;
  }

  it('returns the defaults when the file does not exist', async () => {
    await expect(readConfig()).resolves.toEqual(DEFAULT_CONFIG);
  });

  it('overlays file values and ignores values of the wrong type', async () => {
    const file = writeConfig(JSON.stringify({ runtime: { apiPort: 4000, databasePath: 7 }, narrative: { maxTokens: 80 } }));

    const config = await readConfig(file);

    expect(config.runtime.apiPort).toBe(4000);
    expect(config.runtime.databasePath).toBe('memory/health-graph.db');
    expect(config.narrative).toEqual({ groqApiKey: '', model: 'llama-3.1-8b-instant', maxTokens: 80 });
  });

  it('rejects a file that is not valid JSON', async () => {
    const file = writeConfig('{ not json');
    await expect(readConfig(file)).rejects.toThrow(`Failed to parse config file at ${file}`);
  });

  it('prefers environment variables over file values', () => {
    writeConfig(JSON.stringify({ runtime: { databasePath: 'from-file.db' } }));
    expect(getConfigValue('DATABASE_PATH')).toBe('from-file.db');

    vi.stubEnv('DATABASE_PATH', 'from-env.db');
    expect(getConfigValue('DATABASE_PATH')).toBe('from-env.db');
  });

  it('treats blank values as unset', () => {
    expect(getConfigValue('GROQ_API_KEY')).toBeUndefined();
    expect(getConfigValue('NARRATIVE_MODEL')).toBe('llama-3.1-8b-instant');
    expect(getConfigValue('UNKNOWN_KEY')).toBeUndefined();
  });

  it('parses numeric values and falls back on garbage', () => {
    expect(getNumericConfigValue('ANALYSIS_WINDOW_HOURS', 3)).toBe(6);

    vi.stubEnv('ANALYSIS_WINDOW_HOURS', '8');
    expect(getNumericConfigValue('ANALYSIS_WINDOW_HOURS', 3)).toBe(8);

    vi.stubEnv('ANALYSIS_WINDOW_HOURS', 'eight');
    expect(getNumericConfigValue('ANALYSIS_WINDOW_HOURS', 3)).toBe(3);
    expect(getNumericConfigValue('UNKNOWN_KEY', 5)).toBe(5);
  });

  it('logs and falls back to defaults when the synchronous reload fails', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    writeConfig('{ not json');

    expect(reloadConfigSync()).toEqual(DEFAULT_CONFIG);
    expect(errorSpy).toHaveBeenCalledTimes(1);
  });
});
