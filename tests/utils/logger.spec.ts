import { mkdtempSync, readFileSync, readdirSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { clearConfigCacheForTests } from '../../src/config/config-loader.js';
import { logThought, scrubSensitiveText } from '../../src/utils/logger.js';

describe('scrubSensitiveText', () => {
  beforeEach(() => {
    vi.stubEnv('API_SECRET', '');
    vi.stubEnv('GROQ_API_KEY', '');
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('redacts sensitive key=value pairs', () => {
    expect(scrubSensitiveText('api_key=abc123 next')).toBe('api_key=[REDACTED] next');
    expect(scrubSensitiveText('password: "hunter two"')).toBe('password: [REDACTED]');
  });

  it('redacts bearer tokens', () => {
    expect(scrubSensitiveText('Authorization: Bearer abc.def')).toBe('Authorization: Bearer [REDACTED]');
  });

  it('redacts configured secret values wherever they appear', () => {
    vi.stubEnv('GROQ_API_KEY', 'test-groq-placeholder');
    expect(scrubSensitiveText('calling with test-groq-placeholder now')).toBe('calling with [REDACTED] now');
  });

  it('leaves short configured values alone', () => {
    vi.stubEnv('API_SECRET', 'abc');
    expect(scrubSensitiveText('the abc route')).toBe('the abc route');
  });
});

describe('logThought', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(path.join(tmpdir(), 'causal-logs-'));
    vi.stubEnv('LOG_DIR', dir);
    vi.stubEnv('API_SECRET', '');
    vi.stubEnv('GROQ_API_KEY', '');
    clearConfigCacheForTests();
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
    clearConfigCacheForTests();
    rmSync(dir, { recursive: true, force: true });
  });

  it('appends scrubbed lines to the daily log file', async () => {
    await logThought('[Test] token=abc123 observed');

    const files = readdirSync(dir);
    expect(files).toHaveLength(1);
    expect(files[0]).toMatch(/^\d{4}-\d{2}-\d{2}\.log$/);
    expect(readFileSync(path.join(dir, files[0] ?? ''), 'utf8')).toMatch(/^\[.+\] \[Test\] token=\[REDACTED\] observed\n$/);
  });

  it('reports write failures on stderr instead of rejecting', async () => {
    const blocker = path.join(dir, 'not-a-dir');
    writeFileSync(blocker, '');
    vi.stubEnv('LOG_DIR', blocker);
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    await expect(logThought('[Test] hello')).resolves.toBeUndefined();
    expect(errorSpy).toHaveBeenCalledTimes(1);
  });
});
