import * as path from 'path';
import { tmpdir } from 'os';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { DoctorService, buildReport, formatDoctorReport } from '../../src/core/doctor.js';
import { clearConfigCacheForTests } from '../../src/config/config-loader.js';
import { CONFIG_SCHEMA } from '../../src/config/env-schema.js';
import type { HealthCheckResult } from '../../src/types/health-doctor.js';
import type { JobSnapshot } from '../../src/types/scheduler.js';

function check(severity: HealthCheckResult['severity'], id = 'probe'): HealthCheckResult {
  return { id, name: 'Probe', severity, message: `${severity} message`, remediation: 'Fix it.' };
}

describe('buildReport', () => {
  const now = new Date('2026-01-15T12:00:00.000Z');

  it('is ready when every check passes', () => {
    expect(buildReport([check('ok')], now).readiness).toEqual({
      level: 'ready',
      totalChecks: 1,
      passed: 1,
      warnings: 0,
      critical: 0,
      evaluatedAt: '2026-01-15T12:00:00.000Z',
    });
  });

  it('is degraded on warnings and not ready on critical failures', () => {
    expect(buildReport([check('ok'), check('warning')], now).readiness.level).toBe('degraded');
    expect(buildReport([check('warning'), check('critical')], now).readiness.level).toBe('not_ready');
  });
});

describe('formatDoctorReport', () => {
  const now = new Date('2026-01-15T12:00:00.000Z');

  it('prints one line per check and remediation only for failures', () => {
    const text = formatDoctorReport(buildReport([check('ok'), check('critical')], now));

    expect(text.split('\n')).toEqual([
      'Causal Engine Doctor',
      '══════════════════════════════════════',
      '  ✓ [OK      ] Probe: ok message',
      '  ✗ [CRITICAL] Probe: critical message',
      '          → Fix it.',
      '──────────────────────────────────────',
      'Readiness: NOT_READY  (1 ok, 0 warning, 1 critical)',
    ]);
  });

  it('prints JSON when asked', () => {
    const report = buildReport([check('ok')], now);
    expect(JSON.parse(formatDoctorReport(report, true))).toEqual(report);
  });
});

describe('DoctorService', () => {
  beforeEach(() => {
    vi.stubEnv('CAUSAL_ENGINE_CONFIG_PATH', path.join(tmpdir(), 'causal-engine-absent', 'causal-engine.json'));
    for (const spec of CONFIG_SCHEMA) {
      vi.stubEnv(spec.key, '');
    }
    clearConfigCacheForTests();
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    clearConfigCacheForTests();
  });

  it('runs only the configuration checks without dependencies', () => {
    const report = new DoctorService().runAll();

    expect(report.checks.map((result) => result.id)).toEqual(['configuration', 'narrative_model']);
    expect(report.checks[0]).toEqual({
      id: 'configuration',
      name: 'Configuration',
      severity: 'ok',
      message: '8 configuration key(s) valid.',
    });
    expect(report.checks[1]?.severity).toBe('warning');
  });

  it('names the narrative model when a key is configured', () => {
    vi.stubEnv('GROQ_API_KEY', 'test-key');

    const [, narrative] = new DoctorService().runAll().checks;

    expect(narrative).toEqual({
      id: 'narrative_model',
      name: 'Narrative Model',
      severity: 'ok',
      message: 'Narratives may use llama-3.1-8b-instant.',
    });
  });

  it('reports store and maturity failures as critical', () => {
    const fail = (): never => {
      throw new Error('database is locked\nstack line');
    };

    const report = new DoctorService({ probeStore: fail, maturityPhase: fail }).runAll();

    expect(report.checks.find((result) => result.id === 'health_graph')?.message)
      .toBe('Health graph query failed: database is locked');
    expect(report.checks.find((result) => result.id === 'maturity_phase')?.severity).toBe('critical');
    expect(report.readiness.level).toBe('not_ready');
  });

  it('describes the passive phase', () => {
    const report = new DoctorService({ maturityPhase: () => 'passive' }).runAll();

    expect(report.checks.find((result) => result.id === 'maturity_phase')?.message)
      .toBe('Phase: passive. Too few learned meal edges; answers come from rules only.');
  });

  it('warns about failing jobs', () => {
    const jobs: JobSnapshot[] = [
      {
        id: 'edge-weight-learning',
        cronExpression: '0 * * * *',
        description: 'learn',
        status: 'error',
        lastRunAt: null,
        lastError: 'store offline',
        runCount: 1,
      },
    ];

    const report = new DoctorService({ listJobs: () => jobs }).runAll();

    expect(report.checks.find((result) => result.id === 'scheduled_jobs')?.message)
      .toBe('Failing job(s): edge-weight-learning (store offline).');
  });
});
