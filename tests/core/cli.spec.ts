import * as path from 'path';
import { tmpdir } from 'os';
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';

vi.mock('../../src/utils/logger.js', () => ({
  logThought: vi.fn().mockResolvedValue(undefined),
  scrubSensitiveText: (s: string) => s,
}));

import {
  handleAskCli,
  handleCounterfactualsCli,
  handleDoctorCli,
  handleHelpCli,
  handleUnknownCommand,
  handleUpdateGraphCli,
  runCli,
  type CliContext,
} from '../../src/core/cli.js';
import { clearConfigCacheForTests } from '../../src/config/config-loader.js';
import { CONFIG_SCHEMA } from '../../src/config/env-schema.js';
import { CausalityEngine } from '../../src/services/causality-engine.js';
import { InMemoryHealthGraph } from '../helpers/in-memory-health-graph.js';

const at = (hour: number, minute = 0): Date => new Date(2026, 0, 15, hour, minute);

// Capture console output during tests
let consoleOutput: string[] = [];
let consoleErrors: string[] = [];

function contextFor(store: InMemoryHealthGraph, probeStore: () => void = () => undefined): () => CliContext {
  return () => ({ engine: new CausalityEngine(store, { now: () => at(15) }), probeStore });
}

function crashStore(): InMemoryHealthGraph {
  const store = new InMemoryHealthGraph();
  store.addGlucose(150, at(12), 'rising');
  store.addGlucose(106, at(13), 'crashing');
  store.addSample('hrv_sdnn', 60, new Date(2026, 0, 12, 9, 0), 'ms');
  store.addSample('hrv_sdnn', 45, at(13), 'ms');
  return store;
}

beforeEach(() => {
  consoleOutput = [];
  consoleErrors = [];
  vi.spyOn(console, 'log').mockImplementation((...args) => {
    consoleOutput.push(args.join(' '));
  });
  vi.spyOn(console, 'error').mockImplementation((...args) => {
    consoleErrors.push(args.join(' '));
  });
  vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  vi.stubEnv('CAUSAL_ENGINE_CONFIG_PATH', path.join(tmpdir(), 'causal-engine-absent', 'causal-engine.json'));
  for (const spec of CONFIG_SCHEMA) {
    vi.stubEnv(spec.key, '');
  }
  clearConfigCacheForTests();
  process.exitCode = undefined;
});

afterEach(() => {
  vi.restoreAllMocks();
  vi.unstubAllEnvs();
  clearConfigCacheForTests();
  process.exitCode = undefined;
});

// ── handleHelpCli ────────────────────────────────────────────────────────────

describe('handleHelpCli', () => {
  it('returns false when --help is not present', () => {
    expect(handleHelpCli([])).toBe(false);
    expect(handleHelpCli(['doctor'])).toBe(false);
  });

  it('prints help for --help and -h', () => {
    expect(handleHelpCli(['--help'])).toBe(true);
    expect(handleHelpCli(['ask', '-h'])).toBe(true);
    expect(consoleOutput[0]).toMatch(/^Usage: node dist\/src\/index\.js/);
    expect(process.exitCode).toBe(0);
  });
});

// ── handleUnknownCommand ─────────────────────────────────────────────────────

describe('handleUnknownCommand', () => {
  it('ignores known commands, flags and an empty argv', () => {
    expect(handleUnknownCommand([])).toBe(false);
    expect(handleUnknownCommand(['ask', 'tired'])).toBe(false);
    expect(handleUnknownCommand(['--json'])).toBe(false);
  });

  it('rejects unknown commands', () => {
    expect(handleUnknownCommand(['frobnicate'])).toBe(true);
    expect(consoleErrors[0]).toBe("[CausalEngine] Unknown command: 'frobnicate'");
    expect(process.exitCode).toBe(1);
  });
});

// ── handleAskCli ─────────────────────────────────────────────────────────────

describe('handleAskCli', () => {
  it('requires a symptom', async () => {
    const open = vi.fn(contextFor(new InMemoryHealthGraph()));

    expect(await handleAskCli(['ask', '--json'], open)).toBe(true);
    expect(consoleErrors).toEqual(['Usage: ask "<symptom>"']);
    expect(process.exitCode).toBe(1);
    expect(open).not.toHaveBeenCalled();
  });

  it('says so when nothing explains the symptom', async () => {
    await handleAskCli(['ask', 'tired'], contextFor(new InMemoryHealthGraph()));

    expect(consoleOutput).toEqual(["No explanation for 'tired' in the current window."]);
    expect(process.exitCode).toBe(0);
  });

  it('prints ranked explanations with their narratives', async () => {
    await handleAskCli(['ask', 'Why', 'am', 'I', 'tired?'], contextFor(crashStore()));

    expect(consoleOutput).toEqual([
      '1. [75%] Glucose Crash Fatigue',
      '   Post-meal glucose crash with HRV suppression indicates metabolic fatigue. Add protein or fat before carbs to flatten the glucose curve.',
    ]);
  });

  it('prints JSON with --json', async () => {
    await handleAskCli(['ask', 'tired', '--json'], contextFor(crashStore()));

    const parsed: unknown = JSON.parse(consoleOutput[0] ?? '');
    expect(parsed).toEqual([
      expect.objectContaining({ symptom: 'tired', causalChain: ['Glucose Crash Fatigue'], strength: 0.75 }),
    ]);
  });

  it('reports store failures', async () => {
    const store = crashStore();
    store.failure = new Error('disk gone');

    await handleAskCli(['ask', 'tired'], contextFor(store));

    expect(consoleErrors).toEqual(['[CausalEngine] ask failed: Health data unavailable during queryGlucose: disk gone']);
    expect(process.exitCode).toBe(1);
  });
});

// ── handleCounterfactualsCli ─────────────────────────────────────────────────

describe('handleCounterfactualsCli', () => {
  it('requires a node ID', () => {
    expect(handleCounterfactualsCli(['counterfactuals'], contextFor(new InMemoryHealthGraph()))).toBe(true);
    expect(consoleErrors).toEqual(['Usage: counterfactuals <nodeId>']);
    expect(process.exitCode).toBe(1);
  });

  it('lists templated interventions', () => {
    handleCounterfactualsCli(['counterfactuals', 'meal_12'], contextFor(new InMemoryHealthGraph()));

    expect(consoleOutput).toHaveLength(4);
    expect(consoleOutput[0]).toBe('- Switch to whole wheat flour (-35% glucose spike) (impact 0.35, trivial)');
  });
});

// ── handleUpdateGraphCli ─────────────────────────────────────────────────────

describe('handleUpdateGraphCli', () => {
  it('prints the learning summary', () => {
    const store = new InMemoryHealthGraph();
    store.addMeal({ timestamp: at(12), source: 'manual', ingredients: [], estimatedGlycemicLoad: 30 });
    store.addGlucose(160, at(13), 'rising');

    expect(handleUpdateGraphCli(['update-graph'], contextFor(store))).toBe(true);
    expect(consoleOutput).toEqual(['Scanned 1 meal(s): 0 edge(s) updated, 1 created.']);
    expect(process.exitCode).toBe(0);
  });

  it('reports store failures', () => {
    const store = new InMemoryHealthGraph();
    store.failure = new Error('locked');

    handleUpdateGraphCli(['update-graph'], contextFor(store));

    expect(consoleErrors).toEqual(['[CausalEngine] update-graph failed: Health data unavailable during queryMeals: locked']);
    expect(process.exitCode).toBe(1);
  });
});

// ── handleDoctorCli ──────────────────────────────────────────────────────────

describe('handleDoctorCli', () => {
  it('exits 1 when only warnings are present', () => {
    handleDoctorCli(['doctor'], contextFor(new InMemoryHealthGraph()));

    expect(consoleOutput[0]).toContain('Causal Engine Doctor');
    expect(process.exitCode).toBe(1);
  });

  it('exits 0 when every check passes', () => {
    vi.stubEnv('GROQ_API_KEY', 'test-key');

    handleDoctorCli(['doctor'], contextFor(new InMemoryHealthGraph()));

    expect(process.exitCode).toBe(0);
  });

  it('exits 2 when the store is unreachable', () => {
    const probeStore = (): void => {
      throw new Error('SQLITE_CANTOPEN');
    };

    handleDoctorCli(['doctor', '--json'], contextFor(new InMemoryHealthGraph(), probeStore));

    const report: unknown = JSON.parse(consoleOutput[0] ?? '');
    expect(report).toMatchObject({ readiness: { level: 'not_ready', critical: 1 } });
    expect(process.exitCode).toBe(2);
  });
});

// ── runCli ───────────────────────────────────────────────────────────────────

describe('runCli', () => {
  it('returns false when no one-shot command is given', async () => {
    await expect(runCli([], contextFor(new InMemoryHealthGraph()))).resolves.toBe(false);
  });

  it('stops at unknown commands without opening the store', async () => {
    const open = vi.fn(contextFor(new InMemoryHealthGraph()));

    await expect(runCli(['frobnicate'], open)).resolves.toBe(true);
    expect(open).not.toHaveBeenCalled();
  });
});
