import { describe, expect, it } from 'vitest';
import { DigitalFrictionAnalyzer } from '../../../src/causal/tools/digital-friction-analyzer.js';
import { EnvironmentalStressAnalyzer } from '../../../src/causal/tools/environmental-stress-analyzer.js';
import { InflammationTracker } from '../../../src/causal/tools/inflammation-tracker.js';
import { MetabolicScanner } from '../../../src/causal/tools/metabolic-scanner.js';
import { SleepQualityAnalyzer } from '../../../src/causal/tools/sleep-quality-analyzer.js';
import { windowEndingAt } from '../../../src/utils/math.js';
import { InMemoryHealthGraph } from '../../helpers/in-memory-health-graph.js';

const at = (day: number, hour: number, minute = 0): Date => new Date(2026, 0, day, hour, minute);
const window = windowEndingAt(at(15, 15), 6);

describe('MetabolicScanner', () => {
  const scanner = new MetabolicScanner();

  function seedCrash(store: InMemoryHealthGraph): void {
    store.addGlucose(110, at(15, 11, 30), 'rising');
    store.addGlucose(170, at(15, 12), 'rising');
    store.addGlucose(104, at(15, 13), 'crashing');
    store.addGlucose(108, at(15, 13, 30));
    store.addSample('hrv_sdnn', 50, at(15, 10), 'ms');
    store.addSample('hrv_sdnn', 35, at(15, 13, 30), 'ms');
  }

  it('reports insufficient data below three readings', () => {
    const store = new InMemoryHealthGraph();
    store.addGlucose(120, at(15, 12));
    store.addGlucose(100, at(15, 13));

    expect(scanner.analyze([], store, window)).toEqual({
      toolName: 'MetabolicScanner',
      evidence: { metabolic: 0 },
      confidence: 0.1,
      detail: 'Insufficient glucose data (2 readings)',
    });
  });

  it('scores an attributed crash and suppresses digital debt', () => {
    const store = new InMemoryHealthGraph();
    seedCrash(store);
    store.addMeal({ timestamp: at(15, 11), source: 'instant_pot', ingredients: [] });

    const observation = scanner.analyze([], store, window);

    expect(observation.evidence.metabolic).toBeCloseTo(0.5 + 0.3 * (7.5 / 42.5) + 0.2);
    expect(observation.evidence.digital).toBe(-0.3);
    expect(observation.confidence).toBeCloseTo(4 / 12);
    expect(observation.detail).toBe('Crash: 66mg/dL, HRV drop: 17%, Meal: instant_pot');
  });

  it('leaves digital debt alone without a meal to blame', () => {
    const store = new InMemoryHealthGraph();
    seedCrash(store);

    const observation = scanner.analyze([], store, window);

    expect(observation.evidence.metabolic).toBeCloseTo(0.5 + 0.3 * (7.5 / 42.5));
    expect(observation.evidence.digital).toBeUndefined();
    expect(observation.detail).toBe('Crash: 66mg/dL, HRV drop: 17%, No meal attributed');
  });
});

describe('DigitalFrictionAnalyzer', () => {
  const analyzer = new DigitalFrictionAnalyzer();

  it('reports no evidence without passive screen time', () => {
    const store = new InMemoryHealthGraph();
    store.addBehavior({ timestamp: at(15, 10), durationSeconds: 3600, category: 'active_work' });

    expect(analyzer.analyze([], store, window)).toEqual({
      toolName: 'DigitalFrictionAnalyzer',
      evidence: { digital: 0 },
      confidence: 0.8,
      detail: 'No passive screen time detected',
    });
  });

  it('credits scrolling that starts right after a crash to metabolic debt', () => {
    const store = new InMemoryHealthGraph();
    store.addGlucose(70, at(15, 13), 'crashing');
    store.addBehavior({ timestamp: at(15, 13, 10), durationSeconds: 2400, category: 'zombie_scrolling' });

    const observation = analyzer.analyze([], store, window);

    expect(observation.evidence).toEqual({ digital: 0, metabolic: 0.15 });
    expect(observation.detail).toBe('Genuine digital: 0min, Reactive scrolling: 40min');
  });

  it.each([
    ['at the moment of the crash', 0],
    ['exactly 30 minutes after the crash', 30],
  ])('treats scrolling that starts %s as reactive', (_label, offsetMinutes) => {
    const store = new InMemoryHealthGraph();
    store.addGlucose(70, at(15, 13), 'crashing');
    store.addBehavior({ timestamp: at(15, 13, offsetMinutes), durationSeconds: 2400, category: 'zombie_scrolling' });

    expect(analyzer.analyze([], store, window)).toEqual({
      toolName: 'DigitalFrictionAnalyzer',
      evidence: { digital: 0, metabolic: 0.15 },
      confidence: 0.8,
      detail: 'Genuine digital: 0min, Reactive scrolling: 40min',
    });
  });

  it('counts scrolling unrelated to a crash as genuine digital debt', () => {
    const store = new InMemoryHealthGraph();
    store.addBehavior({ timestamp: at(15, 10), durationSeconds: 5400, category: 'passive_consumption' });

    expect(analyzer.analyze([], store, window).evidence).toEqual({ digital: 1 });
  });

  it('scales genuine evidence by its share of passive time', () => {
    const store = new InMemoryHealthGraph();
    store.addGlucose(70, at(15, 13), 'reactive_low');
    store.addBehavior({ timestamp: at(15, 13, 10), durationSeconds: 1200, category: 'zombie_scrolling' });
    store.addBehavior({ timestamp: at(15, 10), durationSeconds: 1800, category: 'zombie_scrolling' });

    const observation = analyzer.analyze([], store, window);

    expect(observation.evidence.digital).toBeCloseTo(0.3);
    expect(observation.evidence.metabolic).toBeUndefined();
  });
});

describe('SleepQualityAnalyzer', () => {
  const analyzer = new SleepQualityAnalyzer();

  it('scores a full deficit against the population baseline when nothing was recorded', () => {
    expect(analyzer.analyze([], new InMemoryHealthGraph(), window)).toEqual({
      toolName: 'SleepQualityAnalyzer',
      evidence: { somatic: 0.6 },
      confidence: 0.2,
      detail: 'Sleep: 0.0h (baseline: 7.5h), Late meals: 0, Late screens: 0',
    });
  });

  it('flags short sleep, late high-GL meals and late screens', () => {
    const store = new InMemoryHealthGraph();
    store.addSample('sleep_analysis', 8, at(12, 3), 'h');
    store.addSample('sleep_analysis', 8, at(13, 3), 'h');
    store.addSample('sleep_analysis', 5, at(15, 3), 'h');
    store.addMeal({ timestamp: at(14, 21, 30), source: 'doordash', ingredients: [], estimatedGlycemicLoad: 30 });
    store.addBehavior({ timestamp: at(14, 22, 30), durationSeconds: 1800, category: 'zombie_scrolling' });

    const observation = analyzer.analyze([], store, window);

    expect(observation.evidence.somatic).toBeCloseTo(0.6);
    expect(observation.evidence.metabolic).toBe(0.3);
    expect(observation.confidence).toBe(0.25);
    expect(observation.detail).toBe('Sleep: 5.0h (baseline: 7.0h), Late meals: 1, Late screens: 1');
  });
});

describe('EnvironmentalStressAnalyzer', () => {
  const analyzer = new EnvironmentalStressAnalyzer();

  it('reports no evidence without environmental data', () => {
    expect(analyzer.analyze([], new InMemoryHealthGraph(), window)).toEqual({
      toolName: 'EnvironmentalStressAnalyzer',
      evidence: { somatic: 0 },
      confidence: 0.3,
      detail: 'No environmental data available',
    });
  });

  it('scores poor air quality', () => {
    const store = new InMemoryHealthGraph();
    store.addEnvironment({
      timestamp: at(15, 12),
      temperatureCelsius: 25,
      humidity: 40,
      aqiUS: 160,
      uvIndex: 3,
      pollenIndex: 4,
    });

    const observation = analyzer.analyze([], store, window);

    expect(observation.evidence.somatic).toBeCloseTo(0.8);
    expect(observation.confidence).toBe(0.7);
    expect(observation.detail).toBe('AQI: 160 (80%), Pollen: 4, Temp: 25C');
  });

  it('adds HRV confirmation when variability drops against the baseline', () => {
    const store = new InMemoryHealthGraph();
    store.addEnvironment({
      timestamp: at(15, 12),
      temperatureCelsius: 35,
      humidity: 40,
      aqiUS: 120,
      uvIndex: 8,
      pollenIndex: 9,
    });
    store.addSample('hrv_sdnn', 60, at(10, 12), 'ms');
    store.addSample('hrv_sdnn', 48, at(15, 13), 'ms');

    expect(analyzer.analyze([], store, window).evidence.somatic).toBeCloseTo(0.9);
  });
});

describe('InflammationTracker', () => {
  const tracker = new InflammationTracker();

  it('reports zero load against population baselines without samples', () => {
    expect(tracker.analyze([], new InMemoryHealthGraph(), window)).toEqual({
      toolName: 'InflammationTracker',
      evidence: { metabolic: 0, somatic: 0 },
      confidence: 0,
      detail: 'HRV deviation: 0%, Post-prandial: 0%, HR elevation: 0%',
    });
  });

  it('combines HRV deviation, post-meal suppression and heart-rate elevation', () => {
    const store = new InMemoryHealthGraph();
    store.addSample('hrv_sdnn', 60, at(10, 12), 'ms');
    store.addSample('hrv_sdnn', 60, at(11, 12), 'ms');
    store.addSample('hrv_sdnn', 42, at(15, 13, 30), 'ms');
    store.addSample('resting_hr', 60, at(10, 12), 'bpm');
    store.addSample('resting_hr', 66, at(15, 13), 'bpm');
    store.addMeal({ timestamp: at(15, 12), source: 'manual', ingredients: [] });

    const observation = tracker.analyze([], store, window);

    expect(observation.evidence.metabolic).toBeCloseTo(0.26 * 0.6);
    expect(observation.evidence.somatic).toBeCloseTo(0.26 * 0.4);
    expect(observation.confidence).toBeCloseTo(0.15);
    expect(observation.detail).toBe('HRV deviation: 30%, Post-prandial: 30%, HR elevation: 10%');
  });

  it('reports no HRV deviation against a zero baseline', () => {
    const store = new InMemoryHealthGraph();
    store.addSample('hrv_sdnn', 0, at(10, 12), 'ms');
    store.addSample('hrv_sdnn', 0, at(11, 12), 'ms');

    expect(tracker.analyze([], store, window)).toEqual({
      toolName: 'InflammationTracker',
      evidence: { metabolic: 0, somatic: 0 },
      confidence: 0.1,
      detail: 'HRV deviation: 0%, Post-prandial: 0%, HR elevation: 0%',
    });
  });
});
