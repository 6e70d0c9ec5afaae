import { describe, expect, it } from 'vitest';
import { MetabolicDebtScorer } from '../../src/causal/metabolic-debt-scorer.js';
import { InMemoryHealthGraph } from '../helpers/in-memory-health-graph.js';

const at = (hour: number, minute = 0): Date => new Date(2026, 0, 15, hour, minute);

describe('MetabolicDebtScorer', () => {
  it('scores zero without meals', () => {
    expect(new MetabolicDebtScorer(() => at(15)).score(new InMemoryHealthGraph(), 6)).toBe(0);
  });

  it('combines glycemic load, the glucose swing and the cooking offset', () => {
    const store = new InMemoryHealthGraph();
    store.addMeal({ timestamp: at(12), source: 'manual', ingredients: [], estimatedGlycemicLoad: 25 });
    store.addGlucose(160, at(13), 'rising');
    store.addGlucose(100, at(14), 'crashing');

    expect(new MetabolicDebtScorer(() => at(15)).score(store, 6)).toBeCloseTo(40.5);
  });

  it('weights meals after 8 PM more heavily', () => {
    const store = new InMemoryHealthGraph();
    store.addMeal({
      timestamp: at(20, 30),
      source: 'instant_pot',
      ingredients: [],
      estimatedGlycemicLoad: 50,
      bioavailabilityModifier: 1.5,
    });

    expect(new MetabolicDebtScorer(() => at(23)).score(store, 6)).toBeCloseTo(39);
  });

  it('counts a post-meal HRV drop against the weekly baseline', () => {
    const store = new InMemoryHealthGraph();
    store.addMeal({ timestamp: at(9), source: 'manual', ingredients: [], estimatedGlycemicLoad: 0, bioavailabilityModifier: 1.5 });
    store.addSample('hrv_sdnn', 60, new Date(2026, 0, 12, 9, 0), 'ms');
    store.addSample('hrv_sdnn', 45, at(10, 30), 'ms');

    expect(new MetabolicDebtScorer(() => at(15)).score(store, 6)).toBeCloseTo(6.25);
  });
});
