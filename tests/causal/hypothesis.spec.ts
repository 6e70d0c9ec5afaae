import { describe, expect, it } from 'vitest';
import {
  createAgentState,
  createHypothesis,
  createObservation,
  foldObservation,
  sortHypotheses,
} from '../../src/causal/hypothesis.js';

describe('createHypothesis', () => {
  it('clamps confidence and prior into [0, 1]', () => {
    const hypothesis = createHypothesis({
      debtType: 'metabolic',
      description: 'Post-meal crash',
      confidence: 1.4,
      priorProbability: -0.2,
    });
    expect(hypothesis.confidence).toBe(1);
    expect(hypothesis.priorProbability).toBe(0);
  });

  it('keeps confidence and prior in [0, 1] across a grid of inputs', () => {
    for (const value of [-1, -0.2, 0, 0.1, 0.5, 0.9, 1, 1.4, Number.NaN]) {
      const hypothesis = createHypothesis({ debtType: 'somatic', description: 'Sleep', confidence: value, priorProbability: value });
      const expected = Number.isNaN(value) ? 0 : Math.min(Math.max(value, 0), 1);
      expect(hypothesis.confidence).toBe(expected);
      expect(hypothesis.priorProbability).toBe(expected);
    }
  });

  it('defaults the prior and evidence lists', () => {
    const hypothesis = createHypothesis({ debtType: 'digital', description: 'Scrolling', confidence: 0.5 });
    expect(hypothesis.priorProbability).toBe(0.33);
    expect(hypothesis.causalChain).toEqual([]);
    expect(hypothesis.supportingEvidence).toEqual([]);
    expect(hypothesis.contradictingEvidence).toEqual([]);
  });
});

describe('sortHypotheses', () => {
  it('keeps the input order for equal confidences', () => {
    const first = createHypothesis({ debtType: 'digital', description: 'a', confidence: 0.15 });
    const second = createHypothesis({ debtType: 'somatic', description: 'b', confidence: 0.15 });
    const top = createHypothesis({ debtType: 'metabolic', description: 'c', confidence: 0.6 });
    expect(sortHypotheses([first, second, top]).map((h) => h.debtType)).toEqual(['metabolic', 'digital', 'somatic']);
  });
});

describe('createObservation', () => {
  it('clamps the confidence and freezes the evidence', () => {
    const observation = createObservation({
      toolName: 'MetabolicScanner',
      evidence: { metabolic: 0.4 },
      confidence: 3,
      detail: 'Crash: 60mg/dL',
    });
    expect(observation.confidence).toBe(1);
    expect(Object.isFrozen(observation.evidence)).toBe(true);
  });
});

describe('foldObservation', () => {
  const metabolic = createHypothesis({ debtType: 'metabolic', description: 'Crash', confidence: 0.4 });
  const digital = createHypothesis({ debtType: 'digital', description: 'Scrolling', confidence: 0.5 });
  const somatic = createHypothesis({ debtType: 'somatic', description: 'Sleep', confidence: 0.2 });

  it('adds evidence scaled by the observation confidence and records it', () => {
    const folded = foldObservation([digital, metabolic, somatic], {
      toolName: 'MetabolicScanner',
      evidence: { metabolic: 0.5, digital: -0.3 },
      confidence: 0.8,
      detail: '',
    });

    expect(folded.map((h) => h.debtType)).toEqual(['metabolic', 'digital', 'somatic']);
    expect(folded[0]?.confidence).toBeCloseTo(0.8);
    expect(folded[0]?.supportingEvidence).toEqual(['MetabolicScanner: +50%']);
    expect(folded[1]?.confidence).toBeCloseTo(0.26);
    expect(folded[1]?.contradictingEvidence).toEqual(['MetabolicScanner: -30%']);
  });

  it('leaves categories the observation does not score untouched', () => {
    const folded = foldObservation([metabolic, somatic], {
      toolName: 'DigitalFrictionAnalyzer',
      evidence: { digital: 0.9 },
      confidence: 1,
      detail: '',
    });
    expect(folded[0]).toBe(metabolic);
    expect(folded[1]).toBe(somatic);
  });

  it('updates confidence without recording zero evidence', () => {
    const [updated] = foldObservation([metabolic], {
      toolName: 'MetabolicScanner',
      evidence: { metabolic: 0 },
      confidence: 1,
      detail: '',
    });
    expect(updated?.confidence).toBe(0.4);
    expect(updated?.supportingEvidence).toEqual([]);
    expect(updated?.contradictingEvidence).toEqual([]);
  });

  it('clamps the folded confidence', () => {
    const [updated] = foldObservation([metabolic], {
      toolName: 'MetabolicScanner',
      evidence: { metabolic: -2 },
      confidence: 1,
      detail: '',
    });
  });

  it('keeps folded confidence in [0, 1] across a grid of confidences and evidence', () => {
    for (const confidence of [0, 0.1, 0.5, 0.9, 1]) {
      for (const evidence of [-2, -0.5, 0, 0.5, 2]) {
        for (const observationConfidence of [0, 0.5, 1]) {
          const start = createHypothesis({ debtType: 'metabolic', description: 'Crash', confidence });
          const [updated] = foldObservation([start], {
            toolName: 'MetabolicScanner',
            evidence: { metabolic: evidence },
            confidence: observationConfidence,
            detail: '',
          });
          expect(updated?.confidence).toBeGreaterThanOrEqual(0);
          expect(updated?.confidence).toBeLessThanOrEqual(1);
          expect(updated?.confidence).toBeCloseTo(Math.min(Math.max(confidence + evidence * observationConfidence, 0), 1));
        }
      }
    }
  });
});

describe('createAgentState', () => {
  it('opens a window ending now', () => {
    const now = new Date(2026, 0, 15, 15, 0);
    const state = createAgentState('Why am I tired?', { now, windowHours: 2 });
    expect(state.analysisWindow.end).toBe(now);
    expect(state.analysisWindow.start).toEqual(new Date(2026, 0, 15, 13, 0));
    expect(state.isResolved).toBe(false);
    expect(state.hypotheses).toEqual([]);
  });

  it('defaults to a six hour window', () => {
    const now = new Date(2026, 0, 15, 15, 0);
    expect(createAgentState('Tired', { now }).analysisWindow.start).toEqual(new Date(2026, 0, 15, 9, 0));
  });
});
