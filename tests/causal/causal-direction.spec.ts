import { describe, expect, it } from 'vitest';
import { CAUSAL_ORDER, canCause, isValidDirection } from '../../src/causal/causal-direction.js';

describe('canCause', () => {
  it('allows categories earlier in the causal order to cause later ones', () => {
    expect(canCause('meal', 'glucose')).toBe(true);
    expect(canCause('glucose', 'physiological')).toBe(true);
    expect(canCause('environmental', 'symptom')).toBe(true);
  });

  it('rejects reverse causation', () => {
    expect(canCause('glucose', 'meal')).toBe(false);
    expect(canCause('symptom', 'physiological')).toBe(false);
  });

  it('allows a category to influence itself', () => {
    expect(canCause('meal', 'meal')).toBe(true);
  });

  it('rejects forbidden pairs even when the order permits them', () => {
    expect(canCause('behavioral', 'glucose')).toBe(false);
    expect(canCause('environmental', 'behavioral')).toBe(false);
  });
});

describe('isValidDirection', () => {
  it('only consults the forbidden pairs', () => {
    expect(isValidDirection('glucose', 'meal')).toBe(true);
    expect(isValidDirection('symptom', 'meal')).toBe(false);
  });
});

describe('CAUSAL_ORDER', () => {
  it('starts at meals and ends at symptoms', () => {
    expect(CAUSAL_ORDER[0]).toBe('meal');
    expect(CAUSAL_ORDER.at(-1)).toBe('symptom');
    expect(Object.isFrozen(CAUSAL_ORDER)).toBe(true);
  });
});
