import type { NodeCategory } from '../types/health-graph.js';

/**
 * Fixed domain knowledge about causal direction. Not learned.
 *
 * Categories earlier in `CAUSAL_ORDER` may cause categories later in it.
 * `HARD_CONSTRAINTS` forbids specific pairs regardless of order.
 */
export const CAUSAL_ORDER: readonly NodeCategory[] = Object.freeze([
    'meal',
    'environmental',
    'behavioral',
    'glucose',
    'physiological',
    'symptom',
] as const);

export interface ForbiddenPair {
    readonly cause: NodeCategory;
    readonly cannotCause: NodeCategory;
}

export const HARD_CONSTRAINTS: readonly ForbiddenPair[] = Object.freeze([
    // Screen behaviour has no direct path to blood glucose.
    Object.freeze({ cause: 'behavioral', cannotCause: 'glucose' } as const),
    // Reverse-causation trap.
    Object.freeze({ cause: 'symptom', cannotCause: 'meal' } as const),
    Object.freeze({ cause: 'environmental', cannotCause: 'behavioral' } as const),
]);

/** False when the pair is explicitly forbidden. Ignores ordering. */
export function isValidDirection(source: NodeCategory, target: NodeCategory): boolean {
    return !HARD_CONSTRAINTS.some(
        (constraint) => constraint.cause === source && constraint.cannotCause === target,
    );
}

/** True when `source` precedes or equals `target` in the causal order and the pair is not forbidden. */
export function canCause(source: NodeCategory, target: NodeCategory): boolean {
    const sourceIndex = CAUSAL_ORDER.indexOf(source);
    const targetIndex = CAUSAL_ORDER.indexOf(target);
    if (sourceIndex < 0 || targetIndex < 0) return false;
    return sourceIndex <= targetIndex && isValidDirection(source, target);
}
