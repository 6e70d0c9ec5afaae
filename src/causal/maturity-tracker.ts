import type { MaturityPhase, PhaseConfig, PhaseConfigProvider } from '../types/causal.js';
import type { HealthGraphStore } from '../types/health-graph.js';
import { DAY_MS, mean } from '../utils/math.js';

export const PHASE_CONFIGS: Readonly<Record<MaturityPhase, Readonly<PhaseConfig>>> = Object.freeze({
    passive: Object.freeze({ useReAct: false, useLLM: false, maxTools: 0 }),
    correlation: Object.freeze({ useReAct: false, useLLM: false, maxTools: 1 }),
    causal: Object.freeze({ useReAct: true, useLLM: false, maxTools: 3 }),
    active: Object.freeze({ useReAct: true, useLLM: true, maxTools: 3 }),
});

const MIN_RECENT_GLUCOSE = 50;
const MIN_MEALS = 14;
const MIN_EDGE_CONFIDENCE = 0.5;
const MIN_HISTORICAL_GLUCOSE = 100;

/**
 * Derives the engine's maturity phase from data density and learned edge
 * confidence. Every call re-reads the store.
 */
export class EngineMaturityTracker implements PhaseConfigProvider {
    readonly #store: HealthGraphStore;
    readonly #now: () => Date;

    constructor(store: HealthGraphStore, now: () => Date = () => new Date()) {
        this.#store = store;
        this.#now = now;
    }

    currentPhase(): MaturityPhase {
        const now = this.#now();
        const daysAgo = (days: number): Date => new Date(now.getTime() - days * DAY_MS);

        const recentGlucose = this.#store.queryGlucose(daysAgo(14), now);
        const meals = this.#store.queryMeals(daysAgo(56), now);
        if (recentGlucose.length < MIN_RECENT_GLUCOSE || meals.length < MIN_MEALS) {
            return 'passive';
        }

        const edges = this.#store.queryEdgesByType('meal_to_glucose', daysAgo(28), now);
        const averageConfidence = mean(edges.map((edge) => edge.confidence)) ?? 0;
        if (averageConfidence < MIN_EDGE_CONFIDENCE) {
            return 'correlation';
        }

        const olderGlucose = this.#store.queryGlucose(daysAgo(56), daysAgo(28));
        if (olderGlucose.length < MIN_HISTORICAL_GLUCOSE) {
            return 'causal';
        }

        return 'active';
    }

    phaseConfig(): PhaseConfig {
        return { ...PHASE_CONFIGS[this.currentPhase()] };
    }
}
