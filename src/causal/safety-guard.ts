import type { CausalExplanation } from '../types/causal.js';
import type { HealthGraphStore, PhysiologicalSample, TimeWindow } from '../types/health-graph.js';

/** HRV (SDNN) below this many milliseconds stops reasoning. */
export const CRITICAL_HRV_MS = 20;

export const SAFETY_NARRATIVE =
    'Critically low heart rate variability detected. Immediate rest intervention recommended.';

/**
 * The most recent HRV in the window when it is below `CRITICAL_HRV_MS`,
 * otherwise `undefined`. A window without HRV samples is not critical.
 */
export function criticalHrv(store: HealthGraphStore, window: TimeWindow): number | undefined {
    const latest = store
        .querySamples('hrv_sdnn', window.start, window.end)
        .reduce<PhysiologicalSample | undefined>(
            (newest, sample) => (!newest || sample.timestamp >= newest.timestamp ? sample : newest),
            undefined,
        );
    return latest && latest.value < CRITICAL_HRV_MS ? latest.value : undefined;
}

/** The single explanation returned instead of a reasoning session. */
export function safetyExplanation(symptom: string, hrvMs: number): CausalExplanation {
    return Object.freeze({
        symptom,
        causalChain: [`HRV: ${Math.round(hrvMs)}ms`, 'Rest intervention'],
        strength: 1,
        confidence: 1,
        narrative: SAFETY_NARRATIVE,
    });
}
