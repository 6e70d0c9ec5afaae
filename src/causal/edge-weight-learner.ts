import { glycemicLoad, nodeId } from '../types/health-graph.js';
import type { GlucoseReading, HealthGraphEdge, HealthGraphStore, TimeWindow } from '../types/health-graph.js';
import { logThought } from '../utils/logger.js';
import { MINUTE_MS, clamp01 } from '../utils/math.js';

export const MAX_EDGE_CONFIDENCE = 0.99;
export const SPIKE_THRESHOLD_MG_DL = 140;
const POST_MEAL_MIN_MS = 30 * MINUTE_MS;
const POST_MEAL_MAX_MS = 120 * MINUTE_MS;

export interface BatchUpdateSummary {
    mealsScanned: number;
    edgesUpdated: number;
    edgesCreated: number;
    confirmed: number;
    disconfirmed: number;
}

/** Meal impact matches the observed response, in either direction. */
export function isConfirmed(mealGL: number, spikeOccurred: boolean): boolean {
    return (mealGL > 25 && spikeOccurred) || (mealGL < 20 && !spikeOccurred);
}

function postMealPeak(mealAt: Date, glucose: readonly GlucoseReading[]): GlucoseReading | undefined {
    let peak: GlucoseReading | undefined;
    for (const reading of glucose) {
        const delta = reading.timestamp.getTime() - mealAt.getTime();
        if (delta <= POST_MEAL_MIN_MS || delta >= POST_MEAL_MAX_MS) continue;
        if (!peak || reading.glucoseMgDL > peak.glucoseMgDL) peak = reading;
    }
    return peak;
}

/**
 * Online learning of meal → glucose edge weights.
 *
 * Each observation moves strength toward 1 (confirmed) or 0 (disconfirmed) by
 * `1 / (1 + confidence × 10)` of the remaining distance, so confident edges
 * move less. Confidence rises in both cases and is capped at 0.99.
 */
export class EdgeWeightLearner {
    updateEdge(edge: HealthGraphEdge, confirmed: boolean, store: HealthGraphStore): HealthGraphEdge {
        const observationWeight = 1 / (1 + edge.confidence * 10);
        const updated: HealthGraphEdge = confirmed
            ? {
                ...edge,
                causalStrength: clamp01(edge.causalStrength + (1 - edge.causalStrength) * observationWeight),
                confidence: Math.min(edge.confidence + 0.02, MAX_EDGE_CONFIDENCE),
            }
            : {
                ...edge,
                causalStrength: clamp01(edge.causalStrength - edge.causalStrength * observationWeight),
                confidence: Math.min(edge.confidence + 0.01, MAX_EDGE_CONFIDENCE),
            };

        return store.addEdge(updated);
    }

    batchUpdate(store: HealthGraphStore, window: TimeWindow): BatchUpdateSummary {
        const summary: BatchUpdateSummary = {
            mealsScanned: 0,
            edgesUpdated: 0,
            edgesCreated: 0,
            confirmed: 0,
            disconfirmed: 0,
        };
        const meals = store.queryMeals(window.start, window.end);
        const glucose = store.queryGlucose(window.start, window.end);

        for (const meal of meals) {
            if (meal.id === undefined) continue;
            summary.mealsScanned += 1;

            const peak = postMealPeak(meal.timestamp, glucose);
            if (!peak) continue;

            const spikeOccurred = peak.glucoseMgDL > SPIKE_THRESHOLD_MG_DL;
            const confirmed = isConfirmed(glycemicLoad(meal), spikeOccurred);
            if (confirmed) summary.confirmed += 1;
            else summary.disconfirmed += 1;

            const mealNode = nodeId('meal', meal.id);
            const existing = store.queryEdges(mealNode).filter((edge) => edge.edgeType === 'meal_to_glucose');
            for (const edge of existing) {
                this.updateEdge(edge, confirmed, store);
                summary.edgesUpdated += 1;
            }

            if (existing.length === 0 && peak.id !== undefined) {
                store.addEdge({
                    sourceNodeId: mealNode,
                    targetNodeId: nodeId('glucose', peak.id),
                    sourceCategory: 'meal',
                    targetCategory: 'glucose',
                    edgeType: 'meal_to_glucose',
                    causalStrength: spikeOccurred ? 0.6 : 0.3,
                    temporalOffsetSeconds: (peak.timestamp.getTime() - meal.timestamp.getTime()) / 1000,
                    confidence: 0.3,
                    createdAt: new Date(),
                });
                summary.edgesCreated += 1;
            }
        }

        void logThought(
            `[EdgeWeightLearner] Scanned ${summary.mealsScanned} meal(s): ${summary.edgesUpdated} updated, ${summary.edgesCreated} created, ${summary.confirmed} confirmed, ${summary.disconfirmed} disconfirmed.`,
        );
        return summary;
    }
}
