import type { AnalysisTool, DebtType, Hypothesis, ToolObservation } from '../../types/causal.js';
import type { GlucoseReading, HealthGraphStore, TimeWindow } from '../../types/health-graph.js';
import { MINUTE_MS, mean } from '../../utils/math.js';

const MIN_READINGS = 3;
const STRONG_SIGNAL = 0.7;
const DIGITAL_SUPPRESSION = -0.3;

function firstBy(readings: readonly GlucoseReading[], better: (a: GlucoseReading, b: GlucoseReading) => boolean): GlucoseReading | undefined {
    let best: GlucoseReading | undefined;
    for (const reading of readings) {
        if (!best || better(reading, best)) best = reading;
    }
    return best;
}

/**
 * Looks for a post-meal glucose crash in the window.
 *
 * Score = 0.5 × crash severity (peak-to-nadir drop / 60 mg/dL)
 *       + 0.3 × HRV drop after the nadir
 *       + 0.2 × meal attribution (a meal 30–150 min before the nadir).
 */
export class MetabolicScanner implements AnalysisTool {
    readonly name = 'MetabolicScanner';
    readonly targetDebtTypes: ReadonlySet<DebtType> = new Set<DebtType>(['metabolic']);

    analyze(_hypotheses: readonly Hypothesis[], store: HealthGraphStore, window: TimeWindow): ToolObservation {
        const glucose = store.queryGlucose(window.start, window.end);
        const meals = store.queryMeals(window.start, window.end);
        const hrv = store.querySamples('hrv_sdnn', window.start, window.end);

        const peak = firstBy(glucose, (a, b) => a.glucoseMgDL > b.glucoseMgDL);
        if (glucose.length < MIN_READINGS || !peak) {
            return {
                toolName: this.name,
                evidence: { metabolic: 0 },
                confidence: 0.1,
                detail: `Insufficient glucose data (${glucose.length} readings)`,
            };
        }

        const afterPeak = glucose.filter((reading) => reading.timestamp > peak.timestamp);
        const nadir = firstBy(afterPeak, (a, b) => a.glucoseMgDL < b.glucoseMgDL);
        const crashDelta = nadir ? peak.glucoseMgDL - nadir.glucoseMgDL : 0;
        const crashSeverity = Math.min(Math.max(crashDelta, 0) / 60, 1);

        const averageHrv = mean(hrv.map((sample) => sample.value)) ?? 0;
        let hrvDrop = 0;
        if (nadir && averageHrv > 0) {
            const postCrash = mean(hrv.filter((sample) => sample.timestamp > nadir.timestamp).map((sample) => sample.value));
            if (postCrash !== undefined) {
                hrvDrop = Math.max((averageHrv - postCrash) / averageHrv, 0);
            }
        }

        const relatedMeal = nadir
            ? meals.find((meal) => {
                const delta = nadir.timestamp.getTime() - meal.timestamp.getTime();
                return delta > 30 * MINUTE_MS && delta < 150 * MINUTE_MS;
            })
            : undefined;

        const score = crashSeverity * 0.5 + Math.min(hrvDrop, 1) * 0.3 + (relatedMeal ? 0.2 : 0);
        const evidence: Partial<Record<DebtType, number>> = { metabolic: score };
        if (score > STRONG_SIGNAL) {
            evidence.digital = DIGITAL_SUPPRESSION;
        }

        const mealDetail = relatedMeal ? `Meal: ${relatedMeal.source}` : 'No meal attributed';
        return {
            toolName: this.name,
            evidence,
            confidence: Math.min(glucose.length / 12, 1),
            detail: `Crash: ${Math.trunc(crashDelta)}mg/dL, HRV drop: ${Math.trunc(hrvDrop * 100)}%, ${mealDetail}`,
        };
    }
}
