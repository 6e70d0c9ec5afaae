import type { AnalysisTool, DebtType, Hypothesis, ToolObservation } from '../../types/causal.js';
import type { HealthGraphStore, TimeWindow } from '../../types/health-graph.js';
import { DAY_MS, HOUR_MS, mean } from '../../utils/math.js';

const POPULATION_HRV_MS = 50;
const POPULATION_RESTING_HR = 65;

// Compares the window against the preceding 7 days: HRV deviation,
// post-meal HRV suppression and resting heart-rate elevation.
export class InflammationTracker implements AnalysisTool {
    readonly name = 'InflammationTracker';
    readonly targetDebtTypes: ReadonlySet<DebtType> = new Set<DebtType>(['metabolic', 'somatic']);

    analyze(_hypotheses: readonly Hypothesis[], store: HealthGraphStore, window: TimeWindow): ToolObservation {
        const baselineStart = new Date(window.start.getTime() - 7 * DAY_MS);

        const baselineHrv = store.querySamples('hrv_sdnn', baselineStart, window.start);
        const currentHrv = store.querySamples('hrv_sdnn', window.start, window.end);
        const baselineHrvAverage = mean(baselineHrv.map((sample) => sample.value)) ?? POPULATION_HRV_MS;
        const currentHrvAverage = mean(currentHrv.map((sample) => sample.value)) ?? baselineHrvAverage;
        const hrvDeviation = baselineHrvAverage > 0
            ? Math.max((baselineHrvAverage - currentHrvAverage) / baselineHrvAverage, 0)
            : 0;

        const baselineHr = store.querySamples('resting_hr', baselineStart, window.start);
        const currentHr = store.querySamples('resting_hr', window.start, window.end);
        const baselineHrAverage = mean(baselineHr.map((sample) => sample.value)) ?? POPULATION_RESTING_HR;
        const currentHrAverage = mean(currentHr.map((sample) => sample.value)) ?? baselineHrAverage;
        const hrElevation = baselineHrAverage > 0
            ? Math.max((currentHrAverage - baselineHrAverage) / baselineHrAverage, 0)
            : 0;

        let postPrandial = 0;
        for (const meal of store.queryMeals(window.start, window.end)) {
            const afterMeal = currentHrv.filter((sample) => {
                const delta = sample.timestamp.getTime() - meal.timestamp.getTime();
                return delta > HOUR_MS && delta < 2 * HOUR_MS;
            });
            const average = mean(afterMeal.map((sample) => sample.value));
            if (average !== undefined && baselineHrvAverage > 0 && average < baselineHrvAverage * 0.8) {
                postPrandial = Math.max(postPrandial, (baselineHrvAverage - average) / baselineHrvAverage);
            }
        }

        const score = hrvDeviation * 0.4 + postPrandial * 0.4 + hrElevation * 0.2;
        const percent = (value: number): number => Math.trunc(value * 100);

        return {
            toolName: this.name,
            evidence: { metabolic: score * 0.6, somatic: score * 0.4 },
            confidence: Math.min((currentHrv.length + baselineHrv.length) / 20, 1),
            detail: `HRV deviation: ${percent(hrvDeviation)}%, Post-prandial: ${percent(postPrandial)}%, HR elevation: ${percent(hrElevation)}%`,
        };
    }
}
