import type { AnalysisTool, DebtType, Hypothesis, ToolObservation } from '../../types/causal.js';
import { glycemicLoad, isPassiveBehavior } from '../../types/health-graph.js';
import type { HealthGraphStore, TimeWindow } from '../../types/health-graph.js';
import { DAY_MS, HOUR_MS, sum } from '../../utils/math.js';

const POPULATION_SLEEP_HOURS = 7.5;
/** A deficit of this many hours scores 1. */
const MAX_DEFICIT_HOURS = 3;
const LATE_MEAL_HOUR = 21;
const LATE_SCREEN_HOUR = 22;

/**
 * Last night's sleep against the 7-day average, plus late high-GL meals and
 * late passive screen time. Hours are read in local time.
 */
export class SleepQualityAnalyzer implements AnalysisTool {
    readonly name = 'SleepQualityAnalyzer';
    readonly targetDebtTypes: ReadonlySet<DebtType> = new Set<DebtType>(['somatic', 'metabolic']);

    analyze(_hypotheses: readonly Hypothesis[], store: HealthGraphStore, window: TimeWindow): ToolObservation {
        // Widen backwards to cover the previous night.
        const sleepStart = new Date(window.start.getTime() - 12 * HOUR_MS);
        const sleep = store.querySamples('sleep_analysis', sleepStart, window.end);
        const totalSleepHours = sum(sleep.map((sample) => sample.value));

        const baselineStart = new Date(window.start.getTime() - 7 * DAY_MS);
        const baseline = store.querySamples('sleep_analysis', baselineStart, window.start);
        const nights = new Set(baseline.map((sample) => sample.timestamp.toDateString())).size;
        const baselineHours = nights > 0 ? sum(baseline.map((sample) => sample.value)) / nights : POPULATION_SLEEP_HOURS;

        const deficitScore = Math.min(Math.max(baselineHours - totalSleepHours, 0) / MAX_DEFICIT_HOURS, 1);

        const lateMeals = store
            .queryMeals(sleepStart, window.end)
            .filter((meal) => meal.timestamp.getHours() >= LATE_MEAL_HOUR && glycemicLoad(meal) > 25);
        const lateScreens = store
            .queryBehaviors(sleepStart, window.end)
            .filter((event) => event.timestamp.getHours() >= LATE_SCREEN_HOUR && isPassiveBehavior(event));

        const evidence: Partial<Record<DebtType, number>> = {
            somatic: deficitScore * 0.6 + (lateScreens.length > 0 ? 0.2 : 0),
        };
        if (lateMeals.length > 0) {
            evidence.metabolic = 0.3;
        }

        return {
            toolName: this.name,
            evidence,
            confidence: sleep.length === 0 ? 0.2 : Math.min(sleep.length / 4, 1),
            detail: `Sleep: ${totalSleepHours.toFixed(1)}h (baseline: ${baselineHours.toFixed(1)}h), Late meals: ${lateMeals.length}, Late screens: ${lateScreens.length}`,
        };
    }
}
