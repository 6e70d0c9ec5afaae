import { glycemicLoad } from '../types/health-graph.js';
import type { GlucoseReading, HealthGraphStore, MealEvent, PhysiologicalSample } from '../types/health-graph.js';
import { DAY_MS, HOUR_MS, MINUTE_MS, mean } from '../utils/math.js';

const POPULATION_HRV_MS = 50;
const LATE_MEAL_HOUR = 20;

function spikeMagnitude(meal: MealEvent, glucose: readonly GlucoseReading[]): number {
    const after = glucose.filter((reading) => {
        const delta = reading.timestamp.getTime() - meal.timestamp.getTime();
        return delta > 0 && delta < 150 * MINUTE_MS;
    });
    let peak: GlucoseReading | undefined;
    for (const reading of after) {
        if (!peak || reading.glucoseMgDL > peak.glucoseMgDL) peak = reading;
    }
    if (!peak) return 0;

    const peakAt = peak.timestamp;
    const postPeak = after.filter((reading) => reading.timestamp > peakAt).map((reading) => reading.glucoseMgDL);
    const nadir = postPeak.length > 0 ? Math.min(...postPeak) : peak.glucoseMgDL;
    // An 80 mg/dL swing scores 1.
    return Math.min((peak.glucoseMgDL - nadir) / 80, 1);
}

function hrvDrop(meal: MealEvent, hrv: readonly PhysiologicalSample[], baseline: number): number {
    const after = hrv.filter((sample) => {
        const delta = sample.timestamp.getTime() - meal.timestamp.getTime();
        return delta > HOUR_MS && delta < 3 * HOUR_MS;
    });
    const average = mean(after.map((sample) => sample.value)) ?? baseline;
    return baseline > 0 ? Math.max((baseline - average) / baseline, 0) : 0;
}

function cookingModifier(meal: MealEvent): number {
    if (meal.bioavailabilityModifier === undefined) return 1;
    return meal.bioavailabilityModifier > 1 ? 0.8 : 1.2;
}

/**
 * Digestive (metabolic) debt: the delayed physiological cost of recent meals,
 * on a 0–100 scale. Per meal: 0.3 × GL factor + 0.3 × spike magnitude
 * + 0.25 × HRV drop + 0.15 × cooking modifier offset, ×1.3 after 8 PM.
 */
export class MetabolicDebtScorer {
    readonly #now: () => Date;

    constructor(now: () => Date = () => new Date()) {
        this.#now = now;
    }

    score(store: HealthGraphStore, windowHours: number): number {
        const end = this.#now();
        const start = new Date(end.getTime() - windowHours * HOUR_MS);

        const meals = store.queryMeals(start, end);
        if (meals.length === 0) return 0;

        const glucose = store.queryGlucose(start, end);
        const hrv = store.querySamples('hrv_sdnn', start, end);
        const baselineSamples = store.querySamples('hrv_sdnn', new Date(start.getTime() - 7 * DAY_MS), start);
        const baseline = mean(baselineSamples.map((sample) => sample.value)) ?? POPULATION_HRV_MS;

        let total = 0;
        for (const meal of meals) {
            const debt = Math.min(glycemicLoad(meal) / 50, 1) * 0.3
                + spikeMagnitude(meal, glucose) * 0.3
                + hrvDrop(meal, hrv, baseline) * 0.25
                + (cookingModifier(meal) - 0.8) * 0.15;
            total += debt * (meal.timestamp.getHours() >= LATE_MEAL_HOUR ? 1.3 : 1);
        }

        return Math.min((total / meals.length) * 100, 100);
    }
}
