import type { CausalExplanation, RuleEvaluator } from '../../types/causal.js';
import { glycemicLoad, isPassiveBehavior } from '../../types/health-graph.js';
import type { GlucoseReading, HealthGraphStore, TimeWindow } from '../../types/health-graph.js';
import { DAY_MS, mean, sum, windowEndingAt } from '../../utils/math.js';
import { DEFAULT_RULES } from './default-rules.js';
import type { BioRule, RuleCondition, RuleContext } from './types.js';

const DEFAULT_WINDOW_HOURS = 6;

function maxOf(values: readonly number[]): number | undefined {
    return values.length > 0 ? Math.max(...values) : undefined;
}

/** Peak-to-nadir drop after the window's highest reading. Needs at least two readings. */
function crashDelta(glucose: readonly GlucoseReading[]): number | undefined {
    if (glucose.length < 2) return undefined;
    let peak = glucose[0];
    for (const reading of glucose) {
        if (reading.glucoseMgDL > peak.glucoseMgDL) peak = reading;
    }
    const afterPeak = glucose.filter((reading) => reading.timestamp > peak.timestamp);
    if (afterPeak.length === 0) return undefined;
    return peak.glucoseMgDL - Math.min(...afterPeak.map((reading) => reading.glucoseMgDL));
}

export function gatherRuleContext(store: HealthGraphStore, window: TimeWindow): RuleContext {
    const { start, end } = window;
    const baselineStart = new Date(start.getTime() - 7 * DAY_MS);

    const averageHrv = mean(store.querySamples('hrv_sdnn', start, end).map((sample) => sample.value));
    const baselineHrv = mean(store.querySamples('hrv_sdnn', baselineStart, start).map((sample) => sample.value));
    const hrvDropPercent = averageHrv !== undefined && baselineHrv !== undefined && baselineHrv > 0
        ? ((baselineHrv - averageHrv) / baselineHrv) * 100
        : undefined;

    const glucose = store.queryGlucose(start, end);
    const sleep = store.querySamples('sleep_analysis', start, end);
    const behaviors = store.queryBehaviors(start, end);
    const environment = store.queryEnvironment(start, end);
    const meals = store.queryMeals(start, end);

    const proteinGrams = meals
        .flatMap((meal) => meal.ingredients)
        .filter((ingredient) => ingredient.type === 'protein')
        .map((ingredient) => ingredient.quantityGrams ?? 0);

    return {
        averageHrv,
        baselineHrv,
        hrvDropPercent,
        glucoseCrashDelta: crashDelta(glucose),
        currentGlucose: glucose.at(-1)?.glucoseMgDL,
        totalSleepHours: sleep.length > 0 ? sum(sleep.map((sample) => sample.value)) : undefined,
        maxDopamineDebt: maxOf(behaviors.flatMap((event) =>
            event.dopamineDebtScore === undefined ? [] : [event.dopamineDebtScore])),
        passiveMinutes: sum(behaviors.filter(isPassiveBehavior).map((event) => event.durationSeconds / 60)),
        maxAqi: maxOf(environment.map((condition) => condition.aqiUS)),
        maxPollen: maxOf(environment.map((condition) => condition.pollenIndex)),
        totalProteinGrams: sum(proteinGrams),
        maxMealGL: maxOf(meals.map(glycemicLoad)),
        latestMealHour: meals.at(-1)?.timestamp.getHours(),
    };
}

function above(value: number | undefined, threshold: number): boolean {
    return value !== undefined && value > threshold;
}

function below(value: number | undefined, threshold: number): boolean {
    return value !== undefined && value < threshold;
}

export function evaluateCondition(condition: RuleCondition, context: RuleContext): boolean {
    switch (condition.check) {
        case 'hrv_below': return below(context.averageHrv, condition.threshold);
        case 'hrv_drop_percent': return above(context.hrvDropPercent, condition.threshold);
        case 'glucose_crash_delta': return above(context.glucoseCrashDelta, condition.threshold);
        case 'glucose_below': return below(context.currentGlucose, condition.threshold);
        case 'sleep_below': return below(context.totalSleepHours, condition.hours);
        case 'dopamine_debt_above': return above(context.maxDopamineDebt, condition.threshold);
        case 'passive_minutes_above': return above(context.passiveMinutes, condition.threshold);
        case 'aqi_above': return above(context.maxAqi, condition.threshold);
        case 'pollen_above': return above(context.maxPollen, condition.threshold);
        case 'protein_below': return below(context.totalProteinGrams, condition.grams);
        case 'gl_above': return above(context.maxMealGL, condition.threshold);
        case 'late_meal_after':
            return context.latestMealHour !== undefined && context.latestMealHour >= condition.hour;
    }
}

/**
 * Deterministic fallback reasoning. Every rule whose conditions all hold
 * yields one explanation; rules with more conditions come first.
 */
export class BioRuleEngine implements RuleEvaluator {
    readonly #rules: readonly BioRule[];
    readonly #now: () => Date;

    constructor(rules: readonly BioRule[] = DEFAULT_RULES, now: () => Date = () => new Date()) {
        this.#rules = rules;
        this.#now = now;
    }

    get rules(): readonly BioRule[] {
        return this.#rules;
    }

    evaluate(symptom: string, store: HealthGraphStore, window?: TimeWindow): CausalExplanation[] {
        const context = gatherRuleContext(store, window ?? windowEndingAt(this.#now(), DEFAULT_WINDOW_HOURS));

        return this.#rules
            .filter((rule) => rule.conditions.every((condition) => evaluateCondition(condition, context)))
            .sort((left, right) => right.conditions.length - left.conditions.length)
            .map((rule) => Object.freeze({
                symptom,
                causalChain: [rule.name],
                strength: rule.confidence,
                confidence: rule.confidence,
                narrative: `${rule.explanation} ${rule.recommendation}`,
            }));
    }
}
