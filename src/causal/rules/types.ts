import type { DebtType } from '../../types/causal.js';

/** One measurable condition over the rule context. Comparisons are strict except `late_meal_after`. */
export type RuleCondition =
    | { check: 'hrv_below'; threshold: number }
    | { check: 'hrv_drop_percent'; threshold: number }
    | { check: 'glucose_crash_delta'; threshold: number }
    | { check: 'glucose_below'; threshold: number }
    | { check: 'sleep_below'; hours: number }
    | { check: 'dopamine_debt_above'; threshold: number }
    | { check: 'passive_minutes_above'; threshold: number }
    | { check: 'aqi_above'; threshold: number }
    | { check: 'pollen_above'; threshold: number }
    | { check: 'protein_below'; grams: number }
    | { check: 'gl_above'; threshold: number }
    | { check: 'late_meal_after'; hour: number };

/** A deterministic rule: when every condition holds, it yields an explanation at a fixed confidence. */
export interface BioRule {
    readonly id: string;
    readonly name: string;
    readonly conditions: readonly RuleCondition[];
    readonly conclusion: DebtType;
    readonly explanation: string;
    readonly recommendation: string;
    readonly confidence: number;
}

/** Health signals gathered once per evaluation. Missing data is `undefined` and fails every check on it. */
export interface RuleContext {
    averageHrv?: number;
    baselineHrv?: number;
    hrvDropPercent?: number;
    glucoseCrashDelta?: number;
    currentGlucose?: number;
    totalSleepHours?: number;
    maxDopamineDebt?: number;
    passiveMinutes: number;
    maxAqi?: number;
    maxPollen?: number;
    totalProteinGrams: number;
    maxMealGL?: number;
    latestMealHour?: number;
}
