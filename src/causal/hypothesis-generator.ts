import { DEBT_TYPES } from '../types/causal.js';
import type { DebtType, Hypothesis } from '../types/causal.js';
import {
    glycemicLoad,
    isCrashReading,
    isEnvironmentalStress,
    isPassiveBehavior,
} from '../types/health-graph.js';
import type { HealthGraphStore, TimeWindow } from '../types/health-graph.js';
import { mean, sum } from '../utils/math.js';
import { createHypothesis, sortHypotheses } from './hypothesis.js';

// ── Thresholds ──────────────────────────────────────────────────────────────

export const HIGH_GL_THRESHOLD = 25;
export const VERY_HIGH_GL_THRESHOLD = 35;
export const SLEEP_DEFICIT_HOURS = 7.0;
export const PLACEHOLDER_CONFIDENCE = 0.15;

const METABOLIC_CRASH_CONFIDENCE = 0.76;
const METABOLIC_VERY_HIGH_GL_CONFIDENCE = 0.68;
const METABOLIC_HIGH_GL_CONFIDENCE = 0.58;
const METABOLIC_WEAK_CONFIDENCE = 0.40;
const DIGITAL_BASE_CONFIDENCE = 0.45;
const DIGITAL_MAX_CONFIDENCE = 0.80;
const SOMATIC_BOTH_CONFIDENCE = 0.70;
const SOMATIC_SINGLE_CONFIDENCE = 0.55;
const SKIN_MEAL_AND_SLEEP_CONFIDENCE = 0.78;
const SKIN_MEAL_CONFIDENCE = 0.72;
const SKIN_DEFAULT_CONFIDENCE = 0.62;
const SKIN_AQI_THRESHOLD = 80;

export const SKIN_KEYWORDS: readonly string[] = [
    'skin', 'acne', 'pimple', 'dark circle', 'eye bag', 'oily', 'oiliness',
    'pore', 'wrinkle', 'redness', 'complexion', 'face', 'breakout', 'pigment',
    'spot', 'texture', 'dry skin', 'hydration',
];

export const DARK_CIRCLE_KEYWORDS: readonly string[] = ['dark circle', 'eye bag', 'dark eye', 'puffy eye'];

/** Signals derived from one analysis window, shared by every category rule. */
export interface WindowSignals {
    hasCrash: boolean;
    hasHighGLMeal: boolean;
    /** Highest GL among meals above the high-GL threshold, 0 when none. */
    maxHighGL: number;
    mealCount: number;
    lastMealLabel?: string;
    lastMealGL?: number;
    averageHrv?: number;
    passiveEventCount: number;
    passiveMinutes: number;
    maxDopamineDebt: number;
    totalSleepHours: number;
    hasSleepDeficit: boolean;
    hasEnvironmentalStress: boolean;
    latestAqi?: number;
    latestPollen?: number;
}

export function collectWindowSignals(store: HealthGraphStore, window: TimeWindow): WindowSignals {
    const { start, end } = window;
    const glucose = store.queryGlucose(start, end);
    const meals = store.queryMeals(start, end);
    const behaviors = store.queryBehaviors(start, end);
    const environment = store.queryEnvironment(start, end);
    const hrv = store.querySamples('hrv_sdnn', start, end);
    const sleep = store.querySamples('sleep_analysis', start, end);

    const highGLValues = meals.map(glycemicLoad).filter((gl) => gl > HIGH_GL_THRESHOLD);
    const lastMeal = meals.at(-1);
    const passive = behaviors.filter(isPassiveBehavior);
    const totalSleepHours = sum(sleep.map((sample) => sample.value));
    const latestEnvironment = environment.at(-1);

    return {
        hasCrash: glucose.some(isCrashReading),
        hasHighGLMeal: highGLValues.length > 0,
        maxHighGL: highGLValues.length > 0 ? Math.max(...highGLValues) : 0,
        mealCount: meals.length,
        lastMealLabel: lastMeal ? (lastMeal.ingredients[0]?.name ?? lastMeal.source) : undefined,
        lastMealGL: lastMeal ? glycemicLoad(lastMeal) : undefined,
        averageHrv: mean(hrv.map((sample) => sample.value)),
        passiveEventCount: passive.length,
        passiveMinutes: sum(passive.map((event) => event.durationSeconds / 60)),
        maxDopamineDebt: Math.max(0, ...passive.map((event) => event.dopamineDebtScore ?? 0)),
        totalSleepHours,
        hasSleepDeficit: sleep.length === 0 || totalSleepHours < SLEEP_DEFICIT_HOURS,
        hasEnvironmentalStress: environment.some(isEnvironmentalStress),
        latestAqi: latestEnvironment?.aqiUS,
        latestPollen: latestEnvironment?.pollenIndex,
    };
}

// ── Per-category rules ──────────────────────────────────────────────────────

function metabolicHypothesis(signals: WindowSignals): Hypothesis | undefined {
    if (signals.hasCrash || signals.hasHighGLMeal) {
        const chain: string[] = [];
        if (signals.lastMealLabel !== undefined && signals.lastMealGL !== undefined) {
            chain.push(`${signals.lastMealLabel} (GL ${Math.trunc(signals.lastMealGL)})`);
        }
        if (signals.hasCrash) chain.push('Glucose crash detected');
        if (signals.averageHrv !== undefined) chain.push(`HRV: ${Math.trunc(signals.averageHrv)}ms`);

        let confidence = METABOLIC_HIGH_GL_CONFIDENCE;
        if (signals.hasCrash) confidence = METABOLIC_CRASH_CONFIDENCE;
        else if (signals.maxHighGL > VERY_HIGH_GL_THRESHOLD) confidence = METABOLIC_VERY_HIGH_GL_CONFIDENCE;

        return createHypothesis({
            debtType: 'metabolic',
            description: 'Post-meal glucose crash or high glycemic load',
            confidence,
            causalChain: chain,
            supportingEvidence: signals.hasCrash
                ? ['Glucose crash detected in window']
                : [`High-GL meal (GL ${Math.trunc(signals.maxHighGL)}) detected`],
            priorProbability: 0.45,
        });
    }

    if (signals.mealCount > 0) {
        return createHypothesis({
            debtType: 'metabolic',
            description: 'Meal-related metabolic impact',
            confidence: METABOLIC_WEAK_CONFIDENCE,
            causalChain: ['Meals detected, no crash'],
            priorProbability: 0.30,
        });
    }

    return undefined;
}

function digitalHypothesis(signals: WindowSignals): Hypothesis | undefined {
    if (signals.passiveEventCount === 0) return undefined;

    const minutes = Math.trunc(signals.passiveMinutes);
    return createHypothesis({
        debtType: 'digital',
        description: 'Passive screen time and dopamine debt',
        confidence: Math.min(DIGITAL_BASE_CONFIDENCE + signals.passiveMinutes / 200, DIGITAL_MAX_CONFIDENCE),
        causalChain: [`${minutes}min passive screen time`, `Dopamine debt: ${Math.trunc(signals.maxDopamineDebt)}`],
        supportingEvidence: [`${signals.passiveEventCount} passive events, ${minutes} total minutes`],
        priorProbability: 0.35,
    });
}

function somaticHypothesis(signals: WindowSignals): Hypothesis | undefined {
    if (!signals.hasSleepDeficit && !signals.hasEnvironmentalStress) return undefined;

    const sleepText = signals.totalSleepHours.toFixed(1);
    const chain: string[] = [];
    if (signals.hasSleepDeficit) chain.push(`Sleep: ${sleepText}h`);
    if (signals.hasEnvironmentalStress && signals.latestAqi !== undefined) {
        chain.push(`AQI: ${signals.latestAqi}, Pollen: ${signals.latestPollen ?? 0}`);
    }

    return createHypothesis({
        debtType: 'somatic',
        description: 'Environmental or sleep-related stress',
        confidence: signals.hasSleepDeficit && signals.hasEnvironmentalStress
            ? SOMATIC_BOTH_CONFIDENCE
            : SOMATIC_SINGLE_CONFIDENCE,
        causalChain: chain,
        supportingEvidence: signals.hasSleepDeficit
            ? [`Sleep deficit: ${sleepText}h`]
            : ['Environmental stress detected'],
        priorProbability: 0.35,
    });
}

function mentionsAny(text: string, keywords: readonly string[]): boolean {
    return keywords.some((keyword) => text.includes(keyword));
}

/**
 * Skin-specific hypothesis for symptoms that match the skin keyword list.
 * This is a heuristic keyword policy: dark-circle wording routes to somatic,
 * anything else to metabolic when a high-GL meal is present.
 */
export function skinHypothesis(symptom: string, signals: WindowSignals): Hypothesis | undefined {
    const text = symptom.toLowerCase();
    if (!mentionsAny(text, SKIN_KEYWORDS)) return undefined;

    const chain: string[] = [];
    if (signals.hasHighGLMeal) {
        chain.push(`High-GL meal (GL ${Math.trunc(signals.maxHighGL)}) → IGF-1 spike → sebum overproduction`);
    }
    if (signals.totalSleepHours < SLEEP_DEFICIT_HOURS) {
        chain.push(`Sleep ${signals.totalSleepHours.toFixed(1)}h → cortisol elevation → skin inflammation`);
    }
    if (signals.latestAqi !== undefined && signals.latestAqi > SKIN_AQI_THRESHOLD) {
        chain.push(`AQI ${signals.latestAqi} → oxidative stress → barrier disruption`);
    }
    if (chain.length === 0) chain.push('Lifestyle factors → skin condition');

    let debtType: DebtType = signals.hasHighGLMeal ? 'metabolic' : 'somatic';
    if (mentionsAny(text, DARK_CIRCLE_KEYWORDS)) debtType = 'somatic';

    let confidence = SKIN_DEFAULT_CONFIDENCE;
    if (signals.hasHighGLMeal && signals.hasSleepDeficit) confidence = SKIN_MEAL_AND_SLEEP_CONFIDENCE;
    else if (signals.hasHighGLMeal) confidence = SKIN_MEAL_CONFIDENCE;

    return createHypothesis({
        debtType,
        description: `Skin condition driven by ${debtType === 'metabolic' ? 'dietary/metabolic' : 'sleep/stress'} factors`,
        confidence,
        causalChain: chain,
        supportingEvidence: ['Skin-related question detected'],
        priorProbability: 0.45,
    });
}

export function placeholderHypothesis(debtType: DebtType): Hypothesis {
    return createHypothesis({
        debtType,
        description: `No strong indicators for ${debtType} debt`,
        confidence: PLACEHOLDER_CONFIDENCE,
        priorProbability: PLACEHOLDER_CONFIDENCE,
    });
}

/**
 * Thought stage: one deterministic hypothesis per category from the window's
 * raw data, sorted by confidence. Every category is represented.
 */
export function generateHypotheses(symptom: string, store: HealthGraphStore, window: TimeWindow): Hypothesis[] {
    const signals = collectWindowSignals(store, window);

    let hypotheses = [metabolicHypothesis(signals), digitalHypothesis(signals), somaticHypothesis(signals)]
        .filter((hypothesis): hypothesis is Hypothesis => hypothesis !== undefined);

    const skin = skinHypothesis(symptom, signals);
    if (skin) {
        const existing = hypotheses.find((hypothesis) => hypothesis.debtType === skin.debtType);
        if ((existing?.confidence ?? 0) < skin.confidence) {
            hypotheses = [...hypotheses.filter((hypothesis) => hypothesis.debtType !== skin.debtType), skin];
        }
    }

    const covered = new Set(hypotheses.map((hypothesis) => hypothesis.debtType));
    for (const debtType of DEBT_TYPES) {
        if (!covered.has(debtType)) hypotheses.push(placeholderHypothesis(debtType));
    }

    return sortHypotheses(hypotheses);
}
