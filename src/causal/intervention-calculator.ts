import rawTemplates from './data/counterfactual-templates.json' with { type: 'json' };
import type { CausalExplanation, Counterfactual, InterventionEffort } from '../types/causal.js';
import { clamp01 } from '../utils/math.js';

export type InterventionFamily = 'meal' | 'behavior' | 'sleep' | 'environment';

export type InterventionTemplates = Readonly<Record<InterventionFamily, readonly Counterfactual[]>>;

export const MAX_SYMPTOM_COUNTERFACTUALS = 5;

const EFFORTS: readonly InterventionEffort[] = ['trivial', 'moderate', 'significant'];

function isEffort(value: unknown): value is InterventionEffort {
    return typeof value === 'string' && EFFORTS.some((effort) => effort === value);
}

function parseTemplate(family: string, entry: unknown): Counterfactual {
    if (typeof entry !== 'object' || entry === null) {
        throw new Error(`[InterventionCalculator] Template in '${family}' is not an object.`);
    }
    const description: unknown = Reflect.get(entry, 'description');
    const impact: unknown = Reflect.get(entry, 'impact');
    const effort: unknown = Reflect.get(entry, 'effort');
    const confidence: unknown = Reflect.get(entry, 'confidence');
    if (typeof description !== 'string' || typeof impact !== 'number'
        || typeof confidence !== 'number' || !isEffort(effort)) {
        throw new Error(`[InterventionCalculator] Malformed template in '${family}'.`);
    }
    return Object.freeze({ description, impact: clamp01(impact), effort, confidence: clamp01(confidence) });
}

function parseFamily(source: Readonly<Record<string, unknown>>, family: InterventionFamily): readonly Counterfactual[] {
    const entries = source[family];
    if (!Array.isArray(entries)) {
        throw new Error(`[InterventionCalculator] Missing template family '${family}'.`);
    }
    return Object.freeze(entries.map((entry: unknown) => parseTemplate(family, entry)));
}

/** Validate a template table. Throws on a missing family or malformed entry. */
export function parseTemplates(source: Readonly<Record<string, unknown>>): InterventionTemplates {
    return Object.freeze({
        meal: parseFamily(source, 'meal'),
        behavior: parseFamily(source, 'behavior'),
        sleep: parseFamily(source, 'sleep'),
        environment: parseFamily(source, 'environment'),
    });
}

export const DEFAULT_TEMPLATES: InterventionTemplates = parseTemplates(rawTemplates);

/**
 * Templated counterfactual interventions, selected by keyword families.
 *
 * Impact, effort and confidence are fixed per template; nothing here
 * propagates values through the causal graph.
 */
export class InterventionCalculator {
    readonly #templates: InterventionTemplates;

    constructor(templates: InterventionTemplates = DEFAULT_TEMPLATES) {
        this.#templates = templates;
    }

    /** Families chosen by substrings of a node ID, in fixed order. Falls back to the general set. */
    generateCounterfactuals(eventNodeId: string): Counterfactual[] {
        const results: Counterfactual[] = [];

        if (eventNodeId.includes('meal')) results.push(...this.#templates.meal);
        if (eventNodeId.includes('behavioral') || eventNodeId.includes('screen')) results.push(...this.#templates.behavior);
        if (eventNodeId.includes('glucose')) results.push(...this.#templates.meal);
        if (eventNodeId.includes('environment')) results.push(...this.#templates.environment);

        return results.length > 0 ? results : this.generalCounterfactuals();
    }

    /**
     * Families chosen from each explanation's causal-chain text, deduplicated by
     * description and capped at five. No match gives the general set.
     */
    generateCounterfactualsForSymptom(_symptom: string, explanations: readonly CausalExplanation[]): Counterfactual[] {
        const results: Counterfactual[] = [];

        for (const explanation of explanations) {
            const chain = explanation.causalChain.join(' ').toLowerCase();
            const mentions = (...words: string[]): boolean => words.some((word) => chain.includes(word));

            if (mentions('glucose', 'meal', 'roti', 'gl')) results.push(...this.#templates.meal);
            if (mentions('screen', 'scroll', 'dopamine')) results.push(...this.#templates.behavior);
            if (mentions('sleep')) results.push(...this.#templates.sleep);
            if (mentions('aqi', 'pollen', 'environment')) results.push(...this.#templates.environment);
        }

        if (results.length === 0) return this.generalCounterfactuals();

        const seen = new Set<string>();
        return results
            .filter((counterfactual) => {
                if (seen.has(counterfactual.description)) return false;
                seen.add(counterfactual.description);
                return true;
            })
            .slice(0, MAX_SYMPTOM_COUNTERFACTUALS);
    }

    /** First two meal templates plus the first sleep template. */
    generalCounterfactuals(): Counterfactual[] {
        return [...this.#templates.meal.slice(0, 2), ...this.#templates.sleep.slice(0, 1)];
    }
}
