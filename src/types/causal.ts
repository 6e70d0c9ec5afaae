import type { HealthGraphStore, TimeWindow } from './health-graph.js';

/** Root-cause categories a symptom can be attributed to. */
export type DebtType = 'metabolic' | 'digital' | 'somatic';

export const DEBT_TYPES: readonly DebtType[] = ['metabolic', 'digital', 'somatic'];

/** Scored causal claim. Ordered by confidence, highest first. */
export interface Hypothesis {
    readonly debtType: DebtType;
    readonly description: string;
    readonly confidence: number;
    readonly causalChain: readonly string[];
    readonly supportingEvidence: readonly string[];
    readonly contradictingEvidence: readonly string[];
    readonly priorProbability: number;
}

/** Output of one analysis step. Positive evidence supports a category, negative contradicts it. */
export interface ToolObservation {
    readonly toolName: string;
    readonly evidence: Readonly<Partial<Record<DebtType, number>>>;
    /** The tool's self-reported reliability. */
    readonly confidence: number;
    readonly detail: string;
}

/** Mutable state of one reasoning session. Never shared or persisted. */
export interface AgentState {
    readonly symptom: string;
    hypotheses: Hypothesis[];
    observations: ToolObservation[];
    isResolved: boolean;
    readonly analysisWindow: TimeWindow;
}

export interface CausalExplanation {
    readonly symptom: string;
    readonly causalChain: readonly string[];
    readonly strength: number;
    readonly confidence: number;
    readonly narrative: string;
}

export type InterventionEffort = 'trivial' | 'moderate' | 'significant';

/** A templated "what if" intervention. */
export interface Counterfactual {
    readonly description: string;
    /** Estimated effect size. */
    readonly impact: number;
    readonly effort: InterventionEffort;
    readonly confidence: number;
}

export interface RankedDebt {
    type: DebtType;
    /** Normalised so scores across categories sum to 1. */
    score: number;
    rawScore: number;
}

/**
 * Maturity phase of the engine, driven by data density and learned edge confidence.
 * - passive:     only collecting data, rules only
 * - correlation: rules still primary
 * - causal:      learned edges trusted, iterative reasoning enabled
 * - active:      iterative reasoning plus model-written narratives
 */
export type MaturityPhase = 'passive' | 'correlation' | 'causal' | 'active';

export interface PhaseConfig {
    useReAct: boolean;
    useLLM: boolean;
    maxTools: number;
}

// ── Collaborators ───────────────────────────────────────────────────────────

/** Capability contract for analysis tools run in the Act stage. */
export interface AnalysisTool {
    readonly name: string;
    readonly targetDebtTypes: ReadonlySet<DebtType>;
    analyze(hypotheses: readonly Hypothesis[], store: HealthGraphStore, window: TimeWindow): ToolObservation;
}

export interface ToolSelector {
    /** The most informative tool for the current state, or `undefined` to stop. */
    selectTool(state: AgentState): AnalysisTool | undefined;
}

export interface RuleEvaluator {
    evaluate(symptom: string, store: HealthGraphStore, window?: TimeWindow): CausalExplanation[];
}

export interface NarrativeOptions {
    /** Whether a language model may write the narrative. Templates are always allowed. */
    allowModel?: boolean;
}

export interface NarrativeSource {
    generate(
        symptom: string,
        hypothesis: Hypothesis,
        observations: readonly ToolObservation[],
        options?: NarrativeOptions,
    ): Promise<string> | string;
}

export interface PhaseConfigProvider {
    phaseConfig(): PhaseConfig;
}

export interface HypothesisClassifier {
    classify(hypotheses: readonly Hypothesis[], observations: readonly ToolObservation[]): RankedDebt[];
}
