import type { AgentState, DebtType, Hypothesis, ToolObservation } from '../types/causal.js';
import type { TimeWindow } from '../types/health-graph.js';
import { clamp01, windowEndingAt } from '../utils/math.js';

export interface HypothesisInput {
    debtType: DebtType;
    description: string;
    confidence: number;
    causalChain?: readonly string[];
    supportingEvidence?: readonly string[];
    contradictingEvidence?: readonly string[];
    priorProbability?: number;
}

const DEFAULT_PRIOR = 0.33;

/** Build a hypothesis with both probabilities clamped to [0, 1]. */
export function createHypothesis(input: HypothesisInput): Hypothesis {
    return {
        debtType: input.debtType,
        description: input.description,
        confidence: clamp01(input.confidence),
        causalChain: [...(input.causalChain ?? [])],
        supportingEvidence: [...(input.supportingEvidence ?? [])],
        contradictingEvidence: [...(input.contradictingEvidence ?? [])],
        priorProbability: clamp01(input.priorProbability ?? DEFAULT_PRIOR),
    };
}

/** Descending by confidence. */
export function compareHypotheses(left: Hypothesis, right: Hypothesis): number {
    return right.confidence - left.confidence;
}

/** Stable descending sort; an already-sorted list comes back in the same order. */
export function sortHypotheses(hypotheses: readonly Hypothesis[]): Hypothesis[] {
    return [...hypotheses].sort(compareHypotheses);
}

export function createObservation(observation: ToolObservation): ToolObservation {
    return Object.freeze({
        toolName: observation.toolName,
        evidence: Object.freeze({ ...observation.evidence }),
        confidence: clamp01(observation.confidence),
        detail: observation.detail,
    });
}

function formatPercent(value: number): string {
    return (value * 100).toFixed(0);
}

/**
 * Fold one observation into the hypotheses with an additive update:
 * `confidence + evidence × observation.confidence`, clamped. Categories the
 * observation does not score are left as they are. Returns a re-sorted list.
 */
export function foldObservation(hypotheses: readonly Hypothesis[], observation: ToolObservation): Hypothesis[] {
    const updated = hypotheses.map((hypothesis) => {
        const evidence = observation.evidence[hypothesis.debtType];
        if (evidence === undefined) return hypothesis;

        const confidence = clamp01(hypothesis.confidence + evidence * observation.confidence);
        if (evidence > 0) {
            return {
                ...hypothesis,
                confidence,
                supportingEvidence: [
                    ...hypothesis.supportingEvidence,
                    `${observation.toolName}: +${formatPercent(evidence)}%`,
                ],
            };
        }
        if (evidence < 0) {
            return {
                ...hypothesis,
                confidence,
                contradictingEvidence: [
                    ...hypothesis.contradictingEvidence,
                    `${observation.toolName}: ${formatPercent(evidence)}%`,
                ],
            };
        }
        return { ...hypothesis, confidence };
    });

    return sortHypotheses(updated);
}

export interface AgentStateOptions {
    windowHours?: number;
    now?: Date;
}

const DEFAULT_WINDOW_HOURS = 6;

export function createAgentState(symptom: string, options: AgentStateOptions = {}): AgentState {
    const analysisWindow: TimeWindow = windowEndingAt(
        options.now ?? new Date(),
        options.windowHours ?? DEFAULT_WINDOW_HOURS,
    );
    return {
        symptom,
        hypotheses: [],
        observations: [],
        isResolved: false,
        analysisWindow,
    };
}
