import { DEBT_TYPES } from '../types/causal.js';
import type { DebtType, Hypothesis, HypothesisClassifier, RankedDebt, ToolObservation } from '../types/causal.js';

const UNIFORM_PRIOR: Readonly<Record<DebtType, number>> = {
    metabolic: 0.33,
    digital: 0.33,
    somatic: 0.34,
};

const PRIOR_WEIGHT = 0.2;
const CONFIDENCE_WEIGHT = 0.3;

/**
 * Aggregates hypotheses and tool observations into category scores.
 *
 * Raw score = uniform prior + Σ(prior × 0.2 + confidence × 0.3) per hypothesis
 * + Σ(evidence × observation confidence). Negative totals count as 0 and the
 * result is normalised to sum to 1, strongest first.
 */
export class DebtClassifier implements HypothesisClassifier {
    classify(hypotheses: readonly Hypothesis[], observations: readonly ToolObservation[]): RankedDebt[] {
        const scores: Record<DebtType, number> = { ...UNIFORM_PRIOR };

        for (const hypothesis of hypotheses) {
            scores[hypothesis.debtType] +=
                hypothesis.priorProbability * PRIOR_WEIGHT + hypothesis.confidence * CONFIDENCE_WEIGHT;
        }

        for (const observation of observations) {
            for (const debtType of DEBT_TYPES) {
                const evidence = observation.evidence[debtType];
                if (evidence !== undefined) {
                    scores[debtType] += evidence * observation.confidence;
                }
            }
        }

        for (const debtType of DEBT_TYPES) {
            scores[debtType] = Math.max(scores[debtType], 0);
        }

        const total = DEBT_TYPES.reduce((acc, debtType) => acc + scores[debtType], 0);
        if (total <= 0) return [];

        return DEBT_TYPES
            .map((type) => ({ type, score: scores[type] / total, rawScore: scores[type] }))
            .sort((left, right) => right.score - left.score);
    }
}
