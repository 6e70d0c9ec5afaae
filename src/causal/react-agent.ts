import type {
    AgentState,
    CausalExplanation,
    DebtType,
    Hypothesis,
    HypothesisClassifier,
    NarrativeSource,
    PhaseConfigProvider,
    RuleEvaluator,
    ToolSelector,
} from '../types/causal.js';
import type { HealthGraphStore } from '../types/health-graph.js';
import type { ReasoningTrace } from '../types/reasoning-trace.js';
import { logThought } from '../utils/logger.js';
import { createAgentState, createObservation, foldObservation } from './hypothesis.js';
import { generateHypotheses } from './hypothesis-generator.js';
import { criticalHrv, safetyExplanation } from './safety-guard.js';

export const MAX_ITERATIONS = 3;
export const RESOLUTION_THRESHOLD = 0.7;
/** Below this top confidence an unresolved session defers to the rule engine. */
export const RULE_SUPERSEDE_THRESHOLD = 0.4;
export const EXPLANATION_FLOOR = 0.15;
export const MAX_EXPLANATIONS = 3;

export interface ReActAgentDeps {
    store: HealthGraphStore;
    tools: ToolSelector;
    classifier: HypothesisClassifier;
    rules: RuleEvaluator;
    narratives: NarrativeSource;
    maturity: PhaseConfigProvider;
}

export interface ReActAgentOptions {
    /** Analysis window length. Defaults to 6 hours. */
    windowHours?: number;
    /** Clock used to anchor the analysis window. */
    now?: () => Date;
}

/**
 * Outcome of the synchronous part of a session: a safety stop or the rule
 * engine's explanations, which are final, or the state to narrate.
 */
export type Deliberation =
    | { kind: 'safety'; explanation: CausalExplanation; state: AgentState }
    | { kind: 'rules'; explanations: CausalExplanation[]; state: AgentState }
    | { kind: 'hypotheses'; state: AgentState; allowModel: boolean };

/** Explanations plus the trace of the session that produced them. */
export interface ReasoningOutcome {
    explanations: CausalExplanation[];
    trace: ReasoningTrace;
}

function explainedHypotheses(state: AgentState): Hypothesis[] {
    return state.hypotheses
        .filter((hypothesis) => hypothesis.confidence > EXPLANATION_FLOOR)
        .slice(0, MAX_EXPLANATIONS);
}

/**
 * Bounded Thought → Act → Observe reasoning over one analysis window.
 *
 * Everything up to narrative generation runs synchronously in `deliberate`;
 * `run` adds the awaited narrative step and the session trace. A critically
 * low HRV in the window ends the session before any hypothesis is formed.
 *
 * Usage:
 * ```ts
 * const agent = new ReActAgent({ store, tools, classifier, rules, narratives, maturity });
 * const explanations = await agent.reason('Why am I tired?');
 * ```
 */
export class ReActAgent {
    readonly #deps: ReActAgentDeps;
    readonly #windowHours: number | undefined;
    readonly #now: () => Date;

    constructor(deps: ReActAgentDeps, options: ReActAgentOptions = {}) {
        this.#deps = deps;
        this.#windowHours = options.windowHours;
        this.#now = options.now ?? (() => new Date());
    }

    async reason(symptom: string): Promise<CausalExplanation[]> {
        const outcome = await this.run(symptom);
        return outcome.explanations;
    }

    async run(symptom: string): Promise<ReasoningOutcome> {
        const startedAt = Date.now();
        const createdAt = this.#now();
        const deliberation = this.deliberate(symptom);

        let explanations: CausalExplanation[];
        let conclusion: DebtType | undefined;
        if (deliberation.kind === 'safety') {
            explanations = [deliberation.explanation];
        } else if (deliberation.kind === 'rules') {
            explanations = deliberation.explanations;
        } else {
            const explained = explainedHypotheses(deliberation.state);
            conclusion = explained[0]?.debtType;
            explanations = await this.#buildExplanations(deliberation.state, explained, deliberation.allowModel);
        }

        const top = explanations[0];
        const { state } = deliberation;
        return {
            explanations,
            trace: {
                symptom,
                stage: deliberation.kind === 'hypotheses' ? 'inference' : deliberation.kind,
                hypotheses: state.hypotheses.map(({ debtType, description, confidence }) => ({
                    debtType,
                    description,
                    confidence,
                })),
                observations: [...state.observations],
                conclusion,
                confidence: top?.confidence,
                durationMs: Date.now() - startedAt,
                causalChain: top ? [...top.causalChain] : [],
                narrative: top?.narrative,
                createdAt,
            },
        };
    }

    deliberate(symptom: string): Deliberation {
        const { store, tools, rules, maturity } = this.#deps;
        const config = maturity.phaseConfig();
        const state = createAgentState(symptom, { windowHours: this.#windowHours, now: this.#now() });

        const hrvMs = criticalHrv(store, state.analysisWindow);
        if (hrvMs !== undefined) {
            void logThought(`[ReActAgent] HRV ${hrvMs}ms is critically low; skipping reasoning for '${symptom}'.`);
            return { kind: 'safety', explanation: safetyExplanation(symptom, hrvMs), state };
        }

        if (!config.useReAct) {
            void logThought(`[ReActAgent] Iterative reasoning disabled for this phase; using rules for '${symptom}'.`);
            return { kind: 'rules', explanations: rules.evaluate(symptom, store), state };
        }

        // Thought
        state.hypotheses = generateHypotheses(symptom, store, state.analysisWindow);
        void logThought(
            `[ReActAgent] Thought: ${state.hypotheses.map((h) => `${h.debtType}=${h.confidence.toFixed(2)}`).join(', ')}`,
        );

        const iterations = Math.min(MAX_ITERATIONS, config.maxTools);
        for (let i = 0; i < iterations; i += 1) {
            if (state.isResolved) break;

            // Act
            const tool = tools.selectTool(state);
            if (!tool) break;
            const observation = createObservation(tool.analyze(state.hypotheses, store, state.analysisWindow));

            // Observe
            state.observations.push(observation);
            state.hypotheses = foldObservation(state.hypotheses, observation);
            void logThought(`[ReActAgent] Observe (${tool.name}): ${observation.detail}`);

            const dominant = state.hypotheses[0];
            if (dominant && dominant.confidence >= RESOLUTION_THRESHOLD) {
                state.isResolved = true;
            }
        }

        if (!state.isResolved) {
            const ruleResults = rules.evaluate(symptom, store, state.analysisWindow);
            const best = state.hypotheses[0];
            if (ruleResults.length > 0 && (!best || best.confidence < RULE_SUPERSEDE_THRESHOLD)) {
                void logThought(`[ReActAgent] Unresolved; ${ruleResults.length} rule result(s) supersede hypotheses.`);
                return { kind: 'rules', explanations: ruleResults, state };
            }
        }

        return { kind: 'hypotheses', state, allowModel: config.useLLM };
    }

    async #buildExplanations(
        state: AgentState,
        explained: readonly Hypothesis[],
        allowModel: boolean,
    ): Promise<CausalExplanation[]> {
        const { classifier, narratives } = this.#deps;
        const ranked = classifier.classify(state.hypotheses, state.observations);

        const explanations: CausalExplanation[] = [];
        for (const hypothesis of explained) {
            const score = ranked.find((debt) => debt.type === hypothesis.debtType)?.score ?? hypothesis.confidence;
            const narrative = await narratives.generate(state.symptom, hypothesis, state.observations, { allowModel });
            explanations.push(Object.freeze({
                symptom: state.symptom,
                causalChain: [...hypothesis.causalChain],
                strength: score,
                confidence: hypothesis.confidence,
                narrative,
            }));
        }
        return explanations;
    }
}
