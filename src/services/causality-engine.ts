import { CausalDAG } from '../causal/causal-dag.js';
import type { RankedPath } from '../causal/causal-dag.js';
import { DebtClassifier } from '../causal/debt-classifier.js';
import { EdgeWeightLearner } from '../causal/edge-weight-learner.js';
import type { BatchUpdateSummary } from '../causal/edge-weight-learner.js';
import { InterventionCalculator } from '../causal/intervention-calculator.js';
import { EngineMaturityTracker } from '../causal/maturity-tracker.js';
import { MetabolicDebtScorer } from '../causal/metabolic-debt-scorer.js';
import { NarrativeGenerator } from '../causal/narrative-generator.js';
import type { NarrativeModel } from '../causal/narrative-generator.js';
import { ReActAgent } from '../causal/react-agent.js';
import { BioRuleEngine } from '../causal/rules/bio-rule-engine.js';
import { ToolRegistry } from '../causal/tools/tool-registry.js';
import type {
    CausalExplanation,
    Counterfactual,
    HypothesisClassifier,
    MaturityPhase,
    NarrativeSource,
    RuleEvaluator,
    ToolSelector,
} from '../types/causal.js';
import type { HealthGraphStore, NodeCategory } from '../types/health-graph.js';
import type { ReasoningTrace, ReasoningTraceStore, TraceQuery } from '../types/reasoning-trace.js';
import { logThought } from '../utils/logger.js';
import { windowEndingAt } from '../utils/math.js';

export interface CausalityEngineOptions {
    /** Analysis window for symptom queries. Defaults to 6 hours. */
    analysisWindowHours?: number;
    /** Look-back window for edge learning. Defaults to 24 hours. */
    batchWindowHours?: number;
    /** Optional language model for narratives. */
    narrativeModel?: NarrativeModel;
    narrativeMaxTokens?: number;
    tools?: ToolSelector;
    rules?: RuleEvaluator;
    classifier?: HypothesisClassifier;
    narratives?: NarrativeSource;
    /** Where each symptom query's reasoning trace is written. Traces are not kept without one. */
    traces?: ReasoningTraceStore;
    now?: () => Date;
}

export interface PathExplanation {
    from: NodeCategory;
    paths: RankedPath[];
    droppedEdgeCount: number;
}

const DEFAULT_BATCH_WINDOW_HOURS = 24;

/**
 * Entry point tying the reasoning core to a health graph store.
 *
 * Usage:
 * ```ts
 * const store = new SqliteHealthGraph(openHealthDatabase());
 * const engine = new CausalityEngine(store, { traces: store });
 * const explanations = await engine.querySymptom('Why am I tired?');
 * const fixes = engine.generateCounterfactualForSymptom('Why am I tired?', explanations);
 * ```
 */
export class CausalityEngine {
    readonly #store: HealthGraphStore;
    readonly #traces: ReasoningTraceStore | undefined;
    readonly #agent: ReActAgent;
    readonly #maturity: EngineMaturityTracker;
    readonly #interventions = new InterventionCalculator();
    readonly #learner = new EdgeWeightLearner();
    readonly #debtScorer: MetabolicDebtScorer;
    readonly #batchWindowHours: number;
    readonly #now: () => Date;

    constructor(store: HealthGraphStore, options: CausalityEngineOptions = {}) {
        this.#store = store;
        this.#traces = options.traces;
        this.#now = options.now ?? (() => new Date());
        this.#batchWindowHours = options.batchWindowHours ?? DEFAULT_BATCH_WINDOW_HOURS;
        this.#maturity = new EngineMaturityTracker(store, this.#now);
        this.#debtScorer = new MetabolicDebtScorer(this.#now);
        this.#agent = new ReActAgent(
            {
                store,
                tools: options.tools ?? new ToolRegistry(),
                classifier: options.classifier ?? new DebtClassifier(),
                rules: options.rules ?? new BioRuleEngine(undefined, this.#now),
                narratives: options.narratives
                    ?? new NarrativeGenerator(options.narrativeModel, { maxTokens: options.narrativeMaxTokens }),
                maturity: this.#maturity,
            },
            { windowHours: options.analysisWindowHours, now: this.#now },
        );
    }

    /**
     * Ranked causal explanations for a free-text symptom. Empty when nothing
     * clears the floor. The session's trace goes to the trace store, if any.
     */
    async querySymptom(symptom: string): Promise<CausalExplanation[]> {
        void logThought(`[CausalityEngine] Query: '${symptom}'`);
        const { explanations, trace } = await this.#agent.run(symptom);
        if (this.#traces) {
            const stored = this.#traces.addReasoningTrace(trace);
            void logThought(`[CausalityEngine] Trace ${stored.id ?? '?'} recorded (${trace.stage}, ${trace.durationMs}ms).`);
        }
        void logThought(`[CausalityEngine] ${explanations.length} explanation(s) for '${symptom}'.`);
        return explanations;
    }

    /** Stored reasoning traces, newest first. Empty without a trace store. */
    listTraces(query: TraceQuery): ReasoningTrace[] {
        return this.#traces?.listReasoningTraces(query) ?? [];
    }

    getTrace(id: number): ReasoningTrace | undefined {
        return this.#traces?.getReasoningTrace(id);
    }

    generateCounterfactual(eventNodeId: string): Counterfactual[] {
        return this.#interventions.generateCounterfactuals(eventNodeId);
    }

    generateCounterfactualForSymptom(symptom: string, explanations: readonly CausalExplanation[]): Counterfactual[] {
        return this.#interventions.generateCounterfactualsForSymptom(symptom, explanations);
    }

    /** Ranked category paths from `from` to the symptom category over every stored edge. */
    explainPaths(from: NodeCategory): PathExplanation {
        const dag = new CausalDAG(this.#store.listEdges());
        if (dag.droppedEdgeCount > 0) {
            void logThought(`[CausalityEngine] Dropped ${dag.droppedEdgeCount} edge(s) violating causal order.`);
        }
        return { from, paths: dag.rankPaths(from), droppedEdgeCount: dag.droppedEdgeCount };
    }

    /** Digestive debt on a 0–100 scale over the last `hours`. */
    digestiveDebtScore(hours = 6): number {
        return this.#debtScorer.score(this.#store, hours);
    }

    /** Run edge-weight learning over the last `windowHours`. */
    updateGraph(windowHours: number = this.#batchWindowHours): BatchUpdateSummary {
        return this.#learner.batchUpdate(this.#store, windowEndingAt(this.#now(), windowHours));
    }

    maturityPhase(): MaturityPhase {
        return this.#maturity.currentPhase();
    }
}
