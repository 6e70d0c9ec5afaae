import type { DebtType, ToolObservation } from './causal.js';

/** How a session ended. `safety` is the low-HRV stop. */
export type TraceStage = 'safety' | 'rules' | 'inference';

export const TRACE_STAGES: readonly TraceStage[] = ['safety', 'rules', 'inference'];

export interface HypothesisSummary {
    debtType: DebtType;
    description: string;
    confidence: number;
}

/** Audit record of one reasoning session. */
export interface ReasoningTrace {
    id?: number;
    symptom: string;
    stage: TraceStage;
    /** Hypotheses as they stood when the session ended. */
    hypotheses: HypothesisSummary[];
    observations: ToolObservation[];
    /** Category of the top narrated hypothesis. Absent for safety and rule outcomes. */
    conclusion?: DebtType;
    /** Confidence of the top explanation. */
    confidence?: number;
    durationMs: number;
    causalChain: string[];
    narrative?: string;
    createdAt: Date;
}

export interface TraceQuery {
    symptom?: string;
    limit: number;
}

export interface ReasoningTraceStore {
    /** Insert a trace. Returns it with its assigned ID. */
    addReasoningTrace(trace: ReasoningTrace): ReasoningTrace;
    /** Newest first, optionally for one symptom. */
    listReasoningTraces(query: TraceQuery): ReasoningTrace[];
    getReasoningTrace(id: number): ReasoningTrace | undefined;
}
