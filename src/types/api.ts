import type { RankedPath } from '../causal/causal-dag.js';
import type { BatchUpdateSummary } from '../causal/edge-weight-learner.js';
import type { ConfigValidationResult } from '../config/env-validator.js';
import type { CausalExplanation, Counterfactual, MaturityPhase } from './causal.js';
import type { NodeCategory } from './health-graph.js';
import type { ReasoningTrace } from './reasoning-trace.js';
import type { JobSnapshot } from './scheduler.js';

export interface ApiEnvelope<T = unknown> {
    ok: boolean;
    data?: T;
    error?: string;
    correlationId?: string;
    timestamp: string;
}

// ── Health ──────────────────────────────────────────────────────────────────

export interface HealthData {
    status: 'ok' | 'degraded';
    uptimeSec: number;
    memoryUsageMb: number;
    maturityPhase: MaturityPhase;
    jobs: JobSnapshot[];
    config: Pick<ConfigValidationResult, 'ok' | 'issues' | 'validatedAt'>;
}

// ── Causal queries ──────────────────────────────────────────────────────────

export interface SymptomQueryRequest {
    symptom: string;
}

export interface SymptomQueryData {
    symptom: string;
    explanations: CausalExplanation[];
}

export interface SymptomCounterfactualRequest {
    symptom: string;
    explanations: CausalExplanation[];
}

export interface CounterfactualData {
    counterfactuals: Counterfactual[];
}

export interface PathsData {
    from: NodeCategory;
    paths: RankedPath[];
    droppedEdgeCount: number;
}

export interface DebtScoreData {
    hours: number;
    score: number;
}

export type UpdateGraphData = BatchUpdateSummary;

// ── Reasoning traces ────────────────────────────────────────────────────────

export interface TraceListData {
    traces: ReasoningTrace[];
}

export type TraceData = ReasoningTrace;
