import type { Request, Response } from 'express';
import type {
    CounterfactualData,
    DebtScoreData,
    PathsData,
    SymptomQueryData,
    TraceData,
    TraceListData,
    UpdateGraphData,
} from '../../types/api.js';
import type { CausalExplanation } from '../../types/causal.js';
import { RequestValidationError } from '../../types/errors.js';
import { NODE_CATEGORIES, oneOf } from '../../types/health-graph.js';
import type { CausalityEngine } from '../../services/causality-engine.js';
import { logThought } from '../../utils/logger.js';
import { sendError, sendMappedError, sendOk } from '../shared.js';

export interface CausalDeps {
    engine: CausalityEngine;
}

const MAX_SYMPTOM_LENGTH = 500;
const DEFAULT_DEBT_HOURS = 6;
const DEFAULT_TRACE_LIMIT = 50;
const MAX_TRACE_LIMIT = 200;

// ── Body parsing ────────────────────────────────────────────────────────────

function field(body: unknown, key: string): unknown {
    return typeof body === 'object' && body !== null ? Reflect.get(body, key) : undefined;
}

export function parseSymptom(body: unknown): string {
    const symptom = field(body, 'symptom');
    if (typeof symptom !== 'string' || symptom.trim() === '') {
        throw new RequestValidationError("Field 'symptom' must be a non-empty string.");
    }
    if (symptom.length > MAX_SYMPTOM_LENGTH) {
        throw new RequestValidationError(`Field 'symptom' exceeds ${MAX_SYMPTOM_LENGTH} characters.`);
    }
    return symptom.trim();
}

function parseExplanation(entry: unknown, index: number): CausalExplanation {
    const symptom = field(entry, 'symptom');
    const causalChain = field(entry, 'causalChain');
    const strength = field(entry, 'strength');
    const confidence = field(entry, 'confidence');
    const narrative = field(entry, 'narrative');

    if (
        typeof symptom !== 'string'
        || !Array.isArray(causalChain)
        || typeof strength !== 'number'
        || typeof confidence !== 'number'
        || typeof narrative !== 'string'
    ) {
        throw new RequestValidationError(`Explanation at index ${index} is malformed.`);
    }

    const links: string[] = [];
    for (const link of causalChain) {
        if (typeof link !== 'string') {
            throw new RequestValidationError(`Explanation at index ${index} has a non-string chain link.`);
        }
        links.push(link);
    }
    return { symptom, causalChain: links, strength, confidence, narrative };
}

export function parseExplanations(body: unknown): CausalExplanation[] {
    const explanations = field(body, 'explanations');
    if (explanations === undefined) return [];
    if (!Array.isArray(explanations)) {
        throw new RequestValidationError("Field 'explanations' must be an array.");
    }
    return explanations.map((entry: unknown, index) => parseExplanation(entry, index));
}

function parseHours(raw: unknown): number {
    if (raw === undefined) return DEFAULT_DEBT_HOURS;
    const hours = typeof raw === 'string' ? Number(raw) : Number.NaN;
    if (!Number.isFinite(hours) || hours <= 0) {
        throw new RequestValidationError("Query 'hours' must be a positive number.");
    }
    return hours;
}

function parseTraceLimit(raw: unknown): number {
    if (raw === undefined) return DEFAULT_TRACE_LIMIT;
    const limit = typeof raw === 'string' ? Number(raw) : Number.NaN;
    if (!Number.isInteger(limit) || limit < 1 || limit > MAX_TRACE_LIMIT) {
        throw new RequestValidationError(`Query 'limit' must be an integer from 1 to ${MAX_TRACE_LIMIT}.`);
    }
    return limit;
}

function parseTraceSymptom(raw: unknown): string | undefined {
    if (raw === undefined) return undefined;
    if (typeof raw !== 'string' || raw.trim() === '') {
        throw new RequestValidationError("Query 'symptom' must be a non-empty string.");
    }
    return raw.trim();
}

// ── Handlers ────────────────────────────────────────────────────────────────

/** POST /causal/query: `{ symptom }` → ranked explanations. */
export function handleSymptomQuery(deps: CausalDeps) {
    return async (req: Request, res: Response): Promise<void> => {
        try {
            const symptom = parseSymptom(req.body);
            const explanations = await deps.engine.querySymptom(symptom);
            const data: SymptomQueryData = { symptom, explanations };
            sendOk(res, data);
        } catch (error) {
            sendMappedError(res, error);
        }
    };
}

/** POST /causal/counterfactuals: `{ symptom, explanations }` → interventions. */
export function handleSymptomCounterfactuals(deps: CausalDeps) {
    return (req: Request, res: Response): void => {
        try {
            const symptom = parseSymptom(req.body);
            const explanations = parseExplanations(req.body);
            const data: CounterfactualData = {
                counterfactuals: deps.engine.generateCounterfactualForSymptom(symptom, explanations),
            };
            sendOk(res, data);
        } catch (error) {
            sendMappedError(res, error);
        }
    };
}

/** GET /causal/counterfactuals/:nodeId */
export function handleNodeCounterfactuals(deps: CausalDeps) {
    return (req: Request, res: Response): void => {
        const data: CounterfactualData = {
            counterfactuals: deps.engine.generateCounterfactual(req.params.nodeId ?? ''),
        };
        sendOk(res, data);
    };
}

/** GET /causal/paths/:category: ranked category paths to the symptom node. */
export function handleCausalPaths(deps: CausalDeps) {
    return (req: Request, res: Response): void => {
        try {
            const category = oneOf(req.params.category, NODE_CATEGORIES);
            if (!category) {
                throw new RequestValidationError(
                    `Unknown category '${req.params.category ?? ''}'. Expected one of: ${NODE_CATEGORIES.join(', ')}.`,
                );
            }
            const data: PathsData = deps.engine.explainPaths(category);
            sendOk(res, data);
        } catch (error) {
            sendMappedError(res, error);
        }
    };
}

/** GET /causal/debt-score?hours=6 */
export function handleDebtScore(deps: CausalDeps) {
    return (req: Request, res: Response): void => {
        try {
            const hours = parseHours(req.query.hours);
            const data: DebtScoreData = { hours, score: deps.engine.digestiveDebtScore(hours) };
            sendOk(res, data);
        } catch (error) {
            sendMappedError(res, error);
        }
    };
}

/** POST /causal/update-graph: signed; runs one edge learning pass. */
export function handleUpdateGraph(deps: CausalDeps) {
    return (_req: Request, res: Response): void => {
        try {
            const data: UpdateGraphData = deps.engine.updateGraph();
            void logThought(`[API] Manual edge learning run: ${data.mealsScanned} meal(s) scanned.`);
            sendOk(res, data);
        } catch (error) {
            sendMappedError(res, error);
        }
    };
}

/** GET /causal/traces?symptom=&limit=50: stored reasoning traces, newest first. */
export function handleListTraces(deps: CausalDeps) {
    return (req: Request, res: Response): void => {
        try {
            const data: TraceListData = {
                traces: deps.engine.listTraces({
                    symptom: parseTraceSymptom(req.query.symptom),
                    limit: parseTraceLimit(req.query.limit),
                }),
            };
            sendOk(res, data);
        } catch (error) {
            sendMappedError(res, error);
        }
    };
}

/** GET /causal/traces/:id */
export function handleGetTrace(deps: CausalDeps) {
    return (req: Request, res: Response): void => {
        try {
            const id = Number(req.params.id);
            if (!Number.isInteger(id) || id < 1) {
                throw new RequestValidationError('Trace ID must be a positive integer.');
            }
            const trace = deps.engine.getTrace(id);
            if (!trace) {
                sendError(res, 'Trace not found.', 404);
                return;
            }
            const data: TraceData = trace;
            sendOk(res, data);
        } catch (error) {
            sendMappedError(res, error);
        }
    };
}
