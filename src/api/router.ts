import { createServer, type Server } from 'node:http';
import express, { type ErrorRequestHandler, type Express } from 'express';
import { handleHealth, handleLiveness, type HealthDeps } from './handlers/health.js';
import {
    handleCausalPaths,
    handleDebtScore,
    handleGetTrace,
    handleListTraces,
    handleNodeCounterfactuals,
    handleSymptomCounterfactuals,
    handleSymptomQuery,
    handleUpdateGraph,
    type CausalDeps,
} from './handlers/causal.js';
import { requestLogger, requireSignature, sendError, sendMappedError, setRawRequestBody } from './shared.js';
import type { CausalityEngine } from '../services/causality-engine.js';
import type { JobScheduler } from '../services/job-scheduler.js';
import { getNumericConfigValue } from '../config/config-loader.js';
import { logThought } from '../utils/logger.js';

export interface ApiServerDeps {
    engine: CausalityEngine;
    scheduler?: JobScheduler;
}

const DEFAULT_PORT = 3100;

/** Keeps body-parser failures inside the JSON envelope. */
const handleUncaught: ErrorRequestHandler = (err: unknown, _req, res, _next) => {
    if (err instanceof SyntaxError) {
        sendError(res, 'Malformed JSON body.', 400);
        return;
    }
    sendMappedError(res, err);
};

/**
 * Build the control plane express app without binding a port.
 *
 * Endpoints:
 *   GET  /health                          Maturity phase, jobs, config validation
 *   GET  /health/live                     Liveness probe
 *   POST /causal/query                    Explain a symptom
 *   POST /causal/counterfactuals          Interventions for a symptom's explanations
 *   GET  /causal/counterfactuals/:nodeId  Interventions for one event node
 *   GET  /causal/paths/:category          Ranked causal paths to the symptom node
 *   GET  /causal/debt-score               Digestive debt score (`?hours=6`)
 *   GET  /causal/traces                   Reasoning traces, newest first (`?symptom=&limit=50`)
 *   GET  /causal/traces/:id               One reasoning trace
 *   POST /causal/update-graph             Run edge learning now (signed)
 */
export function createApiApp(deps: ApiServerDeps): Express {
    const app = express();

    // ── Global Middleware ───────────────────────────────────────────────────────
    app.use(express.json({ verify: setRawRequestBody }));
    app.use(requestLogger);

    const healthDeps: HealthDeps = { engine: deps.engine, scheduler: deps.scheduler };
    const causalDeps: CausalDeps = { engine: deps.engine };

    // ── Routes ──────────────────────────────────────────────────────────────────
    app.get('/health', handleHealth(healthDeps));
    app.get('/health/live', handleLiveness());

    app.post('/causal/query', handleSymptomQuery(causalDeps));
    app.post('/causal/counterfactuals', handleSymptomCounterfactuals(causalDeps));
    app.get('/causal/counterfactuals/:nodeId', handleNodeCounterfactuals(causalDeps));
    app.get('/causal/paths/:category', handleCausalPaths(causalDeps));
    app.get('/causal/debt-score', handleDebtScore(causalDeps));
    app.get('/causal/traces', handleListTraces(causalDeps));
    app.get('/causal/traces/:id', handleGetTrace(causalDeps));

    // Protected endpoints
    app.post('/causal/update-graph', requireSignature, handleUpdateGraph(causalDeps));

    // ── Catch-all 404 ──────────────────────────────────────────────────────────
    app.use((_req, res) => {
        sendError(res, 'Not found.', 404);
    });
    app.use(handleUncaught);

    return app;
}

/** Create the app and start listening on `API_PORT` (default 3100). */
export function startApiServer(deps: ApiServerDeps): Server {
    const port = getNumericConfigValue('API_PORT', DEFAULT_PORT);
    const server = createServer(createApiApp(deps));

    server.listen(port, () => {
        console.log(`[CausalEngine API] Control plane listening on http://localhost:${port}`);
        void logThought(`[API] HTTP server started on port ${port}.`);
    });
    return server;
}
