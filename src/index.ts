import { runCli, type CliContext } from './core/cli.js';
import { getConfigValue, getNumericConfigValue } from './config/config-loader.js';
import { validateConfiguration } from './config/env-validator.js';
import { startApiServer } from './api/router.js';
import { openHealthDatabase, DEFAULT_DB_PATH, type HealthDatabase } from './services/db.js';
import { SqliteHealthGraph } from './services/health-graph.js';
import { CausalityEngine } from './services/causality-engine.js';
import { GroqNarrativeModel } from './services/narrative-model.js';
import { JobScheduler } from './services/job-scheduler.js';
import { logThought } from './utils/logger.js';

const EDGE_LEARNING_JOB_ID = 'edge-weight-learning';

function openContext(): CliContext & { db: HealthDatabase } {
    const db = openHealthDatabase(getConfigValue('DATABASE_PATH') ?? DEFAULT_DB_PATH);
    const store = new SqliteHealthGraph(db);
    const engine = new CausalityEngine(store, {
        analysisWindowHours: getNumericConfigValue('ANALYSIS_WINDOW_HOURS', 6),
        batchWindowHours: getNumericConfigValue('BATCH_WINDOW_HOURS', 24),
        narrativeModel: new GroqNarrativeModel(getConfigValue('GROQ_API_KEY') ?? '', getConfigValue('NARRATIVE_MODEL')),
        narrativeMaxTokens: getNumericConfigValue('NARRATIVE_MAX_TOKENS', 120),
        traces: store,
    });
    return { db, engine, probeStore: () => { store.listEdges(); } };
}

// ── Early one-shot CLI commands (bypass service startup) ─────────────────────

const argv = process.argv.slice(2);
if (await runCli(argv, openContext)) {
    process.exit(process.exitCode ?? 0);
}

// ── Startup validation ───────────────────────────────────────────────────────

const validation = validateConfiguration();
for (const issue of validation.issues) {
    console.warn(`[CausalEngine] Config ${issue.class}: ${issue.message} ${issue.remediation}`);
}
if (!validation.ok) {
    console.error('[CausalEngine] Startup blocked by missing required configuration.');
    process.exit(1);
}

const { db, engine } = openContext();
void logThought(`[CausalEngine] Process started in '${engine.maturityPhase()}' phase.`);

// ── Scheduled edge learning ──────────────────────────────────────────────────

const scheduler = new JobScheduler();
scheduler.register({
    id: EDGE_LEARNING_JOB_ID,
    cronExpression: getConfigValue('EDGE_UPDATE_CRON') ?? '0 * * * *',
    description: 'Confirm or disconfirm meal → glucose edges from post-meal glucose',
    handler: () => {
        engine.updateGraph();
    },
});

scheduler.on('job:error', (event) => {
    console.error(`[CausalEngine] Job '${event.jobId}' failed: ${event.error ?? 'unknown error'}`);
});

// ── Control Plane HTTP API ───────────────────────────────────────────────────

const server = startApiServer({ engine, scheduler });

// ── Signal Handlers ──────────────────────────────────────────────────────────

function shutdown(signal: NodeJS.Signals): void {
    scheduler.stopAll();
    server.close();
    db.close();
    void logThought(`[CausalEngine] Received ${signal}; services stopped.`);
    process.exit(0);
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
