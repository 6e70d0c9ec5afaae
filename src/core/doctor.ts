import type { DoctorReport, HealthCheckResult, ReadinessLevel, ReadinessSummary } from '../types/health-doctor.js';
import type { JobSnapshot } from '../types/scheduler.js';
import type { MaturityPhase } from '../types/causal.js';
import { validateConfiguration } from '../config/env-validator.js';
import { getConfigValue } from '../config/config-loader.js';

export interface DoctorDeps {
    /** Runs a trivial query against the health graph store. Throws when unreachable. */
    probeStore?: () => void;
    maturityPhase?: () => MaturityPhase;
    listJobs?: () => JobSnapshot[];
}

/**
 * Runtime diagnostics for the causal engine.
 *
 * Checks the health graph store, configuration, narrative model credentials,
 * the maturity phase and scheduled jobs. No secret values are emitted.
 */
export class DoctorService {
    readonly #deps: DoctorDeps;

    constructor(deps: DoctorDeps = {}) {
        this.#deps = deps;
    }

    runAll(): DoctorReport {
        const { probeStore, maturityPhase, listJobs } = this.#deps;
        const checks = [
            probeStore ? checkStore(probeStore) : null,
            checkConfiguration(),
            checkNarrativeModel(),
            maturityPhase ? checkMaturity(maturityPhase) : null,
            listJobs ? checkJobs(listJobs()) : null,
        ].filter((result): result is HealthCheckResult => result !== null);

        return buildReport(checks);
    }
}

// ── Individual Checks ────────────────────────────────────────────────────────

function checkStore(probe: () => void): HealthCheckResult {
    try {
        probe();
        return {
            id: 'health_graph',
            name: 'Health Graph Store',
            severity: 'ok',
            message: 'SQLite health graph is reachable.',
        };
    } catch (err) {
        return {
            id: 'health_graph',
            name: 'Health Graph Store',
            severity: 'critical',
            message: `Health graph query failed: ${safeError(err)}`,
            remediation: 'Check DATABASE_PATH points at a writable location and no other process holds an exclusive lock.',
        };
    }
}

function checkConfiguration(): HealthCheckResult {
    const validation = validateConfiguration();
    const missing = validation.issues.filter((issue) => issue.class === 'missing_required');
    const invalid = validation.issues.filter((issue) => issue.class === 'format_error');

    if (missing.length > 0) {
        return {
            id: 'configuration',
            name: 'Configuration',
            severity: 'critical',
            message: `Missing required key(s): ${missing.map((issue) => issue.key).join(', ')}.`,
            remediation: missing.map((issue) => issue.remediation).join(' '),
        };
    }

    if (invalid.length > 0) {
        return {
            id: 'configuration',
            name: 'Configuration',
            severity: 'warning',
            message: invalid.map((issue) => issue.message).join(' '),
            remediation: invalid.map((issue) => issue.remediation).join(' '),
        };
    }

    return {
        id: 'configuration',
        name: 'Configuration',
        severity: 'ok',
        message: `${validation.presentKeys.length} configuration key(s) valid.`,
    };
}

function checkNarrativeModel(): HealthCheckResult {
    if (!getConfigValue('GROQ_API_KEY')) {
        return {
            id: 'narrative_model',
            name: 'Narrative Model',
            severity: 'warning',
            message: 'GROQ_API_KEY not set; narratives fall back to templates.',
            remediation: 'Set GROQ_API_KEY to enable model-written narratives in the active phase.',
        };
    }
    return {
        id: 'narrative_model',
        name: 'Narrative Model',
        severity: 'ok',
        message: `Narratives may use ${getConfigValue('NARRATIVE_MODEL') ?? 'the default model'}.`,
    };
}

function checkMaturity(maturityPhase: () => MaturityPhase): HealthCheckResult {
    try {
        const phase = maturityPhase();
        return {
            id: 'maturity_phase',
            name: 'Maturity Phase',
            severity: 'ok',
            message: phase === 'passive'
                ? 'Phase: passive. Too few learned meal edges; answers come from rules only.'
                : `Phase: ${phase}.`,
        };
    } catch (err) {
        return {
            id: 'maturity_phase',
            name: 'Maturity Phase',
            severity: 'critical',
            message: `Maturity phase unavailable: ${safeError(err)}`,
            remediation: 'Resolve the health graph store failure first.',
        };
    }
}

function checkJobs(jobs: JobSnapshot[]): HealthCheckResult {
    const failing = jobs.filter((job) => job.status === 'error');
    if (failing.length > 0) {
        return {
            id: 'scheduled_jobs',
            name: 'Scheduled Jobs',
            severity: 'warning',
            message: `Failing job(s): ${failing.map((job) => `${job.id} (${job.lastError ?? 'unknown error'})`).join(', ')}.`,
            remediation: 'Inspect the daily log for the failing run and re-run it with `update-graph`.',
        };
    }
    return {
        id: 'scheduled_jobs',
        name: 'Scheduled Jobs',
        severity: 'ok',
        message: `${jobs.length} job(s) registered.`,
    };
}

// ── Report Assembly ─────────────────────────────────────────────────────────

export function buildReport(checks: HealthCheckResult[], now: Date = new Date()): DoctorReport {
    const critical = checks.filter((c) => c.severity === 'critical').length;
    const warnings = checks.filter((c) => c.severity === 'warning').length;
    const passed = checks.filter((c) => c.severity === 'ok').length;

    let level: ReadinessLevel;
    if (critical > 0) {
        level = 'not_ready';
    } else if (warnings > 0) {
        level = 'degraded';
    } else {
        level = 'ready';
    }

    const readiness: ReadinessSummary = {
        level,
        totalChecks: checks.length,
        passed,
        warnings,
        critical,
        evaluatedAt: now.toISOString(),
    };

    return { readiness, checks };
}

const SEVERITY_ICONS: Record<HealthCheckResult['severity'], string> = {
    ok: '✓',
    warning: '⚠',
    critical: '✗',
};

/** Human-readable report, or pretty JSON when `asJson` is set. */
export function formatDoctorReport(report: DoctorReport, asJson = false): string {
    if (asJson) return JSON.stringify(report, null, 2);

    const lines = ['Causal Engine Doctor', '══════════════════════════════════════'];
    for (const check of report.checks) {
        lines.push(`  ${SEVERITY_ICONS[check.severity]} [${check.severity.toUpperCase().padEnd(8)}] ${check.name}: ${check.message}`);
        if (check.remediation && check.severity !== 'ok') {
            lines.push(`          → ${check.remediation}`);
        }
    }
    const { readiness } = report;
    lines.push('──────────────────────────────────────');
    lines.push(
        `Readiness: ${readiness.level.toUpperCase()}  ` +
            `(${readiness.passed} ok, ${readiness.warnings} warning, ${readiness.critical} critical)`,
    );
    return lines.join('\n');
}

// ── Utilities ────────────────────────────────────────────────────────────────

function safeError(err: unknown): string {
    const text = err instanceof Error ? err.message : String(err);
    return text.split('\n')[0] ?? 'unknown error';
}
