// ── Doctor Types ─────────────────────────────────────────────────────────────

/**
 * - `ok`       Check passed.
 * - `warning`  The engine runs with reduced capability (e.g. template narratives only).
 * - `critical` The engine cannot answer queries.
 */
export type HealthCheckSeverity = 'ok' | 'warning' | 'critical';

export type ReadinessLevel = 'ready' | 'degraded' | 'not_ready';

export interface HealthCheckResult {
    /** Stable machine-readable identifier (e.g. `health_graph`). */
    id: string;
    name: string;
    severity: HealthCheckSeverity;
    message: string;
    /** Present when severity is not `ok`. */
    remediation?: string;
}

export interface ReadinessSummary {
    level: ReadinessLevel;
    totalChecks: number;
    passed: number;
    warnings: number;
    critical: number;
    evaluatedAt: string;
}

export interface DoctorReport {
    readiness: ReadinessSummary;
    checks: HealthCheckResult[];
}
