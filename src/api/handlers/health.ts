import type { Request, Response } from 'express';
import type { HealthData } from '../../types/api.js';
import type { MaturityPhase } from '../../types/causal.js';
import type { JobSnapshot } from '../../types/scheduler.js';
import { validateConfiguration } from '../../config/env-validator.js';
import { sendMappedError, sendOk } from '../shared.js';

const startTime = Date.now();

export interface HealthDeps {
    engine: { maturityPhase(): MaturityPhase };
    scheduler?: { listJobs(): JobSnapshot[] };
}

/** GET /health: Maturity phase, job snapshots and config validation. */
export function handleHealth(deps: HealthDeps) {
    return (_req: Request, res: Response): void => {
        try {
            const validation = validateConfiguration();
            const jobs = deps.scheduler?.listJobs() ?? [];

            const data: HealthData = {
                status: !validation.ok || jobs.some((job) => job.status === 'error') ? 'degraded' : 'ok',
                uptimeSec: Math.floor((Date.now() - startTime) / 1000),
                memoryUsageMb: Math.round(process.memoryUsage().rss / 1024 / 1024),
                maturityPhase: deps.engine.maturityPhase(),
                jobs,
                config: {
                    ok: validation.ok,
                    issues: validation.issues,
                    validatedAt: validation.validatedAt,
                },
            };

            sendOk(res, data);
        } catch (error) {
            sendMappedError(res, error);
        }
    };
}

/** GET /health/live: Process liveness only. */
export function handleLiveness() {
    return (_req: Request, res: Response): void => {
        sendOk(res, { status: 'alive', uptimeSec: Math.floor((Date.now() - startTime) / 1000) });
    };
}
