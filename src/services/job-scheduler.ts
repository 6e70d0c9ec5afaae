import cron, { ScheduledTask } from 'node-cron';
import { logThought } from '../utils/logger.js';
import type {
    JobConfig,
    JobSnapshot,
    JobStatus,
    SchedulerEvent,
    SchedulerEventListener,
    SchedulerEventType,
} from '../types/scheduler.js';

interface RegisteredJob {
    config: JobConfig;
    task: ScheduledTask | null;
    status: JobStatus;
    runCount: number;
    lastRunAt: Date | null;
    lastError: string | null;
}

/**
 * Runs the engine's periodic maintenance (edge-weight learning) on cron
 * schedules through `node-cron`.
 *
 * A failing handler marks its job as `error` and emits `job:error`; other
 * jobs and later ticks are unaffected.
 *
 * Usage:
 * ```ts
 * const scheduler = new JobScheduler();
 * scheduler.register({
 *   id: 'edge-weight-learning',
 *   cronExpression: '0 * * * *',
 *   description: 'Confirm or disconfirm meal → glucose edges',
 *   handler: () => { engine.updateGraph(); },
 * });
 * ```
 */
export class JobScheduler {
    readonly #jobs: Map<string, RegisteredJob> = new Map();
    readonly #listeners: Map<SchedulerEventType, Set<SchedulerEventListener>> = new Map();

    /** Throws on a duplicate ID or an invalid cron expression. */
    register(config: JobConfig): void {
        if (this.#jobs.has(config.id)) {
            throw new Error(`[JobScheduler] Job '${config.id}' is already registered.`);
        }
        if (!cron.validate(config.cronExpression)) {
            throw new Error(
                `[JobScheduler] Invalid cron expression for job '${config.id}': ${config.cronExpression}`,
            );
        }

        const entry: RegisteredJob = {
            config,
            task: null,
            status: 'idle',
            runCount: 0,
            lastRunAt: null,
            lastError: null,
        };
        this.#jobs.set(config.id, entry);

        if (config.autoStart ?? true) {
            this.#startJob(entry);
        }
        void logThought(`[JobScheduler] Registered job '${config.id}' (${config.cronExpression}).`);
    }

    unregister(jobId: string): boolean {
        const entry = this.#jobs.get(jobId);
        if (!entry) return false;

        entry.task?.stop();
        this.#jobs.delete(jobId);
        return true;
    }

    /** Run a job's handler immediately, outside its schedule. */
    async runNow(jobId: string): Promise<JobSnapshot> {
        const entry = this.#require(jobId);
        await this.#executeJob(entry);
        return this.#snapshot(entry);
    }

    start(jobId: string): void {
        this.#startJob(this.#require(jobId));
    }

    stop(jobId: string): void {
        this.#stopJob(this.#require(jobId));
    }

    stopAll(): void {
        for (const entry of this.#jobs.values()) {
            this.#stopJob(entry);
        }
    }

    listJobs(): JobSnapshot[] {
        return [...this.#jobs.values()].map((entry) => this.#snapshot(entry));
    }

    getJob(jobId: string): JobSnapshot | undefined {
        const entry = this.#jobs.get(jobId);
        return entry ? this.#snapshot(entry) : undefined;
    }

    /** Subscribe to scheduler events. Returns an unsubscribe function. */
    on(eventType: SchedulerEventType, listener: SchedulerEventListener): () => void {
        let set = this.#listeners.get(eventType);
        if (!set) {
            set = new Set();
            this.#listeners.set(eventType, set);
        }
        set.add(listener);

        return () => {
            set?.delete(listener);
        };
    }

    // ── Private Helpers ────────────────────────────────────────────────────────

    #require(jobId: string): RegisteredJob {
        const entry = this.#jobs.get(jobId);
        if (!entry) {
            throw new Error(`[JobScheduler] Job '${jobId}' is not registered.`);
        }
        return entry;
    }

    #snapshot(entry: RegisteredJob): JobSnapshot {
        return {
            id: entry.config.id,
            cronExpression: entry.config.cronExpression,
            description: entry.config.description,
            status: entry.status,
            runCount: entry.runCount,
            lastRunAt: entry.lastRunAt,
            lastError: entry.lastError,
        };
    }

    #startJob(entry: RegisteredJob): void {
        if (entry.task) return;

        entry.task = cron.schedule(entry.config.cronExpression, async () => {
            await this.#executeJob(entry);
        });
        entry.status = 'idle';
    }

    #stopJob(entry: RegisteredJob): void {
        if (!entry.task) return;
        entry.task.stop();
        entry.task = null;
        entry.status = 'stopped';
    }

    async #executeJob(entry: RegisteredJob): Promise<void> {
        const { config } = entry;
        const resumeStatus: JobStatus = entry.task ? 'idle' : 'stopped';
        entry.status = 'running';
        entry.runCount += 1;
        entry.lastRunAt = new Date();

        this.#emit({ type: 'job:start', jobId: config.id, timestamp: new Date() });

        try {
            await logThought(`[JobScheduler] Executing job '${config.id}'.`);
            await config.handler();
            entry.status = resumeStatus;
            entry.lastError = null;

            this.#emit({ type: 'job:done', jobId: config.id, timestamp: new Date() });
        } catch (err: unknown) {
            const message = err instanceof Error ? err.message : String(err);
            entry.status = 'error';
            entry.lastError = message;

            console.error(`[JobScheduler] Job '${config.id}' failed:`, message);
            await logThought(`[JobScheduler] Job '${config.id}' failed: ${message}`);

            this.#emit({ type: 'job:error', jobId: config.id, timestamp: new Date(), error: message });
        }
    }

    #emit(event: SchedulerEvent): void {
        const listeners = this.#listeners.get(event.type);
        if (!listeners) return;

        for (const listener of listeners) {
            try {
                listener(event);
            } catch (listenerErr) {
                console.error('[JobScheduler] Event listener threw an error:', listenerErr);
            }
        }
    }
}
