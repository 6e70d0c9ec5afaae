/** Status of a registered scheduled job. */
export type JobStatus = 'idle' | 'running' | 'stopped' | 'error';

/** Configuration required to register a repeating maintenance job. */
export interface JobConfig {
    /** Unique identifier, e.g. 'edge-weight-learning'. */
    id: string;
    /** node-cron expression. */
    cronExpression: string;
    description: string;
    handler: () => Promise<void> | void;
    /**
     * Start the cron task on registration.
     * @default true
     */
    autoStart?: boolean;
}

/** Read-only view of a registered job, as served by `GET /health`. */
export interface JobSnapshot {
    id: string;
    cronExpression: string;
    description: string;
    status: JobStatus;
    runCount: number;
    lastRunAt: Date | null;
    lastError: string | null;
}

/**
 * - 'job:start': just before a handler runs.
 * - 'job:done':  after a handler resolves.
 * - 'job:error': when a handler throws.
 */
export type SchedulerEventType = 'job:start' | 'job:done' | 'job:error';

export interface SchedulerEvent {
    type: SchedulerEventType;
    jobId: string;
    timestamp: Date;
    error?: string;
}

export type SchedulerEventListener = (event: SchedulerEvent) => void;
