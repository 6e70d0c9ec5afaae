/**
 * Registry of the configuration keys the causal engine reads.
 *
 * Each entry declares:
 *   - `key`         The env variable / flat config key.
 *   - `type`        Whether the value is a sensitive secret or a plain setting.
 *   - `class`       'required' | 'optional'.
 *   - `scope`       Subsystem that owns the key.
 *   - `format`      Expected shape, checked by `validateConfiguration`.
 *   - `description` Human-readable purpose.
 *   - `remediation` Actionable hint when the key is missing or invalid.
 */

export type ConfigKeyClass = 'required' | 'optional';

export type ConfigKeyType = 'secret' | 'env';

export type ConfigKeyScope = 'runtime' | 'reasoning' | 'learning' | 'narrative';

export type ConfigKeyFormat = 'text' | 'port' | 'positive_number' | 'cron';

export interface ConfigKeySpec {
    key: string;
    type: ConfigKeyType;
    class: ConfigKeyClass;
    scope: ConfigKeyScope;
    format: ConfigKeyFormat;
    description: string;
    remediation: string;
}

export const CONFIG_SCHEMA: readonly ConfigKeySpec[] = [
    // ── Runtime ─────────────────────────────────────────────────────────────────
    {
        key: 'API_SECRET',
        type: 'secret',
        class: 'optional',
        scope: 'runtime',
        format: 'text',
        description: 'HMAC secret for signed maintenance endpoints such as POST /causal/update-graph.',
        remediation: 'Set API_SECRET (or runtime.apiSecret in causal-engine.json) to enable signed endpoints.',
    },
    {
        key: 'API_PORT',
        type: 'env',
        class: 'optional',
        scope: 'runtime',
        format: 'port',
        description: 'Port for the HTTP control plane. Defaults to 3100.',
        remediation: 'Use an integer between 1 and 65535.',
    },
    {
        key: 'DATABASE_PATH',
        type: 'env',
        class: 'required',
        scope: 'runtime',
        format: 'text',
        description: 'SQLite file holding the health graph.',
        remediation: 'Set runtime.databasePath in causal-engine.json or DATABASE_PATH.',
    },
    {
        key: 'LOG_DIR',
        type: 'env',
        class: 'optional',
        scope: 'runtime',
        format: 'text',
        description: 'Directory for daily reasoning logs.',
        remediation: 'Point LOG_DIR at a writable directory.',
    },

    // ── Reasoning ───────────────────────────────────────────────────────────────
    {
        key: 'ANALYSIS_WINDOW_HOURS',
        type: 'env',
        class: 'optional',
        scope: 'reasoning',
        format: 'positive_number',
        description: 'Length of the analysis window used by each reasoning session.',
        remediation: 'Use a positive number of hours, e.g. 6.',
    },

    // ── Learning ────────────────────────────────────────────────────────────────
    {
        key: 'EDGE_UPDATE_CRON',
        type: 'env',
        class: 'optional',
        scope: 'learning',
        format: 'cron',
        description: 'Schedule for the meal→glucose edge learning job.',
        remediation: "Use a node-cron expression such as '0 * * * *'.",
    },
    {
        key: 'BATCH_WINDOW_HOURS',
        type: 'env',
        class: 'optional',
        scope: 'learning',
        format: 'positive_number',
        description: 'How far back each edge learning run scans for meals.',
        remediation: 'Use a positive number of hours, e.g. 24.',
    },

    // ── Narrative ───────────────────────────────────────────────────────────────
    {
        key: 'GROQ_API_KEY',
        type: 'secret',
        class: 'optional',
        scope: 'narrative',
        format: 'text',
        description: 'Enables model-written narratives through Groq. Templates are used without it.',
        remediation: 'Set GROQ_API_KEY to enable model-written narratives.',
    },
    {
        key: 'NARRATIVE_MODEL',
        type: 'env',
        class: 'optional',
        scope: 'narrative',
        format: 'text',
        description: 'Groq chat model used for narratives.',
        remediation: "Use a Groq model ID such as 'llama-3.1-8b-instant'.",
    },
    {
        key: 'NARRATIVE_MAX_TOKENS',
        type: 'env',
        class: 'optional',
        scope: 'narrative',
        format: 'positive_number',
        description: 'Token cap for one narrative.',
        remediation: 'Use a positive integer, e.g. 120.',
    },
];

/** Keys whose raw values must never reach logs or API responses. */
export const SENSITIVE_CONFIG_KEYS: readonly string[] = CONFIG_SCHEMA
    .filter((spec) => spec.type === 'secret')
    .map((spec) => spec.key);
