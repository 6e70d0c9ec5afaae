import * as fs from 'fs/promises';
import { existsSync, readFileSync } from 'fs';
import * as path from 'path';

export interface EngineConfig {
    runtime: {
        apiSecret: string;
        apiPort: number;
        databasePath: string;
        logDir: string;
    };
    reasoning: {
        analysisWindowHours: number;
    };
    learning: {
        edgeUpdateCron: string;
        batchWindowHours: number;
    };
    narrative: {
        groqApiKey: string;
        model: string;
        maxTokens: number;
    };
}

export const DEFAULT_CONFIG: EngineConfig = {
    runtime: {
        apiSecret: '',
        apiPort: 3100,
        databasePath: 'memory/health-graph.db',
        logDir: 'memory/logs',
    },
    reasoning: {
        analysisWindowHours: 6,
    },
    learning: {
        edgeUpdateCron: '0 * * * *',
        batchWindowHours: 24,
    },
    narrative: {
        groqApiKey: '',
        model: 'llama-3.1-8b-instant',
        maxTokens: 120,
    },
};

const CONFIG_FILE_NAME = 'causal-engine.json';

export function getConfigPath(overridePath?: string): string {
    if (overridePath) return path.resolve(overridePath);
    if (process.env.CAUSAL_ENGINE_CONFIG_PATH) {
        return path.resolve(process.env.CAUSAL_ENGINE_CONFIG_PATH);
    }
    return path.resolve(CONFIG_FILE_NAME);
}

export async function readConfig(overridePath?: string): Promise<EngineConfig> {
    const targetPath = getConfigPath(overridePath);
    try {
        const rawData = await fs.readFile(targetPath, 'utf-8');
        return mergeWithDefaults(JSON.parse(rawData));
    } catch (error) {
        const fsError = error as NodeJS.ErrnoException;
        if (fsError.code === 'ENOENT') return mergeWithDefaults({});
        throw new Error(`Failed to parse config file at ${targetPath}: ${fsError.message}`);
    }
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readString(section: Record<string, unknown>, key: string, fallback: string): string {
    const value = section[key];
    return typeof value === 'string' ? value : fallback;
}

function readNumber(section: Record<string, unknown>, key: string, fallback: number): number {
    const value = section[key];
    return typeof value === 'number' && Number.isFinite(value) ? value : fallback;
}

function sectionOf(record: Record<string, unknown>, key: string): Record<string, unknown> {
    const value = record[key];
    return isRecord(value) ? value : {};
}

/** Overlay loaded JSON on the defaults, keeping only values of the right type. */
export function mergeWithDefaults(loaded: unknown): EngineConfig {
    const record = isRecord(loaded) ? loaded : {};
    const runtime = sectionOf(record, 'runtime');
    const reasoning = sectionOf(record, 'reasoning');
    const learning = sectionOf(record, 'learning');
    const narrative = sectionOf(record, 'narrative');
    const defaults = DEFAULT_CONFIG;

    return {
        runtime: {
            apiSecret: readString(runtime, 'apiSecret', defaults.runtime.apiSecret),
            apiPort: readNumber(runtime, 'apiPort', defaults.runtime.apiPort),
            databasePath: readString(runtime, 'databasePath', defaults.runtime.databasePath),
            logDir: readString(runtime, 'logDir', defaults.runtime.logDir),
        },
        reasoning: {
            analysisWindowHours: readNumber(reasoning, 'analysisWindowHours', defaults.reasoning.analysisWindowHours),
        },
        learning: {
            edgeUpdateCron: readString(learning, 'edgeUpdateCron', defaults.learning.edgeUpdateCron),
            batchWindowHours: readNumber(learning, 'batchWindowHours', defaults.learning.batchWindowHours),
        },
        narrative: {
            groqApiKey: readString(narrative, 'groqApiKey', defaults.narrative.groqApiKey),
            model: readString(narrative, 'model', defaults.narrative.model),
            maxTokens: readNumber(narrative, 'maxTokens', defaults.narrative.maxTokens),
        },
    };
}

// ── Flat key adapter ────────────────────────────────────────────────────────

let cachedConfig: EngineConfig | null = null;

export function clearConfigCacheForTests(): void {
    cachedConfig = null;
}

export function reloadConfigSync(): EngineConfig {
    const configPath = getConfigPath();
    try {
        if (existsSync(configPath)) {
            cachedConfig = mergeWithDefaults(JSON.parse(readFileSync(configPath, 'utf8')));
            return cachedConfig;
        }
    } catch (error) {
        console.error(`[Config] Failed to parse JSON config at ${configPath}:`, error);
    }
    cachedConfig = mergeWithDefaults({});
    return cachedConfig;
}

function jsonValueFor(config: EngineConfig, key: string): unknown {
    switch (key) {
        case 'API_SECRET': return config.runtime.apiSecret;
        case 'API_PORT': return config.runtime.apiPort;
        case 'DATABASE_PATH': return config.runtime.databasePath;
        case 'LOG_DIR': return config.runtime.logDir;
        case 'ANALYSIS_WINDOW_HOURS': return config.reasoning.analysisWindowHours;
        case 'EDGE_UPDATE_CRON': return config.learning.edgeUpdateCron;
        case 'BATCH_WINDOW_HOURS': return config.learning.batchWindowHours;
        case 'GROQ_API_KEY': return config.narrative.groqApiKey;
        case 'NARRATIVE_MODEL': return config.narrative.model;
        case 'NARRATIVE_MAX_TOKENS': return config.narrative.maxTokens;
        default: return undefined;
    }
}

function hasText(value: unknown): boolean {
    return value !== undefined && value !== null && String(value).trim() !== '';
}

/**
 * Gets a configured value. Environment variables win for every known key,
 * then `causal-engine.json` merged with defaults.
 */
export function getConfigValue(key: string): string | undefined {
    const config = cachedConfig ?? reloadConfigSync();

    const envValue = process.env[key];
    if (hasText(envValue)) {
        return String(envValue);
    }

    const jsonValue = jsonValueFor(config, key);
    if (hasText(jsonValue)) {
        return String(jsonValue);
    }

    return undefined;
}

/** Numeric config value, or `fallback` when unset or not a finite number. */
export function getNumericConfigValue(key: string, fallback: number): number {
    const raw = getConfigValue(key);
    if (raw === undefined) return fallback;
    const parsed = Number(raw);
    return Number.isFinite(parsed) ? parsed : fallback;
}
