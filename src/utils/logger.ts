import * as fs from 'fs/promises';
import * as path from 'path';
import { getConfigValue } from '../config/config-loader.js';
import { SENSITIVE_CONFIG_KEYS } from '../config/env-schema.js';

const REDACTED = '[REDACTED]';
const DEFAULT_LOG_DIR = 'memory/logs';

const KEY_VALUE_SECRET_PATTERN =
    /\b([A-Za-z0-9_-]*(?:api[_-]?key|secret|token|password)[A-Za-z0-9_-]*)(\s*[=:]\s*)("[^"]*"|'[^']*'|[^\s,;]+)/gi;

const BEARER_PATTERN = /\b(Bearer\s+)[A-Za-z0-9._~+/-]+=*/g;

function escapeRegExp(value: string): string {
    return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Redact secrets from free text: `key=value` pairs whose key looks sensitive,
 * bearer tokens, and the raw values of sensitive config keys wherever they appear.
 */
export function scrubSensitiveText(input: string): string {
    let output = input
        .replace(KEY_VALUE_SECRET_PATTERN, (_match, key: string, separator: string) => `${key}${separator}${REDACTED}`)
        .replace(BEARER_PATTERN, (_match, prefix: string) => `${prefix}${REDACTED}`);

    for (const key of SENSITIVE_CONFIG_KEYS) {
        const value = process.env[key];
        // Short values would redact ordinary words.
        if (!value || value.trim().length < 8) continue;
        output = output.replace(new RegExp(escapeRegExp(value.trim()), 'g'), REDACTED);
    }

    return output;
}

function logFileFor(date: Date): string {
    const dir = getConfigValue('LOG_DIR') ?? DEFAULT_LOG_DIR;
    return path.resolve(dir, `${date.toISOString().slice(0, 10)}.log`);
}

/**
 * Append a reasoning trace line to today's log file.
 *
 * Never rejects: write failures are reported on stderr so call sites can use
 * `void logThought(...)`.
 */
export async function logThought(message: string): Promise<void> {
    const now = new Date();
    const line = `[${now.toISOString()}] ${scrubSensitiveText(message)}\n`;
    const target = logFileFor(now);

    try {
        await fs.mkdir(path.dirname(target), { recursive: true });
        await fs.appendFile(target, line, 'utf8');
    } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        console.error(`[Logger] Failed to write to ${target}: ${reason}`);
    }
}
