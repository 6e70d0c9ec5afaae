/**
 * Runtime configuration validator.
 *
 * Reports missing required keys and format violations. No secret values are
 * ever included in the output.
 */

import cron from 'node-cron';
import { CONFIG_SCHEMA } from './env-schema.js';
import type { ConfigKeySpec } from './env-schema.js';
import { getConfigValue } from './config-loader.js';

export type ConfigIssueClass = 'missing_required' | 'format_error';

export interface ConfigIssue {
  key: string;
  class: ConfigIssueClass;
  message: string;
  remediation: string;
}

export interface ConfigValidationResult {
  /** true when no required key is missing. */
  ok: boolean;
  presentKeys: string[];
  issues: ConfigIssue[];
  validatedAt: string;
}

function formatError(spec: ConfigKeySpec, raw: string): string | null {
  const value = raw.trim();
  switch (spec.format) {
    case 'port': {
      const parsed = Number(value);
      if (!Number.isInteger(parsed) || parsed < 1 || parsed > 65535) {
        return `${spec.key} must be an integer in range 1–65535, got '${value}'.`;
      }
      return null;
    }
    case 'positive_number': {
      const parsed = Number(value);
      if (!Number.isFinite(parsed) || parsed <= 0) {
        return `${spec.key} must be a positive number, got '${value}'.`;
      }
      return null;
    }
    case 'cron':
      return cron.validate(value) ? null : `${spec.key} is not a valid cron expression: '${value}'.`;
    case 'text':
      return null;
  }
}

/** Validate every key in `CONFIG_SCHEMA` against the merged configuration. */
export function validateConfiguration(): ConfigValidationResult {
  const presentKeys: string[] = [];
  const issues: ConfigIssue[] = [];

  for (const spec of CONFIG_SCHEMA) {
    const raw = getConfigValue(spec.key);
    if (raw === undefined) {
      if (spec.class === 'required') {
        issues.push({
          key: spec.key,
          class: 'missing_required',
          message: `${spec.key} is required but not configured.`,
          remediation: spec.remediation,
        });
      }
      continue;
    }

    presentKeys.push(spec.key);
    // Secrets are never echoed, so they only get a presence check.
    if (spec.type === 'secret') continue;

    const problem = formatError(spec, raw);
    if (problem) {
      issues.push({ key: spec.key, class: 'format_error', message: problem, remediation: spec.remediation });
    }
  }

  return {
    ok: !issues.some((issue) => issue.class === 'missing_required'),
    presentKeys,
    issues,
    validatedAt: new Date().toISOString(),
  };
}
