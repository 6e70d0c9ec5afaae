/** Clamp a score into [0, 1]. NaN collapses to 0. */
export function clamp01(value: number): number {
    if (Number.isNaN(value)) return 0;
    return Math.min(Math.max(value, 0), 1);
}

export function mean(values: readonly number[]): number | undefined {
    if (values.length === 0) return undefined;
    return values.reduce((total, value) => total + value, 0) / values.length;
}

export function sum(values: readonly number[]): number {
    return values.reduce((total, value) => total + value, 0);
}

export const MINUTE_MS = 60_000;
export const HOUR_MS = 60 * MINUTE_MS;
export const DAY_MS = 24 * HOUR_MS;

/** Window ending at `end` and reaching back `hours`. */
export function windowEndingAt(end: Date, hours: number): { start: Date; end: Date } {
    return { start: new Date(end.getTime() - hours * HOUR_MS), end };
}
