import type { AnalysisTool, DebtType, Hypothesis, ToolObservation } from '../../types/causal.js';
import { isCrashReading, isPassiveBehavior } from '../../types/health-graph.js';
import type { HealthGraphStore, TimeWindow } from '../../types/health-graph.js';
import { MINUTE_MS } from '../../utils/math.js';

export const REACTIVE_WINDOW_MS = 30 * MINUTE_MS;
const REACTIVE_METABOLIC_SIGNAL = 0.15;
const ANALYZER_CONFIDENCE = 0.8;

/**
 * Scores passive screen time, separating scrolling that started shortly after
 * a glucose crash (reactive, an effect of fatigue) from genuine digital debt.
 * Scrolling that starts at the crash or up to 30 minutes after it is reactive.
 * When reactive minutes dominate, credit moves to the metabolic category.
 */
export class DigitalFrictionAnalyzer implements AnalysisTool {
    readonly name = 'DigitalFrictionAnalyzer';
    readonly targetDebtTypes: ReadonlySet<DebtType> = new Set<DebtType>(['digital']);

    analyze(_hypotheses: readonly Hypothesis[], store: HealthGraphStore, window: TimeWindow): ToolObservation {
        const passive = store.queryBehaviors(window.start, window.end).filter(isPassiveBehavior);
        if (passive.length === 0) {
            return {
                toolName: this.name,
                evidence: { digital: 0 },
                confidence: ANALYZER_CONFIDENCE,
                detail: 'No passive screen time detected',
            };
        }

        const crashTimes = store
            .queryGlucose(window.start, window.end)
            .filter(isCrashReading)
            .map((reading) => reading.timestamp.getTime());

        let genuineMinutes = 0;
        let reactiveMinutes = 0;
        for (const event of passive) {
            const startedAt = event.timestamp.getTime();
            const reactive = crashTimes.some((crashAt) => {
                const delta = startedAt - crashAt;
                return delta >= 0 && delta <= REACTIVE_WINDOW_MS;
            });
            if (reactive) reactiveMinutes += event.durationSeconds / 60;
            else genuineMinutes += event.durationSeconds / 60;
        }

        const totalMinutes = genuineMinutes + reactiveMinutes;
        const genuineRatio = totalMinutes > 0 ? genuineMinutes / totalMinutes : 0;
        const evidence: Partial<Record<DebtType, number>> = {
            digital: Math.min(genuineMinutes / 60, 1) * genuineRatio,
        };
        if (reactiveMinutes > genuineMinutes) {
            evidence.metabolic = REACTIVE_METABOLIC_SIGNAL;
        }

        return {
            toolName: this.name,
            evidence,
            confidence: ANALYZER_CONFIDENCE,
            detail: `Genuine digital: ${Math.trunc(genuineMinutes)}min, Reactive scrolling: ${Math.trunc(reactiveMinutes)}min`,
        };
    }
}
