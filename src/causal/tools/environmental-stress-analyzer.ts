import type { AnalysisTool, DebtType, Hypothesis, ToolObservation } from '../../types/causal.js';
import type { HealthGraphStore, TimeWindow } from '../../types/health-graph.js';
import { DAY_MS, mean } from '../../utils/math.js';

function aqiScore(maxAqi: number): number {
    if (maxAqi > 150) return 0.8;
    if (maxAqi > 100) return 0.5;
    if (maxAqi > 50) return 0.2;
    return 0;
}

function pollenScore(maxPollen: number): number {
    if (maxPollen >= 10) return 0.7;
    if (maxPollen >= 8) return 0.5;
    if (maxPollen >= 5) return 0.2;
    return 0;
}

function heatScore(maxTemperature: number): number {
    if (maxTemperature > 38) return 0.7;
    if (maxTemperature > 33) return 0.4;
    if (maxTemperature < 5) return 0.3;
    return 0;
}

/**
 * AQI, pollen, heat and UV load in the window, confirmed by an HRV drop
 * against the 7-day baseline (a drop above 10% adds up to 0.3).
 */
export class EnvironmentalStressAnalyzer implements AnalysisTool {
    readonly name = 'EnvironmentalStressAnalyzer';
    readonly targetDebtTypes: ReadonlySet<DebtType> = new Set<DebtType>(['somatic']);

    analyze(_hypotheses: readonly Hypothesis[], store: HealthGraphStore, window: TimeWindow): ToolObservation {
        const environment = store.queryEnvironment(window.start, window.end);
        if (environment.length === 0) {
            return {
                toolName: this.name,
                evidence: { somatic: 0 },
                confidence: 0.3,
                detail: 'No environmental data available',
            };
        }

        const maxAqi = Math.max(...environment.map((condition) => condition.aqiUS));
        const maxPollen = Math.max(...environment.map((condition) => condition.pollenIndex));
        const maxTemperature = Math.max(...environment.map((condition) => condition.temperatureCelsius));
        const maxUv = Math.max(...environment.map((condition) => condition.uvIndex));

        const aqi = aqiScore(maxAqi);
        const pollen = pollenScore(maxPollen);
        const heat = heatScore(maxTemperature);
        const uv = maxUv > 7 ? 0.2 : 0;
        const environmental = Math.max(aqi, pollen, heat) * 0.6 + Math.min(aqi + pollen + heat + uv, 1) * 0.4;

        const baselineStart = new Date(window.start.getTime() - 7 * DAY_MS);
        const current = mean(store.querySamples('hrv_sdnn', window.start, window.end).map((sample) => sample.value));
        const baseline = mean(store.querySamples('hrv_sdnn', baselineStart, window.start).map((sample) => sample.value));
        let hrvConfirmation = 0;
        if (current !== undefined && baseline !== undefined && baseline > 0) {
            const drop = (baseline - current) / baseline;
            if (drop > 0.1) hrvConfirmation = Math.min(drop, 0.3);
        }

        return {
            toolName: this.name,
            evidence: { somatic: Math.min(environmental + hrvConfirmation, 1) },
            confidence: 0.7,
            detail: `AQI: ${maxAqi} (${(aqi * 100).toFixed(0)}%), Pollen: ${maxPollen}, Temp: ${maxTemperature.toFixed(0)}C`,
        };
    }
}
