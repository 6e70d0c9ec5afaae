import type { AgentState, AnalysisTool, ToolSelector } from '../../types/causal.js';
import { logThought } from '../../utils/logger.js';
import { DigitalFrictionAnalyzer } from './digital-friction-analyzer.js';
import { EnvironmentalStressAnalyzer } from './environmental-stress-analyzer.js';
import { InflammationTracker } from './inflammation-tracker.js';
import { MetabolicScanner } from './metabolic-scanner.js';
import { SleepQualityAnalyzer } from './sleep-quality-analyzer.js';

/** The built-in tools in selection priority order. */
export function createDefaultTools(): AnalysisTool[] {
    return [
        new MetabolicScanner(),
        new InflammationTracker(),
        new DigitalFrictionAnalyzer(),
        new SleepQualityAnalyzer(),
        new EnvironmentalStressAnalyzer(),
    ];
}

/**
 * Catalog of analysis tools available to the Act stage.
 *
 * Each tool runs at most once per session. Selection prefers the first
 * remaining tool that targets the current top hypothesis's category.
 *
 * Usage:
 * ```ts
 * const registry = new ToolRegistry();
 * registry.register(customTool);
 * const next = registry.selectTool(state);
 * ```
 */
export class ToolRegistry implements ToolSelector {
    readonly #tools: Map<string, AnalysisTool> = new Map();

    constructor(tools: readonly AnalysisTool[] = createDefaultTools()) {
        for (const tool of tools) {
            this.#tools.set(tool.name, tool);
        }
    }

    /** Register a tool. Replaces a tool with the same name, keeping its position. */
    register(tool: AnalysisTool): void {
        this.#tools.set(tool.name, tool);
        void logThought(`[ToolRegistry] Registered tool '${tool.name}'.`);
    }

    get(name: string): AnalysisTool | undefined {
        return this.#tools.get(name);
    }

    list(): AnalysisTool[] {
        return [...this.#tools.values()];
    }

    get size(): number {
        return this.#tools.size;
    }

    selectTool(state: AgentState): AnalysisTool | undefined {
        const investigated = new Set(state.observations.map((observation) => observation.toolName));
        const remaining = this.list().filter((tool) => !investigated.has(tool.name));
        if (remaining.length === 0) return undefined;

        const top = state.hypotheses[0];
        if (top) {
            const targeted = remaining.find((tool) => tool.targetDebtTypes.has(top.debtType));
            if (targeted) return targeted;
        }
        return remaining[0];
    }
}
