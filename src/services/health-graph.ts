import {
    BEHAVIOR_CATEGORIES,
    EDGE_TYPES,
    ENERGY_STATES,
    GLUCOSE_TRENDS,
    MEAL_SOURCES,
    NODE_CATEGORIES,
    oneOf,
} from '../types/health-graph.js';
import type {
    BehavioralEvent,
    EdgeType,
    EnvironmentalCondition,
    GlucoseReading,
    HealthGraphEdge,
    HealthGraphStore,
    Ingredient,
    MealEvent,
    MetricType,
    PhysiologicalSample,
} from '../types/health-graph.js';
import { DEBT_TYPES } from '../types/causal.js';
import type { DebtType, ToolObservation } from '../types/causal.js';
import { DataUnavailableError } from '../types/errors.js';
import { TRACE_STAGES } from '../types/reasoning-trace.js';
import type { HypothesisSummary, ReasoningTrace, ReasoningTraceStore, TraceQuery } from '../types/reasoning-trace.js';
import { clamp01 } from '../utils/math.js';
import type { HealthDatabase } from './db.js';

// ── Row shapes ──────────────────────────────────────────────────────────────

interface GlucoseRow {
    id: number;
    glucose_mg_dl: number;
    timestamp: number;
    trend: string;
    energy_state: string;
    related_meal_event_id: number | null;
}

interface MealRow {
    id: number;
    timestamp: number;
    source: string;
    ingredients_json: string;
    cooking_method: string | null;
    estimated_glycemic_load: number | null;
    bioavailability_modifier: number | null;
}

interface BehaviorRow {
    id: number;
    timestamp: number;
    duration_seconds: number;
    category: string;
    app_name: string | null;
    dopamine_debt_score: number | null;
}

interface EnvironmentRow {
    id: number;
    timestamp: number;
    temperature_celsius: number;
    humidity: number;
    aqi_us: number;
    uv_index: number;
    pollen_index: number;
}

interface SampleRow {
    id: number;
    metric_type: string;
    value: number;
    unit: string;
    timestamp: number;
}

interface EdgeRow {
    id: number;
    source_node_id: string;
    target_node_id: string;
    source_category: string | null;
    target_category: string | null;
    edge_type: string;
    causal_strength: number;
    temporal_offset_seconds: number;
    confidence: number;
    created_at: number;
}

interface TraceRow {
    id: number;
    symptom: string;
    stage: string;
    hypotheses_json: string;
    observations_json: string;
    conclusion: string | null;
    confidence: number | null;
    duration_ms: number;
    causal_chain_json: string;
    narrative: string | null;
    created_at: number;
}

// ── Row mapping ─────────────────────────────────────────────────────────────

function optional<T>(value: T | null): T | undefined {
    return value === null ? undefined : value;
}

function parseIngredients(json: string): Ingredient[] {
    const parsed: unknown = JSON.parse(json);
    if (!Array.isArray(parsed)) return [];

    const ingredients: Ingredient[] = [];
    for (const entry of parsed) {
        if (typeof entry !== 'object' || entry === null) continue;
        const name: unknown = Reflect.get(entry, 'name');
        if (typeof name !== 'string') continue;
        const quantityGrams: unknown = Reflect.get(entry, 'quantityGrams');
        const glycemicIndex: unknown = Reflect.get(entry, 'glycemicIndex');
        const type: unknown = Reflect.get(entry, 'type');
        ingredients.push({
            name,
            quantityGrams: typeof quantityGrams === 'number' ? quantityGrams : undefined,
            glycemicIndex: typeof glycemicIndex === 'number' ? glycemicIndex : undefined,
            type: typeof type === 'string' ? type : undefined,
        });
    }
    return ingredients;
}

function toGlucose(row: GlucoseRow): GlucoseReading {
    return {
        id: row.id,
        glucoseMgDL: row.glucose_mg_dl,
        timestamp: new Date(row.timestamp),
        trend: oneOf(row.trend, GLUCOSE_TRENDS) ?? 'stable',
        energyState: oneOf(row.energy_state, ENERGY_STATES) ?? 'stable',
        relatedMealEventId: optional(row.related_meal_event_id),
    };
}

function toMeal(row: MealRow): MealEvent {
    return {
        id: row.id,
        timestamp: new Date(row.timestamp),
        source: oneOf(row.source, MEAL_SOURCES) ?? 'manual',
        ingredients: parseIngredients(row.ingredients_json),
        cookingMethod: optional(row.cooking_method),
        estimatedGlycemicLoad: optional(row.estimated_glycemic_load),
        bioavailabilityModifier: optional(row.bioavailability_modifier),
    };
}

function toBehavior(row: BehaviorRow): BehavioralEvent {
    return {
        id: row.id,
        timestamp: new Date(row.timestamp),
        durationSeconds: row.duration_seconds,
        category: oneOf(row.category, BEHAVIOR_CATEGORIES) ?? 'rest',
        appName: optional(row.app_name),
        dopamineDebtScore: optional(row.dopamine_debt_score),
    };
}

function toEnvironment(row: EnvironmentRow): EnvironmentalCondition {
    return {
        id: row.id,
        timestamp: new Date(row.timestamp),
        temperatureCelsius: row.temperature_celsius,
        humidity: row.humidity,
        aqiUS: row.aqi_us,
        uvIndex: row.uv_index,
        pollenIndex: row.pollen_index,
    };
}

function toSample(row: SampleRow, metricType: MetricType): PhysiologicalSample {
    return {
        id: row.id,
        metricType,
        value: row.value,
        unit: row.unit,
        timestamp: new Date(row.timestamp),
    };
}

/** Rows with an edge type outside the closed set are skipped. */
function toEdge(row: EdgeRow): HealthGraphEdge | undefined {
    const edgeType = oneOf(row.edge_type, EDGE_TYPES);
    if (!edgeType) return undefined;
    return {
        id: row.id,
        sourceNodeId: row.source_node_id,
        targetNodeId: row.target_node_id,
        sourceCategory: oneOf(row.source_category, NODE_CATEGORIES),
        targetCategory: oneOf(row.target_category, NODE_CATEGORIES),
        edgeType,
        causalStrength: row.causal_strength,
        temporalOffsetSeconds: row.temporal_offset_seconds,
        confidence: row.confidence,
        createdAt: new Date(row.created_at),
    };
}

function toEdges(rows: readonly EdgeRow[]): HealthGraphEdge[] {
    return rows.flatMap((row) => {
        const edge = toEdge(row);
        return edge ? [edge] : [];
    });
}

function parseArray(json: string): unknown[] {
    const parsed: unknown = JSON.parse(json);
    return Array.isArray(parsed) ? parsed : [];
}

function parseHypothesisSummaries(json: string): HypothesisSummary[] {
    const summaries: HypothesisSummary[] = [];
    for (const entry of parseArray(json)) {
        if (typeof entry !== 'object' || entry === null) continue;
        const rawType: unknown = Reflect.get(entry, 'debtType');
        const debtType = typeof rawType === 'string' ? oneOf(rawType, DEBT_TYPES) : undefined;
        const description: unknown = Reflect.get(entry, 'description');
        const confidence: unknown = Reflect.get(entry, 'confidence');
        if (!debtType || typeof description !== 'string' || typeof confidence !== 'number') continue;
        summaries.push({ debtType, description, confidence });
    }
    return summaries;
}

function parseObservations(json: string): ToolObservation[] {
    const observations: ToolObservation[] = [];
    for (const entry of parseArray(json)) {
        if (typeof entry !== 'object' || entry === null) continue;
        const toolName: unknown = Reflect.get(entry, 'toolName');
        const confidence: unknown = Reflect.get(entry, 'confidence');
        const detail: unknown = Reflect.get(entry, 'detail');
        const rawEvidence: unknown = Reflect.get(entry, 'evidence');
        if (typeof toolName !== 'string' || typeof confidence !== 'number' || typeof detail !== 'string') continue;

        const evidence: Partial<Record<DebtType, number>> = {};
        if (typeof rawEvidence === 'object' && rawEvidence !== null) {
            for (const debtType of DEBT_TYPES) {
                const value: unknown = Reflect.get(rawEvidence, debtType);
                if (typeof value === 'number') evidence[debtType] = value;
            }
        }
        observations.push({ toolName, evidence, confidence, detail });
    }
    return observations;
}

function toTrace(row: TraceRow): ReasoningTrace {
    return {
        id: row.id,
        symptom: row.symptom,
        stage: oneOf(row.stage, TRACE_STAGES) ?? 'inference',
        hypotheses: parseHypothesisSummaries(row.hypotheses_json),
        observations: parseObservations(row.observations_json),
        conclusion: oneOf(row.conclusion, DEBT_TYPES),
        confidence: optional(row.confidence),
        durationMs: row.duration_ms,
        causalChain: parseArray(row.causal_chain_json).filter((link): link is string => typeof link === 'string'),
        narrative: optional(row.narrative),
        createdAt: new Date(row.created_at),
    };
}

// ── Store ───────────────────────────────────────────────────────────────────

/**
 * better-sqlite3 implementation of the health graph store.
 *
 * Time-series queries are inclusive on both ends and return rows oldest first.
 * Timestamps are stored as epoch milliseconds. Every failure surfaces as a
 * `DataUnavailableError` naming the operation.
 */
export class SqliteHealthGraph implements HealthGraphStore, ReasoningTraceStore {
    readonly #db: HealthDatabase;

    constructor(db: HealthDatabase) {
        this.#db = db;
    }

    #run<T>(operation: string, work: () => T): T {
        try {
            return work();
        } catch (error) {
            throw new DataUnavailableError(operation, error);
        }
    }

    // ── Queries ─────────────────────────────────────────────────────────────

    queryGlucose(from: Date, to: Date): GlucoseReading[] {
        return this.#run('queryGlucose', () => this.#db
            .prepare<[number, number], GlucoseRow>(`
                SELECT * FROM glucose_readings
                WHERE timestamp BETWEEN ? AND ?
                ORDER BY timestamp ASC, id ASC
            `)
            .all(from.getTime(), to.getTime())
            .map(toGlucose));
    }

    queryMeals(from: Date, to: Date): MealEvent[] {
        return this.#run('queryMeals', () => this.#db
            .prepare<[number, number], MealRow>(`
                SELECT * FROM meal_events
                WHERE timestamp BETWEEN ? AND ?
                ORDER BY timestamp ASC, id ASC
            `)
            .all(from.getTime(), to.getTime())
            .map(toMeal));
    }

    queryBehaviors(from: Date, to: Date): BehavioralEvent[] {
        return this.#run('queryBehaviors', () => this.#db
            .prepare<[number, number], BehaviorRow>(`
                SELECT * FROM behavioral_events
                WHERE timestamp BETWEEN ? AND ?
                ORDER BY timestamp ASC, id ASC
            `)
            .all(from.getTime(), to.getTime())
            .map(toBehavior));
    }

    queryEnvironment(from: Date, to: Date): EnvironmentalCondition[] {
        return this.#run('queryEnvironment', () => this.#db
            .prepare<[number, number], EnvironmentRow>(`
                SELECT * FROM environmental_conditions
                WHERE timestamp BETWEEN ? AND ?
                ORDER BY timestamp ASC, id ASC
            `)
            .all(from.getTime(), to.getTime())
            .map(toEnvironment));
    }

    querySamples(type: MetricType, from: Date, to: Date): PhysiologicalSample[] {
        return this.#run('querySamples', () => this.#db
            .prepare<[string, number, number], SampleRow>(`
                SELECT * FROM physiological_samples
                WHERE metric_type = ? AND timestamp BETWEEN ? AND ?
                ORDER BY timestamp ASC, id ASC
            `)
            .all(type, from.getTime(), to.getTime())
            .map((row) => toSample(row, type)));
    }

    queryEdges(sourceNodeId: string): HealthGraphEdge[] {
        return this.#run('queryEdges', () => toEdges(this.#db
            .prepare<[string], EdgeRow>(`
                SELECT * FROM causal_edges
                WHERE source_node_id = ?
                ORDER BY created_at ASC, id ASC
            `)
            .all(sourceNodeId)));
    }

    queryEdgesByType(type: EdgeType, from: Date, to: Date): HealthGraphEdge[] {
        return this.#run('queryEdgesByType', () => toEdges(this.#db
            .prepare<[string, number, number], EdgeRow>(`
                SELECT * FROM causal_edges
                WHERE edge_type = ? AND created_at BETWEEN ? AND ?
                ORDER BY causal_strength DESC, id ASC
            `)
            .all(type, from.getTime(), to.getTime())));
    }

    listEdges(): HealthGraphEdge[] {
        return this.#run('listEdges', () => toEdges(this.#db
            .prepare<[], EdgeRow>('SELECT * FROM causal_edges ORDER BY id ASC')
            .all()));
    }

    /** Insert, or update when `edge.id` is set. Strength and confidence are clamped to [0, 1]. */
    addEdge(edge: HealthGraphEdge): HealthGraphEdge {
        return this.#run('addEdge', () => {
            const stored: HealthGraphEdge = {
                ...edge,
                causalStrength: clamp01(edge.causalStrength),
                confidence: clamp01(edge.confidence),
            };

            if (edge.id !== undefined) {
                this.#db.prepare(`
                    UPDATE causal_edges SET
                        source_node_id = ?,
                        target_node_id = ?,
                        source_category = ?,
                        target_category = ?,
                        edge_type = ?,
                        causal_strength = ?,
                        temporal_offset_seconds = ?,
                        confidence = ?
                    WHERE id = ?
                `).run(
                    stored.sourceNodeId,
                    stored.targetNodeId,
                    stored.sourceCategory ?? null,
                    stored.targetCategory ?? null,
                    stored.edgeType,
                    stored.causalStrength,
                    stored.temporalOffsetSeconds,
                    stored.confidence,
                    edge.id,
                );
                return stored;
            }

            const result = this.#db.prepare(`
                INSERT INTO causal_edges (
                    source_node_id, target_node_id, source_category, target_category, edge_type,
                    causal_strength, temporal_offset_seconds, confidence, created_at
                )
                VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
            `).run(
                stored.sourceNodeId,
                stored.targetNodeId,
                stored.sourceCategory ?? null,
                stored.targetCategory ?? null,
                stored.edgeType,
                stored.causalStrength,
                stored.temporalOffsetSeconds,
                stored.confidence,
                stored.createdAt.getTime(),
            );
            return { ...stored, id: Number(result.lastInsertRowid) };
        });
    }

    // ── Ingestion ───────────────────────────────────────────────────────────

    addGlucoseReading(reading: GlucoseReading): GlucoseReading {
        return this.#run('addGlucoseReading', () => {
            const result = this.#db.prepare(`
                INSERT INTO glucose_readings (glucose_mg_dl, timestamp, trend, energy_state, related_meal_event_id)
                VALUES (?, ?, ?, ?, ?)
            `).run(
                reading.glucoseMgDL,
                reading.timestamp.getTime(),
                reading.trend,
                reading.energyState,
                reading.relatedMealEventId ?? null,
            );
            return { ...reading, id: Number(result.lastInsertRowid) };
        });
    }

    addMealEvent(meal: MealEvent): MealEvent {
        return this.#run('addMealEvent', () => {
            const result = this.#db.prepare(`
                INSERT INTO meal_events (
                    timestamp, source, ingredients_json, cooking_method,
                    estimated_glycemic_load, bioavailability_modifier
                )
                VALUES (?, ?, ?, ?, ?, ?)
            `).run(
                meal.timestamp.getTime(),
                meal.source,
                JSON.stringify(meal.ingredients),
                meal.cookingMethod ?? null,
                meal.estimatedGlycemicLoad ?? null,
                meal.bioavailabilityModifier ?? null,
            );
            return { ...meal, id: Number(result.lastInsertRowid) };
        });
    }

    addBehavioralEvent(event: BehavioralEvent): BehavioralEvent {
        return this.#run('addBehavioralEvent', () => {
            const result = this.#db.prepare(`
                INSERT INTO behavioral_events (timestamp, duration_seconds, category, app_name, dopamine_debt_score)
                VALUES (?, ?, ?, ?, ?)
            `).run(
                event.timestamp.getTime(),
                event.durationSeconds,
                event.category,
                event.appName ?? null,
                event.dopamineDebtScore ?? null,
            );
            return { ...event, id: Number(result.lastInsertRowid) };
        });
    }

    addEnvironmentalCondition(condition: EnvironmentalCondition): EnvironmentalCondition {
        return this.#run('addEnvironmentalCondition', () => {
            const result = this.#db.prepare(`
                INSERT INTO environmental_conditions (
                    timestamp, temperature_celsius, humidity, aqi_us, uv_index, pollen_index
                )
                VALUES (?, ?, ?, ?, ?, ?)
            `).run(
                condition.timestamp.getTime(),
                condition.temperatureCelsius,
                condition.humidity,
                condition.aqiUS,
                condition.uvIndex,
                condition.pollenIndex,
            );
            return { ...condition, id: Number(result.lastInsertRowid) };
        });
    }

    addPhysiologicalSample(sample: PhysiologicalSample): PhysiologicalSample {
        return this.#run('addPhysiologicalSample', () => {
            const result = this.#db.prepare(`
                INSERT INTO physiological_samples (metric_type, value, unit, timestamp)
                VALUES (?, ?, ?, ?)
            `).run(sample.metricType, sample.value, sample.unit, sample.timestamp.getTime());
            return { ...sample, id: Number(result.lastInsertRowid) };
        });
    }

    // ── Reasoning traces ────────────────────────────────────────────────────

    addReasoningTrace(trace: ReasoningTrace): ReasoningTrace {
        return this.#run('addReasoningTrace', () => {
            const result = this.#db.prepare(`
                INSERT INTO reasoning_traces (
                    symptom, stage, hypotheses_json, observations_json, conclusion,
                    confidence, duration_ms, causal_chain_json, narrative, created_at
                )
                VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
            `).run(
                trace.symptom,
                trace.stage,
                JSON.stringify(trace.hypotheses),
                JSON.stringify(trace.observations),
                trace.conclusion ?? null,
                trace.confidence ?? null,
                trace.durationMs,
                JSON.stringify(trace.causalChain),
                trace.narrative ?? null,
                trace.createdAt.getTime(),
            );
            return { ...trace, id: Number(result.lastInsertRowid) };
        });
    }

    listReasoningTraces(query: TraceQuery): ReasoningTrace[] {
        return this.#run('listReasoningTraces', () => {
            if (query.symptom === undefined) {
                return this.#db
                    .prepare<[number], TraceRow>('SELECT * FROM reasoning_traces ORDER BY id DESC LIMIT ?')
                    .all(query.limit)
                    .map(toTrace);
            }
            return this.#db
                .prepare<[string, number], TraceRow>(
                    'SELECT * FROM reasoning_traces WHERE symptom = ? ORDER BY id DESC LIMIT ?',
                )
                .all(query.symptom, query.limit)
                .map(toTrace);
        });
    }

    getReasoningTrace(id: number): ReasoningTrace | undefined {
        return this.#run('getReasoningTrace', () => {
            const row = this.#db
                .prepare<[number], TraceRow>('SELECT * FROM reasoning_traces WHERE id = ?')
                .get(id);
            return row ? toTrace(row) : undefined;
        });
    }
}
