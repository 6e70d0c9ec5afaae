/**
 * Record types persisted in the health graph store and the edge records that
 * connect them. Timestamps are `Date` instances; durations are seconds.
 */

/** Category of a node in the health graph, in no particular order. */
export type NodeCategory =
    | 'meal'
    | 'environmental'
    | 'behavioral'
    | 'glucose'
    | 'physiological'
    | 'symptom';

export const NODE_CATEGORIES: readonly NodeCategory[] = [
    'meal',
    'environmental',
    'behavioral',
    'glucose',
    'physiological',
    'symptom',
];

export type EdgeType =
    | 'meal_to_glucose'
    | 'glucose_to_hrv'
    | 'glucose_to_energy'
    | 'behavior_to_hrv'
    | 'meal_to_sleep'
    | 'behavior_to_sleep'
    | 'environment_to_hrv'
    | 'environment_to_sleep'
    | 'environment_to_digestion'
    | 'behavior_to_meal'
    | 'meal_to_skin'
    | 'sleep_to_skin'
    | 'behavior_to_skin'
    | 'environment_to_skin'
    | 'skin_to_symptom'
    | 'temporal'
    | 'causal';

export const EDGE_TYPES: readonly EdgeType[] = [
    'meal_to_glucose',
    'glucose_to_hrv',
    'glucose_to_energy',
    'behavior_to_hrv',
    'meal_to_sleep',
    'behavior_to_sleep',
    'environment_to_hrv',
    'environment_to_sleep',
    'environment_to_digestion',
    'behavior_to_meal',
    'meal_to_skin',
    'sleep_to_skin',
    'behavior_to_skin',
    'environment_to_skin',
    'skin_to_symptom',
    'temporal',
    'causal',
];

/** The member of `allowed` equal to `value`, if any. Narrows stored text to a closed union. */
export function oneOf<T extends string>(value: string | null | undefined, allowed: readonly T[]): T | undefined {
    return allowed.find((candidate) => candidate === value);
}

/**
 * Directed, weighted, timestamped relation between two nodes.
 *
 * Categories are attached when the edge is created. `categoryFromNodeId`
 * only serves rows written before the category columns existed.
 */
export interface HealthGraphEdge {
    id?: number;
    sourceNodeId: string;
    targetNodeId: string;
    sourceCategory?: NodeCategory;
    targetCategory?: NodeCategory;
    edgeType: EdgeType;
    /** Learned strength in [0, 1]. */
    causalStrength: number;
    temporalOffsetSeconds: number;
    /** Learned confidence in [0, 1]; never decreases over the edge's life. */
    confidence: number;
    createdAt: Date;
}

// ── Node IDs ────────────────────────────────────────────────────────────────

const NODE_ID_PREFIXES: ReadonlyArray<readonly [string, NodeCategory]> = [
    ['physio_', 'physiological'],
    ['glucose_', 'glucose'],
    ['meal_', 'meal'],
    ['behavioral_', 'behavioral'],
    ['environment_', 'environmental'],
    ['symptom_', 'symptom'],
];

/** Build the node ID for a record, e.g. `nodeId('meal', 12)` → `meal_12`. */
export function nodeId(category: NodeCategory, recordId: number | string): string {
    const entry = NODE_ID_PREFIXES.find(([, mapped]) => mapped === category);
    const prefix = entry ? entry[0] : `${category}_`;
    return `${prefix}${recordId}`;
}

/** Infer a node's category from its ID prefix. */
export function categoryFromNodeId(id: string): NodeCategory | undefined {
    for (const [prefix, category] of NODE_ID_PREFIXES) {
        if (id.startsWith(prefix)) {
            return category;
        }
    }
    return undefined;
}

// ── Time-series records ─────────────────────────────────────────────────────

export interface TimeWindow {
    start: Date;
    end: Date;
}

export type GlucoseTrend = 'rapidly_rising' | 'rising' | 'stable' | 'falling' | 'rapidly_falling';

export const GLUCOSE_TRENDS: readonly GlucoseTrend[] = ['rapidly_rising', 'rising', 'stable', 'falling', 'rapidly_falling'];

export type EnergyState = 'stable' | 'rising' | 'crashing' | 'reactive_low';

export const ENERGY_STATES: readonly EnergyState[] = ['stable', 'rising', 'crashing', 'reactive_low'];

export interface GlucoseReading {
    id?: number;
    glucoseMgDL: number;
    timestamp: Date;
    trend: GlucoseTrend;
    energyState: EnergyState;
    relatedMealEventId?: number;
}

/** True when a reading marks a glucose crash or reactive low. */
export function isCrashReading(reading: GlucoseReading): boolean {
    return reading.energyState === 'crashing' || reading.energyState === 'reactive_low';
}

export type MealSource = 'rotimatic_next' | 'instant_pot' | 'instacart' | 'doordash' | 'manual';

export const MEAL_SOURCES: readonly MealSource[] = ['rotimatic_next', 'instant_pot', 'instacart', 'doordash', 'manual'];

export interface Ingredient {
    name: string;
    quantityGrams?: number;
    glycemicIndex?: number;
    /** Free-form nutrient class such as `protein` or `grain`. */
    type?: string;
}

export interface MealEvent {
    id?: number;
    timestamp: Date;
    source: MealSource;
    ingredients: Ingredient[];
    cookingMethod?: string;
    estimatedGlycemicLoad?: number;
    bioavailabilityModifier?: number;
}

/** GL = Σ GI × available carbs / 100, assuming 70% of grain weight is carbohydrate. */
export function computedGlycemicLoad(meal: MealEvent): number {
    return meal.ingredients.reduce((total, ingredient) => {
        if (ingredient.glycemicIndex === undefined || ingredient.quantityGrams === undefined) {
            return total;
        }
        return total + (ingredient.glycemicIndex * ingredient.quantityGrams * 0.7) / 100;
    }, 0);
}

/** Estimated glycemic load when present, otherwise the ingredient-derived value. */
export function glycemicLoad(meal: MealEvent): number {
    return meal.estimatedGlycemicLoad ?? computedGlycemicLoad(meal);
}

export type BehaviorCategory =
    | 'active_work'
    | 'passive_consumption'
    | 'zombie_scrolling'
    | 'stress_signal'
    | 'exercise'
    | 'rest';

export const BEHAVIOR_CATEGORIES: readonly BehaviorCategory[] = [
    'active_work',
    'passive_consumption',
    'zombie_scrolling',
    'stress_signal',
    'exercise',
    'rest',
];

export interface BehavioralEvent {
    id?: number;
    timestamp: Date;
    durationSeconds: number;
    category: BehaviorCategory;
    appName?: string;
    dopamineDebtScore?: number;
}

/** Passive consumption and compulsive scrolling count as passive screen time. */
export function isPassiveBehavior(event: BehavioralEvent): boolean {
    return event.category === 'passive_consumption' || event.category === 'zombie_scrolling';
}

export interface EnvironmentalCondition {
    id?: number;
    timestamp: Date;
    temperatureCelsius: number;
    humidity: number;
    aqiUS: number;
    uvIndex: number;
    pollenIndex: number;
}

/** AQI above 100, pollen at 8 or more, or heat above 33 °C. */
export function isEnvironmentalStress(condition: EnvironmentalCondition): boolean {
    return condition.aqiUS > 100 || condition.pollenIndex >= 8 || condition.temperatureCelsius > 33;
}

export type MetricType =
    | 'hrv_sdnn'
    | 'resting_hr'
    | 'sleep_analysis'
    | 'blood_oxygen'
    | 'respiratory_rate'
    | 'active_energy'
    | 'step_count';

export const METRIC_TYPES: readonly MetricType[] = [
    'hrv_sdnn',
    'resting_hr',
    'sleep_analysis',
    'blood_oxygen',
    'respiratory_rate',
    'active_energy',
    'step_count',
];

export interface PhysiologicalSample {
    id?: number;
    metricType: MetricType;
    value: number;
    unit: string;
    timestamp: Date;
}

// ── Store contract ──────────────────────────────────────────────────────────

/**
 * Query surface the reasoning core needs from the health data store.
 * Every method may throw; callers let failures propagate.
 */
export interface HealthGraphStore {
    queryGlucose(from: Date, to: Date): GlucoseReading[];
    queryMeals(from: Date, to: Date): MealEvent[];
    queryBehaviors(from: Date, to: Date): BehavioralEvent[];
    queryEnvironment(from: Date, to: Date): EnvironmentalCondition[];
    querySamples(type: MetricType, from: Date, to: Date): PhysiologicalSample[];
    /** Edges leaving a node, oldest first. */
    queryEdges(sourceNodeId: string): HealthGraphEdge[];
    /** Edges of one type created inside a window, strongest first. */
    queryEdgesByType(type: EdgeType, from: Date, to: Date): HealthGraphEdge[];
    listEdges(): HealthGraphEdge[];
    /** Insert, or update when `edge.id` is set. Returns the stored edge. */
    addEdge(edge: HealthGraphEdge): HealthGraphEdge;
}
