import Database from 'better-sqlite3';
import path from 'path';
import fs from 'fs';

export type HealthDatabase = Database.Database;

export const DEFAULT_DB_PATH = 'memory/health-graph.db';

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS glucose_readings (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    glucose_mg_dl REAL NOT NULL,
    timestamp INTEGER NOT NULL,
    trend TEXT NOT NULL DEFAULT 'stable',
    energy_state TEXT NOT NULL DEFAULT 'stable',
    related_meal_event_id INTEGER
  );

  CREATE INDEX IF NOT EXISTS idx_glucose_readings_timestamp
    ON glucose_readings(timestamp);

  CREATE TABLE IF NOT EXISTS meal_events (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    timestamp INTEGER NOT NULL,
    source TEXT NOT NULL,
    ingredients_json TEXT NOT NULL DEFAULT '[]',
    cooking_method TEXT,
    estimated_glycemic_load REAL,
    bioavailability_modifier REAL
  );

  CREATE INDEX IF NOT EXISTS idx_meal_events_timestamp
    ON meal_events(timestamp);

  CREATE TABLE IF NOT EXISTS behavioral_events (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    timestamp INTEGER NOT NULL,
    duration_seconds REAL NOT NULL,
    category TEXT NOT NULL,
    app_name TEXT,
    dopamine_debt_score REAL
  );

  CREATE INDEX IF NOT EXISTS idx_behavioral_events_timestamp
    ON behavioral_events(timestamp);

  CREATE TABLE IF NOT EXISTS environmental_conditions (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    timestamp INTEGER NOT NULL,
    temperature_celsius REAL NOT NULL,
    humidity REAL NOT NULL,
    aqi_us REAL NOT NULL,
    uv_index REAL NOT NULL,
    pollen_index REAL NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_environmental_conditions_timestamp
    ON environmental_conditions(timestamp);

  CREATE TABLE IF NOT EXISTS physiological_samples (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    metric_type TEXT NOT NULL,
    value REAL NOT NULL,
    unit TEXT NOT NULL,
    timestamp INTEGER NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_physiological_samples_type_time
    ON physiological_samples(metric_type, timestamp);

  CREATE TABLE IF NOT EXISTS causal_edges (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    source_node_id TEXT NOT NULL,
    target_node_id TEXT NOT NULL,
    source_category TEXT,
    target_category TEXT,
    edge_type TEXT NOT NULL,
    causal_strength REAL NOT NULL,
    temporal_offset_seconds REAL NOT NULL DEFAULT 0,
    confidence REAL NOT NULL,
    created_at INTEGER NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_causal_edges_source
    ON causal_edges(source_node_id);

  CREATE INDEX IF NOT EXISTS idx_causal_edges_type_created
    ON causal_edges(edge_type, created_at);

  CREATE TABLE IF NOT EXISTS reasoning_traces (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    symptom TEXT NOT NULL,
    stage TEXT NOT NULL,
    hypotheses_json TEXT NOT NULL DEFAULT '[]',
    observations_json TEXT NOT NULL DEFAULT '[]',
    conclusion TEXT,
    confidence REAL,
    duration_ms REAL NOT NULL,
    causal_chain_json TEXT NOT NULL DEFAULT '[]',
    narrative TEXT,
    created_at INTEGER NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_reasoning_traces_symptom
    ON reasoning_traces(symptom);
`;

/**
 * Open (or create) the health graph database and apply the schema.
 * Pass `:memory:` for an in-process database.
 */
export function openHealthDatabase(dbPath: string = DEFAULT_DB_PATH): HealthDatabase {
    if (dbPath !== ':memory:') {
        const resolved = path.resolve(dbPath);
        if (!fs.existsSync(path.dirname(resolved))) {
            fs.mkdirSync(path.dirname(resolved), { recursive: true });
        }
        dbPath = resolved;
    }

    const db = new Database(dbPath);
    db.pragma('journal_mode = WAL');
    db.exec(SCHEMA);
    return db;
}
