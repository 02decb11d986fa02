/**
 * SQLite Database Storage for Simulation Data
 * Persists runs, periodic snapshots, per-entity and per-relationship
 * metrics, the event stream and checkpoints for later analysis
 */

import Database from 'better-sqlite3';
import type { SimEvent, SimulationConfig, WorldState } from '../core/types.js';
import type { PersistenceSink } from '../history/checkpoint.js';
import { hashState } from '../core/rng.js';
import { SimulationConfigSchema } from '../core/schema.js';
import { getAggregateTension, getSocialClasses, getTerritories, getTotalWealth } from '../core/world.js';
import { assertCheckpointKey } from '../history/sinks.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Run information
 */
export interface RunInfo {
  id: number;
  seed: number;
  scenario: string;
  startedAt: Date;
  endedAt: Date | null;
  finalTick: number | null;
  config: SimulationConfig | null;
}

export interface SnapshotRow {
  tick: number;
  stateHash: string;
  totalWealth: number;
  aggregateTension: number;
  activeEntities: number;
  imperialRentPool: number;
  overshootRatio: number;
}

export interface StoredEvent {
  tick: number;
  type: string;
  targetId: string | null;
  payload: string;
}

export interface DatabaseStats {
  totalRuns: number;
  totalSnapshots: number;
  totalEvents: number;
  totalCheckpoints: number;
  dbSizeBytes: number;
}

interface RunRow {
  id: number;
  seed: number;
  scenario: string;
  started_at: string;
  ended_at: string | null;
  final_tick: number | null;
  config: string;
}

interface SnapshotDbRow {
  tick: number;
  state_hash: string;
  total_wealth: number;
  aggregate_tension: number;
  active_entities: number;
  imperial_rent_pool: number;
  overshoot_ratio: number;
}

interface EventDbRow {
  tick: number;
  event_type: string;
  target_id: string | null;
  payload: string;
}

interface CountRow {
  count: number;
}

// ============================================================================
// Schema
// ============================================================================

const SCHEMA = `
-- Simulation runs
CREATE TABLE IF NOT EXISTS runs (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  seed INTEGER NOT NULL,
  scenario TEXT NOT NULL DEFAULT 'custom',
  started_at TEXT NOT NULL DEFAULT (datetime('now')),
  ended_at TEXT,
  final_tick INTEGER,
  config TEXT NOT NULL
);

-- World state snapshots (every N ticks)
CREATE TABLE IF NOT EXISTS snapshots (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  run_id INTEGER NOT NULL,
  tick INTEGER NOT NULL,
  state_hash TEXT NOT NULL,
  total_wealth REAL NOT NULL,
  aggregate_tension REAL NOT NULL,
  active_entities INTEGER NOT NULL,
  imperial_rent_pool REAL NOT NULL,
  overshoot_ratio REAL NOT NULL,
  FOREIGN KEY (run_id) REFERENCES runs(id),
  UNIQUE(run_id, tick)
);

-- Entity metrics per snapshot
CREATE TABLE IF NOT EXISTS entity_metrics (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  snapshot_id INTEGER NOT NULL,
  entity_id TEXT NOT NULL,
  kind TEXT NOT NULL,
  role TEXT,
  active INTEGER NOT NULL,
  wealth REAL,
  class_consciousness REAL,
  national_identity REAL,
  agitation REAL,
  heat REAL,
  biocapacity REAL,
  FOREIGN KEY (snapshot_id) REFERENCES snapshots(id)
);

-- Relationship metrics per snapshot
CREATE TABLE IF NOT EXISTS relationship_metrics (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  snapshot_id INTEGER NOT NULL,
  source_id TEXT NOT NULL,
  target_id TEXT NOT NULL,
  kind TEXT NOT NULL,
  value_flow REAL NOT NULL,
  tension REAL NOT NULL,
  solidarity_strength REAL NOT NULL,
  FOREIGN KEY (snapshot_id) REFERENCES snapshots(id)
);

-- Simulation events
CREATE TABLE IF NOT EXISTS events (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  run_id INTEGER NOT NULL,
  tick INTEGER NOT NULL,
  event_type TEXT NOT NULL,
  target_id TEXT,
  payload TEXT NOT NULL,
  FOREIGN KEY (run_id) REFERENCES runs(id)
);

-- Serialized checkpoints
CREATE TABLE IF NOT EXISTS checkpoints (
  key TEXT PRIMARY KEY,
  data TEXT NOT NULL,
  updated_at TEXT NOT NULL DEFAULT (datetime('now'))
);

-- Indexes for common queries
CREATE INDEX IF NOT EXISTS idx_snapshots_run_tick ON snapshots(run_id, tick);
CREATE INDEX IF NOT EXISTS idx_entity_metrics_snapshot ON entity_metrics(snapshot_id);
CREATE INDEX IF NOT EXISTS idx_entity_metrics_entity ON entity_metrics(entity_id);
CREATE INDEX IF NOT EXISTS idx_relationship_metrics_snapshot ON relationship_metrics(snapshot_id);
CREATE INDEX IF NOT EXISTS idx_events_run ON events(run_id);
CREATE INDEX IF NOT EXISTS idx_events_run_tick ON events(run_id, tick);
`;

// ============================================================================
// SimulationDatabase Class
// ============================================================================

/**
 * SQLite database for simulation data storage
 * All methods are synchronous for simplicity with better-sqlite3
 */
export class SimulationDatabase {
  private db: Database.Database;
  private currentRunId: number | null = null;
  private snapshotInterval: number;
  private lastSnapshotTick: number = -1;
  private lastEventTick: number = -1;

  // Prepared statements for performance
  private readonly stmtInsertRun: Database.Statement<[number, string, string]>;
  private readonly stmtEndRun: Database.Statement<[number | null, number]>;
  private readonly stmtInsertSnapshot: Database.Statement<
    [number, number, string, number, number, number, number, number]
  >;
  private readonly stmtInsertEntityMetrics: Database.Statement<
    [number, string, string, string | null, number, number | null, number | null, number | null, number | null, number | null, number | null]
  >;
  private readonly stmtInsertRelationshipMetrics: Database.Statement<
    [number, string, string, string, number, number, number]
  >;
  private readonly stmtInsertEvent: Database.Statement<[number, number, string, string | null, string]>;
  private readonly stmtUpsertCheckpoint: Database.Statement<[string, string]>;
  private readonly stmtSelectCheckpoint: Database.Statement<[string], { data: string }>;
  private readonly stmtDeleteCheckpoint: Database.Statement<[string]>;

  /**
   * Create a new SimulationDatabase
   * @param dbPath Path to SQLite database file (use ':memory:' for in-memory)
   * @param snapshotInterval Record snapshots every N ticks (default: 10)
   */
  constructor(dbPath: string = 'simulation.db', snapshotInterval: number = 10) {
    this.db = new Database(dbPath);
    this.snapshotInterval = Math.max(1, snapshotInterval);

    // Enable WAL mode for better concurrent performance
    this.db.pragma('journal_mode = WAL');

    this.db.exec(SCHEMA);

    this.stmtInsertRun = this.db.prepare(`
      INSERT INTO runs (seed, scenario, config) VALUES (?, ?, ?)
    `);
    this.stmtEndRun = this.db.prepare(`
      UPDATE runs SET ended_at = datetime('now'), final_tick = ? WHERE id = ?
    `);
    this.stmtInsertSnapshot = this.db.prepare(`
      INSERT OR IGNORE INTO snapshots (run_id, tick, state_hash, total_wealth, aggregate_tension, active_entities, imperial_rent_pool, overshoot_ratio)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?)
    `);
    this.stmtInsertEntityMetrics = this.db.prepare(`
      INSERT INTO entity_metrics (snapshot_id, entity_id, kind, role, active, wealth, class_consciousness, national_identity, agitation, heat, biocapacity)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);
    this.stmtInsertRelationshipMetrics = this.db.prepare(`
      INSERT INTO relationship_metrics (snapshot_id, source_id, target_id, kind, value_flow, tension, solidarity_strength)
      VALUES (?, ?, ?, ?, ?, ?, ?)
    `);
    this.stmtInsertEvent = this.db.prepare(`
      INSERT INTO events (run_id, tick, event_type, target_id, payload)
      VALUES (?, ?, ?, ?, ?)
    `);
    this.stmtUpsertCheckpoint = this.db.prepare(`
      INSERT INTO checkpoints (key, data) VALUES (?, ?)
      ON CONFLICT(key) DO UPDATE SET data = excluded.data, updated_at = datetime('now')
    `);
    this.stmtSelectCheckpoint = this.db.prepare('SELECT data FROM checkpoints WHERE key = ?');
    this.stmtDeleteCheckpoint = this.db.prepare('DELETE FROM checkpoints WHERE key = ?');
  }

  // ============================================================================
  // Run Management
  // ============================================================================

  /**
   * Start tracking a new simulation run
   * @returns Run ID
   */
  startRun(seed: number, config: SimulationConfig, scenario: string = 'custom'): number {
    const result = this.stmtInsertRun.run(seed, scenario, JSON.stringify(config));
    this.currentRunId = Number(result.lastInsertRowid);
    this.lastSnapshotTick = -1;
    this.lastEventTick = -1;
    return this.currentRunId;
  }

  /**
   * Mark the current run as ended
   */
  endRun(finalTick: number | null = null): void {
    if (this.currentRunId === null) return;
    this.stmtEndRun.run(finalTick, this.currentRunId);
    this.currentRunId = null;
  }

  getCurrentRunId(): number | null {
    return this.currentRunId;
  }

  getRun(runId: number): RunInfo | null {
    const row = this.db
      .prepare<[number], RunRow>(
        'SELECT id, seed, scenario, started_at, ended_at, final_tick, config FROM runs WHERE id = ?'
      )
      .get(runId);
    return row ? toRunInfo(row) : null;
  }

  getAllRuns(): RunInfo[] {
    return this.db
      .prepare<[], RunRow>(
        'SELECT id, seed, scenario, started_at, ended_at, final_tick, config FROM runs ORDER BY id DESC'
      )
      .all()
      .map(toRunInfo);
  }

  // ============================================================================
  // Snapshot Recording
  // ============================================================================

  /**
   * Record a world state snapshot
   * Only records at the configured interval (e.g., every 10 ticks)
   * @returns true if snapshot was recorded, false if skipped
   */
  recordSnapshot(state: WorldState, force: boolean = false): boolean {
    if (this.currentRunId === null) return false;
    if (!force && this.lastSnapshotTick >= 0 && state.tick - this.lastSnapshotTick < this.snapshotInterval) {
      return false;
    }

    const runId = this.currentRunId;
    const insertSnapshot = this.db.transaction((): boolean => {
      const activeEntities = Object.values(state.entities).filter((e) => e.active).length;
      const snapshotResult = this.stmtInsertSnapshot.run(
        runId,
        state.tick,
        hashState(state),
        getTotalWealth(state),
        getAggregateTension(state),
        activeEntities,
        state.economy.imperialRentPool,
        state.economy.overshootRatio
      );
      // Tick already recorded for this run (e.g. replayed after an undo)
      if (snapshotResult.changes === 0) return false;
      const snapshotId = Number(snapshotResult.lastInsertRowid);

      for (const cls of getSocialClasses(state)) {
        this.stmtInsertEntityMetrics.run(
          snapshotId,
          cls.id,
          cls.kind,
          cls.role,
          cls.active ? 1 : 0,
          cls.wealth,
          cls.ideology.classConsciousness,
          cls.ideology.nationalIdentity,
          cls.ideology.agitation,
          null,
          null
        );
      }

      for (const territory of getTerritories(state)) {
        this.stmtInsertEntityMetrics.run(
          snapshotId,
          territory.id,
          territory.kind,
          null,
          territory.active ? 1 : 0,
          null,
          null,
          null,
          null,
          territory.heat,
          territory.biocapacity
        );
      }

      for (const rel of state.relationships) {
        this.stmtInsertRelationshipMetrics.run(
          snapshotId,
          rel.sourceId,
          rel.targetId,
          rel.kind,
          rel.valueFlow,
          rel.tension,
          rel.solidarityStrength
        );
      }
      return true;
    });

    const recorded = insertSnapshot();
    if (recorded) this.lastSnapshotTick = state.tick;
    return recorded;
  }

  getSnapshots(runId: number): SnapshotRow[] {
    return this.db
      .prepare<[number], SnapshotDbRow>(
        `SELECT tick, state_hash, total_wealth, aggregate_tension, active_entities, imperial_rent_pool, overshoot_ratio
         FROM snapshots WHERE run_id = ? ORDER BY tick`
      )
      .all(runId)
      .map((row) => ({
        tick: row.tick,
        stateHash: row.state_hash,
        totalWealth: row.total_wealth,
        aggregateTension: row.aggregate_tension,
        activeEntities: row.active_entities,
        imperialRentPool: row.imperial_rent_pool,
        overshootRatio: row.overshoot_ratio,
      }));
  }

  // ============================================================================
  // Event Recording
  // ============================================================================

  /**
   * Record a tick's events in one transaction. Like snapshots, the first
   * committed version of a tick wins: events at or below the newest tick
   * already recorded (a replay after undo) are skipped. Pass the committed
   * tick so a tick without events still counts as recorded.
   */
  recordEvents(events: readonly SimEvent[], committedTick: number = -1): void {
    if (this.currentRunId === null) return;

    const fresh = events.filter((event) => event.tick > this.lastEventTick);
    this.lastEventTick = Math.max(this.lastEventTick, committedTick, ...events.map((event) => event.tick));
    if (fresh.length === 0) return;

    const runId = this.currentRunId;
    const insertEvents = this.db.transaction((list: readonly SimEvent[]) => {
      for (const event of list) {
        const target = event.payload['targetId'];
        this.stmtInsertEvent.run(
          runId,
          event.tick,
          event.type,
          typeof target === 'string' ? target : null,
          JSON.stringify(event.payload)
        );
      }
    });

    insertEvents(fresh);
  }

  getEvents(runId: number, limit: number = 100, type?: string): StoredEvent[] {
    const rows =
      type === undefined
        ? this.db
            .prepare<[number, number], EventDbRow>(
              'SELECT tick, event_type, target_id, payload FROM events WHERE run_id = ? ORDER BY id DESC LIMIT ?'
            )
            .all(runId, limit)
        : this.db
            .prepare<[number, string, number], EventDbRow>(
              'SELECT tick, event_type, target_id, payload FROM events WHERE run_id = ? AND event_type = ? ORDER BY id DESC LIMIT ?'
            )
            .all(runId, type, limit);

    return rows.map((row) => ({
      tick: row.tick,
      type: row.event_type,
      targetId: row.target_id,
      payload: row.payload,
    }));
  }

  // ============================================================================
  // Checkpoints
  // ============================================================================

  writeCheckpoint(key: string, data: string): void {
    this.stmtUpsertCheckpoint.run(key, data);
  }

  readCheckpoint(key: string): string | null {
    return this.stmtSelectCheckpoint.get(key)?.data ?? null;
  }

  listCheckpoints(): string[] {
    return this.db
      .prepare<[], { key: string }>('SELECT key FROM checkpoints ORDER BY key')
      .all()
      .map((row) => row.key);
  }

  deleteCheckpoint(key: string): boolean {
    return this.stmtDeleteCheckpoint.run(key).changes > 0;
  }

  // ============================================================================
  // Utilities
  // ============================================================================

  close(): void {
    this.db.close();
  }

  /**
   * Raw handle for analytics queries
   */
  getDatabase(): Database.Database {
    return this.db;
  }

  /**
   * Get database statistics
   */
  getStats(): DatabaseStats {
    const count = (table: string): number =>
      this.db.prepare<[], CountRow>(`SELECT COUNT(*) as count FROM ${table}`).get()?.count ?? 0;

    const pageCount = this.db.pragma('page_count', { simple: true });
    const pageSize = this.db.pragma('page_size', { simple: true });

    return {
      totalRuns: count('runs'),
      totalSnapshots: count('snapshots'),
      totalEvents: count('events'),
      totalCheckpoints: count('checkpoints'),
      dbSizeBytes: typeof pageCount === 'number' && typeof pageSize === 'number' ? pageCount * pageSize : 0,
    };
  }
}

function toRunInfo(row: RunRow): RunInfo {
  return {
    id: row.id,
    seed: row.seed,
    scenario: row.scenario,
    startedAt: new Date(row.started_at),
    endedAt: row.ended_at ? new Date(row.ended_at) : null,
    finalTick: row.final_tick,
    config: parseStoredConfig(row.config),
  };
}

function parseStoredConfig(text: string): SimulationConfig | null {
  try {
    const parsed = SimulationConfigSchema.safeParse(JSON.parse(text));
    return parsed.success ? parsed.data : null;
  } catch (error) {
    console.warn('[Database] Stored run config is not valid JSON:', error);
    return null;
  }
}

/**
 * Checkpoint sink backed by the checkpoints table
 */
export class SqliteCheckpointSink implements PersistenceSink {
  private readonly database: SimulationDatabase;

  constructor(database: SimulationDatabase) {
    this.database = database;
  }

  write(key: string, data: string): void {
    assertCheckpointKey(key);
    this.database.writeCheckpoint(key, data);
  }

  read(key: string): string | null {
    return this.database.readCheckpoint(key);
  }

  exists(key: string): boolean {
    return this.database.readCheckpoint(key) !== null;
  }

  list(): string[] {
    return this.database.listCheckpoints();
  }

  remove(key: string): boolean {
    return this.database.deleteCheckpoint(key);
  }
}

/**
 * Create a simulation database instance
 * Returns null if database creation fails (allows simulation to run without DB)
 */
export function createDatabase(
  dbPath: string = 'simulation.db',
  snapshotInterval: number = 10
): SimulationDatabase | null {
  try {
    return new SimulationDatabase(dbPath, snapshotInterval);
  } catch (error) {
    console.warn('[Database] Failed to create database:', error);
    return null;
  }
}
